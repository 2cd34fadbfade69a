import { describe, expect, it } from "vitest";
import { DiagnosticEmitter } from "../../diagnostics/index.js";
import { InternalBindingError } from "../../errors.js";
import type { ProcedureKind } from "../../fragments/types.js";
import type { SourceSpan, SymbolId } from "../../ids.js";
import { createTypeParameters, TypeParameterNamespace } from "../../scopes/type-parameters.js";
import { SymbolArena } from "../../symbols/symbol-arena.js";
import type {
  ClassLikeSymbol,
  ConstructorSymbol,
  ExtensionSymbol,
  ProcedureSymbol,
} from "../../symbols/types.js";
import { Namespace } from "../namespace.js";
import {
  buildNamespace,
  isDuplicatedDeclaration,
  type NamespaceOwner,
  type PendingInsertion,
} from "../namespace-builder.js";
import { NamedTypeReference } from "../../scopes/type-reference.js";

const at = (start: number): SourceSpan => ({
  file: "unit.src",
  start,
  end: start + 1,
});

const base = (id: SymbolId, name: string, isAugmentation = false) => ({
  id,
  name,
  span: at(id * 10),
  unit: "unit.src",
  references: {},
  isAugmentation,
});

const setup = () => {
  const symbols = new SymbolArena();
  const problems = new DiagnosticEmitter();

  const procedure = (
    name: string,
    procedureKind: ProcedureKind = "method",
    { isAugmentation = false }: { isAugmentation?: boolean } = {}
  ) =>
    symbols.register(
      (id): ProcedureSymbol => ({
        ...base(id, name, isAugmentation),
        kind: "procedure",
        procedureKind,
        isStatic: false,
        isExternal: false,
        isAbstract: false,
        typeParameters: new TypeParameterNamespace(),
        formals: [],
      })
    );

  const classLike = (
    name: string,
    { isSynthesized = false }: { isSynthesized?: boolean } = {}
  ) =>
    symbols.register(
      (id): ClassLikeSymbol => ({
        ...base(id, name),
        kind: "class",
        classKind: isSynthesized ? "mixin-application" : "class",
        isSynthesized,
        isNamedMixinApplication: false,
        isAbstract: isSynthesized,
        mixedInType: isSynthesized
          ? new NamedTypeReference({ name: "M", span: at(0) })
          : undefined,
        interfaces: [],
        enumConstants: [],
      })
    );

  const constructorNamed = (name: string) =>
    symbols.register(
      (id): ConstructorSymbol => ({
        ...base(id, name),
        kind: "constructor",
        isConst: false,
        isExternal: false,
        formals: [],
      })
    );

  const extension = (
    name: string,
    isUnnamed: boolean,
    { isAugmentation = false }: { isAugmentation?: boolean } = {}
  ) =>
    symbols.register(
      (id): ExtensionSymbol => ({
        ...base(id, name, isAugmentation),
        kind: "extension",
        isUnnamed,
        onType: new NamedTypeReference({ name: "int", span: at(0) }),
      })
    );

  const build = (
    entries: readonly { id: SymbolId; name: string; span: SourceSpan }[],
    {
      owner,
      hasConstructors = owner !== undefined,
    }: { owner?: NamespaceOwner; hasConstructors?: boolean } = {}
  ) => {
    const insertions: PendingInsertion[] = entries.map(({ id, name, span }) => ({
      name,
      symbol: id,
      span,
    }));
    return buildNamespace({
      insertions,
      namespace: new Namespace({ hasConstructors }),
      owner,
      problems,
      symbols,
    });
  };

  const codes = () => problems.diagnostics.map((diagnostic) => diagnostic.code);

  return { symbols, problems, procedure, classLike, constructorNamed, extension, build, codes };
};

const ownerNamed = (name: string, ...typeParameters: string[]): NamespaceOwner => {
  let next = 0;
  const namespace = new TypeParameterNamespace();
  namespace.declare(
    createTypeParameters({
      fragments: typeParameters.map((entry, index) => ({
        name: entry,
        span: at(900 + index),
      })),
      kind: "declared",
      nextId: () => next++,
    }),
    { ownerName: name, allowNameConflict: true, problems: new DiagnosticEmitter() }
  );
  return { name, kindLabel: "class", typeParameters: namespace };
};

describe("buildNamespace", () => {
  it("routes symbols into getable, setable and constructor maps", () => {
    const { procedure, constructorNamed, build, codes } = setup();
    const get = procedure("size", "getter");
    const set = procedure("size", "setter");
    const ctor = constructorNamed("");
    const namespace = build([get, set, ctor], { owner: ownerNamed("Box") });

    expect(namespace.lookupGetable("size")).toBe(get.id);
    expect(namespace.lookupSetable("size")).toBe(set.id);
    expect(namespace.lookupConstructor("")).toBe(ctor.id);
    expect(codes()).toEqual([]);
    expect(namespace.isSealed).toBe(true);
  });

  it("reports one duplicate at the second declaration with a note at the first", () => {
    const { symbols, procedure, build, problems } = setup();
    const first = procedure("run");
    const second = procedure("run");
    const namespace = build([first, second]);

    expect(namespace.lookupGetable("run")).toBe(second.id);
    expect(symbols.get(second.id).next).toBe(first.id);
    expect(problems.diagnostics).toHaveLength(1);
    const [duplicate] = problems.diagnostics;
    expect(duplicate?.code).toBe("BD0001");
    expect(duplicate?.span).toEqual(second.span);
    expect(duplicate?.related?.map(({ span, severity }) => ({ span, severity }))).toEqual([
      { span: first.span, severity: "note" },
    ]);
  });

  it("reports duplicated constructors under the owner's name", () => {
    const { constructorNamed, build, problems } = setup();
    build(
      [
        constructorNamed(""),
        constructorNamed(""),
        constructorNamed("named"),
        constructorNamed("named"),
      ],
      { owner: ownerNamed("Box") }
    );

    expect(problems.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      "'Box' is already declared in this scope",
      "'Box.named' is already declared in this scope",
    ]);
  });

  it("chains augmentations without reporting them", () => {
    const { procedure, build, codes } = setup();
    const original = procedure("run");
    const first = procedure("run", "method", { isAugmentation: true });
    const second = procedure("run", "method", { isAugmentation: true });
    const setterBase = procedure("value", "setter");
    const setterAugment = procedure("value", "setter", { isAugmentation: true });
    const namespace = build([original, first, second, setterBase, setterAugment]);

    expect(codes()).toEqual([]);
    expect(namespace.lookupGetable("run")).toBe(second.id);
    expect(namespace.augmentationsOf("run")).toEqual([first.id, second.id]);
    expect(namespace.setterAugmentationsOf("value")).toEqual([setterAugment.id]);
    expect(namespace.augmentationsOf("value")).toEqual([]);
  });

  it("accepts an augmentation with no base silently", () => {
    const { procedure, build, codes } = setup();
    const orphan = procedure("run", "method", { isAugmentation: true });
    const namespace = build([orphan]);

    expect(namespace.lookupGetable("run")).toBe(orphan.id);
    expect(namespace.augmentationsOf("run")).toEqual([]);
    expect(codes()).toEqual([]);
  });

  it("warns about an augmentation with no base named like its owner", () => {
    const { procedure, build, codes } = setup();
    const orphan = procedure("Box", "method", { isAugmentation: true });
    const namespace = build([orphan], { owner: ownerNamed("Box") });

    expect(namespace.lookupGetable("Box")).toBe(orphan.id);
    expect(codes()).toEqual(["BD0002"]);
  });

  it("reports a constructor named like a type parameter", () => {
    const { constructorNamed, build, problems } = setup();
    const named = constructorNamed("T");
    build([named], { owner: ownerNamed("Box", "T") });

    expect(problems.diagnostics.map(({ code, span }) => ({ code, span }))).toEqual([
      { code: "BD0003", span: named.span },
    ]);
  });

  it("lets synthesized mixin applications share a name", () => {
    const { classLike, build, codes } = setup();
    const first = classLike("_A&S&M", { isSynthesized: true });
    const second = classLike("_A&S&M", { isSynthesized: true });
    const third = classLike("_A&S&M", { isSynthesized: true });
    const namespace = build([first, second, third]);

    expect(codes()).toEqual([]);
    expect(namespace.lookupGetable("_A&S&M")).toBe(third.id);
  });

  it("treats a redeclared class as a duplicate", () => {
    const { classLike, build, codes } = setup();
    build([classLike("A"), classLike("A")]);
    expect(codes()).toEqual(["BD0001"]);
  });

  it("is idempotent for a symbol inserted twice", () => {
    const { procedure, build, codes } = setup();
    const run = procedure("run");
    const namespace = build([run, run]);

    expect(namespace.lookupGetable("run")).toBe(run.id);
    expect(codes()).toEqual([]);
  });

  it("fails when a symbol is already chained to another entry", () => {
    const { symbols, procedure, build } = setup();
    const first = procedure("run");
    const other = procedure("run");
    const incoming = procedure("run");
    symbols.link(incoming.id, other.id);

    expect(() => build([first, incoming])).toThrow(InternalBindingError);
  });

  it("fails on a constructor in a unit namespace", () => {
    const { constructorNamed, build } = setup();
    expect(() => build([constructorNamed("")])).toThrow("unhandled constructor ''");
  });

  it("warns about members named like their owner", () => {
    const { procedure, constructorNamed, build, problems } = setup();
    build([procedure("Box"), constructorNamed("Box")], { owner: ownerNamed("Box") });

    expect(
      problems.diagnostics.map(({ code, severity, message }) => ({ code, severity, message }))
    ).toEqual([
      {
        code: "BD0002",
        severity: "warning",
        message: "member 'Box' has the same name as the enclosing class",
      },
    ]);
  });

  it("reports members that clash with a type parameter", () => {
    const { procedure, build, problems } = setup();
    const clash = procedure("T", "getter");
    build([clash, procedure("value")], { owner: ownerNamed("Box", "T") });

    expect(problems.diagnostics).toHaveLength(1);
    const [conflict] = problems.diagnostics;
    expect(conflict?.code).toBe("BD0003");
    expect(conflict?.span).toEqual(clash.span);
    expect(conflict?.related?.[0]?.span).toEqual(at(900));
    expect(conflict?.related?.[0]?.message).toBe("type parameter declared here");
  });

  it("keeps unnamed extensions out of the maps", () => {
    const { extension, build } = setup();
    const unnamed = extension("_extension#0", true);
    const namedExtension = extension("Tools", false);
    const namespace = build([unnamed, namedExtension]);

    expect(namespace.lookupGetable("_extension#0")).toBeUndefined();
    expect(namespace.lookupGetable("Tools")).toBe(namedExtension.id);
    expect(namespace.extensions()).toEqual([unnamed.id, namedExtension.id]);
  });

  it("keeps augmenting named extensions in the extension set", () => {
    const { extension, build, codes } = setup();
    const orphan = extension("Tools", false, { isAugmentation: true });
    const original = extension("Helpers", false);
    const augmenting = extension("Helpers", false, { isAugmentation: true });
    const namespace = build([orphan, original, augmenting]);

    expect(codes()).toEqual([]);
    expect(namespace.lookupGetable("Helpers")).toBe(augmenting.id);
    expect(namespace.extensions()).toEqual([orphan.id, original.id, augmenting.id]);
    expect(namespace.augmentationsOf("Helpers")).toEqual([]);
  });

  it("rejects mutation after sealing", () => {
    const { procedure, build } = setup();
    const namespace = build([procedure("run")]);
    expect(() => namespace.set("getable", "other", 0)).toThrow(
      "namespace is sealed"
    );
  });
});

describe("isDuplicatedDeclaration", () => {
  it("never treats a getter and setter pair as duplicates", () => {
    const { symbols, procedure } = setup();
    const get = procedure("x", "getter");
    const set = procedure("x", "setter");
    expect(isDuplicatedDeclaration({ existing: get, incoming: set, symbols })).toBe(false);
    expect(isDuplicatedDeclaration({ existing: set, incoming: get, symbols })).toBe(false);
  });

  it("flags any chain that reaches a declared class", () => {
    const { symbols, classLike } = setup();
    const declared = classLike("_A&S&M");
    const first = classLike("_A&S&M", { isSynthesized: true });
    const second = classLike("_A&S&M", { isSynthesized: true });
    symbols.link(first.id, declared.id);
    symbols.link(second.id, first.id);

    expect(
      isDuplicatedDeclaration({ existing: first, incoming: second, symbols })
    ).toBe(true);
  });
});
