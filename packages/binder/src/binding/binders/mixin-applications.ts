import type { NamedTypeSyntax } from "../../fragments/types.js";
import type { SourceSpan, SymbolId } from "../../ids.js";
import {
  copyTypeParameters,
  TypeParameterNamespace,
  type TypeParameter,
} from "../../scopes/type-parameters.js";
import type { NamedTypeReference } from "../../scopes/type-reference.js";
import type { TypeScope } from "../../scopes/type-scope.js";
import type { ClassLikeSymbol, SupertypeReference } from "../../symbols/types.js";
import { registerHandle } from "../context.js";
import type { BindingContext } from "../types.js";
import { buildNamedType } from "./type-parameters.js";

/** The declaration that ends a `with` clause under its own name. */
export interface NamedApplication {
  name: string;
  span: SourceSpan;
  isAugmentation: boolean;
  isAbstract: boolean;
  scope: TypeScope;
  interfaces: readonly NamedTypeSyntax[];
}

export const mixinApplicationName = ({
  subclass,
  supertype,
  mixins,
}: {
  subclass: string;
  supertype: string;
  mixins: readonly string[];
}): string => `_${subclass}&${[supertype, ...mixins].join("&")}`;

/**
 * Turns `supertype with M1, M2, ...` into a chain of mixin applications,
 * each extending the previous one, and returns the supertype the declaring
 * class ends up with. When `named` is given the last application is the
 * named declaration itself.
 */
export const applyMixins = ({
  subclass,
  supertype,
  mixins,
  typeParameters,
  scope: declarationScope,
  named,
  ctx,
}: {
  subclass: string;
  supertype: NamedTypeSyntax;
  mixins: readonly NamedTypeSyntax[];
  /** Where the supertype resolves when there are no mixins. */
  scope: TypeScope;
  /** Parameters of the declaring class, copied into each application. */
  typeParameters: readonly TypeParameter[];
  named?: NamedApplication;
  ctx: BindingContext;
}): { supertype: SupertypeReference; last?: ClassLikeSymbol } => {
  let current: SupertypeReference | undefined;
  let last: ClassLikeSymbol | undefined;

  for (const [index, mixin] of mixins.entries()) {
    const declared = index === mixins.length - 1 ? named : undefined;
    const name = declared
      ? declared.name
      : mixinApplicationName({
          subclass,
          supertype: supertype.name,
          mixins: mixins.slice(0, index + 1).map((entry) => entry.name),
        });
    const scope = declared
      ? declared.scope
      : applicationScope({ name, typeParameters, ctx });

    const applicationSupertype: SupertypeReference = current ?? {
      kind: "type",
      reference: buildNamedType(supertype, scope, ctx),
    };
    const mixedInType = buildNamedType(mixin, scope, ctx);
    const interfaces = declared
      ? declared.interfaces.map((entry) => buildNamedType(entry, scope, ctx))
      : [];

    const application = registerApplication({
      name,
      span: declared ? declared.span : mixin.span,
      supertype: applicationSupertype,
      mixedInType,
      interfaces,
      named: declared,
      ctx,
    });

    if (!declared) {
      ctx.unit.pending.push({
        name,
        symbol: application.id,
        span: application.span,
      });
    }

    current = { kind: "application", symbol: application.id };
    last = application;
  }

  return {
    supertype: current ?? {
      kind: "type",
      reference: buildNamedType(supertype, declarationScope, ctx),
    },
    last,
  };
};

const applicationScope = ({
  name,
  typeParameters,
  ctx,
}: {
  name: string;
  typeParameters: readonly TypeParameter[];
  ctx: BindingContext;
}): TypeScope => {
  const copies = new TypeParameterNamespace();
  copies.declare(
    copyTypeParameters({
      parameters: typeParameters,
      kind: "declared",
      nextId: ctx.session.nextTypeParameterId,
    }),
    { ownerName: name, allowNameConflict: true, problems: ctx.problems }
  );
  copies.freeze();
  return ctx.unitTypeScope.createChild({
    kind: "unnamed-mixin-application",
    typeParameters: copies,
  });
};

const registerApplication = ({
  name,
  span,
  supertype,
  mixedInType,
  interfaces,
  named,
  ctx,
}: {
  name: string;
  span: SourceSpan;
  supertype: SupertypeReference;
  mixedInType: NamedTypeReference;
  interfaces: readonly NamedTypeReference[];
  named?: NamedApplication;
  ctx: BindingContext;
}): ClassLikeSymbol => {
  const handle = ctx.referenceIndex?.lookupDeclaration("class", name)?.handle;
  const application = ctx.session.symbols.register(
    (id: SymbolId): ClassLikeSymbol => ({
      id,
      kind: "class",
      classKind: "mixin-application",
      name,
      span,
      unit: ctx.uri,
      references: { node: handle },
      isAugmentation: named?.isAugmentation ?? false,
      isSynthesized: named === undefined,
      isNamedMixinApplication: named !== undefined,
      isAbstract: named?.isAbstract ?? true,
      supertype,
      mixedInType,
      interfaces,
      enumConstants: [],
    })
  );
  if (handle) {
    registerHandle({ handle, symbol: application.id, ctx });
  }
  ctx.mixinApplications.set(application.id, mixedInType);
  return application;
};
