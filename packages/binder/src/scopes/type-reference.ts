import {
  diagnosticFromCode,
  type ProblemReporter,
} from "../diagnostics/index.js";
import { InternalBindingError } from "../errors.js";
import type { NamedTypeSyntax, TypeSyntax } from "../fragments/types.js";
import type { SourceSpan, SymbolId, TypeParameterId } from "../ids.js";
import type { SymbolArena } from "../symbols/symbol-arena.js";
import { describeSymbolKind, isTypeDeclaration } from "../symbols/types.js";
import { lookupGetable, type LookupScope } from "./lookup-scope.js";
import {
  createTypeParameters,
  TypeParameterNamespace,
  type TypeParameter,
} from "./type-parameters.js";
import type { TypeScope } from "./type-scope.js";

export type TypeTarget =
  | { kind: "declaration"; symbol: SymbolId }
  | { kind: "type-parameter"; parameter: TypeParameter }
  | { kind: "builtin"; name: string }
  | { kind: "invalid"; reason: "not-found" | "not-a-type" };

export interface TypeResolutionContext {
  problems: ProblemReporter;
  symbols: SymbolArena;
}

export class NamedTypeReference {
  readonly kind = "named";
  readonly name: string;
  readonly span: SourceSpan;
  readonly typeArguments: readonly TypeReference[];
  readonly nullable: boolean;
  private resolved?: TypeTarget;

  constructor({
    name,
    span,
    typeArguments = [],
    nullable = false,
  }: {
    name: string;
    span: SourceSpan;
    typeArguments?: readonly TypeReference[];
    nullable?: boolean;
  }) {
    this.name = name;
    this.span = span;
    this.typeArguments = typeArguments;
    this.nullable = nullable;
  }

  get target(): TypeTarget | undefined {
    return this.resolved;
  }

  get isResolved(): boolean {
    return this.resolved !== undefined;
  }

  resolveIn(
    scope: LookupScope,
    { problems, symbols }: TypeResolutionContext
  ): TypeTarget {
    if (this.resolved) {
      throw new InternalBindingError(
        `type '${this.name}' resolved twice`,
        this.span
      );
    }

    const found = lookupGetable(scope, this.name);
    if (!found) {
      problems.report(
        diagnosticFromCode({
          code: "SR0001",
          params: { kind: "type-not-found", name: this.name },
          span: this.span,
        })
      );
      this.resolved = { kind: "invalid", reason: "not-found" };
      return this.resolved;
    }

    switch (found.kind) {
      case "builtin":
        this.resolved = { kind: "builtin", name: found.name };
        return this.resolved;
      case "type-parameter":
        this.resolved = { kind: "type-parameter", parameter: found.parameter };
        return this.resolved;
      case "symbol": {
        const symbol = symbols.get(found.symbol);
        if (isTypeDeclaration(symbol)) {
          this.resolved = { kind: "declaration", symbol: symbol.id };
          return this.resolved;
        }
        problems.report(
          diagnosticFromCode({
            code: "SR0002",
            params: {
              kind: "not-a-type",
              name: this.name,
              declarationKind: describeSymbolKind(symbol),
            },
            span: this.span,
          })
        );
        this.resolved = { kind: "invalid", reason: "not-a-type" };
        return this.resolved;
      }
    }
  }
}

export interface FunctionTypeReference {
  kind: "function";
  span: SourceSpan;
  typeParameters: TypeParameterNamespace;
  returnType?: TypeReference;
  parameterTypes: readonly TypeReference[];
  nullable: boolean;
}

export type TypeReference = NamedTypeReference | FunctionTypeReference;

type TypeBuildContext = {
  scope: TypeScope;
  problems: ProblemReporter;
  nextTypeParameterId: () => TypeParameterId;
};

export const namedTypeReferenceFromSyntax = ({
  syntax,
  scope,
  problems,
  nextTypeParameterId,
}: TypeBuildContext & { syntax: NamedTypeSyntax }): NamedTypeReference => {
  const reference = new NamedTypeReference({
    name: syntax.name,
    span: syntax.span,
    typeArguments: syntax.typeArguments?.map((argument) =>
      typeReferenceFromSyntax({
        syntax: argument,
        scope,
        problems,
        nextTypeParameterId,
      })
    ),
    nullable: syntax.nullable,
  });
  scope.registerUnresolved(reference);
  return reference;
};

/**
 * Builds the reference tree for a piece of type syntax. Every named
 * reference is registered with the scope it is written in; function types
 * with type parameters open a child scope of their own.
 */
export const typeReferenceFromSyntax = ({
  syntax,
  scope,
  problems,
  nextTypeParameterId,
}: TypeBuildContext & { syntax: TypeSyntax }): TypeReference => {
  if (syntax.kind === "named") {
    return namedTypeReferenceFromSyntax({
      syntax,
      scope,
      problems,
      nextTypeParameterId,
    });
  }

  const typeParameters = new TypeParameterNamespace();
  const parameters = createTypeParameters({
    fragments: syntax.typeParameters ?? [],
    kind: "function",
    nextId: nextTypeParameterId,
  });
  typeParameters.declare(parameters, {
    ownerName: "",
    allowNameConflict: true,
    problems,
  });
  typeParameters.freeze();

  const innerScope =
    parameters.length > 0
      ? scope.createChild({ kind: "function-type-parameters", typeParameters })
      : scope;
  const build = (inner: TypeSyntax): TypeReference =>
    typeReferenceFromSyntax({
      syntax: inner,
      scope: innerScope,
      problems,
      nextTypeParameterId,
    });

  parameters.forEach((parameter, index) => {
    const bound = syntax.typeParameters?.[index]?.bound;
    if (bound) parameter.bound = build(bound);
  });

  return {
    kind: "function",
    span: syntax.span,
    typeParameters,
    returnType: syntax.returnType ? build(syntax.returnType) : undefined,
    parameterTypes: syntax.parameterTypes?.map(build) ?? [],
    nullable: syntax.nullable ?? false,
  };
};
