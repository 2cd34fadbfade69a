import type { NamedTypeSyntax, TypeParameterFragment, TypeSyntax } from "../../fragments/types.js";
import {
  createTypeParameters,
  TypeParameterNamespace,
  type TypeParameter,
  type TypeParameterKind,
} from "../../scopes/type-parameters.js";
import {
  namedTypeReferenceFromSyntax,
  typeReferenceFromSyntax,
  type NamedTypeReference,
  type TypeReference,
} from "../../scopes/type-reference.js";
import type { TypeScope, TypeScopeKind } from "../../scopes/type-scope.js";
import type { BindingContext } from "../types.js";

export interface BoundTypeParameters {
  namespace: TypeParameterNamespace;
  parameters: readonly TypeParameter[];
  scope: TypeScope;
}

/**
 * Declares a type parameter list in a fresh namespace and opens the scope
 * its bounds and the owner's signature resolve in. Members without type
 * parameters keep using the enclosing scope.
 */
export const bindTypeParameters = ({
  fragments = [],
  ownerName,
  allowNameConflict,
  parentScope,
  scopeKind,
  kind = "declared",
  synthesized = [],
  ctx,
}: {
  fragments?: readonly TypeParameterFragment[];
  ownerName: string;
  allowNameConflict: boolean;
  parentScope: TypeScope;
  scopeKind: Exclude<TypeScopeKind, "unit">;
  kind?: TypeParameterKind;
  /** Extension parameters copied in ahead of the member's own. */
  synthesized?: readonly TypeParameter[];
  ctx: BindingContext;
}): BoundTypeParameters => {
  const namespace = new TypeParameterNamespace();
  const parameters = createTypeParameters({
    fragments,
    kind,
    nextId: ctx.session.nextTypeParameterId,
  });

  namespace.declare(synthesized, {
    ownerName,
    allowNameConflict: true,
    problems: ctx.problems,
  });
  namespace.declare(parameters, {
    ownerName,
    allowNameConflict,
    problems: ctx.problems,
  });

  const opensScope =
    scopeKind !== "member-type-parameters" || namespace.size > 0;
  const scope = opensScope
    ? parentScope.createChild({ kind: scopeKind, typeParameters: namespace })
    : parentScope;

  parameters.forEach((parameter, index) => {
    const bound = fragments[index]?.bound;
    if (bound) parameter.bound = buildType(bound, scope, ctx);
  });

  return { namespace, parameters, scope };
};

export const buildType = (
  syntax: TypeSyntax,
  scope: TypeScope,
  ctx: BindingContext
): TypeReference =>
  typeReferenceFromSyntax({
    syntax,
    scope,
    problems: ctx.problems,
    nextTypeParameterId: ctx.session.nextTypeParameterId,
  });

export const buildNamedType = (
  syntax: NamedTypeSyntax,
  scope: TypeScope,
  ctx: BindingContext
): NamedTypeReference =>
  namedTypeReferenceFromSyntax({
    syntax,
    scope,
    problems: ctx.problems,
    nextTypeParameterId: ctx.session.nextTypeParameterId,
  });
