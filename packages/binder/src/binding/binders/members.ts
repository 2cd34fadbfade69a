import { unhandled } from "../../errors.js";
import type {
  ConstructorFragment,
  FactoryFragment,
  FormalParameterFragment,
  MethodFragment,
} from "../../fragments/types.js";
import {
  constructorMemberName,
  createNameScheme,
  procedureMemberName,
  procedureTearOffName,
} from "../../naming/name-scheme.js";
import { copyTypeParameters } from "../../scopes/type-parameters.js";
import type { TypeScope } from "../../scopes/type-scope.js";
import type {
  BoundFormal,
  ConstructorSymbol,
  ProcedureSymbol,
} from "../../symbols/types.js";
import { reuseHandle } from "../context.js";
import type { BindingContext, ContainerContext } from "../types.js";
import { describeContainer } from "./index.js";
import {
  bindTypeParameters,
  buildNamedType,
  buildType,
} from "./type-parameters.js";

const bindFormals = (
  formals: readonly FormalParameterFragment[] | undefined,
  scope: TypeScope,
  ctx: BindingContext
): BoundFormal[] =>
  (formals ?? []).map((formal) => ({
    name: formal.name,
    span: formal.span,
    type: formal.type ? buildType(formal.type, scope, ctx) : undefined,
    isNamed: formal.isNamed ?? false,
    isRequired: formal.isRequired ?? !formal.isNamed,
  }));

export const bindMethod = (
  fragment: MethodFragment,
  container: ContainerContext,
  ctx: BindingContext
): ProcedureSymbol => {
  const modifiers = fragment.modifiers ?? {};
  const isStatic = modifiers.isStatic ?? false;
  const isAugmentation = modifiers.isAugment ?? false;
  const scheme = createNameScheme({
    container: { kind: container.kind, name: container.name },
    isStatic,
  });

  // Instance members of extensions are lowered to functions that take the
  // extension's type parameters as their own leading parameters.
  const synthesized =
    scheme.isInstanceMember && container.extensionTypeParameters
      ? copyTypeParameters({
          parameters: container.extensionTypeParameters,
          kind: "extension-synthesized",
          nextId: ctx.session.nextTypeParameterId,
        })
      : [];
  const { namespace, scope } = bindTypeParameters({
    fragments: fragment.typeParameters,
    ownerName: fragment.name,
    allowNameConflict: true,
    parentScope: container.typeScope,
    scopeKind: "member-type-parameters",
    synthesized,
    ctx,
  });
  const formals = bindFormals(fragment.formals, scope, ctx);
  const returnType = fragment.returnType
    ? buildType(fragment.returnType, scope, ctx)
    : undefined;
  namespace.freeze();

  const key = procedureMemberName(scheme, fragment.procedureKind, fragment.name);
  const tearOff = procedureTearOffName(
    scheme,
    fragment.procedureKind,
    fragment.name
  );

  const symbol = ctx.session.symbols.register(
    (id): ProcedureSymbol => ({
      id,
      kind: "procedure",
      procedureKind: fragment.procedureKind,
      name: fragment.name,
      span: fragment.span,
      unit: ctx.uri,
      container: container.symbol,
      // Augmenting members never take over a persisted handle.
      references: isAugmentation
        ? {}
        : {
            node: reuseHandle({
              references: container.references,
              name: key,
              symbol: id,
              ctx,
            }),
            tearOff: tearOff
              ? reuseHandle({
                  references: container.references,
                  name: tearOff,
                  symbol: id,
                  ctx,
                })
              : undefined,
          },
      isAugmentation,
      isStatic,
      isExternal: modifiers.isExternal ?? false,
      isAbstract: modifiers.isAbstract ?? false,
      typeParameters: namespace,
      formals,
      returnType,
    })
  );
  container.pending.push({
    name: fragment.name,
    symbol: symbol.id,
    span: fragment.span,
  });
  return symbol;
};

export const bindConstructor = (
  fragment: ConstructorFragment | FactoryFragment,
  container: ContainerContext,
  ctx: BindingContext
): ConstructorSymbol => {
  if (container.kind !== "class-like" && container.kind !== "extension-type") {
    return unhandled(
      `${fragment.kind} '${fragment.name}'`,
      describeContainer(container),
      fragment.span
    );
  }

  const modifiers = fragment.modifiers ?? {};
  const scheme = createNameScheme({
    container: { kind: container.kind, name: container.name },
    isStatic: true,
  });
  const scope = container.typeScope;
  const formals = bindFormals(fragment.formals, scope, ctx);
  const returnType =
    fragment.kind === "factory" && fragment.returnType
      ? buildType(fragment.returnType, scope, ctx)
      : undefined;
  const redirectionTarget =
    fragment.kind === "factory" && fragment.redirectionTarget
      ? buildNamedType(fragment.redirectionTarget, scope, ctx)
      : undefined;

  const key = constructorMemberName(scheme, fragment.name, { isTearOff: false });
  const tearOff = constructorMemberName(scheme, fragment.name, {
    isTearOff: true,
  });

  const symbol = ctx.session.symbols.register(
    (id): ConstructorSymbol => ({
      id,
      kind: fragment.kind,
      name: fragment.name,
      span: fragment.span,
      unit: ctx.uri,
      container: container.symbol,
      references: {
        node: reuseHandle({
          references: container.references,
          name: key,
          symbol: id,
          ctx,
        }),
        tearOff: reuseHandle({
          references: container.references,
          name: tearOff,
          symbol: id,
          ctx,
        }),
      },
      isAugmentation: modifiers.isAugment ?? false,
      isConst: modifiers.isConst ?? false,
      isExternal: modifiers.isExternal ?? false,
      formals,
      returnType,
      redirectionTarget,
    })
  );
  container.pending.push({
    name: fragment.name,
    symbol: symbol.id,
    span: fragment.span,
  });
  return symbol;
};
