import { unexpected } from "../../errors.js";
import type {
  ClassFragment,
  EnumConstantFragment,
  EnumFragment,
  ExtensionFragment,
  ExtensionTypeFragment,
  MemberFragment,
  MixinFragment,
  NamedMixinApplicationFragment,
  NamedTypeSyntax,
  TypedefFragment,
} from "../../fragments/types.js";
import type { SourceSpan } from "../../ids.js";
import {
  unnamedExtensionName,
  type ContainerKind,
} from "../../naming/name-scheme.js";
import type {
  ContainerReferenceIndex,
  ReferenceLookup,
} from "../../references/reference-index.js";
import type {
  TypeParameter,
  TypeParameterNamespace,
} from "../../scopes/type-parameters.js";
import type { TypeScope } from "../../scopes/type-scope.js";
import type {
  ClassLikeSymbol,
  ExtensionSymbol,
  ExtensionTypeSymbol,
  SymbolRecord,
  TypeAliasSymbol,
} from "../../symbols/types.js";
import { registerHandle } from "../context.js";
import { Namespace } from "../namespace.js";
import type { BindingContext, ContainerContext } from "../types.js";
import {
  bindEnumConstant,
  bindEnumValues,
  bindRepresentationField,
} from "./fields.js";
import { bindFragment } from "./index.js";
import { applyMixins } from "./mixin-applications.js";
import {
  bindTypeParameters,
  buildNamedType,
  buildType,
} from "./type-parameters.js";

const recordDeclarationHandle = (
  index: ContainerReferenceIndex | undefined,
  symbol: SymbolRecord,
  ctx: BindingContext
) => {
  if (index) {
    registerHandle({ handle: index.handle, symbol: symbol.id, ctx });
  }
};

const addInsertion = (container: ContainerContext, symbol: SymbolRecord) => {
  container.pending.push({
    name: symbol.name,
    symbol: symbol.id,
    span: symbol.span,
  });
};

const objectSupertype = (
  span: SourceSpan,
  ctx: BindingContext
): NamedTypeSyntax => ({
  kind: "named",
  name: ctx.options.coreTypes.object,
  span,
});

const bindDeclarationBody = ({
  symbol,
  kind,
  kindLabel,
  members = [],
  typeParameters,
  parameters,
  scope,
  references,
  hasConstructors,
  prelude,
  ctx,
}: {
  symbol: SymbolRecord;
  kind: Exclude<ContainerKind, "unit">;
  kindLabel: string;
  members?: readonly MemberFragment[];
  typeParameters: TypeParameterNamespace;
  parameters: readonly TypeParameter[];
  scope: TypeScope;
  references?: ReferenceLookup;
  hasConstructors: boolean;
  prelude?: (body: ContainerContext) => void;
  ctx: BindingContext;
}): void => {
  const body: ContainerContext = {
    kind,
    name: symbol.name,
    symbol: symbol.id,
    references,
    pending: [],
    typeScope: scope,
    extensionTypeParameters:
      kind === "extension" || kind === "extension-type"
        ? parameters
        : undefined,
  };

  prelude?.(body);
  members.forEach((member) => bindFragment(member, body, ctx));
  typeParameters.freeze();

  ctx.declarations.push({
    symbol: symbol.id,
    name: symbol.name,
    kindLabel,
    namespace: new Namespace({ hasConstructors }),
    typeParameters,
    typeScope: scope,
    pending: body.pending,
  });
};

export const bindTypedef = (
  fragment: TypedefFragment,
  container: ContainerContext,
  ctx: BindingContext
): TypeAliasSymbol => {
  const { namespace, scope } = bindTypeParameters({
    fragments: fragment.typeParameters,
    ownerName: fragment.name,
    allowNameConflict: true,
    parentScope: container.typeScope,
    scopeKind: "declaration-type-parameters",
    ctx,
  });
  namespace.freeze();
  const aliasedType = buildType(fragment.aliasedType, scope, ctx);
  const persisted = ctx.referenceIndex?.lookupDeclaration(
    "typedef",
    fragment.name
  );

  const symbol = ctx.session.symbols.register(
    (id): TypeAliasSymbol => ({
      id,
      kind: "type-alias",
      name: fragment.name,
      span: fragment.span,
      unit: ctx.uri,
      references: { node: persisted?.handle },
      isAugmentation: fragment.modifiers?.isAugment ?? false,
      aliasedType,
    })
  );
  recordDeclarationHandle(persisted, symbol, ctx);
  addInsertion(container, symbol);
  return symbol;
};

const bindClassLike = ({
  fragment,
  classKind,
  supertype,
  mixins,
  container,
  ctx,
}: {
  fragment: ClassFragment | MixinFragment | EnumFragment;
  classKind: "class" | "mixin" | "enum";
  supertype?: NamedTypeSyntax;
  mixins: readonly NamedTypeSyntax[];
  container: ContainerContext;
  ctx: BindingContext;
}): ClassLikeSymbol => {
  const { namespace, parameters, scope } = bindTypeParameters({
    fragments: fragment.typeParameters,
    ownerName: fragment.name,
    allowNameConflict: false,
    parentScope: container.typeScope,
    scopeKind: "declaration-type-parameters",
    ctx,
  });

  // Applications are inserted ahead of the class that uses them.
  const resolvedSupertype = supertype
    ? applyMixins({
        subclass: fragment.name,
        supertype,
        mixins,
        typeParameters: parameters,
        scope,
        ctx,
      }).supertype
    : undefined;
  const interfaces = (fragment.interfaces ?? []).map((entry) =>
    buildNamedType(entry, scope, ctx)
  );
  const modifiers = fragment.modifiers ?? {};
  const constants: readonly EnumConstantFragment[] =
    fragment.kind === "enum" ? fragment.constants : [];

  const references = ctx.referenceIndex?.lookupDeclaration(
    "class",
    fragment.name
  );
  const symbol = ctx.session.symbols.register(
    (id): ClassLikeSymbol => ({
      id,
      kind: "class",
      classKind,
      name: fragment.name,
      span: fragment.span,
      unit: ctx.uri,
      references: { node: references?.handle },
      isAugmentation: modifiers.isAugment ?? false,
      isSynthesized: false,
      isNamedMixinApplication: false,
      isAbstract: modifiers.isAbstract ?? false,
      supertype: resolvedSupertype,
      interfaces,
      enumConstants: constants.map((constant) => constant.name),
    })
  );
  recordDeclarationHandle(references, symbol, ctx);
  addInsertion(container, symbol);

  bindDeclarationBody({
    symbol,
    kind: "class-like",
    kindLabel: classKind,
    members: fragment.members,
    typeParameters: namespace,
    parameters,
    scope,
    references,
    hasConstructors: classKind !== "mixin",
    prelude:
      classKind === "enum"
        ? (body) => {
            constants.forEach((constant) =>
              bindEnumConstant(constant, body, ctx)
            );
            bindEnumValues(fragment.span, body, ctx);
          }
        : undefined,
    ctx,
  });
  return symbol;
};

export const bindClass = (
  fragment: ClassFragment,
  container: ContainerContext,
  ctx: BindingContext
): ClassLikeSymbol => {
  const isRoot =
    fragment.supertype === undefined &&
    fragment.name === ctx.options.coreTypes.object;
  return bindClassLike({
    fragment,
    classKind: "class",
    supertype: isRoot
      ? undefined
      : (fragment.supertype ?? objectSupertype(fragment.span, ctx)),
    mixins: fragment.mixins ?? [],
    container,
    ctx,
  });
};

/** The first `on` type is the supertype; later ones are applied as mixins. */
export const bindMixin = (
  fragment: MixinFragment,
  container: ContainerContext,
  ctx: BindingContext
): ClassLikeSymbol => {
  const [first, ...rest] = fragment.onTypes ?? [];
  return bindClassLike({
    fragment,
    classKind: "mixin",
    supertype: first ?? objectSupertype(fragment.span, ctx),
    mixins: rest,
    container,
    ctx,
  });
};

export const bindEnum = (
  fragment: EnumFragment,
  container: ContainerContext,
  ctx: BindingContext
): ClassLikeSymbol =>
  bindClassLike({
    fragment,
    classKind: "enum",
    supertype: {
      kind: "named",
      name: ctx.options.coreTypes.enumBase,
      span: fragment.span,
    },
    mixins: fragment.mixins ?? [],
    container,
    ctx,
  });

export const bindNamedMixinApplication = (
  fragment: NamedMixinApplicationFragment,
  container: ContainerContext,
  ctx: BindingContext
): ClassLikeSymbol => {
  const { namespace, parameters, scope } = bindTypeParameters({
    fragments: fragment.typeParameters,
    ownerName: fragment.name,
    allowNameConflict: false,
    parentScope: container.typeScope,
    scopeKind: "declaration-type-parameters",
    ctx,
  });

  const { last } = applyMixins({
    subclass: fragment.name,
    supertype: fragment.supertype,
    mixins: fragment.mixins,
    typeParameters: parameters,
    scope,
    named: {
      name: fragment.name,
      span: fragment.span,
      isAugmentation: fragment.modifiers?.isAugment ?? false,
      isAbstract: fragment.modifiers?.isAbstract ?? false,
      scope,
      interfaces: fragment.interfaces ?? [],
    },
    ctx,
  });
  if (!last) {
    return unexpected(
      `a mixin clause on '${fragment.name}'`,
      "no mixins",
      fragment.span
    );
  }
  addInsertion(container, last);

  bindDeclarationBody({
    symbol: last,
    kind: "class-like",
    kindLabel: "class",
    typeParameters: namespace,
    parameters,
    scope,
    references: ctx.referenceIndex?.lookupDeclaration("class", fragment.name),
    hasConstructors: true,
    ctx,
  });
  return last;
};

export const bindExtension = (
  fragment: ExtensionFragment,
  container: ContainerContext,
  ctx: BindingContext
): ExtensionSymbol => {
  const name =
    fragment.name ?? unnamedExtensionName(ctx.nextUnnamedExtension++);
  const { namespace, parameters, scope } = bindTypeParameters({
    fragments: fragment.typeParameters,
    ownerName: name,
    allowNameConflict: true,
    parentScope: container.typeScope,
    scopeKind: "declaration-type-parameters",
    ctx,
  });
  const onType = buildType(fragment.onType, scope, ctx);
  const persisted = ctx.referenceIndex?.lookupDeclaration("extension", name);

  const symbol = ctx.session.symbols.register(
    (id): ExtensionSymbol => ({
      id,
      kind: "extension",
      name,
      span: fragment.span,
      unit: ctx.uri,
      references: { node: persisted?.handle },
      isAugmentation: fragment.modifiers?.isAugment ?? false,
      isUnnamed: fragment.name === undefined,
      onType,
    })
  );
  recordDeclarationHandle(persisted, symbol, ctx);
  addInsertion(container, symbol);

  // Extension members lower to unit-level functions and use the unit's
  // persisted handles.
  bindDeclarationBody({
    symbol,
    kind: "extension",
    kindLabel: "extension",
    members: fragment.members,
    typeParameters: namespace,
    parameters,
    scope,
    references: ctx.referenceIndex,
    hasConstructors: false,
    ctx,
  });
  return symbol;
};

export const bindExtensionType = (
  fragment: ExtensionTypeFragment,
  container: ContainerContext,
  ctx: BindingContext
): ExtensionTypeSymbol => {
  const { namespace, parameters, scope } = bindTypeParameters({
    fragments: fragment.typeParameters,
    ownerName: fragment.name,
    allowNameConflict: false,
    parentScope: container.typeScope,
    scopeKind: "declaration-type-parameters",
    ctx,
  });
  const representationType = buildType(
    fragment.representation.type,
    scope,
    ctx
  );
  const interfaces = (fragment.interfaces ?? []).map((entry) =>
    buildNamedType(entry, scope, ctx)
  );

  const references = ctx.referenceIndex?.lookupDeclaration(
    "extension-type",
    fragment.name
  );
  const symbol = ctx.session.symbols.register(
    (id): ExtensionTypeSymbol => ({
      id,
      kind: "extension-type",
      name: fragment.name,
      span: fragment.span,
      unit: ctx.uri,
      references: { node: references?.handle },
      isAugmentation: fragment.modifiers?.isAugment ?? false,
      representationType,
      interfaces,
    })
  );
  recordDeclarationHandle(references, symbol, ctx);
  addInsertion(container, symbol);

  bindDeclarationBody({
    symbol,
    kind: "extension-type",
    kindLabel: "extension type",
    members: fragment.members,
    typeParameters: namespace,
    parameters,
    scope,
    references,
    hasConstructors: true,
    prelude: (body) =>
      bindRepresentationField({
        fragment: fragment.representation,
        type: representationType,
        container: body,
        ctx,
      }),
    ctx,
  });
  return symbol;
};
