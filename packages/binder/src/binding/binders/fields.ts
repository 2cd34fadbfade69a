import type {
  EnumConstantFragment,
  FieldFragment,
  RepresentationFieldFragment,
} from "../../fragments/types.js";
import type { ReferenceHandle, SourceSpan, SymbolId } from "../../ids.js";
import {
  createNameScheme,
  fieldMemberName,
  procedureMemberName,
  type CanonicalName,
  type NameScheme,
} from "../../naming/name-scheme.js";
import { incrementBinderPerfCounter } from "../../perf.js";
import type { TypeReference } from "../../scopes/type-reference.js";
import type {
  FieldSymbol,
  LoweredSlotKind,
  LoweredSlotSymbol,
  SymbolReferences,
} from "../../symbols/types.js";
import { reuseHandle } from "../context.js";
import type { BindingContext, ContainerContext } from "../types.js";
import { buildType } from "./type-parameters.js";

type FieldFlags = Pick<
  FieldSymbol,
  | "isStatic"
  | "isConst"
  | "isFinal"
  | "isLate"
  | "isExternal"
  | "hasInitializer"
  | "isRepresentationField"
  | "isEnumConstant"
  | "isSynthesized"
  | "isAugmentation"
>;

type HandleLookup = (name: CanonicalName) => ReferenceHandle | undefined;
type ReferenceResolver = (lookup: HandleLookup) => SymbolReferences;

const plainField: FieldFlags = {
  isStatic: false,
  isConst: false,
  isFinal: false,
  isLate: false,
  isExternal: false,
  hasInitializer: false,
  isRepresentationField: false,
  isEnumConstant: false,
  isSynthesized: false,
  isAugmentation: false,
};

const schemeFor = (container: ContainerContext, isStatic: boolean) =>
  createNameScheme({
    container: { kind: container.kind, name: container.name },
    isStatic,
  });

const registerField = ({
  name,
  span,
  flags,
  type,
  container,
  references,
  ctx,
}: {
  name: string;
  span: SourceSpan;
  flags: Partial<FieldFlags>;
  type?: TypeReference;
  container: ContainerContext;
  /** Looks up the field's handles once its id is known. */
  references: ReferenceResolver;
  ctx: BindingContext;
}): FieldSymbol => {
  const field = ctx.session.symbols.register(
    (id): FieldSymbol => ({
      ...plainField,
      ...flags,
      id,
      kind: "field",
      name,
      span,
      unit: ctx.uri,
      container: container.symbol,
      references: references((key) =>
        reuseHandle({
          references: container.references,
          name: key,
          symbol: id,
          ctx,
        })
      ),
      type,
      loweredSlots: [],
    })
  );
  container.pending.push({ name, symbol: field.id, span });
  return field;
};

/** Field, getter and setter handles sharing one canonical text. */
const accessorReferences =
  (text: string, hasSetter: boolean): ReferenceResolver =>
  (lookup) => ({
    node: lookup({ bucket: "field", text }),
    getter: lookup({ bucket: "getter", text }),
    setter: hasSetter ? lookup({ bucket: "setter", text }) : undefined,
  });

const lowerLateField = ({
  field,
  scheme,
  container,
  ctx,
}: {
  field: FieldSymbol;
  scheme: NameScheme;
  container: ContainerContext;
  ctx: BindingContext;
}): void => {
  const synthesized = { isSynthesized: true };
  const isSetText = fieldMemberName(
    scheme,
    "is-set-field",
    field.name,
    synthesized
  );
  const lateText = fieldMemberName(scheme, "getter", field.name, synthesized);
  const slots: [LoweredSlotKind, CanonicalName][] = [
    ["is-set-field", { bucket: "field", text: isSetText }],
    ["is-set-getter", { bucket: "getter", text: isSetText }],
    ["is-set-setter", { bucket: "setter", text: isSetText }],
    ["late-getter", { bucket: "getter", text: lateText }],
  ];
  // A late final field with an initializer can never be assigned.
  if (!(field.isFinal && field.hasInitializer)) {
    slots.push(["late-setter", { bucket: "setter", text: lateText }]);
  }

  slots.forEach(([slot, key]) => {
    const symbol = ctx.session.symbols.register(
      (id: SymbolId): LoweredSlotSymbol => ({
        id,
        kind: "lowered-slot",
        slot,
        field: field.id,
        name: key.text,
        span: field.span,
        unit: ctx.uri,
        container: container.symbol,
        references: {
          node: reuseHandle({
            references: container.references,
            name: key,
            symbol: id,
            ctx,
          }),
        },
        isAugmentation: false,
      })
    );
    field.loweredSlots.push(symbol.id);
  });
  incrementBinderPerfCounter("binder.fields.lowered");
};

export const bindField = (
  fragment: FieldFragment,
  container: ContainerContext,
  ctx: BindingContext
): FieldSymbol => {
  const modifiers = fragment.modifiers ?? {};
  const flags: FieldFlags = {
    ...plainField,
    isStatic: modifiers.isStatic ?? false,
    isConst: modifiers.isConst ?? false,
    isFinal: modifiers.isFinal ?? false,
    isLate: modifiers.isLate ?? false,
    isExternal: modifiers.isExternal ?? false,
    hasInitializer: fragment.hasInitializer ?? false,
    isAugmentation: modifiers.isAugment ?? false,
  };
  const scheme = schemeFor(container, flags.isStatic);
  const type = fragment.type
    ? buildType(fragment.type, container.typeScope, ctx)
    : undefined;

  const hasSetter =
    !flags.isConst &&
    (!flags.isFinal || (flags.isLate && !flags.hasInitializer));
  const isStaticStorage = !scheme.isInstanceMember;
  const isLateLowered =
    flags.isLate &&
    (ctx.options.lateLowering({
      hasInitializer: flags.hasInitializer,
      isFinal: flags.isFinal,
      isStatic: isStaticStorage,
    }) ||
      (ctx.options.staticFieldLowering && isStaticStorage));
  const lowersToFunctions =
    container.kind === "extension" || container.kind === "extension-type";

  const references = ((): ReferenceResolver => {
    if (flags.isExternal && lowersToFunctions && scheme.isInstanceMember) {
      // External instance fields of extensions are a getter/setter pair of
      // unit-level functions.
      const getter = procedureMemberName(scheme, "getter", fragment.name);
      const setter = procedureMemberName(scheme, "setter", fragment.name);
      return (lookup) => ({
        getter: lookup(getter),
        setter: hasSetter ? lookup(setter) : undefined,
      });
    }
    if (isLateLowered) {
      const text = fieldMemberName(scheme, "field", fragment.name, {
        isSynthesized: true,
      });
      return (lookup) => ({
        node: lookup({ bucket: "field", text }),
      });
    }
    return accessorReferences(
      fieldMemberName(scheme, "field", fragment.name, { isSynthesized: false }),
      hasSetter
    );
  })();

  const field = registerField({
    name: fragment.name,
    span: fragment.span,
    flags,
    type,
    container,
    references,
    ctx,
  });

  if (isLateLowered) {
    lowerLateField({ field, scheme, container, ctx });
  }
  return field;
};

export const bindEnumConstant = (
  constant: EnumConstantFragment,
  container: ContainerContext,
  ctx: BindingContext
): FieldSymbol =>
  registerField({
    name: constant.name,
    span: constant.span,
    flags: {
      isStatic: true,
      isConst: true,
      isFinal: true,
      isEnumConstant: true,
    },
    container,
    references: accessorReferences(
      fieldMemberName(schemeFor(container, true), "field", constant.name, {
        isSynthesized: false,
      }),
      false
    ),
    ctx,
  });

/** The `values` list every enum declares implicitly. */
export const bindEnumValues = (
  span: SourceSpan,
  container: ContainerContext,
  ctx: BindingContext
): FieldSymbol =>
  registerField({
    name: "values",
    span,
    flags: {
      isStatic: true,
      isConst: true,
      isFinal: true,
      isSynthesized: true,
    },
    container,
    references: accessorReferences(
      fieldMemberName(schemeFor(container, true), "field", "values", {
        isSynthesized: false,
      }),
      false
    ),
    ctx,
  });

export const bindRepresentationField = ({
  fragment,
  type,
  container,
  ctx,
}: {
  fragment: RepresentationFieldFragment;
  type: TypeReference;
  container: ContainerContext;
  ctx: BindingContext;
}): FieldSymbol => {
  const text = fieldMemberName(
    schemeFor(container, false),
    "representation-field",
    fragment.name,
    { isSynthesized: false }
  );
  return registerField({
    name: fragment.name,
    span: fragment.span,
    flags: { isFinal: true, isRepresentationField: true },
    type,
    container,
    references: (lookup) => ({ getter: lookup({ bucket: "getter", text }) }),
    ctx,
  });
};
