import { InternalBindingError, unhandled } from "../../errors.js";
import type { Fragment } from "../../fragments/types.js";
import { incrementBinderPerfCounter } from "../../perf.js";
import type { SymbolRecord } from "../../symbols/types.js";
import type { PendingInsertion } from "../namespace-builder.js";
import type { BindingContext, ContainerContext } from "../types.js";
import {
  bindClass,
  bindEnum,
  bindExtension,
  bindExtensionType,
  bindMixin,
  bindNamedMixinApplication,
  bindTypedef,
} from "./declarations.js";
import { bindField } from "./fields.js";
import { bindConstructor, bindMethod } from "./members.js";

export interface BoundFragment {
  symbol: SymbolRecord;
  /** Entries this fragment appended to its container's pending list. */
  insertions: readonly PendingInsertion[];
}

export const describeContainer = (container: ContainerContext): string =>
  container.kind === "unit"
    ? "a unit body"
    : `the body of ${container.kind} '${container.name}'`;

const requireUnitLevel = (fragment: Fragment, container: ContainerContext) => {
  if (container.kind !== "unit") {
    unhandled(
      `${fragment.kind} fragment`,
      describeContainer(container),
      fragment.span
    );
  }
};

export const bindFragment = (
  fragment: Fragment,
  container: ContainerContext,
  ctx: BindingContext
): BoundFragment => {
  if (ctx.session.boundFragments.has(fragment)) {
    throw new InternalBindingError(
      `${fragment.kind} fragment bound twice`,
      fragment.span
    );
  }
  ctx.session.boundFragments.add(fragment);
  incrementBinderPerfCounter("binder.fragments");

  const firstInsertion = container.pending.length;
  const symbol = bindByKind(fragment, container, ctx);
  return { symbol, insertions: container.pending.slice(firstInsertion) };
};

const bindByKind = (
  fragment: Fragment,
  container: ContainerContext,
  ctx: BindingContext
): SymbolRecord => {
  switch (fragment.kind) {
    case "typedef":
      requireUnitLevel(fragment, container);
      return bindTypedef(fragment, container, ctx);
    case "class":
      requireUnitLevel(fragment, container);
      return bindClass(fragment, container, ctx);
    case "mixin":
      requireUnitLevel(fragment, container);
      return bindMixin(fragment, container, ctx);
    case "named-mixin-application":
      requireUnitLevel(fragment, container);
      return bindNamedMixinApplication(fragment, container, ctx);
    case "enum":
      requireUnitLevel(fragment, container);
      return bindEnum(fragment, container, ctx);
    case "extension":
      requireUnitLevel(fragment, container);
      return bindExtension(fragment, container, ctx);
    case "extension-type":
      requireUnitLevel(fragment, container);
      return bindExtensionType(fragment, container, ctx);
    case "field":
      return bindField(fragment, container, ctx);
    case "method":
      return bindMethod(fragment, container, ctx);
    case "constructor":
    case "factory":
      return bindConstructor(fragment, container, ctx);
  }
};
