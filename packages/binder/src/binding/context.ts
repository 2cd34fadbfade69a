import { DiagnosticEmitter } from "../diagnostics/index.js";
import type { ReferenceHandle, SymbolId } from "../ids.js";
import type { CanonicalName } from "../naming/name-scheme.js";
import type { ReferenceLookup } from "../references/reference-index.js";
import {
  BuiltinLookupScope,
  NamespaceLookupScope,
} from "../scopes/lookup-scope.js";
import { TypeScope } from "../scopes/type-scope.js";
import { createCompilationSession } from "../session.js";
import { incrementBinderPerfCounter } from "../perf.js";
import { Namespace } from "./namespace.js";
import type {
  BindingContext,
  BindingInputs,
  BindingOptions,
  BindingResult,
  CoreTypeNames,
  LateLoweringPredicate,
  ResolvedBindingOptions,
} from "./types.js";

export const defaultCoreTypes: CoreTypeNames = {
  object: "Object",
  enumBase: "_Enum",
  builtins: [
    "Object",
    "_Enum",
    "Enum",
    "Null",
    "Never",
    "dynamic",
    "void",
    "bool",
    "int",
    "double",
    "num",
    "String",
    "List",
    "Map",
    "Set",
    "Iterable",
    "Function",
    "Type",
    "Future",
  ],
};

const toPredicate = (
  lateLowering: BindingOptions["lateLowering"]
): LateLoweringPredicate => {
  if (typeof lateLowering === "function") return lateLowering;
  const enabled = lateLowering ?? false;
  return () => enabled;
};

export const resolveBindingOptions = (
  options: BindingOptions = {}
): ResolvedBindingOptions => ({
  lateLowering: toPredicate(options.lateLowering),
  staticFieldLowering: options.staticFieldLowering ?? false,
  coreTypes: { ...defaultCoreTypes, ...options.coreTypes },
});

export const createBindingContext = ({
  unit,
  session,
  referenceIndex,
  options,
  problems,
}: BindingInputs): BindingContext => {
  const resolvedOptions = resolveBindingOptions(options);
  const unitNamespace = new Namespace({ hasConstructors: false });
  const builtins = new BuiltinLookupScope([
    resolvedOptions.coreTypes.object,
    resolvedOptions.coreTypes.enumBase,
    ...resolvedOptions.coreTypes.builtins,
  ]);
  const unitTypeScope = TypeScope.createRoot(
    new NamespaceLookupScope(unitNamespace, builtins)
  );

  return {
    session: session ?? createCompilationSession(),
    problems: new DiagnosticEmitter({ forwardTo: problems }),
    options: resolvedOptions,
    uri: unit.uri,
    referenceIndex,
    unitNamespace,
    unitTypeScope,
    unit: {
      kind: "unit",
      name: unit.uri,
      references: referenceIndex,
      pending: [],
      typeScope: unitTypeScope,
    },
    declarations: [],
    mixinApplications: new Map(),
    nextUnnamedExtension: 0,
    reusedHandles: 0,
  };
};

export const toBindingResult = (
  ctx: BindingContext,
  {
    resolvedTypes,
    phasesMs,
  }: { resolvedTypes: number; phasesMs: Readonly<Record<string, number>> }
): BindingResult => ({
  uri: ctx.uri,
  session: ctx.session,
  unitNamespace: ctx.unitNamespace,
  declarations: ctx.declarations,
  mixinApplications: ctx.mixinApplications,
  typeScope: ctx.unitTypeScope,
  registeredTypes: ctx.unitTypeScope.registeredCount,
  resolvedTypes,
  reusedHandles: ctx.reusedHandles,
  diagnostics: ctx.problems.diagnostics,
  phasesMs,
});

/**
 * Looks up a persisted handle and, when one exists, records it for `symbol`
 * in the session's handle table.
 */
export const reuseHandle = ({
  references,
  name,
  symbol,
  ctx,
}: {
  references: ReferenceLookup | undefined;
  name: CanonicalName;
  symbol: SymbolId;
  ctx: BindingContext;
}): ReferenceHandle | undefined => {
  const handle = references?.lookup(name);
  if (!handle) return undefined;
  registerHandle({ handle, symbol, ctx });
  return handle;
};

export const registerHandle = ({
  handle,
  symbol,
  ctx,
}: {
  handle: ReferenceHandle;
  symbol: SymbolId;
  ctx: BindingContext;
}): void => {
  ctx.session.handles.register(handle, symbol);
  ctx.reusedHandles += 1;
  incrementBinderPerfCounter("binder.handles.reused");
};
