export * from "./diagnostics/index.js";
export { InternalBindingError } from "./errors.js";
export type {
  ReferenceHandle,
  SymbolId,
  TypeParameterId,
  TypeScopeId,
} from "./ids.js";
export { toReferenceHandle } from "./ids.js";
export type * from "./fragments/types.js";
export * from "./naming/name-scheme.js";
export * from "./symbols/types.js";
export { SymbolArena } from "./symbols/symbol-arena.js";
export * from "./references/reference-index.js";
export { ReferenceHandleTable } from "./references/handle-table.js";
export {
  createCompilationSession,
  type CompilationSession,
} from "./session.js";
export {
  TypeParameter,
  TypeParameterNamespace,
  type TypeParameterKind,
} from "./scopes/type-parameters.js";
export {
  NamedTypeReference,
  type FunctionTypeReference,
  type TypeReference,
  type TypeTarget,
} from "./scopes/type-reference.js";
export { TypeScope, type TypeScopeKind } from "./scopes/type-scope.js";
export type { LookupResult, LookupScope } from "./scopes/lookup-scope.js";
export { Namespace, type NamespaceMapKind } from "./binding/namespace.js";
export {
  buildNamespace,
  isDuplicatedDeclaration,
  type NamespaceOwner,
  type PendingInsertion,
} from "./binding/namespace-builder.js";
export {
  defaultCoreTypes,
  resolveBindingOptions,
} from "./binding/context.js";
export {
  bindUnit,
  resolveUnitTypes,
  runBindingPipeline,
} from "./binding/binding.js";
export type * from "./binding/types.js";
export { mixinApplicationName } from "./binding/binders/mixin-applications.js";
export {
  walkBindingResult,
  type WalkedMap,
  type WalkedSymbol,
} from "./binding/walk.js";
export {
  diffBinderPerfCounters,
  logBinderPerfSummary,
  snapshotBinderPerfCounters,
} from "./perf.js";
