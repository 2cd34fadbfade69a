/**
 * Identifier aliases shared by the binder, the namespace builder and the
 * scope tree. Symbol ids index into the session's symbol arena.
 */
export type SymbolId = number;
export type TypeParameterId = number;
export type TypeScopeId = number;

/** Stable cross-build identity of a bound symbol. */
export type ReferenceHandle = string & { readonly __brand: "ReferenceHandle" };

export const toReferenceHandle = (value: string): ReferenceHandle =>
  value as ReferenceHandle;

export type {
  SourceSpan,
  DiagnosticSeverity,
  Diagnostic,
  DiagnosticPhase,
} from "./diagnostics/index.js";
