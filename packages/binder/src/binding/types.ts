import type {
  Diagnostic,
  DiagnosticEmitter,
  ProblemReporter,
} from "../diagnostics/index.js";
import type { CompilationUnitInput } from "../fragments/types.js";
import type { SymbolId } from "../ids.js";
import type { ContainerKind } from "../naming/name-scheme.js";
import type {
  ReferenceLookup,
  UnitReferenceIndex,
} from "../references/reference-index.js";
import type {
  TypeParameter,
  TypeParameterNamespace,
} from "../scopes/type-parameters.js";
import type { NamedTypeReference } from "../scopes/type-reference.js";
import type { TypeScope } from "../scopes/type-scope.js";
import type { CompilationSession } from "../session.js";
import type { Namespace } from "./namespace.js";
import type { PendingInsertion } from "./namespace-builder.js";

export interface LateFieldShape {
  hasInitializer: boolean;
  isFinal: boolean;
  /** True for static members and unit-level fields. */
  isStatic: boolean;
}

export type LateLoweringPredicate = (field: LateFieldShape) => boolean;

export interface CoreTypeNames {
  object: string;
  enumBase: string;
  /** Names resolvable as types without a declaration in the unit. */
  builtins: readonly string[];
}

export interface BindingOptions {
  lateLowering?: boolean | LateLoweringPredicate;
  /** Lowers every static and unit-level late field, whatever `lateLowering` says. */
  staticFieldLowering?: boolean;
  coreTypes?: Partial<CoreTypeNames>;
}

export interface ResolvedBindingOptions {
  lateLowering: LateLoweringPredicate;
  staticFieldLowering: boolean;
  coreTypes: CoreTypeNames;
}

export interface BindingInputs {
  unit: CompilationUnitInput;
  session?: CompilationSession;
  /** Handles persisted by a previous build; absent on a clean build. */
  referenceIndex?: UnitReferenceIndex;
  options?: BindingOptions;
  /** Receives every diagnostic as it is reported. */
  problems?: ProblemReporter;
}

export interface DeclarationBinding {
  symbol: SymbolId;
  name: string;
  kindLabel: string;
  namespace: Namespace;
  typeParameters: TypeParameterNamespace;
  typeScope: TypeScope;
  pending: PendingInsertion[];
}

export interface ContainerContext {
  kind: ContainerKind;
  name: string;
  symbol?: SymbolId;
  /** Where members look up persisted handles. */
  references?: ReferenceLookup;
  pending: PendingInsertion[];
  typeScope: TypeScope;
  /** Declared parameters of an extension (type), copied into instance members. */
  extensionTypeParameters?: readonly TypeParameter[];
}

export interface BindingContext {
  session: CompilationSession;
  problems: DiagnosticEmitter;
  options: ResolvedBindingOptions;
  uri: string;
  referenceIndex?: UnitReferenceIndex;
  unitNamespace: Namespace;
  unitTypeScope: TypeScope;
  unit: ContainerContext;
  declarations: DeclarationBinding[];
  mixinApplications: Map<SymbolId, NamedTypeReference>;
  nextUnnamedExtension: number;
  reusedHandles: number;
}

export interface BoundUnit {
  context: BindingContext;
  phasesMs: Record<string, number>;
}

export interface BindingResult {
  uri: string;
  session: CompilationSession;
  unitNamespace: Namespace;
  declarations: readonly DeclarationBinding[];
  /** Mixin application symbol to the type it mixes in. */
  mixinApplications: ReadonlyMap<SymbolId, NamedTypeReference>;
  typeScope: TypeScope;
  registeredTypes: number;
  resolvedTypes: number;
  reusedHandles: number;
  diagnostics: readonly Diagnostic[];
  /** Phase timings, filled only when perf reporting is enabled. */
  phasesMs: Readonly<Record<string, number>>;
}
