import type { ReferenceHandle, SourceSpan, SymbolId } from "../ids.js";
import type { ProcedureKind } from "../fragments/types.js";
import type { TypeParameterNamespace } from "../scopes/type-parameters.js";
import type {
  NamedTypeReference,
  TypeReference,
} from "../scopes/type-reference.js";

export interface SymbolReferences {
  node?: ReferenceHandle;
  getter?: ReferenceHandle;
  setter?: ReferenceHandle;
  tearOff?: ReferenceHandle;
}

interface SymbolBase {
  id: SymbolId;
  name: string;
  span: SourceSpan;
  /** Uri of the compilation unit that bound the symbol. */
  unit: string;
  /** Enclosing declaration; absent for unit-level symbols. */
  container?: SymbolId;
  references: SymbolReferences;
  isAugmentation: boolean;
  /** Previously bound symbol of the same name and map, set at most once. */
  next?: SymbolId;
}

export interface TypeAliasSymbol extends SymbolBase {
  kind: "type-alias";
  aliasedType: TypeReference;
}

export type ClassLikeKind = "class" | "mixin" | "enum" | "mixin-application";

export type SupertypeReference =
  | { kind: "type"; reference: NamedTypeReference }
  | { kind: "application"; symbol: SymbolId };

export interface ClassLikeSymbol extends SymbolBase {
  kind: "class";
  classKind: ClassLikeKind;
  /** Unnamed applications produced from a `with` clause. */
  isSynthesized: boolean;
  isNamedMixinApplication: boolean;
  isAbstract: boolean;
  supertype?: SupertypeReference;
  mixedInType?: NamedTypeReference;
  interfaces: readonly NamedTypeReference[];
  enumConstants: readonly string[];
}

export interface ExtensionSymbol extends SymbolBase {
  kind: "extension";
  isUnnamed: boolean;
  onType: TypeReference;
}

export interface ExtensionTypeSymbol extends SymbolBase {
  kind: "extension-type";
  representationType: TypeReference;
  interfaces: readonly NamedTypeReference[];
}

export interface FieldSymbol extends SymbolBase {
  kind: "field";
  isStatic: boolean;
  isConst: boolean;
  isFinal: boolean;
  isLate: boolean;
  isExternal: boolean;
  hasInitializer: boolean;
  isRepresentationField: boolean;
  isEnumConstant: boolean;
  isSynthesized: boolean;
  type?: TypeReference;
  /** Extra slots bound when late initialization is lowered. */
  loweredSlots: SymbolId[];
}

export interface BoundFormal {
  name: string;
  span: SourceSpan;
  type?: TypeReference;
  isNamed: boolean;
  isRequired: boolean;
}

export interface ProcedureSymbol extends SymbolBase {
  kind: "procedure";
  procedureKind: ProcedureKind;
  isStatic: boolean;
  isExternal: boolean;
  isAbstract: boolean;
  typeParameters: TypeParameterNamespace;
  formals: readonly BoundFormal[];
  returnType?: TypeReference;
}

export interface ConstructorSymbol extends SymbolBase {
  kind: "constructor" | "factory";
  isConst: boolean;
  isExternal: boolean;
  formals: readonly BoundFormal[];
  returnType?: TypeReference;
  redirectionTarget?: NamedTypeReference;
}

export type LoweredSlotKind =
  | "is-set-field"
  | "is-set-getter"
  | "is-set-setter"
  | "late-getter"
  | "late-setter";

export interface LoweredSlotSymbol extends SymbolBase {
  kind: "lowered-slot";
  slot: LoweredSlotKind;
  field: SymbolId;
}

export type SymbolRecord =
  | TypeAliasSymbol
  | ClassLikeSymbol
  | ExtensionSymbol
  | ExtensionTypeSymbol
  | FieldSymbol
  | ProcedureSymbol
  | ConstructorSymbol
  | LoweredSlotSymbol;

export type SymbolKind = SymbolRecord["kind"];

export const isConstructorLike = (
  symbol: SymbolRecord
): symbol is ConstructorSymbol =>
  symbol.kind === "constructor" || symbol.kind === "factory";

export const isSetterSymbol = (symbol: SymbolRecord): boolean =>
  (symbol.kind === "procedure" && symbol.procedureKind === "setter") ||
  (symbol.kind === "lowered-slot" &&
    (symbol.slot === "is-set-setter" || symbol.slot === "late-setter"));

export const isGetterSymbol = (symbol: SymbolRecord): boolean =>
  (symbol.kind === "procedure" && symbol.procedureKind === "getter") ||
  (symbol.kind === "lowered-slot" &&
    (symbol.slot === "is-set-getter" || symbol.slot === "late-getter"));

export const isTypeDeclaration = (symbol: SymbolRecord): boolean =>
  symbol.kind === "type-alias" ||
  symbol.kind === "class" ||
  symbol.kind === "extension-type";

/** Human readable kind, used in diagnostics. */
export const describeSymbolKind = (symbol: SymbolRecord): string => {
  switch (symbol.kind) {
    case "type-alias":
      return "typedef";
    case "class":
      return symbol.classKind === "mixin-application"
        ? "mixin application"
        : symbol.classKind;
    case "extension":
      return "extension";
    case "extension-type":
      return "extension type";
    case "field":
      return "field";
    case "procedure":
      return symbol.procedureKind;
    case "constructor":
      return "constructor";
    case "factory":
      return "factory";
    case "lowered-slot":
      return "field";
  }
};
