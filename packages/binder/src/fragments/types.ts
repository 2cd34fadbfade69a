import type { SourceSpan } from "../diagnostics/index.js";

export interface NamedTypeSyntax {
  kind: "named";
  name: string;
  span: SourceSpan;
  typeArguments?: readonly TypeSyntax[];
  nullable?: boolean;
}

export interface FunctionTypeSyntax {
  kind: "function";
  span: SourceSpan;
  typeParameters?: readonly TypeParameterFragment[];
  returnType?: TypeSyntax;
  parameterTypes?: readonly TypeSyntax[];
  nullable?: boolean;
}

export type TypeSyntax = NamedTypeSyntax | FunctionTypeSyntax;

export interface TypeParameterFragment {
  name: string;
  span: SourceSpan;
  bound?: TypeSyntax;
  /** `_` parameters under wildcard semantics never enter a namespace. */
  isWildcard?: boolean;
}

export interface Modifiers {
  isStatic?: boolean;
  isExternal?: boolean;
  isAugment?: boolean;
  isConst?: boolean;
  isLate?: boolean;
  isFinal?: boolean;
  isAbstract?: boolean;
  isSealed?: boolean;
  isBase?: boolean;
  isInterface?: boolean;
  isMixinClass?: boolean;
}

export interface FormalParameterFragment {
  name: string;
  span: SourceSpan;
  type?: TypeSyntax;
  isNamed?: boolean;
  isRequired?: boolean;
  isInitializingFormal?: boolean;
}

interface NamedFragmentBase {
  name: string;
  span: SourceSpan;
  modifiers?: Modifiers;
}

export interface TypedefFragment extends NamedFragmentBase {
  kind: "typedef";
  typeParameters?: readonly TypeParameterFragment[];
  aliasedType: TypeSyntax;
}

export interface ClassFragment extends NamedFragmentBase {
  kind: "class";
  typeParameters?: readonly TypeParameterFragment[];
  supertype?: NamedTypeSyntax;
  mixins?: readonly NamedTypeSyntax[];
  interfaces?: readonly NamedTypeSyntax[];
  members?: readonly MemberFragment[];
}

export interface MixinFragment extends NamedFragmentBase {
  kind: "mixin";
  typeParameters?: readonly TypeParameterFragment[];
  onTypes?: readonly NamedTypeSyntax[];
  interfaces?: readonly NamedTypeSyntax[];
  members?: readonly MemberFragment[];
}

export interface NamedMixinApplicationFragment extends NamedFragmentBase {
  kind: "named-mixin-application";
  typeParameters?: readonly TypeParameterFragment[];
  supertype: NamedTypeSyntax;
  mixins: readonly NamedTypeSyntax[];
  interfaces?: readonly NamedTypeSyntax[];
}

export interface EnumConstantFragment {
  name: string;
  span: SourceSpan;
}

export interface EnumFragment extends NamedFragmentBase {
  kind: "enum";
  typeParameters?: readonly TypeParameterFragment[];
  mixins?: readonly NamedTypeSyntax[];
  interfaces?: readonly NamedTypeSyntax[];
  constants: readonly EnumConstantFragment[];
  members?: readonly MemberFragment[];
}

export interface ExtensionFragment {
  kind: "extension";
  /** Absent for `extension on T { ... }`. */
  name?: string;
  span: SourceSpan;
  modifiers?: Modifiers;
  typeParameters?: readonly TypeParameterFragment[];
  onType: TypeSyntax;
  members?: readonly MemberFragment[];
}

export interface RepresentationFieldFragment {
  name: string;
  span: SourceSpan;
  type: TypeSyntax;
}

export interface ExtensionTypeFragment extends NamedFragmentBase {
  kind: "extension-type";
  typeParameters?: readonly TypeParameterFragment[];
  representation: RepresentationFieldFragment;
  interfaces?: readonly NamedTypeSyntax[];
  members?: readonly MemberFragment[];
}

export interface FieldFragment extends NamedFragmentBase {
  kind: "field";
  type?: TypeSyntax;
  hasInitializer?: boolean;
}

export type ProcedureKind = "method" | "getter" | "setter" | "operator";

export interface MethodFragment extends NamedFragmentBase {
  kind: "method";
  procedureKind: ProcedureKind;
  typeParameters?: readonly TypeParameterFragment[];
  formals?: readonly FormalParameterFragment[];
  returnType?: TypeSyntax;
}

export interface ConstructorFragment extends NamedFragmentBase {
  kind: "constructor";
  formals?: readonly FormalParameterFragment[];
}

export interface FactoryFragment extends NamedFragmentBase {
  kind: "factory";
  formals?: readonly FormalParameterFragment[];
  returnType?: TypeSyntax;
  redirectionTarget?: NamedTypeSyntax;
}

export type DeclarationFragment =
  | ClassFragment
  | MixinFragment
  | EnumFragment
  | ExtensionFragment
  | ExtensionTypeFragment;

export type MemberFragment =
  | FieldFragment
  | MethodFragment
  | ConstructorFragment
  | FactoryFragment;

export type Fragment =
  | TypedefFragment
  | DeclarationFragment
  | NamedMixinApplicationFragment
  | MemberFragment;

export type FragmentKind = Fragment["kind"];

export interface UnitFragments {
  uri: string;
  fragments: readonly Fragment[];
}

export interface CompilationUnitInput extends UnitFragments {
  /** Part files sharing the unit's namespace, bound after the main list. */
  parts?: readonly UnitFragments[];
}
