import { InternalBindingError } from "../errors.js";
import type { TypeScopeId } from "../ids.js";
import {
  TypeParameterLookupScope,
  type LookupScope,
} from "./lookup-scope.js";
import type { TypeParameterNamespace } from "./type-parameters.js";
import type {
  NamedTypeReference,
  TypeResolutionContext,
} from "./type-reference.js";

export type TypeScopeKind =
  | "unit"
  | "declaration-type-parameters"
  | "member-type-parameters"
  | "function-type-parameters"
  | "unnamed-mixin-application";

type TypeScopeTree = {
  sealed: boolean;
  nextId: TypeScopeId;
  registered: number;
};

/**
 * Node of the per-unit tree of deferred type references. References are
 * registered while fragments bind; the whole tree is resolved exactly once
 * from the root, after which it is sealed.
 */
export class TypeScope {
  readonly id: TypeScopeId;
  readonly kind: TypeScopeKind;
  readonly lookup: LookupScope;
  readonly parent?: TypeScope;
  private readonly tree: TypeScopeTree;
  private readonly childScopes: TypeScope[] = [];
  private pending: NamedTypeReference[] = [];

  private constructor({
    kind,
    lookup,
    parent,
    tree,
  }: {
    kind: TypeScopeKind;
    lookup: LookupScope;
    parent?: TypeScope;
    tree: TypeScopeTree;
  }) {
    this.id = tree.nextId++;
    this.kind = kind;
    this.lookup = lookup;
    this.parent = parent;
    this.tree = tree;
  }

  static createRoot(lookup: LookupScope): TypeScope {
    return new TypeScope({
      kind: "unit",
      lookup,
      tree: { sealed: false, nextId: 0, registered: 0 },
    });
  }

  createChild({
    kind,
    typeParameters,
  }: {
    kind: Exclude<TypeScopeKind, "unit">;
    typeParameters: TypeParameterNamespace;
  }): TypeScope {
    this.assertOpen(`create a ${kind} scope`);
    const child = new TypeScope({
      kind,
      lookup: new TypeParameterLookupScope(typeParameters, this.lookup),
      parent: this,
      tree: this.tree,
    });
    this.childScopes.push(child);
    return child;
  }

  registerUnresolved(reference: NamedTypeReference): void {
    this.assertOpen(`register type '${reference.name}'`, reference);
    this.pending.push(reference);
    this.tree.registered += 1;
  }

  get children(): readonly TypeScope[] {
    return this.childScopes;
  }

  get unresolved(): readonly NamedTypeReference[] {
    return this.pending;
  }

  get isSealed(): boolean {
    return this.tree.sealed;
  }

  /** Number of references registered anywhere in this scope's tree. */
  get registeredCount(): number {
    return this.tree.registered;
  }

  resolveTypes(ctx: TypeResolutionContext): number {
    if (this.parent) {
      throw new InternalBindingError(
        `type resolution must start at the unit scope, not a ${this.kind} scope`
      );
    }
    this.assertOpen("resolve types");
    this.tree.sealed = true;
    return this.resolveSubtree(ctx);
  }

  private resolveSubtree(ctx: TypeResolutionContext): number {
    const references = this.pending;
    this.pending = [];
    references.forEach((reference) => reference.resolveIn(this.lookup, ctx));
    return this.childScopes.reduce(
      (count, child) => count + child.resolveSubtree(ctx),
      references.length
    );
  }

  private assertOpen(action: string, reference?: NamedTypeReference): void {
    if (this.tree.sealed) {
      throw new InternalBindingError(
        `cannot ${action} after type resolution started`,
        reference?.span
      );
    }
  }
}
