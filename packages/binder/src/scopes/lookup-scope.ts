import type { SymbolId } from "../ids.js";
import type { Namespace } from "../binding/namespace.js";
import type {
  TypeParameter,
  TypeParameterNamespace,
} from "./type-parameters.js";

export type LookupResult =
  | { kind: "symbol"; symbol: SymbolId }
  | { kind: "type-parameter"; parameter: TypeParameter }
  | { kind: "builtin"; name: string };

export interface LookupScope {
  readonly parent?: LookupScope;
  lookupLocal(name: string): LookupResult | undefined;
}

/** Walks the chain from `scope` outwards; the innermost hit wins. */
export const lookupGetable = (
  scope: LookupScope,
  name: string
): LookupResult | undefined => {
  let current: LookupScope | undefined = scope;
  while (current) {
    const result = current.lookupLocal(name);
    if (result) return result;
    current = current.parent;
  }
  return undefined;
};

export class BuiltinLookupScope implements LookupScope {
  private names: ReadonlySet<string>;

  constructor(names: Iterable<string>) {
    this.names = new Set(names);
  }

  lookupLocal(name: string): LookupResult | undefined {
    return this.names.has(name) ? { kind: "builtin", name } : undefined;
  }
}

export class NamespaceLookupScope implements LookupScope {
  constructor(
    private readonly namespace: Namespace,
    readonly parent?: LookupScope
  ) {}

  lookupLocal(name: string): LookupResult | undefined {
    const symbol = this.namespace.lookupGetable(name);
    return symbol === undefined ? undefined : { kind: "symbol", symbol };
  }
}

export class TypeParameterLookupScope implements LookupScope {
  constructor(
    private readonly typeParameters: TypeParameterNamespace,
    readonly parent?: LookupScope
  ) {}

  lookupLocal(name: string): LookupResult | undefined {
    const parameter = this.typeParameters.get(name);
    return parameter ? { kind: "type-parameter", parameter } : undefined;
  }
}
