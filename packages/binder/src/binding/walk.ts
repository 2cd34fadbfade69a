import type { SymbolId } from "../ids.js";
import type { SymbolArena } from "../symbols/symbol-arena.js";
import type { SymbolRecord } from "../symbols/types.js";
import type { Namespace, NamespaceMapKind } from "./namespace.js";
import type { BindingResult, DeclarationBinding } from "./types.js";

export type WalkedMap = NamespaceMapKind | "extension" | "lowered-slot";

export interface WalkedSymbol {
  symbol: SymbolRecord;
  map: WalkedMap;
  /** Declaration whose namespace holds the symbol; absent at unit level. */
  container?: SymbolRecord;
  depth: number;
}

const namespaceMaps: readonly NamespaceMapKind[] = [
  "getable",
  "setable",
  "constructor",
];

/**
 * Visits every bound symbol of a result in namespace order: getables,
 * setables, constructors, then unnamed extensions. Augmentation chains are
 * visited oldest first and a declaration's members follow the declaration.
 */
export function* walkBindingResult(
  result: BindingResult
): Generator<WalkedSymbol> {
  const declarations = new Map<SymbolId, DeclarationBinding>(
    result.declarations.map(
      (binding): [SymbolId, DeclarationBinding] => [binding.symbol, binding]
    )
  );
  yield* walkNamespace({
    namespace: result.unitNamespace,
    symbols: result.session.symbols,
    declarations,
    depth: 0,
  });
}

function* walkNamespace({
  namespace,
  symbols,
  declarations,
  container,
  depth,
}: {
  namespace: Namespace;
  symbols: SymbolArena;
  declarations: ReadonlyMap<SymbolId, DeclarationBinding>;
  container?: SymbolRecord;
  depth: number;
}): Generator<WalkedSymbol> {
  const visit = function* (
    symbol: SymbolRecord,
    map: WalkedMap
  ): Generator<WalkedSymbol> {
    yield { symbol, map, container, depth };
    if (symbol.kind === "field") {
      for (const slot of symbol.loweredSlots) {
        yield { symbol: symbols.get(slot), map: "lowered-slot", container, depth };
      }
    }
    const declaration = declarations.get(symbol.id);
    if (declaration) {
      yield* walkNamespace({
        namespace: declaration.namespace,
        symbols,
        declarations,
        container: symbol,
        depth: depth + 1,
      });
    }
  };

  for (const map of namespaceMaps) {
    for (const [, head] of namespace.entries(map)) {
      for (const symbol of symbols.declarationOrder(head)) {
        yield* visit(symbol, map);
      }
    }
  }

  // Named extensions were already visited through the getable map.
  for (const id of namespace.extensions()) {
    const symbol = symbols.get(id);
    if (symbol.kind === "extension" && symbol.isUnnamed) {
      yield* visit(symbol, "extension");
    }
  }
}
