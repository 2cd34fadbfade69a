import type { Fragment } from "./fragments/types.js";
import type { TypeParameterId } from "./ids.js";
import { ReferenceHandleTable } from "./references/handle-table.js";
import { SymbolArena } from "./symbols/symbol-arena.js";

/**
 * State shared by every unit bound in one compilation. Passed explicitly to
 * the binder; there is no process-wide instance.
 */
export interface CompilationSession {
  symbols: SymbolArena;
  handles: ReferenceHandleTable;
  boundFragments: WeakSet<Fragment>;
  nextTypeParameterId(): TypeParameterId;
}

export const createCompilationSession = (): CompilationSession => {
  let nextTypeParameter: TypeParameterId = 0;
  return {
    symbols: new SymbolArena(),
    handles: new ReferenceHandleTable(),
    boundFragments: new WeakSet(),
    nextTypeParameterId: () => nextTypeParameter++,
  };
};
