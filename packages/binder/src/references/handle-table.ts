import type { ReferenceHandle, SymbolId } from "../ids.js";

/**
 * Handle to symbol bindings of one compilation session. Entries are only
 * ever added; a handle keeps the first symbol registered for it.
 */
export class ReferenceHandleTable {
  private bindings = new Map<ReferenceHandle, SymbolId>();

  register(handle: ReferenceHandle, symbol: SymbolId): boolean {
    if (this.bindings.has(handle)) {
      return false;
    }
    this.bindings.set(handle, symbol);
    return true;
  }

  get(handle: ReferenceHandle): SymbolId | undefined {
    return this.bindings.get(handle);
  }

  has(handle: ReferenceHandle): boolean {
    return this.bindings.has(handle);
  }

  get size(): number {
    return this.bindings.size;
  }

  entries(): IterableIterator<[ReferenceHandle, SymbolId]> {
    return this.bindings.entries();
  }
}
