import type { SymbolId } from "../ids.js";
import { InternalBindingError } from "../errors.js";
import type { SymbolRecord } from "./types.js";

/**
 * Owns every symbol bound during a session. Augmentation chains are stored
 * as ids (`next`) into this arena, newest pointing at the previous one.
 */
export class SymbolArena {
  private records: SymbolRecord[] = [];

  register<R extends SymbolRecord>(create: (id: SymbolId) => R): R {
    const id = this.records.length;
    const record = create(id);
    if (record.id !== id) {
      throw new InternalBindingError(
        `symbol registered under id ${record.id}, expected ${id}`,
        record.span
      );
    }
    this.records.push(record);
    return record;
  }

  get(id: SymbolId): SymbolRecord {
    const record = this.records[id];
    if (!record) {
      throw new InternalBindingError(`unknown symbol ${id}`);
    }
    return record;
  }

  get size(): number {
    return this.records.length;
  }

  link(id: SymbolId, next: SymbolId): void {
    const record = this.get(id);
    if (record.next !== undefined && record.next !== next) {
      throw new InternalBindingError(
        `symbol '${record.name}' is already linked to ${record.next}`,
        record.span
      );
    }
    this.get(next);
    record.next = next;
  }

  /** The symbol followed by everything it augments, newest first. */
  *chain(id: SymbolId): Generator<SymbolRecord> {
    const seen = new Set<SymbolId>();
    let current: SymbolId | undefined = id;
    while (current !== undefined) {
      if (seen.has(current)) {
        throw new InternalBindingError(`cyclic augmentation chain at ${id}`);
      }
      seen.add(current);
      const record = this.get(current);
      yield record;
      current = record.next;
    }
  }

  declarationOrder(id: SymbolId): SymbolRecord[] {
    return [...this.chain(id)].reverse();
  }

  all(): readonly SymbolRecord[] {
    return this.records;
  }
}
