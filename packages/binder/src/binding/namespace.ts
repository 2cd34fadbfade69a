import { InternalBindingError } from "../errors.js";
import type { SymbolId } from "../ids.js";

export type NamespaceMapKind = "getable" | "setable" | "constructor";

/**
 * Name to symbol maps of a unit or type declaration. Each map holds the
 * head (newest symbol) of a name's chain; insertion order is kept.
 */
export class Namespace {
  readonly hasConstructors: boolean;
  private readonly getables = new Map<string, SymbolId>();
  private readonly setables = new Map<string, SymbolId>();
  private readonly constructors = new Map<string, SymbolId>();
  private readonly extensionSymbols = new Set<SymbolId>();
  private readonly augmentations = new Map<string, SymbolId[]>();
  private readonly setterAugmentations = new Map<string, SymbolId[]>();
  private sealed = false;

  constructor({ hasConstructors }: { hasConstructors: boolean }) {
    this.hasConstructors = hasConstructors;
  }

  lookupGetable(name: string): SymbolId | undefined {
    return this.getables.get(name);
  }

  lookupSetable(name: string): SymbolId | undefined {
    return this.setables.get(name);
  }

  lookupConstructor(name: string): SymbolId | undefined {
    return this.constructors.get(name);
  }

  lookup(map: NamespaceMapKind, name: string): SymbolId | undefined {
    return this.mapFor(map).get(name);
  }

  entries(map: NamespaceMapKind): IterableIterator<[string, SymbolId]> {
    return this.mapFor(map).entries();
  }

  extensions(): readonly SymbolId[] {
    return [...this.extensionSymbols];
  }

  augmentationsOf(name: string): readonly SymbolId[] {
    return this.augmentations.get(name) ?? [];
  }

  setterAugmentationsOf(name: string): readonly SymbolId[] {
    return this.setterAugmentations.get(name) ?? [];
  }

  get isSealed(): boolean {
    return this.sealed;
  }

  set(map: NamespaceMapKind, name: string, symbol: SymbolId): void {
    this.assertMutable(`bind '${name}'`);
    if (map === "constructor" && !this.hasConstructors) {
      throw new InternalBindingError(
        `constructor '${name}' bound in a namespace without constructors`
      );
    }
    this.mapFor(map).set(name, symbol);
  }

  addExtension(symbol: SymbolId): void {
    this.assertMutable("add an extension");
    this.extensionSymbols.add(symbol);
  }

  addAugmentation(
    name: string,
    symbol: SymbolId,
    { isSetter }: { isSetter: boolean }
  ): void {
    this.assertMutable(`augment '${name}'`);
    const lists = isSetter ? this.setterAugmentations : this.augmentations;
    const list = lists.get(name);
    if (list) {
      list.push(symbol);
      return;
    }
    lists.set(name, [symbol]);
  }

  seal(): void {
    this.sealed = true;
  }

  private mapFor(map: NamespaceMapKind): Map<string, SymbolId> {
    switch (map) {
      case "getable":
        return this.getables;
      case "setable":
        return this.setables;
      case "constructor":
        return this.constructors;
    }
  }

  private assertMutable(action: string): void {
    if (this.sealed) {
      throw new InternalBindingError(`cannot ${action}: namespace is sealed`);
    }
  }
}
