import { toReferenceHandle, type ReferenceHandle } from "../ids.js";
import type { CanonicalName, ReferenceBucket } from "../naming/name-scheme.js";

/**
 * Persisted handles of a previous build, as supplied by the incremental
 * build layer. Tables map canonical names to handles.
 */
export interface ReferenceTablesData {
  fields?: Readonly<Record<string, string>>;
  getters?: Readonly<Record<string, string>>;
  setters?: Readonly<Record<string, string>>;
  constructors?: Readonly<Record<string, string>>;
}

export interface ContainerReferenceData extends ReferenceTablesData {
  handle: string;
}

export interface UnitReferenceData extends ReferenceTablesData {
  typedefs?: Readonly<Record<string, string>>;
  extensions?: Readonly<Record<string, string>>;
  classes?: Readonly<Record<string, ContainerReferenceData>>;
  extensionTypes?: Readonly<Record<string, ContainerReferenceData>>;
}

export type ReferenceDeclarationKind =
  | "typedef"
  | "class"
  | "extension"
  | "extension-type";

export interface ReferenceLookup {
  lookup(name: CanonicalName): ReferenceHandle | undefined;
}

export interface ContainerReferenceIndex extends ReferenceLookup {
  handle: ReferenceHandle;
}

export interface UnitReferenceIndex extends ReferenceLookup {
  lookupDeclaration(
    kind: ReferenceDeclarationKind,
    name: string
  ): ContainerReferenceIndex | undefined;
}

type HandleMap = ReadonlyMap<string, ReferenceHandle>;

// Records come from JSON, so they are copied into maps to keep prototype
// keys such as `constructor` out of the lookup.
const toHandleMap = (
  record: Readonly<Record<string, string>> = {}
): HandleMap =>
  new Map(
    Object.entries(record).map(
      ([name, handle]): [string, ReferenceHandle] => [
        name,
        toReferenceHandle(handle),
      ]
    )
  );

const bucketTables = (
  data: ReferenceTablesData
): Record<ReferenceBucket, HandleMap> => ({
  field: toHandleMap(data.fields),
  getter: toHandleMap(data.getters),
  setter: toHandleMap(data.setters),
  constructor: toHandleMap(data.constructors),
});

const createLookup = (data: ReferenceTablesData): ReferenceLookup => {
  const tables = bucketTables(data);
  return {
    lookup: ({ bucket, text }) => tables[bucket].get(text),
  };
};

const containerIndex = (
  data: ContainerReferenceData
): ContainerReferenceIndex => ({
  handle: toReferenceHandle(data.handle),
  ...createLookup(data),
});

const containerIndices = (
  record: Readonly<Record<string, ContainerReferenceData>> = {}
): ReadonlyMap<string, ContainerReferenceIndex> =>
  new Map(
    Object.entries(record).map(
      ([name, entry]): [string, ContainerReferenceIndex] => [
        name,
        containerIndex(entry),
      ]
    )
  );

const leafIndex = (handle: ReferenceHandle): ContainerReferenceIndex => ({
  handle,
  lookup: () => undefined,
});

export const createReferenceIndex = (
  data: UnitReferenceData
): UnitReferenceIndex => {
  const typedefs = toHandleMap(data.typedefs);
  const extensions = toHandleMap(data.extensions);
  const classes = containerIndices(data.classes);
  const extensionTypes = containerIndices(data.extensionTypes);

  const lookupDeclaration = (
    kind: ReferenceDeclarationKind,
    name: string
  ): ContainerReferenceIndex | undefined => {
    switch (kind) {
      case "class":
        return classes.get(name);
      case "extension-type":
        return extensionTypes.get(name);
      case "typedef": {
        const handle = typedefs.get(name);
        return handle ? leafIndex(handle) : undefined;
      }
      case "extension": {
        const handle = extensions.get(name);
        return handle ? leafIndex(handle) : undefined;
      }
    }
  };

  return {
    ...createLookup(data),
    lookupDeclaration,
  };
};
