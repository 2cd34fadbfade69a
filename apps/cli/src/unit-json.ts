import type {
  CompilationUnitInput,
  ContainerReferenceData,
  EnumConstantFragment,
  FormalParameterFragment,
  Fragment,
  MemberFragment,
  Modifiers,
  NamedTypeSyntax,
  ProcedureKind,
  SourceSpan,
  TypeParameterFragment,
  TypeSyntax,
  UnitFragments,
  UnitReferenceData,
} from "@declbind/binder";

/** Input that does not describe a unit or a reference index. */
export class UnitFormatError extends Error {
  readonly path: string;
  readonly detail: string;
  /** Input file, once known. */
  readonly file?: string;

  constructor(path: string, detail: string, file?: string) {
    super(`${path}: ${detail}`);
    this.name = "UnitFormatError";
    this.path = path;
    this.detail = detail;
    this.file = file;
  }
}

type JsonRecord = { readonly [key: string]: unknown };

/** Where a value sits in the document, and the file its spans default to. */
type Cursor = { path: string; file: string };

const at = (cursor: Cursor, key: string | number): Cursor => ({
  ...cursor,
  path:
    typeof key === "number" ? `${cursor.path}[${key}]` : `${cursor.path}.${key}`,
});

const describeValue = (value: unknown): string => {
  if (value === null) return "null";
  if (Array.isArray(value)) return "an array";
  return `a ${typeof value}`;
};

const isRecord = (value: unknown): value is JsonRecord =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const expectRecord = (value: unknown, cursor: Cursor): JsonRecord => {
  if (isRecord(value)) return value;
  throw new UnitFormatError(
    cursor.path,
    `expected an object but found ${describeValue(value)}`,
  );
};

const expectString = (value: unknown, cursor: Cursor): string => {
  if (typeof value === "string") return value;
  throw new UnitFormatError(
    cursor.path,
    `expected a string but found ${describeValue(value)}`,
  );
};

const expectOffset = (value: unknown, cursor: Cursor): number => {
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return value;
  }
  throw new UnitFormatError(
    cursor.path,
    `expected a non-negative integer but found ${describeValue(value)}`,
  );
};

const optional = <T>(
  record: JsonRecord,
  key: string,
  cursor: Cursor,
  decode: (value: unknown, cursor: Cursor) => T,
): T | undefined => {
  const value = record[key];
  return value === undefined ? undefined : decode(value, at(cursor, key));
};

const required = <T>(
  record: JsonRecord,
  key: string,
  cursor: Cursor,
  decode: (value: unknown, cursor: Cursor) => T,
): T => {
  if (record[key] === undefined) {
    throw new UnitFormatError(at(cursor, key).path, "missing required value");
  }
  return decode(record[key], at(cursor, key));
};

const expectBoolean = (value: unknown, cursor: Cursor): boolean => {
  if (typeof value === "boolean") return value;
  throw new UnitFormatError(
    cursor.path,
    `expected a boolean but found ${describeValue(value)}`,
  );
};

const arrayOf =
  <T>(decode: (value: unknown, cursor: Cursor) => T) =>
  (value: unknown, cursor: Cursor): T[] => {
    if (!Array.isArray(value)) {
      throw new UnitFormatError(
        cursor.path,
        `expected an array but found ${describeValue(value)}`,
      );
    }
    return value.map((item, index) => decode(item, at(cursor, index)));
  };

const recordOf =
  <T>(decode: (value: unknown, cursor: Cursor) => T) =>
  (value: unknown, cursor: Cursor): Record<string, T> => {
    const record = expectRecord(value, cursor);
    return Object.fromEntries(
      Object.entries(record).map(([key, entry]) => [
        key,
        decode(entry, at(cursor, key)),
      ]),
    );
  };

const decodeSpan = (value: unknown, cursor: Cursor): SourceSpan => {
  const record = expectRecord(value, cursor);
  const start = required(record, "start", cursor, expectOffset);
  const end = required(record, "end", cursor, expectOffset);
  if (end < start) {
    throw new UnitFormatError(
      at(cursor, "end").path,
      `span ends at ${end} before it starts at ${start}`,
    );
  }
  return {
    file: optional(record, "file", cursor, expectString) ?? cursor.file,
    start,
    end,
  };
};

const MODIFIER_KEYS = [
  "isStatic",
  "isExternal",
  "isAugment",
  "isConst",
  "isLate",
  "isFinal",
  "isAbstract",
  "isSealed",
  "isBase",
  "isInterface",
  "isMixinClass",
] as const satisfies readonly (keyof Modifiers)[];

const knownModifiers = new Set<string>(MODIFIER_KEYS);

const decodeModifiers = (value: unknown, cursor: Cursor): Modifiers => {
  const record = expectRecord(value, cursor);
  const unknown = Object.keys(record).find((key) => !knownModifiers.has(key));
  if (unknown !== undefined) {
    throw new UnitFormatError(
      at(cursor, unknown).path,
      `unknown modifier '${unknown}'`,
    );
  }

  const modifiers: Modifiers = {};
  for (const key of MODIFIER_KEYS) {
    const flag = optional(record, key, cursor, expectBoolean);
    if (flag !== undefined) {
      modifiers[key] = flag;
    }
  }
  return modifiers;
};

const decodeNamedType = (value: unknown, cursor: Cursor): NamedTypeSyntax => {
  const record = expectRecord(value, cursor);
  const kind = optional(record, "kind", cursor, expectString) ?? "named";
  if (kind !== "named") {
    throw new UnitFormatError(
      at(cursor, "kind").path,
      `expected a named type but found '${kind}'`,
    );
  }
  return {
    kind: "named",
    name: required(record, "name", cursor, expectString),
    span: required(record, "span", cursor, decodeSpan),
    typeArguments: optional(
      record,
      "typeArguments",
      cursor,
      arrayOf(decodeType),
    ),
    nullable: optional(record, "nullable", cursor, expectBoolean),
  };
};

function decodeType(value: unknown, cursor: Cursor): TypeSyntax {
  const record = expectRecord(value, cursor);
  const kind = required(record, "kind", cursor, expectString);
  switch (kind) {
    case "named":
      return decodeNamedType(record, cursor);
    case "function":
      return {
        kind: "function",
        span: required(record, "span", cursor, decodeSpan),
        typeParameters: optional(
          record,
          "typeParameters",
          cursor,
          arrayOf(decodeTypeParameter),
        ),
        returnType: optional(record, "returnType", cursor, decodeType),
        parameterTypes: optional(
          record,
          "parameterTypes",
          cursor,
          arrayOf(decodeType),
        ),
        nullable: optional(record, "nullable", cursor, expectBoolean),
      };
    default:
      throw new UnitFormatError(
        at(cursor, "kind").path,
        `unknown type kind '${kind}'`,
      );
  }
}

function decodeTypeParameter(
  value: unknown,
  cursor: Cursor,
): TypeParameterFragment {
  const record = expectRecord(value, cursor);
  return {
    name: required(record, "name", cursor, expectString),
    span: required(record, "span", cursor, decodeSpan),
    bound: optional(record, "bound", cursor, decodeType),
    isWildcard: optional(record, "isWildcard", cursor, expectBoolean),
  };
}

const decodeFormal = (
  value: unknown,
  cursor: Cursor,
): FormalParameterFragment => {
  const record = expectRecord(value, cursor);
  return {
    name: required(record, "name", cursor, expectString),
    span: required(record, "span", cursor, decodeSpan),
    type: optional(record, "type", cursor, decodeType),
    isNamed: optional(record, "isNamed", cursor, expectBoolean),
    isRequired: optional(record, "isRequired", cursor, expectBoolean),
    isInitializingFormal: optional(
      record,
      "isInitializingFormal",
      cursor,
      expectBoolean,
    ),
  };
};

const decodeEnumConstant = (
  value: unknown,
  cursor: Cursor,
): EnumConstantFragment => {
  const record = expectRecord(value, cursor);
  return {
    name: required(record, "name", cursor, expectString),
    span: required(record, "span", cursor, decodeSpan),
  };
};

const PROCEDURE_KINDS: readonly ProcedureKind[] = [
  "method",
  "getter",
  "setter",
  "operator",
];

const decodeProcedureKind = (value: unknown, cursor: Cursor): ProcedureKind => {
  const text = expectString(value, cursor);
  const kind = PROCEDURE_KINDS.find((entry) => entry === text);
  if (kind) return kind;
  throw new UnitFormatError(cursor.path, `unknown procedure kind '${text}'`);
};

const namedTypes = arrayOf(decodeNamedType);
const typeParameters = arrayOf(decodeTypeParameter);
const formals = arrayOf(decodeFormal);

const MEMBER_KINDS = new Set<string>([
  "field",
  "method",
  "constructor",
  "factory",
]);

const decodeMember = (value: unknown, cursor: Cursor): MemberFragment => {
  const fragment = decodeFragment(value, cursor);
  switch (fragment.kind) {
    case "field":
    case "method":
    case "constructor":
    case "factory":
      return fragment;
    default:
      throw new UnitFormatError(
        at(cursor, "kind").path,
        `'${fragment.kind}' is not a member fragment (expected one of ${[
          ...MEMBER_KINDS,
        ].join(", ")})`,
      );
  }
};

const members = arrayOf(decodeMember);

const decodeFragment = (value: unknown, cursor: Cursor): Fragment => {
  const record = expectRecord(value, cursor);
  const kind = required(record, "kind", cursor, expectString);
  const span = required(record, "span", cursor, decodeSpan);
  const modifiers = optional(record, "modifiers", cursor, decodeModifiers);
  const name = () => required(record, "name", cursor, expectString);

  switch (kind) {
    case "typedef":
      return {
        kind,
        name: name(),
        span,
        modifiers,
        typeParameters: optional(record, "typeParameters", cursor, typeParameters),
        aliasedType: required(record, "aliasedType", cursor, decodeType),
      };
    case "class":
      return {
        kind,
        name: name(),
        span,
        modifiers,
        typeParameters: optional(record, "typeParameters", cursor, typeParameters),
        supertype: optional(record, "supertype", cursor, decodeNamedType),
        mixins: optional(record, "mixins", cursor, namedTypes),
        interfaces: optional(record, "interfaces", cursor, namedTypes),
        members: optional(record, "members", cursor, members),
      };
    case "mixin":
      return {
        kind,
        name: name(),
        span,
        modifiers,
        typeParameters: optional(record, "typeParameters", cursor, typeParameters),
        onTypes: optional(record, "onTypes", cursor, namedTypes),
        interfaces: optional(record, "interfaces", cursor, namedTypes),
        members: optional(record, "members", cursor, members),
      };
    case "named-mixin-application":
      return {
        kind,
        name: name(),
        span,
        modifiers,
        typeParameters: optional(record, "typeParameters", cursor, typeParameters),
        supertype: required(record, "supertype", cursor, decodeNamedType),
        mixins: required(record, "mixins", cursor, namedTypes),
        interfaces: optional(record, "interfaces", cursor, namedTypes),
      };
    case "enum":
      return {
        kind,
        name: name(),
        span,
        modifiers,
        typeParameters: optional(record, "typeParameters", cursor, typeParameters),
        mixins: optional(record, "mixins", cursor, namedTypes),
        interfaces: optional(record, "interfaces", cursor, namedTypes),
        constants: required(
          record,
          "constants",
          cursor,
          arrayOf(decodeEnumConstant),
        ),
        members: optional(record, "members", cursor, members),
      };
    case "extension":
      return {
        kind,
        name: optional(record, "name", cursor, expectString),
        span,
        modifiers,
        typeParameters: optional(record, "typeParameters", cursor, typeParameters),
        onType: required(record, "onType", cursor, decodeType),
        members: optional(record, "members", cursor, members),
      };
    case "extension-type": {
      const representation = required(
        record,
        "representation",
        cursor,
        expectRecord,
      );
      const representationCursor = at(cursor, "representation");
      return {
        kind,
        name: name(),
        span,
        modifiers,
        typeParameters: optional(record, "typeParameters", cursor, typeParameters),
        representation: {
          name: required(
            representation,
            "name",
            representationCursor,
            expectString,
          ),
          span: required(
            representation,
            "span",
            representationCursor,
            decodeSpan,
          ),
          type: required(
            representation,
            "type",
            representationCursor,
            decodeType,
          ),
        },
        interfaces: optional(record, "interfaces", cursor, namedTypes),
        members: optional(record, "members", cursor, members),
      };
    }
    case "field":
      return {
        kind,
        name: name(),
        span,
        modifiers,
        type: optional(record, "type", cursor, decodeType),
        hasInitializer: optional(record, "hasInitializer", cursor, expectBoolean),
      };
    case "method":
      return {
        kind,
        name: name(),
        span,
        modifiers,
        procedureKind:
          optional(record, "procedureKind", cursor, decodeProcedureKind) ??
          "method",
        typeParameters: optional(record, "typeParameters", cursor, typeParameters),
        formals: optional(record, "formals", cursor, formals),
        returnType: optional(record, "returnType", cursor, decodeType),
      };
    case "constructor":
      return {
        kind,
        name: optional(record, "name", cursor, expectString) ?? "",
        span,
        modifiers,
        formals: optional(record, "formals", cursor, formals),
      };
    case "factory":
      return {
        kind,
        name: optional(record, "name", cursor, expectString) ?? "",
        span,
        modifiers,
        formals: optional(record, "formals", cursor, formals),
        returnType: optional(record, "returnType", cursor, decodeType),
        redirectionTarget: optional(
          record,
          "redirectionTarget",
          cursor,
          decodeNamedType,
        ),
      };
    default:
      throw new UnitFormatError(
        at(cursor, "kind").path,
        `unknown fragment kind '${kind}'`,
      );
  }
};

const decodeUnitFragments = (
  record: JsonRecord,
  cursor: Cursor,
): UnitFragments => {
  const uri = required(record, "uri", cursor, expectString);
  const file = { ...cursor, file: uri };
  return {
    uri,
    fragments: required(record, "fragments", file, arrayOf(decodeFragment)),
  };
};

/** Decodes `{ uri, fragments, parts? }`; spans without a file get the uri. */
export const decodeCompilationUnit = (value: unknown): CompilationUnitInput => {
  const cursor: Cursor = { path: "$", file: "" };
  const record = expectRecord(value, cursor);
  return {
    ...decodeUnitFragments(record, cursor),
    parts: optional(
      record,
      "parts",
      cursor,
      arrayOf((part, partCursor) =>
        decodeUnitFragments(expectRecord(part, partCursor), partCursor),
      ),
    ),
  };
};

const handleTable = recordOf(expectString);

const decodeContainerReferences = (
  value: unknown,
  cursor: Cursor,
): ContainerReferenceData => {
  const record = expectRecord(value, cursor);
  return {
    handle: required(record, "handle", cursor, expectString),
    fields: optional(record, "fields", cursor, handleTable),
    getters: optional(record, "getters", cursor, handleTable),
    setters: optional(record, "setters", cursor, handleTable),
    constructors: optional(record, "constructors", cursor, handleTable),
  };
};

export const decodeReferenceData = (value: unknown): UnitReferenceData => {
  const cursor: Cursor = { path: "$", file: "" };
  const record = expectRecord(value, cursor);
  const containers = recordOf(decodeContainerReferences);
  return {
    fields: optional(record, "fields", cursor, handleTable),
    getters: optional(record, "getters", cursor, handleTable),
    setters: optional(record, "setters", cursor, handleTable),
    constructors: optional(record, "constructors", cursor, handleTable),
    typedefs: optional(record, "typedefs", cursor, handleTable),
    extensions: optional(record, "extensions", cursor, handleTable),
    classes: optional(record, "classes", cursor, containers),
    extensionTypes: optional(record, "extensionTypes", cursor, containers),
  };
};

export const parseJsonDocument = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new UnitFormatError("$", `invalid JSON (${detail})`);
  }
};
