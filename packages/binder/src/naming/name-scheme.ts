import type { ProcedureKind } from "../fragments/types.js";

export type ContainerKind = "unit" | "class-like" | "extension" | "extension-type";

export type MemberKind =
  | "getter"
  | "setter"
  | "method"
  | "field"
  | "constructor"
  | "factory";

/** Which table of a persisted reference index a canonical name lives in. */
export type ReferenceBucket = "field" | "getter" | "setter" | "constructor";

export interface CanonicalName {
  bucket: ReferenceBucket;
  text: string;
}

export interface ContainerName {
  kind: ContainerKind;
  name: string;
}

export interface NameScheme {
  container: ContainerName;
  isInstanceMember: boolean;
}

export type FieldNameType =
  | "field"
  | "getter"
  | "setter"
  | "is-set-field"
  | "representation-field";

export const createNameScheme = ({
  container,
  isStatic,
}: {
  container: ContainerName;
  isStatic: boolean;
}): NameScheme => ({
  container,
  isInstanceMember: container.kind !== "unit" && !isStatic,
});

// Extension and extension type members are lowered to unit-level functions,
// so their names carry the container name as a prefix.
const lowersToFunctions = (container: ContainerName): boolean =>
  container.kind === "extension" || container.kind === "extension-type";

const memberPrefix = (container: ContainerName): string =>
  lowersToFunctions(container) ? `${container.name}|` : "";

const ownerSegment = (container: ContainerName): string =>
  container.kind === "unit" ? "" : `${container.name}#`;

const canonical = (bucket: ReferenceBucket, text: string): CanonicalName => ({
  bucket,
  text,
});

export const procedureMemberName = (
  scheme: NameScheme,
  kind: ProcedureKind,
  name: string
): CanonicalName => {
  const { container, isInstanceMember } = scheme;
  const prefix = memberPrefix(container);

  if (!lowersToFunctions(container)) {
    return kind === "setter"
      ? canonical("setter", name)
      : canonical("getter", name);
  }

  if (!isInstanceMember) {
    return kind === "setter"
      ? canonical("setter", `${prefix}${name}`)
      : canonical("getter", `${prefix}${name}`);
  }

  switch (kind) {
    case "getter":
      return canonical("getter", `${prefix}get#${name}`);
    case "setter":
      // Not a true setter once lowered: it is a function taking the
      // receiver, so it shares the getter table.
      return canonical("getter", `${prefix}set#${name}`);
    case "method":
    case "operator":
      return canonical("getter", `${prefix}${name}`);
  }
};

/**
 * Name under which an extension (type) instance method is referenced as a
 * value. Other members have no separate tear-off.
 */
export const procedureTearOffName = (
  scheme: NameScheme,
  kind: ProcedureKind,
  name: string
): CanonicalName | undefined => {
  if (!lowersToFunctions(scheme.container) || !scheme.isInstanceMember) {
    return undefined;
  }
  if (kind !== "method") {
    return undefined;
  }
  return procedureMemberName(scheme, "getter", name);
};

export const fieldMemberName = (
  scheme: NameScheme,
  type: FieldNameType,
  name: string,
  { isSynthesized }: { isSynthesized: boolean }
): string => {
  const { container } = scheme;
  const prefix = memberPrefix(container);

  if (type === "representation-field") {
    return `${prefix}#rep#${name}`;
  }

  if (!isSynthesized) {
    return `${prefix}${name}`;
  }

  switch (type) {
    case "field":
      return `_#${ownerSegment(container)}${name}`;
    case "is-set-field":
      return `_#${ownerSegment(container)}${name}#isSet`;
    case "getter":
    case "setter":
      return `${prefix}${name}`;
  }
};

export const constructorMemberName = (
  scheme: NameScheme,
  name: string,
  { isTearOff }: { isTearOff: boolean }
): CanonicalName => {
  const { container } = scheme;
  const displayName = name === "" ? "new" : name;

  if (container.kind === "extension-type") {
    return isTearOff
      ? canonical("getter", `${container.name}|_#${displayName}#tearOff`)
      : canonical("constructor", `${container.name}|constructor#${displayName}`);
  }

  return isTearOff
    ? canonical("getter", `_#${container.name}#${displayName}#tearOff`)
    : canonical("constructor", name);
};

export interface MemberKeys {
  key: CanonicalName;
  tearOff?: CanonicalName;
}

/**
 * Canonical lookup keys for one member. Fields report their field-table key;
 * the getter and setter companions share the same text.
 */
export const memberKeys = ({
  container,
  memberKind,
  isStatic,
  name,
}: {
  container: ContainerName;
  memberKind: MemberKind;
  isStatic: boolean;
  name: string;
}): MemberKeys => {
  const scheme = createNameScheme({ container, isStatic });
  switch (memberKind) {
    case "getter":
    case "setter":
    case "method":
      return {
        key: procedureMemberName(scheme, memberKind, name),
        tearOff: procedureTearOffName(scheme, memberKind, name),
      };
    case "field":
      return {
        key: canonical(
          "field",
          fieldMemberName(
            scheme,
            container.kind === "extension-type" && scheme.isInstanceMember
              ? "representation-field"
              : "field",
            name,
            { isSynthesized: false }
          )
        ),
      };
    case "constructor":
    case "factory":
      return {
        key: constructorMemberName(scheme, name, { isTearOff: false }),
        tearOff: constructorMemberName(scheme, name, { isTearOff: true }),
      };
  }
};

export const unnamedExtensionName = (index: number): string =>
  `_extension#${index}`;
