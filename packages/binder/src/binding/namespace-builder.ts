import {
  diagnosticFromCode,
  type ProblemReporter,
} from "../diagnostics/index.js";
import { unexpected, unhandled } from "../errors.js";
import type { SourceSpan, SymbolId } from "../ids.js";
import type { TypeParameterNamespace } from "../scopes/type-parameters.js";
import type { SymbolArena } from "../symbols/symbol-arena.js";
import {
  isConstructorLike,
  isGetterSymbol,
  isSetterSymbol,
  type SymbolRecord,
} from "../symbols/types.js";
import type { Namespace, NamespaceMapKind } from "./namespace.js";

export interface PendingInsertion {
  name: string;
  symbol: SymbolId;
  span: SourceSpan;
}

export interface NamespaceOwner {
  name: string;
  /** e.g. `class`, `extension type`; used in diagnostics. */
  kindLabel: string;
  typeParameters: TypeParameterNamespace;
}

export const namespaceMapFor = (symbol: SymbolRecord): NamespaceMapKind => {
  if (isConstructorLike(symbol)) return "constructor";
  if (isSetterSymbol(symbol)) return "setable";
  return "getable";
};

/**
 * Decides whether `incoming`, bound under the same name as the current head
 * `existing`, redeclares it. `incoming.next` already points at `existing`.
 */
export const isDuplicatedDeclaration = ({
  existing,
  incoming,
  symbols,
}: {
  existing: SymbolRecord;
  incoming: SymbolRecord;
  symbols: SymbolArena;
}): boolean => {
  if (incoming.isAugmentation) return false;

  if (existing.next === undefined) {
    if (isGetterSymbol(existing) && isSetterSymbol(incoming)) return false;
    if (isSetterSymbol(existing) && isGetterSymbol(incoming)) return false;
  } else {
    for (const earlier of symbols.chain(existing.next)) {
      if (earlier.kind === "class" && !earlier.isSynthesized) return true;
    }
  }

  if (
    existing.kind === "class" &&
    incoming.kind === "class" &&
    existing.isSynthesized &&
    incoming.isSynthesized
  ) {
    return false;
  }

  return true;
};

const reportedName = (
  symbol: SymbolRecord,
  name: string,
  owner: NamespaceOwner | undefined
): string => {
  if (!isConstructorLike(symbol) || !owner) return name;
  return name === "" ? owner.name : `${owner.name}.${name}`;
};

export const buildNamespace = ({
  insertions,
  namespace,
  owner,
  problems,
  symbols,
}: {
  insertions: readonly PendingInsertion[];
  namespace: Namespace;
  owner?: NamespaceOwner;
  problems: ProblemReporter;
  symbols: SymbolArena;
}): Namespace => {
  const inserted: { name: string; symbol: SymbolRecord }[] = [];

  const reportDuplicate = (
    name: string,
    symbol: SymbolRecord,
    existing: SymbolRecord
  ) => {
    const displayName = reportedName(symbol, name, owner);
    problems.report(
      diagnosticFromCode({
        code: "BD0001",
        params: { kind: "duplicated-declaration", name: displayName },
        span: symbol.span,
        related: [
          diagnosticFromCode({
            code: "BD0001",
            params: { kind: "previous-declaration", name: displayName },
            span: existing.span,
            severity: "note",
            hints: [],
          }),
        ],
      })
    );
  };

  const checkOwnerName = (name: string, symbol: SymbolRecord) => {
    if (!owner || isConstructorLike(symbol) || name !== owner.name) return;
    problems.report(
      diagnosticFromCode({
        code: "BD0002",
        params: {
          kind: "member-shares-declaration-name",
          name,
          declarationKind: owner.kindLabel,
        },
        span: symbol.span,
      })
    );
  };

  const acceptDeclaration = (
    name: string,
    symbol: SymbolRecord,
    { map, hasBase }: { map: NamespaceMapKind; hasBase: boolean }
  ) => {
    checkOwnerName(name, symbol);
    if (symbol.kind === "extension") {
      namespace.addExtension(symbol.id);
      return;
    }
    if (!symbol.isAugmentation) return;
    if (hasBase) {
      namespace.addAugmentation(name, symbol.id, {
        isSetter: map === "setable",
      });
      return;
    }
    // TODO: report augmentations without a base declaration once the
    // orphaned-augmentation diagnostic is defined.
  };

  const insert = ({ name, symbol: id, span }: PendingInsertion) => {
    const symbol = symbols.get(id);
    if (symbol.kind === "extension" && symbol.isUnnamed) {
      namespace.addExtension(id);
      return;
    }

    const map = namespaceMapFor(symbol);
    if (map === "constructor" && !namespace.hasConstructors) {
      return unhandled(`constructor '${name}'`, "a unit namespace", span);
    }

    const existingId = namespace.lookup(map, name);
    if (existingId === undefined) {
      namespace.set(map, name, id);
      inserted.push({ name, symbol });
      acceptDeclaration(name, symbol, { map, hasBase: false });
      return;
    }

    if (existingId === id) return;

    if (symbol.next !== undefined && symbol.next !== existingId) {
      return unexpected(
        `'${name}' to augment symbol ${existingId}`,
        `a chain linked to symbol ${symbol.next}`,
        span
      );
    }

    symbols.link(id, existingId);
    namespace.set(map, name, id);
    inserted.push({ name, symbol });

    const existing = symbols.get(existingId);
    if (isDuplicatedDeclaration({ existing, incoming: symbol, symbols })) {
      reportDuplicate(name, symbol, existing);
      return;
    }
    acceptDeclaration(name, symbol, { map, hasBase: true });
  };

  insertions.forEach(insert);

  if (owner) {
    inserted.forEach(({ name, symbol }) => {
      const parameter = owner.typeParameters.get(name);
      if (!parameter) return;
      problems.report(
        diagnosticFromCode({
          code: "BD0003",
          params: { kind: "conflicts-with-type-parameter", name },
          span: symbol.span,
          related: [
            diagnosticFromCode({
              code: "BD0003",
              params: { kind: "type-parameter-declared-here" },
              span: parameter.span,
              severity: "note",
            }),
          ],
        })
      );
    });
  }

  namespace.seal();
  return namespace;
};
