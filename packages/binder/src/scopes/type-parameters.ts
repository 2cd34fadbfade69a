import {
  diagnosticFromCode,
  type ProblemReporter,
} from "../diagnostics/index.js";
import { InternalBindingError } from "../errors.js";
import type { TypeParameterFragment } from "../fragments/types.js";
import type { SourceSpan, TypeParameterId } from "../ids.js";
import type { TypeReference } from "./type-reference.js";

export type TypeParameterKind =
  | "declared"
  | "extension-synthesized"
  | "function";

export class TypeParameter {
  readonly id: TypeParameterId;
  readonly originalName: string;
  readonly span: SourceSpan;
  readonly kind: TypeParameterKind;
  readonly isWildcard: boolean;
  bound?: TypeReference;
  private currentName: string;

  constructor({
    id,
    name,
    span,
    kind,
    isWildcard = false,
  }: {
    id: TypeParameterId;
    name: string;
    span: SourceSpan;
    kind: TypeParameterKind;
    isWildcard?: boolean;
  }) {
    this.id = id;
    this.originalName = name;
    this.currentName = name;
    this.span = span;
    this.kind = kind;
    this.isWildcard = isWildcard;
  }

  get name(): string {
    return this.currentName;
  }

  rename(name: string): void {
    this.currentName = name;
  }
}

export const createTypeParameters = ({
  fragments,
  kind,
  nextId,
}: {
  fragments: readonly TypeParameterFragment[];
  kind: TypeParameterKind;
  nextId: () => TypeParameterId;
}): TypeParameter[] =>
  fragments.map(
    (fragment) =>
      new TypeParameter({
        id: nextId(),
        name: fragment.name,
        span: fragment.span,
        kind,
        isWildcard: fragment.isWildcard,
      })
  );

/** Copies handed to extension members and mixin application scopes. */
export const copyTypeParameters = ({
  parameters,
  kind,
  nextId,
}: {
  parameters: readonly TypeParameter[];
  kind: TypeParameterKind;
  nextId: () => TypeParameterId;
}): TypeParameter[] =>
  parameters.map(
    (parameter) =>
      new TypeParameter({
        id: nextId(),
        name: parameter.originalName,
        span: parameter.span,
        kind,
        isWildcard: parameter.isWildcard,
      })
  );

export interface DeclareTypeParametersOptions {
  ownerName: string;
  allowNameConflict: boolean;
  problems: ProblemReporter;
}

export class TypeParameterNamespace {
  private byName = new Map<string, TypeParameter>();
  private frozen = false;

  get(name: string): TypeParameter | undefined {
    return this.byName.get(name);
  }

  parameters(): IterableIterator<TypeParameter> {
    return this.byName.values();
  }

  get size(): number {
    return this.byName.size;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  declare(
    parameters: readonly TypeParameter[],
    { ownerName, allowNameConflict, problems }: DeclareTypeParametersOptions
  ): void {
    if (this.frozen) {
      throw new InternalBindingError(
        `type parameters of '${ownerName}' are frozen`,
        parameters[0]?.span
      );
    }

    parameters.forEach((parameter) => {
      if (parameter.isWildcard) {
        return;
      }

      const existing = this.byName.get(parameter.name);
      if (!existing) {
        this.byName.set(parameter.name, parameter);
        if (!allowNameConflict && parameter.name === ownerName) {
          problems.report(
            diagnosticFromCode({
              code: "BD0005",
              params: {
                kind: "type-parameter-shares-declaration-name",
                name: parameter.name,
              },
              span: parameter.span,
            })
          );
        }
        return;
      }

      if (existing.kind === "extension-synthesized") {
        // The member's own parameter shadows the one copied from the
        // extension; the copy stays reachable under its hidden name.
        this.byName.delete(existing.name);
        existing.rename(`#${existing.name}`);
        this.byName.set(existing.name, existing);
        this.byName.set(parameter.name, parameter);
        return;
      }

      problems.report(
        diagnosticFromCode({
          code: "BD0004",
          params: { kind: "duplicated-type-parameter", name: parameter.name },
          span: parameter.span,
          related: [
            diagnosticFromCode({
              code: "BD0004",
              params: { kind: "previous-type-parameter", name: existing.name },
              span: existing.span,
              severity: "note",
            }),
          ],
        })
      );
    });
  }

  freeze(): void {
    this.frozen = true;
  }
}
