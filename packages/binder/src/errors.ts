import { describeSpan, type SourceSpan } from "./diagnostics/index.js";

/**
 * Raised when the binder's own invariants break. These are never user
 * diagnostics; they abort binding of the unit.
 */
export class InternalBindingError extends Error {
  readonly span?: SourceSpan;

  constructor(message: string, span?: SourceSpan) {
    super(span ? `${message} (at ${describeSpan(span)})` : message);
    this.name = "InternalBindingError";
    this.span = span;
  }
}

export const unexpected = (
  expected: string,
  actual: string,
  span?: SourceSpan
): never => {
  throw new InternalBindingError(
    `expected ${expected} but found ${actual}`,
    span
  );
};

export const unhandled = (
  what: string,
  where: string,
  span?: SourceSpan
): never => {
  throw new InternalBindingError(`unhandled ${what} in ${where}`, span);
};
