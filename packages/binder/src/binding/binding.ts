import { InternalBindingError } from "../errors.js";
import { incrementBinderPerfCounter, timeBinderPhase } from "../perf.js";
import { bindFragment } from "./binders/index.js";
import {
  createBindingContext,
  toBindingResult,
} from "./context.js";
import { buildNamespace } from "./namespace-builder.js";
import type { BindingInputs, BindingResult, BoundUnit } from "./types.js";

export * from "./types.js";

/**
 * Binds every fragment of a unit (main list, then parts) and builds the unit
 * and declaration namespaces. Type references stay unresolved.
 */
export const bindUnit = (inputs: BindingInputs): BoundUnit => {
  const context = createBindingContext(inputs);
  const phasesMs: Record<string, number> = {};
  const { unit } = inputs;

  timeBinderPhase(phasesMs, "bind", () => {
    unit.fragments.forEach((fragment) =>
      bindFragment(fragment, context.unit, context)
    );
    unit.parts?.forEach((part) =>
      part.fragments.forEach((fragment) =>
        bindFragment(fragment, context.unit, context)
      )
    );
  });

  timeBinderPhase(phasesMs, "namespaces", () => {
    buildNamespace({
      insertions: context.unit.pending,
      namespace: context.unitNamespace,
      problems: context.problems,
      symbols: context.session.symbols,
    });
    context.declarations.forEach((declaration) =>
      buildNamespace({
        insertions: declaration.pending,
        namespace: declaration.namespace,
        owner: {
          name: declaration.name,
          kindLabel: declaration.kindLabel,
          typeParameters: declaration.typeParameters,
        },
        problems: context.problems,
        symbols: context.session.symbols,
      })
    );
  });

  return { context, phasesMs };
};

/** Resolves every type reference registered while binding. Runs once. */
export const resolveUnitTypes = ({ context }: BoundUnit): number => {
  const resolved = context.unitTypeScope.resolveTypes({
    problems: context.problems,
    symbols: context.session.symbols,
  });
  const registered = context.unitTypeScope.registeredCount;
  if (resolved !== registered) {
    throw new InternalBindingError(
      `resolved ${resolved} of ${registered} registered type references`
    );
  }
  incrementBinderPerfCounter("binder.types.resolved", resolved);
  return resolved;
};

export const runBindingPipeline = (inputs: BindingInputs): BindingResult => {
  const bound = bindUnit(inputs);
  const phasesMs = { ...bound.phasesMs };
  const resolvedTypes = timeBinderPhase(phasesMs, "resolve", () =>
    resolveUnitTypes(bound)
  );
  return toBindingResult(bound.context, { resolvedTypes, phasesMs });
};
