type BinderPerfCounterSnapshot = Map<string, number>;

type BinderPerfSummary = {
  unit: string;
  success: boolean;
  phasesMs: Readonly<Record<string, number>>;
  counters: Readonly<Record<string, number>>;
  diagnostics: number;
};

const BINDER_PERF_ENV = "DECLBIND_PERF";

const readPerfEnv = (): string | undefined => process.env[BINDER_PERF_ENV];

const PERF_ENABLED = (() => {
  const raw = readPerfEnv();
  if (!raw) return false;
  const normalized = raw.trim().toLowerCase();
  return normalized === "1" || normalized === "true" || normalized === "yes";
})();

const counters = new Map<string, number>();

const roundMs = (value: number): number => Math.round(value * 1000) / 1000;

const toSortedRecord = (
  entries: ReadonlyMap<string, number>
): Record<string, number> =>
  Object.fromEntries(
    Array.from(entries.entries()).sort(([left], [right]) =>
      left.localeCompare(right)
    )
  );

export const incrementBinderPerfCounter = (name: string, amount = 1): void => {
  if (!PERF_ENABLED || amount === 0) {
    return;
  }
  counters.set(name, (counters.get(name) ?? 0) + amount);
};

export const snapshotBinderPerfCounters = (): BinderPerfCounterSnapshot =>
  PERF_ENABLED ? new Map(counters) : new Map();

export const diffBinderPerfCounters = ({
  before,
  after,
}: {
  before: ReadonlyMap<string, number>;
  after: ReadonlyMap<string, number>;
}): Record<string, number> => {
  if (!PERF_ENABLED) {
    return {};
  }

  const keys = new Set<string>([...before.keys(), ...after.keys()]);
  const delta = new Map<string, number>();
  keys.forEach((key) => {
    const diff = (after.get(key) ?? 0) - (before.get(key) ?? 0);
    if (diff !== 0) {
      delta.set(key, diff);
    }
  });
  return toSortedRecord(delta);
};

/** Runs `fn` and records its wall time under `phase` when perf is on. */
export const timeBinderPhase = <T>(
  phasesMs: Record<string, number>,
  phase: string,
  fn: () => T
): T => {
  if (!PERF_ENABLED) {
    return fn();
  }
  const start = performance.now();
  try {
    return fn();
  } finally {
    phasesMs[phase] = (phasesMs[phase] ?? 0) + (performance.now() - start);
  }
};

export const logBinderPerfSummary = ({
  unit,
  success,
  phasesMs,
  counters,
  diagnostics,
}: BinderPerfSummary): void => {
  if (!PERF_ENABLED) {
    return;
  }

  const summary = {
    unit,
    success,
    diagnostics,
    phasesMs: Object.fromEntries(
      Object.entries(phasesMs)
        .sort(([left], [right]) => left.localeCompare(right))
        .map(([phase, value]) => [phase, roundMs(value)])
    ),
    counters,
  };

  console.error(`[declbind:binder:perf] ${JSON.stringify(summary)}`);
};
