import { readFile } from "node:fs/promises";
import { CommanderError } from "commander";
import {
  createReferenceIndex,
  diffBinderPerfCounters,
  InternalBindingError,
  logBinderPerfSummary,
  runBindingPipeline,
  snapshotBinderPerfCounters,
  walkBindingResult,
  type BindingOptions,
  type BindingResult,
  type SymbolRecord,
  type WalkedSymbol,
} from "@declbind/binder";
import { getConfig } from "./config/index.js";
import type { DeclbindConfig, LateLoweringMode } from "./config/types.js";
import { formatCliDiagnostic, type SourceCache } from "./diagnostics.js";
import {
  decodeCompilationUnit,
  decodeReferenceData,
  parseJsonDocument,
  UnitFormatError,
} from "./unit-json.js";

export type CliOutput = {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
};

export const EXIT_DIAGNOSTICS = 1;
export const EXIT_FAILURE = 2;

const consoleOutput: CliOutput = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

const lateLoweringByMode: Record<
  LateLoweringMode,
  NonNullable<BindingOptions["lateLowering"]>
> = {
  none: false,
  all: true,
  instance: (field) => !field.isStatic,
  static: (field) => field.isStatic,
};

export const toBindingOptions = (config: DeclbindConfig): BindingOptions => ({
  lateLowering: lateLoweringByMode[config.lateLowering],
  staticFieldLowering: config.staticFieldLowering,
});

const symbolLabel = (symbol: SymbolRecord): string => {
  switch (symbol.kind) {
    case "procedure":
      return symbol.procedureKind;
    case "class":
      return symbol.classKind;
    case "lowered-slot":
      return symbol.slot;
    default:
      return symbol.kind;
  }
};

const formatWalkedSymbol = ({ symbol, map, depth }: WalkedSymbol): string => {
  const augmentation = symbol.isAugmentation ? " (augmentation)" : "";
  const handle = symbol.references.node ? ` @${symbol.references.node}` : "";
  return `${"  ".repeat(depth)}[${map}] ${symbolLabel(symbol)} ${
    symbol.name
  }${augmentation}${handle}`;
};

export const formatNamespaceListing = (result: BindingResult): string[] =>
  Array.from(walkBindingResult(result), formatWalkedSymbol);

const readDocument = async <T>(
  file: string,
  decode: (value: unknown) => T,
): Promise<T> => {
  let text: string;
  try {
    text = await readFile(file, "utf8");
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new UnitFormatError("$", `cannot read file (${detail})`, file);
  }
  try {
    return decode(parseJsonDocument(text));
  } catch (error) {
    if (error instanceof UnitFormatError) {
      throw new UnitFormatError(error.path, error.detail, file);
    }
    throw error;
  }
};

const bindConfiguredUnit = async (
  config: DeclbindConfig,
): Promise<BindingResult> => {
  const unit = await readDocument(config.unit, decodeCompilationUnit);
  const referenceIndex = config.index
    ? createReferenceIndex(
        await readDocument(config.index, decodeReferenceData),
      )
    : undefined;
  return runBindingPipeline({
    unit,
    referenceIndex,
    options: toBindingOptions(config),
  });
};

/**
 * Binds the configured unit and reports through `output`. Resolves to the
 * process exit code: 0 when clean, 1 on error diagnostics, 2 when the input
 * is unusable or binding failed internally.
 */
export const runDeclbind = async (
  config: DeclbindConfig,
  output: CliOutput = consoleOutput,
): Promise<number> => {
  const before = snapshotBinderPerfCounters();
  let result: BindingResult;
  try {
    result = await bindConfiguredUnit(config);
  } catch (error) {
    if (error instanceof UnitFormatError) {
      output.stderr(
        `${error.file ?? config.unit}: invalid input at ${error.message}`,
      );
      return EXIT_FAILURE;
    }
    if (error instanceof InternalBindingError) {
      output.stderr(`${config.unit}: internal binding failure: ${error.message}`);
      return EXIT_FAILURE;
    }
    throw error;
  }

  const sources: SourceCache = new Map();
  result.diagnostics.forEach((diagnostic) =>
    output.stderr(formatCliDiagnostic(diagnostic, { color: config.color, sources })),
  );

  if (config.printNamespace) {
    formatNamespaceListing(result).forEach((line) => output.stdout(line));
  }

  const hasErrors = result.diagnostics.some(
    (diagnostic) => diagnostic.severity === "error",
  );
  logBinderPerfSummary({
    unit: result.uri,
    success: !hasErrors,
    phasesMs: result.phasesMs,
    counters: diffBinderPerfCounters({
      before,
      after: snapshotBinderPerfCounters(),
    }),
    diagnostics: result.diagnostics.length,
  });

  return hasErrors ? EXIT_DIAGNOSTICS : 0;
};

export const exec = () => main().catch(errorHandler);

async function main() {
  const config = getConfig();
  process.exitCode = await runDeclbind(config);
}

function errorHandler(error: unknown) {
  // Commander has already printed usage errors, help and the version.
  if (error instanceof CommanderError) {
    process.exitCode = error.exitCode;
    return;
  }

  console.error(error);
  process.exitCode = EXIT_FAILURE;
}
