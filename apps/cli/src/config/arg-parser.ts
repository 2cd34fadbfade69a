import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import type { DeclbindConfig, LateLoweringMode } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../package.json") as { version: string };

const LATE_LOWERING_MODES = ["none", "all", "instance", "static"] as const;

type ParsedOptions = {
  index?: string;
  lateLowering: LateLoweringMode;
  staticFieldLowering?: boolean;
  printNamespace?: boolean;
  color: boolean;
};

const parseLateLoweringMode = (value: string): LateLoweringMode => {
  const normalized = value.toLowerCase();
  const mode = LATE_LOWERING_MODES.find((entry) => entry === normalized);
  if (mode) {
    return mode;
  }
  throw new InvalidArgumentError(
    `invalid late lowering mode "${value}" (allowed: ${LATE_LOWERING_MODES.join(", ")})`,
  );
};

const createCommand = (): Command =>
  new Command()
    .name("declbind")
    .description("Bind a compilation unit dump and report its diagnostics")
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .exitOverride()
    .argument("<unit>", "compilation unit fragments (JSON)")
    .option("--index <file>", "reference index of a previous build (JSON)")
    .option(
      "--late-lowering <mode>",
      `lower late fields (${LATE_LOWERING_MODES.join("|")})`,
      parseLateLoweringMode,
      "none",
    )
    .option(
      "--static-field-lowering",
      "also lower static and unit-level late fields",
    )
    .option("--print-namespace", "print every bound symbol after binding")
    .option("--no-color", "disable colored diagnostics");

/**
 * Parses declbind arguments (without the node and script entries). Usage
 * errors surface as a CommanderError carrying the exit code.
 */
export const parseConfig = (argv: readonly string[]): DeclbindConfig => {
  const program = createCommand();
  program.parse(["node", "declbind", ...argv]);
  const opts = program.opts<ParsedOptions>();
  const [unit = ""] = program.args;

  return {
    unit,
    index: opts.index,
    lateLowering: opts.lateLowering,
    staticFieldLowering: opts.staticFieldLowering ?? false,
    printNamespace: opts.printNamespace ?? false,
    color: opts.color,
  };
};

export const getConfigFromCli = (): DeclbindConfig =>
  parseConfig(process.argv.slice(2));
