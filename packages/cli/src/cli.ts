/**
 * CLI pipeline: parse args -> load config -> run command -> report.
 */

import { resolve } from "node:path";

import { defaultConfig, loadConfig, type PequantConfig } from "@pequant/config";
import type { Logger } from "@pequant/core";
import { wrapError } from "@pequant/errors";
import { QUANTIFICATION_LAYOUTS, type QuantificationLayout } from "@pequant/io";
import { runQuantification } from "@pequant/quantify";
import { writeOligoOrder, writeRunSheet } from "@pequant/workflow";
import pc from "picocolors";

import { parseArgv } from "./args.js";
import { JsonReporter } from "./reporters/json-reporter.js";
import { TerminalReporter } from "./reporters/terminal-reporter.js";
import type { CommandName, CommandOutcome, OutcomeReporter } from "./reporters/types.js";

export const VERSION = "0.1.0";

export const EXIT_OK = 0;
/** Only with --strict: the run finished but the report has issues */
export const EXIT_ISSUES = 1;
export const EXIT_FATAL = 2;

const COMMANDS: readonly CommandName[] = ["quantify", "run-sheet", "oligo-order"];

export interface CliArgs {
  readonly command: string | undefined;
  readonly designs: string | undefined;
  readonly counts: string | undefined;
  readonly samples: string | undefined;
  readonly output: string | undefined;
  readonly config: string | undefined;
  readonly report: string | undefined;
  readonly layout: string | undefined;
  readonly amplicon: string | undefined;
  readonly scaffold: string | undefined;
  readonly prefix: string | undefined;
  readonly format: string;
  readonly scaffold2: boolean;
  readonly strict: boolean;
  readonly help: boolean;
  readonly version: boolean;
}

export interface CliIO {
  readonly stdout: (text: string) => void;
  readonly stderr: (text: string) => void;
  /** Environment for `${VAR}` interpolation in the config file */
  readonly env?: Readonly<Record<string, string | undefined>>;
  readonly signal?: AbortSignal;
}

export const processIO: CliIO = {
  stdout: (text) => process.stdout.write(`${text}\n`),
  stderr: (text) => process.stderr.write(`${text}\n`),
};

/** Bad invocation; reported with a pointer to --help */
export class UsageError extends Error {
  override readonly name = "UsageError";
}

export function parseArgs(argv: readonly string[]): CliArgs {
  const { positionals, flags } = parseArgv(argv);
  const text = (name: string): string | undefined => {
    const value = flags[name];
    return typeof value === "string" ? value : undefined;
  };

  return {
    command: positionals[0],
    designs: text("designs"),
    counts: text("counts"),
    samples: text("samples"),
    output: text("output"),
    config: text("config"),
    report: text("report"),
    layout: text("layout"),
    amplicon: text("amplicon"),
    scaffold: text("scaffold"),
    prefix: text("prefix"),
    format: text("format") ?? "terminal",
    scaffold2: flags.scaffold2 === true,
    strict: flags.strict === true,
    help: flags.help === true,
    version: flags.version === true,
  };
}

const HELP = `
  pequant - Quantification aggregation for prime-editing screens

  Usage:
    pequant quantify --designs <file> --counts <file> --output <file> [options]
    pequant run-sheet --designs <file> --samples <file> --output <file> [options]
    pequant oligo-order --designs <file> --output <file> [options]

  Options:
    -c, --config <file>        YAML configuration (default: built-in defaults)
    -o, --output <file>        File to write
    --report <file>            Also write the run report as JSON
    --layout wide|amplicon     Quantification table layout (quantify)
    --amplicon <seq>           Amplicon sequence (run-sheet)
    --scaffold <seq>           Scaffold sequence (run-sheet)
    --prefix <name>            Oligo name prefix (oligo-order)
    --scaffold2                Rewrite sense extensions for scaffold 2 (oligo-order)
    --format terminal|json     Output format (default: terminal)
    --strict                   Exit with 1 when the run report has issues
    -v, --version              Print the version
    -h, --help                 Show this help message

  Exit codes:
    0  output written
    1  output written, issues reported (--strict only)
    2  nothing written: invalid invocation, configuration or input
`;

/**
 * Runs the CLI and resolves to the process exit code.
 */
export async function main(argv: readonly string[], io: CliIO = processIO): Promise<number> {
  const args = parseArgs(argv);

  if (args.help) {
    io.stdout(HELP);
    return EXIT_OK;
  }
  if (args.version) {
    io.stdout(VERSION);
    return EXIT_OK;
  }

  try {
    const reporter = selectReporter(args.format);
    const outcome = await runCommand(args, io);
    io.stdout(reporter.report(outcome));
    return args.strict && outcome.report.hasIssues ? EXIT_ISSUES : EXIT_OK;
  } catch (error: unknown) {
    if (error instanceof UsageError) {
      io.stderr(`${pc.red("error")} ${error.message}`);
      io.stderr("Run pequant --help for usage.");
      return EXIT_FATAL;
    }
    const failure = wrapError(error);
    io.stderr(`${pc.red("error")} [${failure.code}] ${failure.message}`);
    return EXIT_FATAL;
  }
}

function selectReporter(format: string): OutcomeReporter {
  switch (format) {
    case "terminal":
      return new TerminalReporter();
    case "json":
      return new JsonReporter();
    default:
      throw new UsageError(`--format must be terminal or json (got "${format}")`);
  }
}

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

async function runCommand(args: CliArgs, io: CliIO): Promise<CommandOutcome> {
  const command = args.command;
  if (command === undefined) {
    throw new UsageError("No command given");
  }
  if (!isCommandName(command)) {
    throw new UsageError(`Unknown command "${command}"`);
  }

  const designPath = requireFlag(args.designs, "designs");
  const outputPath = resolve(requireFlag(args.output, "output"));
  const logger = stderrLogger(io);
  const signal = io.signal ? { signal: io.signal } : {};
  const reportOption = args.report !== undefined ? { reportPath: resolve(args.report) } : {};

  switch (command) {
    case "quantify": {
      const quantificationPath = requireFlag(args.counts, "counts");
      const config = withLayout(await readConfig(args, io), args.layout);
      const run = await runQuantification({
        designPath,
        quantificationPath,
        outputPath,
        config,
        logger,
        ...signal,
        ...reportOption,
      });
      return {
        command,
        outputPath: run.outputPath,
        written: run.summaries.length,
        unit: "summary rows",
        report: run.report,
        ...(run.reportPath !== undefined ? { reportPath: run.reportPath } : {}),
      };
    }

    case "run-sheet": {
      const sampleSheetPath = requireFlag(args.samples, "samples");
      const result = await writeRunSheet({
        designPath,
        sampleSheetPath,
        outputPath,
        config: await readConfig(args, io),
        logger,
        ...signal,
        ...reportOption,
        ...(args.amplicon !== undefined ? { amplicon: args.amplicon } : {}),
        ...(args.scaffold !== undefined ? { scaffold: args.scaffold } : {}),
      });
      return {
        command,
        outputPath,
        written: result.rowCount,
        unit: "run-sheet rows",
        report: result.report,
        ...(result.reportPath !== undefined ? { reportPath: result.reportPath } : {}),
      };
    }

    case "oligo-order": {
      const result = await writeOligoOrder({
        designPath,
        outputPath,
        config: await readConfig(args, io),
        logger,
        ...signal,
        ...reportOption,
        ...(args.prefix !== undefined ? { prefix: args.prefix } : {}),
        ...(args.scaffold2 ? { scaffold2: true } : {}),
      });
      return {
        command,
        outputPath,
        written: result.oligoCount,
        unit: "oligos",
        report: result.report,
        ...(result.reportPath !== undefined ? { reportPath: result.reportPath } : {}),
      };
    }
  }
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

function requireFlag(value: string | undefined, name: string): string {
  if (value === undefined) {
    throw new UsageError(`--${name} <file> is required`);
  }
  return value;
}

async function readConfig(args: CliArgs, io: CliIO): Promise<PequantConfig> {
  if (args.config === undefined) {
    return defaultConfig();
  }
  return loadConfig(args.config, io.env ? { env: io.env } : undefined);
}

function withLayout(config: PequantConfig, layout: string | undefined): PequantConfig {
  if (layout === undefined) {
    return config;
  }
  if (!isLayout(layout)) {
    throw new UsageError(`--layout must be one of: ${QUANTIFICATION_LAYOUTS.join(", ")}`);
  }
  return { ...config, input: { ...config.input, layout } };
}

function isLayout(value: string): value is QuantificationLayout {
  return QUANTIFICATION_LAYOUTS.some((layout) => layout === value);
}

function stderrLogger(io: CliIO): Logger {
  return {
    info: (message) => io.stderr(pc.dim(message)),
    warn: (message) => io.stderr(pc.yellow(message)),
  };
}
