/**
 * Run-sheet generator.
 *
 * Joins a sample sheet with the design database through the Identifier
 * Resolver and writes one row per resolved sample, ready for the
 * downstream editing-outcome analysis.
 */

import { defaultConfig, type PequantConfig, type ResolverRules } from "@pequant/config";
import {
  consoleLogger,
  type DesignRecord,
  type Logger,
  logInfo,
  logWarn,
  RunReport,
} from "@pequant/core";
import { ConfigSchemaError, DesignFieldMissingError, RunAbortedError } from "@pequant/errors";
import { formatDelimited, loadDesignDatabase } from "@pequant/io";
import { createIdentifierResolver } from "@pequant/quantify";

import { commitOutput } from "./output.js";
import { loadSampleSheet, type SampleSheetEntry } from "./sample-sheet.js";
import { trimAdapters, trimLeadingAdapter } from "./sequences.js";

export const RUN_SHEET_COLUMNS = [
  "name",
  "fastq_r1",
  "fastq_r2",
  "prime_editing_pegRNA_extension_seq",
  "amplicon_seq",
  "prime_editing_pegRNA_scaffold_seq",
  "prime_editing_pegRNA_spacer_seq",
] as const;

export type RunSheetRow = readonly string[];

export interface RunSheetSettings {
  readonly resolver: ResolverRules;
  readonly amplicon: string;
  readonly scaffold: string;
}

/**
 * Builds run-sheet rows in sample-sheet order. Samples that do not
 * resolve to exactly one design, and designs lacking an extension or
 * spacer, are recorded in `report` and produce no row.
 */
export function generateRunSheet(
  designs: readonly DesignRecord[],
  samples: readonly SampleSheetEntry[],
  settings: RunSheetSettings,
  report: RunReport,
): RunSheetRow[] {
  const resolver = createIdentifierResolver(designs, settings.resolver);
  const incomplete = new Set<string>();
  const rows: RunSheetRow[] = [];

  for (const sample of samples) {
    const resolution = resolver.resolve(sample.name);
    if (resolution.status !== "resolved") {
      report.record(resolution.error);
      continue;
    }

    const { design } = resolution;
    const extension = design.extensionSense ?? "";
    const spacer = design.spacer ?? "";
    const field = extension === "" ? "extension sequence" : spacer === "" ? "spacer sequence" : undefined;
    if (field !== undefined) {
      if (!incomplete.has(design.designId)) {
        incomplete.add(design.designId);
        report.record(new DesignFieldMissingError(design.designId, field));
      }
      continue;
    }

    rows.push([
      sample.name,
      sample.fastqR1,
      sample.fastqR2,
      trimLeadingAdapter(extension),
      settings.amplicon,
      settings.scaffold,
      trimAdapters(spacer),
    ]);
  }

  return rows;
}

export function formatRunSheet(rows: readonly RunSheetRow[]): string {
  return formatDelimited([RUN_SHEET_COLUMNS, ...rows], "\t");
}

export interface WriteRunSheetOptions {
  readonly designPath: string;
  readonly sampleSheetPath: string;
  readonly outputPath: string;
  readonly config?: PequantConfig;
  /** Overrides `workflow.amplicon` */
  readonly amplicon?: string;
  /** Overrides `workflow.scaffold` */
  readonly scaffold?: string;
  /** Also write the run report as JSON, committed with the output */
  readonly reportPath?: string;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

export interface RunSheetResult {
  readonly rowCount: number;
  readonly report: RunReport;
  readonly outputPath: string;
  readonly reportPath?: string;
}

/**
 * Loads both inputs, generates the run sheet and writes it atomically.
 *
 * @throws {ConfigSchemaError} when no amplicon or scaffold sequence is known
 * @throws {IOError} for unreadable or invalid inputs and failed writes
 * @throws {RunAbortedError} if `signal` fires before the file is in place
 */
export async function writeRunSheet(options: WriteRunSheetOptions): Promise<RunSheetResult> {
  const config = options.config ?? defaultConfig();
  const logger = options.logger ?? consoleLogger;

  const amplicon = options.amplicon ?? config.workflow.amplicon;
  const scaffold = options.scaffold ?? config.workflow.scaffold;
  const missing = [
    ...(amplicon === undefined ? ["workflow.amplicon: Required for a run sheet"] : []),
    ...(scaffold === undefined ? ["workflow.scaffold: Required for a run sheet"] : []),
  ];
  if (amplicon === undefined || scaffold === undefined) {
    throw new ConfigSchemaError(missing);
  }

  if (options.signal?.aborted) {
    throw new RunAbortedError("load");
  }
  const designs = await loadDesignDatabase(options.designPath, {
    ...(config.input.designDelimiter ? { delimiter: config.input.designDelimiter } : {}),
  });
  const samples = await loadSampleSheet(options.sampleSheetPath);

  const report = new RunReport();
  const rows = generateRunSheet(designs, samples, { resolver: config.resolver, amplicon, scaffold }, report);
  if (report.hasIssues) {
    logWarn(logger, "run-sheet", `${report.issues.length} sample(s) left out`);
  }

  await commitOutput(options.outputPath, formatRunSheet(rows), report, {
    logger,
    ...(options.reportPath !== undefined ? { reportPath: options.reportPath } : {}),
    ...(options.signal ? { signal: options.signal } : {}),
  });
  logInfo(logger, "run-sheet", `Wrote ${rows.length} row(s) to ${options.outputPath}`);

  return {
    rowCount: rows.length,
    report,
    outputPath: options.outputPath,
    ...(options.reportPath !== undefined ? { reportPath: options.reportPath } : {}),
  };
}
