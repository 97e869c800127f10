/**
 * Oligo-order generator: one sense and one antisense oligo per design.
 */

import { defaultConfig, type PequantConfig } from "@pequant/config";
import {
  consoleLogger,
  type DesignRecord,
  type Logger,
  logInfo,
  logWarn,
  RunReport,
} from "@pequant/core";
import { DesignFieldMissingError, RunAbortedError } from "@pequant/errors";
import { formatDelimited, loadDesignDatabase } from "@pequant/io";
import { compareCodeUnits } from "@pequant/quantify";

import { commitOutput } from "./output.js";
import { toScaffold2 } from "./sequences.js";

export interface OligoOrderSettings {
  /** Prepended, with an underscore, to every oligo name */
  readonly prefix?: string;
  readonly scaffold2: boolean;
}

export interface Oligo {
  readonly name: string;
  readonly sequence: string;
}

export function oligoBaseName(designId: string, prefix?: string): string {
  return prefix ? `${prefix}_${designId}` : designId;
}

/**
 * Lists `<base>_S` and `<base>_AS` oligos for every design carrying
 * extension sequences, in design-identifier order. A design with only
 * one of the two strands is recorded in `report` and skipped.
 *
 * @throws {ScaffoldMismatchError} with `scaffold2` set, for the first
 *   sense extension not written for scaffold 1
 */
export function generateOligoOrder(
  designs: readonly DesignRecord[],
  settings: OligoOrderSettings,
  report: RunReport,
): Oligo[] {
  const sorted = [...designs].sort((a, b) => compareCodeUnits(a.designId, b.designId));
  const oligos: Oligo[] = [];

  for (const design of sorted) {
    const sense = design.extensionSense ?? "";
    const antisense = design.extensionAntisense ?? "";
    if (sense === "" && antisense === "") continue;
    if (sense === "" || antisense === "") {
      const field = sense === "" ? "sense extension" : "antisense extension";
      report.record(new DesignFieldMissingError(design.designId, field));
      continue;
    }

    const base = oligoBaseName(design.designId, settings.prefix);
    oligos.push(
      { name: `${base}_S`, sequence: settings.scaffold2 ? toScaffold2(design.designId, sense) : sense },
      { name: `${base}_AS`, sequence: antisense },
    );
  }

  return oligos;
}

/** Comma-separated, no header */
export function formatOligoOrder(oligos: readonly Oligo[]): string {
  return formatDelimited(
    oligos.map(({ name, sequence }) => [name, sequence]),
    ",",
  );
}

export interface WriteOligoOrderOptions {
  readonly designPath: string;
  readonly outputPath: string;
  readonly config?: PequantConfig;
  /** Overrides `workflow.oligoPrefix` */
  readonly prefix?: string;
  /** Overrides `workflow.scaffold2` */
  readonly scaffold2?: boolean;
  /** Also write the run report as JSON, committed with the output */
  readonly reportPath?: string;
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
}

export interface OligoOrderResult {
  readonly oligoCount: number;
  readonly report: RunReport;
  readonly outputPath: string;
  readonly reportPath?: string;
}

/**
 * Generates the order from the design database and writes it atomically.
 * A scaffold mismatch aborts before anything is written.
 */
export async function writeOligoOrder(options: WriteOligoOrderOptions): Promise<OligoOrderResult> {
  const config = options.config ?? defaultConfig();
  const logger = options.logger ?? consoleLogger;
  const prefix = options.prefix ?? config.workflow.oligoPrefix;

  if (options.signal?.aborted) {
    throw new RunAbortedError("load");
  }
  const designs = await loadDesignDatabase(options.designPath, {
    ...(config.input.designDelimiter ? { delimiter: config.input.designDelimiter } : {}),
  });

  const report = new RunReport();
  const oligos = generateOligoOrder(
    designs,
    {
      scaffold2: options.scaffold2 ?? config.workflow.scaffold2,
      ...(prefix !== undefined ? { prefix } : {}),
    },
    report,
  );
  if (report.hasIssues) {
    logWarn(logger, "oligo-order", `${report.issues.length} design(s) left out`);
  }

  await commitOutput(options.outputPath, formatOligoOrder(oligos), report, {
    logger,
    ...(options.reportPath !== undefined ? { reportPath: options.reportPath } : {}),
    ...(options.signal ? { signal: options.signal } : {}),
  });
  logInfo(logger, "oligo-order", `Wrote ${oligos.length} oligo(s) to ${options.outputPath}`);

  return {
    oligoCount: oligos.length,
    report,
    outputPath: options.outputPath,
    ...(options.reportPath !== undefined ? { reportPath: options.reportPath } : {}),
  };
}
