/**
 * End-to-end quantification run: load → resolve → aggregate → emit.
 */

import { resolve } from "node:path";

import { defaultConfig, type PequantConfig } from "@pequant/config";
import {
  consoleLogger,
  type DesignRecord,
  formatRunReport,
  type Logger,
  logWarn,
  type QuantificationRecord,
  RunReport,
  type SummaryRecord,
} from "@pequant/core";
import { RunAbortedError } from "@pequant/errors";
import { loadDesignDatabase, loadQuantification } from "@pequant/io";

import { emitSummary } from "./emitter.js";
import { aggregate } from "./engine.js";
import { createIdentifierResolver, resolveRecords } from "./resolver.js";

/**
 * Pure in-memory core of a run. Per-record problems are added to
 * `report`; the returned summaries are in output order.
 */
export function quantify(
  designs: readonly DesignRecord[],
  records: readonly QuantificationRecord[],
  config: PequantConfig,
  report: RunReport,
): readonly SummaryRecord[] {
  const resolver = createIdentifierResolver(designs, config.resolver);
  const resolved = resolveRecords(records, resolver, report);
  return aggregate(resolved, designs, config.categories, report);
}

export interface RunQuantificationOptions {
  readonly designPath: string;
  readonly quantificationPath: string;
  readonly outputPath: string;
  /** Default: `defaultConfig()` */
  readonly config?: PequantConfig;
  readonly signal?: AbortSignal;
  /** Also write the run report as JSON to this path */
  readonly reportPath?: string;
  readonly logger?: Logger;
}

export interface QuantificationRun {
  readonly summaries: readonly SummaryRecord[];
  readonly report: RunReport;
  readonly outputPath: string;
  readonly reportPath?: string;
}

/**
 * Runs a full quantification. Both inputs are loaded before anything is
 * written, so a fatal input error never creates or touches the output.
 * The run report, when requested, is committed with the summary and
 * renamed into place first.
 *
 * @throws {IOError} for unreadable or invalid inputs and failed writes
 * @throws {RunAbortedError} if `signal` fires before the output is in place
 */
export async function runQuantification(
  options: RunQuantificationOptions,
): Promise<QuantificationRun> {
  const config = options.config ?? defaultConfig();
  const logger = options.logger ?? consoleLogger;
  const { signal } = options;

  throwIfAborted(signal, "load");
  const designs = await loadDesignDatabase(options.designPath, {
    ...(config.input.designDelimiter ? { delimiter: config.input.designDelimiter } : {}),
  });
  const records = await loadQuantification(options.quantificationPath, {
    layout: config.input.layout,
    ...(config.input.quantificationDelimiter
      ? { delimiter: config.input.quantificationDelimiter }
      : {}),
  });

  throwIfAborted(signal, "aggregate");
  const report = new RunReport();
  const summaries = quantify(designs, records, config, report);

  if (report.hasIssues) {
    const details = Object.entries(report.countByCode())
      .map(([code, count]) => `${count} ${code}`)
      .join(", ");
    logWarn(logger, "quantify", `${report.issues.length} record issue(s): ${details}`);
  }

  const outputPath = resolve(options.outputPath);
  const reportPath = options.reportPath === undefined ? undefined : resolve(options.reportPath);
  await emitSummary(outputPath, summaries, {
    ...config.output,
    logger,
    ...(signal ? { signal } : {}),
    ...(reportPath !== undefined
      ? { companions: [{ path: reportPath, content: formatRunReport(report) }] }
      : {}),
  });

  return { summaries, report, outputPath, ...(reportPath !== undefined ? { reportPath } : {}) };
}

function throwIfAborted(signal: AbortSignal | undefined, stage: string): void {
  if (signal?.aborted) {
    throw new RunAbortedError(stage);
  }
}
