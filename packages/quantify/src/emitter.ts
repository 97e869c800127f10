/**
 * Summary Emitter: renders SummaryRecords as a delimited table and
 * writes it all-or-nothing.
 */

import { DEFAULT_UNDEFINED_MARKER } from "@pequant/config";
import { type Logger, OUTCOME_CATEGORIES, type SummaryRecord } from "@pequant/core";
import { type AtomicFile, formatDelimited, writeFilesAtomic } from "@pequant/io";

export const SUMMARY_COLUMNS: readonly string[] = [
  "design_id",
  "total_reads",
  ...OUTCOME_CATEGORIES.map((category) => `${category}_reads`),
  ...OUTCOME_CATEGORIES.map((category) => `${category}_fraction`),
  "status",
];

export interface SummaryTableOptions {
  /** Written for undefined fractions. Default: "NA" */
  readonly undefinedMarker?: string;
  /** Rounds fractions to this many decimals; full precision when absent */
  readonly fractionDigits?: number;
  /** Default: tab */
  readonly delimiter?: string;
}

export interface EmitSummaryOptions extends SummaryTableOptions {
  readonly signal?: AbortSignal;
  readonly logger?: Logger;
  /**
   * Files committed together with the summary. They are renamed into
   * place before it, so the summary never exists without them.
   */
  readonly companions?: readonly AtomicFile[];
}

/**
 * Renders summaries in the order given, one row each, under the fixed
 * column header. A failed-resolution bucket carries its raw sample
 * identifier in the `design_id` column.
 */
export function formatSummaryTable(
  summaries: readonly SummaryRecord[],
  options?: SummaryTableOptions,
): string {
  const marker = options?.undefinedMarker ?? DEFAULT_UNDEFINED_MARKER;
  const digits = options?.fractionDigits;

  const formatFraction = (value: number | null): string => {
    if (value === null) return marker;
    return digits === undefined ? String(value) : value.toFixed(digits);
  };

  const rows = summaries.map((summary) => [
    summary.key,
    String(summary.totalReads),
    ...OUTCOME_CATEGORIES.map((category) => String(summary.counts[category])),
    ...OUTCOME_CATEGORIES.map((category) => formatFraction(summary.fractions[category])),
    summary.status,
  ]);

  return formatDelimited([SUMMARY_COLUMNS, ...rows], options?.delimiter ?? "\t");
}

/**
 * Writes the summary table to `filePath` atomically, after any
 * `companions`.
 *
 * @throws {OutputWriteError} if a file cannot be written; a previous
 *   file at `filePath` is left untouched
 * @throws {RunAbortedError} if `signal` fires before the file is in place
 */
export async function emitSummary(
  filePath: string,
  summaries: readonly SummaryRecord[],
  options?: EmitSummaryOptions,
): Promise<void> {
  const summary = { path: filePath, content: formatSummaryTable(summaries, options) };
  await writeFilesAtomic([...(options?.companions ?? []), summary], {
    ...(options?.signal ? { signal: options.signal } : {}),
    ...(options?.logger ? { logger: options.logger } : {}),
  });
}
