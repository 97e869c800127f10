/**
 * Quantification Record Reader.
 *
 * Two layouts are understood:
 * - `wide`: one row per sample, a `sample` column, an optional
 *   `total_reads` column and one count column per outcome label.
 * - `amplicon`: the per-amplicon summary of the analysis tool, with
 *   columns Batch, Amplicon, Unmodified, Modified and Discarded. All rows
 *   of a batch form one record whose labels read `<Amplicon>:<column>`.
 */

import { resolve } from "node:path";

import { deepFreeze, type LabelCount, type QuantificationRecord } from "@pequant/core";
import { InputSchemaError } from "@pequant/errors";
import { z } from "zod";

import { readTextFile } from "./fs-utils.js";
import { type DelimitedTable, delimiterForPath, parseDelimited, type TableRow } from "./table.js";

export const QUANTIFICATION_LAYOUTS = ["wide", "amplicon"] as const;
export type QuantificationLayout = (typeof QUANTIFICATION_LAYOUTS)[number];

export const AMPLICON_COUNT_COLUMNS = ["Unmodified", "Modified", "Discarded"] as const;

const SAMPLE_COLUMN = "sample";
const TOTAL_COLUMN = "total_reads";

/** A blank cell counts as zero reads */
const CountSchema = z
  .string()
  .trim()
  .regex(/^\d*$/, "must be a non-negative integer")
  .transform((value) => (value === "" ? 0 : Number(value)))
  .refine(Number.isSafeInteger, "is too large");

export interface ReadQuantificationOptions {
  readonly layout?: QuantificationLayout;
  /** Overrides the delimiter picked from the file extension */
  readonly delimiter?: string;
}

export interface ParseQuantificationOptions {
  readonly layout?: QuantificationLayout;
  readonly delimiter?: string;
  /** File path or label used in error messages */
  readonly source?: string;
}

/**
 * Reads quantification records from `filePath`.
 *
 * @throws {InputFileNotFoundError} if the file does not exist
 * @throws {InputReadError} if it cannot be read
 * @throws {InputSchemaError} on missing columns or invalid counts
 */
export async function loadQuantification(
  filePath: string,
  options?: ReadQuantificationOptions,
): Promise<readonly QuantificationRecord[]> {
  const absolutePath = resolve(filePath);
  const content = await readTextFile(absolutePath);
  return parseQuantificationTable(content, {
    delimiter: options?.delimiter ?? delimiterForPath(absolutePath),
    source: absolutePath,
    ...(options?.layout ? { layout: options.layout } : {}),
  });
}

/**
 * Parses quantification table text into frozen records, in input order.
 * Sample identifiers are trimmed but otherwise kept as written; blank
 * identifiers are left for the resolver to flag.
 */
export function parseQuantificationTable(
  content: string,
  options?: ParseQuantificationOptions,
): readonly QuantificationRecord[] {
  const source = options?.source ?? "<quantification table>";
  const table = parseDelimited(content, { delimiter: options?.delimiter ?? "\t", source });

  if (table.header.length === 0) {
    throw new InputSchemaError(source, ["table is empty"]);
  }

  const layout = options?.layout ?? "wide";
  const records = layout === "amplicon" ? parseAmpliconLayout(table, source) : parseWideLayout(table, source);
  return deepFreeze(records);
}

// ---------------------------------------------------------------------------
// Wide layout
// ---------------------------------------------------------------------------

function parseWideLayout(table: DelimitedTable, source: string): QuantificationRecord[] {
  const lowered = table.header.map((name) => name.toLowerCase());
  const sampleIndex = lowered.indexOf(SAMPLE_COLUMN);
  const totalIndex = lowered.indexOf(TOTAL_COLUMN);

  if (sampleIndex === -1) {
    throw new InputSchemaError(source, [`missing required column "${SAMPLE_COLUMN}"`]);
  }

  const labelColumns = table.header
    .map((label, index) => ({ label, index }))
    .filter(({ index }) => index !== sampleIndex && index !== totalIndex);
  if (labelColumns.length === 0) {
    throw new InputSchemaError(source, ["no outcome label columns"]);
  }

  const issues: string[] = [];
  const records: QuantificationRecord[] = [];
  const seen = new Map<string, number>();

  for (const row of table.rows) {
    const sampleId = (row.cells[sampleIndex] ?? "").trim();
    // Blank identifiers are left to the resolver, which reports each one
    if (sampleId !== "") {
      const previous = seen.get(sampleId);
      if (previous !== undefined) {
        issues.push(`row ${row.line}: duplicate sample "${sampleId}" (first seen in row ${previous})`);
        continue;
      }
      seen.set(sampleId, row.line);
    }

    const rowIssues: string[] = [];
    const counts: LabelCount[] = [];

    for (const { label, index } of labelColumns) {
      const reads = parseCount(row, index, label, rowIssues);
      counts.push({ label, reads });
    }

    const labelSum = sumReads(counts);
    let totalReads = labelSum;
    const totalCell = totalIndex === -1 ? "" : (row.cells[totalIndex] ?? "").trim();
    if (totalCell !== "") {
      totalReads = parseCount(row, totalIndex, TOTAL_COLUMN, rowIssues);
      if (rowIssues.length === 0 && totalReads < labelSum) {
        rowIssues.push(
          `row ${row.line}: ${TOTAL_COLUMN} ${totalReads} is below the label sum ${labelSum}`,
        );
      }
    }

    if (rowIssues.length > 0) {
      issues.push(...rowIssues);
      continue;
    }

    records.push({
      sampleId,
      counts,
      totalReads,
    });
  }

  if (issues.length > 0) {
    throw new InputSchemaError(source, issues);
  }
  return records;
}

// ---------------------------------------------------------------------------
// Amplicon layout
// ---------------------------------------------------------------------------

interface BatchAccumulator {
  readonly counts: LabelCount[];
  readonly amplicons: Map<string, number>;
}

function parseAmpliconLayout(table: DelimitedTable, source: string): QuantificationRecord[] {
  const lowered = table.header.map((name) => name.toLowerCase());
  const columnIndex = (name: string): number => lowered.indexOf(name.toLowerCase());

  const required = ["Batch", "Amplicon", ...AMPLICON_COUNT_COLUMNS];
  const missing = required.filter((name) => columnIndex(name) === -1);
  if (missing.length > 0) {
    throw new InputSchemaError(
      source,
      missing.map((name) => `missing required column "${name}"`),
    );
  }

  const batchIndex = columnIndex("Batch");
  const ampliconIndex = columnIndex("Amplicon");
  const issues: string[] = [];
  const batches = new Map<string, BatchAccumulator>();

  for (const row of table.rows) {
    const batch = (row.cells[batchIndex] ?? "").trim();
    const amplicon = (row.cells[ampliconIndex] ?? "").trim();

    if (amplicon === "") {
      issues.push(`row ${row.line}: Amplicon must not be empty`);
      continue;
    }

    let accumulator = batches.get(batch);
    if (!accumulator) {
      accumulator = { counts: [], amplicons: new Map() };
      batches.set(batch, accumulator);
    }

    const previous = accumulator.amplicons.get(amplicon);
    if (previous !== undefined) {
      issues.push(
        `row ${row.line}: batch "${batch}" repeats amplicon "${amplicon}" (first seen in row ${previous})`,
      );
      continue;
    }
    accumulator.amplicons.set(amplicon, row.line);

    const rowIssues: string[] = [];
    for (const column of AMPLICON_COUNT_COLUMNS) {
      const reads = parseCount(row, columnIndex(column), column, rowIssues);
      accumulator.counts.push({ label: `${amplicon}:${column}`, reads });
    }
    issues.push(...rowIssues);
  }

  if (issues.length > 0) {
    throw new InputSchemaError(source, issues);
  }

  return [...batches].map(([sampleId, { counts }]) => ({
    sampleId,
    counts,
    totalReads: sumReads(counts),
  }));
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function parseCount(row: TableRow, index: number, column: string, issues: string[]): number {
  const cell = row.cells[index] ?? "";
  const result = CountSchema.safeParse(cell);
  if (!result.success) {
    const message = result.error.issues[0]?.message ?? "is invalid";
    issues.push(`row ${row.line}: column "${column}" ${message} (got "${cell.trim()}")`);
    return 0;
  }
  return result.data;
}

function sumReads(counts: readonly LabelCount[]): number {
  return counts.reduce((sum, { reads }) => sum + reads, 0);
}
