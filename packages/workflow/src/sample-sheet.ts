/**
 * Sample sheet reader: one row per sequenced sample with its read files.
 */

import { resolve } from "node:path";

import { deepFreeze } from "@pequant/core";
import { InputSchemaError } from "@pequant/errors";
import { delimiterForPath, parseDelimited, readTextFile, rowToObject } from "@pequant/io";
import { z } from "zod";

export const SAMPLE_SHEET_COLUMNS = ["name", "fastq_r1", "fastq_r2"] as const;

const SampleRowSchema = z.object({
  name: z.string().trim().min(1, "must not be empty"),
  fastq_r1: z.string().trim().min(1, "must not be empty"),
  fastq_r2: z.string().trim().min(1, "must not be empty"),
});

export interface SampleSheetEntry {
  readonly name: string;
  readonly fastqR1: string;
  readonly fastqR2: string;
}

export interface ParseSampleSheetOptions {
  readonly delimiter?: string;
  readonly source?: string;
}

/**
 * @throws {InputFileNotFoundError} if the file does not exist
 * @throws {InputSchemaError} on missing columns, blank cells or repeated names
 */
export async function loadSampleSheet(
  filePath: string,
  options?: { readonly delimiter?: string },
): Promise<readonly SampleSheetEntry[]> {
  const absolutePath = resolve(filePath);
  const content = await readTextFile(absolutePath);
  return parseSampleSheet(content, {
    delimiter: options?.delimiter ?? delimiterForPath(absolutePath),
    source: absolutePath,
  });
}

export function parseSampleSheet(
  content: string,
  options?: ParseSampleSheetOptions,
): readonly SampleSheetEntry[] {
  const source = options?.source ?? "<sample sheet>";
  const table = parseDelimited(content, { delimiter: options?.delimiter ?? "\t", source });
  const header = table.header.map((name) => name.toLowerCase());

  const missing = SAMPLE_SHEET_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new InputSchemaError(
      source,
      missing.map((column) => `missing required column "${column}"`),
    );
  }

  const issues: string[] = [];
  const entries: SampleSheetEntry[] = [];
  const firstSeen = new Map<string, number>();

  for (const row of table.rows) {
    const result = SampleRowSchema.safeParse(rowToObject(header, row));
    if (!result.success) {
      for (const issue of result.error.issues) {
        issues.push(`row ${row.line}: ${issue.path.join(".")}: ${issue.message}`);
      }
      continue;
    }

    const { name, fastq_r1: fastqR1, fastq_r2: fastqR2 } = result.data;
    const previous = firstSeen.get(name);
    if (previous !== undefined) {
      issues.push(`row ${row.line}: duplicate name "${name}" (first seen in row ${previous})`);
      continue;
    }
    firstSeen.set(name, row.line);
    entries.push({ name, fastqR1, fastqR2 });
  }

  if (issues.length > 0) {
    throw new InputSchemaError(source, issues);
  }
  return deepFreeze(entries);
}
