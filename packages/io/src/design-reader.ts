/**
 * Design Database Reader.
 * Loads the design table, validates every row with Zod and returns
 * frozen DesignRecords in file order.
 */

import { resolve } from "node:path";

import { type DesignRecord, deepFreeze } from "@pequant/core";
import { InputSchemaError } from "@pequant/errors";
import { z } from "zod";

import { readTextFile } from "./fs-utils.js";
import { delimiterForPath, parseDelimited, rowToObject } from "./table.js";

export const REQUIRED_DESIGN_COLUMNS = [
  "design_id",
  "target_locus",
  "amplicon",
  "intended_edit",
] as const;

const lengthSchema = z.coerce.number().int().nonnegative();

export const DesignRowSchema = z.object({
  design_id: z.string().min(1),
  target_locus: z.string().min(1),
  amplicon: z.string().min(1),
  intended_edit: z.string().min(1),
  scaffold_variant: z.string().optional(),
  pbs: lengthSchema.optional(),
  rtt: lengthSchema.optional(),
  spacer: z.string().optional(),
  extension_sense: z.string().optional(),
  extension_antisense: z.string().optional(),
});

export type DesignRow = z.infer<typeof DesignRowSchema>;

export interface ReadDesignOptions {
  /** Overrides the delimiter picked from the file extension */
  readonly delimiter?: string;
}

export interface ParseDesignOptions {
  readonly delimiter?: string;
  /** File path or label used in error messages */
  readonly source?: string;
}

/**
 * Reads the design database at `filePath`.
 *
 * @throws {InputFileNotFoundError} if the file does not exist
 * @throws {InputReadError} if it cannot be read
 * @throws {InputSchemaError} on missing columns, invalid rows or duplicate ids
 */
export async function loadDesignDatabase(
  filePath: string,
  options?: ReadDesignOptions,
): Promise<readonly DesignRecord[]> {
  const absolutePath = resolve(filePath);
  const content = await readTextFile(absolutePath);
  return parseDesignTable(content, {
    delimiter: options?.delimiter ?? delimiterForPath(absolutePath),
    source: absolutePath,
  });
}

/**
 * Parses design table text. Header names are matched case-insensitively;
 * unknown columns are ignored. Every problem in the table is collected
 * before a single InputSchemaError is thrown.
 */
export function parseDesignTable(
  content: string,
  options?: ParseDesignOptions,
): readonly DesignRecord[] {
  const source = options?.source ?? "<design table>";
  const table = parseDelimited(content, { delimiter: options?.delimiter ?? "\t", source });
  const header = table.header.map((name) => name.toLowerCase());

  if (header.length === 0) {
    throw new InputSchemaError(source, ["table is empty"]);
  }

  const missing = REQUIRED_DESIGN_COLUMNS.filter((column) => !header.includes(column));
  if (missing.length > 0) {
    throw new InputSchemaError(
      source,
      missing.map((column) => `missing required column "${column}"`),
    );
  }

  const issues: string[] = [];
  const records: DesignRecord[] = [];
  const firstSeen = new Map<string, number>();

  for (const row of table.rows) {
    const raw = rowToObject(header, row);
    const candidate: Record<string, string> = {};
    for (const [column, value] of Object.entries(raw)) {
      const trimmed = value.trim();
      if (trimmed !== "") {
        candidate[column] = trimmed;
      }
    }

    const result = DesignRowSchema.safeParse(candidate);
    if (!result.success) {
      for (const issue of result.error.issues) {
        issues.push(`row ${row.line}: ${issue.path.join(".")}: ${issue.message}`);
      }
      continue;
    }

    const designId = result.data.design_id;
    const previous = firstSeen.get(designId);
    if (previous !== undefined) {
      issues.push(`row ${row.line}: duplicate design_id "${designId}" (first seen in row ${previous})`);
      continue;
    }
    firstSeen.set(designId, row.line);
    records.push(toDesignRecord(result.data));
  }

  if (issues.length > 0) {
    throw new InputSchemaError(source, issues);
  }

  return deepFreeze(records);
}

function toDesignRecord(row: DesignRow): DesignRecord {
  return {
    designId: row.design_id,
    targetLocus: row.target_locus,
    amplicon: row.amplicon,
    intendedEdit: row.intended_edit,
    ...(row.scaffold_variant !== undefined ? { scaffoldVariant: row.scaffold_variant } : {}),
    ...(row.pbs !== undefined ? { pbs: row.pbs } : {}),
    ...(row.rtt !== undefined ? { rtt: row.rtt } : {}),
    ...(row.spacer !== undefined ? { spacer: row.spacer } : {}),
    ...(row.extension_sense !== undefined ? { extensionSense: row.extension_sense } : {}),
    ...(row.extension_antisense !== undefined
      ? { extensionAntisense: row.extension_antisense }
      : {}),
  };
}
