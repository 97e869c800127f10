/**
 * Category normalization: raw outcome labels → OutcomeCategory counts.
 */

import type { CategoryTable } from "@pequant/config";
import {
  type CategoryCounts,
  emptyCategoryCounts,
  type OutcomeCategory,
  type QuantificationRecord,
} from "@pequant/core";
import { UnknownCategoryError } from "@pequant/errors";

const foldedTables = new WeakMap<CategoryTable, ReadonlyMap<string, OutcomeCategory>>();

/** Case-folded view of a table; later entries win on collision */
function foldedTable(table: CategoryTable): ReadonlyMap<string, OutcomeCategory> {
  let folded = foldedTables.get(table);
  if (!folded) {
    const map = new Map<string, OutcomeCategory>();
    for (const [label, category] of Object.entries(table)) {
      map.set(label.toLowerCase(), category);
    }
    folded = map;
    foldedTables.set(table, folded);
  }
  return folded;
}

/**
 * Looks a label up by exact match first, then case-insensitively.
 */
export function lookupCategory(label: string, table: CategoryTable): OutcomeCategory | undefined {
  if (Object.hasOwn(table, label)) {
    return table[label];
  }
  return foldedTable(table).get(label.toLowerCase());
}

/**
 * Sums a record's label counts per outcome category.
 *
 * @throws {UnknownCategoryError} listing every label the table does not
 *   map; nothing is counted for such a record
 */
export function normalizeCounts(record: QuantificationRecord, table: CategoryTable): CategoryCounts {
  const counts = emptyCategoryCounts();
  const unknown: string[] = [];

  for (const { label, reads } of record.counts) {
    const category = lookupCategory(label, table);
    if (category === undefined) {
      if (!unknown.includes(label)) unknown.push(label);
      continue;
    }
    counts[category] += reads;
  }

  if (unknown.length > 0) {
    throw new UnknownCategoryError(record.sampleId, unknown);
  }
  return counts;
}
