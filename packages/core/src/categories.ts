/**
 * The fixed set of outcome categories every raw label is normalized onto.
 * Order here is the column order of every summary table.
 */
export const OUTCOME_CATEGORIES = [
  "intended_edit",
  "unintended_edit",
  "indel",
  "unmodified",
  "unclassified",
] as const;

export type OutcomeCategory = (typeof OUTCOME_CATEGORIES)[number];

/** Read counts per category. */
export type CategoryCounts = Readonly<Record<OutcomeCategory, number>>;

/** Fractions per category; `null` when the group has no reads. */
export type CategoryFractions = Readonly<Record<OutcomeCategory, number | null>>;

export function isOutcomeCategory(value: string): value is OutcomeCategory {
  return OUTCOME_CATEGORIES.some((category) => category === value);
}

/**
 * Fresh, mutable all-zero counts. Callers accumulate into it and freeze
 * the result.
 */
export function emptyCategoryCounts(): Record<OutcomeCategory, number> {
  return {
    intended_edit: 0,
    unintended_edit: 0,
    indel: 0,
    unmodified: 0,
    unclassified: 0,
  };
}
