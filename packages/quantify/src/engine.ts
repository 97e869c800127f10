/**
 * Aggregation Engine.
 *
 * Pools resolved records per design, keeps failed resolutions in
 * buckets keyed by raw sample identifier and turns each group into one
 * frozen SummaryRecord. `summarizeGroup` is pure per group and
 * `mergeSummaries` combines independently computed shards.
 */

import type { CategoryTable } from "@pequant/config";
import {
  type CategoryCounts,
  type CategoryFractions,
  deepFreeze,
  type DesignRecord,
  emptyCategoryCounts,
  OUTCOME_CATEGORIES,
  type OutcomeCategory,
  type ResolutionStatus,
  type ResolvedRecord,
  type RunReport,
  type SummaryRecord,
} from "@pequant/core";
import { UnknownCategoryError } from "@pequant/errors";

import { normalizeCounts } from "./normalize.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Category counts of one record after normalization */
export interface NormalizedSample {
  readonly sampleId: string;
  readonly counts: CategoryCounts;
  readonly totalReads: number;
}

/** Everything `summarizeGroup` needs to produce one SummaryRecord */
export interface SummaryGroup {
  readonly key: string;
  readonly designId: string | null;
  readonly status: ResolutionStatus;
  readonly candidates: readonly string[];
  readonly samples: readonly NormalizedSample[];
}

// ---------------------------------------------------------------------------
// Grouping
// ---------------------------------------------------------------------------

interface MutableGroup {
  readonly key: string;
  readonly designId: string | null;
  readonly status: ResolutionStatus;
  readonly candidates: readonly string[];
  readonly samples: NormalizedSample[];
}

/**
 * Builds one group per design (empty for designs without samples) and
 * one bucket per failed-resolution sample identifier. Records with
 * unknown labels are reported and contribute no counts.
 */
export function groupRecords(
  resolved: readonly ResolvedRecord[],
  designs: readonly DesignRecord[],
  table: CategoryTable,
  report: RunReport,
): SummaryGroup[] {
  const designGroups = new Map<string, MutableGroup>();
  const buckets = new Map<string, MutableGroup>();

  for (const design of designs) {
    if (!designGroups.has(design.designId)) {
      designGroups.set(design.designId, createGroup(design.designId, design.designId, "resolved", []));
    }
  }

  for (const entry of resolved) {
    let group: MutableGroup;
    if (entry.status === "resolved") {
      const designId = entry.design.designId;
      group = designGroups.get(designId) ?? createGroup(designId, designId, "resolved", []);
      designGroups.set(designId, group);
    } else {
      const sampleId = entry.record.sampleId;
      group = buckets.get(sampleId) ?? createGroup(sampleId, null, entry.status, entry.candidates);
      buckets.set(sampleId, group);
    }

    const sample = normalizeSample(entry, table, report);
    if (sample) {
      group.samples.push(sample);
    }
  }

  return [...designGroups.values(), ...buckets.values()];
}

function createGroup(
  key: string,
  designId: string | null,
  status: ResolutionStatus,
  candidates: readonly string[],
): MutableGroup {
  return { key, designId, status, candidates, samples: [] };
}

function normalizeSample(
  entry: ResolvedRecord,
  table: CategoryTable,
  report: RunReport,
): NormalizedSample | undefined {
  try {
    return {
      sampleId: entry.record.sampleId,
      counts: normalizeCounts(entry.record, table),
      totalReads: entry.record.totalReads,
    };
  } catch (error: unknown) {
    if (error instanceof UnknownCategoryError) {
      report.record(error);
      return undefined;
    }
    throw error;
  }
}

// ---------------------------------------------------------------------------
// Summaries
// ---------------------------------------------------------------------------

/**
 * Pools a group's samples: counts and totals are summed, fractions are
 * `count / totalReads`, or `null` for every category when the group has
 * no reads.
 */
export function summarizeGroup(group: SummaryGroup): SummaryRecord {
  const counts = emptyCategoryCounts();
  let totalReads = 0;

  for (const sample of group.samples) {
    totalReads += sample.totalReads;
    for (const category of OUTCOME_CATEGORIES) {
      counts[category] += sample.counts[category];
    }
  }

  return deepFreeze({
    key: group.key,
    designId: group.designId,
    sampleIds: group.samples.map((sample) => sample.sampleId).sort(compareCodeUnits),
    totalReads,
    counts,
    fractions: computeFractions(counts, totalReads),
    status: group.status,
    candidates: [...group.candidates],
  });
}

export function computeFractions(counts: CategoryCounts, totalReads: number): CategoryFractions {
  const fraction = (category: OutcomeCategory): number | null =>
    totalReads === 0 ? null : counts[category] / totalReads;
  return {
    intended_edit: fraction("intended_edit"),
    unintended_edit: fraction("unintended_edit"),
    indel: fraction("indel"),
    unmodified: fraction("unmodified"),
    unclassified: fraction("unclassified"),
  };
}

/**
 * Groups and summarizes resolved records; the result is in output order
 * (see `sortSummaries`).
 */
export function aggregate(
  resolved: readonly ResolvedRecord[],
  designs: readonly DesignRecord[],
  table: CategoryTable,
  report: RunReport,
): readonly SummaryRecord[] {
  const summaries = groupRecords(resolved, designs, table, report).map(summarizeGroup);
  return sortSummaries(summaries);
}

// ---------------------------------------------------------------------------
// Ordering and merging
// ---------------------------------------------------------------------------

/** Orders strings by UTF-16 code unit, independent of locale */
export function compareCodeUnits(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Designs by identifier, then failed-resolution buckets by sample
 * identifier. Comparison is by UTF-16 code unit, independent of locale.
 */
export function compareSummaries(a: SummaryRecord, b: SummaryRecord): number {
  const aBucket = a.designId === null ? 1 : 0;
  const bBucket = b.designId === null ? 1 : 0;
  if (aBucket !== bBucket) return aBucket - bBucket;
  return compareCodeUnits(a.key, b.key);
}

export function sortSummaries(summaries: readonly SummaryRecord[]): readonly SummaryRecord[] {
  return Object.freeze([...summaries].sort(compareSummaries));
}

/**
 * Combines summaries computed over disjoint shards of the input. Entries
 * for the same design (or the same failed sample identifier) are pooled
 * and their fractions recomputed.
 */
export function mergeSummaries(
  shards: readonly (readonly SummaryRecord[])[],
): readonly SummaryRecord[] {
  const merged = new Map<string, SummaryRecord>();

  for (const shard of shards) {
    for (const summary of shard) {
      const id = `${summary.designId === null ? "bucket" : "design"}:${summary.key}`;
      const existing = merged.get(id);
      merged.set(id, existing ? combineSummaries(existing, summary) : summary);
    }
  }

  return sortSummaries([...merged.values()]);
}

function combineSummaries(a: SummaryRecord, b: SummaryRecord): SummaryRecord {
  const counts = emptyCategoryCounts();
  for (const category of OUTCOME_CATEGORIES) {
    counts[category] = a.counts[category] + b.counts[category];
  }
  const totalReads = a.totalReads + b.totalReads;

  return deepFreeze({
    key: a.key,
    designId: a.designId,
    sampleIds: [...a.sampleIds, ...b.sampleIds].sort(compareCodeUnits),
    totalReads,
    counts,
    fractions: computeFractions(counts, totalReads),
    status: a.status,
    candidates: [...new Set([...a.candidates, ...b.candidates])].sort(compareCodeUnits),
  });
}
