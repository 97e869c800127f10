import type { CategoryCounts, CategoryFractions } from "./categories.js";

// ---------------------------------------------------------------------------
// Design database
// ---------------------------------------------------------------------------

/**
 * One row of the design database. Only the first four fields are needed
 * for quantification; the sequence fields feed the run-sheet and
 * oligo-order generators.
 */
export interface DesignRecord {
  readonly designId: string;
  readonly targetLocus: string;
  readonly amplicon: string;
  readonly intendedEdit: string;
  readonly scaffoldVariant?: string;
  /** Primer-binding-site length */
  readonly pbs?: number;
  /** Reverse-transcription-template length */
  readonly rtt?: number;
  readonly spacer?: string;
  readonly extensionSense?: string;
  readonly extensionAntisense?: string;
}

// ---------------------------------------------------------------------------
// Quantification input
// ---------------------------------------------------------------------------

export interface LabelCount {
  readonly label: string;
  readonly reads: number;
}

/**
 * Outcome counts of one sample as produced by the analysis tool.
 * `totalReads` is at least the sum of `counts`; the difference is reads
 * no label accounts for.
 */
export interface QuantificationRecord {
  readonly sampleId: string;
  readonly counts: readonly LabelCount[];
  readonly totalReads: number;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export type ResolutionStatus = "resolved" | "unresolved" | "ambiguous";

export interface ResolvedMatch {
  readonly status: "resolved";
  readonly record: QuantificationRecord;
  readonly design: DesignRecord;
  readonly candidates: readonly string[];
}

export interface FailedMatch {
  readonly status: "unresolved" | "ambiguous";
  readonly record: QuantificationRecord;
  readonly design: null;
  /** Every matching design identifier (sorted); empty when unresolved */
  readonly candidates: readonly string[];
}

export type ResolvedRecord = ResolvedMatch | FailedMatch;

// ---------------------------------------------------------------------------
// Summary
// ---------------------------------------------------------------------------

/**
 * Aggregated outcome of one design, or of one failed-resolution bucket
 * (in which case `designId` is null and `key` is the raw sample id).
 */
export interface SummaryRecord {
  readonly key: string;
  readonly designId: string | null;
  readonly sampleIds: readonly string[];
  readonly totalReads: number;
  readonly counts: CategoryCounts;
  readonly fractions: CategoryFractions;
  readonly status: ResolutionStatus;
  readonly candidates: readonly string[];
}
