import type { DesignRecord, QuantificationRecord } from "@pequant/core";

export function design(designId: string, overrides?: Partial<DesignRecord>): DesignRecord {
  return {
    designId,
    targetLocus: "HEK3",
    amplicon: "AMP-HEK3",
    intendedEdit: "CTT insertion",
    ...overrides,
  };
}

/** Builds a record; the total defaults to the sum of the label counts */
export function record(
  sampleId: string,
  counts: Readonly<Record<string, number>>,
  totalReads?: number,
): QuantificationRecord {
  const entries = Object.entries(counts).map(([label, reads]) => ({ label, reads }));
  return {
    sampleId,
    counts: entries,
    totalReads: totalReads ?? entries.reduce((sum, { reads }) => sum + reads, 0),
  };
}
