import { PequantError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * A quantification record carries outcome labels the category table does
 * not know. The record is left out of numeric aggregation; every other
 * record is unaffected.
 */
export class UnknownCategoryError extends PequantError {
  readonly _tag = "ValidationError" as const;
  readonly code = "AGGREGATE_CATEGORY_UNKNOWN" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly sampleId: string;
  readonly labels: readonly string[];

  constructor(sampleId: string, labels: readonly string[]) {
    const noun = labels.length === 1 ? "label" : "labels";
    super(`Sample "${sampleId}" has unknown outcome ${noun}: ${labels.join(", ")}`);
    const entry = ERROR_CATALOG.AGGREGATE_CATEGORY_UNKNOWN;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.sampleId = sampleId;
    this.labels = labels;
  }
}
