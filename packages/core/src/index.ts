/**
 * @pequant/core
 *
 * Domain types shared by every pequant package.
 */

export {
  type CategoryCounts,
  type CategoryFractions,
  emptyCategoryCounts,
  isOutcomeCategory,
  OUTCOME_CATEGORIES,
  type OutcomeCategory,
} from "./categories.js";
export { deepFreeze } from "./freeze.js";
export { consoleLogger, type Logger, logInfo, logWarn, silentLogger } from "./logger.js";
export { formatRunReport, RunReport, type RunReportJSON } from "./run-report.js";
export type {
  DesignRecord,
  FailedMatch,
  LabelCount,
  QuantificationRecord,
  ResolutionStatus,
  ResolvedMatch,
  ResolvedRecord,
  SummaryRecord,
} from "./types.js";

export const PACKAGE_NAME = "@pequant/core" as const;
