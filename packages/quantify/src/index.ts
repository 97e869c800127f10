/**
 * @pequant/quantify
 *
 * The quantification aggregation engine: Identifier Resolver, category
 * normalization, Aggregation Engine and Summary Emitter, plus the
 * pipeline that joins them.
 */

export {
  emitSummary,
  type EmitSummaryOptions,
  formatSummaryTable,
  SUMMARY_COLUMNS,
  type SummaryTableOptions,
} from "./emitter.js";
export {
  aggregate,
  compareCodeUnits,
  compareSummaries,
  computeFractions,
  groupRecords,
  mergeSummaries,
  type NormalizedSample,
  sortSummaries,
  summarizeGroup,
  type SummaryGroup,
} from "./engine.js";
export { lookupCategory, normalizeCounts } from "./normalize.js";
export {
  type QuantificationRun,
  quantify,
  runQuantification,
  type RunQuantificationOptions,
} from "./pipeline.js";
export {
  type CompiledResolverRules,
  compileResolverRules,
  createIdentifierResolver,
  deriveCandidateKeys,
  type IdentifierResolver,
  resolveRecords,
  type SampleResolution,
} from "./resolver.js";

export const PACKAGE_NAME = "@pequant/quantify" as const;
