/**
 * @pequant/workflow
 *
 * Generators around the quantification run: the run sheet that drives
 * the editing-outcome analysis and the oligo order for a design set.
 */

export {
  formatOligoOrder,
  generateOligoOrder,
  type Oligo,
  type OligoOrderResult,
  type OligoOrderSettings,
  oligoBaseName,
  writeOligoOrder,
  type WriteOligoOrderOptions,
} from "./oligo-order.js";
export {
  formatRunSheet,
  generateRunSheet,
  RUN_SHEET_COLUMNS,
  type RunSheetResult,
  type RunSheetRow,
  type RunSheetSettings,
  writeRunSheet,
  type WriteRunSheetOptions,
} from "./run-sheet.js";
export {
  loadSampleSheet,
  type ParseSampleSheetOptions,
  parseSampleSheet,
  SAMPLE_SHEET_COLUMNS,
  type SampleSheetEntry,
} from "./sample-sheet.js";
export {
  SCAFFOLD1_PREFIX,
  SCAFFOLD2_PREFIX,
  toScaffold2,
  trimAdapters,
  trimLeadingAdapter,
} from "./sequences.js";

export const PACKAGE_NAME = "@pequant/workflow" as const;
