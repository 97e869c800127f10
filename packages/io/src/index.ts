/**
 * @pequant/io
 *
 * File access for pequant: delimited tables, atomic writes and the two
 * input readers.
 */

export {
  type DesignRow,
  DesignRowSchema,
  loadDesignDatabase,
  type ParseDesignOptions,
  parseDesignTable,
  type ReadDesignOptions,
  REQUIRED_DESIGN_COLUMNS,
} from "./design-reader.js";
export {
  type AtomicFile,
  fileExists,
  readTextFile,
  writeFileAtomic,
  type WriteFileAtomicOptions,
  writeFilesAtomic,
} from "./fs-utils.js";
export {
  AMPLICON_COUNT_COLUMNS,
  loadQuantification,
  type ParseQuantificationOptions,
  parseQuantificationTable,
  QUANTIFICATION_LAYOUTS,
  type QuantificationLayout,
  type ReadQuantificationOptions,
} from "./quantification-reader.js";
export {
  type DelimitedTable,
  delimiterForPath,
  formatDelimited,
  parseDelimited,
  type ParseDelimitedOptions,
  rowToObject,
  type TableRow,
} from "./table.js";

export const PACKAGE_NAME = "@pequant/io" as const;
