/**
 * @pequant/errors
 *
 * Shared error taxonomy for pequant.
 *
 * Each error carries a `.code` from the catalog that discriminates the
 * specific condition, a `_tag` naming its base kind and a `fatal` flag.
 * Fatal errors abort a run before any output is finalized; the others
 * are collected into the run report.
 */

// ============================================================================
// CORE EXPORTS
// ============================================================================

export { type ErrorJSON, isError, isPequantError, PequantError } from "./base.js";

export {
  type BaseErrorType,
  type CodesForBase,
  ERROR_CATALOG,
  type ErrorCatalogEntry,
  type ErrorCode,
  type ErrorDomain,
} from "./catalog.js";

export {
  getAllErrorCodes,
  getCatalogEntry,
  getErrorCodesByDomain,
  getErrorMessage,
  isValidErrorCode,
  validateCatalog,
  wrapError,
} from "./utils.js";

export { hasCode, isConfigError, isFatalError, isIOError, isResolutionError } from "./guards.js";

// ============================================================================
// ERROR FAMILIES
// ============================================================================

export {
  ConfigError,
  ConfigFileNotFoundError,
  ConfigInterpolationError,
  ConfigParseError,
  ConfigReadError,
  ConfigSchemaError,
  type MissingEnvVar,
} from "./config.js";
export {
  InputFileNotFoundError,
  InputReadError,
  InputSchemaError,
  IOError,
  OutputWriteError,
} from "./io.js";
export {
  AmbiguousMatchError,
  InvalidIdentifierError,
  ResolutionError,
  UnresolvedSampleError,
} from "./resolution.js";
export { UnknownCategoryError } from "./aggregation.js";
export { DesignFieldMissingError, ScaffoldMismatchError, WorkflowError } from "./workflow.js";
export { InternalError, RunAbortedError } from "./run.js";

// ============================================================================
// PACKAGE METADATA
// ============================================================================

export const PACKAGE_NAME = "@pequant/errors";
export const PACKAGE_VERSION = "0.1.0";
