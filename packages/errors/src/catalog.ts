/**
 * Error Catalog - Single Source of Truth
 *
 * Every error code raised anywhere in pequant is declared here together
 * with its base kind, its domain and whether it is an expected
 * (user-facing, recoverable or input-caused) condition.
 *
 * Naming convention: DOMAIN_SPECIFIC_ERROR (UPPER_SNAKE_CASE)
 * Domains: internal, io, config, resolve, aggregate, workflow, run
 */

/**
 * Behavioral base kinds every error code maps to.
 */
export type BaseErrorType =
  | "ValidationError"
  | "NotFoundError"
  | "ConflictError"
  | "ExternalError"
  | "CancelledError"
  | "InternalError";

export const ERROR_CATALOG = {
  // ============================================================================
  // INTERNAL ERRORS - Bugs and unknown failures
  // ============================================================================
  INTERNAL_ERROR: {
    domain: "internal",
    baseType: "InternalError" as const,
    isExpected: false,
    fatal: true,
    title: "Internal error",
    description: "An unexpected error occurred",
  },

  // ============================================================================
  // IO ERRORS - Input tables and output files
  // ============================================================================
  IO_FILE_NOT_FOUND: {
    domain: "io",
    baseType: "NotFoundError" as const,
    isExpected: true,
    fatal: true,
    title: "Input file not found",
    description: "An input table does not exist at the given path",
  },
  IO_READ_FAILED: {
    domain: "io",
    baseType: "ExternalError" as const,
    isExpected: false,
    fatal: true,
    title: "Input read failed",
    description: "An input table exists but could not be read",
  },
  IO_SCHEMA_INVALID: {
    domain: "io",
    baseType: "ValidationError" as const,
    isExpected: true,
    fatal: true,
    title: "Input schema invalid",
    description: "An input table is missing columns or contains malformed rows",
  },
  IO_WRITE_FAILED: {
    domain: "io",
    baseType: "ExternalError" as const,
    isExpected: false,
    fatal: true,
    title: "Output write failed",
    description: "An output file could not be written or finalized",
  },

  // ============================================================================
  // CONFIG ERRORS - pequant.yaml
  // ============================================================================
  CONFIG_FILE_NOT_FOUND: {
    domain: "config",
    baseType: "NotFoundError" as const,
    isExpected: true,
    fatal: true,
    title: "Config file not found",
    description: "The configuration file does not exist",
  },
  CONFIG_READ_FAILED: {
    domain: "config",
    baseType: "ExternalError" as const,
    isExpected: true,
    fatal: true,
    title: "Config read failed",
    description: "The configuration file exists but cannot be read as text",
  },
  CONFIG_PARSE_FAILED: {
    domain: "config",
    baseType: "ValidationError" as const,
    isExpected: true,
    fatal: true,
    title: "Config parse failed",
    description: "The configuration file is not valid YAML",
  },
  CONFIG_VALIDATION_FAILED: {
    domain: "config",
    baseType: "ValidationError" as const,
    isExpected: true,
    fatal: true,
    title: "Config validation failed",
    description: "The configuration does not match the expected schema",
  },
  CONFIG_INTERPOLATION_FAILED: {
    domain: "config",
    baseType: "ValidationError" as const,
    isExpected: true,
    fatal: true,
    title: "Config interpolation failed",
    description: "The configuration references environment variables that are not set",
  },

  // ============================================================================
  // RESOLVE ERRORS - Sample identifier to design identifier
  // ============================================================================
  RESOLVE_IDENTIFIER_INVALID: {
    domain: "resolve",
    baseType: "ValidationError" as const,
    isExpected: true,
    fatal: false,
    title: "Invalid sample identifier",
    description: "The sample identifier cannot be parsed into any candidate design key",
  },
  RESOLVE_SAMPLE_UNRESOLVED: {
    domain: "resolve",
    baseType: "NotFoundError" as const,
    isExpected: true,
    fatal: false,
    title: "Unresolved sample",
    description: "No design in the database matches the sample identifier",
  },
  RESOLVE_MATCH_AMBIGUOUS: {
    domain: "resolve",
    baseType: "ConflictError" as const,
    isExpected: true,
    fatal: false,
    title: "Ambiguous match",
    description: "More than one design matches the sample identifier",
  },

  // ============================================================================
  // AGGREGATE ERRORS - Outcome category normalization
  // ============================================================================
  AGGREGATE_CATEGORY_UNKNOWN: {
    domain: "aggregate",
    baseType: "ValidationError" as const,
    isExpected: true,
    fatal: false,
    title: "Unknown outcome category",
    description: "An outcome label has no entry in the category table",
  },

  // ============================================================================
  // WORKFLOW ERRORS - Run sheets and oligo orders
  // ============================================================================
  WORKFLOW_SCAFFOLD_MISMATCH: {
    domain: "workflow",
    baseType: "ValidationError" as const,
    isExpected: true,
    fatal: true,
    title: "Scaffold mismatch",
    description: "An extension sequence does not start with the expected scaffold bases",
  },
  WORKFLOW_DESIGN_FIELD_MISSING: {
    domain: "workflow",
    baseType: "ValidationError" as const,
    isExpected: true,
    fatal: false,
    title: "Design field missing",
    description: "A design lacks a sequence field the generator needs",
  },

  // ============================================================================
  // RUN ERRORS - Whole-run control
  // ============================================================================
  RUN_ABORTED: {
    domain: "run",
    baseType: "CancelledError" as const,
    isExpected: true,
    fatal: true,
    title: "Run aborted",
    description: "The run was cancelled before its output was finalized",
  },
} as const;

// ============================================================================
// TYPE EXPORTS
// ============================================================================

/**
 * Union type of all error codes
 */
export type ErrorCode = keyof typeof ERROR_CATALOG;

/**
 * Type representing a single error catalog entry
 */
export type ErrorCatalogEntry = (typeof ERROR_CATALOG)[ErrorCode];

/**
 * Union type of all domain names
 */
export type ErrorDomain = ErrorCatalogEntry["domain"];

/**
 * Extract all ErrorCodes that belong to a specific BaseErrorType
 */
export type CodesForBase<B extends BaseErrorType> = {
  [K in ErrorCode]: (typeof ERROR_CATALOG)[K]["baseType"] extends B ? K : never;
}[ErrorCode];
