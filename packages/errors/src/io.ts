import { PequantError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all I/O errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for input and output failures.
 *
 * Every IOError is fatal: the run aborts before any output is finalized.
 * Enables generic catch: `if (e instanceof IOError)`.
 */
export abstract class IOError extends PequantError {
  abstract readonly filePath: string;
}

// ---------------------------------------------------------------------------
// Input file not found
// ---------------------------------------------------------------------------

/**
 * Thrown when an input table does not exist.
 */
export class InputFileNotFoundError extends IOError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "IO_FILE_NOT_FOUND" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Input file not found: ${filePath}`);
    const entry = ERROR_CATALOG.IO_FILE_NOT_FOUND;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.filePath = filePath;
  }
}

// ---------------------------------------------------------------------------
// Input read failed
// ---------------------------------------------------------------------------

/**
 * Thrown when an input table exists but cannot be read (permissions,
 * binary content, a directory in place of a file).
 */
export class InputReadError extends IOError {
  readonly _tag = "ExternalError" as const;
  readonly code = "IO_READ_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly filePath: string;
  readonly reason: string;

  constructor(filePath: string, reason: string, cause?: Error) {
    super(`Cannot read ${filePath}: ${reason}`, undefined, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.IO_READ_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.filePath = filePath;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Input schema invalid
// ---------------------------------------------------------------------------

/**
 * Thrown when an input table is missing required columns or holds rows
 * that cannot be interpreted. `issues` lists each problem, prefixed with
 * its row number where one applies.
 */
export class InputSchemaError extends IOError {
  readonly _tag = "ValidationError" as const;
  readonly code = "IO_SCHEMA_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly filePath: string;
  readonly issues: readonly string[];

  constructor(filePath: string, issues: readonly string[]) {
    super(`Invalid table ${filePath}:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    const entry = ERROR_CATALOG.IO_SCHEMA_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.filePath = filePath;
    this.issues = issues;
  }
}

// ---------------------------------------------------------------------------
// Output write failed
// ---------------------------------------------------------------------------

/**
 * Thrown when an output file cannot be written or renamed into place.
 * The destination is left as it was before the write started.
 */
export class OutputWriteError extends IOError {
  readonly _tag = "ExternalError" as const;
  readonly code = "IO_WRITE_FAILED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly filePath: string;

  constructor(filePath: string, reason: string, cause?: Error) {
    super(`Cannot write ${filePath}: ${reason}`, undefined, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.IO_WRITE_FAILED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.filePath = filePath;
  }
}
