import { PequantError } from "./base.js";
import { ERROR_CATALOG, type ErrorCatalogEntry, type ErrorCode } from "./catalog.js";
import { InternalError } from "./run.js";

/**
 * Look up error catalog entry by code
 */
export function getCatalogEntry(code: ErrorCode): ErrorCatalogEntry {
  return ERROR_CATALOG[code];
}

/**
 * Check if a string is a valid error code
 */
export function isValidErrorCode(code: string): code is ErrorCode {
  return code in ERROR_CATALOG;
}

/**
 * Get all error codes in the catalog
 */
export function getAllErrorCodes(): ErrorCode[] {
  return Object.keys(ERROR_CATALOG).filter(isValidErrorCode);
}

/**
 * Get all error codes for a specific domain
 */
export function getErrorCodesByDomain(domain: string): ErrorCode[] {
  return getAllErrorCodes().filter((code) => ERROR_CATALOG[code].domain === domain);
}

/**
 * Wrap an unknown error into a PequantError.
 * If the error is already a PequantError, return it as-is.
 * Otherwise, wrap it in an InternalError.
 */
export function wrapError(error: unknown): PequantError {
  if (error instanceof PequantError) {
    return error;
  }

  if (error instanceof Error) {
    return new InternalError(error.message, { originalName: error.name }, error);
  }

  const message = typeof error === "string" ? error : "An unknown error occurred";
  return new InternalError(message);
}

/**
 * Extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }

  if (typeof error === "string") {
    return error;
  }

  return "An unknown error occurred";
}

/**
 * Validate catalog consistency (for tests)
 * Checks:
 * - All codes are UPPER_SNAKE_CASE
 * - Every code starts with its domain
 * - Per-record (non-fatal) codes are expected conditions
 */
export function validateCatalog(): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  for (const code of getAllErrorCodes()) {
    const entry = ERROR_CATALOG[code];

    if (!/^[A-Z][A-Z0-9_]*$/.test(code)) {
      errors.push(`Code '${code}' is not in UPPER_SNAKE_CASE format`);
    }

    if (!code.startsWith(`${entry.domain.toUpperCase()}_`)) {
      errors.push(`Code '${code}' does not start with its domain '${entry.domain}'`);
    }

    if (!entry.fatal && !entry.isExpected) {
      errors.push(`Code '${code}' is recoverable but not marked as expected`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}
