/**
 * Type guards for error families and code-level discrimination.
 */

import { PequantError } from "./base.js";
import type { ErrorCode } from "./catalog.js";
import { ConfigError } from "./config.js";
import { IOError } from "./io.js";
import { ResolutionError } from "./resolution.js";

/** Check if an error is an input/output failure */
export function isIOError(error: unknown): error is IOError {
  return error instanceof IOError;
}

/** Check if an error is a configuration failure */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/** Check if an error came from sample identifier resolution */
export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}

/** Check if an error must abort the run */
export function isFatalError(error: unknown): boolean {
  if (error instanceof PequantError) {
    return error.fatal;
  }
  return true;
}

/**
 * Check if a PequantError has a specific error code.
 * Narrows the type to include the specific code literal.
 */
export function hasCode<C extends ErrorCode>(
  error: PequantError,
  code: C,
): error is PequantError & { readonly code: C } {
  return error.code === code;
}
