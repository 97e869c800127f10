import { PequantError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Thrown when a run's AbortSignal fires before the output is finalized.
 */
export class RunAbortedError extends PequantError {
  readonly _tag = "CancelledError" as const;
  readonly code = "RUN_ABORTED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;

  constructor(stage: string) {
    super(`Run aborted during ${stage}`);
    const entry = ERROR_CATALOG.RUN_ABORTED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
  }
}

/**
 * Fallback for failures that are not part of the catalog.
 */
export class InternalError extends PequantError {
  readonly _tag = "InternalError" as const;
  readonly code = "INTERNAL_ERROR" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;

  constructor(message: string, metadata?: Record<string, string>, cause?: Error) {
    super(message, metadata, cause ? { cause } : undefined);
    const entry = ERROR_CATALOG.INTERNAL_ERROR;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
  }
}
