import type { BaseErrorType, ErrorCode, ErrorDomain } from "./catalog.js";

/**
 * Plain-object form of a PequantError, as written to run reports.
 */
export interface ErrorJSON {
  readonly _tag: BaseErrorType;
  readonly name: string;
  readonly code: ErrorCode;
  readonly domain: ErrorDomain;
  readonly message: string;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly timestamp: string;
  readonly metadata?: Readonly<Record<string, string>>;
}

/**
 * Root of the pequant error hierarchy.
 *
 * Subclasses pin `code` to a catalog entry and copy `domain`,
 * `isExpected` and `fatal` from it. Per-record conditions (fatal: false)
 * are collected into a run report instead of being thrown.
 */
export abstract class PequantError extends Error {
  abstract readonly _tag: BaseErrorType;
  abstract readonly code: ErrorCode;
  abstract readonly domain: ErrorDomain;
  abstract readonly isExpected: boolean;
  abstract readonly fatal: boolean;

  readonly metadata?: Readonly<Record<string, string>>;
  readonly timestamp: string;

  constructor(message: string, metadata?: Record<string, string>, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.timestamp = new Date().toISOString();
    if (metadata !== undefined) {
      this.metadata = Object.freeze({ ...metadata });
    }
  }

  toJSON(): ErrorJSON {
    return {
      _tag: this._tag,
      name: this.name,
      code: this.code,
      domain: this.domain,
      message: this.message,
      isExpected: this.isExpected,
      fatal: this.fatal,
      timestamp: this.timestamp,
      ...(this.metadata ? { metadata: this.metadata } : {}),
    };
  }
}

/**
 * Check whether a value is any PequantError.
 */
export function isPequantError(error: unknown): error is PequantError {
  return error instanceof PequantError;
}

/**
 * Check whether a value is an Error of any kind.
 */
export function isError(error: unknown): error is Error {
  return error instanceof Error;
}
