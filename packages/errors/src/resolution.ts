import { PequantError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

// ---------------------------------------------------------------------------
// Base class for all per-sample resolution errors
// ---------------------------------------------------------------------------

/**
 * Abstract base class for errors raised while mapping a sample
 * identifier to a design. None of them abort a run; they are recorded
 * in the run report and the sample is kept under its flagged state.
 */
export abstract class ResolutionError extends PequantError {
  abstract readonly sampleId: string;
}

// ---------------------------------------------------------------------------
// Invalid identifier
// ---------------------------------------------------------------------------

/**
 * The sample identifier could not be turned into any candidate key.
 */
export class InvalidIdentifierError extends ResolutionError {
  readonly _tag = "ValidationError" as const;
  readonly code = "RESOLVE_IDENTIFIER_INVALID" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly sampleId: string;
  readonly reason: string;

  constructor(sampleId: string, reason: string) {
    super(`Invalid sample identifier "${sampleId}": ${reason}`);
    const entry = ERROR_CATALOG.RESOLVE_IDENTIFIER_INVALID;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.sampleId = sampleId;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Unresolved sample
// ---------------------------------------------------------------------------

/**
 * No design matches any candidate key of the sample.
 */
export class UnresolvedSampleError extends ResolutionError {
  readonly _tag = "NotFoundError" as const;
  readonly code = "RESOLVE_SAMPLE_UNRESOLVED" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly sampleId: string;
  readonly candidateKeys: readonly string[];

  constructor(sampleId: string, candidateKeys: readonly string[]) {
    super(`No design matches sample "${sampleId}" (tried: ${candidateKeys.join(", ")})`);
    const entry = ERROR_CATALOG.RESOLVE_SAMPLE_UNRESOLVED;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.sampleId = sampleId;
    this.candidateKeys = candidateKeys;
  }
}

// ---------------------------------------------------------------------------
// Ambiguous match
// ---------------------------------------------------------------------------

/**
 * More than one design matches the sample. The sample is never assigned
 * to any of them; `candidates` lists every matching design identifier.
 */
export class AmbiguousMatchError extends ResolutionError {
  readonly _tag = "ConflictError" as const;
  readonly code = "RESOLVE_MATCH_AMBIGUOUS" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly sampleId: string;
  readonly candidates: readonly string[];

  constructor(sampleId: string, candidates: readonly string[]) {
    super(`Sample "${sampleId}" matches ${candidates.length} designs: ${candidates.join(", ")}`);
    const entry = ERROR_CATALOG.RESOLVE_MATCH_AMBIGUOUS;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.sampleId = sampleId;
    this.candidates = candidates;
  }
}
