import { PequantError } from "./base.js";
import { ERROR_CATALOG, type ErrorDomain } from "./catalog.js";

/**
 * Abstract base class for run-sheet and oligo-order generator errors.
 */
export abstract class WorkflowError extends PequantError {}

/**
 * Thrown when scaffold-2 substitution is requested but a sense extension
 * does not start with the scaffold-1 bases.
 */
export class ScaffoldMismatchError extends WorkflowError {
  readonly _tag = "ValidationError" as const;
  readonly code = "WORKFLOW_SCAFFOLD_MISMATCH" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly designId: string;
  readonly expectedPrefix: string;

  constructor(designId: string, expectedPrefix: string) {
    super(`Extension of design "${designId}" does not start with "${expectedPrefix}"`);
    const entry = ERROR_CATALOG.WORKFLOW_SCAFFOLD_MISMATCH;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.designId = designId;
    this.expectedPrefix = expectedPrefix;
  }
}

/**
 * Recorded when a design lacks a sequence the generator needs; the design
 * is skipped.
 */
export class DesignFieldMissingError extends WorkflowError {
  readonly _tag = "ValidationError" as const;
  readonly code = "WORKFLOW_DESIGN_FIELD_MISSING" as const;
  readonly domain: ErrorDomain;
  readonly isExpected: boolean;
  readonly fatal: boolean;
  readonly designId: string;
  readonly field: string;

  constructor(designId: string, field: string) {
    super(`Design "${designId}" has no ${field}`);
    const entry = ERROR_CATALOG.WORKFLOW_DESIGN_FIELD_MISSING;
    this.domain = entry.domain;
    this.isExpected = entry.isExpected;
    this.fatal = entry.fatal;
    this.designId = designId;
    this.field = field;
  }
}
