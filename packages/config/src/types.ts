import type { OutcomeCategory } from "@pequant/core";
import type { QuantificationLayout } from "@pequant/io";

/**
 * Extracts a candidate design key from a sample identifier. `match` is a
 * regular expression with named groups; `key` is a template whose
 * `{name}` placeholders are filled from those groups.
 */
export interface ResolverPattern {
  readonly match: string;
  readonly key: string;
}

export interface ResolverRules {
  /** Compare keys and design identifiers without case folding */
  readonly caseSensitive: boolean;
  /** Regular expressions removed from the end of an identifier */
  readonly stripSuffixes: readonly string[];
  readonly patterns: readonly ResolverPattern[];
}

/** Raw outcome label → outcome category */
export type CategoryTable = Readonly<Record<string, OutcomeCategory>>;

export interface InputConfig {
  readonly layout: QuantificationLayout;
  readonly designDelimiter?: string;
  readonly quantificationDelimiter?: string;
}

export interface OutputConfig {
  /** Written in place of a fraction that is undefined (zero reads) */
  readonly undefinedMarker: string;
  /** Rounds fractions for presentation; full precision when absent */
  readonly fractionDigits?: number;
  readonly delimiter: string;
}

export interface WorkflowConfig {
  /** Prepended, with an underscore, to every oligo name */
  readonly oligoPrefix?: string;
  /** Rewrite sense extensions for the second scaffold variant */
  readonly scaffold2: boolean;
  readonly amplicon?: string;
  readonly scaffold?: string;
}

export interface PequantConfig {
  readonly resolver: ResolverRules;
  readonly categories: CategoryTable;
  readonly input: InputConfig;
  readonly output: OutputConfig;
  readonly workflow: WorkflowConfig;
}
