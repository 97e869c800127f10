/**
 * Identifier Resolver.
 *
 * Maps raw sample identifiers onto design identifiers. A sample resolves
 * only when its candidate keys select exactly one design; anything else
 * is kept with a failed status and reported, never guessed.
 */

import { fillTemplate, type ResolverRules } from "@pequant/config";
import type { DesignRecord, QuantificationRecord, ResolvedRecord, RunReport } from "@pequant/core";
import {
  AmbiguousMatchError,
  InvalidIdentifierError,
  type ResolutionError,
  UnresolvedSampleError,
} from "@pequant/errors";

// ---------------------------------------------------------------------------
// Candidate keys
// ---------------------------------------------------------------------------

interface CompiledPattern {
  readonly regex: RegExp;
  readonly key: string;
}

export interface CompiledResolverRules {
  readonly caseSensitive: boolean;
  readonly suffixes: readonly RegExp[];
  readonly patterns: readonly CompiledPattern[];
}

export function compileResolverRules(rules: ResolverRules): CompiledResolverRules {
  const flags = rules.caseSensitive ? "" : "i";
  return {
    caseSensitive: rules.caseSensitive,
    suffixes: rules.stripSuffixes.map((source) => new RegExp(`(?:${source})$`, flags)),
    patterns: rules.patterns.map(({ match, key }) => ({ regex: new RegExp(match, flags), key })),
  };
}

/**
 * Derives the candidate design keys of a sample identifier.
 *
 * Without patterns the single key is the trimmed identifier with every
 * configured suffix removed, repeatedly, until none applies. With
 * patterns each matching pattern contributes its filled key template.
 * Keys are lower-cased unless the rules are case-sensitive.
 *
 * @throws {InvalidIdentifierError} for a blank identifier or one that
 *   yields no key
 */
export function deriveCandidateKeys(
  sampleId: string,
  rules: ResolverRules | CompiledResolverRules,
): readonly string[] {
  const compiled = "suffixes" in rules ? rules : compileResolverRules(rules);
  const identifier = sampleId.trim();
  if (identifier === "") {
    throw new InvalidIdentifierError(sampleId, "identifier is blank");
  }

  const fold = (key: string): string => (compiled.caseSensitive ? key : key.toLowerCase());

  if (compiled.patterns.length > 0) {
    const keys: string[] = [];
    for (const { regex, key } of compiled.patterns) {
      const match = regex.exec(identifier);
      const filled = match ? fillTemplate(key, match.groups ?? {}) : undefined;
      if (filled === undefined || filled === "") continue;
      const folded = fold(filled);
      if (!keys.includes(folded)) keys.push(folded);
    }
    if (keys.length === 0) {
      throw new InvalidIdentifierError(sampleId, "no resolver pattern matches");
    }
    return keys;
  }

  const stripped = stripSuffixes(identifier, compiled.suffixes);
  if (stripped === "") {
    throw new InvalidIdentifierError(sampleId, "nothing is left after removing suffixes");
  }
  return [fold(stripped)];
}

function stripSuffixes(identifier: string, suffixes: readonly RegExp[]): string {
  let current = identifier;
  let changed = true;
  while (changed && current !== "") {
    changed = false;
    for (const suffix of suffixes) {
      const next = current.replace(suffix, "");
      if (next !== current) {
        current = next;
        changed = true;
      }
    }
  }
  return current;
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export type SampleResolution =
  | {
      readonly status: "resolved";
      readonly design: DesignRecord;
      readonly candidates: readonly string[];
    }
  | {
      readonly status: "unresolved" | "ambiguous";
      readonly design: null;
      readonly candidates: readonly string[];
      readonly error: ResolutionError;
    };

export interface IdentifierResolver {
  readonly rules: CompiledResolverRules;
  candidateKeys(sampleId: string): readonly string[];
  resolve(sampleId: string): SampleResolution;
}

/**
 * Builds a resolver over a design set. Design identifiers are indexed
 * under their folded form, so two designs differing only in case make
 * every sample that selects them ambiguous.
 */
export function createIdentifierResolver(
  designs: readonly DesignRecord[],
  rules: ResolverRules,
): IdentifierResolver {
  const compiled = compileResolverRules(rules);
  const index = new Map<string, DesignRecord[]>();
  for (const design of designs) {
    const key = compiled.caseSensitive ? design.designId : design.designId.toLowerCase();
    const bucket = index.get(key);
    if (bucket) {
      bucket.push(design);
    } else {
      index.set(key, [design]);
    }
  }

  const resolve = (sampleId: string): SampleResolution => {
    let keys: readonly string[];
    try {
      keys = deriveCandidateKeys(sampleId, compiled);
    } catch (error: unknown) {
      if (error instanceof InvalidIdentifierError) {
        return { status: "unresolved", design: null, candidates: [], error };
      }
      throw error;
    }

    const matches = new Map<string, DesignRecord>();
    for (const key of keys) {
      for (const design of index.get(key) ?? []) {
        matches.set(design.designId, design);
      }
    }

    const [first, ...rest] = matches.values();
    if (!first) {
      return {
        status: "unresolved",
        design: null,
        candidates: [],
        error: new UnresolvedSampleError(sampleId, keys),
      };
    }
    if (rest.length > 0) {
      const candidates = [...matches.keys()].sort();
      return {
        status: "ambiguous",
        design: null,
        candidates,
        error: new AmbiguousMatchError(sampleId, candidates),
      };
    }
    return { status: "resolved", design: first, candidates: [first.designId] };
  };

  return {
    rules: compiled,
    candidateKeys: (sampleId) => deriveCandidateKeys(sampleId, compiled),
    resolve,
  };
}

/**
 * Resolves every record, in input order. Failed resolutions are recorded
 * in `report` and kept with `design: null`.
 */
export function resolveRecords(
  records: readonly QuantificationRecord[],
  resolver: IdentifierResolver,
  report: RunReport,
): ResolvedRecord[] {
  return records.map((record): ResolvedRecord => {
    const resolution = resolver.resolve(record.sampleId);
    if (resolution.status === "resolved") {
      return {
        status: "resolved",
        record,
        design: resolution.design,
        candidates: resolution.candidates,
      };
    }
    report.record(resolution.error);
    return {
      status: resolution.status,
      record,
      design: null,
      candidates: resolution.candidates,
    };
  });
}
