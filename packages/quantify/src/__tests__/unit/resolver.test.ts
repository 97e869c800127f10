import { DEFAULT_RESOLVER_RULES, type ResolverRules } from "@pequant/config";
import { RunReport } from "@pequant/core";
import {
  AmbiguousMatchError,
  InvalidIdentifierError,
  UnresolvedSampleError,
} from "@pequant/errors";
import { describe, expect, it } from "vitest";
import { createIdentifierResolver, deriveCandidateKeys, resolveRecords } from "../../resolver.js";
import { design, record } from "../helpers/builders.js";

const LOCUS_RULES: ResolverRules = {
  caseSensitive: false,
  stripSuffixes: [],
  patterns: [
    { match: "^(?<locus>[A-Z0-9]+)_P(?<pbs>\\d+)_R(?<rtt>\\d+)", key: "{locus}_P{pbs}_R{rtt}" },
    { match: "^(?<locus>[A-Z0-9]+)_R(?<rtt>\\d+)_P(?<pbs>\\d+)", key: "{locus}_P{pbs}_R{rtt}" },
  ],
};

function invalidReason(fn: () => unknown): string {
  try {
    fn();
  } catch (error) {
    if (error instanceof InvalidIdentifierError) {
      return error.reason;
    }
    throw error;
  }
  throw new Error("expected InvalidIdentifierError");
}

describe("deriveCandidateKeys", () => {
  it("strips a replicate suffix and folds case", () => {
    expect(deriveCandidateKeys("HEK3_P10_R13_rep2", DEFAULT_RESOLVER_RULES)).toEqual([
      "hek3_p10_r13",
    ]);
  });

  it("strips stacked well and replicate suffixes", () => {
    expect(deriveCandidateKeys("HEK3_P10_R13_B07_rep1", DEFAULT_RESOLVER_RULES)).toEqual([
      "hek3_p10_r13",
    ]);
    expect(deriveCandidateKeys("HEK3_P10_R13_Rep1_H12", DEFAULT_RESOLVER_RULES)).toEqual([
      "hek3_p10_r13",
    ]);
  });

  it("leaves the RTT segment alone", () => {
    expect(deriveCandidateKeys("HEK3_P10_R13", DEFAULT_RESOLVER_RULES)).toEqual(["hek3_p10_r13"]);
  });

  it("keeps case when case-sensitive", () => {
    const rules = { ...DEFAULT_RESOLVER_RULES, caseSensitive: true };
    expect(deriveCandidateKeys("  HEK3_Rep1 ", rules)).toEqual(["HEK3"]);
  });

  it("rejects a blank identifier", () => {
    expect(invalidReason(() => deriveCandidateKeys("   ", DEFAULT_RESOLVER_RULES))).toBe(
      "identifier is blank",
    );
  });

  it("rejects an identifier that is only suffixes", () => {
    expect(invalidReason(() => deriveCandidateKeys("_rep1", DEFAULT_RESOLVER_RULES))).toBe(
      "nothing is left after removing suffixes",
    );
  });

  it("builds keys from pattern templates", () => {
    expect(deriveCandidateKeys("HEK3_P10_R13_rep1", LOCUS_RULES)).toEqual(["hek3_p10_r13"]);
    expect(deriveCandidateKeys("HEK3_R13_P10", LOCUS_RULES)).toEqual(["hek3_p10_r13"]);
  });

  it("rejects an identifier no pattern matches", () => {
    expect(invalidReason(() => deriveCandidateKeys("control", LOCUS_RULES))).toBe(
      "no resolver pattern matches",
    );
  });
});

describe("createIdentifierResolver", () => {
  const designs = [design("HEK3_P10_R13"), design("HEK3_P13_R10"), design("FANCF_P12_R16")];

  it("resolves a replicate to its design", () => {
    const resolution = createIdentifierResolver(designs, DEFAULT_RESOLVER_RULES).resolve(
      "HEK3_P10_R13_rep1",
    );
    expect(resolution.status).toBe("resolved");
    expect(resolution.design?.designId).toBe("HEK3_P10_R13");
    expect(resolution.candidates).toEqual(["HEK3_P10_R13"]);
  });

  it("matches design identifiers case-insensitively by default", () => {
    const resolution = createIdentifierResolver(designs, DEFAULT_RESOLVER_RULES).resolve(
      "fancf_p12_r16",
    );
    expect(resolution.design?.designId).toBe("FANCF_P12_R16");
  });

  it("reports an unresolved sample with the keys it tried", () => {
    const resolution = createIdentifierResolver(designs, DEFAULT_RESOLVER_RULES).resolve(
      "EMX1_P10_R10",
    );
    expect(resolution.status).toBe("unresolved");
    if (resolution.status !== "resolved") {
      expect(resolution.error).toBeInstanceOf(UnresolvedSampleError);
      expect(resolution.error.message).toBe(
        'No design matches sample "EMX1_P10_R10" (tried: emx1_p10_r10)',
      );
    }
  });

  it("treats designs colliding after case folding as ambiguous", () => {
    const resolver = createIdentifierResolver(
      [design("Alpha"), design("ALPHA")],
      DEFAULT_RESOLVER_RULES,
    );
    const resolution = resolver.resolve("alpha_rep1");
    expect(resolution.status).toBe("ambiguous");
    expect(resolution.design).toBeNull();
    expect(resolution.candidates).toEqual(["ALPHA", "Alpha"]);
    if (resolution.status !== "resolved") {
      expect(resolution.error).toBeInstanceOf(AmbiguousMatchError);
      expect(resolution.error.message).toBe('Sample "alpha_rep1" matches 2 designs: ALPHA, Alpha');
    }
  });

  it("distinguishes case when case-sensitive", () => {
    const resolver = createIdentifierResolver([design("Alpha"), design("ALPHA")], {
      ...DEFAULT_RESOLVER_RULES,
      caseSensitive: true,
    });
    expect(resolver.resolve("Alpha_rep1").design?.designId).toBe("Alpha");
  });

  it("is ambiguous when two pattern keys select different designs", () => {
    const resolver = createIdentifierResolver([design("X"), design("Y")], {
      caseSensitive: false,
      stripSuffixes: [],
      patterns: [
        { match: "^(?<a>[A-Z]+)_", key: "{a}" },
        { match: "_(?<b>[A-Z]+)$", key: "{b}" },
      ],
    });
    const resolution = resolver.resolve("X_Y");
    expect(resolution.status).toBe("ambiguous");
    expect(resolution.candidates).toEqual(["X", "Y"]);
  });

  it("marks an invalid identifier as unresolved", () => {
    const resolution = createIdentifierResolver(designs, DEFAULT_RESOLVER_RULES).resolve("");
    expect(resolution.status).toBe("unresolved");
    if (resolution.status !== "resolved") {
      expect(resolution.error).toBeInstanceOf(InvalidIdentifierError);
    }
  });

  it("exposes candidate keys", () => {
    const resolver = createIdentifierResolver(designs, DEFAULT_RESOLVER_RULES);
    expect(resolver.candidateKeys("FANCF_P12_R16_A3")).toEqual(["fancf_p12_r16"]);
  });
});

describe("resolveRecords", () => {
  it("keeps input order and records every failure", () => {
    const resolver = createIdentifierResolver(
      [design("D1"), design("Alpha"), design("ALPHA")],
      DEFAULT_RESOLVER_RULES,
    );
    const report = new RunReport();
    const resolved = resolveRecords(
      [record("D1_rep1", { A: 1 }), record("  ", { A: 1 }), record("alpha", { A: 1 }), record("nope", { A: 1 })],
      resolver,
      report,
    );

    expect(resolved.map((r) => r.status)).toEqual(["resolved", "unresolved", "ambiguous", "unresolved"]);
    expect(resolved.map((r) => r.record.sampleId)).toEqual(["D1_rep1", "  ", "alpha", "nope"]);
    expect(report.issues.map((e) => e.code)).toEqual([
      "RESOLVE_IDENTIFIER_INVALID",
      "RESOLVE_MATCH_AMBIGUOUS",
      "RESOLVE_SAMPLE_UNRESOLVED",
    ]);
  });
});
