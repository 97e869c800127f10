import { describe, expect, it } from "vitest";
import {
  AmbiguousMatchError,
  ConfigInterpolationError,
  ConfigParseError,
  ConfigReadError,
  ConfigSchemaError,
  ERROR_CATALOG,
  InputFileNotFoundError,
  InputSchemaError,
  InvalidIdentifierError,
  IOError,
  OutputWriteError,
  PequantError,
  ResolutionError,
  RunAbortedError,
  ScaffoldMismatchError,
  UnknownCategoryError,
  UnresolvedSampleError,
} from "../../index.js";

describe("IOError family", () => {
  it("InputFileNotFoundError extends IOError and PequantError", () => {
    const error = new InputFileNotFoundError("/data/designs.tsv");
    expect(error).toBeInstanceOf(IOError);
    expect(error).toBeInstanceOf(PequantError);
    expect(error).toBeInstanceOf(Error);
  });

  it("maps to its catalog entry", () => {
    const error = new InputFileNotFoundError("/data/designs.tsv");
    const entry = ERROR_CATALOG.IO_FILE_NOT_FOUND;
    expect(error.code).toBe("IO_FILE_NOT_FOUND");
    expect(error._tag).toBe("NotFoundError");
    expect(error.domain).toBe(entry.domain);
    expect(error.isExpected).toBe(entry.isExpected);
    expect(error.fatal).toBe(true);
  });

  it("sets name from the concrete class", () => {
    expect(new OutputWriteError("/out.tsv", "disk full").name).toBe("OutputWriteError");
  });

  it("lists schema issues in the message", () => {
    const error = new InputSchemaError("/q.tsv", ["row 2: reads must be an integer"]);
    expect(error.message).toBe("Invalid table /q.tsv:\n  - row 2: reads must be an integer");
    expect(error.issues).toEqual(["row 2: reads must be an integer"]);
  });

  it("keeps the cause of a write failure", () => {
    const cause = new Error("EACCES");
    const error = new OutputWriteError("/out.tsv", "permission denied", cause);
    expect(error.cause).toBe(cause);
  });
});

describe("ResolutionError family", () => {
  it("InvalidIdentifierError is a non-fatal validation error", () => {
    const error = new InvalidIdentifierError("  ", "identifier is blank");
    expect(error).toBeInstanceOf(ResolutionError);
    expect(error._tag).toBe("ValidationError");
    expect(error.fatal).toBe(false);
    expect(error.message).toBe('Invalid sample identifier "  ": identifier is blank');
  });

  it("UnresolvedSampleError stores the keys it tried", () => {
    const error = new UnresolvedSampleError("S1_A01", ["s1"]);
    expect(error.sampleId).toBe("S1_A01");
    expect(error.candidateKeys).toEqual(["s1"]);
    expect(error.message).toBe('No design matches sample "S1_A01" (tried: s1)');
  });

  it("AmbiguousMatchError lists every candidate design", () => {
    const error = new AmbiguousMatchError("hek3_p10", ["HEK3_P10", "hek3_P10"]);
    expect(error.candidates).toEqual(["HEK3_P10", "hek3_P10"]);
    expect(error.message).toBe('Sample "hek3_p10" matches 2 designs: HEK3_P10, hek3_P10');
    expect(error._tag).toBe("ConflictError");
  });
});

describe("UnknownCategoryError", () => {
  it("uses the singular noun for one label", () => {
    const error = new UnknownCategoryError("S1", ["Weird"]);
    expect(error.message).toBe('Sample "S1" has unknown outcome label: Weird');
  });

  it("uses the plural noun for several labels", () => {
    const error = new UnknownCategoryError("S1", ["A", "B"]);
    expect(error.message).toBe('Sample "S1" has unknown outcome labels: A, B');
    expect(error.labels).toEqual(["A", "B"]);
  });
});

describe("config errors", () => {
  it("ConfigParseError includes the location", () => {
    const error = new ConfigParseError("bad indentation", 3, 5);
    expect(error.message).toBe("Config parse failed at line 3:5: bad indentation");
    expect(error.line).toBe(3);
    expect(error.column).toBe(5);
  });

  it("ConfigSchemaError lists issues", () => {
    const error = new ConfigSchemaError(["resolver.patterns.0.key: Required"]);
    expect(error.message).toBe("Config validation failed:\n  - resolver.patterns.0.key: Required");
  });

  it("ConfigReadError is a fatal external error", () => {
    const error = new ConfigReadError("/etc/pequant.yaml", "EISDIR");
    expect(error.message).toBe("Cannot read config /etc/pequant.yaml: EISDIR");
    expect(error._tag).toBe(ERROR_CATALOG.CONFIG_READ_FAILED.baseType);
    expect(error.fatal).toBe(true);
  });

  it("ConfigInterpolationError keeps each reference and dedupes names", () => {
    const error = new ConfigInterpolationError([
      { name: "A", line: 2 },
      { name: "A", line: 5 },
    ]);
    expect(error.missingVars).toEqual(["A"]);
    expect(error.filePath).toBeUndefined();
    expect(error.message).toBe("Missing environment variables: A (line 2), A (line 5)");
  });
});

describe("other errors", () => {
  it("ScaffoldMismatchError names the design and prefix", () => {
    const error = new ScaffoldMismatchError("HEK3_P10_R13", "gtgc");
    expect(error.message).toBe('Extension of design "HEK3_P10_R13" does not start with "gtgc"');
  });

  it("RunAbortedError is a fatal cancellation", () => {
    const error = new RunAbortedError("emit");
    expect(error._tag).toBe("CancelledError");
    expect(error.fatal).toBe(true);
    expect(error.message).toBe("Run aborted during emit");
  });
});

describe("toJSON", () => {
  it("serializes catalog fields", () => {
    const json = new UnresolvedSampleError("S9", ["s9"]).toJSON();
    expect(json.code).toBe("RESOLVE_SAMPLE_UNRESOLVED");
    expect(json._tag).toBe("NotFoundError");
    expect(json.domain).toBe("resolve");
    expect(json.fatal).toBe(false);
    expect(json.name).toBe("UnresolvedSampleError");
    expect(json.metadata).toBeUndefined();
    expect(typeof json.timestamp).toBe("string");
  });
});
