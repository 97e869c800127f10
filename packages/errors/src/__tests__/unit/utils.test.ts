import { describe, expect, it } from "vitest";
import {
  ConfigSchemaError,
  getErrorMessage,
  hasCode,
  InputReadError,
  InternalError,
  isConfigError,
  isFatalError,
  isIOError,
  isResolutionError,
  UnresolvedSampleError,
  wrapError,
} from "../../index.js";

describe("wrapError", () => {
  it("returns PequantErrors unchanged", () => {
    const error = new InputReadError("/x.tsv", "is a directory");
    expect(wrapError(error)).toBe(error);
  });

  it("wraps plain errors into InternalError with the original name", () => {
    const wrapped = wrapError(new TypeError("boom"));
    expect(wrapped).toBeInstanceOf(InternalError);
    expect(wrapped.message).toBe("boom");
    expect(wrapped.metadata).toEqual({ originalName: "TypeError" });
  });

  it("wraps strings and unknown values", () => {
    expect(wrapError("oops").message).toBe("oops");
    expect(wrapError(42).message).toBe("An unknown error occurred");
  });
});

describe("getErrorMessage", () => {
  it("reads messages from errors and strings", () => {
    expect(getErrorMessage(new Error("a"))).toBe("a");
    expect(getErrorMessage("b")).toBe("b");
    expect(getErrorMessage(null)).toBe("An unknown error occurred");
  });
});

describe("guards", () => {
  it("isFatalError follows the catalog and treats foreign errors as fatal", () => {
    expect(isFatalError(new UnresolvedSampleError("S", ["s"]))).toBe(false);
    expect(isFatalError(new InputReadError("/x", "y"))).toBe(true);
    expect(isFatalError(new Error("z"))).toBe(true);
  });

  it("family guards discriminate", () => {
    expect(isIOError(new InputReadError("/x", "y"))).toBe(true);
    expect(isIOError(new UnresolvedSampleError("S", []))).toBe(false);
    expect(isResolutionError(new UnresolvedSampleError("S", []))).toBe(true);
    expect(isConfigError(new ConfigSchemaError(["x: bad"]))).toBe(true);
    expect(isConfigError(new InputReadError("/x", "y"))).toBe(false);
  });

  it("hasCode narrows by code", () => {
    const error = new UnresolvedSampleError("S", []);
    expect(hasCode(error, "RESOLVE_SAMPLE_UNRESOLVED")).toBe(true);
    expect(hasCode(error, "RESOLVE_MATCH_AMBIGUOUS")).toBe(false);
  });
});
