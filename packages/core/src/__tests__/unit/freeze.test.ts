import { describe, expect, it } from "vitest";
import { deepFreeze } from "../../freeze.js";

describe("deepFreeze", () => {
  it("recursively freezes nested objects", () => {
    const obj = { nested: { deep: { value: 42 } } };
    deepFreeze(obj);
    expect(Object.isFrozen(obj)).toBe(true);
    expect(Object.isFrozen(obj.nested)).toBe(true);
    expect(Object.isFrozen(obj.nested.deep)).toBe(true);
  });

  it("freezes arrays of records", () => {
    const obj = { counts: [{ label: "Unmodified", reads: 3 }] };
    deepFreeze(obj);
    expect(Object.isFrozen(obj.counts)).toBe(true);
    expect(Object.isFrozen(obj.counts[0])).toBe(true);
  });

  it("handles circular references", () => {
    const a: { self?: unknown } = {};
    a.self = a;
    expect(() => deepFreeze(a)).not.toThrow();
    expect(Object.isFrozen(a)).toBe(true);
  });

  it("passes through primitives and null", () => {
    expect(deepFreeze(42)).toBe(42);
    expect(deepFreeze("string")).toBe("string");
    expect(deepFreeze(null)).toBe(null);
  });

  it("returns the same reference", () => {
    const obj = { a: 1 };
    expect(deepFreeze(obj)).toBe(obj);
  });
});
