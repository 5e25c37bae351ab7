import { describe, it, expect } from "vitest";
import { indexOfEqual, isEqual } from "./equal.js";

class Flag {
  called = false;

  constructor(readonly matchesAnything: boolean) {}

  isEqual(_other: unknown): boolean {
    this.called = true;
    return this.matchesAnything;
  }
}

class Money {
  constructor(readonly cents: number) {}

  equals(other: unknown): boolean {
    return other instanceof Money && other.cents === this.cents;
  }
}

describe("isEqual", () => {
  describe("absent values", () => {
    it("treats null and undefined as equal", () => {
      expect(isEqual(null, null)).toBe(true);
      expect(isEqual(undefined, undefined)).toBe(true);
      expect(isEqual(null, undefined)).toBe(true);
    });

    it("never equates absent and present values", () => {
      expect(isEqual(null, 0)).toBe(false);
      expect(isEqual(0, null)).toBe(false);
      expect(isEqual([], undefined)).toBe(false);
      expect(isEqual("", null)).toBe(false);
    });
  });

  describe("equality hook", () => {
    it("lets the left operand decide", () => {
      const lenient = new Flag(true);
      const plain = new Flag(false);
      expect(isEqual(lenient, plain)).toBe(true);
      expect(lenient.called).toBe(true);
      expect(plain.called).toBe(false);
    });

    it("ignores the right operand's hook", () => {
      const lenient = new Flag(true);
      const plain = new Flag(false);
      expect(isEqual(plain, lenient)).toBe(false);
      expect(plain.called).toBe(true);
      expect(lenient.called).toBe(false);
    });

    it("is not consulted against absent values", () => {
      const lenient = new Flag(true);
      expect(isEqual(lenient, null)).toBe(false);
      expect(lenient.called).toBe(false);
    });

    it("accepts the legacy equals spelling", () => {
      expect(isEqual(new Money(100), new Money(100))).toBe(true);
      expect(isEqual(new Money(100), new Money(200))).toBe(false);
      expect(isEqual(new Money(100), 100)).toBe(false);
    });
  });

  describe("conversions", () => {
    it("equates numbers and bigints both ways", () => {
      expect(isEqual(1, 1n)).toBe(true);
      expect(isEqual(1n, 1)).toBe(true);
      expect(isEqual(2, 1n)).toBe(false);
    });

    it("treats a failed conversion as not equal", () => {
      expect(isEqual(1n, 1.5)).toBe(false);
      expect(isEqual(new BigInt64Array([1n]), [1.5])).toBe(false);
      expect(isEqual(new Float64Array([1]), [1n])).toBe(false);
    });

    it("unwraps and wraps boxed primitives", () => {
      expect(isEqual("a", new String("a"))).toBe(true);
      expect(isEqual(new String("a"), "a")).toBe(true);
      expect(isEqual(3, new Number(3))).toBe(true);
      expect(isEqual(new Number(3), 3)).toBe(true);
      expect(isEqual(true, new Boolean(true))).toBe(true);
    });

    it("converts between sequence representations", () => {
      expect(isEqual([1, 2], new Int32Array([1, 2]))).toBe(true);
      expect(isEqual(new Int32Array([1, 2]), [1, 2])).toBe(true);
      expect(isEqual([1, 2], new Set([1, 2]))).toBe(true);
      expect(isEqual([1, 2], new Int32Array([2, 1]))).toBe(false);
    });

    it("converts between maps and plain objects", () => {
      expect(isEqual({ a: 1 }, new Map([["a", 1]]))).toBe(true);
      expect(isEqual(new Map([["a", 1]]), { a: 1 })).toBe(true);
      expect(isEqual({ a: 1 }, new Map([["a", 2]]))).toBe(false);
    });

    it("does not convert between unrelated kinds", () => {
      expect(isEqual("1", 1)).toBe(false);
      expect(isEqual(1, "1")).toBe(false);
      expect(isEqual([1], { 0: 1 })).toBe(false);
    });
  });
});

describe("indexOfEqual", () => {
  it("returns the first matching index", () => {
    expect(indexOfEqual(2, [1, 2, 3, 2])).toBe(1);
    expect(indexOfEqual(2n, [1, 2, 3])).toBe(1);
    expect(indexOfEqual({ a: 1 }, [{ a: 2 }, { a: 1 }])).toBe(1);
  });

  it("returns -1 when nothing matches", () => {
    expect(indexOfEqual(4, [1, 2, 3])).toBe(-1);
    expect(indexOfEqual(1, [])).toBe(-1);
  });
});

describe("isEqual with repeated members", () => {
  it("does not reuse a set member mismatch as a match", () => {
    const x = { v: 1 };
    const y = { v: 2 };
    expect(isEqual([new Set([x, { v: 2 }]), x], [new Set([y, { v: 1 }]), y])).toBe(false);
  });
});
