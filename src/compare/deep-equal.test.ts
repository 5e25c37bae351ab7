import { describe, it, expect } from "vitest";
import { deepEqual } from "./deep-equal.js";

class Point {
  constructor(public x: number, public y: number) {}
}

interface Linked {
  value: number;
  next?: Linked;
}

describe("deepEqual", () => {
  it("compares primitives by value", () => {
    expect(deepEqual(1, 1)).toBe(true);
    expect(deepEqual("a", "a")).toBe(true);
    expect(deepEqual(NaN, NaN)).toBe(true);
    expect(deepEqual(0, -0)).toBe(true);
    expect(deepEqual(1, 1n)).toBe(false);
    expect(deepEqual("1", 1)).toBe(false);
  });

  it("requires the same runtime type", () => {
    expect(deepEqual(new Point(1, 2), { x: 1, y: 2 })).toBe(false);
    expect(deepEqual([1], new Int8Array([1]))).toBe(false);
    expect(deepEqual(new TypeError("x"), new Error("x"))).toBe(false);
  });

  it("compares nested structures", () => {
    expect(deepEqual({ a: [1, { b: "c" }] }, { a: [1, { b: "c" }] })).toBe(true);
    expect(deepEqual({ a: [1, { b: "c" }] }, { a: [1, { b: "d" }] })).toBe(false);
    expect(deepEqual(new Point(1, 2), new Point(1, 2))).toBe(true);
    expect(deepEqual(new Point(1, 2), new Point(2, 1))).toBe(false);
  });

  it("distinguishes a missing key from an undefined one", () => {
    expect(deepEqual({ a: undefined }, {})).toBe(false);
    expect(deepEqual({}, { a: undefined })).toBe(false);
  });

  it("compares maps by key identity and sets by member", () => {
    expect(deepEqual(new Map([["a", [1]]]), new Map([["a", [1]]]))).toBe(true);
    expect(deepEqual(new Map([[{ k: 1 }, 1]]), new Map([[{ k: 1 }, 1]]))).toBe(false);
    expect(deepEqual(new Set([{ a: 1 }, 2]), new Set([2, { a: 1 }]))).toBe(true);
    expect(deepEqual(new Set([1, 2]), new Set([1, 3]))).toBe(false);
  });

  it("compares dates, patterns and errors by content", () => {
    expect(deepEqual(new Date(5), new Date(5))).toBe(true);
    expect(deepEqual(new Date(5), new Date(6))).toBe(false);
    expect(deepEqual(/a/g, /a/g)).toBe(true);
    expect(deepEqual(/a/g, /a/i)).toBe(false);
    expect(deepEqual(new Error("boom"), new Error("boom"))).toBe(true);
    expect(deepEqual(new Error("boom"), new Error("bang"))).toBe(false);
  });

  it("compares functions by identity", () => {
    const fn = (): number => 1;
    expect(deepEqual(fn, fn)).toBe(true);
    expect(deepEqual(fn, (): number => 1)).toBe(false);
  });

  it("terminates on cyclic values", () => {
    const a: Linked = { value: 1 };
    a.next = a;
    const b: Linked = { value: 1 };
    b.next = b;
    expect(deepEqual(a, b)).toBe(true);

    const c: Linked = { value: 2 };
    c.next = c;
    expect(deepEqual(a, c)).toBe(false);
  });
});

describe("deepEqual with set members revisited", () => {
  it("compares a pair again after it failed inside a set", () => {
    const x = { v: 1 };
    const x2 = { v: 1 };
    const y = { v: 2 };
    const y2 = { v: 2 };

    expect(deepEqual(x, y)).toBe(false);
    expect(deepEqual([new Set([x, y2]), x], [new Set([y, x2]), y])).toBe(false);
    expect(deepEqual([new Set([x, y2]), x], [new Set([y, x2]), x2])).toBe(true);
  });
});
