import { describe, it, expect } from "vitest";
import { MAX_DIFF_EDITS, structuralDiff } from "./structural.js";

describe("structuralDiff", () => {
  it("diffs two arrays line by line", () => {
    expect(structuralDiff([1, 2, 3], [1, 2, 4])).toBe(
      " - Diff:\n  [\n    1,\n    2,\n-   3\n+   4\n  ]"
    );
  });

  it("diffs two maps", () => {
    expect(structuralDiff(new Map([["a", 1]]), new Map([["a", 2]]))).toBe(
      ' - Diff:\n  {\n-   "a": 1\n+   "a": 2\n  }'
    );
  });

  it("collapses unchanged runs beyond the context", () => {
    const actual = [1, 2, 3, 4, 5, 6, 7, 8, 9, 10];
    const expected = [1, 2, 3, 4, 5, 6, 7, 8, 9, 11];
    expect(structuralDiff(actual, expected, 1)).toBe(
      " - Diff:\n  ...\n    9,\n-   10\n+   11\n  ]"
    );
  });

  it("is empty for scalars and mismatched kinds", () => {
    expect(structuralDiff(1, 2)).toBe("");
    expect(structuralDiff("a", "b")).toBe("");
    expect(structuralDiff([1], { a: 1 })).toBe("");
    expect(structuralDiff([1], new Set([2]))).toBe("");
  });

  it("is empty when the encodings match", () => {
    expect(structuralDiff(new Set([1]), new Set([1]))).toBe("");
    expect(structuralDiff({ a: 1n }, { a: "1" })).toBe("");
  });

  it("skips the diff when too many lines changed", () => {
    expect(structuralDiff([1, 2, 3], [4, 5, 6], 3, 2)).toBe(
      " - Diff: skipped, more than 2 lines changed"
    );
  });

  it("caps large diffs by default", () => {
    const actual = Array.from({ length: 1000 }, (_, i) => i);
    const expected = Array.from({ length: 1000 }, (_, i) => i + 1000);
    expect(structuralDiff(actual, expected)).toBe(
      ` - Diff: skipped, more than ${MAX_DIFF_EDITS} lines changed`
    );
  });
});
