import { describe, it, expect } from "vitest";
import { formatMessage } from "./template.js";

class Point {
  constructor(public x: number) {}
}

describe("formatMessage", () => {
  it("substitutes verbs in order", () => {
    expect(formatMessage("%s and %d", ["a", 2])).toBe("a and 2");
    expect(formatMessage("got '%v' (%T)", [[1, 2], [1, 2]])).toBe("got '[1,2]' (Array)");
  });

  it("renders source forms with %#v", () => {
    expect(formatMessage("%#v", ["hi"])).toBe('"hi"');
    expect(formatMessage("%#v", [5n])).toBe("5n");
    expect(formatMessage("%#v", [["a", "b"]])).toBe('["a","b"]');
    expect(formatMessage("%#v", [new Map([["a", 1]])])).toBe('Map {"a":1}');
    expect(formatMessage("%#v", [new Point(1)])).toBe('Point {"x":1}');
  });

  it("quotes with %q", () => {
    expect(formatMessage("%q", ['a"b'])).toBe('"a\\"b"');
  });

  it("renders numbers with %d", () => {
    expect(formatMessage("%d", [3n])).toBe("3");
    expect(formatMessage("%d", [1.5])).toBe("1.5");
  });

  it("renders errors and absent values with %v", () => {
    expect(formatMessage("%v", [new Error("boom")])).toBe("boom");
    expect(formatMessage("%v %v", [undefined, null])).toBe("undefined null");
  });

  it("escapes a doubled percent", () => {
    expect(formatMessage("100%%", [])).toBe("100%");
    expect(formatMessage("%d%%", [50])).toBe("50%");
  });

  it("leaves verbs without arguments in place", () => {
    expect(formatMessage("%s %s", ["only"])).toBe("only %s");
  });

  it("appends arguments without verbs", () => {
    expect(formatMessage("x", [1, "y"])).toBe("x 1 y");
  });

  it("renders symbols with %d", () => {
    expect(formatMessage("id %d", [Symbol("k")])).toBe("id Symbol(k)");
  });

  it("names values that throw while rendering", () => {
    const noisy = {
      get boom(): string {
        throw new Error("nope");
      },
    };
    expect(formatMessage("%v", [noisy])).toBe("[unprintable Object]");
    expect(formatMessage("%#v and %T", [noisy, noisy])).toBe("[unprintable Object] and Object");
    expect(formatMessage("x", [noisy])).toBe("x [unprintable Object]");
  });
});
