import { describe, it, expect } from "vitest";
import { sameType, typeIdentity } from "./identity.js";

class Animal {}
class Dog extends Animal {}

describe("typeIdentity", () => {
  it("uses tags for primitives", () => {
    expect(typeIdentity(1)).toBe("number");
    expect(typeIdentity(null)).toBe("null");
    expect(typeIdentity(undefined)).toBe("undefined");
  });

  it("uses prototypes for objects", () => {
    expect(typeIdentity([])).toBe(Array.prototype);
    expect(typeIdentity(new Dog())).toBe(Dog.prototype);
    expect(typeIdentity(Object.create(null))).toBeNull();
  });
});

describe("sameType", () => {
  it("compares runtime types, not values", () => {
    expect(sameType(1, 2)).toBe(true);
    expect(sameType(1, 1n)).toBe(false);
    expect(sameType([1], [])).toBe(true);
    expect(sameType(new Dog(), new Dog())).toBe(true);
    expect(sameType(new Dog(), new Animal())).toBe(false);
    expect(sameType({}, new Map())).toBe(false);
    expect(sameType(null, undefined)).toBe(false);
  });
});
