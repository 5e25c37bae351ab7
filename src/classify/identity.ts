/**
 * Tag used for values that have no prototype to compare
 */
export type PrimitiveTypeTag =
  | "null"
  | "undefined"
  | "boolean"
  | "number"
  | "bigint"
  | "string"
  | "symbol"
  | "function";

export function primitiveTag(value: unknown): PrimitiveTypeTag | undefined {
  if (value === null) return "null";
  const tag = typeof value;
  return tag === "object" ? undefined : tag;
}

/**
 * Runtime type identity: the primitive tag for primitives, the prototype for
 * objects and functions. Two values have the same type iff their identities
 * are identical.
 */
export function typeIdentity(value: unknown): PrimitiveTypeTag | object | null {
  if (value === null || (typeof value !== "object" && typeof value !== "function")) {
    return primitiveTag(value) ?? null;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return typeof proto === "object" || typeof proto === "function" ? proto : null;
}

export function sameType(a: unknown, b: unknown): boolean {
  return typeIdentity(a) === typeIdentity(b);
}
