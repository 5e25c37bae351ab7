import { kindOf, lengthOf, ownEntries } from "./kinds.js";

/**
 * Whether a value equals the zero-initialised form of its type.
 *
 * Containers are zero when empty. Structs (class instances and other
 * objects) are zero when every own enumerable property is zero, which is
 * what a freshly constructed, never assigned instance looks like.
 */
export function isZeroValue(value: unknown): boolean {
  return isZeroAt(value, new WeakSet<object>());
}

function isZeroAt(value: unknown, seen: WeakSet<object>): boolean {
  switch (kindOf(value)) {
    case "absent":
      return true;
    case "boolean":
      return value === false;
    case "number":
      return value === 0;
    case "bigint":
      return value === 0n;
    case "text":
      return String(value) === "";
    case "symbol":
    case "function":
      return false;
    case "sequence":
    case "fixed-sequence":
    case "set":
    case "mapping":
      return lengthOf(value) === 0;
    case "boxed":
      return value instanceof Number ? value.valueOf() === 0 : value instanceof Boolean && !value.valueOf();
    case "date":
      return value instanceof Date && value.getTime() === 0;
    case "regexp":
      return value instanceof RegExp && value.source === "(?:)";
    case "error":
      return value instanceof Error && value.message === "";
    case "struct":
      break;
  }

  if (typeof value !== "object" || value === null) return false;
  // a self-referencing struct is not zero: the reference itself is a value
  if (seen.has(value)) return false;
  seen.add(value);
  return ownEntries(value).every(([, field]) => isZeroAt(field, seen));
}
