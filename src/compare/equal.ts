import { isNilLike } from "../classify/kinds.js";
import { isEqualityHook, isLegacyEqualityHook } from "../types/hook.js";
import { convertTo } from "./convert.js";
import { deepEqual } from "./deep-equal.js";

/**
 * Library-wide equality.
 *
 * 1. Absent values are only equal to absent values.
 * 2. A left operand implementing the equality hook decides on its own;
 *    the right operand's hook is never consulted.
 * 3. Otherwise deep structural equality.
 * 4. Failing that, the right operand is converted to the left operand's
 *    type (1n against 1, a String object against a string, ...) and compared
 *    again. An impossible conversion is simply "not equal".
 */
export function isEqual(a: unknown, b: unknown): boolean {
  if (isNilLike(a) || isNilLike(b)) {
    return isNilLike(a) && isNilLike(b);
  }

  if (isEqualityHook(a)) {
    return a.isEqual(b);
  }
  if (isLegacyEqualityHook(a)) {
    return a.equals(b);
  }

  if (deepEqual(a, b)) {
    return true;
  }

  const converted = convertTo(a, b);
  return converted.ok && deepEqual(a, converted.value);
}

/**
 * Index of the first candidate equal to `value`, or -1
 */
export function indexOfEqual(value: unknown, candidates: Iterable<unknown>): number {
  let index = 0;
  for (const candidate of candidates) {
    if (isEqual(value, candidate)) return index;
    index++;
  }
  return -1;
}
