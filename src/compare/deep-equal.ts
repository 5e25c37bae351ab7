import { isTypedArray, ownEntries } from "../classify/kinds.js";
import { sameType } from "../classify/identity.js";

type SeenPairs = Map<object, Set<object>>;

/**
 * Deep structural equality: both values must have the same runtime type and
 * recursively equal contents. Identity is never required, except for
 * functions and symbols.
 */
export function deepEqual(a: unknown, b: unknown): boolean {
  return equalAt(a, b, new Map());
}

function equalAt(a: unknown, b: unknown, seen: SeenPairs): boolean {
  if (a === b) return true;
  if (typeof a === "number" && typeof b === "number") {
    return Number.isNaN(a) && Number.isNaN(b);
  }
  if (typeof a !== "object" || a === null || typeof b !== "object" || b === null) {
    return false;
  }
  if (!sameType(a, b)) return false;

  // a pair still on the recursion stack is assumed equal; any real
  // difference shows up elsewhere in the walk. Pairs leave the stack once
  // their comparison returns.
  const partners = seen.get(a) ?? new Set<object>();
  if (partners.has(b)) return true;
  seen.set(a, partners);
  partners.add(b);
  try {
    return equalObjects(a, b, seen);
  } finally {
    partners.delete(b);
    if (partners.size === 0) seen.delete(a);
  }
}

function equalObjects(a: object, b: object, seen: SeenPairs): boolean {
  if (a instanceof Date && b instanceof Date) {
    return equalAt(a.getTime(), b.getTime(), seen);
  }
  if (a instanceof RegExp && b instanceof RegExp) {
    return a.source === b.source && a.flags === b.flags;
  }
  if (
    (a instanceof Number && b instanceof Number) ||
    (a instanceof String && b instanceof String) ||
    (a instanceof Boolean && b instanceof Boolean)
  ) {
    return equalAt(a.valueOf(), b.valueOf(), seen);
  }
  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!equalAt(a[i], b[i], seen)) return false;
    }
    return true;
  }
  if (isTypedArray(a) && isTypedArray(b)) {
    if (a.length !== b.length) return false;
    for (let i = 0; i < a.length; i++) {
      if (!equalAt(a[i], b[i], seen)) return false;
    }
    return true;
  }
  if (a instanceof Map && b instanceof Map) {
    if (a.size !== b.size) return false;
    for (const [key, value] of a) {
      if (!b.has(key) || !equalAt(value, b.get(key), seen)) return false;
    }
    return true;
  }
  if (a instanceof Set && b instanceof Set) {
    if (a.size !== b.size) return false;
    for (const item of a) {
      if (b.has(item)) continue;
      let found = false;
      for (const candidate of b) {
        if (equalAt(item, candidate, seen)) {
          found = true;
          break;
        }
      }
      if (!found) return false;
    }
    return true;
  }
  if (a instanceof Error && b instanceof Error) {
    if (a.name !== b.name || a.message !== b.message) return false;
  }

  return equalEntries(a, b, seen);
}

function equalEntries(a: object, b: object, seen: SeenPairs): boolean {
  const entriesA = ownEntries(a);
  const entriesB = ownEntries(b);
  if (entriesA.length !== entriesB.length) return false;
  for (const [key, value] of entriesA) {
    if (!Object.prototype.propertyIsEnumerable.call(b, key)) return false;
    if (!equalAt(value, Reflect.get(b, key), seen)) return false;
  }
  return true;
}
