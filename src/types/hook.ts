/**
 * Opt-in equality for values whose structure is not the right thing to
 * compare, e.g. a class holding a Date that should compare by instant.
 *
 * Only the left-hand operand's hook is consulted.
 */
export interface EqualityHook {
  isEqual(other: unknown): boolean;
}

/**
 * Older spelling of the equality hook.
 *
 * @deprecated implement {@link EqualityHook} instead
 */
export interface LegacyEqualityHook {
  equals(other: unknown): boolean;
}

function hasMethod(value: unknown, name: string): boolean {
  if (typeof value !== "object" && typeof value !== "function") return false;
  if (value === null) return false;
  return typeof Reflect.get(value, name) === "function";
}

export function isEqualityHook(value: unknown): value is EqualityHook {
  return hasMethod(value, "isEqual");
}

export function isLegacyEqualityHook(value: unknown): value is LegacyEqualityHook {
  return hasMethod(value, "equals");
}
