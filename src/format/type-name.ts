/**
 * Human-readable runtime type name: the primitive tag for primitives and
 * the constructor name for objects ("Array", "Map", a class name, ...)
 */
export function typeName(value: unknown): string {
  if (value === null) return "null";
  if (typeof value === "function") return "function";
  if (typeof value !== "object") return typeof value;

  const proto: unknown = Object.getPrototypeOf(value);
  if (typeof proto !== "object" || proto === null) return "Object";
  const ctor: unknown = Reflect.get(proto, "constructor");
  if (typeof ctor === "function" && ctor.name.length > 0) return ctor.name;
  return "Object";
}

/**
 * Comma-separated type names of a list of values
 */
export function typeNames(values: readonly unknown[]): string {
  if (values.length === 0) return "none";
  return values.map((v) => typeName(v)).join(",");
}
