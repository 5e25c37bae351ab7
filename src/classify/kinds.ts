/**
 * Runtime kind of a value, independent of its static type
 */
export type ValueKind =
  | "absent"
  | "boolean"
  | "number"
  | "bigint"
  | "text"
  | "symbol"
  | "function"
  | "sequence"
  | "fixed-sequence"
  | "set"
  | "mapping"
  | "date"
  | "regexp"
  | "error"
  | "boxed"
  | "struct";

export type TypedArray =
  | Int8Array
  | Uint8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array
  | BigInt64Array
  | BigUint64Array;

export function isTypedArray(value: unknown): value is TypedArray {
  return ArrayBuffer.isView(value) && !(value instanceof DataView);
}

/**
 * Plain objects are records: their prototype is Object.prototype or null.
 * Class instances are structs, even when they carry no methods.
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function kindOf(value: unknown): ValueKind {
  if (value === null || value === undefined) return "absent";
  switch (typeof value) {
    case "boolean":
      return "boolean";
    case "number":
      return "number";
    case "bigint":
      return "bigint";
    case "string":
      return "text";
    case "symbol":
      return "symbol";
    case "function":
      return "function";
  }
  if (Array.isArray(value)) return "sequence";
  if (isTypedArray(value)) return "fixed-sequence";
  if (value instanceof Set) return "set";
  if (value instanceof Map || isPlainObject(value)) return "mapping";
  if (value instanceof String) return "text";
  if (value instanceof Number || value instanceof Boolean) return "boxed";
  if (value instanceof Date) return "date";
  if (value instanceof RegExp) return "regexp";
  if (value instanceof Error) return "error";
  return "struct";
}

/**
 * Whether a value is absent. Only null and undefined are: an empty array or
 * a zero is a value like any other.
 */
export function isNilLike(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

export function isTextKind(value: unknown): value is string | String {
  return kindOf(value) === "text";
}

export function isSequenceKind(
  value: unknown
): value is unknown[] | TypedArray | Set<unknown> {
  const kind = kindOf(value);
  return kind === "sequence" || kind === "fixed-sequence" || kind === "set";
}

export function isMappingKind(
  value: unknown
): value is Map<unknown, unknown> | Record<string, unknown> {
  return kindOf(value) === "mapping";
}

/**
 * Number of elements of a sequence, set or mapping; undefined for anything
 * else (including strings, which have a length but are not containers here)
 */
export function lengthOf(value: unknown): number | undefined {
  if (Array.isArray(value) || isTypedArray(value)) return value.length;
  if (value instanceof Set || value instanceof Map) return value.size;
  if (isPlainObject(value)) return Object.keys(value).length;
  return undefined;
}

/**
 * Own enumerable entries of an object, symbol keys included
 */
export function ownEntries(value: object): Array<[string | symbol, unknown]> {
  const keys: Array<string | symbol> = [
    ...Object.keys(value),
    ...Object.getOwnPropertySymbols(value).filter((sym) =>
      Object.prototype.propertyIsEnumerable.call(value, sym)
    ),
  ];
  return keys.map((key) => [key, Reflect.get(value, key)]);
}
