import { isPlainObject, isTypedArray, kindOf, type TypedArray } from "../classify/kinds.js";

export type Conversion = { ok: true; value: unknown } | { ok: false };

interface TypedArrayFactory<T> {
  readonly name: string;
  readonly prototype: object;
  from(items: ArrayLike<T>): TypedArray;
}

const NOT_CONVERTIBLE: Conversion = { ok: false };

const NUMBER_ARRAYS: ReadonlyArray<TypedArrayFactory<number>> = [
  Int8Array,
  Uint8Array,
  Uint8ClampedArray,
  Int16Array,
  Uint16Array,
  Int32Array,
  Uint32Array,
  Float32Array,
  Float64Array,
];

const BIGINT_ARRAYS: ReadonlyArray<TypedArrayFactory<bigint>> = [BigInt64Array, BigUint64Array];

/**
 * Convert `value` to the runtime type of `target`, the way a typed language
 * converts between numeric widths or from a named type to its underlying
 * type. Anything that throws on the way is reported as not convertible.
 */
export function convertTo(target: unknown, value: unknown): Conversion {
  try {
    return convert(target, value);
  } catch {
    // e.g. BigInt(1.5) or a bigint element headed for a Float64Array
    return NOT_CONVERTIBLE;
  }
}

function convert(target: unknown, value: unknown): Conversion {
  switch (kindOf(target)) {
    case "number":
      if (typeof value === "bigint") return { ok: true, value: Number(value) };
      if (value instanceof Number) return { ok: true, value: value.valueOf() };
      return NOT_CONVERTIBLE;

    case "bigint":
      if (typeof value === "number") return { ok: true, value: BigInt(value) };
      if (value instanceof Number) return { ok: true, value: BigInt(value.valueOf()) };
      return NOT_CONVERTIBLE;

    case "text":
      if (target instanceof String) {
        return typeof value === "string" ? { ok: true, value: new String(value) } : NOT_CONVERTIBLE;
      }
      if (value instanceof String) return { ok: true, value: value.valueOf() };
      return NOT_CONVERTIBLE;

    case "boolean":
      if (value instanceof Boolean) return { ok: true, value: value.valueOf() };
      return NOT_CONVERTIBLE;

    case "boxed":
      if (target instanceof Number && (typeof value === "number" || typeof value === "bigint")) {
        return { ok: true, value: new Number(Number(value)) };
      }
      if (target instanceof Boolean && typeof value === "boolean") {
        return { ok: true, value: new Boolean(value) };
      }
      return NOT_CONVERTIBLE;

    case "sequence":
      if (isTypedArray(value)) return { ok: true, value: [...value] };
      if (value instanceof Set) return { ok: true, value: [...value] };
      return NOT_CONVERTIBLE;

    case "fixed-sequence":
      return convertToTypedArray(target, value);

    case "mapping":
      if (target instanceof Map && isPlainObject(value)) {
        return { ok: true, value: new Map(Object.entries(value)) };
      }
      if (isPlainObject(target) && value instanceof Map) {
        return { ok: true, value: Object.fromEntries(value) };
      }
      return NOT_CONVERTIBLE;

    default:
      return NOT_CONVERTIBLE;
  }
}

function elementsOf(value: unknown): unknown[] | undefined {
  if (Array.isArray(value)) return value;
  if (isTypedArray(value)) return [...value];
  return undefined;
}

function convertToTypedArray(target: unknown, value: unknown): Conversion {
  const elements = elementsOf(value);
  if (!elements) return NOT_CONVERTIBLE;

  const proto: unknown = Object.getPrototypeOf(target);
  const numberCtor = NUMBER_ARRAYS.find((ctor) => ctor.prototype === proto);
  if (numberCtor) {
    const numbers = elements.map((item) => {
      if (typeof item !== "number") {
        throw new TypeError(`cannot store ${typeof item} in ${numberCtor.name}`);
      }
      return item;
    });
    return { ok: true, value: numberCtor.from(numbers) };
  }

  const bigintCtor = BIGINT_ARRAYS.find((ctor) => ctor.prototype === proto);
  if (bigintCtor) {
    // BigInt() throws for fractional numbers
    const bigints = elements.map((item) =>
      typeof item === "bigint" ? item : BigInt(Number(item))
    );
    return { ok: true, value: bigintCtor.from(bigints) };
  }

  return NOT_CONVERTIBLE;
}
