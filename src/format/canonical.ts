import { isTypedArray, ownEntries } from "../classify/kinds.js";

export type Json = null | boolean | number | string | Json[] | { [key: string]: Json };

const CIRCULAR = "[Circular]";

/**
 * Encode any value into a JSON-safe interchange form that no longer carries
 * type identity: Maps become objects, Sets and typed arrays become arrays,
 * bigints become decimal strings. Object keys are sorted so equal content
 * always encodes the same way.
 */
export function toCanonical(value: unknown): Json {
  return encode(value, new Set<object>());
}

function encode(value: unknown, ancestors: Set<object>): Json {
  switch (typeof value) {
    case "undefined":
      return null;
    case "boolean":
    case "string":
      return value;
    case "number":
      return Number.isFinite(value) ? value : String(value);
    case "bigint":
      return value.toString();
    case "symbol":
      return value.toString();
    case "function":
      return `[Function ${value.name || "anonymous"}]`;
  }
  if (typeof value !== "object" || value === null) return null;

  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? "Invalid Date" : value.toISOString();
  }
  if (value instanceof RegExp) return value.toString();
  if (value instanceof Error) return `${value.name}: ${value.message}`;
  if (value instanceof String || value instanceof Number || value instanceof Boolean) {
    return encode(value.valueOf(), ancestors);
  }

  if (ancestors.has(value)) return CIRCULAR;
  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map((item: unknown) => encode(item, ancestors));
    }
    if (isTypedArray(value)) {
      const items: Json[] = [];
      for (let i = 0; i < value.length; i++) {
        items.push(encode(value[i], ancestors));
      }
      return items;
    }
    if (value instanceof Set) {
      return Array.from(value, (item: unknown) => encode(item, ancestors));
    }
    if (value instanceof Map) {
      const entries: Array<[string, Json]> = [];
      for (const [key, item] of value) {
        const encodedKey = typeof key === "string" ? key : JSON.stringify(encode(key, ancestors));
        entries.push([encodedKey, encode(item, ancestors)]);
      }
      return sortedObject(entries);
    }
    const entries: Array<[string, Json]> = [];
    for (const [key, item] of ownEntries(value)) {
      if (typeof key === "symbol") continue;
      entries.push([key, encode(item, ancestors)]);
    }
    return sortedObject(entries);
  } finally {
    ancestors.delete(value);
  }
}

function sortedObject(entries: Array<[string, Json]>): { [key: string]: Json } {
  const out: { [key: string]: Json } = {};
  for (const [key, item] of entries.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
    out[key] = item;
  }
  return out;
}
