import { isPlainObject } from "../classify/kinds.js";
import { toCanonical } from "./canonical.js";
import { typeName } from "./type-name.js";

/**
 * Render a value for a failure message (%v): strings as-is, errors by their
 * message, containers and objects as canonical JSON
 */
export function stringify(value: unknown): string {
  if (typeof value === "string") {
    return value;
  }
  if (value === null) {
    return "null";
  }
  if (value === undefined) {
    return "undefined";
  }
  if (typeof value === "number" || typeof value === "boolean" || typeof value === "bigint") {
    return String(value);
  }
  if (value instanceof Error) {
    return value.message;
  }
  const canonical = toCanonical(value);
  return typeof canonical === "string" ? canonical : JSON.stringify(canonical);
}

/**
 * Render a value as it would be written in source (%#v): strings quoted,
 * bigints suffixed, non-plain objects prefixed with their type name
 */
export function quote(value: unknown): string {
  if (typeof value === "string") {
    return JSON.stringify(value);
  }
  if (typeof value === "bigint") {
    return `${value}n`;
  }
  if (value === null || value === undefined || typeof value !== "object") {
    return stringify(value);
  }
  const json = JSON.stringify(toCanonical(value));
  if (Array.isArray(value) || isPlainObject(value)) {
    return json;
  }
  return `${typeName(value)} ${json}`;
}
