/**
 * Deterministic JSON formatting and structural equality for attribute values
 *
 * Invariants:
 * - Pure functions: same input always produces same output
 * - No mutation of input values
 * - Object keys are ordered by Unicode code point
 */

import type { AttributeValue, SizeSerializer } from "./types.js";

const compareKeys = (a: string, b: string): number => {
  if (a === b) return 0;
  return a < b ? -1 : 1;
};

/**
 * Recursively copy a value with sorted object keys
 * @throws Error if circular references detected
 */
function normalize(input: unknown): unknown {
  const seen = new WeakSet<object>();

  const walk = (value: unknown): unknown => {
    if (value === null || typeof value !== "object") {
      return value;
    }

    if (seen.has(value)) {
      throw new Error("Circular reference detected in object");
    }
    seen.add(value);

    try {
      if (Array.isArray(value)) {
        return value.map(walk);
      }

      const out: Record<string, unknown> = {};
      const entries: Array<[string, unknown]> = Object.entries(value);
      entries.sort(([a], [b]) => compareKeys(a, b));
      for (const [key, entry] of entries) {
        out[key] = walk(entry);
      }
      return out;
    } finally {
      seen.delete(value);
    }
  };

  return walk(input);
}

/**
 * Stable, deterministic JSON stringification with a trailing newline
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 */
export function stableStringify(value: unknown, indent = 2): string {
  return JSON.stringify(normalize(value), null, indent) + "\n";
}

/**
 * Compact canonical JSON: sorted keys, no whitespace, no trailing newline.
 * Structurally equal values always produce the same string.
 */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(normalize(value));
}

/**
 * Safe JSON parsing with structured error information
 */
export function safeParseJson(
  raw: string
): { success: true; data: unknown } | { success: false; error: string } {
  try {
    const data: unknown = JSON.parse(raw);
    return { success: true, data };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    return { success: false, error: message };
  }
}

/**
 * Strict structural equality.
 *
 * Scalars compare with `===` ("1" !== 1), sequences element-wise in order,
 * mappings by key set and per-key value with key order ignored.
 */
export function valuesEqual(a: AttributeValue, b: AttributeValue): boolean {
  if (a === b) return true;
  if (typeof a !== "object" || typeof b !== "object") return false;

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) return false;
    return a.every((item, i) => {
      const other = b[i];
      return other !== undefined && valuesEqual(item, other);
    });
  }

  const aKeys = Object.keys(a);
  if (aKeys.length !== Object.keys(b).length) return false;
  return aKeys.every((key) => {
    const left = a[key];
    const right = b[key];
    return (
      left !== undefined &&
      right !== undefined &&
      Object.prototype.hasOwnProperty.call(b, key) &&
      valuesEqual(left, right)
    );
  });
}

/**
 * Default size serializer: strings as-is, everything else canonical JSON
 */
export const defaultSerializer: SizeSerializer = (value) =>
  typeof value === "string" ? value : canonicalJson(value);

/**
 * UTF-8 byte length of a value's serialized form
 */
export function byteSize(value: AttributeValue, serialize: SizeSerializer = defaultSerializer): number {
  return Buffer.byteLength(serialize(value), "utf8");
}
