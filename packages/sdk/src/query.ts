/**
 * Comparator parsing and in-process evaluation of value comparisons
 *
 * Semantics (shared with the SQLite adapter's SQL):
 * - eq/ne compare scalar text forms ("1" equals 1; booleans are "1"/"0");
 *   containers never equal a scalar operand
 * - gt/lt/ge/le: a numeric operand compares numeric values only, a string
 *   operand compares scalar text; containers never match
 * - like is an ASCII case-insensitive substring match on the text form
 */

import { canonicalJson } from "./format.js";
import type { AttributeValue, Comparator, ComparisonOp, Scalar } from "./types.js";

const COMPARATORS: Record<string, ComparisonOp> = {
  "=": "eq",
  "!=": "ne",
  "<>": "ne",
  ">": "gt",
  "<": "lt",
  ">=": "ge",
  "<=": "le",
  LIKE: "like",
};

/**
 * Map a comparator string onto the closed comparison set.
 * Unrecognized input falls back to equality.
 */
export function parseComparator(input: Comparator | string): ComparisonOp {
  return COMPARATORS[input.trim().toUpperCase()] ?? "eq";
}

/**
 * Whether parseComparator() recognizes the input rather than falling back
 */
export function isComparator(input: string): boolean {
  return Object.prototype.hasOwnProperty.call(COMPARATORS, input.trim().toUpperCase());
}

/**
 * Text form of a scalar as a relational store holds it
 */
export function scalarText(value: Scalar): string {
  if (typeof value === "boolean") return value ? "1" : "0";
  return String(value);
}

/**
 * Text form used for LIKE matching
 */
export function valueText(value: AttributeValue): string {
  return typeof value === "object" ? canonicalJson(value) : scalarText(value);
}

/**
 * Lowercase ASCII letters only, matching SQL LIKE case folding
 */
function foldAscii(text: string): string {
  return text.replace(/[A-Z]/g, (c) => c.toLowerCase());
}

function ordered(cmp: number, op: "gt" | "lt" | "ge" | "le"): boolean {
  switch (op) {
    case "gt":
      return cmp > 0;
    case "lt":
      return cmp < 0;
    case "ge":
      return cmp >= 0;
    case "le":
      return cmp <= 0;
  }
}

/**
 * Test a stored value against an operand
 */
export function matchesComparison(stored: AttributeValue, operand: Scalar, op: ComparisonOp): boolean {
  const isContainer = typeof stored === "object";

  switch (op) {
    case "eq":
      return !isContainer && scalarText(stored) === scalarText(operand);
    case "ne":
      return isContainer || scalarText(stored) !== scalarText(operand);
    case "like":
      return foldAscii(valueText(stored)).includes(foldAscii(scalarText(operand)));
    case "gt":
    case "lt":
    case "ge":
    case "le": {
      if (isContainer) return false;
      if (typeof operand === "number") {
        if (typeof stored !== "number") return false;
        return ordered(stored - operand, op);
      }
      const left = scalarText(stored);
      const right = scalarText(operand);
      return ordered(left === right ? 0 : left < right ? -1 : 1, op);
    }
  }
}
