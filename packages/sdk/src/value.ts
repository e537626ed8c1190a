/**
 * Attribute value model: tags, guards and cast rules
 *
 * Cast rules per target (absent reads as `null`):
 *
 * | input      | int                  | float          | bool             | array        | string        |
 * |------------|----------------------|----------------|------------------|--------------|---------------|
 * | null       | 0                    | 0              | false            | []           | ""            |
 * | number     | truncated            | itself         | !== 0            | [v]          | String(v)     |
 * | boolean    | 1 / 0                | 1 / 0          | itself           | [v]          | "1" / ""      |
 * | string     | numeric prefix, trunc| numeric prefix | "" and "0" false | [v]          | itself        |
 * | sequence   | empty ? 0 : 1        | empty ? 0 : 1  | non-empty        | itself       | canonical JSON|
 * | mapping    | empty ? 0 : 1        | empty ? 0 : 1  | non-empty        | its values   | canonical JSON|
 */

import { canonicalJson } from "./format.js";
import type {
  AttributeContainer,
  AttributeMap,
  AttributeValue,
  CastKind,
  CastResult,
  Scalar,
  ValueTag,
} from "./types.js";

/**
 * Stored representation of an absent attribute
 */
export const ABSENT_SENTINEL = "";

/**
 * Leading numeric prefix: whitespace, sign, digits/fraction, exponent
 */
const NUMERIC_PREFIX = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;

/**
 * A complete decimal number with optional surrounding whitespace
 */
const NUMERIC_STRING = /^\s*[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?\s*$/;

export function isMapping(value: unknown): value is AttributeMap {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

export function isSequence(value: unknown): value is AttributeValue[] {
  return Array.isArray(value);
}

export function isContainer(value: unknown): value is AttributeContainer {
  return isSequence(value) || isMapping(value);
}

export function isScalar(value: unknown): value is Scalar {
  return (
    typeof value === "string" ||
    typeof value === "boolean" ||
    (typeof value === "number" && Number.isFinite(value))
  );
}

/**
 * Type guard for values inside the attribute value model
 */
export function isAttributeValue(value: unknown): value is AttributeValue {
  if (isScalar(value)) return true;
  if (isSequence(value)) return value.every(isAttributeValue);
  if (isMapping(value)) return Object.values(value).every(isAttributeValue);
  return false;
}

/**
 * Whether a raw read result means "no value"
 */
export function isAbsent(raw: AttributeValue | undefined | null): raw is undefined | null | "" {
  return raw === undefined || raw === null || raw === ABSENT_SENTINEL;
}

/**
 * Runtime tag of a value
 */
export function valueTag(value: AttributeValue): ValueTag {
  if (typeof value === "string") return "string";
  if (typeof value === "boolean") return "boolean";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "float";
  return Array.isArray(value) ? "sequence" : "mapping";
}

/**
 * Whether a value is a number or a string holding exactly one decimal number
 */
export function isNumeric(value: AttributeValue | null): value is number | string {
  if (typeof value === "number") return Number.isFinite(value);
  if (typeof value === "string") return NUMERIC_STRING.test(value);
  return false;
}

export function toFloat(value: AttributeValue | null): number {
  if (value === null) return 0;
  if (typeof value === "number") return Number.isFinite(value) ? value : 0;
  if (typeof value === "boolean") return value ? 1 : 0;
  if (typeof value === "string") {
    const match = NUMERIC_PREFIX.exec(value);
    return match ? Number(match[0]) : 0;
  }
  return containerSize(value) > 0 ? 1 : 0;
}

export function toInt(value: AttributeValue | null): number {
  const n = Math.trunc(toFloat(value));
  // Normalize -0 and overflow to plain integers
  return Number.isFinite(n) ? n + 0 : 0;
}

export function toBool(value: AttributeValue | null): boolean {
  if (value === null) return false;
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return value !== 0;
  if (typeof value === "string") return value !== "" && value !== "0";
  return containerSize(value) > 0;
}

export function toSequence(value: AttributeValue | null): AttributeValue[] {
  if (value === null) return [];
  if (isSequence(value)) return value;
  if (isMapping(value)) return Object.values(value);
  return [value];
}

export function toText(value: AttributeValue | null): string {
  if (value === null) return "";
  if (typeof value === "string") return value;
  if (typeof value === "boolean") return value ? "1" : "";
  if (typeof value === "number") return String(value);
  return canonicalJson(value);
}

function containerSize(value: AttributeContainer): number {
  return Array.isArray(value) ? value.length : Object.keys(value).length;
}

/**
 * Coerce a value to the requested cast kind
 */
export function castValue<K extends CastKind>(value: AttributeValue | null, kind: K): CastResult<K>;
export function castValue(value: AttributeValue | null, kind: CastKind): CastResult<CastKind> {
  switch (kind) {
    case "int":
    case "integer":
      return toInt(value);
    case "float":
    case "double":
      return toFloat(value);
    case "bool":
    case "boolean":
      return toBool(value);
    case "array":
    case "sequence":
      return toSequence(value);
    case "string":
      return toText(value);
  }
}
