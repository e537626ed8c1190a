/**
 * Validation utilities for entity references and attribute keys
 */

import { InvalidEntityTypeError, UnknownEntityTypeError } from "./errors.js";

/**
 * Valid entity type names: lowercase letter first, then lowercase letters, digits, underscore.
 * Safe as a directory name and as part of a SQL table name.
 */
export const ENTITY_TYPE_PATTERN = /^[a-z][a-z0-9_]*$/;

/**
 * Validate an entity type name
 * @throws InvalidEntityTypeError if empty or malformed
 */
export function validateEntityType(type: string): void {
  if (!type) {
    throw new InvalidEntityTypeError(type, "must be a non-empty string");
  }

  if (!ENTITY_TYPE_PATTERN.test(type)) {
    throw new InvalidEntityTypeError(
      type,
      "only lowercase letters, digits and underscore are allowed, starting with a letter"
    );
  }
}

/**
 * Validate an entity type against an optional closed set
 * @throws InvalidEntityTypeError if malformed
 * @throws UnknownEntityTypeError if outside the configured set
 */
export function assertEntityType(type: string, allowed?: readonly string[]): void {
  validateEntityType(type);
  if (allowed && !allowed.includes(type)) {
    throw new UnknownEntityTypeError(type);
  }
}

/**
 * Whether an entity id identifies a record (positive safe integer)
 */
export function isValidEntityId(id: number): boolean {
  return Number.isSafeInteger(id) && id > 0;
}

/**
 * Whether an attribute key is usable (non-empty string)
 */
export function isValidAttributeKey(key: string): boolean {
  return typeof key === "string" && key.length > 0;
}

/**
 * Parse a document file name ("42.json") into an entity id
 * @returns The id, or null when the name is not a positive integer id
 */
export function parseEntityIdFromFile(fileName: string, extension = ".json"): number | null {
  if (!fileName.endsWith(extension)) return null;
  const stem = fileName.slice(0, -extension.length);
  if (!/^[1-9]\d*$/.test(stem)) return null;
  const id = Number(stem);
  return isValidEntityId(id) ? id : null;
}
