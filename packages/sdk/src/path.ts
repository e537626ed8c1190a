/**
 * Dot-path access into tree-shaped attribute values
 *
 * Only mappings are traversed. Writes never mutate their input: the container
 * chain is rebuilt from the leaf back to the root.
 */

import type { AttributeMap, AttributeValue } from "./types.js";
import { isMapping } from "./value.js";

/**
 * Split a dot path into segments ("a.b.c" → ["a", "b", "c"])
 */
export function splitPath(path: string): string[] {
  return path.split(".");
}

function hasKey(map: AttributeMap, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(map, key);
}

/**
 * Read the value at a path
 * @returns The value, or undefined when a segment is missing or an intermediate is not a mapping
 */
export function readPath(root: AttributeValue, segments: readonly string[]): AttributeValue | undefined {
  let node: AttributeValue = root;
  for (const segment of segments) {
    if (!isMapping(node) || !hasKey(node, segment)) {
      return undefined;
    }
    const next: AttributeValue | undefined = node[segment];
    if (next === undefined) return undefined;
    node = next;
  }
  return node;
}

/**
 * Return a copy of root with value set at the path.
 * Missing or non-mapping intermediates (and a non-mapping root) become new mappings.
 */
export function writePath(
  root: AttributeValue | null,
  segments: readonly string[],
  value: AttributeValue
): AttributeValue {
  const [head, ...rest] = segments;
  if (head === undefined) {
    return value;
  }

  const base: AttributeMap = isMapping(root) ? root : {};
  const child = rest.length > 0 ? writePath(base[head] ?? null, rest, value) : value;
  return { ...base, [head]: child };
}

/**
 * Return a copy of root with the leaf at the path removed.
 * @returns null when the path does not fully resolve to an existing key
 */
export function removePath(root: AttributeValue, segments: readonly string[]): AttributeMap | null {
  const [head, ...rest] = segments;
  if (head === undefined || !isMapping(root) || !hasKey(root, head)) {
    return null;
  }

  if (rest.length === 0) {
    const { [head]: _removed, ...remaining } = root;
    return remaining;
  }

  const child = root[head];
  if (child === undefined) return null;
  const updated = removePath(child, rest);
  return updated === null ? null : { ...root, [head]: updated };
}
