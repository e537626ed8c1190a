/**
 * In-process reference backing store
 * Layout: type → entity id → key → value. Values are cloned on the way in and out.
 */

import type { AttributeValue, BackingStore, ComparisonOp, Scalar } from "../types.js";
import { matchesComparison } from "../query.js";
import { assertEntityType } from "../validation.js";

export interface MemoryBackendOptions {
  /** Closed set of entity types (any valid name when omitted) */
  entityTypes?: readonly string[];
}

export class MemoryBackend implements BackingStore {
  #tables = new Map<string, Map<number, Map<string, AttributeValue>>>();
  #entityTypes?: readonly string[];

  constructor(options: MemoryBackendOptions = {}) {
    this.#entityTypes = options.entityTypes;
  }

  #table(type: string): Map<number, Map<string, AttributeValue>> {
    assertEntityType(type, this.#entityTypes);
    let table = this.#tables.get(type);
    if (!table) {
      table = new Map();
      this.#tables.set(type, table);
    }
    return table;
  }

  async get(type: string, id: number, key: string): Promise<AttributeValue | undefined> {
    const value = this.#table(type).get(id)?.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  async getValues(type: string, id: number, key: string): Promise<AttributeValue[]> {
    const value = await this.get(type, id, key);
    return value === undefined ? [] : [value];
  }

  async getAll(type: string, id: number): Promise<Map<string, AttributeValue[]>> {
    const result = new Map<string, AttributeValue[]>();
    const row = this.#table(type).get(id);
    if (row) {
      for (const [key, value] of row) {
        result.set(key, [structuredClone(value)]);
      }
    }
    return result;
  }

  async set(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    const table = this.#table(type);
    let row = table.get(id);
    if (!row) {
      row = new Map();
      table.set(id, row);
    }
    row.set(key, structuredClone(value));
    return true;
  }

  async delete(type: string, id: number, key: string): Promise<boolean> {
    const table = this.#table(type);
    const row = table.get(id);
    if (!row || !row.delete(key)) {
      return false;
    }
    if (row.size === 0) {
      table.delete(id);
    }
    return true;
  }

  async distinctKeysByPrefix(type: string, prefix: string): Promise<string[]> {
    const keys = new Set<string>();
    for (const row of this.#table(type).values()) {
      for (const key of row.keys()) {
        if (key.startsWith(prefix)) keys.add(key);
      }
    }
    return [...keys].sort();
  }

  async deleteRowsByKey(type: string, key: string): Promise<number> {
    const table = this.#table(type);
    let count = 0;
    for (const [id, row] of table) {
      if (row.delete(key)) {
        count++;
        if (row.size === 0) table.delete(id);
      }
    }
    return count;
  }

  async findIds(type: string, key: string, operand: Scalar, op: ComparisonOp): Promise<number[]> {
    const ids: number[] = [];
    for (const [id, row] of this.#table(type)) {
      const value = row.get(key);
      if (value !== undefined && matchesComparison(value, operand, op)) {
        ids.push(id);
      }
    }
    return ids.sort((a, b) => a - b);
  }

  async close(): Promise<void> {
    this.#tables.clear();
  }
}
