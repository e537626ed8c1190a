/**
 * Multi-key and multi-entity operations
 *
 * Composed from accessor calls, plus three backend queries that have no
 * per-entity equivalent (prefix key listing, prefix deletion, value search).
 * A failure on one item never aborts the rest of a bulk operation.
 */

import type {
  AttributeAccessor,
  AttributeStats,
  AttributeValue,
  BackingStore,
  BulkCoordinator,
  Comparator,
  EngineOptions,
  Scalar,
  SyncDirection,
  ValueComparison,
} from "./types.js";
import { errorMessage, isContractViolation } from "./errors.js";
import { byteSize, canonicalJson, valuesEqual } from "./format.js";
import { logger } from "./observability/logs.js";
import { isComparator, parseComparator } from "./query.js";
import { isAbsent, isAttributeValue, isContainer, isNumeric, isScalar, toFloat } from "./value.js";
import { assertEntityType, isValidEntityId } from "./validation.js";

type KeyedValues = Map<string, AttributeValue> | Record<string, AttributeValue>;

function entriesOf(values: KeyedValues): Array<[string, AttributeValue]> {
  return values instanceof Map ? [...values] : Object.entries(values);
}

class Coordinator implements BulkCoordinator {
  #attributes: AttributeAccessor;
  #backend: BackingStore;
  #options: EngineOptions;

  constructor(attributes: AttributeAccessor, backend: BackingStore, options: EngineOptions) {
    this.#attributes = attributes;
    this.#backend = backend;
    this.#options = options;
  }

  #checkType(type: string): void {
    assertEntityType(type, this.#options.entityTypes);
  }

  /**
   * Run one item's read; an adapter failure is logged and reads as absent
   */
  async #readItem<T>(type: string, id: number, key: string, read: () => Promise<T | null>): Promise<T | null> {
    try {
      return await read();
    } catch (err) {
      if (isContractViolation(err)) throw err;
      logger.error("bulk.read.failed", { type, key, message: errorMessage(err), details: { id } });
      return null;
    }
  }

  #getOne(type: string, id: number, key: string): Promise<AttributeValue | null> {
    return this.#readItem(type, id, key, () => this.#attributes.get(type, id, key));
  }

  getMany(type: string, id: number, keys: string[], single?: true): Promise<Map<string, AttributeValue>>;
  getMany(type: string, id: number, keys: string[], single: false): Promise<Map<string, AttributeValue[]>>;
  async getMany(
    type: string,
    id: number,
    keys: string[],
    single = true
  ): Promise<Map<string, AttributeValue> | Map<string, AttributeValue[]>> {
    if (single) {
      const result = new Map<string, AttributeValue>();
      for (const key of keys) {
        const value = await this.#getOne(type, id, key);
        if (value !== null) result.set(key, value);
      }
      return result;
    }

    const result = new Map<string, AttributeValue[]>();
    for (const key of keys) {
      const values = await this.#readItem(type, id, key, () => this.#attributes.get(type, id, key, false));
      if (values !== null) result.set(key, values);
    }
    return result;
  }

  async getAll(type: string, id: number): Promise<Map<string, AttributeValue[]>> {
    this.#checkType(type);
    if (!isValidEntityId(id)) return new Map();
    return this.#backend.getAll(type, id);
  }

  async updateMany(type: string, id: number, values: KeyedValues, skipUnchanged = true): Promise<string[]> {
    const written: string[] = [];
    for (const [key, value] of entriesOf(values)) {
      const ok = skipUnchanged
        ? await this.#attributes.updateIfChanged(type, id, key, value)
        : await this.#attributes.update(type, id, key, value);
      if (ok) written.push(key);
    }
    return written;
  }

  async deleteMany(type: string, id: number, keys: string[]): Promise<number> {
    let count = 0;
    for (const key of keys) {
      if (await this.#attributes.delete(type, id, key)) count++;
    }
    return count;
  }

  async backup(type: string, id: number, keys: string[]): Promise<Map<string, AttributeValue>> {
    return this.getMany(type, id, keys);
  }

  async restore(type: string, id: number, backup: KeyedValues): Promise<string[]> {
    return this.updateMany(type, id, backup, false);
  }

  getByPrefix(type: string, id: number, prefix: string, withValues?: true): Promise<Map<string, AttributeValue>>;
  getByPrefix(type: string, id: number, prefix: string, withValues: false): Promise<string[]>;
  async getByPrefix(
    type: string,
    id: number,
    prefix: string,
    withValues = true
  ): Promise<Map<string, AttributeValue> | string[]> {
    const all = await this.getAll(type, id);
    const keys = [...all.keys()].filter((key) => key.startsWith(prefix));
    if (!withValues) return keys;

    const matched = new Map<string, AttributeValue>();
    for (const key of keys) {
      const first = all.get(key)?.[0];
      if (first !== undefined && !isAbsent(first)) matched.set(key, first);
    }
    return matched;
  }

  async deleteByPrefix(type: string, prefix: string): Promise<number> {
    this.#checkType(type);
    if (prefix === "") {
      logger.warn("bulk.prefix.rejected", { type, message: "empty prefix would match every key" });
      return 0;
    }

    let keys: string[];
    try {
      keys = await this.#backend.distinctKeysByPrefix(type, prefix);
    } catch (err) {
      if (isContractViolation(err)) throw err;
      logger.error("bulk.prefix.failed", { type, message: errorMessage(err), details: { prefix } });
      return 0;
    }

    let count = 0;
    for (const key of keys) {
      try {
        count += await this.#backend.deleteRowsByKey(type, key);
      } catch (err) {
        if (isContractViolation(err)) throw err;
        logger.error("bulk.prefix.failed", { type, key, message: errorMessage(err) });
      }
    }

    logger.info("bulk.prefix.delete", { type, details: { prefix, keys: keys.length, rows: count } });
    return count;
  }

  async bulkGet(type: string, ids: number[], key: string): Promise<Map<number, AttributeValue>> {
    const result = new Map<number, AttributeValue>();
    for (const id of ids) {
      const value = await this.#getOne(type, id, key);
      if (value !== null) result.set(id, value);
    }
    return result;
  }

  async bulkUpdate(
    type: string,
    ids: number[],
    key: string,
    value: AttributeValue
  ): Promise<Map<number, boolean>> {
    const result = new Map<number, boolean>();
    for (const id of ids) {
      result.set(id, await this.#attributes.update(type, id, key, value));
    }
    return result;
  }

  async bulkDelete(type: string, ids: number[], key: string): Promise<Map<number, boolean>> {
    const result = new Map<number, boolean>();
    for (const id of ids) {
      result.set(id, await this.#attributes.delete(type, id, key));
    }
    return result;
  }

  async findObjectsByValue(
    type: string,
    key: string,
    value: Scalar,
    comparator: Comparator | string = "="
  ): Promise<number[]> {
    this.#checkType(type);
    if (key === "" || !isScalar(value)) return [];

    const op = parseComparator(comparator);
    if (!isComparator(comparator)) {
      logger.warn("bulk.find.comparator", {
        type,
        key,
        message: 'unknown comparator, using "="',
        details: { comparator },
      });
    }
    try {
      return await this.#backend.findIds(type, key, value, op);
    } catch (err) {
      if (isContractViolation(err)) throw err;
      logger.error("bulk.find.failed", { type, key, message: errorMessage(err), details: { op } });
      return [];
    }
  }

  async findLarge(type: string, id: number, sizeLimit?: number): Promise<Map<string, number>> {
    const limit = sizeLimit ?? this.#options.largeValueLimit;
    const large = new Map<string, number>();
    for (const [key, values] of await this.getAll(type, id)) {
      const first = values[0];
      if (first === undefined || isAbsent(first)) continue;
      const size = byteSize(first, this.#options.serialize);
      if (size > limit) large.set(key, size);
    }
    return large;
  }

  async compareValues(type: string, ids: number[], key: string): Promise<ValueComparison> {
    const report: ValueComparison = {
      valueCounts: new Map(),
      containerCounts: new Map(),
      objectsWithMeta: 0,
      objectsWithoutMeta: 0,
      values: new Map(),
      uniqueValues: [],
    };

    for (const id of ids) {
      const value = await this.#getOne(type, id, key);
      if (value === null) {
        report.objectsWithoutMeta++;
        continue;
      }

      report.objectsWithMeta++;
      report.values.set(id, value);

      if (isContainer(value)) {
        const bucket = canonicalJson(value);
        report.containerCounts.set(bucket, (report.containerCounts.get(bucket) ?? 0) + 1);
      } else {
        report.valueCounts.set(value, (report.valueCounts.get(value) ?? 0) + 1);
      }

      if (!report.uniqueValues.some((seen) => valuesEqual(seen, value))) {
        report.uniqueValues.push(value);
      }
    }

    return report;
  }

  async getStats(type: string, ids: number[], key: string): Promise<AttributeStats> {
    let numericValues = 0;
    let min = Infinity;
    let max = -Infinity;
    let sum = 0;
    for (const id of ids) {
      const value = await this.#getOne(type, id, key);
      if (!isNumeric(value)) continue;
      const n = toFloat(value);
      numericValues++;
      sum += n;
      if (n < min) min = n;
      if (n > max) max = n;
    }

    if (numericValues === 0) {
      return { count: ids.length, numericValues: 0, min: null, max: null, average: null, sum: null };
    }

    return { count: ids.length, numericValues, min, max, average: sum / numericValues, sum };
  }

  async syncObject(
    type: string,
    id: number,
    target: Record<string, unknown>,
    fieldMap: Record<string, string>,
    direction: SyncDirection = "toMeta"
  ): Promise<boolean> {
    this.#checkType(type);
    const fields = Object.entries(fieldMap);
    if (!isValidEntityId(id) || fields.length === 0) return false;

    let success = true;
    for (const [property, key] of fields) {
      if (direction === "toMeta" || direction === "both") {
        if (Object.prototype.hasOwnProperty.call(target, property)) {
          const value = target[property];
          if (!isAttributeValue(value) || !(await this.#attributes.update(type, id, key, value))) {
            success = false;
          }
        }
      }

      if (direction === "fromMeta" || direction === "both") {
        const value = await this.#attributes.get(type, id, key);
        if (value !== null) target[property] = value;
      }
    }

    return success;
  }
}

/**
 * Create a bulk coordinator over an accessor and its backing store
 */
export function createCoordinator(
  attributes: AttributeAccessor,
  backend: BackingStore,
  options: EngineOptions
): BulkCoordinator {
  return new Coordinator(attributes, backend, options);
}
