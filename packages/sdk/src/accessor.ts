/**
 * Single-entity, single-key attribute operations
 *
 * Every method validates the entity type first and throws on a contract
 * violation. Invalid ids and empty keys read as absent and fail writes.
 * Adapter failures during writes are logged and reported as `false`;
 * failures during plain reads propagate.
 */

import type {
  AttributeAccessor,
  AttributeContainer,
  AttributeValue,
  BackingStore,
  CastKind,
  CastResult,
  EngineOptions,
  ValueTag,
} from "./types.js";
import { errorMessage, isContractViolation } from "./errors.js";
import { byteSize, safeParseJson, valuesEqual } from "./format.js";
import { MetricsCollector, type CounterName } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";
import { readPath, removePath, splitPath, writePath } from "./path.js";
import {
  ABSENT_SENTINEL,
  castValue,
  isAbsent,
  isAttributeValue,
  isContainer,
  isMapping,
  isSequence,
  toBool,
  toInt,
  valueTag,
} from "./value.js";
import { assertEntityType, isValidAttributeKey, isValidEntityId } from "./validation.js";

interface FailureKind {
  event: string;
  counter: CounterName;
}

const WRITE_FAILURE: FailureKind = { event: "attr.write.failed", counter: "failedWrites" };
const DELETE_FAILURE: FailureKind = { event: "attr.delete.failed", counter: "failedDeletes" };

class Accessor implements AttributeAccessor {
  #backend: BackingStore;
  #options: EngineOptions;
  #metrics: MetricsCollector;

  constructor(backend: BackingStore, options: EngineOptions, metrics: MetricsCollector) {
    this.#backend = backend;
    this.#options = options;
    this.#metrics = metrics;
  }

  #checkType(type: string): void {
    assertEntityType(type, this.#options.entityTypes);
  }

  #isValidRef(id: number, key: string): boolean {
    return isValidEntityId(id) && isValidAttributeKey(key);
  }

  /**
   * Read one value, normalizing absence (missing row or sentinel) to null
   */
  async #read(type: string, id: number, key: string): Promise<AttributeValue | null> {
    this.#checkType(type);
    if (!this.#isValidRef(id, key)) return null;

    this.#metrics.increment(type, "reads");
    const raw = await this.#metrics.time("get", () => this.#backend.get(type, id, key));
    return isAbsent(raw) ? null : raw;
  }

  /**
   * Upsert through the backend; a rejected write counts as failed
   */
  async #set(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    const ok = await this.#metrics.time("set", () => this.#backend.set(type, id, key, value));
    this.#metrics.increment(type, ok ? "writes" : "failedWrites");
    return ok;
  }

  /**
   * Run a mutating operation, converting adapter failures into `failure`
   */
  async #guard<T>(
    operation: string,
    type: string,
    id: number,
    key: string,
    failure: T,
    fn: () => Promise<T>,
    kind: FailureKind = WRITE_FAILURE
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isContractViolation(err)) throw err;
      this.#metrics.increment(type, kind.counter);
      logger.error(kind.event, {
        type,
        key,
        message: errorMessage(err),
        details: { id, operation },
      });
      return failure;
    }
  }

  /**
   * Common preamble for writes: type check, reference check, value check
   */
  #canWrite(type: string, id: number, key: string, value?: unknown): boolean {
    this.#checkType(type);
    if (!this.#isValidRef(id, key)) return false;
    if (value !== undefined && !isAttributeValue(value)) {
      logger.warn("attr.value.rejected", { type, key, message: "value is outside the attribute value model" });
      return false;
    }
    return true;
  }

  async exists(type: string, id: number, key: string): Promise<boolean> {
    return (await this.#read(type, id, key)) !== null;
  }

  get(type: string, id: number, key: string, single?: true): Promise<AttributeValue | null>;
  get(type: string, id: number, key: string, single: false): Promise<AttributeValue[] | null>;
  async get(
    type: string,
    id: number,
    key: string,
    single = true
  ): Promise<AttributeValue | AttributeValue[] | null> {
    if (single) {
      return this.#read(type, id, key);
    }

    this.#checkType(type);
    if (!this.#isValidRef(id, key)) return null;
    this.#metrics.increment(type, "reads");
    const values = await this.#metrics.time("getValues", () => this.#backend.getValues(type, id, key));
    const present = values.filter((value) => !isAbsent(value));
    return present.length > 0 ? present : null;
  }

  async getWithDefault<D>(type: string, id: number, key: string, fallback: D): Promise<AttributeValue | D> {
    return (await this.#read(type, id, key)) ?? fallback;
  }

  async getCast<K extends CastKind>(
    type: string,
    id: number,
    key: string,
    kind: K,
    fallback?: AttributeValue
  ): Promise<CastResult<K>> {
    const value = await this.#read(type, id, key);
    if (value === null && fallback !== undefined) {
      return castValue(fallback, kind);
    }
    return castValue(value, kind);
  }

  async update(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    if (!this.#canWrite(type, id, key, value)) return false;
    return this.#guard("update", type, id, key, false, () => this.#set(type, id, key, value));
  }

  async updateIfChanged(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    if (!this.#canWrite(type, id, key, value)) return false;
    return this.#guard("updateIfChanged", type, id, key, false, async () => {
      const current = (await this.#read(type, id, key)) ?? ABSENT_SENTINEL;
      if (valuesEqual(current, value)) {
        this.#metrics.increment(type, "skippedWrites");
        return false;
      }
      return this.#set(type, id, key, value);
    });
  }

  async delete(type: string, id: number, key: string): Promise<boolean> {
    if (!this.#canWrite(type, id, key)) return false;
    return this.#guard(
      "delete",
      type,
      id,
      key,
      false,
      async () => {
        const removed = await this.#metrics.time("delete", () => this.#backend.delete(type, id, key));
        if (removed) this.#metrics.increment(type, "deletes");
        return removed;
      },
      DELETE_FAILURE
    );
  }

  async increment(type: string, id: number, key: string, amount = 1): Promise<number | false> {
    return this.#adjust("increment", type, id, key, Math.trunc(amount));
  }

  async decrement(type: string, id: number, key: string, amount = 1): Promise<number | false> {
    return this.#adjust("decrement", type, id, key, -Math.abs(Math.trunc(amount)));
  }

  async #adjust(
    operation: string,
    type: string,
    id: number,
    key: string,
    delta: number
  ): Promise<number | false> {
    if (!this.#canWrite(type, id, key) || !Number.isFinite(delta)) return false;
    return this.#guard<number | false>(operation, type, id, key, false, async () => {
      const next = toInt(await this.#read(type, id, key)) + delta;
      if (!Number.isSafeInteger(next)) return false;
      return (await this.#set(type, id, key, next)) ? next : false;
    });
  }

  async arrayContains(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    const current = await this.#read(type, id, key);
    return isSequence(current) && current.some((item) => valuesEqual(item, value));
  }

  async arrayAppend(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    if (!this.#canWrite(type, id, key, value)) return false;
    return this.#guard("arrayAppend", type, id, key, false, async () => {
      const current = await this.#read(type, id, key);
      const list = isSequence(current) ? current : [];
      return this.#set(type, id, key, [...list, value]);
    });
  }

  async arrayRemove(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    if (!this.#canWrite(type, id, key)) return false;
    return this.#guard("arrayRemove", type, id, key, false, async () => {
      const current = await this.#read(type, id, key);
      if (!isSequence(current)) return false;
      const index = current.findIndex((item) => valuesEqual(item, value));
      if (index === -1) return false;
      return this.#set(type, id, key, current.filter((_, i) => i !== index));
    });
  }

  async arrayRemoveAll(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    if (!this.#canWrite(type, id, key)) return false;
    return this.#guard("arrayRemoveAll", type, id, key, false, async () => {
      const current = await this.#read(type, id, key);
      if (!isSequence(current)) return false;
      const kept = current.filter((item) => !valuesEqual(item, value));
      if (kept.length === current.length) return false;
      return this.#set(type, id, key, kept);
    });
  }

  async arrayUnique(type: string, id: number, key: string): Promise<boolean> {
    if (!this.#canWrite(type, id, key)) return false;
    return this.#guard("arrayUnique", type, id, key, false, async () => {
      const current = await this.#read(type, id, key);
      if (!isSequence(current)) return false;
      const unique: AttributeValue[] = [];
      for (const item of current) {
        if (!unique.some((seen) => valuesEqual(seen, item))) unique.push(item);
      }
      if (unique.length === current.length) return false;
      return this.#set(type, id, key, unique);
    });
  }

  async arrayCount(type: string, id: number, key: string): Promise<number> {
    const current = await this.#read(type, id, key);
    return isSequence(current) ? current.length : 0;
  }

  async getNested<D = null>(
    type: string,
    id: number,
    key: string,
    path: string,
    fallback?: D
  ): Promise<AttributeValue | D | null> {
    const root = await this.#read(type, id, key);
    const found = root === null ? undefined : readPath(root, splitPath(path));
    if (found !== undefined) return found;
    return fallback === undefined ? null : fallback;
  }

  async setNested(
    type: string,
    id: number,
    key: string,
    path: string,
    value: AttributeValue
  ): Promise<boolean> {
    if (!this.#canWrite(type, id, key, value)) return false;
    return this.#guard("setNested", type, id, key, false, async () => {
      const root = await this.#read(type, id, key);
      return this.#set(type, id, key, writePath(root, splitPath(path), value));
    });
  }

  async removeNested(type: string, id: number, key: string, path: string): Promise<boolean> {
    if (!this.#canWrite(type, id, key)) return false;
    return this.#guard("removeNested", type, id, key, false, async () => {
      const root = await this.#read(type, id, key);
      if (!isMapping(root)) return false;
      const updated = removePath(root, splitPath(path));
      return updated === null ? false : this.#set(type, id, key, updated);
    });
  }

  async getJson(
    type: string,
    id: number,
    key: string,
    fallback: AttributeContainer = {}
  ): Promise<AttributeContainer> {
    const value = await this.#read(type, id, key);
    if (isContainer(value)) return value;
    if (typeof value !== "string") return fallback;

    const parsed = safeParseJson(value);
    if (parsed.success && isContainer(parsed.data) && isAttributeValue(parsed.data)) {
      return parsed.data;
    }
    return fallback;
  }

  async setJson(type: string, id: number, key: string, value: AttributeContainer): Promise<boolean> {
    return this.update(type, id, key, value);
  }

  async isTruthy(type: string, id: number, key: string, fallback = false): Promise<boolean> {
    const value = await this.#read(type, id, key);
    return value === null ? fallback : toBool(value);
  }

  async toggle(type: string, id: number, key: string): Promise<boolean | null> {
    if (!this.#canWrite(type, id, key)) return null;
    return this.#guard<boolean | null>("toggle", type, id, key, null, async () => {
      const next = !toBool(await this.#read(type, id, key));
      return (await this.#set(type, id, key, next)) ? next : null;
    });
  }

  async getType(type: string, id: number, key: string): Promise<ValueTag | null> {
    const value = await this.#read(type, id, key);
    return value === null ? null : valueTag(value);
  }

  async getSize(type: string, id: number, key: string): Promise<number> {
    const value = await this.#read(type, id, key);
    return value === null ? 0 : byteSize(value, this.#options.serialize);
  }

  async isType(type: string, id: number, key: string, tag: ValueTag): Promise<boolean> {
    return (await this.getType(type, id, key)) === tag;
  }

  async isLarge(type: string, id: number, key: string, sizeLimit?: number): Promise<boolean> {
    const limit = sizeLimit ?? this.#options.largeValueLimit;
    return (await this.getSize(type, id, key)) > limit;
  }

  async migrateKey(
    type: string,
    id: number,
    oldKey: string,
    newKey: string,
    deleteOld = true
  ): Promise<boolean> {
    if (!this.#canWrite(type, id, oldKey) || !isValidAttributeKey(newKey)) return false;
    return this.#guard("migrateKey", type, id, newKey, false, async () => {
      // An absent source copies the sentinel, so the destination reads as absent too
      const value = (await this.#read(type, id, oldKey)) ?? ABSENT_SENTINEL;
      const copied = await this.#set(type, id, newKey, value);
      if (copied && deleteOld) {
        return this.delete(type, id, oldKey);
      }
      return copied;
    });
  }
}

/**
 * Create an attribute accessor over a backing store
 *
 * @example
 * ```typescript
 * const attributes = createAccessor(new MemoryBackend(), {
 *   largeValueLimit: 1048576,
 *   serialize: defaultSerializer,
 * });
 *
 * await attributes.increment("post", 42, "view_count");
 * const views = await attributes.getCast("post", 42, "view_count", "int");
 * ```
 */
export function createAccessor(
  backend: BackingStore,
  options: EngineOptions,
  metrics: MetricsCollector = new MetricsCollector()
): AttributeAccessor {
  return new Accessor(backend, options, metrics);
}
