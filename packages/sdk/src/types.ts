/**
 * Core types for the attribute store
 */

/**
 * Scalar attribute value
 */
export type Scalar = string | number | boolean;

/**
 * Mapping of string keys to attribute values
 */
export interface AttributeMap {
  [key: string]: AttributeValue;
}

/**
 * Any value an attribute can hold: a scalar or a (nested) sequence/mapping
 */
export type AttributeValue = Scalar | AttributeValue[] | AttributeMap;

/**
 * Container attribute value (sequence or mapping)
 */
export type AttributeContainer = AttributeValue[] | AttributeMap;

/**
 * Runtime tag of a stored value
 */
export type ValueTag = "integer" | "float" | "boolean" | "string" | "sequence" | "mapping";

/**
 * Cast targets accepted by getCast(). Aliases resolve to the same rule.
 */
export type CastKind =
  | "int"
  | "integer"
  | "float"
  | "double"
  | "bool"
  | "boolean"
  | "array"
  | "sequence"
  | "string";

/**
 * Result type of a cast for each cast kind
 */
export type CastResult<K extends CastKind> = K extends "int" | "integer" | "float" | "double"
  ? number
  : K extends "bool" | "boolean"
    ? boolean
    : K extends "array" | "sequence"
      ? AttributeValue[]
      : string;

/**
 * Comparison operator accepted by findObjectsByValue()
 */
export type Comparator = "=" | "!=" | "<>" | ">" | "<" | ">=" | "<=" | "LIKE";

/**
 * Closed set of comparisons a backing store must support
 */
export type ComparisonOp = "eq" | "ne" | "gt" | "lt" | "ge" | "le" | "like";

/**
 * Serializer used to measure the byte size of a value
 */
export type SizeSerializer = (value: AttributeValue) => string;

/**
 * Direction for syncObject()
 */
export type SyncDirection = "toMeta" | "fromMeta" | "both";

/**
 * Persistent storage the engine delegates to.
 *
 * Keys are unique per (type, id); a missing row reads as `undefined`.
 */
export interface BackingStore {
  /** Read the stored value for one key, `undefined` when no row exists */
  get(type: string, id: number, key: string): Promise<AttributeValue | undefined>;

  /** Read every stored value for one key (zero or one element) */
  getValues(type: string, id: number, key: string): Promise<AttributeValue[]>;

  /** Read every attribute of one entity */
  getAll(type: string, id: number): Promise<Map<string, AttributeValue[]>>;

  /** Upsert a value; resolves to whether the store accepted it */
  set(type: string, id: number, key: string, value: AttributeValue): Promise<boolean>;

  /** Delete one key of one entity; false when nothing was stored */
  delete(type: string, id: number, key: string): Promise<boolean>;

  /** Distinct keys starting with prefix, across every entity of the type */
  distinctKeysByPrefix(type: string, prefix: string): Promise<string[]>;

  /** Delete a key from every entity of the type; resolves to rows removed */
  deleteRowsByKey(type: string, key: string): Promise<number>;

  /** Distinct entity ids (ascending) whose value for key satisfies the comparison */
  findIds(type: string, key: string, operand: Scalar, op: ComparisonOp): Promise<number[]>;

  /** Release resources held by the store */
  close(): Promise<void>;
}

/**
 * Single-entity, single-key operations
 */
export interface AttributeAccessor {
  exists(type: string, id: number, key: string): Promise<boolean>;

  get(type: string, id: number, key: string, single?: true): Promise<AttributeValue | null>;
  get(type: string, id: number, key: string, single: false): Promise<AttributeValue[] | null>;

  getWithDefault<D>(type: string, id: number, key: string, fallback: D): Promise<AttributeValue | D>;

  getCast<K extends CastKind>(
    type: string,
    id: number,
    key: string,
    kind: K,
    fallback?: AttributeValue
  ): Promise<CastResult<K>>;

  update(type: string, id: number, key: string, value: AttributeValue): Promise<boolean>;
  updateIfChanged(type: string, id: number, key: string, value: AttributeValue): Promise<boolean>;
  delete(type: string, id: number, key: string): Promise<boolean>;

  increment(type: string, id: number, key: string, amount?: number): Promise<number | false>;
  decrement(type: string, id: number, key: string, amount?: number): Promise<number | false>;

  arrayContains(type: string, id: number, key: string, value: AttributeValue): Promise<boolean>;
  arrayAppend(type: string, id: number, key: string, value: AttributeValue): Promise<boolean>;
  arrayRemove(type: string, id: number, key: string, value: AttributeValue): Promise<boolean>;
  arrayRemoveAll(type: string, id: number, key: string, value: AttributeValue): Promise<boolean>;
  arrayUnique(type: string, id: number, key: string): Promise<boolean>;
  arrayCount(type: string, id: number, key: string): Promise<number>;

  getNested<D = null>(
    type: string,
    id: number,
    key: string,
    path: string,
    fallback?: D
  ): Promise<AttributeValue | D | null>;
  setNested(type: string, id: number, key: string, path: string, value: AttributeValue): Promise<boolean>;
  removeNested(type: string, id: number, key: string, path: string): Promise<boolean>;

  getJson(type: string, id: number, key: string, fallback?: AttributeContainer): Promise<AttributeContainer>;
  setJson(type: string, id: number, key: string, value: AttributeContainer): Promise<boolean>;

  isTruthy(type: string, id: number, key: string, fallback?: boolean): Promise<boolean>;
  toggle(type: string, id: number, key: string): Promise<boolean | null>;

  getType(type: string, id: number, key: string): Promise<ValueTag | null>;
  getSize(type: string, id: number, key: string): Promise<number>;
  isType(type: string, id: number, key: string, tag: ValueTag): Promise<boolean>;
  isLarge(type: string, id: number, key: string, sizeLimit?: number): Promise<boolean>;

  migrateKey(
    type: string,
    id: number,
    oldKey: string,
    newKey: string,
    deleteOld?: boolean
  ): Promise<boolean>;
}

/**
 * Report returned by compareValues()
 */
export interface ValueComparison {
  /** Occurrences per scalar value */
  valueCounts: Map<Scalar, number>;
  /**
   * Occurrences per container, keyed by canonical JSON. Kept apart from
   * valueCounts so a string never shares a bucket with a container.
   */
  containerCounts: Map<string, number>;
  objectsWithMeta: number;
  objectsWithoutMeta: number;
  /** Value per entity id, absent entities omitted */
  values: Map<number, AttributeValue>;
  /** Structurally distinct values in first-seen order */
  uniqueValues: AttributeValue[];
}

/**
 * Report returned by getStats()
 */
export interface AttributeStats {
  /** Size of the cohort */
  count: number;
  /** How many cohort members held a numeric value */
  numericValues: number;
  min: number | null;
  max: number | null;
  average: number | null;
  sum: number | null;
}

/**
 * Multi-key and multi-entity operations composed from accessor calls
 */
export interface BulkCoordinator {
  getMany(type: string, id: number, keys: string[], single?: true): Promise<Map<string, AttributeValue>>;
  getMany(type: string, id: number, keys: string[], single: false): Promise<Map<string, AttributeValue[]>>;

  getAll(type: string, id: number): Promise<Map<string, AttributeValue[]>>;

  updateMany(
    type: string,
    id: number,
    values: Map<string, AttributeValue> | Record<string, AttributeValue>,
    skipUnchanged?: boolean
  ): Promise<string[]>;

  deleteMany(type: string, id: number, keys: string[]): Promise<number>;

  backup(type: string, id: number, keys: string[]): Promise<Map<string, AttributeValue>>;
  restore(
    type: string,
    id: number,
    backup: Map<string, AttributeValue> | Record<string, AttributeValue>
  ): Promise<string[]>;

  getByPrefix(type: string, id: number, prefix: string, withValues?: true): Promise<Map<string, AttributeValue>>;
  getByPrefix(type: string, id: number, prefix: string, withValues: false): Promise<string[]>;

  /**
   * Delete every key starting with prefix from every entity of the type.
   * Irreversible; resolves to the number of rows removed.
   */
  deleteByPrefix(type: string, prefix: string): Promise<number>;

  bulkGet(type: string, ids: number[], key: string): Promise<Map<number, AttributeValue>>;
  bulkUpdate(type: string, ids: number[], key: string, value: AttributeValue): Promise<Map<number, boolean>>;
  bulkDelete(type: string, ids: number[], key: string): Promise<Map<number, boolean>>;

  findObjectsByValue(
    type: string,
    key: string,
    value: Scalar,
    comparator?: Comparator | string
  ): Promise<number[]>;

  findLarge(type: string, id: number, sizeLimit?: number): Promise<Map<string, number>>;

  compareValues(type: string, ids: number[], key: string): Promise<ValueComparison>;
  getStats(type: string, ids: number[], key: string): Promise<AttributeStats>;

  syncObject(
    type: string,
    id: number,
    target: Record<string, unknown>,
    fieldMap: Record<string, string>,
    direction?: SyncDirection
  ): Promise<boolean>;
}

/**
 * Backend selection for openAttributeStore()
 */
export type BackendOptions =
  | { kind: "memory" }
  | { kind: "file"; root?: string; indent?: number }
  | { kind: "sqlite"; filename?: string; tablePrefix?: string };

/**
 * Log levels understood by the store logger
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Configuration options for opening an attribute store
 */
export interface StoreOptions {
  /** Backend to build, or a ready BackingStore instance (default: memory) */
  backend?: BackendOptions | BackingStore;
  /** Closed set of entity types; any valid name is accepted when omitted */
  entityTypes?: string[];
  /** Size above which a value counts as large, in bytes (default: 1048576) */
  largeValueLimit?: number;
  /** Serializer used by getSize()/findLarge() */
  serialize?: SizeSerializer;
  /** Minimum log level (default: from ATTRSTORE_LOG_LEVEL, else "info") */
  logLevel?: LogLevel;
}

/**
 * Options shared by the accessor and the coordinator
 */
export interface EngineOptions {
  entityTypes?: readonly string[];
  largeValueLimit: number;
  serialize: SizeSerializer;
}

/**
 * Snapshot of per-type operation counters
 */
export interface OperationCounters {
  reads: number;
  writes: number;
  skippedWrites: number;
  failedWrites: number;
  deletes: number;
  failedDeletes: number;
}

/**
 * Snapshot returned by AttributeStore.metrics()
 */
export interface MetricsSnapshot {
  types: Record<string, OperationCounters>;
  /** Mean latency per operation name, in milliseconds */
  meanLatencyMs: Record<string, number>;
}

/**
 * Opened attribute store
 */
export interface AttributeStore {
  attributes: AttributeAccessor;
  bulk: BulkCoordinator;
  backend: BackingStore;
  metrics(): MetricsSnapshot;
  close(): Promise<void>;
}
