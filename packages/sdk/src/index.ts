/**
 * Attribute Store SDK
 *
 * Typed key/value attributes attached to entities, over pluggable backing stores
 */

// Re-export types
export type {
  Scalar,
  AttributeMap,
  AttributeValue,
  AttributeContainer,
  ValueTag,
  CastKind,
  CastResult,
  Comparator,
  ComparisonOp,
  SizeSerializer,
  SyncDirection,
  BackingStore,
  AttributeAccessor,
  ValueComparison,
  AttributeStats,
  BulkCoordinator,
  BackendOptions,
  LogLevel,
  StoreOptions,
  EngineOptions,
  OperationCounters,
  MetricsSnapshot,
  AttributeStore,
} from "./types.js";

// Engine
export { createAccessor } from "./accessor.js";
export { createCoordinator } from "./bulk.js";
export { openAttributeStore } from "./store.js";
export { resolveOptions, resolveEnvOptions, expandTilde, DEFAULT_LARGE_VALUE_LIMIT } from "./config.js";
export type { EnvOptions, ResolvedOptions } from "./config.js";

// Backends
export { MemoryBackend } from "./backends/memory.js";
export type { MemoryBackendOptions } from "./backends/memory.js";
export { FileBackend } from "./backends/file.js";
export type { FileBackendOptions } from "./backends/file.js";
export { SqliteBackend } from "./backends/sqlite.js";
export type { SqliteBackendOptions } from "./backends/sqlite.js";

// Value model utilities
export {
  ABSENT_SENTINEL,
  castValue,
  isAttributeValue,
  isNumeric,
  valueTag,
} from "./value.js";
export { stableStringify, canonicalJson, valuesEqual, byteSize, defaultSerializer } from "./format.js";
export { splitPath, readPath, writePath, removePath } from "./path.js";
export { isComparator, parseComparator, matchesComparison } from "./query.js";
export { isValidEntityId, isValidAttributeKey, validateEntityType } from "./validation.js";

// Re-export errors
export {
  AttributeStoreError,
  InvalidEntityTypeError,
  UnknownEntityTypeError,
  ConfigError,
  BackendError,
  DocumentNotFoundError,
  DocumentReadError,
  DocumentWriteError,
  DocumentRemoveError,
  DirectoryError,
  ListFilesError,
} from "./errors.js";

// Observability
export { logger } from "./observability/logs.js";
export type { LogEntry } from "./observability/logs.js";
export { MetricsCollector } from "./observability/metrics.js";
