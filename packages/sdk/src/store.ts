/**
 * Store facade: builds the backend and wires the accessor and coordinator
 */

import * as path from "node:path";
import type { AttributeStore, BackendOptions, BackingStore, MetricsSnapshot, StoreOptions } from "./types.js";
import { createAccessor } from "./accessor.js";
import { createCoordinator } from "./bulk.js";
import { expandTilde, resolveOptions } from "./config.js";
import { FileBackend } from "./backends/file.js";
import { MemoryBackend } from "./backends/memory.js";
import { SqliteBackend } from "./backends/sqlite.js";
import { logger } from "./observability/logs.js";
import { MetricsCollector } from "./observability/metrics.js";

function buildBackend(
  options: BackendOptions,
  defaultRoot: string,
  entityTypes?: readonly string[]
): BackingStore {
  switch (options.kind) {
    case "memory":
      return new MemoryBackend({ entityTypes });
    case "file":
      return new FileBackend({
        root: options.root === undefined ? defaultRoot : path.resolve(expandTilde(options.root)),
        indent: options.indent,
        entityTypes,
      });
    case "sqlite":
      return new SqliteBackend({
        filename: options.filename,
        tablePrefix: options.tablePrefix,
        entityTypes,
      });
  }
}

/**
 * Open an attribute store
 *
 * @example
 * ```typescript
 * const store = openAttributeStore({
 *   backend: { kind: "sqlite", filename: "./attributes.db" },
 *   entityTypes: ["post", "user"],
 * });
 *
 * await store.attributes.update("post", 42, "subtitle", "Draft");
 * const ids = await store.bulk.findObjectsByValue("post", "subtitle", "draft", "LIKE");
 * await store.close();
 * ```
 *
 * A caller-supplied BackingStore is closed along with the store.
 */
export function openAttributeStore(options: StoreOptions = {}): AttributeStore {
  const resolved = resolveOptions(options);
  logger.setLevel(resolved.logLevel);

  const backend =
    "kind" in resolved.backend
      ? buildBackend(resolved.backend, resolved.root, resolved.engine.entityTypes)
      : resolved.backend;

  const metrics = new MetricsCollector();
  const attributes = createAccessor(backend, resolved.engine, metrics);
  const bulk = createCoordinator(attributes, backend, resolved.engine);

  logger.debug("store.open", {
    details: {
      backend: "kind" in resolved.backend ? resolved.backend.kind : "custom",
      largeValueLimit: resolved.engine.largeValueLimit,
    },
  });

  return {
    attributes,
    bulk,
    backend,
    metrics(): MetricsSnapshot {
      return metrics.snapshot();
    },
    async close(): Promise<void> {
      await backend.close();
    },
  };
}
