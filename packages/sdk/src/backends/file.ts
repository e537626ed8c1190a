/**
 * File backing store: one canonical JSON document per entity
 * Layout: <root>/<type>/<id>.json
 * Format: { "attributes": { "<key>": <value>, ... }, "id": <id>, "type": "<type>" }
 *
 * An entity whose last attribute is deleted has its document removed.
 * Writes use the atomic write-fsync-rename pattern. Mutations of one document
 * are serialized per backend instance, so concurrent writes to different keys
 * of an entity never drop each other.
 */

import * as path from "node:path";
import type { AttributeValue, BackingStore, ComparisonOp, Scalar } from "../types.js";
import { DocumentNotFoundError, DocumentReadError } from "../errors.js";
import { stableStringify, safeParseJson } from "../format.js";
import { atomicWrite, listFiles, readDocument, removeDocument } from "../io.js";
import { matchesComparison } from "../query.js";
import { EntityDocumentSchema } from "../schemas.js";
import { assertEntityType, isValidEntityId, parseEntityIdFromFile } from "../validation.js";

export interface FileBackendOptions {
  /** Root directory for entity documents */
  root: string;
  /** Number of spaces for JSON indentation (default: 2) */
  indent?: number;
  /** Closed set of entity types (any valid name when omitted) */
  entityTypes?: readonly string[];
}

type AttributeRow = Map<string, AttributeValue>;

/**
 * In-process mutex serializing read-modify-write cycles on one document
 */
class Mutex {
  #queue: Array<() => void> = [];
  #locked = false;

  get idle(): boolean {
    return !this.#locked && this.#queue.length === 0;
  }

  async acquire(): Promise<void> {
    if (!this.#locked) {
      this.#locked = true;
      return;
    }

    await new Promise<void>((resolve) => {
      this.#queue.push(resolve);
    });
  }

  release(): void {
    const next = this.#queue.shift();
    if (next) {
      next();
    } else {
      this.#locked = false;
    }
  }
}

export class FileBackend implements BackingStore {
  #root: string;
  #indent: number;
  #entityTypes?: readonly string[];
  #mutexes = new Map<string, Mutex>();

  constructor(options: FileBackendOptions) {
    this.#root = path.resolve(options.root);
    this.#indent = options.indent ?? 2;
    this.#entityTypes = options.entityTypes;
  }

  get root(): string {
    return this.#root;
  }

  /**
   * Directory holding every document of a type
   */
  #typeDir(type: string): string {
    assertEntityType(type, this.#entityTypes);
    return path.join(this.#root, type);
  }

  #filePath(type: string, id: number): string {
    return path.join(this.#typeDir(type), `${id}.json`);
  }

  /**
   * Read an entity's attributes
   * @returns null when the entity has no document
   * @throws DocumentReadError if the document is not valid JSON or has the wrong shape
   */
  async #readRow(type: string, id: number): Promise<AttributeRow | null> {
    if (!isValidEntityId(id)) return null;
    const filePath = this.#filePath(type, id);

    let content: string;
    try {
      content = await readDocument(filePath);
    } catch (err) {
      if (err instanceof DocumentNotFoundError) {
        return null;
      }
      throw err;
    }

    const parsed = safeParseJson(content);
    if (!parsed.success) {
      throw new DocumentReadError(filePath, { cause: new Error(parsed.error) });
    }

    const doc = EntityDocumentSchema.safeParse(parsed.data);
    if (!doc.success) {
      throw new DocumentReadError(filePath, { cause: doc.error });
    }
    if (doc.data.type !== type || doc.data.id !== id) {
      throw new DocumentReadError(filePath, {
        cause: new Error(`Document key ${doc.data.type}/${doc.data.id} does not match ${type}/${id}`),
      });
    }

    return new Map(Object.entries(doc.data.attributes));
  }

  async #writeRow(type: string, id: number, row: AttributeRow): Promise<void> {
    const filePath = this.#filePath(type, id);
    if (row.size === 0) {
      await removeDocument(filePath);
      return;
    }
    const doc = { type, id, attributes: Object.fromEntries(row) };
    await atomicWrite(filePath, stableStringify(doc, this.#indent));
  }

  /**
   * Read, change and write back one document under its mutex.
   * `change` returns false to leave the document untouched.
   */
  async #mutate(type: string, id: number, change: (row: AttributeRow) => boolean): Promise<boolean> {
    const filePath = this.#filePath(type, id);
    let mutex = this.#mutexes.get(filePath);
    if (!mutex) {
      mutex = new Mutex();
      this.#mutexes.set(filePath, mutex);
    }

    await mutex.acquire();
    try {
      const row = (await this.#readRow(type, id)) ?? new Map<string, AttributeValue>();
      if (!change(row)) return false;
      await this.#writeRow(type, id, row);
      return true;
    } finally {
      mutex.release();
      if (mutex.idle) this.#mutexes.delete(filePath);
    }
  }

  /**
   * Visit every entity document of a type in ascending id order
   */
  async *#scan(type: string): AsyncIterable<[number, AttributeRow]> {
    const files = await listFiles(this.#typeDir(type), ".json");
    const ids = files
      .map((name) => parseEntityIdFromFile(name))
      .filter((id): id is number => id !== null)
      .sort((a, b) => a - b);

    for (const id of ids) {
      const row = await this.#readRow(type, id);
      if (row) yield [id, row];
    }
  }

  async get(type: string, id: number, key: string): Promise<AttributeValue | undefined> {
    const row = await this.#readRow(type, id);
    return row?.get(key);
  }

  async getValues(type: string, id: number, key: string): Promise<AttributeValue[]> {
    const value = await this.get(type, id, key);
    return value === undefined ? [] : [value];
  }

  async getAll(type: string, id: number): Promise<Map<string, AttributeValue[]>> {
    const result = new Map<string, AttributeValue[]>();
    const row = await this.#readRow(type, id);
    if (row) {
      for (const [key, value] of row) {
        result.set(key, [value]);
      }
    }
    return result;
  }

  async set(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    if (!isValidEntityId(id)) return false;
    return this.#mutate(type, id, (row) => {
      row.set(key, value);
      return true;
    });
  }

  async delete(type: string, id: number, key: string): Promise<boolean> {
    if (!isValidEntityId(id)) return false;
    return this.#mutate(type, id, (row) => row.delete(key));
  }

  async distinctKeysByPrefix(type: string, prefix: string): Promise<string[]> {
    const keys = new Set<string>();
    for await (const [, row] of this.#scan(type)) {
      for (const key of row.keys()) {
        if (key.startsWith(prefix)) keys.add(key);
      }
    }
    return [...keys].sort();
  }

  async deleteRowsByKey(type: string, key: string): Promise<number> {
    let count = 0;
    for await (const [id, row] of this.#scan(type)) {
      if (row.has(key) && (await this.#mutate(type, id, (current) => current.delete(key)))) {
        count++;
      }
    }
    return count;
  }

  async findIds(type: string, key: string, operand: Scalar, op: ComparisonOp): Promise<number[]> {
    const ids: number[] = [];
    for await (const [id, row] of this.#scan(type)) {
      const value = row.get(key);
      if (value !== undefined && matchesComparison(value, operand, op)) {
        ids.push(id);
      }
    }
    return ids;
  }

  async close(): Promise<void> {
    // Nothing is held open between calls
  }
}
