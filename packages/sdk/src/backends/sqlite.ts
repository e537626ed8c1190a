/**
 * Relational backing store on SQLite (better-sqlite3)
 *
 * One table per entity type: <prefix><type>_meta
 *   meta_id     INTEGER PRIMARY KEY
 *   entity_id   INTEGER   owning entity
 *   meta_key    TEXT      attribute key, unique per entity
 *   meta_value  TEXT      scalar text, or canonical JSON for containers
 *   value_type  TEXT      string | integer | float | boolean | json
 *
 * Every value reaches SQL through a bound parameter. Table names are built
 * only from validated entity type names; comparison operators come from a
 * fixed table keyed by ComparisonOp.
 */

import Database from "better-sqlite3";
import type { AttributeValue, BackingStore, ComparisonOp, Scalar } from "../types.js";
import { BackendError } from "../errors.js";
import { canonicalJson, safeParseJson } from "../format.js";
import { scalarText } from "../query.js";
import { AttributeValueSchema } from "../schemas.js";
import { assertEntityType, isValidEntityId } from "../validation.js";

export interface SqliteBackendOptions {
  /** Database file (default: ":memory:"); ignored when `database` is given */
  filename?: string;
  /** Borrowed database handle; not closed by close() */
  database?: Database.Database;
  /** Prefix for table names (default: "") */
  tablePrefix?: string;
  /** Closed set of entity types (any valid name when omitted) */
  entityTypes?: readonly string[];
}

type ValueType = "string" | "integer" | "float" | "boolean" | "json";

interface ValueRow {
  meta_value: string;
  value_type: ValueType;
}

interface KeyedValueRow extends ValueRow {
  meta_key: string;
}

interface EncodedValue {
  value: string;
  valueType: ValueType;
}

type KeyParams = { id: number; key: string };
type FindParams = { key: string; operand: string | number };

interface TableStatements {
  get: Database.Statement<KeyParams, ValueRow>;
  getAll: Database.Statement<{ id: number }, KeyedValueRow>;
  upsert: Database.Statement<KeyParams & { value: string; valueType: ValueType }>;
  delete: Database.Statement<KeyParams>;
  keysByPrefix: Database.Statement<{ prefix: string }, { meta_key: string }>;
  deleteByKey: Database.Statement<{ key: string }>;
  find: Record<ComparisonOp, Database.Statement<FindParams, { entity_id: number }>>;
  findNumeric: Record<"gt" | "lt" | "ge" | "le", Database.Statement<FindParams, { entity_id: number }>>;
}

const ORDER_OPERATORS = { gt: ">", lt: "<", ge: ">=", le: "<=" } as const;

/**
 * Escape LIKE wildcards so the operand matches literally
 */
export function escapeLike(text: string): string {
  return text.replace(/[\\%_]/g, (c) => `\\${c}`);
}

export function encodeValue(value: AttributeValue): EncodedValue {
  if (typeof value === "string") return { value, valueType: "string" };
  if (typeof value === "boolean") return { value: scalarText(value), valueType: "boolean" };
  if (typeof value === "number") {
    return { value: String(value), valueType: Number.isInteger(value) ? "integer" : "float" };
  }
  return { value: canonicalJson(value), valueType: "json" };
}

export function decodeValue(row: ValueRow): AttributeValue {
  switch (row.value_type) {
    case "string":
      return row.meta_value;
    case "integer":
    case "float":
      return Number(row.meta_value);
    case "boolean":
      return row.meta_value === "1";
    case "json": {
      const parsed = safeParseJson(row.meta_value);
      const value = parsed.success ? AttributeValueSchema.safeParse(parsed.data) : null;
      if (!value?.success) {
        throw new Error(`Stored JSON value is malformed: ${row.meta_value.slice(0, 64)}`);
      }
      return value.data;
    }
  }
}

export class SqliteBackend implements BackingStore {
  #db: Database.Database;
  #ownsDatabase: boolean;
  #tablePrefix: string;
  #entityTypes?: readonly string[];
  #statements = new Map<string, TableStatements>();

  constructor(options: SqliteBackendOptions = {}) {
    this.#ownsDatabase = options.database === undefined;
    this.#db = options.database ?? new Database(options.filename ?? ":memory:");
    this.#tablePrefix = options.tablePrefix ?? "";
    this.#entityTypes = options.entityTypes;
  }

  /**
   * Table name for an entity type
   */
  tableName(type: string): string {
    assertEntityType(type, this.#entityTypes);
    return `${this.#tablePrefix}${type}_meta`;
  }

  /**
   * Create the type's table on first use and prepare its statements
   */
  #prepare(type: string): TableStatements {
    const cached = this.#statements.get(type);
    if (cached) return cached;

    const table = `"${this.tableName(type)}"`;
    this.#db.exec(`
      CREATE TABLE IF NOT EXISTS ${table} (
        meta_id INTEGER PRIMARY KEY AUTOINCREMENT,
        entity_id INTEGER NOT NULL,
        meta_key TEXT NOT NULL,
        meta_value TEXT NOT NULL,
        value_type TEXT NOT NULL,
        UNIQUE (entity_id, meta_key)
      );
      CREATE INDEX IF NOT EXISTS "${this.tableName(type)}_key" ON ${table} (meta_key);
    `);

    const select = `SELECT DISTINCT entity_id FROM ${table} WHERE meta_key = @key`;
    const db = this.#db;

    const statements: TableStatements = {
      get: db.prepare<KeyParams, ValueRow>(
        `SELECT meta_value, value_type FROM ${table} WHERE entity_id = @id AND meta_key = @key`
      ),
      getAll: db.prepare<{ id: number }, KeyedValueRow>(
        `SELECT meta_key, meta_value, value_type FROM ${table} WHERE entity_id = @id ORDER BY meta_id`
      ),
      upsert: db.prepare<KeyParams & { value: string; valueType: ValueType }>(
        `INSERT INTO ${table} (entity_id, meta_key, meta_value, value_type)
         VALUES (@id, @key, @value, @valueType)
         ON CONFLICT (entity_id, meta_key)
         DO UPDATE SET meta_value = excluded.meta_value, value_type = excluded.value_type`
      ),
      delete: db.prepare<KeyParams>(`DELETE FROM ${table} WHERE entity_id = @id AND meta_key = @key`),
      keysByPrefix: db.prepare<{ prefix: string }, { meta_key: string }>(
        `SELECT DISTINCT meta_key FROM ${table}
         WHERE substr(meta_key, 1, length(@prefix)) = @prefix ORDER BY meta_key`
      ),
      deleteByKey: db.prepare<{ key: string }>(`DELETE FROM ${table} WHERE meta_key = @key`),
      find: {
        eq: this.#prepareFind(`${select} AND value_type != 'json' AND meta_value = @operand`),
        ne: this.#prepareFind(`${select} AND (value_type = 'json' OR meta_value != @operand)`),
        like: this.#prepareFind(`${select} AND meta_value LIKE @operand ESCAPE '\\'`),
        gt: this.#prepareFind(`${select} AND value_type != 'json' AND meta_value > @operand`),
        lt: this.#prepareFind(`${select} AND value_type != 'json' AND meta_value < @operand`),
        ge: this.#prepareFind(`${select} AND value_type != 'json' AND meta_value >= @operand`),
        le: this.#prepareFind(`${select} AND value_type != 'json' AND meta_value <= @operand`),
      },
      findNumeric: {
        gt: this.#prepareFind(this.#numericQuery(select, "gt")),
        lt: this.#prepareFind(this.#numericQuery(select, "lt")),
        ge: this.#prepareFind(this.#numericQuery(select, "ge")),
        le: this.#prepareFind(this.#numericQuery(select, "le")),
      },
    };

    this.#statements.set(type, statements);
    return statements;
  }

  #prepareFind(where: string): Database.Statement<FindParams, { entity_id: number }> {
    return this.#db.prepare<FindParams, { entity_id: number }>(`${where} ORDER BY entity_id`);
  }

  #numericQuery(select: string, op: keyof typeof ORDER_OPERATORS): string {
    return `${select} AND value_type IN ('integer', 'float')
      AND CAST(meta_value AS REAL) ${ORDER_OPERATORS[op]} @operand`;
  }

  /**
   * Run a statement, wrapping driver errors with the operation name
   */
  #run<T>(operation: string, type: string, fn: (statements: TableStatements) => T): T {
    assertEntityType(type, this.#entityTypes);
    try {
      return fn(this.#prepare(type));
    } catch (err) {
      throw new BackendError(operation, type, { cause: err });
    }
  }

  async get(type: string, id: number, key: string): Promise<AttributeValue | undefined> {
    return this.#run("get", type, (s) => {
      const row = s.get.get({ id, key });
      return row ? decodeValue(row) : undefined;
    });
  }

  async getValues(type: string, id: number, key: string): Promise<AttributeValue[]> {
    const value = await this.get(type, id, key);
    return value === undefined ? [] : [value];
  }

  async getAll(type: string, id: number): Promise<Map<string, AttributeValue[]>> {
    return this.#run("getAll", type, (s) => {
      const result = new Map<string, AttributeValue[]>();
      for (const row of s.getAll.all({ id })) {
        const values = result.get(row.meta_key) ?? [];
        values.push(decodeValue(row));
        result.set(row.meta_key, values);
      }
      return result;
    });
  }

  async set(type: string, id: number, key: string, value: AttributeValue): Promise<boolean> {
    if (!isValidEntityId(id)) return false;
    const encoded = encodeValue(value);
    return this.#run("set", type, (s) => {
      const info = s.upsert.run({ id, key, value: encoded.value, valueType: encoded.valueType });
      return info.changes > 0;
    });
  }

  async delete(type: string, id: number, key: string): Promise<boolean> {
    return this.#run("delete", type, (s) => s.delete.run({ id, key }).changes > 0);
  }

  async distinctKeysByPrefix(type: string, prefix: string): Promise<string[]> {
    return this.#run("distinctKeysByPrefix", type, (s) =>
      s.keysByPrefix.all({ prefix }).map((row) => row.meta_key)
    );
  }

  async deleteRowsByKey(type: string, key: string): Promise<number> {
    return this.#run("deleteRowsByKey", type, (s) => s.deleteByKey.run({ key }).changes);
  }

  async findIds(type: string, key: string, operand: Scalar, op: ComparisonOp): Promise<number[]> {
    return this.#run("findIds", type, (s) => {
      let rows: Array<{ entity_id: number }>;
      if (op === "like") {
        rows = s.find.like.all({ key, operand: `%${escapeLike(scalarText(operand))}%` });
      } else if (op !== "eq" && op !== "ne" && typeof operand === "number") {
        rows = s.findNumeric[op].all({ key, operand });
      } else {
        rows = s.find[op].all({ key, operand: scalarText(operand) });
      }
      return rows.map((row) => row.entity_id);
    });
  }

  async close(): Promise<void> {
    this.#statements.clear();
    if (this.#ownsDatabase && this.#db.open) {
      this.#db.close();
    }
  }
}
