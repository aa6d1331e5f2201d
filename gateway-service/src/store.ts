import Database from 'better-sqlite3';
import { mkdirSync } from 'fs';
import path from 'path';
import { StorageUnavailableError } from './errors.js';
import { createLogger } from './log.js';

const log = createLogger('store');

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

const NAMESPACE_RE = /^[A-Za-z0-9_]+$/;

/**
 * Open (creating if absent) the SQLite state file in WAL mode.
 */
export function openDatabase(file: string): Database.Database {
  try {
    if (file !== ':memory:') mkdirSync(path.dirname(path.resolve(file)), { recursive: true });
    const db = new Database(file);
    db.pragma('journal_mode = WAL');
    db.pragma('synchronous = NORMAL');
    return db;
  } catch (e) {
    throw new StorageUnavailableError(file, e);
  }
}

/** Throws a TypeError naming the offending path if `value` cannot round-trip through JSON. */
export function assertJsonValue(value: unknown, at = '$'): asserts value is JsonValue {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) throw new TypeError(`non-finite number at ${at} is not JSON-serializable`);
    return;
  }
  if (Array.isArray(value)) {
    value.forEach((item, i) => assertJsonValue(item, `${at}[${i}]`));
    return;
  }
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      throw new TypeError(`${value.constructor?.name ?? 'object'} at ${at} is not a plain object`);
    }
    for (const [k, v] of Object.entries(value)) assertJsonValue(v, `${at}.${k}`);
    return;
  }
  throw new TypeError(`${typeof value} at ${at} is not JSON-serializable`);
}

interface Row {
  key: string;
  value: string;
}

/**
 * String -> JSON key-value namespace (one table) inside a SQLite file.
 * Values are stored as JSON text only.
 */
export class KeyValueStore {
  readonly namespace: string;
  private db: Database.Database | null;
  private readonly ownsDb: boolean;
  private readonly file: string;

  constructor(db: Database.Database, namespace: string, options: { ownsDb?: boolean } = {}) {
    if (!NAMESPACE_RE.test(namespace)) {
      throw new TypeError(`namespace must be alphanumeric/underscore, got "${namespace}"`);
    }
    this.namespace = namespace;
    this.db = db;
    this.ownsDb = options.ownsDb ?? false;
    this.file = db.name;
    try {
      db.exec(`CREATE TABLE IF NOT EXISTS ${namespace} (key TEXT PRIMARY KEY, value TEXT NOT NULL)`);
    } catch (e) {
      throw new StorageUnavailableError(this.file, e);
    }
  }

  private handle(): Database.Database {
    if (!this.db || !this.db.open) throw new StorageUnavailableError(this.file);
    return this.db;
  }

  get(key: string): JsonValue | undefined {
    const row = this.handle()
      .prepare<[string], Pick<Row, 'value'>>(`SELECT value FROM ${this.namespace} WHERE key = ?`)
      .get(key);
    if (!row) return undefined;
    return this.decode(key, row.value);
  }

  has(key: string): boolean {
    const row = this.handle()
      .prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${this.namespace} WHERE key = ?`)
      .get(key);
    return row !== undefined;
  }

  set(key: string, value: unknown): void {
    assertJsonValue(value);
    const text = JSON.stringify(value);
    this.handle()
      .prepare<[string, string]>(
        `INSERT INTO ${this.namespace} (key, value) VALUES (?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value`
      )
      .run(key, text);
  }

  delete(key: string): boolean {
    const info = this.handle().prepare<[string]>(`DELETE FROM ${this.namespace} WHERE key = ?`).run(key);
    return info.changes > 0;
  }

  keys(): string[] {
    return this.handle()
      .prepare<[], Pick<Row, 'key'>>(`SELECT key FROM ${this.namespace} ORDER BY key`)
      .all()
      .map((r) => r.key);
  }

  /** All decodable entries; corrupt rows are logged and skipped. */
  entries(): Array<[string, JsonValue]> {
    const out: Array<[string, JsonValue]> = [];
    const rows = this.handle().prepare<[], Row>(`SELECT key, value FROM ${this.namespace} ORDER BY key`).all();
    for (const row of rows) {
      const value = this.decode(row.key, row.value);
      if (value !== undefined) out.push([row.key, value]);
    }
    return out;
  }

  size(): number {
    const row = this.handle().prepare<[], { n: number }>(`SELECT COUNT(*) AS n FROM ${this.namespace}`).get();
    return row ? row.n : 0;
  }

  /** Run several writes in one transaction; commits once when `fn` returns, rolls back if it throws. */
  batch<T>(fn: () => T): T {
    return this.handle().transaction(fn)();
  }

  close(): void {
    if (!this.db) return;
    if (this.ownsDb && this.db.open) this.db.close();
    this.db = null;
  }

  private decode(key: string, text: string): JsonValue | undefined {
    try {
      const value: unknown = JSON.parse(text);
      assertJsonValue(value);
      return value;
    } catch {
      log.error(`corrupt JSON for key ${JSON.stringify(key)} in ${this.namespace}; treating as absent`);
      return undefined;
    }
  }
}

/** Open a namespace in its own database handle; `close()` releases the file. */
export function openStore(file: string, namespace: string): KeyValueStore {
  const db = openDatabase(file);
  try {
    return new KeyValueStore(db, namespace, { ownsDb: true });
  } catch (e) {
    db.close();
    throw e;
  }
}
