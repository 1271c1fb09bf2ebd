/**
 * KV Store
 *
 * Tuple-keyed key/value storage on a single SQLite table (better-sqlite3).
 * Keys are arrays of strings, numbers or booleans, stored as their JSON
 * encoding so that a key prefix is also a string prefix. Values are JSON.
 */

import Database from 'better-sqlite3';
import { withDbSpan, isOTELEnabled } from '../telemetry/otel.ts';

export type KvKeyPart = string | number | boolean;
export type KvKey = readonly KvKeyPart[];

export interface KvEntry<T> {
  key: KvKey;
  value: T;
  versionstamp: string;
}

export interface KVStoreOptions {
  /** SQLite file path, or ':memory:' */
  path?: string;
}

export interface KvListOptions {
  limit?: number;
  reverse?: boolean;
}

export interface KvCommitResult {
  ok: boolean;
}

interface KvRow {
  key: string;
  value: string;
  versionstamp: number;
}

/** Upper bound for prefix scans: sorts after every UTF-8 continuation */
const PREFIX_END = '\u{10FFFF}';

function encodeKey(key: KvKey): string {
  return JSON.stringify(key);
}

function decodeKey(raw: string): KvKey {
  const parsed: unknown = JSON.parse(raw);
  if (!Array.isArray(parsed)) {
    throw new Error(`Corrupt KV key: ${raw}`);
  }
  return parsed.filter(
    (part): part is KvKeyPart =>
      typeof part === 'string' || typeof part === 'number' || typeof part === 'boolean'
  );
}

/**
 * Range bounds covering every key that starts with `prefix`
 */
function prefixRange(prefix: KvKey): [string, string] {
  if (prefix.length === 0) {
    return ['[', `[${PREFIX_END}`];
  }
  const start = encodeKey(prefix).slice(0, -1) + ',';
  return [start, start + PREFIX_END];
}

/**
 * KV Store wrapper over SQLite
 */
export class KVStore {
  private handle: Database.Database | null = null;
  private version = 0;

  constructor(private options: KVStoreOptions = {}) {}

  /**
   * Open the database and create the table
   */
  async init(): Promise<void> {
    if (this.handle) return;
    const db = new Database(this.options.path ?? ':memory:');
    db.pragma('journal_mode = WAL');
    db.exec(`
      CREATE TABLE IF NOT EXISTS kv (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        versionstamp INTEGER NOT NULL,
        expires_at INTEGER
      );
      CREATE TABLE IF NOT EXISTS kv_sequences (
        name TEXT PRIMARY KEY,
        value INTEGER NOT NULL
      );
    `);
    const row = db
      .prepare<[], { v: number }>('SELECT COALESCE(MAX(versionstamp), 0) AS v FROM kv')
      .get();
    this.version = row?.v ?? 0;
    this.handle = db;
  }

  /**
   * Get a value by key
   */
  async get<T>(key: KvKey): Promise<T | null> {
    const entry = await this.getEntry<T>(key);
    return entry ? entry.value : null;
  }

  /**
   * Get a value together with its versionstamp
   */
  async getEntry<T>(key: KvKey): Promise<KvEntry<T> | null> {
    if (!isOTELEnabled()) {
      return this.readEntry<T>(key);
    }
    return await withDbSpan('kv.get', key, async () => this.readEntry<T>(key));
  }

  /**
   * Get multiple values by keys
   */
  async getMany<T>(keys: KvKey[]): Promise<(T | null)[]> {
    return keys.map((key) => this.readEntry<T>(key)?.value ?? null);
  }

  /**
   * Set a value, optionally expiring after `expireIn` milliseconds
   */
  async set<T>(key: KvKey, value: T, options?: { expireIn?: number }): Promise<void> {
    if (!isOTELEnabled()) {
      this.writeEntry(key, value, options?.expireIn);
      return;
    }

    await withDbSpan('kv.set', key, async (span) => {
      if (options?.expireIn) {
        span.setAttribute('db.kv.ttl', options.expireIn);
      }
      this.writeEntry(key, value, options?.expireIn);
    });
  }

  /**
   * Delete a value
   */
  async delete(key: KvKey): Promise<void> {
    if (!isOTELEnabled()) {
      this.removeEntry(key);
      return;
    }
    await withDbSpan('kv.delete', key, async () => this.removeEntry(key));
  }

  /**
   * List values whose key starts with `prefix`, in key order
   */
  async list<T>(prefix: KvKey, options: KvListOptions = {}): Promise<KvEntry<T>[]> {
    if (!isOTELEnabled()) {
      return this.scan<T>(prefix, options);
    }

    return await withDbSpan('kv.list', prefix, async (span) => {
      const results = this.scan<T>(prefix, options);
      span.setAttribute('db.result.count', results.length);
      return results;
    });
  }

  /**
   * Start an atomic operation. Checks and mutations commit in one transaction.
   */
  atomic(): AtomicOperation {
    return new AtomicOperation(this);
  }

  /**
   * Increment and return a named sequence, starting at 1
   */
  async nextSequence(name: string): Promise<number> {
    const row = this.db
      .prepare<[string], { value: number }>(
        `INSERT INTO kv_sequences (name, value) VALUES (?, 1)
         ON CONFLICT(name) DO UPDATE SET value = value + 1
         RETURNING value`
      )
      .get(name);
    if (!row) {
      throw new Error(`Sequence ${name} could not be advanced`);
    }
    return row.value;
  }

  close(): void {
    if (this.handle) {
      this.handle.close();
      this.handle = null;
    }
  }

  // --------------------------------------------------------------------------
  // Synchronous primitives shared with AtomicOperation
  // --------------------------------------------------------------------------

  /** @internal */
  readEntry<T>(key: KvKey): KvEntry<T> | null {
    const row = this.db
      .prepare<[string, number], KvRow>(
        'SELECT key, value, versionstamp FROM kv WHERE key = ? AND (expires_at IS NULL OR expires_at > ?)'
      )
      .get(encodeKey(key), Date.now());
    if (!row) return null;
    return { key, value: JSON.parse(row.value), versionstamp: String(row.versionstamp) };
  }

  /** @internal */
  writeEntry(key: KvKey, value: unknown, expireIn?: number): void {
    this.version++;
    const expiresAt = expireIn !== undefined && expireIn > 0 ? Date.now() + expireIn : null;
    this.db
      .prepare(
        `INSERT INTO kv (key, value, versionstamp, expires_at) VALUES (?, ?, ?, ?)
         ON CONFLICT(key) DO UPDATE SET value = excluded.value,
           versionstamp = excluded.versionstamp, expires_at = excluded.expires_at`
      )
      .run(encodeKey(key), JSON.stringify(value), this.version, expiresAt);
  }

  /** @internal */
  removeEntry(key: KvKey): void {
    this.db.prepare('DELETE FROM kv WHERE key = ?').run(encodeKey(key));
  }

  /** @internal */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  private scan<T>(prefix: KvKey, options: KvListOptions): KvEntry<T>[] {
    const [start, end] = prefixRange(prefix);
    const order = options.reverse ? 'DESC' : 'ASC';
    const limit = options.limit ?? -1;
    const rows = this.db
      .prepare<[string, string, number, number], KvRow>(
        `SELECT key, value, versionstamp FROM kv
         WHERE key >= ? AND key < ? AND (expires_at IS NULL OR expires_at > ?)
         ORDER BY key ${order} LIMIT ?`
      )
      .all(start, end, Date.now(), limit);

    return rows.map((row) => ({
      key: decodeKey(row.key),
      value: JSON.parse(row.value),
      versionstamp: String(row.versionstamp),
    }));
  }

  private get db(): Database.Database {
    if (!this.handle) {
      throw new Error('KV store not initialized. Call init() first.');
    }
    return this.handle;
  }
}

type Mutation =
  | { type: 'set'; key: KvKey; value: unknown; expireIn?: number }
  | { type: 'delete'; key: KvKey };

interface AtomicCheck {
  key: KvKey;
  /** null asserts the key does not exist */
  versionstamp: string | null;
}

/**
 * Batched checks and mutations, applied all-or-nothing
 */
export class AtomicOperation {
  private checks: AtomicCheck[] = [];
  private mutations: Mutation[] = [];

  constructor(private store: KVStore) {}

  check(...checks: AtomicCheck[]): this {
    this.checks.push(...checks);
    return this;
  }

  set(key: KvKey, value: unknown, options?: { expireIn?: number }): this {
    this.mutations.push({ type: 'set', key, value, expireIn: options?.expireIn });
    return this;
  }

  delete(key: KvKey): this {
    this.mutations.push({ type: 'delete', key });
    return this;
  }

  /**
   * Apply the mutations if every check holds. `ok` is false when a check failed.
   */
  async commit(): Promise<KvCommitResult> {
    return this.store.transaction(() => {
      for (const check of this.checks) {
        const current = this.store.readEntry(check.key);
        const currentStamp = current ? current.versionstamp : null;
        if (currentStamp !== check.versionstamp) {
          return { ok: false };
        }
      }

      for (const mutation of this.mutations) {
        if (mutation.type === 'set') {
          this.store.writeEntry(mutation.key, mutation.value, mutation.expireIn);
        } else {
          this.store.removeEntry(mutation.key);
        }
      }

      return { ok: true };
    });
  }
}
