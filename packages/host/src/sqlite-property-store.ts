import Database from "better-sqlite3";
import type { PropertyStore } from "@bucket-cache/engine";

export interface SqlitePropertyStoreOptions {
  /**
   * Database file, or ":memory:" for a process-scoped store.
   */
  filename: string;
  tableName?: string;
}

const TABLE_NAME_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Property slots in a SQLite table, so persisted buckets outlive the process.
 */
export class SqlitePropertyStore implements PropertyStore {
  private readonly db: Database.Database;
  private readonly tableName: string;
  private closed = false;

  constructor(options: SqlitePropertyStoreOptions) {
    const tableName = options.tableName ?? "cache_properties";
    if (!TABLE_NAME_PATTERN.test(tableName)) {
      throw new Error(`Invalid property table name: ${tableName}`);
    }
    this.tableName = tableName;
    this.db = new Database(options.filename);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS ${this.tableName} (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL,
        updated_at TEXT DEFAULT (datetime('now'))
      )
    `);
  }

  async get(key: string): Promise<string | null> {
    const row = this.db.prepare(`SELECT value FROM ${this.tableName} WHERE key = ?`).get(key) as
      | { value: string }
      | undefined;
    return row?.value ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.db
      .prepare(
        `INSERT OR REPLACE INTO ${this.tableName} (key, value, updated_at) VALUES (?, ?, datetime('now'))`
      )
      .run(key, value);
  }

  async remove(key: string): Promise<void> {
    this.db.prepare(`DELETE FROM ${this.tableName} WHERE key = ?`).run(key);
  }

  async keys(): Promise<string[]> {
    const rows = this.db.prepare(`SELECT key FROM ${this.tableName} ORDER BY key`).all() as Array<{ key: string }>;
    return rows.map((row) => row.key);
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.db.close();
  }
}

export const createSqlitePropertyStore = (options: SqlitePropertyStoreOptions): SqlitePropertyStore =>
  new SqlitePropertyStore(options);
