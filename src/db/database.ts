import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import type { Database as DatabaseType } from "better-sqlite3";

export const SCHEMA_VERSION = 1;

const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS config_documents (
  key        TEXT PRIMARY KEY,
  document   TEXT NOT NULL,
  updated_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS events (
  event_id   INTEGER PRIMARY KEY AUTOINCREMENT,
  event_type TEXT NOT NULL,
  timestamp  TEXT NOT NULL,
  payload    TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_events_type ON events (event_type);
CREATE INDEX IF NOT EXISTS idx_events_ts   ON events (timestamp);
`;

/**
 * Owns the SQLite connection shared by the config store and the event log.
 * Several processes may open the same file; WAL mode plus a busy timeout
 * lets a reader and a writer proceed without SQLITE_BUSY errors.
 */
export class DatabaseManager {
  private db: DatabaseType | null = null;

  get connection(): DatabaseType {
    if (!this.db) {
      throw new Error("Database not opened. Call open() first.");
    }
    return this.db;
  }

  /** Open (creating the parent directory for file databases). */
  open(path: string): void {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    this.db = new Database(path);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("busy_timeout = 2000");
  }

  /**
   * Create the schema if this file has none yet. Safe to call on every
   * start and from every process; DB_INITIALIZED is only recorded once.
   */
  initialize(): void {
    const db = this.connection;

    db.transaction(() => {
      if (this.schemaVersion() >= SCHEMA_VERSION) return;

      db.exec(SCHEMA_SQL);
      db.pragma(`user_version = ${SCHEMA_VERSION}`);

      const now = new Date().toISOString();
      db.prepare(`INSERT INTO events (event_type, timestamp, payload) VALUES (?, ?, ?)`).run(
        "DB_INITIALIZED",
        now,
        JSON.stringify({ initialized_at: now, schema_version: SCHEMA_VERSION }),
      );
    }).immediate();
  }

  isInitialized(): boolean {
    if (!this.db) return false;
    return this.schemaVersion() >= SCHEMA_VERSION;
  }

  schemaVersion(): number {
    const version: unknown = this.connection.pragma("user_version", { simple: true });
    return typeof version === "number" ? version : 0;
  }

  close(): void {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
