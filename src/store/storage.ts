import { mkdirSync, readFileSync, renameSync, rmSync, writeFileSync } from "node:fs";
import { basename, dirname, join } from "node:path";
import type { Database as DatabaseType } from "better-sqlite3";
import { isErrnoException } from "../errors.js";

/**
 * Platform-neutral persistence for the configuration document.
 * `write` must replace the whole document atomically: a reader in another
 * process sees either the previous document or the new one, never a mix.
 */
export interface ConfigStorage {
  readonly location: string;
  read(): string | null;
  write(document: string): void;
  /**
   * Run a read-modify-write so no other writer of the same storage can
   * interleave. Storages without a lock leave this out.
   */
  exclusive?<T>(fn: () => T): T;
}

export const CONFIG_DOCUMENT_KEY = "kash_stash_config";

export class SqliteConfigStorage implements ConfigStorage {
  constructor(
    private db: DatabaseType,
    private key: string = CONFIG_DOCUMENT_KEY,
  ) {}

  get location(): string {
    return `sqlite:${this.db.name}#${this.key}`;
  }

  read(): string | null {
    const row = this.db
      .prepare<[string], { document: string }>(`SELECT document FROM config_documents WHERE key = ?`)
      .get(this.key);
    return row?.document ?? null;
  }

  write(document: string): void {
    const upsert = this.db.prepare(
      `INSERT INTO config_documents (key, document, updated_at) VALUES (?, ?, ?)
       ON CONFLICT (key) DO UPDATE SET document = excluded.document, updated_at = excluded.updated_at`,
    );
    this.db.transaction(() => {
      upsert.run(this.key, document, new Date().toISOString());
    })();
  }

  /** BEGIN IMMEDIATE takes the write lock up front, so a concurrent writer waits on busy_timeout. */
  exclusive<T>(fn: () => T): T {
    return this.db.transaction(fn).immediate();
  }
}

/**
 * A JSON file shared with other processes (the mobile apps keep their
 * configuration in `kash_stash_config.json`). Writes go to a temporary
 * sibling first and are renamed over the target.
 */
export class JsonFileConfigStorage implements ConfigStorage {
  constructor(private filePath: string) {}

  get location(): string {
    return this.filePath;
  }

  read(): string | null {
    try {
      return readFileSync(this.filePath, "utf-8");
    } catch (err: unknown) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }
  }

  write(document: string): void {
    const dir = dirname(this.filePath);
    mkdirSync(dir, { recursive: true });

    const tmpPath = join(dir, `.${basename(this.filePath)}.${process.pid}.tmp`);
    try {
      writeFileSync(tmpPath, document, "utf-8");
      renameSync(tmpPath, this.filePath);
    } catch (err) {
      rmSync(tmpPath, { force: true });
      throw err;
    }
  }
}
