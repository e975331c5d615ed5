import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { getConfig } from "../config.js";
import { CacheError, errorMessage } from "../errors.js";
import { log } from "../utils/logger.js";
import type { CachedTask, CacheWriter } from "./types.js";

const logger = log.child("cache");

const IN_MEMORY = ":memory:";

/** File-backed record of fingerprints whose task succeeded. */
export class CacheStore implements CacheWriter {
  readonly path: string;
  private db: Database.Database;

  constructor(dbPath?: string) {
    const path = dbPath ?? getConfig().cache.dbPath;
    this.path = path;
    try {
      if (path !== IN_MEMORY) mkdirSync(dirname(path), { recursive: true });
      this.db = new Database(path);
      if (path !== IN_MEMORY) this.db.pragma("journal_mode = WAL");
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS task_cache (
          fingerprint TEXT PRIMARY KEY,
          task_name   TEXT NOT NULL,
          recorded_at INTEGER NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_task_cache_name ON task_cache(task_name);
      `);
    } catch (err) {
      throw new CacheError(`Cannot open cache store at ${path}: ${errorMessage(err)}`, { cause: err });
    }
    logger.debug("Cache store opened", { path });
  }

  lookup(fingerprint: string): boolean {
    const row = this.db.prepare("SELECT 1 FROM task_cache WHERE fingerprint = ?").get(fingerprint);
    return row !== undefined;
  }

  record(taskName: string, fingerprint: string): void {
    this.db.prepare(`
      INSERT OR REPLACE INTO task_cache (fingerprint, task_name, recorded_at)
      VALUES (?, ?, ?)
    `).run(fingerprint, taskName, Date.now());
    logger.debug("Recorded fingerprint", { task: taskName, fingerprint });
  }

  /** Record several results in one transaction. */
  recordAll(entries: CachedTask[]): void {
    const insert = this.db.transaction((rows: CachedTask[]) => {
      for (const row of rows) this.record(row.taskName, row.fingerprint);
    });
    insert(entries);
  }

  list(taskName?: string): CachedTask[] {
    const rows = (taskName
      ? this.db.prepare("SELECT fingerprint, task_name FROM task_cache WHERE task_name = ? ORDER BY recorded_at").all(taskName)
      : this.db.prepare("SELECT fingerprint, task_name FROM task_cache ORDER BY recorded_at").all()) as CacheRow[];
    return rows.map((row) => ({ taskName: row.task_name, fingerprint: row.fingerprint }));
  }

  /** Delete a fingerprint. Returns true if it was present. */
  delete(fingerprint: string): boolean {
    return this.db.prepare("DELETE FROM task_cache WHERE fingerprint = ?").run(fingerprint).changes > 0;
  }

  /** Delete every entry. Returns the count removed. */
  clear(): number {
    return this.db.prepare("DELETE FROM task_cache").run().changes;
  }

  close(): void {
    this.db.close();
  }
}

type CacheRow = {
  fingerprint: string;
  task_name: string;
};
