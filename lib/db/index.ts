import Database from "better-sqlite3";
import {
  drizzle,
  type BetterSQLite3Database,
} from "drizzle-orm/better-sqlite3";
import { DATABASE_CONFIG } from "@/config";
import * as schema from "./schema";

export type LedgerDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: LedgerDatabase;
  sqlite: Database.Database;
  close(): void;
}

/**
 * Strip the "file:" prefix; better-sqlite3 takes a plain path or ":memory:"
 */
export function toSqlitePath(url: string): string {
  return url.replace(/^file:/, "");
}

/**
 * Create the statistics tables if they don't exist
 */
export function ensureSchema(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS statistics_meta (
      series_id TEXT PRIMARY KEY NOT NULL,
      name TEXT NOT NULL,
      unit TEXT NOT NULL,
      unit_class TEXT NOT NULL,
      source TEXT NOT NULL,
      has_sum INTEGER DEFAULT 1 NOT NULL,
      has_mean INTEGER DEFAULT 0 NOT NULL,
      updated_at_ms INTEGER DEFAULT (unixepoch() * 1000) NOT NULL
    )
  `);

  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS statistics (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      series_id TEXT NOT NULL,
      start_ms INTEGER NOT NULL,
      state REAL NOT NULL,
      sum REAL NOT NULL,
      created_at_ms INTEGER DEFAULT (unixepoch() * 1000) NOT NULL
    )
  `);

  sqlite.exec(
    `CREATE UNIQUE INDEX IF NOT EXISTS statistics_series_start_unique ON statistics (series_id, start_ms)`,
  );
  sqlite.exec(
    `CREATE INDEX IF NOT EXISTS statistics_start_idx ON statistics (start_ms)`,
  );
}

/**
 * Open (and if needed initialise) the statistics database
 */
export function createDatabase(
  url: string = DATABASE_CONFIG.url,
): DatabaseHandle {
  const path = toSqlitePath(url);
  const sqlite = new Database(path);

  if (path !== ":memory:") {
    // Enable WAL mode for better concurrent access
    sqlite.pragma("journal_mode = WAL");
  }

  ensureSchema(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => sqlite.close(),
  };
}

export * from "./schema";
export { schema };
