// pattern: Imperative Shell
import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import * as schema from "./schema";

const IN_MEMORY = ":memory:";

/**
 * DDL for the tables in ./schema. Every statement is guarded so it can run
 * against an existing database on each start.
 */
const SCHEMA_STATEMENTS: ReadonlyArray<string> = [
  `CREATE TABLE IF NOT EXISTS notification_history (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    feed_identity TEXT NOT NULL,
    entry_identity TEXT NOT NULL,
    notified_at INTEGER NOT NULL
  )`,
  `CREATE UNIQUE INDEX IF NOT EXISTS notification_history_feed_entry_idx
    ON notification_history (feed_identity, entry_identity)`,
];

/**
 * Opens the history database and creates its tables when they are missing.
 * Pass `":memory:"` for a throwaway database.
 */
export function createDatabase(
  dbPath: string,
): { readonly db: AppDatabase; readonly close: () => void } {
  if (dbPath !== IN_MEMORY) {
    mkdirSync(dirname(dbPath), { recursive: true });
  }

  const sqlite = new Database(dbPath);
  sqlite.pragma("journal_mode = WAL");

  ensureSchema(sqlite);

  const db = drizzle(sqlite, { schema });

  return { db, close: () => sqlite.close() };
}

export function ensureSchema(sqlite: Database.Database): void {
  sqlite.transaction(() => {
    for (const statement of SCHEMA_STATEMENTS) {
      sqlite.exec(statement);
    }
  })();
}

export type DatabaseResult = ReturnType<typeof createDatabase>;
export type AppDatabase = BetterSQLite3Database<typeof schema>;
