import { drizzle, type BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";
import { applyMigrations } from "./migrate.js";
import * as schema from "./schema.js";

export type AppDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: AppDatabase;
  close(): void;
}

/**
 * Open (and migrate) the SQLite database at `url`. Pass ":memory:" for an
 * ephemeral database.
 */
export function createDatabase(url: string): DatabaseHandle {
  if (url !== ":memory:") {
    mkdirSync(dirname(url), { recursive: true });
  }

  const sqlite = new Database(url);
  if (url !== ":memory:") {
    sqlite.pragma("journal_mode = WAL");
  }
  applyMigrations(sqlite);

  return {
    db: drizzle(sqlite, { schema }),
    close: () => sqlite.close(),
  };
}

export { schema };
