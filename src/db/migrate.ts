import Database from "better-sqlite3";
import { readFileSync } from "fs";
import { join, dirname } from "path";
import { fileURLToPath } from "url";

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const MIGRATION_PATH = join(__dirname, "../../drizzle/0000_init.sql");

export function applyMigrations(sqlite: Database.Database): void {
  const migration = readFileSync(MIGRATION_PATH, "utf-8");
  sqlite.exec(migration);
}

export function runMigrations(dbPath: string): void {
  const sqlite = new Database(dbPath);
  try {
    applyMigrations(sqlite);
  } finally {
    sqlite.close();
  }
}

// Run migrations if called directly
if (import.meta.url === `file://${process.argv[1]}`) {
  const dbPath = process.env.DATABASE_URL || "./data/invoice-inbox-sync.db";
  runMigrations(dbPath);
  console.log(`Database migrations applied to ${dbPath}`);
}
