/**
 * SQLite database connection
 *
 * One process-wide connection to the glossary database. Several pipeline
 * processes may share the file, so writers wait on a busy lock instead of
 * failing immediately.
 */

import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname, join } from "path";

const BUSY_TIMEOUT_MS = 5000;

let db: Database.Database | null = null;

/**
 * Explicit path, else DB_PATH, else data/glossary.db under the working
 * directory. Parent directories are created for file databases.
 */
export function resolveDbPath(explicit?: string): string {
  const dbPath =
    explicit || process.env.DB_PATH || join(process.cwd(), "data", "glossary.db");
  if (dbPath !== ":memory:") {
    mkdirSync(dirname(dbPath), { recursive: true });
  }
  return dbPath;
}

/**
 * Open the glossary database (idempotent: returns the open connection)
 *
 * @param dbPath - Overrides DB_PATH
 */
export function openDb(dbPath?: string): Database.Database {
  if (db) {
    return db;
  }

  const connection = new Database(resolveDbPath(dbPath));
  // Definitions and references cascade on term delete
  connection.pragma("foreign_keys = ON");
  connection.pragma("journal_mode = WAL");
  connection.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

  db = connection;
  return db;
}

export function closeDb(): void {
  if (db) {
    db.close();
    db = null;
  }
}

/**
 * Current connection
 *
 * @throws Error if openDb() was not called
 */
export function getDb(): Database.Database {
  if (!db) {
    throw new Error("Database not opened. Call openDb() first.");
  }
  return db;
}

/**
 * Inject a connection (or clear it with null)
 *
 * @internal Test use only
 */
export function setDbForTesting(testDb: Database.Database | null): void {
  db = testDb;
}
