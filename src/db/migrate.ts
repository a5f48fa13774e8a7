/**
 * Database migration runner
 *
 * Applies SQL migrations from migrations/ in filename order, recording
 * each in schema_migrations.
 */

import { readdirSync, readFileSync } from "fs";
import { join } from "path";
import type Database from "better-sqlite3";
import * as logger from "@/logger";
import { openDb, closeDb } from "./connection";

function migrationsDir(): string {
  return join(process.cwd(), "migrations");
}

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      version TEXT NOT NULL UNIQUE,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

function getAppliedMigrations(db: Database.Database): Set<string> {
  const rows = db
    .prepare<[], { version: string }>("SELECT version FROM schema_migrations")
    .all();
  return new Set(rows.map((r) => r.version));
}

/**
 * Migration filenames not yet applied, in order.
 * A missing migrations/ directory means nothing to apply.
 */
function getPendingMigrations(applied: Set<string>): string[] {
  let files: string[];
  try {
    files = readdirSync(migrationsDir());
  } catch (err) {
    logger.warn("No migrations directory found", {
      dir: migrationsDir(),
      error: err instanceof Error ? err.message : String(err),
    });
    return [];
  }

  return files
    .filter((f) => f.endsWith(".sql"))
    .sort()
    .filter((f) => !applied.has(f));
}

/**
 * Apply a single migration file atomically
 */
function applyMigration(db: Database.Database, filename: string): void {
  const sql = readFileSync(join(migrationsDir(), filename), "utf-8");

  const transaction = db.transaction(() => {
    db.exec(sql);
    db.prepare("INSERT INTO schema_migrations (version) VALUES (?)").run(
      filename,
    );
  });

  transaction();
}

/**
 * Apply all pending migrations to an open database
 *
 * @returns Filenames applied, in order
 */
export function migrateDb(db: Database.Database): string[] {
  ensureMigrationsTable(db);
  const pending = getPendingMigrations(getAppliedMigrations(db));
  for (const migration of pending) {
    logger.info("Applying migration", { migration });
    applyMigration(db, migration);
  }
  return pending;
}

/**
 * Open the configured database, migrate it and close it
 */
export function runMigrations(): void {
  const db = openDb();
  try {
    const applied = migrateDb(db);
    logger.info(
      applied.length === 0 ? "No pending migrations" : "Migrations complete",
      { applied: applied.length },
    );
  } finally {
    closeDb();
  }
}

/**
 * CLI entrypoint
 */
if (require.main === module) {
  runMigrations();
}
