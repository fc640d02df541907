/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the plan store schema
 * from any prior version to the current version. Runs when the
 * database is opened.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a new function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { z } from "zod";
import { createComponentLogger } from "../logging.js";

const log = createComponentLogger("db.migrations");

// ============================================
// MIGRATION RUNNER
// ============================================

type Migration = (db: Database.Database) => void;

const versionRowSchema = z.object({ v: z.number().nullable() });

/**
 * Run all pending migrations against the open database.
 * Safe to call on every open: already-applied migrations are skipped.
 * Returns the schema version afterwards.
 */
export function runMigrations(db: Database.Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = versionRowSchema.parse(db.prepare("SELECT MAX(version) AS v FROM schema_version").get());
  const currentVersion = row.v ?? -1;
  const targetVersion = migrations.length - 1;

  if (currentVersion >= targetVersion) {
    return currentVersion;
  }

  log.info("Running migrations", { from: currentVersion, to: targetVersion });

  const stamp = db.prepare(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  for (let i = currentVersion + 1; i < migrations.length; i++) {
    const txn = db.transaction(() => {
      migrations[i](db);
      stamp.run(i);
    });
    txn();
    log.debug("Applied migration", { version: i });
  }

  return targetVersion;
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // ── v0: Plans ──────────────────────────────────────────────────────
  // One row per plan; the full plan document lives in `document`.
  function v0_plans(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS plans (
        id TEXT PRIMARY KEY,
        correlation_id TEXT NOT NULL,
        status TEXT NOT NULL,
        task_instruction TEXT NOT NULL,
        document TEXT NOT NULL,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_plans_updated ON plans(updated_at);
    `);
  },

  // ── v1: Correlation lookup ─────────────────────────────────────────
  function v1_correlation_index(db) {
    db.exec(`CREATE INDEX IF NOT EXISTS idx_plans_correlation ON plans(correlation_id);`);
  },
];
