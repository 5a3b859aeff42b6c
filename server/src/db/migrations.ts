/**
 * Database Migrations
 *
 * Sequential, numbered migrations that bring the database schema from any
 * prior version to the current one. Runs at startup after the database file
 * is opened.
 *
 * Rules:
 * - Migrations are append-only. Never edit a shipped migration.
 * - Each migration runs inside a transaction.
 * - To evolve the schema, add a new function to the `migrations` array.
 */

import type Database from "better-sqlite3";
import { createComponentLogger } from "#logging.js";

const log = createComponentLogger("db.migrations");

// ============================================
// MIGRATION RUNNER
// ============================================

type Migration = (db: Database.Database) => void;

/**
 * Run all pending migrations against the open database. Safe to call on
 * every startup; applied migrations are skipped. Returns the schema version.
 */
export function runMigrations(db: Database.Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_version (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const row = db
    .prepare<[], { v: number | null }>("SELECT MAX(version) AS v FROM schema_version")
    .get();
  const currentVersion = row?.v ?? -1;
  const targetVersion = migrations.length - 1;

  if (currentVersion >= targetVersion) {
    return currentVersion;
  }

  log.info("Migrating schema", { from: currentVersion, to: targetVersion });

  const stamp = db.prepare<[number]>(
    "INSERT INTO schema_version (version, applied_at) VALUES (?, datetime('now'))",
  );

  migrations.forEach((migrate, version) => {
    if (version <= currentVersion) return;
    db.transaction(() => {
      migrate(db);
      stamp.run(version);
    })();
    log.debug("Applied migration", { version });
  });

  return targetVersion;
}

// ============================================
// MIGRATIONS
// ============================================

const migrations: Migration[] = [
  // ── v0: Baseline ──────────────────────────────────────────────────
  // Timestamps are ISO-8601 UTC strings, so text ordering is time ordering.
  function v0_baseline(db) {
    db.exec(`
      CREATE TABLE IF NOT EXISTS actions (
        id TEXT PRIMARY KEY,
        kind TEXT NOT NULL,
        author_id TEXT NOT NULL,
        guild_id TEXT,
        channel_id TEXT NOT NULL,
        message_id TEXT NOT NULL,
        created_at TEXT NOT NULL,
        trigger_at TEXT NOT NULL,
        extra TEXT NOT NULL DEFAULT '{}'
      );
      CREATE INDEX IF NOT EXISTS idx_actions_trigger_at ON actions(trigger_at);
      CREATE INDEX IF NOT EXISTS idx_actions_author ON actions(author_id);
    `);
  },

  // ── v1: Quarantine ────────────────────────────────────────────────
  // Rows that no longer decode are set aside with a reason instead of
  // being retried forever or deleted.
  function v1_invalid_reason(db) {
    db.exec(`ALTER TABLE actions ADD COLUMN invalid_reason TEXT`);
  },
];
