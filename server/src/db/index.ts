/**
 * Database Manager
 *
 * SQLite database holding the pending actions table.
 */

import Database from "better-sqlite3";
import * as path from "path";
import * as fs from "fs";
import { createComponentLogger } from "#logging.js";
import { runMigrations } from "./migrations.js";

const log = createComponentLogger("db");

let db: Database.Database | null = null;

export function getDatabase(): Database.Database {
  if (!db) {
    throw new Error("Database not initialized. Call initDatabase() first.");
  }
  return db;
}

export function initDatabase(dbPath: string): Database.Database {
  fs.mkdirSync(path.dirname(dbPath), { recursive: true });

  db = new Database(dbPath);
  db.pragma("journal_mode = WAL");
  db.pragma("busy_timeout = 5000");

  // Creates tables on a fresh DB, evolves the schema on an existing one
  runMigrations(db);

  log.info("Database initialized", { path: dbPath });
  return db;
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}
