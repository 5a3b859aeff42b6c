/**
 * Migration Runner Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import Database from "better-sqlite3";
import { runMigrations } from "./migrations.js";

vi.mock("#logging.js", () => ({
  createComponentLogger: () => ({
    trace: vi.fn(), debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), fatal: vi.fn(),
  }),
}));

describe("runMigrations", () => {
  let db: Database.Database;

  beforeEach(() => {
    db = new Database(":memory:");
  });

  afterEach(() => {
    db.close();
  });

  function tableNames(): string[] {
    return db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table' ORDER BY name")
      .all()
      .map((row) => row.name);
  }

  it("creates the schema on a fresh database", () => {
    expect(runMigrations(db)).toBe(1);
    expect(tableNames()).toEqual(["actions", "schema_version"]);
  });

  it("indexes trigger time and author", () => {
    runMigrations(db);

    const indexes = db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'actions' AND name LIKE 'idx_%' ORDER BY name")
      .all()
      .map((row) => row.name);
    expect(indexes).toEqual(["idx_actions_author", "idx_actions_trigger_at"]);
  });

  it("is a no-op when already current", () => {
    runMigrations(db);
    expect(runMigrations(db)).toBe(1);

    const versions = db.prepare<[], { version: number }>("SELECT version FROM schema_version").all();
    expect(versions).toEqual([{ version: 0 }, { version: 1 }]);
  });

  it("defaults the payload to an empty object", () => {
    runMigrations(db);
    db.prepare(`
      INSERT INTO actions (id, kind, author_id, channel_id, message_id, created_at, trigger_at)
      VALUES ('act_1', 'REMINDER', 'u1', 'c1', 'm1', '2026-03-01T12:00:00.000Z', '2026-03-01T13:00:00.000Z')
    `).run();

    const row = db
      .prepare<[], { extra: string; guild_id: string | null; invalid_reason: string | null }>(
        "SELECT extra, guild_id, invalid_reason FROM actions",
      )
      .get();
    expect(row).toEqual({ extra: "{}", guild_id: null, invalid_reason: null });
  });

  it("adds the quarantine column to a baseline database", () => {
    db.exec(`
      CREATE TABLE schema_version (version INTEGER PRIMARY KEY, applied_at TEXT NOT NULL DEFAULT (datetime('now')));
      CREATE TABLE actions (
        id TEXT PRIMARY KEY, kind TEXT NOT NULL, author_id TEXT NOT NULL, guild_id TEXT,
        channel_id TEXT NOT NULL, message_id TEXT NOT NULL, created_at TEXT NOT NULL,
        trigger_at TEXT NOT NULL, extra TEXT NOT NULL DEFAULT '{}'
      );
      INSERT INTO schema_version (version) VALUES (0);
      INSERT INTO actions (id, kind, author_id, channel_id, message_id, created_at, trigger_at)
      VALUES ('act_old', 'REMINDER', 'u1', 'c1', 'm1', '2026-03-01T12:00:00.000Z', '2026-03-01T13:00:00.000Z');
    `);

    expect(runMigrations(db)).toBe(1);

    const columns = db
      .prepare<[], { name: string }>("SELECT name FROM pragma_table_info('actions') ORDER BY cid")
      .all()
      .map((column) => column.name);
    expect(columns.at(-1)).toBe("invalid_reason");
    expect(db.prepare<[], { id: string }>("SELECT id FROM actions").all()).toEqual([{ id: "act_old" }]);
  });
});
