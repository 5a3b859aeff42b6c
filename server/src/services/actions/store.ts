/**
 * Action Store
 *
 * Durable storage for pending actions. The dispatcher only ever needs the
 * soonest row, so `fetchSoonest` is bounded by a horizon to keep the query
 * cheap when far-future actions pile up.
 *
 * A row that no longer decodes into a valid action is quarantined: its
 * `invalid_reason` is set and every read skips it from then on, so one bad
 * row never blocks the actions queued behind it.
 */

import type Database from "better-sqlite3";
import { nanoid } from "nanoid";
import { createComponentLogger } from "#logging.js";
import { createAction, kindName, rawExtra, rawKind } from "./action.js";
import { ActionValidationError } from "./errors.js";
import type { Action, ActionFilter, PersistedAction } from "./types.js";

const log = createComponentLogger("actions.store");

const DAY_MS = 24 * 60 * 60 * 1000;

// ============================================
// INTERFACE
// ============================================

export interface ActionStore {
  /** Soonest action due within the horizon, or null when idle */
  fetchSoonest(): Promise<PersistedAction | null>;
  /** Persist an action and return its stored form with an id assigned */
  insert(action: Action): Promise<PersistedAction>;
  /** Remove by id. Idempotent; resolves true if a row was removed. */
  delete(id: string): Promise<boolean>;
  get(id: string): Promise<PersistedAction | null>;
  /** Pending actions ordered by trigger time */
  list(filter?: ActionFilter): Promise<PersistedAction[]>;
}

export interface SqliteActionStoreOptions {
  /** Only actions due before now + horizonMs are fetched (default: 28 days) */
  horizonMs?: number;
}

// ============================================
// ROW MAPPING
// ============================================

interface ActionRow {
  id: string;
  kind: string;
  author_id: string;
  guild_id: string | null;
  channel_id: string;
  message_id: string;
  created_at: string;
  trigger_at: string;
  extra: string;
  invalid_reason: string | null;
}

export function rowToAction(row: ActionRow): PersistedAction {
  const action = createAction({
    id: row.id,
    kind: row.kind,
    authorId: row.author_id,
    guildId: row.guild_id,
    channelId: row.channel_id,
    messageId: row.message_id,
    createdAt: row.created_at,
    triggerAt: row.trigger_at,
    extra: row.extra,
  });
  return Object.freeze({ ...action, id: row.id });
}

// ============================================
// SQLITE IMPLEMENTATION
// ============================================

export function createSqliteActionStore(
  db: Database.Database,
  options: SqliteActionStoreOptions = {},
): ActionStore {
  const horizonMs = options.horizonMs ?? 28 * DAY_MS;

  const selectSoonest = db.prepare<[string], ActionRow>(`
    SELECT * FROM actions
    WHERE trigger_at < ? AND invalid_reason IS NULL
    ORDER BY trigger_at ASC, created_at ASC
    LIMIT 1
  `);

  const insertRow = db.prepare<
    [string, string, string, string | null, string, string, string, string, string],
    ActionRow
  >(`
    INSERT INTO actions
      (id, kind, author_id, guild_id, channel_id, message_id, created_at, trigger_at, extra)
    VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    RETURNING *
  `);

  const deleteRow = db.prepare<[string]>("DELETE FROM actions WHERE id = ?");
  const selectById = db.prepare<[string], ActionRow>("SELECT * FROM actions WHERE id = ?");
  const quarantineRow = db.prepare<[string, string]>("UPDATE actions SET invalid_reason = ? WHERE id = ?");

  /** Decode a row, quarantining it when it is not a valid action */
  function decodeRow(row: ActionRow): PersistedAction | null {
    try {
      return rowToAction(row);
    } catch (error) {
      if (!(error instanceof ActionValidationError)) throw error;
      quarantineRow.run(error.message, row.id);
      log.error("Quarantined invalid action row", error, {
        actionId: row.id,
        kind: row.kind,
        triggerAt: row.trigger_at,
      });
      return null;
    }
  }

  async function fetchSoonest(): Promise<PersistedAction | null> {
    const horizon = new Date(Date.now() + horizonMs).toISOString();
    for (let row = selectSoonest.get(horizon); row; row = selectSoonest.get(horizon)) {
      const action = decodeRow(row);
      if (action) return action;
    }
    return null;
  }

  async function insert(action: Action): Promise<PersistedAction> {
    const id = `act_${nanoid(12)}`;
    const row = insertRow.get(
      id,
      rawKind(action),
      action.authorId,
      action.guildId ?? null,
      action.channelId,
      action.messageId,
      action.createdAt.toISOString(),
      action.triggerAt.toISOString(),
      rawExtra(action),
    );
    if (!row) {
      throw new Error(`Insert of action ${id} returned no row`);
    }

    const stored = rowToAction(row);
    log.debug("Action stored", { actionId: stored.id, kind: row.kind, triggerAt: row.trigger_at });
    return stored;
  }

  async function deleteAction(id: string): Promise<boolean> {
    return deleteRow.run(id).changes > 0;
  }

  async function get(id: string): Promise<PersistedAction | null> {
    const row = selectById.get(id);
    return row ? rowToAction(row) : null;
  }

  async function list(filter: ActionFilter = {}): Promise<PersistedAction[]> {
    const clauses: string[] = ["invalid_reason IS NULL"];
    const params: string[] = [];

    if (filter.authorId !== undefined) {
      clauses.push("author_id = ?");
      params.push(filter.authorId);
    }
    if (filter.kind !== undefined) {
      clauses.push("kind = ?");
      params.push(kindName(filter.kind));
    }

    const rows = db
      .prepare<string[], ActionRow>(
        `SELECT * FROM actions WHERE ${clauses.join(" AND ")} ORDER BY trigger_at ASC, created_at ASC`,
      )
      .all(...params);
    return rows.flatMap((row) => decodeRow(row) ?? []);
  }

  return {
    fetchSoonest,
    insert,
    delete: deleteAction,
    get,
    list,
  };
}
