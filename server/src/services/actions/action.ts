/**
 * Action Entity
 *
 * Construction normalizes and validates loose input into a frozen, tagged
 * Action. Nothing is coerced to a default: an unknown kind or a payload that
 * does not match its kind is rejected.
 */

import { z } from "zod";
import { ActionValidationError } from "./errors.js";
import {
  ActionKind,
  type Action,
  type ActionInput,
  type ActionKindName,
  type PersistedAction,
} from "./types.js";

// ============================================
// PAYLOAD SCHEMAS
// ============================================

const ReminderExtraSchema = z.object({
  content: z.string(),
}).strict();

const InfractionExtraSchema = z.object({
  targetId: z.string().min(1),
  reason: z.string(),
}).strict();

const KIND_NAMES: Record<ActionKind, ActionKindName> = {
  [ActionKind.REMINDER]: "REMINDER",
  [ActionKind.INFRACTION]: "INFRACTION",
};

// ============================================
// NORMALIZATION
// ============================================

function isKindName(value: string): value is ActionKindName {
  return Object.prototype.hasOwnProperty.call(ActionKind, value);
}

/**
 * Accepts the numeric code or the symbolic name of a kind.
 */
export function normalizeKind(value: unknown): ActionKind {
  if (typeof value === "number") {
    const match = Object.values(ActionKind).find((code) => code === value);
    if (match !== undefined) return match;
  } else if (typeof value === "string" && isKindName(value)) {
    return ActionKind[value];
  }
  throw new ActionValidationError("kind", `unknown kind ${JSON.stringify(value)}`);
}

/**
 * Accepts an object or its JSON text.
 */
export function decodeExtra(value: Record<string, unknown> | string): Record<string, unknown> {
  if (typeof value !== "string") return value;

  let decoded: unknown;
  try {
    decoded = JSON.parse(value);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ActionValidationError("extra", `malformed JSON (${reason})`);
  }

  if (typeof decoded !== "object" || decoded === null || Array.isArray(decoded)) {
    throw new ActionValidationError("extra", "JSON must encode an object");
  }
  return Object.fromEntries(Object.entries(decoded));
}

function parseExtra<T>(schema: z.ZodType<T>, extra: Record<string, unknown>, kind: ActionKind): T {
  const result = schema.safeParse(extra);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ActionValidationError("extra", `does not match ${KIND_NAMES[kind]} payload (${issues})`);
  }
  return result.data;
}

function toDate(value: Date | string, field: string): Date {
  const date = new Date(value instanceof Date ? value.getTime() : value);
  if (Number.isNaN(date.getTime())) {
    throw new ActionValidationError(field, `not a valid timestamp: ${String(value)}`);
  }
  return date;
}

function requireId(value: unknown, field: string): string {
  if (typeof value !== "string" || value.length === 0) {
    throw new ActionValidationError(field, "must be a non-empty string");
  }
  return value;
}

// ============================================
// CONSTRUCTION
// ============================================

export function createAction(input: ActionInput): Action {
  const kind = normalizeKind(input.kind ?? ActionKind.REMINDER);
  const extra = decodeExtra(input.extra);
  const createdAt = input.createdAt === undefined ? new Date() : toDate(input.createdAt, "createdAt");
  const triggerAt = toDate(input.triggerAt, "triggerAt");

  if (triggerAt.getTime() < createdAt.getTime()) {
    throw new ActionValidationError("triggerAt", "must not be before createdAt");
  }

  const base = {
    id: input.id === undefined ? undefined : requireId(input.id, "id"),
    authorId: requireId(input.authorId, "authorId"),
    channelId: requireId(input.channelId, "channelId"),
    messageId: requireId(input.messageId, "messageId"),
    guildId: input.guildId ?? undefined,
    createdAt,
    triggerAt,
  };

  switch (kind) {
    case ActionKind.REMINDER:
      return Object.freeze({
        ...base,
        kind,
        extra: Object.freeze(parseExtra(ReminderExtraSchema, extra, kind)),
      });
    case ActionKind.INFRACTION:
      return Object.freeze({
        ...base,
        kind,
        extra: Object.freeze(parseExtra(InfractionExtraSchema, extra, kind)),
      });
  }
}

// ============================================
// VIEWS
// ============================================

export function kindName(kind: ActionKind): ActionKindName {
  return KIND_NAMES[kind];
}

/** Symbolic name of the kind, as stored and transmitted */
export function rawKind(action: Action): ActionKindName {
  return kindName(action.kind);
}

/** Payload as JSON text, as stored and transmitted */
export function rawExtra(action: Action): string {
  return JSON.stringify(action.extra);
}

export function isPersisted(action: Action): action is PersistedAction {
  return typeof action.id === "string";
}

/** Compact summary for log lines */
export function describeAction(action: Action): Record<string, unknown> {
  return {
    actionId: action.id ?? null,
    kind: rawKind(action),
    authorId: action.authorId,
    guildId: action.guildId ?? null,
    channelId: action.channelId,
    triggerAt: action.triggerAt.toISOString(),
  };
}
