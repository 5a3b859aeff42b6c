/**
 * Action Entity Tests
 */

import { describe, it, expect } from "vitest";
import {
  createAction,
  decodeExtra,
  describeAction,
  isPersisted,
  normalizeKind,
  rawExtra,
  rawKind,
} from "./action.js";
import { ActionValidationError } from "./errors.js";
import { ActionKind, type ActionInput } from "./types.js";

const CREATED = "2026-03-01T12:00:00.000Z";
const TRIGGER = "2026-03-01T13:00:00.000Z";

function input(overrides: Partial<ActionInput> = {}): ActionInput {
  return {
    authorId: "u1",
    channelId: "c1",
    messageId: "m1",
    guildId: "g1",
    createdAt: CREATED,
    triggerAt: TRIGGER,
    extra: { content: "stretch" },
    ...overrides,
  };
}

function validationError(fn: () => unknown): ActionValidationError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ActionValidationError) return error;
    throw error;
  }
  throw new Error("expected an ActionValidationError");
}

describe("createAction", () => {
  it("builds a reminder from the symbolic kind and JSON payload", () => {
    const action = createAction(input({ kind: "REMINDER", extra: '{"content":"stretch"}' }));

    expect(action.kind).toBe(ActionKind.REMINDER);
    expect(action.extra).toEqual({ content: "stretch" });
    expect(action.authorId).toBe("u1");
    expect(action.guildId).toBe("g1");
    expect(action.createdAt.toISOString()).toBe(CREATED);
    expect(action.triggerAt.toISOString()).toBe(TRIGGER);
    expect(action.id).toBeUndefined();
  });

  it("defaults to the reminder kind", () => {
    expect(createAction(input()).kind).toBe(ActionKind.REMINDER);
  });

  it("builds an infraction from the numeric code", () => {
    const action = createAction(input({ kind: 2, extra: { targetId: "u2", reason: "spam" } }));

    expect(action.kind).toBe(ActionKind.INFRACTION);
    expect(action.extra).toEqual({ targetId: "u2", reason: "spam" });
  });

  it("freezes the action and its payload", () => {
    const action = createAction(input());

    expect(Object.isFrozen(action)).toBe(true);
    expect(Object.isFrozen(action.extra)).toBe(true);
  });

  it("maps a null guild to undefined", () => {
    expect(createAction(input({ guildId: null })).guildId).toBeUndefined();
  });

  it("defaults createdAt to now", () => {
    const before = Date.now();
    const action = createAction(input({ createdAt: undefined, triggerAt: new Date(before + 60_000) }));

    expect(action.createdAt.getTime()).toBeGreaterThanOrEqual(before);
    expect(action.createdAt.getTime()).toBeLessThanOrEqual(Date.now());
  });

  it("copies Date inputs instead of sharing them", () => {
    const triggerAt = new Date(TRIGGER);
    const action = createAction(input({ triggerAt }));

    triggerAt.setTime(0);
    expect(action.triggerAt.toISOString()).toBe(TRIGGER);
  });

  it("rejects an unknown symbolic kind", () => {
    const error = validationError(() => createAction(input({ kind: "BAN" })));

    expect(error.field).toBe("kind");
    expect(error.message).toBe('Invalid action kind: unknown kind "BAN"');
  });

  it("rejects an unknown numeric kind", () => {
    expect(validationError(() => createAction(input({ kind: 3 }))).field).toBe("kind");
  });

  it("rejects malformed JSON payloads", () => {
    const error = validationError(() => createAction(input({ extra: "{not json" })));

    expect(error.field).toBe("extra");
    expect(error.message.startsWith("Invalid action extra: malformed JSON (")).toBe(true);
  });

  it("rejects JSON that is not an object", () => {
    const error = validationError(() => createAction(input({ extra: "[1,2]" })));

    expect(error.message).toBe("Invalid action extra: JSON must encode an object");
  });

  it("rejects payloads with unexpected keys", () => {
    const error = validationError(() => createAction(input({ extra: { content: "x", colour: "red" } })));

    expect(error.field).toBe("extra");
    expect(error.message).toContain("does not match REMINDER payload");
  });

  it("rejects an infraction payload without a target", () => {
    const error = validationError(() => createAction(input({ kind: "INFRACTION", extra: { reason: "spam" } })));

    expect(error.message).toContain("does not match INFRACTION payload (targetId: Required)");
  });

  it("rejects a trigger time before creation", () => {
    const error = validationError(() => createAction(input({ triggerAt: "2026-03-01T11:59:59.000Z" })));

    expect(error.field).toBe("triggerAt");
    expect(error.message).toBe("Invalid action triggerAt: must not be before createdAt");
  });

  it("accepts a trigger time equal to creation", () => {
    expect(createAction(input({ triggerAt: CREATED })).triggerAt.toISOString()).toBe(CREATED);
  });

  it("rejects unparseable timestamps", () => {
    const error = validationError(() => createAction(input({ triggerAt: "not-a-date" })));

    expect(error.message).toBe("Invalid action triggerAt: not a valid timestamp: not-a-date");
  });

  it("rejects empty identifiers", () => {
    expect(validationError(() => createAction(input({ authorId: "" }))).field).toBe("authorId");
    expect(validationError(() => createAction(input({ channelId: "" }))).field).toBe("channelId");
    expect(validationError(() => createAction(input({ messageId: "" }))).field).toBe("messageId");
    expect(validationError(() => createAction(input({ id: "" }))).field).toBe("id");
  });
});

describe("normalizeKind", () => {
  it("accepts codes and names", () => {
    expect(normalizeKind(1)).toBe(ActionKind.REMINDER);
    expect(normalizeKind("INFRACTION")).toBe(ActionKind.INFRACTION);
  });

  it("does not accept inherited property names", () => {
    expect(() => normalizeKind("toString")).toThrow(ActionValidationError);
  });
});

describe("decodeExtra", () => {
  it("passes objects through", () => {
    const extra = { content: "x" };
    expect(decodeExtra(extra)).toBe(extra);
  });

  it("rejects JSON null", () => {
    expect(() => decodeExtra("null")).toThrow("Invalid action extra: JSON must encode an object");
  });
});

describe("views", () => {
  const action = createAction(input());

  it("exposes the raw kind and payload", () => {
    expect(rawKind(action)).toBe("REMINDER");
    expect(rawExtra(action)).toBe('{"content":"stretch"}');
  });

  it("describes an action for log lines", () => {
    expect(describeAction(action)).toEqual({
      actionId: null,
      kind: "REMINDER",
      authorId: "u1",
      guildId: "g1",
      channelId: "c1",
      triggerAt: TRIGGER,
    });
  });

  it("tells persisted actions apart", () => {
    expect(isPersisted(action)).toBe(false);
    expect(isPersisted(createAction(input({ id: "act_123" })))).toBe(true);
  });
});
