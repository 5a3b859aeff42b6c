/**
 * Action Types
 *
 * A scheduled action is one future event (a reminder, or the expiry of a
 * timed infraction) carrying a payload whose shape is fixed by its kind.
 */

// ============================================
// KINDS
// ============================================

/**
 * Enumerated action kinds. The numeric code is the raw representation; the
 * key is the symbolic name used when an action is serialized.
 */
export const ActionKind = {
  REMINDER: 1,
  INFRACTION: 2,
} as const;

export type ActionKind = (typeof ActionKind)[keyof typeof ActionKind];
export type ActionKindName = keyof typeof ActionKind;

// ============================================
// PAYLOADS
// ============================================

export interface ReminderExtra {
  /** Text the author asked to be reminded of */
  content: string;
}

export interface InfractionExtra {
  /** Member whose infraction expires */
  targetId: string;
  reason: string;
}

// ============================================
// ACTION
// ============================================

interface ActionBase {
  /** Unset until persisted; assigned by the store on insert */
  readonly id?: string;
  readonly authorId: string;
  readonly channelId: string;
  readonly messageId: string;
  /** Absent for direct messages */
  readonly guildId?: string;
  readonly createdAt: Date;
  readonly triggerAt: Date;
}

export interface ReminderAction extends ActionBase {
  readonly kind: typeof ActionKind.REMINDER;
  readonly extra: Readonly<ReminderExtra>;
}

export interface InfractionAction extends ActionBase {
  readonly kind: typeof ActionKind.INFRACTION;
  readonly extra: Readonly<InfractionExtra>;
}

export type Action = ReminderAction | InfractionAction;

/** An action the store has assigned an id to */
export type PersistedAction = Action & { readonly id: string };

// ============================================
// INPUT
// ============================================

/**
 * Loose construction input: `kind` may be the code or the symbolic name,
 * `extra` may be an object or its JSON text.
 */
export interface ActionInput {
  id?: string;
  kind?: ActionKind | ActionKindName | number | string;
  authorId: string;
  channelId: string;
  messageId: string;
  guildId?: string | null;
  createdAt?: Date | string;
  triggerAt: Date | string;
  extra: Record<string, unknown> | string;
}

export interface ActionFilter {
  authorId?: string;
  kind?: ActionKind;
}
