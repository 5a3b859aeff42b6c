/**
 * Scheduled Actions - Barrel Exports
 *
 * Single-flight delayed actions: reminders and infraction expiries.
 *
 * Structure:
 *   types.ts       - Action kinds, payloads, input shapes
 *   errors.ts      - Validation and lifecycle errors
 *   action.ts      - Construction, validation, raw views
 *   store.ts       - ActionStore interface + SQLite implementation
 *   notifier.ts    - Notifier interface + in-process event bus
 *   sync.ts        - Mutex, condition, abortable sleep
 *   dispatcher.ts  - Run-loop, fast path, reschedule
 */

// Dispatcher
export { ActionDispatcher, DEFAULT_DISPATCHER_OPTIONS } from "./dispatcher.js";
export type { DispatcherOptions } from "./dispatcher.js";

// Entity
export { createAction, describeAction, isPersisted, kindName, rawExtra, rawKind } from "./action.js";
export { ActionKind } from "./types.js";
export type {
  Action,
  ActionFilter,
  ActionInput,
  ActionKindName,
  InfractionAction,
  InfractionExtra,
  PersistedAction,
  ReminderAction,
  ReminderExtra,
} from "./types.js";

// Errors
export { ActionValidationError, DispatcherNotRunningError } from "./errors.js";

// Store
export { createSqliteActionStore } from "./store.js";
export type { ActionStore, SqliteActionStoreOptions } from "./store.js";

// Notifier
export { createEventNotifier } from "./notifier.js";
export type { EventNotifier, Notifier, TriggeredActionListener } from "./notifier.js";
