/**
 * Action Notifier
 *
 * Receives every fired action. Delivery is fire-and-forget: the dispatcher
 * never waits on, or retries, what listeners do with it.
 */

import { createComponentLogger } from "#logging.js";
import { describeAction } from "./action.js";
import type { Action } from "./types.js";

const log = createComponentLogger("actions.notifier");

export interface Notifier {
  notify(action: Action): void;
}

export type TriggeredActionListener = (action: Action) => void | PromiseLike<void>;

export interface EventNotifier extends Notifier {
  /** Register a listener; returns a function that removes it */
  onTriggeredAction(listener: TriggeredActionListener): () => void;
  listenerCount(): number;
}

/**
 * In-process event bus. Listeners run in registration order; a listener that
 * throws or rejects is logged and does not affect the others.
 */
export function createEventNotifier(): EventNotifier {
  const listeners: TriggeredActionListener[] = [];

  function report(error: unknown, action: Action): void {
    log.error("Triggered action listener failed", error, describeAction(action));
  }

  function notify(action: Action): void {
    if (listeners.length === 0) {
      log.warn("Action triggered with no listeners", describeAction(action));
      return;
    }

    for (const listener of [...listeners]) {
      try {
        const result = listener(action);
        if (result !== undefined) {
          Promise.resolve(result).catch((error: unknown) => report(error, action));
        }
      } catch (error) {
        report(error, action);
      }
    }
  }

  function onTriggeredAction(listener: TriggeredActionListener): () => void {
    listeners.push(listener);
    return () => {
      const index = listeners.indexOf(listener);
      if (index !== -1) listeners.splice(index, 1);
    };
  }

  return {
    notify,
    onTriggeredAction,
    listenerCount: () => listeners.length,
  };
}
