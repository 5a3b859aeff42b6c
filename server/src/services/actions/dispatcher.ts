/**
 * Action Dispatcher
 *
 * Single-flight scheduler: holds at most one pending action (`active`),
 * sleeps until it is due, fires it, and starts over. Inserting an action that
 * may need to fire sooner cancels the waiting run-loop instance and starts a
 * fresh one, which re-reads the soonest action from the store instead of
 * adjusting an in-flight sleep.
 *
 * Run-loop instance states:
 *   FETCHING → EMPTY → WAITING_FOR_SIGNAL
 *   FETCHING → HAS_ACTION → SLEEPING → FIRING → (reschedule) FETCHING
 * Cancellation moves SLEEPING or WAITING_FOR_SIGNAL straight to CANCELLED.
 *
 * `active` is only read or written while holding `mutex`; the condition
 * bound to it is only waited on or notified while holding it too. Sleeping
 * happens outside the mutex.
 */

import type { ILogger } from "@nudge/shared/logging";
import { createComponentLogger } from "#logging.js";
import { describeAction } from "./action.js";
import { ActionValidationError, DispatcherNotRunningError } from "./errors.js";
import type { Notifier } from "./notifier.js";
import type { ActionStore } from "./store.js";
import { Condition, MAX_TIMEOUT_MS, Mutex, sleep } from "./sync.js";
import type { Action, ActionFilter, PersistedAction } from "./types.js";

const log = createComponentLogger("actions.dispatcher");

/** Logger stamped with the chat location the action belongs to */
function actionLog(action: Action): ILogger {
  return log.child({ guildId: action.guildId, channelId: action.channelId });
}

// ============================================
// TYPES
// ============================================

export interface DispatcherOptions {
  store: ActionStore;
  notifier: Notifier;
  /** Actions due within this window skip the store (default: 60s) */
  shortHorizonMs?: number;
  /** Backoff after a failed store call in the run-loop (default: 5s) */
  fetchRetryMs?: number;
  /** An idle run-loop re-queries the store this often (default: 1h) */
  idleRecheckMs?: number;
}

export const DEFAULT_DISPATCHER_OPTIONS = {
  shortHorizonMs: 60_000,
  fetchRetryMs: 5_000,
  idleRecheckMs: 60 * 60 * 1000,
} as const;

type FetchOutcome =
  | { state: "has_action"; action: PersistedAction }
  | { state: "notified" }
  | { state: "retry" }
  | { state: "cancelled" };

type FireOutcome = "fired" | "skipped" | "retry" | "cancelled";

// ============================================
// DISPATCHER
// ============================================

export class ActionDispatcher {
  private readonly store: ActionStore;
  private readonly notifier: Notifier;
  private readonly shortHorizonMs: number;
  private readonly fetchRetryMs: number;
  private readonly idleRecheckMs: number;

  private readonly mutex = new Mutex();
  private readonly cond = new Condition(this.mutex);
  private active: PersistedAction | null = null;

  private running = false;
  private controller: AbortController | null = null;
  private task: Promise<void> = Promise.resolve();
  private generation = 0;
  private readonly shortTimers = new Set<ReturnType<typeof setTimeout>>();

  constructor(options: DispatcherOptions) {
    this.store = options.store;
    this.notifier = options.notifier;
    this.shortHorizonMs = options.shortHorizonMs ?? DEFAULT_DISPATCHER_OPTIONS.shortHorizonMs;
    this.fetchRetryMs = options.fetchRetryMs ?? DEFAULT_DISPATCHER_OPTIONS.fetchRetryMs;
    this.idleRecheckMs = options.idleRecheckMs ?? DEFAULT_DISPATCHER_OPTIONS.idleRecheckMs;
  }

  /** The action the run-loop is currently waiting on */
  get activeAction(): PersistedAction | null {
    return this.active;
  }

  get isRunning(): boolean {
    return this.running;
  }

  /** Fast-path actions armed but not yet fired */
  get pendingShortActions(): number {
    return this.shortTimers.size;
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  start(): void {
    if (this.running) {
      log.warn("Dispatcher already running");
      return;
    }

    this.running = true;
    log.info("Dispatcher started", {
      shortHorizonMs: this.shortHorizonMs,
      fetchRetryMs: this.fetchRetryMs,
    });
    this.startLoop();
  }

  /**
   * Cancel the run-loop and drop every armed fast-path action. Resolves once
   * the current run-loop instance has ended.
   */
  async stop(): Promise<void> {
    if (!this.running) return;

    this.running = false;
    this.controller?.abort();
    this.controller = null;

    const dropped = this.shortTimers.size;
    for (const timer of this.shortTimers) clearTimeout(timer);
    this.shortTimers.clear();

    await this.task;
    log.info("Dispatcher stopped", { droppedShortActions: dropped });
  }

  // ----------------------------------------
  // Public API
  // ----------------------------------------

  /**
   * Schedule an action. Actions due within the short horizon fire from a
   * dedicated timer and are never stored (the returned action has no id).
   * Everything else is stored, and the run-loop is restarted if the new
   * action is due no later than the one it is waiting on.
   */
  async createAction(action: Action): Promise<Action> {
    if (!this.running) {
      throw new DispatcherNotRunningError();
    }
    if (action.id !== undefined) {
      throw new ActionValidationError("id", "action is already persisted");
    }

    const delayMs = action.triggerAt.getTime() - Date.now();
    if (delayMs <= this.shortHorizonMs) {
      this.scheduleShortAction(action, delayMs);
      return action;
    }

    const stored = await this.store.insert(action);

    const preempts = await this.mutex.runExclusive(
      () => this.active === null || this.active.triggerAt.getTime() >= stored.triggerAt.getTime(),
    );
    if (preempts) {
      log.debug("New action may preempt the active one", describeAction(stored));
      this.reschedule().catch((error: unknown) => {
        log.error("Reschedule after insert failed", error, describeAction(stored));
      });
    }

    return stored;
  }

  /**
   * Remove a stored action. Resolves false if no such action was pending.
   */
  async cancelAction(id: string): Promise<boolean> {
    const removed = await this.store.delete(id);
    if (!removed) return false;

    const wasActive = await this.mutex.runExclusive(() => this.active?.id === id);
    log.info("Action cancelled", { actionId: id, wasActive });

    if (wasActive) {
      await this.reschedule();
    }
    return true;
  }

  listActions(filter?: ActionFilter): Promise<PersistedAction[]> {
    return this.store.list(filter);
  }

  /**
   * Wake any instance idling on the condition, then cancel the current
   * run-loop instance and start a fresh one. The new instance starts after
   * the notification, so it can never be woken by it. Never rejects; no-op
   * once stopped.
   */
  async reschedule(): Promise<void> {
    if (!this.running) return;

    await this.mutex.runExclusive(() => this.cond.notifyAll());
    if (!this.running) return;

    this.startLoop();
  }

  // ----------------------------------------
  // Run-loop
  // ----------------------------------------

  private startLoop(): void {
    this.controller?.abort();

    const controller = new AbortController();
    const instance = ++this.generation;
    this.controller = controller;
    this.task = this.runLoop(controller.signal, instance).catch((error: unknown) => {
      log.error("Run-loop instance crashed", error, { instance });
    });
  }

  private async runLoop(signal: AbortSignal, instance: number): Promise<void> {
    const fetched = await this.fetchNext(signal, instance);

    if (fetched.state !== "has_action") {
      // A notified instance ends: whoever notified starts its successor
      if (fetched.state === "retry" && (await sleep(this.fetchRetryMs, signal))) {
        await this.reschedule();
      }
      return;
    }

    const action = fetched.action;
    const delayMs = action.triggerAt.getTime() - Date.now();

    if (delayMs > 0) {
      log.debug("Sleeping until next action", { ...describeAction(action), delayMs, instance });
      if (!(await sleep(delayMs, signal))) return;

      if (delayMs > MAX_TIMEOUT_MS) {
        // Woke at the timer limit, not at the trigger time
        await this.reschedule();
        return;
      }
    }

    const outcome = await this.fire(action, signal);
    if (outcome === "cancelled") return;
    if (outcome === "retry" && !(await sleep(this.fetchRetryMs, signal))) return;
    if (signal.aborted) return;

    await this.reschedule();
  }

  /**
   * FETCHING: load the soonest action into `active`. When there is none,
   * wait on the condition until notified, cancelled, or the idle recheck
   * interval passes.
   */
  private async fetchNext(signal: AbortSignal, instance: number): Promise<FetchOutcome> {
    await this.mutex.acquire();
    try {
      if (signal.aborted) return { state: "cancelled" };

      let action: PersistedAction | null;
      try {
        action = await this.store.fetchSoonest();
      } catch (error) {
        log.error("Failed to fetch next action", error, { instance, retryInMs: this.fetchRetryMs });
        return signal.aborted ? { state: "cancelled" } : { state: "retry" };
      }

      if (signal.aborted) return { state: "cancelled" };
      this.active = action;

      if (action) {
        return { state: "has_action", action };
      }

      log.debug("No pending actions, idling", { instance });
      const recheck = setTimeout(() => {
        this.reschedule().catch((error: unknown) => {
          log.error("Idle recheck failed", error, { instance });
        });
      }, this.idleRecheckMs);

      let notified: boolean;
      try {
        notified = await this.cond.wait(signal);
      } finally {
        clearTimeout(recheck);
      }
      return notified && !signal.aborted ? { state: "notified" } : { state: "cancelled" };
    } finally {
      this.mutex.release();
    }
  }

  /**
   * FIRING: delete the action, then hand it to the notifier. The delete is
   * the commit point; once it has succeeded the notification always follows.
   */
  private async fire(action: PersistedAction, signal: AbortSignal): Promise<FireOutcome> {
    await this.mutex.acquire();
    try {
      if (signal.aborted) return "cancelled";

      let removed: boolean;
      try {
        removed = await this.store.delete(action.id);
      } catch (error) {
        log.error("Failed to delete due action", error, {
          ...describeAction(action),
          retryInMs: this.fetchRetryMs,
        });
        return "retry";
      }

      this.active = null;

      if (!removed) {
        log.warn("Due action was already removed, not firing", describeAction(action));
        return "skipped";
      }

      actionLog(action).info("Action triggered", describeAction(action));
      this.deliver(action);
      return "fired";
    } finally {
      this.mutex.release();
    }
  }

  // ----------------------------------------
  // Fast path
  // ----------------------------------------

  private scheduleShortAction(action: Action, delayMs: number): void {
    const timer = setTimeout(() => {
      this.shortTimers.delete(timer);
      actionLog(action).info("Short action triggered", describeAction(action));
      this.deliver(action);
    }, Math.max(0, delayMs));

    this.shortTimers.add(timer);
    log.debug("Short action armed", { ...describeAction(action), delayMs });
  }

  private deliver(action: Action): void {
    try {
      this.notifier.notify(action);
    } catch (error) {
      actionLog(action).error("Notifier threw while handling action", error, describeAction(action));
    }
  }
}
