/**
 * Async Synchronization Primitives
 *
 * A FIFO mutex, a condition bound to it, and an abortable sleep. Together
 * they give the dispatcher lock + wait/notify semantics on the event loop.
 */

/** Maximum delay for setTimeout (Node.js limit: ~24.8 days) */
export const MAX_TIMEOUT_MS = 2_147_483_647;

// ============================================
// MUTEX
// ============================================

export class Mutex {
  private locked = false;
  private readonly queue: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return Promise.resolve();
    }
    return new Promise((resolve) => this.queue.push(resolve));
  }

  /** Hands the lock straight to the next waiter, if any */
  release(): void {
    if (!this.locked) {
      throw new Error("Mutex released while not held");
    }
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

// ============================================
// CONDITION
// ============================================

export class Condition {
  private readonly waiters = new Set<() => void>();

  constructor(readonly mutex: Mutex) {}

  /**
   * Release the mutex, wait for `notifyAll()` or abort, then re-acquire the
   * mutex before returning. Must be called while holding the mutex.
   * Resolves true when notified, false when aborted.
   */
  async wait(signal?: AbortSignal): Promise<boolean> {
    if (!this.mutex.isLocked) {
      throw new Error("Condition.wait() requires the mutex to be held");
    }
    if (signal?.aborted) return false;

    this.mutex.release();
    try {
      return await new Promise<boolean>((resolve) => {
        const onAbort = (): void => {
          this.waiters.delete(wake);
          resolve(false);
        };
        const wake = (): void => {
          signal?.removeEventListener("abort", onAbort);
          resolve(true);
        };
        this.waiters.add(wake);
        signal?.addEventListener("abort", onAbort, { once: true });
      });
    } finally {
      await this.mutex.acquire();
    }
  }

  /** Wake every waiter. Must be called while holding the mutex. */
  notifyAll(): void {
    if (!this.mutex.isLocked) {
      throw new Error("Condition.notifyAll() requires the mutex to be held");
    }
    const waiters = [...this.waiters];
    this.waiters.clear();
    for (const wake of waiters) wake();
  }

  get waiting(): number {
    return this.waiters.size;
  }
}

// ============================================
// SLEEP
// ============================================

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 * Delays above MAX_TIMEOUT_MS are clamped.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false);
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(true);
    }, Math.min(Math.max(0, ms), MAX_TIMEOUT_MS));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
