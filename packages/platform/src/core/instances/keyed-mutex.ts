/**
 * Keyed Mutex
 *
 * Per-key exclusive sections. At most one holder per key at a time;
 * waiters for the same key are served in arrival order; different keys
 * never wait on each other. There is no global lock.
 *
 * A waiter can be cancelled through an AbortSignal while it is still
 * queued. Once the section is entered, the signal is ignored: the holder
 * always runs to completion so that a state change is never half-applied.
 */

import { OperationCancelledError } from "../engine/errors.js";

interface Waiter {
  resolve: () => void;
  onAbort?: () => void;
  signal?: AbortSignal;
}

/** Present in the map only while some caller holds the key */
interface KeyState {
  queue: Waiter[];
}

export class KeyedMutex {
  private readonly keys = new Map<string, KeyState>();

  /**
   * Runs `fn` while holding the section for `key`.
   * Rejects with OperationCancelledError if `signal` aborts before the
   * section is acquired; `fn` is then never called.
   */
  async runExclusive<T>(
    key: string,
    fn: () => Promise<T>,
    signal?: AbortSignal,
    operation = "workflow operation"
  ): Promise<T> {
    await this.acquire(key, signal, operation);
    try {
      return await fn();
    } finally {
      this.release(key);
    }
  }

  /** Whether some caller currently holds the section for `key` */
  isLocked(key: string): boolean {
    return this.keys.has(key);
  }

  /** Number of callers queued behind the holder of `key` */
  pendingCount(key: string): number {
    return this.keys.get(key)?.queue.length ?? 0;
  }

  private acquire(key: string, signal: AbortSignal | undefined, operation: string): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(new OperationCancelledError(operation));
    }

    const state = this.keys.get(key);
    if (!state) {
      this.keys.set(key, { queue: [] });
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const waiter: Waiter = { resolve, signal };
      if (signal) {
        waiter.onAbort = () => {
          const index = state.queue.indexOf(waiter);
          if (index !== -1) {
            state.queue.splice(index, 1);
            reject(new OperationCancelledError(operation));
          }
        };
        signal.addEventListener("abort", waiter.onAbort, { once: true });
      }
      state.queue.push(waiter);
    });
  }

  private release(key: string): void {
    const state = this.keys.get(key);
    if (!state) return;

    const next = state.queue.shift();
    if (!next) {
      this.keys.delete(key);
      return;
    }

    if (next.signal && next.onAbort) {
      next.signal.removeEventListener("abort", next.onAbort);
    }
    // Ownership passes directly to the next waiter; the key stays held.
    next.resolve();
  }
}
