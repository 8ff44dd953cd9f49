import type { TimerService } from "./ports/timer.js";
import { realTimerService } from "./adapters/real-timers.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface TaskQueue<T> {
  /** Append an item; hands it straight to the oldest waiting consumer if any */
  push(item: T): void;
  /**
   * Take the oldest item, waiting up to `timeoutMs` for one to arrive.
   * Resolves undefined on timeout or when {@link TaskQueue.wake} is called.
   */
  pop(timeoutMs: number): Promise<T | undefined>;
  /** Remove and return every queued item, oldest first */
  drain(): T[];
  /** Copy of the queued items, oldest first */
  toArray(): T[];
  /** Number of queued items */
  size(): number;
  /** Release every consumer currently blocked in pop() */
  wake(): void;
}

interface Waiter<T> {
  resolve: (item: T | undefined) => void;
  timer: NodeJS.Timeout;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create an unbounded FIFO channel with a bounded-wait pop.
 * Any number of producers and consumers may share it.
 */
export function createTaskQueue<T>(
  timers: TimerService = realTimerService
): TaskQueue<T> {
  const items: T[] = [];
  const waiters: Waiter<T>[] = [];

  function push(item: T): void {
    const waiter = waiters.shift();
    if (waiter) {
      timers.clearTimeout(waiter.timer);
      waiter.resolve(item);
      return;
    }
    items.push(item);
  }

  function pop(timeoutMs: number): Promise<T | undefined> {
    if (items.length > 0) {
      return Promise.resolve(items.shift());
    }

    return new Promise((resolve) => {
      const waiter: Waiter<T> = {
        resolve,
        timer: timers.setTimeout(() => {
          const index = waiters.indexOf(waiter);
          if (index !== -1) waiters.splice(index, 1);
          resolve(undefined);
        }, timeoutMs),
      };
      waiters.push(waiter);
    });
  }

  function drain(): T[] {
    return items.splice(0, items.length);
  }

  function wake(): void {
    for (const waiter of waiters.splice(0, waiters.length)) {
      timers.clearTimeout(waiter.timer);
      waiter.resolve(undefined);
    }
  }

  return {
    push,
    pop,
    drain,
    toArray: () => [...items],
    size: () => items.length,
    wake,
  };
}
