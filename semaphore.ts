/**
 * A counting semaphore for a single event loop.
 *
 * The semaphore tracks a number of available slots. Waiters take a slot or queue up for one;
 * `release()` hands slots to queued waiters first, in arrival order, and only then raises the
 * count. A waiter can give up when its timeout elapses or its `AbortSignal` fires; giving up
 * never changes the count.
 *
 * Synchronous waits cannot block: no other code runs while the caller holds the thread, so no
 * one could release a slot in the meantime. `tryWait()` therefore either takes a free slot at
 * once or reports failure.
 *
 * @module
 */

import type { Timeout } from "./utils.ts";
import { remainingTime, scheduleTimeout } from "./utils.ts";
import { notOutOfRange } from "./ensure.ts";
import { OutOfRangeError, SemaphoreFullError } from "./errors.ts";
import { logger } from "./logger.ts";

/**
 * Options of an asynchronous wait.
 */
export interface WaitOptions {
  /** Gives up and resolves `false` once elapsed. Waits indefinitely when omitted. */
  timeout?: Timeout;

  /** Gives up and rejects with `signal.reason` once aborted. */
  signal?: AbortSignal;
}

/**
 * The capabilities the scoped releaser needs from a counting semaphore.
 */
export interface CountingSemaphore {
  /** Number of slots available right now. */
  readonly currentCount: number;

  /** Takes a slot if one is free. Never blocks. */
  tryWait(): boolean;

  /** Synchronous wait with an optional timeout. */
  wait(timeout?: Timeout): boolean;

  /**
   * Resolves `true` once a slot is taken, or `false` if the timeout elapses first.
   * Rejects with the signal's reason if it is aborted first.
   */
  waitAsync(options?: WaitOptions): Promise<boolean>;

  /** Returns slots to the semaphore and returns the count from before the release. */
  release(releaseCount?: number): number;
}

interface Waiter {
  grant(): void;
}

/**
 * A counting semaphore with an optional maximum count.
 *
 * @example
 * ```ts
 * const downloads = new Semaphore(3);
 *
 * async function download(url: string, signal: AbortSignal) {
 *   if (!await downloads.waitAsync({ timeout: 5_000, signal })) {
 *     throw new Error(`No download slot for ${url} within 5s`);
 *   }
 *   try {
 *     return await fetch(url, { signal });
 *   } finally {
 *     downloads.release();
 *   }
 * }
 * ```
 */
export class Semaphore implements CountingSemaphore {
  #count: number;
  readonly #maxCount: number;
  readonly #waiters: Waiter[] = [];

  /**
   * @param initialCount Slots available at construction; between `0` and `maxCount`.
   * @param maxCount Upper bound of the count; `Infinity` for none.
   */
  constructor(initialCount: number, maxCount = Number.POSITIVE_INFINITY) {
    this.#maxCount = wholeCount(notOutOfRange(maxCount, "maxCount", { lowerBound: 1 }), "maxCount", true);
    this.#count = wholeCount(
      notOutOfRange(initialCount, "initialCount", { lowerBound: 0, upperBound: maxCount }),
      "initialCount",
    );
  }

  get currentCount(): number {
    return this.#count;
  }

  get maxCount(): number {
    return this.#maxCount;
  }

  /** Number of asynchronous waiters queued for a slot. */
  get waitingCount(): number {
    return this.#waiters.length;
  }

  tryWait(): boolean {
    if (this.#count <= 0) return false;
    this.#count--;
    return true;
  }

  /**
   * Synchronous wait. Nothing can release a slot while the caller holds the thread, so the
   * timeout is only validated and the outcome is that of {@link tryWait}.
   */
  wait(timeout?: Timeout): boolean {
    remainingTime(timeout);
    return this.tryWait();
  }

  async waitAsync({ timeout, signal }: WaitOptions = {}): Promise<boolean> {
    signal?.throwIfAborted();
    if (this.tryWait()) return true;

    const delay = remainingTime(timeout);
    if (delay === 0) return false;

    return await new Promise<boolean>((resolve, reject) => {
      const settle = (outcome: () => void) => {
        cancelTimer();
        signal?.removeEventListener("abort", onAbort);
        outcome();
      };

      const waiter: Waiter = {
        grant: () => settle(() => resolve(true)),
      };

      const onAbort = () => {
        this.#dequeue(waiter);
        settle(() => reject(signal?.reason));
      };

      const cancelTimer = scheduleTimeout(() => {
        this.#dequeue(waiter);
        settle(() => resolve(false));
      }, delay);

      signal?.addEventListener("abort", onAbort, { once: true });
      this.#waiters.push(waiter);
    });
  }

  release(releaseCount = 1): number {
    wholeCount(notOutOfRange(releaseCount, "releaseCount", { lowerBound: 1 }), "releaseCount");

    const previous = this.#count;
    if (releaseCount > this.#maxCount - previous) {
      throw new SemaphoreFullError(this.#maxCount);
    }

    for (let i = 0; i < releaseCount; i++) {
      const waiter = this.#waiters.shift();
      if (waiter) {
        logger.debug(`semaphore slot handed to a waiter, ${this.#waiters.length} still waiting`);
        waiter.grant();
      } else {
        this.#count++;
      }
    }

    return previous;
  }

  #dequeue(waiter: Waiter): void {
    const index = this.#waiters.indexOf(waiter);
    if (index !== -1) this.#waiters.splice(index, 1);
  }
}

function wholeCount(value: number, paramName: string, allowInfinity = false): number {
  if (Number.isInteger(value) || (allowInfinity && value === Number.POSITIVE_INFINITY)) return value;
  throw new OutOfRangeError(paramName, value, "Value must be a whole number.");
}
