/**
 * Scoped acquisition of a counting semaphore slot.
 *
 * `acquireAndRelease` and `acquireAndReleaseAsync` take a slot and hand back a disposable
 * handle that returns it. The handle is built on the disposal lifecycle, so the slot goes back
 * exactly once however the handle is released: `using`, `await using`, `dispose()`,
 * `disposeAsync()`, or any number of repeats of these.
 *
 * Failing to get a slot in time is an expected outcome and yields `undefined`; cancellation is
 * not, and rejects with the signal's reason. Neither touches the count. The semaphore belongs to
 * the caller: the handle only ever releases the one slot it took.
 *
 * @example
 * ```ts
 * const writes = new Semaphore(1);
 *
 * async function append(line: string, signal: AbortSignal) {
 *   await using slot = await acquireAndReleaseAsync(writes, { timeout: 1_000, signal });
 *   if (!slot) throw new Error("log file busy");
 *   await appendFile("app.log", line + "\n");
 * } // slot released here
 * ```
 *
 * @module
 */

import type { AsyncLifecycleDisposable, DisposableOptions } from "./types.ts";
import type { CountingSemaphore, WaitOptions } from "./semaphore.ts";
import { createAsyncDisposable } from "./async-disposable.ts";
import { notNull } from "./ensure.ts";

/**
 * Handle over one acquired semaphore slot. Disposing it, synchronously or asynchronously,
 * releases the slot once.
 */
export type SemaphoreReleaser = AsyncLifecycleDisposable;

/**
 * Options of {@link acquireAndReleaseAsync}.
 */
export interface AcquireOptions extends WaitOptions, DisposableOptions { }

/**
 * Options of {@link acquireAndRelease}. A synchronous acquisition cannot be cancelled.
 */
export type SyncAcquireOptions = Omit<AcquireOptions, "signal">;

/**
 * Takes a free slot from `semaphore`. The wait cannot block the event loop, so a slot that is
 * not free right away counts as a timeout.
 *
 * @returns A handle that releases the slot, or `undefined` if no slot was free.
 * @throws {OutOfRangeError} when `timeout` is a negative duration.
 *
 * @example
 * ```ts
 * using slot = acquireAndRelease(cacheLock);
 * if (slot) rebuildCache();
 * ```
 */
export function acquireAndRelease(
  semaphore: CountingSemaphore,
  { timeout, ...options }: SyncAcquireOptions = {},
): SemaphoreReleaser | undefined {
  if (!notNull(semaphore, "semaphore").wait(timeout)) return undefined;
  return createReleaser(semaphore, options);
}

/**
 * Waits for a slot from `semaphore`.
 *
 * @returns A handle that releases the slot, or `undefined` if `timeout` elapsed first.
 * @throws The signal's reason, if `signal` aborts before a slot is granted.
 */
export async function acquireAndReleaseAsync(
  semaphore: CountingSemaphore,
  { timeout, signal, ...options }: AcquireOptions = {},
): Promise<SemaphoreReleaser | undefined> {
  const acquired = await notNull(semaphore, "semaphore").waitAsync({ timeout, signal });
  if (!acquired) return undefined;
  return createReleaser(semaphore, options);
}

function createReleaser(
  semaphore: CountingSemaphore,
  { label = "semaphore releaser", ...options }: DisposableOptions,
): SemaphoreReleaser {
  return createAsyncDisposable({
    releaseManagedResources() {
      semaphore.release();
    },

    releaseManagedResourcesAsync() {
      semaphore.release();
    },
  }, { label, ...options });
}
