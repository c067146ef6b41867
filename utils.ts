import { notOutOfRange } from "./ensure.ts";

/**
 * How long to wait: a duration in milliseconds, or an absolute deadline.
 * `Infinity` and an omitted timeout both mean "wait indefinitely".
 */
export type Timeout = number | Date;

/**
 * The largest delay `setTimeout` accepts; longer delays fire immediately.
 */
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

/**
 * Converts a {@link Timeout} into the number of milliseconds left to wait from `now`.
 *
 * @param timeout A duration (must not be negative), a deadline, or `undefined` for no limit.
 * @param now The current time, in milliseconds since the epoch.
 * @returns The remaining milliseconds, `0` for an elapsed deadline, or `Infinity` for no limit.
 *
 * @example
 * ```ts
 * import { remainingTime } from "./utils.ts"
 *
 * remainingTime(250);                            // 250
 * remainingTime(new Date(Date.now() + 1_000));   // ~1000
 * remainingTime(new Date(0));                    // 0
 * remainingTime(undefined);                      // Infinity
 * ```
 */
export function remainingTime(timeout: Timeout | undefined, now = Date.now()): number {
  if (timeout === undefined) return Number.POSITIVE_INFINITY;
  if (timeout instanceof Date) return Math.max(0, timeout.getTime() - now);
  return notOutOfRange(timeout, "timeout", { lowerBound: 0 });
}

/**
 * Schedules `callback` after `delay` milliseconds, unless the delay is infinite.
 *
 * Delays beyond what a single timer can hold are chained across several timers. The returned
 * function cancels whichever timer is pending.
 */
export function scheduleTimeout(callback: () => void, delay: number): () => void {
  if (!Number.isFinite(delay)) return () => { };

  let timer: ReturnType<typeof setTimeout>;
  const arm = (remaining: number) => {
    const step = Math.min(remaining, MAX_TIMER_DELAY);
    timer = setTimeout(() => {
      if (remaining > step) arm(remaining - step);
      else callback();
    }, step);
  };

  arm(delay);
  return () => clearTimeout(timer);
}
