/**
 * Guard clauses, a run-once disposal lifecycle, and scoped acquisition of counting semaphore
 * slots, built on the explicit resource management protocol (`using` / `await using`).
 *
 * @example
 * ```ts
 * import { Semaphore, acquireAndReleaseAsync, ensure } from "resource-guard";
 *
 * const slots = new Semaphore(2);
 *
 * export async function render(template: string | undefined) {
 *   const source = ensure.notNullOrWhiteSpace(template, "template");
 *   await using slot = await acquireAndReleaseAsync(slots, { timeout: 500 });
 *   if (!slot) return undefined;
 *   return compile(source);
 * }
 * ```
 *
 * @module
 */

export type * from "./types.ts";
export * from "./errors.ts";
export * as ensure from "./ensure.ts";
export type { Comparable, Orderable, RangeOptions, Widened } from "./ensure.ts";
export { createDisposable, DisposableBase } from "./disposable.ts";
export { AsyncDisposableBase, createAsyncDisposable } from "./async-disposable.ts";
export { Semaphore } from "./semaphore.ts";
export type { CountingSemaphore, WaitOptions } from "./semaphore.ts";
export { acquireAndRelease, acquireAndReleaseAsync } from "./semaphore-releaser.ts";
export type { AcquireOptions, SemaphoreReleaser, SyncAcquireOptions } from "./semaphore-releaser.ts";
export { remainingTime } from "./utils.ts";
export type { Timeout } from "./utils.ts";
export { ifNotNull, isNullOrDefault } from "./nullable.ts";
export { detailMessage } from "./exception.ts";
export { derivesFrom, isConstructor } from "./type.ts";
export type { Constructor } from "./type.ts";
export { logger, parseLogLevel } from "./logger.ts";
