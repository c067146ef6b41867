/**
 * Helpers for values that may be absent.
 *
 * @module
 */

/**
 * Calls `fn` with `target` when `target` is neither `null` nor `undefined`.
 *
 * @returns What `fn` returns, or `undefined` when `target` is absent.
 *
 * @example
 * ```ts
 * import { ifNotNull } from "./nullable.ts"
 *
 * ifNotNull(process.env.PORT, Number); // 8080, or undefined when PORT is unset
 * ifNotNull(timer, clearTimeout);      // only clears a timer that exists
 * ```
 */
export function ifNotNull<T, R>(target: T | null | undefined, fn: (value: T) => R): R | undefined {
  return target === null || target === undefined ? undefined : fn(target);
}

/**
 * Whether `value` is absent or the zero value of its primitive type:
 * `null`, `undefined`, `0`, `-0`, `0n`, `false` or `""`.
 *
 * `NaN` and every object, empty or not, are not default values.
 */
export function isNullOrDefault(value: unknown): value is null | undefined | 0 | 0n | false | "" {
  return value === null || value === undefined || value === 0 || value === 0n || value === false || value === "";
}
