/**
 * Guard clauses for validating arguments at the top of a function.
 *
 * Each guard returns the validated value, narrowed where the type system allows it, so
 * checks can be written inline with assignments. Failures throw synchronously with one of
 * the typed errors from `errors.ts`, always naming the offending parameter.
 *
 * The module carries no state. Import it as a namespace to get the fluent form:
 *
 * @example
 * ```ts
 * import * as ensure from "./ensure.ts";
 *
 * function connect(host: string | undefined, port: number, retries: number[]) {
 *   const target = ensure.notNullOrWhiteSpace(host, "host");
 *   ensure.notOutOfRange(port, "port", { lowerBound: 1, upperBound: 65535 });
 *   ensure.notNullOrEmpty(retries, "retries");
 *   // ...
 * }
 * ```
 *
 * @module
 */

import { EmptyError, InvalidEnumError, NullError, OutOfRangeError } from "./errors.ts";

/**
 * An object that knows how to order itself against another value of the same kind.
 * `compareTo` returns a negative number, zero or a positive number when `this` sorts
 * before, together with or after `other`.
 */
export interface Comparable<T> {
  compareTo(other: T): number;
}

/** Values `notOutOfRange` can order. */
export type Orderable = number | bigint | string | Date | Comparable<unknown>;

/**
 * The type bounds are given in for a value of type `T`: the primitive type for a literal,
 * `T` itself otherwise.
 */
export type Widened<T> = T extends number ? number : T extends string ? string : T extends bigint ? bigint : T;

/**
 * Options of {@link notOutOfRange}. Both bounds are inclusive; an omitted bound is not checked.
 */
export interface RangeOptions<T> {
  lowerBound?: T;
  upperBound?: T;
  /** Replaces the generated description of the violated bounds. */
  message?: string;
}

/**
 * Returns `value` if it is neither `null` nor `undefined`.
 *
 * @throws {NullError} when the value is absent.
 */
export function notNull<T>(value: T, paramName?: string, message?: string): NonNullable<T> {
  if (value === null || value === undefined) {
    throw new NullError(paramName, message);
  }
  return value;
}

/**
 * Returns `value` if it is present and has content: a non-empty string, or an array, `Map`,
 * `Set` or other iterable that yields at least one element.
 *
 * @throws {NullError} when the value is absent.
 * @throws {EmptyError} when the value has no content.
 */
export function notNullOrEmpty<T extends string | Iterable<unknown>>(
  value: T | null | undefined,
  paramName?: string,
  message?: string,
): T {
  const present = notNull(value, paramName, message);
  if (typeof present === "string") {
    if (present.length === 0) {
      throw new EmptyError(paramName, message ?? "Value cannot be an empty string.");
    }
    return present;
  }

  if (isEmptyIterable(present)) {
    throw new EmptyError(paramName, message ?? "Collection must contain at least one element.");
  }
  return present;
}

/**
 * Returns `value` if it is a non-empty string containing at least one non-whitespace character.
 *
 * @throws {NullError} when the value is absent.
 * @throws {EmptyError} when the value is empty or only whitespace.
 */
export function notNullOrWhiteSpace(
  value: string | null | undefined,
  paramName?: string,
  message?: string,
): string {
  const present = notNullOrEmpty(value, paramName, message);
  if (present.trim().length === 0) {
    throw new EmptyError(paramName, message ?? "Value cannot be composed entirely of whitespace.");
  }
  return present;
}

/**
 * Returns `value` if it lies within the inclusive `lowerBound`/`upperBound` range.
 *
 * Numbers, bigints, strings and dates are ordered with the relational operators; any other
 * value must implement {@link Comparable}. `NaN` is never within range.
 *
 * @throws {OutOfRangeError} when a bound is violated.
 *
 * @example
 * ```ts
 * ensure.notOutOfRange(2, "v", { lowerBound: 0, upperBound: 3 }); // 2
 * ensure.notOutOfRange(5, "v", { lowerBound: 0, upperBound: 3 });
 * // OutOfRangeError: Value must be between 0 and 3, inclusive. (Parameter 'v')
 * ```
 */
export function notOutOfRange<T extends Orderable>(
  value: T,
  paramName?: string,
  { lowerBound, upperBound, message }: RangeOptions<Widened<NoInfer<T>>> = {},
): T {
  const belowLower = lowerBound !== undefined && !(compare(value, lowerBound) >= 0);
  const aboveUpper = upperBound !== undefined && !(compare(value, upperBound) <= 0);

  if (belowLower || aboveUpper) {
    throw new OutOfRangeError(paramName, value, message ?? describeRange(lowerBound, upperBound));
  }
  return value;
}

/**
 * Returns `value` if it is one of the members of `enumObject`.
 *
 * Works with numeric, string and heterogeneous TypeScript enums as well as plain
 * `as const` objects. The reverse-mapping entries the compiler emits for numeric enums
 * (`Color[0] === "Red"`) are not treated as members.
 *
 * @throws {InvalidEnumError} when the value is not a member.
 *
 * @example
 * ```ts
 * enum Color { Red, Green }
 * ensure.notInvalidEnum(1, Color, "color"); // 1
 * ensure.notInvalidEnum(7, Color, "color"); // throws InvalidEnumError
 * ```
 */
export function notInvalidEnum<E extends Record<string, string | number>>(
  value: unknown,
  enumObject: E,
  paramName?: string,
): E[keyof E] {
  for (const key in enumObject) {
    if (!Object.hasOwn(enumObject, key) || isReverseMappingKey(key, enumObject)) continue;
    const member = enumObject[key];
    if (member === value) {
      return member;
    }
  }
  throw new InvalidEnumError(paramName, value);
}

function isEmptyIterable(value: Iterable<unknown>): boolean {
  if (Array.isArray(value)) return value.length === 0;
  if (value instanceof Map || value instanceof Set) return value.size === 0;

  const iterator = value[Symbol.iterator]();
  const empty = iterator.next().done === true;
  iterator.return?.();
  return empty;
}

// `enum E { A }` compiles to `{ A: 0, "0": "A" }`; the numeric key is the reverse mapping.
function isReverseMappingKey(key: string, enumObject: Record<string, string | number>): boolean {
  const member = enumObject[key];
  return typeof member === "string" && typeof enumObject[member] === "number" && String(enumObject[member]) === key;
}

function compare(value: Orderable, bound: Orderable): number {
  if (isComparable(value)) return value.compareTo(bound);
  if (isComparable(bound)) return -bound.compareTo(value);

  const left = value instanceof Date ? value.getTime() : value;
  const right = bound instanceof Date ? bound.getTime() : bound;
  if (left < right) return -1;
  if (left > right) return 1;
  // Loose equality so that `1` and `1n` compare equal; `NaN` stays unordered.
  return left == right ? 0 : Number.NaN;
}

function isComparable(value: unknown): value is Comparable<unknown> {
  return typeof value === "object" && value !== null && !(value instanceof Date) &&
    "compareTo" in value && typeof value.compareTo === "function";
}

function describeRange(lowerBound: unknown, upperBound: unknown): string {
  if (lowerBound !== undefined && upperBound !== undefined) {
    return `Value must be between ${formatBound(lowerBound)} and ${formatBound(upperBound)}, inclusive.`;
  }
  return lowerBound !== undefined
    ? `Value must be greater than or equal to ${formatBound(lowerBound)}.`
    : `Value must be less than or equal to ${formatBound(upperBound)}.`;
}

function formatBound(bound: unknown): string {
  return bound instanceof Date ? bound.toISOString() : String(bound);
}
