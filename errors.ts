/**
 * Error taxonomy raised by the guard clauses in `ensure.ts` and by the counting semaphore.
 *
 * Every argument error carries the name of the offending parameter in `paramName` and
 * appends it to the message as `(Parameter '<name>')`, so a failure read from a log line
 * still points at the call site that produced it.
 *
 * @example
 * ```ts
 * import { ArgumentError, NullError } from "./errors.ts";
 *
 * try {
 *   ensure.notNull(undefined, "options");
 * } catch (error) {
 *   if (error instanceof NullError) {
 *     console.log(error.paramName); // "options"
 *   }
 *   console.log(error instanceof ArgumentError); // true
 * }
 * ```
 *
 * @module
 */

function withParameter(reason: string, paramName?: string): string {
  return paramName ? `${reason} (Parameter '${paramName}')` : reason;
}

/**
 * Base class of every argument validation failure.
 */
export class ArgumentError extends Error {
  override name = "ArgumentError";

  /** The reason without the parameter suffix. */
  readonly reason: string;

  constructor(
    reason: string,
    readonly paramName?: string,
    options?: ErrorOptions,
  ) {
    super(withParameter(reason, paramName), options);
    this.reason = reason;
  }
}

/**
 * A required argument was `null` or `undefined`.
 */
export class NullError extends ArgumentError {
  override name = "NullError";

  constructor(paramName?: string, reason = "Value cannot be null.", options?: ErrorOptions) {
    super(reason, paramName, options);
  }
}

/**
 * A string or collection argument was present but had no content.
 */
export class EmptyError extends ArgumentError {
  override name = "EmptyError";

  constructor(paramName?: string, reason = "Value cannot be empty.", options?: ErrorOptions) {
    super(reason, paramName, options);
  }
}

/**
 * A comparable argument fell outside its inclusive bounds.
 */
export class OutOfRangeError extends ArgumentError {
  override name = "OutOfRangeError";

  constructor(
    paramName: string | undefined,
    readonly actualValue: unknown,
    reason = "Value is out of range.",
    options?: ErrorOptions,
  ) {
    super(reason, paramName, options);
  }
}

/**
 * An argument was not one of the members of its enum.
 */
export class InvalidEnumError extends ArgumentError {
  override name = "InvalidEnumError";

  constructor(
    paramName: string | undefined,
    readonly invalidValue: unknown,
    options?: ErrorOptions,
  ) {
    super(`The value of argument '${paramName ?? "value"}' (${String(invalidValue)}) is invalid for its enum type.`, paramName, options);
  }
}

/**
 * Releasing a semaphore would have raised its count above its maximum.
 */
export class SemaphoreFullError extends Error {
  override name = "SemaphoreFullError";

  constructor(
    readonly maxCount: number,
    options?: ErrorOptions,
  ) {
    super(`Adding the specified count to the semaphore would cause it to exceed its maximum count of ${maxCount}.`, options);
  }
}
