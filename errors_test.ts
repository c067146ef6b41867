import { test } from "node:test";
import { expect } from "expect";

import {
  ArgumentError,
  EmptyError,
  InvalidEnumError,
  NullError,
  OutOfRangeError,
  SemaphoreFullError,
} from "./errors.ts";

// Test Case ERR1: Every validation error is an ArgumentError with its own name
test("ArgumentError - every validation error is an ArgumentError with its own name", () => {
  const errors = [
    new NullError("a"),
    new EmptyError("b"),
    new OutOfRangeError("c", 4),
    new InvalidEnumError("d", "x"),
  ];

  expect(errors.map((error) => error instanceof ArgumentError)).toEqual([true, true, true, true]);
  expect(errors.map((error) => error.name)).toEqual(["NullError", "EmptyError", "OutOfRangeError", "InvalidEnumError"]);
  expect(errors.map((error) => error.paramName)).toEqual(["a", "b", "c", "d"]);
});

// Test Case ERR2: The parameter suffix is omitted without a parameter name
test("ArgumentError - the parameter suffix is omitted without a parameter name", () => {
  const error = new NullError();

  expect(error.message).toBe("Value cannot be null.");
  expect(error.reason).toBe("Value cannot be null.");
  expect(error.paramName).toBeUndefined();
});

// Test Case ERR3: Forwards a cause
test("ArgumentError - forwards a cause", () => {
  const cause = new Error("parse failed");
  const error = new ArgumentError("Value is malformed.", "json", { cause });

  expect(error.message).toBe("Value is malformed. (Parameter 'json')");
  expect(error.cause).toBe(cause);
});

// Test Case ERR4: Reports the maximum count
test("SemaphoreFullError - reports the maximum count", () => {
  const error = new SemaphoreFullError(2);

  expect(error).toBeInstanceOf(Error);
  expect(error.name).toBe("SemaphoreFullError");
  expect(error.maxCount).toBe(2);
  expect(error.message).toBe(
    "Adding the specified count to the semaphore would cause it to exceed its maximum count of 2.",
  );
});
