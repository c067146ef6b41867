import { test } from "node:test";
import { expect } from "expect";

import { Semaphore } from "./semaphore.ts";
import { OutOfRangeError, SemaphoreFullError } from "./errors.ts";
import { flushMicrotasks } from "./_test_helpers.ts";

// Test Case SEM1: Validates its counts
test("Semaphore - validates its counts", () => {
  expect(() => new Semaphore(-1)).toThrow(OutOfRangeError);
  expect(() => new Semaphore(3, 2)).toThrow("Value must be between 0 and 2, inclusive. (Parameter 'initialCount')");
  expect(() => new Semaphore(0, 0)).toThrow("Value must be greater than or equal to 1. (Parameter 'maxCount')");

  const semaphore = new Semaphore(0);
  expect(semaphore.currentCount).toBe(0);
  expect(semaphore.maxCount).toBe(Number.POSITIVE_INFINITY);
});

// Test Case SEM2: Rejects fractional counts
test("Semaphore - rejects fractional counts", () => {
  expect(() => new Semaphore(0.5)).toThrow(OutOfRangeError);
  expect(() => new Semaphore(0.5)).toThrow("Value must be a whole number. (Parameter 'initialCount')");
  expect(() => new Semaphore(1, 2.5)).toThrow("Value must be a whole number. (Parameter 'maxCount')");
  expect(new Semaphore(0).maxCount).toBe(Number.POSITIVE_INFINITY);
  expect(() => new Semaphore(Number.POSITIVE_INFINITY)).toThrow(OutOfRangeError);

  const semaphore = new Semaphore(0);
  expect(() => semaphore.release(1.5)).toThrow("Value must be a whole number. (Parameter 'releaseCount')");
  expect(semaphore.currentCount).toBe(0);
  expect(semaphore.tryWait()).toBe(false);
});

// Test Case SEM3: tryWait takes free slots and never blocks
test("Semaphore - tryWait takes free slots and never blocks", () => {
  const semaphore = new Semaphore(2);

  expect(semaphore.tryWait()).toBe(true);
  expect(semaphore.tryWait()).toBe(true);
  expect(semaphore.tryWait()).toBe(false);
  expect(semaphore.currentCount).toBe(0);
});

// Test Case SEM4: Wait with a timeout never blocks and validates the timeout
test("Semaphore - wait with a timeout never blocks and validates the timeout", () => {
  const semaphore = new Semaphore(1);

  expect(semaphore.wait(1_000)).toBe(true);
  expect(semaphore.wait(new Date(Date.now() + 1_000))).toBe(false);
  expect(() => semaphore.wait(-1)).toThrow(OutOfRangeError);
  expect(semaphore.currentCount).toBe(0);
});

// Test Case SEM5: waitAsync takes a free slot without queueing
test("Semaphore - waitAsync takes a free slot without queueing", async () => {
  const semaphore = new Semaphore(1);

  const waiting = semaphore.waitAsync();
  // The slot is taken synchronously, before the promise settles.
  expect(semaphore.currentCount).toBe(0);
  expect(semaphore.waitingCount).toBe(0);
  await expect(waiting).resolves.toBe(true);
});

// Test Case SEM6: Waiters stay pending until a release and are served in order
test("Semaphore - waiters stay pending until a release and are served in order", async () => {
  const semaphore = new Semaphore(0);
  const order: string[] = [];

  const first = semaphore.waitAsync().then((acquired) => order.push(`first ${acquired}`));
  const second = semaphore.waitAsync().then((acquired) => order.push(`second ${acquired}`));
  await flushMicrotasks();
  expect(order).toEqual([]);
  expect(semaphore.waitingCount).toBe(2);

  expect(semaphore.release()).toBe(0);
  await first;
  expect(order).toEqual(["first true"]);
  expect(semaphore.currentCount).toBe(0);
  expect(semaphore.waitingCount).toBe(1);

  semaphore.release();
  await second;
  expect(order).toEqual(["first true", "second true"]);
  expect(semaphore.currentCount).toBe(0);
});

// Test Case SEM7: A timed-out wait resolves false and leaves the count alone
test("Semaphore - a timed-out wait resolves false and leaves the count alone", async () => {
  const semaphore = new Semaphore(0);

  await expect(semaphore.waitAsync({ timeout: 10 })).resolves.toBe(false);
  expect(semaphore.waitingCount).toBe(0);

  semaphore.release();
  expect(semaphore.currentCount).toBe(1);
});

// Test Case SEM8: A zero timeout or an elapsed deadline fails at once
test("Semaphore - a zero timeout or an elapsed deadline fails at once", async () => {
  const semaphore = new Semaphore(0);

  await expect(semaphore.waitAsync({ timeout: 0 })).resolves.toBe(false);
  await expect(semaphore.waitAsync({ timeout: new Date(0) })).resolves.toBe(false);
  expect(semaphore.waitingCount).toBe(0);
});

// Test Case SEM9: A future deadline waits for a release
test("Semaphore - a future deadline waits for a release", async () => {
  const semaphore = new Semaphore(0);

  const waiting = semaphore.waitAsync({ timeout: new Date(Date.now() + 60_000) });
  await flushMicrotasks();
  semaphore.release();

  await expect(waiting).resolves.toBe(true);
});

// Test Case SEM10: A negative timeout is rejected
test("Semaphore - a negative timeout is rejected", async () => {
  const semaphore = new Semaphore(0);

  await expect(semaphore.waitAsync({ timeout: -5 })).rejects.toThrow(OutOfRangeError);
});

// Test Case SEM11: Aborting a wait rejects with the signal's reason and leaves the count alone
test("Semaphore - aborting a wait rejects with the signal's reason and leaves the count alone", async () => {
  const semaphore = new Semaphore(0);
  const controller = new AbortController();
  const reason = new Error("shutting down");

  const waiting = semaphore.waitAsync({ signal: controller.signal, timeout: 60_000 });
  await flushMicrotasks();
  controller.abort(reason);

  await expect(waiting).rejects.toBe(reason);
  expect(semaphore.waitingCount).toBe(0);
  expect(semaphore.currentCount).toBe(0);

  semaphore.release();
  expect(semaphore.currentCount).toBe(1);
});

// Test Case SEM12: An already aborted signal rejects even when a slot is free
test("Semaphore - an already aborted signal rejects even when a slot is free", async () => {
  const semaphore = new Semaphore(1);
  const reason = new Error("cancelled");

  await expect(semaphore.waitAsync({ signal: AbortSignal.abort(reason) })).rejects.toBe(reason);
  expect(semaphore.currentCount).toBe(1);
});

// Test Case SEM13: Aborting after the slot was granted has no effect
test("Semaphore - aborting after the slot was granted has no effect", async () => {
  const semaphore = new Semaphore(0);
  const controller = new AbortController();

  const waiting = semaphore.waitAsync({ signal: controller.signal });
  await flushMicrotasks();
  semaphore.release();
  controller.abort();

  await expect(waiting).resolves.toBe(true);
  expect(semaphore.currentCount).toBe(0);
});

// Test Case SEM14: Release returns the previous count and respects the maximum
test("Semaphore - release returns the previous count and respects the maximum", () => {
  const semaphore = new Semaphore(1, 3);

  expect(semaphore.release(2)).toBe(1);
  expect(semaphore.currentCount).toBe(3);
  expect(() => semaphore.release()).toThrow(SemaphoreFullError);
  expect(semaphore.currentCount).toBe(3);
  expect(() => semaphore.release(0)).toThrow(OutOfRangeError);
});

// Test Case SEM15: Releasing several slots serves waiters before raising the count
test("Semaphore - releasing several slots serves waiters before raising the count", async () => {
  const semaphore = new Semaphore(0);

  const waiting = semaphore.waitAsync();
  await flushMicrotasks();

  expect(semaphore.release(3)).toBe(0);
  await expect(waiting).resolves.toBe(true);
  expect(semaphore.currentCount).toBe(2);
});
