import type { ReclamationRecord, ReclamationTracker } from "./types.ts";

/**
 * In-memory stand-in for the `FinalizationRegistry`-backed tracker. Reclamation is simulated
 * by handing a captured record to `onReclaimed`.
 */
export function createTracker() {
  const records = new Map<object, ReclamationRecord>();
  const tracker: ReclamationTracker = {
    register(_target, record, unregisterToken) {
      records.set(unregisterToken, record);
    },
    unregister(unregisterToken) {
      return records.delete(unregisterToken);
    },
  };

  return {
    tracker,
    records,
    /** The single record currently watched. */
    only(): ReclamationRecord {
      const [record, ...rest] = [...records.values()];
      if (!record || rest.length > 0) {
        throw new Error(`Expected exactly one watched record, found ${records.size}`);
      }
      return record;
    },
  };
}

/**
 * A promise together with the function that resolves it.
 */
export function deferred<T = void>() {
  let resolve!: (value: T | PromiseLike<T>) => void;
  let reject!: (reason?: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Lets every already-queued promise reaction run.
 */
export function flushMicrotasks(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
