/**
 * The guarded state machine behind every disposable in the library.
 *
 * A lifecycle moves `live → disposing → disposed` exactly once. `disposing` is entered
 * before any hook runs, so a hook that re-enters disposal, or a second trigger arriving while
 * an asynchronous release is in flight, can never run a hook twice.
 *
 * @module
 */

import type { AsyncResourceReleaser, ReclamationRecord, ReclamationTracker } from "./types.ts";
import { logger } from "./logger.ts";

export type LifecyclePhase = "live" | "disposing" | "disposed";

/**
 * Logs and, where the hooks outlive the resource, releases the unmanaged resources of
 * something that was reclaimed without being disposed. Errors are logged, never rethrown:
 * nobody is left to observe them.
 */
export function onReclaimed(record: ReclamationRecord): void {
  logger.warn(`${record.label} was reclaimed without being disposed; dispose it explicitly or with \`using\``);
  if (!record.release) return;

  try {
    record.release();
  } catch (error) {
    logger.error(`${record.label} failed to release unmanaged resources on reclamation`, error);
  }
}

/**
 * Process-wide reclamation tracker.
 */
export const reclamationTracker: ReclamationTracker = new FinalizationRegistry<ReclamationRecord>(onReclaimed);

export class Lifecycle {
  #phase: LifecyclePhase = "live";
  #pending: Promise<void> | undefined;
  #tracker: ReclamationTracker | undefined;

  constructor(
    private readonly releaser: AsyncResourceReleaser,
    readonly label: string,
  ) {}

  get phase(): LifecyclePhase {
    return this.#phase;
  }

  get isDisposed(): boolean {
    return this.#phase === "disposed";
  }

  /**
   * Starts watching `target` for reclamation. With `releaseOnReclaim`, the unmanaged hook runs
   * when `target` is reclaimed undisposed; only pass it when the hooks do not reference `target`.
   */
  watch(target: object, tracker: ReclamationTracker, releaseOnReclaim: boolean): void {
    const record: ReclamationRecord = releaseOnReclaim
      ? { label: this.label, release: () => this.reclaim() }
      : { label: this.label };
    tracker.register(target, record, this);
    this.#tracker = tracker;
  }

  /**
   * Synchronous disposal: managed hook, then unmanaged hook. The unmanaged hook runs even if
   * the managed one throws, and the lifecycle is committed either way.
   */
  dispose(): void {
    if (this.#phase !== "live") return;
    this.#phase = "disposing";

    try {
      this.releaser.releaseManagedResources?.();
    } finally {
      try {
        this.releaser.releaseUnmanagedResources?.();
      } finally {
        this.#commit();
      }
    }
  }

  /**
   * Asynchronous disposal: awaits the asynchronous managed hook, then runs the unmanaged hook.
   * The lifecycle only commits once the asynchronous hook has settled.
   */
  disposeAsync(): Promise<void> {
    if (this.#phase === "disposed") return Promise.resolve();
    if (this.#pending) return this.#pending;
    if (this.#phase !== "live") return Promise.resolve();
    this.#phase = "disposing";

    this.#pending = this.#releaseAsync();
    return this.#pending;
  }

  /**
   * Reclamation path: the managed hook is skipped, its targets may already be gone.
   */
  reclaim(): void {
    if (this.#phase !== "live") return;
    this.#phase = "disposing";

    try {
      this.releaser.releaseUnmanagedResources?.();
    } finally {
      this.#phase = "disposed";
    }
  }

  async #releaseAsync(): Promise<void> {
    try {
      await this.releaser.releaseManagedResourcesAsync?.();
    } finally {
      try {
        this.releaser.releaseUnmanagedResources?.();
      } finally {
        this.#commit();
      }
    }
  }

  #commit(): void {
    this.#phase = "disposed";
    this.#tracker?.unregister(this);
    this.#tracker = undefined;
  }
}
