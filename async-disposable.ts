/**
 * This module layers an awaitable release phase on top of the disposal lifecycle in
 * `disposable.ts`, for owners whose managed cleanup is itself asynchronous (flushing a
 * connection, draining a queue).
 *
 * Asynchronous disposal awaits `releaseManagedResourcesAsync`, then runs the synchronous
 * `releaseUnmanagedResources` hook, then marks the owner disposed. The synchronous managed hook
 * is not run on this path: the asynchronous one already covered managed cleanup. A synchronous
 * `dispose()` on the same owner still follows the synchronous protocol.
 *
 * Whichever of the two starts first performs the transition:
 * - concurrent `disposeAsync()` calls share one in-flight promise;
 * - a `dispose()` arriving while `disposeAsync()` is in flight returns without running any hook,
 *   and `isDisposed` stays `false` until the in-flight release settles.
 *
 * @module
 */

import type { AsyncLifecycleDisposable, AsyncResourceReleaser, DisposableOptions } from "./types.ts";
import { Lifecycle, reclamationTracker } from "./_lifecycle.ts";

/**
 * Wraps a set of release hooks, one of them asynchronous, into a dual disposable handle usable
 * with both `using` and `await using`.
 *
 * @example
 * ```ts
 * const session = createAsyncDisposable({
 *   releaseManagedResourcesAsync: () => client.flush(),
 *   releaseUnmanagedResources: () => client.destroy(),
 * }, { label: "session" });
 *
 * {
 *   await using _ = session;
 *   // ...
 * } // awaits client.flush(), then client.destroy()
 * ```
 */
export function createAsyncDisposable(
  releaser: AsyncResourceReleaser,
  { label = "async disposable", trackReclamation = true, tracker = reclamationTracker }: DisposableOptions = {},
): AsyncLifecycleDisposable {
  const lifecycle = new Lifecycle(releaser, label);

  const handle: AsyncLifecycleDisposable = {
    get isDisposed() {
      return lifecycle.isDisposed;
    },

    dispose() {
      lifecycle.dispose();
    },

    disposeAsync() {
      return lifecycle.disposeAsync();
    },

    [Symbol.dispose]() {
      lifecycle.dispose();
    },

    [Symbol.asyncDispose]() {
      return lifecycle.disposeAsync();
    },
  };

  if (trackReclamation) lifecycle.watch(handle, tracker, true);
  return handle;
}

/**
 * Base class for objects whose managed cleanup is asynchronous.
 *
 * Override {@link releaseManagedResourcesAsync} for the asynchronous cleanup and chain to the
 * base implementation. Override the synchronous hooks as with `DisposableBase`.
 *
 * @example
 * ```ts
 * class Producer extends AsyncDisposableBase {
 *   protected override async releaseManagedResourcesAsync(): Promise<void> {
 *     await this.queue.drain();
 *     await super.releaseManagedResourcesAsync();
 *   }
 * }
 *
 * await using producer = new Producer();
 * ```
 */
export abstract class AsyncDisposableBase implements AsyncLifecycleDisposable {
  readonly #lifecycle: Lifecycle;

  constructor({ label, trackReclamation = true, tracker = reclamationTracker }: DisposableOptions = {}) {
    this.#lifecycle = new Lifecycle({
      releaseManagedResources: () => this.releaseManagedResources(),
      releaseManagedResourcesAsync: () => this.releaseManagedResourcesAsync(),
      releaseUnmanagedResources: () => this.releaseUnmanagedResources(),
    }, label ?? new.target.name);

    if (trackReclamation) this.#lifecycle.watch(this, tracker, false);
  }

  get isDisposed(): boolean {
    return this.#lifecycle.isDisposed;
  }

  dispose(): void {
    this.#lifecycle.dispose();
  }

  disposeAsync(): Promise<void> {
    return this.#lifecycle.disposeAsync();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  [Symbol.asyncDispose](): Promise<void> {
    return this.disposeAsync();
  }

  protected releaseManagedResources(): void { }

  protected async releaseManagedResourcesAsync(): Promise<void> { }

  protected releaseUnmanagedResources(): void { }
}
