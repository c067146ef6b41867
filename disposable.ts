/**
 * This module provides the synchronous disposal lifecycle: a run-once, two-phase release
 * protocol for objects that own resources.
 *
 * ## Overview
 *
 * Disposal has two phases. The **managed** phase releases resources that depend on the rest of
 * the owner's object graph; the **unmanaged** phase releases resources that must be released no
 * matter what, such as native handles. Explicit disposal runs both phases, in that order. If the
 * owner is garbage collected without ever being disposed, only the unmanaged phase can still
 * run, and a leak warning is logged.
 *
 * Two shapes are offered:
 * - **`createDisposable(releaser)`** wraps an object holding the release hooks and returns a
 *   handle. Because the hooks live outside the handle, the unmanaged hook still runs if the
 *   handle is reclaimed without being disposed.
 * - **`DisposableBase`** is an abstract class whose subclasses override the hooks. Its hooks
 *   live on the reclaimed object itself, so reclamation can only be reported, not cleaned up.
 *
 * Both plug into the `using` declaration through `Symbol.dispose`.
 *
 * @module
 */

import type { DisposableOptions, LifecycleDisposable, ResourceReleaser } from "./types.ts";
import { Lifecycle, reclamationTracker } from "./_lifecycle.ts";

/**
 * Wraps a set of release hooks into a disposable handle whose hooks run at most once.
 *
 * @param releaser The owner's release hooks. It must not reference the returned handle, or
 *                 the handle can never be reclaimed.
 * @param options  Diagnostics label and reclamation tracking.
 *
 * @example
 * ```ts
 * const fd = openSync("data.bin", "r");
 * const file = createDisposable({
 *   releaseUnmanagedResources: () => closeSync(fd),
 * }, { label: "data.bin" });
 *
 * {
 *   using handle = file;
 *   // read from fd
 * } // closeSync(fd) runs here, exactly once
 *
 * file.dispose(); // no-op
 * ```
 */
export function createDisposable(
  releaser: ResourceReleaser,
  { label = "disposable", trackReclamation = true, tracker = reclamationTracker }: DisposableOptions = {},
): LifecycleDisposable {
  const lifecycle = new Lifecycle(releaser, label);

  const handle: LifecycleDisposable = {
    get isDisposed() {
      return lifecycle.isDisposed;
    },

    dispose() {
      lifecycle.dispose();
    },

    [Symbol.dispose]() {
      lifecycle.dispose();
    },
  };

  if (trackReclamation) lifecycle.watch(handle, tracker, true);
  return handle;
}

/**
 * Base class for objects that own resources and release them with the two-phase protocol.
 *
 * Subclasses override {@link releaseManagedResources} and/or {@link releaseUnmanagedResources}
 * and call the base implementation so that behavior composed along the class chain still runs.
 *
 * @example
 * ```ts
 * class Connection extends DisposableBase {
 *   constructor(private readonly socket: Socket) {
 *     super({ label: "Connection" });
 *   }
 *
 *   protected override releaseManagedResources(): void {
 *     this.socket.end();
 *     super.releaseManagedResources();
 *   }
 * }
 *
 * using connection = new Connection(socket);
 * ```
 */
export abstract class DisposableBase implements LifecycleDisposable {
  readonly #lifecycle: Lifecycle;

  constructor({ label, trackReclamation = true, tracker = reclamationTracker }: DisposableOptions = {}) {
    this.#lifecycle = new Lifecycle({
      releaseManagedResources: () => this.releaseManagedResources(),
      releaseUnmanagedResources: () => this.releaseUnmanagedResources(),
    }, label ?? new.target.name);

    // The hooks close over `this`; reclamation can only be reported.
    if (trackReclamation) this.#lifecycle.watch(this, tracker, false);
  }

  get isDisposed(): boolean {
    return this.#lifecycle.isDisposed;
  }

  dispose(): void {
    this.#lifecycle.dispose();
  }

  [Symbol.dispose](): void {
    this.dispose();
  }

  protected releaseManagedResources(): void { }

  protected releaseUnmanagedResources(): void { }
}
