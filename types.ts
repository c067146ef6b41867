/**
 * Something that can be released from either a `using` or an `await using` block.
 *
 * @example
 * ```ts
 * {
 *   using slot = acquireAndRelease(writes); // released synchronously
 * }
 * {
 *   await using slot = await acquireAndReleaseAsync(writes); // released asynchronously
 * }
 * ```
 */
export interface DualDisposable extends Disposable, AsyncDisposable { }

/**
 * The release hooks of a resource owner, handed to `createDisposable`.
 *
 * ## Managed vs. unmanaged resources
 *
 * A **managed** resource is one whose cleanup only makes sense while the rest of the owner's
 * object graph is still intact, for example calling back into another object the owner holds.
 * An **unmanaged** resource is one that must be released even when the owner was never
 * disposed and is being reclaimed by the garbage collector, for example a raw file descriptor.
 *
 * Both hooks are optional. Each runs at most once per owner.
 */
export interface ResourceReleaser {
  /** Releases managed resources. Only runs on explicit disposal. */
  releaseManagedResources?(): void;

  /** Releases unmanaged resources. Runs on explicit disposal and on reclamation. */
  releaseUnmanagedResources?(): void;
}

/**
 * The release hooks of a resource owner whose managed cleanup is itself asynchronous,
 * handed to `createAsyncDisposable`.
 *
 * `releaseManagedResourcesAsync` replaces `releaseManagedResources` when the owner is disposed
 * asynchronously; the synchronous hook still covers a synchronous `dispose()`.
 */
export interface AsyncResourceReleaser extends ResourceReleaser {
  releaseManagedResourcesAsync?(): PromiseLike<void> | void;
}

/**
 * A resource with a two-phase, run-once release protocol.
 *
 * The lifecycle has a single transition, from live to disposed, taken by whichever of
 * `dispose()`, `[Symbol.dispose]()` or reclamation happens first. Every later trigger is a no-op.
 */
export interface LifecycleDisposable extends Disposable {
  /** `false` until disposal has completed, `true` forever after. */
  readonly isDisposed: boolean;

  /** Releases managed then unmanaged resources, once. */
  dispose(): void;
}

/**
 * A {@link LifecycleDisposable} that can also be released asynchronously.
 */
export interface AsyncLifecycleDisposable extends LifecycleDisposable, DualDisposable {
  /**
   * Awaits the asynchronous managed release hook, then runs the unmanaged release hook, once.
   * Concurrent calls share the same in-flight promise.
   */
  disposeAsync(): Promise<void>;
}

/**
 * Options shared by the disposable factories and base classes.
 */
export interface DisposableOptions {
  /**
   * Name used in diagnostics, such as the warning logged when the resource is reclaimed
   * without having been disposed.
   *
   * @default "disposable"
   */
  label?: string;

  /**
   * Whether to watch the resource for reclamation without disposal.
   *
   * @default true
   */
  trackReclamation?: boolean;

  /**
   * Where reclamation is watched. Defaults to the process-wide tracker backed by a
   * `FinalizationRegistry`.
   */
  tracker?: ReclamationTracker;
}

/**
 * The record kept for a watched resource until it is disposed or reclaimed.
 * It must never reference the watched resource itself, or the resource could not be reclaimed.
 */
export interface ReclamationRecord {
  readonly label: string;

  /** Runs the unmanaged release hook on reclamation, when the hooks outlive the resource. */
  readonly release?: () => void;
}

/**
 * Watches resources for reclamation without disposal. `FinalizationRegistry` satisfies it.
 */
export interface ReclamationTracker {
  register(target: object, record: ReclamationRecord, unregisterToken: object): void;
  unregister(unregisterToken: object): boolean;
}
