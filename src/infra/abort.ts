/**
 * Deadline bound to an {@link AbortController}. The controller aborts when the
 * timer fires or when the optional parent signal aborts, whichever comes
 * first; {@link Deadline.reason} records which one it was.
 */
export interface Deadline {
  readonly signal: AbortSignal;
  readonly timeoutMs: number;
  /** `null` while the deadline is still running. */
  readonly reason: "timeout" | "cancelled" | null;
  /** Disarms the timer and detaches from the parent signal. */
  clear(): void;
}

/** Arms a deadline of {@link timeoutMs} milliseconds, linked to {@link parent}. */
export function createDeadline(timeoutMs: number, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  let reason: Deadline["reason"] = null;
  let cleared = false;

  const abort = (cause: "timeout" | "cancelled"): void => {
    if (reason !== null || cleared) {
      return;
    }
    reason = cause;
    controller.abort();
  };

  const onParentAbort = (): void => abort("cancelled");
  const timer = setTimeout(() => abort("timeout"), timeoutMs);

  if (parent?.aborted) {
    abort("cancelled");
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  return {
    signal: controller.signal,
    timeoutMs,
    get reason() {
      return reason;
    },
    clear() {
      if (cleared) {
        return;
      }
      cleared = true;
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    },
  };
}

/** Error raised by {@link raceWithSignal} when the signal aborts first. */
export class AbortedWaitError extends Error {
  constructor() {
    super("Wait aborted before the operation settled");
    this.name = "AbortedWaitError";
  }
}

/**
 * Waits for {@link promise} unless {@link signal} aborts first. Aborting only
 * stops this caller from waiting; the underlying operation keeps running for
 * any other consumer of the same promise.
 */
export function raceWithSignal<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    // Observe the shared promise so an eventual rejection is not reported as unhandled.
    promise.catch(() => undefined);
    return Promise.reject(new AbortedWaitError());
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new AbortedWaitError());
    signal.addEventListener("abort", onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      },
    );
  });
}
