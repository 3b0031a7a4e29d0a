import { CancelledError } from "./errors.js";

/**
 * Cooperative cancellation helpers. A session owns one AbortController; every
 * wait in the orchestrator takes its signal and rejects with CancelledError
 * once it fires.
 */

export function cancelledFrom(signal: AbortSignal): CancelledError {
  const reason: unknown = signal.reason;
  if (reason instanceof CancelledError) {
    return reason;
  }
  return new CancelledError(typeof reason === "string" ? reason : "interrupted");
}

export function throwIfCancelled(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw cancelledFrom(signal);
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(cancelledFrom(signal));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal ? cancelledFrom(signal) : new CancelledError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, Math.max(0, ms));

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function raceCancellation<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  if (!signal) {
    return promise;
  }

  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(cancelledFrom(signal));
      return;
    }

    const onAbort = (): void => reject(cancelledFrom(signal));
    signal.addEventListener("abort", onAbort, { once: true });

    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort);
        reject(error);
      }
    );
  });
}

/** Child controller that aborts with its parent but can also be aborted on its own. */
export function linkedController(parent?: AbortSignal): { controller: AbortController; dispose: () => void } {
  const controller = new AbortController();
  if (!parent) {
    return { controller, dispose: () => undefined };
  }

  const forward = (): void => controller.abort(parent.reason);
  if (parent.aborted) {
    forward();
  } else {
    parent.addEventListener("abort", forward, { once: true });
  }

  return { controller, dispose: () => parent.removeEventListener("abort", forward) };
}
