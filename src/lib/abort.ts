import { SessionAbortedError } from "./errors.js";

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SessionAbortedError();
  }
}

export interface ScopedSignal {
  signal: AbortSignal;
  /** True when the scope ended because of its own timeout rather than the parent. */
  timedOut(): boolean;
  dispose(): void;
}

/**
 * Child signal that aborts when the parent aborts or when `timeoutMs` elapses.
 * Callers must dispose it once the guarded call settles.
 */
export function scopedSignal(parent: AbortSignal | undefined, timeoutMs: number): ScopedSignal {
  const controller = new AbortController();
  let expired = false;

  const onParentAbort = (): void => controller.abort(parent?.reason);
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener("abort", onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    expired = true;
    controller.abort(new Error(`Timed out after ${timeoutMs}ms.`));
  }, timeoutMs);

  return {
    signal: controller.signal,
    timedOut: () => expired,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    }
  };
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) {
    throwIfAborted(signal);
    return Promise.resolve();
  }

  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new SessionAbortedError());
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new SessionAbortedError());
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);

    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
