import { TimeoutError } from './errors';

export interface OperationOptions {
  /** Caller-supplied deadline; aborting it times the operation out. */
  signal?: AbortSignal;
}

export interface Deadline {
  signal: AbortSignal;
  dispose(): void;
}

/**
 * Combines an optional caller signal with an operation-level time budget.
 * Always call `dispose()` once the operation settles so the timer is released.
 */
export function withDeadline(timeoutMs: number | undefined, parent?: AbortSignal): Deadline {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);

  if (parent) {
    if (parent.aborted) {
      controller.abort(parent.reason);
    } else {
      parent.addEventListener('abort', onParentAbort, { once: true });
    }
  }

  let timer: NodeJS.Timeout | undefined;
  if (timeoutMs !== undefined && timeoutMs > 0) {
    timer = setTimeout(() => controller.abort(new Error(`deadline of ${timeoutMs}ms exceeded`)), timeoutMs);
    timer.unref();
  }

  return {
    signal: controller.signal,
    dispose() {
      if (timer) clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}

export function ensureActive(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new TimeoutError(operation, { cause: signal.reason });
  }
}

/**
 * Settles with `promise`, or rejects with a TimeoutError as soon as `signal` aborts.
 * The underlying work is not cancelled; whatever it already applied stays applied.
 */
export function raceSignal<T>(promise: Promise<T>, signal: AbortSignal | undefined, operation: string): Promise<T> {
  if (!signal) return promise;

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new TimeoutError(operation, { cause: signal.reason }));
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }
    // Settling after a timeout is a no-op, but the handlers keep a late rejection from going unhandled
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(err);
      },
    );
  });
}
