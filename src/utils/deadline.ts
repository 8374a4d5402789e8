/**
 * Bound a promise by a timeout and, optionally, an AbortSignal
 */

export interface DeadlineOptions {
  timeoutMs: number;
  onTimeout: () => Error;
  signal?: AbortSignal;
  onAbort?: () => Error;
}

/**
 * Settle with `work`, or reject with `onTimeout()` / `onAbort()` if either fires first.
 * The work itself is not cancelled; callers tear down whatever it is waiting on.
 */
export function withDeadline<T>(work: Promise<T>, options: DeadlineOptions): Promise<T> {
  const { timeoutMs, onTimeout, signal, onAbort } = options;

  return new Promise<T>((resolve, reject) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;

    const abortError = (): Error => (onAbort ? onAbort() : new Error('Operation aborted'));

    const cleanup = (): void => {
      settled = true;
      if (timer) clearTimeout(timer);
      signal?.removeEventListener('abort', handleAbort);
    };

    function handleAbort(): void {
      if (settled) return;
      cleanup();
      reject(abortError());
    }

    work.then(
      value => {
        if (settled) return;
        cleanup();
        resolve(value);
      },
      (error: unknown) => {
        if (settled) return;
        cleanup();
        reject(error);
      }
    );

    if (signal?.aborted) {
      cleanup();
      reject(abortError());
      return;
    }

    timer = setTimeout(() => {
      if (settled) return;
      cleanup();
      reject(onTimeout());
    }, Math.max(0, timeoutMs));
    signal?.addEventListener('abort', handleAbort, { once: true });
  });
}

/**
 * Milliseconds left until an absolute deadline (epoch ms), never negative
 */
export function remainingMs(deadline: number, now: number = Date.now()): number {
  return Math.max(0, deadline - now);
}
