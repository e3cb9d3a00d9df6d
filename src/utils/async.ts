/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export interface TimeoutOptions {
  timeoutMs: number;
  onTimeout: () => Error;
  /** Cancels the task early; the returned promise rejects with the signal's reason. */
  signal?: AbortSignal;
}

/**
 * Run `task` with its own abort signal. The signal aborts when the timeout fires or the
 * parent signal aborts, and the returned promise rejects right away in both cases, even
 * if the task ignores the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  { timeoutMs, onTimeout, signal }: TimeoutOptions
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onParentAbort: (() => void) | undefined;

  const cancelled = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      const error = onTimeout();
      controller.abort(error);
      reject(error);
    }, timeoutMs);

    onParentAbort = (): void => {
      const reason: unknown = signal?.reason;
      controller.abort(reason);
      reject(reason instanceof Error ? reason : new Error('Cancelled'));
    };
    if (signal?.aborted) {
      onParentAbort();
    } else {
      signal?.addEventListener('abort', onParentAbort, { once: true });
    }
  });

  try {
    return await Promise.race([task(controller.signal), cancelled]);
  } finally {
    clearTimeout(timer);
    if (onParentAbort) {
      signal?.removeEventListener('abort', onParentAbort);
    }
  }
}

/** Settles with the promise's outcome, or with null as soon as `signal` aborts. */
export async function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T | null> {
  if (signal.aborted) {
    return null;
  }
  let onAbort: (() => void) | undefined;
  const aborted = new Promise<null>((resolve) => {
    onAbort = (): void => resolve(null);
    signal.addEventListener('abort', onAbort, { once: true });
  });
  try {
    return await Promise.race([promise, aborted]);
  } finally {
    if (onAbort) {
      signal.removeEventListener('abort', onAbort);
    }
  }
}

/** Waits for every promise to settle, up to `ms`. Returns true if all settled in time. */
export async function settleWithin(promises: readonly Promise<unknown>[], ms: number): Promise<boolean> {
  if (promises.length === 0) {
    return true;
  }
  const timer = new AbortController();
  try {
    return await Promise.race([
      Promise.allSettled(promises).then(() => true),
      sleep(ms, timer.signal).then(() => false),
    ]);
  } finally {
    timer.abort();
  }
}
