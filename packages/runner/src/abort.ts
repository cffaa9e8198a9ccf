import { MAX_TIMER_MS, TimeoutError } from '@patchwarden/core';

function timerDelay(ms: number): number {
  return Math.min(Math.max(0, ms), MAX_TIMER_MS);
}

/** The signal's reason as an Error; `AbortSignal.abort()` without a reason yields a DOMException. */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  if (reason instanceof Error) return reason;
  return new Error(reason === undefined ? 'operation aborted' : String(reason));
}

/** Resolves after `ms`; rejects with the abort reason if the signal fires first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortReason(signal));
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      if (signal) reject(abortReason(signal));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, timerDelay(ms));
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export type Deadline = Readonly<{
  signal: AbortSignal;
  dispose: () => void;
}>;

/**
 * A child signal that follows `parent` and additionally aborts with
 * `TimeoutError` after `ms`. Call `dispose` once the guarded work settles.
 */
export function withDeadline(parent: AbortSignal | undefined, ms: number, message?: string): Deadline {
  const controller = new AbortController();

  const onParentAbort = (): void => {
    if (parent) controller.abort(parent.reason);
  };
  if (parent?.aborted) {
    controller.abort(parent.reason);
  } else {
    parent?.addEventListener('abort', onParentAbort, { once: true });
  }

  const timer = setTimeout(() => {
    controller.abort(new TimeoutError(message ?? `execution timed out after ${ms}ms`));
  }, timerDelay(ms));

  return {
    signal: controller.signal,
    dispose: () => {
      clearTimeout(timer);
      parent?.removeEventListener('abort', onParentAbort);
    },
  };
}
