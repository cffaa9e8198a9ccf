import { ProcessAlreadyStartedError, TimeoutError } from '@patchwarden/core';
import type { Logger } from 'pino';

import { abortReason } from './abort.js';
import { silentLogger } from './logger.js';

export type WatchdogOptions = Readonly<{
  timeoutMs: number;
  /** How often the elapsed time is checked. */
  checkIntervalMs?: number;
  onTimeout?: () => void;
  logger?: Logger;
}>;

const DEFAULT_CHECK_INTERVAL_MS = 5_000;

/**
 * Stand-alone deadline monitor. `watch` settles exactly once: it resolves on
 * `stop()`, rejects with the abort reason when the signal fires, and rejects
 * with `TimeoutError` (after `onTimeout`) once `timeoutMs` has elapsed.
 */
export class Watchdog {
  readonly timeoutMs: number;
  readonly checkIntervalMs: number;
  private readonly onTimeout: (() => void) | undefined;
  private readonly logger: Logger;
  private stopCurrent: (() => void) | null = null;

  constructor(options: WatchdogOptions) {
    this.timeoutMs = options.timeoutMs;
    this.checkIntervalMs = Math.max(1, Math.min(options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS, options.timeoutMs));
    this.onTimeout = options.onTimeout;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'watchdog' });
  }

  get isRunning(): boolean {
    return this.stopCurrent !== null;
  }

  watch(signal?: AbortSignal): Promise<void> {
    if (this.stopCurrent) return Promise.reject(new ProcessAlreadyStartedError('watchdog is already running'));
    if (signal?.aborted) return Promise.reject(abortReason(signal));

    return new Promise<void>((resolve, reject) => {
      const startedAt = Date.now();

      const finish = (): void => {
        clearInterval(ticker);
        signal?.removeEventListener('abort', onAbort);
        this.stopCurrent = null;
      };
      const onAbort = (): void => {
        finish();
        if (signal) reject(abortReason(signal));
      };
      const ticker = setInterval(() => {
        if (Date.now() - startedAt < this.timeoutMs) return;
        finish();
        this.logger.warn({ timeoutMs: this.timeoutMs }, 'watchdog deadline reached');
        this.onTimeout?.();
        reject(new TimeoutError(`watchdog deadline of ${this.timeoutMs}ms reached`));
      }, this.checkIntervalMs);

      signal?.addEventListener('abort', onAbort, { once: true });
      this.stopCurrent = () => {
        finish();
        resolve();
      };
    });
  }

  stop(): void {
    this.stopCurrent?.();
  }
}

/** The part of a subprocess handle the process watch needs. */
export interface WatchedProcess {
  readonly isRunning: boolean;
  readonly pid: number | null;
  kill(): void;
}

export type ProcessWatch = Readonly<{
  /** True once the deadline fired while the process was still running. */
  timedOut: () => boolean;
  stop: () => void;
}>;

/**
 * Arms a timer that SIGKILLs `handle` if it is still running after
 * `timeoutMs`. The caller turns a timed-out attempt into `TimeoutError`.
 */
export function watchProcess(
  handle: WatchedProcess,
  timeoutMs: number,
  options: { onTimeout?: () => void; logger?: Logger } = {},
): ProcessWatch {
  let timedOut = false;
  const timer = setTimeout(() => {
    if (!handle.isRunning) return;
    timedOut = true;
    options.logger?.warn({ pid: handle.pid, timeoutMs }, 'analysis process exceeded its time limit; killing');
    options.onTimeout?.();
    try {
      handle.kill();
    } catch (err) {
      options.logger?.error({ err, pid: handle.pid }, 'failed to kill timed-out analysis process');
    }
  }, Math.max(0, timeoutMs));

  return {
    timedOut: () => timedOut,
    stop: () => clearTimeout(timer),
  };
}
