import {
  DEFAULT_RETRY_POLICY,
  MaxRetriesExceededError,
  calculateDelay,
  classifyError,
  type ClassifiedError,
  type RetryPolicy,
} from '@patchwarden/core';
import type { Logger } from 'pino';

import { abortReason, sleep } from './abort.js';
import { silentLogger } from './logger.js';

export type RetryNotice = Readonly<{
  /** 1-based number of the retry about to happen. */
  retry: number;
  delayMs: number;
  error: unknown;
  classified: ClassifiedError;
}>;

export type RetryExecuteOptions = Readonly<{
  signal?: AbortSignal;
  onRetry?: (notice: RetryNotice) => void;
}>;

export type RetryExecutorOptions = Readonly<{
  policy?: RetryPolicy;
  classify?: (err: unknown) => ClassifiedError;
  logger?: Logger;
}>;

/**
 * Bounded exponential-backoff retry. Retryability comes from the error
 * classifier alone; the executor never inspects errors itself.
 */
export class RetryExecutor {
  readonly policy: RetryPolicy;
  private readonly classify: (err: unknown) => ClassifiedError;
  private readonly logger: Logger;

  constructor(options: RetryExecutorOptions = {}) {
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
    this.classify = options.classify ?? classifyError;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'retry' });
  }

  calculateDelay(attempt: number): number {
    return calculateDelay(this.policy, attempt);
  }

  /**
   * Runs `fn` up to `maxRetries + 1` times; `fn` receives the 1-based attempt number.
   *
   * Rejects with the error itself when it is not retryable or the signal has
   * fired, with the abort reason when a backoff sleep is interrupted, and
   * with `MaxRetriesExceededError` once every attempt failed.
   */
  async execute<T>(fn: (attempt: number) => Promise<T>, options: RetryExecuteOptions = {}): Promise<T> {
    const { signal } = options;
    const maxAttempts = this.policy.maxRetries + 1;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (attempt > 1) {
        const delayMs = this.calculateDelay(attempt - 1);
        await sleep(delayMs, signal);
      }
      if (signal?.aborted) throw abortReason(signal);

      try {
        return await fn(attempt);
      } catch (err) {
        if (signal?.aborted) throw err;

        const classified = this.classify(err);
        if (!classified.retryable) throw err;

        lastError = err;
        if (attempt < maxAttempts) {
          const notice: RetryNotice = { retry: attempt, delayMs: this.calculateDelay(attempt), error: err, classified };
          this.logger.warn(
            { attempt, code: classified.code, delayMs: notice.delayMs, err: classified.message },
            'attempt failed; retrying',
          );
          options.onRetry?.(notice);
        }
      }
    }

    throw new MaxRetriesExceededError(maxAttempts, lastError);
  }
}
