import { describe, expect, it, vi } from 'vitest';

import { MaxRetriesExceededError, createRetryPolicy } from '@patchwarden/core';

import { RetryExecutor, type RetryNotice } from './retryExecutor.js';

const fastPolicy = createRetryPolicy({ maxRetries: 3, initialDelayMs: 1, maxDelayMs: 5, multiplier: 2 });

describe('RetryExecutor', () => {
  it('returns the first success', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const fn = vi.fn(async (attempt: number) => {
      if (attempt < 3) throw new Error('503 service unavailable');
      return `ok on ${attempt}`;
    });

    await expect(executor.execute(fn)).resolves.toBe('ok on 3');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('makes maxRetries + 1 attempts before giving up', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const last = new Error('rate limit exceeded (429)');
    const fn = vi.fn(async (): Promise<string> => {
      throw last;
    });
    const notices: RetryNotice[] = [];

    const err = await executor.execute(fn, { onRetry: (notice) => notices.push(notice) }).catch((e: unknown) => e);

    expect(fn).toHaveBeenCalledTimes(4);
    expect(err).toBeInstanceOf(MaxRetriesExceededError);
    if (!(err instanceof MaxRetriesExceededError)) return;
    expect(err.attempts).toBe(4);
    expect(err.cause).toBe(last);
    expect(notices.map((n) => [n.retry, n.delayMs, n.classified.code])).toEqual([
      [1, 1, 'RATE_LIMITED'],
      [2, 2, 'RATE_LIMITED'],
      [3, 4, 'RATE_LIMITED'],
    ]);
  });

  it('rethrows non-retryable errors immediately', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const unauthorized = new Error('401 Unauthorized');
    const fn = vi.fn(async (): Promise<void> => {
      throw unauthorized;
    });

    await expect(executor.execute(fn)).rejects.toBe(unauthorized);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('uses the injected classifier', async () => {
    const executor = new RetryExecutor({
      policy: fastPolicy,
      classify: (err) => ({ code: 'UNKNOWN', message: String(err), retryable: false, fallbackAction: 'fail', cause: err }),
    });
    const fn = vi.fn(async (): Promise<void> => {
      throw new Error('timeout');
    });

    await expect(executor.execute(fn)).rejects.toThrow('timeout');
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('rejects with the abort reason when cancelled during backoff', async () => {
    const executor = new RetryExecutor({ policy: createRetryPolicy({ initialDelayMs: 10_000, maxDelayMs: 10_000 }) });
    const controller = new AbortController();
    const reason = new Error('shutting down');
    const fn = vi.fn(async (): Promise<void> => {
      setTimeout(() => controller.abort(reason), 10);
      throw new Error('server error 500');
    });

    await expect(executor.execute(fn, { signal: controller.signal })).rejects.toBe(reason);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('does not retry a failure caused by the signal', async () => {
    const executor = new RetryExecutor({ policy: fastPolicy });
    const controller = new AbortController();
    const attemptError = new Error('timeout while waiting');
    const fn = vi.fn(async (): Promise<void> => {
      controller.abort(new Error('deadline'));
      throw attemptError;
    });

    await expect(executor.execute(fn, { signal: controller.signal })).rejects.toBe(attemptError);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('exposes the delay formula', () => {
    const executor = new RetryExecutor();
    expect([0, 1, 2, 3, 4, 5, 6].map((n) => executor.calculateDelay(n))).toEqual([0, 1000, 2000, 4000, 8000, 10000, 10000]);
  });
});
