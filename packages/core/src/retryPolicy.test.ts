import { describe, expect, it } from 'vitest';

import { DEFAULT_RETRY_POLICY, calculateDelay, createRetryPolicy } from './retryPolicy.js';

describe('calculateDelay', () => {
  it('grows exponentially and caps at maxDelayMs', () => {
    const delays = [0, 1, 2, 3, 4, 5, 6].map((attempt) => calculateDelay(DEFAULT_RETRY_POLICY, attempt));
    expect(delays).toEqual([0, 1000, 2000, 4000, 8000, 10000, 10000]);
  });

  it('returns 0 for non-positive attempts', () => {
    expect(calculateDelay(DEFAULT_RETRY_POLICY, -3)).toBe(0);
  });

  it('uses the configured multiplier', () => {
    const policy = createRetryPolicy({ initialDelayMs: 100, multiplier: 3, maxDelayMs: 1_000 });
    expect(calculateDelay(policy, 1)).toBe(100);
    expect(calculateDelay(policy, 2)).toBe(300);
    expect(calculateDelay(policy, 3)).toBe(900);
    expect(calculateDelay(policy, 4)).toBe(1_000);
  });
});

describe('createRetryPolicy', () => {
  it('fills defaults and freezes the result', () => {
    const policy = createRetryPolicy({ maxRetries: 1 });
    expect(policy).toEqual({ maxRetries: 1, initialDelayMs: 1000, maxDelayMs: 10000, multiplier: 2 });
    expect(Object.isFrozen(policy)).toBe(true);
  });

  it('rejects invalid values', () => {
    expect(() => createRetryPolicy({ maxRetries: -1 })).toThrow(RangeError);
    expect(() => createRetryPolicy({ maxRetries: 1.5 })).toThrow(RangeError);
    expect(() => createRetryPolicy({ initialDelayMs: -1 })).toThrow(RangeError);
    expect(() => createRetryPolicy({ multiplier: 0.5 })).toThrow(RangeError);
  });
});
