export type RetryPolicy = Readonly<{
  /** Retries after the first attempt; `maxRetries: 3` means up to 4 attempts. */
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  multiplier: number;
}>;

export const DEFAULT_RETRY_POLICY: RetryPolicy = Object.freeze({
  maxRetries: 3,
  initialDelayMs: 1_000,
  maxDelayMs: 10_000,
  multiplier: 2,
});

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  const policy = { ...DEFAULT_RETRY_POLICY, ...overrides };
  if (!Number.isInteger(policy.maxRetries) || policy.maxRetries < 0) {
    throw new RangeError(`maxRetries must be a non-negative integer, got ${policy.maxRetries}`);
  }
  if (!(policy.initialDelayMs >= 0) || !(policy.maxDelayMs >= 0)) {
    throw new RangeError('retry delays must be non-negative');
  }
  if (!(policy.multiplier >= 1)) {
    throw new RangeError(`multiplier must be >= 1, got ${policy.multiplier}`);
  }
  return Object.freeze(policy);
}

/** Backoff before retry `attempt` (1-based): `min(initial * multiplier^(attempt-1), max)`. */
export function calculateDelay(policy: RetryPolicy, attempt: number): number {
  if (attempt <= 0) return 0;

  let delay = policy.initialDelayMs;
  for (let i = 1; i < attempt; i += 1) {
    delay *= policy.multiplier;
    if (delay > policy.maxDelayMs) return policy.maxDelayMs;
  }
  return Math.min(delay, policy.maxDelayMs);
}
