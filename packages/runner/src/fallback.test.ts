import { describe, expect, it, vi } from 'vitest';

import {
  BinaryNotFoundError,
  MaxRetriesExceededError,
  OutputLimitError,
  classifyError,
  type ClassifiedError,
} from '@patchwarden/core';

import type { CacheEntry } from './cache.js';
import { CACHE_MISS_REASON, FallbackHandler, PARTIAL_OUTPUT, SKIPPED_OUTPUT } from './fallback.js';

function classified(overrides: Partial<ClassifiedError>): ClassifiedError {
  return { code: 'UNKNOWN', message: 'x', retryable: false, fallbackAction: 'fail', cause: null, ...overrides };
}

describe('FallbackHandler', () => {
  it('skips with a reason naming the code', async () => {
    const handler = new FallbackHandler();
    const result = await handler.handle(classifyError(new BinaryNotFoundError('claude')));

    expect(result).toEqual({
      skipped: true,
      cached: false,
      partial: false,
      output: SKIPPED_OUTPUT,
      reason: 'Analysis unavailable: CLAUDE_NOT_FOUND - analysis binary not found in PATH: claude',
    });
  });

  it('returns the captured stdout as a partial result', async () => {
    const handler = new FallbackHandler();
    const result = await handler.handle(classifyError(new OutputLimitError(10, 'first findings')));

    expect(result).toEqual({
      skipped: false,
      cached: false,
      partial: true,
      output: 'first findings',
      reason: 'Returning partial results: analysis output exceeds limit of 10 bytes',
    });
  });

  it('uses a placeholder partial output when nothing was captured', async () => {
    const handler = new FallbackHandler();
    const result = await handler.handle(classified({ code: 'CONTENT_TOO_LARGE', fallbackAction: 'partial', message: 'too large' }));
    expect(result?.output).toBe(PARTIAL_OUTPUT);
  });

  it('serves a cached entry for the cache action', async () => {
    const entry: CacheEntry = {
      key: 12,
      payload: { output: 'old review', skipped: false, partial: false, reason: null },
      cachedAt: '2026-01-01T00:00:00.000Z',
      durationMs: 10,
    };
    const getReview = vi.fn(async (key: number) => (key === 12 ? entry : null));
    const handler = new FallbackHandler({ cache: { getReview } });

    await expect(handler.handle(classified({ fallbackAction: 'cache' }), { key: 12 })).resolves.toEqual({
      skipped: false,
      cached: true,
      partial: false,
      output: 'old review',
      reason: 'Using cached result from 2026-01-01T00:00:00.000Z',
    });
    await expect(handler.handle(classified({ fallbackAction: 'cache' }), { key: 13 })).resolves.toMatchObject({
      skipped: true,
      cached: false,
      reason: CACHE_MISS_REASON,
    });
  });

  it('reports a cache miss without a cache or key', async () => {
    const handler = new FallbackHandler();
    await expect(handler.handle(classified({ fallbackAction: 'cache' }), { key: 1 })).resolves.toMatchObject({
      skipped: true,
      reason: CACHE_MISS_REASON,
    });
  });

  it('propagates retry and fail but counts them', async () => {
    const handler = new FallbackHandler();
    const exhausted = new MaxRetriesExceededError(4, new Error('rate limit exceeded (429)'));

    await expect(handler.handle(classifyError(exhausted))).resolves.toBeNull();
    await expect(handler.handle(classified({ code: 'UNKNOWN', fallbackAction: 'fail' }))).resolves.toBeNull();

    expect(handler.metrics()).toEqual({
      total: 2,
      byAction: { retry: 1, skip: 0, cache: 0, partial: 0, fail: 1 },
      byErrorCode: { RATE_LIMITED: 1, UNKNOWN: 1 },
    });
  });

  it('hands out snapshots', async () => {
    const handler = new FallbackHandler();
    const before = handler.metrics();
    await handler.handle(classified({ fallbackAction: 'skip', code: 'UNAUTHORIZED' }));

    expect(before.total).toBe(0);
    expect(before.byAction.skip).toBe(0);
    expect(handler.metrics().byAction.skip).toBe(1);
  });
});
