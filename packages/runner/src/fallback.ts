import {
  MaxRetriesExceededError,
  OutputLimitError,
  SubprocessExitError,
  type ClassifiedError,
  type FallbackAction,
} from '@patchwarden/core';
import type { Logger } from 'pino';

import type { ReviewLookup } from './cache.js';
import { silentLogger } from './logger.js';

export type FallbackResult = Readonly<{
  skipped: boolean;
  cached: boolean;
  partial: boolean;
  output: string;
  reason: string;
}>;

export type FallbackRequest = Readonly<{
  /** Cache key of the run, when it has one. */
  key?: number;
}>;

export type FallbackMetrics = Readonly<{
  total: number;
  byAction: Readonly<Record<FallbackAction, number>>;
  byErrorCode: Readonly<Record<string, number>>;
}>;

export const SKIPPED_OUTPUT = 'Analysis skipped; the CI run was not blocked.';
export const CACHE_MISS_REASON = 'No cached result available';
export const PARTIAL_OUTPUT = 'Partial analysis completed';

/** Stdout captured by the failing process, looking through retry exhaustion. */
function capturedStdout(err: unknown): string {
  const inner = err instanceof MaxRetriesExceededError ? err.cause : err;
  if (inner instanceof OutputLimitError || inner instanceof SubprocessExitError) return inner.stdout;
  return '';
}

function emptyActionCounts(): Record<FallbackAction, number> {
  return { retry: 0, skip: 0, cache: 0, partial: 0, fail: 0 };
}

/**
 * Turns a classified failure into a degraded result. `fail` and `retry`
 * yield `null`, meaning the error propagates; they are still counted.
 */
export class FallbackHandler {
  private readonly cache: ReviewLookup | null;
  private readonly logger: Logger;
  private total = 0;
  private readonly byAction = emptyActionCounts();
  private readonly byErrorCode = new Map<string, number>();

  constructor(options: { cache?: ReviewLookup | null; logger?: Logger } = {}) {
    this.cache = options.cache ?? null;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'fallback' });
  }

  async handle(classified: ClassifiedError, request: FallbackRequest = {}): Promise<FallbackResult | null> {
    this.total += 1;
    this.byAction[classified.fallbackAction] += 1;
    this.byErrorCode.set(classified.code, (this.byErrorCode.get(classified.code) ?? 0) + 1);
    this.logger.info({ code: classified.code, action: classified.fallbackAction, key: request.key }, 'fallback triggered');

    switch (classified.fallbackAction) {
      case 'skip':
        return {
          skipped: true,
          cached: false,
          partial: false,
          output: SKIPPED_OUTPUT,
          reason: `Analysis unavailable: ${classified.code} - ${classified.message}`,
        };

      case 'cache': {
        const entry = request.key !== undefined && this.cache ? await this.cache.getReview(request.key) : null;
        if (!entry) {
          return { skipped: true, cached: false, partial: false, output: '', reason: CACHE_MISS_REASON };
        }
        return {
          skipped: entry.payload.skipped,
          cached: true,
          partial: entry.payload.partial,
          output: entry.payload.output,
          reason: `Using cached result from ${entry.cachedAt}`,
        };
      }

      case 'partial': {
        const stdout = capturedStdout(classified.cause);
        return {
          skipped: false,
          cached: false,
          partial: true,
          output: stdout.trim() ? stdout : PARTIAL_OUTPUT,
          reason: `Returning partial results: ${classified.message}`,
        };
      }

      case 'retry':
      case 'fail':
        return null;
    }
  }

  metrics(): FallbackMetrics {
    return {
      total: this.total,
      byAction: { ...this.byAction },
      byErrorCode: Object.fromEntries(this.byErrorCode),
    };
  }
}
