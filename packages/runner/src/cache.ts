import { createHash } from 'node:crypto';
import fs from 'node:fs/promises';
import path from 'node:path';

import type { Logger } from 'pino';
import { z } from 'zod';

import { writeJsonAtomic } from './jsonAtomic.js';
import { silentLogger } from './logger.js';

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000;
const CACHE_FILE_MODE = 0o600;

export type CachedPayload = Readonly<{
  output: string;
  skipped: boolean;
  partial: boolean;
  reason: string | null;
}>;

export type CacheEntry = Readonly<{
  key: number;
  payload: CachedPayload;
  /** ISO timestamp of the write. */
  cachedAt: string;
  durationMs: number;
}>;

const cacheFileSchema = z.object({
  key: z.number().int(),
  payload: z.object({
    output: z.string(),
    skipped: z.boolean(),
    partial: z.boolean(),
    reason: z.string().nullable(),
  }),
  cached_at: z.string().datetime({ offset: true }),
  duration_ms: z.number().nonnegative(),
});

export type ReviewCacheOptions = Readonly<{
  dir: string;
  enabled?: boolean;
  ttlMs?: number;
  logger?: Logger;
  now?: () => number;
}>;

/** The cache operations the fallback handler reads through. */
export interface ReviewLookup {
  getReview(key: number): Promise<CacheEntry | null>;
}

function assertKey(key: number): void {
  if (!Number.isSafeInteger(key)) throw new RangeError(`cache key must be a safe integer, got ${key}`);
}

export function cacheFileName(key: number): string {
  const base = `pr-${key}`;
  return `${base}-${createHash('md5').update(base).digest('hex')}.json`;
}

/** One JSON file per key; entries older than the TTL are dropped when read. */
export class ReviewCache implements ReviewLookup {
  readonly dir: string;
  readonly enabled: boolean;
  private ttlMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(options: ReviewCacheOptions) {
    this.dir = path.resolve(options.dir);
    this.enabled = options.enabled ?? true;
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'cache' });
    this.now = options.now ?? Date.now;
  }

  get ttl(): number {
    return this.ttlMs;
  }

  setTTL(ms: number): void {
    if (!(ms > 0)) throw new RangeError(`cache TTL must be positive, got ${ms}`);
    this.ttlMs = ms;
  }

  pathFor(key: number): string {
    assertKey(key);
    return path.join(this.dir, cacheFileName(key));
  }

  async getReview(key: number): Promise<CacheEntry | null> {
    if (!this.enabled) return null;
    const filePath = this.pathFor(key);

    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') this.logger.warn({ err, key }, 'cache entry unreadable');
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (err) {
      this.logger.warn({ err, key }, 'cache entry is not valid JSON');
      return null;
    }
    const parsed = cacheFileSchema.safeParse(json);
    if (!parsed.success || parsed.data.key !== key) {
      this.logger.warn({ key }, 'cache entry has an unexpected shape');
      return null;
    }

    const cachedAtMs = Date.parse(parsed.data.cached_at);
    if (this.now() - cachedAtMs > this.ttlMs) {
      this.logger.debug({ key, cachedAt: parsed.data.cached_at }, 'cache entry expired');
      await this.removeFile(filePath, key);
      return null;
    }

    return {
      key,
      payload: parsed.data.payload,
      cachedAt: parsed.data.cached_at,
      durationMs: parsed.data.duration_ms,
    };
  }

  async setReview(key: number, entry: Readonly<{ payload: CachedPayload; durationMs: number }>): Promise<CacheEntry | null> {
    if (!this.enabled) return null;
    const filePath = this.pathFor(key);
    const cachedAt = new Date(this.now()).toISOString();

    await writeJsonAtomic(
      filePath,
      { key, payload: entry.payload, cached_at: cachedAt, duration_ms: entry.durationMs },
      { mode: CACHE_FILE_MODE },
    );
    this.logger.debug({ key }, 'cache entry written');
    return { key, payload: entry.payload, cachedAt, durationMs: entry.durationMs };
  }

  async invalidate(key: number): Promise<void> {
    await this.removeFile(this.pathFor(key), key);
  }

  /** Removes every file in the cache dir, logging failures and carrying on. Returns how many were removed. */
  async clear(): Promise<number> {
    let names: string[];
    try {
      names = await fs.readdir(this.dir);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') return 0;
      throw err;
    }

    let removed = 0;
    for (const name of names) {
      const filePath = path.join(this.dir, name);
      try {
        await fs.unlink(filePath);
        removed += 1;
      } catch (err) {
        this.logger.warn({ err, file: filePath }, 'failed to delete cache file');
      }
    }
    return removed;
  }

  private async removeFile(filePath: string, key: number): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
        this.logger.warn({ err, key }, 'failed to delete cache entry');
      }
    }
  }
}
