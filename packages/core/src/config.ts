import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigError } from './errors.js';
import { createRetryPolicy, type RetryPolicy } from './retryPolicy.js';

export const DEFAULT_CONFIG_FILE = 'patchwarden.yaml';

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMER_MS = 2_147_483_647;
export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMER_MS / 1000);

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'] as const;
export type LogLevel = (typeof logLevels)[number];

export type RunnerConfig = Readonly<{
  runner: Readonly<{
    binary: string;
    timeoutMs: number;
    skipPermissions: boolean;
    gracePeriodMs: number;
    prewarm: boolean;
    maxOutputBytes: number;
    requireGit: boolean;
  }>;
  retry: RetryPolicy;
  cache: Readonly<{
    enabled: boolean;
    /** Absolute once loaded; relative paths resolve against the work dir. */
    dir: string;
    ttlMs: number;
  }>;
  capabilities: Readonly<{
    /** Absolute once loaded, in search order. */
    dirs: readonly string[];
  }>;
  logging: Readonly<{
    level: LogLevel;
  }>;
}>;

const HOUR_MS = 60 * 60 * 1000;

const rawConfigSchema = z
  .object({
    runner: z
      .object({
        binary: z.string().min(1).optional().default('claude'),
        timeout_seconds: z.number().positive().max(MAX_TIMEOUT_SECONDS).optional().default(300),
        skip_permissions: z.boolean().optional().default(false),
        grace_period_seconds: z.number().nonnegative().max(MAX_TIMEOUT_SECONDS).optional().default(5),
        prewarm: z.boolean().optional().default(false),
        max_output_bytes: z.number().int().positive().optional().default(10 * 1024 * 1024),
        require_git: z.boolean().optional().default(true),
      })
      .passthrough()
      .optional()
      .default({}),
    retry: z
      .object({
        max_retries: z.number().int().nonnegative().optional().default(3),
        initial_delay_ms: z.number().nonnegative().max(MAX_TIMER_MS).optional().default(1_000),
        max_delay_ms: z.number().nonnegative().max(MAX_TIMER_MS).optional().default(10_000),
        multiplier: z.number().min(1).optional().default(2),
      })
      .passthrough()
      .optional()
      .default({}),
    cache: z
      .object({
        enabled: z.boolean().optional().default(true),
        dir: z.string().min(1).optional().default(path.join('.patchwarden', 'cache')),
        ttl_hours: z.number().positive().optional().default(24),
      })
      .passthrough()
      .optional()
      .default({}),
    capabilities: z
      .object({
        dirs: z.array(z.string().min(1)).optional().default(['.capabilities', 'capabilities']),
      })
      .passthrough()
      .optional()
      .default({}),
    logging: z
      .object({
        level: z.enum(logLevels).optional().default('info'),
      })
      .passthrough()
      .optional()
      .default({}),
  })
  .passthrough();

function expandHome(inputPath: string, homeDir: string): string {
  if (inputPath === '~') return homeDir;
  if (inputPath.startsWith('~/') || inputPath.startsWith('~\\')) return path.join(homeDir, inputPath.slice(2));
  return inputPath;
}

function resolveAgainst(workDir: string, inputPath: string, homeDir: string): string {
  return path.resolve(workDir, expandHome(inputPath, homeDir));
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

function applyEnvOverrides(config: RunnerConfig, env: NodeJS.ProcessEnv, workDir: string, homeDir: string): RunnerConfig {
  const binary = env.PATCHWARDEN_BINARY?.trim();
  const cacheDir = env.PATCHWARDEN_CACHE_DIR?.trim();
  const logLevel = env.PATCHWARDEN_LOG_LEVEL?.trim().toLowerCase();

  if (logLevel && !(logLevels as readonly string[]).includes(logLevel)) {
    throw new ConfigError(`PATCHWARDEN_LOG_LEVEL: invalid level '${logLevel}'. must be one of: ${logLevels.join(', ')}`);
  }

  return {
    ...config,
    runner: binary ? { ...config.runner, binary } : config.runner,
    cache: cacheDir ? { ...config.cache, dir: resolveAgainst(workDir, cacheDir, homeDir) } : config.cache,
    logging: logLevel ? { level: z.enum(logLevels).parse(logLevel) } : config.logging,
  };
}

export type ParseConfigOptions = Readonly<{
  workDir: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  sourceName?: string;
}>;

export function parseConfigObject(raw: unknown, options: ParseConfigOptions): RunnerConfig {
  const sourceName = options.sourceName ?? 'config';
  const homeDir = options.homeDir ?? os.homedir();
  const workDir = path.resolve(options.workDir);

  const parsed = rawConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigError(`Invalid ${sourceName}: ${formatZodIssues(parsed.error)}`, { cause: parsed.error });
  }
  const value = parsed.data;

  let retry: RetryPolicy;
  try {
    retry = createRetryPolicy({
      maxRetries: value.retry.max_retries,
      initialDelayMs: value.retry.initial_delay_ms,
      maxDelayMs: value.retry.max_delay_ms,
      multiplier: value.retry.multiplier,
    });
  } catch (err) {
    throw new ConfigError(`Invalid ${sourceName}: retry: ${err instanceof Error ? err.message : String(err)}`, { cause: err });
  }

  const config: RunnerConfig = {
    runner: {
      binary: value.runner.binary,
      timeoutMs: Math.round(value.runner.timeout_seconds * 1000),
      skipPermissions: value.runner.skip_permissions,
      gracePeriodMs: Math.round(value.runner.grace_period_seconds * 1000),
      prewarm: value.runner.prewarm,
      maxOutputBytes: value.runner.max_output_bytes,
      requireGit: value.runner.require_git,
    },
    retry,
    cache: {
      enabled: value.cache.enabled,
      dir: resolveAgainst(workDir, value.cache.dir, homeDir),
      ttlMs: value.cache.ttl_hours * HOUR_MS,
    },
    capabilities: {
      dirs: value.capabilities.dirs.map((dir) => resolveAgainst(workDir, dir, homeDir)),
    },
    logging: {
      level: value.logging.level,
    },
  };

  return applyEnvOverrides(config, options.env ?? {}, workDir, homeDir);
}

export function parseConfigYaml(yamlText: string, options: ParseConfigOptions): RunnerConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (err) {
    throw new ConfigError(`Invalid ${options.sourceName ?? 'config'}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }
  return parseConfigObject(raw, options);
}

export type LoadConfigOptions = Readonly<{
  workDir: string;
  /** Defaults to `<workDir>/patchwarden.yaml`; an explicit path must exist. */
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}>;

/** Loads the YAML config; a missing default file yields the built-in defaults. */
export async function loadConfig(options: LoadConfigOptions): Promise<RunnerConfig> {
  const workDir = path.resolve(options.workDir);
  const explicit = options.configPath !== undefined;
  const configPath = path.resolve(workDir, options.configPath ?? DEFAULT_CONFIG_FILE);
  const env = options.env ?? process.env;

  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (!explicit && (err as NodeJS.ErrnoException).code === 'ENOENT') {
      return parseConfigObject({}, { workDir, env, homeDir: options.homeDir, sourceName: 'default config' });
    }
    throw new ConfigError(`Failed to read config ${configPath}: ${err instanceof Error ? err.message : String(err)}`, {
      cause: err,
    });
  }

  return parseConfigYaml(text, { workDir, env, homeDir: options.homeDir, sourceName: configPath });
}
