import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { loadConfig, parseConfigObject, parseConfigYaml } from './config.js';
import { ConfigError } from './errors.js';

describe('config', () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = await fs.mkdtemp(path.join(os.tmpdir(), 'patchwarden-config-'));
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it('fills every default from an empty document', () => {
    const config = parseConfigObject({}, { workDir, env: {} });

    expect(config.runner).toEqual({
      binary: 'claude',
      timeoutMs: 300_000,
      skipPermissions: false,
      gracePeriodMs: 5_000,
      prewarm: false,
      maxOutputBytes: 10 * 1024 * 1024,
      requireGit: true,
    });
    expect(config.retry).toEqual({ maxRetries: 3, initialDelayMs: 1000, maxDelayMs: 10000, multiplier: 2 });
    expect(config.cache).toEqual({ enabled: true, dir: path.join(workDir, '.patchwarden', 'cache'), ttlMs: 86_400_000 });
    expect(config.capabilities.dirs).toEqual([path.join(workDir, '.capabilities'), path.join(workDir, 'capabilities')]);
    expect(config.logging.level).toBe('info');
  });

  it('parses snake_case YAML into the runtime shape', () => {
    const config = parseConfigYaml(
      [
        'runner:',
        '  binary: /opt/bin/analyzer',
        '  timeout_seconds: 30',
        '  skip_permissions: true',
        'retry:',
        '  max_retries: 1',
        '  initial_delay_ms: 10',
        'cache:',
        '  dir: ~/reviews',
        '  ttl_hours: 1',
        'capabilities:',
        '  dirs: [skills]',
      ].join('\n'),
      { workDir, env: {}, homeDir: '/home/tester' },
    );

    expect(config.runner.binary).toBe('/opt/bin/analyzer');
    expect(config.runner.timeoutMs).toBe(30_000);
    expect(config.runner.skipPermissions).toBe(true);
    expect(config.retry.maxRetries).toBe(1);
    expect(config.retry.initialDelayMs).toBe(10);
    expect(config.cache.dir).toBe(path.join('/home/tester', 'reviews'));
    expect(config.cache.ttlMs).toBe(3_600_000);
    expect(config.capabilities.dirs).toEqual([path.join(workDir, 'skills')]);
  });

  it('applies environment overrides', () => {
    const config = parseConfigObject(
      { logging: { level: 'warn' } },
      {
        workDir,
        env: { PATCHWARDEN_BINARY: 'fake-claude', PATCHWARDEN_CACHE_DIR: 'tmp-cache', PATCHWARDEN_LOG_LEVEL: 'DEBUG' },
      },
    );

    expect(config.runner.binary).toBe('fake-claude');
    expect(config.cache.dir).toBe(path.join(workDir, 'tmp-cache'));
    expect(config.logging.level).toBe('debug');
  });

  it('rejects an unknown log level from the environment', () => {
    expect(() => parseConfigObject({}, { workDir, env: { PATCHWARDEN_LOG_LEVEL: 'loud' } })).toThrow(ConfigError);
  });

  it('reports schema violations with their path', () => {
    expect(() => parseConfigObject({ runner: { timeout_seconds: -5 } }, { workDir, env: {}, sourceName: 'test.yaml' })).toThrow(
      /^Invalid test\.yaml: runner\.timeout_seconds: /,
    );
  });

  it('rejects timeouts longer than a timer can hold', () => {
    expect(() => parseConfigObject({ runner: { timeout_seconds: 2_147_483 } }, { workDir, env: {} })).not.toThrow();
    expect(() => parseConfigObject({ runner: { timeout_seconds: 2_147_484 } }, { workDir, env: {} })).toThrow(ConfigError);
    expect(() => parseConfigObject({ retry: { max_delay_ms: 2 ** 31 } }, { workDir, env: {} })).toThrow(ConfigError);
  });

  it('wraps retry policy violations', () => {
    expect(() => parseConfigObject({ retry: { multiplier: 1, max_retries: 2 } }, { workDir, env: {} })).not.toThrow();
    expect(() => parseConfigObject({ retry: { multiplier: 0.5 } }, { workDir, env: {} })).toThrow(ConfigError);
  });

  it('rejects malformed YAML', () => {
    expect(() => parseConfigYaml('runner: [unclosed', { workDir, env: {} })).toThrow(ConfigError);
  });

  it('falls back to defaults when the default file is missing', async () => {
    const config = await loadConfig({ workDir, env: {} });
    expect(config.runner.binary).toBe('claude');
  });

  it('fails when an explicit config path is missing', async () => {
    await expect(loadConfig({ workDir, configPath: 'nope.yaml', env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('reads patchwarden.yaml from the work dir', async () => {
    await fs.writeFile(path.join(workDir, 'patchwarden.yaml'), 'runner:\n  prewarm: true\n', 'utf-8');
    const config = await loadConfig({ workDir, env: {} });
    expect(config.runner.prewarm).toBe(true);
  });

  it('loads the repo sample config', async () => {
    const repoRoot = fileURLToPath(new URL('../../../', import.meta.url));
    const config = await loadConfig({ workDir: repoRoot, env: {} });

    expect(config.runner.binary).toBe('claude');
    expect(config.retry.maxRetries).toBe(3);
    expect(config.capabilities.dirs).toContain(path.join(repoRoot, 'capabilities'));
  });
});
