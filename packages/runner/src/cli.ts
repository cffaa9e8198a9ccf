import fs from 'node:fs/promises';
import path from 'node:path';
import { parseArgs } from 'node:util';

import { NotInitializedError, exitCodeForError, formatErrorMessage, type ExitCodeValue } from '@patchwarden/core';

import { Runner, type RunResult } from './runner.js';

export class UsageError extends Error {
  override name = 'UsageError';
}

export type CliIo = Readonly<{
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  /** Replaces `process.env` for config overrides and the analysis process. */
  env?: NodeJS.ProcessEnv;
}>;

const defaultIo: CliIo = {
  stdout: (text) => process.stdout.write(text),
  stderr: (text) => process.stderr.write(text),
};

function usage(): string {
  return [
    'Usage:',
    '  patchwarden run --capability <name> [--key <n>] [--input k=v]... [--input-file k=path]... [--timeout <s>] [--force] [--dry-run] [--config <path>] [--work-dir <dir>]',
    '  patchwarden capabilities [--config <path>] [--work-dir <dir>]',
    '  patchwarden warmup [--config <path>] [--work-dir <dir>]',
    '  patchwarden cache clear [--config <path>] [--work-dir <dir>]',
    '  patchwarden cache invalidate --key <n> [--config <path>] [--work-dir <dir>]',
    '',
    'Exit codes: 0 success or degraded result, 1 infrastructure error, 2 analysis failure, 101 timeout, 102 output limit.',
  ].join('\n');
}

function parseKey(raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const key = Number(raw);
  if (!Number.isSafeInteger(key)) throw new UsageError(`--key must be an integer, got '${raw}'`);
  return key;
}

function splitAssignment(flag: string, raw: string): [string, string] {
  const eq = raw.indexOf('=');
  if (eq <= 0) throw new UsageError(`${flag} expects key=value, got '${raw}'`);
  return [raw.slice(0, eq).trim(), raw.slice(eq + 1)];
}

async function collectInputs(inline: readonly string[], files: readonly string[]): Promise<Record<string, string>> {
  const inputs: Record<string, string> = {};
  for (const raw of inline) {
    const [key, value] = splitAssignment('--input', raw);
    inputs[key] = value;
  }
  for (const raw of files) {
    const [key, file] = splitAssignment('--input-file', raw);
    inputs[key] = await fs.readFile(path.resolve(file), 'utf-8');
  }
  return inputs;
}

function withNewline(text: string): string {
  return text.endsWith('\n') ? text : `${text}\n`;
}

function reportResult(result: RunResult, io: CliIo): void {
  if (result.invocation) {
    io.stderr(`[dry-run] ${result.invocation.args.join(' ')}\n`);
    io.stdout(withNewline(result.invocation.prompt));
    return;
  }
  if (result.skipped) io.stderr(`[skipped] ${result.reason ?? 'analysis skipped'}\n`);
  else if (result.partial) io.stderr(`[partial] ${result.reason ?? 'partial analysis'}\n`);
  else if (result.cached) io.stderr(`[cached] ${result.reason ?? 'cached result'}\n`);
  if (result.output) io.stdout(withNewline(result.output));
}

/**
 * CLI entry. Resolves to the process exit code; failures are reported on
 * stderr rather than thrown.
 */
export async function main(argv: readonly string[], io: CliIo = defaultIo): Promise<ExitCodeValue> {
  try {
    return await dispatch(argv, io);
  } catch (err) {
    io.stderr(`error: ${formatErrorMessage(err)}\n`);
    if (err instanceof UsageError) io.stderr(`\n${usage()}\n`);
    return exitCodeForError(err);
  }
}

async function dispatch(argv: readonly string[], io: CliIo): Promise<ExitCodeValue> {
  const [command, ...rest] = argv;

  const { values, positionals } = parseArgs({
    args: [...rest],
    options: {
      capability: { type: 'string' },
      key: { type: 'string' },
      input: { type: 'string', multiple: true },
      'input-file': { type: 'string', multiple: true },
      timeout: { type: 'string' },
      force: { type: 'boolean' },
      'dry-run': { type: 'boolean' },
      config: { type: 'string' },
      'work-dir': { type: 'string' },
      help: { type: 'boolean' },
    },
    allowPositionals: true,
  });

  if (!command || command === 'help' || command === '--help' || values.help) {
    io.stdout(`${usage()}\n`);
    return 0;
  }
  if (!['run', 'capabilities', 'warmup', 'cache'].includes(command)) {
    throw new UsageError(`unknown command: ${command}`);
  }

  const runner = new Runner({
    workDir: path.resolve(values['work-dir'] ?? process.cwd()),
    handleSignals: true,
    ...(values.config !== undefined ? { configPath: values.config } : {}),
    ...(io.env !== undefined ? { env: io.env } : {}),
  });

  try {
    if (command === 'run') {
      const capability = values.capability ?? positionals[0];
      if (!capability) throw new UsageError('run requires --capability <name>');
      let timeoutMs: number | undefined;
      if (values.timeout !== undefined) {
        const seconds = Number(values.timeout);
        if (!(seconds > 0)) throw new UsageError(`--timeout must be a positive number of seconds, got '${values.timeout}'`);
        timeoutMs = Math.round(seconds * 1000);
      }
      const key = parseKey(values.key);
      const inputs = await collectInputs(values.input ?? [], values['input-file'] ?? []);

      await runner.bootstrap();
      const result = await runner.run({
        capability,
        inputs,
        ...(key !== undefined ? { key } : {}),
        ...(timeoutMs !== undefined ? { timeoutMs } : {}),
        force: values.force ?? false,
        dryRun: values['dry-run'] ?? false,
      });
      reportResult(result, io);
      return 0;
    }

    if (command === 'cache') {
      const action = positionals[0];
      if (action !== 'clear' && action !== 'invalidate') throw new UsageError('cache requires clear or invalidate');
      const key = parseKey(values.key);
      if (action === 'invalidate' && key === undefined) throw new UsageError('cache invalidate requires --key <n>');

      await runner.bootstrap();
      const cache = runner.cache;
      if (!cache) throw new NotInitializedError(runner.state);
      if (key !== undefined && action === 'invalidate') {
        await cache.invalidate(key);
        io.stdout(`invalidated key ${key}\n`);
      } else {
        const removed = await cache.clear();
        io.stdout(`removed ${removed} cache entries\n`);
      }
      return 0;
    }

    await runner.bootstrap();

    if (command === 'capabilities') {
      for (const name of runner.capabilities) io.stdout(`${name}\n`);
      return 0;
    }

    const pool = runner.processPool;
    if (!pool) throw new NotInitializedError(runner.state);
    const warmup = await pool.warmup();
    io.stdout(`${warmup.version} (${warmup.durationMs}ms)\n`);
    return 0;
  } finally {
    await runner.shutdown();
  }
}
