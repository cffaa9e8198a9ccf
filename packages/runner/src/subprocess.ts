import { spawn, type ChildProcessWithoutNullStreams } from 'node:child_process';
import { constants as fsConstants } from 'node:fs';
import fs from 'node:fs/promises';
import path from 'node:path';
import type { Readable } from 'node:stream';

import {
  BinaryNotFoundError,
  OutputLimitError,
  ProcessAlreadyStartedError,
  ProcessNotRunningError,
  SignalFailedError,
  SubprocessExitError,
  TimeoutError,
  formatErrorMessage,
} from '@patchwarden/core';
import type { Logger } from 'pino';

import { abortReason } from './abort.js';
import { silentLogger } from './logger.js';
import { terminateProcess } from './processTermination.js';

async function isExecutableFile(candidate: string): Promise<boolean> {
  const stat = await fs.stat(candidate).catch(() => null);
  if (!stat || !stat.isFile()) return false;
  return fs.access(candidate, fsConstants.X_OK).then(
    () => true,
    () => false,
  );
}

/**
 * Resolves `binary` the way a shell would: paths are checked as given, bare
 * names are searched on PATH (with PATHEXT on Windows).
 */
export async function lookPath(
  binary: string,
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform,
): Promise<string> {
  if (!binary.trim()) throw new BinaryNotFoundError(binary);

  const hasSeparator = binary.includes('/') || (platform === 'win32' && binary.includes('\\'));
  if (hasSeparator) {
    const resolved = path.resolve(binary);
    if (await isExecutableFile(resolved)) return resolved;
    throw new BinaryNotFoundError(binary);
  }

  const pathValue = env.PATH ?? env.Path ?? '';
  const delimiter = platform === 'win32' ? ';' : ':';
  const extensions =
    platform === 'win32'
      ? ['', ...(env.PATHEXT ?? '.COM;.EXE;.BAT;.CMD').split(';').filter((ext) => ext.length > 0)]
      : [''];

  for (const dir of pathValue.split(delimiter)) {
    if (!dir) continue;
    for (const ext of extensions) {
      const candidate = path.join(dir, `${binary}${ext}`);
      if (await isExecutableFile(candidate)) return candidate;
    }
  }
  throw new BinaryNotFoundError(binary);
}

export type SubprocessOptions = Readonly<{
  binary: string;
  args: readonly string[];
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Kill the process once stdout grows past this many bytes. */
  maxOutputBytes?: number;
  logger?: Logger;
}>;

type ExitStatus = Readonly<{ code: number | null; signal: NodeJS.Signals | null }>;

function drain(stream: Readable, onChunk: (chunk: Buffer) => void): Promise<void> {
  return new Promise<void>((resolve) => {
    stream.on('data', (chunk: Buffer | string) => onChunk(typeof chunk === 'string' ? Buffer.from(chunk) : chunk));
    stream.once('close', () => resolve());
  });
}

/**
 * Owns one analysis process: its argument vector, its three pipes and the
 * captured output. Output is drained from the moment `start` returns.
 */
export class SubprocessHandle {
  readonly binary: string;
  readonly args: readonly string[];
  private readonly options: SubprocessOptions;
  private readonly logger: Logger;

  private child: ChildProcessWithoutNullStreams | null = null;
  private started = false;
  private exited = false;
  private exitStatus: ExitStatus | null = null;
  private exitPromise: Promise<ExitStatus> | null = null;
  private startPromise: Promise<void> | null = null;
  /** A stop or kill that arrived while `start` was still resolving the binary. */
  private stopRequested: NodeJS.Signals | null = null;
  private drains: Promise<void>[] = [];

  private readonly stdoutChunks: Buffer[] = [];
  private readonly stderrChunks: Buffer[] = [];
  private stdoutBytes = 0;
  private outputLimitHit = false;

  constructor(options: SubprocessOptions) {
    this.options = options;
    this.binary = options.binary;
    this.args = [...options.args];
    this.logger = options.logger ?? silentLogger();
  }

  get pid(): number | null {
    return this.child?.pid ?? null;
  }

  get isRunning(): boolean {
    return this.started && !this.exited;
  }

  get exitCode(): number | null {
    return this.exitStatus?.code ?? null;
  }

  stdout(): string {
    return Buffer.concat(this.stdoutChunks).toString('utf-8');
  }

  stderr(): string {
    return Buffer.concat(this.stderrChunks).toString('utf-8');
  }

  start(signal?: AbortSignal): Promise<void> {
    if (this.started) return Promise.reject(new ProcessAlreadyStartedError());
    this.started = true;
    this.startPromise = this.spawnChild(signal);
    return this.startPromise;
  }

  private async spawnChild(signal?: AbortSignal): Promise<void> {
    const env = this.options.env ?? process.env;
    let resolved: string;
    try {
      resolved = await lookPath(this.binary, env);
    } catch (err) {
      this.exited = true;
      throw err;
    }
    if (signal?.aborted) {
      this.exited = true;
      throw abortReason(signal);
    }
    if (this.stopRequested) {
      this.exited = true;
      throw new ProcessNotRunningError(`process received ${this.stopRequested} before it was spawned`);
    }

    const child = spawn(resolved, [...this.args], {
      cwd: this.options.cwd,
      env,
      stdio: 'pipe',
      windowsHide: true,
    });
    this.child = child;

    this.exitPromise = new Promise<ExitStatus>((resolve) => {
      child.once('exit', (code, exitSignal) => {
        const status: ExitStatus = { code, signal: exitSignal };
        this.exited = true;
        this.exitStatus = status;
        resolve(status);
      });
    });

    try {
      await new Promise<void>((resolve, reject) => {
        child.once('spawn', () => resolve());
        child.once('error', reject);
      });
    } catch (err) {
      this.exited = true;
      this.exitPromise = null;
      if ((err as NodeJS.ErrnoException).code === 'ENOENT') throw new BinaryNotFoundError(this.binary, { cause: err });
      throw err;
    }

    child.on('error', (err) => this.logger.warn({ err, pid: child.pid }, 'analysis process error'));
    child.stdin.on('error', (err) => this.logger.debug({ err, pid: child.pid }, 'analysis process stdin closed early'));

    this.drains = [
      drain(child.stdout, (chunk) => this.captureStdout(chunk)),
      drain(child.stderr, (chunk) => this.stderrChunks.push(chunk)),
    ];
    this.logger.debug({ pid: child.pid, binary: resolved, args: this.args.length }, 'analysis process started');
  }

  private captureStdout(chunk: Buffer): void {
    const limit = this.options.maxOutputBytes;
    if (limit === undefined) {
      this.stdoutChunks.push(chunk);
      return;
    }
    if (this.outputLimitHit) return;

    const room = limit - this.stdoutBytes;
    if (chunk.length <= room) {
      this.stdoutChunks.push(chunk);
      this.stdoutBytes += chunk.length;
      return;
    }
    if (room > 0) this.stdoutChunks.push(chunk.subarray(0, room));
    this.stdoutBytes = limit;
    this.outputLimitHit = true;
    this.logger.warn({ pid: this.pid, limitBytes: limit }, 'analysis output limit exceeded; killing process');
    if (this.child && this.isRunning) terminateProcess(this.child, 'SIGKILL', { logger: this.logger });
  }

  /** Writes the prompt to stdin and closes it. */
  writePrompt(text: string): Promise<void> {
    const child = this.child;
    if (!child || this.exited) return Promise.reject(new ProcessNotRunningError());

    return new Promise<void>((resolve, reject) => {
      child.stdin.write(text, 'utf-8', (err) => {
        if (err) {
          reject(err);
          return;
        }
        child.stdin.end(() => resolve());
      });
    });
  }

  /** Closes stdin without writing anything. */
  closeInput(): void {
    const child = this.child;
    if (child && !child.stdin.writableEnded) child.stdin.end();
  }

  /**
   * Resolves with stdout once the process exits 0.
   *
   * An aborted signal kills the process and rejects with `TimeoutError`.
   */
  async wait(signal?: AbortSignal): Promise<string> {
    const exitPromise = this.exitPromise;
    if (!exitPromise) throw new ProcessNotRunningError('process was never started');

    let status: ExitStatus;
    if (signal) {
      status = await this.raceAbort(exitPromise, signal);
    } else {
      status = await exitPromise;
    }
    await Promise.all(this.drains);

    const stdout = this.stdout();
    if (this.outputLimitHit) throw new OutputLimitError(this.options.maxOutputBytes ?? 0, stdout);
    if (status.code === 0) return stdout;
    throw new SubprocessExitError({ exitCode: status.code, signal: status.signal, stdout, stderr: this.stderr() });
  }

  private async raceAbort(exitPromise: Promise<ExitStatus>, signal: AbortSignal): Promise<ExitStatus> {
    const toTimeout = (): TimeoutError => {
      const reason = abortReason(signal);
      return reason instanceof TimeoutError
        ? reason
        : new TimeoutError(`analysis process aborted: ${formatErrorMessage(reason)}`, { cause: reason });
    };

    if (signal.aborted) {
      this.kill();
      await exitPromise;
      throw toTimeout();
    }

    let markAborted: () => void = () => undefined;
    const aborted = new Promise<'aborted'>((resolve) => {
      markAborted = () => resolve('aborted');
    });
    const onAbort = (): void => markAborted();
    signal.addEventListener('abort', onAbort, { once: true });
    try {
      const winner = await Promise.race([exitPromise, aborted]);
      if (winner !== 'aborted') return winner;
    } finally {
      signal.removeEventListener('abort', onAbort);
    }

    this.kill();
    await exitPromise;
    throw toTimeout();
  }

  /** SIGTERM. No-op when the process is not running. */
  stop(): void {
    this.signal('SIGTERM');
  }

  /** SIGKILL. No-op when the process is not running. */
  kill(): void {
    this.signal('SIGKILL');
  }

  private signal(sig: NodeJS.Signals): void {
    const child = this.child;
    if (!this.isRunning) return;
    if (!child) {
      this.stopRequested = sig;
      return;
    }
    const delivered = terminateProcess(child, sig, { logger: this.logger });
    if (!delivered && !this.exited) throw new SignalFailedError(sig, child.pid ?? null);
  }

  /** Resolves once the process has exited, waiting out a `start` still in flight; immediately when it never started. */
  async whenExited(): Promise<void> {
    if (this.startPromise) {
      await this.startPromise.catch((err: unknown) => {
        this.logger.debug({ err, binary: this.binary }, 'process never spawned');
      });
    }
    if (this.exitPromise) await this.exitPromise;
  }
}
