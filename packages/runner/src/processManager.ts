import { DuplicateProcessError, ProcessNotRunningError, ShutdownTimeoutError } from '@patchwarden/core';
import type { Logger } from 'pino';

import { silentLogger } from './logger.js';
import { SubprocessHandle, type SubprocessOptions } from './subprocess.js';

export type ProcessManagerOptions = Readonly<{
  binary: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  maxOutputBytes?: number;
  logger?: Logger;
}>;

export type StopAllResult = Readonly<{
  /** Ids that ignored SIGTERM for the whole grace period and were SIGKILLed. */
  forced: readonly string[];
}>;

const KILL_WAIT_MS = 5_000;

function waitAtMost(pending: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const elapsed = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), Math.max(0, ms));
  });
  return Promise.race([pending.then(() => true), elapsed]).finally(() => clearTimeout(timer));
}

/** Registry of named analysis processes. */
export class ProcessManager {
  private readonly options: ProcessManagerOptions;
  private readonly logger: Logger;
  private readonly handles = new Map<string, SubprocessHandle>();

  constructor(options: ProcessManagerOptions) {
    this.options = options;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'process-manager' });
  }

  /** Spawns and registers a handle. A live handle under the same id is an error; a finished one is replaced. */
  async start(id: string, args: readonly string[], signal?: AbortSignal): Promise<SubprocessHandle> {
    const existing = this.handles.get(id);
    if (existing?.isRunning) throw new DuplicateProcessError(id);

    const handleOptions: SubprocessOptions = {
      binary: this.options.binary,
      args,
      logger: this.logger,
      ...(this.options.cwd !== undefined ? { cwd: this.options.cwd } : {}),
      ...(this.options.env !== undefined ? { env: this.options.env } : {}),
      ...(this.options.maxOutputBytes !== undefined ? { maxOutputBytes: this.options.maxOutputBytes } : {}),
    };
    const handle = new SubprocessHandle(handleOptions);
    this.handles.set(id, handle);
    try {
      await handle.start(signal);
    } catch (err) {
      if (this.handles.get(id) === handle) this.handles.delete(id);
      throw err;
    }
    this.logger.debug({ id, pid: handle.pid }, 'process started');
    return handle;
  }

  get(id: string): SubprocessHandle | undefined {
    return this.handles.get(id);
  }

  isRunning(id: string): boolean {
    return this.handles.get(id)?.isRunning ?? false;
  }

  ids(): string[] {
    return [...this.handles.keys()];
  }

  get size(): number {
    return this.handles.size;
  }

  /** Unregisters the handle and sends it SIGTERM. */
  stop(id: string): void {
    const handle = this.handles.get(id);
    if (!handle) throw new ProcessNotRunningError(`no process registered as '${id}'`);
    this.handles.delete(id);
    handle.stop();
  }

  remove(id: string): boolean {
    return this.handles.delete(id);
  }

  /**
   * SIGTERMs every handle, waits up to `graceMs` for them to exit, then
   * SIGKILLs stragglers. Every handle is attempted; the first error is
   * rethrown once the registry is empty. A process that survives SIGKILL
   * for `KILL_WAIT_MS` surfaces as `ShutdownTimeoutError`.
   */
  async stopAll(graceMs: number): Promise<StopAllResult> {
    const entries = [...this.handles.entries()];
    this.handles.clear();

    const errors: unknown[] = [];
    const live = entries.filter(([, handle]) => handle.isRunning);

    for (const [id, handle] of live) {
      try {
        handle.stop();
      } catch (err) {
        this.logger.warn({ err, id }, 'failed to send SIGTERM');
        errors.push(err);
      }
    }

    const exitedInTime = await waitAtMost(Promise.all(live.map(([, handle]) => handle.whenExited())), graceMs);

    const forced: string[] = [];
    const killed: SubprocessHandle[] = [];
    if (!exitedInTime) {
      for (const [id, handle] of live) {
        if (!handle.isRunning) continue;
        forced.push(id);
        try {
          handle.kill();
          killed.push(handle);
        } catch (err) {
          this.logger.warn({ err, id }, 'failed to send SIGKILL');
          errors.push(err);
        }
      }
      if (!(await waitAtMost(Promise.all(killed.map((handle) => handle.whenExited())), KILL_WAIT_MS))) {
        errors.push(new ShutdownTimeoutError(`processes still running ${KILL_WAIT_MS}ms after SIGKILL: ${forced.join(', ')}`));
      }
    }

    if (forced.length > 0) this.logger.warn({ forced }, 'processes did not exit within the grace period');
    if (errors.length > 0) throw errors[0];
    return { forced };
  }
}
