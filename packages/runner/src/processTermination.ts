import { spawn as spawnDefault } from 'node:child_process';

import type { Logger } from 'pino';

export interface ProcessKillTarget {
  pid?: number | null;
  kill: (signal?: NodeJS.Signals) => boolean;
}

type TaskKillSpawnResult = {
  unref: () => void;
  once: (event: 'error', listener: (err: Error) => void) => unknown;
};

type TaskKillSpawn = (
  command: string,
  args: readonly string[],
  options: { stdio: 'ignore'; windowsHide: true },
) => TaskKillSpawnResult;

export interface TerminateProcessOptions {
  platform?: NodeJS.Platform;
  spawnImpl?: TaskKillSpawn;
  logger?: Logger;
}

/**
 * Sends `signal` to the process and reports whether it was delivered.
 *
 * On Windows a SIGKILL also runs `taskkill /T /F` so the whole tree goes away.
 * `kill` throwing (e.g. EPERM) counts as not delivered.
 */
export function terminateProcess(
  proc: ProcessKillTarget,
  signal: NodeJS.Signals,
  options: TerminateProcessOptions = {},
): boolean {
  const platform = options.platform ?? process.platform;
  const spawnImpl: TaskKillSpawn = options.spawnImpl ?? ((command, args, spawnOptions) => spawnDefault(command, args, spawnOptions));

  let delivered: boolean;
  try {
    delivered = proc.kill(signal);
  } catch (err) {
    options.logger?.warn({ err, pid: proc.pid, signal }, 'failed to signal process');
    delivered = false;
  }

  if (platform !== 'win32') return delivered;
  if (signal !== 'SIGKILL') return delivered;
  if (!proc.pid || proc.pid <= 0) return delivered;

  try {
    const killer = spawnImpl('taskkill', ['/PID', String(proc.pid), '/T', '/F'], {
      stdio: 'ignore',
      windowsHide: true,
    });
    killer.unref();
    killer.once('error', (err) => options.logger?.warn({ err, pid: proc.pid }, 'taskkill failed'));
  } catch (err) {
    options.logger?.warn({ err, pid: proc.pid }, 'taskkill could not be started');
  }
  return delivered;
}
