import type { Logger } from 'pino';

import { withDeadline } from './abort.js';
import { silentLogger } from './logger.js';
import { SubprocessHandle } from './subprocess.js';

export type ProcessPoolOptions = Readonly<{
  binary: string;
  env?: NodeJS.ProcessEnv;
  /** Upper bound for `<binary> --version`. */
  timeoutMs?: number;
  logger?: Logger;
}>;

export type WarmupResult = Readonly<{
  version: string;
  durationMs: number;
}>;

const DEFAULT_WARMUP_TIMEOUT_MS = 30_000;

/** Pre-flight check that the analysis binary resolves and answers `--version`. */
export class ProcessPool {
  private readonly options: ProcessPoolOptions;
  private readonly logger: Logger;
  private warm = false;
  private lastResult: WarmupResult | null = null;

  constructor(options: ProcessPoolOptions) {
    this.options = options;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'process-pool' });
  }

  get isWarm(): boolean {
    return this.warm;
  }

  get lastWarmup(): WarmupResult | null {
    return this.lastResult;
  }

  async warmup(signal?: AbortSignal): Promise<WarmupResult> {
    const startedAt = Date.now();
    const deadline = withDeadline(signal, this.options.timeoutMs ?? DEFAULT_WARMUP_TIMEOUT_MS, 'warm-up timed out');
    const handle = new SubprocessHandle({
      binary: this.options.binary,
      args: ['--version'],
      logger: this.logger,
      ...(this.options.env !== undefined ? { env: this.options.env } : {}),
    });

    try {
      await handle.start(deadline.signal);
      handle.closeInput();
      const version = (await handle.wait(deadline.signal)).trim();
      const result: WarmupResult = { version, durationMs: Date.now() - startedAt };
      this.warm = true;
      this.lastResult = result;
      this.logger.info({ version, durationMs: result.durationMs }, 'analysis binary warmed up');
      return result;
    } catch (err) {
      this.warm = false;
      throw err;
    } finally {
      deadline.dispose();
    }
  }
}
