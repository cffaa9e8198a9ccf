import { TimeoutError, buildPrompt, type Capability, type InputValues } from '@patchwarden/core';
import type { Logger } from 'pino';

import { withDeadline } from './abort.js';
import { silentLogger } from './logger.js';
import type { ProcessManager } from './processManager.js';
import type { RetryExecutor, RetryNotice } from './retryExecutor.js';
import { watchProcess } from './watchdog.js';

export const DEFAULT_EXECUTION_TIMEOUT_MS = 5 * 60 * 1000;

export type PreparedInvocation = Readonly<{
  capability: Capability;
  prompt: string;
  args: readonly string[];
}>;

export type ExecuteOptions = Readonly<{
  /** Bounds the whole call, retries and backoff included. */
  timeoutMs?: number;
  signal?: AbortSignal;
  onRetry?: (notice: RetryNotice) => void;
}>;

export type ExecuteResult = Readonly<{
  output: string;
  attempts: number;
  durationMs: number;
}>;

export type CapabilityExecutorOptions = Readonly<{
  manager: ProcessManager;
  retry: RetryExecutor;
  skipPermissions?: boolean;
  defaultTimeoutMs?: number;
  basePrompt?: string;
  logger?: Logger;
}>;

/**
 * One capability invocation: render the prompt, build the CLI arguments,
 * then start, feed and wait on the analysis process inside the retry loop.
 */
export class CapabilityExecutor {
  private readonly options: CapabilityExecutorOptions;
  private readonly logger: Logger;
  private sequence = 0;

  constructor(options: CapabilityExecutorOptions) {
    this.options = options;
    this.logger = (options.logger ?? silentLogger()).child({ component: 'executor' });
  }

  buildArgs(capability: Capability): string[] {
    const args = ['-p'];
    if (this.options.skipPermissions) args.push('--dangerously-skip-permissions');

    const { timeoutSeconds, maxTokens, allowedTools } = capability.options;
    if (timeoutSeconds !== undefined && timeoutSeconds > 0) args.push('--timeout', String(timeoutSeconds));
    for (const tool of allowedTools) args.push('--allowedTools', tool);
    if (maxTokens !== undefined && maxTokens > 0) args.push('--max-tokens', String(maxTokens));
    return args;
  }

  /** Renders the prompt and arguments without spawning anything; this is the dry run. */
  prepare(capability: Capability, inputs: InputValues = {}): PreparedInvocation {
    const prompt = buildPrompt(capability, inputs, this.options.basePrompt ? { basePrompt: this.options.basePrompt } : {});
    return { capability, prompt, args: this.buildArgs(capability) };
  }

  async execute(invocation: PreparedInvocation, options: ExecuteOptions = {}): Promise<ExecuteResult> {
    const startedAt = Date.now();
    const timeoutMs = options.timeoutMs ?? this.options.defaultTimeoutMs ?? DEFAULT_EXECUTION_TIMEOUT_MS;
    const deadline = withDeadline(
      options.signal,
      timeoutMs,
      `capability '${invocation.capability.name}' timed out after ${timeoutMs}ms`,
    );
    const runId = `${invocation.capability.name}-${(this.sequence += 1)}`;
    let attempts = 0;

    try {
      const output = await this.options.retry.execute(
        (attempt) => {
          attempts = attempt;
          return this.attempt(`${runId}-attempt-${attempt}`, invocation, deadline.signal);
        },
        {
          signal: deadline.signal,
          ...(options.onRetry ? { onRetry: options.onRetry } : {}),
        },
      );
      return { output, attempts, durationMs: Date.now() - startedAt };
    } finally {
      deadline.dispose();
    }
  }

  private async attempt(id: string, invocation: PreparedInvocation, signal: AbortSignal): Promise<string> {
    const { manager } = this.options;
    const handle = await manager.start(id, invocation.args, signal);
    const limitSeconds = invocation.capability.options.timeoutSeconds;
    const watch =
      limitSeconds !== undefined && limitSeconds > 0 ? watchProcess(handle, limitSeconds * 1000, { logger: this.logger }) : null;

    try {
      const writeError = await handle.writePrompt(invocation.prompt).then(
        () => null,
        (err: unknown) => err,
      );

      let output: string;
      try {
        output = await handle.wait(signal);
      } catch (err) {
        if (watch?.timedOut()) {
          throw new TimeoutError(`analysis process exceeded its ${limitSeconds}s limit`, { cause: err });
        }
        throw err;
      }

      if (writeError) {
        this.logger.debug({ id, err: writeError }, 'prompt was not fully written before the process exited');
      }
      return output;
    } finally {
      watch?.stop();
      if (handle.isRunning) {
        try {
          handle.kill();
        } catch (err) {
          this.logger.warn({ id, err }, 'failed to kill analysis process after attempt');
        }
      }
      manager.remove(id);
    }
  }
}
