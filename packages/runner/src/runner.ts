import path from 'node:path';

import {
  FileCapabilityProvider,
  NotInitializedError,
  ProcessAlreadyStartedError,
  TimeoutError,
  canTransition,
  classifyError,
  loadConfig,
  type CapabilityProvider,
  type InputValues,
  type LifecycleState,
  type RunnerConfig,
} from '@patchwarden/core';
import type { Logger } from 'pino';

import { ReviewCache, type CachedPayload } from './cache.js';
import { CapabilityExecutor } from './executor.js';
import { FallbackHandler, type FallbackMetrics } from './fallback.js';
import { createLogger } from './logger.js';
import { runParallel } from './parallel.js';
import { ProcessManager } from './processManager.js';
import { ProcessPool } from './processPool.js';
import { RetryExecutor } from './retryExecutor.js';
import { assertGitWorkspace, inspectWorkspace } from './workspace.js';

export type RunnerOptions = Readonly<{
  workDir?: string;
  /** Explicit config file; must exist when given. */
  configPath?: string;
  /** Skips file loading entirely. */
  config?: RunnerConfig;
  env?: NodeJS.ProcessEnv;
  /** Defaults to a file provider over the configured capability dirs. */
  provider?: CapabilityProvider;
  logger?: Logger;
  /** Install SIGINT/SIGTERM handlers that trigger `shutdown`. */
  handleSignals?: boolean;
}>;

export type RunRequest = Readonly<{
  capability: string;
  /** Cache key (for example a pull request number). Runs without one are never cached. */
  key?: number;
  inputs?: InputValues;
  timeoutMs?: number;
  dryRun?: boolean;
  /** Ignore a cached result and run anyway. */
  force?: boolean;
}>;

export type RunResult = Readonly<{
  output: string;
  durationMs: number;
  attempts: number;
  skipped: boolean;
  cached: boolean;
  partial: boolean;
  reason: string | null;
  /** Set for dry runs: what would have been sent. */
  invocation: Readonly<{ prompt: string; args: readonly string[] }> | null;
}>;

export type BootstrapMetrics = Readonly<{
  startedAt: string;
  configLoadMs: number;
  capabilityScanMs: number;
  workspaceCheckMs: number;
  warmupMs: number | null;
  totalMs: number;
}>;

type Components = Readonly<{
  config: RunnerConfig;
  logger: Logger;
  provider: CapabilityProvider;
  manager: ProcessManager;
  pool: ProcessPool;
  cache: ReviewCache;
  fallback: FallbackHandler;
  executor: CapabilityExecutor;
}>;

const HANDLED_SIGNALS: readonly NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

async function timed<T>(fn: () => Promise<T>): Promise<{ value: T; ms: number }> {
  const startedAt = Date.now();
  const value = await fn();
  return { value, ms: Date.now() - startedAt };
}

/**
 * Lifecycle owner: `bootstrap` → any number of `run`s → `shutdown`.
 *
 * Concurrent runs (see `runParallel`) share the `running` state; the runner
 * returns to `ready` when the last one finishes.
 */
export class Runner {
  private readonly options: RunnerOptions;
  private readonly workDir: string;
  private currentState: LifecycleState = 'uninitialized';
  private components: Components | null = null;
  private bootstrapStats: BootstrapMetrics | null = null;
  private discovered: readonly string[] = [];
  private readonly inFlight = new Set<AbortController>();
  private shutdownPromise: Promise<void> | null = null;
  private bootstrapPromise: Promise<void> | null = null;
  private readonly signalHandlers = new Map<NodeJS.Signals, () => void>();

  constructor(options: RunnerOptions = {}) {
    this.options = options;
    this.workDir = path.resolve(options.workDir ?? process.cwd());
  }

  get state(): LifecycleState {
    return this.currentState;
  }

  get config(): RunnerConfig | null {
    return this.components?.config ?? null;
  }

  get capabilities(): readonly string[] {
    return this.discovered;
  }

  get bootstrapMetrics(): BootstrapMetrics | null {
    return this.bootstrapStats;
  }

  metrics(): FallbackMetrics | null {
    return this.components?.fallback.metrics() ?? null;
  }

  get cache(): ReviewCache | null {
    return this.components?.cache ?? null;
  }

  get processPool(): ProcessPool | null {
    return this.components?.pool ?? null;
  }

  private transition(to: LifecycleState): void {
    if (!canTransition(this.currentState, to)) {
      throw new Error(`invalid lifecycle transition ${this.currentState} -> ${to}`);
    }
    this.currentState = to;
  }

  /**
   * Loads config, discovers capabilities and validates the workspace
   * concurrently. Any failure leaves the runner in `initializing`. A
   * `shutdown` that begins meanwhile cancels the rest of the bootstrap, which
   * then rejects with `NotInitializedError`.
   */
  bootstrap(signal?: AbortSignal): Promise<void> {
    if (this.currentState !== 'uninitialized') {
      return Promise.reject(new ProcessAlreadyStartedError(`cannot bootstrap: runner is in state ${this.currentState}`));
    }
    this.transition('initializing');
    const tracked = this.track(signal);
    this.bootstrapPromise = this.performBootstrap(tracked.signal).finally(() => tracked.dispose());
    return this.bootstrapPromise;
  }

  private async performBootstrap(signal: AbortSignal): Promise<void> {
    const startedAt = Date.now();

    const configStep = timed(() => this.loadConfiguration());
    const [configResult, workspaceResult, scanResult] = await Promise.all([
      configStep,
      timed(() => inspectWorkspace(this.workDir)),
      timed(async () => {
        const provider = this.options.provider ?? new FileCapabilityProvider((await configStep).value.capabilities.dirs);
        return { provider, names: await provider.discover() };
      }),
    ]);
    this.assertBootstrapping();

    const config = configResult.value;
    const logger = this.options.logger ?? createLogger({ level: config.logging.level });
    if (config.runner.requireGit) assertGitWorkspace(workspaceResult.value);
    if (!workspaceResult.value.hasClaudeMd) logger.debug({ workDir: this.workDir }, 'no CLAUDE.md in workspace');

    const components = this.createComponents(config, logger, scanResult.value.provider);
    this.components = components;
    this.discovered = scanResult.value.names;

    let warmupMs: number | null = null;
    if (config.runner.prewarm) {
      const warmupStartedAt = Date.now();
      try {
        await components.pool.warmup(signal);
      } catch (err) {
        this.assertBootstrapping();
        logger.warn({ err }, 'analysis binary warm-up failed; continuing');
      }
      warmupMs = Date.now() - warmupStartedAt;
    }
    this.assertBootstrapping();

    this.bootstrapStats = {
      startedAt: new Date(startedAt).toISOString(),
      configLoadMs: configResult.ms,
      capabilityScanMs: scanResult.ms,
      workspaceCheckMs: workspaceResult.ms,
      warmupMs,
      totalMs: Date.now() - startedAt,
    };
    if (this.options.handleSignals) this.installSignalHandlers();

    this.transition('ready');
    logger.info(
      { capabilities: this.discovered.length, totalMs: this.bootstrapStats.totalMs, workDir: this.workDir },
      'runner ready',
    );
  }

  private assertBootstrapping(): void {
    if (this.currentState !== 'initializing') throw new NotInitializedError(this.currentState);
  }

  /** An abort controller that follows `parent` and that `shutdown` aborts too. */
  private track(parent: AbortSignal | undefined): { signal: AbortSignal; dispose: () => void } {
    const controller = new AbortController();
    const onAbort = (): void => {
      if (parent) controller.abort(parent.reason);
    };
    if (parent?.aborted) controller.abort(parent.reason);
    else parent?.addEventListener('abort', onAbort, { once: true });
    this.inFlight.add(controller);
    return {
      signal: controller.signal,
      dispose: () => {
        parent?.removeEventListener('abort', onAbort);
        this.inFlight.delete(controller);
      },
    };
  }

  private async loadConfiguration(): Promise<RunnerConfig> {
    if (this.options.config) return this.options.config;
    return loadConfig({
      workDir: this.workDir,
      ...(this.options.configPath !== undefined ? { configPath: this.options.configPath } : {}),
      ...(this.options.env !== undefined ? { env: this.options.env } : {}),
    });
  }

  private createComponents(config: RunnerConfig, logger: Logger, provider: CapabilityProvider): Components {
    const manager = new ProcessManager({
      binary: config.runner.binary,
      cwd: this.workDir,
      maxOutputBytes: config.runner.maxOutputBytes,
      logger,
      ...(this.options.env !== undefined ? { env: this.options.env } : {}),
    });
    const cache = new ReviewCache({ dir: config.cache.dir, enabled: config.cache.enabled, ttlMs: config.cache.ttlMs, logger });
    return {
      config,
      logger,
      provider,
      manager,
      pool: new ProcessPool({
        binary: config.runner.binary,
        logger,
        ...(this.options.env !== undefined ? { env: this.options.env } : {}),
      }),
      cache,
      fallback: new FallbackHandler({ cache, logger }),
      executor: new CapabilityExecutor({
        manager,
        retry: new RetryExecutor({ policy: config.retry, logger }),
        skipPermissions: config.runner.skipPermissions,
        defaultTimeoutMs: config.runner.timeoutMs,
        logger,
      }),
    };
  }

  /**
   * Executes one capability. Degraded outcomes (skip, cache, partial)
   * resolve; anything else rejects with the underlying error.
   */
  async run(request: RunRequest, signal?: AbortSignal): Promise<RunResult> {
    const components = this.components;
    if (!components || (this.currentState !== 'ready' && this.currentState !== 'running')) {
      throw new NotInitializedError(this.currentState);
    }
    if (request.key !== undefined && !Number.isSafeInteger(request.key)) {
      throw new RangeError(`run key must be a safe integer, got ${request.key}`);
    }

    const tracked = this.track(signal);
    if (this.currentState === 'ready') this.transition('running');
    try {
      return await this.runInner(components, request, tracked.signal);
    } finally {
      tracked.dispose();
      if (this.inFlight.size === 0 && this.currentState === 'running') this.transition('ready');
    }
  }

  private async runInner(components: Components, request: RunRequest, signal: AbortSignal): Promise<RunResult> {
    const { logger, cache, fallback, executor, provider } = components;
    const startedAt = Date.now();
    const log = logger.child({ capability: request.capability, key: request.key });

    if (request.key !== undefined && !request.force && !request.dryRun) {
      const entry = await cache.getReview(request.key);
      if (entry) {
        log.info({ cachedAt: entry.cachedAt }, 'using cached result');
        return {
          output: entry.payload.output,
          durationMs: Date.now() - startedAt,
          attempts: 0,
          skipped: entry.payload.skipped,
          cached: true,
          partial: entry.payload.partial,
          reason: entry.payload.reason ?? `Using cached result from ${entry.cachedAt}`,
          invocation: null,
        };
      }
    }

    const capability = await provider.load(request.capability);
    const prepared = executor.prepare(capability, request.inputs ?? {});
    if (request.dryRun) {
      log.info({ args: prepared.args }, 'dry run; not spawning the analysis process');
      return {
        output: '',
        durationMs: Date.now() - startedAt,
        attempts: 0,
        skipped: false,
        cached: false,
        partial: false,
        reason: null,
        invocation: { prompt: prepared.prompt, args: prepared.args },
      };
    }

    let attempts = 0;
    try {
      const result = await executor.execute(prepared, {
        signal,
        ...(request.timeoutMs !== undefined ? { timeoutMs: request.timeoutMs } : {}),
        onRetry: (notice) => {
          attempts = notice.retry + 1;
        },
      });
      log.info({ attempts: result.attempts, durationMs: result.durationMs }, 'analysis completed');
      await this.store(components, request.key, { output: result.output, skipped: false, partial: false, reason: null }, result.durationMs);
      return {
        output: result.output,
        durationMs: Date.now() - startedAt,
        attempts: result.attempts,
        skipped: false,
        cached: false,
        partial: false,
        reason: null,
        invocation: null,
      };
    } catch (err) {
      const classified = classifyError(err);
      log.warn({ code: classified.code, action: classified.fallbackAction, err: classified.message }, 'analysis failed');

      const degraded = await fallback.handle(classified, request.key !== undefined ? { key: request.key } : {});
      if (!degraded) throw err;

      const durationMs = Date.now() - startedAt;
      if (degraded.partial && !degraded.cached) {
        await this.store(
          components,
          request.key,
          { output: degraded.output, skipped: false, partial: true, reason: degraded.reason },
          durationMs,
        );
      }
      return {
        output: degraded.output,
        durationMs,
        attempts: Math.max(attempts, 1),
        skipped: degraded.skipped,
        cached: degraded.cached,
        partial: degraded.partial,
        reason: degraded.reason,
        invocation: null,
      };
    }
  }

  private async store(components: Components, key: number | undefined, payload: CachedPayload, durationMs: number): Promise<void> {
    if (key === undefined) return;
    try {
      await components.cache.setReview(key, { payload, durationMs });
    } catch (err) {
      components.logger.warn({ err, key }, 'failed to write cache entry');
    }
  }

  /** Runs several requests under one shared signal; the first failure cancels the rest. */
  runParallel(requests: readonly RunRequest[], signal?: AbortSignal): Promise<RunResult[]> {
    return runParallel(
      requests.map((request) => (shared: AbortSignal) => this.run(request, shared)),
      signal,
    );
  }

  /**
   * Aborts in-flight runs, SIGTERMs every tracked process, SIGKILLs what is
   * left after the grace period and ends in `stopped`. Concurrent calls share
   * one shutdown.
   */
  shutdown(graceMs?: number): Promise<void> {
    if (this.shutdownPromise) return this.shutdownPromise;
    if (this.currentState === 'stopped') return Promise.resolve();
    this.shutdownPromise = this.performShutdown(graceMs);
    return this.shutdownPromise;
  }

  private async performShutdown(graceMs?: number): Promise<void> {
    this.transition('shutting_down');
    this.removeSignalHandlers();
    this.components?.logger.info({ inFlight: this.inFlight.size }, 'shutting down');

    for (const controller of this.inFlight) {
      controller.abort(new TimeoutError('run aborted: runner is shutting down'));
    }

    try {
      if (this.bootstrapPromise) {
        await this.bootstrapPromise.catch((err: unknown) => {
          this.components?.logger.debug({ err }, 'bootstrap ended by shutdown');
        });
      }
      const components = this.components;
      if (components) {
        const { forced } = await components.manager.stopAll(graceMs ?? components.config.runner.gracePeriodMs);
        if (forced.length > 0) components.logger.warn({ forced }, 'force-killed analysis processes');
      }
    } finally {
      this.currentState = 'stopped';
      this.components?.logger.info('runner stopped');
    }
  }

  private installSignalHandlers(): void {
    for (const sig of HANDLED_SIGNALS) {
      const handler = (): void => {
        this.components?.logger.warn({ signal: sig }, 'received signal; shutting down');
        this.shutdown().catch((err: unknown) => {
          this.components?.logger.error({ err }, 'shutdown failed');
        });
      };
      this.signalHandlers.set(sig, handler);
      process.once(sig, handler);
    }
  }

  private removeSignalHandlers(): void {
    for (const [sig, handler] of this.signalHandlers) process.removeListener(sig, handler);
    this.signalHandlers.clear();
  }
}
