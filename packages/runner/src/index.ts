export { abortReason, sleep, withDeadline, type Deadline } from './abort.js';
export {
  DEFAULT_CACHE_TTL_MS,
  ReviewCache,
  cacheFileName,
  type CacheEntry,
  type CachedPayload,
  type ReviewCacheOptions,
  type ReviewLookup,
} from './cache.js';
export { main, UsageError, type CliIo } from './cli.js';
export {
  CapabilityExecutor,
  DEFAULT_EXECUTION_TIMEOUT_MS,
  type CapabilityExecutorOptions,
  type ExecuteOptions,
  type ExecuteResult,
  type PreparedInvocation,
} from './executor.js';
export {
  CACHE_MISS_REASON,
  FallbackHandler,
  PARTIAL_OUTPUT,
  SKIPPED_OUTPUT,
  type FallbackMetrics,
  type FallbackRequest,
  type FallbackResult,
} from './fallback.js';
export { createLogger, silentLogger, type CreateLoggerOptions, type Logger } from './logger.js';
export { runParallel, type ParallelTask } from './parallel.js';
export { ProcessManager, type ProcessManagerOptions, type StopAllResult } from './processManager.js';
export { ProcessPool, type ProcessPoolOptions, type WarmupResult } from './processPool.js';
export { terminateProcess } from './processTermination.js';
export { RetryExecutor, type RetryExecuteOptions, type RetryExecutorOptions, type RetryNotice } from './retryExecutor.js';
export { Runner, type BootstrapMetrics, type RunRequest, type RunResult, type RunnerOptions } from './runner.js';
export { SubprocessHandle, lookPath, type SubprocessOptions } from './subprocess.js';
export { Watchdog, watchProcess, type WatchdogOptions, type WatchedProcess } from './watchdog.js';
export { assertGitWorkspace, inspectWorkspace, type WorkspaceInfo } from './workspace.js';
