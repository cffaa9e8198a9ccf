export {
  BinaryNotFoundError,
  CapabilityNotFoundError,
  CapabilityValidationError,
  ConfigError,
  DuplicateProcessError,
  ExitCode,
  MaxRetriesExceededError,
  NotInitializedError,
  OutputLimitError,
  ProcessAlreadyStartedError,
  ProcessNotRunningError,
  RunnerError,
  ShutdownTimeoutError,
  SignalFailedError,
  SubprocessExitError,
  TimeoutError,
  WorkspaceNotGitError,
  exitCodeForError,
  formatErrorMessage,
  isRunnerError,
  runnerErrorCodes,
  type ExitCodeValue,
  type RunnerErrorCode,
  type SubprocessExitDetails,
} from './errors.js';

export { canTransition, type LifecycleState } from './lifecycle.js';

export {
  classifiedErrorCodes,
  classifyError,
  fallbackActions,
  type ClassifiedError,
  type ClassifiedErrorCode,
  type FallbackAction,
} from './classifier.js';

export { DEFAULT_RETRY_POLICY, calculateDelay, createRetryPolicy, type RetryPolicy } from './retryPolicy.js';

export {
  DEFAULT_CONFIG_FILE,
  MAX_TIMEOUT_SECONDS,
  MAX_TIMER_MS,
  loadConfig,
  logLevels,
  parseConfigObject,
  parseConfigYaml,
  type LoadConfigOptions,
  type LogLevel,
  type ParseConfigOptions,
  type RunnerConfig,
} from './config.js';

export {
  CAPABILITY_FILE,
  FileCapabilityProvider,
  capabilityInputTypes,
  parseCapabilityMarkdown,
  type Capability,
  type CapabilityInput,
  type CapabilityInputType,
  type CapabilityOptions,
  type CapabilityProvider,
} from './capability.js';

export {
  buildPrompt,
  formatInputValue,
  resolveInputs,
  substitutePlaceholders,
  type BuildPromptOptions,
  type InputValues,
} from './promptInjector.js';
