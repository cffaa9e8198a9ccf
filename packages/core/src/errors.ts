/** Process exit codes surfaced to the invoking CI step. */
export const ExitCode = {
  Success: 0,
  InfraError: 1,
  SubprocessError: 2,
  Timeout: 101,
  ResourceLimit: 102,
} as const;
export type ExitCodeValue = (typeof ExitCode)[keyof typeof ExitCode];

export const runnerErrorCodes = [
  'BINARY_NOT_FOUND',
  'PROCESS_NOT_RUNNING',
  'PROCESS_ALREADY_STARTED',
  'DUPLICATE_PROCESS',
  'SIGNAL_FAILED',
  'SUBPROCESS_FAILED',
  'OUTPUT_LIMIT',
  'TIMEOUT',
  'MAX_RETRIES_EXCEEDED',
  'SHUTDOWN_TIMEOUT',
  'NOT_INITIALIZED',
  'CAPABILITY_NOT_FOUND',
  'INVALID_CAPABILITY',
  'INVALID_CONFIG',
  'WORKSPACE_NOT_GIT',
] as const;
export type RunnerErrorCode = (typeof runnerErrorCodes)[number];

const exitCodeByErrorCode: Readonly<Record<RunnerErrorCode, ExitCodeValue>> = {
  BINARY_NOT_FOUND: ExitCode.InfraError,
  PROCESS_NOT_RUNNING: ExitCode.InfraError,
  PROCESS_ALREADY_STARTED: ExitCode.InfraError,
  DUPLICATE_PROCESS: ExitCode.InfraError,
  SIGNAL_FAILED: ExitCode.InfraError,
  SUBPROCESS_FAILED: ExitCode.SubprocessError,
  OUTPUT_LIMIT: ExitCode.ResourceLimit,
  TIMEOUT: ExitCode.Timeout,
  MAX_RETRIES_EXCEEDED: ExitCode.SubprocessError,
  SHUTDOWN_TIMEOUT: ExitCode.InfraError,
  NOT_INITIALIZED: ExitCode.InfraError,
  CAPABILITY_NOT_FOUND: ExitCode.InfraError,
  INVALID_CAPABILITY: ExitCode.InfraError,
  INVALID_CONFIG: ExitCode.InfraError,
  WORKSPACE_NOT_GIT: ExitCode.InfraError,
};

/**
 * Base class for every failure the runner raises on purpose.
 *
 * `code` is stable and is what the error classifier and the CLI look at;
 * `message` is for humans and may change.
 */
export class RunnerError extends Error {
  override name = 'RunnerError';
  readonly code: RunnerErrorCode;

  constructor(code: RunnerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
  }

  get exitCode(): ExitCodeValue {
    return exitCodeByErrorCode[this.code];
  }
}

export class BinaryNotFoundError extends RunnerError {
  override name = 'BinaryNotFoundError';
  readonly binary: string;

  constructor(binary: string, options?: { cause?: unknown }) {
    super('BINARY_NOT_FOUND', `analysis binary not found in PATH: ${binary}`, options);
    this.binary = binary;
  }
}

export class ProcessNotRunningError extends RunnerError {
  override name = 'ProcessNotRunningError';

  constructor(message = 'process is not running') {
    super('PROCESS_NOT_RUNNING', message);
  }
}

export class ProcessAlreadyStartedError extends RunnerError {
  override name = 'ProcessAlreadyStartedError';

  constructor(message = 'process has already been started') {
    super('PROCESS_ALREADY_STARTED', message);
  }
}

export class DuplicateProcessError extends RunnerError {
  override name = 'DuplicateProcessError';
  readonly processId: string;

  constructor(processId: string) {
    super('DUPLICATE_PROCESS', `process '${processId}' is already running`);
    this.processId = processId;
  }
}

export class SignalFailedError extends RunnerError {
  override name = 'SignalFailedError';

  constructor(signal: NodeJS.Signals, pid: number | null) {
    super('SIGNAL_FAILED', `failed to deliver ${signal} to pid ${pid ?? 'unknown'}`);
  }
}

export type SubprocessExitDetails = Readonly<{
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
}>;

export class SubprocessExitError extends RunnerError {
  override name = 'SubprocessExitError';
  readonly exitCodeValue: number | null;
  readonly signal: NodeJS.Signals | null;
  readonly stdout: string;
  readonly stderr: string;

  constructor(details: SubprocessExitDetails) {
    const how = details.signal ? `was terminated by ${details.signal}` : `exited with code ${details.exitCode ?? 'unknown'}`;
    const stderr = details.stderr.trim();
    super('SUBPROCESS_FAILED', stderr ? `analysis process ${how}: ${stderr}` : `analysis process ${how}`);
    this.exitCodeValue = details.exitCode;
    this.signal = details.signal;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
  }
}

export class OutputLimitError extends RunnerError {
  override name = 'OutputLimitError';
  readonly limitBytes: number;
  readonly stdout: string;

  constructor(limitBytes: number, stdout: string) {
    super('OUTPUT_LIMIT', `analysis output exceeds limit of ${limitBytes} bytes`);
    this.limitBytes = limitBytes;
    this.stdout = stdout;
  }
}

export class TimeoutError extends RunnerError {
  override name = 'TimeoutError';

  constructor(message = 'execution timed out', options?: { cause?: unknown }) {
    super('TIMEOUT', message, options);
  }
}

export class MaxRetriesExceededError extends RunnerError {
  override name = 'MaxRetriesExceededError';
  readonly attempts: number;

  constructor(attempts: number, lastError: unknown) {
    super('MAX_RETRIES_EXCEEDED', `max retries exceeded after ${attempts} attempts: ${formatErrorMessage(lastError)}`, {
      cause: lastError,
    });
    this.attempts = attempts;
  }
}

export class ShutdownTimeoutError extends RunnerError {
  override name = 'ShutdownTimeoutError';

  constructor(message = 'graceful shutdown timed out') {
    super('SHUTDOWN_TIMEOUT', message);
  }
}

export class NotInitializedError extends RunnerError {
  override name = 'NotInitializedError';

  constructor(state: string) {
    super('NOT_INITIALIZED', `runner not initialized: runner is in state ${state}`);
  }
}

export class CapabilityNotFoundError extends RunnerError {
  override name = 'CapabilityNotFoundError';
  readonly capability: string;

  constructor(capability: string, options?: { cause?: unknown }) {
    super('CAPABILITY_NOT_FOUND', `capability not found: ${capability}`, options);
    this.capability = capability;
  }
}

export class CapabilityValidationError extends RunnerError {
  override name = 'CapabilityValidationError';

  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CAPABILITY', message, options);
  }
}

export class ConfigError extends RunnerError {
  override name = 'ConfigError';

  constructor(message: string, options?: { cause?: unknown }) {
    super('INVALID_CONFIG', message, options);
  }
}

export class WorkspaceNotGitError extends RunnerError {
  override name = 'WorkspaceNotGitError';

  constructor(workDir: string) {
    super('WORKSPACE_NOT_GIT', `workspace is not a git repository: ${workDir}`);
  }
}

export function isRunnerError(err: unknown, code?: RunnerErrorCode): err is RunnerError {
  if (!(err instanceof RunnerError)) return false;
  return code === undefined || err.code === code;
}

export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error && err.message.trim()) return err.message.trim();
  return String(err);
}

/** Maps any failure to the exit code the CLI reports. Unknown errors count as infrastructure errors. */
export function exitCodeForError(err: unknown): ExitCodeValue {
  if (err instanceof RunnerError) return err.exitCode;
  return ExitCode.InfraError;
}
