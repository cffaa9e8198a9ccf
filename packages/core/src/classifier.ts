import {
  BinaryNotFoundError,
  OutputLimitError,
  TimeoutError,
  formatErrorMessage,
} from './errors.js';

export const fallbackActions = ['retry', 'skip', 'cache', 'partial', 'fail'] as const;
export type FallbackAction = (typeof fallbackActions)[number];

export const classifiedErrorCodes = [
  'TIMEOUT',
  'RATE_LIMITED',
  'UNAUTHORIZED',
  'SERVER_ERROR',
  'CONTENT_TOO_LARGE',
  'CLAUDE_NOT_FOUND',
  'UNKNOWN',
] as const;
export type ClassifiedErrorCode = (typeof classifiedErrorCodes)[number];

export type ClassifiedError = Readonly<{
  code: ClassifiedErrorCode;
  message: string;
  retryable: boolean;
  fallbackAction: FallbackAction;
  cause: unknown;
}>;

type Rule = Readonly<{
  code: ClassifiedErrorCode;
  retryable: boolean;
  fallbackAction: FallbackAction;
  matchesCause: (err: unknown) => boolean;
  substrings: readonly string[];
}>;

const SERVER_ERROR_STATUSES: readonly number[] = [500, 502, 503, 504];

function readNumberField(err: unknown, field: 'status' | 'statusCode'): number | null {
  if (!err || typeof err !== 'object') return null;
  const value: unknown = Reflect.get(err, field);
  return typeof value === 'number' && Number.isInteger(value) ? value : null;
}

function httpStatusOf(err: unknown): number | null {
  return readNumberField(err, 'status') ?? readNumberField(err, 'statusCode');
}

function errnoCodeOf(err: unknown): string | null {
  if (!(err instanceof Error)) return null;
  const code: unknown = Reflect.get(err, 'code');
  return typeof code === 'string' ? code : null;
}

// Order matters: the first rule whose structured check matches wins, then the first substring match.
const rules: readonly Rule[] = [
  {
    code: 'TIMEOUT',
    retryable: true,
    fallbackAction: 'retry',
    matchesCause: (err) => err instanceof TimeoutError || errnoCodeOf(err) === 'ETIMEDOUT',
    substrings: ['timeout', 'deadline exceeded'],
  },
  {
    code: 'RATE_LIMITED',
    retryable: true,
    fallbackAction: 'retry',
    matchesCause: (err) => httpStatusOf(err) === 429,
    substrings: ['rate limit', '429'],
  },
  {
    code: 'UNAUTHORIZED',
    retryable: false,
    fallbackAction: 'skip',
    matchesCause: (err) => httpStatusOf(err) === 401,
    substrings: ['401', 'unauthorized', 'authentication'],
  },
  {
    code: 'SERVER_ERROR',
    retryable: true,
    fallbackAction: 'retry',
    matchesCause: (err) => {
      const status = httpStatusOf(err);
      return status !== null && SERVER_ERROR_STATUSES.includes(status);
    },
    substrings: SERVER_ERROR_STATUSES.map(String),
  },
  {
    code: 'CONTENT_TOO_LARGE',
    retryable: false,
    fallbackAction: 'partial',
    matchesCause: (err) => err instanceof OutputLimitError,
    substrings: ['too large', 'exceeds limit', 'context length'],
  },
  {
    code: 'CLAUDE_NOT_FOUND',
    retryable: false,
    fallbackAction: 'skip',
    matchesCause: (err) => err instanceof BinaryNotFoundError,
    substrings: [],
  },
];

/**
 * Maps a failure to its retry/fallback policy.
 *
 * Typed causes (error classes, HTTP `status`/`statusCode`, errno `code`) are
 * checked first; the lower-cased message is the fallback for text the
 * analysis process printed.
 */
export function classifyError(err: unknown): ClassifiedError {
  const message = formatErrorMessage(err);
  const lowered = message.toLowerCase();

  const rule =
    rules.find((candidate) => candidate.matchesCause(err)) ??
    rules.find((candidate) => candidate.substrings.some((s) => lowered.includes(s)));
  if (rule) {
    return {
      code: rule.code,
      message,
      retryable: rule.retryable,
      fallbackAction: rule.fallbackAction,
      cause: err,
    };
  }

  return { code: 'UNKNOWN', message, retryable: true, fallbackAction: 'retry', cause: err };
}
