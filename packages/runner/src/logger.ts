import { destination, pino, type DestinationStream, type Logger } from 'pino';

import type { LogLevel } from '@patchwarden/core';

export type { Logger } from 'pino';

export type CreateLoggerOptions = Readonly<{
  level?: LogLevel;
  /** Defaults to stderr so stdout carries only analysis output. */
  destination?: DestinationStream;
}>;

export function createLogger(options: CreateLoggerOptions = {}): Logger {
  return pino(
    {
      name: 'patchwarden',
      level: options.level ?? 'info',
      base: { pid: process.pid },
    },
    options.destination ?? destination(2),
  );
}

/** A logger that drops everything; the default for library callers that pass none. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
