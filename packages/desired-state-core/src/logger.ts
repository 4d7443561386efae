/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Structured logging.
 *
 * Every component accepts an optional pino logger and falls back to a silent
 * one, so library use stays quiet unless the host process opts in. Binaries
 * create their logger with `createLogger` at startup.
 */

import { destination, pino, type DestinationStream, type Level, type Logger } from 'pino';

export type { Logger } from 'pino';

/** Log levels accepted by `createLogger` and the LOG_LEVEL variable */
export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = Level | 'silent';

/**
 * Options for creating a logger.
 */
export interface LoggerOptions {
  /** Name stamped on every line (e.g. the binary name) */
  name: string;
  /** Minimum level to emit (default: "info") */
  level?: LogLevel;
  /** Where to write JSON lines (default: stderr) */
  destination?: DestinationStream;
}

/**
 * Create a logger writing JSON lines.
 *
 * Output goes to stderr by default so command output on stdout stays clean.
 */
export function createLogger(options: LoggerOptions): Logger {
  const stream = options.destination ?? destination(2);
  return pino(
    {
      name: options.name,
      level: options.level ?? 'info',
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    stream
  );
}

/**
 * A logger that discards everything.
 */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}

/**
 * Check whether a string names a log level.
 */
export function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}
