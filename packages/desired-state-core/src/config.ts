/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Runtime configuration.
 *
 * Precedence for each setting: explicit override (CLI flag), then
 * environment variable, then default.
 *
 * | Setting  | Flag     | Variable             | Default             |
 * |----------|----------|----------------------|---------------------|
 * | file     | --file   | DESIRED_STATE_FILE   | desired_state.yml   |
 * | logLevel |          | LOG_LEVEL            | caller-supplied     |
 */

import * as path from 'node:path';
import { ValidationError } from './errors.js';
import { isLogLevel, LOG_LEVELS, type LogLevel } from './logger.js';

export const DEFAULT_STATE_FILE = 'desired_state.yml';
export const STATE_FILE_ENV = 'DESIRED_STATE_FILE';
export const LOG_LEVEL_ENV = 'LOG_LEVEL';

export interface DesiredStateConfig {
  /** Absolute path of the desired state file */
  file: string;
  /** Minimum log level */
  logLevel: LogLevel;
}

export interface ConfigOverrides {
  /** Desired state file path (relative paths resolve against cwd) */
  file?: string;
  /** Log level override */
  logLevel?: string;
  /** Log level used when neither an override nor LOG_LEVEL is set (default: "info") */
  defaultLogLevel?: LogLevel;
  /** Directory relative paths resolve against (default: process.cwd()) */
  cwd?: string;
}

/**
 * Resolve configuration from overrides and the environment.
 *
 * @throws {ValidationError} If the log level is not a known level
 */
export function loadConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): DesiredStateConfig {
  const cwd = overrides.cwd ?? process.cwd();
  const file = nonEmpty(overrides.file) ?? nonEmpty(env[STATE_FILE_ENV]) ?? DEFAULT_STATE_FILE;

  const level = nonEmpty(overrides.logLevel) ?? nonEmpty(env[LOG_LEVEL_ENV]) ?? overrides.defaultLogLevel ?? 'info';
  if (!isLogLevel(level)) {
    throw new ValidationError('log level', level, `expected one of ${LOG_LEVELS.join(', ')}`);
  }

  return {
    file: path.resolve(cwd, file),
    logLevel: level,
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
