/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * CLI utilities for option handling and opening the store
 */

import {
  DesiredStateStore,
  YamlFileCodec,
  createLogger,
  loadConfig,
  type Logger,
} from '@desired-state/core';

/**
 * Options accepted by every command.
 */
export type GlobalOptions = {
  /** Desired state file (default: $DESIRED_STATE_FILE or desired_state.yml) */
  file?: string;
  /** Log level (default: $LOG_LEVEL or warn) */
  logLevel?: string;
};

/**
 * Open the desired state store named by the global options.
 * Creates a template file if none exists.
 */
export async function openStore(
  options: GlobalOptions
): Promise<{ store: DesiredStateStore; logger: Logger }> {
  const config = loadConfig({
    file: options.file,
    logLevel: options.logLevel,
    defaultLogLevel: 'warn',
  });
  const logger = createLogger({ name: 'desired-state', level: config.logLevel });
  const store = await DesiredStateStore.open(new YamlFileCodec(config.file, { logger }), { logger });
  return { store, logger };
}

/**
 * Exit with error message.
 */
export function exitError(message: string): never {
  console.error(`Error: ${message}`);
  process.exit(1);
}
