#!/usr/bin/env -S node --import tsx
/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import {
  DesiredStateStore,
  ReconciliationLoop,
  YamlFileCodec,
  createLogger,
  formatError,
  loadConfig,
} from '@desired-state/core';
import { createServer } from './server.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

const program = new Command();

program
  .name('desired-state-server')
  .description('HTTP server for the desired state store')
  .version(packageJson.version)
  .option('-f, --file <path>', 'Desired state file (default: $DESIRED_STATE_FILE or desired_state.yml)')
  .option('-p, --port <port>', 'HTTP port', '3000')
  .option('-H, --host <host>', 'Bind address', 'localhost')
  .option('--cors', 'Enable CORS for cross-origin requests', false)
  .action(async (options: {
    file?: string;
    port: string;
    host: string;
    cors: boolean;
  }) => {
    const config = loadConfig({ file: options.file, defaultLogLevel: 'info' });
    const logger = createLogger({ name: 'desired-state-server', level: config.logLevel });

    const store = await DesiredStateStore.open(new YamlFileCodec(config.file, { logger }), { logger });
    const reconciler = new ReconciliationLoop(store, { logger }).start();

    const server = createServer({
      store,
      port: parseInt(options.port, 10),
      host: options.host,
      cors: options.cors,
      logger,
    });

    await server.start();
    logger.info({ file: config.file }, `desired-state-server listening on http://${options.host}:${server.port}`);

    let stopping = false;

    // Handle shutdown signals
    const shutdown = async (code: number) => {
      if (stopping) return;
      stopping = true;
      logger.info('shutting down');
      try {
        await reconciler.stop();
      } catch (err) {
        logger.error({ err }, 'reconciliation loop failed');
        code = 1;
      }
      try {
        await server.stop();
      } catch (err) {
        logger.error({ err }, 'failed to stop HTTP server');
        code = 1;
      }
      process.exit(code);
    };

    process.on('SIGINT', () => void shutdown(0));
    process.on('SIGTERM', () => void shutdown(0));

    // The loop only ends by itself on a fatal error
    void reconciler.done.then(
      () => undefined,
      () => void shutdown(1)
    );
  });

program.parseAsync().catch((err: unknown) => {
  console.error(`Error: ${formatError(err)}`);
  process.exit(1);
});
