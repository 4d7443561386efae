#!/usr/bin/env -S node --import tsx
/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * desired-state CLI - manage the desired version of each service
 *
 * All commands operate on the file given by --file, $DESIRED_STATE_FILE or
 * ./desired_state.yml.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import {
  listCommand,
  removeCommand,
  setCommand,
  watchCommand,
} from './commands/services.js';
import type { GlobalOptions } from './utils.js';

const require = createRequire(import.meta.url);
const packageJson = require('../package.json') as { version: string };

const program = new Command();

program
  .name('desired-state')
  .description('Manage the desired version requirement of each service')
  .version(packageJson.version)
  .option('-f, --file <path>', 'Desired state file (default: $DESIRED_STATE_FILE or desired_state.yml)')
  .option('--log-level <level>', 'Log level: fatal, error, warn, info, debug, trace or silent');

program
  .command('list')
  .description('List services and their version requirements')
  .action(() => listCommand(program.opts<GlobalOptions>()));

program
  .command('set <service> <version-req>')
  .description("Set a service's version requirement (e.g. '^1.2.3')")
  .action((service: string, versionReq: string) =>
    setCommand(service, versionReq, program.opts<GlobalOptions>())
  );

program
  .command('remove <service>')
  .description('Remove a service')
  .action((service: string) => removeCommand(service, program.opts<GlobalOptions>()));

program
  .command('watch')
  .description('Follow changes to the desired state file until interrupted')
  .action(() => watchCommand(program.opts<GlobalOptions>()));

await program.parseAsync();
