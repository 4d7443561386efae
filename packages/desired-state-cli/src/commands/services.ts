/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * desired-state service commands
 *
 * Usage:
 *   desired-state list
 *   desired-state set api '^1.2.3'
 *   desired-state remove api
 *   desired-state --file /etc/desired_state.yml watch
 */

import type { StateEvent } from '@desired-state/types';
import {
  ReconciliationLoop,
  ValidationError,
  formatError,
  type WatchSource,
} from '@desired-state/core';
import { exitError, openStore, type GlobalOptions } from '../utils.js';

/**
 * List services and their version requirements.
 */
export async function listCommand(options: GlobalOptions): Promise<void> {
  try {
    const { store } = await openStore(options);
    for (const service of store.list()) {
      console.log(`${service.name} ${service.versionReq}`);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}

/**
 * Set a service's version requirement.
 */
export async function setCommand(
  service: string,
  versionReq: string,
  options: GlobalOptions
): Promise<void> {
  try {
    const { store } = await openStore(options);
    const stored = await store.set(service, versionReq);
    console.log(`set ${stored.name} to ${stored.versionReq}`);
  } catch (err) {
    if (err instanceof ValidationError && err.field === 'version requirement') {
      exitError(`invalid version requirement string for service ${service}: ${err.reason}`);
    }
    exitError(formatError(err));
  }
}

/**
 * Remove a service.
 */
export async function removeCommand(service: string, options: GlobalOptions): Promise<void> {
  try {
    const { store } = await openStore(options);
    if (await store.remove(service)) {
      console.log(`removed ${service}`);
    } else {
      console.log(`${service} was not present`);
    }
  } catch (err) {
    exitError(formatError(err));
  }
}

export interface WatchOptions extends GlobalOptions {
  /** Stop watching when aborted (default: on SIGINT or SIGTERM) */
  signal?: AbortSignal;
  /** Notification source (default: fs.watch) */
  watchSource?: WatchSource;
}

/**
 * Print a state update the way `watch` shows it.
 */
export function formatStateEvent(event: StateEvent): string[] {
  return [
    `state updated to version ${event.schemaVersion} with ${event.services.length} service(s)`,
    ...event.services.map((s) => `  - ${s.name} ${s.versionReq}`),
  ];
}

/**
 * Follow external edits to the desired state file, printing every update.
 */
export async function watchCommand(options: WatchOptions): Promise<void> {
  let signal = options.signal;
  let detach = () => {};

  if (!signal) {
    const controller = new AbortController();
    const stop = () => controller.abort();
    process.on('SIGINT', stop);
    process.on('SIGTERM', stop);
    detach = () => {
      process.off('SIGINT', stop);
      process.off('SIGTERM', stop);
    };
    signal = controller.signal;
  }

  try {
    const { store, logger } = await openStore(options);
    const loop = new ReconciliationLoop(store, {
      logger,
      watchSource: options.watchSource,
      onStateEvent: (event) => {
        for (const line of formatStateEvent(event)) {
          console.log(line);
        }
      },
    });
    await loop.run(signal);
  } catch (err) {
    exitError(formatError(err));
  } finally {
    detach();
  }
}
