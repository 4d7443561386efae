/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Test helpers for desired-state core
 * Provides temporary directories, log capture and a scriptable watch source
 */

import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createLogger, type Logger } from './logger.js';
import type {
  WatchHandle,
  WatchListener,
  WatchNotification,
  WatchSource,
} from './reconciler/interfaces.js';

/**
 * Creates a temporary directory for testing
 * @returns Path to temporary directory
 */
export function createTempDir(): string {
  return mkdtempSync(join(tmpdir(), 'desired-state-test-'));
}

/**
 * Removes a temporary directory and all its contents
 * @param dir Path to directory to remove
 */
export function removeTempDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

/**
 * A parsed pino log line.
 */
export interface LogRecord {
  level: number;
  msg: string;
  component?: string;
  [key: string]: unknown;
}

/** pino's numeric level for warn */
export const WARN_LEVEL = 40;

/**
 * Create a debug-level logger whose lines are collected in memory.
 */
export function captureLogger(): { logger: Logger; records: LogRecord[] } {
  const records: LogRecord[] = [];
  const logger = createLogger({
    name: 'test',
    level: 'debug',
    destination: {
      write(line: string) {
        records.push(JSON.parse(line) as LogRecord);
      },
    },
  });
  return { logger, records };
}

/**
 * Poll until `predicate` holds.
 * @throws If it does not hold within `timeoutMs`
 */
export async function waitFor(
  predicate: () => boolean,
  timeoutMs = 5000,
  intervalMs = 10
): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, intervalMs));
  }
}

/**
 * Watch source driven by the test.
 */
export class FakeWatchSource implements WatchSource {
  /** Directories passed to watch(), in order */
  readonly watched: string[] = [];
  private listener: WatchListener | null = null;
  private closedCount = 0;

  /** Number of times a watch handle was closed */
  get closed(): number {
    return this.closedCount;
  }

  /** Whether a watch is currently open */
  get active(): boolean {
    return this.listener !== null;
  }

  watch(directory: string, listener: WatchListener): WatchHandle {
    this.watched.push(directory);
    this.listener = listener;
    return {
      close: () => {
        if (this.listener === listener) {
          this.listener = null;
          this.closedCount++;
        }
      },
    };
  }

  emit(notification: WatchNotification): void {
    this.listener?.onEvent(notification);
  }

  error(error: Error): void {
    this.listener?.onError(error);
  }

  disconnect(error?: Error): void {
    this.listener?.onDisconnect(error);
  }
}
