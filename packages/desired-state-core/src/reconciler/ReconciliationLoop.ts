/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Background reconciliation of the store with external edits to its file.
 *
 * The loop is level-triggered: every relevant notification causes a full
 * re-read and diff in `reloadFromDisk`, so duplicate, coalesced or spurious
 * notifications (including metadata-only changes) never produce an event
 * unless the parsed content actually changed.
 *
 * Errors:
 * - IoError from a reload is logged; the last good state stays authoritative
 * - ConcurrencyError ends the loop (the store can no longer be trusted)
 * - The watch source disconnecting ends the loop with WatchSourceDisconnectedError
 */

import { promises as fs } from 'node:fs';
import { basename, dirname, join, resolve } from 'node:path';
import type { StateEvent } from '@desired-state/types';
import type { DesiredStateStore } from '../DesiredStateStore.js';
import {
  ConcurrencyError,
  IoError,
  WatchSourceDisconnectedError,
  toError,
} from '../errors.js';
import type { StateSubscription } from '../eventHub.js';
import { silentLogger, type Logger } from '../logger.js';
import { FsWatchSource } from './FsWatchSource.js';
import type {
  ReconcilerPhase,
  WatchEventKind,
  WatchHandle,
  WatchNotification,
  WatchSource,
} from './interfaces.js';
import { NotificationQueue } from './NotificationQueue.js';

/** Default interval at which the loop wakes without a notification */
export const DEFAULT_TICK_MS = 1000;

const CONTENT_KINDS: ReadonlySet<WatchEventKind> = new Set(['create', 'modify', 'remove', 'any']);

/**
 * Options for a reconciliation loop.
 */
export interface ReconciliationLoopOptions {
  /** Logger (default: silent) */
  logger?: Logger;
  /** Wake-up interval in milliseconds when no notification arrives (default: 1000) */
  tickMs?: number;
  /** Notification source (default: FsWatchSource) */
  watchSource?: WatchSource;
  /** Called with every state event the loop observes, after logging it */
  onStateEvent?: (event: StateEvent) => void;
}

/**
 * Handle to a started loop.
 */
export interface ReconciliationHandle {
  /** Stop the loop and wait for it to finish. Safe to call multiple times. */
  stop(): Promise<void>;
  /** Settles when the loop ends; rejects if it ended with a fatal error */
  readonly done: Promise<void>;
}

/**
 * Resolve a path to its canonical absolute form.
 *
 * Falls back to the canonical parent directory plus the base name when the
 * path does not exist, and to the plain absolute path when neither exists.
 */
export async function canonicalizePath(path: string): Promise<string> {
  const absolute = resolve(path);
  try {
    return await fs.realpath(absolute);
  } catch {
    try {
      return join(await fs.realpath(dirname(absolute)), basename(absolute));
    } catch {
      return absolute;
    }
  }
}

/**
 * Check whether a notification kind can change file content.
 */
export function isContentChange(kind: WatchEventKind): boolean {
  return CONTENT_KINDS.has(kind);
}

/**
 * Check whether a notification concerns the target.
 *
 * A notification without paths is treated as possibly relevant.
 */
export async function affectsTarget(notification: WatchNotification, target: string): Promise<boolean> {
  if (notification.paths.length === 0) return true;
  for (const path of notification.paths) {
    if ((await canonicalizePath(path)) === target) return true;
  }
  return false;
}

/**
 * Keeps a DesiredStateStore aligned with its backing file.
 *
 * @example
 * ```typescript
 * const loop = new ReconciliationLoop(store, { logger });
 * const handle = loop.start();
 * // ...
 * await handle.stop();
 * ```
 */
export class ReconciliationLoop {
  private readonly logger: Logger;
  private readonly tickMs: number;
  private readonly watchSource: WatchSource;
  private readonly onStateEvent?: (event: StateEvent) => void;
  private currentPhase: ReconcilerPhase = 'idle';
  private running = false;

  constructor(
    private readonly store: DesiredStateStore,
    options: ReconciliationLoopOptions = {}
  ) {
    this.logger = (options.logger ?? silentLogger()).child({ component: 'reconciler' });
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.watchSource = options.watchSource ?? new FsWatchSource();
    this.onStateEvent = options.onStateEvent;
  }

  /** Current phase of the loop */
  get phase(): ReconcilerPhase {
    return this.currentPhase;
  }

  /**
   * Run the loop in the background.
   */
  start(): ReconciliationHandle {
    const controller = new AbortController();
    const done = this.run(controller.signal);
    // Observed through handle.done; keep an unobserved failure from being reported as unhandled
    done.catch(() => undefined);
    return {
      done,
      async stop() {
        controller.abort();
        await done;
      },
    };
  }

  /**
   * Run the loop until `signal` aborts.
   *
   * Emits the current state once on start, so subscribers registered before
   * the loop receive an initial snapshot.
   *
   * @throws {WatchSourceDisconnectedError} If the watch source stops
   * @throws {ConcurrencyError} If the store's lock is poisoned
   * @throws {Error} If the loop is already running
   */
  async run(signal?: AbortSignal): Promise<void> {
    if (this.running) {
      throw new Error('reconciliation loop is already running');
    }
    this.running = true;
    this.currentPhase = 'idle';

    const subscription = this.store.subscribe();
    const queue = new NotificationQueue();
    let handle: WatchHandle | null = null;

    try {
      await this.store.emitCurrentState();

      const target = await canonicalizePath(this.store.path);
      const directory = dirname(target);

      handle = this.watchSource.watch(directory, {
        onEvent: (notification) => queue.push(notification),
        onError: (error) => this.logger.warn({ err: error }, 'file watch error'),
        onDisconnect: (error) => queue.disconnected(error),
      });
      this.logger.info({ path: target }, 'watching desired state file');

      // Edits made before the watch existed produced no notification
      await this.reconcile(target);
      this.drainStateEvents(subscription);

      while (!signal?.aborted) {
        this.drainStateEvents(subscription);
        this.currentPhase = 'awaiting_event';

        const next = await queue.next(this.tickMs, signal);
        if (next.type === 'aborted') break;
        if (next.type === 'timeout') {
          this.currentPhase = 'idle';
          continue;
        }
        if (next.type === 'disconnected') {
          throw new WatchSourceDisconnectedError(target, next.error);
        }

        await this.handleNotification(next.notification, target);
        this.drainStateEvents(subscription);
        this.currentPhase = 'idle';
      }
    } catch (err) {
      this.logger.error({ err }, 'reconciliation loop stopped');
      throw err;
    } finally {
      handle?.close();
      subscription.unsubscribe();
      this.currentPhase = 'stopped';
      this.running = false;
    }
  }

  private async handleNotification(notification: WatchNotification, target: string): Promise<void> {
    this.currentPhase = 'filtering';
    this.logger.debug({ kind: notification.kind, paths: notification.paths }, 'filesystem event');

    if (!isContentChange(notification.kind) || !(await affectsTarget(notification, target))) {
      return;
    }
    await this.reconcile(target);
  }

  private async reconcile(target: string): Promise<void> {
    this.currentPhase = 'reloading';
    try {
      const changed = await this.store.reloadFromDisk();
      if (changed) {
        this.currentPhase = 'notified';
        this.logger.info({ path: target }, 'reloaded desired state from file');
      }
    } catch (err) {
      if (err instanceof IoError) {
        this.logger.warn({ err }, 'failed to reload desired state');
        return;
      }
      if (err instanceof ConcurrencyError) {
        throw err;
      }
      throw new ConcurrencyError(toError(err));
    }
  }

  private drainStateEvents(subscription: StateSubscription): void {
    for (const event of subscription.drain()) {
      this.logger.info(
        {
          schemaVersion: event.schemaVersion,
          services: event.services.map((s) => `${s.name} ${s.versionReq}`),
        },
        `state updated to version ${event.schemaVersion} with ${event.services.length} service(s)`
      );
      this.onStateEvent?.(event);
    }
  }
}
