/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Filesystem notification source abstraction for the reconciliation loop.
 *
 * - FsWatchSource: Node's fs.watch on a directory
 * - Tests supply their own source to drive notifications deterministically
 */

/**
 * What happened to the paths in a notification.
 *
 * `any` is used when the source cannot tell (fs.watch reports creations,
 * deletions and renames alike as "rename").
 */
export type WatchEventKind = 'create' | 'modify' | 'remove' | 'access' | 'metadata' | 'any';

/**
 * A filesystem notification.
 */
export interface WatchNotification {
  kind: WatchEventKind;
  /** Absolute paths concerned; empty if the source did not say */
  paths: string[];
}

/**
 * Callbacks a watch source reports through.
 */
export interface WatchListener {
  /** A filesystem change was observed */
  onEvent(notification: WatchNotification): void;
  /** A non-fatal error was reported; the source keeps running */
  onError(error: Error): void;
  /** The source stopped delivering notifications without being closed by us */
  onDisconnect(error?: Error): void;
}

/**
 * An active watch.
 */
export interface WatchHandle {
  /** Stop watching. No further callbacks are made. Safe to call multiple times. */
  close(): void;
}

/**
 * Creates watches on directories.
 */
export interface WatchSource {
  /**
   * Start watching a directory (non-recursively).
   *
   * @throws If the directory cannot be watched
   */
  watch(directory: string, listener: WatchListener): WatchHandle;
}

/**
 * Phases of the reconciliation loop.
 *
 * idle -> awaiting_event -> filtering -> reloading -> notified -> idle,
 * with filtering and reloading returning straight to idle when the
 * notification is irrelevant or the reload changed nothing.
 */
export type ReconcilerPhase =
  | 'idle'
  | 'awaiting_event'
  | 'filtering'
  | 'reloading'
  | 'notified'
  | 'stopped';
