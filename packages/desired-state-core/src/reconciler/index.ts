/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

export type {
  ReconcilerPhase,
  WatchEventKind,
  WatchHandle,
  WatchListener,
  WatchNotification,
  WatchSource,
} from './interfaces.js';
export { FsWatchSource, toWatchNotification } from './FsWatchSource.js';
export { NotificationQueue, type QueueWaitResult } from './NotificationQueue.js';
export {
  ReconciliationLoop,
  DEFAULT_TICK_MS,
  affectsTarget,
  canonicalizePath,
  isContentChange,
  type ReconciliationHandle,
  type ReconciliationLoopOptions,
} from './ReconciliationLoop.js';
