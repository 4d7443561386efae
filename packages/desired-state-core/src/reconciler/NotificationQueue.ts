/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Single wait point merging watch notifications, the loop's tick, a
 * disconnect of the watch source and cancellation.
 */

import type { WatchNotification } from './interfaces.js';

export type QueueWaitResult =
  | { type: 'notification'; notification: WatchNotification }
  | { type: 'timeout' }
  | { type: 'disconnected'; error?: Error }
  | { type: 'aborted' };

export class NotificationQueue {
  private readonly items: WatchNotification[] = [];
  private disconnect: { error?: Error } | null = null;
  private wake: (() => void) | null = null;

  /** Queue a notification from the watch source */
  push(notification: WatchNotification): void {
    this.items.push(notification);
    this.wake?.();
  }

  /** Record that the watch source has stopped */
  disconnected(error?: Error): void {
    this.disconnect = { error };
    this.wake?.();
  }

  /**
   * Wait up to `timeoutMs` for the next notification.
   *
   * Queued notifications are returned before a disconnect is reported, and
   * cancellation takes precedence over both.
   */
  async next(timeoutMs: number, signal?: AbortSignal): Promise<QueueWaitResult> {
    const ready = this.take(signal);
    if (ready) return ready;

    await new Promise<void>((resolve) => {
      const timer = setTimeout(done, timeoutMs);
      signal?.addEventListener('abort', done, { once: true });
      this.wake = done;

      function done() {
        clearTimeout(timer);
        signal?.removeEventListener('abort', done);
        resolve();
      }
    });
    this.wake = null;

    return this.take(signal) ?? { type: 'timeout' };
  }

  private take(signal?: AbortSignal): QueueWaitResult | null {
    if (signal?.aborted) return { type: 'aborted' };
    const notification = this.items.shift();
    if (notification) return { type: 'notification', notification };
    if (this.disconnect) return { type: 'disconnected', error: this.disconnect.error };
    return null;
  }
}
