/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * WatchSource backed by Node's fs.watch.
 *
 * Watches a directory rather than the file itself: replacing the file by
 * rename (as the YAML codec and most editors do) would otherwise leave the
 * watch attached to the old inode.
 */

import * as fs from 'node:fs';
import { join } from 'node:path';
import type { WatchHandle, WatchListener, WatchNotification, WatchSource } from './interfaces.js';

/**
 * Map an fs.watch callback to a notification.
 *
 * "rename" covers creation, deletion and renames, so it maps to `any`.
 */
export function toWatchNotification(
  directory: string,
  eventType: fs.WatchEventType,
  filename: string | null
): WatchNotification {
  return {
    kind: eventType === 'change' ? 'modify' : 'any',
    paths: filename ? [join(directory, filename)] : [],
  };
}

export class FsWatchSource implements WatchSource {
  watch(directory: string, listener: WatchListener): WatchHandle {
    let closed = false;

    const watcher = fs.watch(directory, { persistent: true }, (eventType, filename) => {
      if (closed) return;
      listener.onEvent(toWatchNotification(directory, eventType, filename));
    });

    // fs.watch stops delivering after an error, so treat it as a disconnect
    watcher.on('error', (err: Error) => {
      if (closed) return;
      closed = true;
      watcher.close();
      listener.onDisconnect(err);
    });

    watcher.on('close', () => {
      if (closed) return;
      closed = true;
      listener.onDisconnect();
    });

    return {
      close() {
        if (closed) return;
        closed = true;
        watcher.close();
      },
    };
  }
}
