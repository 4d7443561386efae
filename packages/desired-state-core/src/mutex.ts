/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Async mutex serializing the store's critical sections.
 *
 * Every read-modify-persist-notify sequence on the store runs inside
 * `runExclusive`, so no two mutations interleave across their awaits.
 *
 * Domain errors (DesiredStateError) thrown by a critical section are
 * expected outcomes: the store only commits after persistence succeeds, so
 * state is still consistent and the mutex stays usable. Any other error means
 * a bug interrupted a critical section at an unknown point; the mutex is then
 * poisoned and refuses all later acquisitions with ConcurrencyError.
 */

import { ConcurrencyError, DesiredStateError, toError } from './errors.js';

export class AsyncMutex {
  private queue: Array<() => void> = [];
  private locked = false;
  private poisonCause: Error | null = null;

  /** Whether an unexpected failure has poisoned the mutex */
  get poisoned(): boolean {
    return this.poisonCause !== null;
  }

  /**
   * Acquire the mutex, execute the callback, then release.
   * If the mutex is already held, waits until it's available.
   *
   * @throws {ConcurrencyError} If the mutex is poisoned
   */
  async runExclusive<T>(fn: () => T): Promise<Awaited<T>> {
    await this.acquire();
    try {
      if (this.poisonCause) {
        throw new ConcurrencyError(this.poisonCause);
      }
      try {
        return await fn();
      } catch (err) {
        if (!(err instanceof DesiredStateError)) {
          this.poisonCause = toError(err);
        }
        throw err;
      }
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    return new Promise((resolve) => {
      if (!this.locked) {
        this.locked = true;
        resolve();
      } else {
        this.queue.push(resolve);
      }
    });
  }

  private release(): void {
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.locked = false;
    }
  }
}
