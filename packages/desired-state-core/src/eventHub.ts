/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Publish/subscribe fan-out of state events.
 *
 * Buffer policy: each subscription holds at most `bufferSize` undelivered
 * events (default 64). When a new event arrives at a full buffer the oldest
 * queued event is discarded and `dropped` is incremented. Events are full
 * snapshots, so a lagging subscriber still converges on the latest state.
 * `emit` never waits for a subscriber.
 *
 * Pruning is lazy: a subscription whose consumer has gone (unsubscribed,
 * or its AbortSignal fired) stays registered until the next `emit` attempts
 * delivery to it.
 */

import type { StateEvent } from '@desired-state/types';

export const DEFAULT_SUBSCRIPTION_BUFFER = 64;

/**
 * Options for a new subscription.
 */
export interface SubscribeOptions {
  /** Maximum queued events before the oldest is dropped (default: 64) */
  bufferSize?: number;
  /** Unsubscribe when this signal aborts */
  signal?: AbortSignal;
}

/**
 * A receive endpoint registered with an EventHub.
 *
 * Consume with `next()`, `tryNext()`, `drain()` or `for await`. Iteration
 * ends after `unsubscribe()`.
 */
export class StateSubscription implements AsyncIterable<StateEvent> {
  private readonly buffer: StateEvent[] = [];
  private waiters: Array<(event: StateEvent | undefined) => void> = [];
  private isClosed = false;
  private droppedCount = 0;

  constructor(
    private readonly bufferSize: number,
    private readonly onClose?: () => void
  ) {}

  /** Whether the consumer has gone */
  get closed(): boolean {
    return this.isClosed;
  }

  /** Number of queued, undelivered events */
  get pending(): number {
    return this.buffer.length;
  }

  /** Number of events discarded because the buffer was full */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Hand an event to this subscription.
   *
   * @returns false if the subscription is closed and the event was not delivered
   * @internal Called by EventHub.emit
   */
  deliver(event: StateEvent): boolean {
    if (this.isClosed) return false;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
      return true;
    }

    if (this.buffer.length >= this.bufferSize) {
      this.buffer.shift();
      this.droppedCount++;
    }
    this.buffer.push(event);
    return true;
  }

  /**
   * Take the next queued event without waiting.
   */
  tryNext(): StateEvent | undefined {
    return this.buffer.shift();
  }

  /**
   * Take all queued events without waiting.
   */
  drain(): StateEvent[] {
    return this.buffer.splice(0, this.buffer.length);
  }

  /**
   * Wait for the next event.
   *
   * Resolves with `undefined` once the subscription is closed (or `signal`
   * aborts) and no queued events remain.
   */
  next(signal?: AbortSignal): Promise<StateEvent | undefined> {
    const queued = this.buffer.shift();
    if (queued) return Promise.resolve(queued);
    if (this.isClosed || signal?.aborted) return Promise.resolve(undefined);

    return new Promise((resolve) => {
      const onAbort = () => {
        this.waiters = this.waiters.filter((w) => w !== waiter);
        resolve(undefined);
      };
      const waiter = (event: StateEvent | undefined) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(event);
      };
      this.waiters.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Close the subscription. Pending `next()` calls resolve with `undefined`;
   * queued events remain readable. Safe to call multiple times.
   */
  unsubscribe(): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.onClose?.();
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter(undefined);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<StateEvent> {
    for (;;) {
      const event = await this.next();
      if (event === undefined) return;
      yield event;
    }
  }
}

/**
 * Broadcasts state events to every live subscription.
 */
export class EventHub {
  private readonly subscriptions = new Set<StateSubscription>();

  /** Registered subscriptions, including closed ones not yet pruned */
  get subscriberCount(): number {
    return this.subscriptions.size;
  }

  /**
   * Create an independent delivery channel.
   */
  subscribe(options: SubscribeOptions = {}): StateSubscription {
    const bufferSize = options.bufferSize ?? DEFAULT_SUBSCRIPTION_BUFFER;
    if (!Number.isInteger(bufferSize) || bufferSize < 1) {
      throw new RangeError(`bufferSize must be a positive integer, got ${bufferSize}`);
    }

    const { signal } = options;
    const onAbort = () => subscription.unsubscribe();
    const subscription = new StateSubscription(bufferSize, () => signal?.removeEventListener('abort', onAbort));
    this.subscriptions.add(subscription);

    if (signal) {
      if (signal.aborted) {
        subscription.unsubscribe();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    return subscription;
  }

  /**
   * Deliver an event to every live subscription, pruning the ones whose
   * delivery fails.
   *
   * @returns The number of subscriptions that received the event
   */
  emit(event: StateEvent): number {
    let delivered = 0;
    for (const subscription of this.subscriptions) {
      if (subscription.deliver(event)) {
        delivered++;
      } else {
        this.subscriptions.delete(subscription);
      }
    }
    return delivered;
  }
}
