/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * The authoritative in-memory desired state.
 *
 * One store instance is shared by every caller in a process (command and
 * HTTP handlers, the reconciliation loop). All mutations and reloads run
 * under one AsyncMutex covering read, mutate, persist and notify.
 *
 * Commit discipline: a mutation builds the next mapping, persists it, and
 * only then swaps it in and emits. If persistence fails the previous state
 * stays visible and no event is emitted.
 */

import {
  CURRENT_SCHEMA_VERSION,
  desiredStatesEqual,
  emptyDesiredState,
  snapshotServices,
  stateUpdated,
  type DesiredState,
  type Service,
} from '@desired-state/types';
import type { DesiredStateCodec, DocumentReadResult } from './codec/interfaces.js';
import { ValidationError } from './errors.js';
import { EventHub, type StateSubscription, type SubscribeOptions } from './eventHub.js';
import { silentLogger, type Logger } from './logger.js';
import { AsyncMutex } from './mutex.js';
import { parseVersionReq } from './versionReq.js';

/**
 * Options for opening a store.
 */
export interface DesiredStateStoreOptions {
  /** Logger (default: silent) */
  logger?: Logger;
  /** Event hub to publish on (default: a new hub owned by the store) */
  hub?: EventHub;
}

/**
 * Shared, lock-serialized desired state backed by a codec.
 *
 * @example
 * ```typescript
 * const store = await DesiredStateStore.open(new YamlFileCodec('desired_state.yml'));
 * const events = store.subscribe();
 * await store.set('api', '^1.2.3');
 * console.log(store.list());         // [{ name: 'api', versionReq: '^1.2.3' }]
 * console.log(await events.next());  // { type: 'state_updated', ... }
 * ```
 */
export class DesiredStateStore {
  private state: DesiredState;
  private readonly mutex = new AsyncMutex();
  private readonly hub: EventHub;
  private readonly logger: Logger;

  private constructor(
    private readonly codec: DesiredStateCodec,
    initial: DesiredState,
    options: DesiredStateStoreOptions
  ) {
    this.state = initial;
    this.hub = options.hub ?? new EventHub();
    this.logger = (options.logger ?? silentLogger()).child({ component: 'store' });
  }

  /**
   * Load the desired state through a codec and create the store.
   *
   * A missing, empty, unreadable or malformed document yields an empty state
   * at the current schema version (a missing one also gets a template).
   *
   * @throws {IoError} If the template for a missing document cannot be written
   */
  static async open(
    codec: DesiredStateCodec,
    options: DesiredStateStoreOptions = {}
  ): Promise<DesiredStateStore> {
    const result = await codec.read();
    const initial = result.type === 'loaded'
      ? { schemaVersion: result.schemaVersion, services: result.services }
      : emptyDesiredState();
    const store = new DesiredStateStore(codec, initial, options);
    store.logger.debug(
      { path: codec.path, result: result.type, services: initial.services.size },
      'opened desired state'
    );
    return store;
  }

  /** Location of the backing document */
  get path(): string {
    return this.codec.path;
  }

  /** Schema version of the backing document */
  get schemaVersion(): string {
    return this.state.schemaVersion;
  }

  /** Whether an unexpected failure has poisoned the store's lock */
  get poisoned(): boolean {
    return this.mutex.poisoned;
  }

  /**
   * All services sorted by name.
   *
   * Reads the last committed state. Commits replace the whole state in one
   * assignment, so a list never observes a mutation half-applied.
   */
  list(): readonly Service[] {
    return snapshotServices(this.state.services);
  }

  /**
   * Look up one service by name.
   */
  get(name: string): Service | undefined {
    const service = this.state.services.get(name);
    return service ? { name: service.name, versionReq: service.versionReq } : undefined;
  }

  /**
   * The current state as an immutable snapshot.
   */
  snapshot(): DesiredState {
    return {
      schemaVersion: this.state.schemaVersion,
      services: new Map(this.list().map((s) => [s.name, s])),
    };
  }

  /**
   * Insert or overwrite a service's version requirement.
   *
   * Emits a state_updated event on every successful call, including one that
   * sets a service to the requirement it already has.
   *
   * @param name - Service name
   * @param versionReqExpr - Semver range expression
   * @returns The stored service
   * @throws {ValidationError} If the name is empty or the expression is not a valid range
   * @throws {IoError} If persisting fails; the state is left unchanged
   * @throws {ConcurrencyError} If the store's lock is poisoned
   */
  async set(name: string, versionReqExpr: string): Promise<Service> {
    if (name.trim() === '') {
      throw new ValidationError('service name', name, 'name is empty');
    }
    const versionReq = parseVersionReq(versionReqExpr);
    const service: Service = { name, versionReq };

    return this.mutex.runExclusive(async () => {
      const services = new Map(this.state.services);
      services.set(name, service);
      await this.commit({ schemaVersion: this.state.schemaVersion, services });
      this.logger.info({ service: name, versionReq }, 'set service');
      return { ...service };
    });
  }

  /**
   * Remove a service.
   *
   * @returns true if the service existed and was removed, false if absent
   *   (in which case nothing is persisted and no event is emitted)
   * @throws {IoError} If persisting fails; the state is left unchanged
   * @throws {ConcurrencyError} If the store's lock is poisoned
   */
  async remove(name: string): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      if (!this.state.services.has(name)) {
        return false;
      }
      const services = new Map(this.state.services);
      services.delete(name);
      await this.commit({ schemaVersion: this.state.schemaVersion, services });
      this.logger.info({ service: name }, 'removed service');
      return true;
    });
  }

  /**
   * Re-read the backing document and adopt it if it differs.
   *
   * A missing or empty document counts as an empty state. An unreadable or
   * malformed one is ignored and the last good state is kept. Emits exactly
   * one event if the schema version or any (name, versionReq) pair changed.
   *
   * @returns true if the state changed
   * @throws {IoError} If a template for a missing document cannot be written
   * @throws {ConcurrencyError} If the store's lock is poisoned
   */
  async reloadFromDisk(): Promise<boolean> {
    return this.mutex.runExclusive(async () => {
      const result = await this.codec.read();
      const next = this.stateFromReadResult(result);
      if (!next) {
        this.logger.warn(
          { path: this.codec.path, result: result.type },
          'keeping last good desired state'
        );
        return false;
      }
      if (desiredStatesEqual(this.state, next)) {
        this.logger.debug({ path: this.codec.path }, 'desired state unchanged');
        return false;
      }
      this.state = next;
      this.publish();
      return true;
    });
  }

  /**
   * Emit the current state to all subscribers.
   *
   * @throws {ConcurrencyError} If the store's lock is poisoned
   */
  async emitCurrentState(): Promise<void> {
    await this.mutex.runExclusive(() => {
      this.publish();
    });
  }

  /**
   * Register a new subscriber for state events.
   */
  subscribe(options?: SubscribeOptions): StateSubscription {
    return this.hub.subscribe(options);
  }

  /**
   * Persist, then swap in and announce the next state.
   * Must be called while holding the mutex.
   */
  private async commit(next: DesiredState): Promise<void> {
    await this.codec.write(next.schemaVersion, next.services.values());
    this.state = next;
    this.publish();
  }

  private publish(): void {
    const delivered = this.hub.emit(stateUpdated(this.state));
    this.logger.debug({ subscribers: delivered }, 'emitted state_updated');
  }

  private stateFromReadResult(result: DocumentReadResult): DesiredState | null {
    switch (result.type) {
      case 'loaded':
        return { schemaVersion: result.schemaVersion, services: result.services };
      case 'missing':
      case 'empty':
        return emptyDesiredState(CURRENT_SCHEMA_VERSION);
      case 'unreadable':
      case 'malformed':
        return null;
    }
  }
}
