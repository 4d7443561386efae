/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * State event definitions.
 *
 * Events carry a full snapshot rather than a delta, so a subscriber that
 * misses events (e.g. because its buffer overflowed) still converges on the
 * latest state from the next one it receives.
 */

import { snapshotServices, type DesiredState, type Service } from './service.js';

/**
 * Emitted whenever the desired state transitions.
 */
export interface StateUpdatedEvent {
  readonly type: 'state_updated';
  /** Schema version of the backing document */
  readonly schemaVersion: string;
  /** Services sorted by name, frozen */
  readonly services: readonly Service[];
}

/**
 * All events published by the state store.
 */
export type StateEvent = StateUpdatedEvent;

/**
 * Build a frozen state_updated event from a desired state.
 */
export function stateUpdated(state: DesiredState): StateUpdatedEvent {
  return Object.freeze({
    type: 'state_updated' as const,
    schemaVersion: state.schemaVersion,
    services: snapshotServices(state.services),
  });
}
