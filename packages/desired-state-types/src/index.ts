/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * @desired-state/types: Shared type definitions for desired state
 *
 * Terminology:
 * - **Service**: A named deployable unit with a version requirement
 * - **Version requirement**: A semver range expression (e.g. `^1.2.3`)
 * - **Desired state**: The mapping of service name to version requirement
 * - **Snapshot**: A frozen, name-sorted copy of the services at one point in time
 */

// Services and desired state
export {
  CURRENT_SCHEMA_VERSION,
  type Service,
  type DesiredState,
  emptyDesiredState,
  compareServiceNames,
  sortServices,
  snapshotServices,
  desiredStatesEqual,
  servicesEqual,
} from './service.js';

// State events
export {
  type StateEvent,
  type StateUpdatedEvent,
  stateUpdated,
} from './event.js';

// On-disk document
export {
  DesiredStateDocumentSchema,
  DesiredStateDocumentServiceSchema,
  type DesiredStateDocument,
  type DesiredStateDocumentService,
  toDocument,
} from './document.js';
