/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Service and desired state type definitions.
 *
 * A service is identified by its name alone; the version requirement is the
 * mutable part. A desired state pairs a schema version (of the on-disk
 * document, not of the services) with the name -> service mapping.
 */

/**
 * Schema version written to new documents and assumed when a document
 * omits it.
 */
export const CURRENT_SCHEMA_VERSION = '0.1.0';

/**
 * A service and the range of versions it should run.
 */
export interface Service {
  /** Unique service name */
  readonly name: string;
  /** Normalized semver range expression, e.g. `^1.2.3` or `>=1.0.0 <2.0.0` */
  readonly versionReq: string;
}

/**
 * The declared mapping of service name to version requirement.
 */
export interface DesiredState {
  /** Schema version of the backing document */
  readonly schemaVersion: string;
  /** Services keyed by name */
  readonly services: ReadonlyMap<string, Service>;
}

/**
 * Create an empty desired state at the current schema version.
 */
export function emptyDesiredState(schemaVersion: string = CURRENT_SCHEMA_VERSION): DesiredState {
  return { schemaVersion, services: new Map() };
}

/**
 * Order service names by UTF-16 code unit, independent of locale.
 */
export function compareServiceNames(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Return the services sorted by name. The input is not modified.
 */
export function sortServices(services: Iterable<Service>): Service[] {
  return Array.from(services).sort((a, b) => compareServiceNames(a.name, b.name));
}

/**
 * Take an immutable, sorted point-in-time copy of a service mapping.
 *
 * Each element is a fresh frozen object, so holders of a snapshot never see
 * later changes to the mapping it was taken from.
 */
export function snapshotServices(services: ReadonlyMap<string, Service>): readonly Service[] {
  return Object.freeze(
    sortServices(services.values()).map((s) =>
      Object.freeze({ name: s.name, versionReq: s.versionReq })
    )
  );
}

/**
 * Compare two desired states by schema version and (name, versionReq) pairs.
 */
export function desiredStatesEqual(a: DesiredState, b: DesiredState): boolean {
  if (a.schemaVersion !== b.schemaVersion) return false;
  return servicesEqual(a.services, b.services);
}

/**
 * Compare two service mappings by their (name, versionReq) pairs.
 */
export function servicesEqual(
  a: ReadonlyMap<string, Service>,
  b: ReadonlyMap<string, Service>
): boolean {
  if (a.size !== b.size) return false;
  for (const [name, service] of a) {
    const other = b.get(name);
    if (!other || other.versionReq !== service.versionReq) return false;
  }
  return true;
}
