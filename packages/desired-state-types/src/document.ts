/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * On-disk desired state document schema.
 *
 * Document layout (YAML):
 *
 * ```yaml
 * version: 0.1.0
 * services:
 *   - name: api
 *     version: ^1.2.3
 * ```
 *
 * `version` is the document schema version; each service's `version` is its
 * version requirement. Both top-level keys are optional.
 */

import { z } from 'zod';
import { CURRENT_SCHEMA_VERSION, sortServices, type Service } from './service.js';

export const DesiredStateDocumentServiceSchema = z.object({
  name: z.string(),
  version: z.string(),
});

export const DesiredStateDocumentSchema = z.object({
  version: z.string().default(CURRENT_SCHEMA_VERSION),
  services: z.array(DesiredStateDocumentServiceSchema).default([]),
});

export type DesiredStateDocumentService = z.infer<typeof DesiredStateDocumentServiceSchema>;

/** A parsed document, with defaults applied */
export type DesiredStateDocument = z.output<typeof DesiredStateDocumentSchema>;

/**
 * Build the document for a schema version and set of services.
 * Services are written in name order.
 */
export function toDocument(schemaVersion: string, services: Iterable<Service>): DesiredStateDocument {
  return {
    version: schemaVersion,
    services: sortServices(services).map((s) => ({ name: s.name, version: s.versionReq })),
  };
}
