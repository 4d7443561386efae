/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * Request and response bodies of the HTTP API.
 */

import { z } from 'zod';
import type { Service } from '@desired-state/types';

/** A service as exchanged over HTTP */
export interface ServiceBody {
  name: string;
  version: string;
}

/** Body of PUT /services/:name */
export const SetServiceRequestSchema = z.object({
  version: z.string(),
});
export type SetServiceRequest = z.infer<typeof SetServiceRequestSchema>;

/** Body of every error response */
export interface ErrorBody {
  error: string;
}

export function toServiceBody(service: Service): ServiceBody {
  return { name: service.name, version: service.versionReq };
}
