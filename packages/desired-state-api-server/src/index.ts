/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

/**
 * HTTP facade over the desired state store.
 *
 * Exposes GET/PUT/DELETE on /services backed by a shared DesiredStateStore.
 */

export {
  createApp,
  createServer,
  type AppOptions,
  type ServerConfig,
  type Server,
} from './server.js';
export { createServiceRoutes } from './routes/index.js';
export { errorToStatus, type ErrorStatus } from './errors.js';
export {
  SetServiceRequestSchema,
  toServiceBody,
  type ServiceBody,
  type SetServiceRequest,
  type ErrorBody,
} from './types.js';
