/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * desired-state core - Programmatic API for the desired state store
 *
 * This package holds the store, its YAML codec, the event hub and the
 * reconciliation loop. It has no UI or HTTP dependencies; the CLI and the
 * API server are thin layers over it.
 */

// Errors
export {
  DesiredStateError,
  ValidationError,
  IoError,
  ParseError,
  ConcurrencyError,
  WatchSourceDisconnectedError,
  type IoOperation,
  isNotFoundError,
  toError,
  formatError,
} from './errors.js';

// Configuration and logging
export {
  loadConfig,
  DEFAULT_STATE_FILE,
  STATE_FILE_ENV,
  LOG_LEVEL_ENV,
  type DesiredStateConfig,
  type ConfigOverrides,
} from './config.js';
export {
  createLogger,
  silentLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LoggerOptions,
  type LogLevel,
} from './logger.js';

// Version requirements
export {
  parseVersionReq,
  isValidVersion,
} from './versionReq.js';

// Codecs
export {
  YamlFileCodec,
  InMemoryCodec,
  TEMPLATE_HEADER,
  renderTemplate,
  parseDocument,
  type DesiredStateCodec,
  type DocumentReadResult,
} from './codec/index.js';

// Store and events
export { AsyncMutex } from './mutex.js';
export {
  EventHub,
  StateSubscription,
  DEFAULT_SUBSCRIPTION_BUFFER,
  type SubscribeOptions,
} from './eventHub.js';
export {
  DesiredStateStore,
  type DesiredStateStoreOptions,
} from './DesiredStateStore.js';

// Reconciliation
export * from './reconciler/index.js';
