/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Dual-licensed under AGPL-3.0 and commercial license. See LICENSE for details.
 */

/**
 * Domain error types for desired-state.
 *
 * All errors extend DesiredStateError, allowing callers to catch all domain
 * errors with `if (err instanceof DesiredStateError)` or specific errors with
 * their class. Anything else escaping a critical section is treated as a bug
 * and poisons the store's mutex (see mutex.ts).
 */

// =============================================================================
// Base Error
// =============================================================================

/** Base class for all desired-state errors */
export class DesiredStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

// =============================================================================
// Caller Errors
// =============================================================================

/**
 * Thrown for caller-supplied input that is not well formed, such as a
 * version requirement that does not parse.
 */
export class ValidationError extends DesiredStateError {
  constructor(
    public readonly field: string,
    public readonly value: string,
    public readonly reason: string
  ) {
    super(`invalid ${field} '${value}': ${reason}`);
  }
}

// =============================================================================
// Storage Errors
// =============================================================================

export type IoOperation = 'read' | 'write' | 'mkdir' | 'rename';

/**
 * Thrown when reading or writing the backing file fails.
 */
export class IoError extends DesiredStateError {
  constructor(
    public readonly operation: IoOperation,
    public readonly path: string,
    public readonly cause: Error
  ) {
    super(`failed to ${operation} '${path}': ${cause.message}`);
  }

  /** The errno code of the underlying failure, if any */
  get code(): string | undefined {
    return (this.cause as NodeJS.ErrnoException).code;
  }
}

/**
 * Describes a backing file whose content is not a valid document.
 *
 * Never thrown to callers; carried in a `malformed` read result.
 */
export class ParseError extends DesiredStateError {
  constructor(
    public readonly path: string,
    public readonly reason: string
  ) {
    super(`failed to parse desired state file '${path}': ${reason}`);
  }
}

// =============================================================================
// Fatal Errors
// =============================================================================

/**
 * Thrown when the store's lock was poisoned by an unexpected failure inside
 * a critical section. The in-memory state can no longer be trusted.
 */
export class ConcurrencyError extends DesiredStateError {
  constructor(public readonly cause?: Error) {
    super(
      cause
        ? `state lock poisoned: ${cause.message}`
        : 'state lock poisoned'
    );
  }
}

/**
 * Thrown when the filesystem notification source closes while the
 * reconciliation loop is still running.
 */
export class WatchSourceDisconnectedError extends DesiredStateError {
  constructor(
    public readonly path: string,
    public readonly cause?: Error
  ) {
    super(
      cause
        ? `file watcher for '${path}' disconnected unexpectedly: ${cause.message}`
        : `file watcher for '${path}' disconnected unexpectedly`
    );
  }
}

// =============================================================================
// Helper Functions
// =============================================================================

/** Check if error is ENOENT (file not found) */
export function isNotFoundError(err: unknown): boolean {
  return (
    err instanceof Error && (err as NodeJS.ErrnoException).code === 'ENOENT'
  );
}

/** Coerce an unknown thrown value to an Error */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/** Format error for CLI and log output */
export function formatError(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return String(err);
}
