/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import type { Context } from 'hono';
import { ValidationError, formatError, type Logger } from '@desired-state/core';
import type { ErrorBody } from './types.js';

/** Statuses the API answers failures with */
export type ErrorStatus = 400 | 404 | 500;

/**
 * Map a store error to an HTTP status.
 *
 * Caller mistakes become 400; I/O failures, a poisoned lock and anything
 * unexpected become 500.
 */
export function errorToStatus(err: unknown): ErrorStatus {
  if (err instanceof ValidationError) {
    return 400;
  }
  return 500;
}

/**
 * Send an error response.
 */
export function sendError(c: Context, status: ErrorStatus, message: string) {
  const body: ErrorBody = { error: message };
  return c.json(body, status);
}

/**
 * Send the response for an error thrown by the store, logging server-side
 * failures.
 */
export function sendStoreError(c: Context, err: unknown, logger: Logger) {
  const status = errorToStatus(err);
  if (status === 500) {
    logger.error({ err, method: c.req.method, path: c.req.path }, 'request failed');
  }
  return sendError(c, status, formatError(err));
}
