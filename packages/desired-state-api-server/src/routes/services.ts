/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { Hono } from 'hono';
import type { DesiredStateStore, Logger } from '@desired-state/core';
import { sendError, sendStoreError } from '../errors.js';
import { SetServiceRequestSchema, toServiceBody } from '../types.js';

export function createServiceRoutes(store: DesiredStateStore, logger: Logger) {
  const app = new Hono();

  // GET /services - List services sorted by name
  app.get('/', (c) => {
    return c.json(store.list().map(toServiceBody));
  });

  // GET /services/:name - Get one service
  app.get('/:name', (c) => {
    const name = c.req.param('name');
    const service = store.get(name);
    if (!service) {
      return sendError(c, 404, `service '${name}' not found`);
    }
    return c.json(toServiceBody(service));
  });

  // PUT /services/:name - Set a service's version requirement
  app.put('/:name', async (c) => {
    const name = c.req.param('name');

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return sendError(c, 400, 'request body is not valid JSON');
    }

    const parsed = SetServiceRequestSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join('.') || '(body)'}: ${issue.message}`)
        .join('; ');
      return sendError(c, 400, `invalid request body: ${issues}`);
    }

    try {
      const service = await store.set(name, parsed.data.version);
      return c.json(toServiceBody(service));
    } catch (err) {
      return sendStoreError(c, err, logger);
    }
  });

  // DELETE /services/:name - Remove a service
  app.delete('/:name', async (c) => {
    const name = c.req.param('name');
    try {
      const removed = await store.remove(name);
      if (!removed) {
        return sendError(c, 404, `service '${name}' not found`);
      }
      return c.body(null, 204);
    } catch (err) {
      return sendStoreError(c, err, logger);
    }
  });

  return app;
}
