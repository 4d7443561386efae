/**
 * Copyright (c) 2025 Elara AI Pty Ltd
 * Licensed under BSL 1.1. See LICENSE for details.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { serve, type ServerType } from '@hono/node-server';
import { silentLogger, type DesiredStateStore, type Logger } from '@desired-state/core';
import { sendError } from './errors.js';
import { createServiceRoutes } from './routes/index.js';

/**
 * Options for building the HTTP application.
 */
export interface AppOptions {
  /** Enable CORS for cross-origin requests (default: false) */
  cors?: boolean;
  /** Logger (default: silent) */
  logger?: Logger;
}

/**
 * Server configuration options.
 */
export interface ServerConfig extends AppOptions {
  /** The store served by the API (required) */
  store: DesiredStateStore;
  /** HTTP port (default: 3000) */
  port?: number;
  /** Bind address (default: "localhost") */
  host?: string;
}

/**
 * Server instance handle.
 */
export interface Server {
  /** Start the server */
  start(): Promise<void>;
  /** Stop the server */
  stop(): Promise<void>;
  /** The underlying HTTP server */
  readonly httpServer: ServerType;
  /** The port the server is listening on */
  readonly port: number;
}

/**
 * Build the Hono application serving a store.
 *
 * Exposed separately from createServer so it can be exercised with
 * `app.request()` without binding a port.
 */
export function createApp(store: DesiredStateStore, options: AppOptions = {}): Hono {
  const logger = (options.logger ?? silentLogger()).child({ component: 'http' });
  const app = new Hono();

  if (options.cors) {
    app.use('*', cors({ origin: '*' }));
  }

  app.use('*', async (c, next) => {
    const started = Date.now();
    await next();
    logger.debug(
      { method: c.req.method, path: c.req.path, status: c.res.status, ms: Date.now() - started },
      'handled request'
    );
  });

  // Service routes: /services, /services/:name
  app.route('/services', createServiceRoutes(store, logger));

  app.notFound((c) => sendError(c, 404, `no route for ${c.req.method} ${c.req.path}`));

  app.onError((err, c) => {
    logger.error({ err, method: c.req.method, path: c.req.path }, 'unhandled request error');
    return sendError(c, 500, err.message);
  });

  return app;
}

/**
 * Create a desired state API server.
 *
 * @param config - Server configuration
 * @returns Server instance
 */
export function createServer(config: ServerConfig): Server {
  const { store, port = 3000, host = 'localhost', cors: enableCors = false, logger } = config;

  const app = createApp(store, { cors: enableCors, logger });

  let httpServer: ServerType | null = null;
  let actualPort = port;

  const server: Server = {
    async start() {
      return new Promise((resolve) => {
        httpServer = serve({
          fetch: app.fetch,
          port,
          hostname: host,
        }, (info) => {
          actualPort = info.port;
          resolve();
        });
      });
    },

    async stop() {
      return new Promise((resolve, reject) => {
        if (!httpServer) {
          resolve();
          return;
        }
        // Force close all connections immediately
        if ('closeAllConnections' in httpServer) {
          httpServer.closeAllConnections();
        }
        httpServer.close((err) => {
          if (err) {
            reject(err);
          } else {
            resolve();
          }
        });
        httpServer = null;
      });
    },

    get httpServer() {
      if (!httpServer) {
        throw new Error('Server not started');
      }
      return httpServer;
    },

    get port() {
      return actualPort;
    },
  };

  return server;
}
