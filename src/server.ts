/**
 * HTTP server — Hono app for health checks and, in webhook mode, Bot API
 * updates.
 *
 * Routes:
 *   GET  /health             — Health check with live job counts
 *   POST /telegram/webhook   — Bot API updates (webhook mode only)
 */

import { Hono, type Context } from 'hono';
import { logger } from 'hono/logger';
import { serve } from '@hono/node-server';
import type { RelayEngine } from '@filerelay/core';

export type UpdateMode = 'polling' | 'webhook';

export const WEBHOOK_PATH = '/telegram/webhook';

export interface AppOptions {
  engine: RelayEngine;
  mode: UpdateMode;
  /** Mounted at WEBHOOK_PATH when present */
  webhook?: (c: Context) => Promise<Response>;
}

export interface ServerConfig {
  port?: number;
  host?: string;
}

export function createApp(options: AppOptions): Hono {
  const { engine, mode, webhook } = options;
  const app = new Hono();

  app.use('*', logger());

  app.get('/health', (c) =>
    c.json({
      ok: true,
      service: 'filerelay',
      mode,
      jobs: {
        tracked: engine.store.size(),
        active: engine.store.activeCount(),
        inFlight: engine.inFlight(),
      },
    }),
  );

  if (webhook) {
    app.post(WEBHOOK_PATH, webhook);
  }

  return app;
}

export function createServer(app: Hono, config: ServerConfig = {}) {
  const port = config.port ?? 3456;
  const host = config.host ?? '0.0.0.0';

  const server = serve({ fetch: app.fetch, port, hostname: host }, (info) => {
    console.log(`[filerelay] Server listening on ${host}:${info.port}`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(
        `[filerelay] Port ${port} is already in use.\n` +
          `  Try: PORT=${port + 1} npm start  (or stop the process using port ${port})`,
      );
      process.exit(1);
    }
    throw err;
  });

  return {
    server,
    stop: () =>
      new Promise<void>((resolve) => {
        server.close(() => {
          console.log('[filerelay] Server stopped');
          resolve();
        });
      }),
  };
}
