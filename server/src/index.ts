import { serve } from '@hono/node-server';
import { fileURLToPath } from 'node:url';
import path from 'node:path';
import { createApp } from './app.js';
import { loadConfig } from './lib/config.js';
import logger from './lib/logger.js';
import { initSentry, captureError, flushSentry } from './lib/sentry.js';
import { createServices, type Services } from './lib/services.js';

let shuttingDown = false;
let server: ReturnType<typeof serve> | null = null;
let services: Services | null = null;

function shutdown(signal: string) {
  if (shuttingDown) return;
  if (!server) return;
  shuttingDown = true;
  logger.info({ signal }, 'Graceful shutdown initiated');

  const flushTasks = Promise.allSettled([
    services?.close() ?? Promise.resolve(),
    flushSentry(2000),
  ]).then((results) => {
    const closed = results[0];
    if (closed.status === 'rejected') {
      logger.warn({
        error: closed.reason instanceof Error ? closed.reason.message : String(closed.reason),
      }, 'Service shutdown failed');
    }
  });

  // Stop accepting new connections, then give the flush tasks a short budget.
  server.close(() => {
    void Promise.race([
      flushTasks,
      new Promise((resolve) => setTimeout(resolve, 3_000)),
    ]).finally(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
  });

  setTimeout(() => {
    logger.warn('Forcing exit after shutdown timeout');
    process.exit(1);
  }, 10_000).unref();
}

export function startServer() {
  if (server) return server;

  initSentry();
  const config = loadConfig();
  services = createServices(config);

  const allowedOrigins = process.env.ALLOWED_ORIGINS
    ? process.env.ALLOWED_ORIGINS.split(',').map((o) => o.trim()).filter(Boolean)
    : [];

  const app = createApp({
    applications: services.applications,
    store: services.store,
    queue: services.queue,
    maxUploadBytes: config.maxUploadBytes,
    allowedOrigins,
    isShuttingDown: () => shuttingDown,
  });

  logger.info({ port: config.port }, 'Resume screening API starting');
  server = serve({ fetch: app.fetch, port: config.port });
  logger.info({ port: config.port }, `Server running at http://localhost:${config.port}`);

  process.on('SIGTERM', () => shutdown('SIGTERM'));
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('unhandledRejection', (reason) => {
    captureError(reason, { source: 'unhandledRejection' });
    logger.error({ reason }, 'Unhandled promise rejection');
    shutdown('UNHANDLED_REJECTION');
  });
  process.on('uncaughtException', (err) => {
    logger.error({ err }, 'Uncaught exception');
    shutdown('UNCAUGHT_EXCEPTION');
  });

  return server;
}

function isMainModule(): boolean {
  const current = fileURLToPath(import.meta.url);
  const entry = process.argv[1];
  if (!entry) return false;
  return path.resolve(entry) === path.resolve(current);
}

if (isMainModule()) {
  startServer();
}
