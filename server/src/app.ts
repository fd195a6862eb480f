import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { captureError } from './lib/sentry.js';
import logger from './lib/logger.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { createResumeRoutes, type ResumeRouteDeps } from './routes/resumes.js';

export interface AppDeps extends ResumeRouteDeps {
  allowedOrigins?: string[];
  healthCacheTtlMs?: number;
  isShuttingDown?: () => boolean;
}

/**
 * Builds the HTTP app. Kept free of process-level side effects so tests can
 * drive it with `app.request(...)`.
 */
export function createApp(deps: AppDeps): Hono {
  const app = new Hono();
  const isShuttingDown = deps.isShuttingDown ?? (() => false);
  const healthCacheTtlMs = deps.healthCacheTtlMs ?? 5_000;

  app.use('*', requestIdMiddleware);

  app.use('*', async (c, next) => {
    const bypass = c.req.path === '/health';
    if (isShuttingDown() && !bypass) {
      return c.json({ error: 'Server is restarting. Please retry shortly.' }, 503);
    }
    await next();
  });

  app.use('*', async (c, next) => {
    await next();
    c.header('X-Content-Type-Options', 'nosniff');
    c.header('X-Frame-Options', 'DENY');
    c.header('Referrer-Policy', 'no-referrer');
  });

  if (deps.allowedOrigins && deps.allowedOrigins.length > 0) {
    app.use('*', cors({ origin: deps.allowedOrigins }));
  }

  let cachedHealth: { checkedAt: number; dbOk: boolean } | null = null;

  app.get('/health', async (c) => {
    c.header('Cache-Control', 'no-store');
    const now = Date.now();
    const cached = cachedHealth !== null && now - cachedHealth.checkedAt < healthCacheTtlMs;
    let dbOk = cachedHealth?.dbOk ?? false;
    if (!cached) {
      try {
        dbOk = await deps.applications.ping();
      } catch (err) {
        c.get('log').warn({ error: err instanceof Error ? err.message : String(err) }, 'Health probe failed');
        dbOk = false;
      }
      cachedHealth = { checkedAt: now, dbOk };
    }

    const status = isShuttingDown() ? 'draining' : dbOk ? 'ok' : 'degraded';
    return c.json({
      status,
      db_ok: dbOk,
      cached,
      timestamp: new Date(now).toISOString(),
    }, status === 'ok' ? 200 : 503);
  });

  app.route('/api/resumes', createResumeRoutes(deps));

  app.notFound((c) => {
    return c.json({ error: 'Not found' }, 404);
  });

  app.onError((err, c) => {
    const requestId = c.get('requestId');
    captureError(err, { path: c.req.path, method: c.req.method, requestId });
    logger.error({ err, requestId }, 'Unhandled error');
    return c.json({ error: 'Internal server error', request_id: requestId }, 500);
  });

  return app;
}
