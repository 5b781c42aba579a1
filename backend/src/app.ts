/**
 * HTTP application
 *
 * Hono for HTTP handling, tRPC for the typed API. Built around an Economy
 * so tests can drive it with an in-memory ledger through app.request().
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { compress } from 'hono/compress';
import { cors } from 'hono/cors';
import { trpcServer } from '@hono/trpc-server';
import { config } from './config';
import type { Economy } from './economy';
import { logger as pinoLogger } from './logger';
import { requestIdMiddleware, serverTimingMiddleware, type RequestIdVariables } from './middleware/request-id';
import { securityHeaders } from './middleware/security';
import { httpMetricsMiddleware } from './monitoring/http-metrics';
import { createMetricsEndpoint } from './monitoring/metrics';
import { appRouter } from './routers';
import { createContextFactory } from './trpc';

export function createApp(economy: Economy): Hono<{ Variables: RequestIdVariables }> {
  const app = new Hono<{ Variables: RequestIdVariables }>();

  // ==========================================================================
  // MIDDLEWARE
  // ==========================================================================

  app.use('*', bodyLimit({
    maxSize: 64 * 1024, // Ledger calls carry ids and numbers only
    onError: (c) => c.json({ error: 'Request body too large', maxSize: '64KB' }, 413),
  }));

  app.use('*', requestIdMiddleware);
  app.use('*', serverTimingMiddleware);
  app.use('*', compress());
  app.use('*', securityHeaders);

  // Structured request logging, includes requestId
  app.use('*', async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    const status = c.res.status;
    const level = status >= 500 ? 'error' : status >= 400 ? 'warn' : 'info';
    pinoLogger[level]({
      requestId: c.get('requestId'),
      method: c.req.method,
      path: c.req.path,
      status,
      duration,
    }, `${c.req.method} ${c.req.path} -> ${status} (${duration}ms)`);
  });

  app.use('*', cors({
    origin: (requestOrigin) => (config.app.allowedOrigins.includes(requestOrigin) ? requestOrigin : null),
    allowMethods: ['GET', 'POST', 'OPTIONS'],
    allowHeaders: ['Content-Type', 'X-Request-Id', 'X-Account-Id'],
    maxAge: 3600,
  }));

  app.use('*', httpMetricsMiddleware());

  // ==========================================================================
  // METRICS AND HEALTH
  // ==========================================================================

  createMetricsEndpoint(app);

  // Liveness: no ledger access
  app.get('/health', (c) =>
    c.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      ledger: economy.store.driver,
      environment: config.app.env,
    })
  );

  // ==========================================================================
  // tRPC HANDLER
  // ==========================================================================

  app.use('/trpc/*', trpcServer({
    router: appRouter,
    createContext: createContextFactory(economy),
  }));

  return app;
}
