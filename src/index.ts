/**
 * HTTP application
 *
 * createApp() wires middleware and routes around a service container; the
 * Node entry point lives in server.ts.
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { MemoryKeyValueStore } from './kv/memory.js';
import { requestLogger } from './middleware/requestLogger.js';
import { strictMode } from './middleware/strictMode.js';
import { createExchangeRoutes } from './routes/exchange.js';
import { createHoyolabRoutes } from './routes/hoyolab.js';
import { createMihomoRoutes } from './routes/mihomo.js';
import type { Services } from './services.js';
import type { AppEnv } from './types.js';
import { ApiError, handleApiError, notFoundError } from './utils/errors.js';

const HEALTH_PROBE_KEY = 'health:probe';

export function createApp(services: Services): Hono<AppEnv> {
  const { config, store } = services;
  const app = new Hono<AppEnv>();

  app.use('*', requestLogger(config.verboseLogging));

  app.use(
    '/*',
    cors({
      origin: config.corsOrigins.includes('*') ? '*' : config.corsOrigins,
      allowMethods: ['GET', 'HEAD', 'POST', 'OPTIONS'],
      allowHeaders: ['Content-Type', 'Authorization', 'x-api-key'],
    })
  );

  // Global error handler - parameter errors carry their own envelope
  app.onError((error, c) => {
    if (!(error instanceof ApiError)) {
      console.error('Unhandled error:', { path: c.req.path, method: c.req.method });
    }
    return handleApiError(c, error, config.showErrorDetails);
  });

  app.notFound((c) => notFoundError(c, 'Route'));

  // Health check with a store round trip
  app.get('/health', async (c) => {
    let reachable = true;
    try {
      await store.get(HEALTH_PROBE_KEY);
    } catch (error) {
      console.error('Health: store probe failed:', error);
      reachable = false;
    }

    return c.json(
      {
        status: reachable ? 'ok' : 'degraded',
        timestamp: new Date().toISOString(),
        store: { type: store.kind, reachable },
      },
      reachable ? 200 : 503
    );
  });

  // Memory store statistics
  app.get('/cache-stats', strictMode(config.strictModeSecret), (c) => {
    if (store instanceof MemoryKeyValueStore) {
      return c.json({ type: store.kind, ...store.getMetrics() });
    }
    return c.json({ type: store.kind });
  });

  app.route('/api/exchange', createExchangeRoutes(services));
  app.route('/api/hoyolab', createHoyolabRoutes(services));
  app.route('/api/mihomo', createMihomoRoutes(services));

  return app;
}
