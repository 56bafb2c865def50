/**
 * Request Logging Middleware
 *
 * Logs every request with method, path, status, timing and, for generated
 * artifacts, whether the generation cache served it.
 */

import type { MiddlewareHandler } from 'hono';
import type { AppEnv, CacheStatus } from '../types.js';

/**
 * Log entry structure
 */
export interface RequestLogEntry {
  timestamp: string;
  method: string;
  path: string;
  status: number;
  duration_ms: number;
  cache?: CacheStatus;
}

/**
 * Request logger middleware
 *
 * Successful requests are logged when `verbose` is set; 5xx responses are
 * always logged.
 *
 * @example
 * ```ts
 * app.use('*', requestLogger(config.verboseLogging));
 * ```
 */
export function requestLogger(verbose: boolean): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const startTime = performance.now();

    await next();

    const status = c.res.status;
    if (!verbose && status < 500) {
      return;
    }

    const logEntry: RequestLogEntry = {
      timestamp: new Date().toISOString(),
      method: c.req.method,
      path: c.req.path,
      status,
      duration_ms: Math.round((performance.now() - startTime) * 100) / 100, // 2 decimal places
    };

    const cache = c.get('cacheStatus');
    if (cache) {
      logEntry.cache = cache;
    }

    console.log('Request:', JSON.stringify(logEntry));
  };
}

