/**
 * Strict mode gate for raw-data routes
 *
 * With a secret configured, gated routes require it in
 * `Authorization: Bearer <secret>` or `x-api-key: <secret>`. Without one the
 * gate lets everything through.
 */

import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types.js';
import { ErrorCode, errorResponse } from '../utils/errors.js';

/**
 * Extract the strict mode secret from headers
 */
export function extractSecret(headers: Headers): string | null {
  const authHeader = headers.get('authorization');
  if (authHeader) {
    const bearerMatch = authHeader.match(/^Bearer\s+(.+)$/i);
    if (bearerMatch?.[1]) {
      return bearerMatch[1].trim();
    }
  }
  const xApiKey = headers.get('x-api-key');
  return xApiKey ? xApiKey.trim() : null;
}

export function strictMode(secret: string | null): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    if (secret === null) {
      await next();
      return;
    }

    const provided = extractSecret(c.req.raw.headers);
    if (!provided) {
      return errorResponse(
        c,
        ErrorCode.STRICT_MODE_REJECTED,
        'Strict mode is enabled. Use Authorization: Bearer <secret> or x-api-key: <secret>',
        401
      );
    }

    if (provided !== secret) {
      return errorResponse(c, ErrorCode.STRICT_MODE_REJECTED, 'Invalid strict mode secret', 403);
    }

    await next();
  };
}
