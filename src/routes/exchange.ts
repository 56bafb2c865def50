/**
 * Credential exchange routes
 *
 * Verifies credentials against the upstream service, stores them behind a
 * fresh token and returns the token.
 */

import { Hono } from 'hono';
import { DEFAULT_LANGUAGE } from '../i18n/languages.js';
import { parseBody } from '../middleware/validation.js';
import { mapUpstreamError } from '../orchestration/failures.js';
import type { Services } from '../services.js';
import type { AppEnv } from '../types.js';
import { ErrorCode, badRequestError } from '../utils/errors.js';
import { HoyolabExchangeSchema, MihomoExchangeSchema } from './params.js';
import { successResponse } from './responses.js';

export function createExchangeRoutes(services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { config, registry } = services;

  /**
   * POST /api/exchange/hoyolab
   *
   * @example
   * ```bash
   * curl -X POST http://localhost:3000/api/exchange/hoyolab \
   *   -H "Content-Type: application/json" \
   *   -d '{"uid": 800000001, "ltuid": 900001, "ltoken": "<ltoken>"}'
   * ```
   */
  app.post('/hoyolab', async (c) => {
    const body = await parseBody(c, HoyolabExchangeSchema);
    if (!body.ok) {
      return body.error;
    }

    const credentials = body.value;
    const verification = await services.hoyolab.getBasicInfo(credentials, DEFAULT_LANGUAGE);
    if (!verification.ok) {
      const reason = mapUpstreamError('hoyolab', verification.error);
      return badRequestError(c, ErrorCode.TR_FAILED_VERIFICATION, 'Failed to verify credentials', {
        code: reason.code,
        message: reason.message,
      });
    }
    if (!verification.value) {
      return badRequestError(c, ErrorCode.TR_FAILED_VERIFICATION, 'Failed to verify credentials');
    }

    const token = await registry.create({ kind: 'hoyolab', ...credentials }, config.transactionTtl);
    return successResponse(c, token);
  });

  /**
   * POST /api/exchange/mihomo
   *
   * Stores the player snapshot so later renders need no upstream call.
   */
  app.post('/mihomo', async (c) => {
    const body = await parseBody(c, MihomoExchangeSchema);
    if (!body.ok) {
      return body.error;
    }

    const { uid } = body.value;
    const player = await services.mihomo.getPlayer(uid, DEFAULT_LANGUAGE);
    if (!player.ok) {
      const reason = mapUpstreamError('mihomo', player.error);
      return badRequestError(c, ErrorCode.TR_FAILED_VERIFICATION, 'Failed to verify UID', {
        code: reason.code,
        message: reason.message,
      });
    }

    const token = await registry.create({ kind: 'mihomo', uid, cached: player.value }, config.mihomoTtl);
    return successResponse(c, token);
  });

  return app;
}
