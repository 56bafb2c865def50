/**
 * Mihomo routes
 *
 * A request names the player by `token` (snapshot taken at exchange, cached
 * renders) or by raw `uid` (fresh lookup, never cached). A token wins when
 * both are given.
 */

import { Hono, type Context } from 'hono';
import { buildCacheKey, type ArtifactKey } from '../cache/index.js';
import type { Language } from '../i18n/languages.js';
import { strictMode } from '../middleware/strictMode.js';
import type { GenerationFailure } from '../orchestration/failures.js';
import { fetchPlayer, selectCharacter, type MihomoSubject } from '../orchestration/mihomo.js';
import { runGeneration, type GenerationOutcome } from '../orchestration/pipeline.js';
import { buildCharacterCard, buildPlayerCard } from '../render/cards/mihomo.js';
import type { Services } from '../services.js';
import { MihomoRecordSchema } from '../transactions/records.js';
import type { AppEnv } from '../types.js';
import type { MihomoCharacter, MihomoPlayer } from '../upstream/mihomo/models.js';
import { ApiError, ErrorCode } from '../utils/errors.js';
import { ok, type Result } from '../utils/result.js';
import {
  CharacterSchema,
  TokenSchema,
  UidSchema,
  parseFlag,
  parseLanguage,
  parseParam,
} from './params.js';
import { imageHeadResponse, sendImage, sendJson, toJsonBytes } from './responses.js';

type PlayerReference = { by: 'token'; token: string } | { by: 'uid'; uid: number };

interface MihomoQuery {
  player: PlayerReference;
  lang: Language;
  nocache: boolean;
}

interface MihomoGeneration<I> {
  artifact: (subject: MihomoSubject) => ArtifactKey;
  fetch: (subject: MihomoSubject) => Promise<Result<I, GenerationFailure>>;
  render: (input: I, subject: MihomoSubject) => Promise<Buffer>;
}

/**
 * @throws {ApiError} MISSING_UID_TOKEN when neither `uid` nor `token` is given
 */
export function parseMihomoQuery(query: Record<string, string>): MihomoQuery {
  const lang = parseLanguage(query.lang);
  const nocache = parseFlag(query.nocache);

  if (query.token !== undefined) {
    const token = parseParam(TokenSchema, query.token, ErrorCode.MISSING_TOKEN, 'A token is required');
    return { player: { by: 'token', token }, lang, nocache };
  }

  if (query.uid !== undefined) {
    const uid = parseParam(UidSchema, query.uid, ErrorCode.MISSING_UID, `Invalid UID: ${query.uid}`);
    return { player: { by: 'uid', uid }, lang, nocache };
  }

  throw new ApiError(ErrorCode.MISSING_UID_TOKEN, 'Either uid or token is required');
}

export function createMihomoRoutes(services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { config, registry, generationCache, mihomo, renderer, translator } = services;

  function generate<I>(query: MihomoQuery, generation: MihomoGeneration<I>): Promise<GenerationOutcome> {
    const reference = query.player;

    if (reference.by === 'uid') {
      return runGeneration<MihomoSubject, I>({
        resolve: async () => ({ uid: reference.uid, snapshot: null }),
        fetch: generation.fetch,
        render: generation.render,
      });
    }

    return runGeneration<MihomoSubject, I>({
      resolve: async () => {
        const record = await registry.get(reference.token, MihomoRecordSchema);
        return record ? { uid: record.uid, snapshot: record.cached } : null;
      },
      scope: {
        cache: generationCache,
        token: reference.token,
        key: (subject) => buildCacheKey(generation.artifact(subject)),
        ttl: config.imageTtl,
        bypass: query.nocache,
      },
      fetch: generation.fetch,
      render: generation.render,
    });
  }

  /**
   * GET /api/mihomo/profile?character=1&token=...&detailed=true
   */
  app.get('/profile', async (c: Context<AppEnv>) => {
    const character = parseParam(
      CharacterSchema,
      c.req.query('character'),
      ErrorCode.MIHOMO_INVALID_CHARACTER,
      `Invalid character: ${c.req.query('character')}`
    );
    const filename = `mihomo_${character}.png`;
    if (c.req.method === 'HEAD') {
      return imageHeadResponse(filename, config.imageTtl);
    }

    const query = parseMihomoQuery(c.req.query());
    const detailed = parseFlag(c.req.query('detailed'));

    const outcome = await generate(query, {
      artifact: (subject) => ({ artifact: 'mihomo-character', uid: subject.uid, character, lang: query.lang, detailed }),
      fetch: async (subject): Promise<Result<{ player: MihomoPlayer; character: MihomoCharacter }, GenerationFailure>> => {
        const player = await fetchPlayer(mihomo, subject, query.lang);
        if (!player.ok) {
          return player;
        }
        const selected = selectCharacter(player.value, character);
        return selected.ok ? ok({ player: player.value, character: selected.value }) : selected;
      },
      render: (input) =>
        renderer.render(buildCharacterCard(input.player, input.character, detailed, translator, query.lang)),
    });
    return sendImage(c, outcome, filename, config.imageTtl);
  });

  /**
   * GET /api/mihomo/player?token=...
   */
  app.get('/player', async (c: Context<AppEnv>) => {
    const filename = 'player.png';
    if (c.req.method === 'HEAD') {
      return imageHeadResponse(filename, config.imageTtl);
    }

    const query = parseMihomoQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (subject) => ({ artifact: 'mihomo-player', uid: subject.uid, lang: query.lang, format: 'png' }),
      fetch: (subject) => fetchPlayer(mihomo, subject, query.lang),
      render: (player) => renderer.render(buildPlayerCard(player, translator, query.lang)),
    });
    return sendImage(c, outcome, filename, config.imageTtl);
  });

  /**
   * GET /api/mihomo/info?token=...
   */
  app.get('/info', strictMode(config.strictModeSecret), async (c) => {
    const query = parseMihomoQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (subject) => ({ artifact: 'mihomo-player', uid: subject.uid, lang: query.lang, format: 'json' }),
      fetch: (subject) => fetchPlayer(mihomo, subject, query.lang),
      render: toJsonBytes,
    });
    return sendJson(c, outcome);
  });

  return app;
}
