/**
 * HoYoLAB routes
 *
 * Image routes render battle chronicle cards; info routes serve the same
 * data as JSON and sit behind strict mode. Every route takes `token`,
 * `lang` (default en-US) and `nocache`.
 */

import { Hono, type Context } from 'hono';
import { buildCacheKey, type ArtifactKey } from '../cache/index.js';
import { strictMode } from '../middleware/strictMode.js';
import type { GenerationFailure } from '../orchestration/failures.js';
import {
  fetchCharacters,
  fetchForgottenHall,
  fetchOverview,
  fetchSimulatedUniverse,
  selectFloor,
  selectRun,
  type SelectedRun,
} from '../orchestration/hoyolab.js';
import { runGeneration, type GenerationOutcome } from '../orchestration/pipeline.js';
import {
  buildCharactersCard,
  buildForgottenHallCard,
  buildOverviewCard,
  buildSimulatedUniverseCard,
  buildSwarmDisasterCard,
} from '../render/cards/hoyolab.js';
import type { Services } from '../services.js';
import { HoyolabRecordSchema, type HoyolabRecord } from '../transactions/records.js';
import type { ChallengeFloor } from '../upstream/hoyolab/models.js';
import type { AppEnv } from '../types.js';
import { ErrorCode } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import {
  IndexSchema,
  MemoryOfChaosKindSchema,
  SimulatedUniverseKindSchema,
  parseGenerationQuery,
  parseParam,
  type GenerationQuery,
} from './params.js';
import { imageHeadResponse, sendImage, sendJson, toJsonBytes } from './responses.js';

interface HoyolabGeneration<I> {
  artifact: (record: HoyolabRecord) => ArtifactKey;
  fetch: (record: HoyolabRecord) => Promise<Result<I, GenerationFailure>>;
  render: (input: I, record: HoyolabRecord) => Promise<Buffer>;
}

function parseSimulatedUniverseKind(value: string | undefined) {
  return parseParam(
    SimulatedUniverseKindSchema,
    value,
    ErrorCode.HOYOLAB_SIMU_UNKNOWN_KIND,
    `Unknown simulated universe kind: ${value}`
  );
}

function parseMemoryOfChaosKind(value: string | undefined) {
  return parseParam(
    MemoryOfChaosKindSchema,
    value,
    ErrorCode.HOYOLAB_SIMU_UNKNOWN_KIND,
    `Unknown memory of chaos kind: ${value}`
  );
}

function parseIndex(value: string | undefined): number {
  return parseParam(IndexSchema, value, ErrorCode.INVALID_INDEX, `Invalid index: ${value}`);
}

export function createHoyolabRoutes(services: Services): Hono<AppEnv> {
  const app = new Hono<AppEnv>();
  const { config, registry, generationCache, hoyolab, renderer, translator } = services;
  const gate = strictMode(config.strictModeSecret);

  function generate<I>(query: GenerationQuery, generation: HoyolabGeneration<I>): Promise<GenerationOutcome> {
    return runGeneration<HoyolabRecord, I>({
      resolve: () => registry.get(query.token, HoyolabRecordSchema),
      scope: {
        cache: generationCache,
        token: query.token,
        key: (record) => buildCacheKey(generation.artifact(record)),
        ttl: config.imageTtl,
        bypass: query.nocache,
      },
      fetch: generation.fetch,
      render: generation.render,
    });
  }

  /**
   * GET /api/hoyolab/chronicles
   */
  const chronicles = async (c: Context<AppEnv>) => {
    const filename = 'chronicles.png';
    if (c.req.method === 'HEAD') {
      return imageHeadResponse(filename, config.imageTtl);
    }

    const query = parseGenerationQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (record) => ({ artifact: 'chronicles-overview', uid: record.uid, ltuid: record.ltuid, lang: query.lang, format: 'png' }),
      fetch: (record) => fetchOverview(hoyolab, record, query.lang),
      render: (input, record) => renderer.render(buildOverviewCard(input, record.uid, translator, query.lang)),
    });
    return sendImage(c, outcome, filename, config.imageTtl);
  };

  app.get('/chronicles', chronicles);
  app.get('/chronicles.png', chronicles);

  /**
   * GET /api/hoyolab/characters
   */
  const characters = async (c: Context<AppEnv>) => {
    const filename = 'characters.png';
    if (c.req.method === 'HEAD') {
      return imageHeadResponse(filename, config.imageTtl);
    }

    const query = parseGenerationQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (record) => ({ artifact: 'chronicles-characters', uid: record.uid, ltuid: record.ltuid, lang: query.lang, format: 'png' }),
      fetch: (record) => fetchCharacters(hoyolab, record, query.lang),
      render: (input, record) => renderer.render(buildCharactersCard(input, record.uid, translator, query.lang)),
    });
    return sendImage(c, outcome, filename, config.imageTtl);
  };

  app.get('/characters', characters);
  app.get('/characters.png', characters);

  /**
   * GET /api/hoyolab/simuniverse/:kind/:index
   *
   * `index` is 1-based, most recent run first.
   */
  app.get('/simuniverse/:kind/:index', async (c) => {
    const mode = parseSimulatedUniverseKind(c.req.param('kind'));
    const index = parseIndex(c.req.param('index'));
    const filename = `simuniverse_${mode}_${index}.png`;
    if (c.req.method === 'HEAD') {
      return imageHeadResponse(filename, config.imageTtl);
    }

    const query = parseGenerationQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (record) => ({
        artifact: 'simulated-universe',
        uid: record.uid,
        ltuid: record.ltuid,
        mode,
        index,
        lang: query.lang,
        format: 'png',
      }),
      fetch: async (record): Promise<Result<SelectedRun, GenerationFailure>> => {
        const universe = await fetchSimulatedUniverse(hoyolab, record, query.lang, mode);
        return universe.ok ? selectRun(universe.value, index) : universe;
      },
      render: (run, record) =>
        renderer.render(
          run.mode === 'swarm'
            ? buildSwarmDisasterCard(run.record, run.striders, index, record.uid, translator, query.lang)
            : buildSimulatedUniverseCard(run.record, index, record.uid, translator, query.lang)
        ),
    });
    return sendImage(c, outcome, filename, config.imageTtl);
  });

  /**
   * GET /api/hoyolab/moc/:kind/:floor
   *
   * `floor` is 1-based, counted from the lowest cleared floor.
   */
  app.get('/moc/:kind/:floor', async (c) => {
    const mode = parseMemoryOfChaosKind(c.req.param('kind'));
    const floor = parseIndex(c.req.param('floor'));
    const filename = `moc_${mode}_${floor}.png`;
    if (c.req.method === 'HEAD') {
      return imageHeadResponse(filename, config.imageTtl);
    }

    const query = parseGenerationQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (record) => ({
        artifact: 'memory-of-chaos',
        uid: record.uid,
        ltuid: record.ltuid,
        mode,
        floor,
        lang: query.lang,
        format: 'png',
      }),
      fetch: async (record): Promise<Result<ChallengeFloor, GenerationFailure>> => {
        const hall = await fetchForgottenHall(hoyolab, record, query.lang, mode);
        return hall.ok ? selectFloor(hall.value, floor) : hall;
      },
      render: (selected, record) =>
        renderer.render(buildForgottenHallCard(selected, floor, record.uid, translator, query.lang)),
    });
    return sendImage(c, outcome, filename, config.imageTtl);
  });

  /**
   * GET /api/hoyolab/info/chronicles
   */
  app.get('/info/chronicles', gate, async (c) => {
    const query = parseGenerationQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (record) => ({ artifact: 'chronicles-overview', uid: record.uid, ltuid: record.ltuid, lang: query.lang, format: 'json' }),
      fetch: (record) => fetchOverview(hoyolab, record, query.lang),
      render: toJsonBytes,
    });
    return sendJson(c, outcome);
  });

  /**
   * GET /api/hoyolab/info/characters
   */
  app.get('/info/characters', gate, async (c) => {
    const query = parseGenerationQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (record) => ({ artifact: 'chronicles-characters', uid: record.uid, ltuid: record.ltuid, lang: query.lang, format: 'json' }),
      fetch: (record) => fetchCharacters(hoyolab, record, query.lang),
      render: toJsonBytes,
    });
    return sendJson(c, outcome);
  });

  /**
   * GET /api/hoyolab/info/simuniverse/:kind
   *
   * The runs of one period; swarm returns the whole swarm disaster payload.
   */
  app.get('/info/simuniverse/:kind', gate, async (c) => {
    const mode = parseSimulatedUniverseKind(c.req.param('kind'));
    const query = parseGenerationQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (record) => ({
        artifact: 'simulated-universe',
        uid: record.uid,
        ltuid: record.ltuid,
        mode,
        index: 0,
        lang: query.lang,
        format: 'json',
      }),
      fetch: async (record): Promise<Result<unknown, GenerationFailure>> => {
        const universe = await fetchSimulatedUniverse(hoyolab, record, query.lang, mode);
        if (!universe.ok) {
          return err(universe.error);
        }
        switch (universe.value.mode) {
          case 'current':
            return ok(universe.value.data.current_record);
          case 'previous':
            return ok(universe.value.data.last_record);
          case 'swarm':
            return ok(universe.value.data);
        }
      },
      render: toJsonBytes,
    });
    return sendJson(c, outcome);
  });

  /**
   * GET /api/hoyolab/info/moc/:kind
   */
  app.get('/info/moc/:kind', gate, async (c) => {
    const mode = parseMemoryOfChaosKind(c.req.param('kind'));
    const query = parseGenerationQuery(c.req.query());
    const outcome = await generate(query, {
      artifact: (record) => ({
        artifact: 'memory-of-chaos',
        uid: record.uid,
        ltuid: record.ltuid,
        mode,
        floor: 0,
        lang: query.lang,
        format: 'json',
      }),
      fetch: (record) => fetchForgottenHall(hoyolab, record, query.lang, mode),
      render: toJsonBytes,
    });
    return sendJson(c, outcome);
  });

  return app;
}
