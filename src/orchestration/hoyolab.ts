/**
 * HoYoLAB fetch steps
 *
 * Each step calls the client, checks that the data needed for the artifact
 * is present and selects the requested record. Failures come back as
 * GenerationFailure values for the pipeline.
 */

import type { MemoryOfChaosMode, SimulatedUniverseMode } from '../cache/index.js';
import type { Language } from '../i18n/languages.js';
import type { OverviewInput } from '../render/cards/hoyolab.js';
import type { HoyolabRecord } from '../transactions/records.js';
import { upstreamError } from '../upstream/errors.js';
import type { HoyolabClient } from '../upstream/hoyolab/client.js';
import type {
  ChallengeFloor,
  ChronicleCharacters,
  ForgottenHall,
  PathStrider,
  RogueRecord,
  SimulatedUniverse,
  SwarmDisaster,
  SwarmRecord,
} from '../upstream/hoyolab/models.js';
import { ErrorCode } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';
import { invalidParameter, upstreamFailure, type GenerationFailure } from './failures.js';

type Step<T> = Promise<Result<T, GenerationFailure>>;

function incomplete(what: string): GenerationFailure {
  return upstreamFailure('hoyolab', upstreamError('incomplete', what));
}

function noRecords(): GenerationFailure {
  return invalidParameter(ErrorCode.HOYOLAB_SIMU_NO_RECORDS, 'No records found');
}

function indexOutOfRange(index: number, count: number): GenerationFailure {
  return invalidParameter(
    ErrorCode.HOYOLAB_SIMU_INVALID_INDEX,
    `Index ${index} is out of range, ${count} available`
  );
}

/**
 * Profile payload: basic info, index stats and real-time notes
 */
export async function fetchOverview(client: HoyolabClient, record: HoyolabRecord, lang: Language): Step<OverviewInput> {
  const [basicInfo, index, notes] = await Promise.all([
    client.getBasicInfo(record, lang),
    client.getIndex(record, lang),
    client.getNotes(record, lang),
  ]);

  if (!basicInfo.ok) return err(upstreamFailure('hoyolab', basicInfo.error));
  if (!index.ok) return err(upstreamFailure('hoyolab', index.error));
  if (!notes.ok) return err(upstreamFailure('hoyolab', notes.error));
  if (!basicInfo.value) return err(incomplete('basic info'));
  if (!index.value) return err(incomplete('index'));
  if (!notes.value) return err(incomplete('notes'));

  return ok({
    basicInfo: basicInfo.value,
    index: index.value,
    notes: notes.value,
  });
}

export async function fetchCharacters(
  client: HoyolabClient,
  record: HoyolabRecord,
  lang: Language
): Step<ChronicleCharacters> {
  const characters = await client.getCharacters(record, lang);
  if (!characters.ok) return err(upstreamFailure('hoyolab', characters.error));
  if (!characters.value) return err(incomplete('characters'));
  return ok(characters.value);
}

export type SimulatedUniverseData =
  | { mode: 'current' | 'previous'; data: SimulatedUniverse }
  | { mode: 'swarm'; data: SwarmDisaster };

export async function fetchSimulatedUniverse(
  client: HoyolabClient,
  record: HoyolabRecord,
  lang: Language,
  mode: SimulatedUniverseMode
): Step<SimulatedUniverseData> {
  if (mode === 'swarm') {
    const swarm = await client.getSwarmDisaster(record, lang);
    if (!swarm.ok) return err(upstreamFailure('hoyolab', swarm.error));
    if (!swarm.value) return err(incomplete('swarm disaster'));
    return ok({ mode, data: swarm.value });
  }

  const universe = await client.getSimulatedUniverse(record, lang);
  if (!universe.ok) return err(upstreamFailure('hoyolab', universe.error));
  if (!universe.value) return err(incomplete('simulated universe'));
  return ok({ mode, data: universe.value });
}

export type SelectedRun =
  | { mode: 'current' | 'previous'; record: RogueRecord }
  | { mode: 'swarm'; record: SwarmRecord; striders: PathStrider[] };

/**
 * Pick the 1-based run of a period, most recent first as the service lists them
 */
export function selectRun(universe: SimulatedUniverseData, index: number): Result<SelectedRun, GenerationFailure> {
  if (universe.mode === 'swarm') {
    const records = universe.data.detail.records;
    if (records.length === 0) return err(noRecords());
    const record = records[index - 1];
    if (!record) return err(indexOutOfRange(index, records.length));
    return ok({ mode: 'swarm' as const, record, striders: universe.data.basic.destiny });
  }

  const period = universe.mode === 'current' ? universe.data.current_record : universe.data.last_record;
  if (period.records.length === 0) return err(noRecords());
  const record = period.records[index - 1];
  if (!record) return err(indexOutOfRange(index, period.records.length));
  return ok({ mode: universe.mode, record });
}

export async function fetchForgottenHall(
  client: HoyolabClient,
  record: HoyolabRecord,
  lang: Language,
  mode: MemoryOfChaosMode
): Step<ForgottenHall> {
  const hall = await client.getForgottenHall(record, lang, mode === 'previous');
  if (!hall.ok) return err(upstreamFailure('hoyolab', hall.error));
  if (!hall.value) return err(incomplete('memory of chaos'));
  return ok(hall.value);
}

/**
 * Pick a floor by its 1-based number
 *
 * The service lists floors from the highest cleared down, so floor `n` sits
 * at `floors.length - n`.
 */
export function selectFloor(hall: ForgottenHall, floor: number): Result<ChallengeFloor, GenerationFailure> {
  const floors = hall.all_floor_detail;
  const position = floors.length - floor;
  const selected = position >= 0 ? floors[position] : undefined;
  if (!selected) return err(indexOutOfRange(floor, floors.length));
  return ok(selected);
}
