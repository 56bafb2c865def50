/**
 * Fetch Step and Selection Tests
 */

import { describe, expect, it } from 'vitest';
import {
  fetchForgottenHall,
  fetchOverview,
  fetchSimulatedUniverse,
  selectFloor,
  selectRun,
} from '../../src/orchestration/hoyolab.js';
import { fetchPlayer, selectCharacter } from '../../src/orchestration/mihomo.js';
import type { HoyolabRecord } from '../../src/transactions/records.js';
import { upstreamError } from '../../src/upstream/errors.js';
import { ErrorCode } from '../../src/utils/errors.js';
import { err, ok } from '../../src/utils/result.js';
import {
  FakeHoyolabClient,
  FakeMihomoClient,
  basicInfo,
  chronicleIndex,
  forgottenHall,
  mihomoPlayer,
  notes,
  simulatedUniverse,
  swarmDisaster,
} from '../fixtures.js';

const record: HoyolabRecord = { kind: 'hoyolab', uid: 800000001, ltuid: 900001, ltoken: 'test-token' };

describe('fetchOverview', () => {
  it('should combine basic info, index and notes', async () => {
    const client = new FakeHoyolabClient();

    const result = await fetchOverview(client, record, 'en-US');

    expect(result).toEqual({ ok: true, value: { basicInfo, index: chronicleIndex, notes } });
    expect(client.calls.map((call) => call.method)).toEqual(['getBasicInfo', 'getIndex', 'getNotes']);
  });

  it('should fail when the notes are private', async () => {
    const client = new FakeHoyolabClient();
    const error = upstreamError('data-not-public', 'Data is not public', { retcode: 10102 });
    client.getNotes = () => Promise.resolve(err(error));

    const result = await fetchOverview(client, record, 'en-US');

    expect(result).toEqual({ ok: false, error: { kind: 'upstream', service: 'hoyolab', error } });
  });

  it('should report missing notes as incomplete', async () => {
    const client = new FakeHoyolabClient();
    client.getNotes = () => Promise.resolve(ok(null));

    const result = await fetchOverview(client, record, 'en-US');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'upstream', service: 'hoyolab', error: { kind: 'incomplete', message: 'notes' } },
    });
  });

  it('should fail on any other notes error', async () => {
    const client = new FakeHoyolabClient();
    const error = upstreamError('transient', 'HoYoLAB returned retcode -1: busy', { retcode: -1 });
    client.getNotes = () => Promise.resolve(err(error));

    const result = await fetchOverview(client, record, 'en-US');

    expect(result).toEqual({ ok: false, error: { kind: 'upstream', service: 'hoyolab', error } });
  });

  it('should report missing basic info as incomplete', async () => {
    const client = new FakeHoyolabClient();
    client.getBasicInfo = () => Promise.resolve(ok(null));

    const result = await fetchOverview(client, record, 'en-US');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'upstream', service: 'hoyolab', error: { kind: 'incomplete', message: 'basic info' } },
    });
  });
});

describe('selectRun', () => {
  it('should pick runs of the current period by 1-based index', async () => {
    const universe = await fetchSimulatedUniverse(new FakeHoyolabClient(), record, 'en-US', 'current');
    if (!universe.ok) throw new Error('fetch failed');

    const first = selectRun(universe.value, 1);
    const second = selectRun(universe.value, 2);

    expect(first.ok && first.value.record.name).toBe('World 9 - latest');
    expect(second.ok && second.value.record.name).toBe('World 8 - earlier');
  });

  it('should reject an index past the last run', () => {
    const result = selectRun({ mode: 'current', data: simulatedUniverse }, 3);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'invalid-parameter',
        code: ErrorCode.HOYOLAB_SIMU_INVALID_INDEX,
        message: 'Index 3 is out of range, 2 available',
      },
    });
  });

  it('should report a period without runs', () => {
    const result = selectRun({ mode: 'previous', data: simulatedUniverse }, 1);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'invalid-parameter', code: ErrorCode.HOYOLAB_SIMU_NO_RECORDS, message: 'No records found' },
    });
  });

  it('should read swarm disaster runs from their own payload', async () => {
    const client = new FakeHoyolabClient();
    const universe = await fetchSimulatedUniverse(client, record, 'en-US', 'swarm');
    if (!universe.ok) throw new Error('fetch failed');

    const result = selectRun(universe.value, 1);

    expect(result).toEqual({
      ok: true,
      value: { mode: 'swarm', record: swarmDisaster.detail.records[0], striders: swarmDisaster.basic.destiny },
    });
    expect(client.calls.map((call) => call.method)).toEqual(['getSwarmDisaster']);
  });
});

describe('selectFloor', () => {
  it('should count floors from the lowest', () => {
    const first = selectFloor(forgottenHall, 1);
    const third = selectFloor(forgottenHall, 3);

    expect(first.ok && first.value.name).toBe('Floor I');
    expect(third.ok && third.value.name).toBe('Floor III');
  });

  it('should reject a floor above the highest cleared', () => {
    const result = selectFloor(forgottenHall, 4);

    expect(result).toEqual({
      ok: false,
      error: {
        kind: 'invalid-parameter',
        code: ErrorCode.HOYOLAB_SIMU_INVALID_INDEX,
        message: 'Index 4 is out of range, 3 available',
      },
    });
  });

  it('should report any floor of a period without cleared floors as out of range', () => {
    const result = selectFloor({ ...forgottenHall, all_floor_detail: [] }, 1);

    expect(result.ok).toBe(false);
    expect(!result.ok && result.error).toEqual({
      kind: 'invalid-parameter',
      code: ErrorCode.HOYOLAB_SIMU_INVALID_INDEX,
      message: 'Index 1 is out of range, 0 available',
    });
  });

  it('should ask for the previous period when requested', async () => {
    const client = new FakeHoyolabClient();

    await fetchForgottenHall(client, record, 'en-US', 'previous');

    expect(client.calls).toEqual([{ method: 'getForgottenHall:previous', uid: 800000001 }]);
  });
});

describe('Mihomo selection', () => {
  it('should use a snapshot without calling the client', async () => {
    const client = new FakeMihomoClient();

    const result = await fetchPlayer(client, { uid: 800000001, snapshot: mihomoPlayer }, 'en-US');

    expect(result).toEqual({ ok: true, value: mihomoPlayer });
    expect(client.calls).toEqual([]);
  });

  it('should look up a UID without a snapshot', async () => {
    const client = new FakeMihomoClient();

    await fetchPlayer(client, { uid: 800000001, snapshot: null }, 'ja-JP');

    expect(client.calls).toEqual([{ uid: 800000001, lang: 'ja-JP' }]);
  });

  it('should map a lookup failure to the Mihomo service', async () => {
    const client = new FakeMihomoClient();
    client.failWith = upstreamError('account-not-found', 'UID not found', { status: 404 });

    const result = await fetchPlayer(client, { uid: 1, snapshot: null }, 'en-US');

    expect(result).toEqual({
      ok: false,
      error: { kind: 'upstream', service: 'mihomo', error: client.failWith },
    });
  });

  it('should pick a displayed character by slot', () => {
    const result = selectCharacter(mihomoPlayer, 1);

    expect(result.ok && result.value.name).toBe('Seele');
  });

  it('should reject an empty slot', () => {
    expect(selectCharacter(mihomoPlayer, 2)).toEqual({
      ok: false,
      error: {
        kind: 'invalid-parameter',
        code: ErrorCode.MIHOMO_INVALID_CHARACTER,
        message: 'Character 2 is not on display, 1 available',
      },
    });
  });
});
