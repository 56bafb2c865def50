/**
 * Shared test fixtures and in-process fakes
 *
 * Upstream clients count their calls so tests can tell a cache hit from a
 * regeneration; the renderer returns a deterministic byte string instead
 * of a PNG.
 */

import { loadConfig, type AppConfig } from '../src/config.js';
import { Translator } from '../src/i18n/translator.js';
import type { Language } from '../src/i18n/languages.js';
import { MemoryKeyValueStore } from '../src/kv/memory.js';
import type { CardDocument } from '../src/render/document.js';
import type { CardRenderer } from '../src/render/renderer.js';
import { createServices, type Services } from '../src/services.js';
import type { UpstreamError } from '../src/upstream/errors.js';
import type { ChronicleResult, HoyolabClient, HoyolabCredentials } from '../src/upstream/hoyolab/client.js';
import type {
  ChronicleBasicInfo,
  ChronicleCharacters,
  ChronicleIndex,
  ChronicleNotes,
  ForgottenHall,
  RogueRecord,
  SimulatedUniverse,
  SwarmDisaster,
} from '../src/upstream/hoyolab/models.js';
import type { MihomoClient } from '../src/upstream/mihomo/client.js';
import type { MihomoPlayer } from '../src/upstream/mihomo/models.js';
import { err, ok, type Result } from '../src/utils/result.js';

export const TEST_SECRET = 'test-secret';

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return {
    ...loadConfig({ REDIS_ENABLED: 'false', VERBOSE_LOGGING: 'false' }),
    ...overrides,
  };
}

export const basicInfo: ChronicleBasicInfo = {
  nickname: 'Trailblazer',
  level: 70,
  region: 'prod_official_asia',
};

export const chronicleIndex: ChronicleIndex = {
  stats: {
    active_days: 420,
    avatar_num: 38,
    achievement_num: 512,
    chest_num: 1890,
    abyss_process: 'Stage 12 completed',
  },
  avatar_list: [],
};

export const notes: ChronicleNotes = {
  current_stamina: 120,
  max_stamina: 240,
  stamina_recover_time: 28800,
  accepted_epedition_num: 4,
  total_expedition_num: 4,
  current_train_score: 500,
  max_train_score: 500,
  current_rogue_score: 9000,
  max_rogue_score: 14000,
  weekly_cocoon_cnt: 1,
  weekly_cocoon_limit: 3,
};

export const characters: ChronicleCharacters = {
  avatar_list: [
    { id: 1001, level: 80, name: 'March 7th', element: 'ice', icon: 'march.png', rarity: 4, rank: 6, relics: [], ornaments: [] },
    { id: 1102, level: 80, name: 'Seele', element: 'quantum', icon: 'seele.png', rarity: 5, rank: 0, relics: [], ornaments: [] },
    { id: 1002, level: 70, name: 'Dan Heng', element: 'wind', icon: 'danheng.png', rarity: 4, rank: 2, relics: [], ornaments: [] },
  ],
};

export function rogueRecord(name: string): RogueRecord {
  return {
    name,
    finish_time: { year: 2024, month: 3, day: 9, hour: 7, minute: 5 },
    score: 1200,
    final_lineup: [{ id: 1102, level: 80, rarity: 5, element: 'quantum', rank: 0 }],
    buffs: [{ base_type: { id: 120, name: 'Preservation', cnt: 7 }, items: [] }],
    miracles: [{ id: 100, name: 'Dimension Reduction Dice' }],
    difficulty: 5,
    progress: 6,
  };
}

export const simulatedUniverse: SimulatedUniverse = {
  basic_info: { unlocked_buff_num: 300, unlocked_miracle_num: 120, unlocked_skill_points: 40 },
  current_record: {
    basic: { id: 2, finish_cnt: 2 },
    records: [rogueRecord('World 9 - latest'), rogueRecord('World 8 - earlier')],
  },
  last_record: {
    basic: { id: 1, finish_cnt: 0 },
    records: [],
  },
};

export const swarmDisaster: SwarmDisaster = {
  basic: {
    destiny: [
      { id: 1, level: 3, desc: 'Preservation' },
      { id: 4, level: 1 },
    ],
    cnt: { narrow: 3, miracle: 40, event: 25 },
  },
  detail: {
    records: [
      {
        name: 'Swarm run',
        finish_time: { year: 2024, month: 4, day: 1, hour: 22, minute: 30 },
        final_lineup: [],
        miracles: [],
        difficulty: 2,
      },
    ],
  },
};

function floor(name: string) {
  return {
    name,
    round_num: 5,
    star_num: 3,
    node_1: { avatars: [] },
    node_2: { avatars: [] },
  };
}

/** Floors as the service lists them: highest first */
export const forgottenHall: ForgottenHall = {
  schedule_id: 1010,
  star_num: 9,
  max_floor: 'Memory of Chaos (III)',
  battle_num: 3,
  has_data: true,
  all_floor_detail: [floor('Floor III'), floor('Floor II'), floor('Floor I')],
};

export const mihomoPlayer: MihomoPlayer = {
  player: {
    uid: '800000001',
    nickname: 'Stelle',
    level: 70,
    world_level: 6,
    friend_count: 12,
    signature: 'hello',
  },
  characters: [
    {
      id: '1102',
      name: 'Seele',
      rarity: 5,
      rank: 0,
      level: 80,
      promotion: 6,
      path: { id: 'Rogue', name: 'The Hunt' },
      element: { id: 'Quantum', name: 'Quantum' },
      skills: [],
      light_cone: null,
      relics: [],
      attributes: [],
      additions: [],
    },
  ],
};

type Call = { method: string; uid: number };

/**
 * HoYoLAB client returning fixed payloads, or a configured error
 */
export class FakeHoyolabClient implements HoyolabClient {
  calls: Call[] = [];
  failWith: UpstreamError | null = null;

  private respond<T>(method: string, credentials: HoyolabCredentials, value: T | null): ChronicleResult<T> {
    this.calls.push({ method, uid: credentials.uid });
    return Promise.resolve(this.failWith ? err(this.failWith) : ok(value));
  }

  getBasicInfo(credentials: HoyolabCredentials, _lang: Language): ChronicleResult<ChronicleBasicInfo> {
    return this.respond('getBasicInfo', credentials, basicInfo);
  }

  getIndex(credentials: HoyolabCredentials, _lang: Language): ChronicleResult<ChronicleIndex> {
    return this.respond('getIndex', credentials, chronicleIndex);
  }

  getNotes(credentials: HoyolabCredentials, _lang: Language): ChronicleResult<ChronicleNotes> {
    return this.respond('getNotes', credentials, notes);
  }

  getCharacters(credentials: HoyolabCredentials, _lang: Language): ChronicleResult<ChronicleCharacters> {
    return this.respond('getCharacters', credentials, characters);
  }

  getSimulatedUniverse(credentials: HoyolabCredentials, _lang: Language): ChronicleResult<SimulatedUniverse> {
    return this.respond('getSimulatedUniverse', credentials, simulatedUniverse);
  }

  getSwarmDisaster(credentials: HoyolabCredentials, _lang: Language): ChronicleResult<SwarmDisaster> {
    return this.respond('getSwarmDisaster', credentials, swarmDisaster);
  }

  getForgottenHall(
    credentials: HoyolabCredentials,
    _lang: Language,
    previous: boolean
  ): ChronicleResult<ForgottenHall> {
    return this.respond(previous ? 'getForgottenHall:previous' : 'getForgottenHall', credentials, forgottenHall);
  }
}

export class FakeMihomoClient implements MihomoClient {
  calls: Array<{ uid: number; lang: Language }> = [];
  failWith: UpstreamError | null = null;

  getPlayer(uid: number, lang: Language): Promise<Result<MihomoPlayer, UpstreamError>> {
    this.calls.push({ uid, lang });
    return Promise.resolve(this.failWith ? err(this.failWith) : ok(mihomoPlayer));
  }
}

/**
 * Renderer whose output is the document title, so tests can read it back
 */
export class FakeRenderer implements CardRenderer {
  rendered: CardDocument[] = [];
  cleared = 0;
  failWith: Error | null = null;

  async render(document: CardDocument): Promise<Buffer> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.rendered.push(document);
    return Buffer.from(`card:${document.title}`, 'utf8');
  }

  clear(): void {
    this.cleared++;
  }
}

export interface TestServices extends Services {
  store: MemoryKeyValueStore;
  hoyolab: FakeHoyolabClient;
  mihomo: FakeMihomoClient;
  renderer: FakeRenderer;
}

export function createTestServices(overrides: Partial<AppConfig> = {}): TestServices {
  const store = new MemoryKeyValueStore({ cleanupIntervalMs: 0 });
  const hoyolab = new FakeHoyolabClient();
  const mihomo = new FakeMihomoClient();
  const renderer = new FakeRenderer();
  const translator = Translator.fromDirectory();

  const services = createServices(testConfig(overrides), { store, hoyolab, mihomo, renderer, translator });
  return { ...services, store, hoyolab, mihomo, renderer };
}
