/**
 * HoYoLAB battle chronicle client
 *
 * Signs each request with a dynamic secret, sends the account cookies and
 * unwraps the `{retcode, message, data}` envelope into a Result.
 */

import { createHash, randomInt } from 'node:crypto';
import type { ZodType, ZodTypeDef } from 'zod';
import type { Language } from '../../i18n/languages.js';
import { toHoyolabLanguage } from '../../i18n/languages.js';
import { err, ok, type Result } from '../../utils/result.js';
import { upstreamError, type UpstreamError } from '../errors.js';
import { fetchJson, type FetchFunction } from '../http.js';
import {
  BasicInfoSchema,
  CharactersSchema,
  EnvelopeSchema,
  ForgottenHallSchema,
  IndexSchema,
  NotesSchema,
  SimulatedUniverseSchema,
  SwarmDisasterSchema,
  type ChronicleBasicInfo,
  type ChronicleCharacters,
  type ChronicleIndex,
  type ChronicleNotes,
  type ForgottenHall,
  type SimulatedUniverse,
  type SwarmDisaster,
} from './models.js';

export interface HoyolabCredentials {
  uid: number;
  ltuid: number;
  ltoken: string;
  lcookie?: string;
  lmid?: string;
}

/**
 * Every call resolves to the payload, `null` when the service answered
 * without data, or an UpstreamError.
 */
export type ChronicleResult<T> = Promise<Result<T | null, UpstreamError>>;

export interface HoyolabClient {
  getBasicInfo(credentials: HoyolabCredentials, lang: Language): ChronicleResult<ChronicleBasicInfo>;
  getIndex(credentials: HoyolabCredentials, lang: Language): ChronicleResult<ChronicleIndex>;
  getNotes(credentials: HoyolabCredentials, lang: Language): ChronicleResult<ChronicleNotes>;
  getCharacters(credentials: HoyolabCredentials, lang: Language): ChronicleResult<ChronicleCharacters>;
  getSimulatedUniverse(credentials: HoyolabCredentials, lang: Language): ChronicleResult<SimulatedUniverse>;
  getSwarmDisaster(credentials: HoyolabCredentials, lang: Language): ChronicleResult<SwarmDisaster>;
  getForgottenHall(
    credentials: HoyolabCredentials,
    lang: Language,
    previous: boolean
  ): ChronicleResult<ForgottenHall>;
}

export interface HoyolabClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFunction;
  now?: () => number;
}

const DS_SALT = '6s25p5ox5y14umn1p61aqyyvbvvl3lrt';
const DS_ALPHABET = 'abcdefghijklmnopqrstuvwxyz0123456789';
const APP_VERSION = '1.5.0';
const CLIENT_TYPE = '5';

const SERVERS: Record<string, string> = {
  '1': 'prod_gf_cn',
  '2': 'prod_gf_cn',
  '5': 'prod_qd_cn',
  '6': 'prod_official_usa',
  '7': 'prod_official_eur',
  '8': 'prod_official_asia',
  '9': 'prod_official_cht',
};

/**
 * Game server of an account, derived from the first digit of its UID
 *
 * @returns The server id, or null for a UID no server owns
 */
export function serverForUid(uid: number): string | null {
  const first = String(uid).charAt(0);
  return SERVERS[first] ?? null;
}

/**
 * Dynamic secret header value: `{time},{random},{md5}`
 */
export function generateDynamicSecret(
  nowMs: number,
  random: string = randomString(6)
): string {
  const t = Math.floor(nowMs / 1000);
  const hash = createHash('md5').update(`salt=${DS_SALT}&t=${t}&r=${random}`).digest('hex');
  return `${t},${random},${hash}`;
}

function randomString(length: number): string {
  let out = '';
  for (let i = 0; i < length; i++) {
    out += DS_ALPHABET.charAt(randomInt(DS_ALPHABET.length));
  }
  return out;
}

/**
 * Cookie header for an account. `v2_` tokens use the v2 cookie names.
 */
export function buildCookie(credentials: HoyolabCredentials): string {
  const parts: string[] = [];

  if (credentials.ltoken.startsWith('v2_')) {
    parts.push(`ltuid_v2=${credentials.ltuid}`, `ltoken_v2=${credentials.ltoken}`);
    if (credentials.lmid) {
      parts.push(`ltmid_v2=${credentials.lmid}`);
    }
  } else {
    parts.push(`ltuid=${credentials.ltuid}`, `ltoken=${credentials.ltoken}`);
  }

  if (credentials.lcookie) {
    parts.push(`cookie_token=${credentials.lcookie}`, `account_id=${credentials.ltuid}`);
  }

  return parts.join('; ');
}

/**
 * Map a non-zero retcode to an UpstreamError
 */
export function mapRetcode(retcode: number, message: string): UpstreamError {
  switch (retcode) {
    case -100:
    case 10001:
    case 10103:
      return upstreamError('invalid-credentials', message || 'Invalid cookies', { retcode });
    case 10102:
      return upstreamError('data-not-public', message || 'Data is not public', { retcode });
    case 1009:
      return upstreamError('account-not-found', message || 'Account not found', { retcode });
    default:
      return upstreamError('transient', `HoYoLAB returned retcode ${retcode}: ${message}`, { retcode });
  }
}

export class HttpHoyolabClient implements HoyolabClient {
  private baseUrl: string;
  private timeoutMs: number;
  private fetchFn?: FetchFunction;
  private now: () => number;

  constructor(options: HoyolabClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.fetchFn = options.fetchFn;
    this.now = options.now ?? Date.now;
  }

  getBasicInfo(credentials: HoyolabCredentials, lang: Language): ChronicleResult<ChronicleBasicInfo> {
    return this.request('/role/basicInfo', BasicInfoSchema, credentials, lang);
  }

  getIndex(credentials: HoyolabCredentials, lang: Language): ChronicleResult<ChronicleIndex> {
    return this.request('/index', IndexSchema, credentials, lang);
  }

  getNotes(credentials: HoyolabCredentials, lang: Language): ChronicleResult<ChronicleNotes> {
    return this.request('/note', NotesSchema, credentials, lang);
  }

  getCharacters(credentials: HoyolabCredentials, lang: Language): ChronicleResult<ChronicleCharacters> {
    return this.request('/avatar/info', CharactersSchema, credentials, lang);
  }

  getSimulatedUniverse(credentials: HoyolabCredentials, lang: Language): ChronicleResult<SimulatedUniverse> {
    return this.request('/rogue', SimulatedUniverseSchema, credentials, lang, {
      schedule_type: '3',
      need_detail: 'true',
    });
  }

  getSwarmDisaster(credentials: HoyolabCredentials, lang: Language): ChronicleResult<SwarmDisaster> {
    return this.request('/rogue_locust', SwarmDisasterSchema, credentials, lang, {
      need_detail: 'true',
    });
  }

  getForgottenHall(
    credentials: HoyolabCredentials,
    lang: Language,
    previous: boolean
  ): ChronicleResult<ForgottenHall> {
    return this.request('/challenge', ForgottenHallSchema, credentials, lang, {
      schedule_type: previous ? '2' : '1',
      need_all: 'true',
    });
  }

  private async request<T>(
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    credentials: HoyolabCredentials,
    lang: Language,
    params: Record<string, string> = {}
  ): ChronicleResult<T> {
    const server = serverForUid(credentials.uid);
    if (!server) {
      return err(upstreamError('account-not-found', `No game server for UID ${credentials.uid}`));
    }

    const query = new URLSearchParams({ server, role_id: String(credentials.uid), ...params });
    const language = toHoyolabLanguage(lang);

    const response = await fetchJson(`${this.baseUrl}${path}?${query.toString()}`, {
      timeoutMs: this.timeoutMs,
      fetchFn: this.fetchFn,
      headers: {
        Accept: 'application/json',
        Cookie: buildCookie(credentials),
        DS: generateDynamicSecret(this.now()),
        Origin: 'https://act.hoyolab.com',
        Referer: 'https://act.hoyolab.com/',
        'x-rpc-app_version': APP_VERSION,
        'x-rpc-client_type': CLIENT_TYPE,
        'x-rpc-language': language,
      },
    });

    if (!response.ok) {
      return response;
    }

    const envelope = EnvelopeSchema.safeParse(response.value);
    if (!envelope.success) {
      return err(upstreamError('transient', `HoYoLAB ${path} returned an unexpected body`));
    }

    const { retcode, message, data } = envelope.data;
    if (retcode !== 0) {
      return err(mapRetcode(retcode, message));
    }

    if (data === null || data === undefined) {
      return ok(null);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      const field = parsed.error.issues[0]?.path.join('.') || 'data';
      return err(upstreamError('incomplete', `HoYoLAB ${path} is missing ${field}`));
    }

    return ok(parsed.data);
  }
}
