/**
 * Mihomo client: public player snapshots by UID, no credentials needed
 */

import type { Language } from '../../i18n/languages.js';
import { toMihomoLanguage } from '../../i18n/languages.js';
import { err, ok, type Result } from '../../utils/result.js';
import { upstreamError, type UpstreamError } from '../errors.js';
import { fetchJson, type FetchFunction } from '../http.js';
import { MihomoPlayerSchema, type MihomoPlayer } from './models.js';

export interface MihomoClient {
  getPlayer(uid: number, lang: Language): Promise<Result<MihomoPlayer, UpstreamError>>;
}

export interface MihomoClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetchFn?: FetchFunction;
}

const USER_AGENT = 'starrail-card-gateway';

function mapStatus(status: number): UpstreamError | null {
  if (status === 400 || status === 404) {
    return upstreamError('account-not-found', 'UID not found', { status });
  }
  return null;
}

export class HttpMihomoClient implements MihomoClient {
  constructor(private options: MihomoClientOptions) {}

  async getPlayer(uid: number, lang: Language): Promise<Result<MihomoPlayer, UpstreamError>> {
    const query = new URLSearchParams({ lang: toMihomoLanguage(lang), version: 'v2' });
    const response = await fetchJson(`${this.options.baseUrl}/sr_info_parsed/${uid}?${query.toString()}`, {
      timeoutMs: this.options.timeoutMs,
      fetchFn: this.options.fetchFn,
      headers: { Accept: 'application/json', 'User-Agent': USER_AGENT },
      mapStatus,
    });

    if (!response.ok) {
      return response;
    }

    const parsed = MihomoPlayerSchema.safeParse(response.value);
    if (!parsed.success) {
      const field = parsed.error.issues[0]?.path.join('.') || 'body';
      return err(upstreamError('incomplete', `Mihomo player payload is missing ${field}`));
    }

    return ok(parsed.data);
  }
}
