/**
 * Transaction Registry - opaque tokens mapped to credential records
 *
 * A token is 32 random bytes, hex-encoded. The record is stored as JSON at
 * `{namespace}:{token}` with a TTL and is never updated afterwards; expiry
 * is the only way a token stops resolving.
 */

import { randomBytes } from 'node:crypto';
import type { ZodType, ZodTypeDef } from 'zod';
import type { KeyValueStore } from '../kv/interface.js';
import type { CredentialRecord } from './records.js';

const TOKEN_PATTERN = /^[0-9a-f]{64}$/;

export function isWellFormedToken(token: string): boolean {
  return TOKEN_PATTERN.test(token);
}

export class TransactionRegistry {
  constructor(
    private store: KeyValueStore,
    private namespace: string
  ) {}

  keyFor(token: string): string {
    return `${this.namespace}:${token}`;
  }

  /**
   * Store a record under a fresh token
   *
   * @param ttl - Seconds until the token expires
   * @returns The 64-character hex token
   */
  async create(record: CredentialRecord, ttl: number): Promise<string> {
    const token = randomBytes(32).toString('hex');
    await this.store.setex(this.keyFor(token), Buffer.from(JSON.stringify(record), 'utf8'), ttl);
    return token;
  }

  /**
   * Resolve a token to a record of the requested kind
   *
   * @returns The record, or null when the token is malformed, unknown,
   * expired, unreadable or bound to another kind of record
   *
   * @example
   * ```ts
   * const record = await registry.get(token, HoyolabRecordSchema);
   * ```
   */
  async get<T extends CredentialRecord>(
    token: string,
    schema: ZodType<T, ZodTypeDef, unknown>
  ): Promise<T | null> {
    if (!isWellFormedToken(token)) {
      return null;
    }

    const raw = await this.store.get(this.keyFor(token));
    if (!raw) {
      return null;
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(raw.toString('utf8'));
    } catch {
      console.error(`TransactionRegistry: record for token ${token.slice(0, 8)}... is not valid JSON`);
      return null;
    }

    const parsed = schema.safeParse(decoded);
    return parsed.success ? parsed.data : null;
  }
}
