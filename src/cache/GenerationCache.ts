/**
 * Generation Cache - token-scoped storage of rendered artifacts
 *
 * Entries live at `{namespace}:{token}:{cacheKey}` on the same store as the
 * credential records. They are derived data: a miss only costs a
 * regeneration, so a failing read is logged and reported as a miss.
 *
 * Writes are unconditional and last-writer-wins. Two requests missing the
 * same key concurrently both render and both write; rendering is
 * deterministic, so the surviving bytes are the same either way.
 */

import type { KeyValueStore } from '../kv/interface.js';

export class GenerationCache {
  constructor(
    private store: KeyValueStore,
    private namespace: string
  ) {}

  /**
   * Full store key of an entry
   */
  keyFor(token: string, cacheKey: string): string {
    return `${this.namespace}:${token}:${cacheKey}`;
  }

  /**
   * Read an artifact
   *
   * @returns The bytes, or null on a miss, an expired entry or a store failure
   */
  async get(token: string, cacheKey: string): Promise<Buffer | null> {
    try {
      return await this.store.get(this.keyFor(token, cacheKey));
    } catch (error) {
      console.error(`GenerationCache: read failed for ${cacheKey}, treating as miss:`, error);
      return null;
    }
  }

  /**
   * Store an artifact, replacing any previous bytes
   *
   * @param ttl - Seconds until the entry expires
   */
  set(token: string, cacheKey: string, data: Buffer, ttl: number): Promise<void> {
    // Issue the write before returning so callers that do not await it
    // still have the command in flight
    return this.store.setex(this.keyFor(token, cacheKey), data, ttl);
  }
}
