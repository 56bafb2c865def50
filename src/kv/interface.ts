/**
 * Key-value store contract shared by the transaction registry and the
 * generation cache.
 *
 * Every command is independently atomic; nothing in the service spans
 * multiple keys, so no transactions are required from a backend.
 *
 * @example
 * ```ts
 * const store = createKeyValueStore(config);
 * await store.setex('qingque:transactions:abc', Buffer.from('{}'), 300);
 * const bytes = await store.get('qingque:transactions:abc');
 * ```
 */
export interface KeyValueStore {
  /** Backend name reported by the health endpoint */
  readonly kind: 'memory' | 'redis';

  /**
   * Read a value
   *
   * @returns The stored bytes, or null when missing or expired
   */
  get(key: string): Promise<Buffer | null>;

  /**
   * Write a value with an expiry, replacing any previous value
   *
   * A TTL of zero or less leaves the key absent.
   *
   * @param ttlSeconds - Seconds until the key expires
   */
  setex(key: string, value: Buffer, ttlSeconds: number): Promise<void>;

  /**
   * Remove a key; missing keys are ignored
   */
  delete(key: string): Promise<void>;

  /**
   * Release connections and timers
   */
  close(): Promise<void>;
}
