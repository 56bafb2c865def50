/**
 * Key-Value Store Module
 *
 * Selects the backend from configuration: Redis when enabled, otherwise
 * the in-process memory store.
 */

import type { AppConfig } from '../config.js';
import type { KeyValueStore } from './interface.js';
import { MemoryKeyValueStore } from './memory.js';
import { RedisKeyValueStore, createRedisConnection } from './redis.js';

export type { KeyValueStore } from './interface.js';
export { MemoryKeyValueStore } from './memory.js';
export type { MemoryStoreMetrics, MemoryStoreOptions } from './memory.js';
export { RedisKeyValueStore, createRedisConnection } from './redis.js';
export type { RedisConnection } from './redis.js';

/**
 * Build the store described by the configuration
 */
export function createKeyValueStore(config: AppConfig): KeyValueStore {
  if (config.redis.enabled) {
    if (config.verboseLogging) {
      console.log(`Store: Using Redis at ${redactUrl(config.redis.url)}`);
    }
    return new RedisKeyValueStore(createRedisConnection(config.redis));
  }

  if (config.verboseLogging) {
    console.log(`Store: Redis disabled, using memory store (max ${config.memoryStoreMaxEntries} entries)`);
  }
  return new MemoryKeyValueStore({ maxEntries: config.memoryStoreMaxEntries });
}

/**
 * Hide the password of a Redis URL before logging it
 */
export function redactUrl(url: string): string {
  try {
    const parsed = new URL(url);
    if (parsed.password) {
      parsed.password = '***';
    }
    return parsed.toString();
  } catch {
    return url;
  }
}
