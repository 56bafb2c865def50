/**
 * Redis Key-Value Store
 *
 * Uses binary-safe GET and SET ... EX so rendered PNG bytes are stored
 * without an encoding round-trip. Errors propagate to the caller; the
 * generation cache decides to degrade a failed read into a miss.
 */

import { Redis } from 'ioredis';
import type { RedisConfig } from '../config.js';
import type { KeyValueStore } from './interface.js';

/**
 * Commands the store needs from a Redis connection; an ioredis client
 * satisfies it, and tests can pass a fake
 */
export interface RedisConnection {
  getBuffer(key: string): Promise<Buffer | null>;
  set(key: string, value: Buffer, secondsToken: 'EX', seconds: number): Promise<unknown>;
  del(key: string): Promise<number>;
  quit(): Promise<unknown>;
}

/**
 * Create an ioredis client for the store
 *
 * The connection is lazy: the first command connects, so a server without
 * Redis still starts and reports failures per request.
 */
export function createRedisConnection(config: RedisConfig): Redis {
  const client = new Redis(config.url, {
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    connectTimeout: config.connectTimeoutMs,
    retryStrategy: (times) => Math.min(times * 200, 2000),
  });

  client.on('error', (error: Error) => {
    console.error('Store: Redis connection error:', error.message);
  });

  return client;
}

export class RedisKeyValueStore implements KeyValueStore {
  readonly kind = 'redis';

  constructor(private client: RedisConnection) {}

  async get(key: string): Promise<Buffer | null> {
    return this.client.getBuffer(key);
  }

  async setex(key: string, value: Buffer, ttlSeconds: number): Promise<void> {
    // Redis rejects a non-positive EX, and a zero TTL means "already expired"
    if (ttlSeconds <= 0) {
      await this.client.del(key);
      return;
    }
    await this.client.set(key, value, 'EX', Math.floor(ttlSeconds));
  }

  async delete(key: string): Promise<void> {
    await this.client.del(key);
  }

  async close(): Promise<void> {
    await this.client.quit();
  }
}
