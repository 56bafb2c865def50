/**
 * Memory Key-Value Store - in-process TTL store
 *
 * Used when Redis is disabled and as the store of every test. Entries
 * expire by absolute deadline; the map is bounded. When full, expired
 * entries are swept first and only then is the least recently used live
 * entry evicted. The store does not tell transaction records from cached
 * images, so a record can still be evicted before its TTL once
 * MEMORY_STORE_MAX_ENTRIES live entries are held.
 */

import type { KeyValueStore } from './interface.js';

interface MemoryEntry {
  value: Buffer;
  /** Epoch milliseconds after which the entry is absent */
  expiresAt: number;
}

/**
 * Memory store metrics
 */
export interface MemoryStoreMetrics {
  /** Current number of entries, expired ones included until swept */
  size: number;
  /** Maximum number of entries */
  maxEntries: number;
  hits: number;
  misses: number;
  expiredCount: number;
  evictedCount: number;
  /** Hit rate (0-1) */
  hitRate: number;
}

/**
 * Configuration options for the memory store
 */
export interface MemoryStoreOptions {
  /** Maximum number of entries (default: 10000) */
  maxEntries?: number;
  /** Clock in epoch milliseconds, injectable for tests (default: Date.now) */
  now?: () => number;
  /** Interval of the expired-entry sweep in ms, 0 disables it (default: 60000) */
  cleanupIntervalMs?: number;
}

export class MemoryKeyValueStore implements KeyValueStore {
  readonly kind = 'memory';

  private entries: Map<string, MemoryEntry> = new Map();
  private maxEntries: number;
  private now: () => number;
  private cleanupTimer?: ReturnType<typeof setInterval>;

  // Metrics tracking
  private hits: number = 0;
  private misses: number = 0;
  private expiredCount: number = 0;
  private evictedCount: number = 0;

  constructor(options: MemoryStoreOptions = {}) {
    this.maxEntries = options.maxEntries ?? 10000;
    this.now = options.now ?? Date.now;

    const cleanupIntervalMs = options.cleanupIntervalMs ?? 60000;
    if (cleanupIntervalMs > 0) {
      this.cleanupTimer = setInterval(() => {
        this.cleanup();
      }, cleanupIntervalMs);
      // The sweep must not keep the process alive on its own
      this.cleanupTimer.unref();
    }
  }

  async get(key: string): Promise<Buffer | null> {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return null;
    }

    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key);
      this.expiredCount++;
      this.misses++;
      return null;
    }

    // Move to end of map (MRU position in insertion-order iteration)
    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;

    return entry.value;
  }

  async setex(key: string, value: Buffer, ttlSeconds: number): Promise<void> {
    if (ttlSeconds <= 0) {
      this.entries.delete(key);
      return;
    }

    if (this.entries.size >= this.maxEntries && !this.entries.has(key)) {
      this.cleanup();
    }

    // Evict LRU entry if the store is still full
    if (this.entries.size >= this.maxEntries && !this.entries.has(key)) {
      const firstKey = this.entries.keys().next().value;
      if (firstKey !== undefined) {
        this.entries.delete(firstKey);
        this.evictedCount++;
      }
    }

    // Re-insert so an overwrite also becomes most recently used
    this.entries.delete(key);
    this.entries.set(key, {
      value: Buffer.from(value),
      expiresAt: this.now() + ttlSeconds * 1000,
    });
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async close(): Promise<void> {
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }
    this.entries.clear();
  }

  /**
   * Remove expired entries
   *
   * @returns Number of entries removed
   */
  cleanup(): number {
    const now = this.now();
    let removed = 0;

    for (const [key, entry] of this.entries) {
      if (now >= entry.expiresAt) {
        this.entries.delete(key);
        removed++;
        this.expiredCount++;
      }
    }

    return removed;
  }

  /**
   * Keys currently held, expired ones included until swept (for tests)
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  getMetrics(): MemoryStoreMetrics {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      maxEntries: this.maxEntries,
      hits: this.hits,
      misses: this.misses,
      expiredCount: this.expiredCount,
      evictedCount: this.evictedCount,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
    };
  }
}
