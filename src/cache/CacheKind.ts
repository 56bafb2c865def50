/**
 * Cache Key Builder
 *
 * Builds human-readable generation cache keys from a closed set of kinds
 * plus a parameter suffix. No hashing is done, so a key read in
 * `redis-cli` tells which card it holds.
 *
 * Every input that changes the output bytes must be part of the suffix,
 * otherwise two different requests share one entry. The typed builders
 * below take exactly those inputs per artifact; prefer them over calling
 * makeCacheKey() with a hand-written suffix.
 */

import type { Language } from '../i18n/languages.js';

export const CacheKind = {
  MIHOMO: 'mihomo',
  MIHOMO_PLAYER: 'mihomo:player',
  HY_CHRONICLES: 'hoyolab:chronicles',
  HY_MOC: 'hoyolab:moc',
  HY_SIMUNIVERSE: 'hoyolab:simulated_universe',
} as const;

export type CacheKind = (typeof CacheKind)[keyof typeof CacheKind];

const CACHE_KINDS: ReadonlySet<string> = new Set(Object.values(CacheKind));

/**
 * Thrown when a key is requested for a kind outside the enumeration.
 * Only reachable through a programming error, never through client input.
 */
export class InvalidCacheKindError extends Error {
  constructor(public kind: string) {
    super(`Invalid cache kind: ${kind}`);
    this.name = 'InvalidCacheKindError';
  }
}

export function isCacheKind(kind: string): kind is CacheKind {
  return CACHE_KINDS.has(kind);
}

/**
 * Make a cache key from a kind and an optional suffix
 *
 * @returns `kind` alone, or `kind:suffix`
 * @throws {InvalidCacheKindError} If the kind is not a member of CacheKind
 *
 * @example
 * ```ts
 * makeCacheKey(CacheKind.HY_MOC, '800000001:900001:current:FLOOR_1:en-US');
 * // 'hoyolab:moc:800000001:900001:current:FLOOR_1:en-US'
 * ```
 */
export function makeCacheKey(kind: string, suffix?: string): string {
  if (!isCacheKind(kind)) {
    throw new InvalidCacheKindError(kind);
  }

  return suffix ? `${kind}:${suffix}` : kind;
}

/** Output format of a cached artifact; JSON entries get a trailing segment */
export type ArtifactFormat = 'png' | 'json';

export type SimulatedUniverseMode = 'current' | 'previous' | 'swarm';
export type MemoryOfChaosMode = 'current' | 'previous';

/**
 * Everything that identifies one cached artifact, per artifact type
 */
export type ArtifactKey =
  | {
      artifact: 'chronicles-overview' | 'chronicles-characters';
      uid: number;
      ltuid: number;
      lang: Language;
      format: ArtifactFormat;
    }
  | {
      artifact: 'simulated-universe';
      uid: number;
      ltuid: number;
      mode: SimulatedUniverseMode;
      /** 1-based record index, JSON entries use 0 for "all records" */
      index: number;
      lang: Language;
      format: ArtifactFormat;
    }
  | {
      artifact: 'memory-of-chaos';
      uid: number;
      ltuid: number;
      mode: MemoryOfChaosMode;
      /** 1-based floor as requested, JSON entries use 0 for "all floors" */
      floor: number;
      lang: Language;
      format: ArtifactFormat;
    }
  | {
      artifact: 'mihomo-character';
      uid: number;
      /** 1-based character slot */
      character: number;
      lang: Language;
      detailed: boolean;
    }
  | {
      artifact: 'mihomo-player';
      uid: number;
      lang: Language;
      format: ArtifactFormat;
    };

function withFormat(suffix: string, format: ArtifactFormat): string {
  return format === 'json' ? `${suffix}:JSON` : suffix;
}

/**
 * Build the generation cache key of an artifact
 *
 * @example
 * ```ts
 * buildCacheKey({ artifact: 'chronicles-overview', uid: 800000001, ltuid: 900001, lang: 'en-US', format: 'png' });
 * // 'hoyolab:chronicles:800000001:900001:overview:en-US'
 * ```
 */
export function buildCacheKey(key: ArtifactKey): string {
  switch (key.artifact) {
    case 'chronicles-overview':
      return makeCacheKey(
        CacheKind.HY_CHRONICLES,
        withFormat(`${key.uid}:${key.ltuid}:overview:${key.lang}`, key.format)
      );
    case 'chronicles-characters':
      return makeCacheKey(
        CacheKind.HY_CHRONICLES,
        withFormat(`${key.uid}:${key.ltuid}:characters:${key.lang}`, key.format)
      );
    case 'simulated-universe':
      return makeCacheKey(
        CacheKind.HY_SIMUNIVERSE,
        withFormat(`${key.uid}:${key.ltuid}:${key.mode}:INDEX_${key.index}:${key.lang}`, key.format)
      );
    case 'memory-of-chaos':
      return makeCacheKey(
        CacheKind.HY_MOC,
        withFormat(`${key.uid}:${key.ltuid}:${key.mode}:FLOOR_${key.floor}:${key.lang}`, key.format)
      );
    case 'mihomo-character':
      return makeCacheKey(
        CacheKind.MIHOMO,
        `${key.uid}:${key.character}:${key.lang}:DETAILED_${key.detailed ? 1 : 0}`
      );
    case 'mihomo-player':
      return makeCacheKey(CacheKind.MIHOMO_PLAYER, withFormat(`${key.uid}:${key.lang}`, key.format));
  }
}
