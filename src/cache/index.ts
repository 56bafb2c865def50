/**
 * Cache Module
 *
 * Cache-key construction and the token-scoped generation cache.
 */

export {
  CacheKind,
  InvalidCacheKindError,
  isCacheKind,
  makeCacheKey,
  buildCacheKey,
} from './CacheKind.js';
export type {
  ArtifactFormat,
  ArtifactKey,
  SimulatedUniverseMode,
  MemoryOfChaosMode,
} from './CacheKind.js';

export { GenerationCache } from './GenerationCache.js';
