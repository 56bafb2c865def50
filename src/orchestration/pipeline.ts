/**
 * Generation pipeline
 *
 *   resolve -> cache lookup -> fetch -> render -> cache store -> served
 *
 * Each step can end the run with a GenerationFailure. Requests without a
 * token (Mihomo by raw UID) carry no cache scope and always regenerate.
 * There is no request coalescing: concurrent misses on the same key each
 * run the full pipeline.
 */

import type { GenerationCache } from '../cache/index.js';
import type { Result } from '../utils/result.js';
import type { GenerationFailure } from './failures.js';

export interface CacheScope<S> {
  cache: GenerationCache;
  token: string;
  /** Cache key of the artifact, built from the resolved subject */
  key: (subject: S) => string;
  ttl: number;
  /** Skip the lookup; the result is still stored */
  bypass: boolean;
}

export interface GenerationRequest<S, I> {
  resolve: () => Promise<S | null>;
  scope?: CacheScope<S>;
  fetch: (subject: S) => Promise<Result<I, GenerationFailure>>;
  render: (input: I, subject: S) => Promise<Buffer>;
}

export type GenerationOutcome =
  | { state: 'served'; body: Buffer; fromCache: boolean }
  | { state: 'failed'; failure: GenerationFailure };

export async function runGeneration<S, I>(request: GenerationRequest<S, I>): Promise<GenerationOutcome> {
  const subject = await request.resolve();
  if (subject === null) {
    return { state: 'failed', failure: { kind: 'invalid-token' } };
  }

  const scope = request.scope;
  const cacheKey = scope ? scope.key(subject) : null;

  if (scope && cacheKey && !scope.bypass) {
    const cached = await scope.cache.get(scope.token, cacheKey);
    if (cached) {
      return { state: 'served', body: cached, fromCache: true };
    }
  }

  const input = await request.fetch(subject);
  if (!input.ok) {
    return { state: 'failed', failure: input.error };
  }

  let body: Buffer;
  try {
    body = await request.render(input.value, subject);
  } catch (error) {
    console.error('Generation: render failed:', error);
    const message = error instanceof Error ? error.message : String(error);
    return { state: 'failed', failure: { kind: 'render', message } };
  }

  if (scope && cacheKey) {
    // Not awaited; the write is already issued when set() returns
    scope.cache.set(scope.token, cacheKey, body, scope.ttl).catch((error: unknown) => {
      console.error(`Generation: cache write failed for ${cacheKey}:`, error);
    });
  }

  return { state: 'served', body, fromCache: false };
}
