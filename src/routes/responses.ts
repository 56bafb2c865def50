/**
 * Response builders for generated artifacts
 */

import type { Context } from 'hono';
import { failureResponse } from '../orchestration/failures.js';
import type { GenerationOutcome } from '../orchestration/pipeline.js';
import type { AppEnv } from '../types.js';
import { ErrorCode, type ErrorResponse } from '../utils/errors.js';

function imageHeaders(filename: string, ttl: number): Record<string, string> {
  return {
    'Content-Type': 'image/png',
    'Content-Disposition': `inline; filename="${filename}"`,
    'Cache-Control': `max-age=${ttl}, must-revalidate`,
  };
}

/**
 * Headers of an image route without a body, for HEAD requests
 */
export function imageHeadResponse(filename: string, ttl: number): Response {
  return new Response(null, { status: 200, headers: imageHeaders(filename, ttl) });
}

/**
 * Answer a generation with a PNG, or with its failure envelope
 */
export function sendImage(
  c: Context<AppEnv>,
  outcome: GenerationOutcome,
  filename: string,
  ttl: number
): Response {
  if (outcome.state === 'failed') {
    return failureResponse(c, outcome.failure);
  }

  c.set('cacheStatus', outcome.fromCache ? 'hit' : 'miss');
  return new Response(new Uint8Array(outcome.body), { status: 200, headers: imageHeaders(filename, ttl) });
}

/**
 * Answer a generation whose body is serialized JSON
 */
export function sendJson(c: Context<AppEnv>, outcome: GenerationOutcome): Response {
  if (outcome.state === 'failed') {
    return failureResponse(c, outcome.failure);
  }

  c.set('cacheStatus', outcome.fromCache ? 'hit' : 'miss');
  return new Response(new Uint8Array(outcome.body), {
    status: 200,
    headers: { 'Content-Type': 'application/json; charset=UTF-8' },
  });
}

/**
 * JSON payload as bytes, the form artifacts are cached in
 */
export function toJsonBytes(value: unknown): Promise<Buffer> {
  return Promise.resolve(Buffer.from(JSON.stringify(value), 'utf8'));
}

/**
 * `{code: 0, message: 'Success', data}` envelope
 */
export function successResponse(c: Context<AppEnv>, data: unknown): Response {
  return c.json<ErrorResponse>({ code: ErrorCode.SUCCESS, message: 'Success', data }, 200);
}
