/**
 * Error Response Utilities Tests
 *
 * Runs the helpers inside a real Hono app so status and body come from
 * actual responses.
 */

import { Hono, type Context } from 'hono';
import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ApiError,
  ErrorCode,
  badRequestError,
  errorResponse,
  handleApiError,
  internalServerError,
  invalidTokenError,
  notFoundError,
} from '../../src/utils/errors.js';

async function respond(handler: (c: Context) => Response): Promise<{ status: number; body: unknown }> {
  const app = new Hono();
  app.get('/test', handler);
  const response = await app.request('/test');
  return { status: response.status, body: await response.json() };
}

describe('error helpers', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('errorResponse omits data when not given', async () => {
    const result = await respond((c) => errorResponse(c, ErrorCode.INVALID_LANG, 'Invalid language: xx-XX', 400));

    expect(result).toEqual({ status: 400, body: { code: 100, message: 'Invalid language: xx-XX' } });
  });

  it('badRequestError attaches data', async () => {
    const result = await respond((c) =>
      badRequestError(c, ErrorCode.INVALID_BODY, 'Validation failed', [{ field: 'uid', message: 'Required' }])
    );

    expect(result).toEqual({
      status: 400,
      body: { code: 105, message: 'Validation failed', data: [{ field: 'uid', message: 'Required' }] },
    });
  });

  it('invalidTokenError answers 403', async () => {
    const result = await respond((c) => invalidTokenError(c));

    expect(result).toEqual({ status: 403, body: { code: 1000, message: 'Invalid token provided' } });
  });

  it('notFoundError names the resource', async () => {
    const result = await respond((c) => notFoundError(c, 'Route'));

    expect(result).toEqual({ status: 404, body: { code: 107, message: 'Route not found' } });
  });

  it('internalServerError hides details by default', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const result = await respond((c) => internalServerError(c, 'Boom', new Error('secret detail')));

    expect(result).toEqual({ status: 500, body: { code: 199, message: 'Boom' } });
  });

  it('internalServerError shows details when asked', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const result = await respond((c) => internalServerError(c, 'Boom', new Error('visible detail'), true));

    expect(result.status).toBe(500);
    expect(result.body).toMatchObject({ code: 199, message: 'Boom', data: { error: 'visible detail' } });
  });

  it('handleApiError converts an ApiError', async () => {
    const result = await respond((c) =>
      handleApiError(c, new ApiError(ErrorCode.HOYOLAB_SIMU_UNKNOWN_KIND, 'Unknown kind', 400))
    );

    expect(result).toEqual({ status: 400, body: { code: 2104, message: 'Unknown kind' } });
  });

  it('handleApiError falls back to a 500', async () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const result = await respond((c) => handleApiError(c, new TypeError('oops')));

    expect(result).toEqual({ status: 500, body: { code: 199, message: 'An unexpected error occurred' } });
  });
});
