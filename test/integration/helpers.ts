/**
 * Integration Test Helpers
 *
 * Builds the full app around in-process fakes and wraps the requests the
 * suites repeat. Nothing listens on a port; requests go through
 * `app.request()`.
 */

import type { Hono } from 'hono';
import type { AppConfig } from '../../src/config.js';
import { createApp } from '../../src/index.js';
import type { AppEnv } from '../../src/types.js';
import { createTestServices, type TestServices } from '../fixtures.js';

export interface TestApp {
  app: Hono<AppEnv>;
  services: TestServices;
}

export function createTestApp(overrides: Partial<AppConfig> = {}): TestApp {
  const services = createTestServices(overrides);
  return { app: createApp(services), services };
}

export function postJson(app: Hono<AppEnv>, path: string, body: unknown): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    })
  );
}

/**
 * Exchange HoYoLAB credentials and return the token
 *
 * @throws {Error} If the exchange is rejected
 */
export async function exchangeHoyolab(app: Hono<AppEnv>, uid: number = 800000001): Promise<string> {
  return readToken(await postJson(app, '/api/exchange/hoyolab', { uid, ltuid: 900001, ltoken: 'test-token' }));
}

/**
 * @throws {Error} If the exchange is rejected
 */
export async function exchangeMihomo(app: Hono<AppEnv>, uid: number = 800000001): Promise<string> {
  return readToken(await postJson(app, '/api/exchange/mihomo', { uid }));
}

async function readToken(response: Response): Promise<string> {
  const body: unknown = await response.json();
  if (
    response.status !== 200 ||
    typeof body !== 'object' ||
    body === null ||
    !('data' in body) ||
    typeof body.data !== 'string'
  ) {
    throw new Error(`Exchange failed with ${response.status}: ${JSON.stringify(body)}`);
  }
  return body.data;
}
