/**
 * Application Configuration
 *
 * DESIGN PRINCIPLES:
 * - Centralized configuration read from environment variables
 * - Fail-fast: the server won't start with invalid configuration
 * - Type-safe: all values are parsed into AppConfig once at startup
 * - Passed explicitly: createServices() receives the config object, nothing
 *   reads process.env after startup
 */

export interface RedisConfig {
  enabled: boolean;
  url: string;
  connectTimeoutMs: number;
}

export interface AppConfig {
  // Core Application Settings
  port: number;
  corsOrigins: string[];
  showErrorDetails: boolean;
  verboseLogging: boolean;

  // Store
  redis: RedisConfig;
  memoryStoreMaxEntries: number;

  // Transactions and caching (seconds)
  transactionNamespace: string;
  transactionTtl: number;
  mihomoTtl: number;
  imageTtl: number;

  // Upstream services
  upstreamTimeoutMs: number;
  hoyolabApiBase: string;
  mihomoApiBase: string;

  // Strict mode: shared secret gating the raw-data routes, null when off
  strictModeSecret: string | null;
}

export type Env = Record<string, string | undefined>;

const DEFAULT_HOYOLAB_API_BASE = 'https://bbs-api-os.hoyolab.com/game_record/hkrpg/api';
const DEFAULT_MIHOMO_API_BASE = 'https://api.mihomo.me';

/**
 * Parse CORS origins from environment variable
 *
 * - Single '*' allows all origins
 * - Comma-separated list for specific origins
 *
 * @param value - Environment variable value
 * @returns Array of origin strings
 */
function parseCorsOrigins(value: string): string[] {
  if (!value || value.trim() === '*') {
    return ['*'];
  }
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

/**
 * Parse an integer variable and enforce a lower bound
 *
 * @throws {Error} If the value is not an integer or is below `min`
 */
function parseIntegerVar(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name] || String(fallback);
  const value = parseInt(raw, 10);
  if (isNaN(value) || String(value) !== raw.trim() || value < min) {
    throw new Error(`Invalid ${name} value: ${raw}. Must be an integer of at least ${min}.`);
  }
  return value;
}

/**
 * Parse a boolean flag; only 'true'/'1' and 'false'/'0' are accepted
 */
function parseFlag(env: Env, name: string, fallback: boolean): boolean {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'true' || normalized === '1') return true;
  if (normalized === 'false' || normalized === '0') return false;
  throw new Error(`Invalid ${name} value: ${raw}. Must be true or false.`);
}

/**
 * Validate and load application configuration
 *
 * DESIGN DECISIONS:
 * - Transaction TTL: 3 days, HoYoLAB credentials are long-lived
 * - Mihomo TTL: 5 minutes, the record is a profile snapshot
 * - Image TTL: 15 minutes for rendered cards and info payloads
 *
 * @param env - Variables to read, defaults to process.env
 * @throws {Error} If a variable is present but invalid
 */
export function loadConfig(env: Env = process.env): AppConfig {
  const port = parseIntegerVar(env, 'PORT', 3000, 1);
  if (port > 65535) {
    throw new Error(`Invalid PORT value: ${port}. Must be between 1 and 65535.`);
  }

  const strictModeSecret = env.STRICT_MODE_SECRET?.trim() || null;

  return {
    port,
    corsOrigins: parseCorsOrigins(env.CORS_ORIGINS || '*'),
    showErrorDetails: parseFlag(env, 'SHOW_ERROR_DETAILS', false),
    verboseLogging: parseFlag(env, 'VERBOSE_LOGGING', true),

    redis: {
      enabled: parseFlag(env, 'REDIS_ENABLED', true),
      url: env.REDIS_URL || 'redis://127.0.0.1:6379',
      connectTimeoutMs: parseIntegerVar(env, 'REDIS_CONNECT_TIMEOUT_MS', 5000, 100),
    },
    memoryStoreMaxEntries: parseIntegerVar(env, 'MEMORY_STORE_MAX_ENTRIES', 10000, 1),

    transactionNamespace: env.TRANSACTION_NAMESPACE || 'qingque:transactions',
    transactionTtl: parseIntegerVar(env, 'TRANSACTION_TTL', 60 * 60 * 24 * 3, 60),
    mihomoTtl: parseIntegerVar(env, 'MIHOMO_TTL', 60 * 5, 1),
    imageTtl: parseIntegerVar(env, 'IMAGE_TTL', 60 * 15, 1),

    upstreamTimeoutMs: parseIntegerVar(env, 'UPSTREAM_TIMEOUT_MS', 10000, 100),
    hoyolabApiBase: (env.HOYOLAB_API_BASE || DEFAULT_HOYOLAB_API_BASE).replace(/\/+$/, ''),
    mihomoApiBase: (env.MIHOMO_API_BASE || DEFAULT_MIHOMO_API_BASE).replace(/\/+$/, ''),

    strictModeSecret,
  };
}
