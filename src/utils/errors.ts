/**
 * Error Response Utilities
 *
 * Provides the JSON error envelope used by every route:
 * { code: number, message: string, data?: unknown }
 *
 * Codes are grouped by range: generic (0-199), transactions (1000-1099),
 * generation (1100+), Mihomo (2000-2099) and HoYoLAB (2100-2199). Clients
 * parse them, so existing values must never be renumbered.
 */

import type { Context } from 'hono';

export enum ErrorCode {
  // General
  SUCCESS = 0,
  INVALID_LANG = 100,
  MISSING_UID = 101,
  MISSING_TOKEN = 102,
  MISSING_UID_TOKEN = 103,
  INVALID_INDEX = 104,
  INVALID_BODY = 105,
  STRICT_MODE_REJECTED = 106,
  NOT_FOUND = 107,
  INTERNAL_ERROR = 199,
  // Transactions
  TR_INVALID_TOKEN = 1000,
  TR_FAILED_VERIFICATION = 1001,
  // Generator
  GEN_FAILURE = 1100,
  // Mihomo
  MIHOMO_ERROR = 2000,
  MIHOMO_UID_NOT_FOUND = 2001,
  MIHOMO_INVALID_CHARACTER = 2002,
  // HoYoLAB
  HOYOLAB_ERROR = 2100,
  HOYOLAB_ACCOUNT_NOT_FOUND = 2101,
  HOYOLAB_DATA_NOT_PUBLIC = 2102,
  HOYOLAB_INVALID_COOKIES = 2103,
  HOYOLAB_SIMU_UNKNOWN_KIND = 2104,
  HOYOLAB_SIMU_NO_RECORDS = 2105,
  HOYOLAB_SIMU_INVALID_INDEX = 2106,
}

/**
 * Standard response envelope, also used for successful exchanges
 */
export interface ErrorResponse {
  code: ErrorCode;
  message: string;
  data?: unknown;
}

/**
 * HTTP statuses the error helpers may answer with
 */
export type ErrorStatus = 400 | 401 | 403 | 404 | 500 | 503;

/**
 * Create a JSON error envelope response
 *
 * @example
 * ```ts
 * return errorResponse(c, ErrorCode.INVALID_LANG, 'Invalid language: xx-XX', 400);
 * ```
 */
export function errorResponse(
  c: Context,
  code: ErrorCode,
  message: string,
  status: ErrorStatus,
  data?: unknown
): Response {
  const response: ErrorResponse = { code, message };

  if (data !== undefined) {
    response.data = data;
  }

  return c.json<ErrorResponse>(response, status);
}

/**
 * Create a 400 Bad Request envelope
 */
export function badRequestError(
  c: Context,
  code: ErrorCode,
  message: string,
  data?: unknown
): Response {
  return errorResponse(c, code, message, 400, data);
}

/**
 * Create a 403 envelope for an unknown or expired token
 */
export function invalidTokenError(c: Context): Response {
  return errorResponse(c, ErrorCode.TR_INVALID_TOKEN, 'Invalid token provided', 403);
}

/**
 * Create a 404 envelope
 */
export function notFoundError(c: Context, resource: string = 'Resource'): Response {
  return errorResponse(c, ErrorCode.NOT_FOUND, `${resource} not found`, 404);
}

/**
 * Create a 500 Internal Server Error envelope
 *
 * The logged details never reach the client unless `showDetails` is set,
 * in which case the error message and stack are attached as `data`.
 *
 * @example
 * ```ts
 * return internalServerError(c, 'An unexpected error occurred', error, config.showErrorDetails);
 * ```
 */
export function internalServerError(
  c: Context,
  message: string = 'Internal server error',
  logDetails?: unknown,
  showDetails: boolean = false
): Response {
  if (logDetails !== undefined) {
    console.error(`${message}:`, logDetails);
  }

  if (showDetails && logDetails instanceof Error) {
    return errorResponse(c, ErrorCode.INTERNAL_ERROR, message, 500, {
      error: logDetails.message,
      stack: logDetails.stack,
    });
  }

  return errorResponse(c, ErrorCode.INTERNAL_ERROR, message, 500);
}

/**
 * Error carrying an envelope code and HTTP status, thrown by code paths that
 * cannot return a response directly
 */
export class ApiError extends Error {
  constructor(
    public code: ErrorCode,
    message: string,
    public status: ErrorStatus = 400,
    public data?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * Convert an ApiError into its envelope, or fall back to a 500
 */
export function handleApiError(
  c: Context,
  error: unknown,
  showDetails: boolean = false
): Response {
  if (error instanceof ApiError) {
    return errorResponse(c, error.code, error.message, error.status, error.data);
  }

  return internalServerError(c, 'An unexpected error occurred', error, showDetails);
}
