/**
 * Generation failures and their HTTP mapping
 */

import type { Context } from 'hono';
import type { UpstreamError } from '../upstream/errors.js';
import { ErrorCode, errorResponse, invalidTokenError, type ErrorStatus } from '../utils/errors.js';

export type UpstreamService = 'hoyolab' | 'mihomo';

export type GenerationFailure =
  | { kind: 'invalid-parameter'; code: ErrorCode; message: string }
  | { kind: 'invalid-token' }
  | { kind: 'upstream'; service: UpstreamService; error: UpstreamError }
  | { kind: 'render'; message: string };

export function invalidParameter(code: ErrorCode, message: string): GenerationFailure {
  return { kind: 'invalid-parameter', code, message };
}

export function upstreamFailure(service: UpstreamService, error: UpstreamError): GenerationFailure {
  return { kind: 'upstream', service, error };
}

const SERVICE_NAMES: Record<UpstreamService, string> = {
  hoyolab: 'HoYoLAB',
  mihomo: 'Mihomo',
};

const SERVICE_ERROR_CODES: Record<UpstreamService, ErrorCode> = {
  hoyolab: ErrorCode.HOYOLAB_ERROR,
  mihomo: ErrorCode.MIHOMO_ERROR,
};

interface MappedFailure {
  code: ErrorCode;
  message: string;
  status: ErrorStatus;
}

/**
 * Envelope code, message and status of an upstream error
 */
export function mapUpstreamError(service: UpstreamService, error: UpstreamError): MappedFailure {
  const name = SERVICE_NAMES[service];

  switch (error.kind) {
    case 'account-not-found':
      return service === 'mihomo'
        ? { code: ErrorCode.MIHOMO_UID_NOT_FOUND, message: 'UID not found', status: 500 }
        : { code: ErrorCode.HOYOLAB_ACCOUNT_NOT_FOUND, message: 'HoYoLAB account not found', status: 500 };
    case 'data-not-public':
      return { code: ErrorCode.HOYOLAB_DATA_NOT_PUBLIC, message: 'HoYoLAB data is not public', status: 500 };
    case 'invalid-credentials':
      return { code: ErrorCode.HOYOLAB_INVALID_COOKIES, message: 'Invalid HoYoLAB cookies', status: 500 };
    case 'timeout':
      return { code: SERVICE_ERROR_CODES[service], message: `${name} request timed out`, status: 503 };
    case 'transient':
      return { code: SERVICE_ERROR_CODES[service], message: `${name} error: ${error.message}`, status: 500 };
    case 'incomplete':
      return { code: SERVICE_ERROR_CODES[service], message: `Data is unavailable (${error.message})`, status: 500 };
  }
}

/**
 * Answer a failed generation with its error envelope
 */
export function failureResponse(c: Context, failure: GenerationFailure): Response {
  switch (failure.kind) {
    case 'invalid-parameter':
      return errorResponse(c, failure.code, failure.message, 400);
    case 'invalid-token':
      return invalidTokenError(c);
    case 'upstream': {
      const mapped = mapUpstreamError(failure.service, failure.error);
      return errorResponse(c, mapped.code, mapped.message, mapped.status);
    }
    case 'render':
      return errorResponse(c, ErrorCode.GEN_FAILURE, 'Failed to generate the image', 500);
  }
}
