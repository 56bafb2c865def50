/**
 * Query, path and body schemas for the API routes
 *
 * Each parameter is validated on its own so a failure can carry the error
 * code of that parameter. Parsers throw ApiError, which the app's error
 * handler turns into a 400 envelope.
 */

import { z, type ZodType, type ZodTypeDef } from 'zod';
import { DEFAULT_LANGUAGE, isLanguage, type Language } from '../i18n/languages.js';
import { formatValidationErrors } from '../middleware/validation.js';
import { ApiError, ErrorCode } from '../utils/errors.js';

// Query and path values arrive as strings; JSON bodies carry real numbers
const PositiveIntegerParam = z.coerce.number().int().positive();
const PositiveInteger = z.number().int().positive();

export const LanguageSchema = z.string().refine(isLanguage).default(DEFAULT_LANGUAGE);

/** `true` and `1` enable a flag; anything else, or nothing, leaves it off */
export const FlagSchema = z
  .string()
  .optional()
  .transform((value) => value === 'true' || value === '1');

export const TokenSchema = z.string().trim().min(1);
export const UidSchema = PositiveIntegerParam;
export const IndexSchema = z.coerce.number().int().min(1);
export const CharacterSchema = z.coerce.number().int().min(1).default(1);
export const SimulatedUniverseKindSchema = z.enum(['current', 'previous', 'swarm']);
export const MemoryOfChaosKindSchema = z.enum(['current', 'previous']);

export const HoyolabExchangeSchema = z.object({
  uid: PositiveInteger,
  ltuid: PositiveInteger,
  ltoken: z.string().min(1),
  lcookie: z.string().min(1).optional(),
  lmid: z.string().min(1).optional(),
});

export const MihomoExchangeSchema = z.object({
  uid: PositiveInteger,
});

/**
 * Validate one parameter
 *
 * @throws {ApiError} 400 with the given code when the value is rejected
 */
export function parseParam<T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  value: unknown,
  code: ErrorCode,
  message: string
): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new ApiError(code, message, 400, formatValidationErrors(result.error));
  }
  return result.data;
}

export function parseLanguage(value: string | undefined): Language {
  return parseParam(LanguageSchema, value, ErrorCode.INVALID_LANG, `Invalid language: ${value}`);
}

export function parseToken(value: string | undefined): string {
  return parseParam(TokenSchema, value, ErrorCode.MISSING_TOKEN, 'A token is required');
}

export function parseFlag(value: string | undefined): boolean {
  return parseParam(FlagSchema, value, ErrorCode.INVALID_BODY, 'Invalid flag');
}

/**
 * Query shared by every token-scoped generation route
 */
export interface GenerationQuery {
  token: string;
  lang: Language;
  nocache: boolean;
}

export function parseGenerationQuery(query: Record<string, string>): GenerationQuery {
  return {
    token: parseToken(query.token),
    lang: parseLanguage(query.lang),
    nocache: parseFlag(query.nocache),
  };
}
