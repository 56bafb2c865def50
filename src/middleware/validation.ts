/**
 * Request validation helpers
 *
 * Validates request bodies with Zod schemas and answers failures with the
 * standard `{code, message, data}` envelope.
 */

import type { Context } from 'hono';
import type { z, ZodType, ZodTypeDef } from 'zod';
import { ErrorCode, errorResponse } from '../utils/errors.js';
import { err, ok, type Result } from '../utils/result.js';

/**
 * Validation error detail format
 */
export interface ValidationErrorDetail {
  field: string;
  message: string;
}

/**
 * Format Zod validation errors for API response
 *
 * @returns Array of field-level error details
 */
export function formatValidationErrors(error: z.ZodError): ValidationErrorDetail[] {
  return error.issues.map((issue) => ({
    field: issue.path.join('.'),
    message: issue.message,
  }));
}

/**
 * Create a 400 INVALID_BODY envelope
 */
export function invalidBodyError(c: Context, message: string, details: ValidationErrorDetail[]): Response {
  return errorResponse(c, ErrorCode.INVALID_BODY, message, 400, details);
}

/**
 * Parse the JSON body of a request against a Zod schema
 *
 * @returns The validated body, or the error response to send
 *
 * @example
 * ```ts
 * const body = await parseBody(c, MihomoExchangeSchema);
 * if (!body.ok) return body.error;
 * ```
 */
export async function parseBody<T>(
  c: Context,
  schema: ZodType<T, ZodTypeDef, unknown>
): Promise<Result<T, Response>> {
  let rawBody: unknown;
  try {
    rawBody = await c.req.json();
  } catch {
    return err(
      invalidBodyError(c, 'Request body contains invalid JSON', [
        { field: 'body', message: 'Request body contains invalid JSON' },
      ])
    );
  }

  const validationResult = schema.safeParse(rawBody);
  if (!validationResult.success) {
    return err(invalidBodyError(c, 'Validation failed', formatValidationErrors(validationResult.error)));
  }

  return ok(validationResult.data);
}
