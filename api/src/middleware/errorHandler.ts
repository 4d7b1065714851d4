/**
 * Error Handler
 *
 * Registered with app.onError. Turns anything a route throws into the JSON
 * error envelope:
 * - ChatError and subclasses: their own code and status
 * - ZodError: VALIDATION_ERROR / 400
 * - malformed JSON bodies: INVALID_JSON / 400
 * - HTTPException (body limit and friends): its status
 * - everything else: INTERNAL_ERROR / 500
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import { ZodError } from 'zod';
import { ChatError } from '@/errors/chatErrors';
import { logger } from '@/utils/logger';

/**
 * Error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
  };
}

// Only show verbose errors in development and test, never in staging or production
function isVerboseErrors(): boolean {
  const env = process.env.NODE_ENV;
  return env === 'development' || env === 'test';
}

const HTTP_EXCEPTION_CODES: Record<number, string> = {
  400: 'BAD_REQUEST',
  404: 'NOT_FOUND',
  413: 'PAYLOAD_TOO_LARGE',
  415: 'UNSUPPORTED_MEDIA_TYPE',
};

export function errorResponse(code: string, message: string, details?: unknown): ErrorResponse {
  return details === undefined ? { error: { code, message } } : { error: { code, message, details } };
}

export function handleError(error: Error, c: Context): Response {
  if (error instanceof ChatError) {
    const log = error.status >= 500 ? logger.error : logger.warn;
    log('Request error', { code: error.code, message: error.message, path: c.req.path });
    return c.json(errorResponse(error.code, error.message), error.status);
  }

  if (error instanceof ZodError) {
    return c.json(errorResponse('VALIDATION_ERROR', 'Invalid request data', error.issues), 400);
  }

  if (error instanceof SyntaxError) {
    return c.json(errorResponse('INVALID_JSON', 'Request body is not valid JSON'), 400);
  }

  if (error instanceof HTTPException) {
    return c.json(
      errorResponse(HTTP_EXCEPTION_CODES[error.status] ?? 'HTTP_ERROR', error.message || 'Request rejected'),
      { status: error.status },
    );
  }

  logger.error('Unhandled error', {
    message: error.message,
    stack: error.stack,
    cause: error.cause ? String(error.cause) : undefined,
    path: c.req.path,
    method: c.req.method,
  });

  return c.json(
    errorResponse('INTERNAL_ERROR', isVerboseErrors() ? error.message : 'An internal error occurred'),
    500,
  );
}
