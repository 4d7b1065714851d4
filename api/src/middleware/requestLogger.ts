/**
 * Request Logger Middleware
 *
 * Assigns every request an id (or keeps a sane client-supplied X-Request-ID)
 * and logs method, path, status and duration once the response is ready.
 */

import { randomUUID } from 'node:crypto';
import type { Context, Next } from 'hono';
import type { HonoEnv } from '@/types/hono';
import { logger } from '@/utils/logger';

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export async function requestLogger(c: Context<HonoEnv>, next: Next) {
  const incoming = c.req.header('x-request-id');
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : randomUUID();
  const startedAt = performance.now();

  c.set('requestId', requestId);
  c.header('X-Request-ID', requestId);

  await next();

  const entry = {
    requestId,
    method: c.req.method,
    path: c.req.path,
    status: c.res.status,
    durationMs: Math.round(performance.now() - startedAt),
  };

  if (c.res.status >= 500) {
    logger.error('Request failed', entry);
  } else {
    logger.info('Request handled', entry);
  }
}
