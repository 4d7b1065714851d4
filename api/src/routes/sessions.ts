/**
 * Session Routes
 *
 * Read back or clear a conversation. A client whose socket dropped while a
 * reply was in flight finds that reply here.
 */

import { Hono } from 'hono';
import { zValidator } from '@hono/zod-validator';
import type { HonoEnv } from '@/types/hono';
import type { SessionStore } from '@/services/session.service';
import { SessionNotFoundError } from '@/errors/chatErrors';
import { rateLimit } from '@/middleware/rateLimit';
import { RateLimitTier } from '@/services/rateLimit.service';
import { sessionParamSchema } from '@/validators/chat';

export function createSessionRoutes(sessions: SessionStore) {
  const routes = new Hono<HonoEnv>();

  const validateParam = zValidator('param', sessionParamSchema, (result) => {
    if (!result.success) throw result.error;
  });

  /**
   * GET /api/sessions/:sessionId
   */
  routes.get('/:sessionId', rateLimit(RateLimitTier.GENERAL), validateParam, (c) => {
    const { sessionId } = c.req.valid('param');
    const session = sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }

    return c.json({
      sessionId,
      turns: session.snapshot().map((turn) => ({
        role: turn.role,
        text: turn.text,
        timestamp: new Date(turn.timestamp).toISOString(),
      })),
    });
  });

  /**
   * DELETE /api/sessions/:sessionId
   *
   * Clears the history; the id can be reused afterwards.
   */
  routes.delete('/:sessionId', rateLimit(RateLimitTier.GENERAL), validateParam, (c) => {
    const { sessionId } = c.req.valid('param');
    if (!sessions.delete(sessionId)) {
      throw new SessionNotFoundError(sessionId);
    }
    return c.body(null, 204);
  });

  return routes;
}
