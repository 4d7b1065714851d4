/**
 * Chat Routes
 *
 * HTTP side of the chat: the path every client falls back to when it has no
 * open socket. Same ChatService call as the WebSocket, answered synchronously.
 */

import { Hono, type Context } from 'hono';
import type { HonoEnv } from '@/types/hono';
import type { ChatResult } from '@/types/chat';
import type { ChatService } from '@/services/chat.service';
import { rateLimit } from '@/middleware/rateLimit';
import { RateLimitTier } from '@/services/rateLimit.service';
import { chatRequestSchema } from '@/validators/chat';

export function toChatResponse(result: ChatResult) {
  return {
    sessionId: result.sessionId,
    response: result.reply,
    passages: result.passages,
    fallback: result.fallback,
    timestamp: result.timestamp,
  };
}

/**
 * JSON bodies and classic form posts are both accepted.
 */
async function readChatBody(c: Context<HonoEnv>): Promise<unknown> {
  const contentType = c.req.header('content-type') ?? '';
  if (contentType.includes('application/json')) {
    return c.req.json();
  }
  return c.req.parseBody();
}

export function createChatRoutes(chat: ChatService) {
  const routes = new Hono<HonoEnv>();

  /**
   * POST /api/chat
   *
   * Body: { message, sessionId? } as JSON or form fields
   */
  routes.post('/', rateLimit(RateLimitTier.CHAT), async (c) => {
    const body = chatRequestSchema.parse(await readChatBody(c));

    const result = await chat.submit({
      sessionId: body.sessionId,
      text: body.message,
      transport: 'http',
    });

    return c.json(toChatResponse(result));
  });

  return routes;
}
