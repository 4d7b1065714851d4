/**
 * Quote Routes
 */

import { Hono } from 'hono';
import type { HonoEnv } from '@/types/hono';
import type { PassageIndex } from '@/services/passageIndex.service';
import { ChatError } from '@/errors/chatErrors';
import { rateLimit } from '@/middleware/rateLimit';
import { RateLimitTier } from '@/services/rateLimit.service';

export const QUOTE_SOURCE = 'The Hidden Words';

export function createQuoteRoutes(index: PassageIndex, random: () => number = Math.random) {
  const routes = new Hono<HonoEnv>();

  /**
   * GET /api/quotes/random
   */
  routes.get('/random', rateLimit(RateLimitTier.GENERAL), (c) => {
    const passage = index.randomPassage(random);
    if (!passage) {
      throw new ChatError('NOT_FOUND', 'No passages are loaded', 404);
    }
    return c.json({ quote: { id: passage.id, text: passage.text }, source: QUOTE_SOURCE });
  });

  return routes;
}
