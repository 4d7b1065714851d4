/**
 * HTTP application
 *
 * Middleware chain, routes and error mapping. Kept apart from the bootstrap
 * so tests can drive it with app.request().
 */

import { Hono } from 'hono';
import { createNodeWebSocket } from '@hono/node-ws';
import type { AppServices } from '@/container';
import { securityHeaders } from '@/middleware/securityHeaders';
import { createCorsMiddleware } from '@/middleware/cors';
import { requestLogger } from '@/middleware/requestLogger';
import { errorResponse, handleError } from '@/middleware/errorHandler';
import { createChatRoutes } from '@/routes/chat';
import { createAudioRoutes } from '@/routes/audio';
import { createSessionRoutes } from '@/routes/sessions';
import { createQuoteRoutes } from '@/routes/quotes';
import { createSocketRoutes } from '@/routes/socket';
import type { HonoEnv } from '@/types/hono';

export function createApp(services: AppServices) {
  const app = new Hono<HonoEnv>();
  const { injectWebSocket, upgradeWebSocket } = createNodeWebSocket({ app });

  // Global middleware chain
  app.use('*', requestLogger);
  app.use('*', securityHeaders);
  app.use('*', createCorsMiddleware(services.config.corsOrigin));

  app.get('/api/health', (c) => {
    return c.json({
      status: 'ok',
      passages: services.index.size,
      sessions: services.sessions.size,
      connections: services.gateway.connectionCount,
      timestamp: new Date().toISOString(),
    });
  });

  app.route('/api/chat', createChatRoutes(services.chat));
  app.route('/api', createAudioRoutes(services.transcription, services.chat));
  app.route('/api/sessions', createSessionRoutes(services.sessions));
  app.route('/api/quotes', createQuoteRoutes(services.index));
  app.route('/ws', createSocketRoutes(services.gateway, upgradeWebSocket));

  app.onError(handleError);

  app.notFound((c) => c.json(errorResponse('NOT_FOUND', 'Endpoint not found'), 404));

  return { app, injectWebSocket };
}
