/**
 * Hidden Words Companion API Server
 *
 * Hono server for:
 * - REST API (/api/*)
 * - WebSocket chat (/ws)
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { createApp } from '@/app';
import { loadConfig, type AppConfig } from '@/config/env';
import { buildServices } from '@/container';
import { ConfigError } from '@/errors/chatErrors';
import { logger } from '@/utils/logger';

function readConfig(): AppConfig {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      logger.error('Invalid configuration, refusing to start', { problems: error.problems });
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = readConfig();
  const services = await buildServices(config);
  const { app, injectWebSocket } = createApp(services);

  const server = serve({
    fetch: app.fetch,
    port: config.port,
  });
  injectWebSocket(server);

  services.gateway.start();
  services.sessions.startSweeper();

  logger.info('API server listening', {
    port: config.port,
    model: config.provider.model,
    passages: services.index.size,
    embedder: config.embedding.provider,
  });

  // Graceful shutdown with request drain
  function gracefulShutdown(signal: string) {
    logger.info(`${signal} received: shutting down gracefully...`);
    services.gateway.stop();
    services.sessions.stopSweeper();
    server.close(() => {
      logger.info('HTTP server closed');
      process.exit(0);
    });
    // Force exit after 10 seconds if drain takes too long
    setTimeout(() => {
      logger.error('Forced shutdown after 10s timeout');
      process.exit(1);
    }, 10_000).unref();
  }

  process.on('SIGTERM', () => gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => gracefulShutdown('SIGINT'));
}

main().catch((error: unknown) => {
  logger.error('Failed to start API server', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  process.exit(1);
});
