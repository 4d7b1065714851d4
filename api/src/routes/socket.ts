/**
 * WebSocket Route
 *
 * GET /ws?sessionId=... upgrades to a socket handled by the SocketGateway.
 */

import { Hono } from 'hono';
import type { createNodeWebSocket } from '@hono/node-ws';
import type { WSContext } from 'hono/ws';
import type { HonoEnv } from '@/types/hono';
import { readFrame } from '@/gateway/frames';
import { clientIp } from '@/middleware/rateLimit';
import type { SocketChannel, SocketConnection, SocketGateway } from '@/gateway/socketGateway';
import { logger } from '@/utils/logger';

type UpgradeWebSocket = ReturnType<typeof createNodeWebSocket>['upgradeWebSocket'];

const WS_OPEN = 1;

function toChannel<T>(ws: WSContext<T>): SocketChannel {
  return {
    send(data) {
      if (ws.readyState !== WS_OPEN) {
        throw new Error(`Socket not open (readyState ${ws.readyState})`);
      }
      ws.send(data);
    },
    close(code, reason) {
      ws.close(code, reason);
    },
  };
}

export function createSocketRoutes(gateway: SocketGateway, upgradeWebSocket: UpgradeWebSocket) {
  const routes = new Hono<HonoEnv>();

  routes.get(
    '/',
    upgradeWebSocket((c) => {
      const requestedSessionId = c.req.query('sessionId');
      const ip = clientIp(c);
      let connection: SocketConnection | undefined;

      return {
        onOpen(_event, ws) {
          connection = gateway.open(toChannel(ws), requestedSessionId, ip);
        },

        onMessage(event) {
          const current = connection;
          if (!current) return;
          readFrame(event.data)
            .then((raw) => gateway.handleMessage(current, raw))
            .catch((error: unknown) => {
              logger.error('Socket frame handling failed', {
                connectionId: current.id,
                error: String(error),
              });
            });
        },

        onClose() {
          if (connection) gateway.handleClose(connection);
        },

        onError() {
          logger.warn('Socket error', { connectionId: connection?.id });
          if (connection) gateway.handleClose(connection);
        },
      };
    }),
  );

  return routes;
}
