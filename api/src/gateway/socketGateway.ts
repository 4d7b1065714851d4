/**
 * Socket Gateway
 *
 * Owns live WebSocket connections. Each connection walks
 * CONNECTING -> OPEN -> CLOSED and is bound to one conversation session; the
 * session outlives it, so a client that reconnects with the same sessionId
 * resumes its history.
 *
 * Messages go through the same ChatService call as HTTP. If the socket is
 * gone by the time a reply is ready, the reply is still recorded in the
 * session (GET /api/sessions/:id) and the delivery is dropped.
 */

import { randomUUID } from 'node:crypto';
import type { SocketConfig } from '@/config/env';
import { EmptyInputError, MessageTooLongError } from '@/errors/chatErrors';
import { parseClientFrame, type ServerFrame } from '@/gateway/frames';
import type { ChatService } from '@/services/chat.service';
import {
  consumeRateLimit,
  getRateLimitKey,
  RateLimitTier,
} from '@/services/rateLimit.service';
import { isValidSessionId, type SessionStore } from '@/services/session.service';
import { logger } from '@/utils/logger';

/** The part of a WebSocket the gateway needs. */
export interface SocketChannel {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type ConnectionState = 'CONNECTING' | 'OPEN' | 'CLOSED';

export const IDLE_CLOSE_CODE = 4000;
export const SHUTDOWN_CLOSE_CODE = 1001;

export const EMPTY_MESSAGE_REPLY = 'Please enter a message.';
export const UNEXPECTED_ERROR_REPLY = 'Something went wrong while preparing a reply. Please try again.';

export function rateLimitedReply(retryAfterSeconds = 60): string {
  return `Too many messages. Please try again in ${retryAfterSeconds} seconds.`;
}

export class SocketConnection {
  state: ConnectionState = 'CONNECTING';
  lastSeenAt: number;

  constructor(
    readonly id: string,
    readonly channel: SocketChannel,
    readonly sessionId: string,
    now: number,
    /** Shares the HTTP chat budget for this address. */
    readonly clientIp?: string,
  ) {
    this.lastSeenAt = now;
  }

  get isOpen(): boolean {
    return this.state === 'OPEN';
  }
}

export interface SocketGatewayOptions extends SocketConfig {
  clock?: () => number;
}

export class SocketGateway {
  private readonly connections = new Map<string, SocketConnection>();
  private readonly clock: () => number;
  private timer?: ReturnType<typeof setInterval>;

  constructor(
    private readonly chat: ChatService,
    private readonly sessions: SessionStore,
    private readonly options: SocketGatewayOptions,
  ) {
    this.clock = options.clock ?? Date.now;
  }

  get connectionCount(): number {
    return this.connections.size;
  }

  /**
   * Binds a freshly opened socket to its session and announces the session id.
   * An invalid requested id is ignored and a new session is created.
   */
  open(channel: SocketChannel, requestedSessionId?: string, clientIp?: string): SocketConnection {
    let sessionId = requestedSessionId || undefined;
    if (sessionId && !isValidSessionId(sessionId)) {
      logger.warn('Ignoring invalid session id on socket connect');
      sessionId = undefined;
    }

    const session = this.sessions.resolve(sessionId);
    const connection = new SocketConnection(randomUUID(), channel, session.id, this.clock(), clientIp);

    this.connections.set(connection.id, connection);
    session.attach(connection.id);
    connection.state = 'OPEN';

    logger.info('Socket connected', {
      connectionId: connection.id,
      sessionId: session.id,
      resumed: session.turnCount > 0,
    });

    this.deliver(connection, { type: 'session', sessionId: session.id });
    return connection;
  }

  async handleMessage(connection: SocketConnection, raw: string): Promise<void> {
    if (!connection.isOpen) return;
    connection.lastSeenAt = this.clock();

    const frame = parseClientFrame(raw);
    switch (frame.kind) {
      case 'ping':
        this.deliver(connection, { type: 'pong' });
        return;
      case 'pong':
        return;
      case 'invalid':
        this.deliver(connection, { type: 'error', content: frame.reason });
        return;
      case 'message':
        await this.answer(connection, frame.text);
    }
  }

  private async answer(connection: SocketConnection, text: string): Promise<void> {
    const limit = await consumeRateLimit(
      `${RateLimitTier.CHAT}:${getRateLimitKey(connection.clientIp)}`,
      RateLimitTier.CHAT,
    );
    if (!limit.allowed) {
      logger.warn('Socket message rate limited', {
        connectionId: connection.id,
        sessionId: connection.sessionId,
        retryAfter: limit.retryAfter,
      });
      this.deliver(connection, { type: 'error', content: rateLimitedReply(limit.retryAfter) });
      return;
    }

    // the session may have been cleared or swept under a live socket
    this.sessions.resolve(connection.sessionId).attach(connection.id);

    try {
      const result = await this.chat.submit({
        sessionId: connection.sessionId,
        text,
        transport: 'websocket',
      });
      this.deliver(connection, { type: 'response', content: result.reply, sessionId: result.sessionId });
    } catch (error) {
      if (error instanceof EmptyInputError) {
        this.deliver(connection, { type: 'error', content: EMPTY_MESSAGE_REPLY });
        return;
      }
      if (error instanceof MessageTooLongError) {
        this.deliver(connection, { type: 'error', content: error.message });
        return;
      }
      logger.error('Socket message failed', {
        connectionId: connection.id,
        sessionId: connection.sessionId,
        error: error instanceof Error ? error.message : String(error),
      });
      this.deliver(connection, { type: 'error', content: UNEXPECTED_ERROR_REPLY });
    }
  }

  /**
   * Sends a frame. Returns false when the connection is closed or the send
   * fails; a failed send closes the connection.
   */
  deliver(connection: SocketConnection, frame: ServerFrame): boolean {
    if (!connection.isOpen) {
      logger.warn('Dropped frame for closed socket', {
        connectionId: connection.id,
        sessionId: connection.sessionId,
        frame: frame.type,
      });
      return false;
    }

    try {
      connection.channel.send(JSON.stringify(frame));
      return true;
    } catch (error) {
      logger.warn('Socket send failed, closing connection', {
        connectionId: connection.id,
        sessionId: connection.sessionId,
        frame: frame.type,
        error: String(error),
      });
      this.release(connection);
      return false;
    }
  }

  /** The client or the network closed the socket. */
  handleClose(connection: SocketConnection): void {
    if (connection.state === 'CLOSED') return;
    this.release(connection);
    logger.info('Socket disconnected', { connectionId: connection.id, sessionId: connection.sessionId });
  }

  /** Server-initiated close. */
  close(connection: SocketConnection, code: number, reason: string): void {
    if (connection.state === 'CLOSED') return;
    this.release(connection);
    try {
      connection.channel.close(code, reason);
    } catch (error) {
      logger.debug('Socket already gone on close', { connectionId: connection.id, error: String(error) });
    }
  }

  /**
   * One keepalive round: idle sockets are closed with code 4000, the rest
   * get a ping.
   */
  tick(now: number = this.clock()): void {
    for (const connection of [...this.connections.values()]) {
      if (now - connection.lastSeenAt >= this.options.idleTimeoutMs) {
        logger.info('Closing idle socket', { connectionId: connection.id, sessionId: connection.sessionId });
        this.close(connection, IDLE_CLOSE_CODE, 'Idle timeout');
        continue;
      }
      this.deliver(connection, { type: 'ping' });
    }
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.tick(), this.options.keepaliveMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    for (const connection of [...this.connections.values()]) {
      this.close(connection, SHUTDOWN_CLOSE_CODE, 'Server shutting down');
    }
  }

  private release(connection: SocketConnection): void {
    connection.state = 'CLOSED';
    this.connections.delete(connection.id);
    this.sessions.get(connection.sessionId)?.detach(connection.id);
  }
}
