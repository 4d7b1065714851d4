/**
 * Chat socket with reconnection.
 *
 * Replies arrive in the order messages were sent, so pending requests are
 * settled first-in first-out. When the socket drops, every pending request is
 * rejected with CompanionConnectionError and a reconnect is scheduled with a
 * doubling delay; the session id travels with each reconnect so history is
 * kept. A socket factory that throws ends reconnection.
 */

import {
  CompanionConnectionError,
  CompanionServerError,
} from './errors.js';
import { serverFrameSchema, type ServerFrame } from './schemas.js';
import type {
  ChatReply,
  ConnectionState,
  ReconnectOptions,
  SocketFactory,
  SocketLike,
} from './types.js';

export const DEFAULT_RECONNECT_DELAY_MS = 3_000;
export const DEFAULT_MAX_RECONNECT_DELAY_MS = 30_000;

interface PendingReply {
  resolve: (reply: ChatReply) => void;
  reject: (error: Error) => void;
}

export interface ChatSocketOptions {
  url: string;
  createSocket: SocketFactory;
  reconnect?: ReconnectOptions;
  getSessionId: () => string | undefined;
  onSession: (sessionId: string) => void;
}

export class ChatSocket {
  private socket?: SocketLike;
  private stateValue: ConnectionState = 'idle';
  private readonly pending: PendingReply[] = [];
  private reconnectTimer?: ReturnType<typeof setTimeout>;
  private reconnectAttempts = 0;
  private closedByClient = false;
  private opening?: {
    resolve: (sessionId: string) => void;
    reject: (error: Error) => void;
  };

  constructor(private readonly options: ChatSocketOptions) {}

  get state(): ConnectionState {
    return this.stateValue;
  }

  /** True once the server has announced the session on this socket. */
  get isOpen(): boolean {
    return this.stateValue === 'open' && this.socket?.isOpen === true;
  }

  /**
   * Opens the socket and resolves with the session id the server announces.
   */
  connect(): Promise<string> {
    this.closedByClient = false;
    this.clearReconnectTimer();
    if (this.isOpen) {
      const sessionId = this.options.getSessionId();
      if (sessionId) return Promise.resolve(sessionId);
    }

    return new Promise<string>((resolve, reject) => {
      this.opening?.reject(new CompanionConnectionError('Superseded by a newer connect()'));
      this.opening = { resolve, reject };
      this.open();
    });
  }

  /**
   * Sends one message. Throws synchronously when the socket is not open or
   * the send itself fails, so the caller can fall back to HTTP.
   */
  send(text: string): Promise<ChatReply> {
    const socket = this.socket;
    if (!socket || !this.isOpen) {
      throw new CompanionConnectionError('Socket is not open', { code: 'NOT_CONNECTED' });
    }

    socket.send(JSON.stringify({ type: 'message', content: text }));
    return new Promise<ChatReply>((resolve, reject) => {
      this.pending.push({ resolve, reject });
    });
  }

  /** Closes the socket and stops reconnecting. */
  close(): void {
    this.closedByClient = true;
    this.clearReconnectTimer();
    const socket = this.socket;
    this.socket = undefined;
    socket?.close(1000, 'Client closed');
    this.settleClosed(new CompanionConnectionError('Connection closed by client'));
  }

  private open(): void {
    const previous = this.socket;
    this.socket = undefined;
    previous?.close(1000, 'Reconnecting');

    const url = new URL(this.options.url);
    const sessionId = this.options.getSessionId();
    if (sessionId) url.searchParams.set('sessionId', sessionId);

    this.stateValue = 'connecting';
    let socket: SocketLike | undefined;
    try {
      // events from a replaced socket are ignored
      socket = this.options.createSocket(url.toString(), {
        onMessage: (data) => {
          if (this.socket === socket) this.handleFrame(data);
        },
        onClose: (code, reason) => {
          if (this.socket === socket) this.handleClose(code, reason);
        },
      });
    } catch (error) {
      // a factory that cannot build a socket fails the same way on every retry
      this.settleClosed(
        error instanceof CompanionConnectionError
          ? error
          : new CompanionConnectionError(
              `Could not open socket: ${error instanceof Error ? error.message : String(error)}`,
              { code: 'SOCKET_UNAVAILABLE' },
            ),
      );
      return;
    }
    this.socket = socket;
  }

  private handleFrame(data: string): void {
    let json: unknown;
    try {
      json = JSON.parse(data);
    } catch {
      return;
    }
    const parsed = serverFrameSchema.safeParse(json);
    if (!parsed.success) return;

    this.dispatch(parsed.data);
  }

  private dispatch(frame: ServerFrame): void {
    switch (frame.type) {
      case 'session':
        this.stateValue = 'open';
        this.reconnectAttempts = 0;
        this.options.onSession(frame.sessionId);
        this.opening?.resolve(frame.sessionId);
        this.opening = undefined;
        return;
      case 'ping':
        this.socket?.send(JSON.stringify({ type: 'pong' }));
        return;
      case 'pong':
        return;
      case 'response':
        this.options.onSession(frame.sessionId);
        this.pending.shift()?.resolve({
          reply: frame.content,
          sessionId: frame.sessionId,
          transport: 'websocket',
        });
        return;
      case 'error':
        this.pending.shift()?.reject(
          new CompanionServerError(frame.content, { status: 0, code: 'SOCKET_ERROR' }),
        );
    }
  }

  private handleClose(code: number, reason: string): void {
    this.socket = undefined;
    this.settleClosed(
      new CompanionConnectionError(reason ? `Connection closed: ${reason}` : 'Connection closed', {
        details: { code },
      }),
    );

    if (!this.closedByClient) {
      this.scheduleReconnect();
    }
  }

  private settleClosed(error: CompanionConnectionError): void {
    this.stateValue = 'closed';
    for (const entry of this.pending.splice(0)) {
      entry.reject(error);
    }
    this.opening?.reject(error);
    this.opening = undefined;
  }

  private scheduleReconnect(): void {
    const { maxReconnectAttempts } = this.options.reconnect ?? {};
    if (maxReconnectAttempts !== undefined && this.reconnectAttempts >= maxReconnectAttempts) {
      return;
    }

    const delay = reconnectDelay(this.reconnectAttempts, this.options.reconnect);
    this.reconnectAttempts++;
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.open();
    }, delay);
  }

  private clearReconnectTimer(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
  }
}

/**
 * Delay before reconnect number `attempt + 1`: initial * 2^attempt, capped.
 */
export function reconnectDelay(attempt: number, options: ReconnectOptions = {}): number {
  const initial = options.initialDelayMs ?? DEFAULT_RECONNECT_DELAY_MS;
  const max = options.maxDelayMs ?? DEFAULT_MAX_RECONNECT_DELAY_MS;
  return Math.min(initial * 2 ** attempt, max);
}

/**
 * Adapts the platform WebSocket (browsers, React Native, Node 22+).
 */
export const globalSocketFactory: SocketFactory = (url, handlers) => {
  if (typeof globalThis.WebSocket === 'undefined') {
    throw new CompanionConnectionError('No WebSocket implementation available; pass createSocket', {
      code: 'NO_WEBSOCKET',
    });
  }

  const ws = new globalThis.WebSocket(url);
  // the server only sends text frames
  ws.addEventListener('message', (event: MessageEvent<unknown>) => {
    if (typeof event.data === 'string') handlers.onMessage(event.data);
  });
  // an error event is always followed by close
  ws.addEventListener('close', (event) => handlers.onClose(event.code, event.reason));

  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data) => ws.send(data),
    close: (code, reason) => ws.close(code, reason),
  };
};
