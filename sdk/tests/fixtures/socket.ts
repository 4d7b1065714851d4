import type { SocketFactory, SocketHandlers, SocketLike } from '../../src/types.js';

/** In-memory socket; the test plays the server. */
export class FakeSocket implements SocketLike {
  readonly sent: string[] = [];
  isOpen = true;
  failSends = false;
  closed?: { code?: number; reason?: string };

  constructor(
    readonly url: string,
    private readonly handlers: SocketHandlers,
  ) {}

  send(data: string): void {
    if (this.failSends) {
      throw new Error('socket send failed');
    }
    this.sent.push(data);
  }

  close(code?: number, reason?: string): void {
    this.isOpen = false;
    this.closed = { code, reason };
  }

  /** Server -> client frame. */
  receive(frame: unknown): void {
    this.handlers.onMessage(JSON.stringify(frame));
  }

  /** The connection drops without the client asking. */
  drop(code = 1006, reason = ''): void {
    this.isOpen = false;
    this.handlers.onClose(code, reason);
  }

  sentFrames(): unknown[] {
    return this.sent.map((data) => JSON.parse(data));
  }
}

export function createSocketFactory() {
  const sockets: FakeSocket[] = [];
  const factory: SocketFactory = (url, handlers) => {
    const socket = new FakeSocket(url, handlers);
    sockets.push(socket);
    return socket;
  };
  return { factory, sockets };
}
