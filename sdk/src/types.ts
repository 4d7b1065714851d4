export interface ReconnectOptions {
  /** Delay before the first reconnect attempt. Default 3000 ms. */
  initialDelayMs?: number;
  /** Upper bound for the doubling delay. Default 30000 ms. */
  maxDelayMs?: number;
  /** Unlimited when omitted. */
  maxReconnectAttempts?: number;
}

export interface CompanionClientConfig {
  /** Server origin, e.g. `https://companion.example.org`. */
  baseUrl: string;
  fetch?: typeof globalThis.fetch;
  /** Opens the chat socket. Defaults to the global WebSocket when there is one. */
  createSocket?: SocketFactory;
  /** Resume an earlier conversation. */
  sessionId?: string;
  reconnect?: ReconnectOptions;
  defaultHeaders?: Record<string, string>;
  timeoutMs?: number;
}

export type Transport = 'websocket' | 'http' | 'voice';

export type ConnectionState = 'idle' | 'connecting' | 'open' | 'closed';

export interface SocketHandlers {
  onMessage(data: string): void;
  onClose(code: number, reason: string): void;
}

/** The part of a WebSocket the client needs. */
export interface SocketLike {
  readonly isOpen: boolean;
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketLike;

export interface Passage {
  id: string;
  text: string;
}

export interface ChatReply {
  reply: string;
  sessionId: string;
  transport: Transport;
  /** Only present on HTTP replies. */
  passages?: Passage[];
  fallback?: boolean;
  timestamp?: string;
}

export interface VoiceReply extends ChatReply {
  /** What the server heard. */
  text: string;
}

export interface HistoryTurn {
  role: 'user' | 'assistant';
  text: string;
  timestamp: string;
}

export interface SessionHistory {
  sessionId: string;
  turns: HistoryTurn[];
}

export interface RandomQuote {
  quote: Passage;
  source: string;
}

/** Anything FormData can carry as a file. */
export type AudioInput = Blob;
