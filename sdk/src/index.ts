export { CompanionClient, toSocketUrl } from './client.js';
export {
  ChatSocket,
  DEFAULT_MAX_RECONNECT_DELAY_MS,
  DEFAULT_RECONNECT_DELAY_MS,
  globalSocketFactory,
  reconnectDelay,
} from './socket.js';
export {
  CompanionConnectionError,
  CompanionError,
  CompanionNotFoundError,
  CompanionRateLimitError,
  CompanionServerError,
  CompanionValidationError,
  createCompanionError,
  type CompanionErrorContext,
  type RateLimitInfo,
} from './errors.js';
export type {
  AudioInput,
  ChatReply,
  CompanionClientConfig,
  ConnectionState,
  HistoryTurn,
  Passage,
  RandomQuote,
  ReconnectOptions,
  SessionHistory,
  SocketFactory,
  SocketHandlers,
  SocketLike,
  Transport,
  VoiceReply,
} from './types.js';
