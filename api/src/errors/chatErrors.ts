/**
 * Chat Errors
 *
 * Every failure a turn can hit. Route handlers let these escape to the
 * onError handler in app.ts, which turns `code`/`status` into the JSON
 * error envelope. The socket gateway maps them to `{ type: 'error' }` frames.
 */

export type ChatErrorStatus = 400 | 404 | 413 | 415 | 422 | 429 | 500 | 502;

export class ChatError extends Error {
  readonly code: string;
  readonly status: ChatErrorStatus;

  constructor(code: string, message: string, status: ChatErrorStatus, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChatError';
    this.code = code;
    this.status = status;
  }
}

export type ProviderErrorCode = 'PROVIDER_ERROR' | 'PROVIDER_TIMEOUT' | 'PROVIDER_UNREACHABLE';

/**
 * The language-model (or embedding) provider errored, timed out or could not be reached.
 */
export class ProviderError extends ChatError {
  declare readonly code: ProviderErrorCode;

  constructor(code: ProviderErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, 502, options);
    this.name = 'ProviderError';
  }
}

/**
 * The provider asked us to slow down (HTTP 429).
 */
export class RateLimitedError extends ChatError {
  readonly retryAfterMs?: number;

  constructor(retryAfterMs?: number) {
    super('PROVIDER_RATE_LIMITED', 'Provider is throttling requests', 429);
    this.name = 'RateLimitedError';
    this.retryAfterMs = retryAfterMs;
  }
}

export type TranscriptionErrorCode =
  | 'NO_AUDIO'
  | 'EMPTY_AUDIO'
  | 'UNSUPPORTED_AUDIO'
  | 'AUDIO_TOO_LARGE'
  | 'UNINTELLIGIBLE_AUDIO'
  | 'TRANSCRIPTION_FAILED';

const TRANSCRIPTION_STATUS: Record<TranscriptionErrorCode, ChatErrorStatus> = {
  NO_AUDIO: 400,
  EMPTY_AUDIO: 400,
  UNSUPPORTED_AUDIO: 415,
  AUDIO_TOO_LARGE: 413,
  UNINTELLIGIBLE_AUDIO: 422,
  TRANSCRIPTION_FAILED: 502,
};

export class TranscriptionError extends ChatError {
  declare readonly code: TranscriptionErrorCode;

  constructor(code: TranscriptionErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, TRANSCRIPTION_STATUS[code], options);
    this.name = 'TranscriptionError';
  }
}

export class EmptyInputError extends ChatError {
  constructor() {
    super('EMPTY_INPUT', 'Message must contain some text', 400);
    this.name = 'EmptyInputError';
  }
}

export class MessageTooLongError extends ChatError {
  constructor(readonly maxLength: number) {
    super('MESSAGE_TOO_LONG', `Message must be at most ${maxLength} characters`, 400);
    this.name = 'MessageTooLongError';
  }
}

export class SessionNotFoundError extends ChatError {
  constructor(sessionId: string) {
    super('NOT_FOUND', `Session ${sessionId} not found`, 404);
    this.name = 'SessionNotFoundError';
  }
}

/**
 * Startup-only: the process configuration is missing or invalid.
 */
export class ConfigError extends Error {
  readonly code = 'CONFIG_ERROR' as const;

  constructor(readonly problems: string[]) {
    super(`Invalid configuration: ${problems.join('; ')}`);
    this.name = 'ConfigError';
  }
}
