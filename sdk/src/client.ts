import { CompanionNotFoundError, CompanionValidationError } from './errors.js';
import { CompanionHttpClient } from './http.js';
import {
  chatResponseSchema,
  emptySchema,
  historySchema,
  randomQuoteSchema,
  transcriptSchema,
  voiceResponseSchema,
} from './schemas.js';
import { ChatSocket, globalSocketFactory } from './socket.js';
import type {
  AudioInput,
  ChatReply,
  CompanionClientConfig,
  ConnectionState,
  RandomQuote,
  SessionHistory,
  VoiceReply,
} from './types.js';

const DEFAULT_AUDIO_FILENAME = 'recording.m4a';

export class CompanionClient {
  private readonly http: CompanionHttpClient;
  private readonly socket: ChatSocket;
  private currentSessionId?: string;

  constructor(config: CompanionClientConfig) {
    if (!config.baseUrl || config.baseUrl.trim().length === 0) {
      throw new Error('CompanionClient requires a non-empty baseUrl');
    }

    this.http = new CompanionHttpClient(config);
    this.currentSessionId = config.sessionId;
    this.socket = new ChatSocket({
      url: toSocketUrl(this.http.origin),
      createSocket: config.createSocket ?? globalSocketFactory,
      reconnect: config.reconnect,
      getSessionId: () => this.currentSessionId,
      onSession: (sessionId) => {
        this.currentSessionId = sessionId;
      },
    });
  }

  get sessionId(): string | undefined {
    return this.currentSessionId;
  }

  get connectionState(): ConnectionState {
    return this.socket.state;
  }

  /**
   * Opens the chat socket; resolves with the session id the server confirms.
   */
  connect(): Promise<string> {
    return this.socket.connect();
  }

  /** Closes the socket for good; send() keeps working over HTTP. */
  close(): void {
    this.socket.close();
  }

  /**
   * Sends a message over the socket when it is open, otherwise over
   * POST /api/chat with the same session.
   */
  async send(text: string): Promise<ChatReply> {
    const message = requireText(text);

    if (this.socket.isOpen) {
      try {
        return this.socket.send(message);
      } catch (error) {
        // the socket went away between the check and the send
        if (!(error instanceof Error)) throw error;
      }
    }

    return this.sendOverHttp(message);
  }

  async transcribe(audio: AudioInput, filename: string = DEFAULT_AUDIO_FILENAME): Promise<string> {
    const response = await this.http.request(
      { method: 'POST', path: '/api/transcribe', form: audioForm(audio, filename) },
      transcriptSchema,
    );
    return response.text;
  }

  /**
   * Uploads a recording; the server transcribes it and answers in the
   * current session.
   */
  async sendVoice(audio: AudioInput, filename: string = DEFAULT_AUDIO_FILENAME): Promise<VoiceReply> {
    const form = audioForm(audio, filename);
    if (this.currentSessionId) form.append('sessionId', this.currentSessionId);

    const response = await this.http.request(
      { method: 'POST', path: '/api/voice', form },
      voiceResponseSchema,
    );
    this.currentSessionId = response.sessionId;

    return {
      text: response.text,
      reply: response.response,
      sessionId: response.sessionId,
      transport: 'voice',
      passages: response.passages,
      fallback: response.fallback,
      timestamp: response.timestamp,
    };
  }

  async history(): Promise<SessionHistory> {
    const sessionId = this.requireSession();
    return this.http.request(
      { method: 'GET', path: `/api/sessions/${encodeURIComponent(sessionId)}` },
      historySchema,
    );
  }

  /**
   * Clears the conversation on the server. The session id stays usable.
   */
  async clearHistory(): Promise<void> {
    const sessionId = this.requireSession();
    try {
      await this.http.request(
        { method: 'DELETE', path: `/api/sessions/${encodeURIComponent(sessionId)}` },
        emptySchema,
      );
    } catch (error) {
      // already gone (expired or cleared elsewhere)
      if (error instanceof CompanionNotFoundError) return;
      throw error;
    }
  }

  async randomQuote(): Promise<RandomQuote> {
    return this.http.request({ method: 'GET', path: '/api/quotes/random' }, randomQuoteSchema);
  }

  private async sendOverHttp(message: string): Promise<ChatReply> {
    const response = await this.http.request(
      {
        method: 'POST',
        path: '/api/chat',
        body: {
          message,
          ...(this.currentSessionId ? { sessionId: this.currentSessionId } : {}),
        },
      },
      chatResponseSchema,
    );
    this.currentSessionId = response.sessionId;

    return {
      reply: response.response,
      sessionId: response.sessionId,
      transport: 'http',
      passages: response.passages,
      fallback: response.fallback,
      timestamp: response.timestamp,
    };
  }

  private requireSession(): string {
    if (!this.currentSessionId) {
      throw new CompanionValidationError('No conversation has been started yet', {
        status: 400,
        code: 'NO_SESSION',
      });
    }
    return this.currentSessionId;
  }
}

function requireText(text: string): string {
  const message = text.trim();
  if (message.length === 0) {
    throw new CompanionValidationError('Message must contain some text', {
      status: 400,
      code: 'EMPTY_INPUT',
    });
  }
  return message;
}

function audioForm(audio: AudioInput, filename: string): FormData {
  const form = new FormData();
  form.append('file', audio, filename);
  return form;
}

export function toSocketUrl(origin: string): string {
  const url = new URL(origin);
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  url.pathname = `${url.pathname.replace(/\/+$/, '')}/ws`;
  url.search = '';
  return url.toString();
}
