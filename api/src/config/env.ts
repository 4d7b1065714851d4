/**
 * Application Configuration
 *
 * Read once at startup from the process environment, validated with zod and
 * frozen. Components receive the slice they need; nothing below the bootstrap
 * reads process.env directly.
 *
 * PROVIDER_API_KEY and PROVIDER_MODEL are required. A missing or invalid value
 * raises ConfigError, which the bootstrap treats as fatal.
 */

import { z } from 'zod';
import { ConfigError } from '@/errors/chatErrors';

export interface ProviderConfig {
  readonly apiKey: string;
  readonly model: string;
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly temperature: number;
}

export interface RetryPolicy {
  /** Total attempts, the first call included. */
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
}

export interface RetrievalConfig {
  readonly topK: number;
  readonly historyWindow: number;
}

export interface EmbeddingConfig {
  readonly provider: 'local' | 'openai';
  readonly model: string;
  readonly baseUrl: string;
  readonly apiKey: string;
}

export interface TranscriptionConfig {
  readonly model: string;
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly maxBytes: number;
}

export interface SocketConfig {
  readonly idleTimeoutMs: number;
  readonly keepaliveMs: number;
}

export interface AppConfig {
  readonly port: number;
  readonly corsOrigin?: string;
  readonly corpusPath: string;
  readonly provider: ProviderConfig;
  readonly retry: RetryPolicy;
  readonly retrieval: RetrievalConfig;
  readonly embedding: EmbeddingConfig;
  readonly transcription: TranscriptionConfig;
  readonly session: { readonly ttlMs: number };
  readonly socket: SocketConfig;
}

export const MAX_RETRIEVAL_TOP_K = 5;

// `.env` files leave unset keys as empty strings
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = () => z.preprocess(blankToUndefined, z.string().trim().optional());
const requiredString = () => z.preprocess(blankToUndefined, z.string().trim().min(1));
const url = (fallback: string) =>
  z.preprocess(blankToUndefined, z.string().url().default(fallback));
const int = (fallback: number, min: number, max: number = Number.MAX_SAFE_INTEGER) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).default(fallback));

const envSchema = z.object({
  PORT: int(3000, 1, 65535),
  CORS_ORIGIN: optionalString(),
  CORPUS_PATH: z.preprocess(blankToUndefined, z.string().default('data/hidden-words.txt')),

  PROVIDER_API_KEY: requiredString(),
  PROVIDER_MODEL: requiredString(),
  PROVIDER_BASE_URL: url('https://openrouter.ai/api'),
  PROVIDER_TIMEOUT_MS: int(30_000, 1000),
  PROVIDER_TEMPERATURE: z.preprocess(blankToUndefined, z.coerce.number().min(0).max(2).default(0.7)),
  PROVIDER_MAX_ATTEMPTS: int(3, 1, 10),
  PROVIDER_RETRY_BASE_MS: int(500, 0),
  PROVIDER_RETRY_MAX_MS: int(4000, 0),

  HISTORY_WINDOW: int(10, 1, 100),
  RETRIEVAL_TOP_K: int(1, 0, MAX_RETRIEVAL_TOP_K),

  EMBEDDING_PROVIDER: z.preprocess(blankToUndefined, z.enum(['local', 'openai']).default('local')),
  EMBEDDING_MODEL: z.preprocess(blankToUndefined, z.string().default('text-embedding-3-small')),
  EMBEDDING_BASE_URL: url('https://api.openai.com'),
  EMBEDDING_API_KEY: optionalString(),

  TRANSCRIPTION_MODEL: z.preprocess(blankToUndefined, z.string().default('whisper-1')),
  TRANSCRIPTION_BASE_URL: url('https://api.openai.com'),
  TRANSCRIPTION_API_KEY: optionalString(),
  TRANSCRIPTION_MAX_BYTES: int(25 * 1024 * 1024, 1),

  SESSION_TTL_MS: int(30 * 60_000, 1000),
  WS_IDLE_TIMEOUT_MS: int(60_000, 1000),
  WS_KEEPALIVE_MS: int(30_000, 1000),
});

function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const nested of Object.values(value)) {
    if (nested && typeof nested === 'object') {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

function trimTrailingSlash(value: string): string {
  return value.replace(/\/+$/, '');
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }

  const e = parsed.data;
  if (e.PROVIDER_RETRY_MAX_MS < e.PROVIDER_RETRY_BASE_MS) {
    throw new ConfigError(['PROVIDER_RETRY_MAX_MS: must be >= PROVIDER_RETRY_BASE_MS']);
  }

  const config: AppConfig = {
    port: e.PORT,
    corsOrigin: e.CORS_ORIGIN,
    corpusPath: e.CORPUS_PATH,
    provider: {
      apiKey: e.PROVIDER_API_KEY,
      model: e.PROVIDER_MODEL,
      baseUrl: trimTrailingSlash(e.PROVIDER_BASE_URL),
      timeoutMs: e.PROVIDER_TIMEOUT_MS,
      temperature: e.PROVIDER_TEMPERATURE,
    },
    retry: {
      maxAttempts: e.PROVIDER_MAX_ATTEMPTS,
      baseDelayMs: e.PROVIDER_RETRY_BASE_MS,
      maxDelayMs: e.PROVIDER_RETRY_MAX_MS,
    },
    retrieval: {
      topK: e.RETRIEVAL_TOP_K,
      historyWindow: e.HISTORY_WINDOW,
    },
    embedding: {
      provider: e.EMBEDDING_PROVIDER,
      model: e.EMBEDDING_MODEL,
      baseUrl: trimTrailingSlash(e.EMBEDDING_BASE_URL),
      apiKey: e.EMBEDDING_API_KEY ?? e.PROVIDER_API_KEY,
    },
    transcription: {
      model: e.TRANSCRIPTION_MODEL,
      baseUrl: trimTrailingSlash(e.TRANSCRIPTION_BASE_URL),
      apiKey: e.TRANSCRIPTION_API_KEY ?? e.PROVIDER_API_KEY,
      maxBytes: e.TRANSCRIPTION_MAX_BYTES,
    },
    session: {
      ttlMs: e.SESSION_TTL_MS,
    },
    socket: {
      idleTimeoutMs: e.WS_IDLE_TIMEOUT_MS,
      keepaliveMs: e.WS_KEEPALIVE_MS,
    },
  };

  return deepFreeze(config);
}
