import type { ZodType, ZodTypeDef } from 'zod';
import {
  CompanionServerError,
  createCompanionError,
  type RateLimitInfo,
} from './errors.js';
import type { CompanionClientConfig } from './types.js';

export interface HttpRequestOptions {
  method: 'GET' | 'POST' | 'DELETE';
  path: string;
  /** Sent as JSON. */
  body?: unknown;
  /** Sent as multipart/form-data; wins over `body`. */
  form?: FormData;
}

export type ResponseSchema<T> = ZodType<T, ZodTypeDef, unknown>;

export class CompanionHttpClient {
  private readonly baseUrl: string;
  private readonly fetchFn: typeof globalThis.fetch;
  private readonly defaultHeaders: Record<string, string>;
  private readonly defaultTimeoutMs: number;

  constructor(config: CompanionClientConfig) {
    this.baseUrl = normalizeBaseUrl(config.baseUrl);
    this.fetchFn = config.fetch ?? globalThis.fetch.bind(globalThis);
    this.defaultHeaders = config.defaultHeaders ?? {};
    this.defaultTimeoutMs = config.timeoutMs ?? 30_000;
  }

  get origin(): string {
    return this.baseUrl;
  }

  async request<T>(options: HttpRequestOptions, schema: ResponseSchema<T>): Promise<T> {
    const url = buildUrl(this.baseUrl, options.path);
    const headers = buildHeaders(
      this.defaultHeaders,
      options.form === undefined && options.body !== undefined,
    );

    const controller = new AbortController();
    const timeoutMs = this.defaultTimeoutMs;
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await this.fetchFn(url, {
        method: options.method,
        headers,
        body: options.form ?? (options.body !== undefined ? JSON.stringify(options.body) : undefined),
        signal: controller.signal,
      });

      const responseText = await response.text();
      const parsed = parseJsonSafely(responseText);
      const responseHeaders = headersToObject(response.headers);
      const rateLimit = parseRateLimitHeaders(response.headers);

      if (!response.ok) {
        const { code, message, details } = parseErrorEnvelope(response.status, parsed);
        throw createCompanionError(message, {
          status: response.status,
          code,
          details,
          headers: responseHeaders,
          rateLimit,
        });
      }

      if (responseText && parsed === undefined) {
        throw new CompanionServerError('Expected JSON response from companion API', {
          status: response.status,
          code: 'INVALID_RESPONSE',
          headers: responseHeaders,
          rateLimit,
        });
      }

      const result = schema.safeParse(parsed);
      if (!result.success) {
        throw new CompanionServerError('Unexpected response shape from companion API', {
          status: response.status,
          code: 'INVALID_RESPONSE',
          details: result.error.issues,
          headers: responseHeaders,
          rateLimit,
        });
      }

      return result.data;
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new CompanionServerError(`Request timed out after ${timeoutMs}ms`, {
          status: 408,
          code: 'TIMEOUT',
        });
      }

      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

function normalizeBaseUrl(baseUrl: string): string {
  return baseUrl.replace(/\/+$/, '');
}

function buildUrl(baseUrl: string, path: string): string {
  const normalizedPath = path.startsWith('/') ? path : `/${path}`;
  return new URL(`${baseUrl}${normalizedPath}`).toString();
}

function buildHeaders(defaultHeaders: Record<string, string>, hasJsonBody: boolean): Headers {
  const merged = new Headers(defaultHeaders);

  // multipart bodies set their own boundary
  if (hasJsonBody && !merged.has('content-type')) {
    merged.set('Content-Type', 'application/json');
  }

  return merged;
}

function headersToObject(headers: Headers): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key] = value;
  });
  return out;
}

function parseRateLimitHeaders(headers: Headers): RateLimitInfo | undefined {
  const limit = toNumber(headers.get('x-ratelimit-limit'));
  const remaining = toNumber(headers.get('x-ratelimit-remaining'));
  const reset = toNumber(headers.get('x-ratelimit-reset'));
  const retryAfter = toNumber(headers.get('retry-after'));

  if (
    limit === undefined &&
    remaining === undefined &&
    reset === undefined &&
    retryAfter === undefined
  ) {
    return undefined;
  }

  return { limit, remaining, reset, retryAfter };
}

function toNumber(value: string | null): number | undefined {
  if (value === null || value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function parseJsonSafely(text: string): unknown {
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseErrorEnvelope(
  status: number,
  parsed: unknown,
): { code: string; message: string; details?: unknown } {
  const fallbackMessage = `Companion API request failed with status ${status}`;

  if (!isRecord(parsed) || !isRecord(parsed.error)) {
    return { code: `HTTP_${status}`, message: fallbackMessage };
  }

  const error = parsed.error;
  const code = typeof error.code === 'string' ? error.code : `HTTP_${status}`;
  const message = typeof error.message === 'string' ? error.message : fallbackMessage;

  return { code, message, details: error.details };
}
