/**
 * Provider Client
 *
 * One call to an OpenAI-compatible /v1/chat/completions endpoint (OpenRouter
 * by default). Classifies every failure:
 * - 429 -> RateLimitedError (Retry-After honoured by the caller)
 * - timeout -> ProviderError PROVIDER_TIMEOUT
 * - network failure -> ProviderError PROVIDER_UNREACHABLE
 * - other non-2xx, or a body without assistant text -> ProviderError PROVIDER_ERROR
 *
 * No retries here; the Answer Composer owns the retry policy.
 */

import type { ProviderConfig } from '@/config/env';
import { ChatError, ProviderError, RateLimitedError } from '@/errors/chatErrors';
import type { ChatMessage } from '@/types/chat';
import type { FetchFn } from '@/types/fetch';
import {
  extractAssistantText,
  extractErrorMessage,
  parseRetryAfter,
} from '@/services/provider/openaiFormat';

export interface CompletionClient {
  complete(messages: readonly ChatMessage[]): Promise<string>;
}

export interface ChatCompletionRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  stream: false;
}

export class ChatCompletionsClient implements CompletionClient {
  constructor(
    private readonly config: ProviderConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {}

  buildRequest(messages: readonly ChatMessage[]): ChatCompletionRequest {
    return {
      model: this.config.model,
      messages: messages.map((message) => ({ role: message.role, content: message.content })),
      temperature: this.config.temperature,
      stream: false,
    };
  }

  async complete(messages: readonly ChatMessage[]): Promise<string> {
    const controller = new AbortController();
    let timedOut = false;
    const timeoutId = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.config.timeoutMs);

    try {
      let response: Response;
      try {
        response = await this.fetchFn(`${this.config.baseUrl}/v1/chat/completions`, {
          method: 'POST',
          headers: {
            'Content-Type': 'application/json',
            Authorization: `Bearer ${this.config.apiKey}`,
          },
          body: JSON.stringify(this.buildRequest(messages)),
          signal: controller.signal,
        });
      } catch (error) {
        if (timedOut) {
          throw new ProviderError(
            'PROVIDER_TIMEOUT',
            `Provider did not answer within ${this.config.timeoutMs}ms`,
            { cause: error },
          );
        }
        throw new ProviderError('PROVIDER_UNREACHABLE', 'Failed to reach the language-model provider', {
          cause: error,
        });
      }

      const body = await readJson(response);

      if (response.status === 429) {
        throw new RateLimitedError(parseRetryAfter(response.headers.get('retry-after')));
      }

      if (!response.ok) {
        const detail = extractErrorMessage(body);
        throw new ProviderError(
          'PROVIDER_ERROR',
          detail
            ? `Provider returned ${response.status}: ${detail}`
            : `Provider returned ${response.status}`,
        );
      }

      const text = extractAssistantText(body);
      if (!text) {
        throw new ProviderError('PROVIDER_ERROR', 'Provider response carried no assistant text');
      }
      return text;
    } catch (error) {
      // the body read can also be cut off by the timeout
      if (timedOut && !(error instanceof ChatError)) {
        throw new ProviderError(
          'PROVIDER_TIMEOUT',
          `Provider did not answer within ${this.config.timeoutMs}ms`,
          { cause: error },
        );
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

async function readJson(response: Response): Promise<unknown> {
  const text = await response.text();
  if (!text) return undefined;
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
