/**
 * Answer Composer
 *
 * Builds the outbound chat request from a fixed instruction, the retrieved
 * passages and the trailing window of session history, then calls the
 * provider. Throttling is retried with bounded exponential backoff; every
 * other provider failure, and an exhausted retry budget, yields
 * FALLBACK_REPLY. compose() never rejects.
 */

import type { RetryPolicy } from '@/config/env';
import { ChatError, RateLimitedError } from '@/errors/chatErrors';
import type { CompletionClient } from '@/services/provider/chatCompletions';
import type { ChatMessage, ConversationTurn, Intent, Passage } from '@/types/chat';
import { logger } from '@/utils/logger';
import { RetryExhaustedError, withRetry, type Sleep } from '@/utils/retry';

export const FALLBACK_REPLY =
  'I apologize, but I am unable to answer right now. Please take a quiet moment and try again shortly.';

export const SYSTEM_INSTRUCTION = [
  'You are a gentle and thoughtful spiritual companion.',
  'Listen closely, answer with warmth and brevity, and draw on The Hidden Words when they help.',
  'Never invent passages or attribute words to the text that it does not contain.',
].join(' ');

const QUOTE_RULE =
  'When you quote a passage, reproduce it word for word exactly as given above. Do not paraphrase it and do not add verse numbers.';

// Any number opening a line, ordinary counts included
const VERSE_NUMBER = /^[ \t]*\d+(?:[.):][ \t]*|[ \t]+)/gm;

export function stripVerseNumbers(reply: string): string {
  return reply.replace(VERSE_NUMBER, '');
}

export interface ComposeInput {
  sessionId: string;
  /** Session turns at the time of the request; ends with the current user turn. */
  turns: readonly ConversationTurn[];
  passages: readonly Passage[];
  userText: string;
  intent?: Intent;
}

export interface ComposeResult {
  reply: string;
  attempts: number;
  retries: number;
  fallback: boolean;
  errorCode?: string;
}

export interface AnswerComposerOptions {
  retry: RetryPolicy;
  historyWindow: number;
  sleep?: Sleep;
}

export class AnswerComposer {
  constructor(
    private readonly client: CompletionClient,
    private readonly options: AnswerComposerOptions,
  ) {}

  buildMessages(input: ComposeInput): ChatMessage[] {
    const system: string[] = [SYSTEM_INSTRUCTION];

    if (input.passages.length > 0) {
      const numbered = input.passages.map((passage, i) => `[${i + 1}] ${passage.text}`).join('\n\n');
      system.push(`Passages from The Hidden Words:\n\n${numbered}`, QUOTE_RULE);
    }

    if (input.intent?.quoteRequest) {
      const count = input.intent.quoteCount;
      system.push(`The user asked for ${count} ${count === 1 ? 'quotation' : 'quotations'}.`);
    }

    if (input.intent?.emotion) {
      system.push(
        `The user seems to be feeling ${input.intent.emotion.name}. Let that shape the tone of your reply.`,
      );
    }

    const history: ChatMessage[] = input.turns
      .slice(-this.options.historyWindow)
      .map((turn) => ({ role: turn.role, content: turn.text }));

    const last = history.at(-1);
    if (!last || last.role !== 'user' || last.content !== input.userText) {
      history.push({ role: 'user', content: input.userText });
    }

    return [{ role: 'system', content: system.join('\n\n') }, ...history];
  }

  async compose(input: ComposeInput): Promise<ComposeResult> {
    const log = logger.child({ sessionId: input.sessionId });
    const messages = this.buildMessages(input);
    let attempts = 0;

    try {
      const outcome = await withRetry(
        () => {
          attempts++;
          return this.client.complete(messages);
        },
        this.options.retry,
        {
          isRetryable: (error) => error instanceof RateLimitedError,
          delayHint: (error) => (error instanceof RateLimitedError ? error.retryAfterMs : undefined),
          onRetry: ({ attempt, delayMs }) =>
            log.warn('Provider throttled, retrying', { attempt, delayMs }),
          sleep: this.options.sleep,
        },
      );

      const reply = input.passages.length > 0 ? stripVerseNumbers(outcome.value) : outcome.value;
      return {
        reply,
        attempts: outcome.attempts,
        retries: outcome.attempts - 1,
        fallback: false,
      };
    } catch (error) {
      const cause = error instanceof RetryExhaustedError ? error.lastError : error;
      const errorCode = cause instanceof ChatError ? cause.code : 'INTERNAL_ERROR';

      log.error('Provider call failed, replying with fallback', {
        errorCode,
        attempts,
        error: cause instanceof Error ? cause.message : String(cause),
      });

      return {
        reply: FALLBACK_REPLY,
        attempts,
        retries: Math.max(0, attempts - 1),
        fallback: true,
        errorCode,
      };
    }
  }
}
