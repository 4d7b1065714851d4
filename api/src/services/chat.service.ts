/**
 * Chat Service
 *
 * The single pipeline behind every transport: WebSocket frames, POST
 * /api/chat and transcribed voice all land in submit(). Identical input and
 * identical history therefore produce identical provider requests whichever
 * way the message arrived.
 */

import { MAX_RETRIEVAL_TOP_K } from '@/config/env';
import { EmptyInputError, MessageTooLongError, ProviderError } from '@/errors/chatErrors';
import type { AnswerComposer } from '@/services/answerComposer.service';
import { readIntent } from '@/services/intent';
import type { PassageIndex } from '@/services/passageIndex.service';
import type { ConversationSession, SessionStore } from '@/services/session.service';
import type { ChatResult, Intent, Passage, Transport } from '@/types/chat';
import { logger, type Logger } from '@/utils/logger';
import { MAX_MESSAGE_LENGTH } from '@/validators/chat';

export interface SubmitInput {
  sessionId?: string;
  text: string;
  transport: Transport;
}

export interface ChatServiceOptions {
  topK: number;
}

export function retrievalDepth(topK: number, intent: Intent): number {
  const depth = intent.quoteRequest ? Math.max(topK, intent.quoteCount) : topK;
  return Math.min(depth, MAX_RETRIEVAL_TOP_K);
}

export class ChatService {
  constructor(
    private readonly sessions: SessionStore,
    private readonly index: PassageIndex,
    private readonly composer: AnswerComposer,
    private readonly options: ChatServiceOptions,
  ) {}

  /**
   * @throws EmptyInputError when the text is blank after trimming
   * @throws MessageTooLongError past MAX_MESSAGE_LENGTH characters
   */
  async submit(input: SubmitInput): Promise<ChatResult> {
    const text = input.text.trim();
    if (!text) {
      throw new EmptyInputError();
    }
    if (text.length > MAX_MESSAGE_LENGTH) {
      throw new MessageTooLongError(MAX_MESSAGE_LENGTH);
    }

    const session = this.sessions.resolve(input.sessionId);
    return session.runExclusive(() => this.runTurn(session, text, input.transport));
  }

  private async runTurn(
    session: ConversationSession,
    text: string,
    transport: Transport,
  ): Promise<ChatResult> {
    const log = logger.child({ sessionId: session.id, transport });

    session.append('user', text);
    const turns = session.snapshot();

    const intent = readIntent(text);
    const passages = await this.retrieve(text, retrievalDepth(this.options.topK, intent), log);

    const result = await this.composer.compose({
      sessionId: session.id,
      turns,
      passages,
      userText: text,
      intent,
    });

    const reply = session.append('assistant', result.reply);

    log.info('Turn completed', {
      passages: passages.map((p) => p.id),
      attempts: result.attempts,
      fallback: result.fallback,
    });

    return {
      sessionId: session.id,
      reply: result.reply,
      passages: passages.map((p) => ({ id: p.id, text: p.text })),
      fallback: result.fallback,
      transport,
      timestamp: new Date(reply.timestamp).toISOString(),
    };
  }

  private async retrieve(
    text: string,
    k: number,
    log: Logger,
  ): Promise<Passage[]> {
    try {
      return await this.index.retrieve(text, k);
    } catch (error) {
      // remote embeddings can fail per query; answer without passages
      if (error instanceof ProviderError) {
        log.warn('Retrieval failed, composing without passages', { errorCode: error.code });
        return [];
      }
      throw error;
    }
  }
}
