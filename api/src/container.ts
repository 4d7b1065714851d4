/**
 * Service wiring
 *
 * Builds every long-lived component from the frozen configuration. The
 * bootstrap calls this once; tests call it with their own passages and a
 * stubbed fetch.
 */

import type { AppConfig } from '@/config/env';
import { SocketGateway } from '@/gateway/socketGateway';
import { AnswerComposer } from '@/services/answerComposer.service';
import { ChatService } from '@/services/chat.service';
import { loadCorpus } from '@/services/corpus.service';
import { OpenAiEmbedder, TermVectorEmbedder, type Embedder } from '@/services/embedding.service';
import { PassageIndex } from '@/services/passageIndex.service';
import { ChatCompletionsClient } from '@/services/provider/chatCompletions';
import { SessionStore, type Clock } from '@/services/session.service';
import { TranscriptionService } from '@/services/transcription.service';
import type { Passage } from '@/types/chat';
import type { FetchFn } from '@/types/fetch';
import type { Sleep } from '@/utils/retry';

export interface AppServices {
  config: AppConfig;
  index: PassageIndex;
  sessions: SessionStore;
  chat: ChatService;
  transcription: TranscriptionService;
  gateway: SocketGateway;
}

export interface BuildOptions {
  /** Skips reading CORPUS_PATH. */
  passages?: readonly Passage[];
  fetch?: FetchFn;
  sleep?: Sleep;
  clock?: Clock;
}

function createEmbedder(config: AppConfig, passages: readonly Passage[], fetchFn: FetchFn): Embedder {
  if (config.embedding.provider === 'openai') {
    return new OpenAiEmbedder(config.embedding, fetchFn);
  }
  return new TermVectorEmbedder(passages.map((passage) => passage.text));
}

export async function buildServices(config: AppConfig, options: BuildOptions = {}): Promise<AppServices> {
  const fetchFn = options.fetch ?? fetch;
  const passages = options.passages ?? (await loadCorpus(config.corpusPath));

  const index = await PassageIndex.build(passages, createEmbedder(config, passages, fetchFn));
  const sessions = new SessionStore({ ttlMs: config.session.ttlMs, clock: options.clock });

  const composer = new AnswerComposer(new ChatCompletionsClient(config.provider, fetchFn), {
    retry: config.retry,
    historyWindow: config.retrieval.historyWindow,
    sleep: options.sleep,
  });
  const chat = new ChatService(sessions, index, composer, { topK: config.retrieval.topK });

  const transcription = new TranscriptionService(config.transcription, fetchFn);
  const gateway = new SocketGateway(chat, sessions, { ...config.socket, clock: options.clock });

  return { config, index, sessions, chat, transcription, gateway };
}
