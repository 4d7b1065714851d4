/**
 * Embedding Service
 *
 * Two embedders sit behind one interface:
 * - TermVectorEmbedder: TF-IDF over the corpus vocabulary, no network. Default.
 * - OpenAiEmbedder: any OpenAI-compatible /v1/embeddings endpoint.
 */

import { z } from 'zod';
import type { EmbeddingConfig } from '@/config/env';
import { ProviderError } from '@/errors/chatErrors';
import type { FetchFn } from '@/types/fetch';
import { logger } from '@/utils/logger';
import stopwordList from '../../data/stopwords.json';

export interface Embedder {
  readonly name: string;
  /** One vector per input, in input order. */
  embed(texts: readonly string[]): Promise<number[][]>;
}

// =====================================================
// Local term vectors
// =====================================================

const STOPWORDS: ReadonlySet<string> = new Set(stopwordList);

const SUFFIXES = ['ing', 'est', 'ed', 'es', 's'] as const;
const MIN_STEM_LENGTH = 3;

/**
 * Folds simple plural and verb endings so "loves", "loved", "lovest" and
 * "love" land on the same term.
 */
export function stem(word: string): string {
  let result = word;
  for (const suffix of SUFFIXES) {
    if (result.endsWith(suffix) && result.length - suffix.length >= MIN_STEM_LENGTH) {
      result = result.slice(0, -suffix.length);
      break;
    }
  }
  if (result.length > MIN_STEM_LENGTH && result.endsWith('e')) {
    result = result.slice(0, -1);
  }
  return result;
}

/**
 * Lower-cased, diacritic-free, stop-word-free stems of `text`.
 */
export function tokenize(text: string): string[] {
  return text
    .normalize('NFKD')
    .replace(/\p{M}+/gu, '')
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0 && !STOPWORDS.has(token))
    .map(stem);
}

export class TermVectorEmbedder implements Embedder {
  readonly name = 'term-vector';

  private readonly vocabulary = new Map<string, number>();
  private readonly idf: number[] = [];

  /**
   * @param documents - the texts that define the vocabulary and document frequencies
   */
  constructor(documents: readonly string[]) {
    const documentFrequency = new Map<string, number>();

    for (const document of documents) {
      for (const term of new Set(tokenize(document))) {
        if (!this.vocabulary.has(term)) {
          this.vocabulary.set(term, this.vocabulary.size);
        }
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }

    const total = documents.length;
    for (const [term, index] of this.vocabulary) {
      const df = documentFrequency.get(term) ?? 1;
      this.idf[index] = Math.log(1 + total / df);
    }
  }

  get dimensions(): number {
    return this.vocabulary.size;
  }

  vectorize(text: string): number[] {
    const vector = new Array<number>(this.vocabulary.size).fill(0);
    for (const term of tokenize(text)) {
      const index = this.vocabulary.get(term);
      if (index !== undefined) {
        vector[index] += this.idf[index];
      }
    }
    return vector;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    return texts.map((text) => this.vectorize(text));
  }
}

// =====================================================
// Remote embeddings
// =====================================================

const embeddingsResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int(),
      embedding: z.array(z.number()),
    }),
  ),
});

const EMBEDDING_BATCH_SIZE = 96;
const EMBEDDING_TIMEOUT_MS = 30_000;

export class OpenAiEmbedder implements Embedder {
  readonly name: string;

  constructor(
    private readonly config: EmbeddingConfig,
    private readonly fetchFn: FetchFn = fetch,
  ) {
    this.name = `openai:${config.model}`;
  }

  async embed(texts: readonly string[]): Promise<number[][]> {
    const vectors: number[][] = [];
    for (let start = 0; start < texts.length; start += EMBEDDING_BATCH_SIZE) {
      vectors.push(...(await this.embedBatch(texts.slice(start, start + EMBEDDING_BATCH_SIZE))));
    }
    return vectors;
  }

  private async embedBatch(input: readonly string[]): Promise<number[][]> {
    let response: Response;
    try {
      response = await this.fetchFn(`${this.config.baseUrl}/v1/embeddings`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.config.apiKey}`,
        },
        body: JSON.stringify({ model: this.config.model, input }),
        signal: AbortSignal.timeout(EMBEDDING_TIMEOUT_MS),
      });
    } catch (error) {
      logger.error('Embedding request failed', { model: this.config.model, error: String(error) });
      const timedOut = error instanceof DOMException && error.name === 'TimeoutError';
      throw new ProviderError(
        timedOut ? 'PROVIDER_TIMEOUT' : 'PROVIDER_UNREACHABLE',
        'Embedding service unavailable',
        { cause: error },
      );
    }

    if (!response.ok) {
      const detail = await response.text().catch(() => '');
      logger.error('Embedding service error', {
        model: this.config.model,
        status: response.status,
        detail: detail.slice(0, 500),
      });
      throw new ProviderError('PROVIDER_ERROR', `Embedding service returned ${response.status}`);
    }

    const parsed = embeddingsResponseSchema.safeParse(await response.json().catch(() => null));
    if (!parsed.success || parsed.data.data.length !== input.length) {
      throw new ProviderError('PROVIDER_ERROR', 'Embedding service returned an unexpected body');
    }

    return [...parsed.data.data]
      .sort((a, b) => a.index - b.index)
      .map((item) => item.embedding);
  }
}
