/**
 * Passage Index
 *
 * Nearest-neighbour lookup over the corpus. Built once at startup (every
 * passage embedded up front) and read-only afterwards, so concurrent sessions
 * can query it freely.
 */

import type { Embedder } from '@/services/embedding.service';
import type { Passage } from '@/types/chat';
import { logger } from '@/utils/logger';
import { cosineSimilarity, topK, type Scored } from '@/utils/vector';

const QUERY_CACHE_LIMIT = 256;

export class PassageIndex {
  private readonly queryCache = new Map<string, number[]>();

  private constructor(
    private readonly passages: readonly Passage[],
    private readonly embedder: Embedder,
  ) {}

  /**
   * Embeds every passage. Embedding failures propagate: an index that cannot
   * be built is a startup failure.
   */
  static async build(passages: readonly Passage[], embedder: Embedder): Promise<PassageIndex> {
    const vectors = passages.length > 0 ? await embedder.embed(passages.map((p) => p.text)) : [];

    const embedded = passages.map((passage, i) =>
      Object.freeze({ id: passage.id, text: passage.text, embedding: Object.freeze(vectors[i]) }),
    );

    logger.info('Passage index built', { passages: embedded.length, embedder: embedder.name });
    return new PassageIndex(embedded, embedder);
  }

  get size(): number {
    return this.passages.length;
  }

  /**
   * Up to `k` passages, most similar first. Equal scores keep corpus order.
   */
  async retrieve(queryText: string, k: number): Promise<Passage[]> {
    if (k <= 0 || this.passages.length === 0) {
      return [];
    }

    const queryVector = await this.embedQuery(queryText);
    const scored: Scored<Passage>[] = this.passages.map((passage, order) => ({
      item: passage,
      score: passage.embedding ? cosineSimilarity(queryVector, passage.embedding) : 0,
      order,
    }));

    return topK(scored, k).map((entry) => entry.item);
  }

  randomPassage(random: () => number = Math.random): Passage | undefined {
    if (this.passages.length === 0) return undefined;
    return this.passages[Math.floor(random() * this.passages.length)];
  }

  private async embedQuery(text: string): Promise<number[]> {
    const key = text.trim().toLowerCase();
    const cached = this.queryCache.get(key);
    if (cached) {
      // refresh recency
      this.queryCache.delete(key);
      this.queryCache.set(key, cached);
      return cached;
    }

    const [vector] = await this.embedder.embed([text]);
    if (this.queryCache.size >= QUERY_CACHE_LIMIT) {
      const oldest = this.queryCache.keys().next();
      if (!oldest.done) this.queryCache.delete(oldest.value);
    }
    this.queryCache.set(key, vector);
    return vector;
  }
}
