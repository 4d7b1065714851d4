// Vector math for passage ranking

export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dot += a[i] * b[i];
    normA += a[i] * a[i];
    normB += b[i] * b[i];
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface Scored<T> {
  item: T;
  score: number;
  /** Position in the source collection; breaks score ties. */
  order: number;
}

/**
 * Highest scores first; equal scores keep source order.
 */
export function topK<T>(scored: Scored<T>[], k: number): Scored<T>[] {
  if (k <= 0) return [];
  return [...scored]
    .sort((a, b) => b.score - a.score || a.order - b.order)
    .slice(0, k);
}
