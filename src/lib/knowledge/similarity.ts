import type { ScoredEntry } from "@/lib/knowledge/types";

export function cosineSimilarity(a: number[], b: number[]): number {
  if (a.length !== b.length) {
    throw new RangeError(`Vector dimensions differ: ${a.length} vs ${b.length}`);
  }

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let index = 0; index < a.length; index += 1) {
    dot += a[index] * b[index];
    normA += a[index] * a[index];
    normB += b[index] * b[index];
  }

  if (normA === 0 || normB === 0) {
    return 0;
  }

  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

/**
 * Scores every candidate against the query vector and returns them best
 * first. `Array.prototype.sort` is stable, so equal scores keep input order.
 */
export function rankBySimilarity<T>(
  queryVector: number[],
  candidates: T[],
  vectors: number[][],
  minScore?: number,
): Array<ScoredEntry<T>> {
  return candidates
    .map((entry, index) => ({ entry, score: cosineSimilarity(queryVector, vectors[index]) }))
    .filter((item) => minScore === undefined || item.score >= minScore)
    .sort((a, b) => b.score - a.score);
}
