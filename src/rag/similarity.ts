import type { EmbeddingVector } from "./types.js";

/** Cosine similarity; 0 when either vector has no magnitude or lengths differ. */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }
  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface SimilarityMatch {
  index: number;
  score: number;
}

/** Candidates ranked by descending similarity; ties keep candidate order. */
export function mostSimilar(
  query: readonly number[],
  candidates: readonly EmbeddingVector[],
  topK: number,
): SimilarityMatch[] {
  if (query.length === 0 || topK <= 0) return [];
  return candidates
    .map((candidate, index) => ({ index, score: cosineSimilarity(query, candidate) }))
    .sort((a, b) => b.score - a.score)
    .slice(0, topK);
}

/** Maps cosine similarity in [-1, 1] onto [0, 1], where 1 is an exact match. */
export function cosineToScore(cosine: number): number {
  return Math.min(1, Math.max(0, (1 + cosine) / 2));
}

export function zeroVector(dimensions: number): EmbeddingVector {
  return new Array<number>(dimensions).fill(0);
}
