import type { EmbeddingEngine } from "./embedding-service.js";
import type { MetadataFilter, SearchResult } from "./types.js";
import type { VectorIndex } from "./vector-store.js";

export interface RetrieveOptions {
  topK: number;
  filter?: MetadataFilter;
  /** Results scoring below this are dropped; 0 keeps everything. */
  similarityThreshold: number;
}

export async function retrieve(
  query: string,
  engine: EmbeddingEngine,
  index: VectorIndex,
  options: RetrieveOptions,
): Promise<SearchResult[]> {
  if (!query.trim()) return [];

  const queryVector = await engine.embedQuery(query);
  const results = await index.search(queryVector, options.topK, options.filter);

  return results.filter((r) => r.similarityScore >= options.similarityThreshold);
}
