import type { EmbeddingService } from "./embedding-service.js";
import { IndexError } from "./errors.js";
import type { ScoredChunk } from "./types.js";
import type { EmbeddingIndex } from "./vector-store.js";

export interface RetrieveOptions {
  k: number;
  minSimilarity: number;
  signal?: AbortSignal;
}

export interface RetrievalResult {
  /** Everything the index returned for the top k, best first. */
  retrieved: ScoredChunk[];
  /** The subset at or above the similarity threshold. */
  relevant: ScoredChunk[];
}

export async function retrieve(
  query: string,
  index: EmbeddingIndex,
  embeddings: EmbeddingService,
  options: RetrieveOptions,
): Promise<RetrievalResult> {
  if (index.chunkCount === 0) {
    throw new IndexError("empty_index", "Nothing has been indexed yet.");
  }

  const queryVector = await embeddings.embedQuery(query, { signal: options.signal });
  const retrieved = index.query(queryVector, options.k);

  return {
    retrieved,
    relevant: retrieved.filter((r) => r.score >= options.minSimilarity),
  };
}
