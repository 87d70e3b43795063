// src/knowledge/vectorRetriever.ts
// Semantic retrieval: embed the question, rank chunks by similarity.

import { InvalidInputError } from "./errors";
import type { EmbeddingCapability, VectorHit, VectorIndex } from "./types";

export interface VectorRetrieverDeps {
  embeddings: EmbeddingCapability;
  vectorIndex: VectorIndex;
}

/** Clamp a similarity into [0, 1]; NaN and infinities become 0 */
function clampScore(score: number): number {
  if (!Number.isFinite(score)) return 0;
  return Math.min(1, Math.max(0, score));
}

/** Descending score, then ascending chunk id (code-unit order) */
function compareHits(a: VectorHit, b: VectorHit): number {
  if (b.score !== a.score) return b.score - a.score;
  if (a.chunk.id < b.chunk.id) return -1;
  if (a.chunk.id > b.chunk.id) return 1;
  return 0;
}

function rankHits(hits: readonly VectorHit[], topK: number): VectorHit[] {
  return hits
    .map((hit) => ({ chunk: hit.chunk, score: clampScore(hit.score) }))
    .sort(compareHits)
    .slice(0, topK);
}

function assertTopK(topK: number): void {
  if (!Number.isInteger(topK) || topK <= 0) {
    throw new InvalidInputError(`top_k must be a positive integer, got ${topK}`);
  }
}

async function searchChunks(
  question: string,
  topK: number,
  deps: VectorRetrieverDeps,
  signal?: AbortSignal
): Promise<VectorHit[]> {
  assertTopK(topK);
  const vector = await deps.embeddings.embed(question, signal);
  const hits = await deps.vectorIndex.search(vector, topK);
  return rankHits(hits, topK);
}

export const VectorRetriever = {
  search: searchChunks,
  // Exposed for testing
  clampScore,
  compareHits,
  rankHits,
  assertTopK,
};
