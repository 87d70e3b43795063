// src/ai/embeddings.ts
// EmbeddingCapability implementations.
//
// "openai" calls the embeddings endpoint. "dev" is a hashed bag-of-words
// vector: deterministic, offline, and good enough for keyword-level similarity.

import { getOpenAIClient } from './providers/openai';
import { config, type EmbeddingProvider } from '../config';
import { extractKeywords } from '../knowledge/keywords';
import { recordAiRequest } from '../observability/metrics';
import type { EmbeddingCapability } from '../knowledge/types';

/* ============= Dev Hashing Embedding ============= */

/** 32-bit FNV-1a */
function fnv1a(text: string): number {
  let hash = 0x811c9dc5;
  for (let i = 0; i < text.length; i++) {
    hash ^= text.charCodeAt(i);
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

export function l2Normalize(vector: number[]): number[] {
  const norm = Math.sqrt(vector.reduce((sum, v) => sum + v * v, 0));
  if (norm === 0) return vector;
  return vector.map((v) => v / norm);
}

/**
 * Hash every keyword into one of `dimension` buckets.
 * Text without keywords embeds to the zero vector.
 */
export function hashEmbedding(text: string, dimension: number): number[] {
  const vector = new Array<number>(dimension).fill(0);
  for (const word of extractKeywords(text)) {
    vector[fnv1a(word) % dimension] += 1;
  }
  return l2Normalize(vector);
}

export function createHashingEmbedding(dimension: number = config.embedding.dimension): EmbeddingCapability {
  return {
    async embed(text: string): Promise<number[]> {
      return hashEmbedding(text, dimension);
    },
  };
}

/* ============= OpenAI Embedding ============= */

export function createOpenAIEmbedding(model: string = config.embedding.model): EmbeddingCapability {
  return {
    async embed(text: string, signal?: AbortSignal): Promise<number[]> {
      const started = Date.now();
      try {
        const resp = await getOpenAIClient().embeddings.create({ model, input: text }, { signal });
        recordAiRequest('embed', 'openai', 'success', Date.now() - started);
        return resp.data[0]?.embedding ?? [];
      } catch (err) {
        recordAiRequest('embed', 'openai', 'error', Date.now() - started);
        throw err;
      }
    },
  };
}

export function createEmbeddingCapability(
  provider: EmbeddingProvider = config.embedding.provider
): EmbeddingCapability {
  return provider === 'openai' ? createOpenAIEmbedding() : createHashingEmbedding();
}
