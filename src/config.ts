/* src/config.ts
   Centralized config: server, storage, AI providers and pipeline defaults */
import path from 'node:path';
import 'dotenv/config';


const env = (name: string, fallback?: string) =>
  (process.env[name] ?? fallback ?? '').toString();

const envNumber = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (raw == null || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
};

export type AIProvider = 'dev' | 'openai' | 'anthropic';
export type EmbeddingProvider = 'dev' | 'openai';

function parseAIProvider(raw: string): AIProvider {
  return raw === 'openai' || raw === 'anthropic' ? raw : 'dev';
}

function parseEmbeddingProvider(raw: string): EmbeddingProvider {
  return raw === 'openai' ? 'openai' : 'dev';
}

export const config = {
  nodeEnv: env('NODE_ENV', 'development'),
  port: envNumber('PORT', 4000),

  // ── Database ─────────────────────────────────────────────────────
  database: {
    path: path.resolve(process.cwd(), env('HYBRID_QA_DB_PATH', 'data/hybrid-qa.db')),
  },

  // ── CORS origins ─────────────────────────────────────────────────
  cors: {
    origins: env('CORS_ORIGINS', 'http://localhost:5173,http://localhost:3000')
      .split(',')
      .map(s => s.trim())
      .filter(Boolean),
  },

  // ── AI ───────────────────────────────────────────────────────────
  ai: {
    provider: parseAIProvider(env('AI_PROVIDER', 'dev')),
    openaiKey: env('OPENAI_API_KEY'),
    anthropicKey: env('ANTHROPIC_API_KEY'),
    seed: process.env.AI_SEED ? envNumber('AI_SEED', 0) : undefined,
    model: {
      openai: env('AI_MODEL_OPENAI', 'gpt-4o-mini'),
      anthropic: env('AI_MODEL_ANTHROPIC', 'claude-3-5-haiku-latest'),
    },
  },

  // ── Embeddings ───────────────────────────────────────────────────
  embedding: {
    provider: parseEmbeddingProvider(env('EMBEDDING_PROVIDER', 'dev')),
    model: env('EMBEDDING_MODEL', 'text-embedding-3-small'),
    dimension: envNumber('EMBEDDING_DIMENSION', 256),
  },

  // ── Ingestion ────────────────────────────────────────────────────
  ingest: {
    chunkSize: envNumber('CHUNK_SIZE', 1000),
    chunkOverlap: envNumber('CHUNK_OVERLAP', 200),
  },
} as const;

/* ---------- Pipeline configuration ---------- */

export interface PipelineConfig {
  /** Vector hits requested per query */
  readonly topK: number;
  /** Hop limit for graph expansion */
  readonly graphMaxDepth: number;
  /** Cap on entities reached by one traversal */
  readonly graphMaxEntities: number;
  /** Composite score at or above which an answer is accepted */
  readonly confidenceThreshold: number;
  /** Context length (chars) that earns full coverage credit */
  readonly minContextLength: number;
  /** Answer length (chars) that earns full length credit */
  readonly minAnswerLength: number;
  /** Blocks longer than this are left out of the merged context */
  readonly maxBlockChars: number;
  /** Total character budget of the merged context */
  readonly maxContextChars: number;
  readonly classificationTimeoutMs: number;
  readonly generationTimeoutMs: number;
  /** Deadline for a whole pipeline run */
  readonly requestTimeoutMs: number;
  /** Delay before the single retry of a failed capability call */
  readonly retryBackoffMs: number;
  readonly classification: { readonly temperature: number; readonly maxTokens: number };
  readonly generation: { readonly temperature: number; readonly maxTokens: number };
}

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
  topK: 5,
  graphMaxDepth: 2,
  graphMaxEntities: 10,
  confidenceThreshold: 0.4,
  minContextLength: 50,
  minAnswerLength: 100,
  maxBlockChars: 2000,
  maxContextChars: 8000,
  classificationTimeoutMs: 10_000,
  generationTimeoutMs: 60_000,
  requestTimeoutMs: 90_000,
  retryBackoffMs: 500,
  classification: { temperature: 0, maxTokens: 10 },
  generation: { temperature: 0.1, maxTokens: 1000 },
};

/**
 * Build an immutable pipeline configuration.
 * Environment values override the defaults, explicit overrides win over both.
 */
export function buildPipelineConfig(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
  const d = DEFAULT_PIPELINE_CONFIG;
  const fromEnv: PipelineConfig = {
    ...d,
    topK: envNumber('TOP_K_VECTOR', d.topK),
    graphMaxDepth: envNumber('KG_MAX_DEPTH', d.graphMaxDepth),
    graphMaxEntities: envNumber('TOP_K_KG', d.graphMaxEntities),
    confidenceThreshold: envNumber('CONFIDENCE_THRESHOLD', d.confidenceThreshold),
    minContextLength: envNumber('MIN_CONTEXT_LENGTH', d.minContextLength),
    minAnswerLength: envNumber('MIN_ANSWER_LENGTH', d.minAnswerLength),
    maxContextChars: envNumber('MAX_CONTEXT_CHARS', d.maxContextChars),
    requestTimeoutMs: envNumber('REQUEST_TIMEOUT_MS', d.requestTimeoutMs),
    generation: {
      temperature: envNumber('LLM_TEMPERATURE', d.generation.temperature),
      maxTokens: envNumber('LLM_MAX_TOKENS', d.generation.maxTokens),
    },
  };

  const merged: PipelineConfig = { ...fromEnv, ...overrides };
  return Object.freeze({
    ...merged,
    classification: Object.freeze({ ...merged.classification }),
    generation: Object.freeze({ ...merged.generation }),
  });
}
