// src/services.ts
// Wires stores and capabilities into the objects routes depend on.

import { config, buildPipelineConfig, type PipelineConfig } from './config';
import type { DbAdapter } from './db/types';
import { createLanguageCapability } from './ai/languageCapability';
import { createEmbeddingCapability } from './ai/embeddings';
import { HybridQueryPipeline } from './knowledge/pipeline';
import type { ChunkingOptions } from './knowledge/chunking';
import type {
  EmbeddingCapability,
  GraphStore,
  LanguageCapability,
  VectorIndex,
} from './knowledge/types';
import { SqliteVectorIndex } from './store/chunks';
import { SqliteGraphStore } from './store/graph';
import { DocumentsStore } from './store/documents';

export interface AppServices {
  db: DbAdapter;
  pipeline: HybridQueryPipeline;
  embeddings: EmbeddingCapability;
  vectorIndex: VectorIndex;
  graphStore: GraphStore;
  documents: DocumentsStore;
  chunking: ChunkingOptions;
  /** Provider names reported by /health */
  providers: { language: string; embedding: string };
}

export interface ServiceOverrides {
  language?: LanguageCapability;
  embeddings?: EmbeddingCapability;
  pipelineConfig?: PipelineConfig;
  chunking?: ChunkingOptions;
}

export function createServices(db: DbAdapter, overrides: ServiceOverrides = {}): AppServices {
  const language = overrides.language ?? createLanguageCapability();
  const embeddings = overrides.embeddings ?? createEmbeddingCapability();
  const vectorIndex = new SqliteVectorIndex(db);
  const graphStore = new SqliteGraphStore(db);

  const pipeline = new HybridQueryPipeline({
    language,
    embeddings,
    vectorIndex,
    graphStore,
    config: overrides.pipelineConfig ?? buildPipelineConfig(),
  });

  return {
    db,
    pipeline,
    embeddings,
    vectorIndex,
    graphStore,
    documents: new DocumentsStore(db),
    chunking: overrides.chunking ?? { size: config.ingest.chunkSize, overlap: config.ingest.chunkOverlap },
    providers: {
      language: overrides.language ? 'custom' : config.ai.provider,
      embedding: overrides.embeddings ? 'custom' : config.embedding.provider,
    },
  };
}
