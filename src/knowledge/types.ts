// src/knowledge/types.ts
// Shared types for the hybrid retrieval pipeline: corpus records, retrieval
// results, merged context, confidence reports and the capability interfaces
// the pipeline depends on.

/* ---------- Query Classification ---------- */

export const QUERY_TYPES = ["factual", "relational", "reasoning"] as const;

export type QueryType = (typeof QUERY_TYPES)[number];

/** Label used whenever the classifier output cannot be trusted */
export const DEFAULT_QUERY_TYPE: QueryType = "factual";

export interface QueryClassification {
  queryType: QueryType;
  rationale: string;
  /** True when the default label was used instead of the model's answer */
  fallback: boolean;
}

/* ---------- Corpus Records ---------- */

export interface Chunk {
  id: string;
  documentId: string;
  text: string;
  embedding: number[];
  /** Character offset of the chunk within its document */
  offset: number;
}

export interface Entity {
  id: string;
  name: string;
  /** Person, Organization, Location, Entity, ... */
  type: string;
  sourceDocumentIds: string[];
}

/** Directed edge between two entities */
export interface Relation {
  sourceEntityId: string;
  targetEntityId: string;
  relationType: string;
  sourceDocumentIds: string[];
}

/* ---------- Retrieval Results ---------- */

export interface VectorHit {
  chunk: Chunk;
  /** Similarity in [0, 1] */
  score: number;
}

export interface GraphEntityHit {
  entity: Entity;
  /** Hops from the nearest seed (seeds are depth 0) */
  depth: number;
}

export interface GraphRelationHit {
  relation: Relation;
  source: Entity;
  target: Entity;
  /** Hop (1-based) during which the relation was traversed */
  depth: number;
}

export interface GraphHits {
  entities: GraphEntityHit[];
  relations: GraphRelationHit[];
  /** Human-readable hop descriptions, "A --[WORKS_AT]--> B" */
  traversalPath: string[];
}

export interface RetrievalResult {
  vectorHits: VectorHit[];
  graphHits: GraphHits;
}

export function emptyGraphHits(): GraphHits {
  return { entities: [], relations: [], traversalPath: [] };
}

/* ---------- Merged Context ---------- */

export type Provenance =
  | { kind: "chunk"; chunkId: string; documentId: string; score: number }
  | {
      kind: "relation";
      sourceEntityId: string;
      targetEntityId: string;
      relationType: string;
      depth: number;
    }
  | { kind: "entity"; entityId: string; depth: number };

export interface MergedContext {
  /** Text blocks in priority order */
  blocks: string[];
  /** provenance[i] names the source of blocks[i] */
  provenance: Provenance[];
  /** Blocks left out by the character budget */
  droppedBlocks: number;
}

/* ---------- Confidence ---------- */

export type Verdict = "accept" | "reject";

export interface ConfidenceComponents {
  sourceQuality: number;
  textOverlap: number;
  rejectionPenalty: number;
  contextCoverage: number;
  sourceCount: number;
  answerLength: number;
}

export interface ConfidenceReport {
  score: number;
  components: ConfidenceComponents;
  verdict: Verdict;
  reason: string;
}

/* ---------- Answer ---------- */

export interface SourceRef {
  chunkId: string;
  documentId: string;
  score: number;
  content: string;
}

export interface KgContext {
  entities: Array<{ id: string; name: string; type: string }>;
  relations: Array<{ source: string; target: string; type: string }>;
  traversalPath: string[];
}

export interface Answer {
  text: string;
  queryType: QueryType;
  confidence: ConfidenceReport;
  sources: SourceRef[];
  kgContext: KgContext;
  reasoningSteps: string[];
}

/* ---------- Capabilities ---------- */

export interface CompletionConstraints {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
  /** Metrics label, e.g. "classify" or "generate" */
  action?: string;
}

export interface LanguageCapability {
  complete(prompt: string, constraints: CompletionConstraints): Promise<string>;
}

export interface EmbeddingCapability {
  embed(text: string, signal?: AbortSignal): Promise<number[]>;
}

export interface VectorIndex {
  /** Ranked hits for `vector`, at most `k` */
  search(vector: number[], k: number): Promise<VectorHit[]>;
  upsert(chunk: Omit<Chunk, "embedding">, vector: number[]): Promise<void>;
  /** Remove every chunk of a document; returns how many were removed */
  deleteByDocument(documentId: string): Promise<number>;
  count(): Promise<number>;
}

export type EntityMatchMode = "exact" | "substring";

export interface EntityInput {
  name: string;
  type: string;
}

export interface RelationInput {
  /** Entity names, resolved by normalized name on write */
  source: string;
  target: string;
  relationType: string;
}

export interface GraphWriteResult {
  entitiesWritten: number;
  relationsWritten: number;
}

export interface GraphStats {
  entities: number;
  relations: number;
}

export interface GraphStore {
  matchEntities(name: string, opts?: { mode?: EntityMatchMode }): Promise<Entity[]>;
  /** Stored entities whose name appears, in any casing, as a word run of `text` */
  mentionedIn(text: string): Promise<Entity[]>;
  /** Entities adjacent to `entityId` and the relations (either direction) linking them */
  neighbors(entityId: string): Promise<{ entities: Entity[]; relations: Relation[] }>;
  /** Transactional per document */
  write(
    documentId: string,
    entities: EntityInput[],
    relations: RelationInput[]
  ): Promise<GraphWriteResult>;
  stats(): Promise<GraphStats>;
}
