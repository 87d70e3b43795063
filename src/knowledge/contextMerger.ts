// src/knowledge/contextMerger.ts
// Fuses vector and graph results into one prioritized, size-bounded context.
//
// Priority per query type:
//   factual    → chunks, relations, entity summaries
//   relational → relations, entity summaries, chunks
//   reasoning  → chunk / graph interleave, starting with a chunk
// Blocks are admitted in priority order until the first one that does not
// fit the budget; everything after it is dropped. Blocks are never truncated.

import { VectorRetriever } from "./vectorRetriever";
import { CONTEXT_BLOCK_SEPARATOR } from "./prompts";
import type {
  GraphEntityHit,
  GraphHits,
  GraphRelationHit,
  MergedContext,
  Provenance,
  QueryType,
  VectorHit,
} from "./types";

/* ============= Types ============= */

export interface ContextBudget {
  /** Blocks longer than this are skipped whole */
  maxBlockChars: number;
  /** Total characters admitted across all blocks */
  maxContextChars: number;
}

interface CandidateBlock {
  text: string;
  provenance: Provenance;
}

/* ============= Block Construction ============= */

function chunkBlocks(hits: readonly VectorHit[]): CandidateBlock[] {
  return [...hits].sort(VectorRetriever.compareHits).map((hit) => ({
    text: hit.chunk.text,
    provenance: {
      kind: "chunk",
      chunkId: hit.chunk.id,
      documentId: hit.chunk.documentId,
      score: hit.score,
    },
  }));
}

function byDepth<T extends { depth: number }>(items: readonly T[]): T[] {
  // Array.prototype.sort is stable: insertion order survives within a depth
  return [...items].sort((a, b) => a.depth - b.depth);
}

function relationBlocks(hits: readonly GraphRelationHit[]): CandidateBlock[] {
  return byDepth(hits).map((hit) => ({
    text: `${hit.source.name} --[${hit.relation.relationType}]--> ${hit.target.name}`,
    provenance: {
      kind: "relation",
      sourceEntityId: hit.relation.sourceEntityId,
      targetEntityId: hit.relation.targetEntityId,
      relationType: hit.relation.relationType,
      depth: hit.depth,
    },
  }));
}

function entityBlocks(hits: readonly GraphEntityHit[]): CandidateBlock[] {
  return byDepth(hits).map((hit) => ({
    text: `${hit.entity.name} (${hit.entity.type})`,
    provenance: { kind: "entity", entityId: hit.entity.id, depth: hit.depth },
  }));
}

/** v1, g1, v2, g2, ...; the longer list continues alone once the other runs out */
function interleave<T>(first: readonly T[], second: readonly T[]): T[] {
  const out: T[] = [];
  const length = Math.max(first.length, second.length);
  for (let i = 0; i < length; i++) {
    if (i < first.length) out.push(first[i]);
    if (i < second.length) out.push(second[i]);
  }
  return out;
}

function orderCandidates(
  queryType: QueryType,
  vectorHits: readonly VectorHit[],
  graphHits: GraphHits
): CandidateBlock[] {
  const vector = chunkBlocks(vectorHits);
  const graph = [...relationBlocks(graphHits.relations), ...entityBlocks(graphHits.entities)];

  switch (queryType) {
    case "factual":
      return [...vector, ...graph];
    case "relational":
      return [...graph, ...vector];
    case "reasoning":
      return interleave(vector, graph);
  }
}

/* ============= Budget ============= */

function applyBudget(candidates: readonly CandidateBlock[], budget: ContextBudget): MergedContext {
  const blocks: string[] = [];
  const provenance: Provenance[] = [];
  let droppedBlocks = 0;
  let total = 0;
  let closed = false;

  for (const candidate of candidates) {
    const length = candidate.text.length;
    if (closed || length === 0 || length > budget.maxBlockChars) {
      droppedBlocks++;
      continue;
    }
    if (total + length > budget.maxContextChars) {
      closed = true;
      droppedBlocks++;
      continue;
    }
    blocks.push(candidate.text);
    provenance.push(candidate.provenance);
    total += length;
  }

  return { blocks, provenance, droppedBlocks };
}

/* ============= Main Entry Point ============= */

function mergeContext(
  queryType: QueryType,
  vectorHits: readonly VectorHit[],
  graphHits: GraphHits,
  budget: ContextBudget
): MergedContext {
  return applyBudget(orderCandidates(queryType, vectorHits, graphHits), budget);
}

/** Total characters across blocks (separators excluded) */
export function contextLength(context: MergedContext): number {
  return context.blocks.reduce((sum, block) => sum + block.length, 0);
}

export function renderContext(context: MergedContext): string {
  return context.blocks.join(CONTEXT_BLOCK_SEPARATOR);
}

/* ============= Export ============= */

export const ContextMerger = {
  merge: mergeContext,
  // Exposed for testing
  orderCandidates,
  applyBudget,
  interleave,
};
