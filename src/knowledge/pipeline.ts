// src/knowledge/pipeline.ts
// Hybrid query pipeline: classify → retrieve → merge → generate → validate.
//
// Each completed stage appends exactly one reasoning step. Retrieval failures
// degrade to empty results; generation outages are terminal. A per-run
// deadline and the caller's signal abort whatever capability call is in
// flight, and the run then rejects with PipelineTimeoutError.

import { untilAborted } from "../ai/retry";
import type { PipelineConfig } from "../config";
import { createLogger, type Logger } from "../observability/logger";
import { recordPipelineRun } from "../observability/metrics";
import { AnswerGenerator } from "./answerGenerator";
import { ConfidenceScorer } from "./confidenceScorer";
import { ContextMerger } from "./contextMerger";
import {
  CapabilityUnavailableError,
  InvalidInputError,
  PipelineTimeoutError,
  abortReason,
  errorMessage,
  type PipelineStage,
} from "./errors";
import { GraphTraverser } from "./graphTraverser";
import { INSUFFICIENT_INFORMATION_MESSAGE } from "./prompts";
import { QueryClassifier } from "./queryClassifier";
import {
  emptyGraphHits,
  type Answer,
  type EmbeddingCapability,
  type GraphHits,
  type GraphStore,
  type KgContext,
  type LanguageCapability,
  type MergedContext,
  type QueryType,
  type SourceRef,
  type VectorHit,
  type VectorIndex,
} from "./types";
import { VectorRetriever } from "./vectorRetriever";

/* ============= Types ============= */

export interface PipelineDeps {
  language: LanguageCapability;
  embeddings: EmbeddingCapability;
  vectorIndex: VectorIndex;
  graphStore: GraphStore;
  config: PipelineConfig;
  logger?: Logger;
}

export interface RunOptions {
  /** Allow graph traversal for relational and reasoning questions (default true) */
  hybrid?: boolean;
  /** Vector hits to request, overriding config.topK */
  topK?: number;
  /** Aborts the run, e.g. when the HTTP client disconnects */
  signal?: AbortSignal;
}

interface GraphOutcome {
  seeds: string[];
  hits: GraphHits;
}

interface RetrievalOutcome {
  vectorHits: VectorHit[];
  graphHits: GraphHits;
  step: string;
}

/* ============= Helpers ============= */

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) deepFreeze(child);
  }
  return value;
}

function collectSources(context: MergedContext, vectorHits: readonly VectorHit[]): SourceRef[] {
  const byId = new Map(vectorHits.map((hit) => [hit.chunk.id, hit]));
  const sources: SourceRef[] = [];
  for (const p of context.provenance) {
    if (p.kind !== "chunk") continue;
    const hit = byId.get(p.chunkId);
    if (!hit) continue;
    sources.push({
      chunkId: hit.chunk.id,
      documentId: hit.chunk.documentId,
      score: hit.score,
      content: hit.chunk.text,
    });
  }
  return sources;
}

function toKgContext(graphHits: GraphHits): KgContext {
  return {
    entities: graphHits.entities.map(({ entity }) => ({
      id: entity.id,
      name: entity.name,
      type: entity.type,
    })),
    relations: graphHits.relations.map((hit) => ({
      source: hit.source.name,
      target: hit.target.name,
      type: hit.relation.relationType,
    })),
    traversalPath: [...graphHits.traversalPath],
  };
}

/* ============= Pipeline ============= */

export class HybridQueryPipeline {
  private readonly log: Logger;

  constructor(private readonly deps: PipelineDeps) {
    this.log = deps.logger ?? createLogger("knowledge:pipeline");
  }

  get config(): PipelineConfig {
    return this.deps.config;
  }

  async run(question: string, options: RunOptions = {}): Promise<Answer> {
    const trimmed = question.trim();
    if (!trimmed) throw new InvalidInputError("Question must not be empty");

    const topK = options.topK ?? this.deps.config.topK;
    VectorRetriever.assertTopK(topK);

    let stage: PipelineStage = "classifying";
    let queryType: QueryType | "unknown" = "unknown";

    const controller = new AbortController();
    const onCallerAbort = () =>
      controller.abort(new PipelineTimeoutError(stage, "request cancelled by caller"));
    if (options.signal?.aborted) onCallerAbort();
    options.signal?.addEventListener("abort", onCallerAbort, { once: true });

    const timeoutMs = this.deps.config.requestTimeoutMs;
    const deadline = setTimeout(
      () => controller.abort(new PipelineTimeoutError(stage, `deadline of ${timeoutMs}ms elapsed`)),
      timeoutMs
    );

    const signal = controller.signal;
    const enter = (next: PipelineStage) => {
      if (signal.aborted) throw abortReason(signal);
      stage = next;
    };

    try {
      const steps: string[] = [];

      // 1. Classification
      enter("classifying");
      const classification = await QueryClassifier.classify(
        trimmed,
        { language: this.deps.language, config: this.deps.config, logger: this.log },
        signal
      );
      queryType = classification.queryType;
      steps.push(
        classification.fallback
          ? `Classified query as ${classification.queryType} (fallback: ${classification.rationale})`
          : `Classified query as ${classification.queryType}`
      );

      // 2. Retrieval
      enter("retrieving");
      const useGraph = (options.hybrid ?? true) && classification.queryType !== "factual";
      const retrieval = await this.retrieve(trimmed, topK, useGraph, signal);
      steps.push(retrieval.step);

      // 3. Merge
      enter("merging");
      const context = ContextMerger.merge(
        classification.queryType,
        retrieval.vectorHits,
        retrieval.graphHits,
        this.deps.config
      );
      steps.push(
        context.blocks.length === 0
          ? "Empty context: no retrieved blocks to merge"
          : `Merged ${context.blocks.length} context blocks with ${classification.queryType} priority` +
              (context.droppedBlocks > 0 ? ` (${context.droppedBlocks} dropped by the size budget)` : "")
      );

      // 4. Generation
      enter("generating");
      const generated = await AnswerGenerator.generate(
        trimmed,
        context,
        { language: this.deps.language, config: this.deps.config, logger: this.log },
        signal
      );
      steps.push(
        generated.skipped
          ? "Generation skipped: empty context"
          : `Generated answer of ${generated.text.length} characters`
      );

      // 5. Validation
      enter("validating");
      const report = ConfidenceScorer.score(
        generated.text,
        context,
        retrieval.vectorHits,
        this.deps.config
      );
      const accepted = report.verdict === "accept";
      steps.push(
        accepted
          ? `Answer accepted: ${report.reason}`
          : `Answer rejected: ${report.reason}; generated text: "${generated.text}"`
      );

      recordPipelineRun(classification.queryType, report.verdict, report.score);
      this.log.info(
        { queryType: classification.queryType, verdict: report.verdict, score: report.score },
        "Query answered"
      );

      return deepFreeze<Answer>({
        text: accepted ? generated.text : INSUFFICIENT_INFORMATION_MESSAGE,
        queryType: classification.queryType,
        confidence: report,
        sources: collectSources(context, retrieval.vectorHits),
        kgContext: toKgContext(retrieval.graphHits),
        reasoningSteps: steps,
      });
    } catch (err) {
      if (signal.aborted) {
        const reason = abortReason(signal);
        const timeout =
          reason instanceof PipelineTimeoutError ? reason : new PipelineTimeoutError(stage, errorMessage(reason));
        recordPipelineRun(queryType, "timeout");
        this.log.warn({ stage: timeout.stage, err: timeout.message }, "Query aborted");
        throw timeout;
      }
      if (err instanceof CapabilityUnavailableError) {
        recordPipelineRun(queryType, "unavailable");
        this.log.error({ stage: err.stage, err: err.message }, "Query failed");
      }
      throw err;
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  /** Vector and graph retrieval, concurrently; each side degrades to empty on failure */
  private async retrieve(
    question: string,
    topK: number,
    useGraph: boolean,
    signal: AbortSignal
  ): Promise<RetrievalOutcome> {
    const notes: string[] = [];

    const vectorSide = VectorRetriever.search(
      question,
      topK,
      { embeddings: this.deps.embeddings, vectorIndex: this.deps.vectorIndex },
      signal
    ).catch((err: unknown): VectorHit[] => {
      if (signal.aborted) throw abortReason(signal);
      this.log.warn({ err: errorMessage(err) }, "Vector retrieval failed");
      notes.push(`vector retrieval failed (${errorMessage(err)})`);
      return [];
    });

    const graphSide: Promise<GraphOutcome> = useGraph
      ? this.retrieveGraph(question, signal, notes)
      : Promise.resolve({ seeds: [], hits: emptyGraphHits() });

    // Store calls take no signal; stop waiting on them once the run aborts
    const [vectorHits, { seeds, hits: graphHits }] = await untilAborted(
      Promise.all([vectorSide, graphSide]),
      signal
    );

    let graphNote: string;
    if (!useGraph) {
      graphNote = "graph traversal not used";
    } else if (seeds.length === 0) {
      graphNote = "no seed entities found in the question";
    } else if (graphHits.entities.length === 0) {
      graphNote = `no graph match for ${seeds.join(", ")}`;
    } else {
      graphNote =
        `${graphHits.entities.length} entities and ${graphHits.relations.length} relations ` +
        `from seeds ${seeds.join(", ")}`;
    }

    const step = [`Retrieved ${vectorHits.length} chunks`, graphNote, ...notes].join("; ");
    return { vectorHits, graphHits, step };
  }

  private async retrieveGraph(
    question: string,
    signal: AbortSignal,
    notes: string[]
  ): Promise<GraphOutcome> {
    let seeds: string[] = [];
    try {
      seeds = await GraphTraverser.seedsForQuestion(question, this.deps.graphStore);
      if (seeds.length === 0) return { seeds, hits: emptyGraphHits() };

      const hits = await GraphTraverser.traverse(seeds, this.deps.config.graphMaxDepth, this.deps.graphStore, {
        maxEntities: this.deps.config.graphMaxEntities,
        signal,
      });
      return { seeds, hits };
    } catch (err) {
      if (signal.aborted) throw abortReason(signal);
      this.log.warn({ err: errorMessage(err) }, "Graph traversal failed");
      notes.push(`graph traversal failed (${errorMessage(err)})`);
      return { seeds, hits: emptyGraphHits() };
    }
  }
}
