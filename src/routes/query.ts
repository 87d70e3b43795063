// src/routes/query.ts
// Question answering endpoint.
// - POST /query - Run the hybrid pipeline for one question
//
// Status mapping: 400 invalid input, 503 capability outage, 504 deadline or
// cancellation. A rejected answer is still a 200 with `rejected: true`.

import type { FastifyInstance } from "fastify";
import type { HybridQueryPipeline } from "../knowledge/pipeline";
import {
  CapabilityUnavailableError,
  InvalidInputError,
  PipelineTimeoutError,
} from "../knowledge/errors";
import type { Answer, ConfidenceReport } from "../knowledge/types";
import { getRateLimitConfig } from "../middleware/rateLimit";
import { getRequestLogger } from "../observability/requestLogger";

/* ---------- Types ---------- */

interface QueryBody {
  question?: unknown;
  use_hybrid?: unknown;
  top_k?: unknown;
}

/* ---------- Serialization ---------- */

function toConfidenceReport(report: ConfidenceReport) {
  const c = report.components;
  return {
    score: report.score,
    verdict: report.verdict,
    reason: report.reason,
    components: {
      source_quality: c.sourceQuality,
      text_overlap: c.textOverlap,
      rejection_penalty: c.rejectionPenalty,
      context_coverage: c.contextCoverage,
      source_count: c.sourceCount,
      answer_length: c.answerLength,
    },
  };
}

export function toQueryResponse(answer: Answer) {
  return {
    answer: answer.text,
    confidence: answer.confidence.score,
    query_type: answer.queryType,
    sources: answer.sources.map((s) => ({
      chunk_id: s.chunkId,
      document_id: s.documentId,
      score: s.score,
      content: s.content,
    })),
    kg_context: {
      entities: answer.kgContext.entities,
      relations: answer.kgContext.relations,
      traversal_path: answer.kgContext.traversalPath,
    },
    reasoning_steps: answer.reasoningSteps,
    rejected: answer.confidence.verdict === "reject",
    confidence_report: toConfidenceReport(answer.confidence),
  };
}

/* ---------- Validation ---------- */

type ParsedQuery =
  | { ok: true; question: string; hybrid: boolean; topK?: number }
  | { ok: false; message: string };

function parseQueryBody(body: QueryBody | null | undefined): ParsedQuery {
  const question = body?.question;
  if (typeof question !== "string" || question.trim().length === 0) {
    return { ok: false, message: "question is required and must be a non-empty string" };
  }

  let hybrid = true;
  const useHybrid = body?.use_hybrid;
  if (useHybrid !== undefined) {
    if (typeof useHybrid !== "boolean") return { ok: false, message: "use_hybrid must be a boolean" };
    hybrid = useHybrid;
  }

  let topK: number | undefined;
  const rawTopK = body?.top_k;
  if (rawTopK !== undefined) {
    if (typeof rawTopK !== "number" || !Number.isInteger(rawTopK) || rawTopK <= 0) {
      return { ok: false, message: "top_k must be a positive integer" };
    }
    topK = rawTopK;
  }

  return { ok: true, question: question.trim(), hybrid, topK };
}

/* ---------- Route Registration ---------- */

export function createQueryRoutes(pipeline: HybridQueryPipeline) {
  return async function queryRoutes(app: FastifyInstance) {
    /**
     * POST /query
     * Body: { question, use_hybrid?, top_k? }
     */
    app.post<{ Body: QueryBody }>("/query", getRateLimitConfig("query"), async (req, reply) => {
      const parsed = parseQueryBody(req.body);
      if (!parsed.ok) {
        return reply.code(400).send({ error: "invalid_input", message: parsed.message });
      }

      const log = getRequestLogger(req);

      // Abort the run when the client goes away before the response is written
      const controller = new AbortController();
      const onClose = () => {
        if (!reply.raw.writableFinished) controller.abort();
      };
      reply.raw.on("close", onClose);

      try {
        const answer = await pipeline.run(parsed.question, {
          hybrid: parsed.hybrid,
          topK: parsed.topK,
          signal: controller.signal,
        });
        return reply.code(200).send(toQueryResponse(answer));
      } catch (err) {
        if (err instanceof InvalidInputError) {
          return reply.code(400).send({ error: "invalid_input", message: err.message });
        }
        if (err instanceof CapabilityUnavailableError) {
          log.error({ stage: err.stage, err: err.message }, "Query failed: capability unavailable");
          return reply
            .code(503)
            .send({ error: "capability_unavailable", stage: err.stage, message: err.message });
        }
        if (err instanceof PipelineTimeoutError) {
          log.warn({ stage: err.stage, err: err.message }, "Query aborted");
          return reply
            .code(504)
            .send({ error: "pipeline_timeout", stage: err.stage, message: err.message });
        }
        throw err;
      } finally {
        reply.raw.off("close", onClose);
      }
    });
  };
}
