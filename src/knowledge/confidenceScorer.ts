// src/knowledge/confidenceScorer.ts
// Hallucination guard: composite confidence score and accept/reject verdict.
//
// Pure functions only. The verdict rejects whenever the answer itself admits
// it cannot answer, whatever the composite score, and always on an empty
// context.

import { contextLength } from "./contextMerger";
import { extractKeywords, keywordCoverage } from "./keywords";
import type {
  ConfidenceComponents,
  ConfidenceReport,
  MergedContext,
  VectorHit,
} from "./types";

/* ============= Constants ============= */

export const CONFIDENCE_WEIGHTS: Readonly<Record<keyof ConfidenceComponents, number>> = {
  sourceQuality: 0.3,
  textOverlap: 0.2,
  rejectionPenalty: 0.2,
  contextCoverage: 0.1,
  sourceCount: 0.1,
  answerLength: 0.1,
};

const WEIGHT_BY_NAME: ReadonlyMap<string, number> = new Map(Object.entries(CONFIDENCE_WEIGHTS));

/** Blocks that earn full source-count credit */
const FULL_SOURCE_COUNT = 3;

/** Phrases by which an answer declines to answer (matched case-insensitively) */
export const REFUSAL_PATTERNS: readonly string[] = [
  "insufficient information",
  "not enough information",
  "i cannot answer",
  "i can't answer",
  "cannot provide",
  "i don't know",
  "cannot determine",
  "unclear from the context",
];

/* ============= Types ============= */

export interface ScoringSettings {
  confidenceThreshold: number;
  minContextLength: number;
  minAnswerLength: number;
}

/* ============= Components ============= */

/** Clamp into [0, 1]; NaN becomes 0 */
function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

function ratio(value: number, target: number): number {
  if (target <= 0) return 1;
  return clamp01(value / target);
}

export function isRefusal(answer: string): boolean {
  const normalized = answer.toLowerCase().replace(/[‘’]/g, "'");
  return REFUSAL_PATTERNS.some((pattern) => normalized.includes(pattern));
}

/** Mean clamped score of the vector hits whose chunk made it into the context */
function sourceQuality(context: MergedContext, vectorHits: readonly VectorHit[]): number {
  const included = new Set<string>();
  for (const p of context.provenance) {
    if (p.kind === "chunk") included.add(p.chunkId);
  }

  const scores = vectorHits
    .filter((hit) => included.has(hit.chunk.id))
    .map((hit) => clamp01(hit.score));
  if (scores.length === 0) return 0;

  return scores.reduce((sum, s) => sum + s, 0) / scores.length;
}

function computeConfidenceComponents(
  answer: string,
  context: MergedContext,
  vectorHits: readonly VectorHit[],
  settings: ScoringSettings
): ConfidenceComponents {
  const contextKeywords = extractKeywords(context.blocks.join("\n"));

  return {
    sourceQuality: clamp01(sourceQuality(context, vectorHits)),
    textOverlap: clamp01(keywordCoverage(extractKeywords(answer), contextKeywords)),
    rejectionPenalty: isRefusal(answer) ? 0 : 1,
    contextCoverage: ratio(contextLength(context), settings.minContextLength),
    sourceCount: ratio(context.blocks.length, FULL_SOURCE_COUNT),
    answerLength: ratio(answer.length, settings.minAnswerLength),
  };
}

/** Weighted sum of the components, clamped to [0, 1] */
function composeConfidence(components: ConfidenceComponents): number {
  let total = 0;
  for (const [key, value] of Object.entries(components)) {
    total += (WEIGHT_BY_NAME.get(key) ?? 0) * clamp01(value);
  }
  return clamp01(total);
}

/* ============= Verdict ============= */

function scoreAnswer(
  answer: string,
  context: MergedContext,
  vectorHits: readonly VectorHit[],
  settings: ScoringSettings
): ConfidenceReport {
  const components = computeConfidenceComponents(answer, context, vectorHits, settings);
  const score = composeConfidence(components);
  const rounded = score.toFixed(3);

  if (context.blocks.length === 0) {
    return { score, components, verdict: "reject", reason: "no context was retrieved" };
  }
  if (components.rejectionPenalty === 0) {
    return {
      score,
      components,
      verdict: "reject",
      reason: "the answer declines to answer from the context",
    };
  }
  if (score < settings.confidenceThreshold) {
    return {
      score,
      components,
      verdict: "reject",
      reason: `confidence ${rounded} is below the threshold ${settings.confidenceThreshold}`,
    };
  }
  return {
    score,
    components,
    verdict: "accept",
    reason: `confidence ${rounded} meets the threshold ${settings.confidenceThreshold}`,
  };
}

/* ============= Export ============= */

export const ConfidenceScorer = {
  score: scoreAnswer,
  computeConfidenceComponents,
  composeConfidence,
  // Exposed for testing
  isRefusal,
  clamp01,
};
