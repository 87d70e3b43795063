// src/knowledge/queryClassifier.ts
// Labels a question as factual, relational or reasoning.
//
// The label only steers retrieval and merging, so a classifier that cannot
// produce one falls back to "factual" instead of failing the run.

import type { PipelineConfig } from "../config";
import { callWithRetry } from "../ai/retry";
import { createLogger, type Logger } from "../observability/logger";
import { InvalidInputError, abortReason, errorMessage } from "./errors";
import { CLASSIFICATION_SYSTEM_PROMPT, buildClassificationPrompt } from "./prompts";
import {
  DEFAULT_QUERY_TYPE,
  QUERY_TYPES,
  type LanguageCapability,
  type QueryClassification,
  type QueryType,
} from "./types";

/* ============= Types ============= */

export interface QueryClassifierDeps {
  language: LanguageCapability;
  config: PipelineConfig;
  logger?: Logger;
}

const defaultLogger = createLogger("knowledge:classifier");

/* ============= Output Parsing ============= */

const EDGE_NOISE = /^[\s"'`.,:;!?()[\]*]+|[\s"'`.,:;!?()[\]*]+$/g;

function isQueryType(value: string): value is QueryType {
  return (QUERY_TYPES as readonly string[]).includes(value);
}

/**
 * Map raw model output onto the closed label set.
 * Returns null when the cleaned output is not exactly one of the labels.
 */
function parseQueryType(raw: string): QueryType | null {
  const cleaned = raw.trim().toLowerCase().replace(EDGE_NOISE, "");
  return isQueryType(cleaned) ? cleaned : null;
}

/* ============= Classification ============= */

async function classifyQuery(
  question: string,
  deps: QueryClassifierDeps,
  signal?: AbortSignal
): Promise<QueryClassification> {
  if (!question.trim()) {
    throw new InvalidInputError("Question must not be empty");
  }

  const log = deps.logger ?? defaultLogger;
  const { config } = deps;

  let raw: string;
  try {
    raw = await callWithRetry(
      (attemptSignal) =>
        deps.language.complete(buildClassificationPrompt(question), {
          systemPrompt: CLASSIFICATION_SYSTEM_PROMPT,
          temperature: config.classification.temperature,
          maxTokens: config.classification.maxTokens,
          signal: attemptSignal,
          action: "classify",
        }),
      {
        action: "classify",
        retries: 1,
        backoffMs: config.retryBackoffMs,
        timeoutMs: config.classificationTimeoutMs,
        signal,
        onRetry: (err) => log.warn({ err: errorMessage(err) }, "Classification failed, retrying"),
      }
    );
  } catch (err) {
    if (signal?.aborted) throw abortReason(signal);
    log.warn({ err: errorMessage(err) }, "Classification unavailable, using default label");
    return {
      queryType: DEFAULT_QUERY_TYPE,
      rationale: `classifier unavailable (${errorMessage(err)}); defaulted to ${DEFAULT_QUERY_TYPE}`,
      fallback: true,
    };
  }

  const parsed = parseQueryType(raw);
  if (!parsed) {
    log.debug({ raw }, "Unrecognized classifier output");
    return {
      queryType: DEFAULT_QUERY_TYPE,
      rationale: `unrecognized classifier output "${raw}"; defaulted to ${DEFAULT_QUERY_TYPE}`,
      fallback: true,
    };
  }

  return { queryType: parsed, rationale: `classifier answered "${raw}"`, fallback: false };
}

/* ============= Export ============= */

export const QueryClassifier = {
  classify: classifyQuery,
  // Exposed for testing
  parseQueryType,
};
