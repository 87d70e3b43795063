// src/knowledge/answerGenerator.ts
// Grounded answer generation over the merged context.

import type { PipelineConfig } from "../config";
import { callWithRetry } from "../ai/retry";
import { createLogger, type Logger } from "../observability/logger";
import { CapabilityUnavailableError, abortReason, errorMessage } from "./errors";
import {
  GENERATION_SYSTEM_PROMPT,
  INSUFFICIENT_INFORMATION_MESSAGE,
  buildGenerationPrompt,
} from "./prompts";
import type { LanguageCapability, MergedContext } from "./types";

export interface AnswerGeneratorDeps {
  language: LanguageCapability;
  config: PipelineConfig;
  logger?: Logger;
}

export interface GeneratedAnswer {
  text: string;
  /** True when no model call was made because the context was empty */
  skipped: boolean;
}

const defaultLogger = createLogger("knowledge:generator");

/**
 * Ask the language capability for an answer restricted to `context`.
 * Transport failures are retried once; a second failure is a
 * CapabilityUnavailableError for the generating stage.
 */
async function generateAnswer(
  question: string,
  context: MergedContext,
  deps: AnswerGeneratorDeps,
  signal?: AbortSignal
): Promise<GeneratedAnswer> {
  if (context.blocks.length === 0) {
    return { text: INSUFFICIENT_INFORMATION_MESSAGE, skipped: true };
  }

  const log = deps.logger ?? defaultLogger;
  const { config } = deps;
  const prompt = buildGenerationPrompt(question, context.blocks);

  try {
    const text = await callWithRetry(
      (attemptSignal) =>
        deps.language.complete(prompt, {
          systemPrompt: GENERATION_SYSTEM_PROMPT,
          temperature: config.generation.temperature,
          maxTokens: config.generation.maxTokens,
          signal: attemptSignal,
          action: "generate",
        }),
      {
        action: "generate",
        retries: 1,
        backoffMs: config.retryBackoffMs,
        timeoutMs: config.generationTimeoutMs,
        signal,
        onRetry: (err) => log.warn({ err: errorMessage(err) }, "Generation failed, retrying"),
      }
    );
    return { text: text.trim(), skipped: false };
  } catch (err) {
    if (signal?.aborted) throw abortReason(signal);
    throw new CapabilityUnavailableError("generating", err);
  }
}

export const AnswerGenerator = {
  generate: generateAnswer,
};
