// src/ai/languageCapability.ts
// LanguageCapability backed by the model router.

import { composeText, defaultModelFor, type ProviderName } from './modelRouter';
import { config } from '../config';
import { recordAiRequest } from '../observability/metrics';
import { createLogger } from '../observability/logger';
import type { CompletionConstraints, LanguageCapability } from '../knowledge/types';

const log = createLogger('ai:language');

export interface LanguageCapabilityOptions {
  provider?: ProviderName;
  model?: string;
  /** Best-effort determinism; only OpenAI honours it */
  seed?: number;
}

export function createLanguageCapability(opts: LanguageCapabilityOptions = {}): LanguageCapability {
  const provider = opts.provider ?? config.ai.provider;
  const model = opts.model || defaultModelFor(provider);
  const seed = opts.seed ?? config.ai.seed;

  return {
    async complete(prompt: string, constraints: CompletionConstraints): Promise<string> {
      const action = constraints.action ?? 'complete';
      const started = Date.now();
      try {
        const result = await composeText(prompt, {
          provider,
          model,
          seed,
          systemPrompt: constraints.systemPrompt,
          temperature: constraints.temperature,
          maxTokens: constraints.maxTokens,
          signal: constraints.signal,
        });
        recordAiRequest(action, provider, 'success', Date.now() - started);
        return result.text;
      } catch (err) {
        recordAiRequest(action, provider, 'error', Date.now() - started);
        log.warn({ err, action, provider, model }, 'Language capability call failed');
        throw err;
      }
    },
  };
}
