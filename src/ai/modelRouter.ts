/* src/ai/modelRouter.ts
   Provider-agnostic "compose text" with provider/model/seed overrides.
*/
import { config } from '../config';
import type { ProviderId, ModelInvocationOptions } from './types';
import type { ComposeProvider } from './providers';
import { OpenAIProvider } from './providers/openai';
import { AnthropicProvider } from './providers/anthropic';
import { DevProvider } from './providers/dev';

export type ProviderName = ProviderId;

export interface ComposeOptions extends ModelInvocationOptions {
  systemPrompt?: string;
  temperature?: number;
  maxTokens?: number;
  signal?: AbortSignal;
}

export interface ComposeResult {
  text: string;
  provider: ProviderName;
  model: string;
  raw?: unknown;
}

const PROVIDERS: Record<ProviderName, ComposeProvider> = {
  dev: DevProvider,
  openai: OpenAIProvider,
  anthropic: AnthropicProvider,
};

/** Model id for `provider` when the caller does not name one */
export function defaultModelFor(provider: ProviderName): string {
  if (provider === 'openai') return config.ai.model.openai;
  if (provider === 'anthropic') return config.ai.model.anthropic;
  return 'dev-stub-1';
}

/* ------------------------------ main entry ------------------------------ */

/**
 * Canonical text generation entry.
 * Returns trimmed text; an empty completion is returned as '' and left to the caller.
 */
export async function composeText(
  prompt: string,
  opts: ComposeOptions = {}
): Promise<ComposeResult> {
  const provider: ProviderName = opts.provider ?? config.ai.provider;
  const model = opts.model || defaultModelFor(provider);

  const resp = await PROVIDERS[provider].compose({
    prompt,
    system: opts.systemPrompt,
    temperature: opts.temperature,
    maxTokens: opts.maxTokens,
    model,
    seed: opts.seed,
    signal: opts.signal,
  });

  return { text: resp.text.trim(), provider, model, raw: resp.meta };
}
