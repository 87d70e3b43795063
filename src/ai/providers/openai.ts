// src/ai/providers/openai.ts
import OpenAI from 'openai';
import { config } from '../../config';
import type { ComposeParams, ComposeResult, ComposeProvider } from './index';
import { normalizeSeed } from './index';

let _client: OpenAI | null = null;

/** Shared client for chat completions and embeddings */
export function getOpenAIClient(): OpenAI {
  if (_client) return _client;
  const apiKey = config.ai.openaiKey;
  if (!apiKey) {
    throw new Error('OPENAI_API_KEY is not set. Set it in your environment to use the OpenAI provider.');
  }
  _client = new OpenAI({ apiKey });
  return _client;
}

/**
 * Compose via OpenAI Chat Completions (supports `seed` for best-effort reproducibility).
 */
export const OpenAIProvider: ComposeProvider = {
  async compose(params: ComposeParams): Promise<ComposeResult> {
    const client = getOpenAIClient();
    const { prompt, system, temperature, maxTokens, model, seed, signal } = params;

    const messages: Array<{ role: 'system' | 'user'; content: string }> = [];
    if (system && system.trim()) messages.push({ role: 'system', content: system });
    messages.push({ role: 'user', content: prompt });

    const resp = await client.chat.completions.create(
      {
        model,
        messages,
        temperature: typeof temperature === 'number' ? temperature : undefined,
        max_tokens: typeof maxTokens === 'number' ? maxTokens : undefined,
        seed: normalizeSeed(seed),
      },
      { signal }
    );

    const text = (resp.choices[0]?.message?.content ?? '').toString();

    return {
      text,
      usage: {
        inputTokens: resp.usage?.prompt_tokens,
        outputTokens: resp.usage?.completion_tokens,
      },
      meta: {
        provider: 'openai',
        model: resp.model,
        system_fingerprint: resp.system_fingerprint,
      },
    };
  },
};

export default OpenAIProvider;
