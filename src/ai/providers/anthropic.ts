// src/ai/providers/anthropic.ts
import Anthropic from '@anthropic-ai/sdk';
import { config } from '../../config';
import type { ComposeParams, ComposeResult, ComposeProvider } from './index';

let _client: Anthropic | null = null;
function getClient(): Anthropic {
  if (_client) return _client;
  const apiKey = config.ai.anthropicKey;
  if (!apiKey) {
    throw new Error(
      'ANTHROPIC_API_KEY is not set. Set it in your environment to use the Anthropic provider.'
    );
  }
  _client = new Anthropic({ apiKey });
  return _client;
}

/**
 * SDK block types evolve across versions, so only `type` and `text` are relied on.
 */
function isTextBlock(b: unknown): b is { type: 'text'; text: string } {
  if (!b || typeof b !== 'object') return false;
  if (!('type' in b) || !('text' in b)) return false;
  return b.type === 'text' && typeof b.text === 'string';
}

export function extractTextFromBlocks(blocks: unknown): string {
  if (!Array.isArray(blocks)) return '';
  return blocks
    .filter(isTextBlock)
    .map((b) => b.text.trim())
    .filter(Boolean)
    .join('\n\n');
}

export const AnthropicProvider: ComposeProvider = {
  async compose(params: ComposeParams): Promise<ComposeResult> {
    const client = getClient();
    // seed is ignored (not part of the Messages API)
    const { prompt, system, temperature, maxTokens, model, signal } = params;

    const resp = await client.messages.create(
      {
        model,
        max_tokens: typeof maxTokens === 'number' ? maxTokens : 1024,
        messages: [{ role: 'user', content: prompt }],
        system: system && system.trim() ? system : undefined,
        temperature: typeof temperature === 'number' ? temperature : undefined,
      },
      { signal }
    );

    return {
      text: extractTextFromBlocks(resp.content),
      usage: {
        inputTokens: resp.usage?.input_tokens,
        outputTokens: resp.usage?.output_tokens,
      },
      meta: {
        provider: 'anthropic',
        model: resp.model,
        message_id: resp.id,
        stop_reason: resp.stop_reason,
      },
    };
  },
};

export default AnthropicProvider;
