// src/ai/providers/index.ts
// Shared provider types + small helpers.

export type ComposeParams = {
  prompt: string;                 // required user prompt
  system?: string;                // optional system prompt
  temperature?: number;           // 0..2 (provider-specific limits apply)
  maxTokens?: number;             // aka max_tokens
  model: string;                  // provider model id
  seed?: number | string;         // OpenAI supports best-effort; others ignore
  signal?: AbortSignal;           // aborts the HTTP request
};

export type ComposeResult = {
  text: string;
  usage?: { inputTokens?: number; outputTokens?: number };
  meta?: Record<string, unknown>; // provider/model/system_fingerprint/etc
};

export interface ComposeProvider {
  compose(params: ComposeParams): Promise<ComposeResult>;
}

// Utility: normalize seed to number where possible (OpenAI expects integer)
export function normalizeSeed(seed?: number | string): number | undefined {
  if (seed === undefined || seed === null || seed === '') return undefined;
  if (typeof seed === 'number') return Math.floor(seed);
  const n = Number(seed);
  return Number.isFinite(n) ? Math.floor(n) : undefined;
}
