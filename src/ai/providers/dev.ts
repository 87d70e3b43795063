// src/ai/providers/dev.ts
// Deterministic offline provider. Used when AI_PROVIDER=dev and in tests.
//
// Classification prompts get a keyword-rule label; generation prompts get the
// first sentence of the passage sharing the most keywords with the question.

import type { ComposeParams, ComposeResult, ComposeProvider } from './index';
import {
  CLASSIFICATION_SYSTEM_PROMPT,
  CONTEXT_BLOCK_SEPARATOR,
  CONTEXT_HEADER,
  INSUFFICIENT_INFORMATION_MESSAGE,
  QUESTION_HEADER,
} from '../../knowledge/prompts';
import { extractKeywords, keywordCoverage } from '../../knowledge/keywords';

const RELATIONAL_CUES = /\b(relat\w*|connect\w*|between|link\w*|associat\w*|who works|works? (at|for))\b/i;
const REASONING_CUES = /\b(why|explain|compare|comparison|difference|impact|cause|implication|how does|how do)\b/i;

export function devClassify(prompt: string): string {
  const question = prompt.replace(/^Question:\s*/, '');
  if (REASONING_CUES.test(question)) return 'reasoning';
  if (RELATIONAL_CUES.test(question)) return 'relational';
  return 'factual';
}

function firstSentence(text: string): string {
  const match = /^(.+?[.!?])(\s|$)/s.exec(text.trim());
  return (match ? match[1] : text).trim();
}

export function devAnswer(prompt: string): string {
  const contextStart = prompt.indexOf(CONTEXT_HEADER);
  const questionStart = prompt.lastIndexOf(QUESTION_HEADER);
  if (contextStart < 0 || questionStart < contextStart) return INSUFFICIENT_INFORMATION_MESSAGE;

  const question = prompt
    .slice(questionStart + QUESTION_HEADER.length)
    .replace(/\n\nAnswer:\s*$/, '');
  const blocks = prompt
    .slice(contextStart + CONTEXT_HEADER.length, questionStart)
    .split(CONTEXT_BLOCK_SEPARATOR)
    .map((b) => b.replace(/^\[\d+\]\s*/, '').trim())
    .filter(Boolean);

  const questionKeywords = extractKeywords(question);
  let best = '';
  let bestCoverage = 0;
  for (const block of blocks) {
    const coverage = keywordCoverage(questionKeywords, extractKeywords(block));
    if (coverage > bestCoverage) {
      best = block;
      bestCoverage = coverage;
    }
  }

  return best ? firstSentence(best) : INSUFFICIENT_INFORMATION_MESSAGE;
}

export const DevProvider: ComposeProvider = {
  async compose(params: ComposeParams): Promise<ComposeResult> {
    const text =
      params.system === CLASSIFICATION_SYSTEM_PROMPT
        ? devClassify(params.prompt)
        : devAnswer(params.prompt);
    return { text, meta: { provider: 'dev', model: params.model } };
  },
};

export default DevProvider;
