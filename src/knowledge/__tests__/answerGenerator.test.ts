import { describe, it, expect } from 'vitest';
import { AnswerGenerator } from '../answerGenerator.js';
import { CapabilityTimeoutError, CapabilityUnavailableError } from '../errors.js';
import {
  GENERATION_SYSTEM_PROMPT,
  INSUFFICIENT_INFORMATION_MESSAGE,
  buildGenerationPrompt,
} from '../prompts.js';
import type { MergedContext } from '../types.js';
import { ScriptedLanguage, hang, testConfig } from './fakes.js';

const config = testConfig();

const context: MergedContext = {
  blocks: ['John Smith works at Tech Corp.', 'Tech Corp is based in Boston.'],
  provenance: [
    { kind: 'chunk', chunkId: 'c1', documentId: 'doc-1', score: 0.9 },
    { kind: 'chunk', chunkId: 'c2', documentId: 'doc-1', score: 0.7 },
  ],
  droppedBlocks: 0,
};

const emptyContext: MergedContext = { blocks: [], provenance: [], droppedBlocks: 0 };

describe('AnswerGenerator.generate', () => {
  it('skips the model call on an empty context', async () => {
    const language = new ScriptedLanguage([], ['should not be used']);
    const result = await AnswerGenerator.generate('Who?', emptyContext, { language, config });
    expect(result).toEqual({ text: INSUFFICIENT_INFORMATION_MESSAGE, skipped: true });
    expect(language.calls).toHaveLength(0);
  });

  it('sends the grounded prompt and trims the answer', async () => {
    const language = new ScriptedLanguage([], ['  John Smith works at Tech Corp.\n']);
    const result = await AnswerGenerator.generate('Where does John Smith work?', context, {
      language,
      config,
    });

    expect(result).toEqual({ text: 'John Smith works at Tech Corp.', skipped: false });
    expect(language.calls).toHaveLength(1);
    const { prompt, constraints } = language.calls[0];
    expect(prompt).toBe(buildGenerationPrompt('Where does John Smith work?', context.blocks));
    expect(constraints.systemPrompt).toBe(GENERATION_SYSTEM_PROMPT);
    expect(constraints.temperature).toBe(0.1);
    expect(constraints.maxTokens).toBe(1000);
    expect(constraints.action).toBe('generate');
  });

  it('retries a failed call once', async () => {
    const language = new ScriptedLanguage([], [new Error('503 from upstream'), 'Boston.']);
    const result = await AnswerGenerator.generate('Where is Tech Corp?', context, { language, config });
    expect(result.text).toBe('Boston.');
    expect(language.answerCalls).toBe(2);
  });

  it('reports the generating stage as unavailable after the retry fails', async () => {
    const language = new ScriptedLanguage([], [new Error('connection refused')]);
    const promise = AnswerGenerator.generate('Where is Tech Corp?', context, { language, config });

    await expect(promise).rejects.toBeInstanceOf(CapabilityUnavailableError);
    await expect(promise).rejects.toMatchObject({ stage: 'generating' });
    expect(language.answerCalls).toBe(2);
  });

  it('times out each attempt', async () => {
    const language = new ScriptedLanguage([], [hang]);
    const shortConfig = testConfig({ generationTimeoutMs: 20 });

    const error = await AnswerGenerator.generate('Where is Tech Corp?', context, {
      language,
      config: shortConfig,
    }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(CapabilityUnavailableError);
    expect(error instanceof Error ? error.cause : undefined).toBeInstanceOf(CapabilityTimeoutError);
    expect(language.answerCalls).toBe(2);
  });

  it('rethrows the caller abort reason without retrying', async () => {
    const controller = new AbortController();
    const reason = new Error('client went away');
    const language = new ScriptedLanguage([], [
      (signal) => {
        controller.abort(reason);
        return hang(signal);
      },
    ]);

    await expect(
      AnswerGenerator.generate('Where is Tech Corp?', context, { language, config }, controller.signal)
    ).rejects.toBe(reason);
    expect(language.answerCalls).toBe(1);
  });
});
