import { describe, it, expect } from 'vitest';
import { QueryClassifier } from '../queryClassifier.js';
import { InvalidInputError } from '../errors.js';
import { CLASSIFICATION_SYSTEM_PROMPT } from '../prompts.js';
import { ScriptedLanguage, testConfig } from './fakes.js';

const { classify, parseQueryType } = QueryClassifier;
const config = testConfig();

/* ============= parseQueryType ============= */

describe('parseQueryType', () => {
  it('accepts each label exactly', () => {
    expect(parseQueryType('factual')).toBe('factual');
    expect(parseQueryType('relational')).toBe('relational');
    expect(parseQueryType('reasoning')).toBe('reasoning');
  });

  it('case-folds and trims', () => {
    expect(parseQueryType('  REASONING\n')).toBe('reasoning');
  });

  it('strips surrounding quotes and punctuation', () => {
    expect(parseQueryType('"Relational."')).toBe('relational');
    expect(parseQueryType("'factual'")).toBe('factual');
  });

  it('rejects anything that is not a bare label', () => {
    expect(parseQueryType('factual query')).toBeNull();
    expect(parseQueryType('banana')).toBeNull();
    expect(parseQueryType('')).toBeNull();
  });
});

/* ============= classify ============= */

describe('classify', () => {
  it('returns the parsed label without fallback', async () => {
    const language = new ScriptedLanguage(['Relational']);
    const result = await classify('How is John Smith connected to Tech Corp?', { language, config });
    expect(result.queryType).toBe('relational');
    expect(result.fallback).toBe(false);
  });

  it('sends the fixed instruction in low-temperature mode', async () => {
    const language = new ScriptedLanguage(['factual']);
    await classify('What is the capital?', { language, config });
    expect(language.calls).toHaveLength(1);
    const { prompt, constraints } = language.calls[0];
    expect(prompt).toBe('Question: What is the capital?\n\nLabel:');
    expect(constraints.systemPrompt).toBe(CLASSIFICATION_SYSTEM_PROMPT);
    expect(constraints.temperature).toBe(0);
    expect(constraints.maxTokens).toBe(10);
  });

  it('falls back to factual on unrecognized output', async () => {
    const language = new ScriptedLanguage(['banana']);
    const result = await classify('Why did sales drop?', { language, config });
    expect(result.queryType).toBe('factual');
    expect(result.fallback).toBe(true);
    expect(result.rationale).toContain('"banana"');
  });

  it('retries once and recovers', async () => {
    const language = new ScriptedLanguage([new Error('socket hang up'), 'reasoning']);
    const result = await classify('Why did sales drop?', { language, config });
    expect(result.queryType).toBe('reasoning');
    expect(language.classifyCalls).toBe(2);
  });

  it('falls back to factual after the retry also fails', async () => {
    const language = new ScriptedLanguage([new Error('socket hang up')]);
    const result = await classify('Why did sales drop?', { language, config });
    expect(result.queryType).toBe('factual');
    expect(result.fallback).toBe(true);
    expect(result.rationale).toContain('socket hang up');
    expect(language.classifyCalls).toBe(2);
  });

  it('throws InvalidInputError for a blank question', async () => {
    const language = new ScriptedLanguage(['factual']);
    await expect(classify('   ', { language, config })).rejects.toBeInstanceOf(InvalidInputError);
    expect(language.calls).toHaveLength(0);
  });

  it('propagates caller cancellation instead of falling back', async () => {
    const language = new ScriptedLanguage(['factual']);
    const controller = new AbortController();
    controller.abort(new Error('client went away'));
    await expect(
      classify('What is the capital?', { language, config }, controller.signal)
    ).rejects.toThrow('client went away');
  });
});
