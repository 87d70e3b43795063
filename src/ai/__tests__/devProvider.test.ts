import { describe, it, expect } from 'vitest';
import { DevProvider, devAnswer, devClassify } from '../providers/dev.js';
import { createLanguageCapability } from '../languageCapability.js';
import {
  CLASSIFICATION_SYSTEM_PROMPT,
  GENERATION_SYSTEM_PROMPT,
  INSUFFICIENT_INFORMATION_MESSAGE,
  buildClassificationPrompt,
  buildGenerationPrompt,
} from '../../knowledge/prompts.js';

describe('devClassify', () => {
  it('labels why and how questions as reasoning', () => {
    expect(devClassify(buildClassificationPrompt('Why did revenue fall?'))).toBe('reasoning');
    expect(devClassify(buildClassificationPrompt('Explain the merger.'))).toBe('reasoning');
  });

  it('labels connection questions as relational', () => {
    expect(devClassify(buildClassificationPrompt('How is John Smith connected to Tech Corp?'))).toBe(
      'relational'
    );
    expect(devClassify(buildClassificationPrompt('Who works at Tech Corp?'))).toBe('relational');
  });

  it('labels everything else as factual', () => {
    expect(devClassify(buildClassificationPrompt('What is the capital of France?'))).toBe('factual');
  });
});

describe('devAnswer', () => {
  it('answers with the first sentence of the best-matching block', () => {
    const prompt = buildGenerationPrompt('Where does John Smith work?', [
      'Paris is large.',
      'John Smith works at Tech Corp. He likes it.',
    ]);
    expect(devAnswer(prompt)).toBe('John Smith works at Tech Corp.');
  });

  it('refuses when no block shares a keyword with the question', () => {
    const prompt = buildGenerationPrompt('What is the revenue of Nonexistent Corp?', ['Paris is large.']);
    expect(devAnswer(prompt)).toBe(INSUFFICIENT_INFORMATION_MESSAGE);
  });

  it('refuses a prompt without a context section', () => {
    expect(devAnswer('Just a question?')).toBe(INSUFFICIENT_INFORMATION_MESSAGE);
  });
});

describe('DevProvider', () => {
  it('dispatches on the system prompt', async () => {
    const classified = await DevProvider.compose({
      prompt: buildClassificationPrompt('Why did revenue fall?'),
      system: CLASSIFICATION_SYSTEM_PROMPT,
      model: 'dev-stub-1',
    });
    expect(classified.text).toBe('reasoning');
  });
});

describe('createLanguageCapability', () => {
  it('completes through the dev provider', async () => {
    const language = createLanguageCapability({ provider: 'dev' });
    const text = await language.complete(
      buildGenerationPrompt('Where does John Smith work?', ['John Smith works at Tech Corp.']),
      { systemPrompt: GENERATION_SYSTEM_PROMPT, action: 'generate' }
    );
    expect(text).toBe('John Smith works at Tech Corp.');
  });
});
