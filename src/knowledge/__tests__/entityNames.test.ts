import { describe, it, expect } from 'vitest';
import {
  extractSeedEntities,
  mentionCandidates,
  mergeSeedNames,
  normalizeEntityName,
  stripLeadingWords,
} from '../entityNames.js';

describe('normalizeEntityName', () => {
  it('trims, lowercases and collapses whitespace', () => {
    expect(normalizeEntityName('  Tech \t  Corp ')).toBe('tech corp');
  });
});

describe('stripLeadingWords', () => {
  it('drops question words at the start of a span', () => {
    expect(stripLeadingWords('Where Does John Smith')).toBe('John Smith');
  });

  it('keeps spans that do not start with one', () => {
    expect(stripLeadingWords('Tech Corp')).toBe('Tech Corp');
  });
});

describe('extractSeedEntities', () => {
  it('finds capitalized names in a question', () => {
    expect(extractSeedEntities('Where does John Smith work?')).toEqual(['John Smith']);
  });

  it('keeps order of appearance and drops duplicates', () => {
    expect(extractSeedEntities('How is John Smith connected to Tech Corp and john smith?')).toEqual([
      'John Smith',
      'Tech Corp',
    ]);
    expect(extractSeedEntities('Does Tech Corp know Tech Corp?')).toEqual(['Tech Corp']);
  });

  it('ignores a bare leading question word and short names', () => {
    expect(extractSeedEntities('Who is Al?')).toEqual([]);
  });

  it('returns nothing for an all-lowercase question', () => {
    expect(extractSeedEntities('what happened here?')).toEqual([]);
  });
});

describe('mentionCandidates', () => {
  it('lists runs of up to four words, skipping ones shorter than 3 characters', () => {
    expect(mentionCandidates('Who is John Smith?')).toEqual([
      'who',
      'who is',
      'who is john',
      'who is john smith',
      'is john',
      'is john smith',
      'john',
      'john smith',
      'smith',
    ]);
  });

  it('returns nothing for text without words', () => {
    expect(mentionCandidates(' ?! ')).toEqual([]);
  });
});

describe('mergeSeedNames', () => {
  it('appends new names and drops normalized duplicates', () => {
    expect(mergeSeedNames(['Tech Corp'], ['tech corp', 'John Smith'])).toEqual(['Tech Corp', 'John Smith']);
  });

  it('caps the result at ten seeds', () => {
    const names = Array.from({ length: 12 }, (_, i) => `Entity ${i}`);
    expect(mergeSeedNames([], names)).toHaveLength(10);
  });
});
