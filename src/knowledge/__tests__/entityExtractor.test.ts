import { describe, it, expect } from 'vitest';
import { EntityExtractor } from '../entityExtractor.js';

const TEXT =
  'John Smith works at Tech Corp. Tech Corp is headquartered in Boston City. ' +
  'Jane Doe is the CEO of Tech Corp.';

describe('EntityExtractor.extract', () => {
  it('extracts typed entities once each', () => {
    const { entities } = EntityExtractor.extract(TEXT);
    expect(entities).toEqual([
      { name: 'John Smith', type: 'Person' },
      { name: 'Tech Corp', type: 'Organization' },
      { name: 'Boston City', type: 'Location' },
      { name: 'Jane Doe', type: 'Person' },
    ]);
  });

  it('extracts relations from known phrasings', () => {
    const { relations } = EntityExtractor.extract(TEXT);
    expect(relations).toEqual([
      { source: 'John Smith', target: 'Tech Corp', relationType: 'WORKS_AT' },
      { source: 'Jane Doe', target: 'Tech Corp', relationType: 'CEO_OF' },
      { source: 'Tech Corp', target: 'Boston City', relationType: 'LOCATED_IN' },
    ]);
  });

  it('strips sentence-initial words from names', () => {
    const result = EntityExtractor.extract('The Acme Group is based in Paris.');
    expect(result.entities).toEqual([
      { name: 'Acme Group', type: 'Organization' },
      { name: 'Paris', type: 'Entity' },
    ]);
    expect(result.relations).toEqual([
      { source: 'Acme Group', target: 'Paris', relationType: 'LOCATED_IN' },
    ]);
  });

  it('drops relations with an unextracted end or a self-loop', () => {
    expect(EntityExtractor.extract('Al works at Tech Corp.').relations).toEqual([]);
    expect(EntityExtractor.extract('Tech Corp works for Tech Corp.').relations).toEqual([]);
  });

  it('caps the number of entities', () => {
    const letters = 'abcdefghijklmnopqrstuvwxyz';
    const names = Array.from({ length: 60 }, (_, i) => `Qx${letters[i % 26]}${letters[Math.floor(i / 26)]}`);
    expect(EntityExtractor.extractEntities(names.join('. ') + '.')).toHaveLength(50);
  });
});

describe('guessEntityType', () => {
  it('recognizes organizations, locations and people', () => {
    expect(EntityExtractor.guessEntityType('Stanford University')).toBe('Organization');
    expect(EntityExtractor.guessEntityType('New York City')).toBe('Location');
    expect(EntityExtractor.guessEntityType('Ada Lovelace')).toBe('Person');
    expect(EntityExtractor.guessEntityType('Paris')).toBe('Entity');
  });
});
