import { describe, it, expect } from 'vitest';
import { createHashingEmbedding, hashEmbedding, l2Normalize } from '../embeddings.js';
import { cosineSimilarity } from '../../store/chunks.js';

describe('l2Normalize', () => {
  it('scales to unit length', () => {
    expect(l2Normalize([3, 4])).toEqual([0.6, 0.8]);
  });

  it('leaves the zero vector alone', () => {
    expect(l2Normalize([0, 0])).toEqual([0, 0]);
  });
});

describe('hashEmbedding', () => {
  it('has the requested dimension and unit length', () => {
    const vector = hashEmbedding('John Smith works at Tech Corp.', 32);
    expect(vector).toHaveLength(32);
    const norm = Math.sqrt(vector.reduce((s, v) => s + v * v, 0));
    expect(norm).toBeCloseTo(1);
  });

  it('is deterministic and ignores case and stop words', () => {
    expect(hashEmbedding('Tech Corp', 64)).toEqual(hashEmbedding('the tech CORP', 64));
  });

  it('embeds text without keywords to the zero vector', () => {
    expect(hashEmbedding('the and of', 8)).toEqual(new Array(8).fill(0));
  });

  it('scores shared keywords above unrelated text', () => {
    const query = hashEmbedding('Where does John Smith work?', 256);
    const related = hashEmbedding('John Smith works at Tech Corp.', 256);
    const unrelated = hashEmbedding('Volcanoes erupt molten rock.', 256);
    expect(cosineSimilarity(query, related)).toBeGreaterThan(cosineSimilarity(query, unrelated));
  });
});

describe('createHashingEmbedding', () => {
  it('resolves to the hashed vector', async () => {
    const capability = createHashingEmbedding(16);
    await expect(capability.embed('Tech Corp')).resolves.toEqual(hashEmbedding('Tech Corp', 16));
  });
});
