import { describe, it, expect } from 'vitest';
import { chunkText } from '../chunking.js';

describe('chunkText', () => {
  it('packs whole sentences up to the size limit', () => {
    expect(chunkText('Aaaa. Bbbb. Cccc.', { size: 11, overlap: 0 })).toEqual([
      { text: 'Aaaa. Bbbb.', offset: 0 },
      { text: 'Cccc.', offset: 12 },
    ]);
  });

  it('repeats trailing sentences that fall inside the overlap', () => {
    expect(chunkText('Aaaa. Bbbb. Cccc.', { size: 11, overlap: 5 })).toEqual([
      { text: 'Aaaa. Bbbb.', offset: 0 },
      { text: 'Bbbb. Cccc.', offset: 6 },
    ]);
  });

  it('cuts an over-long sentence into overlapping windows', () => {
    expect(chunkText('abcdefghij', { size: 4, overlap: 1 })).toEqual([
      { text: 'abcd', offset: 0 },
      { text: 'defg', offset: 3 },
      { text: 'ghij', offset: 6 },
    ]);
  });

  it('keeps offsets pointing into the source text', () => {
    const text = '  Hello world.  ';
    const chunks = chunkText(text, { size: 100, overlap: 10 });
    expect(chunks).toEqual([{ text: 'Hello world.', offset: 2 }]);
    for (const c of chunks) {
      expect(text.slice(c.offset, c.offset + c.text.length)).toBe(c.text);
    }
  });

  it('returns nothing for blank text', () => {
    expect(chunkText('   \n ', { size: 10, overlap: 2 })).toEqual([]);
  });
});
