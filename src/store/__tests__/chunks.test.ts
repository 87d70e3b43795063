import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type SqliteAdapter } from '../../db/index.js';
import { SqliteVectorIndex, cosineSimilarity } from '../chunks.js';
import { DocumentsStore } from '../documents.js';

/* ============= cosineSimilarity ============= */

describe('cosineSimilarity', () => {
  it('is 1 for parallel vectors', () => {
    expect(cosineSimilarity([1, 2], [2, 4])).toBeCloseTo(1);
  });

  it('is 0 for orthogonal vectors', () => {
    expect(cosineSimilarity([1, 0], [0, 1])).toBe(0);
  });

  it('clamps opposite vectors to 0', () => {
    expect(cosineSimilarity([1, 0], [-1, 0])).toBe(0);
  });

  it('is 0 for mismatched lengths and zero vectors', () => {
    expect(cosineSimilarity([1, 0], [1, 0, 0])).toBe(0);
    expect(cosineSimilarity([0, 0], [1, 0])).toBe(0);
    expect(cosineSimilarity([], [])).toBe(0);
  });
});

/* ============= SqliteVectorIndex ============= */

describe('SqliteVectorIndex', () => {
  let db: SqliteAdapter;
  let index: SqliteVectorIndex;

  beforeEach(async () => {
    db = await openDatabase(':memory:');
    index = new SqliteVectorIndex(db);
  });

  afterEach(async () => {
    await db.close();
  });

  const chunk = (id: string, text: string) => ({ id, documentId: 'doc-1', text, offset: 0 });

  it('ranks chunks by similarity and honours k', async () => {
    await index.upsert(chunk('c-a', 'east'), [1, 0]);
    await index.upsert(chunk('c-b', 'north-east'), [0.6, 0.8]);
    await index.upsert(chunk('c-c', 'north'), [0, 1]);

    const hits = await index.search([1, 0], 2);
    expect(hits.map((h) => h.chunk.id)).toEqual(['c-a', 'c-b']);
    expect(hits[0].score).toBeCloseTo(1);
    expect(hits[1].score).toBeCloseTo(0.6);
    expect(hits[1].chunk.embedding).toEqual([0.6, 0.8]);
    expect(await index.count()).toBe(3);
  });

  it('breaks score ties by chunk id', async () => {
    await index.upsert(chunk('b', 'same'), [1, 0]);
    await index.upsert(chunk('a', 'same'), [1, 0]);

    const hits = await index.search([1, 0], 5);
    expect(hits.map((h) => h.chunk.id)).toEqual(['a', 'b']);
  });

  it('replaces a chunk on re-upsert', async () => {
    await index.upsert(chunk('c-a', 'old text'), [1, 0]);
    await index.upsert(chunk('c-a', 'new text'), [0, 1]);

    expect(await index.count()).toBe(1);
    const [hit] = await index.search([0, 1], 1);
    expect(hit.chunk.text).toBe('new text');
    expect(hit.score).toBeCloseTo(1);
  });

  it('deletes only the chunks of the given document', async () => {
    await index.upsert(chunk('c-a', 'east'), [1, 0]);
    await index.upsert(chunk('c-b', 'north'), [0, 1]);
    await index.upsert({ id: 'c-c', documentId: 'doc-2', text: 'west', offset: 0 }, [1, 0]);

    expect(await index.deleteByDocument('doc-1')).toBe(2);
    expect(await index.count()).toBe(1);
    const [hit] = await index.search([1, 0], 1);
    expect(hit.chunk.id).toBe('c-c');
  });

  it('returns nothing for k of 0 or an empty index', async () => {
    expect(await index.search([1, 0], 3)).toEqual([]);
    await index.upsert(chunk('c-a', 'east'), [1, 0]);
    expect(await index.search([1, 0], 0)).toEqual([]);
  });
});

/* ============= DocumentsStore ============= */

describe('DocumentsStore', () => {
  let db: SqliteAdapter;

  beforeEach(async () => {
    db = await openDatabase(':memory:');
  });

  afterEach(async () => {
    await db.close();
  });

  it('creates and reads back a document record', async () => {
    const store = new DocumentsStore(db);
    const created = await store.create({
      id: 'doc-1',
      fileName: 'notes.txt',
      fileType: 'txt',
      chunkCount: 2,
      entityCount: 3,
      relationCount: 1,
    });

    expect(await store.getById('doc-1')).toEqual(created);
    expect(await store.count()).toBe(1);
  });

  it('returns null for an unknown id', async () => {
    expect(await new DocumentsStore(db).getById('missing')).toBeNull();
  });
});
