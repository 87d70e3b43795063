import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { openDatabase, type SqliteAdapter } from '../../db/index.js';
import { SqliteGraphStore } from '../graph.js';

let db: SqliteAdapter;
let store: SqliteGraphStore;

beforeEach(async () => {
  db = await openDatabase(':memory:');
  store = new SqliteGraphStore(db);
});

afterEach(async () => {
  await db.close();
});

async function seedCompany(documentId = 'doc-1') {
  return store.write(
    documentId,
    [
      { name: 'John Smith', type: 'Person' },
      { name: 'Tech Corp', type: 'Organization' },
    ],
    [{ source: 'John Smith', target: 'Tech Corp', relationType: 'WORKS_AT' }]
  );
}

/* ============= write ============= */

describe('SqliteGraphStore.write', () => {
  it('stores entities and relations', async () => {
    expect(await seedCompany()).toEqual({ entitiesWritten: 2, relationsWritten: 1 });
    expect(await store.stats()).toEqual({ entities: 2, relations: 1 });
  });

  it('merges repeated entities and relations across documents', async () => {
    await seedCompany('doc-1');
    await seedCompany('doc-2');

    expect(await store.stats()).toEqual({ entities: 2, relations: 1 });
    const [john] = await store.matchEntities('John Smith');
    expect(john.sourceDocumentIds).toEqual(['doc-1', 'doc-2']);

    const { relations } = await store.neighbors(john.id);
    expect(relations).toHaveLength(1);
    expect(relations[0].sourceDocumentIds).toEqual(['doc-1', 'doc-2']);
  });

  it('skips relations whose endpoints are unknown', async () => {
    const result = await store.write(
      'doc-1',
      [{ name: 'Tech Corp', type: 'Organization' }],
      [{ source: 'Nobody Known', target: 'Tech Corp', relationType: 'WORKS_AT' }]
    );
    expect(result).toEqual({ entitiesWritten: 1, relationsWritten: 0 });
  });

  it('resolves endpoints written by an earlier document', async () => {
    await seedCompany('doc-1');
    const result = await store.write(
      'doc-2',
      [{ name: 'Boston', type: 'Location' }],
      [{ source: 'tech corp', target: 'Boston', relationType: 'LOCATED_IN' }]
    );
    expect(result).toEqual({ entitiesWritten: 1, relationsWritten: 1 });
    expect(await store.stats()).toEqual({ entities: 3, relations: 2 });
  });

  it('trims stored names', async () => {
    await store.write('doc-1', [{ name: '  Ada Lovelace ', type: 'Person' }], []);
    const [ada] = await store.matchEntities('ada lovelace');
    expect(ada.name).toBe('Ada Lovelace');
  });
});

/* ============= matchEntities ============= */

describe('SqliteGraphStore.matchEntities', () => {
  beforeEach(async () => {
    await seedCompany();
    await store.write('doc-2', [{ name: 'Acme Corp', type: 'Organization' }], []);
  });

  it('matches exactly on the normalized name', async () => {
    const matches = await store.matchEntities('  TECH   corp ');
    expect(matches.map((e) => e.name)).toEqual(['Tech Corp']);
  });

  it('returns nothing for a partial name in exact mode', async () => {
    expect(await store.matchEntities('corp')).toEqual([]);
  });

  it('matches substrings in name order', async () => {
    const matches = await store.matchEntities('corp', { mode: 'substring' });
    expect(matches.map((e) => e.name)).toEqual(['Acme Corp', 'Tech Corp']);
  });

  it('returns nothing for a blank name', async () => {
    expect(await store.matchEntities('   ', { mode: 'substring' })).toEqual([]);
  });
});

/* ============= mentionedIn ============= */

describe('SqliteGraphStore.mentionedIn', () => {
  beforeEach(async () => {
    await seedCompany();
    await store.write('doc-2', [{ name: 'Acme Corp', type: 'Organization' }], []);
  });

  it('finds entities named in the text regardless of case', async () => {
    const found = await store.mentionedIn('how is john smith related to tech corp?');
    expect(found.map((e) => e.name)).toEqual(['John Smith', 'Tech Corp']);
  });

  it('matches names split by punctuation', async () => {
    const found = await store.mentionedIn('Is ACME CORP, or tech-corp, hiring?');
    expect(found.map((e) => e.name)).toEqual(['Acme Corp', 'Tech Corp']);
  });

  it('ignores partial names', async () => {
    expect(await store.mentionedIn('what does corp do?')).toEqual([]);
  });
});

/* ============= neighbors ============= */

describe('SqliteGraphStore.neighbors', () => {
  it('follows relations in both directions', async () => {
    await seedCompany();
    const [tech] = await store.matchEntities('Tech Corp');

    const { entities, relations } = await store.neighbors(tech.id);
    expect(entities.map((e) => e.name)).toEqual(['John Smith']);
    expect(relations.map((r) => r.relationType)).toEqual(['WORKS_AT']);
    expect(relations[0].targetEntityId).toBe(tech.id);
  });

  it('returns nothing for an isolated entity', async () => {
    await store.write('doc-1', [{ name: 'Lonely Island', type: 'Location' }], []);
    const [island] = await store.matchEntities('Lonely Island');
    expect(await store.neighbors(island.id)).toEqual({ entities: [], relations: [] });
  });
});
