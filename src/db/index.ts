// src/db/index.ts
// Database adapter factory: opens the SQLite file (or an in-memory database)
// and applies the schema.

import path from 'node:path';
import fs from 'node:fs';
import Database from 'better-sqlite3';
import { SqliteAdapter } from './sqlite';
import { applySchema } from './schema';

export type { DbAdapter, RunResult } from './types';
export { SqliteAdapter } from './sqlite';

/**
 * Open the database at `dbPath`, creating parent directories and the schema.
 * Pass ':memory:' for a throwaway database.
 */
export async function openDatabase(dbPath: string): Promise<SqliteAdapter> {
  if (dbPath !== ':memory:') {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }
  const rawDb = new Database(dbPath);
  if (dbPath !== ':memory:') {
    rawDb.pragma('journal_mode = WAL');
  }
  rawDb.pragma('foreign_keys = ON');

  const adapter = new SqliteAdapter(rawDb);
  await applySchema(adapter);
  return adapter;
}
