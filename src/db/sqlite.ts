// src/db/sqlite.ts
// SQLite adapter: wraps better-sqlite3 behind the async DbAdapter interface.
// All methods return Promises that resolve synchronously (better-sqlite3 is sync).

import type Database from 'better-sqlite3';
import type { DbAdapter, RunResult } from './types';

export class SqliteAdapter implements DbAdapter {
  private _db: Database.Database;
  private _inTransaction = false;

  constructor(db: Database.Database) {
    this._db = db;
  }

  /**
   * Expose the underlying better-sqlite3 Database instance.
   * Used only by the schema bootstrap; stores go through the adapter methods.
   */
  get raw(): Database.Database {
    return this._db;
  }

  queryOne<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T | undefined> {
    const row: unknown = this._db.prepare(sql).get(...params);
    return Promise.resolve(row as T | undefined);
  }

  queryAll<T = Record<string, unknown>>(
    sql: string,
    params: unknown[] = []
  ): Promise<T[]> {
    const rows: unknown[] = this._db.prepare(sql).all(...params);
    return Promise.resolve(rows as T[]);
  }

  run(sql: string, params: unknown[] = []): Promise<RunResult> {
    const result = this._db.prepare(sql).run(...params);
    return Promise.resolve({
      changes: result.changes,
      lastInsertRowid: result.lastInsertRowid,
    });
  }

  exec(sql: string): Promise<void> {
    this._db.exec(sql);
    return Promise.resolve();
  }

  async transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T> {
    // better-sqlite3's db.transaction() doesn't take async callbacks, so
    // BEGIN/COMMIT/ROLLBACK are issued manually. Nested calls join the
    // outer transaction.
    if (this._inTransaction) return fn(this);

    this._db.exec('BEGIN');
    this._inTransaction = true;
    try {
      const result = await fn(this);
      this._db.exec('COMMIT');
      return result;
    } catch (e) {
      this._db.exec('ROLLBACK');
      throw e;
    } finally {
      this._inTransaction = false;
    }
  }

  close(): Promise<void> {
    this._db.close();
    return Promise.resolve();
  }
}
