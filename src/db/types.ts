// src/db/types.ts
// Database adapter interface: unified async API over the SQLite driver

/* ---------- Result Types ---------- */

export interface RunResult {
  changes: number;
  lastInsertRowid: number | bigint;
}

/* ---------- DbAdapter Interface ---------- */

/**
 * Unified async database interface.
 * Stores receive an adapter by constructor and never touch the driver directly.
 *
 * Query methods use '?' parameter placeholders.
 */
export interface DbAdapter {
  /**
   * Execute a SELECT query and return the first matching row, or undefined if no match.
   * @param sql    SQL string with '?' parameter placeholders
   * @param params Ordered parameter values matching the placeholders
   */
  queryOne<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T | undefined>;

  /**
   * Execute a SELECT query and return all matching rows.
   */
  queryAll<T = Record<string, unknown>>(
    sql: string,
    params?: unknown[]
  ): Promise<T[]>;

  /**
   * Execute an INSERT, UPDATE, or DELETE statement.
   */
  run(sql: string, params?: unknown[]): Promise<RunResult>;

  /**
   * Execute raw SQL without parameters. Used for DDL.
   */
  exec(sql: string): Promise<void>;

  /**
   * Execute a series of operations atomically.
   * On error, ROLLBACK is issued and the error is rethrown.
   */
  transaction<T>(fn: (tx: DbAdapter) => Promise<T>): Promise<T>;

  /** Close the database connection. */
  close(): Promise<void>;
}
