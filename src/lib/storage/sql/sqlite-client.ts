import type Database from 'better-sqlite3';
import { openDatabase } from '../../db/connection.js';
import { StorageError } from '../../errors.js';
import { isRow } from './client.js';
import type { SqlClient, SqlExecutor, SqlParam, SqlRow } from './client.js';

/**
 * SqlClient over better-sqlite3. The driver is synchronous; methods are
 * async only to share the interface with PostgreSQL. One connection is
 * shared, so transactions are queued and run one at a time.
 */
export class SqliteClient implements SqlClient {
  readonly dialect = 'sqlite' as const;
  readonly location: string;
  private db: Database.Database | null;
  private readonly executor: SqlExecutor;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(filePath: string) {
    this.location = filePath;
    this.db = openDatabase(filePath);
    this.executor = {
      query: async (sql, params) => this.all(sql, params),
      execute: async (sql, params) => this.run(sql, params),
    };
  }

  private get database(): Database.Database {
    if (!this.db) throw new StorageError(`SQLite database ${this.location} is closed`);
    return this.db;
  }

  private all(sql: string, params: SqlParam[] = []): SqlRow[] {
    const rows: unknown[] = this.database.prepare(sql).all(...params);
    return rows.filter(isRow);
  }

  private run(sql: string, params: SqlParam[] = []): { changes: number } {
    const result = this.database.prepare(sql).run(...params);
    return { changes: result.changes };
  }

  async query(sql: string, params?: SqlParam[]): Promise<SqlRow[]> {
    return this.all(sql, params);
  }

  async execute(sql: string, params?: SqlParam[]): Promise<{ changes: number }> {
    return this.run(sql, params);
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const run = this.queue.then(() => this.runTransaction(fn));
    // The caller gets the failure through `run`; the queue only orders
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async runTransaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const database = this.database;
    try {
      database.exec('BEGIN IMMEDIATE');
      const result = await fn(this.executor);
      database.exec('COMMIT');
      return result;
    } catch (err) {
      if (database.inTransaction) database.exec('ROLLBACK');
      throw err;
    }
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }
}
