import type { PoolConfig } from 'pg';
import type { PostgresConfig } from '../../config-types.js';
import { StorageError, errorMessage } from '../../errors.js';
import { logWarn } from '../../fault-logger.js';
import { toPositionalParams } from './client.js';
import type { SqlClient, SqlExecutor, SqlParam, SqlRow } from './client.js';

// Lazy-load pg so SQLite-only installs never touch it
let pg: typeof import('pg') | null = null;

async function loadPg(): Promise<typeof import('pg')> {
  if (pg) return pg;
  try {
    pg = await import('pg');
    return pg;
  } catch {
    throw new StorageError(
      'PostgreSQL support requires the "pg" package. Install it with: npm install pg'
    );
  }
}

/** The slice of pg.Pool this client uses. */
export interface PgQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: SqlRow[]; rowCount: number | null }>;
}

export interface PgPoolLike extends PgQueryable {
  connect(): Promise<PgQueryable & { release(err?: Error | boolean): void }>;
  end(): Promise<void>;
}

export type PgPoolFactory = (config: PoolConfig) => Promise<PgPoolLike>;

const defaultPoolFactory: PgPoolFactory = async (config) => {
  const { Pool } = await loadPg();
  return new Pool(config);
};

export function buildPoolConfig(config: PostgresConfig): PoolConfig {
  const poolConfig: PoolConfig = {
    max: config.pool_size,
  };

  if (config.connection_string) {
    poolConfig.connectionString = config.connection_string;
  } else {
    poolConfig.host = config.host;
    poolConfig.port = config.port;
    poolConfig.database = config.database;
    poolConfig.user = config.user;
    poolConfig.password = config.password;
  }

  if (config.ssl) {
    poolConfig.ssl = { rejectUnauthorized: false };
  }

  return poolConfig;
}

function describeLocation(config: PostgresConfig): string {
  if (config.connection_string) {
    // Never print credentials
    try {
      const url = new URL(config.connection_string);
      return `postgresql://${url.host}${url.pathname}`;
    } catch {
      return 'postgresql://(connection string)';
    }
  }
  return `postgresql://${config.host}:${config.port}/${config.database}`;
}

function executorFor(target: PgQueryable): SqlExecutor {
  return {
    query: async (sql, params = []) => {
      const result = await target.query(toPositionalParams(sql), params);
      return result.rows;
    },
    execute: async (sql, params = []) => {
      const result = await target.query(toPositionalParams(sql), params);
      return { changes: result.rowCount ?? 0 };
    },
  };
}

export class PostgresClient implements SqlClient {
  readonly dialect = 'postgresql' as const;
  readonly location: string;
  private pool: PgPoolLike | null = null;

  constructor(
    private readonly config: PostgresConfig,
    private readonly createPool: PgPoolFactory = defaultPoolFactory
  ) {
    this.location = describeLocation(config);
  }

  private async getPool(): Promise<PgPoolLike> {
    if (this.pool) return this.pool;
    this.pool = await this.createPool(buildPoolConfig(this.config));
    return this.pool;
  }

  async query(sql: string, params?: SqlParam[]): Promise<SqlRow[]> {
    return executorFor(await this.getPool()).query(sql, params);
  }

  async execute(sql: string, params?: SqlParam[]): Promise<{ changes: number }> {
    return executorFor(await this.getPool()).execute(sql, params);
  }

  async transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T> {
    const pool = await this.getPool();
    const client = await pool.connect();
    // Set when the connection can no longer be trusted; pg then destroys it
    let broken: Error | undefined;

    try {
      await client.query('BEGIN');
      const result = await fn(executorFor(client));
      await client.query('COMMIT');
      return result;
    } catch (e) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        broken = rollbackError instanceof Error ? rollbackError : new StorageError(errorMessage(rollbackError));
        logWarn('postgres', 'Rollback failed, discarding connection', { error: broken.message });
      }
      throw e;
    } finally {
      client.release(broken);
    }
  }

  async close(): Promise<void> {
    if (this.pool) {
      await this.pool.end();
      this.pool = null;
    }
  }
}
