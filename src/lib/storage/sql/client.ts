/**
 * Minimal SQL client used by the relational backend.
 *
 * Statements are written once with `?` placeholders; the PostgreSQL client
 * rewrites them to `$1..$n` before sending.
 */

export type SqlDialect = 'sqlite' | 'postgresql';

export type SqlParam = string | number | bigint | Buffer | null;

export type SqlRow = Record<string, unknown>;

export function isRow(value: unknown): value is SqlRow {
  return typeof value === 'object' && value !== null;
}

export interface SqlExecutor {
  /** Run a statement that returns rows (SELECT, or INSERT ... RETURNING). */
  query(sql: string, params?: SqlParam[]): Promise<SqlRow[]>;
  /** Run a statement for its side effects. */
  execute(sql: string, params?: SqlParam[]): Promise<{ changes: number }>;
}

export interface SqlClient extends SqlExecutor {
  readonly dialect: SqlDialect;
  /** Human-readable location (file path or host/database) */
  readonly location: string;
  /**
   * Run `fn` in a transaction. Commits when it resolves, rolls back and
   * rethrows when it rejects.
   */
  transaction<T>(fn: (tx: SqlExecutor) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

/**
 * Rewrite `?` placeholders to PostgreSQL's `$n`. Question marks inside
 * single-quoted literals are left alone.
 */
export function toPositionalParams(sql: string): string {
  let out = '';
  let index = 0;
  let inString = false;

  for (const ch of sql) {
    if (ch === "'") {
      inString = !inString;
      out += ch;
    } else if (ch === '?' && !inString) {
      index++;
      out += `$${index}`;
    } else {
      out += ch;
    }
  }

  return out;
}
