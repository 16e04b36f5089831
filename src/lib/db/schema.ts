import type Database from 'better-sqlite3';
import type { SqlDialect } from '../storage/sql/client.js';

/**
 * Metadata store of the indexed backend. One row per stored message;
 * insertion_sequence equals the position of the message's vector in the
 * vector index.
 */
export function initIndexedSchema(database: Database.Database): void {
  database.exec(`
    CREATE TABLE IF NOT EXISTS emails (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_id TEXT NOT NULL UNIQUE,
      sender TEXT NOT NULL DEFAULT '',
      cc TEXT NOT NULL DEFAULT '',
      subject TEXT NOT NULL DEFAULT '',
      timestamp TEXT NOT NULL,
      body TEXT NOT NULL DEFAULT '',
      summary TEXT NOT NULL DEFAULT '',
      embedding BLOB NOT NULL,
      insertion_sequence INTEGER NOT NULL UNIQUE,
      created_at TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_emails_timestamp ON emails(timestamp);

    CREATE TABLE IF NOT EXISTS app_metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    );
  `);
}

/**
 * DDL of the relational backend, per dialect. The row id doubles as the
 * insertion sequence.
 */
export function relationalSchema(dialect: SqlDialect): string[] {
  if (dialect === 'postgresql') {
    return [
      `CREATE TABLE IF NOT EXISTS emails (
        id BIGSERIAL PRIMARY KEY,
        source_id TEXT NOT NULL UNIQUE,
        sender TEXT NOT NULL DEFAULT '',
        cc TEXT NOT NULL DEFAULT '',
        subject TEXT NOT NULL DEFAULT '',
        timestamp TIMESTAMPTZ NOT NULL,
        body TEXT NOT NULL DEFAULT '',
        summary TEXT NOT NULL DEFAULT '',
        embedding BYTEA NOT NULL,
        created_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
      )`,
      'CREATE INDEX IF NOT EXISTS idx_emails_timestamp ON emails(timestamp)',
      `CREATE TABLE IF NOT EXISTS app_metadata (
        key TEXT PRIMARY KEY,
        value TEXT NOT NULL
      )`,
    ];
  }

  return [
    `CREATE TABLE IF NOT EXISTS emails (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      source_id TEXT NOT NULL UNIQUE,
      sender TEXT NOT NULL DEFAULT '',
      cc TEXT NOT NULL DEFAULT '',
      subject TEXT NOT NULL DEFAULT '',
      timestamp TEXT NOT NULL,
      body TEXT NOT NULL DEFAULT '',
      summary TEXT NOT NULL DEFAULT '',
      embedding BLOB NOT NULL,
      created_at TEXT NOT NULL
    )`,
    'CREATE INDEX IF NOT EXISTS idx_emails_timestamp ON emails(timestamp)',
    `CREATE TABLE IF NOT EXISTS app_metadata (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )`,
  ];
}
