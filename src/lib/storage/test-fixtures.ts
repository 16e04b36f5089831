/**
 * Fixtures shared by storage, ingestion and retrieval tests.
 */

import { RelationalBackend } from './backends/relational.js';
import { SqliteClient } from './sql/sqlite-client.js';
import type { MailDocument, NewVectorRecord } from './types.js';

export const FIXED_NOW = new Date('2024-05-20T12:00:00.000Z');

export function makeDocument(sourceId: string, overrides: Partial<MailDocument> = {}): MailDocument {
  return {
    sourceId,
    sender: 'alice@example.com',
    cc: '',
    subject: `Subject ${sourceId}`,
    timestamp: new Date('2024-05-01T09:00:00.000Z'),
    body: `Body of ${sourceId}`,
    ...overrides,
  };
}

export function makeRecord(
  sourceId: string,
  embedding: number[],
  overrides: Partial<NewVectorRecord> = {}
): NewVectorRecord {
  return {
    ...makeDocument(sourceId),
    summary: `summary:${sourceId}`,
    embedding,
    ...overrides,
  };
}

/** Relational backend over a private in-memory SQLite database. */
export async function openMemoryBackend(
  dimensions: number,
  searchWindow = 100
): Promise<RelationalBackend> {
  const backend = new RelationalBackend({
    client: new SqliteClient(':memory:'),
    dimensions,
    searchWindow,
    now: () => FIXED_NOW,
  });
  await backend.init();
  return backend;
}
