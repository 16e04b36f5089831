/**
 * Storage abstraction layer for mailrecall.
 *
 * The backend is chosen once from configuration and handed to the
 * ingestion pipeline and the context assembler as a StorageBackend.
 */

import type { MailRecallConfig } from '../config-types.js';
import { resolveDataPath } from '../config.js';
import { IndexedBackend } from './backends/indexed.js';
import { RelationalBackend } from './backends/relational.js';
import type { StorageBackend } from './backends/interface.js';
import { PostgresClient } from './sql/pg-client.js';
import type { PgPoolFactory } from './sql/pg-client.js';
import { SqliteClient } from './sql/sqlite-client.js';
import type { SqlClient } from './sql/client.js';

export * from './types.js';
export type { StorageBackend, RebuildableBackend } from './backends/interface.js';
export { isRebuildable } from './backends/interface.js';
export { IndexedBackend } from './backends/indexed.js';
export type { IndexedBackendOptions } from './backends/indexed.js';
export { RelationalBackend } from './backends/relational.js';
export type { RelationalBackendOptions } from './backends/relational.js';
export type { VectorIndex, VectorIndexHit } from './vector/interface.js';
export { FlatFileVectorIndex } from './vector/flat-file.js';
export type { SqlClient, SqlDialect, SqlExecutor, SqlParam, SqlRow } from './sql/client.js';
export { SqliteClient } from './sql/sqlite-client.js';
export { PostgresClient } from './sql/pg-client.js';

export interface StorageFactoryOptions {
  /** Clock for created_at columns */
  now?: () => Date;
  /** Replaces the pg Pool (tests) */
  createPgPool?: PgPoolFactory;
  /**
   * Open for search only. The indexed backend then leaves its files as they
   * are; the relational backend relies on its database for isolation.
   */
  readOnly?: boolean;
}

function createSqlClient(config: MailRecallConfig, options: StorageFactoryOptions): SqlClient {
  const relational = config.storage.relational;
  if (relational.driver === 'postgresql') {
    return new PostgresClient(relational.postgresql, options.createPgPool);
  }
  return new SqliteClient(resolveDataPath(config, relational.sqlite_path));
}

/**
 * Build the configured backend. Not initialized: call init(), or use
 * openStorage().
 */
export function createStorageBackend(
  config: MailRecallConfig,
  options: StorageFactoryOptions = {}
): StorageBackend {
  const { storage } = config;

  if (storage.backend === 'relational') {
    return new RelationalBackend({
      client: createSqlClient(config, options),
      dimensions: storage.dimensions,
      searchWindow: storage.relational.search_window,
      now: options.now,
    });
  }

  return new IndexedBackend({
    dimensions: storage.dimensions,
    indexPath: resolveDataPath(config, storage.indexed.index_file),
    metadataPath: resolveDataPath(config, storage.indexed.metadata_file),
    checkpointPath: resolveDataPath(config, storage.indexed.checkpoint_file),
    now: options.now,
    readOnly: options.readOnly,
  });
}

export async function openStorage(
  config: MailRecallConfig,
  options: StorageFactoryOptions = {}
): Promise<StorageBackend> {
  const backend = createStorageBackend(config, options);
  await backend.init();
  return backend;
}
