/**
 * StorageBackend interface shared by both storage strategies.
 *
 * Implementations:
 * - IndexedBackend (flat-file vector index + SQLite metadata)
 * - RelationalBackend (SQLite or PostgreSQL rows with inline embeddings)
 *
 * Selected once at startup by createStorageBackend(); the ingestion pipeline
 * and the context assembler only ever see this interface.
 */

import type { StorageBackendKind } from '../../config-types.js';
import type {
  NewVectorRecord,
  RankedRecord,
  StorageInfo,
  StoreOutcome,
  VectorRecord,
} from '../types.js';

export interface StorageBackend {
  readonly kind: StorageBackendKind;
  readonly dimensions: number;

  // ============================================================================
  // Lifecycle
  // ============================================================================

  /**
   * Create schema and verify the persisted dimension against the configured
   * one. Throws DimensionMismatchError on a mismatch.
   */
  init(): Promise<void>;
  close(): Promise<void>;

  // ============================================================================
  // Records
  // ============================================================================

  /**
   * Insert a record unless its sourceId is already stored.
   * Never throws; write failures come back as `failed`.
   */
  store(record: NewVectorRecord): Promise<StoreOutcome>;

  /**
   * Summaries of the k nearest records, nearest first. Never empty and never
   * throws: NO_RESULTS for an empty store, SEARCH_ERROR on failure.
   */
  search(queryEmbedding: number[], k: number): Promise<string[]>;

  /** Like search(), with records and distances. Throws on failure. */
  searchRecords(queryEmbedding: number[], k: number): Promise<RankedRecord[]>;

  getRecord(sourceId: string): Promise<VectorRecord | null>;

  /** Total stored records; 0 on failure. */
  count(): Promise<number>;

  // ============================================================================
  // Checkpoint
  // ============================================================================

  /** EPOCH when no run has completed yet. */
  getCheckpoint(): Promise<Date>;

  /**
   * Advance the checkpoint. An earlier value than the stored one is ignored.
   * @returns The checkpoint in effect afterwards
   */
  setCheckpoint(timestamp: Date): Promise<Date>;

  info(): Promise<StorageInfo>;
}

/** Backends whose vector index can be reconstructed from stored rows. */
export interface RebuildableBackend extends StorageBackend {
  /** @returns Number of vectors written to the new index */
  rebuildIndex(): Promise<number>;
}

export function isRebuildable(backend: StorageBackend): backend is RebuildableBackend {
  return 'rebuildIndex' in backend && typeof backend.rebuildIndex === 'function';
}
