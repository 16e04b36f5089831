/**
 * Relational-only storage: one `emails` table with the embedding stored
 * inline, on SQLite or PostgreSQL.
 *
 * search() ranks only the `searchWindow` most recently inserted rows.
 * Older rows are still stored and counted, but never returned.
 */

import { relationalSchema } from '../../db/schema.js';
import { DimensionMismatchError, StorageError, errorMessage } from '../../errors.js';
import { logError } from '../../fault-logger.js';
import { assertDimensions, encodeVector, l2Distance } from '../../vectors.js';
import type { SqlClient } from '../sql/client.js';
import { METADATA_KEYS } from '../types.js';
import type {
  NewVectorRecord,
  RankedRecord,
  StorageInfo,
  StoreOutcome,
  VectorRecord,
} from '../types.js';
import type { StorageBackend } from './interface.js';
import {
  compareRanked,
  nextCheckpoint,
  normalizeK,
  parseCheckpoint,
  readInteger,
  readString,
  rowToRecord,
  searchSummaries,
} from './shared.js';

const COMPONENT = 'relational-backend';

export interface RelationalBackendOptions {
  client: SqlClient;
  dimensions: number;
  /** Number of most recent rows search() ranks */
  searchWindow: number;
  /** Clock for created_at */
  now?: () => Date;
}

export class RelationalBackend implements StorageBackend {
  readonly kind = 'relational' as const;
  readonly dimensions: number;
  readonly searchWindow: number;
  private readonly client: SqlClient;
  private readonly now: () => Date;
  private initialized = false;

  constructor(options: RelationalBackendOptions) {
    if (!Number.isInteger(options.searchWindow) || options.searchWindow < 1) {
      throw new StorageError(`searchWindow must be a positive integer, got ${options.searchWindow}`);
    }
    this.client = options.client;
    this.dimensions = options.dimensions;
    this.searchWindow = options.searchWindow;
    this.now = options.now ?? (() => new Date());
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async init(): Promise<void> {
    if (this.initialized) return;

    for (const ddl of relationalSchema(this.client.dialect)) {
      await this.client.execute(ddl);
    }

    const persisted = await this.readMetadata(METADATA_KEYS.embeddingDimensions);
    if (persisted === null) {
      await this.writeMetadata(METADATA_KEYS.embeddingDimensions, String(this.dimensions));
    } else if (Number(persisted) !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, Number(persisted), {
        location: this.client.location,
      });
    }

    this.initialized = true;
  }

  async close(): Promise<void> {
    await this.client.close();
    this.initialized = false;
  }

  private requireInit(): void {
    if (!this.initialized) {
      throw new StorageError('RelationalBackend not initialized. Call init() first.');
    }
  }

  private async readMetadata(key: string): Promise<string | null> {
    const rows = await this.client.query('SELECT value FROM app_metadata WHERE key = ?', [key]);
    return rows.length > 0 ? readString(rows[0], 'value') : null;
  }

  private async writeMetadata(key: string, value: string): Promise<void> {
    await this.client.execute(
      `INSERT INTO app_metadata (key, value) VALUES (?, ?)
       ON CONFLICT (key) DO UPDATE SET value = excluded.value`,
      [key, value]
    );
  }

  // ============================================================================
  // Records
  // ============================================================================

  async store(record: NewVectorRecord): Promise<StoreOutcome> {
    try {
      assertDimensions(record.embedding, this.dimensions);
      this.requireInit();

      const inserted = await this.client.transaction((tx) =>
        tx.query(
          `INSERT INTO emails
             (source_id, sender, cc, subject, timestamp, body, summary, embedding, created_at)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
           ON CONFLICT (source_id) DO NOTHING
           RETURNING id`,
          [
            record.sourceId,
            record.sender,
            record.cc,
            record.subject,
            record.timestamp.toISOString(),
            record.body,
            record.summary,
            encodeVector(record.embedding),
            this.now().toISOString(),
          ]
        )
      );

      if (inserted.length === 0) return { status: 'exists' };
      return { status: 'inserted', insertionSequence: readInteger(inserted[0], 'id') };
    } catch (err) {
      return { status: 'failed', reason: errorMessage(err) };
    }
  }

  async searchRecords(queryEmbedding: number[], k: number): Promise<RankedRecord[]> {
    this.requireInit();
    assertDimensions(queryEmbedding, this.dimensions);
    const limit = normalizeK(k);

    const rows = await this.client.query('SELECT * FROM emails ORDER BY id DESC LIMIT ?', [
      this.searchWindow,
    ]);

    return rows
      .map((row) => {
        const record = rowToRecord(row, 'id');
        return { record, distance: l2Distance(queryEmbedding, record.embedding) };
      })
      .sort(compareRanked)
      .slice(0, limit);
  }

  async search(queryEmbedding: number[], k: number): Promise<string[]> {
    return searchSummaries(COMPONENT, () => this.searchRecords(queryEmbedding, k));
  }

  async getRecord(sourceId: string): Promise<VectorRecord | null> {
    this.requireInit();
    const rows = await this.client.query('SELECT * FROM emails WHERE source_id = ?', [sourceId]);
    return rows.length > 0 ? rowToRecord(rows[0], 'id') : null;
  }

  async count(): Promise<number> {
    try {
      this.requireInit();
      const rows = await this.client.query('SELECT COUNT(*) AS n FROM emails');
      return rows.length > 0 ? readInteger(rows[0], 'n') : 0;
    } catch (err) {
      logError(COMPONENT, 'Count failed', err);
      return 0;
    }
  }

  // ============================================================================
  // Checkpoint (app_metadata)
  // ============================================================================

  async getCheckpoint(): Promise<Date> {
    this.requireInit();
    return parseCheckpoint(COMPONENT, await this.readMetadata(METADATA_KEYS.lastSyncTime));
  }

  async setCheckpoint(timestamp: Date): Promise<Date> {
    const current = await this.getCheckpoint();
    const next = nextCheckpoint(COMPONENT, current, timestamp);
    if (next === current) return current;

    await this.writeMetadata(METADATA_KEYS.lastSyncTime, next.toISOString());
    return next;
  }

  async info(): Promise<StorageInfo> {
    return {
      backend: this.kind,
      driver: this.client.dialect,
      dimensions: this.dimensions,
      location: this.client.location,
      records: await this.count(),
      checkpoint: await this.getCheckpoint(),
    };
  }
}
