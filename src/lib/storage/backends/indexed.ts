/**
 * Index-backed storage: a flat-file vector index plus a SQLite metadata
 * store.
 *
 * Write order for a new record is index first, then metadata, with the
 * metadata row's insertion_sequence set to the vector's index position.
 * A failed metadata write truncates the index back. If the process dies
 * between the two writes the vector stays behind as an orphan: searches
 * skip it, and the next store() of the same source id reuses its position
 * when the new embedding is the same vector, or replaces it otherwise.
 *
 * A writer repairs an index that is out of step with the metadata when it
 * opens. A read-only backend never changes the index file or the stored
 * rows: rows it cannot resolve in the index are not searchable until a
 * writer repairs it.
 */

import fs from 'fs';
import path from 'path';
import type Database from 'better-sqlite3';
import { openDatabase } from '../../db/connection.js';
import { initIndexedSchema } from '../../db/schema.js';
import { DimensionMismatchError, StorageError, errorMessage } from '../../errors.js';
import { logError, logInfo, logWarn } from '../../fault-logger.js';
import { assertDimensions, encodeVector, sameStoredVector } from '../../vectors.js';
import { isRow } from '../sql/client.js';
import { FlatFileVectorIndex } from '../vector/flat-file.js';
import type { VectorIndex } from '../vector/interface.js';
import { METADATA_KEYS } from '../types.js';
import type {
  NewVectorRecord,
  RankedRecord,
  StorageInfo,
  StoreOutcome,
  VectorRecord,
} from '../types.js';
import type { RebuildableBackend } from './interface.js';
import {
  nextCheckpoint,
  normalizeK,
  parseCheckpoint,
  readInteger,
  readString,
  readVector,
  rowToRecord,
  searchSummaries,
} from './shared.js';

const COMPONENT = 'indexed-backend';

export interface IndexedBackendOptions {
  dimensions: number;
  indexPath: string;
  metadataPath: string;
  checkpointPath: string;
  /** Defaults to a FlatFileVectorIndex at indexPath */
  index?: VectorIndex;
  /** Clock for created_at */
  now?: () => Date;
  /** Open for search only; writes fail and the index is never repaired */
  readOnly?: boolean;
}

export class IndexedBackend implements RebuildableBackend {
  readonly kind = 'indexed' as const;
  readonly dimensions: number;
  private readonly options: IndexedBackendOptions;
  private readonly index: VectorIndex;
  private readonly now: () => Date;
  private readonly readOnly: boolean;
  private db: Database.Database | null = null;

  constructor(options: IndexedBackendOptions) {
    this.options = options;
    this.dimensions = options.dimensions;
    this.index = options.index ?? new FlatFileVectorIndex(options.indexPath, options.dimensions);
    this.now = options.now ?? (() => new Date());
    this.readOnly = options.readOnly ?? false;
  }

  // ============================================================================
  // Lifecycle
  // ============================================================================

  async init(): Promise<void> {
    if (this.db) return;

    const db = openDatabase(this.options.metadataPath);
    try {
      initIndexedSchema(db);
      this.verifyDimensions(db);
      const opened = this.index.open({ readOnly: this.readOnly });

      const misplaced = this.countMisplacedRows(db);
      if (misplaced > 0 && this.readOnly) {
        logWarn(COMPONENT, 'Vector index out of step with metadata; the next sync repairs it', {
          misplaced,
        });
      } else if (misplaced > 0) {
        logWarn(COMPONENT, 'Vector index out of step with metadata, rebuilding', {
          misplaced,
          indexCreated: opened.created,
        });
        this.rebuild(db);
      }
    } catch (err) {
      this.index.close();
      db.close();
      throw err;
    }

    this.db = db;
  }

  async close(): Promise<void> {
    this.index.close();
    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  private requireDb(): Database.Database {
    if (!this.db) {
      throw new StorageError('IndexedBackend not initialized. Call init() first.');
    }
    return this.db;
  }

  private assertWritable(): void {
    if (this.readOnly) {
      throw new StorageError('IndexedBackend was opened read-only');
    }
  }

  private requireWritable(): Database.Database {
    this.assertWritable();
    return this.requireDb();
  }

  private readMetadata(db: Database.Database, key: string): string | null {
    const row: unknown = db.prepare('SELECT value FROM app_metadata WHERE key = ?').get(key);
    return isRow(row) && typeof row.value === 'string' ? row.value : null;
  }

  private verifyDimensions(db: Database.Database): void {
    const persisted = this.readMetadata(db, METADATA_KEYS.embeddingDimensions);
    if (persisted === null) {
      if (this.readOnly) return;
      db.prepare('INSERT INTO app_metadata (key, value) VALUES (?, ?)').run(
        METADATA_KEYS.embeddingDimensions,
        String(this.dimensions)
      );
      return;
    }
    const stored = Number(persisted);
    if (stored !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, stored, {
        metadata: this.options.metadataPath,
      });
    }
  }

  /** Rows whose vector is missing from the index or sits at another position. */
  private countMisplacedRows(db: Database.Database): number {
    let misplaced = 0;
    const rows: unknown[] = db
      .prepare('SELECT source_id, insertion_sequence FROM emails ORDER BY insertion_sequence')
      .all();
    for (const row of rows.filter(isRow)) {
      const position = this.index.positionOf(readString(row, 'source_id'));
      if (position !== readInteger(row, 'insertion_sequence')) misplaced++;
    }
    return misplaced;
  }

  /**
   * Rewrite the index from metadata embeddings in insertion order and
   * renumber insertion_sequence to the new positions. Orphans are dropped.
   */
  private rebuild(db: Database.Database): number {
    const rows: unknown[] = db
      .prepare('SELECT source_id, embedding FROM emails ORDER BY insertion_sequence')
      .all();
    const entries = rows.filter(isRow).map((row) => ({
      id: readString(row, 'source_id'),
      vector: readVector(row, 'embedding'),
    }));

    this.index.replaceAll(entries);

    // Ascending order: each new position is <= the old one, so UNIQUE holds throughout
    const renumber = db.prepare('UPDATE emails SET insertion_sequence = ? WHERE source_id = ?');
    db.transaction(() => {
      entries.forEach((entry, i) => renumber.run(i + 1, entry.id));
    })();

    logInfo(COMPONENT, 'Rebuilt vector index', { vectors: entries.length });
    return entries.length;
  }

  async rebuildIndex(): Promise<number> {
    return this.rebuild(this.requireWritable());
  }

  // ============================================================================
  // Records
  // ============================================================================

  async store(record: NewVectorRecord): Promise<StoreOutcome> {
    let indexSizeBefore: number | null = null;

    try {
      assertDimensions(record.embedding, this.dimensions);
      const db = this.requireWritable();

      const existing = db.prepare('SELECT 1 FROM emails WHERE source_id = ?').get(record.sourceId);
      if (existing !== undefined) return { status: 'exists' };

      let position = this.reusableOrphan(db, record);
      if (position === null) {
        indexSizeBefore = this.index.size();
        position = this.index.add(record.sourceId, record.embedding);
      }

      db.prepare(
        `INSERT INTO emails
           (source_id, sender, cc, subject, timestamp, body, summary, embedding, insertion_sequence, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        record.sourceId,
        record.sender,
        record.cc,
        record.subject,
        record.timestamp.toISOString(),
        record.body,
        record.summary,
        encodeVector(record.embedding),
        position,
        this.now().toISOString()
      );

      return { status: 'inserted', insertionSequence: position };
    } catch (err) {
      if (indexSizeBefore !== null) this.undoIndexAdd(record.sourceId, indexSizeBefore);
      return { status: 'failed', reason: errorMessage(err) };
    }
  }

  /**
   * Position of an orphaned vector for this record when it holds the same
   * embedding. An orphan with a different vector is removed so the record
   * is indexed with the embedding its metadata row keeps.
   */
  private reusableOrphan(db: Database.Database, record: NewVectorRecord): number | null {
    const position = this.index.positionOf(record.sourceId);
    if (position === null) return null;

    if (sameStoredVector(this.index.vectorOf(record.sourceId) ?? [], record.embedding)) {
      logWarn(COMPONENT, 'Reusing orphaned vector', { sourceId: record.sourceId, position });
      return position;
    }

    logWarn(COMPONENT, 'Replacing orphaned vector with a different embedding', {
      sourceId: record.sourceId,
      position,
    });
    if (position === this.index.size()) {
      this.index.truncateTo(position - 1);
    } else {
      // Rebuilding from metadata drops every orphan, this one included
      this.rebuild(db);
    }
    return null;
  }

  private undoIndexAdd(sourceId: string, size: number): void {
    if (this.index.size() <= size) return;
    try {
      this.index.truncateTo(size);
    } catch (err) {
      logError(COMPONENT, 'Could not remove vector after failed metadata write', err, { sourceId });
    }
  }

  async searchRecords(queryEmbedding: number[], k: number): Promise<RankedRecord[]> {
    const db = this.requireDb();
    const limit = normalizeK(k);
    const hits = this.index.search(queryEmbedding, this.index.size());
    const byId = db.prepare('SELECT * FROM emails WHERE source_id = ?');

    const ranked: RankedRecord[] = [];
    for (const hit of hits) {
      if (ranked.length >= limit) break;
      const row: unknown = byId.get(hit.id);
      // Orphaned vector: no metadata row
      if (!isRow(row)) continue;
      ranked.push({ record: rowToRecord(row, 'insertion_sequence'), distance: hit.distance });
    }
    return ranked;
  }

  async search(queryEmbedding: number[], k: number): Promise<string[]> {
    return searchSummaries(COMPONENT, () => this.searchRecords(queryEmbedding, k));
  }

  async getRecord(sourceId: string): Promise<VectorRecord | null> {
    const row: unknown = this.requireDb().prepare('SELECT * FROM emails WHERE source_id = ?').get(sourceId);
    return isRow(row) ? rowToRecord(row, 'insertion_sequence') : null;
  }

  async count(): Promise<number> {
    try {
      const row: unknown = this.requireDb().prepare('SELECT COUNT(*) AS n FROM emails').get();
      return isRow(row) ? readInteger(row, 'n') : 0;
    } catch (err) {
      logError(COMPONENT, 'Count failed', err);
      return 0;
    }
  }

  // ============================================================================
  // Checkpoint (side file, ISO-8601)
  // ============================================================================

  async getCheckpoint(): Promise<Date> {
    const file = this.options.checkpointPath;
    if (!fs.existsSync(file)) return parseCheckpoint(COMPONENT, null);
    return parseCheckpoint(COMPONENT, fs.readFileSync(file, 'utf-8'));
  }

  async setCheckpoint(timestamp: Date): Promise<Date> {
    this.assertWritable();
    const current = await this.getCheckpoint();
    const next = nextCheckpoint(COMPONENT, current, timestamp);
    if (next === current) return current;

    const file = this.options.checkpointPath;
    fs.mkdirSync(path.dirname(file), { recursive: true });
    const tmp = `${file}.tmp`;
    fs.writeFileSync(tmp, next.toISOString());
    fs.renameSync(tmp, file);
    return next;
  }

  async info(): Promise<StorageInfo> {
    return {
      backend: this.kind,
      driver: 'flat-file + sqlite',
      dimensions: this.dimensions,
      location: this.index.location(),
      records: await this.count(),
      checkpoint: await this.getCheckpoint(),
    };
  }
}
