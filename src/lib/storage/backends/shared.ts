/**
 * Helpers shared by both backends: search contract, ranking order,
 * checkpoint rules and row decoding.
 */

import { logError, logWarn } from '../../fault-logger.js';
import { StorageError, ValidationError } from '../../errors.js';
import { decodeVector } from '../../vectors.js';
import { EPOCH, NO_RESULTS, SEARCH_ERROR } from '../types.js';
import type { RankedRecord, VectorRecord } from '../types.js';

/** k <= 0 (or not a number) is treated as 1. */
export function normalizeK(k: number): number {
  if (!Number.isFinite(k) || k < 1) return 1;
  return Math.floor(k);
}

/** Ascending distance, ties by ascending insertion sequence. */
export function compareRanked(a: RankedRecord, b: RankedRecord): number {
  return a.distance - b.distance || a.record.insertionSequence - b.record.insertionSequence;
}

/**
 * Run a ranked search and apply the never-empty, never-throw contract.
 */
export async function searchSummaries(
  component: string,
  run: () => Promise<RankedRecord[]>
): Promise<string[]> {
  try {
    const ranked = await run();
    if (ranked.length === 0) return [NO_RESULTS];
    return ranked.map((r) => r.record.summary);
  } catch (err) {
    logError(component, 'Search failed', err);
    return [SEARCH_ERROR];
  }
}

export function assertValidTimestamp(timestamp: Date): void {
  if (Number.isNaN(timestamp.getTime())) {
    throw new ValidationError('Checkpoint must be a valid date');
  }
}

/**
 * Decide the checkpoint after a requested update. Earlier values never win.
 */
export function nextCheckpoint(component: string, current: Date, requested: Date): Date {
  assertValidTimestamp(requested);
  if (requested.getTime() < current.getTime()) {
    logWarn(component, 'Ignored checkpoint update that would move backwards', {
      current: current.toISOString(),
      requested: requested.toISOString(),
    });
    return current;
  }
  return requested;
}

/** Parse a persisted ISO-8601 checkpoint; unreadable values count as absent. */
export function parseCheckpoint(component: string, text: string | null | undefined): Date {
  if (text === null || text === undefined || text.trim() === '') return EPOCH;
  const parsed = new Date(text.trim());
  if (Number.isNaN(parsed.getTime())) {
    logWarn(component, 'Unreadable checkpoint, treating as absent', { value: text });
    return EPOCH;
  }
  return parsed;
}

// ============================================================================
// Row decoding
// ============================================================================

function field(row: Record<string, unknown>, key: string): unknown {
  if (!(key in row)) {
    throw new StorageError(`Row is missing column "${key}"`);
  }
  return row[key];
}

export function readString(row: Record<string, unknown>, key: string): string {
  const value = field(row, key);
  if (value === null) return '';
  if (typeof value !== 'string') {
    throw new StorageError(`Column "${key}" is not text`);
  }
  return value;
}

/** INTEGER from SQLite, or BIGINT (returned as a string) from PostgreSQL. */
export function readInteger(row: Record<string, unknown>, key: string): number {
  const value = field(row, key);
  const n =
    typeof value === 'number'
      ? value
      : typeof value === 'bigint' || typeof value === 'string'
        ? Number(value)
        : NaN;
  if (!Number.isSafeInteger(n)) {
    throw new StorageError(`Column "${key}" is not an integer`);
  }
  return n;
}

export function readDate(row: Record<string, unknown>, key: string): Date {
  const value = field(row, key);
  const date =
    value instanceof Date
      ? value
      : typeof value === 'string'
        ? new Date(sqliteTimestampToIso(value))
        : null;
  if (!date || Number.isNaN(date.getTime())) {
    throw new StorageError(`Column "${key}" is not a timestamp`);
  }
  return date;
}

export function readVector(row: Record<string, unknown>, key: string): number[] {
  const value = field(row, key);
  if (!(value instanceof Uint8Array)) {
    throw new StorageError(`Column "${key}" is not a blob`);
  }
  return decodeVector(value);
}

/** "YYYY-MM-DD HH:MM:SS" (CURRENT_TIMESTAMP) is UTC without a zone marker. */
function sqliteTimestampToIso(value: string): string {
  return /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/.test(value) ? value.replace(' ', 'T') + 'Z' : value;
}

/**
 * Decode an `emails` row. `sequenceColumn` names the column holding the
 * insertion sequence (it differs between the two backends).
 */
export function rowToRecord(row: Record<string, unknown>, sequenceColumn: string): VectorRecord {
  return {
    sourceId: readString(row, 'source_id'),
    sender: readString(row, 'sender'),
    cc: readString(row, 'cc'),
    subject: readString(row, 'subject'),
    timestamp: readDate(row, 'timestamp'),
    body: readString(row, 'body'),
    summary: readString(row, 'summary'),
    embedding: readVector(row, 'embedding'),
    insertionSequence: readInteger(row, sequenceColumn),
    createdAt: readDate(row, 'created_at'),
  };
}
