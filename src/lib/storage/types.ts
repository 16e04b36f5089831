/**
 * Canonical storage types shared by both backends and their callers.
 */

/**
 * A fetched message, normalized, before it is stored.
 * `timestamp` is always a UTC instant.
 */
export interface MailDocument {
  sourceId: string;
  sender: string;
  cc: string;
  subject: string;
  timestamp: Date;
  body: string;
}

/**
 * One stored message. Append-only: created once per sourceId, never updated.
 */
export interface VectorRecord {
  sourceId: string;
  sender: string;
  cc: string;
  subject: string;
  timestamp: Date;
  body: string;
  summary: string;
  embedding: number[];
  /** Position of the record's vector; 1-based, assigned in insertion order */
  insertionSequence: number;
  createdAt: Date;
}

export type NewVectorRecord = Omit<VectorRecord, 'insertionSequence' | 'createdAt'>;

export type StoreOutcome =
  | { status: 'inserted'; insertionSequence: number }
  | { status: 'exists' }
  | { status: 'failed'; reason: string };

export interface RankedRecord {
  record: VectorRecord;
  distance: number;
}

export interface StorageInfo {
  backend: 'indexed' | 'relational';
  driver: string;
  dimensions: number;
  location: string;
  records: number;
  checkpoint: Date;
}

/** Returned alone when a search matches nothing. */
export const NO_RESULTS = 'No relevant emails found.';

/** Returned alone when a search could not run. */
export const SEARCH_ERROR = 'No relevant emails found due to an error in the search process.';

export function isSentinel(text: string): boolean {
  return text === NO_RESULTS || text === SEARCH_ERROR;
}

/** Checkpoint value before the first successful run. */
export const EPOCH = new Date(0);

/** Metadata keys in app_metadata */
export const METADATA_KEYS = {
  lastSyncTime: 'last_sync_time',
  embeddingDimensions: 'embedding_dimensions',
} as const;
