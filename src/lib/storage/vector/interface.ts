/**
 * VectorIndex interface for the index-backed storage strategy.
 *
 * Every vector is stored together with the explicit id of the record it
 * belongs to, so a search hit never depends on "N-th vector = N-th row".
 * Positions are still tracked (1-based, in add order) and mirrored by the
 * metadata store's insertion_sequence.
 *
 * Implementations:
 * - FlatFileVectorIndex (append-only JSON-lines file, exact linear scan)
 */

export interface VectorIndexHit {
  id: string;
  /** 1-based add order */
  position: number;
  /** Euclidean distance to the query */
  distance: number;
}

export interface VectorIndexEntry {
  id: string;
  vector: number[];
}

export interface VectorIndexOpenOptions {
  /**
   * Never touch the file: a missing index loads as empty and a torn
   * trailing entry is skipped instead of truncated. Writes throw.
   */
  readOnly?: boolean;
}

export interface VectorIndexOpenResult {
  /** True when no index existed and an empty one was created */
  created: boolean;
}

export interface VectorIndex {
  readonly dimensions: number;

  /**
   * Load (or create) the index. Throws DimensionMismatchError when the
   * persisted index was built for a different dimension.
   */
  open(options?: VectorIndexOpenOptions): VectorIndexOpenResult;

  /**
   * Append a vector. Durable before it returns.
   * @returns The new entry's position (== size after the add)
   */
  add(id: string, vector: number[]): number;

  /** 1-based position, or null when the id is not indexed */
  positionOf(id: string): number | null;

  /** The stored vector (float32 precision), or null when the id is not indexed */
  vectorOf(id: string): number[] | null;

  /**
   * Exact k-nearest search, ascending distance, ties by position.
   */
  search(query: number[], k: number): VectorIndexHit[];

  size(): number;

  /** Drop every entry after `size` (undo of trailing adds). */
  truncateTo(size: number): void;

  /** Replace the whole index with `entries`, in order. */
  replaceAll(entries: VectorIndexEntry[]): void;

  /** Where the index lives (for status output) */
  location(): string;

  close(): void;
}
