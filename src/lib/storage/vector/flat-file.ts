/**
 * Flat-file vector index.
 *
 * File layout (JSON lines, append-only):
 *   {"format":"mailrecall-flat","version":1,"dimensions":768}
 *   {"id":"<source id>","v":"<base64 little-endian float32>"}
 *   ...
 *
 * Each add() is appended and flushed before returning, so the index is
 * always at least as far ahead as the metadata store that is written after
 * it. A line cut short by a crash is dropped on the next writable open();
 * a read-only open() skips it, since it may be an append still in flight.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logWarn } from '../../fault-logger.js';
import { DimensionMismatchError, StorageError } from '../../errors.js';
import { assertDimensions, l2Distance, vectorFromBase64, vectorToBase64 } from '../../vectors.js';
import type {
  VectorIndex,
  VectorIndexEntry,
  VectorIndexHit,
  VectorIndexOpenOptions,
  VectorIndexOpenResult,
} from './interface.js';

const FORMAT = 'mailrecall-flat';
const VERSION = 1;
const NEWLINE = 0x0a;

const HeaderSchema = z.object({
  format: z.literal(FORMAT),
  version: z.literal(VERSION),
  dimensions: z.number().int().positive(),
});

const EntrySchema = z.object({
  id: z.string().min(1),
  v: z.string().min(1),
});

function headerLine(dimensions: number): string {
  return JSON.stringify({ format: FORMAT, version: VERSION, dimensions }) + '\n';
}

function entryLine(id: string, vector: number[]): string {
  return JSON.stringify({ id, v: vectorToBase64(vector) }) + '\n';
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export class FlatFileVectorIndex implements VectorIndex {
  readonly dimensions: number;
  private readonly filePath: string;
  private ids: string[] = [];
  private vectors: Float32Array[] = [];
  private positions = new Map<string, number>();
  /** Byte offset where entry i's line starts */
  private offsets: number[] = [];
  private fileSize = 0;
  private opened = false;
  private readOnly = false;

  constructor(filePath: string, dimensions: number) {
    this.filePath = filePath;
    this.dimensions = dimensions;
  }

  open(options: VectorIndexOpenOptions = {}): VectorIndexOpenResult {
    if (this.opened) return { created: false };
    this.readOnly = options.readOnly ?? false;

    if (!fs.existsSync(this.filePath)) {
      if (this.readOnly) {
        this.reset(0);
        this.opened = true;
        return { created: false };
      }
      fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
      const header = headerLine(this.dimensions);
      fs.writeFileSync(this.filePath, header);
      this.reset(Buffer.byteLength(header));
      this.opened = true;
      return { created: true };
    }

    this.load(fs.readFileSync(this.filePath));
    this.opened = true;
    return { created: false };
  }

  private reset(headerBytes: number): void {
    this.ids = [];
    this.vectors = [];
    this.positions.clear();
    this.offsets = [];
    this.fileSize = headerBytes;
  }

  /** Parse the file contents. */
  private load(buf: Buffer): void {
    const headerEnd = buf.indexOf(NEWLINE);
    if (headerEnd === -1) {
      throw new StorageError(`Vector index ${this.filePath} has no header`);
    }
    const header = HeaderSchema.safeParse(parseJson(buf.subarray(0, headerEnd).toString('utf-8')));
    if (!header.success) {
      throw new StorageError(`Vector index ${this.filePath} has an invalid header`);
    }
    if (header.data.dimensions !== this.dimensions) {
      throw new DimensionMismatchError(this.dimensions, header.data.dimensions, {
        index: this.filePath,
      });
    }

    this.reset(headerEnd + 1);

    let start = headerEnd + 1;
    while (start < buf.length) {
      const end = buf.indexOf(NEWLINE, start);
      const complete = end !== -1;
      const entry = complete
        ? EntrySchema.safeParse(parseJson(buf.subarray(start, end).toString('utf-8')))
        : null;

      if (!entry || !entry.success) {
        const isLast = !complete || end + 1 >= buf.length;
        if (!isLast) {
          throw new StorageError(`Vector index ${this.filePath} is corrupt at byte ${start}`);
        }
        if (this.readOnly) {
          logWarn('vector-index', 'Skipped incomplete trailing entry', {
            file: this.filePath,
            offset: start,
          });
          return;
        }
        // Torn append from an interrupted write
        fs.truncateSync(this.filePath, start);
        logWarn('vector-index', 'Dropped incomplete trailing entry', {
          file: this.filePath,
          offset: start,
        });
        return;
      }

      const vector = vectorFromBase64(entry.data.v);
      if (vector.length !== this.dimensions) {
        throw new DimensionMismatchError(this.dimensions, vector.length, {
          index: this.filePath,
          id: entry.data.id,
        });
      }
      this.push(entry.data.id, vector, start);
      start = end + 1;
      this.fileSize = start;
    }
  }

  private push(id: string, vector: number[], offset: number): number {
    this.ids.push(id);
    this.vectors.push(Float32Array.from(vector));
    this.offsets.push(offset);
    const position = this.ids.length;
    this.positions.set(id, position);
    return position;
  }

  private ensureOpen(): void {
    if (!this.opened) {
      throw new StorageError('FlatFileVectorIndex not opened. Call open() first.');
    }
  }

  private ensureWritable(): void {
    this.ensureOpen();
    if (this.readOnly) {
      throw new StorageError(`Vector index ${this.filePath} is open read-only`);
    }
  }

  add(id: string, vector: number[]): number {
    this.ensureWritable();
    assertDimensions(vector, this.dimensions);
    if (this.positions.has(id)) {
      throw new StorageError(`Vector for "${id}" is already indexed`, { id });
    }

    const line = entryLine(id, vector);
    fs.appendFileSync(this.filePath, line);

    const offset = this.fileSize;
    this.fileSize += Buffer.byteLength(line);
    return this.push(id, vector, offset);
  }

  positionOf(id: string): number | null {
    return this.positions.get(id) ?? null;
  }

  vectorOf(id: string): number[] | null {
    const position = this.positions.get(id);
    return position === undefined ? null : Array.from(this.vectors[position - 1]);
  }

  search(query: number[], k: number): VectorIndexHit[] {
    this.ensureOpen();
    assertDimensions(query, this.dimensions);
    if (k <= 0) return [];

    const hits: VectorIndexHit[] = this.vectors.map((vector, i) => ({
      id: this.ids[i],
      position: i + 1,
      distance: l2Distance(query, vector),
    }));

    hits.sort((a, b) => a.distance - b.distance || a.position - b.position);
    return hits.slice(0, k);
  }

  size(): number {
    return this.ids.length;
  }

  truncateTo(size: number): void {
    this.ensureWritable();
    if (size < 0 || size >= this.ids.length) return;

    const cutAt = this.offsets[size];
    fs.truncateSync(this.filePath, cutAt);

    for (const id of this.ids.slice(size)) {
      this.positions.delete(id);
    }
    this.ids = this.ids.slice(0, size);
    this.vectors = this.vectors.slice(0, size);
    this.offsets = this.offsets.slice(0, size);
    this.fileSize = cutAt;
  }

  replaceAll(entries: VectorIndexEntry[]): void {
    this.ensureWritable();
    const header = headerLine(this.dimensions);
    const lines = [header];
    for (const entry of entries) {
      assertDimensions(entry.vector, this.dimensions);
      lines.push(entryLine(entry.id, entry.vector));
    }

    // Write-then-rename so a crash leaves either the old or the new index
    const tmpPath = `${this.filePath}.tmp`;
    fs.writeFileSync(tmpPath, lines.join(''));
    fs.renameSync(tmpPath, this.filePath);

    this.reset(Buffer.byteLength(header));
    for (const entry of entries) {
      if (this.positions.has(entry.id)) {
        throw new StorageError(`Duplicate id "${entry.id}" in rebuilt index`, { id: entry.id });
      }
      const line = entryLine(entry.id, entry.vector);
      this.push(entry.id, entry.vector, this.fileSize);
      this.fileSize += Buffer.byteLength(line);
    }
  }

  location(): string {
    return this.filePath;
  }

  close(): void {
    this.reset(0);
    this.opened = false;
    this.readOnly = false;
  }
}
