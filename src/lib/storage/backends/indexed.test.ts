import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { IndexedBackend } from './indexed.js';
import { FlatFileVectorIndex } from '../vector/flat-file.js';
import { EPOCH, NO_RESULTS, SEARCH_ERROR } from '../types.js';
import { DimensionMismatchError } from '../../errors.js';
import { FIXED_NOW, makeRecord } from '../test-fixtures.js';

describe('IndexedBackend', () => {
  let dir: string;
  let backend: IndexedBackend;

  function paths() {
    return {
      indexPath: path.join(dir, 'vectors.jsonl'),
      metadataPath: path.join(dir, 'metadata.db'),
      checkpointPath: path.join(dir, 'checkpoint'),
    };
  }

  async function open(dimensions = 2): Promise<IndexedBackend> {
    const opened = new IndexedBackend({ dimensions, ...paths(), now: () => FIXED_NOW });
    await opened.init();
    return opened;
  }

  async function openReader(): Promise<IndexedBackend> {
    const opened = new IndexedBackend({ dimensions: 2, ...paths(), readOnly: true });
    await opened.init();
    return opened;
  }

  function indexedVector(id: string): number[] | null {
    const index = new FlatFileVectorIndex(paths().indexPath, 2);
    index.open({ readOnly: true });
    return index.vectorOf(id);
  }

  /** Append a vector to the index file without a metadata row. */
  function addOrphan(id: string, vector: number[]): void {
    const index = new FlatFileVectorIndex(paths().indexPath, 2);
    index.open();
    index.add(id, vector);
    index.close();
  }

  beforeEach(async () => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailrecall-indexed-'));
    backend = await open();
  });

  afterEach(async () => {
    await backend.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('store', () => {
    it('assigns insertion sequences equal to index positions', async () => {
      expect(await backend.store(makeRecord('a', [0, 0]))).toEqual({
        status: 'inserted',
        insertionSequence: 1,
      });
      expect(await backend.store(makeRecord('b', [1, 1]))).toEqual({
        status: 'inserted',
        insertionSequence: 2,
      });
      expect(await backend.count()).toBe(2);
    });

    it('resolves every index position to the record with that insertion sequence', async () => {
      const vectors = [[0, 0], [1, 0], [0, 2], [3, 3], [-1, 4]];
      for (const [i, vector] of vectors.entries()) {
        await backend.store(makeRecord(`m${i + 1}`, vector));
      }
      for (const [i, vector] of vectors.entries()) {
        const [hit] = await backend.searchRecords(vector, 1);
        expect(hit.distance).toBe(0);
        expect(hit.record.sourceId).toBe(`m${i + 1}`);
        expect(hit.record.insertionSequence).toBe(i + 1);
      }
    });

    it('stores each source id once', async () => {
      await backend.store(makeRecord('a', [0, 0]));
      expect(await backend.store(makeRecord('a', [1, 1]))).toEqual({ status: 'exists' });
      expect(await backend.count()).toBe(1);
      expect((await backend.getRecord('a'))?.embedding).toEqual([0, 0]);
    });

    it('rejects embeddings of the wrong dimension without writing', async () => {
      const outcome = await backend.store(makeRecord('a', [0, 0, 0]));
      expect(outcome).toEqual({
        status: 'failed',
        reason: 'Embedding dimension mismatch: expected 2, got 3',
      });
      expect(await backend.count()).toBe(0);
      expect(await backend.search([0, 0], 1)).toEqual([NO_RESULTS]);
    });

    it('removes the vector again when the metadata write fails', async () => {
      await backend.store(makeRecord('a', [0, 0]));
      const outcome = await backend.store(
        makeRecord('bad', [1, 1], { timestamp: new Date('not a date') })
      );
      expect(outcome.status).toBe('failed');

      expect(await backend.store(makeRecord('b', [1, 1]))).toEqual({
        status: 'inserted',
        insertionSequence: 2,
      });
      const lines = fs.readFileSync(paths().indexPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(3);
    });

    it('round-trips every field', async () => {
      await backend.store(
        makeRecord('a', [0.5, -1], {
          sender: 'bob@example.com',
          cc: 'carol@example.com',
          subject: 'Quarterly numbers',
          body: 'See attached.',
        })
      );
      expect(await backend.getRecord('a')).toEqual({
        sourceId: 'a',
        sender: 'bob@example.com',
        cc: 'carol@example.com',
        subject: 'Quarterly numbers',
        timestamp: new Date('2024-05-01T09:00:00.000Z'),
        body: 'See attached.',
        summary: 'summary:a',
        embedding: [0.5, -1],
        insertionSequence: 1,
        createdAt: FIXED_NOW,
      });
      expect(await backend.getRecord('missing')).toBeNull();
    });
  });

  describe('search', () => {
    it('returns NO_RESULTS for an empty store', async () => {
      expect(await backend.search([0, 0], 3)).toEqual([NO_RESULTS]);
    });

    it('ranks by distance with ties to the earlier insert', async () => {
      await backend.store(makeRecord('far', [3, 0]));
      await backend.store(makeRecord('tie-1', [0, 1]));
      await backend.store(makeRecord('tie-2', [1, 0]));

      expect(await backend.search([0, 0], 2)).toEqual(['summary:tie-1', 'summary:tie-2']);
      const ranked = await backend.searchRecords([0, 0], 5);
      expect(ranked.map((r) => [r.record.sourceId, r.distance])).toEqual([
        ['tie-1', 1],
        ['tie-2', 1],
        ['far', 3],
      ]);
    });

    it('treats k <= 0 as 1', async () => {
      await backend.store(makeRecord('a', [0, 0]));
      await backend.store(makeRecord('b', [1, 1]));
      expect(await backend.search([1, 1], 0)).toEqual(['summary:b']);
      expect(await backend.search([1, 1], -4)).toEqual(['summary:b']);
    });

    it('returns SEARCH_ERROR when the query has the wrong dimension', async () => {
      await backend.store(makeRecord('a', [0, 0]));
      expect(await backend.search([0, 0, 0], 1)).toEqual([SEARCH_ERROR]);
    });
  });

  describe('orphaned vectors', () => {
    beforeEach(async () => {
      await backend.store(makeRecord('a', [5, 5]));
      await backend.close();
      addOrphan('b', [0, 0]);
      backend = await open();
    });

    it('skips orphans in search', async () => {
      expect(await backend.search([0, 0], 2)).toEqual(['summary:a']);
      expect(await backend.count()).toBe(1);
    });

    it('reuses the orphan position when the record is stored', async () => {
      expect(await backend.store(makeRecord('b', [0, 0]))).toEqual({
        status: 'inserted',
        insertionSequence: 2,
      });
      expect(await backend.search([0, 0], 1)).toEqual(['summary:b']);
      const lines = fs.readFileSync(paths().indexPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(3);
    });

    it('replaces a trailing orphan whose vector differs', async () => {
      expect(await backend.store(makeRecord('b', [9, 9]))).toEqual({
        status: 'inserted',
        insertionSequence: 2,
      });
      expect(indexedVector('b')).toEqual([9, 9]);
      expect(await backend.search([9, 9], 2)).toEqual(['summary:b', 'summary:a']);
      const lines = fs.readFileSync(paths().indexPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(3);
    });

    it('rebuilds around an earlier orphan whose vector differs', async () => {
      await backend.close();
      addOrphan('c', [1, 1]);
      backend = await open();

      expect(await backend.store(makeRecord('b', [7, 7]))).toEqual({
        status: 'inserted',
        insertionSequence: 2,
      });
      expect(indexedVector('b')).toEqual([7, 7]);
      expect(indexedVector('c')).toBeNull();
      expect((await backend.getRecord('a'))?.insertionSequence).toBe(1);
      expect(await backend.search([7, 7], 2)).toEqual(['summary:b', 'summary:a']);
    });

    it('drops orphans on rebuild', async () => {
      expect(await backend.rebuildIndex()).toBe(1);
      const lines = fs.readFileSync(paths().indexPath, 'utf-8').trim().split('\n');
      expect(lines).toHaveLength(2);
      expect(await backend.store(makeRecord('c', [1, 1]))).toEqual({
        status: 'inserted',
        insertionSequence: 2,
      });
    });
  });

  describe('init', () => {
    it('rebuilds the index when it is missing', async () => {
      await backend.store(makeRecord('a', [0, 0]));
      await backend.store(makeRecord('b', [2, 2]));
      await backend.close();
      fs.rmSync(paths().indexPath);

      backend = await open();
      expect(await backend.search([2, 2], 1)).toEqual(['summary:b']);
      expect((await backend.getRecord('b'))?.insertionSequence).toBe(2);
    });

    it('renumbers rows when the index lost entries in the middle', async () => {
      await backend.store(makeRecord('a', [0, 0]));
      await backend.store(makeRecord('b', [1, 1]));
      await backend.store(makeRecord('c', [2, 2]));
      await backend.close();

      // Index now only holds a and c, at positions 1 and 2
      const index = new FlatFileVectorIndex(paths().indexPath, 2);
      index.open();
      index.replaceAll([
        { id: 'a', vector: [0, 0] },
        { id: 'c', vector: [2, 2] },
      ]);
      index.close();

      backend = await open();
      const sequences = await Promise.all(
        ['a', 'b', 'c'].map(async (id) => (await backend.getRecord(id))?.insertionSequence)
      );
      expect(sequences).toEqual([1, 2, 3]);
      expect(await backend.search([1, 1], 1)).toEqual(['summary:b']);
    });

    it('refuses a store created with another dimension', async () => {
      await backend.close();
      const other = new IndexedBackend({ dimensions: 3, ...paths() });
      await expect(other.init()).rejects.toThrow(DimensionMismatchError);
      backend = await open();
    });
  });

  describe('read-only', () => {
    beforeEach(async () => {
      await backend.store(makeRecord('a', [0, 0]));
      await backend.store(makeRecord('b', [2, 2]));
      await backend.close();
    });

    it('leaves a missing index missing', async () => {
      fs.rmSync(paths().indexPath);
      backend = await openReader();

      expect(await backend.search([2, 2], 1)).toEqual([NO_RESULTS]);
      expect(await backend.count()).toBe(2);
      expect(fs.existsSync(paths().indexPath)).toBe(false);
    });

    it('searches the rows it can resolve without renumbering the rest', async () => {
      const index = new FlatFileVectorIndex(paths().indexPath, 2);
      index.open();
      index.replaceAll([{ id: 'b', vector: [2, 2] }]);
      index.close();
      backend = await openReader();

      expect(await backend.search([0, 0], 2)).toEqual(['summary:b']);
      expect((await backend.getRecord('a'))?.insertionSequence).toBe(1);
      expect((await backend.getRecord('b'))?.insertionSequence).toBe(2);
    });

    it('refuses writes', async () => {
      backend = await openReader();
      expect(await backend.store(makeRecord('c', [1, 1]))).toEqual({
        status: 'failed',
        reason: 'IndexedBackend was opened read-only',
      });
      await expect(backend.setCheckpoint(FIXED_NOW)).rejects.toThrow('opened read-only');
      await expect(backend.rebuildIndex()).rejects.toThrow('opened read-only');
    });
  });

  describe('checkpoint', () => {
    it('starts at the epoch', async () => {
      expect(await backend.getCheckpoint()).toEqual(EPOCH);
    });

    it('persists to the side file and never moves backwards', async () => {
      const later = new Date('2024-05-10T00:00:00.000Z');
      const earlier = new Date('2024-05-01T00:00:00.000Z');

      expect(await backend.setCheckpoint(later)).toEqual(later);
      expect(await backend.setCheckpoint(earlier)).toEqual(later);
      expect(fs.readFileSync(paths().checkpointPath, 'utf-8')).toBe('2024-05-10T00:00:00.000Z');

      await backend.close();
      backend = await open();
      expect(await backend.getCheckpoint()).toEqual(later);
    });

    it('treats an unreadable checkpoint file as absent', async () => {
      fs.writeFileSync(paths().checkpointPath, 'garbage');
      expect(await backend.getCheckpoint()).toEqual(EPOCH);
    });
  });

  it('reports info', async () => {
    await backend.store(makeRecord('a', [0, 0]));
    expect(await backend.info()).toEqual({
      backend: 'indexed',
      driver: 'flat-file + sqlite',
      dimensions: 2,
      location: paths().indexPath,
      records: 1,
      checkpoint: EPOCH,
    });
  });
});
