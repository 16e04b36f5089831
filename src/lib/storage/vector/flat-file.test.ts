import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { FlatFileVectorIndex } from './flat-file.js';
import { DimensionMismatchError, StorageError } from '../../errors.js';

describe('FlatFileVectorIndex', () => {
  let dir: string;
  let file: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'mailrecall-index-'));
    file = path.join(dir, 'nested', 'vectors.jsonl');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function openIndex(dimensions = 2): FlatFileVectorIndex {
    const index = new FlatFileVectorIndex(file, dimensions);
    index.open();
    return index;
  }

  it('creates the file with a header on first open', () => {
    const index = new FlatFileVectorIndex(file, 3);
    expect(index.open()).toEqual({ created: true });
    expect(fs.readFileSync(file, 'utf-8')).toBe(
      '{"format":"mailrecall-flat","version":1,"dimensions":3}\n'
    );
    expect(index.size()).toBe(0);
  });

  it('assigns 1-based positions in add order', () => {
    const index = openIndex();
    expect(index.add('a', [0, 0])).toBe(1);
    expect(index.add('b', [1, 0])).toBe(2);
    expect(index.positionOf('b')).toBe(2);
    expect(index.positionOf('zzz')).toBeNull();
    expect(index.vectorOf('a')).toEqual([0, 0]);
    expect(index.vectorOf('zzz')).toBeNull();
    expect(index.size()).toBe(2);
  });

  it('rejects duplicate ids and wrong dimensions', () => {
    const index = openIndex();
    index.add('a', [0, 0]);
    expect(() => index.add('a', [1, 1])).toThrow(StorageError);
    expect(() => index.add('b', [1, 1, 1])).toThrow(DimensionMismatchError);
    expect(index.size()).toBe(1);
  });

  it('searches by ascending distance with ties by position', () => {
    const index = openIndex();
    index.add('far', [4, 0]);
    index.add('tie-1', [1, 0]);
    index.add('tie-2', [0, 1]);
    index.add('exact', [0, 0]);

    const hits = index.search([0, 0], 3);
    expect(hits).toEqual([
      { id: 'exact', position: 4, distance: 0 },
      { id: 'tie-1', position: 2, distance: 1 },
      { id: 'tie-2', position: 3, distance: 1 },
    ]);
  });

  it('returns at most size() hits and nothing for k <= 0', () => {
    const index = openIndex();
    index.add('a', [0, 0]);
    expect(index.search([1, 1], 10)).toHaveLength(1);
    expect(index.search([1, 1], 0)).toEqual([]);
  });

  it('reloads entries from disk', () => {
    const first = openIndex();
    first.add('a', [0.5, 1]);
    first.add('b', [2, 0]);
    first.close();

    const second = new FlatFileVectorIndex(file, 2);
    expect(second.open()).toEqual({ created: false });
    expect(second.vectorOf('a')).toEqual([0.5, 1]);
    expect(second.size()).toBe(2);
    expect(second.search([0.5, 1], 1)).toEqual([{ id: 'a', position: 1, distance: 0 }]);
  });

  it('throws DimensionMismatchError when reopened with another dimension', () => {
    openIndex(2).close();
    expect(() => new FlatFileVectorIndex(file, 4).open()).toThrow(DimensionMismatchError);
  });

  it('drops a torn trailing entry on open', () => {
    const first = openIndex();
    first.add('a', [0, 0]);
    first.close();
    fs.appendFileSync(file, '{"id":"b","v":"AAAA');

    const second = new FlatFileVectorIndex(file, 2);
    expect(second.open()).toEqual({ created: false });
    expect(second.size()).toBe(1);
    expect(second.add('b', [1, 1])).toBe(2);
    second.close();

    const third = new FlatFileVectorIndex(file, 2);
    third.open();
    expect(third.size()).toBe(2);
  });

  describe('read-only', () => {
    it('loads a missing index as empty without creating it', () => {
      const index = new FlatFileVectorIndex(file, 2);
      expect(index.open({ readOnly: true })).toEqual({ created: false });
      expect(index.size()).toBe(0);
      expect(index.search([0, 0], 1)).toEqual([]);
      expect(fs.existsSync(file)).toBe(false);
    });

    it('skips a torn trailing entry and leaves the file alone', () => {
      const first = openIndex();
      first.add('a', [0, 0]);
      first.close();
      fs.appendFileSync(file, '{"id":"b","v":"AAAA');
      const bytes = fs.statSync(file).size;

      const reader = new FlatFileVectorIndex(file, 2);
      reader.open({ readOnly: true });
      expect(reader.size()).toBe(1);
      expect(fs.statSync(file).size).toBe(bytes);
    });

    it('refuses writes', () => {
      openIndex().close();
      const reader = new FlatFileVectorIndex(file, 2);
      reader.open({ readOnly: true });
      expect(() => reader.add('a', [0, 0])).toThrow('is open read-only');
      expect(() => reader.truncateTo(0)).toThrow('is open read-only');
      expect(() => reader.replaceAll([])).toThrow('is open read-only');
    });
  });

  it('refuses a corrupt entry in the middle of the file', () => {
    const first = openIndex();
    first.add('a', [0, 0]);
    first.close();
    fs.appendFileSync(file, 'not json\n');
    fs.appendFileSync(file, fs.readFileSync(file, 'utf-8').split('\n')[1] + '\n');

    expect(() => new FlatFileVectorIndex(file, 2).open()).toThrow(StorageError);
  });

  it('truncateTo drops trailing entries on disk and in memory', () => {
    const index = openIndex();
    index.add('a', [0, 0]);
    index.add('b', [1, 1]);
    index.add('c', [2, 2]);
    index.truncateTo(1);

    expect(index.size()).toBe(1);
    expect(index.positionOf('b')).toBeNull();
    expect(index.add('c', [2, 2])).toBe(2);
    index.close();

    const reopened = new FlatFileVectorIndex(file, 2);
    reopened.open();
    expect(reopened.positionOf('c')).toBe(2);
    expect(reopened.positionOf('b')).toBeNull();
  });

  it('replaceAll rewrites the index in the given order', () => {
    const index = openIndex();
    index.add('a', [0, 0]);
    index.add('b', [1, 1]);
    index.replaceAll([
      { id: 'b', vector: [1, 1] },
      { id: 'c', vector: [3, 3] },
    ]);

    expect(index.positionOf('b')).toBe(1);
    expect(index.positionOf('c')).toBe(2);
    expect(index.positionOf('a')).toBeNull();
    expect(fs.existsSync(`${file}.tmp`)).toBe(false);
    index.close();

    const reopened = new FlatFileVectorIndex(file, 2);
    reopened.open();
    expect(reopened.search([3, 3], 1)).toEqual([{ id: 'c', position: 2, distance: 0 }]);
  });

  it('requires open() before use', () => {
    const index = new FlatFileVectorIndex(file, 2);
    expect(() => index.add('a', [0, 0])).toThrow('not opened');
  });
});
