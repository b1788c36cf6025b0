/**
 * Cache index tests — both stores run the same contract; SQLite uses an
 * in-memory database.
 */

import { afterEach, describe, expect, it } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { StorageError } from '../errors/index.js';
import { MemoryCacheIndex, SqliteCacheIndex } from './cache-index.js';
import type { CacheEntry, CacheIndexStore } from './cache-index.js';

function entry(key: string, createdAt = '2026-01-01T00:00:00.000Z'): CacheEntry {
  return {
    key,
    presentationId: 'P1',
    format: 'png',
    artifacts: [
      { path: '/out/P1/0.png', checksum: 'abc', sizeBytes: 10, writtenAt: createdAt, slideIndex: 0 },
      { path: '/out/P1/1.png', checksum: 'def', sizeBytes: 12, writtenAt: createdAt, slideIndex: 1 },
    ],
    createdAt,
  };
}

const stores: Array<[string, () => CacheIndexStore]> = [
  ['MemoryCacheIndex', () => new MemoryCacheIndex()],
  ['SqliteCacheIndex', () => new SqliteCacheIndex(':memory:')],
];

describe.each(stores)('%s', (_name, create) => {
  let store: CacheIndexStore;

  afterEach(() => {
    store.close();
  });

  it('returns undefined for an unknown key', () => {
    store = create();
    expect(store.get('missing')).toBeUndefined();
  });

  it('round-trips an entry', () => {
    store = create();
    store.put(entry('k1'));
    expect(store.get('k1')).toEqual(entry('k1'));
  });

  it('overwrites on put with the same key', () => {
    store = create();
    store.put(entry('k1'));
    const replacement: CacheEntry = { ...entry('k1'), artifacts: [] };
    store.put(replacement);
    expect(store.get('k1')?.artifacts).toEqual([]);
  });

  it('invalidates a single key', () => {
    store = create();
    store.put(entry('k1'));
    store.put(entry('k2'));
    store.invalidate('k1');
    expect(store.get('k1')).toBeUndefined();
    expect(store.get('k2')).toBeDefined();
  });

  it('clear returns the number of removed entries', () => {
    store = create();
    store.put(entry('k1'));
    store.put(entry('k2'));
    expect(store.clear()).toBe(2);
    expect(store.list()).toEqual([]);
  });

  it('does not expose internal state', () => {
    store = create();
    store.put(entry('k1'));
    const read = store.get('k1');
    read?.artifacts.pop();
    expect(store.get('k1')?.artifacts).toHaveLength(2);
  });
});

describe('SqliteCacheIndex', () => {
  let tmpDir: string | undefined;

  afterEach(() => {
    if (tmpDir) fs.rmSync(tmpDir, { recursive: true, force: true });
    tmpDir = undefined;
  });

  it('lists newest entries first', () => {
    const store = new SqliteCacheIndex(':memory:');
    store.put(entry('old', '2026-01-01T00:00:00.000Z'));
    store.put(entry('new', '2026-02-01T00:00:00.000Z'));
    expect(store.list().map((e) => e.key)).toEqual(['new', 'old']);
    store.close();
  });

  it('persists across reopen and creates parent directories', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deckmedia-cache-'));
    const dbPath = path.join(tmpDir, 'nested', 'cache.db');

    const first = new SqliteCacheIndex(dbPath);
    first.put(entry('k1'));
    first.close();

    const second = new SqliteCacheIndex(dbPath);
    expect(second.get('k1')).toEqual(entry('k1'));
    second.close();
  });

  it('wraps open failures in StorageError', () => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'deckmedia-cache-'));
    // A directory where the database file should be
    const dbPath = path.join(tmpDir, 'cache.db');
    fs.mkdirSync(dbPath);
    expect(() => new SqliteCacheIndex(dbPath)).toThrow(StorageError);
  });
});
