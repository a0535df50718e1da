/**
 * Unit tests for SqliteVectorStore.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SqliteVectorStore, cosineDistance } from '../../../src/retrieval/store.js';
import type { VectorRecord } from '../../../src/retrieval/types.js';

function record(id: string, embedding: number[], title = id): VectorRecord {
  return {
    id,
    text: `Title: ${title}`,
    embedding,
    metadata: { room: 'Room A', date: '2026-03-01', start: '09:00', track: 'AI', title },
  };
}

describe('cosineDistance', () => {
  it('is 0 for parallel vectors and 1 for orthogonal ones', () => {
    expect(cosineDistance([1, 0], [2, 0])).toBeCloseTo(0);
    expect(cosineDistance([1, 0], [0, 3])).toBeCloseTo(1);
    expect(cosineDistance([1, 0], [-1, 0])).toBeCloseTo(2);
  });

  it('treats mismatched or zero vectors as unrelated', () => {
    expect(cosineDistance([1, 0], [1, 0, 0])).toBe(1);
    expect(cosineDistance([0, 0], [1, 0])).toBe(1);
    expect(cosineDistance([], [])).toBe(1);
  });
});

describe('SqliteVectorStore', () => {
  let tempDir: string;
  let store: SqliteVectorStore;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'concierge-vectors-'));
    store = new SqliteVectorStore(path.join(tempDir, 'nested', 'retrieval.db'));
  });

  afterEach(() => {
    store.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('returns the k nearest documents closest first', () => {
    store.replace('s1', [record('far', [0, 1]), record('near', [1, 0]), record('mid', [1, 1])]);

    const results = store.query('s1', [1, 0], 2);

    expect(results.map((candidate) => candidate.metadata.title)).toEqual(['near', 'mid']);
    expect(results[0].document).toBe('Title: near');
    expect(results[0].distance).toBeCloseTo(0);
  });

  it('replaces a collection wholesale', () => {
    store.replace('s1', [record('a', [1, 0]), record('b', [0, 1])]);
    store.replace('s1', [record('c', [1, 0])]);

    expect(store.count('s1')).toBe(1);
    expect(store.query('s1', [1, 0], 10).map((candidate) => candidate.metadata.title)).toEqual(['c']);
  });

  it('keeps sessions apart', () => {
    store.replace('s1', [record('a', [1, 0])]);
    store.replace('s2', [record('b', [1, 0]), record('c', [0, 1])]);

    expect(store.count('s1')).toBe(1);
    expect(store.count('s2')).toBe(2);
    expect(store.query('s1', [1, 0], 10)).toHaveLength(1);
  });

  it('tracks collections separately from their documents', () => {
    expect(store.hasCollection('s1')).toBe(false);

    store.replace('s1', []);

    expect(store.hasCollection('s1')).toBe(true);
    expect(store.count('s1')).toBe(0);
  });

  it('stores and overwrites the overview', () => {
    expect(store.getOverview('s1')).toBeNull();

    store.saveOverview('s1', '# First');
    store.saveOverview('s1', '# Second');

    expect(store.getOverview('s1')).toBe('# Second');
  });

  it('deletes everything for a session', () => {
    store.replace('s1', [record('a', [1, 0])]);
    store.saveOverview('s1', '# Overview');
    store.replace('s2', [record('b', [1, 0])]);

    store.deleteSession('s1');

    expect(store.hasCollection('s1')).toBe(false);
    expect(store.count('s1')).toBe(0);
    expect(store.getOverview('s1')).toBeNull();
    expect(store.count('s2')).toBe(1);
  });
});
