/**
 * LanceVectorStore against a temporary on-disk database.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { DimensionMismatchError } from '../errors/index.js';
import type { EmbeddingRecord } from '../vendors/types.js';
import { LanceVectorStore, sqlString } from './lance.js';

// Vector components are exact in float32.
function record(id: string, vector: number[], categories: string[]): EmbeddingRecord {
  return {
    id,
    vector,
    metadata: { name: `Vendor ${id}`, categories, specialties: 'general decoration', types: [] },
  };
}

describe('sqlString', () => {
  it('quotes and escapes single quotes', () => {
    expect(sqlString("Raj's Decor")).toBe("'Raj''s Decor'");
  });
});

describe('LanceVectorStore', () => {
  let dir: string;
  let store: LanceVectorStore;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'lance-test-'));
    store = new LanceVectorStore({ path: path.join(dir, 'vectors'), dimensions: 2 });
  });

  afterEach(async () => {
    await store.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('reads nothing before the first write', async () => {
    expect(await store.count()).toBe(0);
    expect(await store.fetchAll()).toEqual([]);
  });

  it('round-trips records and filters by id', async () => {
    await store.upsert(record('a', [1, 0], ['catering']));
    await store.upsert(record("b'quoted", [0.5, 0.25], ['cake shop']));

    expect(await store.count()).toBe(2);
    const [b] = await store.fetchAll({ ids: ["b'quoted"] });
    expect(b).toEqual(record("b'quoted", [0.5, 0.25], ['cake shop']));
    expect(await store.fetchAll({ ids: [] })).toEqual([]);
  });

  it('replaces by id and merges categories', async () => {
    await store.upsert(record('a', [1, 0], ['catering']));
    await store.upsert(record('a', [0, 1], ['cake shop']));

    const records = await store.fetchAll();
    expect(records).toHaveLength(1);
    expect(records[0].vector).toEqual([0, 1]);
    expect(records[0].metadata.categories).toEqual(['catering', 'cake shop']);
  });

  it('persists across store instances', async () => {
    await store.upsert(record('a', [1, 0], ['catering']));
    await store.close();

    store = new LanceVectorStore({ path: path.join(dir, 'vectors'), dimensions: 2 });
    expect((await store.fetchAll()).map((r) => r.id)).toEqual(['a']);
  });

  it('rejects a vector of the wrong dimension', async () => {
    await expect(store.upsert(record('a', [1, 0, 0], ['catering']))).rejects.toBeInstanceOf(
      DimensionMismatchError
    );
  });
});
