import { describe, it, expect } from '@jest/globals';
import type { EmbeddingRecord } from '../vendors/types.js';
import { mergeCategories, recordToRow, rowToRecord } from './vector-store.js';

const record: EmbeddingRecord = {
  id: 'p1',
  vector: [0.5, 0.25],
  metadata: {
    name: 'Sky Balloons',
    categories: ['balloon decoration'],
    specialties: 'balloon decoration',
    types: ['store'],
    rating: 4.5,
  },
};

describe('row conversion', () => {
  it('stores metadata as a JSON string', () => {
    const row = recordToRow(record);

    expect(row.id).toBe('p1');
    expect(row.vector).toEqual([0.5, 0.25]);
    expect(JSON.parse(row.metadata)).toEqual(record.metadata);
  });

  it('reads rows whose vector is a typed array', () => {
    const row = { ...recordToRow(record), vector: new Float32Array([0.5, 0.25]) };

    expect(rowToRecord(row)).toEqual(record);
  });

  it('rejects rows with invalid metadata', () => {
    expect(() => rowToRecord({ id: 'p1', vector: [1], metadata: '{"name": 3}' })).toThrow();
    expect(() => rowToRecord({ id: 'p1', metadata: '{}' })).toThrow();
  });
});

describe('mergeCategories', () => {
  it('unions categories in first-seen order', () => {
    const merged = mergeCategories(
      { ...record.metadata, categories: ['balloon decoration', 'party supplies'] },
      { ...record.metadata, name: 'Sky Balloons Studio', categories: ['party supplies', 'kids party'] }
    );

    expect(merged.name).toBe('Sky Balloons Studio');
    expect(merged.categories).toEqual(['balloon decoration', 'party supplies', 'kids party']);
  });

  it('returns the new metadata when nothing was stored', () => {
    expect(mergeCategories(undefined, record.metadata)).toBe(record.metadata);
  });
});
