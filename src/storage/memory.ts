/**
 * In-memory vector store for tests and dry runs.
 *
 * @module storage/memory
 */

import type { EmbeddingRecord, RecordFilter } from '../vendors/types.js';
import { mergeCategories, validateRecord, type VectorStore } from './vector-store.js';

export class InMemoryVectorStore implements VectorStore {
  private readonly records = new Map<string, EmbeddingRecord>();

  constructor(readonly dimensions: number) {}

  async upsert(record: EmbeddingRecord): Promise<void> {
    validateRecord(record, this.dimensions);
    const previous = this.records.get(record.id);
    this.records.set(record.id, {
      id: record.id,
      vector: [...record.vector],
      metadata: mergeCategories(previous?.metadata, record.metadata),
    });
  }

  async fetchAll(filter: RecordFilter = {}): Promise<EmbeddingRecord[]> {
    const ids = filter.ids;
    const selected = ids
      ? [...new Set(ids)].flatMap((id) => {
          const record = this.records.get(id);
          return record ? [record] : [];
        })
      : [...this.records.values()];
    // Copies keep callers from mutating stored state.
    return selected.map((record) => ({
      id: record.id,
      vector: [...record.vector],
      metadata: { ...record.metadata, categories: [...record.metadata.categories] },
    }));
  }

  async count(): Promise<number> {
    return this.records.size;
  }
}
