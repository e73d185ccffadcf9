/**
 * Vector Store Contract
 *
 * Persistence for vendor embeddings, keyed by place id, plus the row
 * conversion shared by the store implementations.
 *
 * @module storage/vector-store
 */

import { z } from 'zod';
import { DimensionMismatchError, InvalidVectorError } from '../errors/index.js';
import type { EmbeddingRecord, RecordFilter, VendorMetadata } from '../vendors/types.js';

export interface VectorStore {
  /** Insert or replace the record with the same id */
  upsert(record: EmbeddingRecord): Promise<void>;
  /** Every record, or only those whose id is in `filter.ids` */
  fetchAll(filter?: RecordFilter): Promise<EmbeddingRecord[]>;
  /** Number of stored records */
  count(): Promise<number>;
}

export const VendorMetadataSchema = z.object({
  name: z.string(),
  categories: z.array(z.string()),
  specialties: z.string(),
  formattedAddress: z.string().optional(),
  primaryType: z.string().optional(),
  types: z.array(z.string()),
  rating: z.number().optional(),
  userRatingCount: z.number().optional(),
  phoneNumber: z.string().optional(),
  websiteUri: z.string().optional(),
  googleMapsUri: z.string().optional(),
});

/**
 * Reject records a store cannot hold.
 *
 * @throws InvalidVectorError for an empty id or a non-finite vector
 * @throws DimensionMismatchError when the vector length differs from `dimensions`
 */
export function validateRecord(record: EmbeddingRecord, dimensions: number): void {
  if (!record.id) {
    throw new InvalidVectorError('Record id must be non-empty');
  }
  if (record.vector.length !== dimensions) {
    throw new DimensionMismatchError(dimensions, record.vector.length, record.id);
  }
  if (!record.vector.every((value) => Number.isFinite(value))) {
    throw new InvalidVectorError(`Vector for '${record.id}' contains non-finite values`);
  }
}

/**
 * Merge categories from an earlier record into an updated one, so a vendor
 * keeps every category that ever found it.
 */
export function mergeCategories(
  previous: VendorMetadata | undefined,
  next: VendorMetadata
): VendorMetadata {
  if (!previous) {
    return next;
  }
  const categories = [...new Set([...previous.categories, ...next.categories])];
  return { ...next, categories };
}

// ============================================================================
// Row conversion
// ============================================================================

/**
 * Flat row layout: metadata is stored as a JSON string.
 */
export interface VectorRow {
  id: string;
  vector: number[];
  metadata: string;
}

const StoredRowSchema = z.object({
  id: z.string(),
  vector: z.custom<ArrayLike<number>>(
    (value) =>
      Array.isArray(value) ||
      value instanceof Float32Array ||
      value instanceof Float64Array ||
      (typeof value === 'object' && value !== null && 'length' in value)
  ),
  metadata: z.string(),
});

export function recordToRow(record: EmbeddingRecord): VectorRow {
  return {
    id: record.id,
    vector: [...record.vector],
    metadata: JSON.stringify(record.metadata),
  };
}

/**
 * Convert a stored row back to a record.
 *
 * @throws Error if the row or its metadata does not match the layout
 */
export function rowToRecord(row: unknown): EmbeddingRecord {
  const parsed = StoredRowSchema.parse(row);
  const metadata = VendorMetadataSchema.parse(JSON.parse(parsed.metadata));
  return {
    id: parsed.id,
    vector: Array.from(parsed.vector),
    metadata,
  };
}
