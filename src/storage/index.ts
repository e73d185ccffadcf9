/**
 * Storage Layer
 *
 * Vector stores for vendor embeddings and file storage for run results.
 *
 * @module storage
 */

export { atomicWriteJson } from './atomic.js';
export { InMemoryVectorStore } from './memory.js';
export { LanceVectorStore, sqlString, VENDOR_TABLE, type LanceVectorStoreOptions } from './lance.js';
export { generateRunId, getRunFilePath, getRunsDir, getVectorDbDir, resolveDataDir } from './paths.js';
export { saveRunResult } from './runs.js';
export {
  mergeCategories,
  recordToRow,
  rowToRecord,
  validateRecord,
  VendorMetadataSchema,
  type VectorRow,
  type VectorStore,
} from './vector-store.js';
