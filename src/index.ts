/**
 * Event Vendor Discovery
 *
 * Library entry point. The CLI lives under `cli/`.
 *
 * @module event-vendor-discovery
 */

export * from './errors/index.js';
export * from './workers/index.js';
export * from './dispatch/index.js';
export * from './ranking/index.js';
export * from './pipeline/index.js';

export {
  loadConfig,
  getConfig,
  resetConfig,
  hasApiKey,
  requireApiKey,
  missingApiKeys,
  type ApiKeyName,
  type Config,
  type EmbeddingProvider,
  type ServiceSettings,
} from './config/index.js';

export type { EmbeddingClient, PlaceSearchClient, QueryGenerator } from './clients/types.js';
export { GeminiQueryGenerator, type GeminiQueryGeneratorOptions } from './clients/query-generator.js';
export { PlacesClient, type PlacesClientOptions } from './clients/places.js';
export {
  GeminiEmbeddingClient,
  OpenAIEmbeddingClient,
  type GeminiEmbeddingClientOptions,
  type OpenAIEmbeddingClientOptions,
} from './clients/embeddings.js';

export type {
  EmbeddingRecord,
  LatLng,
  PlaceDetail,
  PlaceSummary,
  RecordFilter,
  SearchLocation,
  VendorMetadata,
} from './vendors/types.js';
export { DEFAULT_LOCATION, resolveLocation } from './vendors/location.js';
export { buildEmbeddingText, placeToVendor } from './vendors/mapper.js';

export {
  InMemoryVectorStore,
  LanceVectorStore,
  saveRunResult,
  type VectorStore,
} from './storage/index.js';

export { createLogger, silentLogger, type Logger, type LogLevel } from './utils/logger.js';
