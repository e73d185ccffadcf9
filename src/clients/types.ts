/**
 * External collaborator contracts.
 *
 * Dispatchers depend on these interfaces only; the concrete clients in this
 * directory implement them against Gemini, OpenAI and Google Places.
 *
 * @module clients/types
 */

import type { PlaceDetail, PlaceSummary, SearchLocation } from '../vendors/types.js';

/**
 * Per-call options. The signal aborts when the dispatching attempt times
 * out; implementations pass it to their transport.
 */
export interface RequestOptions {
  signal?: AbortSignal;
}

/**
 * Generative-query service.
 */
export interface QueryGenerator {
  /** Vendor categories an event needs (e.g. "balloon decorator", "caterer") */
  deriveCategories(eventDescription: string, options?: RequestOptions): Promise<string[]>;
  /** A place-search query for one category of the event */
  generateQuery(eventDescription: string, category: string, options?: RequestOptions): Promise<string>;
}

/**
 * Place-search service.
 */
export interface PlaceSearchClient {
  search(query: string, location: SearchLocation, options?: RequestOptions): Promise<PlaceSummary[]>;
  getDetails(placeId: string, options?: RequestOptions): Promise<PlaceDetail>;
}

/**
 * Embedding service. Every vector it returns has `dimensions` entries.
 */
export interface EmbeddingClient {
  readonly dimensions: number;
  embed(text: string, options?: RequestOptions): Promise<number[]>;
}
