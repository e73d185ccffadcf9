/**
 * Google Places API (New) Client
 *
 * Text Search and Place Details against places.googleapis.com/v1.
 * Responses are validated with zod before mapping to domain types; HTTP and
 * network failures are mapped onto the service error taxonomy.
 *
 * @module clients/places
 */

import { z } from 'zod';
import { PermanentServiceError, TransientServiceError } from '../errors/index.js';
import type { PlaceDetail, PlaceSummary, SearchLocation } from '../vendors/types.js';
import type { PlaceSearchClient, RequestOptions } from './types.js';

// ============================================================================
// Response Schemas
// ============================================================================

const LocalizedTextSchema = z.object({ text: z.string().optional() });

const RawPlaceSchema = z.object({
  id: z.string(),
  displayName: LocalizedTextSchema.optional(),
  formattedAddress: z.string().optional(),
  location: z.object({ latitude: z.number(), longitude: z.number() }).optional(),
  primaryType: z.string().optional(),
  types: z.array(z.string()).optional(),
  rating: z.number().optional(),
  userRatingCount: z.number().optional(),
  priceLevel: z.string().optional(),
  businessStatus: z.string().optional(),
  nationalPhoneNumber: z.string().optional(),
  websiteUri: z.string().optional(),
  googleMapsUri: z.string().optional(),
});

const RawPlaceDetailSchema = RawPlaceSchema.extend({
  generativeSummary: z.object({ overview: LocalizedTextSchema.optional() }).optional(),
  editorialSummary: LocalizedTextSchema.optional(),
  reviews: z.array(z.object({ text: LocalizedTextSchema.optional() })).optional(),
});

const SearchTextResponseSchema = z.object({
  places: z.array(RawPlaceSchema).optional(),
});

type RawPlace = z.infer<typeof RawPlaceSchema>;
type RawPlaceDetail = z.infer<typeof RawPlaceDetailSchema>;

// ============================================================================
// Client
// ============================================================================

const BASE_URL = 'https://places.googleapis.com/v1';

/** Fields requested from Text Search */
export const SEARCH_FIELD_MASK = [
  'places.id',
  'places.displayName',
  'places.formattedAddress',
  'places.location',
  'places.primaryType',
  'places.types',
  'places.rating',
  'places.userRatingCount',
  'places.priceLevel',
  'places.businessStatus',
  'places.nationalPhoneNumber',
  'places.websiteUri',
  'places.googleMapsUri',
].join(',');

/** Fields requested from Place Details */
export const DETAIL_FIELD_MASK = [
  'id',
  'displayName',
  'formattedAddress',
  'primaryType',
  'types',
  'rating',
  'userRatingCount',
  'reviews',
  'generativeSummary',
  'editorialSummary',
].join(',');

export interface PlacesClientOptions {
  apiKey: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Maximum results per text search (1-20, default: 20) */
  pageSize?: number;
  /** Review texts kept per place (default: 3) */
  maxReviews?: number;
}

/**
 * @example
 * ```typescript
 * const client = new PlacesClient({ apiKey: config.apiKeys.googleMaps });
 * const places = await client.search('balloon decorators', { name: 'Gurugram' });
 * const detail = await client.getDetails(places[0].placeId);
 * ```
 */
export class PlacesClient implements PlaceSearchClient {
  private readonly apiKey: string;
  private readonly timeoutMs: number;
  private readonly pageSize: number;
  private readonly maxReviews: number;

  constructor(options: PlacesClientOptions) {
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? 10000;
    this.pageSize = options.pageSize ?? 20;
    this.maxReviews = options.maxReviews ?? 3;
  }

  /**
   * Text search. The location name is appended to the query unless the
   * query already mentions it; bounds become a rectangle location bias.
   */
  async search(
    query: string,
    location: SearchLocation,
    options: RequestOptions = {}
  ): Promise<PlaceSummary[]> {
    const body: Record<string, unknown> = {
      textQuery: withLocation(query, location.name),
      pageSize: this.pageSize,
    };
    if (location.bounds) {
      body.locationBias = { rectangle: location.bounds };
    }

    const json = await this.request(
      `${BASE_URL}/places:searchText`,
      {
        method: 'POST',
        headers: this.headers(SEARCH_FIELD_MASK),
        body: JSON.stringify(body),
      },
      'placesSearch',
      options.signal
    );

    const parsed = SearchTextResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new PermanentServiceError(
        `Unexpected searchText response: ${parsed.error.message}`,
        'placesSearch'
      );
    }
    return (parsed.data.places ?? []).map(toPlaceSummary);
  }

  async getDetails(placeId: string, options: RequestOptions = {}): Promise<PlaceDetail> {
    if (!placeId || /[/?#]/.test(placeId)) {
      throw new PermanentServiceError(`Invalid place id: '${placeId}'`, 'placesDetail', 400);
    }

    const json = await this.request(
      `${BASE_URL}/places/${placeId}`,
      { method: 'GET', headers: this.headers(DETAIL_FIELD_MASK) },
      'placesDetail',
      options.signal
    );

    const parsed = RawPlaceDetailSchema.safeParse(json);
    if (!parsed.success) {
      throw new PermanentServiceError(
        `Unexpected place details response: ${parsed.error.message}`,
        'placesDetail'
      );
    }
    return toPlaceDetail(parsed.data, this.maxReviews);
  }

  private headers(fieldMask: string): Record<string, string> {
    return {
      'Content-Type': 'application/json',
      'X-Goog-Api-Key': this.apiKey,
      'X-Goog-FieldMask': fieldMask,
    };
  }

  /**
   * Fetch with timeout via AbortController, returning parsed JSON. An
   * aborted caller signal aborts the request too.
   */
  private async request(
    url: string,
    init: RequestInit,
    service: 'placesSearch' | 'placesDetail',
    signal?: AbortSignal
  ): Promise<unknown> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);
    const onAbort = (): void => controller.abort();
    if (signal?.aborted) {
      controller.abort();
    } else {
      signal?.addEventListener('abort', onAbort, { once: true });
    }

    let response: Response;
    try {
      response = await fetch(url, { ...init, signal: controller.signal });
    } catch (error) {
      if (signal?.aborted) {
        throw new TransientServiceError('Request aborted by caller', service, undefined, { cause: error });
      }
      if (error instanceof Error && error.name === 'AbortError') {
        throw new TransientServiceError(`Request timed out after ${this.timeoutMs}ms`, service, 408);
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new TransientServiceError(`Network error: ${message}`, service, undefined, {
        cause: error,
      });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }

    if (!response.ok) {
      const text = await response.text().catch(() => 'Unknown error');
      throw httpError(response.status, text, service);
    }

    return response.json();
  }
}

// ============================================================================
// Helpers
// ============================================================================

function httpError(
  status: number,
  text: string,
  service: 'placesSearch' | 'placesDetail'
): Error {
  if (status === 429) {
    return new TransientServiceError(`Quota exceeded: ${text}`, service, status);
  }
  if (status >= 500) {
    return new TransientServiceError(`Server error (${status}): ${text}`, service, status);
  }
  if (status === 401 || status === 403) {
    return new PermanentServiceError(
      'Authentication failed: invalid or unauthorized API key',
      service,
      status
    );
  }
  return new PermanentServiceError(`API error (${status}): ${text}`, service, status);
}

export function withLocation(query: string, locationName: string): string {
  const trimmed = query.trim();
  if (!locationName || trimmed.toLowerCase().includes(locationName.toLowerCase())) {
    return trimmed;
  }
  return `${trimmed} in ${locationName}`;
}

function toPlaceSummary(raw: RawPlace): PlaceSummary {
  return {
    placeId: raw.id,
    name: raw.displayName?.text ?? '',
    formattedAddress: raw.formattedAddress,
    location: raw.location,
    primaryType: raw.primaryType,
    types: raw.types ?? [],
    rating: raw.rating,
    userRatingCount: raw.userRatingCount,
    priceLevel: raw.priceLevel,
    businessStatus: raw.businessStatus,
    phoneNumber: raw.nationalPhoneNumber,
    websiteUri: raw.websiteUri,
    googleMapsUri: raw.googleMapsUri,
  };
}

function toPlaceDetail(raw: RawPlaceDetail, maxReviews: number): PlaceDetail {
  const reviews = (raw.reviews ?? [])
    .map((review) => review.text?.text?.trim() ?? '')
    .filter((text) => text.length > 0)
    .slice(0, maxReviews);

  return {
    ...toPlaceSummary(raw),
    summary: raw.generativeSummary?.overview?.text ?? raw.editorialSummary?.text,
    reviews,
  };
}
