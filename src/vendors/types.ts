/**
 * Vendor Domain Types
 *
 * Places as returned by the place-search service, the vendor view derived
 * from them, and the embedding records persisted for ranking.
 *
 * @module vendors/types
 */

/**
 * Latitude/longitude pair.
 */
export interface LatLng {
  latitude: number;
  longitude: number;
}

/**
 * Where to search: a name appended to queries, optionally with a
 * bounding rectangle used as location bias.
 */
export interface SearchLocation {
  /** e.g. "Gurugram" */
  name: string;
  bounds?: {
    low: LatLng;
    high: LatLng;
  };
}

/**
 * A place as returned by text search.
 */
export interface PlaceSummary {
  placeId: string;
  name: string;
  formattedAddress?: string;
  location?: LatLng;
  primaryType?: string;
  types: string[];
  rating?: number;
  userRatingCount?: number;
  /** e.g. "PRICE_LEVEL_MODERATE" */
  priceLevel?: string;
  businessStatus?: string;
  phoneNumber?: string;
  websiteUri?: string;
  googleMapsUri?: string;
}

/**
 * A place with the descriptive fields from the details endpoint.
 */
export interface PlaceDetail extends PlaceSummary {
  /** Generative or editorial summary */
  summary?: string;
  /** Review texts, most relevant first */
  reviews: string[];
}

/**
 * Metadata stored alongside a vendor's embedding.
 */
export interface VendorMetadata {
  name: string;
  /** Categories whose searches found this vendor */
  categories: string[];
  specialties: string;
  formattedAddress?: string;
  primaryType?: string;
  types: string[];
  rating?: number;
  userRatingCount?: number;
  phoneNumber?: string;
  websiteUri?: string;
  googleMapsUri?: string;
}

/**
 * A persisted embedding. All vectors compared together share one dimension.
 */
export interface EmbeddingRecord {
  /** Place identifier */
  id: string;
  vector: number[];
  metadata: VendorMetadata;
}

/**
 * Filter for store reads.
 */
export interface RecordFilter {
  /** Only these ids; an empty list matches nothing */
  ids?: readonly string[];
}
