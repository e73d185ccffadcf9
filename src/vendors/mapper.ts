/**
 * Vendor Mapping
 *
 * Turns places into stored vendor metadata and into the text that is
 * embedded for similarity ranking.
 *
 * @module vendors/mapper
 */

import type { PlaceDetail, PlaceSummary, VendorMetadata } from './types.js';

/** Review texts included in embedding text */
const MAX_EMBEDDED_REVIEWS = 3;

interface SpecialtyRule {
  specialty: string;
  matches: (types: readonly string[], name: string) => boolean;
}

// Order matters: specialties are listed in rule order.
const SPECIALTY_RULES: SpecialtyRule[] = [
  { specialty: 'flower decoration', matches: (types) => types.includes('florist') },
  { specialty: 'event planning', matches: (types) => types.includes('event_planner') },
  { specialty: 'balloon decoration', matches: (_, name) => name.includes('balloon') },
  {
    specialty: 'flower arrangement',
    matches: (_, name) => name.includes('flower') || name.includes('floral'),
  },
  { specialty: 'wedding decoration', matches: (_, name) => name.includes('wedding') },
  {
    specialty: 'party decoration',
    matches: (_, name) => name.includes('birthday') || name.includes('party'),
  },
];

export const DEFAULT_SPECIALTY = 'general decoration';

/**
 * Comma-separated specialties inferred from business types and name.
 */
export function extractSpecialties(place: Pick<PlaceSummary, 'types' | 'name'>): string {
  const name = place.name.toLowerCase();
  const specialties = SPECIALTY_RULES.filter((rule) => rule.matches(place.types, name)).map(
    (rule) => rule.specialty
  );
  return specialties.length > 0 ? specialties.join(', ') : DEFAULT_SPECIALTY;
}

export function placeToVendor(place: PlaceSummary, categories: readonly string[]): VendorMetadata {
  return {
    name: place.name,
    categories: [...categories],
    specialties: extractSpecialties(place),
    formattedAddress: place.formattedAddress,
    primaryType: place.primaryType,
    types: [...place.types],
    rating: place.rating,
    userRatingCount: place.userRatingCount,
    phoneNumber: place.phoneNumber,
    websiteUri: place.websiteUri,
    googleMapsUri: place.googleMapsUri,
  };
}

function isDetail(place: PlaceSummary | PlaceDetail): place is PlaceDetail {
  return 'reviews' in place;
}

/**
 * Space-joined description of a vendor for embedding. Empty parts are
 * skipped; detail fields appear only when details were fetched.
 */
export function buildEmbeddingText(place: PlaceSummary | PlaceDetail): string {
  const parts: Array<string | undefined> = [
    place.name,
    extractSpecialties(place),
    place.primaryType,
    place.types.length > 0 ? `Business types: ${place.types.join(', ')}` : undefined,
    place.formattedAddress,
    place.rating ? `Rating: ${place.rating}` : undefined,
    place.userRatingCount ? `Reviews: ${place.userRatingCount}` : undefined,
    place.priceLevel ? `Price level: ${place.priceLevel}` : undefined,
    place.businessStatus ? `Status: ${place.businessStatus}` : undefined,
  ];

  if (isDetail(place)) {
    parts.push(place.summary, ...place.reviews.slice(0, MAX_EMBEDDED_REVIEWS));
  }

  return parts.filter((part): part is string => !!part && part.trim().length > 0).join(' ');
}
