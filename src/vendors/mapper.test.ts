/**
 * Tests for vendor mapping and embedding text.
 */

import { describe, it, expect } from '@jest/globals';
import { resolveLocation, DEFAULT_LOCATION } from './location.js';
import { buildEmbeddingText, extractSpecialties, placeToVendor } from './mapper.js';
import type { PlaceDetail, PlaceSummary } from './types.js';

const skyBalloons: PlaceSummary = {
  placeId: 'p1',
  name: 'Sky Balloons & Party Decor',
  formattedAddress: 'Sector 29, Gurugram',
  primaryType: 'store',
  types: ['florist', 'store'],
  rating: 4.6,
  userRatingCount: 120,
  priceLevel: 'PRICE_LEVEL_MODERATE',
  businessStatus: 'OPERATIONAL',
};

describe('extractSpecialties', () => {
  it('should list matching specialties in rule order', () => {
    expect(extractSpecialties(skyBalloons)).toBe('flower decoration, balloon decoration, party decoration');
  });

  it('should fall back to general decoration', () => {
    expect(extractSpecialties({ name: 'Sharma Tent House', types: ['store'] })).toBe('general decoration');
  });

  it('should match names case-insensitively', () => {
    expect(extractSpecialties({ name: 'FLORAL Dreams Wedding Studio', types: [] })).toBe(
      'flower arrangement, wedding decoration'
    );
  });
});

describe('placeToVendor', () => {
  it('should copy place fields and record categories', () => {
    const categories = ['balloon decoration'];
    const vendor = placeToVendor(skyBalloons, categories);

    expect(vendor).toEqual({
      name: 'Sky Balloons & Party Decor',
      categories: ['balloon decoration'],
      specialties: 'flower decoration, balloon decoration, party decoration',
      formattedAddress: 'Sector 29, Gurugram',
      primaryType: 'store',
      types: ['florist', 'store'],
      rating: 4.6,
      userRatingCount: 120,
      phoneNumber: undefined,
      websiteUri: undefined,
      googleMapsUri: undefined,
    });
    expect(vendor.categories).not.toBe(categories);
  });
});

describe('buildEmbeddingText', () => {
  it('should join the search fields', () => {
    expect(buildEmbeddingText(skyBalloons)).toBe(
      'Sky Balloons & Party Decor flower decoration, balloon decoration, party decoration store ' +
        'Business types: florist, store Sector 29, Gurugram Rating: 4.6 Reviews: 120 ' +
        'Price level: PRICE_LEVEL_MODERATE Status: OPERATIONAL'
    );
  });

  it('should skip empty parts', () => {
    expect(buildEmbeddingText({ placeId: 'p2', name: 'Cake Studio', types: [] })).toBe(
      'Cake Studio general decoration'
    );
  });

  it('should add summary and up to three reviews for detailed places', () => {
    const detail: PlaceDetail = {
      placeId: 'p3',
      name: 'Cake Studio',
      types: [],
      summary: 'Custom cakes.',
      reviews: ['Lovely', 'Tasty', 'On time', 'Fourth'],
    };

    expect(buildEmbeddingText(detail)).toBe(
      'Cake Studio general decoration Custom cakes. Lovely Tasty On time'
    );
  });
});

describe('resolveLocation', () => {
  it('should use the default city for empty input and its aliases', () => {
    expect(resolveLocation()).toBe(DEFAULT_LOCATION);
    expect(resolveLocation(' Gurgaon ')).toBe(DEFAULT_LOCATION);
  });

  it('should search other cities by name only', () => {
    expect(resolveLocation(' Pune ')).toEqual({ name: 'Pune' });
  });
});
