/**
 * Search locations.
 *
 * @module vendors/location
 */

import type { SearchLocation } from './types.js';

/**
 * Gurugram, with a rectangle covering the city used as location bias.
 */
export const DEFAULT_LOCATION: SearchLocation = {
  name: 'Gurugram',
  bounds: {
    low: { latitude: 28.35, longitude: 76.9 },
    high: { latitude: 28.55, longitude: 77.15 },
  },
};

const DEFAULT_LOCATION_ALIASES = ['gurugram', 'gurgaon'];

/**
 * A named location. The default city keeps its bounds; any other name is
 * searched by name alone.
 */
export function resolveLocation(name?: string): SearchLocation {
  const trimmed = name?.trim();
  if (!trimmed || DEFAULT_LOCATION_ALIASES.includes(trimmed.toLowerCase())) {
    return DEFAULT_LOCATION;
  }
  return { name: trimmed };
}
