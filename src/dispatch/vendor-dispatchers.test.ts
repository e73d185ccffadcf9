/**
 * Tests for the per-service dispatcher façades.
 */

import { describe, it, expect, jest } from '@jest/globals';
import type { EmbeddingClient, PlaceSearchClient, QueryGenerator } from '../clients/types.js';
import type { ServiceSettings } from '../config/index.js';
import { DimensionMismatchError, RateLimitMisconfiguredError } from '../errors/index.js';
import type { PlaceDetail, PlaceSummary, SearchLocation } from '../vendors/types.js';
import { createVendorDispatchers, type DispatchSettings } from './vendor-dispatchers.js';

// ============================================================================
// Fakes
// ============================================================================

const quota: ServiceSettings = { rpm: 60_000, burst: 10, concurrency: 2 };

function createSettings(overrides: Partial<DispatchSettings> = {}): DispatchSettings {
  return {
    services: { query: quota, placesSearch: quota, placesDetail: quota, embedding: quota },
    requestTimeoutMs: 1000,
    maxRetries: 2,
    backoff: { baseDelayMs: 1, maxDelayMs: 1, jitterRatio: 0 },
    ...overrides,
  };
}

const location: SearchLocation = { name: 'Gurugram' };

function place(placeId: string, name: string): PlaceSummary {
  return { placeId, name, types: [] };
}

function createClients(dimensions = 3) {
  const search = jest.fn<PlaceSearchClient['search']>(async (query) => [place(`id-${query}`, query)]);
  const embed = jest.fn<EmbeddingClient['embed']>(async () => [0.1, 0.2, 0.3]);
  const queries: QueryGenerator = {
    deriveCategories: async () => ['balloon decoration', 'catering'],
    generateQuery: async (_description, category) => `${category} for kids party`,
  };
  const places: PlaceSearchClient = {
    search,
    getDetails: async (placeId): Promise<PlaceDetail> => ({ ...place(placeId, 'Detail'), reviews: [] }),
  };
  const embeddings: EmbeddingClient = { dimensions, embed };
  return { queries, places, embeddings, search, embed };
}

// ============================================================================
// Tests
// ============================================================================

describe('createVendorDispatchers', () => {
  it('should reject an invalid quota before dispatching anything', () => {
    const settings = createSettings({
      services: {
        query: quota,
        placesSearch: { rpm: 0, burst: 10, concurrency: 2 },
        placesDetail: quota,
        embedding: quota,
      },
    });

    expect(() => createVendorDispatchers(settings, createClients())).toThrow(RateLimitMisconfiguredError);
  });
});

describe('QueryDispatcher', () => {
  it('should derive categories as a single item', async () => {
    const dispatchers = createVendorDispatchers(createSettings(), createClients());

    const item = await dispatchers.query.deriveCategories('kids birthday party');

    expect(item).toEqual({
      key: 'categories',
      input: 'kids birthday party',
      ok: true,
      value: ['balloon decoration', 'catering'],
      attempts: 1,
    });
  });

  it('should key generated queries by category', async () => {
    const dispatchers = createVendorDispatchers(createSettings(), createClients());

    const items = await dispatchers.query.generateQueries('kids party', ['balloon decoration', 'catering']);

    expect(items.map((item) => item.key)).toEqual(['balloon decoration', 'catering']);
    expect(items.map((item) => (item.ok ? item.value : null))).toEqual([
      { category: 'balloon decoration', query: 'balloon decoration for kids party' },
      { category: 'catering', query: 'catering for kids party' },
    ]);
    expect(dispatchers.query.getStats()).toEqual({ batches: 1, succeeded: 2, failed: 0, retries: 0 });
  });
});

describe('PlaceSearchDispatcher', () => {
  it('should search each generated query at the location', async () => {
    const clients = createClients();
    const dispatchers = createVendorDispatchers(createSettings(), clients);

    const [item] = await dispatchers.placesSearch.searchBatch(
      [{ category: 'catering', query: 'party caterers' }],
      location
    );

    expect(clients.search).toHaveBeenCalledWith('party caterers', location, {
      signal: expect.any(AbortSignal),
    });
    expect(item.key).toBe('catering');
    expect(item.ok && item.value[0].placeId).toBe('id-party caterers');
  });
});

describe('PlaceDetailDispatcher', () => {
  it('should fetch details keyed by place id', async () => {
    const dispatchers = createVendorDispatchers(createSettings(), createClients());

    const [item] = await dispatchers.placesDetail.detailsBatch(['p1']);

    expect(item.key).toBe('p1');
    expect(item.ok && item.value.name).toBe('Detail');
  });
});

describe('EmbeddingDispatcher', () => {
  it('should expose the client dimension', () => {
    const dispatchers = createVendorDispatchers(createSettings(), createClients(3));
    expect(dispatchers.embedding.dimensions).toBe(3);
  });

  it('should fail a wrong-sized vector without retrying it', async () => {
    const clients = createClients(4);
    const dispatchers = createVendorDispatchers(createSettings(), clients);

    const [item] = await dispatchers.embedding.embedBatch([{ key: 'vendor:p1', text: 'Sky Balloons' }]);

    expect(clients.embed).toHaveBeenCalledTimes(1);
    expect(item.ok).toBe(false);
    if (!item.ok) {
      expect(item.error).toBeInstanceOf(DimensionMismatchError);
      expect(item.error.message).toBe("Vector for 'vendor:p1' has dimension 3, expected 4");
    }
  });
});
