/**
 * Service Dispatchers
 *
 * Typed façades over {@link Dispatcher}, one per external service class.
 * Each owns its own rate limiter and worker pool; nothing is shared between
 * services.
 *
 * @module dispatch/vendor-dispatchers
 */

import type { EmbeddingClient, PlaceSearchClient, QueryGenerator } from '../clients/types.js';
import type { ServiceSettings } from '../config/index.js';
import { DimensionMismatchError, type ServiceName } from '../errors/index.js';
import { childLogger, silentLogger, type Logger } from '../utils/logger.js';
import { WorkerPool } from '../workers/pool.js';
import { RateLimiter } from '../workers/rate-limiter.js';
import type { BackoffConfig, Clock } from '../workers/timing.js';
import type { PlaceDetail, PlaceSummary, SearchLocation } from '../vendors/types.js';
import { Dispatcher, type BatchItem, type DispatcherStats } from './dispatcher.js';

/**
 * Category paired with the query generated for it.
 */
export interface CategoryQuery {
  category: string;
  query: string;
}

// ============================================================================
// Construction
// ============================================================================

export interface DispatchSettings {
  services: Record<ServiceName, ServiceSettings>;
  requestTimeoutMs: number;
  maxRetries: number;
  backoff?: BackoffConfig;
  clock?: Clock;
}

/**
 * Build a limiter/pool pair for one service from its settings.
 *
 * @throws RateLimitMisconfiguredError on invalid quota settings
 */
export function createDispatcher(
  service: ServiceName,
  settings: DispatchSettings,
  logger: Logger = silentLogger
): Dispatcher {
  const { rpm, burst, concurrency } = settings.services[service];
  const serviceLogger = childLogger(logger, service);

  return new Dispatcher({
    service,
    limiter: RateLimiter.perMinute(rpm, burst, settings.clock),
    pool: new WorkerPool({
      service,
      maxConcurrency: concurrency,
      retries: settings.maxRetries,
      timeoutMs: settings.requestTimeoutMs,
      backoff: settings.backoff,
      clock: settings.clock,
      logger: serviceLogger,
    }),
    logger: serviceLogger,
  });
}

// ============================================================================
// Façades
// ============================================================================

export class QueryDispatcher {
  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly generator: QueryGenerator
  ) {}

  /**
   * Derive vendor categories for an event as a single-unit batch.
   */
  async deriveCategories(
    eventDescription: string,
    signal?: AbortSignal
  ): Promise<BatchItem<string, string[]>> {
    const [item] = await this.dispatcher.dispatch({
      inputs: [eventDescription],
      keyOf: () => 'categories',
      call: (description, { signal: attemptSignal }) =>
        this.generator.deriveCategories(description, { signal: attemptSignal }),
      signal,
    });
    return item;
  }

  async generateQueries(
    eventDescription: string,
    categories: readonly string[],
    signal?: AbortSignal
  ): Promise<Array<BatchItem<string, CategoryQuery>>> {
    return this.dispatcher.dispatch({
      inputs: categories,
      keyOf: (category) => category,
      call: async (category, { signal: attemptSignal }) => ({
        category,
        query: await this.generator.generateQuery(eventDescription, category, { signal: attemptSignal }),
      }),
      signal,
    });
  }

  getStats(): DispatcherStats {
    return this.dispatcher.getStats();
  }
}

export class PlaceSearchDispatcher {
  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly client: PlaceSearchClient
  ) {}

  async searchBatch(
    queries: readonly CategoryQuery[],
    location: SearchLocation,
    signal?: AbortSignal
  ): Promise<Array<BatchItem<CategoryQuery, PlaceSummary[]>>> {
    return this.dispatcher.dispatch({
      inputs: queries,
      keyOf: (query) => query.category,
      call: (query, { signal: attemptSignal }) =>
        this.client.search(query.query, location, { signal: attemptSignal }),
      signal,
    });
  }

  getStats(): DispatcherStats {
    return this.dispatcher.getStats();
  }
}

export class PlaceDetailDispatcher {
  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly client: PlaceSearchClient
  ) {}

  async detailsBatch(
    placeIds: readonly string[],
    signal?: AbortSignal
  ): Promise<Array<BatchItem<string, PlaceDetail>>> {
    return this.dispatcher.dispatch({
      inputs: placeIds,
      keyOf: (placeId) => placeId,
      call: (placeId, { signal: attemptSignal }) => this.client.getDetails(placeId, { signal: attemptSignal }),
      signal,
    });
  }

  getStats(): DispatcherStats {
    return this.dispatcher.getStats();
  }
}

/**
 * Text to embed, keyed for correlation with the batch result.
 */
export interface EmbeddingInput {
  key: string;
  text: string;
}

export class EmbeddingDispatcher {
  constructor(
    private readonly dispatcher: Dispatcher,
    private readonly client: EmbeddingClient
  ) {}

  get dimensions(): number {
    return this.client.dimensions;
  }

  /**
   * Embed each text. A vector of the wrong dimension fails its own item
   * with a {@link DimensionMismatchError} and is not retried.
   */
  async embedBatch(
    inputs: readonly EmbeddingInput[],
    signal?: AbortSignal
  ): Promise<Array<BatchItem<EmbeddingInput, number[]>>> {
    return this.dispatcher.dispatch({
      inputs,
      keyOf: (input) => input.key,
      call: async (input, { signal: attemptSignal }) => {
        const vector = await this.client.embed(input.text, { signal: attemptSignal });
        if (vector.length !== this.client.dimensions) {
          throw new DimensionMismatchError(this.client.dimensions, vector.length, input.key);
        }
        return vector;
      },
      signal,
    });
  }

  getStats(): DispatcherStats {
    return this.dispatcher.getStats();
  }
}

// ============================================================================
// Factory
// ============================================================================

export interface VendorClients {
  queries: QueryGenerator;
  places: PlaceSearchClient;
  embeddings: EmbeddingClient;
}

export interface VendorDispatchers {
  query: QueryDispatcher;
  placesSearch: PlaceSearchDispatcher;
  placesDetail: PlaceDetailDispatcher;
  embedding: EmbeddingDispatcher;
}

/**
 * One dispatcher per service, each with its own limiter and pool.
 *
 * @throws RateLimitMisconfiguredError before any work is dispatched
 */
export function createVendorDispatchers(
  settings: DispatchSettings,
  clients: VendorClients,
  logger: Logger = silentLogger
): VendorDispatchers {
  return {
    query: new QueryDispatcher(createDispatcher('query', settings, logger), clients.queries),
    placesSearch: new PlaceSearchDispatcher(
      createDispatcher('placesSearch', settings, logger),
      clients.places
    ),
    placesDetail: new PlaceDetailDispatcher(
      createDispatcher('placesDetail', settings, logger),
      clients.places
    ),
    embedding: new EmbeddingDispatcher(
      createDispatcher('embedding', settings, logger),
      clients.embeddings
    ),
  };
}
