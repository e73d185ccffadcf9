/**
 * Vendor Pipeline
 *
 * Sequences a discovery run over the service dispatchers:
 *
 *   categories → queries → search → (details) → embedding → persist → rank
 *
 * Each stage drains its whole batch before the next begins. Item failures
 * are collected into the run's failure manifest and the affected category or
 * vendor is dropped from later stages; the run itself always resolves. The
 * abort signal is checked between stages and passed to every dispatch. A
 * cancelled run skips the remaining stages but still stores vendors it has
 * already embedded.
 *
 * @module pipeline/vendor-pipeline
 */

import { normalizeCategories } from '../clients/query-generator.js';
import type { CategoryQuery, VendorDispatchers } from '../dispatch/vendor-dispatchers.js';
import { summarizeError, VendorDiscoveryError } from '../errors/index.js';
import { SimilarityEngine } from '../ranking/similarity.js';
import { generateRunId } from '../storage/paths.js';
import type { VectorStore } from '../storage/vector-store.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { buildEmbeddingText, placeToVendor } from '../vendors/mapper.js';
import type {
  EmbeddingRecord,
  PlaceDetail,
  PlaceSummary,
  SearchLocation,
} from '../vendors/types.js';
import type {
  CategoryRanking,
  CollectOptions,
  CorpusScope,
  PipelineStage,
  RunFailure,
  RunOptions,
  RunResult,
  RunStats,
} from './types.js';

/** Default results per category */
export const DEFAULT_TOP_K = 10;

export interface VendorPipelineDeps {
  dispatchers: VendorDispatchers;
  store: VectorStore;
  engine?: SimilarityEngine;
  /** Results per category when a run does not say (default: 10) */
  topK?: number;
  logger?: Logger;
  now?: () => Date;
}

// ============================================================================
// Run state
// ============================================================================

interface DiscoveredVendor {
  place: PlaceSummary | PlaceDetail;
  categories: string[];
  /** Stored before this run */
  existing?: EmbeddingRecord;
  vector?: number[];
}

/**
 * State of one run. Never shared between runs.
 */
class PipelineState {
  categories: string[] = [];
  queries: CategoryQuery[] = [];
  /** Place ids found per category, in discovery order */
  readonly categoryVendors = new Map<string, string[]>();
  readonly vendors = new Map<string, DiscoveredVendor>();
  readonly queryVectors = new Map<string, number[]>();
  readonly rankings: CategoryRanking[] = [];
  /** Vendors whose new embedding was written by this run */
  readonly storedIds = new Set<string>();
  persisted = false;
  readonly failures: RunFailure[] = [];
  readonly stats: Omit<RunStats, 'failures' | 'durationMs' | 'uniqueVendors' | 'newVendors'> = {
    categories: 0,
    queries: 0,
    placesFound: 0,
    detailsFetched: 0,
    embedded: 0,
    stored: 0,
    ranked: 0,
  };

  fail(stage: PipelineStage, key: string, error: unknown, category?: string): void {
    this.failures.push({
      stage,
      key,
      ...(category !== undefined && { category }),
      error: summarizeError(error),
    });
  }

  newVendors(): Array<[string, DiscoveredVendor]> {
    return [...this.vendors].filter(([, vendor]) => !vendor.existing);
  }

  hasUnstoredVectors(): boolean {
    return !this.persisted && [...this.vendors.values()].some((vendor) => vendor.vector !== undefined);
  }
}

/**
 * Combine search and detail views of a place; detail fields win where set.
 */
export function mergeDetail(summary: PlaceSummary, detail: PlaceDetail): PlaceDetail {
  return {
    ...summary,
    name: detail.name || summary.name,
    formattedAddress: detail.formattedAddress ?? summary.formattedAddress,
    primaryType: detail.primaryType ?? summary.primaryType,
    types: detail.types.length > 0 ? detail.types : summary.types,
    rating: detail.rating ?? summary.rating,
    userRatingCount: detail.userRatingCount ?? summary.userRatingCount,
    summary: detail.summary,
    reviews: detail.reviews,
  };
}

// ============================================================================
// Pipeline
// ============================================================================

type StageStep = () => Promise<boolean | void>;

export class VendorPipeline {
  private readonly dispatchers: VendorDispatchers;
  private readonly store: VectorStore;
  private readonly engine: SimilarityEngine;
  private readonly topK: number;
  private readonly logger: Logger;
  private readonly now: () => Date;

  constructor(deps: VendorPipelineDeps) {
    this.dispatchers = deps.dispatchers;
    this.store = deps.store;
    this.logger = deps.logger ?? silentLogger;
    this.engine = deps.engine ?? new SimilarityEngine(this.logger);
    this.topK = deps.topK ?? DEFAULT_TOP_K;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Discover, embed, store and rank vendors for an event.
   *
   * @throws VendorDiscoveryError for an empty description or category list
   */
  async run(options: RunOptions): Promise<RunResult> {
    const description = options.eventDescription.trim();
    if (!description) {
      throw new VendorDiscoveryError('Event description is required');
    }

    const state = new PipelineState();
    const { signal } = options;
    const topK = options.topK ?? this.topK;
    const corpus = options.corpus ?? 'discovered';

    if (options.categories) {
      state.categories = this.explicitCategories(options.categories);
    }

    return this.execute(description, options.location, state, signal, [
      () => (options.categories ? Promise.resolve(true) : this.deriveCategories(state, description, signal)),
      () => this.generateQueries(state, description, signal),
      () => this.search(state, options.location, signal),
      () => this.lookupStored(state),
      () => (options.fetchDetails ? this.fetchDetails(state, signal) : Promise.resolve()),
      () => this.embed(state, true, signal),
      () => this.persist(state),
      () => this.rank(state, topK, corpus),
    ]);
  }

  /**
   * Search each category by name and store embeddings for vendors not yet
   * stored. No query generation and no ranking.
   *
   * @throws VendorDiscoveryError for an empty category list
   */
  async collect(options: CollectOptions): Promise<RunResult> {
    const state = new PipelineState();
    state.categories = this.explicitCategories(options.categories);
    state.queries = state.categories.map((category) => ({ category, query: category }));
    state.stats.queries = state.queries.length;

    const { signal } = options;
    return this.execute(`collect: ${state.categories.join(', ')}`, options.location, state, signal, [
      () => this.search(state, options.location, signal),
      () => this.lookupStored(state),
      () => (options.fetchDetails ? this.fetchDetails(state, signal) : Promise.resolve()),
      () => this.embed(state, false, signal),
      () => this.persist(state),
    ]);
  }

  private explicitCategories(categories: readonly string[]): string[] {
    const normalized = normalizeCategories(categories, Number.POSITIVE_INFINITY);
    if (normalized.length === 0) {
      throw new VendorDiscoveryError('At least one category is required');
    }
    return normalized;
  }

  /**
   * Run stages in order. A stage returning `false` ends the run early
   * without marking it cancelled. On cancellation, embedded vendors not yet
   * written are persisted before the result is built.
   */
  private async execute(
    eventDescription: string,
    location: SearchLocation,
    state: PipelineState,
    signal: AbortSignal | undefined,
    steps: StageStep[]
  ): Promise<RunResult> {
    const startedAt = this.now();
    const runId = generateRunId(eventDescription, startedAt);
    this.logger.info(`Run ${runId} started`);

    let cancelled = false;
    for (const step of steps) {
      if (signal?.aborted) {
        cancelled = true;
        this.logger.warn(`Run ${runId} cancelled`);
        break;
      }
      const proceed = await step();
      if (proceed === false) {
        break;
      }
    }

    if (cancelled && state.hasUnstoredVectors()) {
      await this.persist(state);
    }

    const completedAt = this.now();
    const vendors = [...state.vendors].map(([id, vendor]) => ({
      id,
      name: vendor.place.name,
      categories: [...vendor.categories],
      formattedAddress: vendor.place.formattedAddress,
      rating: vendor.place.rating,
      isNew: state.storedIds.has(id),
    }));

    state.stats.categories = state.categories.length;
    const result: RunResult = {
      runId,
      eventDescription,
      location,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      cancelled,
      categories: state.rankings,
      vendors,
      failures: state.failures,
      stats: {
        ...state.stats,
        uniqueVendors: vendors.length,
        newVendors: vendors.filter((vendor) => vendor.isNew).length,
        failures: state.failures.length,
        durationMs: completedAt.getTime() - startedAt.getTime(),
      },
    };

    this.logger.info(
      `Run ${runId} finished: ${result.categories.length} ranking(s), ${vendors.length} vendor(s), ${state.failures.length} failure(s)`
    );
    return result;
  }

  // ==========================================================================
  // Stages
  // ==========================================================================

  private async deriveCategories(
    state: PipelineState,
    description: string,
    signal?: AbortSignal
  ): Promise<boolean> {
    const item = await this.dispatchers.query.deriveCategories(description, signal);
    if (!item.ok) {
      state.fail('categories', item.key, item.error);
      this.logger.error(`Could not derive vendor categories: ${item.error.message}`);
      return false;
    }
    state.categories = item.value;
    this.logger.info(`Categories: ${state.categories.join(', ')}`);
    return true;
  }

  private async generateQueries(
    state: PipelineState,
    description: string,
    signal?: AbortSignal
  ): Promise<void> {
    const items = await this.dispatchers.query.generateQueries(description, state.categories, signal);
    for (const item of items) {
      if (item.ok) {
        state.queries.push(item.value);
      } else {
        state.fail('queries', item.key, item.error, item.input);
      }
    }
    state.stats.queries = state.queries.length;
  }

  private async search(
    state: PipelineState,
    location: SearchLocation,
    signal?: AbortSignal
  ): Promise<void> {
    const items = await this.dispatchers.placesSearch.searchBatch(state.queries, location, signal);
    const searched: CategoryQuery[] = [];

    for (const item of items) {
      const { category } = item.input;
      if (!item.ok) {
        state.fail('search', item.key, item.error, category);
        continue;
      }
      searched.push(item.input);
      state.stats.placesFound += item.value.length;

      const ids: string[] = [];
      for (const place of item.value) {
        if (!place.placeId || ids.includes(place.placeId)) {
          continue;
        }
        ids.push(place.placeId);
        const vendor = state.vendors.get(place.placeId);
        if (vendor) {
          if (!vendor.categories.includes(category)) {
            vendor.categories.push(category);
          }
        } else {
          state.vendors.set(place.placeId, { place, categories: [category] });
        }
      }
      state.categoryVendors.set(category, ids);
    }

    // Categories whose search failed take no further part.
    state.queries = searched;
    this.logger.info(`Found ${state.vendors.size} unique vendor(s) across ${searched.length} categories`);
  }

  private async lookupStored(state: PipelineState): Promise<void> {
    const ids = [...state.vendors.keys()];
    if (ids.length === 0) {
      return;
    }
    try {
      const records = await this.store.fetchAll({ ids });
      for (const record of records) {
        const vendor = state.vendors.get(record.id);
        if (vendor) {
          vendor.existing = record;
        }
      }
    } catch (error) {
      // Without the lookup every vendor is treated as new.
      state.fail('persist', 'lookup', error);
      this.logger.warn(`Stored vendor lookup failed: ${summarizeError(error).message}`);
    }
  }

  private async fetchDetails(state: PipelineState, signal?: AbortSignal): Promise<void> {
    const pending = state.newVendors().map(([id]) => id);
    if (pending.length === 0) {
      return;
    }
    const items = await this.dispatchers.placesDetail.detailsBatch(pending, signal);
    for (const item of items) {
      const vendor = state.vendors.get(item.input);
      if (!vendor) {
        continue;
      }
      if (item.ok) {
        vendor.place = mergeDetail(vendor.place, item.value);
        state.stats.detailsFetched++;
      } else {
        // The search result still describes the vendor.
        state.fail('details', item.key, item.error);
      }
    }
  }

  private async embed(state: PipelineState, includeQueries: boolean, signal?: AbortSignal): Promise<void> {
    const vendorInputs = state.newVendors().map(([id, vendor]) => ({
      key: `vendor:${id}`,
      text: buildEmbeddingText(vendor.place),
      vendorId: id,
    }));
    const queryInputs = includeQueries
      ? state.queries.map((query) => ({
          key: `query:${query.category}`,
          text: query.query,
          category: query.category,
        }))
      : [];

    const vendorIds = new Map(vendorInputs.map((input) => [input.key, input.vendorId]));
    const categories = new Map(queryInputs.map((input) => [input.key, input.category]));
    const inputs = [...vendorInputs, ...queryInputs].map(({ key, text }) => ({ key, text }));
    if (inputs.length === 0) {
      return;
    }

    const items = await this.dispatchers.embedding.embedBatch(inputs, signal);
    for (const item of items) {
      const vendorId = vendorIds.get(item.key);
      const category = categories.get(item.key);

      if (vendorId !== undefined) {
        const vendor = state.vendors.get(vendorId);
        if (item.ok && vendor) {
          vendor.vector = item.value;
          state.stats.embedded++;
        } else if (!item.ok) {
          state.fail('embedding', vendorId, item.error);
        }
      } else if (category !== undefined) {
        if (item.ok) {
          state.queryVectors.set(category, item.value);
        } else {
          state.fail('embedding', category, item.error, category);
        }
      }
    }
  }

  /**
   * Write records one at a time, keyed by place id. Vendors stored by an
   * earlier run are rewritten only when this run found them under a new
   * category.
   */
  private async persist(state: PipelineState): Promise<void> {
    state.persisted = true;
    for (const [id, vendor] of state.vendors) {
      let record: EmbeddingRecord | undefined;
      if (vendor.vector) {
        record = { id, vector: vendor.vector, metadata: placeToVendor(vendor.place, vendor.categories) };
      } else if (vendor.existing) {
        const known = vendor.existing.metadata.categories;
        if (vendor.categories.some((category) => !known.includes(category))) {
          record = {
            id,
            vector: vendor.existing.vector,
            metadata: placeToVendor(vendor.place, vendor.categories),
          };
        }
      }
      if (!record) {
        continue;
      }

      try {
        await this.store.upsert(record);
        if (vendor.vector) {
          state.storedIds.add(id);
          state.stats.stored++;
        }
      } catch (error) {
        state.fail('persist', id, error);
      }
    }
    this.logger.info(`Stored ${state.stats.stored} new vendor(s)`);
  }

  private async rank(state: PipelineState, topK: number, corpus: CorpusScope): Promise<void> {
    let everything: EmbeddingRecord[] | undefined;

    for (const { category, query } of state.queries) {
      const vector = state.queryVectors.get(category);
      if (!vector) {
        continue;
      }

      try {
        let records: EmbeddingRecord[];
        if (corpus === 'all') {
          everything = everything ?? (await this.store.fetchAll());
          records = everything;
        } else {
          records = await this.store.fetchAll({ ids: state.categoryVendors.get(category) ?? [] });
        }

        const report = this.engine.rankDetailed(vector, records, topK);
        state.rankings.push({
          category,
          query,
          results: report.results,
          excluded: report.excluded.map((entry) => entry.id),
        });
        state.stats.ranked += report.results.length;
      } catch (error) {
        state.fail('rank', category, error, category);
      }
    }
  }
}
