/**
 * Pipeline Type Definitions
 *
 * Run options, the per-run result document and its failure manifest.
 *
 * @module pipeline/types
 */

import type { ErrorSummary } from '../errors/index.js';
import type { SimilarityResult } from '../ranking/similarity.js';
import type { SearchLocation } from '../vendors/types.js';

/**
 * Stages in run order. Each stage waits for the previous one to drain.
 */
export type PipelineStage =
  | 'categories'
  | 'queries'
  | 'search'
  | 'details'
  | 'embedding'
  | 'persist'
  | 'rank';

export type CorpusScope = 'discovered' | 'all';

export interface RunOptions {
  eventDescription: string;
  location: SearchLocation;
  /** Use these categories instead of deriving them */
  categories?: readonly string[];
  /** Results per category (default: configured topK) */
  topK?: number;
  /** Fetch place details for new vendors before embedding (default: false) */
  fetchDetails?: boolean;
  /**
   * Rank each category against the vendors its search found ('discovered',
   * default) or against every stored vendor ('all')
   */
  corpus?: CorpusScope;
  signal?: AbortSignal;
}

export interface CollectOptions {
  /** Categories searched by name, without query generation */
  categories: readonly string[];
  location: SearchLocation;
  fetchDetails?: boolean;
  signal?: AbortSignal;
}

/**
 * One failed item, attached to the stage and category it affected.
 */
export interface RunFailure {
  stage: PipelineStage;
  /** Batch correlation key (category, place id, ...) */
  key: string;
  category?: string;
  error: ErrorSummary;
}

export interface CategoryRanking {
  category: string;
  query: string;
  results: SimilarityResult[];
  /** Records left out for a mismatched dimension or zero norm */
  excluded: string[];
}

export interface VendorSummary {
  id: string;
  name: string;
  categories: string[];
  formattedAddress?: string;
  rating?: number;
  /** A new embedding for this vendor was written during this run */
  isNew: boolean;
}

export interface RunStats {
  categories: number;
  queries: number;
  placesFound: number;
  uniqueVendors: number;
  newVendors: number;
  detailsFetched: number;
  embedded: number;
  stored: number;
  ranked: number;
  failures: number;
  durationMs: number;
}

export interface RunResult {
  runId: string;
  eventDescription: string;
  location: SearchLocation;
  /** ISO8601 */
  startedAt: string;
  /** ISO8601 */
  completedAt: string;
  /** The run stopped early on its abort signal */
  cancelled: boolean;
  categories: CategoryRanking[];
  vendors: VendorSummary[];
  failures: RunFailure[];
  stats: RunStats;
}
