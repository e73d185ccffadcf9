/**
 * Similarity Engine
 *
 * Exact cosine top-k over an in-memory or streamed corpus. Results are
 * ordered by descending score, ties broken by ascending id, so the same
 * inputs always produce the same ranking.
 *
 * @module ranking/similarity
 */

import { InvalidVectorError } from '../errors/index.js';
import { silentLogger, type Logger } from '../utils/logger.js';

// ============================================================================
// Vector helpers
// ============================================================================

export function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i++) {
    sum += a[i] * b[i];
  }
  return sum;
}

export function norm(vector: readonly number[]): number {
  return Math.sqrt(dot(vector, vector));
}

/**
 * Cosine similarity in [-1, 1].
 *
 * @throws InvalidVectorError on differing dimensions or a zero-norm vector
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new InvalidVectorError(`Cannot compare vectors of dimension ${a.length} and ${b.length}`);
  }
  const denominator = norm(a) * norm(b);
  if (denominator === 0) {
    throw new InvalidVectorError('Cosine similarity is undefined for a zero vector');
  }
  return dot(a, b) / denominator;
}

/**
 * Scale a vector to unit length.
 *
 * @throws InvalidVectorError for an empty or zero-norm vector
 */
export function normalizeVector(vector: readonly number[]): number[] {
  const length = norm(vector);
  if (vector.length === 0 || length === 0 || !Number.isFinite(length)) {
    throw new InvalidVectorError('Cannot normalize an empty or zero-norm vector');
  }
  return vector.map((value) => value / length);
}

// ============================================================================
// Types
// ============================================================================

/**
 * Anything with an id and a vector; embedding records qualify.
 */
export interface VectorEntry {
  id: string;
  vector: readonly number[];
}

export interface SimilarityResult {
  id: string;
  score: number;
  /** 1-based position in the ranking */
  rank: number;
}

export type ExclusionReason = 'dimension-mismatch' | 'zero-norm';

export interface ExcludedRecord {
  id: string;
  reason: ExclusionReason;
  dimension: number;
}

export interface RankingReport {
  results: SimilarityResult[];
  excluded: ExcludedRecord[];
}

// ============================================================================
// Top-k buffer
// ============================================================================

interface Scored {
  id: string;
  score: number;
}

/** True when `a` ranks ahead of `b` */
function ranksBefore(a: Scored, b: Scored): boolean {
  if (a.score !== b.score) {
    return a.score > b.score;
  }
  return a.id < b.id;
}

/**
 * Sorted buffer holding at most `k` entries, best first.
 */
class TopK {
  private readonly items: Scored[] = [];

  constructor(private readonly k: number) {}

  offer(candidate: Scored): void {
    if (this.k <= 0) {
      return;
    }
    const last = this.items[this.items.length - 1];
    if (this.items.length >= this.k && last && !ranksBefore(candidate, last)) {
      return;
    }

    let low = 0;
    let high = this.items.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if (ranksBefore(this.items[mid], candidate)) {
        low = mid + 1;
      } else {
        high = mid;
      }
    }
    this.items.splice(low, 0, candidate);
    if (this.items.length > this.k) {
      this.items.pop();
    }
  }

  toResults(): SimilarityResult[] {
    return this.items.map((item, index) => ({ id: item.id, score: item.score, rank: index + 1 }));
  }
}

// ============================================================================
// Engine
// ============================================================================

export class SimilarityEngine {
  constructor(private readonly logger: Logger = silentLogger) {}

  /**
   * Top-k records by cosine similarity to `query`.
   *
   * @throws InvalidVectorError if the query is empty or has zero norm
   */
  rank(query: readonly number[], corpus: Iterable<VectorEntry>, k: number): SimilarityResult[] {
    return this.rankDetailed(query, corpus, k).results;
  }

  /**
   * As {@link rank}, also reporting records left out for a mismatched
   * dimension or zero norm.
   */
  rankDetailed(query: readonly number[], corpus: Iterable<VectorEntry>, k: number): RankingReport {
    const scorer = this.createScorer(query, k);
    for (const entry of corpus) {
      scorer.add(entry);
    }
    return scorer.finish();
  }

  /**
   * Rank a corpus delivered in batches, e.g. pages read from a store.
   * Produces exactly what {@link rankDetailed} would over the concatenation.
   */
  async rankStream(
    query: readonly number[],
    batches: AsyncIterable<readonly VectorEntry[]>,
    k: number
  ): Promise<RankingReport> {
    const scorer = this.createScorer(query, k);
    for await (const batch of batches) {
      for (const entry of batch) {
        scorer.add(entry);
      }
    }
    return scorer.finish();
  }

  private createScorer(
    query: readonly number[],
    k: number
  ): { add(entry: VectorEntry): void; finish(): RankingReport } {
    const queryNorm = norm(query);
    if (query.length === 0 || queryNorm === 0 || !Number.isFinite(queryNorm)) {
      throw new InvalidVectorError('Query vector must be non-empty with non-zero norm');
    }

    const top = new TopK(Math.floor(k));
    const excluded: ExcludedRecord[] = [];
    const logger = this.logger;

    return {
      add(entry: VectorEntry): void {
        if (entry.vector.length !== query.length) {
          excluded.push({ id: entry.id, reason: 'dimension-mismatch', dimension: entry.vector.length });
          logger.warn(
            `Excluding '${entry.id}': dimension ${entry.vector.length}, expected ${query.length}`
          );
          return;
        }
        const entryNorm = norm(entry.vector);
        if (entryNorm === 0 || !Number.isFinite(entryNorm)) {
          excluded.push({ id: entry.id, reason: 'zero-norm', dimension: entry.vector.length });
          logger.warn(`Excluding '${entry.id}': zero-norm vector`);
          return;
        }
        top.offer({ id: entry.id, score: dot(query, entry.vector) / (queryNorm * entryNorm) });
      },
      finish(): RankingReport {
        return { results: top.toResults(), excluded };
      },
    };
  }
}
