/**
 * Ranking Module Exports
 *
 * @module ranking
 */

export {
  cosineSimilarity,
  dot,
  norm,
  normalizeVector,
  SimilarityEngine,
  type ExcludedRecord,
  type ExclusionReason,
  type RankingReport,
  type SimilarityResult,
  type VectorEntry,
} from './similarity.js';
