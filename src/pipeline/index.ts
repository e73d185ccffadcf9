/**
 * Pipeline Module
 *
 * @module pipeline
 */

export { DEFAULT_TOP_K, mergeDetail, VendorPipeline, type VendorPipelineDeps } from './vendor-pipeline.js';
export type {
  CategoryRanking,
  CollectOptions,
  CorpusScope,
  PipelineStage,
  RunFailure,
  RunOptions,
  RunResult,
  RunStats,
  VendorSummary,
} from './types.js';
