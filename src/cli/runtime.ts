/**
 * CLI Runtime
 *
 * Wires configuration into clients, dispatchers, the vector store and the
 * pipeline. Everything that can fail on configuration fails here, before
 * any external call is made.
 *
 * @module cli/runtime
 */

import { OpenAIEmbeddingClient, GeminiEmbeddingClient } from '../clients/embeddings.js';
import { PlacesClient } from '../clients/places.js';
import { GeminiQueryGenerator } from '../clients/query-generator.js';
import type { EmbeddingClient } from '../clients/types.js';
import { missingApiKeys, requireApiKey, type Config } from '../config/index.js';
import { createVendorDispatchers } from '../dispatch/vendor-dispatchers.js';
import { ConfigError } from '../errors/index.js';
import { VendorPipeline } from '../pipeline/vendor-pipeline.js';
import { LanceVectorStore } from '../storage/lance.js';
import { getVectorDbDir } from '../storage/paths.js';
import type { Logger } from '../utils/logger.js';

export interface Runtime {
  pipeline: VendorPipeline;
  close(): Promise<void>;
}

export type RuntimeFactory = (config: Config, dataDir: string, logger: Logger) => Promise<Runtime>;

function createEmbeddingClient(config: Config): EmbeddingClient {
  const { provider, dimensions } = config.embedding;
  if (provider === 'gemini') {
    return new GeminiEmbeddingClient({
      apiKey: requireApiKey(config, 'gemini'),
      model: config.models.embedding,
      dimensions,
    });
  }
  return new OpenAIEmbeddingClient({
    apiKey: requireApiKey(config, 'openai'),
    model: config.models.embedding,
    dimensions,
  });
}

/**
 * Build the production runtime.
 *
 * @throws ConfigError when API keys are missing
 * @throws RateLimitMisconfiguredError on invalid quota settings
 */
export const createRuntime: RuntimeFactory = async (config, dataDir, logger) => {
  const missing = missingApiKeys(config);
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required API key(s): ${missing.join(', ')}. Please set them in your .env file.`
    );
  }

  const dispatchers = createVendorDispatchers(
    config,
    {
      queries: new GeminiQueryGenerator({
        apiKey: requireApiKey(config, 'gemini'),
        modelId: config.models.query,
      }),
      places: new PlacesClient({
        apiKey: requireApiKey(config, 'googleMaps'),
        timeoutMs: config.requestTimeoutMs,
      }),
      embeddings: createEmbeddingClient(config),
    },
    logger
  );

  const store = new LanceVectorStore({
    path: getVectorDbDir(dataDir),
    dimensions: config.embedding.dimensions,
  });

  return {
    pipeline: new VendorPipeline({ dispatchers, store, topK: config.ranking.topK, logger }),
    close: () => store.close(),
  };
};
