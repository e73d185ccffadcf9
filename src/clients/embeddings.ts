/**
 * Embedding Clients
 *
 * OpenAI and Gemini implementations of {@link EmbeddingClient}. Each call
 * embeds one text; batching, rate limiting and retries are the
 * dispatcher's concern.
 *
 * @module clients/embeddings
 */

import { GoogleGenerativeAI, TaskType, type EmbedContentRequest } from '@google/generative-ai';
import OpenAI from 'openai';
import { PermanentServiceError } from '../errors/index.js';
import { normalizeVector } from '../ranking/similarity.js';
import type { EmbeddingClient, RequestOptions } from './types.js';

/**
 * Approximate characters per token (conservative estimate)
 */
const CHARS_PER_TOKEN = 4;

/** Input token ceiling shared by both providers' small models */
const MAX_INPUT_TOKENS = 8000;

export const DEFAULT_OPENAI_EMBEDDING_MODEL = 'text-embedding-3-small';
export const DEFAULT_GEMINI_EMBEDDING_MODEL = 'gemini-embedding-001';

/**
 * Trim and truncate input text.
 *
 * @throws PermanentServiceError if the text is empty
 */
export function prepareInput(text: string): string {
  const trimmed = text.trim();
  if (trimmed.length === 0) {
    throw new PermanentServiceError('Input text cannot be empty', 'embedding');
  }
  const maxLength = MAX_INPUT_TOKENS * CHARS_PER_TOKEN;
  return trimmed.length > maxLength ? trimmed.slice(0, maxLength) : trimmed;
}

// ============================================================================
// OpenAI
// ============================================================================

/**
 * The slice of the OpenAI SDK this client uses.
 */
export interface OpenAIEmbeddingsApi {
  embeddings: {
    create(params: {
      model: string;
      input: string;
      dimensions?: number;
    }, options?: RequestOptions): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

export interface OpenAIEmbeddingClientOptions {
  apiKey: string;
  model?: string;
  dimensions?: number;
  /** Pre-built SDK client; the API key is unused when given */
  client?: OpenAIEmbeddingsApi;
}

export class OpenAIEmbeddingClient implements EmbeddingClient {
  readonly dimensions: number;
  readonly model: string;

  private readonly client: OpenAIEmbeddingsApi;

  constructor(options: OpenAIEmbeddingClientOptions) {
    this.dimensions = options.dimensions ?? 1536;
    this.model = options.model ?? DEFAULT_OPENAI_EMBEDDING_MODEL;
    // SDK retries are disabled: the worker pool owns retry policy.
    this.client = options.client ?? new OpenAI({ apiKey: options.apiKey, maxRetries: 0 });
  }

  async embed(text: string, options: RequestOptions = {}): Promise<number[]> {
    const response = await this.client.embeddings.create(
      {
        model: this.model,
        input: prepareInput(text),
        dimensions: this.dimensions,
      },
      { signal: options.signal }
    );

    const first = response.data[0];
    if (!first) {
      throw new PermanentServiceError('No embedding returned from OpenAI', 'embedding');
    }
    return first.embedding;
  }
}

// ============================================================================
// Gemini
// ============================================================================

/**
 * The slice of the SDK's GenerativeModel this client uses.
 */
export interface EmbeddingModel {
  embedContent(
    request: EmbedContentRequest,
    options?: RequestOptions
  ): Promise<{ embedding: { values: number[] } }>;
}

export interface GeminiEmbeddingClientOptions {
  apiKey: string;
  model?: string;
  dimensions?: number;
  /** Pre-built model; the API key is unused when given */
  embeddingModel?: EmbeddingModel;
}

/**
 * Gemini embeddings, requested at a reduced output dimensionality and
 * normalized to unit length (reduced outputs are not normalized by the API).
 */
export class GeminiEmbeddingClient implements EmbeddingClient {
  readonly dimensions: number;
  readonly model: string;

  private readonly embeddingModel: EmbeddingModel;

  constructor(options: GeminiEmbeddingClientOptions) {
    this.dimensions = options.dimensions ?? 1536;
    this.model = options.model ?? DEFAULT_GEMINI_EMBEDDING_MODEL;
    this.embeddingModel =
      options.embeddingModel ??
      new GoogleGenerativeAI(options.apiKey).getGenerativeModel({ model: this.model });
  }

  async embed(text: string, options: RequestOptions = {}): Promise<number[]> {
    // The request body is serialized as given, so the dimensionality field
    // reaches the API even where the SDK's request type predates it.
    const request: EmbedContentRequest & { outputDimensionality: number } = {
      content: { role: 'user', parts: [{ text: prepareInput(text) }] },
      taskType: TaskType.SEMANTIC_SIMILARITY,
      outputDimensionality: this.dimensions,
    };

    const response = await this.embeddingModel.embedContent(request, { signal: options.signal });
    const values = response.embedding.values;
    if (values.length === 0) {
      throw new PermanentServiceError('No embedding returned from Gemini', 'embedding');
    }
    return normalizeVector(values);
  }
}
