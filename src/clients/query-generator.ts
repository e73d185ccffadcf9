/**
 * Gemini Query Generator
 *
 * Derives vendor categories from an event description and writes one
 * place-search query per category. Retries and timeouts belong to the
 * worker pool; this client makes exactly one model call per method.
 *
 * @module clients/query-generator
 */

import { GoogleGenerativeAI, type GenerateContentRequest } from '@google/generative-ai';
import { z } from 'zod';
import { PermanentServiceError } from '../errors/index.js';
import { buildCategoryPrompt, buildQueryPrompt, MAX_CATEGORIES } from './prompts.js';
import type { QueryGenerator, RequestOptions } from './types.js';

/** Default Gemini model for query generation */
export const DEFAULT_QUERY_MODEL = 'gemini-1.5-flash';

/**
 * The slice of the SDK's GenerativeModel this client uses.
 */
export interface TextModel {
  generateContent(
    request: GenerateContentRequest,
    options?: RequestOptions
  ): Promise<{ response: { text(): string } }>;
}

export interface GeminiQueryGeneratorOptions {
  apiKey: string;
  modelId?: string;
  temperature?: number;
  /** Pre-built model; the API key is unused when given */
  model?: TextModel;
}

const CategoriesSchema = z.object({
  categories: z.array(z.string()),
});

/**
 * Extract JSON from model output: raw, fenced in a code block, or embedded
 * in prose.
 *
 * @throws Error if no JSON can be parsed
 */
export function extractJson(text: string): unknown {
  let cleanText = text.trim();

  const codeBlockMatch = cleanText.match(/```(?:json)?\s*\n?([\s\S]*?)\n?```/);
  if (codeBlockMatch) {
    cleanText = codeBlockMatch[1].trim();
  }

  if (!cleanText.startsWith('{') && !cleanText.startsWith('[')) {
    const jsonMatch = cleanText.match(/(\{[\s\S]*\}|\[[\s\S]*\])/);
    if (jsonMatch) {
      cleanText = jsonMatch[1];
    }
  }

  try {
    return JSON.parse(cleanText);
  } catch {
    throw new Error(`Failed to parse JSON from model response: ${text.substring(0, 200)}`);
  }
}

/**
 * Trim, lowercase and de-duplicate categories, keeping first-seen order.
 */
export function normalizeCategories(
  categories: readonly string[],
  limit: number = MAX_CATEGORIES
): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const raw of categories) {
    const category = raw.trim().toLowerCase();
    if (category && !seen.has(category)) {
      seen.add(category);
      result.push(category);
    }
  }
  return result.slice(0, limit);
}

/**
 * Strip quotes and a leading label from a one-line query response.
 */
export function cleanQuery(text: string): string {
  const firstLine = text.trim().split('\n')[0] ?? '';
  return firstLine
    .replace(/^(search\s+)?query\s*:\s*/i, '')
    .replace(/^["'`]+|["'`]+$/g, '')
    .trim();
}

export class GeminiQueryGenerator implements QueryGenerator {
  readonly modelId: string;

  private readonly model: TextModel;
  private readonly temperature: number;

  constructor(options: GeminiQueryGeneratorOptions) {
    this.modelId = options.modelId ?? DEFAULT_QUERY_MODEL;
    this.temperature = options.temperature ?? 0.3;
    this.model =
      options.model ?? new GoogleGenerativeAI(options.apiKey).getGenerativeModel({ model: this.modelId });
  }

  async deriveCategories(eventDescription: string, options: RequestOptions = {}): Promise<string[]> {
    const text = await this.generate(buildCategoryPrompt(eventDescription), true, options);

    let json: unknown;
    try {
      json = extractJson(text);
    } catch (error) {
      throw new PermanentServiceError(
        error instanceof Error ? error.message : String(error),
        'query',
        undefined,
        { cause: error }
      );
    }

    // A bare array is accepted as the category list.
    const parsed = CategoriesSchema.safeParse(Array.isArray(json) ? { categories: json } : json);
    if (!parsed.success) {
      throw new PermanentServiceError(`Malformed category response: ${parsed.error.message}`, 'query');
    }

    const categories = normalizeCategories(parsed.data.categories);
    if (categories.length === 0) {
      throw new PermanentServiceError('Model returned no vendor categories', 'query');
    }
    return categories;
  }

  async generateQuery(
    eventDescription: string,
    category: string,
    options: RequestOptions = {}
  ): Promise<string> {
    const text = await this.generate(buildQueryPrompt(eventDescription, category), false, options);
    const query = cleanQuery(text);
    if (!query) {
      throw new PermanentServiceError(`Empty query generated for '${category}'`, 'query');
    }
    return query;
  }

  private async generate(prompt: string, jsonMode: boolean, options: RequestOptions): Promise<string> {
    const response = await this.model.generateContent(
      {
        contents: [{ role: 'user', parts: [{ text: prompt }] }],
        generationConfig: {
          temperature: this.temperature,
          ...(jsonMode && { responseMimeType: 'application/json' }),
        },
      },
      { signal: options.signal }
    );

    const text = response.response.text();
    if (!text) {
      throw new PermanentServiceError('Empty response from model', 'query');
    }
    return text;
  }
}
