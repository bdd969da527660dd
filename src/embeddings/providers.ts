/**
 * Embedding Providers
 * API-backed embedding functions. One is created per process and shared.
 */

import { InvalidConfigurationError, MissingCredentialError } from '../errors.js';
import type { EmbeddingConfig, EmbeddingProvider } from './types.js';

/**
 * A missing key only matters once a query has to be embedded, so listing and
 * inspecting collections work without one.
 */
function requireApiKey(apiKey: string): void {
  if (!apiKey.trim()) {
    throw new MissingCredentialError('EMBEDDING_API_KEY', 'similaritySearch', 'queries are embedded with it');
  }
}

const OPENAI_DIMENSIONS: Record<string, number> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
};

/**
 * OpenAI-compatible embedding provider (OpenAI, or any server exposing /embeddings).
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private apiKey: string;
  private baseUrl: string;
  private dimensions: number;

  constructor(
    apiKey: string,
    model: string = 'text-embedding-3-small',
    baseUrl: string = 'https://api.openai.com/v1'
  ) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl;
    this.dimensions = OPENAI_DIMENSIONS[model] ?? 1536;
  }

  async embed(text: string): Promise<number[]> {
    const [embedding] = await this.embedBatch([text]);
    if (!embedding || embedding.length === 0) {
      throw new Error('OpenAI embedding API returned no embedding');
    }
    return embedding;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    requireApiKey(this.apiKey);

    const response = await fetch(`${this.baseUrl}/embeddings`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        Authorization: `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        input: texts,
      }),
    });

    if (!response.ok) {
      throw new Error(`OpenAI embedding API error: ${response.status}`);
    }

    const data = (await response.json()) as { data?: Array<{ embedding: number[] }> };
    return data.data?.map((item) => item.embedding) || [];
  }

  getDimensions(): number {
    return this.dimensions;
  }
}

/**
 * Google embedding provider (text-embedding-004 by default).
 */
export class GoogleEmbeddingProvider implements EmbeddingProvider {
  readonly model: string;
  private apiKey: string;
  private baseUrl = 'https://generativelanguage.googleapis.com/v1beta';
  private dimensions = 768;

  constructor(apiKey: string, model: string = 'text-embedding-004') {
    this.apiKey = apiKey;
    this.model = model;
  }

  async embed(text: string): Promise<number[]> {
    requireApiKey(this.apiKey);
    const url = `${this.baseUrl}/models/${this.model}:embedContent?key=${this.apiKey}`;

    const response = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        model: `models/${this.model}`,
        content: { parts: [{ text }] },
      }),
    });

    if (!response.ok) {
      throw new Error(`Google embedding API error: ${response.status}`);
    }

    const data = (await response.json()) as { embedding?: { values?: number[] } };
    const values = data.embedding?.values;
    if (!values || values.length === 0) {
      throw new Error('Google embedding API returned no embedding');
    }
    return values;
  }

  async embedBatch(texts: string[]): Promise<number[][]> {
    // No batch endpoint, so we parallelize
    return Promise.all(texts.map((text) => this.embed(text)));
  }

  getDimensions(): number {
    return this.dimensions;
  }
}

/**
 * Create the process-wide embedding provider.
 */
export function createEmbeddingProvider(config: EmbeddingConfig): EmbeddingProvider {
  if (!config.model.trim()) {
    throw new InvalidConfigurationError('EMBEDDING_MODEL', 'must not be empty', 'startup');
  }
  switch (config.provider) {
    case 'google':
      return new GoogleEmbeddingProvider(config.apiKey, config.model);

    case 'openai':
    default:
      return new OpenAIEmbeddingProvider(config.apiKey, config.model, config.baseUrl);
  }
}
