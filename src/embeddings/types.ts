/**
 * Embedding Types
 */

export type EmbeddingProviderName = 'openai' | 'google';

/**
 * Embedding provider interface. One instance is shared by every open collection.
 */
export interface EmbeddingProvider {
  /** Embedding model identifier */
  readonly model: string;
  /** Generate embedding for a single text */
  embed(text: string): Promise<number[]>;
  /** Generate embeddings for multiple texts (batch) */
  embedBatch?(texts: string[]): Promise<number[][]>;
  /** Get the embedding dimension */
  getDimensions(): number;
}

export interface EmbeddingConfig {
  provider: EmbeddingProviderName;
  model: string;
  apiKey: string;
  baseUrl?: string;
}
