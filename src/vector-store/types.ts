/**
 * Vector Store Types
 * Contract between the core and the persisted vector store.
 */

import type { Chunk, ChunkMetadata } from '../collections/types.js';

export interface ScoredHit {
  chunk: Chunk;
  score: number;
}

/**
 * Outcome of a scored search. Stores that cannot score report `unsupported`
 * instead of throwing, so callers can fall back to an unscored search.
 */
export type ScoredSearchOutcome =
  | { status: 'scored'; hits: ScoredHit[] }
  | { status: 'unsupported'; reason: string };

/**
 * Read-only handle over one collection namespace.
 */
export interface StoreHandle {
  readonly collection: string;
  /** False when the store has never seen this namespace */
  readonly exists: boolean;

  count(): Promise<number>;
  /** Peek at up to `limit` chunk metadata entries */
  sampleMetadata(limit: number): Promise<ChunkMetadata[]>;
  searchWithScores(queryText: string, topK: number): Promise<ScoredSearchOutcome>;
  search(queryText: string, topK: number): Promise<Chunk[]>;
}

/**
 * Opens collection handles inside one persisted store root.
 */
export interface VectorStoreAdapter {
  readonly rootPath: string;

  open(collection: string): Promise<StoreHandle>;
  /** Every namespace present in the store, in the store's listing order */
  listNamespaces(): Promise<string[]>;
  /** Bytes used by the store root (shared by all collections) */
  storageSize(): Promise<number>;
}
