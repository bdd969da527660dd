/**
 * Collection Types
 * Shared shapes for collections, chunks and retrieval results.
 */

/** Scalar values a chunk's metadata may hold. */
export type MetadataValue = string | number | boolean | null;

export type ChunkMetadata = Record<string, MetadataValue>;

/**
 * A logical collection registration.
 */
export interface CollectionRegistration {
  /** Unique collection name, also the store namespace */
  name: string;
  /** Display label of the document the collection was built from */
  sourceDocument?: string;
}

/**
 * One embedded span of document text.
 */
export interface Chunk {
  /** Chunk text content */
  content: string;
  /** Chunk metadata; `source` names the originating file when ingestion set it */
  metadata: ChunkMetadata;
}

/**
 * One retrieval hit. `score` is undefined when the store could not score the search.
 */
export interface RetrievedChunk {
  chunk: Chunk;
  /** Store relevance measure (distance: lower is better) */
  score?: number;
}

/**
 * Ordered retrieval hits, best first, as returned by the store.
 */
export interface RetrievalResult {
  collection: string;
  query: string;
  topK: number;
  /** Whether the store produced scores for this search */
  scored: boolean;
  results: RetrievedChunk[];
}

/**
 * Per-collection statistics.
 */
export interface CollectionStats {
  name: string;
  /** Number of chunks */
  count: number;
  /** Distinct `source` values seen in a bounded sample */
  sampleSources: string[];
  /** Set when the collection could not be inspected */
  error?: string;
}

/**
 * Answer produced by a RAG chain.
 */
export interface RAGAnswer {
  question: string;
  answer: string;
}
