/**
 * Collections Module
 * Registry, stats and orchestration over the persisted vector store.
 */

export type {
  Chunk,
  ChunkMetadata,
  MetadataValue,
  CollectionRegistration,
  CollectionStats,
  RAGAnswer,
  RetrievalResult,
  RetrievedChunk,
} from './types.js';

export { CollectionRegistry } from './registry.js';
export { StatsAggregator, DEFAULT_SAMPLE_SIZE, DEFAULT_MAX_SOURCES } from './stats.js';
export { CollectionService } from './service.js';
export type { CollectionInfo, CollectionServiceDeps, CollectionServiceSettings } from './service.js';
export { createCollectionRoutes } from './routes.js';
