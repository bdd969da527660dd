/**
 * Collection Service
 * Orchestrates the registry, vector store, retrieval, stats and RAG chains
 * for the console and HTTP transports.
 */

import type { RAGAnswerWithSources, RAGChain, RAGChainBuilder } from '../rag/chain.js';
import type { RetrievalService } from '../retrieval/service.js';
import type { StoreHandle, VectorStoreAdapter } from '../vector-store/types.js';
import type { CollectionRegistry } from './registry.js';
import type { StatsAggregator } from './stats.js';
import type { CollectionRegistration, CollectionStats, RetrievalResult } from './types.js';

export interface CollectionServiceSettings {
  /** Default retrieval breadth */
  topK: number;
  embeddingModel: string;
  llmModel: string;
  llmApiKey: string;
}

export interface CollectionServiceDeps {
  registry: CollectionRegistry;
  store: VectorStoreAdapter;
  retrieval: RetrievalService;
  stats: StatsAggregator;
  chainBuilder: RAGChainBuilder;
  settings: CollectionServiceSettings;
}

/**
 * Display information about one collection.
 */
export interface CollectionInfo {
  name: string;
  sourceDocument?: string;
  /** False when the store has no namespace for this name yet */
  exists: boolean;
  count: number;
  /** Size of the whole store root, shared across collections */
  storageBytes: number;
  embeddingModel: string;
  persistDir: string;
}

export class CollectionService {
  private registry: CollectionRegistry;
  private store: VectorStoreAdapter;
  private retrieval: RetrievalService;
  private stats: StatsAggregator;
  private chainBuilder: RAGChainBuilder;
  private settings: CollectionServiceSettings;

  constructor(deps: CollectionServiceDeps) {
    this.registry = deps.registry;
    this.store = deps.store;
    this.retrieval = deps.retrieval;
    this.stats = deps.stats;
    this.chainBuilder = deps.chainBuilder;
    this.settings = deps.settings;
  }

  get defaultTopK(): number {
    return this.settings.topK;
  }

  listRegistered(): CollectionRegistration[] {
    return this.registry.list();
  }

  /**
   * Stats for every collection in the store, registered or not.
   */
  async listAll(): Promise<CollectionStats[]> {
    return this.stats.listAll();
  }

  /**
   * Resolve a registered name and open its handle.
   */
  async open(name: string): Promise<{ handle: StoreHandle; sourceDocument?: string }> {
    const sourceDocument = this.registry.resolve(name);
    const handle = await this.store.open(name);
    return { handle, sourceDocument };
  }

  async info(name: string): Promise<CollectionInfo> {
    const { handle, sourceDocument } = await this.open(name);
    const [count, storageBytes] = await Promise.all([handle.count(), this.store.storageSize()]);

    return {
      name,
      sourceDocument,
      exists: handle.exists,
      count,
      storageBytes,
      embeddingModel: this.settings.embeddingModel,
      persistDir: this.store.rootPath,
    };
  }

  async retrieve(name: string, query: string, topK: number = this.settings.topK): Promise<RetrievalResult> {
    const { handle } = await this.open(name);
    return this.retrieval.retrieve(handle, query, topK);
  }

  /**
   * Build a RAG chain over a registered collection with the configured model.
   */
  async createChain(name: string, topK: number = this.settings.topK): Promise<RAGChain> {
    const { handle } = await this.open(name);
    return this.chainBuilder.build(handle, topK, this.settings.llmApiKey, this.settings.llmModel);
  }

  async ask(name: string, question: string, topK?: number): Promise<RAGAnswerWithSources> {
    const chain = await this.createChain(name, topK);
    return chain.askWithSources(question);
  }
}
