import type { CollectionStats } from './types.js';
import type { VectorStoreAdapter } from '../vector-store/types.js';

export const DEFAULT_SAMPLE_SIZE = 50;
export const DEFAULT_MAX_SOURCES = 5;

export interface StatsAggregatorOptions {
  /** Rows of metadata peeked per collection */
  sampleSize?: number;
  /** Distinct sources kept per collection */
  maxSources?: number;
}

/**
 * Stats Aggregator - count and sample sources for every namespace in the store.
 * Works from the store listing, not the registry, so dynamically ingested
 * collections show up too.
 */
export class StatsAggregator {
  private store: VectorStoreAdapter;
  private sampleSize: number;
  private maxSources: number;

  constructor(store: VectorStoreAdapter, options: StatsAggregatorOptions = {}) {
    this.store = store;
    this.sampleSize = options.sampleSize ?? DEFAULT_SAMPLE_SIZE;
    this.maxSources = options.maxSources ?? DEFAULT_MAX_SOURCES;
  }

  /**
   * Stats for every collection, in store listing order. A collection that
   * fails inspection is reported with count 0 and its error.
   */
  async listAll(): Promise<CollectionStats[]> {
    const names = await this.store.listNamespaces();
    const stats: CollectionStats[] = [];

    for (const name of names) {
      stats.push(await this.inspect(name));
    }

    const degraded = stats.filter((s) => s.error !== undefined).length;
    console.log(`[Stats] Inspected ${stats.length} collections in ${this.store.rootPath}${degraded > 0 ? ` (${degraded} degraded)` : ''}`);

    return stats;
  }

  private async inspect(name: string): Promise<CollectionStats> {
    try {
      const handle = await this.store.open(name);
      const count = await handle.count();
      const metadata = await handle.sampleMetadata(this.sampleSize);

      const sources = new Set<string>();
      for (const entry of metadata) {
        if (sources.size >= this.maxSources) break;
        const source = entry.source;
        if (source !== undefined && source !== null && source !== '') {
          sources.add(String(source));
        }
      }

      return { name, count, sampleSources: Array.from(sources) };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`[Stats] Collection "${name}" could not be inspected: ${message}`);
      return { name, count: 0, sampleSources: [], error: message };
    }
  }
}
