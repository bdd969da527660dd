import { InvalidConfigurationError, RetrievalFailedError, isCollectionsError } from '../errors.js';
import type { RetrievalResult, RetrievedChunk } from '../collections/types.js';
import type { StoreHandle } from '../vector-store/types.js';

const DEBUG_RETRIEVAL = ['1', 'true', 'yes', 'on'].includes((process.env.DEBUG_RETRIEVAL || '').toLowerCase());

export interface RetrievalServiceOptions {
  /** Log every search (defaults to the DEBUG_RETRIEVAL env switch) */
  debug?: boolean;
}

/**
 * Retrieval Service - top-k similarity search over a collection handle.
 *
 * Tries a scored search first. When the store reports scoring as unsupported
 * it runs an unscored search for the same k and leaves every score undefined.
 * Results keep the store's order.
 */
export class RetrievalService {
  private debug: boolean;

  constructor(options: RetrievalServiceOptions = {}) {
    this.debug = options.debug ?? DEBUG_RETRIEVAL;
  }

  async retrieve(handle: StoreHandle, query: string, topK: number): Promise<RetrievalResult> {
    if (!query.trim()) {
      throw new InvalidConfigurationError('query', 'must not be empty', 'similaritySearch');
    }

    const k = clampTopK(topK);
    if (k === 0) {
      return { collection: handle.collection, query, topK: k, scored: false, results: [] };
    }

    const startTime = Date.now();
    const outcome = await this.guard(handle, () => handle.searchWithScores(query, k));

    let scored: boolean;
    let results: RetrievedChunk[];

    if (outcome.status === 'scored') {
      scored = true;
      results = outcome.hits.map((hit) => ({ chunk: hit.chunk, score: hit.score }));
    } else {
      console.warn(`[Retrieval] Scored search unavailable for "${handle.collection}" (${outcome.reason}); using unscored search`);
      scored = false;
      const chunks = await this.guard(handle, () => handle.search(query, k));
      results = chunks.map((chunk) => ({ chunk }));
    }

    if (this.debug) {
      console.log(`[Retrieval] ${handle.collection} k=${k} scored=${scored} → ${results.length} results (${Date.now() - startTime}ms)`);
    }

    return {
      collection: handle.collection,
      query,
      topK: k,
      scored,
      results: results.slice(0, k),
    };
  }

  private async guard<T>(handle: StoreHandle, search: () => Promise<T>): Promise<T> {
    try {
      return await search();
    } catch (error) {
      if (isCollectionsError(error)) {
        throw error;
      }
      throw new RetrievalFailedError(handle.collection, error);
    }
  }
}

/**
 * Clamp k to a non-negative integer.
 */
export function clampTopK(topK: number): number {
  if (!Number.isFinite(topK)) {
    return 0;
  }
  return Math.max(0, Math.floor(topK));
}
