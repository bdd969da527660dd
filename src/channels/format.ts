/**
 * Result Formatting
 * Plain-text rendering of core results for the console.
 */

import type { CollectionInfo } from '../collections/service.js';
import type { CollectionStats, RetrievalResult } from '../collections/types.js';
import { isCollectionsError } from '../errors.js';

export const SNIPPET_LENGTH = 800;

export function formatSnippet(text: string, maxLength: number = SNIPPET_LENGTH): string {
  const trimmed = text.trim();
  return trimmed.length < maxLength ? trimmed : trimmed.slice(0, maxLength) + '...';
}

/**
 * Bytes as KB below one megabyte, MB above.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024 * 1024) {
    return `${(bytes / 1024).toFixed(2)} KB`;
  }
  return `${(bytes / (1024 * 1024)).toFixed(2)} MB`;
}

export function formatRetrievalResult(result: RetrievalResult): string {
  if (result.results.length === 0) {
    return `No results in "${result.collection}" for: ${result.query}`;
  }

  const blocks = result.results.map((entry, i) => {
    const lines = [`Result #${i + 1}`];
    if (entry.score !== undefined) {
      lines.push(`Score: ${entry.score}`);
    }
    const source = entry.chunk.metadata.source;
    if (source !== undefined && source !== null && source !== '') {
      lines.push(`Source: ${source}`);
    }
    lines.push(formatSnippet(entry.chunk.content));
    return lines.join('\n');
  });

  return blocks.join('\n\n');
}

export function formatStats(stats: CollectionStats[], persistDir: string): string {
  if (stats.length === 0) {
    return `No collections found in: ${persistDir}`;
  }

  const lines = ['Collections:'];
  for (const s of stats) {
    lines.push(`- ${s.name}`);
    lines.push(`  Items: ${s.count}`);
    lines.push(`  Sample sources: [${s.sampleSources.join(', ')}]`);
    if (s.error !== undefined) {
      lines.push(`  Degraded: ${s.error}`);
    }
  }
  return lines.join('\n');
}

export function formatCollectionInfo(info: CollectionInfo): string {
  const lines = [`Collection: ${info.name}`];
  if (info.sourceDocument) {
    lines.push(`Document: ${info.sourceDocument}`);
  }
  lines.push(`Number of chunks: ${info.count}${info.exists ? '' : ' (collection not created yet)'}`);
  lines.push(`Database size: ${formatBytes(info.storageBytes)} (shared across all collections)`);
  lines.push(`Embedding model: ${info.embeddingModel}`);
  lines.push(`Persist directory: ${info.persistDir}`);
  return lines.join('\n');
}

/**
 * One line naming the failed operation and why.
 */
export function formatError(error: unknown): string {
  if (isCollectionsError(error)) {
    return `[${error.code}] ${error.message}`;
  }
  return error instanceof Error ? error.message : String(error);
}
