/**
 * LanceDB Vector Store
 * Opens collection tables inside one persisted LanceDB root directory.
 */

import { connect, type Connection, type Table } from '@lancedb/lancedb';
import { constants } from 'fs';
import { access, readdir, stat } from 'fs/promises';
import { join } from 'path';
import { StoreUnavailableError } from '../errors.js';
import type { Chunk, ChunkMetadata, MetadataValue } from '../collections/types.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import type { ScoredHit, ScoredSearchOutcome, StoreHandle, VectorStoreAdapter } from './types.js';

const TEXT_COLUMN = 'text';
const METADATA_COLUMN = 'metadata';
const SOURCE_COLUMN = 'source';
const DISTANCE_COLUMN = '_distance';
const TABLE_PAGE_SIZE = 100;

type LanceRow = Record<string, unknown>;

/**
 * Handle over a single collection table. A collection the store has never
 * seen gets a handle without a table: count 0, empty searches.
 */
export class LanceCollectionHandle implements StoreHandle {
  readonly collection: string;
  private table: Table | null;
  private embeddingProvider: EmbeddingProvider;

  constructor(collection: string, table: Table | null, embeddingProvider: EmbeddingProvider) {
    this.collection = collection;
    this.table = table;
    this.embeddingProvider = embeddingProvider;
  }

  get exists(): boolean {
    return this.table !== null;
  }

  async count(): Promise<number> {
    if (!this.table) {
      return 0;
    }
    return this.table.countRows();
  }

  async sampleMetadata(limit: number): Promise<ChunkMetadata[]> {
    if (!this.table || limit <= 0) {
      return [];
    }

    // Ingestion may write metadata, a top-level source, both, or neither
    const schema = await this.table.schema();
    const columns = schema.fields
      .map((field) => field.name)
      .filter((name) => name === METADATA_COLUMN || name === SOURCE_COLUMN);
    if (columns.length === 0) {
      return [];
    }

    const rows: LanceRow[] = await this.table
      .query()
      .select(columns)
      .limit(limit)
      .toArray();

    return rows.map((row) => parseMetadata(row));
  }

  async searchWithScores(queryText: string, topK: number): Promise<ScoredSearchOutcome> {
    if (!this.table || topK <= 0) {
      return { status: 'scored', hits: [] };
    }

    const rows = await this.vectorSearch(this.table, queryText, topK);
    const hits: ScoredHit[] = [];

    for (const row of rows) {
      const distance = row[DISTANCE_COLUMN];
      if (typeof distance !== 'number' || !Number.isFinite(distance)) {
        return { status: 'unsupported', reason: `rows carry no numeric ${DISTANCE_COLUMN}` };
      }
      hits.push({ chunk: toChunk(row), score: distance });
    }

    return { status: 'scored', hits };
  }

  async search(queryText: string, topK: number): Promise<Chunk[]> {
    if (!this.table || topK <= 0) {
      return [];
    }

    const rows = await this.vectorSearch(this.table, queryText, topK);
    return rows.map((row) => toChunk(row));
  }

  private async vectorSearch(table: Table, queryText: string, topK: number): Promise<LanceRow[]> {
    const queryVector = await this.embeddingProvider.embed(queryText);
    return table.vectorSearch(queryVector).limit(topK).toArray();
  }
}

/**
 * LanceDB-backed adapter. The root directory must already exist: the core
 * only reads what ingestion wrote.
 */
export class LanceVectorStore implements VectorStoreAdapter {
  readonly rootPath: string;
  private embeddingProvider: EmbeddingProvider;
  private connection: Connection | null = null;

  constructor(rootPath: string, embeddingProvider: EmbeddingProvider) {
    this.rootPath = rootPath;
    this.embeddingProvider = embeddingProvider;
  }

  /**
   * Check the root directory and connect.
   */
  async init(): Promise<void> {
    await assertReadableDirectory(this.rootPath);

    try {
      this.connection = await connect(this.rootPath);
    } catch (error) {
      throw new StoreUnavailableError(this.rootPath, 'connection failed', error);
    }
  }

  async open(collection: string): Promise<StoreHandle> {
    const connection = this.getConnection();
    const names = await this.listNamespaces();

    const table = names.includes(collection) ? await connection.openTable(collection) : null;
    if (!table) {
      console.warn(`[VectorStore] Collection "${collection}" not found in ${this.rootPath}; it has no chunks yet`);
    }

    return new LanceCollectionHandle(collection, table, this.embeddingProvider);
  }

  async listNamespaces(): Promise<string[]> {
    const connection = this.getConnection();
    await assertReadableDirectory(this.rootPath);

    const names: string[] = [];
    let startAfter: string | undefined;

    while (true) {
      let page: string[];
      try {
        page = await connection.tableNames({ startAfter, limit: TABLE_PAGE_SIZE });
      } catch (error) {
        throw new StoreUnavailableError(this.rootPath, 'table listing failed', error);
      }
      names.push(...page);
      if (page.length < TABLE_PAGE_SIZE) {
        break;
      }
      startAfter = page[page.length - 1];
    }

    return names;
  }

  async storageSize(): Promise<number> {
    return directorySize(this.rootPath);
  }

  /**
   * Release the connection.
   */
  async close(): Promise<void> {
    this.connection?.close();
    this.connection = null;
  }

  private getConnection(): Connection {
    if (!this.connection) {
      throw new StoreUnavailableError(this.rootPath, 'store not initialized, call init() first');
    }
    return this.connection;
  }
}

/**
 * Create and connect a LanceVectorStore.
 */
export async function createLanceVectorStore(
  rootPath: string,
  embeddingProvider: EmbeddingProvider
): Promise<LanceVectorStore> {
  const store = new LanceVectorStore(rootPath, embeddingProvider);
  await store.init();
  return store;
}

async function assertReadableDirectory(rootPath: string): Promise<void> {
  try {
    const stats = await stat(rootPath);
    if (!stats.isDirectory()) {
      throw new StoreUnavailableError(rootPath, 'not a directory');
    }
    await access(rootPath, constants.R_OK);
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      throw error;
    }
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    const reason = code === 'ENOENT' ? 'directory not found' : 'directory not readable';
    throw new StoreUnavailableError(rootPath, reason, error);
  }
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  const entries = await readdir(dir, { withFileTypes: true });

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(fullPath);
    } else if (entry.isFile()) {
      try {
        total += (await stat(fullPath)).size;
      } catch (error) {
        // Files can vanish while LanceDB compacts
        console.warn(`[VectorStore] Skipping ${fullPath}:`, error instanceof Error ? error.message : error);
      }
    }
  }

  return total;
}

function toChunk(row: LanceRow): Chunk {
  const text = row[TEXT_COLUMN];
  return {
    content: typeof text === 'string' ? text : '',
    metadata: parseMetadata(row),
  };
}

/**
 * Metadata is stored as a JSON-encoded object string. A top-level `source`
 * column, when ingestion wrote one, fills in a missing `source` key.
 */
function parseMetadata(row: LanceRow): ChunkMetadata {
  const raw = row[METADATA_COLUMN];
  const metadata: ChunkMetadata = {};

  if (raw !== null && raw !== undefined) {
    const parsed: unknown = typeof raw === 'string' ? JSON.parse(raw) : raw;
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      throw new Error(`${METADATA_COLUMN} column does not hold an object`);
    }
    for (const [key, value] of Object.entries(parsed)) {
      if (isMetadataValue(value)) {
        metadata[key] = value;
      }
    }
  }

  const source = row[SOURCE_COLUMN];
  if (metadata.source === undefined && typeof source === 'string') {
    metadata.source = source;
  }

  return metadata;
}

function isMetadataValue(value: unknown): value is MetadataValue {
  return (
    value === null ||
    typeof value === 'string' ||
    typeof value === 'number' ||
    typeof value === 'boolean'
  );
}
