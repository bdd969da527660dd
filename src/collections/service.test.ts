import { afterEach, describe, expect, it, vi } from 'vitest';
import { MissingCredentialError, UnknownCollectionError } from '../errors.js';
import { RAGChainBuilder } from '../rag/chain.js';
import { RetrievalService } from '../retrieval/service.js';
import { FakeLLMProvider, FakeStoreHandle, FakeVectorStore, chunk } from '../testing/fakes.js';
import { CollectionRegistry } from './registry.js';
import { CollectionService, type CollectionServiceSettings } from './service.js';
import { StatsAggregator } from './stats.js';

function createService(settings: Partial<CollectionServiceSettings> = {}) {
  const handle = new FakeStoreHandle('Sample', [
    { chunk: chunk('Termination requires notice.', { source: 'sample.pdf' }), distance: 0.2 },
    { chunk: chunk('Payment schedule.', { source: 'sample.pdf' }), distance: 0.4 },
    { chunk: chunk('Definitions.', { source: 'sample.pdf' }), distance: 0.6 },
  ]);
  const store = new FakeVectorStore('/data/vector_db', [handle, new FakeStoreHandle('Unregistered')], 4096);
  const registry = new CollectionRegistry([
    { name: 'Sample', sourceDocument: 'sample.pdf' },
    { name: 'Notes', sourceDocument: 'notes.pdf' },
  ]);
  const retrieval = new RetrievalService({ debug: false });
  const llm = new FakeLLMProvider('llama-3.1-8b-instant', 'With notice.');

  const service = new CollectionService({
    registry,
    store,
    retrieval,
    stats: new StatsAggregator(store),
    chainBuilder: new RAGChainBuilder(retrieval, { provider: 'groq', createProvider: () => llm }),
    settings: {
      topK: 2,
      embeddingModel: 'text-embedding-3-small',
      llmModel: 'llama-3.1-8b-instant',
      llmApiKey: 'test-secret',
      ...settings,
    },
  });

  return { service, handle, llm };
}

describe('CollectionService', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('lists registrations separately from store contents', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { service } = createService();

    expect(service.listRegistered().map((r) => r.name)).toEqual(['Sample', 'Notes']);
    expect((await service.listAll()).map((s) => s.name)).toEqual(['Sample', 'Unregistered']);
  });

  it('describes a registered collection', async () => {
    const { service } = createService();

    expect(await service.info('Sample')).toEqual({
      name: 'Sample',
      sourceDocument: 'sample.pdf',
      exists: true,
      count: 3,
      storageBytes: 4096,
      embeddingModel: 'text-embedding-3-small',
      persistDir: '/data/vector_db',
    });
  });

  it('describes a registered collection the store has not created', async () => {
    const { service } = createService();

    const info = await service.info('Notes');

    expect(info.exists).toBe(false);
    expect(info.count).toBe(0);
  });

  it('rejects names outside the registry', async () => {
    const { service } = createService();

    await expect(service.info('Unregistered')).rejects.toBeInstanceOf(UnknownCollectionError);
    await expect(service.retrieve('Invoices', 'anything')).rejects.toBeInstanceOf(UnknownCollectionError);
  });

  it('retrieves with the configured default breadth', async () => {
    const { service } = createService();

    const result = await service.retrieve('Sample', 'termination');

    expect(result.topK).toBe(2);
    expect(result.results.map((r) => r.chunk.content)).toEqual(['Termination requires notice.', 'Payment schedule.']);
  });

  it('answers a question with its sources', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const { service, handle, llm } = createService();

    const answer = await service.ask('Sample', 'How is the contract terminated?', 1);

    expect(answer.answer).toBe('With notice.');
    expect(answer.sources.results).toHaveLength(1);
    expect(handle.scoredCalls).toBe(1);
    expect(llm.calls).toHaveLength(1);
  });

  it('reports a missing credential when asking', async () => {
    const { service, llm } = createService({ llmApiKey: '' });

    await expect(service.ask('Sample', 'Anything?')).rejects.toBeInstanceOf(MissingCredentialError);
    expect(llm.calls).toHaveLength(0);
  });
});
