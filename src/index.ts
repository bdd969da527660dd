import 'dotenv/config';
import { loadAppConfig, loadCollectionRegistrations, type RunMode } from './config/index.js';
import { createEmbeddingProvider } from './embeddings/providers.js';
import { createLanceVectorStore } from './vector-store/lance-store.js';
import { CollectionRegistry, CollectionService, StatsAggregator } from './collections/index.js';
import { RetrievalService } from './retrieval/service.js';
import { RAGChainBuilder } from './rag/index.js';
import { createLLMProvider } from './llm/index.js';
import { ConsoleChannel } from './channels/console.js';
import { CollectionsServer } from './server/index.js';

async function main(): Promise<void> {
  console.log('📚 Document Collections Starting...\n');

  const config = loadAppConfig();

  // Command line: [console|server] [query...]
  const [modeArg, ...queryArgs] = process.argv.slice(2);
  const mode: RunMode = modeArg === 'server' || modeArg === 'console' ? modeArg : config.mode;
  const initialQuery = queryArgs.join(' ').trim() || undefined;

  // Embeddings and store
  console.log('[Init] Initializing embedding provider...');
  const embeddingProvider = createEmbeddingProvider(config.embedding);
  console.log(`[Init] Embeddings: ${config.embedding.provider}/${config.embedding.model}`);
  if (!config.embedding.apiKey) {
    console.warn('[Init] EMBEDDING_API_KEY is not set; retrieval and RAG will fail until it is');
  }

  console.log('[Init] Opening vector store...');
  const store = await createLanceVectorStore(config.persistDir, embeddingProvider);

  // Registry
  console.log('[Init] Loading collection registrations...');
  const registry = new CollectionRegistry(await loadCollectionRegistrations(config));
  if (config.collectionName && !registry.has(config.collectionName)) {
    registry.register(config.collectionName);
  }
  console.log(`[Init] ${registry.list().length} collections registered`);

  const retrieval = new RetrievalService();
  const chainBuilder = new RAGChainBuilder(retrieval, {
    provider: config.llm.provider,
    createProvider: createLLMProvider,
    credentialName: config.llm.credentialName,
    baseUrl: config.llm.baseUrl,
  });

  const collectionService = new CollectionService({
    registry,
    store,
    retrieval,
    stats: new StatsAggregator(store),
    chainBuilder,
    settings: {
      topK: config.topK,
      embeddingModel: config.embedding.model,
      llmModel: config.llm.model,
      llmApiKey: config.llm.apiKey,
    },
  });

  console.log(`[Init] LLM: ${config.llm.provider}/${config.llm.model || '(not set)'}`);

  let server: CollectionsServer | undefined;

  // Handle shutdown
  const shutdown = async (): Promise<void> => {
    console.log('\n[Shutdown] Gracefully shutting down...');
    await server?.stop();
    await store.close();
    console.log('[Shutdown] Complete');
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error) => {
      console.error('[Shutdown] Failed:', error);
      process.exit(1);
    });
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  if (mode === 'console') {
    console.log('[Init] Starting in console mode...');
    const consoleChannel = new ConsoleChannel(collectionService, {
      fixedCollection: config.collectionName,
      initialQuery,
      persistDir: config.persistDir,
    });
    await consoleChannel.run();
    await store.close();
    return;
  }

  console.log('[Init] Starting in server mode...');
  server = new CollectionsServer({ port: config.port, collectionService });
  await server.start();

  console.log(`
✅ Collections ready!

  📚 API:        http://localhost:${config.port}/api/collections
  🗄️  Store:      ${config.persistDir}
  🧠 LLM:        ${config.llm.provider}/${config.llm.model}
`);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
