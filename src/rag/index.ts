export { RAGChain, RAGChainBuilder } from './chain.js';
export type { RAGAnswerWithSources, RAGChainBuilderOptions, LLMProviderFactory } from './chain.js';
export { buildStuffPrompt } from './prompt.js';
