/**
 * RAG Chain
 * One retrieval plus one language-model call per question.
 */

import { GenerationFailedError, InvalidConfigurationError, MissingCredentialError } from '../errors.js';
import type { LLMConfig, LLMProvider, LLMProviderName } from '../llm/types.js';
import type { RAGAnswer, RetrievalResult } from '../collections/types.js';
import type { RetrievalService } from '../retrieval/service.js';
import type { StoreHandle } from '../vector-store/types.js';
import { buildStuffPrompt } from './prompt.js';

export type LLMProviderFactory = (config: LLMConfig) => LLMProvider;

export interface RAGAnswerWithSources extends RAGAnswer {
  /** The retrieval the context was built from */
  sources: RetrievalResult;
}

export interface RAGChainBuilderOptions {
  provider: LLMProviderName;
  createProvider: LLMProviderFactory;
  /** Credential name used in error messages */
  credentialName?: string;
  baseUrl?: string;
  /** Sampling temperature for answers */
  temperature?: number;
}

/**
 * A question-answering chain bound to one collection.
 */
export class RAGChain {
  private handle: StoreHandle;
  private topK: number;
  private retrieval: RetrievalService;
  private llm: LLMProvider;
  private temperature: number;

  constructor(
    handle: StoreHandle,
    topK: number,
    retrieval: RetrievalService,
    llm: LLMProvider,
    temperature: number = 0
  ) {
    this.handle = handle;
    this.topK = topK;
    this.retrieval = retrieval;
    this.llm = llm;
    this.temperature = temperature;
  }

  get collection(): string {
    return this.handle.collection;
  }

  get model(): string {
    return this.llm.model;
  }

  async ask(question: string): Promise<RAGAnswer> {
    const { answer } = await this.askWithSources(question);
    return { question, answer };
  }

  /**
   * Same single retrieval and model call as `ask`, also returning the chunks used.
   */
  async askWithSources(question: string): Promise<RAGAnswerWithSources> {
    const sources = await this.retrieval.retrieve(this.handle, question, this.topK);
    const prompt = buildStuffPrompt(question, sources.results);

    const startTime = Date.now();
    let content: string;
    try {
      const response = await this.llm.complete([{ role: 'user', content: prompt }], {
        temperature: this.temperature,
      });
      content = response.content;
    } catch (error) {
      throw new GenerationFailedError(this.llm.model, error);
    }

    console.log(`[RAG] ${this.llm.name}/${this.llm.model} answered from ${sources.results.length} chunks of "${this.handle.collection}" (${Date.now() - startTime}ms)`);

    return { question, answer: content, sources };
  }
}

/**
 * Builds RAG chains. Validates configuration before any client exists.
 */
export class RAGChainBuilder {
  private retrieval: RetrievalService;
  private options: RAGChainBuilderOptions;

  constructor(retrieval: RetrievalService, options: RAGChainBuilderOptions) {
    this.retrieval = retrieval;
    this.options = options;
  }

  build(handle: StoreHandle, topK: number, apiKey: string | undefined, modelName: string): RAGChain {
    if (!apiKey || !apiKey.trim()) {
      throw new MissingCredentialError(this.options.credentialName ?? 'LLM_API_KEY');
    }
    if (!modelName.trim()) {
      throw new InvalidConfigurationError('model name', 'must not be empty', 'build');
    }

    const llm = this.options.createProvider({
      provider: this.options.provider,
      model: modelName,
      apiKey,
      baseUrl: this.options.baseUrl,
    });

    return new RAGChain(handle, topK, this.retrieval, llm, this.options.temperature);
  }
}
