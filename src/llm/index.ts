import { AnthropicProvider } from './anthropic.js';
import { GROQ_BASE_URL, OPENAI_BASE_URL, OpenAIProvider } from './openai.js';
import type { LLMConfig, LLMProvider } from './types.js';

export * from './types.js';
export { AnthropicProvider } from './anthropic.js';
export { OpenAIProvider, GROQ_BASE_URL, OPENAI_BASE_URL } from './openai.js';

/**
 * Create a hosted LLM client. Credentials are checked by the caller.
 */
export function createLLMProvider(config: LLMConfig): LLMProvider {
  switch (config.provider) {
    case 'anthropic':
      return new AnthropicProvider(config.apiKey, config.model);

    case 'openai':
      return new OpenAIProvider(config.apiKey, config.model, config.baseUrl ?? OPENAI_BASE_URL, 'openai');

    case 'groq':
    default:
      return new OpenAIProvider(config.apiKey, config.model, config.baseUrl ?? GROQ_BASE_URL, 'groq');
  }
}
