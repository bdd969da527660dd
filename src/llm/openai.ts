import type { LLMProvider, LLMMessage, LLMOptions, LLMResponse } from './types.js';
import type { OpenAIChatCompletionResponse, OpenAIMessage } from './openai-types.js';

export const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';
export const OPENAI_BASE_URL = 'https://api.openai.com/v1';

/**
 * OpenAI-compatible LLM Provider
 *
 * Talks to any Chat Completions endpoint:
 * - Groq (llama-3.1-8b-instant, llama-3.3-70b-versatile, ...)
 * - OpenAI (gpt-4o, gpt-4o-mini, ...)
 */
export class OpenAIProvider implements LLMProvider {
  readonly name: string;
  readonly model: string;

  private apiKey: string;
  private baseUrl: string;

  constructor(
    apiKey: string,
    model: string = 'gpt-4o-mini',
    baseUrl: string = OPENAI_BASE_URL,
    name: string = 'openai'
  ) {
    this.apiKey = apiKey;
    this.model = model;
    this.baseUrl = baseUrl;
    this.name = name;
  }

  async complete(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    const openaiMessages = this.convertMessages(messages, options?.systemPrompt);

    const requestBody: Record<string, unknown> = {
      model: this.model,
      messages: openaiMessages,
      max_completion_tokens: options?.maxTokens ?? 1024,
      temperature: options?.temperature ?? 0.7,
    };

    if (options?.stopSequences) {
      requestBody.stop = options.stopSequences;
    }

    const response = await fetch(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify(requestBody),
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`${this.name} API error: ${response.status} ${error}`);
    }

    const data = (await response.json()) as OpenAIChatCompletionResponse;

    const choice = data.choices?.[0];
    const content = choice?.message?.content || '';

    return {
      content,
      usage: data.usage
        ? {
            inputTokens: data.usage.prompt_tokens || 0,
            outputTokens: data.usage.completion_tokens || 0,
          }
        : undefined,
      model: data.model || this.model,
      finishReason: choice?.finish_reason,
    };
  }

  private convertMessages(messages: LLMMessage[], systemPrompt?: string): OpenAIMessage[] {
    const converted: OpenAIMessage[] = [];

    if (systemPrompt) {
      converted.push({ role: 'system', content: systemPrompt });
    }

    for (const message of messages) {
      // An explicit systemPrompt replaces system messages
      if (message.role === 'system' && systemPrompt) continue;
      converted.push({ role: message.role, content: message.content });
    }

    return converted;
  }
}
