import Anthropic from '@anthropic-ai/sdk';
import type { LLMProvider, LLMMessage, LLMOptions, LLMResponse } from './types.js';

export class AnthropicProvider implements LLMProvider {
  readonly name = 'anthropic';
  readonly model: string;

  private client: Anthropic;

  constructor(apiKey: string, model: string = 'claude-3-5-haiku-latest') {
    this.model = model;
    this.client = new Anthropic({ apiKey });
  }

  async complete(messages: LLMMessage[], options?: LLMOptions): Promise<LLMResponse> {
    // Separate system message from conversation
    const systemMessage = messages.find((m) => m.role === 'system');

    const conversationMessages: Anthropic.MessageParam[] = [];
    for (const m of messages) {
      if (m.role !== 'system') {
        conversationMessages.push({ role: m.role, content: m.content });
      }
    }

    const response = await this.client.messages.create({
      model: this.model,
      max_tokens: options?.maxTokens ?? 1024,
      system: options?.systemPrompt ?? systemMessage?.content,
      messages: conversationMessages,
      temperature: options?.temperature,
      stop_sequences: options?.stopSequences,
    });

    const textContent = response.content.find((c) => c.type === 'text');

    return {
      content: textContent?.type === 'text' ? textContent.text : '',
      usage: {
        inputTokens: response.usage.input_tokens,
        outputTokens: response.usage.output_tokens,
      },
      model: response.model,
      finishReason: response.stop_reason ?? undefined,
    };
  }
}
