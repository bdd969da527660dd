import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { AnthropicProvider } from './anthropic.js';
import { createLLMProvider } from './index.js';
import { GROQ_BASE_URL, OpenAIProvider } from './openai.js';

const mockFetch = vi.fn();

describe('OpenAIProvider', () => {
  beforeEach(() => {
    vi.stubGlobal('fetch', mockFetch);
  });

  afterEach(() => {
    vi.unstubAllGlobals();
    mockFetch.mockReset();
  });

  it('sends one chat completion request', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: true,
      json: async () => ({
        model: 'llama-3.1-8b-instant',
        choices: [{ message: { role: 'assistant', content: 'Thirty days.' }, finish_reason: 'stop' }],
        usage: { prompt_tokens: 12, completion_tokens: 3 },
      }),
    });
    const provider = new OpenAIProvider('test-secret', 'llama-3.1-8b-instant', GROQ_BASE_URL, 'groq');

    const response = await provider.complete([{ role: 'user', content: 'Notice period?' }], { temperature: 0 });

    expect(response).toEqual({
      content: 'Thirty days.',
      usage: { inputTokens: 12, outputTokens: 3 },
      model: 'llama-3.1-8b-instant',
      finishReason: 'stop',
    });
    expect(mockFetch).toHaveBeenCalledTimes(1);
    expect(mockFetch.mock.calls[0][0]).toBe('https://api.groq.com/openai/v1/chat/completions');
    expect(JSON.parse(mockFetch.mock.calls[0][1].body)).toEqual({
      model: 'llama-3.1-8b-instant',
      messages: [{ role: 'user', content: 'Notice period?' }],
      max_completion_tokens: 1024,
      temperature: 0,
    });
  });

  it('names the provider in API errors', async () => {
    mockFetch.mockResolvedValueOnce({ ok: false, status: 429, text: async () => 'rate limited' });
    const provider = new OpenAIProvider('test-secret', 'llama-3.1-8b-instant', GROQ_BASE_URL, 'groq');

    await expect(provider.complete([{ role: 'user', content: 'Hi' }])).rejects.toThrow(
      'groq API error: 429 rate limited'
    );
  });
});

describe('createLLMProvider', () => {
  it('serves groq through the OpenAI-compatible client', () => {
    const provider = createLLMProvider({ provider: 'groq', model: 'llama-3.1-8b-instant', apiKey: 'test-secret' });

    expect(provider).toBeInstanceOf(OpenAIProvider);
    expect(provider.name).toBe('groq');
    expect(provider.model).toBe('llama-3.1-8b-instant');
  });

  it('creates an Anthropic client', () => {
    const provider = createLLMProvider({ provider: 'anthropic', model: 'claude-3-5-haiku-latest', apiKey: 'test-secret' });

    expect(provider).toBeInstanceOf(AnthropicProvider);
  });
});
