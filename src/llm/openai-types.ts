/**
 * OpenAI API Types
 * Chat Completions response shapes (shared by OpenAI-compatible hosts such as Groq)
 */

/** Message content in a chat completion response */
export interface OpenAIResponseMessage {
  content?: string | null;
}

/** A choice in a chat completion response */
export interface OpenAIChatChoice {
  message?: OpenAIResponseMessage;
  finish_reason?: string;
}

/** Token usage statistics */
export interface OpenAIUsage {
  prompt_tokens?: number;
  completion_tokens?: number;
  total_tokens?: number;
}

/** Response from the chat completions endpoint */
export interface OpenAIChatCompletionResponse {
  id?: string;
  object?: string;
  created?: number;
  model?: string;
  choices?: OpenAIChatChoice[];
  usage?: OpenAIUsage;
}

/** Message sent to the chat completions endpoint */
export interface OpenAIMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}
