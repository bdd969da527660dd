import type { RetrievedChunk } from '../collections/types.js';

/**
 * "Stuff" QA prompt: every retrieved chunk goes into one context block.
 */
export function buildStuffPrompt(question: string, results: RetrievedChunk[]): string {
  const context = results.map((result) => result.chunk.content.trim()).join('\n\n');

  return `Use the following pieces of context to answer the question at the end. If you don't know the answer, say that you don't know; do not make up an answer.

${context}

Question: ${question}
Helpful Answer:`;
}
