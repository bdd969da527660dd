/**
 * Application Configuration
 *
 * Loads configuration from environment variables once at startup.
 */

import { existsSync } from 'fs';
import { readFile } from 'fs/promises';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { z } from 'zod';
import { InvalidConfigurationError } from '../errors.js';
import type { CollectionRegistration } from '../collections/types.js';
import type { EmbeddingConfig, EmbeddingProviderName } from '../embeddings/types.js';
import type { LLMProviderName } from '../llm/types.js';

export type RunMode = 'console' | 'server';

export interface AppConfig {
  /** Persisted vector store root */
  persistDir: string;
  embedding: EmbeddingConfig;
  /** Default retrieval breadth */
  topK: number;
  llm: {
    provider: LLMProviderName;
    model: string;
    /** Empty when not configured; only RAG needs it */
    apiKey: string;
    /** Env var named in "credential missing" messages */
    credentialName: string;
    baseUrl?: string;
  };
  collectionsFile: string;
  /** Inline registrations JSON (wins over the file) */
  collectionsJson?: string;
  /** Single-collection mode */
  collectionName?: string;
  port: number;
  mode: RunMode;
}

export const DEFAULT_TOP_K = 2;
/** Used when TOP_K is set but not a number */
export const FALLBACK_TOP_K = 5;

const LLM_DEFAULTS: Record<LLMProviderName, { model: string; keyVar: string }> = {
  groq: { model: 'llama-3.1-8b-instant', keyVar: 'GROQ_API_KEY' },
  openai: { model: 'gpt-4o-mini', keyVar: 'OPENAI_API_KEY' },
  anthropic: { model: 'claude-3-5-haiku-latest', keyVar: 'ANTHROPIC_API_KEY' },
};

const EMBEDDING_DEFAULTS: Record<EmbeddingProviderName, { model: string; keyVar: string }> = {
  openai: { model: 'text-embedding-3-small', keyVar: 'OPENAI_API_KEY' },
  google: { model: 'text-embedding-004', keyVar: 'GOOGLE_API_KEY' },
};

function isValidLLMProvider(value: string): value is LLMProviderName {
  return value === 'groq' || value === 'openai' || value === 'anthropic';
}

function isValidEmbeddingProvider(value: string): value is EmbeddingProviderName {
  return value === 'openai' || value === 'google';
}

/**
 * Parses TOP_K: unset gives the default, an unparsable value gives FALLBACK_TOP_K.
 */
export function parseTopK(value: string | undefined): number {
  if (value === undefined || value.trim() === '') return DEFAULT_TOP_K;
  // Whole integers only: "2.5" and "3abc" fall back
  if (!/^\s*-?\d+\s*$/.test(value)) return FALLBACK_TOP_K;
  return Number.parseInt(value, 10);
}

/**
 * Expands a leading ~ and resolves against cwd.
 */
export function resolvePath(value: string, cwd: string = process.cwd()): string {
  const expanded = value === '~' || value.startsWith('~/') ? join(homedir(), value.slice(1)) : value;
  return resolve(cwd, expanded);
}

/**
 * Loads application configuration from environment variables.
 *
 * Environment variables:
 * - PERSIST_DIR: vector store root (default: ./vector_db)
 * - EMBEDDING_PROVIDER: 'openai' | 'google' (default: 'openai')
 * - EMBEDDING_MODEL, EMBEDDING_API_KEY, EMBEDDING_BASE_URL
 * - TOP_K: default retrieval breadth (default: 2)
 * - LLM_PROVIDER: 'groq' | 'openai' | 'anthropic' (default: 'groq')
 * - LLM_MODEL, LLM_API_KEY, LLM_BASE_URL
 * - COLLECTIONS_FILE (default: ./collections.json), COLLECTIONS (inline JSON)
 * - COLLECTION_NAME: single-collection mode
 * - MODE: 'console' | 'server' (default: 'console'), PORT (default: 3000)
 */
export function loadAppConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppConfig {
  const llmProviderRaw = (env.LLM_PROVIDER || 'groq').toLowerCase();
  if (!isValidLLMProvider(llmProviderRaw)) {
    throw new InvalidConfigurationError('LLM_PROVIDER', `expected groq, openai or anthropic, got "${llmProviderRaw}"`, 'startup');
  }
  const llmDefaults = LLM_DEFAULTS[llmProviderRaw];

  const embeddingProviderRaw = (env.EMBEDDING_PROVIDER || 'openai').toLowerCase();
  if (!isValidEmbeddingProvider(embeddingProviderRaw)) {
    throw new InvalidConfigurationError('EMBEDDING_PROVIDER', `expected openai or google, got "${embeddingProviderRaw}"`, 'startup');
  }
  const embeddingDefaults = EMBEDDING_DEFAULTS[embeddingProviderRaw];

  const port = Number.parseInt(env.PORT || '3000', 10);
  const collectionName = env.COLLECTION_NAME?.trim();

  return {
    persistDir: resolvePath(env.PERSIST_DIR || './vector_db', cwd),
    embedding: {
      provider: embeddingProviderRaw,
      model: env.EMBEDDING_MODEL || embeddingDefaults.model,
      apiKey: env.EMBEDDING_API_KEY || env[embeddingDefaults.keyVar] || '',
      baseUrl: env.EMBEDDING_BASE_URL || undefined,
    },
    topK: parseTopK(env.TOP_K),
    llm: {
      provider: llmProviderRaw,
      // An explicitly empty LLM_MODEL is kept so RAG reports it
      model: env.LLM_MODEL ?? llmDefaults.model,
      apiKey: env.LLM_API_KEY || env[llmDefaults.keyVar] || '',
      credentialName: env.LLM_API_KEY !== undefined ? 'LLM_API_KEY' : llmDefaults.keyVar,
      baseUrl: env.LLM_BASE_URL || undefined,
    },
    collectionsFile: resolvePath(env.COLLECTIONS_FILE || './collections.json', cwd),
    collectionsJson: env.COLLECTIONS || undefined,
    collectionName: collectionName ? collectionName : undefined,
    port: Number.isNaN(port) ? 3000 : port,
    mode: env.MODE === 'server' ? 'server' : 'console',
  };
}

const registrationObjectSchema = z.object({
  name: z.string().trim().min(1),
  sourceDocument: z.string().min(1).optional(),
});

// ["Sample", "sample.pdf"] pairs are accepted as well
const registrationTupleSchema = z
  .tuple([z.string().trim().min(1), z.string().min(1)])
  .transform(([name, sourceDocument]) => ({ name, sourceDocument }));

export const collectionRegistrationsSchema = z.array(
  z.union([registrationObjectSchema, registrationTupleSchema])
);

/**
 * Parses and validates collection registrations from JSON text.
 */
export function parseCollectionRegistrations(json: string, origin: string): CollectionRegistration[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new InvalidConfigurationError(origin, 'not valid JSON', 'startup', error);
  }

  const result = collectionRegistrationsSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new InvalidConfigurationError(origin, issues, 'startup', result.error);
  }

  return result.data;
}

/**
 * Loads the ordered collection registrations: inline COLLECTIONS first,
 * then COLLECTIONS_FILE. A missing file means no registrations.
 */
export async function loadCollectionRegistrations(config: AppConfig): Promise<CollectionRegistration[]> {
  if (config.collectionsJson) {
    return parseCollectionRegistrations(config.collectionsJson, 'COLLECTIONS');
  }

  if (!existsSync(config.collectionsFile)) {
    console.warn(`[Config] No collections file at ${config.collectionsFile}; registry is empty`);
    return [];
  }

  const content = await readFile(config.collectionsFile, 'utf-8');
  const registrations = parseCollectionRegistrations(content, config.collectionsFile);
  console.log(`[Config] Loaded ${registrations.length} collection registrations from ${config.collectionsFile}`);
  return registrations;
}
