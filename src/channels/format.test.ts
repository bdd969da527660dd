import { describe, expect, it } from 'vitest';
import { MissingCredentialError } from '../errors.js';
import { chunk } from '../testing/fakes.js';
import {
  SNIPPET_LENGTH,
  formatBytes,
  formatCollectionInfo,
  formatError,
  formatRetrievalResult,
  formatSnippet,
  formatStats,
} from './format.js';

describe('formatSnippet', () => {
  it('keeps short text', () => {
    expect(formatSnippet('  short text \n')).toBe('short text');
  });

  it('truncates long text with an ellipsis', () => {
    const snippet = formatSnippet('x'.repeat(SNIPPET_LENGTH + 50));

    expect(snippet).toBe('x'.repeat(SNIPPET_LENGTH) + '...');
  });
});

describe('formatBytes', () => {
  it('uses KB below a megabyte', () => {
    expect(formatBytes(1536)).toBe('1.50 KB');
  });

  it('uses MB from a megabyte up', () => {
    expect(formatBytes(3 * 1024 * 1024)).toBe('3.00 MB');
  });
});

describe('formatRetrievalResult', () => {
  it('numbers results and shows score and source when present', () => {
    const text = formatRetrievalResult({
      collection: 'Sample',
      query: 'termination',
      topK: 2,
      scored: true,
      results: [
        { chunk: chunk('First chunk', { source: 'sample.pdf' }), score: 0.25 },
        { chunk: chunk('Second chunk'), score: 0.5 },
      ],
    });

    expect(text).toBe(
      'Result #1\nScore: 0.25\nSource: sample.pdf\nFirst chunk\n\nResult #2\nScore: 0.5\nSecond chunk'
    );
  });

  it('omits scores for unscored results', () => {
    const text = formatRetrievalResult({
      collection: 'Sample',
      query: 'termination',
      topK: 1,
      scored: false,
      results: [{ chunk: chunk('Only chunk', { source: 'sample.pdf' }) }],
    });

    expect(text).toBe('Result #1\nSource: sample.pdf\nOnly chunk');
  });

  it('reports an empty result', () => {
    const text = formatRetrievalResult({ collection: 'Sample', query: 'nothing', topK: 0, scored: false, results: [] });

    expect(text).toBe('No results in "Sample" for: nothing');
  });
});

describe('formatStats', () => {
  it('lists collections with degraded ones flagged', () => {
    const text = formatStats(
      [
        { name: 'Sample', count: 42, sampleSources: ['sample.pdf'] },
        { name: 'Broken', count: 0, sampleSources: [], error: 'bad metadata' },
      ],
      '/data/vector_db'
    );

    expect(text).toBe(
      'Collections:\n- Sample\n  Items: 42\n  Sample sources: [sample.pdf]\n- Broken\n  Items: 0\n  Sample sources: []\n  Degraded: bad metadata'
    );
  });

  it('reports an empty store', () => {
    expect(formatStats([], '/data/vector_db')).toBe('No collections found in: /data/vector_db');
  });
});

describe('formatCollectionInfo', () => {
  it('renders every field', () => {
    const text = formatCollectionInfo({
      name: 'Sample',
      sourceDocument: 'sample.pdf',
      exists: true,
      count: 42,
      storageBytes: 2048,
      embeddingModel: 'text-embedding-3-small',
      persistDir: '/data/vector_db',
    });

    expect(text).toBe(
      [
        'Collection: Sample',
        'Document: sample.pdf',
        'Number of chunks: 42',
        'Database size: 2.00 KB (shared across all collections)',
        'Embedding model: text-embedding-3-small',
        'Persist directory: /data/vector_db',
      ].join('\n')
    );
  });

  it('notes a collection that was never created', () => {
    const text = formatCollectionInfo({
      name: 'Notes',
      exists: false,
      count: 0,
      storageBytes: 0,
      embeddingModel: 'text-embedding-3-small',
      persistDir: '/data/vector_db',
    });

    expect(text.split('\n')[1]).toBe('Number of chunks: 0 (collection not created yet)');
  });
});

describe('formatError', () => {
  it('prefixes core errors with their code', () => {
    expect(formatError(new MissingCredentialError('GROQ_API_KEY'))).toBe(
      '[MISSING_CREDENTIAL] build: GROQ_API_KEY is not set; the RAG chain needs it to call the language model'
    );
  });

  it('falls back to the message of other errors', () => {
    expect(formatError(new Error('boom'))).toBe('boom');
    expect(formatError('plain')).toBe('plain');
  });
});
