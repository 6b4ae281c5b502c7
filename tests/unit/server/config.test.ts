/**
 * Unit tests for environment configuration
 *
 * @module tests/unit/server/config
 */

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../../../src/server/config.js';
import { DEFAULT_DATABASE_PATH } from '../../../src/services/storage/database/helpers.js';

function captureConfigError(env: Record<string, string>): ConfigError {
  try {
    loadConfig(env);
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('Expected loadConfig to throw');
}

describe('loadConfig', () => {
  it('applies defaults when nothing is set', () => {
    const config = loadConfig({});

    expect(config.storagePath).toBe(DEFAULT_DATABASE_PATH);
    expect(config.allowedDirs).toEqual([]);
    expect(config.chunking).toEqual({ strategy: 'hierarchical', maxTokens: 1000, overlapTokens: 100 });
    expect(config.tokenizer).toBe('gpt');
    expect(config.embedding).toMatchObject({
      model: 'BAAI/bge-small-en',
      dimensions: 384,
      maxInputTokens: 512,
      batchSize: 32,
      timeoutMs: 60_000,
    });
    expect(config.retrieval).toEqual({ initialK: 10, finalK: 5, historyTurns: 3 });
    expect(config.retry).toEqual({ maxAttempts: 3, baseDelayMs: 1000, maxDelayMs: 30_000 });
    expect(config.ingestion).toEqual({ maxConcurrentBatches: 2 });
  });

  it('reads the semantic strategy with its threshold', () => {
    const config = loadConfig({
      RAG_CHUNK_STRATEGY: 'semantic',
      RAG_CHUNK_MAX_TOKENS: '500',
      RAG_SEMANTIC_THRESHOLD: '0.5',
    });

    expect(config.chunking).toEqual({ strategy: 'semantic', maxTokens: 500, similarityThreshold: 0.5 });
  });

  it('splits allowed directories and drops empty entries', () => {
    expect(loadConfig({ RAG_ALLOWED_DIRS: ' /data/a, ,/data/b ' }).allowedDirs).toEqual(['/data/a', '/data/b']);
  });

  it('treats blank values as unset and ignores other variables', () => {
    const config = loadConfig({ RAG_INITIAL_K: '   ', HOME: '/home/test', PATH: '' });

    expect(config.retrieval.initialK).toBe(10);
  });

  it('rejects final K above initial K', () => {
    const error = captureConfigError({ RAG_INITIAL_K: '4', RAG_FINAL_K: '6' });

    expect(error.issues).toEqual(['RAG_FINAL_K: RAG_FINAL_K must not exceed RAG_INITIAL_K']);
    expect(error.message).toBe('Invalid configuration: RAG_FINAL_K: RAG_FINAL_K must not exceed RAG_INITIAL_K');
  });

  it('lists every malformed variable', () => {
    const error = captureConfigError({ RAG_TOKENIZER: 'bpe', RAG_CHUNK_MAX_TOKENS: 'lots' });

    expect(error.issues).toHaveLength(2);
    expect(error.issues.some((issue) => issue.startsWith('RAG_TOKENIZER: '))).toBe(true);
    expect(error.issues.some((issue) => issue.startsWith('RAG_CHUNK_MAX_TOKENS: '))).toBe(true);
  });
});
