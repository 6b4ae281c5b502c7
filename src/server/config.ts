/**
 * Application configuration
 *
 * Read once from RAG_* environment variables (after dotenv has loaded any
 * .env file) and validated with zod. Unset variables take the defaults
 * below; malformed ones fail startup.
 *
 * @module server/config
 */

import { z } from 'zod';
import { DEFAULT_DATABASE_PATH } from '../services/storage/database/helpers.js';
import {
  DEFAULT_EMBEDDING_DIMENSIONS,
  DEFAULT_EMBEDDING_MODEL,
  DEFAULT_MAX_INPUT_TOKENS,
} from '../services/embedding/sentence-transformers.js';
import { DEFAULT_RERANKER_MODEL } from '../services/search/cross-encoder.js';
import { DEFAULT_OLLAMA_CONFIG } from '../services/generation/ollama.js';
import { ChunkingConfig, DEFAULT_HIERARCHICAL_CONFIG, DEFAULT_SEMANTIC_CONFIG } from '../models/segment.js';

const int = (min: number, max: number) => z.coerce.number().int().min(min).max(max);

/**
 * Flat environment shape. Every key is optional.
 */
const EnvSchema = z.object({
  RAG_STORAGE_PATH: z.string().min(1).default(DEFAULT_DATABASE_PATH),
  RAG_ALLOWED_DIRS: z.string().optional(),

  RAG_CHUNK_STRATEGY: z.enum(['hierarchical', 'semantic']).default('hierarchical'),
  RAG_CHUNK_MAX_TOKENS: int(16, 32_000).default(DEFAULT_HIERARCHICAL_CONFIG.maxTokens),
  RAG_CHUNK_OVERLAP_TOKENS: int(0, 8_000).default(DEFAULT_HIERARCHICAL_CONFIG.overlapTokens),
  RAG_SEMANTIC_THRESHOLD: z.coerce.number().min(-1).max(1).default(DEFAULT_SEMANTIC_CONFIG.similarityThreshold),
  RAG_TOKENIZER: z.enum(['gpt', 'whitespace']).default('gpt'),

  RAG_PYTHON_PATH: z.string().optional(),
  RAG_EMBEDDING_MODEL: z.string().min(1).default(DEFAULT_EMBEDDING_MODEL),
  RAG_EMBEDDING_DIMENSIONS: int(1, 8192).default(DEFAULT_EMBEDDING_DIMENSIONS),
  RAG_EMBEDDING_MAX_INPUT_TOKENS: int(1, 32_000).default(DEFAULT_MAX_INPUT_TOKENS),
  RAG_EMBEDDING_DEVICE: z.string().optional(),
  RAG_EMBEDDING_BATCH_SIZE: int(1, 1024).default(32),
  RAG_EMBEDDING_TIMEOUT_MS: int(1_000, 3_600_000).default(60_000),

  RAG_RERANKER_MODEL: z.string().min(1).default(DEFAULT_RERANKER_MODEL),
  RAG_RERANK_TIMEOUT_MS: int(1_000, 3_600_000).default(30_000),

  RAG_INITIAL_K: int(1, 200).default(10),
  RAG_FINAL_K: int(1, 200).default(5),
  RAG_HISTORY_TURNS: int(0, 20).default(3),

  RAG_OLLAMA_URL: z.string().url().default(DEFAULT_OLLAMA_CONFIG.baseUrl),
  RAG_GENERATION_MODEL: z.string().min(1).default(DEFAULT_OLLAMA_CONFIG.model),
  RAG_GENERATION_TIMEOUT_MS: int(1_000, 3_600_000).default(DEFAULT_OLLAMA_CONFIG.requestTimeoutMs),

  RAG_RETRY_MAX_ATTEMPTS: int(1, 10).default(3),
  RAG_RETRY_BASE_DELAY_MS: int(0, 60_000).default(1000),
  RAG_RETRY_MAX_DELAY_MS: int(0, 300_000).default(30_000),

  RAG_MAX_CONCURRENT_BATCHES: int(1, 16).default(2),
});

export const AppConfigSchema = EnvSchema.refine((env) => env.RAG_FINAL_K <= env.RAG_INITIAL_K, {
  message: 'RAG_FINAL_K must not exceed RAG_INITIAL_K',
  path: ['RAG_FINAL_K'],
}).transform((env) => ({
  storagePath: env.RAG_STORAGE_PATH,
  allowedDirs: env.RAG_ALLOWED_DIRS
    ? env.RAG_ALLOWED_DIRS.split(',')
        .map((d) => d.trim())
        .filter((d) => d.length > 0)
    : [],
  chunking: chunkingFrom(env),
  tokenizer: env.RAG_TOKENIZER,
  pythonPath: env.RAG_PYTHON_PATH,
  embedding: {
    model: env.RAG_EMBEDDING_MODEL,
    dimensions: env.RAG_EMBEDDING_DIMENSIONS,
    maxInputTokens: env.RAG_EMBEDDING_MAX_INPUT_TOKENS,
    device: env.RAG_EMBEDDING_DEVICE,
    batchSize: env.RAG_EMBEDDING_BATCH_SIZE,
    timeoutMs: env.RAG_EMBEDDING_TIMEOUT_MS,
  },
  reranker: {
    model: env.RAG_RERANKER_MODEL,
    timeoutMs: env.RAG_RERANK_TIMEOUT_MS,
  },
  retrieval: {
    initialK: env.RAG_INITIAL_K,
    finalK: env.RAG_FINAL_K,
    historyTurns: env.RAG_HISTORY_TURNS,
  },
  generation: {
    baseUrl: env.RAG_OLLAMA_URL,
    model: env.RAG_GENERATION_MODEL,
    timeoutMs: env.RAG_GENERATION_TIMEOUT_MS,
  },
  retry: {
    maxAttempts: env.RAG_RETRY_MAX_ATTEMPTS,
    baseDelayMs: env.RAG_RETRY_BASE_DELAY_MS,
    maxDelayMs: env.RAG_RETRY_MAX_DELAY_MS,
  },
  ingestion: {
    maxConcurrentBatches: env.RAG_MAX_CONCURRENT_BATCHES,
  },
}));

export type AppConfig = z.output<typeof AppConfigSchema>;

function chunkingFrom(env: z.output<typeof EnvSchema>): ChunkingConfig {
  return env.RAG_CHUNK_STRATEGY === 'semantic'
    ? {
        strategy: 'semantic',
        maxTokens: env.RAG_CHUNK_MAX_TOKENS,
        similarityThreshold: env.RAG_SEMANTIC_THRESHOLD,
      }
    : {
        strategy: 'hierarchical',
        maxTokens: env.RAG_CHUNK_MAX_TOKENS,
        overlapTokens: env.RAG_CHUNK_OVERLAP_TOKENS,
      };
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[]
  ) {
    super(message);
    this.name = 'ConfigError';
    Error.captureStackTrace?.(this, ConfigError);
  }
}

/**
 * Parse configuration from an environment map. Empty strings count as unset.
 *
 * @throws ConfigError listing every invalid variable
 */
export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  const relevant: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (key.startsWith('RAG_') && value !== undefined && value.trim() !== '') {
      relevant[key] = value.trim();
    }
  }

  const result = AppConfigSchema.safeParse(relevant);
  if (!result.success) {
    const issues = result.error.errors.map((e) => `${e.path.join('.') || 'config'}: ${e.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join('; ')}`, issues);
  }
  return result.data;
}
