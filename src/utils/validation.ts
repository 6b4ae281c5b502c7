/**
 * Zod Validation Schemas
 *
 * Input validation for every MCP tool. Schemas carry constraints and
 * defaults; tool modules register their `.shape` and re-validate inside the
 * handler with validateInput().
 *
 * @module utils/validation
 */

import { z } from 'zod';
import * as path from 'path';
import { homedir, tmpdir } from 'os';
import { ChunkingConfig, DEFAULT_HIERARCHICAL_CONFIG, DEFAULT_SEMANTIC_CONFIG } from '../models/segment.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing field
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    const errors = result.error.errors.map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    });
    throw new ValidationError(errors.join('; '));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocumentStatusFilter = z.enum(['pending', 'processing', 'complete', 'failed']);

const DocumentId = z.string().min(1, 'Document ID is required');

/**
 * Per-request chunking override. Unset fields keep the configured values.
 */
const ChunkingOverride = {
  strategy: z.enum(['hierarchical', 'semantic']).optional().describe('Chunking strategy'),
  max_tokens: z.number().int().min(16).max(32000).optional().describe('Token ceiling per segment'),
  overlap_tokens: z
    .number()
    .int()
    .min(0)
    .max(8000)
    .optional()
    .describe('Hierarchical only: tokens shared by adjacent windows'),
  similarity_threshold: z
    .number()
    .min(-1)
    .max(1)
    .optional()
    .describe('Semantic only: minimum cosine similarity to extend a segment'),
};

/**
 * Merge a request's chunking fields over the configured chunking.
 * Switching strategy without the new strategy's parameter takes its default.
 */
export function applyChunkingOverride(
  base: ChunkingConfig,
  input: {
    strategy?: ChunkingConfig['strategy'];
    max_tokens?: number;
    overlap_tokens?: number;
    similarity_threshold?: number;
  }
): ChunkingConfig {
  const strategy = input.strategy ?? base.strategy;
  const maxTokens = input.max_tokens ?? base.maxTokens;
  if (strategy === 'semantic') {
    return {
      strategy,
      maxTokens,
      similarityThreshold:
        input.similarity_threshold ??
        (base.strategy === 'semantic' ? base.similarityThreshold : DEFAULT_SEMANTIC_CONFIG.similarityThreshold),
    };
  }
  return {
    strategy,
    maxTokens,
    overlapTokens:
      input.overlap_tokens ??
      (base.strategy === 'hierarchical' ? base.overlapTokens : DEFAULT_HIERARCHICAL_CONFIG.overlapTokens),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const IngestTextInput = z.object({
  source_name: z.string().min(1).max(500).describe('Name used in citations, e.g. "handbook.pdf"'),
  pages: z
    .array(z.string())
    .min(1, 'At least one page is required')
    .max(10000)
    .describe('Page texts in order; page numbers start at 1'),
  file_type: z.string().min(1).max(20).default('txt').describe('Recorded file type'),
  ...ChunkingOverride,
});

export const IngestFileInput = z.object({
  file_path: z.string().min(1).describe('Path to a UTF-8 .txt or .md file'),
  ...ChunkingOverride,
});

export const DocumentReembedInput = z.object({
  document_id: DocumentId,
});

// ═══════════════════════════════════════════════════════════════════════════════
// QUERY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const QueryShape = {
  document_id: DocumentId,
  query: z.string().min(1, 'Query is required').max(10000),
  conversation_id: z.string().min(1).optional().describe('Continue an existing conversation'),
  initial_k: z.number().int().min(1).max(200).optional().describe('Candidates from vector search'),
  final_k: z.number().int().min(1).max(200).optional().describe('Evidence items kept after re-ranking'),
  timeout_ms: z
    .number()
    .int()
    .min(1000)
    .max(600000)
    .optional()
    .describe('Deadline for each model call'),
};

const kOrdered = (input: { initial_k?: number; final_k?: number }): boolean =>
  input.initial_k === undefined || input.final_k === undefined || input.final_k <= input.initial_k;

export const QueryInput = z.object(QueryShape).refine(kOrdered, {
  message: 'final_k must not exceed initial_k',
  path: ['final_k'],
});

export const RetrieveShape = {
  ...QueryShape,
  include_text: z.boolean().default(true).describe('Include segment text in evidence'),
};

export const RetrieveInput = z
  .object(RetrieveShape)
  .refine(kOrdered, { message: 'final_k must not exceed initial_k', path: ['final_k'] });

// ═══════════════════════════════════════════════════════════════════════════════
// DOCUMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DocumentListInput = z.object({
  status_filter: DocumentStatusFilter.optional(),
  limit: z.number().int().min(1).max(1000).default(50),
  offset: z.number().int().min(0).default(0),
});

export const DocumentGetInput = z.object({
  document_id: DocumentId,
  include_segments: z.boolean().default(false),
  segment_limit: z.number().int().min(1).max(1000).default(100),
  segment_offset: z.number().int().min(0).default(0),
});

export const DocumentDeleteInput = z.object({
  document_id: DocumentId,
  confirm: z.literal(true, {
    errorMap: () => ({ message: 'Confirm must be true to delete document' }),
  }),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONVERSATION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConversationGetInput = z.object({
  conversation_id: z.string().min(1, 'Conversation ID is required'),
});

export const ConversationListInput = z.object({
  document_id: DocumentId,
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConfigSetShape = {
  initial_k: z.number().int().min(1).max(200).optional().describe('Default candidates from vector search'),
  final_k: z.number().int().min(1).max(200).optional().describe('Default evidence items kept'),
};

export const ConfigSetInput = z
  .object(ConfigSetShape)
  .refine((input) => input.initial_k !== undefined || input.final_k !== undefined, {
    message: 'Provide initial_k, final_k or both',
  });

// ═══════════════════════════════════════════════════════════════════════════════
// PATH SANITIZATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Resolve a path and require it to sit under one of the allowed directories
 * (default: home, temp dir and the working directory).
 *
 * @throws ValidationError for null bytes or a path outside every allowed directory
 */
export function sanitizePath(filePath: string, allowedBaseDirs: string[] = []): string {
  if (filePath.includes('\0')) {
    throw new ValidationError('Path contains null bytes');
  }

  const resolved = path.resolve(filePath);
  const baseDirs = allowedBaseDirs.length > 0 ? allowedBaseDirs : [homedir(), tmpdir(), process.cwd()];
  const resolvedBases = baseDirs.map((d) => path.resolve(d));
  const withinAllowed = resolvedBases.some(
    (base) => resolved === base || resolved.startsWith(base + path.sep)
  );
  if (!withinAllowed) {
    throw new ValidationError(
      `Path "${resolved}" is outside allowed directories: ${resolvedBases.join(', ')}. ` +
        'Set RAG_ALLOWED_DIRS (comma-separated) to allow it.'
    );
  }
  return resolved;
}
