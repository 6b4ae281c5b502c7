/**
 * Configuration MCP Tools
 *
 * Tools: rag_config_get, rag_config_set
 *
 * Only retrieval depth changes at runtime. Models, chunking and storage
 * shape what is already stored and are read from RAG_* variables at start.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { getConfig, requireServices, updateRetrievalSettings } from '../server/state.js';
import { successResult } from '../server/types.js';
import { ConfigSetInput, ConfigSetShape, validateInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(z.object({}), params);
    const config = getConfig();
    const { db } = requireServices();

    return formatResponse(
      successResult({
        storage_path: config.storagePath,
        chunking: config.chunking,
        tokenizer: config.tokenizer,
        embedding: config.embedding,
        reranker: config.reranker,
        retrieval: config.retrieval,
        generation: config.generation,
        retry: config.retry,
        ingestion: config.ingestion,
        stats: db.getStats(),
        next_steps: [{ tool: 'rag_config_set', description: 'Change initial_k or final_k' }],
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    const retrieval = updateRetrievalSettings({
      ...(input.initial_k !== undefined && { initialK: input.initial_k }),
      ...(input.final_k !== undefined && { finalK: input.final_k }),
    });
    return formatResponse(
      successResult({ retrieval, updated: true, persisted: false })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const configTools: Record<string, ToolDefinition> = {
  rag_config_get: {
    description:
      '[STATUS] Use to view the active configuration (chunking, models, retrieval depth, timeouts) and storage statistics.',
    inputSchema: {},
    handler: handleConfigGet,
  },
  rag_config_set: {
    description:
      '[SETUP] Use to change the default retrieval depth for later queries. final_k must not exceed initial_k. Not persisted across restarts.',
    inputSchema: ConfigSetShape,
    handler: handleConfigSet,
  },
};
