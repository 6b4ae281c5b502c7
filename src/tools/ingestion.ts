/**
 * Ingestion MCP Tools
 *
 * Tools: rag_ingest_text, rag_ingest_file, rag_document_reembed
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/ingestion
 */

import { existsSync } from 'fs';
import { getConfig, requireServices } from '../server/state.js';
import { successResult } from '../server/types.js';
import { pathNotFoundError } from '../server/errors.js';
import {
  applyChunkingOverride,
  DocumentReembedInput,
  IngestFileInput,
  IngestTextInput,
  sanitizePath,
  validateInput,
} from '../utils/validation.js';
import { formatResponse, handleError, type ToolDefinition, type ToolResponse } from './shared.js';

export async function handleIngestText(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestTextInput, params);
    const { ingestion } = requireServices();

    const result = await ingestion.ingest({
      source_name: input.source_name,
      file_type: input.file_type,
      pages: input.pages.map((raw_text, i) => ({ page_number: i + 1, raw_text })),
      chunking: applyChunkingOverride(getConfig().chunking, input),
    });
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleIngestFile(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestFileInput, params);
    const filePath = sanitizePath(input.file_path, getConfig().allowedDirs);
    if (!existsSync(filePath)) {
      throw pathNotFoundError(filePath);
    }
    const { ingestion } = requireServices();

    const result = await ingestion.ingestFile(filePath, applyChunkingOverride(getConfig().chunking, input));
    return formatResponse(successResult(result));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleDocumentReembed(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(DocumentReembedInput, params);
    const { ingestion } = requireServices();
    return formatResponse(successResult(await ingestion.reembedDocument(input.document_id)));
  } catch (error) {
    return handleError(error);
  }
}

export const ingestionTools: Record<string, ToolDefinition> = {
  rag_ingest_text: {
    description:
      '[ESSENTIAL] Use to add a document from already-extracted page texts. Chunks, embeds and indexes it; the document is queryable once status is complete. Returns document_id.',
    inputSchema: IngestTextInput.shape,
    handler: handleIngestText,
  },
  rag_ingest_file: {
    description:
      '[ESSENTIAL] Use to add a UTF-8 .txt or .md file. Pages split on form feeds, else about every 3000 characters. Returns document_id.',
    inputSchema: IngestFileInput.shape,
    handler: handleIngestFile,
  },
  rag_document_reembed: {
    description:
      '[MAINTENANCE] Use after changing the embedding model. Replaces a document\'s vectors; segments are kept.',
    inputSchema: DocumentReembedInput.shape,
    handler: handleDocumentReembed,
  },
};
