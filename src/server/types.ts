/**
 * MCP Server Type Definitions
 *
 * @module server/types
 */

import type { DatabaseService } from '../services/storage/database/index.js';
import type { VectorIndex } from '../services/storage/vector-index.js';
import type { Embedder } from '../services/embedding/embedder.js';
import type { RetrievalPipeline } from '../services/retrieval/pipeline.js';
import type { ConversationStore } from '../services/conversation/conversation-store.js';
import type { IngestionService } from '../services/ingestion/ingestion-service.js';
import type { QuestionAnsweringService } from '../services/qa/qa-service.js';
import type { AppConfig } from './config.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Everything a tool handler needs, built once per server from AppConfig
 */
export interface ServiceContainer {
  db: DatabaseService;
  index: VectorIndex;
  embedder: Embedder;
  pipeline: RetrievalPipeline;
  conversations: ConversationStore;
  ingestion: IngestionService;
  qa: QuestionAnsweringService;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  config: AppConfig;
  /** Built on first use */
  services: ServiceContainer | null;
}
