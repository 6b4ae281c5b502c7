/**
 * Service wiring
 *
 * Builds the service graph from AppConfig. The vector index shares the
 * database connection so ingestion writes land in one transaction.
 *
 * @module server/services
 */

import { createTokenCounter } from '../services/chunking/token-counter.js';
import { ConversationStore } from '../services/conversation/conversation-store.js';
import { Embedder } from '../services/embedding/embedder.js';
import { SentenceTransformerModel } from '../services/embedding/sentence-transformers.js';
import { PlainTextExtractor } from '../services/extraction/extractor.js';
import { OllamaGenerator } from '../services/generation/ollama.js';
import { IngestionService } from '../services/ingestion/ingestion-service.js';
import { QuestionAnsweringService } from '../services/qa/qa-service.js';
import { RetrievalPipeline } from '../services/retrieval/pipeline.js';
import { LocalCrossEncoder } from '../services/search/cross-encoder.js';
import { Reranker } from '../services/search/reranker.js';
import { DatabaseService } from '../services/storage/database/index.js';
import { SqliteVectorIndex } from '../services/storage/vector-index.js';
import type { AppConfig } from './config.js';
import type { ServiceContainer } from './types.js';

export function createServices(config: AppConfig): ServiceContainer {
  const db = DatabaseService.open(config.storagePath);
  const index = new SqliteVectorIndex(db.getConnection());
  const tokenCounter = createTokenCounter(config.tokenizer);

  const embedder = new Embedder(
    new SentenceTransformerModel({
      modelName: config.embedding.model,
      dimensions: config.embedding.dimensions,
      maxInputTokens: config.embedding.maxInputTokens,
      device: config.embedding.device,
      pythonPath: config.pythonPath,
      workerTimeoutMs: config.embedding.timeoutMs,
    }),
    {
      batchSize: config.embedding.batchSize,
      timeoutMs: config.embedding.timeoutMs,
      retry: config.retry,
    }
  );

  const reranker = new Reranker(
    new LocalCrossEncoder({
      modelName: config.reranker.model,
      pythonPath: config.pythonPath,
      workerTimeoutMs: config.reranker.timeoutMs,
    }),
    { timeoutMs: config.reranker.timeoutMs }
  );

  const pipeline = new RetrievalPipeline(
    { embedder, index, reranker, segments: db },
    config.retrieval
  );
  const conversations = new ConversationStore(db);

  const generator = new OllamaGenerator({
    baseUrl: config.generation.baseUrl,
    model: config.generation.model,
    requestTimeoutMs: config.generation.timeoutMs,
    retry: config.retry,
  });

  const ingestion = new IngestionService(
    { db, index, embedder, tokenCounter, extractor: new PlainTextExtractor() },
    {
      chunking: config.chunking,
      batchSize: config.embedding.batchSize,
      maxConcurrentBatches: config.ingestion.maxConcurrentBatches,
    }
  );
  const qa = new QuestionAnsweringService({ db, pipeline, conversations, generator });

  console.error(
    `[Services] db=${db.getPath()} embedding=${embedder.modelIdentity} reranker=${reranker.modelIdentity} ` +
      `generator=${generator.identity}`
  );
  return { db, index, embedder, pipeline, conversations, ingestion, qa };
}
