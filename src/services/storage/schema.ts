/**
 * SQL schema and database initialization
 *
 * Vectors live in a plain table as float32 BLOBs rather than a fixed-width
 * vec0 virtual table: several embedding models (and so dimensions) can
 * coexist, and sqlite-vec's vec_distance_cosine() scores them at query time.
 *
 * @module services/storage/schema
 */

import type Database from 'better-sqlite3';
import { createRequire } from 'module';
import { DatabaseError, DatabaseErrorCode } from './database/types.js';

const require = createRequire(import.meta.url);

/** The part of the sqlite-vec package used here */
interface SqliteVecModule {
  load: (db: Database.Database) => void;
}

/** Current schema version */
export const SCHEMA_VERSION = 1;

export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
  'PRAGMA cache_size = -64000',
  'PRAGMA busy_timeout = 30000',
] as const;

const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)`;

const CREATE_DOCUMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS documents (
  document_id TEXT PRIMARY KEY,
  source_name TEXT NOT NULL,
  file_type TEXT NOT NULL,
  content_hash TEXT NOT NULL,
  page_count INTEGER NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('pending', 'processing', 'complete', 'failed')),
  error_message TEXT,
  chunking_strategy TEXT,
  model_identity TEXT,
  segment_count INTEGER NOT NULL DEFAULT 0,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
)`;

const CREATE_DOCUMENT_PAGES_TABLE = `
CREATE TABLE IF NOT EXISTS document_pages (
  document_id TEXT NOT NULL REFERENCES documents(document_id) ON DELETE CASCADE,
  page_number INTEGER NOT NULL,
  raw_text TEXT NOT NULL,
  PRIMARY KEY (document_id, page_number)
)`;

const CREATE_SEGMENTS_TABLE = `
CREATE TABLE IF NOT EXISTS segments (
  segment_id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(document_id) ON DELETE CASCADE,
  order_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  page_number INTEGER,
  parent_segment_id TEXT,
  char_start INTEGER NOT NULL,
  char_end INTEGER NOT NULL,
  token_count INTEGER NOT NULL,
  overlap_previous INTEGER NOT NULL DEFAULT 0,
  content_hash TEXT NOT NULL,
  UNIQUE (document_id, order_index)
)`;

/**
 * seq keeps insertion order: it breaks score ties and survives re-upserts.
 */
const CREATE_VECTOR_ENTRIES_TABLE = `
CREATE TABLE IF NOT EXISTS vector_entries (
  seq INTEGER PRIMARY KEY AUTOINCREMENT,
  segment_id TEXT NOT NULL UNIQUE,
  document_id TEXT NOT NULL,
  model_identity TEXT NOT NULL,
  dimensions INTEGER NOT NULL,
  vector BLOB NOT NULL,
  metadata TEXT NOT NULL DEFAULT '{}',
  updated_at TEXT NOT NULL
)`;

const CREATE_CONVERSATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS conversations (
  conversation_id TEXT PRIMARY KEY,
  document_id TEXT NOT NULL REFERENCES documents(document_id) ON DELETE CASCADE,
  created_at TEXT NOT NULL
)`;

const CREATE_CONVERSATION_TURNS_TABLE = `
CREATE TABLE IF NOT EXISTS conversation_turns (
  conversation_id TEXT NOT NULL REFERENCES conversations(conversation_id) ON DELETE CASCADE,
  turn_index INTEGER NOT NULL,
  query TEXT NOT NULL,
  answer TEXT NOT NULL,
  cited_pages TEXT NOT NULL DEFAULT '[]',
  created_at TEXT NOT NULL,
  PRIMARY KEY (conversation_id, turn_index)
)`;

const TABLE_DEFINITIONS = [
  CREATE_DOCUMENTS_TABLE,
  CREATE_DOCUMENT_PAGES_TABLE,
  CREATE_SEGMENTS_TABLE,
  CREATE_VECTOR_ENTRIES_TABLE,
  CREATE_CONVERSATIONS_TABLE,
  CREATE_CONVERSATION_TURNS_TABLE,
] as const;

const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_documents_status ON documents(status)',
  'CREATE INDEX IF NOT EXISTS idx_segments_document ON segments(document_id, order_index)',
  'CREATE INDEX IF NOT EXISTS idx_vector_entries_scope ON vector_entries(model_identity, dimensions, document_id)',
  'CREATE INDEX IF NOT EXISTS idx_vector_entries_document ON vector_entries(document_id)',
  'CREATE INDEX IF NOT EXISTS idx_conversations_document ON conversations(document_id)',
] as const;

/**
 * Load sqlite-vec into a connection. FAIL FAST if the extension is missing.
 */
export function loadSqliteVecExtension(db: Database.Database): void {
  try {
    const sqliteVec: SqliteVecModule = require('sqlite-vec');
    sqliteVec.load(db);
  } catch (error) {
    throw new DatabaseError(
      'sqlite-vec extension failed to load. Install: npm install sqlite-vec',
      DatabaseErrorCode.EXTENSION_LOAD_FAILED,
      error
    );
  }
}

export function configurePragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    db.exec(pragma);
  }
}

/**
 * Pragmas, extension, tables, indexes, version stamp. Idempotent.
 * The version is stamped last, inside the same transaction as the tables.
 */
export function initializeDatabase(db: Database.Database): void {
  configurePragmas(db);
  loadSqliteVecExtension(db);

  const init = db.transaction(() => {
    db.exec(CREATE_SCHEMA_VERSION_TABLE);
    for (const ddl of TABLE_DEFINITIONS) db.exec(ddl);
    for (const ddl of CREATE_INDEXES) db.exec(ddl);

    const now = new Date().toISOString();
    db.prepare(
      `INSERT INTO schema_version (id, version, created_at, updated_at)
       VALUES (1, ?, ?, ?)
       ON CONFLICT(id) DO NOTHING`
    ).run(SCHEMA_VERSION, now, now);
  });
  init();

  const row = db
    .prepare<[], { version: number }>('SELECT version FROM schema_version WHERE id = 1')
    .get();
  if (!row || row.version !== SCHEMA_VERSION) {
    throw new DatabaseError(
      `Unsupported schema version ${row?.version ?? 'none'}; expected ${SCHEMA_VERSION}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }
}
