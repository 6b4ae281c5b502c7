/**
 * Database Module - Public API
 */

export type { DatabaseStats, ListDocumentsOptions } from './types.js';
export { DatabaseErrorCode, DatabaseError } from './types.js';
export type { NewDocument, StatusUpdate } from './document-operations.js';

export { DatabaseService } from './service.js';
export { DEFAULT_DATABASE_PATH } from './helpers.js';
