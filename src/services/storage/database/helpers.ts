/**
 * Helper functions for DatabaseService
 */

import Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default database file
 */
export const DEFAULT_DATABASE_PATH = join(homedir(), '.cited-retrieval', 'retrieval.db');

/**
 * Run a statement, converting SQLite FK constraint errors to DatabaseError.
 *
 * @param context - Error context (e.g., "inserting segments: document does not exist")
 */
export function runWithForeignKeyCheck<P extends unknown[]>(
  stmt: Database.Statement<P>,
  params: P,
  context: string
): Database.RunResult {
  try {
    return stmt.run(...params);
  } catch (error) {
    if (error instanceof Error && error.message.includes('FOREIGN KEY constraint failed')) {
      throw new DatabaseError(
        `Foreign key violation ${context}`,
        DatabaseErrorCode.FOREIGN_KEY_VIOLATION,
        error
      );
    }
    throw error;
  }
}

export function placeholders(count: number): string {
  return Array.from({ length: count }, () => '?').join(', ');
}
