/**
 * Helper functions for DatabaseService
 *
 * Name validation, path resolution and JSON column decoding.
 */

import type Database from 'better-sqlite3';
import { homedir } from 'os';
import { join } from 'path';
import { DatabaseError, DatabaseErrorCode } from './types.js';

/**
 * Default storage path for databases
 */
export const DEFAULT_STORAGE_PATH = join(homedir(), '.ontology-extract', 'databases');

const VALID_NAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export function validateName(name: string): void {
  if (!name) {
    throw new DatabaseError('Database name is required', DatabaseErrorCode.INVALID_NAME);
  }
  if (!VALID_NAME_PATTERN.test(name)) {
    throw new DatabaseError(
      `Invalid database name "${name}". Only alphanumeric characters, underscores, and hyphens are allowed.`,
      DatabaseErrorCode.INVALID_NAME
    );
  }
}

export function getDatabasePath(name: string, storagePath?: string): string {
  return join(storagePath ?? DEFAULT_STORAGE_PATH, `${name}.db`);
}

export function nowIso(): string {
  return new Date().toISOString();
}

/**
 * Decode a JSON object column; anything else decodes to {}
 */
export function parseJsonObject(text: string | null): Record<string, unknown> {
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    if (typeof parsed === 'object' && parsed !== null && !Array.isArray(parsed)) {
      return Object.fromEntries(Object.entries(parsed));
    }
  } catch (error) {
    console.error(`[DatabaseService] Ignoring malformed JSON column: ${String(error)}`);
  }
  return {};
}

export function touchMetadata(db: Database.Database): void {
  db.prepare('UPDATE database_metadata SET last_modified_at = ? WHERE id = 1').run(nowIso());
}
