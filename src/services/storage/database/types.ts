/**
 * Storage types: error class, database info and stats
 */

import type { ErrorCategory } from '../../../server/errors.js';

export enum DatabaseErrorCode {
  DATABASE_NOT_FOUND = 'DATABASE_NOT_FOUND',
  DATABASE_ALREADY_EXISTS = 'DATABASE_ALREADY_EXISTS',
  INVALID_NAME = 'INVALID_NAME',
  PERMISSION_DENIED = 'PERMISSION_DENIED',
  SCHEMA_MISMATCH = 'SCHEMA_MISMATCH',
  CORRUPT_ROW = 'CORRUPT_ROW',
}

const CODE_TO_CATEGORY: Record<DatabaseErrorCode, ErrorCategory> = {
  [DatabaseErrorCode.DATABASE_NOT_FOUND]: 'DATABASE_NOT_FOUND',
  [DatabaseErrorCode.DATABASE_ALREADY_EXISTS]: 'DATABASE_ALREADY_EXISTS',
  [DatabaseErrorCode.INVALID_NAME]: 'VALIDATION_ERROR',
  [DatabaseErrorCode.PERMISSION_DENIED]: 'INTERNAL_ERROR',
  [DatabaseErrorCode.SCHEMA_MISMATCH]: 'INTERNAL_ERROR',
  [DatabaseErrorCode.CORRUPT_ROW]: 'INTERNAL_ERROR',
};

export class DatabaseError extends Error {
  readonly code: DatabaseErrorCode;
  readonly category: ErrorCategory;

  constructor(message: string, code: DatabaseErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = 'DatabaseError';
    this.code = code;
    this.category = CODE_TO_CATEGORY[code];
  }
}

export interface DatabaseInfo {
  name: string;
  path: string;
  size_bytes: number;
  description: string | null;
  created_at: string;
  last_modified_at: string;
}

export interface DatabaseStats {
  name: string;
  path: string;
  files: number;
  chunks: number;
  proposals: { pending: number; approved: number; rejected: number };
  entities: number;
  relations: number;
  instances: number;
}

export interface MetadataRow {
  database_name: string;
  description: string | null;
  created_at: string;
  last_modified_at: string;
}
