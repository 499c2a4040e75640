/**
 * Temporary database directories for storage tests
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DatabaseService } from '../../../src/services/storage/database/index.js';

export function createTestDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function cleanupTestDir(dir: string): void {
  rmSync(dir, { recursive: true, force: true });
}

let counter = 0;

/** Fresh database with a unique name inside `dir` */
export function createFreshDatabase(dir: string, prefix = 'test'): DatabaseService {
  counter += 1;
  return DatabaseService.create(`${prefix}-${process.pid}-${counter}`, undefined, dir);
}

export function safeCloseDatabase(db: DatabaseService | undefined): void {
  if (!db) return;
  try {
    db.close();
  } catch (error) {
    console.error(`[test-db] close failed: ${String(error)}`);
  }
}
