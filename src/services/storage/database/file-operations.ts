/**
 * Source file and chunk operations for DatabaseService
 *
 * Files are deduplicated on content_hash. Deleting a file removes its chunks
 * (ON DELETE CASCADE) and every proposal that carries its id as source_file_id.
 * Approved ontology rows are kept.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type { FileStatus, SourceChunk, SourceFile } from '../../../models/file.js';
import { nowIso, touchMetadata } from './helpers.js';

export interface NewFile {
  file_name: string;
  mime_type: string;
  size_bytes: number;
  content_hash: string;
}

export interface DeleteFileResult {
  file_id: string;
  chunks_deleted: number;
  proposals_deleted: number;
}

/**
 * Insert a file row with status 'uploaded'
 *
 * @returns the stored file, or null when a file with the same hash exists
 */
export function insertFile(db: Database.Database, file: NewFile): SourceFile | null {
  return db.transaction((): SourceFile | null => {
    if (getFileByHash(db, file.content_hash)) {
      return null;
    }
    const stored: SourceFile = {
      id: uuidv4(),
      file_name: file.file_name,
      mime_type: file.mime_type,
      size_bytes: file.size_bytes,
      content_hash: file.content_hash,
      status: 'uploaded',
      created_at: nowIso(),
    };
    db.prepare(
      `INSERT INTO files (id, file_name, mime_type, size_bytes, content_hash, status, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    ).run(
      stored.id,
      stored.file_name,
      stored.mime_type,
      stored.size_bytes,
      stored.content_hash,
      stored.status,
      stored.created_at
    );
    touchMetadata(db);
    return stored;
  })();
}

export function getFile(db: Database.Database, id: string): SourceFile | null {
  return db.prepare<[string], SourceFile>('SELECT * FROM files WHERE id = ?').get(id) ?? null;
}

export function getFileByHash(db: Database.Database, contentHash: string): SourceFile | null {
  return (
    db.prepare<[string], SourceFile>('SELECT * FROM files WHERE content_hash = ?').get(contentHash) ?? null
  );
}

/** Files in upload order */
export function listFiles(db: Database.Database): SourceFile[] {
  return db.prepare<[], SourceFile>('SELECT * FROM files ORDER BY rowid').all();
}

/**
 * @returns false when no file has the given id
 */
export function updateFileStatus(db: Database.Database, id: string, status: FileStatus): boolean {
  const result = db.prepare('UPDATE files SET status = ? WHERE id = ?').run(status, id);
  if (result.changes > 0) touchMetadata(db);
  return result.changes > 0;
}

/**
 * @returns null when no file has the given id
 */
export function deleteFile(db: Database.Database, id: string): DeleteFileResult | null {
  return db.transaction((): DeleteFileResult | null => {
    if (!getFile(db, id)) return null;
    const chunks = db.prepare('DELETE FROM chunks WHERE file_id = ?').run(id).changes;
    const proposals = db.prepare('DELETE FROM proposals WHERE source_file_id = ?').run(id).changes;
    db.prepare('DELETE FROM files WHERE id = ?').run(id);
    touchMetadata(db);
    return { file_id: id, chunks_deleted: chunks, proposals_deleted: proposals };
  })();
}

/**
 * Return a failed file to 'uploaded' for another ingestion attempt: its chunks
 * and proposals are removed and it takes the new upload's name.
 *
 * @returns null when no file has the given id or its status is not 'failed'
 */
export function resetFailedFile(db: Database.Database, id: string, fileName: string): SourceFile | null {
  return db.transaction((): SourceFile | null => {
    const file = getFile(db, id);
    if (!file || file.status !== 'failed') return null;
    db.prepare('DELETE FROM chunks WHERE file_id = ?').run(id);
    db.prepare('DELETE FROM proposals WHERE source_file_id = ?').run(id);
    db.prepare("UPDATE files SET status = 'uploaded', file_name = ? WHERE id = ?").run(fileName, id);
    touchMetadata(db);
    return { ...file, file_name: fileName, status: 'uploaded' };
  })();
}

/**
 * Store chunk texts for a file, numbered from 0 in the given order
 */
export function insertChunks(db: Database.Database, fileId: string, texts: readonly string[]): SourceChunk[] {
  const stmt = db.prepare('INSERT INTO chunks (id, file_id, chunk_index, text) VALUES (?, ?, ?, ?)');
  return db.transaction((): SourceChunk[] => {
    const chunks = texts.map((text, index): SourceChunk => {
      const chunk: SourceChunk = { id: uuidv4(), file_id: fileId, chunk_index: index, text };
      stmt.run(chunk.id, chunk.file_id, chunk.chunk_index, chunk.text);
      return chunk;
    });
    touchMetadata(db);
    return chunks;
  })();
}

export function getChunks(db: Database.Database, fileId: string): SourceChunk[] {
  return db
    .prepare<[string], SourceChunk>('SELECT * FROM chunks WHERE file_id = ? ORDER BY chunk_index')
    .all(fileId);
}
