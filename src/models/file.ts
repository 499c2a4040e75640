/**
 * Ingested source file and its text chunks
 *
 * @module models/file
 */

export type FileStatus = 'uploaded' | 'processed' | 'failed';

export interface SourceFile {
  id: string;
  file_name: string;
  mime_type: string;
  size_bytes: number;
  /** 'sha256:' + 64 hex chars, unique per database */
  content_hash: string;
  status: FileStatus;
  created_at: string;
}

export interface SourceChunk {
  id: string;
  file_id: string;
  chunk_index: number;
  text: string;
}
