/**
 * JSON document ingestion
 *
 * parse -> hash/dedupe -> store file and chunks -> extract -> store pending
 * proposals -> mark processed. A provider failure marks the file 'failed'
 * and propagates; an unconfigured provider or unparseable model output
 * yields a processed file with zero proposals. Content whose earlier ingestion
 * failed is ingested again under the same file id.
 *
 * @module services/ontology/ingest
 */

import type { StoredProposal } from '../../models/ontology.js';
import type { DatabaseService } from '../storage/database/service.js';
import { chunkText, DEFAULT_CHUNKING_CONFIG, type ChunkingConfig } from '../chunking/chunker.js';
import { computeHash } from '../../utils/hash.js';
import { ValidationError } from '../../utils/validation.js';
import type { OntologyExtractor, ExtractionStatus } from './ontology-extractor.js';
import type { ParseFailureReason } from './extraction-parser.js';
import { buildProposals, type ProposalDiagnostics } from './proposal-builder.js';

export const JSON_MIME_TYPE = 'application/json';

export interface IngestRequest {
  fileName: string;
  content: string;
  chunking?: ChunkingConfig;
}

export interface DuplicateIngest {
  duplicate: true;
  file_id: string;
  file_name: string;
  proposals_generated: 0;
}

export interface CompletedIngest {
  duplicate: false;
  file_id: string;
  file_name: string;
  size_bytes: number;
  content_hash: string;
  chunks_stored: number;
  extraction_status: ExtractionStatus;
  parse_failure: ParseFailureReason | null;
  proposals_generated: number;
  proposals: StoredProposal[];
  diagnostics: ProposalDiagnostics;
}

export type IngestSummary = DuplicateIngest | CompletedIngest;

/**
 * Parse JSON text or throw ValidationError
 */
export function parseJsonContent(content: string, fileName: string): unknown {
  try {
    return JSON.parse(content);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`File '${fileName}' is not valid JSON: ${detail}`);
  }
}

export async function ingestJsonDocument(
  db: DatabaseService,
  extractor: OntologyExtractor,
  request: IngestRequest
): Promise<IngestSummary> {
  const { fileName, content } = request;
  const document = parseJsonContent(content, fileName);
  const contentHash = computeHash(content);

  const sizeBytes = Buffer.byteLength(content, 'utf8');
  let file = db.insertFile({
    file_name: fileName,
    mime_type: JSON_MIME_TYPE,
    size_bytes: sizeBytes,
    content_hash: contentHash,
  });
  if (!file) {
    const existing = db.getFileByHash(contentHash);
    if (!existing) throw new Error(`No file with hash ${contentHash} after duplicate insert`);
    if (existing.status !== 'failed') {
      console.error(`[Ingest] '${fileName}' duplicates file ${existing.id}, skipping extraction`);
      return { duplicate: true, file_id: existing.id, file_name: existing.file_name, proposals_generated: 0 };
    }
    const retried = db.resetFailedFile(existing.id, fileName);
    if (!retried) throw new Error(`File ${existing.id} could not be reset for another attempt`);
    console.error(`[Ingest] '${fileName}' retries previously failed file ${existing.id}`);
    file = retried;
  }

  try {
    const chunks = db.insertChunks(file.id, chunkText(content, request.chunking ?? DEFAULT_CHUNKING_CONFIG));
    const run = await extractor.extract(document, fileName);
    const batch = buildProposals(run.result, file.id);
    const proposals = db.insertProposals(batch.proposals);
    db.updateFileStatus(file.id, 'processed');

    console.error(
      `[Ingest] '${fileName}' processed: ${chunks.length} chunks, ${proposals.length} proposals (${run.status})`
    );

    return {
      duplicate: false,
      file_id: file.id,
      file_name: file.file_name,
      size_bytes: sizeBytes,
      content_hash: contentHash,
      chunks_stored: chunks.length,
      extraction_status: run.status,
      parse_failure: run.failure?.reason ?? null,
      proposals_generated: proposals.length,
      proposals,
      diagnostics: batch.diagnostics,
    };
  } catch (error) {
    console.error(`[Ingest] Ingestion of '${fileName}' failed: ${String(error)}`);
    db.updateFileStatus(file.id, 'failed');
    throw error;
  }
}
