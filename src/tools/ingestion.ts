/**
 * Ingestion MCP Tools
 *
 * Tools: onto_ingest_json, onto_extract_preview, onto_text_chunk
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/ingestion
 */

import { z } from 'zod';
import { existsSync, readFileSync, statSync } from 'fs';
import { basename, resolve } from 'path';
import { requireDatabase, createExtractor, getChunkingConfig } from '../server/state.js';
import { successResult } from '../server/types.js';
import { pathNotFoundError, validationError } from '../server/errors.js';
import {
  validateInput,
  IngestJsonInput,
  ExtractPreviewInput,
  TextChunkInput,
  type JsonSourceInput,
} from '../utils/validation.js';
import { ingestJsonDocument, parseJsonContent } from '../services/ontology/ingest.js';
import { buildProposals } from '../services/ontology/proposal-builder.js';
import { chunkText, validateChunkingConfig, type ChunkingConfig } from '../services/chunking/chunker.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export const INLINE_FILE_NAME = 'inline.json';

export interface JsonSource {
  fileName: string;
  content: string;
}

/**
 * Resolve a tool's file_path/content input to a name and raw text
 */
export function readJsonSource(input: JsonSourceInput): JsonSource {
  if (input.file_path !== undefined) {
    const filePath = resolve(input.file_path);
    if (!existsSync(filePath) || !statSync(filePath).isFile()) {
      throw pathNotFoundError(filePath);
    }
    return {
      fileName: input.file_name ?? basename(filePath),
      content: readFileSync(filePath, 'utf-8'),
    };
  }
  if (input.content !== undefined) {
    return { fileName: input.file_name ?? INLINE_FILE_NAME, content: input.content };
  }
  throw validationError('Provide exactly one of file_path or content');
}

function checkedChunkingConfig(config: ChunkingConfig): ChunkingConfig {
  try {
    validateChunkingConfig(config);
  } catch (error) {
    throw validationError(error instanceof Error ? error.message : String(error), { ...config });
  }
  return config;
}

export async function handleIngestJson(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(IngestJsonInput, params);
    const db = requireDatabase();
    const source = readJsonSource(input);

    const summary = await ingestJsonDocument(db, createExtractor(), {
      fileName: source.fileName,
      content: source.content,
      chunking: checkedChunkingConfig(getChunkingConfig()),
    });

    return formatResponse(successResult(summary));
  } catch (error) {
    return handleError(error);
  }
}

export async function handleExtractPreview(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ExtractPreviewInput, params);
    const source = readJsonSource(input);
    const document = parseJsonContent(source.content, source.fileName);

    const run = await createExtractor().extract(document, source.fileName);
    const batch = buildProposals(run.result);

    return formatResponse(
      successResult({
        file_name: source.fileName,
        reduced_payload: {
          text: run.reduced.text,
          original_length: run.reduced.originalLength,
          sampled: run.reduced.sampled,
          truncated: run.reduced.truncated,
        },
        extraction_status: run.status,
        model: run.model,
        prompt_version: run.promptVersion,
        parse_failure: run.failure ?? null,
        tokens_used: run.usage?.totalTokens ?? 0,
        proposals: batch.proposals,
        diagnostics: batch.diagnostics,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleTextChunk(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(TextChunkInput, params);
    const defaults = getChunkingConfig();
    const config = checkedChunkingConfig({
      chunkSize: input.chunk_size ?? defaults.chunkSize,
      overlap: input.chunk_overlap ?? defaults.overlap,
    });

    const chunks = chunkText(input.text, config);
    return formatResponse(
      successResult({
        chunk_size: config.chunkSize,
        chunk_overlap: config.overlap,
        total_chunks: chunks.length,
        chunks: chunks.map((text, index) => ({ index, length: text.length, text })),
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

const jsonSourceSchema = {
  file_path: z.string().optional().describe('Path of a JSON file to read'),
  content: z.string().optional().describe('Inline JSON text (instead of file_path)'),
  file_name: z.string().optional().describe('Name recorded for the document'),
};

export const ingestionTools: Record<string, ToolDefinition> = {
  onto_ingest_json: {
    description:
      'Ingest a JSON document into the selected database: store it with its text chunks, extract ontology ' +
      'entities, relations and instances with the extraction model, and queue them as pending proposals',
    inputSchema: jsonSourceSchema,
    handler: handleIngestJson,
  },
  onto_extract_preview: {
    description:
      'Run payload reduction, ontology extraction and proposal building on a JSON document without storing anything',
    inputSchema: jsonSourceSchema,
    handler: handleExtractPreview,
  },
  onto_text_chunk: {
    description: 'Split text into overlapping chunks, preferring to break at spaces',
    inputSchema: {
      text: z.string().describe('Text to split'),
      chunk_size: z.number().int().min(1).optional().describe('Maximum chunk length in characters'),
      chunk_overlap: z.number().int().min(0).optional().describe('Characters shared by consecutive chunks'),
    },
    handler: handleTextChunk,
  },
};
