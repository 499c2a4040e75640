/**
 * MCP Server Type Definitions
 *
 * Defines interfaces for tool results, server configuration, and state.
 *
 * @module server/types
 */

import type { ErrorResponse } from './errors.js';
import type { DatabaseService } from '../services/storage/database/index.js';
import type { LLMProvider } from '../services/gemini/provider.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL RESULT TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export interface ToolResultSuccess<T = unknown> {
  success: true;
  data: T;
}

/** Body of every tool response */
export type ToolResult<T = unknown> = ToolResultSuccess<T> | ErrorResponse;

export function successResult<T>(data: T): ToolResultSuccess<T> {
  return { success: true, data };
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Runtime configuration. Each key is read by the component it names.
 */
export interface ServerConfig {
  /** Directory holding the *.db files */
  defaultStoragePath: string;

  /** Model for ontology extraction */
  extractionModel: string;

  /** Model for question answering */
  answerModel: string;

  /** Sampling temperature for both calls */
  temperature: number;

  extractionMaxOutputTokens: number;

  answerMaxOutputTokens: number;

  /** Serialized payload length above which the document is sampled */
  reductionThreshold: number;

  /** Maximum payload length sent to the extraction model */
  reductionHardCap: number;

  /** Chunk size in characters */
  chunkSize: number;

  /** Chunk overlap in characters, at most half of chunkSize */
  chunkOverlap: number;

  /** Instances listed per entity in assembled context */
  contextSampleSize: number;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SERVER STATE
// ═══════════════════════════════════════════════════════════════════════════════

export interface ServerState {
  /** Currently selected database instance */
  currentDatabase: DatabaseService | null;

  /** Name of the currently selected database */
  currentDatabaseName: string | null;

  config: ServerConfig;

  /** Set once at startup */
  llm: LLMProvider;
}
