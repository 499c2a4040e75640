/**
 * MCP Server State Management
 *
 * Holds the selected database, runtime configuration and the LLM provider.
 * FAIL FAST: All state access throws immediately if preconditions not met.
 *
 * @module server/state
 */

import { DatabaseService } from '../services/storage/database/index.js';
import { DEFAULT_STORAGE_PATH } from '../services/storage/database/helpers.js';
import { loadGeminiConfig, type GeminiConfig } from '../services/gemini/config.js';
import type { LLMProvider } from '../services/gemini/provider.js';
import { OntologyExtractor } from '../services/ontology/ontology-extractor.js';
import { AnswerService } from '../services/ontology/answer-service.js';
import type { ChunkingConfig } from '../services/chunking/chunker.js';
import { databaseNotSelectedError, databaseNotFoundError, databaseAlreadyExistsError } from './errors.js';
import type { ServerState, ServerConfig } from './types.js';

// ═══════════════════════════════════════════════════════════════════════════════
// DEFAULT CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Defaults, with model names and temperature taken from the Gemini config
 */
export function buildDefaultConfig(gemini: GeminiConfig = loadGeminiConfig()): ServerConfig {
  return {
    defaultStoragePath: process.env.ONTOLOGY_STORAGE_PATH?.trim() || DEFAULT_STORAGE_PATH,
    extractionModel: gemini.extractionModel,
    answerModel: gemini.answerModel,
    temperature: gemini.temperature,
    extractionMaxOutputTokens: 4096,
    answerMaxOutputTokens: 1000,
    reductionThreshold: 2000,
    reductionHardCap: 1500,
    chunkSize: 1000,
    chunkOverlap: 200,
    contextSampleSize: 3,
  };
}

const unconfiguredProvider = (gemini: GeminiConfig): LLMProvider => ({
  status: 'unconfigured',
  reason: 'LLM provider has not been initialised',
  config: gemini,
});

// ═══════════════════════════════════════════════════════════════════════════════
// GLOBAL STATE
// ═══════════════════════════════════════════════════════════════════════════════

const initialGemini = loadGeminiConfig();
let defaultConfig: ServerConfig = buildDefaultConfig(initialGemini);

export const state: ServerState = {
  currentDatabase: null,
  currentDatabaseName: null,
  config: { ...defaultConfig },
  llm: unconfiguredProvider(initialGemini),
};

// ═══════════════════════════════════════════════════════════════════════════════
// LLM PROVIDER AND SERVICES
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Install the provider built at startup and align model defaults with it
 */
export function setLLMProvider(provider: LLMProvider): void {
  state.llm = provider;
  defaultConfig = buildDefaultConfig(provider.config);
  state.config = {
    ...state.config,
    extractionModel: provider.config.extractionModel,
    answerModel: provider.config.answerModel,
    temperature: provider.config.temperature,
  };
}

export function getLLMProvider(): LLMProvider {
  return state.llm;
}

export function getChunkingConfig(): ChunkingConfig {
  return { chunkSize: state.config.chunkSize, overlap: state.config.chunkOverlap };
}

/**
 * Extractor configured from the current server config
 */
export function createExtractor(): OntologyExtractor {
  const config = state.config;
  return new OntologyExtractor(state.llm, {
    model: config.extractionModel,
    temperature: config.temperature,
    maxOutputTokens: config.extractionMaxOutputTokens,
    reduction: { threshold: config.reductionThreshold, hardCap: config.reductionHardCap },
  });
}

export function createAnswerService(): AnswerService {
  const config = state.config;
  return new AnswerService(state.llm, {
    model: config.answerModel,
    temperature: config.temperature,
    maxOutputTokens: config.answerMaxOutputTokens,
    sampleSize: config.contextSampleSize,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE ACCESS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Require database to be selected - FAIL FAST if not
 *
 * @throws MCPError with DATABASE_NOT_SELECTED if no database is selected
 */
export function requireDatabase(): DatabaseService {
  if (!state.currentDatabase) {
    throw databaseNotSelectedError();
  }
  return state.currentDatabase;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Select a database by name - opens connection and sets as current
 *
 * @throws MCPError with DATABASE_NOT_FOUND if database doesn't exist
 */
export function selectDatabase(name: string, storagePath?: string): DatabaseService {
  const path = storagePath ?? state.config.defaultStoragePath;

  clearDatabase();

  if (!DatabaseService.exists(name, path)) {
    throw databaseNotFoundError(name, path);
  }

  state.currentDatabase = DatabaseService.open(name, path);
  state.currentDatabaseName = name;
  return state.currentDatabase;
}

/**
 * Create a new database and optionally select it
 *
 * @throws MCPError with DATABASE_ALREADY_EXISTS if database exists
 */
export function createDatabase(
  name: string,
  description?: string,
  storagePath?: string,
  autoSelect: boolean = true
): DatabaseService {
  const path = storagePath ?? state.config.defaultStoragePath;

  if (DatabaseService.exists(name, path)) {
    throw databaseAlreadyExistsError(name);
  }

  const db = DatabaseService.create(name, description, path);

  if (autoSelect) {
    clearDatabase();
    state.currentDatabase = db;
    state.currentDatabaseName = name;
  }
  // When autoSelect=false the caller owns the returned connection

  return db;
}

/**
 * Delete a database, closing it first if it is the current one
 *
 * @throws MCPError with DATABASE_NOT_FOUND if database doesn't exist
 */
export function deleteDatabase(name: string, storagePath?: string): void {
  const path = storagePath ?? state.config.defaultStoragePath;

  if (!DatabaseService.exists(name, path)) {
    throw databaseNotFoundError(name, path);
  }

  if (state.currentDatabaseName === name) {
    clearDatabase();
  }

  DatabaseService.delete(name, path);
}

/**
 * Clear current database selection - closes connection
 */
export function clearDatabase(): void {
  if (state.currentDatabase) {
    state.currentDatabase.close();
    state.currentDatabase = null;
    state.currentDatabaseName = null;
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION
// ═══════════════════════════════════════════════════════════════════════════════

export function getConfig(): ServerConfig {
  return { ...state.config };
}

export function updateConfig(updates: Partial<ServerConfig>): void {
  state.config = { ...state.config, ...updates };
}

export function resetConfig(): void {
  state.config = { ...defaultConfig };
}

// ═══════════════════════════════════════════════════════════════════════════════
// STATE RESET (FOR TESTS)
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Reset all server state - ONLY USE IN TESTS
 */
export function resetState(): void {
  clearDatabase();
  const gemini = loadGeminiConfig();
  defaultConfig = buildDefaultConfig(gemini);
  state.config = { ...defaultConfig };
  state.llm = unconfiguredProvider(gemini);
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROCESS EXIT CLEANUP
// ═══════════════════════════════════════════════════════════════════════════════

// Close on exit so the WAL is checkpointed
process.on('exit', () => {
  if (state.currentDatabase) {
    try {
      state.currentDatabase.close();
    } catch (error) {
      console.error(`[State] Failed to close database on exit: ${String(error)}`);
    }
    state.currentDatabase = null;
    state.currentDatabaseName = null;
  }
});
