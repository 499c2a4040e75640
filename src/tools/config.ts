/**
 * Configuration Management MCP Tools
 *
 * Tools: onto_config_get, onto_config_set
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 * Use console.error() for all logging.
 *
 * @module tools/config
 */

import { z } from 'zod';
import { state, getConfig, updateConfig, getLLMProvider } from '../server/state.js';
import { successResult, type ServerConfig } from '../server/types.js';
import { validateInput, ConfigGetInput, ConfigSetInput, ConfigKey } from '../utils/validation.js';
import { validationError } from '../server/errors.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CONSTANTS
// ═══════════════════════════════════════════════════════════════════════════════

/** Map config keys to their state property names */
const CONFIG_KEY_MAP: Record<ConfigKey, keyof ServerConfig> = {
  extraction_model: 'extractionModel',
  answer_model: 'answerModel',
  temperature: 'temperature',
  extraction_max_output_tokens: 'extractionMaxOutputTokens',
  answer_max_output_tokens: 'answerMaxOutputTokens',
  reduction_threshold: 'reductionThreshold',
  reduction_hard_cap: 'reductionHardCap',
  chunk_size: 'chunkSize',
  chunk_overlap: 'chunkOverlap',
  context_sample_size: 'contextSampleSize',
};

function requireString(key: ConfigKey, v: unknown): string {
  if (typeof v !== 'string' || v.trim().length === 0) {
    throw validationError(`${key} must be a non-empty string`, { value: v });
  }
  return v.trim();
}

function requireNumber(key: ConfigKey, v: unknown, min: number, max: number, integer = true): number {
  if (typeof v !== 'number' || !Number.isFinite(v) || (integer && !Number.isInteger(v)) || v < min || v > max) {
    const kind = integer ? 'an integer' : 'a number';
    throw validationError(`${key} must be ${kind} between ${min} and ${max}`, { value: v });
  }
  return v;
}

/**
 * Validate a new value against its range and the current config
 */
function buildUpdate(key: ConfigKey, value: unknown, current: ServerConfig): Partial<ServerConfig> {
  switch (key) {
    case 'extraction_model':
      return { extractionModel: requireString(key, value) };
    case 'answer_model':
      return { answerModel: requireString(key, value) };
    case 'temperature':
      return { temperature: requireNumber(key, value, 0, 2, false) };
    case 'extraction_max_output_tokens':
      return { extractionMaxOutputTokens: requireNumber(key, value, 256, 65536) };
    case 'answer_max_output_tokens':
      return { answerMaxOutputTokens: requireNumber(key, value, 64, 65536) };
    case 'reduction_threshold':
      return { reductionThreshold: requireNumber(key, value, 100, 1_000_000) };
    case 'reduction_hard_cap':
      return { reductionHardCap: requireNumber(key, value, 100, 1_000_000) };
    case 'chunk_size': {
      const chunkSize = requireNumber(key, value, 100, 10000);
      if (current.chunkOverlap > Math.floor(chunkSize / 2)) {
        throw validationError(`chunk_size ${chunkSize} is too small for chunk_overlap ${current.chunkOverlap}`, {
          value: chunkSize,
          chunk_overlap: current.chunkOverlap,
        });
      }
      return { chunkSize };
    }
    case 'chunk_overlap':
      return { chunkOverlap: requireNumber(key, value, 0, Math.floor(current.chunkSize / 2)) };
    case 'context_sample_size':
      return { contextSampleSize: requireNumber(key, value, 0, 100) };
  }
}

function configSnapshot(): Record<ConfigKey, string | number> {
  const config = getConfig();
  return {
    extraction_model: config.extractionModel,
    answer_model: config.answerModel,
    temperature: config.temperature,
    extraction_max_output_tokens: config.extractionMaxOutputTokens,
    answer_max_output_tokens: config.answerMaxOutputTokens,
    reduction_threshold: config.reductionThreshold,
    reduction_hard_cap: config.reductionHardCap,
    chunk_size: config.chunkSize,
    chunk_overlap: config.chunkOverlap,
    context_sample_size: config.contextSampleSize,
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG TOOL HANDLERS
// ═══════════════════════════════════════════════════════════════════════════════

export async function handleConfigGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigGetInput, params);
    const snapshot = configSnapshot();

    if (input.key) {
      return formatResponse(successResult({ key: input.key, value: snapshot[input.key] }));
    }

    const llm = getLLMProvider();
    return formatResponse(
      successResult({
        ...snapshot,
        // Informational only
        storage_path: state.config.defaultStoragePath,
        current_database: state.currentDatabaseName,
        llm_status: llm.status,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleConfigSet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ConfigSetInput, params);
    updateConfig(buildUpdate(input.key, input.value, getConfig()));
    const field = CONFIG_KEY_MAP[input.key];

    return formatResponse(
      successResult({
        key: input.key,
        value: getConfig()[field],
        updated: true,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL DEFINITIONS FOR MCP REGISTRATION
// ═══════════════════════════════════════════════════════════════════════════════

export const configTools: Record<string, ToolDefinition> = {
  onto_config_get: {
    description: 'Get current runtime configuration',
    inputSchema: {
      key: ConfigKey.optional().describe('Specific config key to retrieve'),
    },
    handler: handleConfigGet,
  },
  onto_config_set: {
    description: 'Update a runtime configuration setting',
    inputSchema: {
      key: ConfigKey.describe('Configuration key to update'),
      value: z.union([z.string(), z.number(), z.boolean()]).describe('New value'),
    },
    handler: handleConfigSet,
  },
};
