/**
 * MCP Tool Module Exports
 *
 * @module tools
 */

import type { ToolDefinition } from './shared.js';
import { databaseTools } from './database.js';
import { ingestionTools } from './ingestion.js';
import { fileTools } from './files.js';
import { proposalTools } from './proposals.js';
import { ontologyTools } from './ontology.js';
import { configTools } from './config.js';

export * from './shared.js';
export * from './database.js';
export * from './ingestion.js';
export * from './files.js';
export * from './proposals.js';
export * from './ontology.js';
export * from './config.js';

/** Every tool the server registers, keyed by tool name */
export const allTools: Record<string, ToolDefinition> = {
  ...databaseTools,
  ...ingestionTools,
  ...fileTools,
  ...proposalTools,
  ...ontologyTools,
  ...configTools,
};
