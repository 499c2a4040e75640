/**
 * MCP Server Module Exports
 *
 * @module server
 */

export {
  MCPError,
  formatErrorResponse,
  validationError,
  databaseNotSelectedError,
  databaseNotFoundError,
  databaseAlreadyExistsError,
  fileNotFoundError,
  proposalNotFoundError,
  proposalAlreadyReviewedError,
  pathNotFoundError,
  type ErrorCategory,
  type ErrorResponse,
} from './errors.js';

export {
  type ToolResult,
  type ToolResultSuccess,
  type ServerConfig,
  type ServerState,
  successResult,
} from './types.js';

export {
  state,
  buildDefaultConfig,
  setLLMProvider,
  getLLMProvider,
  getChunkingConfig,
  createExtractor,
  createAnswerService,
  requireDatabase,
  selectDatabase,
  createDatabase,
  deleteDatabase,
  clearDatabase,
  getConfig,
  updateConfig,
  resetConfig,
  resetState,
} from './state.js';
