export { DatabaseService } from './service.js';
export { DatabaseError, DatabaseErrorCode } from './types.js';
export type { DatabaseInfo, DatabaseStats } from './types.js';
export { DEFAULT_STORAGE_PATH, validateName, getDatabasePath } from './helpers.js';
export { SCHEMA_VERSION } from './schema.js';
export type { NewFile, DeleteFileResult } from './file-operations.js';
export { DEFAULT_PROPOSAL_AUTHOR } from './proposal-operations.js';
export type { ReviewAction, ReviewOutcome } from './proposal-operations.js';
export type { MergeResult } from './ontology-operations.js';
