/**
 * Chunking Service Module Exports
 *
 * @module services/chunking
 */

export {
  chunkText,
  maxChunkCount,
  validateChunkingConfig,
  DEFAULT_CHUNKING_CONFIG,
  type ChunkingConfig,
} from './chunker.js';
