/**
 * Ontology extraction and question answering
 *
 * @module services/ontology
 */

export {
  reducePayload,
  samplePayload,
  serializePayload,
  truncateText,
  DEFAULT_REDUCTION_CONFIG,
  type ReducedPayload,
  type ReductionConfig,
} from './payload-reducer.js';
export { stripCodeFence, parseExtraction, parseExtractionOrEmpty, type ParseOutcome } from './extraction-parser.js';
export { buildProposals, normalizeProperties, type ProposalBatch, type ProposalDiagnostics } from './proposal-builder.js';
export { assembleContext, DEFAULT_CONTEXT_SAMPLE_SIZE } from './context-assembler.js';
export {
  OntologyExtractor,
  DEFAULT_EXTRACTION_MAX_OUTPUT_TOKENS,
  type ExtractionRun,
  type ExtractionStatus,
  type ExtractorOptions,
} from './ontology-extractor.js';
export {
  AnswerService,
  buildFallbackAnswer,
  DEFAULT_ANSWER_MAX_OUTPUT_TOKENS,
  type AnswerOptions,
  type AnswerResult,
} from './answer-service.js';
export { ingestJsonDocument, parseJsonContent, type IngestSummary, type IngestRequest } from './ingest.js';
export { PROMPT_VERSION } from './prompts.js';
