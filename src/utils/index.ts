/**
 * Utility Functions Barrel Export
 *
 * @module utils
 */

export { computeHash, HASH_PREFIX } from './hash.js';

export {
  validateInput,
  ValidationError,
  ConfigKey,
  ProposalStatusFilter,
  ReviewActionInput,
  DatabaseCreateInput,
  DatabaseListInput,
  DatabaseSelectInput,
  DatabaseDeleteInput,
  JsonSourceInput,
  IngestJsonInput,
  ExtractPreviewInput,
  TextChunkInput,
  FileListInput,
  FileDeleteInput,
  ProposalListInput,
  ProposalReviewInput,
  OntologyGetInput,
  ContextBuildInput,
  QuestionAnswerInput,
  ConfigGetInput,
  ConfigSetInput,
} from './validation.js';
