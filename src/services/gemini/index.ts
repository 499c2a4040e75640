/**
 * Gemini API Service
 * Exports client, provider handle and configuration
 */

// Client
export {
  GeminiClient,
  LLMError,
  type LLMErrorCategory,
  type TextGenerationClient,
  type GenerationRequest,
  type GenerationResponse,
  type TokenUsage,
} from './client.js';

// Provider
export {
  createLLMProvider,
  type LLMProvider,
  type ReadyProvider,
  type UnconfiguredProvider,
  type ClientFactory,
} from './provider.js';

// Configuration
export {
  type GeminiConfig,
  GeminiConfigSchema,
  loadGeminiConfig,
  isMissingApiKey,
  GEMINI_MODELS,
  DEFAULT_EXTRACTION_MODEL,
  DEFAULT_ANSWER_MODEL,
  DEFAULT_TEMPERATURE,
} from './config.js';
