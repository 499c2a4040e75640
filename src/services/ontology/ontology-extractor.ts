/**
 * Ontology Extractor
 *
 * reduce -> prompt -> one model call -> parse. The model is reached through
 * the LLMProvider handed in at construction:
 * - unconfigured provider: no call is made, the result is empty
 * - unparseable response: the result is empty and the reason is reported
 * - provider failure: LLMError propagates to the caller (no retry)
 *
 * @module services/ontology/ontology-extractor
 */

import {
  emptyExtractionResult,
  type ExtractionResult,
} from '../../models/ontology.js';
import type { LLMProvider } from '../gemini/provider.js';
import type { GenerationResponse, TokenUsage } from '../gemini/client.js';
import { reducePayload, DEFAULT_REDUCTION_CONFIG, type ReducedPayload, type ReductionConfig } from './payload-reducer.js';
import { logParseFailure, parseExtraction, type ParseFailureReason } from './extraction-parser.js';
import { EXTRACTION_SYSTEM_PROMPT, PROMPT_VERSION, buildExtractionUserPrompt } from './prompts.js';

export type ExtractionStatus = 'extracted' | 'unconfigured' | 'parse_failed';

export interface ExtractorOptions {
  reduction?: ReductionConfig;
  /** Overrides the provider's extraction model */
  model?: string;
  /** Overrides the provider's temperature */
  temperature?: number;
  maxOutputTokens?: number;
}

export interface ExtractionRun {
  status: ExtractionStatus;
  result: ExtractionResult;
  reduced: ReducedPayload;
  promptVersion: string;
  model: string | null;
  failure?: { reason: ParseFailureReason; message: string };
  usage?: TokenUsage;
  rawLength?: number;
}

export const DEFAULT_EXTRACTION_MAX_OUTPUT_TOKENS = 4096;

export class OntologyExtractor {
  private readonly provider: LLMProvider;
  private readonly options: ExtractorOptions;

  constructor(provider: LLMProvider, options: ExtractorOptions = {}) {
    this.provider = provider;
    this.options = options;
  }

  get isConfigured(): boolean {
    return this.provider.status === 'ready';
  }

  /**
   * Send reduced payload text to the extraction model and return its raw
   * response. Only valid on a configured extractor; provider errors propagate.
   */
  async invoke(payloadText: string, fileName: string): Promise<GenerationResponse> {
    if (this.provider.status !== 'ready') {
      throw new Error(`Extraction model is not configured: ${this.provider.reason}`);
    }
    const { client, config } = this.provider;
    return client.generate({
      model: this.options.model ?? config.extractionModel,
      system: EXTRACTION_SYSTEM_PROMPT,
      user: buildExtractionUserPrompt(fileName, payloadText),
      temperature: this.options.temperature ?? config.temperature,
      maxOutputTokens: this.options.maxOutputTokens ?? DEFAULT_EXTRACTION_MAX_OUTPUT_TOKENS,
    });
  }

  /**
   * Extract entities, relations and instances from a parsed JSON document
   */
  async extract(document: unknown, fileName: string): Promise<ExtractionRun> {
    const reduced = reducePayload(document, this.options.reduction ?? DEFAULT_REDUCTION_CONFIG);

    if (this.provider.status !== 'ready') {
      console.warn(`[OntologyExtractor] No LLM available for ontology extraction: ${this.provider.reason}`);
      return {
        status: 'unconfigured',
        result: emptyExtractionResult(),
        reduced,
        promptVersion: PROMPT_VERSION,
        model: null,
      };
    }

    console.error(
      `[OntologyExtractor] Sending ${reduced.text.length} characters of '${fileName}' for extraction` +
        (reduced.sampled ? ` (sampled from ${reduced.originalLength})` : '') +
        (reduced.truncated ? ' (truncated)' : '')
    );
    const response = await this.invoke(reduced.text, fileName);
    console.error(`[OntologyExtractor] Response received: ${response.text.length} characters`);

    const outcome = parseExtraction(response.text);
    if (!outcome.ok) {
      logParseFailure(outcome, response.text, fileName);
      return {
        status: 'parse_failed',
        result: emptyExtractionResult(),
        reduced,
        promptVersion: PROMPT_VERSION,
        model: response.model,
        failure: { reason: outcome.reason, message: outcome.message },
        usage: response.usage,
        rawLength: response.text.length,
      };
    }

    return {
      status: 'extracted',
      result: outcome.result,
      reduced,
      promptVersion: PROMPT_VERSION,
      model: response.model,
      usage: response.usage,
      rawLength: response.text.length,
    };
  }
}
