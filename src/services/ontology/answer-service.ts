/**
 * Answer Service
 *
 * Answers a question about the persisted ontology with one call to the
 * answer model, using assembleContext() output as grounding. Without a
 * configured provider it returns a fallback text instead of calling out.
 *
 * @module services/ontology/answer-service
 */

import type { OntologyGraph } from '../../models/ontology.js';
import type { LLMProvider } from '../gemini/provider.js';
import { assembleContext, DEFAULT_CONTEXT_SAMPLE_SIZE } from './context-assembler.js';
import { ANSWER_SYSTEM_PROMPT, buildAnswerUserPrompt } from './prompts.js';

export const DEFAULT_ANSWER_MAX_OUTPUT_TOKENS = 1000;

export interface AnswerOptions {
  /** Overrides the provider's answer model */
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  sampleSize?: number;
}

export interface AnswerMetadata {
  model: string;
  ai_enabled: boolean;
  tokens_used: number;
  context_entities: number;
  context_relations: number;
  context_instances: number;
  context_length: number;
}

export interface AnswerResult {
  text: string;
  metadata: AnswerMetadata;
}

export class AnswerService {
  private readonly provider: LLMProvider;
  private readonly options: AnswerOptions;

  constructor(provider: LLMProvider, options: AnswerOptions = {}) {
    this.provider = provider;
    this.options = options;
  }

  async answer(question: string, graph: OntologyGraph): Promise<AnswerResult> {
    const { entities, relations, instances } = graph;
    const context = assembleContext(entities, relations, instances, {
      sampleSize: this.options.sampleSize ?? DEFAULT_CONTEXT_SAMPLE_SIZE,
    });
    const counts = {
      context_entities: entities.length,
      context_relations: relations.length,
      context_instances: instances.length,
      context_length: context.length,
    };

    if (this.provider.status !== 'ready') {
      console.warn(`[AnswerService] No LLM available, returning fallback answer: ${this.provider.reason}`);
      return {
        text: buildFallbackAnswer(question, graph),
        metadata: { model: 'fallback', ai_enabled: false, tokens_used: 0, ...counts },
      };
    }

    const { client, config } = this.provider;
    const model = this.options.model ?? config.answerModel;
    console.error(
      `[AnswerService] Answering with ${model}: ${entities.length} entities, ${relations.length} relations, ` +
        `${instances.length} instances, ${context.length} context chars`
    );

    const response = await client.generate({
      model,
      system: ANSWER_SYSTEM_PROMPT,
      user: buildAnswerUserPrompt(question, context),
      temperature: this.options.temperature ?? config.temperature,
      maxOutputTokens: this.options.maxOutputTokens ?? DEFAULT_ANSWER_MAX_OUTPUT_TOKENS,
    });

    return {
      text: response.text,
      metadata: {
        model: response.model,
        ai_enabled: true,
        tokens_used: response.usage.totalTokens,
        ...counts,
      },
    };
  }
}

export function buildFallbackAnswer(question: string, graph: OntologyGraph): string {
  return [
    `I'd like to help with your question: "${question}"`,
    '',
    'AI-powered answers need a Gemini API key. Currently the ontology holds:',
    `- ${graph.entities.length} entities`,
    `- ${graph.relations.length} relationships`,
    `- ${graph.instances.length} data instances`,
    '',
    'Set the GEMINI_API_KEY environment variable to enable analysis.',
  ].join('\n');
}
