/**
 * Gemini API Client
 *
 * One request = one generateContent call: a system instruction, a single user
 * turn, temperature and an output token limit. No retries and no backoff; a
 * failed call surfaces as LLMError and the caller decides what to do.
 */

import { GoogleGenerativeAI } from '@google/generative-ai';

/**
 * Token usage from a model response
 */
export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface GenerationRequest {
  model: string;
  system: string;
  user: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface GenerationResponse {
  text: string;
  usage: TokenUsage;
  model: string;
  processingTimeMs: number;
}

/**
 * Anything that can turn a system+user prompt pair into text.
 * GeminiClient is the production implementation; tests supply fakes.
 */
export interface TextGenerationClient {
  generate(request: GenerationRequest): Promise<GenerationResponse>;
}

export type LLMErrorCategory = 'LLM_API_ERROR' | 'LLM_RATE_LIMIT';

/**
 * Provider-side failure (transport, non-success status, quota)
 */
export class LLMError extends Error {
  readonly category: LLMErrorCategory;
  readonly model: string;

  constructor(message: string, category: LLMErrorCategory, model: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'LLMError';
    this.category = category;
    this.model = model;
  }
}

function isRateLimitMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return message.includes('429') || lower.includes('rate limit') || lower.includes('resource exhausted');
}

/**
 * Gemini Client
 */
export class GeminiClient implements TextGenerationClient {
  private readonly client: GoogleGenerativeAI;

  constructor(apiKey: string) {
    if (!apiKey) {
      throw new Error('GEMINI_API_KEY is required. Set it in the server environment.');
    }
    this.client = new GoogleGenerativeAI(apiKey);
  }

  async generate(request: GenerationRequest): Promise<GenerationResponse> {
    const startTime = Date.now();
    const model = this.client.getGenerativeModel({
      model: request.model,
      systemInstruction: request.system,
    });

    try {
      const result = await model.generateContent({
        contents: [{ role: 'user', parts: [{ text: request.user }] }],
        generationConfig: {
          temperature: request.temperature,
          maxOutputTokens: request.maxOutputTokens,
        },
      });

      const usageMetadata = result.response.usageMetadata;
      return {
        text: result.response.text(),
        usage: {
          inputTokens: usageMetadata?.promptTokenCount ?? 0,
          outputTokens: usageMetadata?.candidatesTokenCount ?? 0,
          totalTokens: usageMetadata?.totalTokenCount ?? 0,
        },
        model: request.model,
        processingTimeMs: Date.now() - startTime,
      };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      const category: LLMErrorCategory = isRateLimitMessage(message) ? 'LLM_RATE_LIMIT' : 'LLM_API_ERROR';
      console.error(`[GeminiClient] ${request.model} request failed (${category}): ${message}`);
      throw new LLMError(`Gemini request failed: ${message}`, category, request.model, { cause: error });
    }
  }
}
