/**
 * Gemini API Configuration
 */

import { z } from 'zod';

export const GEMINI_MODELS = {
  FLASH_2: 'gemini-2.0-flash',
  FLASH_25: 'gemini-2.5-flash',
  PRO: 'gemini-2.5-pro',
} as const;

/** Compact model used for ontology extraction */
export const DEFAULT_EXTRACTION_MODEL = GEMINI_MODELS.FLASH_2;

/** Larger model used for answer generation */
export const DEFAULT_ANSWER_MODEL = GEMINI_MODELS.PRO;

/** Low temperature keeps schema-following output stable */
export const DEFAULT_TEMPERATURE = 0.1;

export const GeminiConfigSchema = z.object({
  // Empty means "unconfigured"; see createLLMProvider()
  apiKey: z.string().default(''),
  extractionModel: z.string().min(1).default(DEFAULT_EXTRACTION_MODEL),
  answerModel: z.string().min(1).default(DEFAULT_ANSWER_MODEL),
  temperature: z.number().min(0).max(2).default(DEFAULT_TEMPERATURE),
});

export type GeminiConfig = z.infer<typeof GeminiConfigSchema>;

/**
 * Load configuration from environment variables
 */
export function loadGeminiConfig(overrides?: Partial<GeminiConfig>): GeminiConfig {
  const envConfig = {
    apiKey: process.env.GEMINI_API_KEY?.trim() || '',
    extractionModel: process.env.ONTOLOGY_EXTRACTION_MODEL?.trim() || DEFAULT_EXTRACTION_MODEL,
    answerModel: process.env.ONTOLOGY_ANSWER_MODEL?.trim() || DEFAULT_ANSWER_MODEL,
    temperature: process.env.ONTOLOGY_TEMPERATURE
      ? parseFloat(process.env.ONTOLOGY_TEMPERATURE)
      : DEFAULT_TEMPERATURE,
  };

  return GeminiConfigSchema.parse({ ...envConfig, ...overrides });
}

const PLACEHOLDER_KEY_PATTERN = /^(placeholder|your[-_])/i;

/**
 * True when the key is missing or is a template value left in a .env file
 */
export function isMissingApiKey(apiKey: string): boolean {
  const key = apiKey.trim();
  return key.length === 0 || PLACEHOLDER_KEY_PATTERN.test(key);
}
