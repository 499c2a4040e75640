/**
 * LLM provider handle
 *
 * Built once at startup and passed to every service that talks to the model.
 * "unconfigured" is a normal state (no credential): extraction then yields an
 * empty result and question answering a fallback text.
 */

import { GeminiClient, type TextGenerationClient } from './client.js';
import { isMissingApiKey, loadGeminiConfig, type GeminiConfig } from './config.js';

export interface ReadyProvider {
  status: 'ready';
  client: TextGenerationClient;
  config: GeminiConfig;
}

export interface UnconfiguredProvider {
  status: 'unconfigured';
  reason: string;
  config: GeminiConfig;
}

export type LLMProvider = ReadyProvider | UnconfiguredProvider;

export type ClientFactory = (apiKey: string) => TextGenerationClient;

const defaultClientFactory: ClientFactory = (apiKey) => new GeminiClient(apiKey);

export function createLLMProvider(
  config: GeminiConfig = loadGeminiConfig(),
  clientFactory: ClientFactory = defaultClientFactory
): LLMProvider {
  if (isMissingApiKey(config.apiKey)) {
    return {
      status: 'unconfigured',
      reason: 'GEMINI_API_KEY is not set or is a placeholder value',
      config,
    };
  }
  return { status: 'ready', client: clientFactory(config.apiKey), config };
}
