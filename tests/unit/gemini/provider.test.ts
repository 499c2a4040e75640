/**
 * Unit tests for Gemini configuration and the provider handle
 */

import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  createLLMProvider,
  loadGeminiConfig,
  isMissingApiKey,
  DEFAULT_EXTRACTION_MODEL,
  DEFAULT_ANSWER_MODEL,
  DEFAULT_TEMPERATURE,
  type TextGenerationClient,
} from '../../../src/services/gemini/index.js';
import { FakeTextClient, TEST_GEMINI_CONFIG } from '../helpers/fake-llm.js';

afterEach(() => {
  vi.unstubAllEnvs();
});

describe('loadGeminiConfig', () => {
  it('uses defaults when nothing is set', () => {
    vi.stubEnv('GEMINI_API_KEY', '');
    vi.stubEnv('ONTOLOGY_EXTRACTION_MODEL', '');
    vi.stubEnv('ONTOLOGY_ANSWER_MODEL', '');
    vi.stubEnv('ONTOLOGY_TEMPERATURE', '');

    expect(loadGeminiConfig()).toEqual({
      apiKey: '',
      extractionModel: DEFAULT_EXTRACTION_MODEL,
      answerModel: DEFAULT_ANSWER_MODEL,
      temperature: DEFAULT_TEMPERATURE,
    });
  });

  it('reads and trims environment values', () => {
    vi.stubEnv('GEMINI_API_KEY', '  test-key  ');
    vi.stubEnv('ONTOLOGY_EXTRACTION_MODEL', 'extract-model');
    vi.stubEnv('ONTOLOGY_ANSWER_MODEL', 'answer-model');
    vi.stubEnv('ONTOLOGY_TEMPERATURE', '0.4');

    expect(loadGeminiConfig()).toEqual({
      apiKey: 'test-key',
      extractionModel: 'extract-model',
      answerModel: 'answer-model',
      temperature: 0.4,
    });
  });

  it('lets overrides win over the environment', () => {
    vi.stubEnv('ONTOLOGY_ANSWER_MODEL', 'answer-model');
    expect(loadGeminiConfig({ answerModel: 'override' }).answerModel).toBe('override');
  });

  it('rejects an out-of-range temperature', () => {
    vi.stubEnv('ONTOLOGY_TEMPERATURE', '5');
    expect(() => loadGeminiConfig()).toThrow();
  });
});

describe('isMissingApiKey', () => {
  it('treats empty and template keys as missing', () => {
    expect(isMissingApiKey('')).toBe(true);
    expect(isMissingApiKey('   ')).toBe(true);
    expect(isMissingApiKey('your-api-key')).toBe(true);
    expect(isMissingApiKey('your_gemini_key')).toBe(true);
    expect(isMissingApiKey('placeholder')).toBe(true);
  });

  it('accepts anything else', () => {
    expect(isMissingApiKey('test-key')).toBe(false);
  });
});

describe('createLLMProvider', () => {
  it('is unconfigured without a usable key and builds no client', () => {
    const factory = vi.fn((): TextGenerationClient => new FakeTextClient());
    const provider = createLLMProvider({ ...TEST_GEMINI_CONFIG, apiKey: 'your-api-key' }, factory);

    expect(provider).toEqual({
      status: 'unconfigured',
      reason: 'GEMINI_API_KEY is not set or is a placeholder value',
      config: { ...TEST_GEMINI_CONFIG, apiKey: 'your-api-key' },
    });
    expect(factory).not.toHaveBeenCalled();
  });

  it('is ready with a client built from the key', () => {
    const client = new FakeTextClient();
    const factory = vi.fn((): TextGenerationClient => client);
    const provider = createLLMProvider(TEST_GEMINI_CONFIG, factory);

    expect(provider.status).toBe('ready');
    expect(provider.status === 'ready' && provider.client).toBe(client);
    expect(factory).toHaveBeenCalledWith('test-key');
  });
});
