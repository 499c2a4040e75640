/**
 * Unit Tests for Configuration MCP Tools
 *
 * Tools: onto_config_get, onto_config_set
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { handleConfigGet, handleConfigSet } from '../../../src/tools/config.js';
import { resetState, updateConfig, setLLMProvider, getConfig } from '../../../src/server/state.js';
import { parseResponse } from '../helpers/tool-response.js';
import { FakeTextClient, readyProvider } from '../helpers/fake-llm.js';

describe('config tools', () => {
  beforeEach(() => {
    resetState();
    updateConfig({ defaultStoragePath: '/tmp/onto-config-tests' });
    setLLMProvider(readyProvider(new FakeTextClient()));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetState();
    vi.restoreAllMocks();
  });

  describe('onto_config_get', () => {
    it('returns every key with server status', async () => {
      const result = parseResponse(await handleConfigGet({}));

      expect(result.data).toEqual({
        extraction_model: 'test-extract-model',
        answer_model: 'test-answer-model',
        temperature: 0.1,
        extraction_max_output_tokens: 4096,
        answer_max_output_tokens: 1000,
        reduction_threshold: 2000,
        reduction_hard_cap: 1500,
        chunk_size: 1000,
        chunk_overlap: 200,
        context_sample_size: 3,
        storage_path: '/tmp/onto-config-tests',
        current_database: null,
        llm_status: 'ready',
      });
    });

    it('returns a single key', async () => {
      const result = parseResponse(await handleConfigGet({ key: 'chunk_size' }));
      expect(result.data).toEqual({ key: 'chunk_size', value: 1000 });
    });

    it('rejects an unknown key', async () => {
      const result = parseResponse(await handleConfigGet({ key: 'api_key' }));
      expect(result.error?.category).toBe('VALIDATION_ERROR');
    });
  });

  describe('onto_config_set', () => {
    it('updates a numeric setting', async () => {
      const result = parseResponse(await handleConfigSet({ key: 'context_sample_size', value: 5 }));

      expect(result).toEqual({ success: true, data: { key: 'context_sample_size', value: 5, updated: true } });
      expect(getConfig().contextSampleSize).toBe(5);
    });

    it('trims model names', async () => {
      const result = parseResponse(await handleConfigSet({ key: 'answer_model', value: '  other-model ' }));

      expect(result.data?.value).toBe('other-model');
      expect(getConfig().answerModel).toBe('other-model');
    });

    it('accepts a fractional temperature', async () => {
      await handleConfigSet({ key: 'temperature', value: 0.35 });
      expect(getConfig().temperature).toBe(0.35);
    });

    it('rejects out-of-range and mistyped values', async () => {
      const tooHot = parseResponse(await handleConfigSet({ key: 'temperature', value: 3 }));
      const notInt = parseResponse(await handleConfigSet({ key: 'chunk_size', value: 500.5 }));
      const wrongType = parseResponse(await handleConfigSet({ key: 'reduction_threshold', value: 'big' }));
      const emptyModel = parseResponse(await handleConfigSet({ key: 'extraction_model', value: '  ' }));

      expect(tooHot.error?.message).toBe('temperature must be a number between 0 and 2');
      expect(notInt.error?.message).toBe('chunk_size must be an integer between 100 and 10000');
      expect(wrongType.error?.message).toBe('reduction_threshold must be an integer between 100 and 1000000');
      expect(emptyModel.error?.message).toBe('extraction_model must be a non-empty string');
      expect(getConfig().temperature).toBe(0.1);
    });

    it('keeps chunk overlap within half the chunk size', async () => {
      const overlap = parseResponse(await handleConfigSet({ key: 'chunk_overlap', value: 501 }));
      expect(overlap.error?.message).toBe('chunk_overlap must be an integer between 0 and 500');

      const shrink = parseResponse(await handleConfigSet({ key: 'chunk_size', value: 300 }));
      expect(shrink.error?.message).toBe('chunk_size 300 is too small for chunk_overlap 200');

      const ok = parseResponse(await handleConfigSet({ key: 'chunk_size', value: 400 }));
      expect(ok.data?.value).toBe(400);
    });

    it('updates the reduction hard cap', async () => {
      await handleConfigSet({ key: 'reduction_hard_cap', value: 100 });
      expect(getConfig().reductionHardCap).toBe(100);
    });
  });
});
