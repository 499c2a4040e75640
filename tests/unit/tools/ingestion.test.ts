/**
 * Unit Tests for Ingestion MCP Tools
 *
 * Tools: onto_ingest_json, onto_extract_preview, onto_text_chunk
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'fs';
import { join } from 'path';
import {
  handleIngestJson,
  handleExtractPreview,
  handleTextChunk,
  readJsonSource,
  INLINE_FILE_NAME,
} from '../../../src/tools/ingestion.js';
import {
  resetState,
  updateConfig,
  setLLMProvider,
  createDatabase,
  requireDatabase,
} from '../../../src/server/state.js';
import { LLMError } from '../../../src/services/gemini/client.js';
import { parseResponse } from '../helpers/tool-response.js';
import { createTestDir, cleanupTestDir } from '../helpers/test-db.js';
import { FakeTextClient, SAMPLE_EXTRACTION_REPLY, readyProvider, unconfiguredProvider } from '../helpers/fake-llm.js';

const CONTENT = JSON.stringify({ report: { basis: 'Accrual', accounts: [{ name: 'Sales', amount: 1200 }] } });

describe('ingestion tools', () => {
  let testDir: string;
  let client: FakeTextClient;
  let counter = 0;

  beforeAll(() => {
    testDir = createTestDir('onto-ingest-tools-');
    writeFileSync(join(testDir, 'report.json'), CONTENT);
    writeFileSync(join(testDir, 'broken.json'), '{"report": ');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    resetState();
    updateConfig({ defaultStoragePath: testDir });
    client = new FakeTextClient(SAMPLE_EXTRACTION_REPLY);
    setLLMProvider(readyProvider(client));
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetState();
    vi.restoreAllMocks();
  });

  function selectFreshDatabase(): void {
    counter += 1;
    createDatabase(`ingest-${counter}`);
  }

  describe('onto_ingest_json', () => {
    it('requires a selected database', async () => {
      const result = parseResponse(await handleIngestJson({ content: CONTENT }));
      expect(result.error?.category).toBe('DATABASE_NOT_SELECTED');
      expect(client.requests).toHaveLength(0);
    });

    it('ingests a file from disk and queues proposals', async () => {
      selectFreshDatabase();

      const result = parseResponse(await handleIngestJson({ file_path: join(testDir, 'report.json') }));

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        duplicate: false,
        file_name: 'report.json',
        chunks_stored: 1,
        extraction_status: 'extracted',
        proposals_generated: 4,
      });
      expect(requireDatabase().listProposals('pending')).toHaveLength(4);
      expect(client.requests[0].model).toBe('test-extract-model');
    });

    it('reports a duplicate on the second ingest of the same content', async () => {
      selectFreshDatabase();
      await handleIngestJson({ content: CONTENT });

      const result = parseResponse(await handleIngestJson({ content: CONTENT, file_name: 'again.json' }));

      expect(result.data).toMatchObject({ duplicate: true, file_name: INLINE_FILE_NAME, proposals_generated: 0 });
      expect(client.requests).toHaveLength(1);
    });

    it('uses the configured extraction settings', async () => {
      selectFreshDatabase();
      updateConfig({ extractionModel: 'configured-model', extractionMaxOutputTokens: 2048 });

      await handleIngestJson({ content: CONTENT });

      expect(client.requests[0]).toMatchObject({ model: 'configured-model', maxOutputTokens: 2048 });
    });

    it('stores the file with no proposals when the provider is unconfigured', async () => {
      setLLMProvider(unconfiguredProvider());
      selectFreshDatabase();

      const result = parseResponse(await handleIngestJson({ content: CONTENT }));

      expect(result.data).toMatchObject({ extraction_status: 'unconfigured', proposals_generated: 0 });
      expect(requireDatabase().listFiles()[0].status).toBe('processed');
    });

    it('maps provider failures to LLM errors and marks the file failed', async () => {
      const failure = new LLMError('Gemini request failed: quota exhausted', 'LLM_RATE_LIMIT', 'test-extract-model');
      setLLMProvider(readyProvider(new FakeTextClient(failure)));
      selectFreshDatabase();

      const result = parseResponse(await handleIngestJson({ content: CONTENT }));

      expect(result.error?.category).toBe('LLM_RATE_LIMIT');
      expect(result.error?.message).toBe('Gemini request failed: quota exhausted');
      expect(requireDatabase().listFiles()[0].status).toBe('failed');
    });

    it('rejects invalid JSON', async () => {
      selectFreshDatabase();
      const result = parseResponse(await handleIngestJson({ file_path: join(testDir, 'broken.json') }));

      expect(result.error?.category).toBe('VALIDATION_ERROR');
      expect(result.error?.message).toMatch(/^File 'broken\.json' is not valid JSON: /);
      expect(requireDatabase().listFiles()).toEqual([]);
    });

    it('reports a missing path', async () => {
      selectFreshDatabase();
      const result = parseResponse(await handleIngestJson({ file_path: join(testDir, 'absent.json') }));

      expect(result.error?.category).toBe('PATH_NOT_FOUND');
      expect(result.error?.message).toBe(`Path does not exist: ${join(testDir, 'absent.json')}`);
    });

    it('requires exactly one source', async () => {
      selectFreshDatabase();
      const both = parseResponse(await handleIngestJson({ content: CONTENT, file_path: 'x.json' }));
      const neither = parseResponse(await handleIngestJson({}));

      expect(both.error?.message).toBe('Provide exactly one of file_path or content');
      expect(neither.error?.message).toBe('Provide exactly one of file_path or content');
    });
  });

  describe('onto_extract_preview', () => {
    it('runs extraction without a database and stores nothing', async () => {
      const result = parseResponse(await handleExtractPreview({ content: CONTENT, file_name: 'preview.json' }));

      expect(result.success).toBe(true);
      expect(result.data).toMatchObject({
        file_name: 'preview.json',
        reduced_payload: { text: JSON.stringify(JSON.parse(CONTENT), null, 2), sampled: false, truncated: false },
        extraction_status: 'extracted',
        model: 'test-extract-model',
        prompt_version: 'v1',
        parse_failure: null,
        tokens_used: 30,
        diagnostics: { entities: 2, relations: 1, instances: 1, skipped: [] },
      });
      expect(result.data?.proposals).toHaveLength(4);
    });

    it('surfaces a parse failure', async () => {
      setLLMProvider(readyProvider(new FakeTextClient('{"entities": []}')));

      const result = parseResponse(await handleExtractPreview({ content: CONTENT }));

      expect(result.data).toMatchObject({
        file_name: INLINE_FILE_NAME,
        extraction_status: 'parse_failed',
        parse_failure: {
          reason: 'missing_keys',
          message: 'Missing required keys in ontology extraction: relations, instances',
        },
        proposals: [],
      });
    });

    it('reports an unconfigured provider', async () => {
      setLLMProvider(unconfiguredProvider());

      const result = parseResponse(await handleExtractPreview({ content: CONTENT }));

      expect(result.data).toMatchObject({ extraction_status: 'unconfigured', model: null, tokens_used: 0 });
    });
  });

  describe('onto_text_chunk', () => {
    it('chunks with the configured defaults', async () => {
      const result = parseResponse(await handleTextChunk({ text: 'short text' }));

      expect(result.data).toEqual({
        chunk_size: 1000,
        chunk_overlap: 200,
        total_chunks: 1,
        chunks: [{ index: 0, length: 10, text: 'short text' }],
      });
    });

    it('honours explicit sizes', async () => {
      const result = parseResponse(await handleTextChunk({ text: 'x'.repeat(250), chunk_size: 100, chunk_overlap: 50 }));

      expect(result.data?.total_chunks).toBe(5);
    });

    it('rejects an overlap above half the chunk size', async () => {
      const result = parseResponse(await handleTextChunk({ text: 'abc', chunk_size: 100, chunk_overlap: 51 }));

      expect(result.error?.category).toBe('VALIDATION_ERROR');
      expect(result.error?.message).toBe('overlap (51) must not exceed half of chunkSize (100)');
    });
  });
});

describe('readJsonSource', () => {
  it('names inline content after the default file name', () => {
    expect(readJsonSource({ content: '{}' })).toEqual({ fileName: INLINE_FILE_NAME, content: '{}' });
  });

  it('prefers an explicit file name', () => {
    expect(readJsonSource({ content: '{}', file_name: 'named.json' }).fileName).toBe('named.json');
  });
});
