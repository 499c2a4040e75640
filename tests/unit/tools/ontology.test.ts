/**
 * Unit Tests for Ontology MCP Tools
 *
 * Tools: onto_ontology_get, onto_context_build, onto_question_answer
 */

import { describe, it, expect, vi, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { handleOntologyGet, handleContextBuild, handleQuestionAnswer } from '../../../src/tools/ontology.js';
import {
  resetState,
  updateConfig,
  setLLMProvider,
  createDatabase,
  requireDatabase,
} from '../../../src/server/state.js';
import { assembleContext } from '../../../src/services/ontology/context-assembler.js';
import { parseResponse } from '../helpers/tool-response.js';
import { createTestDir, cleanupTestDir } from '../helpers/test-db.js';
import { FakeTextClient, readyProvider, unconfiguredProvider } from '../helpers/fake-llm.js';

describe('ontology tools', () => {
  let testDir: string;
  let counter = 0;

  beforeAll(() => {
    testDir = createTestDir('onto-ontology-tools-');
  });

  afterAll(() => {
    cleanupTestDir(testDir);
  });

  beforeEach(() => {
    resetState();
    updateConfig({ defaultStoragePath: testDir });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    resetState();
    vi.restoreAllMocks();
  });

  /** Fresh selected database holding Account, one Period relation and four Account instances */
  function seedOntology(): void {
    counter += 1;
    createDatabase(`ontology-${counter}`);
    const db = requireDatabase();
    const proposals = db.insertProposals([
      { type: 'entity', payload: { name: 'Account', properties: { currency: 'USD' } } },
      { type: 'entity', payload: { name: 'Period', properties: {} } },
      { type: 'relation', payload: { source: 'Account', target: 'Period', rel_type: 'forPeriod', properties: {} } },
      ...[100, 200, 300, 400].map((amount) => ({
        type: 'instance' as const,
        payload: { entity: 'Account', properties: { amount } },
      })),
    ]);
    for (const proposal of proposals) {
      db.reviewProposal(proposal.id, 'approve', 'alice');
    }
  }

  it('requires a selected database', async () => {
    const result = parseResponse(await handleOntologyGet({}));
    expect(result.error?.category).toBe('DATABASE_NOT_SELECTED');
  });

  it('returns the ontology with counts', async () => {
    seedOntology();

    const result = parseResponse(await handleOntologyGet({}));

    expect(result.data?.counts).toEqual({ entities: 2, relations: 1, instances: 4 });
    expect(result.data?.entities).toEqual([
      expect.objectContaining({ name: 'Account', properties: { currency: 'USD' } }),
      expect.objectContaining({ name: 'Period', properties: {} }),
    ]);
  });

  it('builds the context with the configured sample size', async () => {
    seedOntology();
    updateConfig({ contextSampleSize: 2 });

    const result = parseResponse(await handleContextBuild({}));

    const { entities, relations, instances } = requireDatabase().getOntology();
    const expected = assembleContext(entities, relations, instances, { sampleSize: 2 });
    expect(result.data).toEqual({
      context: expected,
      context_length: expected.length,
      sample_size: 2,
      entities: 2,
      relations: 1,
      instances: 4,
    });
    expect(expected.endsWith('  - amount: 100\n  - amount: 200\n  ... and 2 more')).toBe(true);
  });

  it('lets the request override the sample size', async () => {
    seedOntology();

    const result = parseResponse(await handleContextBuild({ sample_size: 0 }));

    expect(result.data?.sample_size).toBe(0);
    expect(String(result.data?.context).endsWith('\nAccount instances (4):\n  ... and 4 more')).toBe(true);
  });

  it('answers a question with the answer model', async () => {
    const client = new FakeTextClient('Total: $1,000.00');
    setLLMProvider(readyProvider(client));
    seedOntology();

    const result = parseResponse(await handleQuestionAnswer({ question: 'What is the total amount?' }));

    expect(result.data).toMatchObject({
      question: 'What is the total amount?',
      answer: 'Total: $1,000.00',
      metadata: { model: 'test-answer-model', ai_enabled: true, tokens_used: 30, context_instances: 4 },
    });
    expect(client.requests[0].maxOutputTokens).toBe(1000);
  });

  it('falls back without a provider', async () => {
    setLLMProvider(unconfiguredProvider());
    seedOntology();

    const result = parseResponse(await handleQuestionAnswer({ question: 'Anything?' }));

    expect(result.data).toMatchObject({ metadata: { model: 'fallback', ai_enabled: false, tokens_used: 0 } });
    expect(String(result.data?.answer)).toContain('- 4 data instances');
  });

  it('validates the question length', async () => {
    seedOntology();
    const result = parseResponse(await handleQuestionAnswer({ question: 'x'.repeat(2001) }));

    expect(result.error?.category).toBe('VALIDATION_ERROR');
    expect(result.error?.message).toBe('question: Question must be 2000 characters or less');
  });
});
