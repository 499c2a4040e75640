/**
 * Unit tests for AnswerService
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { AnswerService, buildFallbackAnswer } from '../../../../src/services/ontology/answer-service.js';
import { assembleContext } from '../../../../src/services/ontology/context-assembler.js';
import { ANSWER_SYSTEM_PROMPT } from '../../../../src/services/ontology/prompts.js';
import type { OntologyGraph } from '../../../../src/models/ontology.js';
import { FakeTextClient, readyProvider, unconfiguredProvider } from '../../helpers/fake-llm.js';

const CREATED = '2026-01-01T00:00:00.000Z';

const GRAPH: OntologyGraph = {
  entities: [{ id: 'e1', name: 'Account', properties: { currency: 'USD' }, source_file_id: null, created_at: CREATED }],
  relations: [],
  instances: [
    { id: 'i1', entity_id: 'e1', properties: { accountName: 'Sales', amount: 1200 }, source_file_id: null, created_at: CREATED },
  ],
};

beforeEach(() => {
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('AnswerService', () => {
  it('answers with the answer model and the assembled context', async () => {
    const client = new FakeTextClient('Sales total $1,200.00');
    const result = await new AnswerService(readyProvider(client)).answer('What are total sales?', GRAPH);
    const context = assembleContext(GRAPH.entities, GRAPH.relations, GRAPH.instances);

    expect(result.text).toBe('Sales total $1,200.00');
    expect(result.metadata).toEqual({
      model: 'test-answer-model',
      ai_enabled: true,
      tokens_used: 30,
      context_entities: 1,
      context_relations: 0,
      context_instances: 1,
      context_length: context.length,
    });

    const [request] = client.requests;
    expect(request.system).toBe(ANSWER_SYSTEM_PROMPT);
    expect(request.maxOutputTokens).toBe(1000);
    expect(request.user).toContain('QUESTION: What are total sales?');
    expect(request.user).toContain(`ONTOLOGY CONTEXT:\n${context}`);
  });

  it('returns the fallback text when unconfigured', async () => {
    const result = await new AnswerService(unconfiguredProvider()).answer('What are total sales?', GRAPH);

    expect(result.text).toBe(buildFallbackAnswer('What are total sales?', GRAPH));
    expect(result.metadata.model).toBe('fallback');
    expect(result.metadata.ai_enabled).toBe(false);
    expect(result.metadata.tokens_used).toBe(0);
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('applies answer option overrides', async () => {
    const client = new FakeTextClient('ok');
    await new AnswerService(readyProvider(client), { model: 'other', temperature: 0.7, maxOutputTokens: 64 }).answer(
      'q',
      GRAPH
    );
    expect(client.requests[0]).toMatchObject({ model: 'other', temperature: 0.7, maxOutputTokens: 64 });
  });

  it('propagates provider errors', async () => {
    const client = new FakeTextClient(new Error('quota'));
    await expect(new AnswerService(readyProvider(client)).answer('q', GRAPH)).rejects.toThrow('quota');
  });
});

describe('buildFallbackAnswer', () => {
  it('reports the ontology counts', () => {
    const text = buildFallbackAnswer('q?', GRAPH);
    expect(text.split('\n')).toEqual([
      'I\'d like to help with your question: "q?"',
      '',
      'AI-powered answers need a Gemini API key. Currently the ontology holds:',
      '- 1 entities',
      '- 0 relationships',
      '- 1 data instances',
      '',
      'Set the GEMINI_API_KEY environment variable to enable analysis.',
    ]);
  });
});
