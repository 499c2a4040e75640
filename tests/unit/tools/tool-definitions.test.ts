/**
 * Tool Definitions Validation Tests
 *
 * Every registered tool has a description, a zod input shape and a handler,
 * and names are unique across modules.
 */

import { describe, it, expect } from 'vitest';
import {
  allTools,
  databaseTools,
  ingestionTools,
  fileTools,
  proposalTools,
  ontologyTools,
  configTools,
} from '../../../src/tools/index.js';

const modules = { databaseTools, ingestionTools, fileTools, proposalTools, ontologyTools, configTools };

describe('Tool definitions validation', () => {
  it('registers every tool exactly once', () => {
    const names = Object.values(modules).flatMap((tools) => Object.keys(tools));
    expect(new Set(names).size).toBe(names.length);
    expect(Object.keys(allTools).sort()).toEqual([...names].sort());
  });

  it('exposes the expected tool names', () => {
    expect(Object.keys(allTools).sort()).toEqual([
      'onto_config_get',
      'onto_config_set',
      'onto_context_build',
      'onto_db_create',
      'onto_db_delete',
      'onto_db_list',
      'onto_db_select',
      'onto_extract_preview',
      'onto_file_delete',
      'onto_file_list',
      'onto_ingest_json',
      'onto_ontology_get',
      'onto_proposal_list',
      'onto_proposal_review',
      'onto_question_answer',
      'onto_text_chunk',
    ]);
  });

  for (const [name, tool] of Object.entries(allTools)) {
    it(`${name} has a description, zod input shape and handler`, () => {
      expect(tool.description.length).toBeGreaterThan(0);
      expect(typeof tool.handler).toBe('function');
      for (const [field, schema] of Object.entries(tool.inputSchema)) {
        expect(schema._def, `${name}.inputSchema.${field} should be a Zod schema`).toBeDefined();
      }
    });
  }
});
