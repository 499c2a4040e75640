/**
 * Ontology MCP Tools
 *
 * Tools: onto_ontology_get, onto_context_build, onto_question_answer
 *
 * @module tools/ontology
 */

import { z } from 'zod';
import { requireDatabase, createAnswerService, getConfig } from '../server/state.js';
import { successResult } from '../server/types.js';
import { validateInput, OntologyGetInput, ContextBuildInput, QuestionAnswerInput } from '../utils/validation.js';
import { assembleContext } from '../services/ontology/context-assembler.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export async function handleOntologyGet(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    validateInput(OntologyGetInput, params);
    const graph = requireDatabase().getOntology();
    return formatResponse(
      successResult({
        ...graph,
        counts: {
          entities: graph.entities.length,
          relations: graph.relations.length,
          instances: graph.instances.length,
        },
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleContextBuild(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ContextBuildInput, params);
    const { entities, relations, instances } = requireDatabase().getOntology();
    const sampleSize = input.sample_size ?? getConfig().contextSampleSize;
    const context = assembleContext(entities, relations, instances, { sampleSize });

    return formatResponse(
      successResult({
        context,
        context_length: context.length,
        sample_size: sampleSize,
        entities: entities.length,
        relations: relations.length,
        instances: instances.length,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleQuestionAnswer(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(QuestionAnswerInput, params);
    const graph = requireDatabase().getOntology();
    const result = await createAnswerService().answer(input.question, graph);

    return formatResponse(
      successResult({
        question: input.question,
        answer: result.text,
        metadata: result.metadata,
      })
    );
  } catch (error) {
    return handleError(error);
  }
}

export const ontologyTools: Record<string, ToolDefinition> = {
  onto_ontology_get: {
    description: 'Get the approved ontology: entities, relations and instances with counts',
    inputSchema: {},
    handler: handleOntologyGet,
  },
  onto_context_build: {
    description: 'Render the approved ontology as the text context given to the answer model',
    inputSchema: {
      sample_size: z.number().int().min(0).max(100).optional().describe('Instances listed per entity'),
    },
    handler: handleContextBuild,
  },
  onto_question_answer: {
    description: 'Answer a question about the approved ontology with the answer model',
    inputSchema: {
      question: z.string().min(1).max(2000).describe('Question to answer'),
    },
    handler: handleQuestionAnswer,
  },
};
