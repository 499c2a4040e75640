/**
 * Zod Validation Schemas
 *
 * Input validation for every MCP tool. Each schema carries its constraints,
 * error messages and defaults.
 *
 * @module utils/validation
 */

import { z } from 'zod';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failed path
 */
export function validateInput<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS
// ═══════════════════════════════════════════════════════════════════════════════

export const ProposalStatusFilter = z.enum(['pending', 'approved', 'rejected']);

export const ReviewActionInput = z.enum(['approve', 'reject']);

/**
 * Configuration keys that can be read and set at runtime
 */
export const ConfigKey = z.enum([
  'extraction_model',
  'answer_model',
  'temperature',
  'extraction_max_output_tokens',
  'answer_max_output_tokens',
  'reduction_threshold',
  'reduction_hard_cap',
  'chunk_size',
  'chunk_overlap',
  'context_sample_size',
]);

const DatabaseName = z
  .string()
  .min(1, 'Database name is required')
  .max(64, 'Database name must be 64 characters or less')
  .regex(/^[a-zA-Z0-9_-]+$/, 'Database name must contain only alphanumeric characters, underscores, and hyphens');

// ═══════════════════════════════════════════════════════════════════════════════
// DATABASE MANAGEMENT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const DatabaseCreateInput = z.object({
  name: DatabaseName,
  description: z.string().max(500, 'Description must be 500 characters or less').optional(),
  storage_path: z.string().optional(),
});

export const DatabaseListInput = z.object({
  include_stats: z.boolean().default(false),
});

export const DatabaseSelectInput = z.object({
  database_name: z.string().min(1, 'Database name is required'),
});

export const DatabaseDeleteInput = z.object({
  database_name: z.string().min(1, 'Database name is required'),
  confirm: z.literal(true, {
    errorMap: () => ({ message: 'Confirm must be true to delete database' }),
  }),
});

// ═══════════════════════════════════════════════════════════════════════════════
// INGESTION SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * A JSON document given either as a file path or as inline content
 */
export const JsonSourceInput = z
  .object({
    file_path: z.string().min(1, 'File path cannot be empty').optional(),
    content: z.string().min(1, 'Content cannot be empty').optional(),
    file_name: z.string().min(1).max(255).optional(),
  })
  .refine((v) => (v.file_path === undefined) !== (v.content === undefined), {
    message: 'Provide exactly one of file_path or content',
  });

export const IngestJsonInput = JsonSourceInput;

export const ExtractPreviewInput = JsonSourceInput;

export const TextChunkInput = z.object({
  text: z.string(),
  chunk_size: z.number().int().min(1).optional(),
  chunk_overlap: z.number().int().min(0).optional(),
});

// ═══════════════════════════════════════════════════════════════════════════════
// FILE AND PROPOSAL SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const FileListInput = z.object({});

export const FileDeleteInput = z.object({
  file_id: z.string().min(1, 'File ID is required'),
});

export const ProposalListInput = z.object({
  status: ProposalStatusFilter.optional(),
});

export const ProposalReviewInput = z.object({
  proposal_id: z.string().min(1, 'Proposal ID is required'),
  action: ReviewActionInput,
  reviewed_by: z.string().min(1, 'Reviewer is required'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// ONTOLOGY SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const OntologyGetInput = z.object({});

export const ContextBuildInput = z.object({
  sample_size: z.number().int().min(0).max(100).optional(),
});

export const QuestionAnswerInput = z.object({
  question: z.string().min(1, 'Question is required').max(2000, 'Question must be 2000 characters or less'),
});

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIG SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const ConfigGetInput = z.object({
  key: ConfigKey.optional(),
});

export const ConfigSetInput = z.object({
  key: ConfigKey,
  value: z.union([z.string(), z.number(), z.boolean()]),
});

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE EXPORTS (inferred from schemas)
// ═══════════════════════════════════════════════════════════════════════════════

export type ConfigKey = z.infer<typeof ConfigKey>;
export type DatabaseCreateInput = z.infer<typeof DatabaseCreateInput>;
export type JsonSourceInput = z.infer<typeof JsonSourceInput>;
export type TextChunkInput = z.infer<typeof TextChunkInput>;
export type ProposalReviewInput = z.infer<typeof ProposalReviewInput>;
export type ConfigSetInput = z.infer<typeof ConfigSetInput>;
