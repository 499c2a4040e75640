/**
 * Extraction Parser
 *
 * Turns raw model text into an ExtractionResult. Model output is treated as
 * untrusted input: parseExtraction() never throws and reports why it failed,
 * parseExtractionOrEmpty() collapses any failure to the empty result. Only the
 * envelope is checked here; items are left to the proposal builder.
 *
 * @module services/ontology/extraction-parser
 */

import { z } from 'zod';
import { emptyExtractionResult, type ExtractionResult } from '../../models/ontology.js';

export const REQUIRED_KEYS = ['entities', 'relations', 'instances'] as const;

export type ParseFailureReason =
  | 'empty_response'
  | 'invalid_json'
  | 'not_an_object'
  | 'missing_keys'
  | 'invalid_shape';

export interface ParseFailure {
  ok: false;
  reason: ParseFailureReason;
  message: string;
}

export type ParseOutcome = { ok: true; result: ExtractionResult } | ParseFailure;

const ExtractionEnvelopeSchema = z.object({
  entities: z.array(z.unknown()),
  relations: z.array(z.unknown()),
  instances: z.array(z.unknown()),
});

const LEADING_FENCE = /^`{3,}[\w+.-]*[ \t]*\r?\n?/;
const TRAILING_FENCE = /\r?\n?`{3,}$/;

/**
 * Remove one markdown code fence around model output.
 *
 * Pre: any string.
 * Post: result is trimmed; at most one leading fence (three or more backticks
 * plus an optional language tag such as `json`) and at most one trailing fence
 * have been removed. Text without fences only loses surrounding whitespace.
 */
export function stripCodeFence(text: string): string {
  let content = text.trim();
  content = content.replace(LEADING_FENCE, '');
  content = content.replace(TRAILING_FENCE, '');
  return content.trim();
}

function describeZodError(error: z.ZodError): string {
  return error.errors
    .map((e) => `${e.path.length > 0 ? `${e.path.join('.')}: ` : ''}${e.message}`)
    .join('; ');
}

/**
 * Parse raw model text into an ExtractionResult or a failure reason
 */
export function parseExtraction(rawText: string): ParseOutcome {
  const content = stripCodeFence(rawText);
  if (content.length === 0) {
    return { ok: false, reason: 'empty_response', message: 'Model returned no content' };
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    return {
      ok: false,
      reason: 'invalid_json',
      message: error instanceof Error ? error.message : String(error),
    };
  }

  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    return {
      ok: false,
      reason: 'not_an_object',
      message: `Expected a JSON object, got ${Array.isArray(parsed) ? 'array' : typeof parsed}`,
    };
  }

  const missing = REQUIRED_KEYS.filter((key) => !(key in parsed));
  if (missing.length > 0) {
    return {
      ok: false,
      reason: 'missing_keys',
      message: `Missing required keys in ontology extraction: ${missing.join(', ')}`,
    };
  }

  const validated = ExtractionEnvelopeSchema.safeParse(parsed);
  if (!validated.success) {
    return { ok: false, reason: 'invalid_shape', message: describeZodError(validated.error) };
  }

  return { ok: true, result: validated.data };
}

/**
 * Log a parse failure with the start of the raw text
 *
 * @param source - file the response was about, when known
 */
export function logParseFailure(failure: ParseFailure, rawText: string, source?: string): void {
  console.error(
    `[ExtractionParser] Failed to parse model response${source ? ` for '${source}'` : ''} ` +
      `(${failure.reason}): ${failure.message}\nRaw: ${rawText.slice(0, 300)}`
  );
}

/**
 * Parse raw model text, falling back to the empty result on any failure
 */
export function parseExtractionOrEmpty(rawText: string): ExtractionResult {
  const outcome = parseExtraction(rawText);
  if (outcome.ok) return outcome.result;

  logParseFailure(outcome, rawText);
  return emptyExtractionResult();
}
