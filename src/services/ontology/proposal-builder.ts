/**
 * Proposal Builder
 *
 * Maps an ExtractionResult to a flat list of reviewable proposals: entities
 * first, then relations, then instances, each in result order.
 *
 * Items that are not objects, that miss a required field (entity `name`;
 * relation `source`, `target`, `type`; instance `entity`) or that carry
 * non-object `properties` are skipped and reported in `diagnostics.skipped`;
 * the rest of the batch still builds.
 *
 * @module services/ontology/proposal-builder
 */

import type {
  ExtractionItem,
  ExtractionResult,
  Proposal,
  PropertyMap,
  ProposalType,
} from '../../models/ontology.js';

export interface SkippedItem {
  kind: ProposalType;
  /** Position of the item in its array of the extraction result */
  index: number;
  reason: string;
}

export interface ProposalDiagnostics {
  entities: number;
  relations: number;
  instances: number;
  skipped: SkippedItem[];
}

export interface ProposalBatch {
  proposals: Proposal[];
  diagnostics: ProposalDiagnostics;
}

type FieldResult<T> = { ok: true; value: T } | { ok: false; reason: string };

const NOT_AN_OBJECT = 'item is not an object';

function isItem(value: unknown): value is ExtractionItem {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(item: ExtractionItem, field: string): FieldResult<string> {
  const value = item[field];
  if (typeof value === 'string' && value.trim().length > 0) {
    return { ok: true, value: value.trim() };
  }
  if (typeof value === 'number') {
    return { ok: true, value: String(value) };
  }
  return { ok: false, reason: `missing required field "${field}"` };
}

/**
 * Normalise a properties value to scalar entries.
 * Absent or null -> {}; null entries dropped; objects and arrays JSON-encoded.
 */
export function normalizeProperties(value: unknown): FieldResult<PropertyMap> {
  if (value === undefined || value === null) {
    return { ok: true, value: {} };
  }
  if (typeof value !== 'object' || Array.isArray(value)) {
    return { ok: false, reason: '"properties" must be an object' };
  }

  const out: PropertyMap = {};
  for (const [key, entry] of Object.entries(value)) {
    if (!key || entry === null || entry === undefined) continue;
    if (typeof entry === 'string' || typeof entry === 'number' || typeof entry === 'boolean') {
      out[key] = entry;
    } else {
      out[key] = JSON.stringify(entry);
    }
  }
  return { ok: true, value: out };
}

function sourceTag(fileId: string | undefined): { source_file_id?: string } {
  return fileId ? { source_file_id: fileId } : {};
}

function firstFailure(...fields: Array<FieldResult<unknown>>): string {
  for (const field of fields) {
    if (!field.ok) return field.reason;
  }
  return 'malformed item';
}

/**
 * Build proposals from an extraction result
 *
 * @param fileId - provenance tag stored as `source_file_id`; omitted when not given
 */
export function buildProposals(result: ExtractionResult, fileId?: string): ProposalBatch {
  const proposals: Proposal[] = [];
  const skipped: SkippedItem[] = [];
  let entities = 0;
  let relations = 0;
  let instances = 0;

  for (const [index, item] of result.entities.entries()) {
    if (!isItem(item)) {
      skipped.push({ kind: 'entity', index, reason: NOT_AN_OBJECT });
      continue;
    }
    const name = requireString(item, 'name');
    const properties = normalizeProperties(item.properties);
    if (!name.ok || !properties.ok) {
      skipped.push({ kind: 'entity', index, reason: firstFailure(name, properties) });
      continue;
    }
    proposals.push({
      type: 'entity',
      payload: { name: name.value, properties: properties.value, ...sourceTag(fileId) },
    });
    entities++;
  }

  for (const [index, item] of result.relations.entries()) {
    if (!isItem(item)) {
      skipped.push({ kind: 'relation', index, reason: NOT_AN_OBJECT });
      continue;
    }
    const source = requireString(item, 'source');
    const target = requireString(item, 'target');
    const relType = requireString(item, 'type');
    const properties = normalizeProperties(item.properties);
    if (!source.ok || !target.ok || !relType.ok || !properties.ok) {
      skipped.push({ kind: 'relation', index, reason: firstFailure(source, target, relType, properties) });
      continue;
    }
    proposals.push({
      type: 'relation',
      payload: {
        source: source.value,
        target: target.value,
        rel_type: relType.value,
        properties: properties.value,
        ...sourceTag(fileId),
      },
    });
    relations++;
  }

  for (const [index, item] of result.instances.entries()) {
    if (!isItem(item)) {
      skipped.push({ kind: 'instance', index, reason: NOT_AN_OBJECT });
      continue;
    }
    const entity = requireString(item, 'entity');
    const properties = normalizeProperties(item.properties);
    if (!entity.ok || !properties.ok) {
      skipped.push({ kind: 'instance', index, reason: firstFailure(entity, properties) });
      continue;
    }
    proposals.push({
      type: 'instance',
      payload: { entity: entity.value, properties: properties.value, ...sourceTag(fileId) },
    });
    instances++;
  }

  if (skipped.length > 0) {
    console.error(
      `[ProposalBuilder] Skipped ${skipped.length} malformed extraction item(s): ` +
        skipped.map((s) => `${s.kind}[${s.index}] ${s.reason}`).join('; ')
    );
  }

  return { proposals, diagnostics: { entities, relations, instances, skipped } };
}
