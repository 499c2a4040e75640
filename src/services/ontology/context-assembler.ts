/**
 * Context Assembler
 *
 * Renders the persisted ontology as plain text for the answer-generating
 * model. Output size is bounded per entity type: at most `sampleSize`
 * instances are rendered for each group, the rest are counted.
 *
 * @module services/ontology/context-assembler
 */

import type {
  OntologyEntityRecord,
  OntologyInstanceRecord,
  OntologyRelationRecord,
} from '../../models/ontology.js';

export const DEFAULT_CONTEXT_SAMPLE_SIZE = 3;

/** Instance string properties at or above this length are left out of the context */
export const MAX_CONTEXT_STRING_LENGTH = 50;

export const UNKNOWN_ENTITY_NAME = 'Unknown';

export interface ContextOptions {
  /** Instances rendered in full per entity group (default: 3) */
  sampleSize?: number;
}

function formatValue(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value) ?? String(value);
}

/**
 * Whether an instance property is worth showing: non-zero numbers, `true`
 * and strings shorter than MAX_CONTEXT_STRING_LENGTH. Booleans count as the
 * numbers 1 and 0.
 */
export function isMeaningfulValue(value: unknown): value is number | string | boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) && value !== 0;
  if (typeof value === 'string') return value.length < MAX_CONTEXT_STRING_LENGTH;
  return false;
}

function buildNameLookup(entities: readonly OntologyEntityRecord[]): Map<string, string> {
  const lookup = new Map<string, string>();
  for (const entity of entities) {
    lookup.set(String(entity.id), entity.name || UNKNOWN_ENTITY_NAME);
  }
  return lookup;
}

function renderEntities(entities: readonly OntologyEntityRecord[]): string[] {
  const lines = ['=== ENTITIES ==='];
  for (const entity of entities) {
    const name = entity.name || UNKNOWN_ENTITY_NAME;
    const props = Object.entries(entity.properties ?? {});
    if (props.length > 0) {
      const rendered = props.map(([k, v]) => `${k}: ${formatValue(v)}`).join(', ');
      lines.push(`Entity '${name}' has properties: ${rendered}`);
    } else {
      lines.push(`Entity '${name}' (no properties defined)`);
    }
  }
  return lines;
}

function renderRelations(
  relations: readonly OntologyRelationRecord[],
  lookup: Map<string, string>
): string[] {
  const lines = ['\n=== RELATIONSHIPS ==='];
  for (const relation of relations) {
    const source = lookup.get(String(relation.source_entity_id)) ?? UNKNOWN_ENTITY_NAME;
    const target = lookup.get(String(relation.target_entity_id)) ?? UNKNOWN_ENTITY_NAME;
    lines.push(`${source} --${relation.rel_type || 'unknown'}--> ${target}`);
  }
  return lines;
}

function renderInstances(
  instances: readonly OntologyInstanceRecord[],
  lookup: Map<string, string>,
  sampleSize: number
): string[] {
  const lines = [`\n=== DATA INSTANCES (${instances.length} total) ===`];

  // Map preserves first-encounter order of groups
  const byEntity = new Map<string, OntologyInstanceRecord[]>();
  for (const instance of instances) {
    const name = lookup.get(String(instance.entity_id)) ?? UNKNOWN_ENTITY_NAME;
    const group = byEntity.get(name) ?? [];
    group.push(instance);
    byEntity.set(name, group);
  }

  for (const [entityName, group] of byEntity) {
    lines.push(`\n${entityName} instances (${group.length}):`);

    for (const instance of group.slice(0, sampleSize)) {
      const summary = Object.entries(instance.properties ?? {})
        .filter(([, value]) => isMeaningfulValue(value))
        .map(([key, value]) => `${key}: ${value}`);
      if (summary.length > 0) {
        lines.push(`  - ${summary.join(', ')}`);
      }
    }

    if (group.length > sampleSize) {
      lines.push(`  ... and ${group.length - sampleSize} more`);
    }
  }

  return lines;
}

/**
 * Render entities, relations and instances into one context string.
 * Sections with no rows are omitted; an empty ontology yields ''.
 */
export function assembleContext(
  entities: readonly OntologyEntityRecord[],
  relations: readonly OntologyRelationRecord[],
  instances: readonly OntologyInstanceRecord[],
  options: ContextOptions = {}
): string {
  const sampleSize = Math.max(0, options.sampleSize ?? DEFAULT_CONTEXT_SAMPLE_SIZE);
  const lookup = buildNameLookup(entities);
  const parts: string[] = [];

  if (entities.length > 0) parts.push(...renderEntities(entities));
  if (relations.length > 0) parts.push(...renderRelations(relations, lookup));
  if (instances.length > 0) parts.push(...renderInstances(instances, lookup, sampleSize));

  return parts.join('\n');
}
