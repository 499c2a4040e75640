/**
 * Unit tests for the context assembler
 */

import { describe, it, expect } from 'vitest';
import { assembleContext, isMeaningfulValue } from '../../../../src/services/ontology/context-assembler.js';
import type {
  OntologyEntityRecord,
  OntologyInstanceRecord,
  OntologyRelationRecord,
} from '../../../../src/models/ontology.js';

const CREATED = '2026-01-01T00:00:00.000Z';

function entity(id: string, name: string, properties: Record<string, unknown> = {}): OntologyEntityRecord {
  return { id, name, properties, source_file_id: null, created_at: CREATED };
}

function relation(id: string, source: string, target: string, relType: string): OntologyRelationRecord {
  return {
    id,
    source_entity_id: source,
    target_entity_id: target,
    rel_type: relType,
    properties: {},
    source_file_id: null,
    created_at: CREATED,
  };
}

function instance(id: string, entityId: string, properties: Record<string, unknown>): OntologyInstanceRecord {
  return { id, entity_id: entityId, properties, source_file_id: null, created_at: CREATED };
}

describe('assembleContext', () => {
  const entities = [entity('e1', 'Account', { currency: 'USD' }), entity('e2', 'Period')];
  const relations = [relation('r1', 'e1', 'e2', 'hasPeriod')];
  const instances = Array.from({ length: 5 }, (_, i) =>
    instance(`i${i}`, 'e1', { amount: i + 1, note: 'x'.repeat(60) })
  );

  it('renders all three sections and samples instances per entity', () => {
    expect(assembleContext(entities, relations, instances)).toBe(
      [
        '=== ENTITIES ===',
        "Entity 'Account' has properties: currency: USD",
        "Entity 'Period' (no properties defined)",
        '\n=== RELATIONSHIPS ===',
        'Account --hasPeriod--> Period',
        '\n=== DATA INSTANCES (5 total) ===',
        '\nAccount instances (5):',
        '  - amount: 1',
        '  - amount: 2',
        '  - amount: 3',
        '  ... and 2 more',
      ].join('\n')
    );
  });

  it('returns an empty string for an empty ontology', () => {
    expect(assembleContext([], [], [])).toBe('');
  });

  it('honours the sample size', () => {
    const text = assembleContext([], [], instances.slice(0, 2), { sampleSize: 0 });
    expect(text).toBe(
      ['\n=== DATA INSTANCES (2 total) ===', '\nUnknown instances (2):', '  ... and 2 more'].join('\n')
    );
  });

  it('falls back to Unknown for unresolved relation endpoints', () => {
    const text = assembleContext([entity('e1', 'Account')], [relation('r1', 'e1', 'gone', 'hasPeriod')], []);
    expect(text.split('\n').pop()).toBe('Account --hasPeriod--> Unknown');
  });

  it('renders true flags and drops false ones', () => {
    const text = assembleContext(
      [entity('e1', 'Account')],
      [],
      [instance('a', 'e1', { closed: true, reconciled: false, amount: 5 })]
    );
    expect(text.split('\n').pop()).toBe('  - closed: true, amount: 5');
  });

  it('groups instances in first-seen order and skips empty summaries', () => {
    const text = assembleContext(
      [entity('e1', 'Account'), entity('e2', 'Period')],
      [],
      [
        instance('a', 'e2', { periodKey: '2024-Q1' }),
        instance('b', 'e1', { amount: 0, flag: false }),
        instance('c', 'e2', { periodKey: '2024-Q2' }),
      ]
    );
    expect(text).toBe(
      [
        '=== ENTITIES ===',
        "Entity 'Account' (no properties defined)",
        "Entity 'Period' (no properties defined)",
        '\n=== DATA INSTANCES (3 total) ===',
        '\nPeriod instances (2):',
        '  - periodKey: 2024-Q1',
        '  - periodKey: 2024-Q2',
        '\nAccount instances (1):',
      ].join('\n')
    );
  });
});

describe('isMeaningfulValue', () => {
  it('keeps non-zero numbers, true and short strings', () => {
    expect(isMeaningfulValue(12)).toBe(true);
    expect(isMeaningfulValue(true)).toBe(true);
    expect(isMeaningfulValue('x'.repeat(49))).toBe(true);
  });

  it('drops zero, long strings and other types', () => {
    expect(isMeaningfulValue(0)).toBe(false);
    expect(isMeaningfulValue('x'.repeat(50))).toBe(false);
    expect(isMeaningfulValue(false)).toBe(false);
    expect(isMeaningfulValue(null)).toBe(false);
  });
});
