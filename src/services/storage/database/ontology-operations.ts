/**
 * Ontology operations for DatabaseService
 *
 * Approved proposals become rows here. Relations and instances refer to
 * entities by id; names are resolved at merge time to the first entity
 * inserted under that exact name.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import type {
  OntologyEntityRecord,
  OntologyGraph,
  OntologyInstanceRecord,
  OntologyRelationRecord,
  Proposal,
} from '../../../models/ontology.js';
import type { DatabaseStats } from './types.js';
import { nowIso, parseJsonObject } from './helpers.js';

export interface MergeResult {
  merged: boolean;
  /** Id of the inserted ontology row */
  ontology_id: string | null;
  note: string | null;
}

interface PropertiesRow {
  properties: string;
}

type EntityRow = Omit<OntologyEntityRecord, 'properties'> & PropertiesRow;
type RelationRow = Omit<OntologyRelationRecord, 'properties'> & PropertiesRow;
type InstanceRow = Omit<OntologyInstanceRecord, 'properties'> & PropertiesRow;

export function findEntityIdByName(db: Database.Database, name: string): string | null {
  const row = db
    .prepare<[string], { id: string }>('SELECT id FROM ontology_entities WHERE name = ? ORDER BY rowid LIMIT 1')
    .get(name);
  return row?.id ?? null;
}

function skipped(note: string): MergeResult {
  console.error(`[DatabaseService] ${note}`);
  return { merged: false, ontology_id: null, note };
}

/**
 * Insert the ontology row an approved proposal describes.
 * Callers run this inside their transaction.
 */
export function mergeProposal(db: Database.Database, proposal: Proposal): MergeResult {
  const id = uuidv4();
  const createdAt = nowIso();
  const sourceFileId = proposal.payload.source_file_id ?? null;
  const properties = JSON.stringify(proposal.payload.properties);

  switch (proposal.type) {
    case 'entity': {
      db.prepare(
        'INSERT INTO ontology_entities (id, name, properties, source_file_id, created_at) VALUES (?, ?, ?, ?, ?)'
      ).run(id, proposal.payload.name, properties, sourceFileId, createdAt);
      return { merged: true, ontology_id: id, note: null };
    }
    case 'relation': {
      const { source, target, rel_type } = proposal.payload;
      const sourceId = findEntityIdByName(db, source);
      const targetId = findEntityIdByName(db, target);
      const unresolved = [sourceId ? null : source, targetId ? null : target].filter(
        (name): name is string => name !== null
      );
      if (!sourceId || !targetId) {
        return skipped(`Relation not merged: no ontology entity named ${unresolved.map((n) => `"${n}"`).join(', ')}`);
      }
      db.prepare(
        `INSERT INTO ontology_relations (id, source_entity_id, target_entity_id, rel_type, properties, source_file_id, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      ).run(id, sourceId, targetId, rel_type, properties, sourceFileId, createdAt);
      return { merged: true, ontology_id: id, note: null };
    }
    case 'instance': {
      const entityId = findEntityIdByName(db, proposal.payload.entity);
      if (!entityId) {
        return skipped(`Instance not merged: no ontology entity named "${proposal.payload.entity}"`);
      }
      db.prepare(
        'INSERT INTO ontology_instances (id, entity_id, properties, source_file_id, created_at) VALUES (?, ?, ?, ?, ?)'
      ).run(id, entityId, properties, sourceFileId, createdAt);
      return { merged: true, ontology_id: id, note: null };
    }
  }
}

/** Persisted entities, relations and instances in insertion order */
export function getOntology(db: Database.Database): OntologyGraph {
  const entities = db
    .prepare<[], EntityRow>('SELECT * FROM ontology_entities ORDER BY rowid')
    .all()
    .map((row) => ({ ...row, properties: parseJsonObject(row.properties) }));
  const relations = db
    .prepare<[], RelationRow>('SELECT * FROM ontology_relations ORDER BY rowid')
    .all()
    .map((row) => ({ ...row, properties: parseJsonObject(row.properties) }));
  const instances = db
    .prepare<[], InstanceRow>('SELECT * FROM ontology_instances ORDER BY rowid')
    .all()
    .map((row) => ({ ...row, properties: parseJsonObject(row.properties) }));
  return { entities, relations, instances };
}

function count(db: Database.Database, sql: string): number {
  return db.prepare<[], { n: number }>(sql).get()?.n ?? 0;
}

export function getStats(db: Database.Database, name: string, path: string): DatabaseStats {
  const byStatus = db
    .prepare<[], { status: string; n: number }>('SELECT status, COUNT(*) AS n FROM proposals GROUP BY status')
    .all();
  const proposals = { pending: 0, approved: 0, rejected: 0 };
  for (const row of byStatus) {
    if (row.status === 'pending' || row.status === 'approved' || row.status === 'rejected') {
      proposals[row.status] = row.n;
    }
  }

  return {
    name,
    path,
    files: count(db, 'SELECT COUNT(*) AS n FROM files'),
    chunks: count(db, 'SELECT COUNT(*) AS n FROM chunks'),
    proposals,
    entities: count(db, 'SELECT COUNT(*) AS n FROM ontology_entities'),
    relations: count(db, 'SELECT COUNT(*) AS n FROM ontology_relations'),
    instances: count(db, 'SELECT COUNT(*) AS n FROM ontology_instances'),
  };
}
