/**
 * SQL schema for the ontology store
 *
 * Tables are created with IF NOT EXISTS on database creation. There is no
 * migration path: a database written with another SCHEMA_VERSION is refused.
 *
 * @module services/storage/database/schema
 */

import type Database from 'better-sqlite3';
import { DatabaseError, DatabaseErrorCode } from './types.js';

export const SCHEMA_VERSION = 1;

export const DATABASE_PRAGMAS = [
  'PRAGMA journal_mode = WAL',
  'PRAGMA foreign_keys = ON',
  'PRAGMA synchronous = NORMAL',
] as const;

const CREATE_SCHEMA_VERSION_TABLE = `
CREATE TABLE IF NOT EXISTS schema_version (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  version INTEGER NOT NULL,
  created_at TEXT NOT NULL
)
`;

const CREATE_DATABASE_METADATA_TABLE = `
CREATE TABLE IF NOT EXISTS database_metadata (
  id INTEGER PRIMARY KEY CHECK (id = 1),
  database_name TEXT NOT NULL,
  description TEXT,
  created_at TEXT NOT NULL,
  last_modified_at TEXT NOT NULL
)
`;

const CREATE_FILES_TABLE = `
CREATE TABLE IF NOT EXISTS files (
  id TEXT PRIMARY KEY,
  file_name TEXT NOT NULL,
  mime_type TEXT NOT NULL,
  size_bytes INTEGER NOT NULL,
  content_hash TEXT NOT NULL UNIQUE,
  status TEXT NOT NULL CHECK (status IN ('uploaded', 'processed', 'failed')),
  created_at TEXT NOT NULL
)
`;

const CREATE_CHUNKS_TABLE = `
CREATE TABLE IF NOT EXISTS chunks (
  id TEXT PRIMARY KEY,
  file_id TEXT NOT NULL,
  chunk_index INTEGER NOT NULL,
  text TEXT NOT NULL,
  UNIQUE (file_id, chunk_index),
  FOREIGN KEY (file_id) REFERENCES files(id) ON DELETE CASCADE
)
`;

const CREATE_PROPOSALS_TABLE = `
CREATE TABLE IF NOT EXISTS proposals (
  id TEXT PRIMARY KEY,
  type TEXT NOT NULL CHECK (type IN ('entity', 'relation', 'instance')),
  payload TEXT NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'approved', 'rejected')),
  source_file_id TEXT,
  created_by TEXT NOT NULL,
  created_at TEXT NOT NULL,
  reviewed_by TEXT,
  reviewed_at TEXT
)
`;

const CREATE_ONTOLOGY_ENTITIES_TABLE = `
CREATE TABLE IF NOT EXISTS ontology_entities (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  properties TEXT NOT NULL DEFAULT '{}',
  source_file_id TEXT,
  created_at TEXT NOT NULL
)
`;

const CREATE_ONTOLOGY_RELATIONS_TABLE = `
CREATE TABLE IF NOT EXISTS ontology_relations (
  id TEXT PRIMARY KEY,
  source_entity_id TEXT NOT NULL,
  target_entity_id TEXT NOT NULL,
  rel_type TEXT NOT NULL,
  properties TEXT NOT NULL DEFAULT '{}',
  source_file_id TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY (source_entity_id) REFERENCES ontology_entities(id),
  FOREIGN KEY (target_entity_id) REFERENCES ontology_entities(id)
)
`;

const CREATE_ONTOLOGY_INSTANCES_TABLE = `
CREATE TABLE IF NOT EXISTS ontology_instances (
  id TEXT PRIMARY KEY,
  entity_id TEXT NOT NULL,
  properties TEXT NOT NULL DEFAULT '{}',
  source_file_id TEXT,
  created_at TEXT NOT NULL,
  FOREIGN KEY (entity_id) REFERENCES ontology_entities(id)
)
`;

const CREATE_INDEXES = [
  'CREATE INDEX IF NOT EXISTS idx_chunks_file_id ON chunks(file_id)',
  'CREATE INDEX IF NOT EXISTS idx_proposals_status ON proposals(status)',
  'CREATE INDEX IF NOT EXISTS idx_proposals_source_file_id ON proposals(source_file_id)',
  'CREATE INDEX IF NOT EXISTS idx_ontology_entities_name ON ontology_entities(name)',
  'CREATE INDEX IF NOT EXISTS idx_ontology_instances_entity_id ON ontology_instances(entity_id)',
];

export const REQUIRED_TABLES = [
  'schema_version',
  'database_metadata',
  'files',
  'chunks',
  'proposals',
  'ontology_entities',
  'ontology_relations',
  'ontology_instances',
] as const;

export function applyPragmas(db: Database.Database): void {
  for (const pragma of DATABASE_PRAGMAS) {
    db.exec(pragma);
  }
}

/**
 * Create all tables and seed the singleton version/metadata rows
 */
export function initializeSchema(db: Database.Database, databaseName: string, description?: string): void {
  applyPragmas(db);
  const now = new Date().toISOString();

  db.transaction(() => {
    for (const sql of [
      CREATE_SCHEMA_VERSION_TABLE,
      CREATE_DATABASE_METADATA_TABLE,
      CREATE_FILES_TABLE,
      CREATE_CHUNKS_TABLE,
      CREATE_PROPOSALS_TABLE,
      CREATE_ONTOLOGY_ENTITIES_TABLE,
      CREATE_ONTOLOGY_RELATIONS_TABLE,
      CREATE_ONTOLOGY_INSTANCES_TABLE,
      ...CREATE_INDEXES,
    ]) {
      db.exec(sql);
    }

    db.prepare('INSERT OR IGNORE INTO schema_version (id, version, created_at) VALUES (1, ?, ?)').run(
      SCHEMA_VERSION,
      now
    );
    db.prepare(
      `INSERT OR IGNORE INTO database_metadata (id, database_name, description, created_at, last_modified_at)
       VALUES (1, ?, ?, ?, ?)`
    ).run(databaseName, description ?? null, now, now);
  })();
}

/**
 * Refuse databases with missing tables or a different schema version
 */
export function verifySchema(db: Database.Database): void {
  const present = new Set(
    db
      .prepare<[], { name: string }>("SELECT name FROM sqlite_master WHERE type = 'table'")
      .all()
      .map((row) => row.name)
  );
  const missing = REQUIRED_TABLES.filter((table) => !present.has(table));
  if (missing.length > 0) {
    throw new DatabaseError(
      `Database schema verification failed. Missing tables: ${missing.join(', ')}`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }

  const row = db.prepare<[], { version: number }>('SELECT version FROM schema_version WHERE id = 1').get();
  if (!row || row.version !== SCHEMA_VERSION) {
    throw new DatabaseError(
      `Unsupported schema version ${row?.version ?? 'none'} (expected ${SCHEMA_VERSION})`,
      DatabaseErrorCode.SCHEMA_MISMATCH
    );
  }
}
