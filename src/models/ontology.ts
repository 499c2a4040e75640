/**
 * Ontology model types
 *
 * Two families live here:
 * - extraction-time values (ExtractionResult, Proposal) that refer to each
 *   other by NAME and exist only in memory until reviewed
 * - persisted records (OntologyEntityRecord, ...) that refer to each other by ID
 *
 * @module models/ontology
 */

/** Scalar property value kept on entities, relations and instances */
export type PropertyValue = string | number | boolean;

export type PropertyMap = Record<string, PropertyValue>;

// ═══════════════════════════════════════════════════════════════════════════════
// EXTRACTION-TIME VALUES
// ═══════════════════════════════════════════════════════════════════════════════

/** One object item of model output; field presence is checked by the proposal builder */
export type ExtractionItem = Record<string, unknown>;

/**
 * Parsed model output. All three keys are always present; items are
 * unchecked and may not even be objects.
 */
export interface ExtractionResult {
  readonly entities: readonly unknown[];
  readonly relations: readonly unknown[];
  readonly instances: readonly unknown[];
}

export function emptyExtractionResult(): ExtractionResult {
  return { entities: [], relations: [], instances: [] };
}

// ═══════════════════════════════════════════════════════════════════════════════
// PROPOSALS
// ═══════════════════════════════════════════════════════════════════════════════

export type ProposalType = 'entity' | 'relation' | 'instance';

/** Proposed ontology class, e.g. "Invoice". `name` is unique only within one batch. */
export interface EntityProposalPayload {
  name: string;
  properties: PropertyMap;
  source_file_id?: string;
}

/** Directed, typed edge between two entity names (resolved to ids on approval) */
export interface RelationProposalPayload {
  source: string;
  target: string;
  rel_type: string;
  properties: PropertyMap;
  source_file_id?: string;
}

/** Concrete data record belonging to the named entity */
export interface InstanceProposalPayload {
  entity: string;
  properties: PropertyMap;
  source_file_id?: string;
}

export type Proposal =
  | { readonly type: 'entity'; readonly payload: EntityProposalPayload }
  | { readonly type: 'relation'; readonly payload: RelationProposalPayload }
  | { readonly type: 'instance'; readonly payload: InstanceProposalPayload };

export type ProposalStatus = 'pending' | 'approved' | 'rejected';

/** Proposal as stored for review */
export type StoredProposal = Proposal & {
  id: string;
  status: ProposalStatus;
  created_by: string;
  created_at: string;
  reviewed_by: string | null;
  reviewed_at: string | null;
};

// ═══════════════════════════════════════════════════════════════════════════════
// PERSISTED ONTOLOGY
// ═══════════════════════════════════════════════════════════════════════════════

export interface OntologyEntityRecord {
  id: string;
  name: string;
  properties: Record<string, unknown>;
  source_file_id: string | null;
  created_at: string;
}

export interface OntologyRelationRecord {
  id: string;
  source_entity_id: string;
  target_entity_id: string;
  rel_type: string;
  properties: Record<string, unknown>;
  source_file_id: string | null;
  created_at: string;
}

export interface OntologyInstanceRecord {
  id: string;
  entity_id: string;
  properties: Record<string, unknown>;
  source_file_id: string | null;
  created_at: string;
}

/** Everything the context assembler needs */
export interface OntologyGraph {
  entities: OntologyEntityRecord[];
  relations: OntologyRelationRecord[];
  instances: OntologyInstanceRecord[];
}
