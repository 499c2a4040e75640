/**
 * Proposal operations for DatabaseService
 *
 * Proposals are stored with their payload as JSON and decoded back through a
 * zod schema. Reviewing a pending proposal sets its status; approving also
 * merges it into the ontology tables inside the same transaction.
 */

import Database from 'better-sqlite3';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import type { Proposal, ProposalStatus, StoredProposal } from '../../../models/ontology.js';
import { DatabaseError, DatabaseErrorCode } from './types.js';
import { nowIso, touchMetadata } from './helpers.js';
import { mergeProposal, type MergeResult } from './ontology-operations.js';

export const DEFAULT_PROPOSAL_AUTHOR = 'system';

export type ReviewAction = 'approve' | 'reject';

export type ReviewOutcome =
  | { kind: 'not_found' }
  | { kind: 'already_reviewed'; status: ProposalStatus }
  | { kind: 'reviewed'; proposal: StoredProposal; merge: MergeResult | null };

interface ProposalRow {
  id: string;
  type: string;
  payload: string;
  status: string;
  source_file_id: string | null;
  created_by: string;
  created_at: string;
  reviewed_by: string | null;
  reviewed_at: string | null;
}

const PropertyMapSchema = z.record(z.union([z.string(), z.number(), z.boolean()]));

const ProposalSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('entity'),
    payload: z.object({
      name: z.string(),
      properties: PropertyMapSchema,
      source_file_id: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal('relation'),
    payload: z.object({
      source: z.string(),
      target: z.string(),
      rel_type: z.string(),
      properties: PropertyMapSchema,
      source_file_id: z.string().optional(),
    }),
  }),
  z.object({
    type: z.literal('instance'),
    payload: z.object({
      entity: z.string(),
      properties: PropertyMapSchema,
      source_file_id: z.string().optional(),
    }),
  }),
]);

const ProposalStatusSchema = z.enum(['pending', 'approved', 'rejected']);

function rowToProposal(row: ProposalRow): StoredProposal {
  let payload: unknown;
  try {
    payload = JSON.parse(row.payload);
  } catch (error) {
    throw new DatabaseError(`Proposal ${row.id} has an unreadable payload`, DatabaseErrorCode.CORRUPT_ROW, error);
  }
  const proposal = ProposalSchema.safeParse({ type: row.type, payload });
  const status = ProposalStatusSchema.safeParse(row.status);
  if (!proposal.success || !status.success) {
    throw new DatabaseError(`Proposal ${row.id} does not match the proposal schema`, DatabaseErrorCode.CORRUPT_ROW);
  }
  return {
    ...proposal.data,
    id: row.id,
    status: status.data,
    created_by: row.created_by,
    created_at: row.created_at,
    reviewed_by: row.reviewed_by,
    reviewed_at: row.reviewed_at,
  };
}

export function insertProposal(
  db: Database.Database,
  proposal: Proposal,
  createdBy: string = DEFAULT_PROPOSAL_AUTHOR
): StoredProposal {
  const stored: StoredProposal = {
    ...proposal,
    id: uuidv4(),
    status: 'pending',
    created_by: createdBy,
    created_at: nowIso(),
    reviewed_by: null,
    reviewed_at: null,
  };
  db.prepare(
    `INSERT INTO proposals (id, type, payload, status, source_file_id, created_by, created_at)
     VALUES (?, ?, ?, ?, ?, ?, ?)`
  ).run(
    stored.id,
    stored.type,
    JSON.stringify(stored.payload),
    stored.status,
    stored.payload.source_file_id ?? null,
    stored.created_by,
    stored.created_at
  );
  touchMetadata(db);
  return stored;
}

export function insertProposals(
  db: Database.Database,
  proposals: readonly Proposal[],
  createdBy: string = DEFAULT_PROPOSAL_AUTHOR
): StoredProposal[] {
  return db.transaction(() => proposals.map((p) => insertProposal(db, p, createdBy)))();
}

export function getProposal(db: Database.Database, id: string): StoredProposal | null {
  const row = db.prepare<[string], ProposalRow>('SELECT * FROM proposals WHERE id = ?').get(id);
  return row ? rowToProposal(row) : null;
}

/** Proposals in creation order, optionally filtered by status */
export function listProposals(db: Database.Database, status?: ProposalStatus): StoredProposal[] {
  const rows = status
    ? db.prepare<[string], ProposalRow>('SELECT * FROM proposals WHERE status = ? ORDER BY rowid').all(status)
    : db.prepare<[], ProposalRow>('SELECT * FROM proposals ORDER BY rowid').all();
  return rows.map(rowToProposal);
}

/**
 * Approve or reject a pending proposal
 */
export function reviewProposal(
  db: Database.Database,
  id: string,
  action: ReviewAction,
  reviewedBy: string
): ReviewOutcome {
  return db.transaction((): ReviewOutcome => {
    const current = getProposal(db, id);
    if (!current) return { kind: 'not_found' };
    if (current.status !== 'pending') return { kind: 'already_reviewed', status: current.status };

    const status: ProposalStatus = action === 'approve' ? 'approved' : 'rejected';
    const reviewedAt = nowIso();
    db.prepare('UPDATE proposals SET status = ?, reviewed_by = ?, reviewed_at = ? WHERE id = ?').run(
      status,
      reviewedBy,
      reviewedAt,
      id
    );

    const merge = action === 'approve' ? mergeProposal(db, current) : null;
    touchMetadata(db);
    return {
      kind: 'reviewed',
      proposal: { ...current, status, reviewed_by: reviewedBy, reviewed_at: reviewedAt },
      merge,
    };
  })();
}
