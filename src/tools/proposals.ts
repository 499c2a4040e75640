/**
 * Proposal Review MCP Tools
 *
 * Tools: onto_proposal_list, onto_proposal_review
 *
 * Approving merges the proposal into the ontology. A relation or instance
 * whose entity names do not resolve is approved but not merged; the
 * response carries the note.
 *
 * @module tools/proposals
 */

import { z } from 'zod';
import { requireDatabase } from '../server/state.js';
import { successResult } from '../server/types.js';
import { proposalNotFoundError, proposalAlreadyReviewedError } from '../server/errors.js';
import { validateInput, ProposalListInput, ProposalReviewInput } from '../utils/validation.js';
import { formatResponse, handleError, type ToolResponse, type ToolDefinition } from './shared.js';

export async function handleProposalList(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProposalListInput, params);
    const proposals = requireDatabase().listProposals(input.status);
    return formatResponse(
      successResult({ proposals, total: proposals.length, status_filter: input.status ?? null })
    );
  } catch (error) {
    return handleError(error);
  }
}

export async function handleProposalReview(params: Record<string, unknown>): Promise<ToolResponse> {
  try {
    const input = validateInput(ProposalReviewInput, params);
    const outcome = requireDatabase().reviewProposal(input.proposal_id, input.action, input.reviewed_by);

    switch (outcome.kind) {
      case 'not_found':
        throw proposalNotFoundError(input.proposal_id);
      case 'already_reviewed':
        throw proposalAlreadyReviewedError(input.proposal_id, outcome.status);
      case 'reviewed':
        return formatResponse(
          successResult({
            proposal: outcome.proposal,
            merged: outcome.merge?.merged ?? false,
            ontology_id: outcome.merge?.ontology_id ?? null,
            merge_note: outcome.merge?.note ?? null,
          })
        );
    }
  } catch (error) {
    return handleError(error);
  }
}

export const proposalTools: Record<string, ToolDefinition> = {
  onto_proposal_list: {
    description: 'List extracted ontology proposals, optionally filtered by review status',
    inputSchema: {
      status: z.enum(['pending', 'approved', 'rejected']).optional().describe('Status filter'),
    },
    handler: handleProposalList,
  },
  onto_proposal_review: {
    description:
      'Approve or reject a pending proposal. Approval adds the entity, relation or instance to the ontology',
    inputSchema: {
      proposal_id: z.string().min(1).describe('Proposal ID'),
      action: z.enum(['approve', 'reject']).describe('Review decision'),
      reviewed_by: z.string().min(1).describe('Reviewer name recorded on the proposal'),
    },
    handler: handleProposalReview,
  },
};
