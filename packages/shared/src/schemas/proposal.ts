/**
 * Proposal Schemas
 * Lifecycle states, vote kinds and the draft a proposer submits
 *
 * @version 1.0.0
 */

import { z } from "zod";
import {
  accountIdSchema,
  amountSchema,
  epochWindowSchema,
  percentageSchema,
} from "./common.js";
import { PROPOSAL_LIMITS } from "../constants/index.js";

// ============================================
// ENUMS
// ============================================

export const proposalStatusSchema = z.enum([
  "DRAFT",
  "ACTIVE",
  "PASSED",
  "REJECTED",
  "EXECUTED",
  "CANCELED",
]);

export type ProposalStatus = z.infer<typeof proposalStatusSchema>;

export const voteKindSchema = z.enum(["YES", "NO", "ABSTAIN"]);

export type VoteKind = z.infer<typeof voteKindSchema>;

// ============================================
// PROPOSAL DRAFT
// ============================================

export interface ProposalTextLimits {
  maxTitleLength: number;
  maxDescriptionLength: number;
}

/**
 * Builds the draft schema for the given text limits. Title and description
 * are trimmed before the length checks.
 */
export function createProposalDraftSchema(
  limits: ProposalTextLimits = PROPOSAL_LIMITS
) {
  return z.object({
    id: accountIdSchema,
    organization: accountIdSchema,
    title: z
      .string()
      .trim()
      .min(1, "Title is required")
      .max(limits.maxTitleLength, `Title exceeds ${limits.maxTitleLength} characters`),
    description: z
      .string()
      .trim()
      .min(1, "Description is required")
      .max(
        limits.maxDescriptionLength,
        `Description exceeds ${limits.maxDescriptionLength} characters`
      ),
    votingWindow: epochWindowSchema,
    payload: z.string().optional(),
    fundingGoal: amountSchema.default(0n),
    minApprovalPercentage: percentageSchema,
  });
}

export const proposalDraftSchema = createProposalDraftSchema();

export type ProposalDraftInput = z.input<typeof proposalDraftSchema>;
export type ProposalDraft = z.output<typeof proposalDraftSchema>;
