/**
 * DAO Registry Types
 */

import type { AccountId, FundingPhase } from "@civitas/shared";
import type { Proposal, VoteTally } from "../proposals/index.js";

export interface DaoRecord {
  readonly id: AccountId;
  readonly name: string;
  readonly description: string;
  readonly url?: string;
  readonly owner: AccountId;
  readonly active: boolean;
  readonly createdAt: number;
  readonly deactivatedAt?: number;
}

/**
 * Read model for displaying one proposal
 */
export interface ProposalView {
  proposal: Proposal;
  tally: VoteTally;
  approvalPercentage: number;
  funding?: {
    phase: FundingPhase;
    progressPercentage: number;
    totalRaised: bigint;
    funderCount: number;
  };
}

export type DaoKey = readonly [daoId: AccountId];
