/**
 * Proposal Lifecycle Types
 */

import type {
  AccountId,
  EpochWindow,
  ProposalStatus,
  VoteKind,
} from "@civitas/shared";

export interface Proposal {
  readonly id: AccountId;
  readonly organization: AccountId;
  readonly proposer: AccountId;
  readonly title: string;
  readonly description: string;
  readonly status: ProposalStatus;
  readonly createdAt: number;

  // Voting window [start, end)
  readonly votingWindow: EpochWindow;

  // Opaque execution payload, interpreted by the caller
  readonly payload?: string;

  readonly fundingGoal: bigint;
  readonly minApprovalPercentage: number;

  // Transition stamps
  readonly activatedAt?: number;
  readonly finalizedAt?: number;
  readonly executedAt?: number;
  readonly canceledAt?: number;

  // Recorded by finalize
  readonly approvalPercentage?: number;
}

/**
 * One per (proposal, voter), immutable once cast
 */
export interface VoteRecord {
  readonly proposalId: AccountId;
  readonly voter: AccountId;
  readonly kind: VoteKind;
  readonly power: bigint;
  readonly castAt: number;
}

/**
 * Invariant: yes + no + abstain == totalVoted == Σ power over VoteRecords
 */
export interface VoteTally {
  readonly proposalId: AccountId;
  readonly yes: bigint;
  readonly no: bigint;
  readonly abstain: bigint;
  readonly totalVoted: bigint;
  readonly voterCount: number;
}

/**
 * Goal check consulted before execution of a crowdfunded proposal
 */
export interface FundingGate {
  /** Undefined when the proposal has no fundable campaign */
  isGoalMet(proposalId: AccountId): boolean | undefined;
}

export interface ProposalFilter {
  organization?: AccountId;
  status?: ProposalStatus;
}

export type ProposalKey = readonly [proposalId: AccountId];
export type VoteKey = readonly [proposalId: AccountId, voter: AccountId];

/** Governance outcomes a cancel may not override */
export const SETTLED_OUTCOMES: readonly ProposalStatus[] = ["PASSED", "REJECTED", "EXECUTED"];
