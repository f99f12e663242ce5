/**
 * Funding Escrow Types
 */

import type { AccountId, EpochWindow } from "@civitas/shared";

/**
 * Alternate-asset accounting. The asset is fixed by the first
 * alternate-asset contribution.
 */
export interface TokenRaised {
  readonly asset?: string;
  readonly amount: bigint;
}

/**
 * Campaign state of one proposal
 * Invariant: totalRaised == nativeRaised + tokenRaised.amount
 */
export interface FundingRecord {
  readonly proposalId: AccountId;
  readonly fundable: boolean;
  readonly window: EpochWindow;
  readonly minGoal: bigint;
  readonly targetGoal: bigint;
  readonly beneficiary: AccountId;

  // Raised amounts
  readonly totalRaised: bigint;
  readonly nativeRaised: bigint;
  readonly tokenRaised: TokenRaised;

  // Distinct accounts that ever contributed
  readonly funderCount: number;

  readonly initializedAt: number;
}

export interface Contribution {
  readonly proposalId: AccountId;
  readonly funder: AccountId;
  readonly nativeAmount: bigint;
  readonly tokenAmount: bigint;
  readonly firstContributedAt: number;
  readonly lastContributedAt: number;
  readonly contributionCount: number;
}

/**
 * Cumulative beneficiary withdrawals
 * Invariant: withdrawnAmount <= nativeRaised, tokenWithdrawnAmount <= tokenRaised.amount
 */
export interface WithdrawalRecord {
  readonly proposalId: AccountId;
  readonly withdrawnAmount: bigint;
  readonly tokenWithdrawnAmount: bigint;
  readonly lastWithdrawnAt: number;
  readonly withdrawalCount: number;
}

export interface AvailableBalance {
  native: bigint;
  token: bigint;
  asset?: string;
}

export type FundingAssetKind = "native" | "token";

export type FundingKey = readonly [proposalId: AccountId];
export type ContributionKey = readonly [proposalId: AccountId, funder: AccountId];
