/**
 * Power Ledger Types
 */

import type { AccountId } from "@civitas/shared";

/**
 * Voting power of one account inside one organization
 */
export interface PowerRecord {
  readonly organization: AccountId;
  readonly account: AccountId;

  // Own balances
  readonly tokenPower: bigint;
  readonly currencyPower: bigint;

  // Sum of standing delegations received
  readonly delegatedPower: bigint;

  // Set while this account's own power is delegated away
  readonly delegateTarget?: AccountId;

  readonly lastUpdated: number;
}

/**
 * Standing delegation. `amount` is a snapshot of the delegator's own
 * power at grant time and never follows later balance changes.
 */
export interface Delegation {
  readonly organization: AccountId;
  readonly delegator: AccountId;
  readonly delegate: AccountId;
  readonly amount: bigint;
  readonly createdAt: number;
  readonly expiresAt?: number;
}

export type PowerKey = readonly [organization: AccountId, account: AccountId];
export type DelegationKey = readonly [
  organization: AccountId,
  delegator: AccountId,
  delegate: AccountId,
];

export type PowerComponent = "token" | "currency";
