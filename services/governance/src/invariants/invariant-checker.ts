/**
 * Invariant Checker
 *
 * Verifies the ledger-wide invariants the core promises after any
 * sequence of successful actions:
 * - tally_consistency: yes + no + abstain == totalVoted == Σ vote power
 * - delegation_conservation: Σ delegatedPower == Σ standing delegation amounts
 * - no_double_spend: a delegating account has a standing delegation and effective power 0
 * - funding_conservation: totalRaised == native + token, withdrawn <= raised,
 *   Σ contributions == raised, target >= min > 0
 * - escrow_holdings: escrow balances match what is still owed (async reconcile)
 */

import { governanceLogger as logger, NATIVE_ASSET } from "@civitas/shared";
import type { AccountId } from "@civitas/shared";
import type { AssetTransferProvider } from "../assets/index.js";
import type { FundingEscrow } from "../funding/index.js";
import type { PowerLedger } from "../power/index.js";
import type { ProposalLifecycle } from "../proposals/index.js";
import { InvariantViolationError } from "../errors.js";

const invariantLogger = logger.child({ component: "invariant-checker" });

// ============================================
// TYPES
// ============================================

export type InvariantName =
  | "tally_consistency"
  | "delegation_conservation"
  | "no_double_spend"
  | "funding_conservation"
  | "escrow_holdings";

export interface InvariantViolation {
  invariant: InvariantName;
  subject: string;
  message: string;
}

export interface InvariantCheckResult {
  passed: boolean;
  violations: InvariantViolation[];
  checkType: "post_operation" | "periodic" | "reconciliation";
  operationId?: string;
  timestamp: number;
}

export interface InvariantStatistics {
  totalChecks: number;
  passedChecks: number;
  failedChecks: number;
  successRate: number;
  healthScore: number;
}

// ============================================
// INVARIANT CHECKER
// ============================================

export class InvariantChecker {
  private readonly checkHistory: InvariantCheckResult[] = [];
  private readonly maxHistorySize = 1000;

  private totalChecks = 0;
  private passedChecks = 0;
  private failedChecks = 0;

  constructor(
    private readonly lifecycle: ProposalLifecycle,
    private readonly powerLedger: PowerLedger,
    private readonly escrow: FundingEscrow
  ) {}

  /**
   * Run every synchronous invariant over the whole ledger
   */
  check(
    checkType: InvariantCheckResult["checkType"] = "periodic",
    operationId?: string
  ): InvariantCheckResult {
    const violations = [
      ...this.checkTallies(),
      ...this.checkDelegations(),
      ...this.checkFunding(),
    ];
    return this.record(violations, checkType, operationId);
  }

  /**
   * Check and throw on the first violation
   */
  enforce(
    checkType: InvariantCheckResult["checkType"] = "post_operation",
    operationId?: string
  ): void {
    const result = this.check(checkType, operationId);
    const first = result.violations[0];
    if (first) {
      throw new InvariantViolationError(first.message, first.invariant, first.subject);
    }
  }

  /**
   * Compare what the escrow account actually holds against what the
   * ledger says is still owed to beneficiaries and contributors.
   */
  async reconcileEscrowHoldings(
    assets: AssetTransferProvider,
    escrowAccount: AccountId
  ): Promise<InvariantCheckResult> {
    const owed = new Map<string, bigint>([[NATIVE_ASSET, 0n]]);

    for (const record of this.escrow.listFundingRecords()) {
      const available = this.escrow.getAvailableBalance(record.proposalId);
      owed.set(NATIVE_ASSET, (owed.get(NATIVE_ASSET) ?? 0n) + available.native);
      if (available.asset !== undefined) {
        owed.set(available.asset, (owed.get(available.asset) ?? 0n) + available.token);
      }
    }

    const violations: InvariantViolation[] = [];
    for (const [asset, expected] of owed) {
      const held = await assets.balanceOf(
        escrowAccount,
        asset === NATIVE_ASSET ? undefined : asset
      );
      if (held !== expected) {
        violations.push({
          invariant: "escrow_holdings",
          subject: asset,
          message: `Escrow holds ${held} ${asset}, ledger owes ${expected}`,
        });
      }
    }

    return this.record(violations, "reconciliation");
  }

  getStatistics(): InvariantStatistics {
    const successRate = this.totalChecks > 0 ? this.passedChecks / this.totalChecks : 1;

    // Every failed check is a ledger defect
    const healthScore = Math.max(0, 100 - this.failedChecks * 10);

    return {
      totalChecks: this.totalChecks,
      passedChecks: this.passedChecks,
      failedChecks: this.failedChecks,
      successRate,
      healthScore,
    };
  }

  getHistory(limit = 100): InvariantCheckResult[] {
    return this.checkHistory.slice(-limit);
  }

  getFailedChecks(limit = 50): InvariantCheckResult[] {
    return this.checkHistory.filter((c) => !c.passed).slice(-limit);
  }

  // ============================================
  // INDIVIDUAL INVARIANTS
  // ============================================

  private checkTallies(): InvariantViolation[] {
    const violations: InvariantViolation[] = [];
    const votesByProposal = groupBy(this.lifecycle.listAllVotes(), (v) => v.proposalId);

    for (const proposal of this.lifecycle.listProposals()) {
      const tally = this.lifecycle.getTally(proposal.id);
      const votes = votesByProposal.get(proposal.id) ?? [];
      const votedPower = votes.reduce((sum, v) => sum + v.power, 0n);
      const bucketSum = tally.yes + tally.no + tally.abstain;

      if (bucketSum !== tally.totalVoted || votedPower !== tally.totalVoted || votes.length !== tally.voterCount) {
        violations.push({
          invariant: "tally_consistency",
          subject: proposal.id,
          message: `Tally mismatch on ${proposal.id}: buckets=${bucketSum}, total=${tally.totalVoted}, votes=${votedPower}`,
        });
      }
    }

    return violations;
  }

  private checkDelegations(): InvariantViolation[] {
    const violations: InvariantViolation[] = [];
    const received = new Map<AccountId, bigint>();
    const delegated = new Map<AccountId, bigint>();

    for (const record of this.powerLedger.listPowerRecords()) {
      received.set(record.organization, (received.get(record.organization) ?? 0n) + record.delegatedPower);

      if (record.delegateTarget !== undefined) {
        const delegation = this.powerLedger.getDelegation(record.organization, record.account);
        if (!delegation) {
          violations.push({
            invariant: "no_double_spend",
            subject: `${record.organization}/${record.account}`,
            message: `${record.account} targets ${record.delegateTarget} without a standing delegation`,
          });
        }
        if (this.powerLedger.computeEffectivePower(record.organization, record.account) !== 0n) {
          violations.push({
            invariant: "no_double_spend",
            subject: `${record.organization}/${record.account}`,
            message: `${record.account} delegates yet has effective power`,
          });
        }
      }
    }

    for (const delegation of this.powerLedger.listDelegations()) {
      delegated.set(delegation.organization, (delegated.get(delegation.organization) ?? 0n) + delegation.amount);

      const target = this.powerLedger.getPowerRecord(delegation.organization, delegation.delegator).delegateTarget;
      if (target !== delegation.delegate) {
        violations.push({
          invariant: "no_double_spend",
          subject: `${delegation.organization}/${delegation.delegator}`,
          message: `Delegation ${delegation.delegator}->${delegation.delegate} is orphaned`,
        });
      }
    }

    const organizations = new Set([...received.keys(), ...delegated.keys()]);
    for (const organization of organizations) {
      const receivedSum = received.get(organization) ?? 0n;
      const delegatedSum = delegated.get(organization) ?? 0n;
      if (receivedSum !== delegatedSum) {
        violations.push({
          invariant: "delegation_conservation",
          subject: organization,
          message: `Received ${receivedSum} != delegated ${delegatedSum} in ${organization}`,
        });
      }
    }

    return violations;
  }

  private checkFunding(): InvariantViolation[] {
    const violations: InvariantViolation[] = [];
    const contributionsByProposal = groupBy(this.escrow.listAllContributions(), (c) => c.proposalId);

    for (const record of this.escrow.listFundingRecords()) {
      const id = record.proposalId;
      const withdrawal = this.escrow.getWithdrawalRecord(id);
      const contributions = contributionsByProposal.get(id) ?? [];
      const contributedNative = contributions.reduce((sum, c) => sum + c.nativeAmount, 0n);
      const contributedToken = contributions.reduce((sum, c) => sum + c.tokenAmount, 0n);

      const problems: string[] = [];
      if (!(record.targetGoal >= record.minGoal && record.minGoal > 0n)) {
        problems.push(`goal ordering min=${record.minGoal} target=${record.targetGoal}`);
      }
      if (record.totalRaised !== record.nativeRaised + record.tokenRaised.amount) {
        problems.push(`total ${record.totalRaised} != native ${record.nativeRaised} + token ${record.tokenRaised.amount}`);
      }
      if (withdrawal.withdrawnAmount > record.nativeRaised) {
        problems.push(`withdrawn ${withdrawal.withdrawnAmount} > native raised ${record.nativeRaised}`);
      }
      if (withdrawal.tokenWithdrawnAmount > record.tokenRaised.amount) {
        problems.push(`token withdrawn ${withdrawal.tokenWithdrawnAmount} > token raised ${record.tokenRaised.amount}`);
      }
      if (contributedNative !== record.nativeRaised || contributedToken !== record.tokenRaised.amount) {
        problems.push(`contributions ${contributedNative}/${contributedToken} != raised ${record.nativeRaised}/${record.tokenRaised.amount}`);
      }

      for (const problem of problems) {
        violations.push({
          invariant: "funding_conservation",
          subject: id,
          message: `Funding mismatch on ${id}: ${problem}`,
        });
      }
    }

    return violations;
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private record(
    violations: InvariantViolation[],
    checkType: InvariantCheckResult["checkType"],
    operationId?: string
  ): InvariantCheckResult {
    this.totalChecks++;
    const result: InvariantCheckResult = {
      passed: violations.length === 0,
      violations,
      checkType,
      operationId,
      timestamp: Date.now(),
    };

    if (result.passed) {
      this.passedChecks++;
      invariantLogger.debug({ checkType, operationId }, "Invariant check passed");
    } else {
      this.failedChecks++;
      invariantLogger.error({
        checkType,
        operationId,
        violations: violations.map((v) => `${v.invariant}: ${v.message}`),
      }, "Invariant check FAILED");
    }

    this.checkHistory.push(result);
    if (this.checkHistory.length > this.maxHistorySize) {
      this.checkHistory.splice(0, this.checkHistory.length - this.maxHistorySize);
    }

    return result;
  }
}

function groupBy<T>(items: T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}
