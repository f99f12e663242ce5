/**
 * Funding Escrow
 *
 * Crowdfunds a proposal's execution:
 * - Contributions in native currency and one alternate asset
 * - Minimum and target goals evaluated against the funding window
 * - Beneficiary withdrawal after success, contributor refunds after failure
 *
 * Every external transfer happens before any record is written, so a
 * rejected transfer leaves no accounting behind. Transferring actions are
 * admitted one at a time, so their checks still hold when they record.
 */

import PQueue from "p-queue";
import {
  governanceLogger as logger,
  assetIdSchema,
  fundingTermsSchema,
  NATIVE_ASSET,
  type AccountId,
  type FundingPhase,
  type FundingTerms,
} from "@civitas/shared";
import type { ActionContext } from "../clock.js";
import type { AssetTransferProvider } from "../assets/index.js";
import type { GovernanceEventBus } from "../audit/index.js";
import { KeyedStore, type UnitOfWork } from "../store/index.js";
import {
  AlreadyExistsError,
  GoalReachedError,
  InsufficientFundsError,
  InvalidInputError,
  InvalidStateError,
  NotFoundError,
  TransferFailedError,
  UnauthorizedError,
  fromZodError,
} from "../errors.js";
import type {
  AvailableBalance,
  Contribution,
  ContributionKey,
  FundingAssetKind,
  FundingKey,
  FundingRecord,
  WithdrawalRecord,
} from "./types.js";

const escrowLogger = logger.child({ component: "funding-escrow" });

// ============================================
// FUNDING ESCROW
// ============================================

export class FundingEscrow {
  private readonly funding: KeyedStore<FundingKey, FundingRecord>;
  private readonly contributions: KeyedStore<ContributionKey, Contribution>;
  private readonly withdrawals: KeyedStore<FundingKey, WithdrawalRecord>;
  private readonly transfers = new PQueue({ concurrency: 1 });

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly events: GovernanceEventBus,
    private readonly assets: AssetTransferProvider,
    private readonly escrowAccount: AccountId
  ) {
    this.funding = new KeyedStore("funding", unitOfWork);
    this.contributions = new KeyedStore("contributions", unitOfWork);
    this.withdrawals = new KeyedStore("withdrawals", unitOfWork);
  }

  // ============================================
  // READS
  // ============================================

  getFundingRecord(proposalId: AccountId): FundingRecord | undefined {
    return this.funding.get([proposalId]);
  }

  getContribution(proposalId: AccountId, funder: AccountId): Contribution | undefined {
    return this.contributions.get([proposalId, funder]);
  }

  listContributions(proposalId: AccountId): Contribution[] {
    return this.contributions.filter((c) => c.proposalId === proposalId);
  }

  listAllContributions(): Contribution[] {
    return this.contributions.values();
  }

  listFundingRecords(): FundingRecord[] {
    return this.funding.values();
  }

  getWithdrawalRecord(proposalId: AccountId): WithdrawalRecord {
    return (
      this.withdrawals.get([proposalId]) ?? {
        proposalId,
        withdrawnAmount: 0n,
        tokenWithdrawnAmount: 0n,
        lastWithdrawnAt: 0,
        withdrawalCount: 0,
      }
    );
  }

  getPhase(proposalId: AccountId, epoch: number): FundingPhase {
    return FundingEscrow.phaseOf(this.requireRecord(proposalId), epoch);
  }

  /**
   * Funds still held for the beneficiary, per asset
   */
  getAvailableBalance(proposalId: AccountId): AvailableBalance {
    const record = this.requireRecord(proposalId);
    const withdrawal = this.getWithdrawalRecord(proposalId);
    return {
      native: record.nativeRaised - withdrawal.withdrawnAmount,
      token: record.tokenRaised.amount - withdrawal.tokenWithdrawnAmount,
      asset: record.tokenRaised.asset,
    };
  }

  /**
   * Whether the minimum goal is met. Undefined when the proposal has no
   * fundable campaign.
   */
  isGoalMet(proposalId: AccountId): boolean | undefined {
    const record = this.funding.get([proposalId]);
    if (!record || !record.fundable) return undefined;
    return record.totalRaised >= record.minGoal;
  }

  /**
   * Percentage of the target raised, rounded down
   */
  getProgress(proposalId: AccountId): number {
    const record = this.requireRecord(proposalId);
    return Number((record.totalRaised * 100n) / record.targetGoal);
  }

  static phaseOf(record: FundingRecord, epoch: number): FundingPhase {
    if (!record.fundable) return "CLOSED";
    if (epoch < record.window.start) return "NOT_STARTED";
    if (epoch < record.window.end) return "OPEN";
    return record.totalRaised >= record.minGoal ? "SUCCEEDED" : "FAILED";
  }

  // ============================================
  // INITIALIZATION
  // ============================================

  /**
   * One-time campaign setup for a proposal
   */
  initialize(ctx: ActionContext, proposalId: AccountId, terms: FundingTerms): FundingRecord {
    const parsed = fundingTermsSchema.safeParse(terms);
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    const { fundable, window, minGoal, targetGoal, beneficiary } = parsed.data;

    return this.unitOfWork.run(() => {
      if (this.funding.has([proposalId])) {
        throw new AlreadyExistsError(`Funding already initialized for ${proposalId}`, "proposalId");
      }

      const record: FundingRecord = {
        proposalId,
        fundable,
        window,
        minGoal,
        targetGoal,
        beneficiary,
        totalRaised: 0n,
        nativeRaised: 0n,
        tokenRaised: { amount: 0n },
        funderCount: 0,
        initializedAt: ctx.epoch,
      };

      this.funding.put([proposalId], record);

      this.events.publish(ctx, "funding_initialized", { proposalId }, {
        fundable,
        windowStart: window.start,
        windowEnd: window.end,
        minGoal,
        targetGoal,
        beneficiary,
      });

      escrowLogger.info({
        proposalId,
        fundable,
        minGoal: minGoal.toString(),
        targetGoal: targetGoal.toString(),
      }, "Funding initialized");

      return record;
    });
  }

  // ============================================
  // CONTRIBUTIONS
  // ============================================

  /**
   * Contribute `amount` from the caller. `asset` absent (or the native
   * asset key) means native currency.
   */
  async contribute(
    ctx: ActionContext,
    proposalId: AccountId,
    amount: bigint,
    asset?: string
  ): Promise<Contribution> {
    return this.transfers.add(() => this.recordContribution(ctx, proposalId, amount, asset), {
      throwOnTimeout: true,
    });
  }

  // ============================================
  // WITHDRAWAL
  // ============================================

  /**
   * Beneficiary withdrawal of native currency after a successful campaign
   */
  async withdraw(ctx: ActionContext, proposalId: AccountId, amount: bigint): Promise<WithdrawalRecord> {
    return this.transfers.add(() => this.withdrawAsset(ctx, proposalId, amount, "native"), {
      throwOnTimeout: true,
    });
  }

  /**
   * Beneficiary withdrawal of the alternate asset after a successful campaign
   */
  async withdrawToken(ctx: ActionContext, proposalId: AccountId, amount: bigint): Promise<WithdrawalRecord> {
    return this.transfers.add(() => this.withdrawAsset(ctx, proposalId, amount, "token"), {
      throwOnTimeout: true,
    });
  }

  // ============================================
  // REFUND
  // ============================================

  /**
   * Return the caller's native-currency contribution after a failed campaign
   */
  async refund(ctx: ActionContext, proposalId: AccountId): Promise<bigint> {
    return this.transfers.add(() => this.refundAsset(ctx, proposalId, "native"), {
      throwOnTimeout: true,
    });
  }

  /**
   * Return the caller's alternate-asset contribution after a failed campaign
   */
  async refundToken(ctx: ActionContext, proposalId: AccountId): Promise<bigint> {
    return this.transfers.add(() => this.refundAsset(ctx, proposalId, "token"), {
      throwOnTimeout: true,
    });
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private async recordContribution(
    ctx: ActionContext,
    proposalId: AccountId,
    amount: bigint,
    asset: string | undefined
  ): Promise<Contribution> {
    const funder = ctx.caller;
    const record = this.requireRecord(proposalId);

    if (!record.fundable) {
      throw new InvalidStateError(`Proposal ${proposalId} is not fundable`, "fundable");
    }
    if (ctx.epoch < record.window.start || ctx.epoch >= record.window.end) {
      throw new InvalidStateError(
        `Funding window [${record.window.start}, ${record.window.end}) is not open at ${ctx.epoch}`,
        "window"
      );
    }
    if (amount <= 0n) {
      throw new InvalidInputError("Contribution must be positive", "amount");
    }
    const tokenAsset = this.parseTokenAsset(asset);
    if (record.totalRaised >= record.targetGoal) {
      throw new GoalReachedError(`Target goal already reached for ${proposalId}`, "targetGoal");
    }
    if (
      tokenAsset !== undefined &&
      record.tokenRaised.asset !== undefined &&
      record.tokenRaised.asset !== tokenAsset
    ) {
      throw new InvalidInputError(
        `Proposal ${proposalId} only accepts ${record.tokenRaised.asset}`,
        "asset"
      );
    }

    await this.transferOrFail(amount, funder, this.escrowAccount, tokenAsset);

    return this.unitOfWork.run(() => {
      const current = this.requireRecord(proposalId);
      const existing = this.contributions.get([proposalId, funder]);

      const contribution: Contribution = existing
        ? {
            ...existing,
            nativeAmount: existing.nativeAmount + (tokenAsset === undefined ? amount : 0n),
            tokenAmount: existing.tokenAmount + (tokenAsset === undefined ? 0n : amount),
            lastContributedAt: ctx.epoch,
            contributionCount: existing.contributionCount + 1,
          }
        : {
            proposalId,
            funder,
            nativeAmount: tokenAsset === undefined ? amount : 0n,
            tokenAmount: tokenAsset === undefined ? 0n : amount,
            firstContributedAt: ctx.epoch,
            lastContributedAt: ctx.epoch,
            contributionCount: 1,
          };

      const updated: FundingRecord = {
        ...current,
        totalRaised: current.totalRaised + amount,
        nativeRaised: current.nativeRaised + (tokenAsset === undefined ? amount : 0n),
        tokenRaised:
          tokenAsset === undefined
            ? current.tokenRaised
            : { asset: tokenAsset, amount: current.tokenRaised.amount + amount },
        funderCount: existing ? current.funderCount : current.funderCount + 1,
      };

      this.funding.put([proposalId], updated);
      this.contributions.put([proposalId, funder], contribution);

      this.events.publish(ctx, "contribution_received", { proposalId, funder }, {
        amount,
        asset: tokenAsset ?? NATIVE_ASSET,
        totalRaised: updated.totalRaised,
        funderCount: updated.funderCount,
      });

      escrowLogger.info({
        proposalId,
        funder,
        amount: amount.toString(),
        asset: tokenAsset ?? NATIVE_ASSET,
        totalRaised: updated.totalRaised.toString(),
      }, "Contribution received");

      return contribution;
    });
  }

  private async withdrawAsset(
    ctx: ActionContext,
    proposalId: AccountId,
    amount: bigint,
    kind: FundingAssetKind
  ): Promise<WithdrawalRecord> {
    const record = this.requireRecord(proposalId);

    if (ctx.caller !== record.beneficiary) {
      throw new UnauthorizedError(`Only the beneficiary may withdraw from ${proposalId}`, "caller");
    }
    const phase = FundingEscrow.phaseOf(record, ctx.epoch);
    if (phase !== "SUCCEEDED") {
      throw new InvalidStateError(`Cannot withdraw while funding is ${phase}`, "phase");
    }
    if (amount <= 0n) {
      throw new InvalidInputError("Withdrawal must be positive", "amount");
    }

    const available = this.getAvailableBalance(proposalId);
    const availableAmount = kind === "native" ? available.native : available.token;
    if (amount > availableAmount) {
      throw new InsufficientFundsError(
        `Requested ${amount} exceeds available ${availableAmount}`,
        amount,
        availableAmount
      );
    }

    const asset = kind === "native" ? undefined : record.tokenRaised.asset;
    await this.transferOrFail(amount, this.escrowAccount, record.beneficiary, asset);

    return this.unitOfWork.run(() => {
      const current = this.getWithdrawalRecord(proposalId);
      const updated: WithdrawalRecord = {
        ...current,
        withdrawnAmount: current.withdrawnAmount + (kind === "native" ? amount : 0n),
        tokenWithdrawnAmount: current.tokenWithdrawnAmount + (kind === "token" ? amount : 0n),
        lastWithdrawnAt: ctx.epoch,
        withdrawalCount: current.withdrawalCount + 1,
      };

      this.withdrawals.put([proposalId], updated);

      this.events.publish(ctx, "funds_withdrawn", { proposalId, beneficiary: record.beneficiary }, {
        amount,
        asset: asset ?? NATIVE_ASSET,
        withdrawnAmount: updated.withdrawnAmount,
        tokenWithdrawnAmount: updated.tokenWithdrawnAmount,
      });

      escrowLogger.info({
        proposalId,
        amount: amount.toString(),
        asset: asset ?? NATIVE_ASSET,
      }, "Funds withdrawn");

      return updated;
    });
  }

  private async refundAsset(
    ctx: ActionContext,
    proposalId: AccountId,
    kind: FundingAssetKind
  ): Promise<bigint> {
    const funder = ctx.caller;
    const record = this.requireRecord(proposalId);
    const contribution = this.contributions.get([proposalId, funder]);

    if (!contribution) {
      throw new NotFoundError(`${funder} has no contribution to ${proposalId}`, "contribution");
    }
    if (ctx.epoch < record.window.end) {
      throw new InvalidStateError("Funding window is still open", "window");
    }
    if (record.totalRaised >= record.minGoal) {
      throw new GoalReachedError(`Minimum goal reached for ${proposalId}; no refunds`, "minGoal");
    }

    const amount = kind === "native" ? contribution.nativeAmount : contribution.tokenAmount;
    if (amount === 0n) {
      throw new InsufficientFundsError(`Nothing left to refund in ${kind}`, amount, 0n);
    }

    const asset = kind === "native" ? undefined : record.tokenRaised.asset;
    await this.transferOrFail(amount, this.escrowAccount, funder, asset);

    this.unitOfWork.run(() => {
      const current = this.requireRecord(proposalId);
      const currentContribution = this.contributions.get([proposalId, funder]) ?? contribution;

      this.funding.put([proposalId], {
        ...current,
        totalRaised: current.totalRaised - amount,
        nativeRaised: kind === "native" ? current.nativeRaised - amount : current.nativeRaised,
        tokenRaised:
          kind === "token"
            ? { ...current.tokenRaised, amount: current.tokenRaised.amount - amount }
            : current.tokenRaised,
      });

      const remaining: Contribution = {
        ...currentContribution,
        nativeAmount: kind === "native" ? 0n : currentContribution.nativeAmount,
        tokenAmount: kind === "token" ? 0n : currentContribution.tokenAmount,
      };
      if (remaining.nativeAmount === 0n && remaining.tokenAmount === 0n) {
        this.contributions.delete([proposalId, funder]);
      } else {
        this.contributions.put([proposalId, funder], remaining);
      }

      this.events.publish(ctx, "contribution_refunded", { proposalId, funder }, {
        amount,
        asset: asset ?? NATIVE_ASSET,
      });

      escrowLogger.info({
        proposalId,
        funder,
        amount: amount.toString(),
        asset: asset ?? NATIVE_ASSET,
      }, "Contribution refunded");
    });

    return amount;
  }

  /**
   * Undefined for native currency; otherwise a validated asset id
   */
  private parseTokenAsset(asset: string | undefined): string | undefined {
    if (asset === undefined || asset === NATIVE_ASSET) return undefined;

    const parsed = assetIdSchema.safeParse(asset);
    if (!parsed.success) {
      throw new InvalidInputError(
        `Invalid asset id "${asset}": ${parsed.error.issues[0]?.message ?? "malformed"}`,
        "asset"
      );
    }
    return parsed.data;
  }

  private async transferOrFail(
    amount: bigint,
    from: AccountId,
    to: AccountId,
    asset?: string
  ): Promise<void> {
    let accepted: boolean;
    try {
      accepted = await this.assets.transfer(amount, from, to, asset);
    } catch (error) {
      throw new TransferFailedError(
        `Transfer of ${amount} ${asset ?? NATIVE_ASSET} from ${from} to ${to} failed`,
        { cause: error }
      );
    }

    if (!accepted) {
      throw new TransferFailedError(
        `Transfer of ${amount} ${asset ?? NATIVE_ASSET} from ${from} to ${to} was rejected`
      );
    }
  }

  private requireRecord(proposalId: AccountId): FundingRecord {
    const record = this.funding.get([proposalId]);
    if (!record) {
      throw new NotFoundError(`No funding record for ${proposalId}`, "proposalId");
    }
    return record;
  }
}
