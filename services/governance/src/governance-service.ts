/**
 * Governance Service
 *
 * Wires the core together and admits actions one at a time:
 * - Power ledger, funding escrow, proposal lifecycle, DAO registry
 * - One unit of work shared by every store
 * - A single-slot action queue giving a total order over actions,
 *   including those that await an external transfer
 * - Post-action invariant enforcement
 */

import PQueue from "p-queue";
import {
  createTimer,
  governanceLogger as logger,
  logError,
  logGovernanceAction,
  type AccountId,
  type DaoRegistrationInput,
  type FundingTerms,
  type ProposalDraftInput,
  type VoteKind,
} from "@civitas/shared";
import { createActionContext, type ActionContext, type LogicalClock } from "./clock.js";
import { createGovernanceConfig, type GovernanceConfig } from "./config.js";
import type { AssetTransferProvider } from "./assets/index.js";
import { GovernanceEventBus } from "./audit/index.js";
import { FundingEscrow, type Contribution, type FundingRecord, type WithdrawalRecord } from "./funding/index.js";
import { InvariantChecker, type InvariantCheckResult } from "./invariants/index.js";
import { PowerLedger, type Delegation, type PowerRecord } from "./power/index.js";
import { ProposalLifecycle, type Proposal, type VoteRecord } from "./proposals/index.js";
import { DaoRegistry, type DaoRecord, type ProposalView } from "./registry/index.js";
import { UnitOfWork } from "./store/index.js";
import { NotFoundError, UnauthorizedError, isGovernanceError } from "./errors.js";

const serviceLogger = logger.child({ component: "governance-service" });

export interface GovernanceServiceOptions {
  clock: LogicalClock;
  assets: AssetTransferProvider;
  config?: Partial<GovernanceConfig>;
}

// ============================================
// GOVERNANCE SERVICE
// ============================================

export class GovernanceService {
  readonly config: GovernanceConfig;
  readonly events: GovernanceEventBus;
  readonly powerLedger: PowerLedger;
  readonly escrow: FundingEscrow;
  readonly lifecycle: ProposalLifecycle;
  readonly registry: DaoRegistry;
  readonly invariants: InvariantChecker;

  private readonly clock: LogicalClock;
  private readonly assets: AssetTransferProvider;
  private readonly unitOfWork = new UnitOfWork();
  private readonly queue = new PQueue({ concurrency: 1 });

  constructor(options: GovernanceServiceOptions) {
    this.config = createGovernanceConfig(options.config);
    this.clock = options.clock;
    this.assets = options.assets;

    this.events = new GovernanceEventBus(this.unitOfWork, this.config.auditHistorySize);
    this.powerLedger = new PowerLedger(this.unitOfWork, this.events, this.assets);
    this.escrow = new FundingEscrow(this.unitOfWork, this.events, this.assets, this.config.escrowAccount);
    this.lifecycle = new ProposalLifecycle(
      this.unitOfWork,
      this.events,
      this.powerLedger,
      {
        maxTitleLength: this.config.maxTitleLength,
        maxDescriptionLength: this.config.maxDescriptionLength,
      },
      this.escrow
    );
    this.registry = new DaoRegistry(this.unitOfWork, this.events, this.lifecycle, this.escrow);
    this.invariants = new InvariantChecker(this.lifecycle, this.powerLedger, this.escrow);

    serviceLogger.info({
      escrowAccount: this.config.escrowAccount,
      enforceInvariants: this.config.enforceInvariants,
    }, "GovernanceService initialized");
  }

  // ============================================
  // REGISTRY
  // ============================================

  createDao(caller: AccountId, input: DaoRegistrationInput): Promise<DaoRecord> {
    return this.submit("createDao", caller, (ctx) => this.registry.createDao(ctx, input));
  }

  deactivateDao(caller: AccountId, daoId: AccountId): Promise<DaoRecord> {
    return this.submit("deactivateDao", caller, (ctx) => this.registry.deactivateDao(ctx, daoId));
  }

  registerProposal(caller: AccountId, draft: ProposalDraftInput): Promise<Proposal> {
    return this.submit("registerProposal", caller, (ctx) => this.registry.registerProposal(ctx, draft));
  }

  executeProposal(caller: AccountId, proposalId: AccountId): Promise<Proposal> {
    return this.submit("executeProposal", caller, (ctx) => this.registry.executeProposal(ctx, proposalId));
  }

  // ============================================
  // PROPOSAL LIFECYCLE
  // ============================================

  activateProposal(caller: AccountId, proposalId: AccountId): Promise<Proposal> {
    return this.submit("activateProposal", caller, (ctx) => this.lifecycle.activate(ctx, proposalId));
  }

  castVote(caller: AccountId, proposalId: AccountId, kind: VoteKind): Promise<VoteRecord> {
    return this.submit("castVote", caller, (ctx) => this.lifecycle.castVote(ctx, proposalId, kind));
  }

  finalizeProposal(caller: AccountId, proposalId: AccountId): Promise<Proposal> {
    return this.submit("finalizeProposal", caller, (ctx) => this.lifecycle.finalize(ctx, proposalId));
  }

  cancelProposal(caller: AccountId, proposalId: AccountId): Promise<Proposal> {
    return this.submit("cancelProposal", caller, (ctx) => this.lifecycle.cancel(ctx, proposalId));
  }

  // ============================================
  // POWER LEDGER
  // ============================================

  updateTokenPower(caller: AccountId, organization: AccountId, account: AccountId, amount: bigint): Promise<PowerRecord> {
    return this.submit("updateTokenPower", caller, (ctx) =>
      this.powerLedger.updateTokenPower(ctx, organization, account, amount)
    );
  }

  updateCurrencyPower(caller: AccountId, organization: AccountId, account: AccountId, amount: bigint): Promise<PowerRecord> {
    return this.submit("updateCurrencyPower", caller, (ctx) =>
      this.powerLedger.updateCurrencyPower(ctx, organization, account, amount)
    );
  }

  refreshCurrencyPower(caller: AccountId, organization: AccountId, account: AccountId): Promise<PowerRecord> {
    return this.submit("refreshCurrencyPower", caller, (ctx) =>
      this.powerLedger.refreshCurrencyPower(ctx, organization, account)
    );
  }

  delegate(caller: AccountId, organization: AccountId, delegate: AccountId, expiresAt?: number): Promise<Delegation> {
    return this.submit("delegate", caller, (ctx) =>
      this.powerLedger.delegate(ctx, organization, delegate, expiresAt)
    );
  }

  revokeDelegation(caller: AccountId, organization: AccountId): Promise<bigint> {
    return this.submit("revokeDelegation", caller, (ctx) => this.powerLedger.revoke(ctx, organization));
  }

  checkDelegationExpiry(
    caller: AccountId,
    organization: AccountId,
    delegator: AccountId,
    delegate: AccountId
  ): Promise<bigint> {
    return this.submit("checkDelegationExpiry", caller, (ctx) =>
      this.powerLedger.checkExpiry(ctx, organization, delegator, delegate)
    );
  }

  // ============================================
  // FUNDING ESCROW
  // ============================================

  /**
   * Open a campaign for a proposal. Only its proposer or organization may.
   */
  initializeFunding(caller: AccountId, proposalId: AccountId, terms: FundingTerms): Promise<FundingRecord> {
    return this.submit("initializeFunding", caller, (ctx) => {
      const proposal = this.lifecycle.getProposal(proposalId);
      if (!proposal) {
        throw new NotFoundError(`Proposal ${proposalId} not found`, "proposalId");
      }
      if (ctx.caller !== proposal.proposer && ctx.caller !== proposal.organization) {
        throw new UnauthorizedError(
          `Only the proposer or ${proposal.organization} may open funding for ${proposalId}`,
          "caller"
        );
      }
      return this.escrow.initialize(ctx, proposalId, terms);
    });
  }

  contribute(caller: AccountId, proposalId: AccountId, amount: bigint, asset?: string): Promise<Contribution> {
    return this.submit("contribute", caller, (ctx) => this.escrow.contribute(ctx, proposalId, amount, asset));
  }

  withdraw(caller: AccountId, proposalId: AccountId, amount: bigint): Promise<WithdrawalRecord> {
    return this.submit("withdraw", caller, (ctx) => this.escrow.withdraw(ctx, proposalId, amount));
  }

  withdrawToken(caller: AccountId, proposalId: AccountId, amount: bigint): Promise<WithdrawalRecord> {
    return this.submit("withdrawToken", caller, (ctx) => this.escrow.withdrawToken(ctx, proposalId, amount));
  }

  refund(caller: AccountId, proposalId: AccountId): Promise<bigint> {
    return this.submit("refund", caller, (ctx) => this.escrow.refund(ctx, proposalId));
  }

  refundToken(caller: AccountId, proposalId: AccountId): Promise<bigint> {
    return this.submit("refundToken", caller, (ctx) => this.escrow.refundToken(ctx, proposalId));
  }

  // ============================================
  // READS
  // ============================================

  getProposalView(proposalId: AccountId): ProposalView | undefined {
    return this.registry.getProposalView(proposalId, this.clock.now());
  }

  getEffectivePower(organization: AccountId, account: AccountId): bigint {
    return this.powerLedger.computeEffectivePower(organization, account);
  }

  checkInvariants(): InvariantCheckResult {
    return this.invariants.check("periodic");
  }

  /**
   * Compare escrow account balances against the ledger
   */
  reconcileEscrow(): Promise<InvariantCheckResult> {
    return this.queue.add(
      () => this.invariants.reconcileEscrowHoldings(this.assets, this.config.escrowAccount),
      { throwOnTimeout: true }
    );
  }

  /**
   * Resolves once every admitted action has finished
   */
  async idle(): Promise<void> {
    await this.queue.onIdle();
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private submit<T>(
    action: string,
    caller: AccountId,
    operation: (ctx: ActionContext) => T | Promise<T>
  ): Promise<T> {
    return this.queue.add(async () => {
      const ctx = createActionContext(this.clock, caller);
      const done = createTimer(`governance.${action}`);

      try {
        const result = await operation(ctx);
        if (this.config.enforceInvariants) {
          this.invariants.enforce("post_operation", action);
        }
        logGovernanceAction("info", action, { actor: caller, epoch: ctx.epoch });
        return result;
      } catch (error) {
        if (isGovernanceError(error)) {
          logGovernanceAction(
            "debug",
            action,
            { actor: caller, epoch: ctx.epoch, errorKind: error.kind },
            error.message
          );
        } else if (error instanceof Error) {
          logError(error, { action, caller, epoch: ctx.epoch });
        }
        throw error;
      } finally {
        done();
      }
    }, { throwOnTimeout: true });
  }
}

export function createGovernanceService(options: GovernanceServiceOptions): GovernanceService {
  return new GovernanceService(options);
}
