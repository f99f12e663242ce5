/**
 * Proposal Lifecycle
 *
 * DRAFT → ACTIVE → {PASSED, REJECTED} → EXECUTED, with
 * {DRAFT, ACTIVE} → CANCELED as the only escape. Vote weight comes from
 * the power ledger at cast time; finalization is a single deterministic
 * evaluation once the voting window has closed.
 */

import {
  governanceLogger as logger,
  createProposalDraftSchema,
  voteKindSchema,
  VOTING,
  type AccountId,
  type ProposalDraftInput,
  type ProposalTextLimits,
  type VoteKind,
} from "@civitas/shared";
import type { ActionContext } from "../clock.js";
import type { GovernanceEventBus } from "../audit/index.js";
import type { PowerLedger } from "../power/index.js";
import { KeyedStore, type UnitOfWork } from "../store/index.js";
import {
  AlreadyExistsError,
  GoalNotReachedError,
  InvalidInputError,
  InvalidStateError,
  NotFoundError,
  UnauthorizedError,
  fromZodError,
} from "../errors.js";
import {
  SETTLED_OUTCOMES,
  type FundingGate,
  type Proposal,
  type ProposalFilter,
  type ProposalKey,
  type VoteKey,
  type VoteRecord,
  type VoteTally,
} from "./types.js";

const lifecycleLogger = logger.child({ component: "proposal-lifecycle" });

// ============================================
// PROPOSAL LIFECYCLE
// ============================================

export class ProposalLifecycle {
  private readonly proposals: KeyedStore<ProposalKey, Proposal>;
  private readonly votes: KeyedStore<VoteKey, VoteRecord>;
  private readonly tallies: KeyedStore<ProposalKey, VoteTally>;
  private readonly draftSchema: ReturnType<typeof createProposalDraftSchema>;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly events: GovernanceEventBus,
    private readonly powerLedger: PowerLedger,
    limits: ProposalTextLimits,
    private readonly fundingGate?: FundingGate
  ) {
    this.proposals = new KeyedStore("proposals", unitOfWork);
    this.votes = new KeyedStore("votes", unitOfWork);
    this.tallies = new KeyedStore("tallies", unitOfWork);
    this.draftSchema = createProposalDraftSchema(limits);
  }

  // ============================================
  // READS
  // ============================================

  getProposal(proposalId: AccountId): Proposal | undefined {
    return this.proposals.get([proposalId]);
  }

  getTally(proposalId: AccountId): VoteTally {
    return this.tallies.get([proposalId]) ?? ProposalLifecycle.emptyTally(proposalId);
  }

  getVote(proposalId: AccountId, voter: AccountId): VoteRecord | undefined {
    return this.votes.get([proposalId, voter]);
  }

  hasVoted(proposalId: AccountId, voter: AccountId): boolean {
    return this.votes.has([proposalId, voter]);
  }

  listVotes(proposalId: AccountId): VoteRecord[] {
    return this.votes.filter((v) => v.proposalId === proposalId);
  }

  listAllVotes(): VoteRecord[] {
    return this.votes.values();
  }

  listProposals(filter: ProposalFilter = {}): Proposal[] {
    return this.proposals.filter(
      (p) =>
        (filter.organization === undefined || p.organization === filter.organization) &&
        (filter.status === undefined || p.status === filter.status)
    );
  }

  /**
   * floor(yes * 100 / (yes + no)); abstentions never enter the
   * denominator. 0 when nobody voted yes or no.
   */
  static computeApproval(tally: Pick<VoteTally, "yes" | "no">): number {
    const decided = tally.yes + tally.no;
    if (decided === 0n) return 0;
    return Number((tally.yes * VOTING.percentScale) / decided);
  }

  // ============================================
  // TRANSITIONS
  // ============================================

  /**
   * Create a proposal in DRAFT with the caller as proposer
   */
  register(ctx: ActionContext, draft: ProposalDraftInput): Proposal {
    const parsed = this.draftSchema.safeParse(draft);
    if (!parsed.success) {
      throw fromZodError(parsed.error);
    }
    const input = parsed.data;

    return this.unitOfWork.run(() => {
      if (this.proposals.has([input.id])) {
        throw new AlreadyExistsError(`Proposal ${input.id} already exists`, "id");
      }

      const proposal: Proposal = {
        id: input.id,
        organization: input.organization,
        proposer: ctx.caller,
        title: input.title,
        description: input.description,
        status: "DRAFT",
        createdAt: ctx.epoch,
        votingWindow: input.votingWindow,
        payload: input.payload,
        fundingGoal: input.fundingGoal,
        minApprovalPercentage: input.minApprovalPercentage,
      };

      this.proposals.put([proposal.id], proposal);
      this.tallies.put([proposal.id], ProposalLifecycle.emptyTally(proposal.id));

      this.events.publish(ctx, "proposal_registered", {
        proposalId: proposal.id,
        organization: proposal.organization,
      }, {
        title: proposal.title,
        status: proposal.status,
        votingStart: proposal.votingWindow.start,
        votingEnd: proposal.votingWindow.end,
        minApprovalPercentage: proposal.minApprovalPercentage,
        fundingGoal: proposal.fundingGoal,
      });

      lifecycleLogger.info({
        proposalId: proposal.id,
        organization: proposal.organization,
        proposer: proposal.proposer,
      }, "Proposal registered");

      return proposal;
    });
  }

  activate(ctx: ActionContext, proposalId: AccountId): Proposal {
    return this.unitOfWork.run(() => {
      const proposal = this.requireProposal(proposalId);
      this.assertProposerOrOrganization(ctx, proposal);
      this.assertStatus(proposal, "DRAFT", "activate");

      return this.transition(ctx, proposal, { status: "ACTIVE", activatedAt: ctx.epoch }, "proposal_activated");
    });
  }

  /**
   * Cast the caller's vote with their current effective power. One vote
   * per account, never revisable.
   */
  castVote(ctx: ActionContext, proposalId: AccountId, kind: VoteKind): VoteRecord {
    const parsedKind = voteKindSchema.safeParse(kind);
    if (!parsedKind.success) {
      throw new InvalidInputError(`Invalid vote kind: ${String(kind)}`, "kind");
    }
    const voter = ctx.caller;

    return this.unitOfWork.run(() => {
      const proposal = this.requireProposal(proposalId);
      this.assertStatus(proposal, "ACTIVE", "vote on");

      const { start, end } = proposal.votingWindow;
      if (ctx.epoch < start || ctx.epoch >= end) {
        throw new InvalidStateError(
          `Voting window [${start}, ${end}) is not open at ${ctx.epoch}`,
          "votingWindow"
        );
      }
      if (this.votes.has([proposalId, voter])) {
        throw new AlreadyExistsError(`${voter} already voted on ${proposalId}`, "voter");
      }

      this.powerLedger.settleExpired(ctx, proposal.organization, voter);
      const power = this.powerLedger.computeEffectivePower(proposal.organization, voter);
      if (power === 0n) {
        throw new InvalidInputError(`${voter} has no voting power in ${proposal.organization}`, "power");
      }

      const vote: VoteRecord = {
        proposalId,
        voter,
        kind: parsedKind.data,
        power,
        castAt: ctx.epoch,
      };

      const tally = this.getTally(proposalId);
      const updated: VoteTally = {
        ...tally,
        yes: vote.kind === "YES" ? tally.yes + power : tally.yes,
        no: vote.kind === "NO" ? tally.no + power : tally.no,
        abstain: vote.kind === "ABSTAIN" ? tally.abstain + power : tally.abstain,
        totalVoted: tally.totalVoted + power,
        voterCount: tally.voterCount + 1,
      };

      this.votes.put([proposalId, voter], vote);
      this.tallies.put([proposalId], updated);

      this.events.publish(ctx, "vote_cast", { proposalId, voter }, {
        kind: vote.kind,
        power,
        totalVoted: updated.totalVoted,
      });

      lifecycleLogger.info({
        proposalId,
        voter,
        kind: vote.kind,
        power: power.toString(),
      }, "Vote cast");

      return vote;
    });
  }

  /**
   * Close voting and settle the outcome. Only once, only after the window.
   */
  finalize(ctx: ActionContext, proposalId: AccountId): Proposal {
    return this.unitOfWork.run(() => {
      const proposal = this.requireProposal(proposalId);
      this.assertStatus(proposal, "ACTIVE", "finalize");

      if (ctx.epoch < proposal.votingWindow.end) {
        throw new InvalidStateError(
          `Voting closes at ${proposal.votingWindow.end}, current epoch is ${ctx.epoch}`,
          "votingWindow"
        );
      }

      const tally = this.getTally(proposalId);
      const approvalPercentage = ProposalLifecycle.computeApproval(tally);
      const status = approvalPercentage >= proposal.minApprovalPercentage ? "PASSED" : "REJECTED";

      return this.transition(
        ctx,
        proposal,
        { status, finalizedAt: ctx.epoch, approvalPercentage },
        "proposal_finalized"
      );
    });
  }

  /**
   * Mark a passed proposal executed. A fundable proposal must also have
   * met its minimum funding goal.
   */
  execute(ctx: ActionContext, proposalId: AccountId): Proposal {
    return this.unitOfWork.run(() => {
      const proposal = this.requireProposal(proposalId);
      this.assertStatus(proposal, "PASSED", "execute");

      if (this.fundingGate?.isGoalMet(proposalId) === false) {
        throw new GoalNotReachedError(`Funding goal not reached for ${proposalId}`, "minGoal");
      }

      return this.transition(ctx, proposal, { status: "EXECUTED", executedAt: ctx.epoch }, "proposal_executed");
    });
  }

  cancel(ctx: ActionContext, proposalId: AccountId): Proposal {
    return this.unitOfWork.run(() => {
      const proposal = this.requireProposal(proposalId);
      this.assertProposerOrOrganization(ctx, proposal);

      if (SETTLED_OUTCOMES.includes(proposal.status) || proposal.status === "CANCELED") {
        throw new InvalidStateError(`Cannot cancel proposal in ${proposal.status}`, "status");
      }

      return this.transition(ctx, proposal, { status: "CANCELED", canceledAt: ctx.epoch }, "proposal_canceled");
    });
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private transition(
    ctx: ActionContext,
    proposal: Proposal,
    changes: Partial<Pick<Proposal, "status" | "activatedAt" | "finalizedAt" | "executedAt" | "canceledAt" | "approvalPercentage">>,
    kind: "proposal_activated" | "proposal_finalized" | "proposal_executed" | "proposal_canceled"
  ): Proposal {
    const updated: Proposal = { ...proposal, ...changes };
    this.proposals.put([proposal.id], updated);

    this.events.publish(ctx, kind, {
      proposalId: proposal.id,
      organization: proposal.organization,
    }, {
      from: proposal.status,
      status: updated.status,
      approvalPercentage: updated.approvalPercentage,
    });

    lifecycleLogger.info({
      proposalId: proposal.id,
      from: proposal.status,
      to: updated.status,
    }, "Proposal status changed");

    return updated;
  }

  private requireProposal(proposalId: AccountId): Proposal {
    const proposal = this.proposals.get([proposalId]);
    if (!proposal) {
      throw new NotFoundError(`Proposal ${proposalId} not found`, "proposalId");
    }
    return proposal;
  }

  private assertStatus(proposal: Proposal, expected: Proposal["status"], action: string): void {
    if (proposal.status !== expected) {
      throw new InvalidStateError(
        `Cannot ${action} proposal ${proposal.id} in ${proposal.status}; expected ${expected}`,
        "status"
      );
    }
  }

  private assertProposerOrOrganization(ctx: ActionContext, proposal: Proposal): void {
    if (ctx.caller !== proposal.proposer && ctx.caller !== proposal.organization) {
      throw new UnauthorizedError(
        `Only the proposer or ${proposal.organization} may change proposal ${proposal.id}`,
        "caller"
      );
    }
  }

  private static emptyTally(proposalId: AccountId): VoteTally {
    return { proposalId, yes: 0n, no: 0n, abstain: 0n, totalVoted: 0n, voterCount: 0 };
  }
}
