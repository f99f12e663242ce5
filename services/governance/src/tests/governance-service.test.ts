/**
 * Governance Service Tests
 *
 * End-to-end flows through the facade:
 * - Proposal with crowdfunding from draft to payout
 * - Failed funding blocks execution and opens refunds
 * - Actions are admitted one at a time, even across transfers
 * - Rejected actions leave no state and no events behind
 *
 * Acceptance criteria:
 * - Ledger invariants hold after every action
 * - Escrow holdings match what the ledger still owes
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { ProposalDraftInput } from "@civitas/shared";
import {
  createGovernanceService,
  GovernanceService,
  ManualClock,
  MockAssetProvider,
  GoalNotReachedError,
  GoalReachedError,
  InvalidStateError,
  NotFoundError,
  UnauthorizedError,
} from "../index.js";

const ORG = "org-alpha";
const PROPOSAL = "p-1";

const DRAFT: ProposalDraftInput = {
  id: PROPOSAL,
  organization: ORG,
  title: "Build a bike shelter",
  description: "Covered parking for forty bikes",
  votingWindow: { start: 10, end: 20 },
  minApprovalPercentage: 50,
};

describe("GovernanceService", () => {
  let clock: ManualClock;
  let assets: MockAssetProvider;
  let service: GovernanceService;

  beforeEach(async () => {
    clock = new ManualClock(0);
    assets = new MockAssetProvider();
    service = createGovernanceService({ clock, assets });

    assets.setBalance("backer", 500n);
    assets.setBalance("other-backer", 500n);

    await service.createDao("founder", { id: ORG, name: "Alpha" });
    await service.updateTokenPower(ORG, ORG, "v1", 60n);
    await service.updateTokenPower(ORG, ORG, "v2", 40n);
    await service.registerProposal("founder", DRAFT);
    await service.initializeFunding("founder", PROPOSAL, {
      fundable: true,
      window: { start: 5, end: 15 },
      minGoal: 100n,
      targetGoal: 200n,
      beneficiary: "builder",
    });
    await service.activateProposal("founder", PROPOSAL);
  });

  async function passVote(): Promise<void> {
    clock.set(10);
    await service.castVote("v1", PROPOSAL, "YES");
    await service.castVote("v2", PROPOSAL, "NO");
    clock.set(20);
    await service.finalizeProposal("anyone", PROPOSAL);
  }

  // ============================================
  // HAPPY PATH
  // ============================================

  describe("funded proposal", () => {
    it("should run from draft to payout", async () => {
      clock.set(5);
      await service.contribute("backer", PROPOSAL, 120n);
      await passVote();

      expect(service.getProposalView(PROPOSAL)).toMatchObject({
        proposal: { status: "PASSED", approvalPercentage: 60 },
        approvalPercentage: 60,
        funding: { phase: "SUCCEEDED", progressPercentage: 60, totalRaised: 120n, funderCount: 1 },
      });

      const executed = await service.executeProposal("founder", PROPOSAL);
      expect(executed.status).toBe("EXECUTED");

      await service.withdraw("builder", PROPOSAL, 120n);
      expect(await assets.balanceOf("builder")).toBe(120n);

      expect(service.events.getHistory().map((e) => e.kind)).toEqual([
        "dao_created",
        "power_updated",
        "power_updated",
        "proposal_registered",
        "funding_initialized",
        "proposal_activated",
        "contribution_received",
        "vote_cast",
        "vote_cast",
        "proposal_finalized",
        "proposal_executed",
        "funds_withdrawn",
      ]);
      expect(service.checkInvariants().passed).toBe(true);
      expect((await service.reconcileEscrow()).passed).toBe(true);
    });

    it("should stamp every action with the clock at admission", async () => {
      clock.set(7);
      await service.contribute("backer", PROPOSAL, 10n);

      const [event] = service.events.getByKind("contribution_received");
      expect(event).toMatchObject({ actor: "backer", epoch: 7 });
      expect(service.escrow.getContribution(PROPOSAL, "backer")?.firstContributedAt).toBe(7);
    });
  });

  // ============================================
  // FAILED FUNDING
  // ============================================

  describe("failed funding", () => {
    beforeEach(async () => {
      clock.set(5);
      await service.contribute("backer", PROPOSAL, 80n);
      await passVote();
    });

    it("should block execution until the minimum goal is met", async () => {
      await expect(service.executeProposal("founder", PROPOSAL)).rejects.toThrow(
        GoalNotReachedError
      );
      expect(service.lifecycle.getProposal(PROPOSAL)?.status).toBe("PASSED");
    });

    it("should refuse the beneficiary and refund contributors", async () => {
      await expect(service.withdraw("builder", PROPOSAL, 80n)).rejects.toThrow(InvalidStateError);

      expect(await service.refund("backer", PROPOSAL)).toBe(80n);
      expect(await assets.balanceOf("backer")).toBe(500n);
      expect((await service.reconcileEscrow()).passed).toBe(true);
    });
  });

  // ============================================
  // AUTHORIZATION
  // ============================================

  describe("initializeFunding", () => {
    it("should only let the proposer or organization open a campaign", async () => {
      await service.registerProposal(ORG, { ...DRAFT, id: "p-2" });

      await expect(
        service.initializeFunding("mallory", "p-2", {
          fundable: true,
          window: { start: 5, end: 15 },
          minGoal: 1n,
          targetGoal: 1n,
          beneficiary: "mallory",
        })
      ).rejects.toThrow(UnauthorizedError);
      expect(service.escrow.getFundingRecord("p-2")).toBeUndefined();
    });

    it("should require an existing proposal", async () => {
      await expect(
        service.initializeFunding("founder", "p-404", {
          fundable: true,
          window: { start: 5, end: 15 },
          minGoal: 1n,
          targetGoal: 1n,
          beneficiary: "builder",
        })
      ).rejects.toThrow(NotFoundError);
    });
  });

  // ============================================
  // ORDERING + ATOMICITY
  // ============================================

  describe("action ordering", () => {
    it("should admit concurrent contributions one at a time", async () => {
      clock.set(5);
      const [first, second] = await Promise.allSettled([
        service.contribute("backer", PROPOSAL, 200n),
        service.contribute("other-backer", PROPOSAL, 50n),
      ]);

      expect(first?.status).toBe("fulfilled");
      expect(second?.status).toBe("rejected");
      if (second?.status === "rejected") {
        expect(second.reason).toBeInstanceOf(GoalReachedError);
      }
      expect(service.escrow.getFundingRecord(PROPOSAL)).toMatchObject({
        totalRaised: 200n,
        funderCount: 1,
      });
      expect(await assets.balanceOf("other-backer")).toBe(500n);
    });

    it("should leave no events behind a rejected action", async () => {
      const before = service.events.getLastSequence();

      clock.set(10);
      await expect(service.castVote("nobody", PROPOSAL, "YES")).rejects.toThrow(
        "nobody has no voting power in org-alpha"
      );

      expect(service.events.getLastSequence()).toBe(before);
      expect(service.lifecycle.getTally(PROPOSAL).voterCount).toBe(0);
    });

    it("should keep admitting actions after a failure", async () => {
      await expect(service.revokeDelegation("v1", ORG)).rejects.toThrow(NotFoundError);
      await service.delegate("v1", ORG, "v2");
      await service.idle();

      expect(service.getEffectivePower(ORG, "v2")).toBe(100n);
    });
  });

  // ============================================
  // POWER
  // ============================================

  describe("power", () => {
    it("should expire a delegation lazily", async () => {
      clock.set(3);
      await service.delegate("v1", ORG, "v2", 12);
      expect(service.getEffectivePower(ORG, "v2")).toBe(100n);

      clock.set(12);
      expect(await service.checkDelegationExpiry("anyone", ORG, "v1", "v2")).toBe(0n);

      clock.set(13);
      expect(await service.checkDelegationExpiry("anyone", ORG, "v1", "v2")).toBe(60n);
      expect(service.getEffectivePower(ORG, "v2")).toBe(40n);
      expect(service.getEffectivePower(ORG, "v1")).toBe(60n);
    });

    it("should refresh currency power from asset balances", async () => {
      assets.setBalance("v1", 15n);
      await service.refreshCurrencyPower(ORG, ORG, "v1");
      expect(service.getEffectivePower(ORG, "v1")).toBe(75n);
    });

    it("should let members delegate and vote with the pooled power", async () => {
      await service.delegate("v2", ORG, "v1");
      clock.set(10);

      const vote = await service.castVote("v1", PROPOSAL, "YES");
      expect(vote.power).toBe(100n);
      await expect(service.castVote("v2", PROPOSAL, "NO")).rejects.toThrow(
        "v2 has no voting power in org-alpha"
      );
    });
  });

  // ============================================
  // INVARIANTS + CONFIG
  // ============================================

  describe("invariants", () => {
    it("should check after every successful action", () => {
      const stats = service.invariants.getStatistics();
      expect(stats.totalChecks).toBe(6);
      expect(stats.failedChecks).toBe(0);
      expect(stats.healthScore).toBe(100);
    });

    it("should detect escrow holdings the ledger does not know about", async () => {
      assets.setBalance("civitas-escrow", 5n);

      const result = await service.reconcileEscrow();

      expect(result.passed).toBe(false);
      expect(result.violations).toEqual([
        {
          invariant: "escrow_holdings",
          subject: "native",
          message: "Escrow holds 5 native, ledger owes 0",
        },
      ]);
      expect(service.invariants.getStatistics().healthScore).toBe(90);
    });

    it("should reconcile escrow holdings after refunds across campaigns", async () => {
      await service.registerProposal("founder", { ...DRAFT, id: "p-2" });
      await service.initializeFunding("founder", "p-2", {
        fundable: true,
        window: { start: 5, end: 15 },
        minGoal: 100n,
        targetGoal: 200n,
        beneficiary: "builder",
      });
      await service.activateProposal("founder", "p-2");

      clock.set(5);
      await service.contribute("backer", PROPOSAL, 60n);
      await service.contribute("other-backer", "p-2", 80n);
      await expect(service.contribute("other-backer", PROPOSAL, 50n, "")).rejects.toMatchObject({
        kind: "InvalidInput",
        field: "asset",
      });

      clock.set(10);
      await service.castVote("v1", PROPOSAL, "YES");
      await service.castVote("v2", "p-2", "NO");

      clock.set(15);
      expect(await service.refund("other-backer", "p-2")).toBe(80n);
      expect((await service.reconcileEscrow()).passed).toBe(true);

      expect(await service.refund("backer", PROPOSAL)).toBe(60n);
      expect(await assets.balanceOf("civitas-escrow")).toBe(0n);
      expect(await assets.balanceOf("other-backer")).toBe(500n);
      expect(service.checkInvariants().passed).toBe(true);
      expect((await service.reconcileEscrow()).passed).toBe(true);
    });

    it("should skip enforcement when disabled", async () => {
      const relaxed = createGovernanceService({
        clock,
        assets,
        config: { enforceInvariants: false, escrowAccount: "vault" },
      });

      await relaxed.createDao("founder", { id: ORG, name: "Alpha" });

      expect(relaxed.config.escrowAccount).toBe("vault");
      expect(relaxed.invariants.getStatistics().totalChecks).toBe(0);
    });
  });
});
