/**
 * Power Ledger Tests
 *
 * - Effective power is own power plus received power, zero when delegating
 * - Delegation amounts are fixed when granted
 * - Lazy expiry reclaims power exactly once
 * - Σ delegatedPower always equals Σ standing delegation amounts
 */

import { describe, it, expect, beforeEach } from "vitest";
import { PowerLedger } from "../power/index.js";
import { GovernanceEventBus } from "../audit/index.js";
import { MockAssetProvider } from "../assets/index.js";
import { UnitOfWork } from "../store/index.js";
import {
  AlreadyExistsError,
  InvalidInputError,
  InvalidStateError,
  NotFoundError,
  UnauthorizedError,
} from "../errors.js";
import type { ActionContext } from "../clock.js";

const ORG = "org-alpha";

function at(caller: string, epoch: number): ActionContext {
  return { caller, epoch };
}

describe("PowerLedger", () => {
  let unitOfWork: UnitOfWork;
  let events: GovernanceEventBus;
  let assets: MockAssetProvider;
  let ledger: PowerLedger;

  beforeEach(() => {
    unitOfWork = new UnitOfWork();
    events = new GovernanceEventBus(unitOfWork);
    assets = new MockAssetProvider();
    ledger = new PowerLedger(unitOfWork, events, assets);

    ledger.updateTokenPower(at(ORG, 1), ORG, "alice", 100n);
    ledger.updateCurrencyPower(at(ORG, 1), ORG, "alice", 20n);
    ledger.updateTokenPower(at(ORG, 1), ORG, "bob", 50n);
  });

  function delegatedTotal(): bigint {
    return ledger.listPowerRecords(ORG).reduce((sum, r) => sum + r.delegatedPower, 0n);
  }

  function delegationTotal(): bigint {
    return ledger.listDelegations(ORG).reduce((sum, d) => sum + d.amount, 0n);
  }

  // ============================================
  // REBALANCING
  // ============================================

  describe("power updates", () => {
    it("should sum token and currency power", () => {
      expect(ledger.computeEffectivePower(ORG, "alice")).toBe(120n);
      expect(ledger.getPowerRecord(ORG, "alice")).toMatchObject({
        tokenPower: 100n,
        currencyPower: 20n,
        delegatedPower: 0n,
        lastUpdated: 1,
      });
    });

    it("should return a zeroed record for unknown accounts", () => {
      expect(ledger.getPowerRecord(ORG, "nobody")).toEqual({
        organization: ORG,
        account: "nobody",
        tokenPower: 0n,
        currencyPower: 0n,
        delegatedPower: 0n,
        lastUpdated: 0,
      });
      expect(ledger.computeEffectivePower("org-beta", "alice")).toBe(0n);
    });

    it("should only let the organization update power", () => {
      expect(() => ledger.updateTokenPower(at("alice", 2), ORG, "alice", 1_000n)).toThrow(
        UnauthorizedError
      );
      expect(ledger.getPowerRecord(ORG, "alice").tokenPower).toBe(100n);
    });

    it("should reject negative power", () => {
      expect(() => ledger.updateCurrencyPower(at(ORG, 2), ORG, "alice", -1n)).toThrow(
        InvalidInputError
      );
    });

    it("should publish power_updated events", () => {
      const [, second] = events.getByKind("power_updated");
      expect(second).toMatchObject({
        actor: ORG,
        subject: { organization: ORG, account: "alice" },
        changes: { component: "currency", tokenPower: "100", currencyPower: "20" },
      });
    });

    it("should refresh currency power from the balance oracle", async () => {
      assets.setBalance("bob", 75n);

      const record = await ledger.refreshCurrencyPower(at(ORG, 3), ORG, "bob");

      expect(record.currencyPower).toBe(75n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(125n);
    });

    it("should fail to refresh without an oracle", async () => {
      const bare = new PowerLedger(unitOfWork, events);
      await expect(bare.refreshCurrencyPower(at(ORG, 3), ORG, "bob")).rejects.toThrow(
        InvalidStateError
      );
    });
  });

  // ============================================
  // DELEGATION
  // ============================================

  describe("delegate", () => {
    it("should move a snapshot of own power to the delegate", () => {
      const delegation = ledger.delegate(at("alice", 5), ORG, "bob");

      expect(delegation).toEqual({
        organization: ORG,
        delegator: "alice",
        delegate: "bob",
        amount: 120n,
        createdAt: 5,
        expiresAt: undefined,
      });
      expect(ledger.computeEffectivePower(ORG, "alice")).toBe(0n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(170n);
      expect(ledger.getPowerRecord(ORG, "alice").delegateTarget).toBe("bob");
      expect(delegatedTotal()).toBe(delegationTotal());
    });

    it("should not follow later balance changes", () => {
      ledger.delegate(at("alice", 5), ORG, "bob");
      ledger.updateTokenPower(at(ORG, 6), ORG, "alice", 500n);

      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(170n);
      expect(ledger.computeEffectivePower(ORG, "alice")).toBe(0n);

      expect(ledger.revoke(at("alice", 7), ORG)).toBe(120n);
      expect(ledger.computeEffectivePower(ORG, "alice")).toBe(520n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(50n);
    });

    it("should reject delegating to self", () => {
      expect(() => ledger.delegate(at("alice", 5), ORG, "alice")).toThrow(InvalidInputError);
    });

    it("should require revocation before re-delegating", () => {
      ledger.delegate(at("alice", 5), ORG, "bob");

      expect(() => ledger.delegate(at("alice", 6), ORG, "carol")).toThrow(AlreadyExistsError);
      expect(ledger.listDelegationsTo(ORG, "carol")).toEqual([]);
    });

    it("should reject delegating zero power", () => {
      expect(() => ledger.delegate(at("carol", 5), ORG, "bob")).toThrow(InvalidInputError);
      expect(ledger.listDelegations(ORG)).toEqual([]);
    });

    it("should reject delegating when all power is received", () => {
      ledger.delegate(at("alice", 5), ORG, "carol");

      expect(() => ledger.delegate(at("carol", 6), ORG, "bob")).toThrow(
        "carol has no own voting power to delegate"
      );
      expect(ledger.getDelegation(ORG, "carol")).toBeUndefined();
      expect(ledger.getPowerRecord(ORG, "carol").delegateTarget).toBeUndefined();
      expect(ledger.computeEffectivePower(ORG, "carol")).toBe(120n);
    });

    it("should stop a delegate from passing received power on", () => {
      ledger.delegate(at("alice", 5), ORG, "bob");
      ledger.delegate(at("bob", 6), ORG, "carol");

      // bob's own 50 moves; the 120 received from alice stays with bob
      expect(ledger.getDelegation(ORG, "bob")?.amount).toBe(50n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(0n);
      expect(ledger.computeEffectivePower(ORG, "carol")).toBe(50n);
      expect(delegatedTotal()).toBe(delegationTotal());
    });

    it("should reject an expiry that is not in the future", () => {
      expect(() => ledger.delegate(at("alice", 5), ORG, "bob", 5)).toThrow(InvalidInputError);
      expect(() => ledger.delegate(at("alice", 5), ORG, "bob", 3)).toThrow(InvalidInputError);
    });
  });

  describe("revoke", () => {
    it("should restore both sides", () => {
      ledger.delegate(at("alice", 5), ORG, "bob");

      const reclaimed = ledger.revoke(at("alice", 6), ORG);

      expect(reclaimed).toBe(120n);
      expect(ledger.computeEffectivePower(ORG, "alice")).toBe(120n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(50n);
      expect(ledger.getPowerRecord(ORG, "alice").delegateTarget).toBeUndefined();
      expect(ledger.listDelegations(ORG)).toEqual([]);
      expect(events.getByKind("delegation_revoked")).toHaveLength(1);
    });

    it("should fail without a standing delegation", () => {
      expect(() => ledger.revoke(at("alice", 6), ORG)).toThrow(NotFoundError);
    });
  });

  // ============================================
  // EXPIRY
  // ============================================

  describe("expiry", () => {
    beforeEach(() => {
      ledger.delegate(at("alice", 5), ORG, "bob", 10);
    });

    it("should keep counting until the clock passes the expiry", () => {
      expect(ledger.checkExpiry(at("anyone", 10), ORG, "alice", "bob")).toBe(0n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(170n);
    });

    it("should behave as revoke once expired", () => {
      expect(ledger.checkExpiry(at("anyone", 11), ORG, "alice", "bob")).toBe(120n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(50n);
      expect(ledger.computeEffectivePower(ORG, "alice")).toBe(120n);

      const [expired] = events.getByKind("delegation_expired");
      expect(expired).toMatchObject({
        actor: "anyone",
        subject: { organization: ORG, delegator: "alice", delegate: "bob" },
        changes: { amount: "120" },
      });

      expect(() => ledger.checkExpiry(at("anyone", 12), ORG, "alice", "bob")).toThrow(
        NotFoundError
      );
    });

    it("should settle a lapsed delegation before re-delegating", () => {
      const delegation = ledger.delegate(at("alice", 12), ORG, "carol");

      expect(delegation.amount).toBe(120n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(50n);
      expect(ledger.computeEffectivePower(ORG, "carol")).toBe(120n);
      expect(events.getByKind("delegation_expired")).toHaveLength(1);
    });

    it("should settle received and outgoing delegations for an account", () => {
      ledger.updateTokenPower(at(ORG, 6), ORG, "dave", 30n);
      ledger.delegate(at("dave", 6), ORG, "bob", 8);

      expect(ledger.settleExpired(at("bob", 9), ORG, "bob")).toBe(30n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(170n);

      expect(ledger.settleExpired(at("bob", 11), ORG, "bob")).toBe(120n);
      expect(ledger.computeEffectivePower(ORG, "bob")).toBe(50n);
      expect(delegatedTotal()).toBe(0n);
      expect(delegationTotal()).toBe(0n);
    });
  });
});
