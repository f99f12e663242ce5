/**
 * Power Ledger
 *
 * Per-(organization, account) voting power plus delegations:
 * - Own power from token and native-currency holdings
 * - Snapshot delegations with optional lazy expiry
 * - Effective power as the only source of vote weight
 *
 * Invariants:
 * - Σ delegatedPower over accounts == Σ amount over standing delegations
 * - An account with a delegate target has effective power 0
 */

import { governanceLogger as logger, type AccountId } from "@civitas/shared";
import type { ActionContext } from "../clock.js";
import type { AssetTransferProvider } from "../assets/index.js";
import type { GovernanceEventBus } from "../audit/index.js";
import { KeyedStore, type UnitOfWork } from "../store/index.js";
import {
  AlreadyExistsError,
  InvalidInputError,
  InvalidStateError,
  InvariantViolationError,
  NotFoundError,
  UnauthorizedError,
} from "../errors.js";
import type {
  Delegation,
  DelegationKey,
  PowerComponent,
  PowerKey,
  PowerRecord,
} from "./types.js";

const powerLogger = logger.child({ component: "power-ledger" });

// ============================================
// POWER LEDGER
// ============================================

export class PowerLedger {
  private readonly power: KeyedStore<PowerKey, PowerRecord>;
  private readonly delegations: KeyedStore<DelegationKey, Delegation>;

  constructor(
    private readonly unitOfWork: UnitOfWork,
    private readonly events: GovernanceEventBus,
    private readonly balanceOracle?: AssetTransferProvider
  ) {
    this.power = new KeyedStore("power", unitOfWork);
    this.delegations = new KeyedStore("delegations", unitOfWork);
  }

  // ============================================
  // READS
  // ============================================

  /**
   * Stored record, or a zeroed one for accounts never seen
   */
  getPowerRecord(organization: AccountId, account: AccountId): PowerRecord {
    return (
      this.power.get([organization, account]) ?? {
        organization,
        account,
        tokenPower: 0n,
        currencyPower: 0n,
        delegatedPower: 0n,
        lastUpdated: 0,
      }
    );
  }

  /**
   * Vote weight an account can spend right now. Must be read at vote
   * time, never cached.
   */
  computeEffectivePower(organization: AccountId, account: AccountId): bigint {
    const record = this.getPowerRecord(organization, account);
    if (record.delegateTarget !== undefined) {
      return 0n;
    }
    return record.tokenPower + record.currencyPower + record.delegatedPower;
  }

  getDelegation(organization: AccountId, delegator: AccountId): Delegation | undefined {
    const target = this.getPowerRecord(organization, delegator).delegateTarget;
    if (target === undefined) return undefined;
    return this.delegations.get([organization, delegator, target]);
  }

  listDelegationsTo(organization: AccountId, delegate: AccountId): Delegation[] {
    return this.delegations.filter(
      (d) => d.organization === organization && d.delegate === delegate
    );
  }

  listDelegations(organization?: AccountId): Delegation[] {
    return organization === undefined
      ? this.delegations.values()
      : this.delegations.filter((d) => d.organization === organization);
  }

  listPowerRecords(organization?: AccountId): PowerRecord[] {
    return organization === undefined
      ? this.power.values()
      : this.power.filter((r) => r.organization === organization);
  }

  // ============================================
  // REBALANCING
  // ============================================

  /**
   * Overwrite the token-derived component. Standing delegations keep
   * their snapshotted amounts.
   */
  updateTokenPower(
    ctx: ActionContext,
    organization: AccountId,
    account: AccountId,
    amount: bigint
  ): PowerRecord {
    return this.updateComponent(ctx, organization, account, "token", amount);
  }

  updateCurrencyPower(
    ctx: ActionContext,
    organization: AccountId,
    account: AccountId,
    amount: bigint
  ): PowerRecord {
    return this.updateComponent(ctx, organization, account, "currency", amount);
  }

  /**
   * Read the account's native balance from the oracle and store it as
   * its currency power.
   */
  async refreshCurrencyPower(
    ctx: ActionContext,
    organization: AccountId,
    account: AccountId
  ): Promise<PowerRecord> {
    this.assertOrganization(ctx, organization);
    if (!this.balanceOracle) {
      throw new InvalidStateError("No balance oracle configured");
    }

    const balance = await this.balanceOracle.balanceOf(account);
    return this.updateCurrencyPower(ctx, organization, account, balance);
  }

  // ============================================
  // DELEGATION
  // ============================================

  /**
   * Delegate the caller's own power to `delegate`. The amount is fixed
   * at token + currency power as of now.
   */
  delegate(
    ctx: ActionContext,
    organization: AccountId,
    delegate: AccountId,
    expiresAt?: number
  ): Delegation {
    const delegator = ctx.caller;

    if (delegate === delegator) {
      throw new InvalidInputError("Cannot delegate to self", "delegate");
    }
    if (expiresAt !== undefined && (!Number.isSafeInteger(expiresAt) || expiresAt <= ctx.epoch)) {
      throw new InvalidInputError(
        `Expiry must be a future epoch: current=${ctx.epoch}, expiresAt=${expiresAt}`,
        "expiresAt"
      );
    }

    return this.unitOfWork.run(() => {
      this.expireOutgoing(ctx, organization, delegator);

      const delegatorRecord = this.getPowerRecord(organization, delegator);
      if (delegatorRecord.delegateTarget !== undefined) {
        throw new AlreadyExistsError(
          `${delegator} already delegates to ${delegatorRecord.delegateTarget}; revoke first`,
          "delegate"
        );
      }
      // Received power stays with its holder, so only own power can move.
      const amount = delegatorRecord.tokenPower + delegatorRecord.currencyPower;
      if (amount === 0n) {
        throw new InvalidInputError(`${delegator} has no own voting power to delegate`, "power");
      }
      const delegation: Delegation = {
        organization,
        delegator,
        delegate,
        amount,
        createdAt: ctx.epoch,
        expiresAt,
      };

      const delegateRecord = this.getPowerRecord(organization, delegate);
      this.delegations.put([organization, delegator, delegate], delegation);
      this.power.put([organization, delegator], {
        ...delegatorRecord,
        delegateTarget: delegate,
      });
      this.power.put([organization, delegate], {
        ...delegateRecord,
        delegatedPower: delegateRecord.delegatedPower + amount,
      });

      this.events.publish(
        ctx,
        "delegation_created",
        { organization, delegator, delegate },
        { amount, expiresAt }
      );

      powerLogger.info({
        organization,
        delegator,
        delegate,
        amount: amount.toString(),
        expiresAt,
      }, "Delegation created");

      return delegation;
    });
  }

  /**
   * Revoke the caller's standing delegation. Returns the reclaimed amount.
   */
  revoke(ctx: ActionContext, organization: AccountId): bigint {
    const delegator = ctx.caller;

    return this.unitOfWork.run(() => {
      const delegation = this.getDelegation(organization, delegator);
      if (!delegation) {
        throw new NotFoundError(`${delegator} has no active delegation`, "delegation");
      }

      this.removeDelegation(ctx, delegation, "delegation_revoked");
      return delegation.amount;
    });
  }

  /**
   * Lazy expiry of one delegation. Behaves as revoke once the clock has
   * passed `expiresAt`; otherwise a no-op returning 0.
   */
  checkExpiry(
    ctx: ActionContext,
    organization: AccountId,
    delegator: AccountId,
    delegate: AccountId
  ): bigint {
    return this.unitOfWork.run(() => {
      const delegation = this.delegations.get([organization, delegator, delegate]);
      if (!delegation) {
        throw new NotFoundError(
          `No delegation from ${delegator} to ${delegate}`,
          "delegation"
        );
      }

      if (!PowerLedger.isExpired(delegation, ctx.epoch)) {
        return 0n;
      }

      this.removeDelegation(ctx, delegation, "delegation_expired");
      return delegation.amount;
    });
  }

  /**
   * Expire every lapsed delegation touching `account`: its own outgoing
   * one and all those it receives. Returns the total amount released.
   */
  settleExpired(ctx: ActionContext, organization: AccountId, account: AccountId): bigint {
    return this.unitOfWork.run(() => {
      let released = this.expireOutgoing(ctx, organization, account);

      for (const delegation of this.listDelegationsTo(organization, account)) {
        if (PowerLedger.isExpired(delegation, ctx.epoch)) {
          this.removeDelegation(ctx, delegation, "delegation_expired");
          released += delegation.amount;
        }
      }

      return released;
    });
  }

  static isExpired(delegation: Delegation, epoch: number): boolean {
    return delegation.expiresAt !== undefined && epoch > delegation.expiresAt;
  }

  // ============================================
  // PRIVATE METHODS
  // ============================================

  private updateComponent(
    ctx: ActionContext,
    organization: AccountId,
    account: AccountId,
    component: PowerComponent,
    amount: bigint
  ): PowerRecord {
    this.assertOrganization(ctx, organization);
    if (amount < 0n) {
      throw new InvalidInputError("Power must not be negative", "amount");
    }

    return this.unitOfWork.run(() => {
      const current = this.getPowerRecord(organization, account);
      const updated: PowerRecord =
        component === "token"
          ? { ...current, tokenPower: amount, lastUpdated: ctx.epoch }
          : { ...current, currencyPower: amount, lastUpdated: ctx.epoch };

      this.power.put([organization, account], updated);

      this.events.publish(
        ctx,
        "power_updated",
        { organization, account },
        { component, tokenPower: updated.tokenPower, currencyPower: updated.currencyPower }
      );

      powerLogger.debug({
        organization,
        account,
        component,
        amount: amount.toString(),
      }, "Power updated");

      return updated;
    });
  }

  private expireOutgoing(ctx: ActionContext, organization: AccountId, account: AccountId): bigint {
    const outgoing = this.getDelegation(organization, account);
    if (outgoing && PowerLedger.isExpired(outgoing, ctx.epoch)) {
      this.removeDelegation(ctx, outgoing, "delegation_expired");
      return outgoing.amount;
    }
    return 0n;
  }

  private removeDelegation(
    ctx: ActionContext,
    delegation: Delegation,
    kind: "delegation_revoked" | "delegation_expired"
  ): void {
    const { organization, delegator, delegate, amount } = delegation;
    const delegateRecord = this.getPowerRecord(organization, delegate);

    if (delegateRecord.delegatedPower < amount) {
      throw new InvariantViolationError(
        `Delegated power of ${delegate} (${delegateRecord.delegatedPower}) is below delegation amount ${amount}`,
        "delegation_conservation",
        organization
      );
    }

    const { delegateTarget: _cleared, ...delegatorRest } = this.getPowerRecord(
      organization,
      delegator
    );

    this.power.put([organization, delegator], delegatorRest);
    this.power.put([organization, delegate], {
      ...delegateRecord,
      delegatedPower: delegateRecord.delegatedPower - amount,
    });
    this.delegations.delete([organization, delegator, delegate]);

    this.events.publish(ctx, kind, { organization, delegator, delegate }, { amount });

    powerLogger.info({
      organization,
      delegator,
      delegate,
      amount: amount.toString(),
      reason: kind,
    }, "Delegation removed");
  }

  private assertOrganization(ctx: ActionContext, organization: AccountId): void {
    if (ctx.caller !== organization) {
      throw new UnauthorizedError(
        `Only ${organization} may update its members' power`,
        "caller"
      );
    }
  }
}
