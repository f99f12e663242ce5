/**
 * Asset Transfer Capability
 *
 * The fungible-asset service the escrow moves funds through and the
 * power ledger reads currency balances from. `asset` absent means the
 * native currency.
 */

import { NATIVE_ASSET, type AccountId } from "@civitas/shared";

// ============================================
// ASSET PROVIDER INTERFACE
// ============================================

export interface AssetTransferProvider {
  /**
   * Move `amount` from one account to another. Resolves false when the
   * service rejects the transfer.
   */
  transfer(amount: bigint, from: AccountId, to: AccountId, asset?: string): Promise<boolean>;

  balanceOf(account: AccountId, asset?: string): Promise<bigint>;
}

export interface TransferReceipt {
  amount: bigint;
  from: AccountId;
  to: AccountId;
  asset: string;
}

/**
 * In-memory balance book for development and tests
 */
export class MockAssetProvider implements AssetTransferProvider {
  private readonly balances = new Map<string, bigint>();
  private readonly receipts: TransferReceipt[] = [];
  private rejectPredicate?: (receipt: TransferReceipt) => boolean;

  setBalance(account: AccountId, amount: bigint, asset: string = NATIVE_ASSET): void {
    this.balances.set(MockAssetProvider.key(account, asset), amount);
  }

  /**
   * Reject every transfer matching the predicate (cleared with undefined)
   */
  rejectTransfers(predicate?: (receipt: TransferReceipt) => boolean): void {
    this.rejectPredicate = predicate;
  }

  getReceipts(): TransferReceipt[] {
    return [...this.receipts];
  }

  async transfer(
    amount: bigint,
    from: AccountId,
    to: AccountId,
    asset: string = NATIVE_ASSET
  ): Promise<boolean> {
    const receipt: TransferReceipt = { amount, from, to, asset };
    if (amount <= 0n || this.rejectPredicate?.(receipt)) {
      return false;
    }

    const fromKey = MockAssetProvider.key(from, asset);
    const fromBalance = this.balances.get(fromKey) ?? 0n;
    if (fromBalance < amount) {
      return false;
    }

    const toKey = MockAssetProvider.key(to, asset);
    this.balances.set(fromKey, fromBalance - amount);
    this.balances.set(toKey, (this.balances.get(toKey) ?? 0n) + amount);
    this.receipts.push(receipt);
    return true;
  }

  async balanceOf(account: AccountId, asset: string = NATIVE_ASSET): Promise<bigint> {
    return this.balances.get(MockAssetProvider.key(account, asset)) ?? 0n;
  }

  private static key(account: AccountId, asset: string): string {
    return `${asset}:${account}`;
  }
}
