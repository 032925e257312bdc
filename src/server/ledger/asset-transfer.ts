import { getAssetBalance, runInTransaction, setAssetBalance } from '../database.js';

/**
 * Moves a fungible asset between a holder and the ledger's custody.
 * A `false` result (or a throw) means nothing moved.
 */
export interface AssetTransfer {
  transferIn(asset: string, from: string, amount: bigint): Promise<boolean>;
  transferOut(asset: string, to: string, amount: bigint): Promise<boolean>;
}

export const LEDGER_CUSTODY = 'ledger:custody';

/**
 * Custodial balance sheet kept in the ledger's own database.
 * Holders are funded with `deposit`; the ledger's escrow sits under LEDGER_CUSTODY.
 */
export class BalanceBook implements AssetTransfer {
  deposit(asset: string, holder: string, amount: bigint): bigint {
    if (amount <= 0n) {
      throw new Error('Deposit amount must be positive');
    }

    return runInTransaction(() => {
      const next = getAssetBalance(asset, holder) + amount;
      setAssetBalance(asset, holder, next);
      return next;
    });
  }

  balanceOf(asset: string, holder: string): bigint {
    return getAssetBalance(asset, holder);
  }

  async transferIn(asset: string, from: string, amount: bigint): Promise<boolean> {
    return this.move(asset, from, LEDGER_CUSTODY, amount);
  }

  async transferOut(asset: string, to: string, amount: bigint): Promise<boolean> {
    return this.move(asset, LEDGER_CUSTODY, to, amount);
  }

  private move(asset: string, from: string, to: string, amount: bigint): boolean {
    if (amount < 0n) return false;
    if (from === to) {
      console.warn(`[BalanceBook] Refusing ${asset} transfer from ${from} to itself`);
      return false;
    }

    return runInTransaction(() => {
      const available = getAssetBalance(asset, from);
      if (available < amount) {
        console.warn(
          `[BalanceBook] Insufficient ${asset} for ${from}: has ${available}, needs ${amount}`
        );
        return false;
      }

      setAssetBalance(asset, from, available - amount);
      setAssetBalance(asset, to, getAssetBalance(asset, to) + amount);
      return true;
    });
  }
}
