// src/services/ledger.ts

import type { Identity } from '../types/escrow';
import type { Ledger, TransferResult } from '../types/ledger';

/** Process-local balances. Used by tests and single-node dev setups. */
export class InMemoryLedger implements Ledger {
  private balances = new Map<Identity, number>();

  constructor(initial: Record<Identity, number> = {}) {
    for (const [account, amount] of Object.entries(initial)) {
      this.credit(account, amount);
    }
  }

  balanceOf(account: Identity): number {
    return this.balances.get(account) ?? 0;
  }

  credit(account: Identity, amount: number): void {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      throw new Error(`Credit amount must be a positive integer, got ${amount}`);
    }
    this.balances.set(account, this.balanceOf(account) + amount);
  }

  transfer(from: Identity, to: Identity, amount: number): TransferResult {
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      return { ok: false, reason: 'TransferFailed', detail: `invalid amount ${amount}` };
    }
    const available = this.balanceOf(from);
    if (available < amount) {
      return { ok: false, reason: 'InsufficientFunds', detail: `${from} holds ${available}` };
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return { ok: true };
  }
}
