// src/types/ledger.ts

import type { Identity } from './escrow';

export type TransferFailure = 'InsufficientFunds' | 'TransferFailed';

export type TransferResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly reason: TransferFailure; readonly detail?: string };

/** Moves a fungible balance between accounts. A failed transfer moves nothing. */
export interface Ledger {
  transfer(from: Identity, to: Identity, amount: number): TransferResult;
  balanceOf(account: Identity): number;
}

/** External height counter. Never decreases; the escrow core cannot set it. */
export interface HeightOracle {
  currentHeight(): number;
}
