// src/__tests__/helpers.ts — shared fixtures

import { vi } from 'vitest';
import { EscrowManager } from '../core/escrow-manager';
import { EscrowQueries } from '../core/escrow-queries';
import { ManualHeightOracle } from '../services/height-oracle';
import { InMemoryLedger } from '../services/ledger';
import { createMemoryRepository } from '../store/repository';
import type { Logger } from '../types/escrow';
import type { TransferResult } from '../types/ledger';
import { hashSecret } from '../utils/crypto';
import { EscrowError } from '../utils/validation';

export const SENDER = 'a'.repeat(64);
export const RECIPIENT = 'b'.repeat(64);
export const OWNER = 'c'.repeat(64);
export const STRANGER = 'd'.repeat(64);
export const HOLDING = 'escrow-holding';

export const SENDER_FUNDS = 5_000_000;

// 32 bytes of 0x01 and its real SHA-256 digest
export const SECRET = '01'.repeat(32);
export const SECRET_HASH = hashSecret(SECRET);
export const WRONG_SECRET = '02'.repeat(32);

export const silentLogger = (): Logger => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

/** Ledger whose next transfer can be made to fail, or to run a hook first. */
export class ScriptedLedger extends InMemoryLedger {
  failNext: TransferResult | null = null;
  beforeTransfer: (() => void) | null = null;
  transfers = 0;

  transfer(from: string, to: string, amount: number): TransferResult {
    this.beforeTransfer?.();
    if (this.failNext) {
      const failure = this.failNext;
      this.failNext = null;
      return failure;
    }
    const result = super.transfer(from, to, amount);
    if (result.ok) this.transfers++;
    return result;
  }
}

export function createHarness(height = 100) {
  const oracle = new ManualHeightOracle(height);
  const ledger = new ScriptedLedger({ [SENDER]: SENDER_FUNDS });
  const repository = createMemoryRepository();
  const core = { repository, ledger, oracle, owner: OWNER, holdingAccount: HOLDING };
  const manager = new EscrowManager({ ...core, logger: silentLogger() });
  const queries = new EscrowQueries(core);
  return { oracle, ledger, repository, manager, queries };
}

export const defaultParams = {
  recipient: RECIPIENT,
  amount: 1_000_000,
  blocksAhead: 10,
  secretHash: SECRET_HASH
};

export function catchEscrowError(fn: () => unknown): EscrowError {
  try {
    fn();
  } catch (err) {
    if (err instanceof EscrowError) return err;
    throw err;
  }
  throw new Error('Expected an EscrowError to be thrown');
}
