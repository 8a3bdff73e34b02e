// src/core/preconditions.ts
//
// Stateless legality checks over (record, currentHeight). Claim and refund
// share one height gate; cancel is only reachable strictly before it.

import type { EscrowRecord } from '../types/escrow';

type Gated = Pick<EscrowRecord, 'state' | 'unlockHeight'>;

export const isFinalized = (record: Pick<EscrowRecord, 'state'>): boolean =>
  record.state !== 'OPEN';

export const heightReached = (record: Gated, height: number): boolean =>
  height >= record.unlockHeight;

export const canClaim = (record: Gated, height: number): boolean =>
  !isFinalized(record) && heightReached(record, height);

export const canRefund = (record: Gated, height: number): boolean =>
  !isFinalized(record) && heightReached(record, height);

export const canCancel = (record: Gated, height: number): boolean =>
  !isFinalized(record) && height < record.unlockHeight;

export const blocksRemaining = (record: Gated, height: number): number =>
  Math.max(0, record.unlockHeight - height);
