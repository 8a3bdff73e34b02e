// src/core/escrow-queries.ts

import type {
  EscrowRecord,
  EscrowStats,
  EscrowStatus,
  EscrowView,
  Identity
} from '../types/escrow';
import type { HeightOracle, Ledger } from '../types/ledger';
import type { EscrowRepository } from '../store/repository';
import * as Preconditions from './preconditions';

export interface EscrowQueriesDeps {
  readonly repository: EscrowRepository;
  readonly ledger: Ledger;
  readonly oracle: HeightOracle;
  readonly owner: Identity;
  readonly holdingAccount: Identity;
}

const MISSING_STATUS: EscrowStatus = {
  exists: false,
  state: null,
  claimed: false,
  refunded: false,
  heightReached: false,
  sender: '',
  recipient: '',
  amount: 0,
  unlockHeight: 0,
  blocksRemaining: 0
};

export const toView = (record: EscrowRecord): EscrowView => ({
  ...record,
  claimed: record.state === 'CLAIMED',
  refunded: record.state === 'REFUNDED'
});

/** Read-only projections. Nothing here throws for an unknown id. */
export class EscrowQueries {
  constructor(private readonly deps: EscrowQueriesDeps) {}

  get(id: number): EscrowView | null {
    const record = this.deps.repository.records.find(id);
    return record ? toView(record) : null;
  }

  canClaim(id: number): boolean {
    return this.check(id, Preconditions.canClaim);
  }

  canRefund(id: number): boolean {
    return this.check(id, Preconditions.canRefund);
  }

  canCancel(id: number): boolean {
    return this.check(id, Preconditions.canCancel);
  }

  status(id: number): EscrowStatus {
    const record = this.deps.repository.records.find(id);
    if (!record) return { ...MISSING_STATUS };

    const height = this.deps.oracle.currentHeight();
    const view = toView(record);
    return {
      exists: true,
      state: view.state,
      claimed: view.claimed,
      refunded: view.refunded,
      heightReached: Preconditions.heightReached(record, height),
      sender: view.sender,
      recipient: view.recipient,
      amount: view.amount,
      unlockHeight: view.unlockHeight,
      blocksRemaining: Preconditions.blocksRemaining(record, height)
    };
  }

  stats(): EscrowStats {
    return {
      totalEscrows: this.deps.repository.totalCreated(),
      holdingBalance: this.deps.ledger.balanceOf(this.deps.holdingAccount),
      currentHeight: this.deps.oracle.currentHeight(),
      privilegedOwner: this.deps.owner
    };
  }

  listByParticipant(identity: Identity): EscrowView[] {
    return this.deps.repository.records
      .list()
      .filter(r => r.sender === identity || r.recipient === identity)
      .map(toView);
  }

  private check(
    id: number,
    predicate: (record: EscrowRecord, height: number) => boolean
  ): boolean {
    const record = this.deps.repository.records.find(id);
    return record !== null && predicate(record, this.deps.oracle.currentHeight());
  }
}
