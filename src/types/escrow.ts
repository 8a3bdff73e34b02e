// src/types/escrow.ts

export type Identity = string;

export type EscrowState = 'OPEN' | 'CLAIMED' | 'REFUNDED';

export interface EscrowRecord {
  readonly id: number;
  readonly sender: Identity;
  readonly recipient: Identity;
  readonly amount: number;
  readonly unlockHeight: number;
  readonly secretHash: string;
  readonly state: EscrowState;
  readonly createdHeight: number;
}

export interface EscrowView extends EscrowRecord {
  readonly claimed: boolean;
  readonly refunded: boolean;
}

export interface CreateEscrowParams {
  readonly recipient: Identity;
  readonly amount: number;
  readonly blocksAhead: number;
  readonly secretHash: string;
}

export interface EscrowStatus {
  readonly exists: boolean;
  readonly state: EscrowState | null;
  readonly claimed: boolean;
  readonly refunded: boolean;
  readonly heightReached: boolean;
  readonly sender: Identity;
  readonly recipient: Identity;
  readonly amount: number;
  readonly unlockHeight: number;
  readonly blocksRemaining: number;
}

export interface EscrowStats {
  readonly totalEscrows: number;
  readonly holdingBalance: number;
  readonly currentHeight: number;
  readonly privilegedOwner: Identity;
}

export interface EscrowEvents {
  created: [record: EscrowRecord];
  claimed: [record: EscrowRecord];
  refunded: [record: EscrowRecord];
  cancelled: [record: EscrowRecord];
}

export type Logger = Pick<Console, 'log' | 'warn' | 'error'>;
