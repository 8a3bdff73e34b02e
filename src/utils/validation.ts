// src/utils/validation.ts

import type { CreateEscrowParams } from '../types/escrow';

export const ESCROW_ERROR_NUMBERS = {
  NotAuthorized: 100,
  NotFound: 101,
  AlreadyFinalized: 102,
  InvalidAmount: 103,
  InvalidHeight: 104,
  HeightNotReached: 105,
  InvalidSecret: 106,
  AlreadyExpired: 107,
  InsufficientBalance: 108,
  DuplicateId: 109,
  InvalidHash: 110,
  TransferFailed: 111,
  TransitionInProgress: 112,
  InvalidIdentity: 113
} as const;

export type EscrowErrorCode = keyof typeof ESCROW_ERROR_NUMBERS;

export const SECRET_HASH_HEX_LENGTH = 64;
export const MAX_SECRET_BYTES = 32;

export class EscrowError extends Error {
  readonly errorNumber: number;

  constructor(
    public readonly code: EscrowErrorCode,
    message: string,
    public readonly field?: string
  ) {
    super(message);
    this.name = 'EscrowError';
    this.errorNumber = ESCROW_ERROR_NUMBERS[code];
  }
}

export const isEscrowError = (err: unknown, code?: EscrowErrorCode): err is EscrowError =>
  err instanceof EscrowError && (code === undefined || err.code === code);

export const validateIdentity = (identity: string, field: string): void => {
  if (typeof identity !== 'string' || identity.trim().length === 0) {
    throw new EscrowError('InvalidIdentity', `${field} is required`, field);
  }
};

const PUBKEY_HEX = /^[0-9a-f]{64}$/;

/** Nostr public key: 64 lowercase hex characters. */
export const isPubkey = (value: string): boolean => PUBKEY_HEX.test(value);

export const validatePubkey = (value: string, field: string): void => {
  if (!isPubkey(value)) {
    throw new EscrowError('InvalidIdentity', `${field} must be a 64-char lowercase hex pubkey`, field);
  }
};

export const validateAmount = (amount: number): void => {
  if (!Number.isSafeInteger(amount) || amount <= 0) {
    throw new EscrowError('InvalidAmount', 'Amount must be a positive integer', 'amount');
  }
};

export const validateBlocksAhead = (blocksAhead: number): void => {
  if (!Number.isSafeInteger(blocksAhead) || blocksAhead <= 0) {
    throw new EscrowError(
      'InvalidHeight',
      'blocksAhead must be a positive integer',
      'blocksAhead'
    );
  }
};

export const validateSecretHash = (secretHash: string): void => {
  if (
    typeof secretHash !== 'string' ||
    secretHash.length !== SECRET_HASH_HEX_LENGTH ||
    !/^[0-9a-fA-F]+$/.test(secretHash)
  ) {
    throw new EscrowError(
      'InvalidHash',
      `secretHash must be ${SECRET_HASH_HEX_LENGTH} hex characters (32 bytes)`,
      'secretHash'
    );
  }
};

export const validateCreateParams = (caller: string, params: CreateEscrowParams): void => {
  validateIdentity(caller, 'caller');
  validateIdentity(params.recipient, 'recipient');
  validateAmount(params.amount);
  validateBlocksAhead(params.blocksAhead);
  validateSecretHash(params.secretHash);
};

/** Escrow ids arrive as path segments; anything but a positive integer is treated as absent. */
export const parseEscrowId = (raw: string): number | null => {
  if (!/^[1-9][0-9]*$/.test(raw)) return null;
  const id = Number(raw);
  return Number.isSafeInteger(id) ? id : null;
};
