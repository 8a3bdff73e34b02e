// src/utils/crypto.ts

import { sha256 } from '@noble/hashes/sha2.js';
import { bytesToHex, hexToBytes, randomBytes } from '@noble/hashes/utils.js';
import { MAX_SECRET_BYTES } from './validation';

const HEX = /^(?:[0-9a-fA-F]{2})+$/;

export const isHex = (value: string): boolean => HEX.test(value);

/** SHA-256 of the hex-encoded preimage, as lowercase hex. */
export const hashSecret = (secretHex: string): string =>
  bytesToHex(sha256(hexToBytes(secretHex)));

/**
 * Hashes a caller-supplied preimage, or returns null when it is not
 * 1..32 bytes of hex.
 */
export const tryHashSecret = (secretHex: string): string | null => {
  if (typeof secretHex !== 'string' || !isHex(secretHex)) return null;
  if (secretHex.length / 2 > MAX_SECRET_BYTES) return null;
  return hashSecret(secretHex);
};

export const secretMatches = (secretHex: string, secretHash: string): boolean => {
  const digest = tryHashSecret(secretHex);
  return digest !== null && digest === secretHash.toLowerCase();
};

export const generateSecret = (): { secret: string; secretHash: string } => {
  const secret = bytesToHex(randomBytes(MAX_SECRET_BYTES));
  return { secret, secretHash: hashSecret(secret) };
};
