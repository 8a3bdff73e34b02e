// src/config.ts

import dotenv from 'dotenv';
import path from 'path';

export type HeightSource = 'manual' | 'bitcoind';

export interface AppConfig {
  readonly port: number;
  readonly production: boolean;
  readonly dbPath: string;
  readonly ownerPubkey: string;
  readonly holdingAccount: string;
  readonly heightSource: HeightSource;
  readonly initialHeight: number;
  readonly bitcoinRpc: { readonly url: string; readonly user: string; readonly pass: string };
  readonly heightPollMs: number;
  readonly rateLimitPerMin: number;
  readonly authMaxSkewSecs: number;
}

export class ConfigError extends Error {
  constructor(public readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = 'ConfigError';
  }
}

const DEV_OWNER_PUBKEY = '0'.repeat(64);

type Env = Record<string, string | undefined>;

function intVar(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(name, `expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function heightSourceVar(env: Env): HeightSource {
  const raw = env.HEIGHT_SOURCE || 'manual';
  if (raw !== 'manual' && raw !== 'bitcoind') {
    throw new ConfigError('HEIGHT_SOURCE', `expected "manual" or "bitcoind", got "${raw}"`);
  }
  return raw;
}

export function loadConfig(env: Env = process.env): AppConfig {
  const production = env.NODE_ENV === 'production';

  const ownerPubkey = env.OWNER_PUBKEY || (production ? '' : DEV_OWNER_PUBKEY);
  if (!/^[0-9a-f]{64}$/.test(ownerPubkey)) {
    throw new ConfigError(
      'OWNER_PUBKEY',
      production ? 'required in production (64 lowercase hex chars)' : 'must be 64 lowercase hex chars'
    );
  }

  const heightSource = heightSourceVar(env);
  if (production && heightSource === 'manual') {
    throw new ConfigError('HEIGHT_SOURCE', 'manual heights are not allowed in production');
  }

  return {
    port: intVar(env, 'PORT', 3000, 0),
    production,
    dbPath: env.DB_PATH || path.join(process.cwd(), 'data', 'escrow.db'),
    ownerPubkey,
    holdingAccount: env.HOLDING_ACCOUNT || 'escrow-holding',
    heightSource,
    initialHeight: intVar(env, 'INITIAL_HEIGHT', 0, 0),
    bitcoinRpc: {
      url: env.BITCOIN_RPC_URL || 'http://127.0.0.1:18443',
      user: env.BITCOIN_RPC_USER || 'admin',
      pass: env.BITCOIN_RPC_PASS || 'admin'
    },
    heightPollMs: intVar(env, 'HEIGHT_POLL_MS', 10_000, 100),
    rateLimitPerMin: intVar(env, 'RATE_LIMIT_PER_MIN', 30, 1),
    authMaxSkewSecs: intVar(env, 'AUTH_MAX_SKEW_SECS', 120, 1)
  };
}

/** Reads `.env` into process.env, then validates. */
export function loadEnvConfig(): AppConfig {
  dotenv.config();
  return loadConfig(process.env);
}
