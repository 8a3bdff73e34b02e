// src/__tests__/config.test.ts

import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config';

const OWNER = 'c'.repeat(64);

describe('loadConfig', () => {
  it('should fall back to dev defaults', () => {
    const config = loadConfig({ DB_PATH: ':memory:' });

    expect(config).toMatchObject({
      port: 3000,
      production: false,
      dbPath: ':memory:',
      ownerPubkey: '0'.repeat(64),
      holdingAccount: 'escrow-holding',
      heightSource: 'manual',
      initialHeight: 0,
      heightPollMs: 10_000,
      rateLimitPerMin: 30,
      authMaxSkewSecs: 120
    });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      PORT: '8080',
      OWNER_PUBKEY: OWNER,
      HEIGHT_SOURCE: 'bitcoind',
      BITCOIN_RPC_URL: 'http://node:8332',
      INITIAL_HEIGHT: '42',
      RATE_LIMIT_PER_MIN: '5'
    });

    expect(config.port).toBe(8080);
    expect(config.ownerPubkey).toBe(OWNER);
    expect(config.heightSource).toBe('bitcoind');
    expect(config.bitcoinRpc.url).toBe('http://node:8332');
    expect(config.initialHeight).toBe(42);
    expect(config.rateLimitPerMin).toBe(5);
  });

  it('should require an owner key in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production', HEIGHT_SOURCE: 'bitcoind' }))
      .toThrow('OWNER_PUBKEY: required in production (64 lowercase hex chars)');
  });

  it('should refuse manual heights in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production', OWNER_PUBKEY: OWNER }))
      .toThrow(ConfigError);
  });

  it('should reject malformed numbers and sources', () => {
    expect(() => loadConfig({ PORT: 'abc' })).toThrow('PORT: expected an integer >= 0, got "abc"');
    expect(() => loadConfig({ HEIGHT_POLL_MS: '10' })).toThrow(ConfigError);
    expect(() => loadConfig({ HEIGHT_SOURCE: 'electrum' })).toThrow(ConfigError);
  });
});
