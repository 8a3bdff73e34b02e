// src/__tests__/routes.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import request from 'supertest';
import type { Express } from 'express';
import { createApp } from '../app';
import { ManualHeightOracle } from '../services/height-oracle';
import { InMemoryLedger } from '../services/ledger';
import { createMemoryRepository } from '../store/repository';
import {
  HOLDING,
  OWNER,
  RECIPIENT,
  SECRET,
  SECRET_HASH,
  SENDER,
  STRANGER,
  silentLogger
} from './helpers';

function buildApp(options: { production?: boolean; rateLimitPerMin?: number } = {}) {
  const oracle = new ManualHeightOracle(100);
  const ledger = new InMemoryLedger({ [SENDER]: 3_000_000 });
  const { app } = createApp({
    repository: createMemoryRepository(),
    ledger,
    oracle,
    manualOracle: oracle,
    owner: OWNER,
    holdingAccount: HOLDING,
    production: options.production ?? false,
    rateLimitPerMin: options.rateLimitPerMin ?? 1_000,
    logger: silentLogger()
  });
  return { app, ledger, oracle };
}

const createBody = { recipient: RECIPIENT, amount: 1_000_000, blocksAhead: 10, secretHash: SECRET_HASH };

describe('Escrow API', () => {
  let app: Express;
  let ledger: InMemoryLedger;

  beforeEach(() => {
    ({ app, ledger } = buildApp());
  });

  const as = (pubkey: string) => ({
    post: (path: string, body: object = {}) =>
      request(app).post(path).set('X-Dev-Pubkey', pubkey).send(body),
    get: (path: string) => request(app).get(path).set('X-Dev-Pubkey', pubkey)
  });

  it('should report health with the current height', async () => {
    const res = await request(app).get('/api/health').expect(200);
    expect(res.body).toMatchObject({ status: 'ok', height: 100 });
  });

  it('should require authentication', async () => {
    const res = await request(app).get('/api/escrows/stats').expect(401);
    expect(res.body.code).toBe('AUTH_REQUIRED');
  });

  it('should reject a malformed dev pubkey', async () => {
    const res = await as('not-a-key').get('/api/escrows/stats').expect(401);
    expect(res.body.code).toBe('INVALID_DEV_PUBKEY');
  });

  it('should create an escrow for the caller', async () => {
    const res = await as(SENDER).post('/api/escrows', createBody).expect(201);

    expect(res.body).toMatchObject({
      id: 1,
      sender: SENDER,
      recipient: RECIPIENT,
      amount: 1_000_000,
      unlockHeight: 110,
      createdHeight: 100,
      claimed: false,
      refunded: false,
      yourRole: 'sender'
    });
    expect(ledger.balanceOf(HOLDING)).toBe(1_000_000);
  });

  it('should map validation failures to 400 with the error number', async () => {
    const res = await as(SENDER).post('/api/escrows', { ...createBody, amount: 0 }).expect(400);

    expect(res.body).toEqual({
      error: 'Amount must be a positive integer',
      code: 'InvalidAmount',
      errorNumber: 103,
      field: 'amount'
    });
  });

  it('should reject a recipient that is not a pubkey', async () => {
    const res = await as(SENDER)
      .post('/api/escrows', { ...createBody, recipient: RECIPIENT.slice(1) })
      .expect(400);

    expect(res.body).toEqual({
      error: 'recipient must be a 64-char lowercase hex pubkey',
      code: 'InvalidIdentity',
      errorNumber: 113,
      field: 'recipient'
    });
    expect(ledger.balanceOf(HOLDING)).toBe(0);
  });

  it('should treat a string amount as invalid', async () => {
    const res = await as(SENDER).post('/api/escrows', { ...createBody, amount: '1000' }).expect(400);
    expect(res.body.code).toBe('InvalidAmount');
  });

  it('should answer 402 when the caller cannot fund the escrow', async () => {
    const res = await as(STRANGER).post('/api/escrows', createBody).expect(402);
    expect(res.body.code).toBe('InsufficientBalance');
  });

  it('should run the claim flow end to end', async () => {
    await as(SENDER).post('/api/escrows', createBody).expect(201);

    const early = await as(RECIPIENT).post('/api/escrows/1/claim', { secret: SECRET }).expect(409);
    expect(early.body.code).toBe('HeightNotReached');

    const canClaimBefore = await as(RECIPIENT).get('/api/escrows/1/can-claim').expect(200);
    expect(canClaimBefore.body).toEqual({ id: 1, canClaim: false });

    const mined = await request(app).post('/api/dev/mine').send({ blocks: 10 }).expect(200);
    expect(mined.body).toEqual({ height: 110 });

    const claimed = await as(RECIPIENT).post('/api/escrows/1/claim', { secret: SECRET }).expect(200);
    expect(claimed.body).toMatchObject({ id: 1, state: 'CLAIMED', claimed: true, refunded: false });
    expect(ledger.balanceOf(RECIPIENT)).toBe(1_000_000);

    const again = await as(RECIPIENT).post('/api/escrows/1/claim', { secret: SECRET }).expect(409);
    expect(again.body.code).toBe('AlreadyFinalized');
  });

  it('should refund to the sender and refuse other callers', async () => {
    await as(SENDER).post('/api/escrows', { ...createBody, blocksAhead: 1 }).expect(201);
    await request(app).post('/api/dev/mine').send({}).expect(200);

    const denied = await as(STRANGER).post('/api/escrows/1/refund').expect(403);
    expect(denied.body.code).toBe('NotAuthorized');

    const refunded = await as(SENDER).post('/api/escrows/1/refund').expect(200);
    expect(refunded.body).toMatchObject({ state: 'REFUNDED', refunded: true });
    expect(ledger.balanceOf(SENDER)).toBe(3_000_000);
  });

  it('should let only the owner cancel', async () => {
    await as(SENDER).post('/api/escrows', createBody).expect(201);

    await as(SENDER).post('/api/escrows/1/cancel').expect(403);
    const res = await as(OWNER).post('/api/escrows/1/cancel').expect(200);
    expect(res.body.refunded).toBe(true);
  });

  it('should return 404 for unknown or malformed ids', async () => {
    await as(SENDER).get('/api/escrows/99').expect(404);
    await as(SENDER).get('/api/escrows/abc').expect(404);
    const res = await as(RECIPIENT).post('/api/escrows/7/claim', { secret: SECRET }).expect(404);
    expect(res.body.code).toBe('NotFound');
  });

  it('should project status without failing for unknown ids', async () => {
    const res = await as(SENDER).get('/api/escrows/99/status').expect(200);
    expect(res.body).toEqual({
      id: 99,
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
    });
  });

  it('should list the caller escrows and serve stats', async () => {
    await as(SENDER).post('/api/escrows', createBody).expect(201);

    const mine = await as(RECIPIENT).get('/api/escrows').expect(200);
    expect(mine.body.map((e: { id: number }) => e.id)).toEqual([1]);
    const none = await as(STRANGER).get('/api/escrows').expect(200);
    expect(none.body).toEqual([]);

    const stats = await as(STRANGER).get('/api/escrows/stats').expect(200);
    expect(stats.body).toEqual({
      totalEscrows: 1,
      holdingBalance: 1_000_000,
      currentHeight: 100,
      privilegedOwner: OWNER
    });
  });

  it('should credit accounts through the dev faucet', async () => {
    const res = await request(app)
      .post('/api/dev/faucet')
      .send({ account: STRANGER, amount: 250 })
      .expect(200);
    expect(res.body).toEqual({ account: STRANGER, balance: 250 });

    await request(app).post('/api/dev/faucet').send({ account: STRANGER, amount: -1 }).expect(400);
  });

  it('should rate limit per caller', async () => {
    ({ app } = buildApp({ rateLimitPerMin: 2 }));

    await as(SENDER).get('/api/escrows/stats').expect(200);
    await as(SENDER).get('/api/escrows/stats').expect(200);
    await as(SENDER).get('/api/escrows/stats').expect(429);
    await as(RECIPIENT).get('/api/escrows/stats').expect(200);
  });

  it('should hide dev routes and the dev header in production', async () => {
    ({ app } = buildApp({ production: true }));

    await request(app).post('/api/dev/mine').send({ blocks: 1 }).expect(404);
    const res = await as(SENDER).get('/api/escrows/stats').expect(401);
    expect(res.body.code).toBe('AUTH_REQUIRED');
  });
});
