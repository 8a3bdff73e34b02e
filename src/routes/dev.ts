// src/routes/dev.ts — dev-mode helpers (never mounted in production)
//
//   POST /faucet { account, amount }   credit a ledger account
//   POST /mine   { blocks }            advance the manual height oracle

import { Router, type Request, type Response } from 'express';
import type { Identity, Logger } from '../types/escrow';
import type { ManualHeightOracle } from '../services/height-oracle';
import { asNumber, asString, readBody } from './http';

export interface CreditableLedger {
  credit(account: Identity, amount: number): void;
  balanceOf(account: Identity): number;
}

export interface DevRouterDeps {
  readonly ledger: CreditableLedger;
  /** Null when heights come from a node. */
  readonly oracle: ManualHeightOracle | null;
  readonly logger?: Logger;
}

export function createDevRouter(deps: DevRouterDeps): Router {
  const logger = deps.logger ?? console;
  const router = Router();

  router.post('/faucet', (req: Request, res: Response) => {
    const body = readBody(req);
    const account = asString(body.account);
    const amount = asNumber(body.amount);
    if (!account) {
      res.status(400).json({ error: 'account is required' });
      return;
    }
    if (!Number.isSafeInteger(amount) || amount <= 0) {
      res.status(400).json({ error: 'amount is required (positive integer)' });
      return;
    }
    deps.ledger.credit(account, amount);
    logger.log(`  💰 Faucet: ${amount} to ${account}`);
    res.json({ account, balance: deps.ledger.balanceOf(account) });
  });

  router.post('/mine', (req: Request, res: Response) => {
    if (!deps.oracle) {
      res.status(400).json({ error: 'Heights come from bitcoind; mining is not available' });
      return;
    }
    const raw = readBody(req).blocks;
    const blocks = raw === undefined ? 1 : asNumber(raw);
    if (!Number.isSafeInteger(blocks) || blocks < 1) {
      res.status(400).json({ error: 'blocks must be a positive integer' });
      return;
    }
    res.json({ height: deps.oracle.mine(blocks) });
  });

  return router;
}
