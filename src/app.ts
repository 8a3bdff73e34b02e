// src/app.ts

import express, { type Express } from 'express';
import cors from 'cors';
import { EscrowManager } from './core/escrow-manager';
import { EscrowQueries } from './core/escrow-queries';
import { NostrAuthService } from './services/nostr-auth';
import type { ManualHeightOracle } from './services/height-oracle';
import type { EscrowRepository } from './store/repository';
import type { HeightOracle, Ledger } from './types/ledger';
import type { Identity, Logger } from './types/escrow';
import { createEscrowRouter } from './routes/escrow';
import { createDevRouter, type CreditableLedger } from './routes/dev';

export interface AppDeps {
  readonly repository: EscrowRepository;
  readonly ledger: Ledger & CreditableLedger;
  readonly oracle: HeightOracle;
  /** Set when heights are advanced by hand; enables POST /api/dev/mine. */
  readonly manualOracle?: ManualHeightOracle;
  readonly owner: Identity;
  readonly holdingAccount: Identity;
  readonly production: boolean;
  readonly rateLimitPerMin: number;
  readonly authMaxSkewSecs?: number;
  readonly logger?: Logger;
}

export interface EscrowApp {
  readonly app: Express;
  readonly manager: EscrowManager;
  readonly queries: EscrowQueries;
}

export function createApp(deps: AppDeps): EscrowApp {
  const logger = deps.logger ?? console;
  const core = {
    repository: deps.repository,
    ledger: deps.ledger,
    oracle: deps.oracle,
    owner: deps.owner,
    holdingAccount: deps.holdingAccount
  };
  const manager = new EscrowManager({ ...core, logger });
  const queries = new EscrowQueries(core);
  const auth = new NostrAuthService({
    allowDevHeader: !deps.production,
    maxSkewSeconds: deps.authMaxSkewSecs
  });

  const app = express();
  app.use(express.json());
  app.use(cors({
    origin: '*',
    methods: ['GET', 'POST'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-Dev-Pubkey']
  }));

  app.get('/api/health', (_req, res) => {
    res.json({ status: 'ok', height: deps.oracle.currentHeight(), timestamp: Date.now() });
  });

  app.use('/api/escrows', createEscrowRouter({
    manager,
    queries,
    auth,
    rateLimitPerMin: deps.rateLimitPerMin,
    logger
  }));

  if (!deps.production) {
    app.use('/api/dev', createDevRouter({
      ledger: deps.ledger,
      oracle: deps.manualOracle ?? null,
      logger
    }));
  }

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  return { app, manager, queries };
}
