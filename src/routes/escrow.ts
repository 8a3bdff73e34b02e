// src/routes/escrow.ts — escrow API
//
//   POST /               create (sender = caller)
//   POST /:id/claim      recipient reveals the secret at/after unlock height
//   POST /:id/refund     sender reclaims at/after unlock height
//   POST /:id/cancel     owner cancels before unlock height
//   GET  /               escrows where the caller is sender or recipient
//   GET  /stats          totals, holding balance, height, owner
//   GET  /:id            record (404 when absent)
//   GET  /:id/status     status projection (never 404)
//   GET  /:id/can-claim, /:id/can-refund

import { Router, type Response } from 'express';
import type { EscrowManager } from '../core/escrow-manager';
import { toView, type EscrowQueries } from '../core/escrow-queries';
import type { Logger } from '../types/escrow';
import {
  requireCaller,
  type AuthenticatedRequest,
  type NostrAuthService
} from '../services/nostr-auth';
import { parseEscrowId, validatePubkey } from '../utils/validation';
import { asNumber, asString, rateLimit, readBody, sendError } from './http';

export interface EscrowRouterDeps {
  readonly manager: EscrowManager;
  readonly queries: EscrowQueries;
  readonly auth: NostrAuthService;
  readonly rateLimitPerMin: number;
  readonly logger?: Logger;
}

export function createEscrowRouter(deps: EscrowRouterDeps): Router {
  const { manager, queries } = deps;
  const logger = deps.logger ?? console;
  const router = Router();
  router.use(deps.auth.middleware());
  router.use(rateLimit(deps.rateLimitPerMin));

  /** Unknown or malformed ids answer 404 the same way. */
  const withId = (req: AuthenticatedRequest, res: Response): number | null => {
    const id = parseEscrowId(req.params.id ?? '');
    if (id === null) res.status(404).json({ error: 'Escrow not found', code: 'NotFound' });
    return id;
  };

  // ── POST / — Create ──────────────────────────────────────────────────────

  router.post('/', (req: AuthenticatedRequest, res: Response) => {
    try {
      const body = readBody(req);
      const caller = requireCaller(req);
      // Over HTTP every participant is a Nostr key; the engine itself accepts any identity.
      const recipient = asString(body.recipient);
      validatePubkey(recipient, 'recipient');
      const id = manager.create(caller, {
        recipient,
        amount: asNumber(body.amount),
        blocksAhead: asNumber(body.blocksAhead),
        secretHash: asString(body.secretHash)
      });
      const view = queries.get(id);
      res.status(201).json({ ...view, id, yourRole: 'sender' });
    } catch (err) {
      sendError(res, err, logger, 'POST /');
    }
  });

  // ── Transitions ──────────────────────────────────────────────────────────

  router.post('/:id/claim', (req: AuthenticatedRequest, res: Response) => {
    const id = withId(req, res);
    if (id === null) return;
    try {
      const record = manager.claim(requireCaller(req), id, asString(readBody(req).secret));
      res.json(toView(record));
    } catch (err) {
      sendError(res, err, logger, 'POST /claim');
    }
  });

  router.post('/:id/refund', (req: AuthenticatedRequest, res: Response) => {
    const id = withId(req, res);
    if (id === null) return;
    try {
      res.json(toView(manager.refund(requireCaller(req), id)));
    } catch (err) {
      sendError(res, err, logger, 'POST /refund');
    }
  });

  router.post('/:id/cancel', (req: AuthenticatedRequest, res: Response) => {
    const id = withId(req, res);
    if (id === null) return;
    try {
      res.json(toView(manager.emergencyCancel(requireCaller(req), id)));
    } catch (err) {
      sendError(res, err, logger, 'POST /cancel');
    }
  });

  // ── Queries ──────────────────────────────────────────────────────────────

  router.get('/', (req: AuthenticatedRequest, res: Response) => {
    try {
      res.json(queries.listByParticipant(requireCaller(req)));
    } catch (err) {
      sendError(res, err, logger, 'GET /');
    }
  });

  router.get('/stats', (_req: AuthenticatedRequest, res: Response) => {
    res.json(queries.stats());
  });

  router.get('/:id', (req: AuthenticatedRequest, res: Response) => {
    const id = withId(req, res);
    if (id === null) return;
    const view = queries.get(id);
    if (!view) {
      res.status(404).json({ error: 'Escrow not found', code: 'NotFound' });
      return;
    }
    res.json(view);
  });

  router.get('/:id/status', (req: AuthenticatedRequest, res: Response) => {
    const id = parseEscrowId(req.params.id ?? '');
    res.json({ id, ...queries.status(id ?? 0) });
  });

  router.get('/:id/can-claim', (req: AuthenticatedRequest, res: Response) => {
    const id = parseEscrowId(req.params.id ?? '');
    res.json({ id, canClaim: id !== null && queries.canClaim(id) });
  });

  router.get('/:id/can-refund', (req: AuthenticatedRequest, res: Response) => {
    const id = parseEscrowId(req.params.id ?? '');
    res.json({ id, canRefund: id !== null && queries.canRefund(id) });
  });

  return router;
}
