// src/routes/http.ts — shared request/response helpers for the API routers

import type { NextFunction, Request, Response } from 'express';
import { EscrowError, type EscrowErrorCode } from '../utils/validation';
import { AuthError, type AuthenticatedRequest } from '../services/nostr-auth';
import type { Logger } from '../types/escrow';

const STATUS_BY_CODE: Record<EscrowErrorCode, number> = {
  NotAuthorized: 403,
  NotFound: 404,
  AlreadyFinalized: 409,
  InvalidAmount: 400,
  InvalidHeight: 400,
  HeightNotReached: 409,
  InvalidSecret: 400,
  AlreadyExpired: 409,
  InsufficientBalance: 402,
  DuplicateId: 409,
  InvalidHash: 400,
  TransferFailed: 502,
  TransitionInProgress: 409,
  InvalidIdentity: 400
};

export const statusFor = (code: EscrowErrorCode): number => STATUS_BY_CODE[code];

export function sendError(res: Response, err: unknown, logger: Logger, route: string): void {
  if (err instanceof EscrowError) {
    res.status(statusFor(err.code)).json({
      error: err.message,
      code: err.code,
      errorNumber: err.errorNumber,
      ...(err.field ? { field: err.field } : {})
    });
    return;
  }
  if (err instanceof AuthError) {
    res.status(err.status).json({ error: err.message, code: err.code });
    return;
  }
  logger.error(`${route} error:`, err);
  res.status(500).json({ error: err instanceof Error ? err.message : 'Internal error' });
}

/** JSON body as a plain record; anything else reads as empty. */
export function readBody(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) return {};
  return { ...body };
}

export const asString = (value: unknown): string => (typeof value === 'string' ? value : '');

export const asNumber = (value: unknown): number => (typeof value === 'number' ? value : Number.NaN);

// ── Rate Limiter (per pubkey) ─────────────────────────────────────────────

export const RATE_WINDOW_MS = 60_000;

export function rateLimit(limit: number, now: () => number = Date.now) {
  const windows = new Map<string, { count: number; resetAt: number }>();

  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const key = req.pubkey ?? req.ip ?? 'anonymous';
    const t = now();
    let entry = windows.get(key);
    if (!entry || t > entry.resetAt) {
      entry = { count: 0, resetAt: t + RATE_WINDOW_MS };
      windows.set(key, entry);
    }
    entry.count++;
    if (entry.count > limit) {
      res.status(429).json({ error: `Rate limit exceeded (${limit}/min). Try again later.` });
      return;
    }
    next();
  };
}
