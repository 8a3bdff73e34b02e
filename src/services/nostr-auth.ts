// src/services/nostr-auth.ts
//
// Resolves the calling identity of an HTTP request. Production callers send
// a NIP-98 event (kind 27235) signed with their Nostr key; outside
// production an X-Dev-Pubkey header is accepted as-is.

import type { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Event as NostrEvent } from 'nostr-tools';
import { verifyEvent } from 'nostr-tools/pure';
import type { Identity } from '../types/escrow';
import { isPubkey } from '../utils/validation';

export const NIP98_KIND = 27235;

export class AuthError extends Error {
  readonly status = 401;

  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'AuthError';
  }
}

export interface NostrAuthOptions {
  readonly allowDevHeader: boolean;
  readonly maxSkewSeconds?: number;
  /** Unix seconds. */
  readonly now?: () => number;
}

export interface AuthenticatedRequest extends Request {
  pubkey?: Identity;
}

const isStringArray = (value: unknown): value is string[] =>
  Array.isArray(value) && value.every(v => typeof v === 'string');

function isNostrEvent(value: unknown): value is NostrEvent {
  if (typeof value !== 'object' || value === null) return false;
  const e: Record<string, unknown> = { ...value };
  return (
    typeof e.id === 'string' &&
    typeof e.pubkey === 'string' &&
    typeof e.sig === 'string' &&
    typeof e.content === 'string' &&
    typeof e.kind === 'number' &&
    typeof e.created_at === 'number' &&
    Array.isArray(e.tags) &&
    e.tags.every(isStringArray)
  );
}

export class NostrAuthService {
  private readonly maxSkewSeconds: number;
  private readonly now: () => number;

  constructor(private readonly options: NostrAuthOptions) {
    this.maxSkewSeconds = options.maxSkewSeconds ?? 120;
    this.now = options.now ?? (() => Math.floor(Date.now() / 1000));
  }

  /** Identity of the principal that sent `req`. Throws AuthError. */
  callerOf(req: Request): Identity {
    const authHeader = req.headers.authorization;
    if (authHeader && authHeader.startsWith('Nostr ')) {
      return this.verifyNip98(authHeader.slice(6), req.method);
    }

    const devPubkey = req.headers['x-dev-pubkey'];
    if (typeof devPubkey === 'string' && this.options.allowDevHeader) {
      if (!isPubkey(devPubkey)) {
        throw new AuthError('Invalid dev pubkey (must be 64 lowercase hex chars)', 'INVALID_DEV_PUBKEY');
      }
      return devPubkey;
    }

    throw new AuthError(
      this.options.allowDevHeader
        ? 'Authentication required. Send NIP-98 Authorization header or X-Dev-Pubkey.'
        : 'Authentication required. Send NIP-98 Authorization header.',
      'AUTH_REQUIRED'
    );
  }

  middleware(): RequestHandler {
    return (req: AuthenticatedRequest, res: Response, next: NextFunction) => {
      try {
        req.pubkey = this.callerOf(req);
        next();
      } catch (err) {
        if (err instanceof AuthError) {
          res.status(err.status).json({ error: err.message, code: err.code });
          return;
        }
        next(err);
      }
    };
  }

  private verifyNip98(encoded: string, method: string): Identity {
    let parsed: unknown;
    try {
      parsed = JSON.parse(Buffer.from(encoded, 'base64').toString('utf8'));
    } catch {
      throw new AuthError('Malformed NIP-98 auth header', 'MALFORMED_AUTH');
    }

    if (!isNostrEvent(parsed)) throw new AuthError('Malformed NIP-98 auth event', 'MALFORMED_AUTH');
    const event = parsed;

    if (event.kind !== NIP98_KIND) {
      throw new AuthError(`Invalid auth event kind (expected ${NIP98_KIND})`, 'INVALID_KIND');
    }
    if (Math.abs(this.now() - event.created_at) > this.maxSkewSeconds) {
      throw new AuthError(`Auth event expired (>${this.maxSkewSeconds}s)`, 'EXPIRED');
    }

    const methodTag = event.tags.find(t => t[0] === 'method');
    if (methodTag && methodTag[1]?.toUpperCase() !== method.toUpperCase()) {
      throw new AuthError('Auth method mismatch', 'METHOD_MISMATCH');
    }
    if (!isPubkey(event.pubkey)) {
      throw new AuthError('Invalid pubkey in auth event', 'INVALID_PUBKEY');
    }
    if (!verifyEvent(event)) {
      throw new AuthError('Invalid signature — Schnorr verification failed', 'INVALID_SIGNATURE');
    }

    return event.pubkey;
  }
}

/** Pubkey set by NostrAuthService.middleware. */
export function requireCaller(req: AuthenticatedRequest): Identity {
  if (!req.pubkey) throw new AuthError('Request was not authenticated', 'AUTH_REQUIRED');
  return req.pubkey;
}
