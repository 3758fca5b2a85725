/**
 * @file src/server/middleware.ts
 * Express middleware shared by the API routes: bearer-session authentication,
 * the wallet-local guard, body validation and the JSON error mapper.
 */

import * as crypto from 'node:crypto';
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import type { ZodType, ZodTypeDef } from 'zod';
import { ProtocolError, WALLET_TOKEN_HEADER } from '../protocol/types.js';
import type { Permission, Session } from '../protocol/types.js';
import { describeIssues } from '../protocol/schemas.js';
import type { SessionStore } from '../auth/sessions.js';
import type { Logger } from '../logger/logger.js';

declare global {
  namespace Express {
    interface Request {
      /** Set by requireSession() once the bearer token checks out. */
      walletSession?: Session;
    }
  }
}

// ── Async handlers ────────────────────────────────────────────────────────────

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** Express 4 ignores returned promises; route rejections to next(). */
export function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

// ── Authentication ────────────────────────────────────────────────────────────

export function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)$/i.exec(header);
  return match?.[1];
}

/**
 * Validates the bearer session and, when given, the permission the route needs.
 * `onAuthenticated` runs after every successful check (used to reset auto-lock).
 */
export function requireSession(
  sessions: SessionStore,
  permission?: Permission,
  onAuthenticated?: (session: Session) => void,
): RequestHandler {
  return (req, _res, next) => {
    req.walletSession = sessions.validate(bearerToken(req), permission);
    onAuthenticated?.(req.walletSession);
    next();
  };
}

export function currentSession(req: Request): Session {
  if (!req.walletSession) {
    throw new ProtocolError('UNAUTHORIZED', 'Missing session token');
  }
  return req.walletSession;
}

// ── Wallet-local guard ────────────────────────────────────────────────────────

const LOOPBACK = new Set(['127.0.0.1', '::1', '::ffff:127.0.0.1']);

export function isLoopback(address: string | undefined): boolean {
  if (!address) return false;
  return LOOPBACK.has(address) || address.startsWith('127.');
}

/**
 * Checks a wallet-local caller: loopback peer address and, when an admin token
 * is configured, a matching X-Wallet-Token header.
 */
export function checkWalletLocal(
  remoteAddress: string | undefined,
  presentedToken: string | string[] | undefined,
  adminToken?: string,
): void {
  if (!isLoopback(remoteAddress)) {
    throw new ProtocolError('FORBIDDEN', 'This endpoint is only available to the local wallet');
  }
  if (adminToken === undefined) return;
  const token = Array.isArray(presentedToken) ? presentedToken[0] : presentedToken;
  if (!token || !safeEqual(token, adminToken)) {
    throw new ProtocolError('UNAUTHORIZED', 'Missing or invalid wallet token');
  }
}

export function walletLocalOnly(adminToken?: string): RequestHandler {
  return (req, _res, next) => {
    checkWalletLocal(req.socket.remoteAddress, req.headers[WALLET_TOKEN_HEADER], adminToken);
    next();
  };
}

function safeEqual(a: string, b: string): boolean {
  const left = crypto.createHash('sha256').update(a).digest();
  const right = crypto.createHash('sha256').update(b).digest();
  return crypto.timingSafeEqual(left, right);
}

// ── Validation ────────────────────────────────────────────────────────────────

export function parseBody<Output, Input>(schema: ZodType<Output, ZodTypeDef, Input>, body: unknown): Output {
  const result = schema.safeParse(body ?? {});
  if (!result.success) {
    throw new ProtocolError('INVALID_REQUEST', 'Invalid request body', {
      details: describeIssues(result.error),
    });
  }
  return result.data;
}

// ── Errors ────────────────────────────────────────────────────────────────────

export function sendError(res: Response, error: ProtocolError): void {
  if (error.retryAfterSeconds !== undefined) {
    res.setHeader('Retry-After', String(error.retryAfterSeconds));
  }
  res.status(error.status).json(error.toBody());
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

export function notFoundHandler(): RequestHandler {
  return (req, res) => {
    sendError(res, new ProtocolError('NOT_FOUND', `No route for ${req.method} ${req.path}`));
  };
}

/** Maps every thrown error onto `{ error, code, details? }` with its HTTP status. */
export function errorHandler(logger: Logger): ErrorRequestHandler {
  return (err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      next(err);
      return;
    }
    if (err instanceof ProtocolError) {
      logger.debug({ code: err.code, path: req.path }, err.message);
      sendError(res, err);
      return;
    }
    if (isBodyParseError(err)) {
      sendError(res, new ProtocolError('INVALID_REQUEST', 'Malformed JSON body'));
      return;
    }
    logger.error({ err, path: req.path }, 'Unhandled error in request handler');
    res.status(StatusCodes.INTERNAL_SERVER_ERROR).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
  };
}
