/**
 * @file src/server/routes.ts
 * HTTP surface of the protocol, mounted under /api/v1.
 * Handlers parse and authenticate, then delegate to ProtocolServer.
 */

import { Router } from 'express';
import { z } from 'zod';
import { requestToBody } from '../protocol/types.js';
import type { AuthorizationApprovedBody, Permission } from '../protocol/types.js';
import {
  addTokenSchema,
  authorizationRequestSchema,
  contractParamSchema,
  signMessageSchema,
  transactionSchema,
  unlockSchema,
} from '../protocol/schemas.js';
import { AUDIT_EVENT_TYPES } from '../logger/audit.js';
import {
  asyncHandler,
  bearerToken,
  currentSession,
  parseBody,
  requireSession,
  walletLocalOnly,
} from './middleware.js';
import type { ProtocolServer } from './server.js';

const auditQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(50),
  event: z.enum(AUDIT_EVENT_TYPES).optional(),
});

export function createApiRouter(server: ProtocolServer): Router {
  const router = Router();
  const { sessions } = server;
  const touch = (): void => server.lock.touch();
  const session = (permission?: Permission) =>
    requireSession(sessions, permission, touch);
  const local = walletLocalOnly(server.adminToken);
  const requestTimeoutMs = server.requests.timeoutMs;

  // ── Wallet ────────────────────────────────────────────────────────────────

  router.get('/wallet/status', (_req, res) => {
    res.json(server.status());
  });

  router.get('/wallet/info', session('wallet_info'), (_req, res) => {
    res.json(server.walletInfo());
  });

  router.post('/wallet/unlock', (req, res) => {
    const { password } = parseBody(unlockSchema, req.body);
    server.unlock(password, req.ip ?? req.socket.remoteAddress ?? 'unknown');
    res.json({ status: 'unlocked' });
  });

  router.post('/wallet/lock', session(), (_req, res) => {
    server.lockWallet('manual');
    res.json({ status: 'locked' });
  });

  // ── Authorization ─────────────────────────────────────────────────────────

  router.post('/auth/request', (req, res) => {
    const input = parseBody(authorizationRequestSchema, req.body);
    const request = server.createAuthorizationRequest({
      appName: input.app_name,
      appUrl: input.app_url,
      permissions: input.permissions,
      description: input.description,
    });
    res.json(requestToBody(request, requestTimeoutMs));
  });

  router.get('/auth/status/:requestId', (req, res) => {
    const request = server.authorizationStatus(req.params['requestId'] ?? '');
    res.json(requestToBody(request, requestTimeoutMs));
  });

  router.get('/auth/pending', local, (_req, res) => {
    res.json({ requests: server.pendingRequests().map((r) => requestToBody(r, requestTimeoutMs)) });
  });

  router.post('/auth/approve/:requestId', local, (req, res) => {
    const approved = server.approveRequest(req.params['requestId'] ?? '');
    const body: AuthorizationApprovedBody = {
      session_token: approved.token,
      expires_at: new Date(approved.expiresAt).toISOString(),
      permissions: approved.permissions,
      status: 'approved',
    };
    res.json(body);
  });

  router.post('/auth/deny/:requestId', local, (req, res) => {
    const denied = server.denyRequest(req.params['requestId'] ?? '');
    res.json({ request_id: denied.requestId, status: denied.status });
  });

  router.post('/auth/revoke', session(), (req, res) => {
    server.revokeSession(bearerToken(req) ?? '');
    res.json({ status: 'revoked' });
  });

  // ── Scoped operations ─────────────────────────────────────────────────────

  router.get('/balance/:contract', session('balance'), asyncHandler(async (req, res) => {
    const contract = parseBody(contractParamSchema, req.params['contract']);
    res.json(await server.getBalance(contract));
  }));

  router.post('/transaction', session('transactions'), asyncHandler(async (req, res) => {
    const input = parseBody(transactionSchema, req.body);
    res.json(await server.sendTransaction(currentSession(req), input));
  }));

  router.post('/sign', session('sign_message'), asyncHandler(async (req, res) => {
    const { message } = parseBody(signMessageSchema, req.body);
    res.json(await server.signMessage(currentSession(req), message));
  }));

  router.post('/tokens/add', session('add_token'), (req, res) => {
    const input = parseBody(addTokenSchema, req.body);
    res.json({ success: true, token: server.addToken(currentSession(req), input) });
  });

  router.get('/tokens', session('wallet_info'), (_req, res) => {
    res.json({ tokens: server.listTokens() });
  });

  // ── Audit (wallet UI) ─────────────────────────────────────────────────────

  router.get('/audit', local, (req, res) => {
    const { limit, event } = parseBody(auditQuerySchema, req.query);
    res.json({ events: server.auditEvents(limit, event) });
  });

  return router;
}
