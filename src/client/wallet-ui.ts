/**
 * @file src/client/wallet-ui.ts
 * Client for the wallet's own user interface: lists pending authorization
 * requests, approves or denies them, reads the audit log and follows the push
 * channel. The server only answers these calls from loopback peers, and also
 * wants the admin token when one is configured.
 */

import { DEFAULT_HOST, DEFAULT_PORT, WALLET_TOKEN_HEADER } from '../protocol/types.js';
import type { AuditEventType } from '../logger/audit.js';
import { createComponentLogger, getRootLogger, type Logger } from '../logger/logger.js';
import { HttpTransport, type PushListener, type PushSubscription } from './http.js';
import {
  approvedSchema,
  auditListSchema,
  deniedSchema,
  pendingListSchema,
  statusMessageSchema,
  walletStatusSchema,
  type ApprovedSession,
  type AuditEntry,
  type AuthorizationRequestView,
  type WalletStatus,
} from './schemas.js';

export interface WalletUiClientOptions {
  serverUrl?: string;
  adminToken?: string;
  timeoutMs?: number;
  logger?: Logger;
}

export interface AuditLogQuery {
  limit?: number;
  event?: AuditEventType;
}

export class WalletUiClient {
  private readonly transport: HttpTransport;
  private readonly logger: Logger;

  constructor(options: WalletUiClientOptions = {}) {
    this.transport = new HttpTransport({
      serverUrl: options.serverUrl ?? `http://${DEFAULT_HOST}:${DEFAULT_PORT}`,
      timeoutMs: options.timeoutMs ?? 10_000,
      headers: options.adminToken ? { [WALLET_TOKEN_HEADER]: options.adminToken } : undefined,
    });
    this.logger = createComponentLogger(options.logger ?? getRootLogger(), 'wallet-ui');
  }

  get serverUrl(): string {
    return this.transport.serverUrl;
  }

  status(): Promise<WalletStatus> {
    return this.transport.request('GET', '/wallet/status', walletStatusSchema);
  }

  listPending(): Promise<AuthorizationRequestView[]> {
    return this.transport.request('GET', '/auth/pending', pendingListSchema);
  }

  approve(requestId: string): Promise<ApprovedSession> {
    return this.transport.request('POST', `/auth/approve/${encodeURIComponent(requestId)}`, approvedSchema, { body: {} });
  }

  async deny(requestId: string): Promise<void> {
    await this.transport.request('POST', `/auth/deny/${encodeURIComponent(requestId)}`, deniedSchema, { body: {} });
  }

  async unlock(password: string): Promise<void> {
    await this.transport.request('POST', '/wallet/unlock', statusMessageSchema, { body: { password } });
  }

  auditLog(query: AuditLogQuery = {}): Promise<AuditEntry[]> {
    const params = new URLSearchParams();
    if (query.limit !== undefined) params.set('limit', String(query.limit));
    if (query.event !== undefined) params.set('event', query.event);
    const qs = params.toString();
    return this.transport.request('GET', qs ? `/audit?${qs}` : '/audit', auditListSchema);
  }

  /** The first event on a new subscription is always `pending_requests`. */
  subscribe(listener: PushListener, onClose?: () => void): Promise<PushSubscription> {
    return this.transport.subscribe(listener, { logger: this.logger, onClose });
  }
}
