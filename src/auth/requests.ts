/**
 * @file src/auth/requests.ts
 *
 * RequestRegistry: authorization requests from DApps awaiting a user decision.
 *
 * Lifecycle: pending → approved | denied | expired. A request is acted on at
 * most once. Approved and denied records stay readable until the DApp collects
 * the outcome with a status poll, or for one request window after the
 * decision. An approval nobody collected in that time has its session revoked.
 *
 * As in SessionStore, every method is synchronous so each transition is atomic
 * on the event loop: two approvals of one id cannot both observe `pending`.
 */

import * as crypto from 'node:crypto';
import { ProtocolDefaults, ProtocolError, normalisePermissions } from '../protocol/types.js';
import type { AuthorizationRequest, Session } from '../protocol/types.js';
import type { SessionStore } from './sessions.js';

export interface NewAuthorizationRequest {
  appName: string;
  appUrl: string;
  permissions: readonly string[];
  description?: string;
}

export interface RequestListener {
  onRequestCreated(request: AuthorizationRequest): void;
  /** An approval was never collected; its session has been revoked. */
  onApprovalAbandoned?(request: AuthorizationRequest): void;
}

export interface RequestRegistryOptions {
  maxPending?: number;
  timeoutMs?: number;
  listener?: RequestListener;
}

export class RequestRegistry {
  private readonly pending = new Map<string, AuthorizationRequest>();
  private readonly resolved = new Map<string, AuthorizationRequest>();
  readonly maxPending: number;
  readonly timeoutMs: number;
  private readonly listener: RequestListener | undefined;

  constructor(
    private readonly sessions: SessionStore,
    options: RequestRegistryOptions = {},
  ) {
    this.maxPending = options.maxPending ?? ProtocolDefaults.maxPendingRequests;
    this.timeoutMs = options.timeoutMs ?? ProtocolDefaults.requestTimeoutMinutes * 60_000;
    this.listener = options.listener;
  }

  create(input: NewAuthorizationRequest, now: number = Date.now()): AuthorizationRequest {
    const permissions = normalisePermissions(input.permissions);
    if (this.pending.size >= this.maxPending) {
      throw new ProtocolError(
        'TOO_MANY_PENDING_REQUESTS',
        `Too many pending authorization requests (max ${this.maxPending})`,
      );
    }

    let requestId = crypto.randomUUID();
    while (this.pending.has(requestId) || this.resolved.has(requestId)) requestId = crypto.randomUUID();

    const request: AuthorizationRequest = {
      requestId,
      appName: input.appName,
      appUrl: input.appUrl,
      permissions,
      createdAt: now,
      status: 'pending',
    };
    if (input.description !== undefined) request.description = input.description;

    this.pending.set(requestId, request);
    this.listener?.onRequestCreated({ ...request });
    return request;
  }

  getStatus(requestId: string): AuthorizationRequest {
    const request = this.pending.get(requestId) ?? this.resolved.get(requestId);
    if (!request) {
      throw new ProtocolError('NOT_FOUND', `Authorization request ${requestId} not found`);
    }
    return request;
  }

  /**
   * Approves a pending request and mints its session. When the session store
   * is full the request stays pending and MAX_SESSIONS_EXCEEDED propagates.
   */
  approve(requestId: string, now: number = Date.now()): Session {
    const request = this.requirePending(requestId);
    const session = this.sessions.create(request, now);

    request.status = 'approved';
    request.resolvedAt = now;
    request.sessionToken = session.token;
    request.sessionExpiresAt = session.expiresAt;
    this.pending.delete(requestId);
    this.resolved.set(requestId, request);
    return session;
  }

  deny(requestId: string, now: number = Date.now()): AuthorizationRequest {
    const request = this.requirePending(requestId);
    request.status = 'denied';
    request.resolvedAt = now;
    this.pending.delete(requestId);
    this.resolved.set(requestId, request);
    return request;
  }

  /** Drops a resolved record once its outcome has been delivered. */
  consume(requestId: string): boolean {
    return this.resolved.delete(requestId);
  }

  /** Pending requests in arrival order. */
  listPending(): AuthorizationRequest[] {
    return [...this.pending.values()];
  }

  /**
   * Expires pending requests older than the window and drops outcomes left
   * uncollected for a window after their decision. Returns the requests that
   * just expired.
   */
  sweepExpired(now: number = Date.now()): AuthorizationRequest[] {
    const expired: AuthorizationRequest[] = [];
    for (const [id, request] of this.pending) {
      if (now - request.createdAt >= this.timeoutMs) {
        request.status = 'expired';
        this.pending.delete(id);
        expired.push(request);
      }
    }
    for (const [id, request] of this.resolved) {
      if (now - (request.resolvedAt ?? request.createdAt) < this.timeoutMs) continue;
      this.resolved.delete(id);
      if (request.status === 'approved' && request.sessionToken && this.sessions.revoke(request.sessionToken)) {
        this.listener?.onApprovalAbandoned?.(request);
      }
    }
    return expired;
  }

  clear(): void {
    this.pending.clear();
    this.resolved.clear();
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  private requirePending(requestId: string): AuthorizationRequest {
    const request = this.pending.get(requestId);
    if (request) return request;
    const resolved = this.resolved.get(requestId);
    if (resolved) {
      throw new ProtocolError(
        'INVALID_STATE',
        `Authorization request ${requestId} is already ${resolved.status}`,
      );
    }
    throw new ProtocolError('NOT_FOUND', `Authorization request ${requestId} not found`);
  }
}
