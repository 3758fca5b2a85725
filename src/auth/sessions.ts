/**
 * @file src/auth/sessions.ts
 *
 * SessionStore: live, permission-scoped sessions keyed by bearer token.
 *
 * Every method is synchronous. On the single Node.js event loop that makes each
 * check-and-set (capacity check + insert, expiry check + evict) atomic with
 * respect to concurrent HTTP requests.
 */

import * as crypto from 'node:crypto';
import { ProtocolDefaults, ProtocolError } from '../protocol/types.js';
import type { AuthorizationRequest, Permission, Session } from '../protocol/types.js';

export interface SessionStoreOptions {
  maxSessions?: number;
  /** Absolute lifetime of a session. */
  timeoutMs?: number;
  /** Optional inactivity limit; undefined disables it. */
  idleTimeoutMs?: number;
}

const TOKEN_BYTES = 32;

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  readonly maxSessions: number;
  readonly timeoutMs: number;
  readonly idleTimeoutMs: number | undefined;

  constructor(options: SessionStoreOptions = {}) {
    this.maxSessions = options.maxSessions ?? ProtocolDefaults.maxSessions;
    this.timeoutMs = options.timeoutMs ?? ProtocolDefaults.sessionTimeoutMinutes * 60_000;
    this.idleTimeoutMs = options.idleTimeoutMs;
  }

  /**
   * Mints a session carrying the request's permissions.
   * Throws MAX_SESSIONS_EXCEEDED when the store is full; nothing is evicted.
   */
  create(request: Pick<AuthorizationRequest, 'appName' | 'appUrl' | 'permissions'>, now: number = Date.now()): Session {
    this.sweepExpired(now);
    if (this.sessions.size >= this.maxSessions) {
      throw new ProtocolError(
        'MAX_SESSIONS_EXCEEDED',
        `Maximum number of sessions (${this.maxSessions}) reached`,
      );
    }

    let token = generateToken();
    while (this.sessions.has(token)) token = generateToken();

    const session: Session = {
      token,
      appName: request.appName,
      appUrl: request.appUrl,
      permissions: [...request.permissions],
      createdAt: now,
      expiresAt: now + this.timeoutMs,
      lastActivity: now,
    };
    this.sessions.set(token, session);
    return session;
  }

  /**
   * Resolves a bearer token to its session and refreshes `lastActivity`.
   * Expired sessions are evicted on the spot.
   */
  validate(token: string | undefined, requiredPermission?: Permission, now: number = Date.now()): Session {
    if (!token) {
      throw new ProtocolError('UNAUTHORIZED', 'Missing session token');
    }
    const session = this.sessions.get(token);
    if (!session) {
      throw new ProtocolError('UNAUTHORIZED', 'Invalid session token');
    }
    if (this.isExpired(session, now)) {
      this.sessions.delete(token);
      throw new ProtocolError('SESSION_EXPIRED', 'Session has expired');
    }
    if (requiredPermission && !session.permissions.includes(requiredPermission)) {
      throw new ProtocolError('FORBIDDEN', `Session lacks the '${requiredPermission}' permission`);
    }
    session.lastActivity = now;
    return session;
  }

  /** Idempotent. Returns whether a session was actually removed. */
  revoke(token: string): boolean {
    return this.sessions.delete(token);
  }

  /** Evicts expired sessions and returns them. */
  sweepExpired(now: number = Date.now()): Session[] {
    const expired: Session[] = [];
    for (const [token, session] of this.sessions) {
      if (this.isExpired(session, now)) {
        this.sessions.delete(token);
        expired.push(session);
      }
    }
    return expired;
  }

  list(): Session[] {
    return [...this.sessions.values()];
  }

  clear(): void {
    this.sessions.clear();
  }

  get size(): number {
    return this.sessions.size;
  }

  private isExpired(session: Session, now: number): boolean {
    if (now >= session.expiresAt) return true;
    return this.idleTimeoutMs !== undefined && now - session.lastActivity >= this.idleTimeoutMs;
  }
}

function generateToken(): string {
  return crypto.randomBytes(TOKEN_BYTES).toString('base64url');
}
