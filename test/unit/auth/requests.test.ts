/**
 * Unit tests for src/auth/requests.ts
 *
 * Test gates:
 *  ✅ create() validates permissions, enforces the pending cap and notifies the listener
 *  ✅ a request is approved or denied at most once
 *  ✅ approve() mints a session; a full session store leaves the request pending
 *  ✅ sweepExpired() expires old pending requests and forgets stale outcomes
 *  ✅ an approval nobody collected has its session revoked
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { RequestRegistry } from '../../../src/auth/requests.js';
import { SessionStore } from '../../../src/auth/sessions.js';
import { ProtocolError } from '../../../src/protocol/types.js';

const T0 = 1_700_000_000_000;
const FIVE_MIN = 5 * 60_000;

const input = {
  appName: 'Test DApp',
  appUrl: 'http://localhost:3000',
  permissions: ['wallet_info', 'balance'],
};

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof ProtocolError) return err.code;
    throw err;
  }
  return 'none';
}

describe('RequestRegistry', () => {
  let sessions: SessionStore;
  let registry: RequestRegistry;
  const onRequestCreated = vi.fn();

  beforeEach(() => {
    onRequestCreated.mockReset();
    sessions = new SessionStore({ maxSessions: 2 });
    registry = new RequestRegistry(sessions, {
      maxPending: 3,
      timeoutMs: FIVE_MIN,
      listener: { onRequestCreated },
    });
  });

  // ── create ──────────────────────────────────────────────────────────────────

  it('GATE: creates a pending request with a UUID id', () => {
    const request = registry.create(input, T0);
    expect(request.requestId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(request.status).toBe('pending');
    expect(request.createdAt).toBe(T0);
    expect(registry.pendingCount).toBe(1);
  });

  it('deduplicates permissions in first-seen order', () => {
    const request = registry.create({ ...input, permissions: ['balance', 'wallet_info', 'balance'] }, T0);
    expect(request.permissions).toEqual(['balance', 'wallet_info']);
  });

  it('rejects an unknown permission with INVALID_REQUEST', () => {
    expect(codeOf(() => registry.create({ ...input, permissions: ['steal_funds'] }, T0))).toBe('INVALID_REQUEST');
    expect(registry.pendingCount).toBe(0);
  });

  it('keeps the description only when given', () => {
    expect(registry.create(input, T0)).not.toHaveProperty('description');
    expect(registry.create({ ...input, description: 'Show my balance' }, T0).description).toBe('Show my balance');
  });

  it('notifies the listener with a copy of each new request', () => {
    const request = registry.create(input, T0);
    expect(onRequestCreated).toHaveBeenCalledTimes(1);
    expect(onRequestCreated.mock.calls[0]?.[0]).toEqual(request);
    expect(onRequestCreated.mock.calls[0]?.[0]).not.toBe(request);
  });

  it('GATE: refuses more than maxPending requests with TOO_MANY_PENDING_REQUESTS', () => {
    for (let i = 0; i < 3; i++) registry.create(input, T0);
    expect(codeOf(() => registry.create(input, T0))).toBe('TOO_MANY_PENDING_REQUESTS');
    expect(onRequestCreated).toHaveBeenCalledTimes(3);
  });

  it('lists pending requests in arrival order', () => {
    const a = registry.create(input, T0);
    const b = registry.create({ ...input, appName: 'Second' }, T0 + 1);
    expect(registry.listPending().map((r) => r.requestId)).toEqual([a.requestId, b.requestId]);
  });

  // ── approve / deny ──────────────────────────────────────────────────────────

  it('GATE: approve() mints a session with the requested permissions', () => {
    const request = registry.create(input, T0);
    const session = registry.approve(request.requestId, T0 + 10);
    expect(session.permissions).toEqual(['wallet_info', 'balance']);
    expect(session.appName).toBe('Test DApp');
    expect(sessions.size).toBe(1);

    const status = registry.getStatus(request.requestId);
    expect(status.status).toBe('approved');
    expect(status.sessionToken).toBe(session.token);
    expect(status.sessionExpiresAt).toBe(session.expiresAt);
    expect(registry.pendingCount).toBe(0);
  });

  it('GATE: a second decision on the same request is INVALID_STATE', () => {
    const request = registry.create(input, T0);
    registry.approve(request.requestId, T0);
    expect(codeOf(() => registry.approve(request.requestId, T0))).toBe('INVALID_STATE');
    expect(codeOf(() => registry.deny(request.requestId))).toBe('INVALID_STATE');
    expect(sessions.size).toBe(1);
  });

  it('deny() marks the request denied without a session', () => {
    const request = registry.create(input, T0);
    const denied = registry.deny(request.requestId);
    expect(denied.status).toBe('denied');
    expect(denied.sessionToken).toBeUndefined();
    expect(sessions.size).toBe(0);
  });

  it('unknown ids are NOT_FOUND', () => {
    expect(codeOf(() => registry.getStatus('missing'))).toBe('NOT_FOUND');
    expect(codeOf(() => registry.approve('missing'))).toBe('NOT_FOUND');
    expect(codeOf(() => registry.deny('missing'))).toBe('NOT_FOUND');
  });

  it('GATE: leaves the request pending when the session store is full', () => {
    registry.approve(registry.create(input, T0).requestId, T0);
    registry.approve(registry.create(input, T0).requestId, T0);
    const third = registry.create(input, T0);
    expect(codeOf(() => registry.approve(third.requestId, T0))).toBe('MAX_SESSIONS_EXCEEDED');
    expect(registry.getStatus(third.requestId).status).toBe('pending');
  });

  it('consume() forgets a resolved request once', () => {
    const request = registry.create(input, T0);
    registry.deny(request.requestId);
    expect(registry.consume(request.requestId)).toBe(true);
    expect(registry.consume(request.requestId)).toBe(false);
    expect(codeOf(() => registry.getStatus(request.requestId))).toBe('NOT_FOUND');
  });

  // ── sweep ───────────────────────────────────────────────────────────────────

  it('GATE: sweepExpired() expires pending requests at the timeout', () => {
    const old = registry.create(input, T0);
    const young = registry.create(input, T0 + 60_000);
    expect(registry.sweepExpired(T0 + FIVE_MIN - 1)).toEqual([]);

    const expired = registry.sweepExpired(T0 + FIVE_MIN);
    expect(expired.map((r) => r.requestId)).toEqual([old.requestId]);
    expect(expired[0]?.status).toBe('expired');
    expect(codeOf(() => registry.getStatus(old.requestId))).toBe('NOT_FOUND');
    expect(registry.getStatus(young.requestId).status).toBe('pending');
  });

  it('an expired request can no longer be approved', () => {
    const request = registry.create(input, T0);
    registry.sweepExpired(T0 + FIVE_MIN);
    expect(codeOf(() => registry.approve(request.requestId, T0 + FIVE_MIN))).toBe('NOT_FOUND');
  });

  it('drops uncollected outcomes a window after the decision', () => {
    const request = registry.create(input, T0);
    registry.deny(request.requestId, T0 + 1_000);
    registry.sweepExpired(T0 + FIVE_MIN);
    expect(registry.getStatus(request.requestId).status).toBe('denied');
    registry.sweepExpired(T0 + 1_000 + FIVE_MIN);
    expect(codeOf(() => registry.getStatus(request.requestId))).toBe('NOT_FOUND');
  });

  it('GATE: keeps a late approval collectable for a full window', () => {
    const request = registry.create(input, T0);
    const session = registry.approve(request.requestId, T0 + FIVE_MIN - 1);
    expect(registry.sweepExpired(T0 + FIVE_MIN)).toEqual([]);
    const status = registry.getStatus(request.requestId);
    expect(status.status).toBe('approved');
    expect(status.sessionToken).toBe(session.token);
    expect(sessions.size).toBe(1);
  });

  it('GATE: revokes the session of an approval nobody collected', () => {
    const onApprovalAbandoned = vi.fn();
    registry = new RequestRegistry(sessions, {
      timeoutMs: FIVE_MIN,
      listener: { onRequestCreated, onApprovalAbandoned },
    });
    const request = registry.create(input, T0);
    const session = registry.approve(request.requestId, T0 + 1_000);

    registry.sweepExpired(T0 + 1_000 + FIVE_MIN);
    expect(codeOf(() => registry.getStatus(request.requestId))).toBe('NOT_FOUND');
    expect(sessions.size).toBe(0);
    expect(codeOf(() => sessions.validate(session.token, undefined, T0 + 2_000 + FIVE_MIN))).toBe('UNAUTHORIZED');
    expect(onApprovalAbandoned).toHaveBeenCalledTimes(1);
    expect(onApprovalAbandoned.mock.calls[0]?.[0]).toMatchObject({ requestId: request.requestId, status: 'approved' });
  });

  it('leaves a collected approval\'s session alone', () => {
    const request = registry.create(input, T0);
    registry.approve(request.requestId, T0);
    expect(registry.consume(request.requestId)).toBe(true);
    registry.sweepExpired(T0 + FIVE_MIN);
    expect(sessions.size).toBe(1);
  });

  it('clear() drops pending and resolved requests', () => {
    const a = registry.create(input, T0);
    registry.deny(registry.create(input, T0).requestId);
    registry.clear();
    expect(registry.pendingCount).toBe(0);
    expect(codeOf(() => registry.getStatus(a.requestId))).toBe('NOT_FOUND');
  });
});
