/**
 * Unit tests for src/cli/output.ts
 *
 * Test gates:
 *  ✅ describeError appends the error code and retry time
 *  ✅ formatPendingRequests renders one aligned row per request
 *  ✅ formatAuditRows shows only the interesting detail fields
 *  ✅ formatPushEvent renders every event type on one line
 *  ✅ table handles empty rows
 *  ✅ kv aligns keys correctly
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import {
  describeError,
  formatAuditRows,
  formatLockState,
  formatPendingRequests,
  formatPushEvent,
  kv,
  secondsUntil,
  table,
} from '../../../src/cli/output.js';
import type { AuditEntry, AuthorizationRequestView } from '../../../src/client/schemas.js';
import { ProtocolError } from '../../../src/protocol/types.js';

// ── Capture stdout ────────────────────────────────────────────────────────────

let captured = '';
beforeEach(() => {
  captured = '';
  vi.spyOn(process.stdout, 'write').mockImplementation((chunk: unknown) => {
    captured += String(chunk);
    return true;
  });
});
afterEach(() => {
  vi.restoreAllMocks();
});

const plain = (s: string): string => s.replace(/\x1b\[[0-9;]*m/g, '');

const CREATED = '2024-05-01T12:00:00.000Z';

function request(overrides: Partial<AuthorizationRequestView> = {}): AuthorizationRequestView {
  return {
    requestId: 'req-1',
    status: 'pending',
    appName: 'Test DApp',
    appUrl: 'http://localhost:3000',
    permissions: ['wallet_info', 'balance'],
    description: null,
    createdAt: CREATED,
    expiresAt: '2024-05-01T12:05:00.000Z',
    sessionToken: undefined,
    sessionExpiresAt: undefined,
    ...overrides,
  };
}

function auditRow(overrides: Partial<AuditEntry> = {}): AuditEntry {
  return {
    id: 1,
    ts: CREATED,
    event: 'auth_requested',
    app_name: 'Test DApp',
    source: null,
    request_id: 'req-1',
    details_json: '{"permissions":["wallet_info","balance"],"appUrl":"http://localhost:3000"}',
    ...overrides,
  };
}

// ── describeError ─────────────────────────────────────────────────────────────

describe('describeError()', () => {
  it('GATE: appends the code and the retry time', () => {
    const err = new ProtocolError('TOO_MANY_ATTEMPTS', 'Too many attempts', { retryAfterSeconds: 3 });
    expect(describeError(err)).toBe('Too many attempts [TOO_MANY_ATTEMPTS] (retry in 3s)');
  });

  it('appends only the code when there is no wait', () => {
    expect(describeError(new ProtocolError('WALLET_LOCKED', 'Wallet is locked'))).toBe('Wallet is locked [WALLET_LOCKED]');
  });

  it('passes plain errors and strings through', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('boom')).toBe('boom');
  });
});

// ── secondsUntil / formatLockState ────────────────────────────────────────────

describe('secondsUntil()', () => {
  it('rounds up and floors at zero', () => {
    expect(secondsUntil('2024-05-01T12:00:10.000Z', Date.parse('2024-05-01T12:00:00.500Z'))).toBe(10);
    expect(secondsUntil('2024-05-01T12:00:00.000Z', Date.parse('2024-05-01T12:01:00.000Z'))).toBe(0);
  });
});

describe('formatLockState()', () => {
  it('names the state', () => {
    expect(plain(formatLockState(true))).toBe('locked');
    expect(plain(formatLockState(false))).toBe('unlocked');
  });
});

// ── formatPendingRequests ─────────────────────────────────────────────────────

describe('formatPendingRequests()', () => {
  it('says so when nothing is pending', () => {
    formatPendingRequests([]);
    expect(plain(captured)).toBe('  No pending authorization requests.\n');
  });

  it('GATE: prints one row per request with the time left', () => {
    formatPendingRequests([request()], Date.parse(CREATED));
    const lines = plain(captured).split('\n');
    expect(lines[0]).toBe(`  ${'REQUEST'}  ${'APP'.padEnd(9)}  ${'URL'.padEnd(21)}  ${'PERMISSIONS'.padEnd(19)}  EXPIRES`);
    expect(lines[2]).toBe(`  ${'req-1'.padEnd(7)}  Test DApp  http://localhost:3000  wallet_info,balance  ${'300s'.padEnd(7)}`);
  });
});

// ── formatAuditRows ───────────────────────────────────────────────────────────

describe('formatAuditRows()', () => {
  it('says so when there are no events', () => {
    formatAuditRows([]);
    expect(plain(captured)).toBe('  No audit events found.\n');
  });

  it('GATE: prints the event line and the interesting details only', () => {
    formatAuditRows([auditRow()]);
    const ts = new Date(CREATED).toLocaleString();
    expect(plain(captured)).toBe(
      `  ${ts}  ${'auth_requested'.padEnd(16)}  Test DApp\n` +
      '    permissions=wallet_info,balance\n',
    );
  });

  it('shows the source of unlock events', () => {
    formatAuditRows([auditRow({ event: 'unlock_failed', app_name: null, source: '127.0.0.1', details_json: '{"attempts":2}' })]);
    const lines = plain(captured).split('\n');
    expect(lines[0]).toMatch(/unlock_failed {3}  from 127\.0\.0\.1$/);
    expect(lines[1]).toBe('    attempts=2');
  });

  it('skips the details line for malformed JSON', () => {
    formatAuditRows([auditRow({ details_json: '{not json' })]);
    expect(plain(captured).split('\n').filter((l) => l.length > 0)).toHaveLength(1);
  });

  it('skips the details line when nothing is interesting', () => {
    formatAuditRows([auditRow({ details_json: '{"length":5}' })]);
    expect(plain(captured).split('\n').filter((l) => l.length > 0)).toHaveLength(1);
  });
});

// ── formatPushEvent ───────────────────────────────────────────────────────────

describe('formatPushEvent()', () => {
  it('GATE: renders each event type', () => {
    expect(plain(formatPushEvent({ type: 'authorization_request', request: request({ permissions: ['balance'] }) })))
      .toBe('request   Test DApp wants balance (req-1)');
    expect(plain(formatPushEvent({ type: 'authorization_resolved', request_id: 'req-1', status: 'approved' })))
      .toBe('resolved  req-1 approved');
    expect(plain(formatPushEvent({ type: 'pending_requests', requests: [request(), request({ requestId: 'req-2' })] })))
      .toBe('pending   2 request(s) awaiting a decision');
    expect(plain(formatPushEvent({ type: 'wallet_locked', reason: 'auto_lock' })))
      .toBe('locked    auto-lock after inactivity');
    expect(plain(formatPushEvent({ type: 'wallet_locked', reason: 'manual' })))
      .toBe('locked    locked by user');
    expect(plain(formatPushEvent({ type: 'wallet_unlocked' }))).toBe('unlocked');
    expect(plain(formatPushEvent({ type: 'session_revoked', app_name: 'Test DApp' })))
      .toBe('revoked   session for Test DApp');
    expect(plain(formatPushEvent({ type: 'server_shutdown' }))).toBe('server shutting down');
  });
});

// ── table / kv ────────────────────────────────────────────────────────────────

describe('table()', () => {
  it('prints a placeholder for no rows', () => {
    table(['A', 'B'], []);
    expect(plain(captured)).toBe('  (no rows)\n');
  });

  it('truncates cells to the column width', () => {
    table(['A', 'B'], [['abcdef', 'x']], { maxWidth: 8 });
    const lines = plain(captured).split('\n');
    expect(lines[2]).toBe('  abcd  x');
  });
});

describe('kv()', () => {
  it('aligns keys', () => {
    kv([['a', '1'], ['long', '2']]);
    expect(plain(captured)).toBe('  a     1\n  long  2\n');
  });
});
