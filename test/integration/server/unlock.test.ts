/**
 * Integration tests for wallet unlock over HTTP, including brute-force limits.
 *
 * Test gates:
 *  ✅ a retry inside the backoff window is 429 with Retry-After and retry_after
 *  ✅ the attempt after five failures locks the source, even with the right password
 *  ✅ rejections and failures land in the audit log
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { ProtocolError } from '../../../src/protocol/types.js';
import { backoffDelaySeconds } from '../../../src/auth/rate-limiter.js';
import { call, startServer, PASSWORD, type RunningServer } from '../helpers.js';

const SOURCE = '127.0.0.1';

let ctx: RunningServer;

beforeEach(async () => {
  ctx = await startServer({ locked: true });
});

afterEach(async () => {
  await ctx.server.close();
});

function rejection(fn: () => void): ProtocolError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ProtocolError) return err;
    throw err;
  }
  throw new Error('expected a ProtocolError');
}

describe('POST /wallet/unlock rate limiting', () => {
  it('GATE: an immediate retry after a failure is 429 TOO_MANY_ATTEMPTS', async () => {
    const first = await call(ctx.api, 'POST', '/wallet/unlock', { body: { password: 'wrong-password' } });
    expect(first.status).toBe(401);

    const second = await call(ctx.api, 'POST', '/wallet/unlock', { body: { password: PASSWORD } });
    expect(second.status).toBe(429);
    expect(second.headers.get('retry-after')).toBe('1');
    expect(second.body).toEqual({
      error: 'TOO_MANY_ATTEMPTS: Too many attempts. Please wait 1 seconds',
      code: 'TOO_MANY_ATTEMPTS',
      retry_after: 1,
    });
    expect((await call(ctx.api, 'GET', '/wallet/status')).body['locked']).toBe(true);
  });

  it('GATE: locks the source after five failures', () => {
    let now = Date.now();
    for (let attempt = 1; attempt <= 5; attempt++) {
      now += backoffDelaySeconds(attempt) * 1000;
      expect(rejection(() => ctx.server.unlock('wrong-password', SOURCE, now)).code).toBe('UNAUTHORIZED');
    }
    now += 60_000;
    const locked = rejection(() => ctx.server.unlock(PASSWORD, SOURCE, now));
    expect(locked.code).toBe('ACCOUNT_LOCKED');
    expect(locked.retryAfterSeconds).toBe(60);
    expect(locked.status).toBe(429);
    expect(ctx.server.lock.isLocked).toBe(true);

    // Once the lock is served, the right password works again.
    ctx.server.unlock(PASSWORD, SOURCE, now + 60_000);
    expect(ctx.server.lock.isLocked).toBe(false);
  });

  it('a success clears the failure record', () => {
    const now = Date.now();
    rejection(() => ctx.server.unlock('wrong-password', SOURCE, now));
    ctx.server.unlock(PASSWORD, SOURCE, now + 1_000);
    expect(ctx.server.rateLimiter.get(SOURCE)).toBeUndefined();
  });

  it('other sources are not affected', () => {
    const now = Date.now();
    rejection(() => ctx.server.unlock('wrong-password', SOURCE, now));
    ctx.server.unlock(PASSWORD, '127.0.0.2', now);
    expect(ctx.server.lock.isLocked).toBe(false);
  });

  it('GATE: audits failures and rejections', () => {
    const now = Date.now();
    rejection(() => ctx.server.unlock('wrong-password', SOURCE, now));
    rejection(() => ctx.server.unlock('wrong-password', SOURCE, now + 10));
    expect(ctx.server.audit.count('unlock_failed')).toBe(1);
    const [rejected] = ctx.server.audit.query({ event: 'unlock_rejected' });
    expect(rejected?.source).toBe(SOURCE);
    expect(rejected?.details_json).toBe('{"code":"TOO_MANY_ATTEMPTS"}');
  });
});
