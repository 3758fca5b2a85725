/**
 * Unit tests for src/auth/rate-limiter.ts
 *
 * Test gates:
 *  ✅ backoff delay doubles from the second attempt and caps at 60s
 *  ✅ attempts inside the backoff window are rejected with TOO_MANY_ATTEMPTS
 *  ✅ the attempt after maxAttempts failures locks the source
 *  ✅ a lock is served exactly once, then the record starts over
 *  ✅ reported waits never exceed 60 seconds under default settings
 *  ✅ sweep() prunes expired locks and stale records only
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter, backoffDelaySeconds } from '../../../src/auth/rate-limiter.js';
import { ProtocolError } from '../../../src/protocol/types.js';

const T0 = 1_700_000_000_000;
const SRC = '127.0.0.1';

function rejection(fn: () => void): ProtocolError {
  try {
    fn();
  } catch (err) {
    if (err instanceof ProtocolError) return err;
    throw err;
  }
  throw new Error('expected a ProtocolError');
}

/** Records `n` failures, each spaced exactly as far apart as the backoff allows. */
function failAllowed(limiter: RateLimiter, n: number, start = T0): number {
  let now = start;
  for (let attempt = 1; attempt <= n; attempt++) {
    now += backoffDelaySeconds(attempt) * 1000;
    limiter.check(SRC, now);
    limiter.recordFailure(SRC, now);
  }
  return now;
}

// ── backoffDelaySeconds ───────────────────────────────────────────────────────

describe('backoffDelaySeconds()', () => {
  it('is zero for the first attempt', () => {
    expect(backoffDelaySeconds(1)).toBe(0);
  });

  it('doubles from the second attempt', () => {
    expect([2, 3, 4, 5, 6].map((n) => backoffDelaySeconds(n))).toEqual([1, 2, 4, 8, 16]);
  });

  it('caps at 60 seconds', () => {
    expect(backoffDelaySeconds(8)).toBe(60);
    expect(backoffDelaySeconds(30)).toBe(60);
  });

  it('honours a custom cap', () => {
    expect(backoffDelaySeconds(10, 5)).toBe(5);
  });
});

// ── check() / recordFailure() ─────────────────────────────────────────────────

describe('RateLimiter', () => {
  let limiter: RateLimiter;

  beforeEach(() => {
    limiter = new RateLimiter();
  });

  it('allows an unknown source', () => {
    expect(() => limiter.check(SRC, T0)).not.toThrow();
  });

  it('GATE: rejects a retry inside the backoff window with TOO_MANY_ATTEMPTS', () => {
    limiter.recordFailure(SRC, T0);
    const err = rejection(() => limiter.check(SRC, T0 + 400));
    expect(err.code).toBe('TOO_MANY_ATTEMPTS');
    expect(err.retryAfterSeconds).toBe(1);
    expect(err.message).toBe('TOO_MANY_ATTEMPTS: Too many attempts. Please wait 1 seconds');
  });

  it('allows the retry once the backoff has elapsed', () => {
    limiter.recordFailure(SRC, T0);
    expect(() => limiter.check(SRC, T0 + 1_000)).not.toThrow();
  });

  it('reports the remaining backoff rounded up', () => {
    failAllowed(limiter, 3);
    // Third failure at T0 + 3000; the fourth attempt needs 4s.
    const err = rejection(() => limiter.check(SRC, T0 + 3_000 + 1_500));
    expect(err.retryAfterSeconds).toBe(3);
  });

  it('does not record rejected attempts', () => {
    limiter.recordFailure(SRC, T0);
    rejection(() => limiter.check(SRC, T0 + 10));
    expect(limiter.get(SRC)?.attempts).toBe(1);
  });

  it('GATE: locks the source on the attempt after maxAttempts failures', () => {
    const last = failAllowed(limiter, 5);
    const err = rejection(() => limiter.check(SRC, last + 60_000));
    expect(err.code).toBe('ACCOUNT_LOCKED');
    expect(err.retryAfterSeconds).toBe(60);
    expect(err.message).toBe('ACCOUNT_LOCKED: Account locked. Try again in 60 seconds');
  });

  it('reports the remaining lock time while locked', () => {
    const last = failAllowed(limiter, 5);
    const lockedAt = last + 60_000;
    rejection(() => limiter.check(SRC, lockedAt));
    const err = rejection(() => limiter.check(SRC, lockedAt + 45_500));
    expect(err.code).toBe('ACCOUNT_LOCKED');
    expect(err.retryAfterSeconds).toBe(15);
  });

  it('does not extend a lock on attempts made during it', () => {
    const last = failAllowed(limiter, 5);
    const lockedAt = last + 60_000;
    rejection(() => limiter.check(SRC, lockedAt));
    rejection(() => limiter.check(SRC, lockedAt + 30_000));
    expect(limiter.get(SRC)?.lockedUntil).toBe(lockedAt + 60_000);
  });

  it('GATE: starts over once the lock has been served', () => {
    const last = failAllowed(limiter, 5);
    const lockedAt = last + 60_000;
    rejection(() => limiter.check(SRC, lockedAt));
    expect(() => limiter.check(SRC, lockedAt + 60_000)).not.toThrow();
    expect(limiter.get(SRC)).toBeUndefined();
  });

  it('GATE: never asks a caller to wait more than 60 seconds', () => {
    let now = T0;
    for (let i = 0; i < 40; i++) {
      try {
        limiter.check(SRC, now);
        limiter.recordFailure(SRC, now);
      } catch (err) {
        if (!(err instanceof ProtocolError)) throw err;
        expect(err.retryAfterSeconds).toBeLessThanOrEqual(60);
      }
      now += 7_000;
    }
  });

  it('recordSuccess() clears the record', () => {
    limiter.recordFailure(SRC, T0);
    limiter.recordSuccess(SRC);
    expect(limiter.size).toBe(0);
    expect(() => limiter.check(SRC, T0)).not.toThrow();
  });

  it('tracks sources independently', () => {
    limiter.recordFailure(SRC, T0);
    expect(() => limiter.check('10.0.0.2', T0)).not.toThrow();
  });

  it('honours custom maxAttempts and lockoutMs', () => {
    const strict = new RateLimiter({ maxAttempts: 1, lockoutMs: 10_000 });
    strict.recordFailure(SRC, T0);
    const err = rejection(() => strict.check(SRC, T0 + 5_000));
    expect(err.code).toBe('ACCOUNT_LOCKED');
    expect(err.retryAfterSeconds).toBe(10);
  });
});

// ── sweep() ───────────────────────────────────────────────────────────────────

describe('RateLimiter.sweep()', () => {
  it('removes records idle for more than 30 minutes', () => {
    const limiter = new RateLimiter();
    limiter.recordFailure(SRC, T0);
    expect(limiter.sweep(T0 + 30 * 60_000)).toBe(0);
    expect(limiter.sweep(T0 + 30 * 60_000 + 1)).toBe(1);
    expect(limiter.size).toBe(0);
  });

  it('removes expired locks', () => {
    const limiter = new RateLimiter({ maxAttempts: 1 });
    limiter.recordFailure(SRC, T0);
    rejection(() => limiter.check(SRC, T0 + 1_000));
    expect(limiter.sweep(T0 + 30_000)).toBe(0);
    expect(limiter.sweep(T0 + 61_000)).toBe(1);
  });

  it('keeps an active lock even when the record is stale', () => {
    const limiter = new RateLimiter({ maxAttempts: 1, lockoutMs: 60 * 60_000 });
    limiter.recordFailure(SRC, T0);
    rejection(() => limiter.check(SRC, T0 + 1_000));
    expect(limiter.sweep(T0 + 40 * 60_000)).toBe(0);
    expect(limiter.size).toBe(1);
  });
});
