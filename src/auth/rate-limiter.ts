/**
 * @file src/auth/rate-limiter.ts
 *
 * Per-source throttle for wallet unlock attempts.
 *
 * Policy:
 *  - the n-th attempt must wait min(2^(n-2), 60) seconds after the previous one
 *  - after `maxAttempts` failures the next attempt locks the source out
 *  - a lock is never extended by attempts made while it is active
 *  - a rejected attempt is not recorded
 *
 * check() runs before the credential is verified; the caller then reports the
 * outcome with recordFailure() or recordSuccess().
 */

import { ProtocolError } from '../protocol/types.js';

export interface RateLimitRecord {
  sourceKey: string;
  attempts: number;
  lastAttempt: number;
  lockedUntil?: number;
}

export interface RateLimiterOptions {
  maxAttempts?: number;
  lockoutMs?: number;
  maxBackoffSeconds?: number;
  /** Records idle this long, with no active lock, are pruned by sweep(). */
  staleAfterMs?: number;
}

const DEFAULTS = {
  maxAttempts: 5,
  lockoutMs: 60_000,
  maxBackoffSeconds: 60,
  staleAfterMs: 30 * 60_000,
} as const;

/** Delay in seconds required before attempt number `attempt` (1-based). */
export function backoffDelaySeconds(attempt: number, maxSeconds: number = DEFAULTS.maxBackoffSeconds): number {
  if (attempt <= 1) return 0;
  return Math.min(2 ** (attempt - 2), maxSeconds);
}

export class RateLimiter {
  private readonly records = new Map<string, RateLimitRecord>();
  private readonly maxAttempts: number;
  private readonly lockoutMs: number;
  private readonly maxBackoffSeconds: number;
  private readonly staleAfterMs: number;

  constructor(options: RateLimiterOptions = {}) {
    this.maxAttempts = options.maxAttempts ?? DEFAULTS.maxAttempts;
    this.lockoutMs = options.lockoutMs ?? DEFAULTS.lockoutMs;
    this.maxBackoffSeconds = options.maxBackoffSeconds ?? DEFAULTS.maxBackoffSeconds;
    this.staleAfterMs = options.staleAfterMs ?? DEFAULTS.staleAfterMs;
  }

  /**
   * Throws ACCOUNT_LOCKED or TOO_MANY_ATTEMPTS when `sourceKey` may not try
   * yet. Both carry the remaining wait in `retryAfterSeconds`.
   */
  check(sourceKey: string, now: number = Date.now()): void {
    const record = this.records.get(sourceKey);
    if (!record) return;

    if (record.lockedUntil !== undefined) {
      if (now < record.lockedUntil) {
        throw lockedError(record.lockedUntil - now);
      }
      // Lock served; start over.
      this.records.delete(sourceKey);
      return;
    }

    if (record.attempts >= this.maxAttempts) {
      record.lockedUntil = now + this.lockoutMs;
      throw lockedError(this.lockoutMs);
    }

    const delayMs = backoffDelaySeconds(record.attempts + 1, this.maxBackoffSeconds) * 1000;
    const elapsed = now - record.lastAttempt;
    if (elapsed < delayMs) {
      const wait = Math.max(1, Math.ceil((delayMs - elapsed) / 1000));
      throw new ProtocolError(
        'TOO_MANY_ATTEMPTS',
        `TOO_MANY_ATTEMPTS: Too many attempts. Please wait ${wait} seconds`,
        { retryAfterSeconds: wait },
      );
    }
  }

  recordFailure(sourceKey: string, now: number = Date.now()): RateLimitRecord {
    const record = this.records.get(sourceKey) ?? { sourceKey, attempts: 0, lastAttempt: now };
    record.attempts++;
    record.lastAttempt = now;
    this.records.set(sourceKey, record);
    return record;
  }

  recordSuccess(sourceKey: string): void {
    this.records.delete(sourceKey);
  }

  /** Prunes expired locks and idle records. Returns how many were removed. */
  sweep(now: number = Date.now()): number {
    let removed = 0;
    for (const [key, record] of this.records) {
      const lockExpired = record.lockedUntil !== undefined && now >= record.lockedUntil;
      const lockActive = record.lockedUntil !== undefined && !lockExpired;
      const stale = now - record.lastAttempt > this.staleAfterMs;
      if (lockExpired || (stale && !lockActive)) {
        this.records.delete(key);
        removed++;
      }
    }
    return removed;
  }

  get(sourceKey: string): RateLimitRecord | undefined {
    return this.records.get(sourceKey);
  }

  get size(): number {
    return this.records.size;
  }
}

function lockedError(remainingMs: number): ProtocolError {
  const wait = Math.max(1, Math.ceil(remainingMs / 1000));
  return new ProtocolError(
    'ACCOUNT_LOCKED',
    `ACCOUNT_LOCKED: Account locked. Try again in ${wait} seconds`,
    { retryAfterSeconds: wait },
  );
}
