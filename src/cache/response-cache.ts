/**
 * @file src/cache/response-cache.ts
 * Keyed TTL cache for read-mostly responses (wallet info, balances).
 * Expiry is lazy: an entry is only dropped when a read finds it stale.
 */

export interface CacheEntry<T> {
  key: string;
  value: T;
  storedAt: number;
}

export class ResponseCache<T = unknown> {
  private readonly entries = new Map<string, CacheEntry<T>>();

  /** Returns the value if `now - storedAt < ttlMs`, evicting it otherwise. */
  get(key: string, ttlMs: number, now: number = Date.now()): T | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (now - entry.storedAt < ttlMs) return entry.value;
    this.entries.delete(key);
    return undefined;
  }

  set(key: string, value: T, now: number = Date.now()): void {
    this.entries.set(key, { key, value, storedAt: now });
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /** Drops every key starting with `prefix`, e.g. `balance:` after a transaction. */
  clearMatching(prefix: string): number {
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

export const balanceKey = (contract: string): string => `balance:${contract}`;
export const BALANCE_PREFIX = 'balance:';
export const WALLET_INFO_KEY = 'wallet_info';
