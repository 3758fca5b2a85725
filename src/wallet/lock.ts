/**
 * @file src/wallet/lock.ts
 * Locked/unlocked state of the wallet, with idle auto-lock.
 * A wallet without a password verifier cannot be unlocked once locked, and
 * never auto-locks.
 */

import { verifyPassword } from './password.js';
import type { PasswordVerifier } from './types.js';

export interface WalletLockOptions {
  verifier?: PasswordVerifier;
  /** Defaults to locked when a verifier is present. */
  locked?: boolean;
  /** Idle time before auto-lock; 0 or undefined disables it. */
  autoLockMs?: number;
}

export class WalletLock {
  private verifier: PasswordVerifier | undefined;
  private locked: boolean;
  private lastActivity: number;
  private readonly autoLockMs: number;

  constructor(options: WalletLockOptions = {}, now: number = Date.now()) {
    this.verifier = options.verifier;
    this.locked = options.locked ?? options.verifier !== undefined;
    this.autoLockMs = options.autoLockMs ?? 0;
    this.lastActivity = now;
  }

  get isLocked(): boolean {
    return this.locked;
  }

  get hasPassword(): boolean {
    return this.verifier !== undefined;
  }

  setVerifier(verifier: PasswordVerifier | undefined): void {
    this.verifier = verifier;
  }

  /** Returns false on a wrong password or when no password is configured. */
  unlock(password: string, now: number = Date.now()): boolean {
    if (!this.verifier || !verifyPassword(this.verifier, password)) return false;
    this.locked = false;
    this.lastActivity = now;
    return true;
  }

  /** Returns whether the state changed. */
  lock(): boolean {
    if (this.locked) return false;
    this.locked = true;
    return true;
  }

  touch(now: number = Date.now()): void {
    this.lastActivity = now;
  }

  /** Locks if idle past the auto-lock window. Returns whether it locked now. */
  autoLock(now: number = Date.now()): boolean {
    if (this.locked || this.autoLockMs <= 0 || !this.verifier) return false;
    if (now - this.lastActivity < this.autoLockMs) return false;
    this.locked = true;
    return true;
  }
}
