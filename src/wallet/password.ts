/**
 * @file src/wallet/password.ts
 *
 * Unlock-password hashing for the wallet lock.
 *
 *  - scrypt KDF with a fresh 32-byte salt per verifier
 *  - constant-time comparison of derived keys
 *  - derived buffers are zeroed once compared
 *
 * Test environments can lower the cost with TEST_KDF_N.
 */

import * as crypto from 'node:crypto';
import { WalletError, type PasswordVerifier } from './types.js';

// ── KDF Constants ─────────────────────────────────────────────────────────────

const KDF_PARAMS = {
  N: 16384,
  r: 8,
  p: 1,
} as const;

const KEY_LEN = 32;
const SALT_LEN = 32;

function costParameter(): number {
  const override = process.env['TEST_KDF_N'];
  return override ? parseInt(override, 10) : KDF_PARAMS.N;
}

function deriveKey(password: string, salt: Buffer, params: PasswordVerifier['kdfParams']): Buffer {
  return crypto.scryptSync(password, salt, KEY_LEN, {
    N: params.N,
    r: params.r,
    p: params.p,
    maxmem: 256 * params.N * params.r,
  });
}

// ── Public API ────────────────────────────────────────────────────────────────

export function createPasswordVerifier(password: string): PasswordVerifier {
  if (!password) {
    throw new WalletError('INVALID_PASSWORD', 'Wallet password must not be empty.');
  }

  const kdfParams = { N: costParameter(), r: KDF_PARAMS.r, p: KDF_PARAMS.p };
  const salt = crypto.randomBytes(SALT_LEN);
  const derived = deriveKey(password, salt, kdfParams);
  try {
    return {
      version: 1,
      kdf: 'scrypt',
      kdfParams,
      salt: salt.toString('hex'),
      hash: derived.toString('hex'),
    };
  } finally {
    derived.fill(0);
  }
}

/** True when `password` derives the stored hash. Runs in constant time for equal-length keys. */
export function verifyPassword(verifier: PasswordVerifier, password: string): boolean {
  const expected = Buffer.from(verifier.hash, 'hex');
  const derived = deriveKey(password, Buffer.from(verifier.salt, 'hex'), verifier.kdfParams);
  try {
    return derived.length === expected.length && crypto.timingSafeEqual(derived, expected);
  } finally {
    derived.fill(0);
  }
}
