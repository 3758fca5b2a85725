/**
 * @file src/wallet/types.ts
 * Contract between the protocol server and the wallet/chain client that owns
 * keys, balances and transaction submission.
 * The server never sees key material; it only calls through WalletBackend.
 */

import type { WalletType } from '../protocol/types.js';

// ── Operations ────────────────────────────────────────────────────────────────

export interface TransactionCall {
  contract: string;
  function: string;
  kwargs: Record<string, unknown>;
  /** Fee budget. The backend estimates when omitted. */
  stampsSupplied?: number;
}

/** Outcome of a submission. `success === false` means the chain rejected it. */
export interface TransactionResult {
  success: boolean;
  transactionHash?: string;
  result?: unknown;
  errors?: string[];
  gasUsed?: number;
}

// ── Backend interface ─────────────────────────────────────────────────────────

/**
 * The external wallet/chain client. Implementations may talk to a node, a
 * hardware device or (for demos and tests) nothing at all.
 * Failures should be thrown; ProtocolServer maps them to NETWORK_ERROR.
 */
export interface WalletBackend {
  readonly walletType: WalletType;
  /** The wallet's public address. Safe to log and share. */
  getAddress(): string;
  getBalance(contract: string): Promise<number>;
  sendTransaction(call: TransactionCall, network: NetworkConfig): Promise<TransactionResult>;
  signMessage(message: string): Promise<string>;
}

export interface NetworkConfig {
  url: string;
  chainId: string;
}

// ── Error Classes ─────────────────────────────────────────────────────────────

export type WalletErrorCode =
  | 'INVALID_PASSWORD'
  | 'BACKEND_UNAVAILABLE';

/**
 * Typed error thrown by wallet collaborators.
 * Always includes a machine-readable `code` for programmatic handling.
 */
export class WalletError extends Error {
  override readonly name = 'WalletError';

  constructor(
    public readonly code: WalletErrorCode,
    message: string,
    public override readonly cause?: unknown,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, WalletError);
    }
  }
}

// ── Password verifier ─────────────────────────────────────────────────────────

/** Stored form of the unlock password. Only the scrypt hash is kept. */
export interface PasswordVerifier {
  version: 1;
  kdf: 'scrypt';
  kdfParams: { N: number; r: number; p: number };
  /** 32-byte salt, hex-encoded. */
  salt: string;
  /** Derived key, hex-encoded. */
  hash: string;
}
