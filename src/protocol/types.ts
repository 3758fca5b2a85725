/**
 * @file src/protocol/types.ts
 * Shared vocabulary of the wallet protocol: permissions, records, wire shapes,
 * the error taxonomy and the protocol-wide defaults.
 * Server, client and stores all import from here; never the reverse.
 */

import { StatusCodes } from 'http-status-codes';

// ── Protocol constants ────────────────────────────────────────────────────────

export const PROTOCOL_VERSION = '1.0.0';
export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;
export const PUSH_PATH = `/ws/${API_VERSION}`;

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 8545;

export const ProtocolDefaults = {
  sessionTimeoutMinutes: 60,
  requestTimeoutMinutes: 5,
  autoLockMinutes: 30,
  maxSessions: 10,
  maxPendingRequests: 10,
  cacheTtlSeconds: 30,
  sweepIntervalSeconds: 60,
} as const;

/** Header carrying the optional admin credential for wallet-local endpoints. */
export const WALLET_TOKEN_HEADER = 'x-wallet-token';

// ── Permissions and wallet kinds ──────────────────────────────────────────────

export const PERMISSIONS = [
  'wallet_info',
  'balance',
  'transactions',
  'sign_message',
  'add_token',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export const WALLET_TYPES = ['desktop', 'web', 'cli', 'hardware'] as const;

export type WalletType = (typeof WALLET_TYPES)[number];

export function isPermission(value: string): value is Permission {
  return (PERMISSIONS as readonly string[]).includes(value);
}

/**
 * Validates and deduplicates a permission list, preserving first-seen order.
 * Throws INVALID_REQUEST naming the first unknown entry.
 */
export function normalisePermissions(values: readonly string[]): Permission[] {
  const seen = new Set<Permission>();
  for (const value of values) {
    if (!isPermission(value)) {
      throw new ProtocolError('INVALID_REQUEST', `Unknown permission: ${value}`);
    }
    seen.add(value);
  }
  return [...seen];
}

// ── Records ───────────────────────────────────────────────────────────────────

export type RequestStatus = 'pending' | 'approved' | 'denied' | 'expired';

/** A DApp's pending or resolved ask for a permission set. */
export interface AuthorizationRequest {
  requestId: string;
  appName: string;
  appUrl: string;
  permissions: Permission[];
  description?: string;
  /** Epoch ms. */
  createdAt: number;
  status: RequestStatus;
  /** Epoch ms of the approve or deny decision. */
  resolvedAt?: number;
  /** Set once approved, so the polling DApp can collect it. */
  sessionToken?: string;
  sessionExpiresAt?: number;
}

export interface Session {
  token: string;
  appName: string;
  appUrl: string;
  permissions: Permission[];
  createdAt: number;
  /** Absolute expiry, epoch ms. Never moved by activity. */
  expiresAt: number;
  lastActivity: number;
}

// ── Wire shapes (snake_case JSON bodies) ──────────────────────────────────────

export interface WalletStatusBody {
  available: boolean;
  locked: boolean;
  wallet_type: WalletType;
  network: string | null;
  chain_id: string | null;
  version: string;
}

export interface WalletInfoBody {
  address: string;
  truncated_address: string;
  locked: boolean;
  chain_id: string | null;
  network: string | null;
  wallet_type: WalletType;
  version: string;
}

export interface AuthorizationRequestBody {
  request_id: string;
  status: RequestStatus;
  app_name: string;
  app_url: string;
  permissions: Permission[];
  description: string | null;
  created_at: string;
  expires_at: string;
  session_token?: string;
  session_expires_at?: string;
}

export interface AuthorizationApprovedBody {
  session_token: string;
  expires_at: string;
  permissions: Permission[];
  status: 'approved';
}

export interface BalanceBody {
  balance: number;
  contract: string;
  cached: boolean;
}

export interface TransactionResultBody {
  success: boolean;
  transaction_hash: string | null;
  result: unknown;
  errors: string[] | null;
  gas_used: number | null;
}

export interface SignatureBody {
  signature: string;
  message: string;
  address: string;
}

export interface TokenBody {
  contract_address: string;
  token_name: string | null;
  token_symbol: string | null;
  decimals: number | null;
  added_at: string;
}

export interface ErrorBody {
  error: string;
  code: ErrorCode;
  details?: unknown;
  retry_after?: number;
}

export function requestToBody(request: AuthorizationRequest, timeoutMs: number): AuthorizationRequestBody {
  const body: AuthorizationRequestBody = {
    request_id: request.requestId,
    status: request.status,
    app_name: request.appName,
    app_url: request.appUrl,
    permissions: request.permissions,
    description: request.description ?? null,
    created_at: new Date(request.createdAt).toISOString(),
    expires_at: new Date(request.createdAt + timeoutMs).toISOString(),
  };
  if (request.sessionToken !== undefined) body.session_token = request.sessionToken;
  if (request.sessionExpiresAt !== undefined) {
    body.session_expires_at = new Date(request.sessionExpiresAt).toISOString();
  }
  return body;
}

// ── Error taxonomy ────────────────────────────────────────────────────────────

export type ErrorCode =
  | 'UNAUTHORIZED'
  | 'SESSION_EXPIRED'
  | 'FORBIDDEN'
  | 'NOT_FOUND'
  | 'INVALID_STATE'
  | 'INVALID_REQUEST'
  | 'TOO_MANY_PENDING_REQUESTS'
  | 'MAX_SESSIONS_EXCEEDED'
  | 'TOO_MANY_ATTEMPTS'
  | 'ACCOUNT_LOCKED'
  | 'WALLET_LOCKED'
  | 'WALLET_NOT_FOUND'
  | 'USER_REJECTED'
  | 'NETWORK_ERROR'
  | 'TRANSACTION_FAILED'
  | 'INTERNAL_ERROR';

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  UNAUTHORIZED: StatusCodes.UNAUTHORIZED,
  SESSION_EXPIRED: StatusCodes.UNAUTHORIZED,
  FORBIDDEN: StatusCodes.FORBIDDEN,
  NOT_FOUND: StatusCodes.NOT_FOUND,
  INVALID_STATE: StatusCodes.CONFLICT,
  INVALID_REQUEST: StatusCodes.UNPROCESSABLE_ENTITY,
  TOO_MANY_PENDING_REQUESTS: StatusCodes.TOO_MANY_REQUESTS,
  MAX_SESSIONS_EXCEEDED: StatusCodes.TOO_MANY_REQUESTS,
  TOO_MANY_ATTEMPTS: StatusCodes.TOO_MANY_REQUESTS,
  ACCOUNT_LOCKED: StatusCodes.TOO_MANY_REQUESTS,
  WALLET_LOCKED: StatusCodes.LOCKED,
  WALLET_NOT_FOUND: StatusCodes.SERVICE_UNAVAILABLE,
  USER_REJECTED: StatusCodes.FORBIDDEN,
  NETWORK_ERROR: StatusCodes.BAD_GATEWAY,
  TRANSACTION_FAILED: StatusCodes.BAD_REQUEST,
  INTERNAL_ERROR: StatusCodes.INTERNAL_SERVER_ERROR,
};

export function httpStatusFor(code: ErrorCode): number {
  return STATUS_BY_CODE[code];
}

export function isErrorCode(value: unknown): value is ErrorCode {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(STATUS_BY_CODE, value);
}

export interface ProtocolErrorOptions {
  /** Seconds the caller must wait, for TOO_MANY_ATTEMPTS and ACCOUNT_LOCKED. */
  retryAfterSeconds?: number;
  details?: unknown;
  /** HTTP status observed by a client, when the error came off the wire. */
  status?: number;
  cause?: unknown;
}

/**
 * Typed error raised by every protocol operation, on both sides of the wire.
 * `code` is the machine-readable discriminator; messages are for humans.
 */
export class ProtocolError extends Error {
  override readonly name = 'ProtocolError';
  readonly retryAfterSeconds?: number;
  readonly details?: unknown;
  readonly status: number;
  override readonly cause?: unknown;

  constructor(
    public readonly code: ErrorCode,
    message: string,
    options: ProtocolErrorOptions = {},
  ) {
    super(message);
    this.retryAfterSeconds = options.retryAfterSeconds;
    this.details = options.details;
    this.status = options.status ?? httpStatusFor(code);
    this.cause = options.cause;
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ProtocolError);
    }
  }

  toBody(): ErrorBody {
    const body: ErrorBody = { error: this.message, code: this.code };
    if (this.details !== undefined) body.details = this.details;
    if (this.retryAfterSeconds !== undefined) body.retry_after = this.retryAfterSeconds;
    return body;
  }
}
