/**
 * @file src/client/client.ts
 *
 * ProtocolClient: the DApp side of the protocol.
 *
 *   const client = new ProtocolClient({ appName: 'My DApp', appUrl: 'http://localhost:3000' });
 *   if (await client.connect(['wallet_info', 'balance'])) {
 *     const balance = await client.getBalance('currency');
 *   }
 *
 * Holds at most one session token. Wallet info and balances are cached for
 * `cacheTtlMs`; balances are dropped after every transaction. Rate-limit
 * errors are surfaced with their wait time and never retried here.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ZodType, ZodTypeDef } from 'zod';
import { DEFAULT_HOST, DEFAULT_PORT, ProtocolError, normalisePermissions } from '../protocol/types.js';
import type { Permission, RequestStatus } from '../protocol/types.js';
import { ResponseCache, WALLET_INFO_KEY, balanceKey } from '../cache/response-cache.js';
import { createComponentLogger, getRootLogger, type Logger } from '../logger/logger.js';
import { HttpTransport, type PushListener, type PushSubscription } from './http.js';
import {
  addTokenSchema,
  authorizationRequestSchema,
  balanceSchema,
  signatureSchema,
  statusMessageSchema,
  tokenListSchema,
  transactionSchema,
  walletInfoSchema,
  walletStatusSchema,
  type AuthorizationRequestView,
  type SignedMessage,
  type TransactionOutcome,
  type WalletInfo,
  type WalletStatus,
  type WalletToken,
} from './schemas.js';

// ── Options and results ───────────────────────────────────────────────────────

/** Structured-clone-safe client settings (the sync facade ships these to its worker). */
export interface ProtocolClientConfig {
  appName: string;
  appUrl?: string;
  /** Defaults to http://127.0.0.1:8545. */
  serverUrl?: string;
  /** Per-request timeout. */
  timeoutMs?: number;
  /** Timeout for the availability probe. */
  probeTimeoutMs?: number;
  headers?: Record<string, string>;
  pollIntervalMs?: number;
  cacheTtlMs?: number;
}

export interface ProtocolClientOptions extends ProtocolClientConfig {
  logger?: Logger;
}

export interface WaitOptions {
  /** Give up and report `pending` after this long. Default 5 minutes. */
  timeoutMs?: number;
  pollIntervalMs?: number;
  signal?: AbortSignal;
}

export interface ConnectOptions extends WaitOptions {
  description?: string;
}

export interface AuthorizationOutcome {
  requestId: string;
  /** `pending` means the wait ended (timeout or abort) before a decision. */
  status: RequestStatus;
  sessionToken?: string;
  permissions?: Permission[];
}

export interface TokenMetadata {
  tokenName?: string;
  tokenSymbol?: string;
  decimals?: number;
}

/** Session state mirrored by the sync facade. */
export interface ClientState {
  sessionToken: string | null;
  permissions: Permission[];
}

export const DEFAULT_SERVER_URL = `http://${DEFAULT_HOST}:${DEFAULT_PORT}`;
const DEFAULT_WAIT_MS = 5 * 60_000;

// ── ProtocolClient ────────────────────────────────────────────────────────────

export class ProtocolClient {
  readonly appName: string;
  readonly appUrl: string;
  private readonly transport: HttpTransport;
  private readonly probeTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly cacheTtlMs: number;
  private readonly logger: Logger;
  private readonly infoCache = new ResponseCache<WalletInfo>();
  private readonly balanceCache = new ResponseCache<number>();
  private readonly subscriptions = new Set<PushSubscription>();
  private sessionToken: string | null = null;
  private permissions: Permission[] = [];

  constructor(options: ProtocolClientOptions) {
    this.appName = options.appName;
    this.appUrl = options.appUrl ?? 'http://localhost';
    this.transport = new HttpTransport({
      serverUrl: options.serverUrl ?? DEFAULT_SERVER_URL,
      timeoutMs: options.timeoutMs ?? 10_000,
      headers: options.headers,
    });
    this.probeTimeoutMs = options.probeTimeoutMs ?? 5_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
    this.cacheTtlMs = options.cacheTtlMs ?? 30_000;
    this.logger = createComponentLogger(options.logger ?? getRootLogger(), 'protocol-client');
  }

  get isConnected(): boolean {
    return this.sessionToken !== null;
  }

  get grantedPermissions(): Permission[] {
    return [...this.permissions];
  }

  /** Entries held in the wallet-info and balance caches. */
  get cacheSize(): number {
    return this.infoCache.size + this.balanceCache.size;
  }

  getState(): ClientState {
    return { sessionToken: this.sessionToken, permissions: [...this.permissions] };
  }

  restoreState(state: ClientState): void {
    this.sessionToken = state.sessionToken;
    this.permissions = [...state.permissions];
  }

  // ── Discovery ───────────────────────────────────────────────────────────────

  /** Never throws: any failure reads as "not available". */
  async checkWalletAvailable(): Promise<boolean> {
    try {
      const status = await this.transport.request('GET', '/wallet/status', walletStatusSchema, {
        timeoutMs: this.probeTimeoutMs,
      });
      return status.available;
    } catch (err) {
      this.logger.debug({ err }, 'Wallet availability probe failed');
      return false;
    }
  }

  getStatus(): Promise<WalletStatus> {
    return this.transport.request('GET', '/wallet/status', walletStatusSchema);
  }

  // ── Authorization ───────────────────────────────────────────────────────────

  requestAuthorization(permissions: readonly string[], description?: string): Promise<AuthorizationRequestView> {
    return this.transport.request('POST', '/auth/request', authorizationRequestSchema, {
      body: {
        app_name: this.appName,
        app_url: this.appUrl,
        permissions: normalisePermissions(permissions),
        description,
      },
    });
  }

  /**
   * Polls until the request is resolved. A timeout or abort is a normal
   * outcome (`status: 'pending'`), not an error. While the wallet is
   * unreachable only the availability probe runs between polls.
   */
  async waitForAuthorization(requestId: string, options: WaitOptions = {}): Promise<AuthorizationOutcome> {
    const deadline = Date.now() + (options.timeoutMs ?? DEFAULT_WAIT_MS);
    const interval = options.pollIntervalMs ?? this.pollIntervalMs;

    for (;;) {
      try {
        const request = await this.transport.request('GET', `/auth/status/${encodeURIComponent(requestId)}`, authorizationRequestSchema);
        if (request.status !== 'pending') return this.settle(request);
      } catch (err) {
        if (!(err instanceof ProtocolError)) throw err;
        if (err.code === 'NOT_FOUND') return { requestId, status: 'expired' };
        if (err.code !== 'NETWORK_ERROR') throw err;
        const available = await this.checkWalletAvailable();
        this.logger.warn({ requestId, available }, 'Wallet unreachable while waiting for authorization');
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0 || options.signal?.aborted) return { requestId, status: 'pending' };
      try {
        await sleep(Math.min(interval, remaining), undefined, { signal: options.signal });
      } catch {
        // Aborted by the caller.
        return { requestId, status: 'pending' };
      }
    }
  }

  /**
   * Full handshake: probe, request, wait. Returns true once a session is held.
   * Requires at least one permission.
   */
  async connect(permissions: readonly string[], options: ConnectOptions = {}): Promise<boolean> {
    if (permissions.length === 0) {
      throw new ProtocolError('INVALID_REQUEST', 'At least one permission is required');
    }
    if (!(await this.checkWalletAvailable())) {
      this.logger.warn({ serverUrl: this.transport.serverUrl }, 'Wallet is not available');
      return false;
    }
    const pending = await this.requestAuthorization(permissions, options.description);
    this.logger.info({ requestId: pending.requestId }, 'Waiting for the user to approve the connection');

    const outcome = await this.waitForAuthorization(pending.requestId, options);
    if (outcome.status !== 'approved') {
      this.logger.info({ requestId: pending.requestId, status: outcome.status }, 'Connection not approved');
      return false;
    }
    if (this.permissions.includes('wallet_info')) {
      await this.getWalletInfo();
    }
    return true;
  }

  /** Revokes the session (best effort) and forgets all cached state. */
  async disconnect(): Promise<void> {
    const token = this.sessionToken;
    this.clearSession();
    for (const subscription of this.subscriptions) subscription.close();
    this.subscriptions.clear();
    if (!token) return;
    try {
      await this.transport.request('POST', '/auth/revoke', statusMessageSchema, {
        headers: { Authorization: `Bearer ${token}` },
      });
    } catch (err) {
      this.logger.debug({ err }, 'Session revoke failed; token dropped locally');
    }
  }

  // ── Scoped operations ───────────────────────────────────────────────────────

  async getWalletInfo(): Promise<WalletInfo> {
    const cached = this.infoCache.get(WALLET_INFO_KEY, this.cacheTtlMs);
    if (cached) return cached;
    const info = await this.authed('GET', '/wallet/info', walletInfoSchema);
    this.infoCache.set(WALLET_INFO_KEY, info);
    return info;
  }

  async getBalance(contract = 'currency'): Promise<number> {
    const key = balanceKey(contract);
    const cached = this.balanceCache.get(key, this.cacheTtlMs);
    if (cached !== undefined) return cached;
    const { balance } = await this.authed('GET', `/balance/${encodeURIComponent(contract)}`, balanceSchema);
    this.balanceCache.set(key, balance);
    return balance;
  }

  async sendTransaction(
    contract: string,
    fn: string,
    kwargs: Record<string, unknown> = {},
    stampsSupplied?: number,
  ): Promise<TransactionOutcome> {
    try {
      return await this.authed('POST', '/transaction', transactionSchema, {
        contract,
        function: fn,
        kwargs,
        stamps_supplied: stampsSupplied,
      });
    } finally {
      this.balanceCache.clear();
    }
  }

  signMessage(message: string): Promise<SignedMessage> {
    return this.authed('POST', '/sign', signatureSchema, { message });
  }

  addToken(contractAddress: string, metadata: TokenMetadata = {}): Promise<WalletToken> {
    return this.authed('POST', '/tokens/add', addTokenSchema, {
      contract_address: contractAddress,
      token_name: metadata.tokenName,
      token_symbol: metadata.tokenSymbol,
      decimals: metadata.decimals,
    });
  }

  listTokens(): Promise<WalletToken[]> {
    return this.authed('GET', '/tokens', tokenListSchema);
  }

  async lockWallet(): Promise<void> {
    await this.authed('POST', '/wallet/lock', statusMessageSchema, {});
    this.infoCache.clear();
  }

  /** Throws TOO_MANY_ATTEMPTS / ACCOUNT_LOCKED with `retryAfterSeconds`; never retries. */
  async unlockWallet(password: string): Promise<void> {
    await this.transport.request('POST', '/wallet/unlock', statusMessageSchema, { body: { password } });
    this.infoCache.clear();
  }

  // ── Push ────────────────────────────────────────────────────────────────────

  /** Opens a push connection; it is closed again by disconnect(). */
  async subscribe(listener: PushListener, headers?: Record<string, string>): Promise<PushSubscription> {
    const subscription = await this.transport.subscribe(listener, {
      headers,
      logger: this.logger,
      onClose: () => this.subscriptions.delete(subscription),
    });
    this.subscriptions.add(subscription);
    return subscription;
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private settle(request: AuthorizationRequestView): AuthorizationOutcome {
    if (request.status === 'approved' && request.sessionToken) {
      this.sessionToken = request.sessionToken;
      this.permissions = [...request.permissions];
      this.infoCache.clear();
      this.balanceCache.clear();
      return { requestId: request.requestId, status: 'approved', sessionToken: request.sessionToken, permissions: request.permissions };
    }
    return { requestId: request.requestId, status: request.status };
  }

  private async authed<T>(
    method: 'GET' | 'POST',
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    body?: unknown,
  ): Promise<T> {
    const token = this.sessionToken;
    if (!token) {
      throw new ProtocolError('UNAUTHORIZED', 'Not connected: call connect() first');
    }
    try {
      return await this.transport.request(method, path, schema, {
        body,
        headers: { Authorization: `Bearer ${token}` },
      });
    } catch (err) {
      if (err instanceof ProtocolError && (err.code === 'UNAUTHORIZED' || err.code === 'SESSION_EXPIRED')) {
        this.clearSession();
      }
      throw err;
    }
  }

  private clearSession(): void {
    this.sessionToken = null;
    this.permissions = [];
    this.infoCache.clear();
    this.balanceCache.clear();
  }
}
