/**
 * @file src/server/server.ts
 *
 * ProtocolServer: the local wallet service.
 *
 * Owns the protocol state (requests, sessions, rate limits, balance cache,
 * push listeners) and the wallet lock, exposes it over HTTP and the push
 * channel, and runs one background sweeper for expiry and auto-lock.
 *
 * The public methods are the same operations the routes call, so an embedding
 * wallet UI can drive approvals in-process without going through HTTP.
 */

import * as http from 'node:http';
import type { AddressInfo } from 'node:net';
import { setTimeout as sleep } from 'node:timers/promises';
import express, { type Express } from 'express';
import {
  API_PREFIX,
  DEFAULT_HOST,
  DEFAULT_PORT,
  PROTOCOL_VERSION,
  ProtocolDefaults,
  ProtocolError,
  requestToBody,
} from '../protocol/types.js';
import type {
  AuthorizationRequest,
  BalanceBody,
  Session,
  SignatureBody,
  TokenBody,
  TransactionResultBody,
  WalletInfoBody,
  WalletStatusBody,
  WalletType,
} from '../protocol/types.js';
import type { AddTokenInput, TransactionInput } from '../protocol/schemas.js';
import { RequestRegistry, type NewAuthorizationRequest } from '../auth/requests.js';
import { SessionStore } from '../auth/sessions.js';
import { RateLimiter, type RateLimiterOptions } from '../auth/rate-limiter.js';
import { BALANCE_PREFIX, ResponseCache, balanceKey } from '../cache/response-cache.js';
import { NotificationBus } from '../notify/bus.js';
import { AuditDb, type AuditEventType, type AuditRow } from '../logger/audit.js';
import { createComponentLogger, getRootLogger, type Logger } from '../logger/logger.js';
import { WalletLock } from '../wallet/lock.js';
import { createPasswordVerifier } from '../wallet/password.js';
import type { NetworkConfig, WalletBackend } from '../wallet/types.js';
import { CorsConfig, createCorsMiddleware } from './cors.js';
import { errorHandler, notFoundHandler } from './middleware.js';
import { attachPushChannel, type PushChannel } from './push.js';
import { createApiRouter } from './routes.js';
import { PeriodicSweeper } from './sweeper.js';
import {
  StartupError,
  createProcessPortReclaimer,
  isAddressInUse,
  probeWalletServer,
  type PortReclaimer,
} from './startup.js';

// ── Options ───────────────────────────────────────────────────────────────────

export interface ProtocolServerOptions {
  wallet?: WalletBackend;
  /** Reported when no backend is attached; otherwise the backend's own type wins. */
  walletType?: WalletType;
  /** Unlock password. When set the wallet starts locked unless `locked` says otherwise. */
  password?: string;
  locked?: boolean;
  network?: NetworkConfig;
  cors?: CorsConfig;
  /** Extra credential for wallet-local endpoints (X-Wallet-Token). */
  adminToken?: string;
  maxSessions?: number;
  maxPendingRequests?: number;
  sessionTimeoutMs?: number;
  sessionIdleTimeoutMs?: number;
  requestTimeoutMs?: number;
  autoLockMs?: number;
  cacheTtlMs?: number;
  sweepIntervalMs?: number;
  sweepStopTimeoutMs?: number;
  rateLimit?: RateLimiterOptions;
  /** Audit log location; ':memory:' by default. Ignored when `audit` is given. */
  auditDbPath?: string;
  audit?: AuditDb;
  logger?: Logger;
}

export interface RobustStartOptions {
  host?: string;
  port?: number;
  maxRetries?: number;
  /** Base delay between attempts; doubles each retry. */
  retryDelayMs?: number;
  probeTimeoutMs?: number;
  reclaimer?: PortReclaimer;
}

export interface SweepReport {
  expiredRequests: number;
  expiredSessions: number;
  prunedRateLimits: number;
  autoLocked: boolean;
}

// ── ProtocolServer ────────────────────────────────────────────────────────────

export class ProtocolServer {
  readonly app: Express;
  readonly requests: RequestRegistry;
  readonly sessions: SessionStore;
  readonly rateLimiter: RateLimiter;
  readonly cache = new ResponseCache<BalanceBody>();
  readonly bus: NotificationBus;
  readonly audit: AuditDb;
  readonly lock: WalletLock;
  readonly adminToken: string | undefined;

  private readonly logger: Logger;
  private readonly sweeper: PeriodicSweeper;
  private readonly cacheTtlMs: number;
  private readonly walletTypeFallback: WalletType;
  private readonly tokens = new Map<string, TokenBody>();
  private wallet: WalletBackend | undefined;
  private network: NetworkConfig | undefined;
  private httpServer: http.Server | null = null;
  private push: PushChannel | null = null;

  constructor(options: ProtocolServerOptions = {}) {
    this.logger = createComponentLogger(options.logger ?? getRootLogger(), 'protocol-server');
    this.wallet = options.wallet;
    this.walletTypeFallback = options.walletType ?? 'cli';
    this.network = options.network;
    this.adminToken = options.adminToken;
    this.cacheTtlMs = options.cacheTtlMs ?? ProtocolDefaults.cacheTtlSeconds * 1000;

    this.bus = new NotificationBus(createComponentLogger(this.logger, 'push'));
    this.sessions = new SessionStore({
      maxSessions: options.maxSessions,
      timeoutMs: options.sessionTimeoutMs,
      idleTimeoutMs: options.sessionIdleTimeoutMs,
    });
    this.requests = new RequestRegistry(this.sessions, {
      maxPending: options.maxPendingRequests,
      timeoutMs: options.requestTimeoutMs,
      listener: {
        onRequestCreated: (request) => {
          this.bus.broadcast({ type: 'authorization_request', request: requestToBody(request, this.requests.timeoutMs) });
        },
        onApprovalAbandoned: (request) => {
          this.audit.log('session_revoked', { reason: 'uncollected' }, { appName: request.appName, requestId: request.requestId });
          this.logger.info({ requestId: request.requestId, appName: request.appName }, 'Uncollected session revoked');
          this.bus.broadcast({ type: 'session_revoked', app_name: request.appName });
        },
      },
    });
    this.rateLimiter = new RateLimiter(options.rateLimit);
    this.audit = options.audit ?? new AuditDb(options.auditDbPath ?? ':memory:');
    this.lock = new WalletLock({
      verifier: options.password !== undefined ? createPasswordVerifier(options.password) : undefined,
      locked: options.locked,
      autoLockMs: options.autoLockMs ?? ProtocolDefaults.autoLockMinutes * 60_000,
    });
    this.sweeper = new PeriodicSweeper(
      (now) => { this.sweep(now); },
      {
        intervalMs: options.sweepIntervalMs ?? ProtocolDefaults.sweepIntervalSeconds * 1000,
        stopTimeoutMs: options.sweepStopTimeoutMs,
      },
      createComponentLogger(this.logger, 'sweeper'),
    );

    const app = express();
    app.disable('x-powered-by');
    app.use(createCorsMiddleware(options.cors ?? CorsConfig.localhostDev()));
    app.use(express.json({ limit: '64kb' }));
    app.use(API_PREFIX, createApiRouter(this));
    app.use(notFoundHandler());
    app.use(errorHandler(this.logger));
    this.app = app;
  }

  // ── Configuration ───────────────────────────────────────────────────────────

  setWallet(wallet: WalletBackend | undefined): void {
    this.wallet = wallet;
    this.cache.clear();
  }

  /** Replaces the unlock password. Does not change the lock state. */
  setPassword(password: string): void {
    this.lock.setVerifier(createPasswordVerifier(password));
  }

  configureNetwork(url: string, chainId: string): void {
    this.network = { url, chainId };
    this.cache.clear();
    this.logger.info({ url, chainId }, 'Network configured');
  }

  get walletType(): WalletType {
    return this.wallet?.walletType ?? this.walletTypeFallback;
  }

  // ── Wallet state ────────────────────────────────────────────────────────────

  status(): WalletStatusBody {
    return {
      available: true,
      locked: this.lock.isLocked,
      wallet_type: this.walletType,
      network: this.network?.url ?? null,
      chain_id: this.network?.chainId ?? null,
      version: PROTOCOL_VERSION,
    };
  }

  walletInfo(): WalletInfoBody {
    const address = this.requireWallet().getAddress();
    return {
      address,
      truncated_address: truncateAddress(address),
      locked: this.lock.isLocked,
      chain_id: this.network?.chainId ?? null,
      network: this.network?.url ?? null,
      wallet_type: this.walletType,
      version: PROTOCOL_VERSION,
    };
  }

  /** Rate-limited by `source`. Throws TOO_MANY_ATTEMPTS, ACCOUNT_LOCKED or UNAUTHORIZED. */
  unlock(password: string, source: string, now: number = Date.now()): void {
    try {
      this.rateLimiter.check(source, now);
    } catch (err) {
      this.audit.log('unlock_rejected', { code: err instanceof ProtocolError ? err.code : 'unknown' }, { source });
      throw err;
    }
    if (!this.lock.hasPassword) {
      throw new ProtocolError('INVALID_STATE', 'No wallet password is configured');
    }
    if (!this.lock.unlock(password, now)) {
      const record = this.rateLimiter.recordFailure(source, now);
      this.audit.log('unlock_failed', { attempts: record.attempts }, { source });
      this.logger.warn({ source, attempts: record.attempts }, 'Wallet unlock failed');
      throw new ProtocolError('UNAUTHORIZED', 'Invalid password');
    }
    this.rateLimiter.recordSuccess(source);
    this.audit.log('unlock_succeeded', {}, { source });
    this.logger.info({ source }, 'Wallet unlocked');
    this.bus.broadcast({ type: 'wallet_unlocked' });
  }

  lockWallet(reason: 'manual' | 'auto_lock'): boolean {
    const changed = this.lock.lock();
    if (changed) this.onLocked(reason);
    return changed;
  }

  // ── Authorization ───────────────────────────────────────────────────────────

  createAuthorizationRequest(input: NewAuthorizationRequest): AuthorizationRequest {
    const request = this.requests.create(input);
    this.audit.log('auth_requested', { permissions: request.permissions, appUrl: request.appUrl }, {
      appName: request.appName,
      requestId: request.requestId,
    });
    this.logger.info({ requestId: request.requestId, appName: request.appName }, 'Authorization requested');
    return request;
  }

  /** A resolved request is handed out once, then dropped. */
  authorizationStatus(requestId: string): AuthorizationRequest {
    const request = this.requests.getStatus(requestId);
    if (request.status !== 'pending') this.requests.consume(requestId);
    return request;
  }

  pendingRequests(): AuthorizationRequest[] {
    return this.requests.listPending();
  }

  approveRequest(requestId: string): Session {
    if (this.lock.isLocked) {
      throw new ProtocolError('WALLET_LOCKED', 'Unlock the wallet before approving requests');
    }
    const session = this.requests.approve(requestId);
    this.lock.touch();
    this.audit.log('auth_approved', { permissions: session.permissions }, { appName: session.appName, requestId });
    this.logger.info({ requestId, appName: session.appName }, 'Authorization approved');
    this.bus.broadcast({ type: 'authorization_resolved', request_id: requestId, status: 'approved' });
    return session;
  }

  denyRequest(requestId: string): AuthorizationRequest {
    const request = this.requests.deny(requestId);
    this.audit.log('auth_denied', {}, { appName: request.appName, requestId });
    this.logger.info({ requestId, appName: request.appName }, 'Authorization denied');
    this.bus.broadcast({ type: 'authorization_resolved', request_id: requestId, status: 'denied' });
    return request;
  }

  revokeSession(token: string): boolean {
    const session = this.sessions.list().find((s) => s.token === token);
    const removed = this.sessions.revoke(token);
    if (removed && session) {
      this.audit.log('session_revoked', {}, { appName: session.appName });
      this.bus.broadcast({ type: 'session_revoked', app_name: session.appName });
    }
    return removed;
  }

  // ── Scoped operations ───────────────────────────────────────────────────────

  async getBalance(contract: string): Promise<BalanceBody> {
    const wallet = this.requireUnlockedWallet();
    const key = balanceKey(contract);
    const hit = this.cache.get(key, this.cacheTtlMs);
    if (hit) return { ...hit, cached: true };

    const balance = await this.callBackend(() => wallet.getBalance(contract), 'Balance lookup failed');
    const body: BalanceBody = { balance, contract, cached: false };
    this.cache.set(key, body);
    return body;
  }

  async sendTransaction(session: Session, input: TransactionInput): Promise<TransactionResultBody> {
    const wallet = this.requireUnlockedWallet();
    const network = this.network;
    if (!network) {
      throw new ProtocolError('NETWORK_ERROR', 'Network configuration not set');
    }
    const call = {
      contract: input.contract,
      function: input.function,
      kwargs: input.kwargs,
      stampsSupplied: input.stamps_supplied,
    };
    const result = await this.callBackend(() => wallet.sendTransaction(call, network), 'Transaction submission failed');
    const body: TransactionResultBody = {
      success: result.success,
      transaction_hash: result.transactionHash ?? null,
      result: result.result ?? null,
      errors: result.errors ?? null,
      gas_used: result.gasUsed ?? null,
    };
    const context = { appName: session.appName };
    const details = { contract: call.contract, function: call.function, transactionHash: body.transaction_hash };

    if (!result.success) {
      this.audit.log('tx_failed', { ...details, errors: body.errors }, context);
      throw new ProtocolError('TRANSACTION_FAILED', body.errors?.join('; ') || 'Transaction failed', { details: body });
    }
    this.cache.clearMatching(BALANCE_PREFIX);
    this.audit.log('tx_submitted', details, context);
    this.logger.info({ ...details, appName: session.appName }, 'Transaction submitted');
    return body;
  }

  async signMessage(session: Session, message: string): Promise<SignatureBody> {
    const wallet = this.requireUnlockedWallet();
    const signature = await this.callBackend(() => wallet.signMessage(message), 'Message signing failed');
    this.audit.log('message_signed', { length: message.length }, { appName: session.appName });
    return { signature, message, address: wallet.getAddress() };
  }

  addToken(session: Session, input: AddTokenInput): TokenBody {
    this.requireUnlockedWallet();
    const token: TokenBody = {
      contract_address: input.contract_address,
      token_name: input.token_name ?? null,
      token_symbol: input.token_symbol ?? null,
      decimals: input.decimals ?? null,
      added_at: new Date().toISOString(),
    };
    this.tokens.set(token.contract_address, token);
    this.audit.log('token_added', { contractAddress: token.contract_address }, { appName: session.appName });
    return token;
  }

  listTokens(): TokenBody[] {
    return [...this.tokens.values()];
  }

  auditEvents(limit: number, event?: AuditEventType): AuditRow[] {
    return this.audit.query({ limit, event });
  }

  // ── Background sweep ────────────────────────────────────────────────────────

  sweep(now: number = Date.now()): SweepReport {
    const expiredRequests = this.requests.sweepExpired(now);
    for (const request of expiredRequests) {
      this.audit.log('auth_expired', {}, { appName: request.appName, requestId: request.requestId });
      this.bus.broadcast({ type: 'authorization_resolved', request_id: request.requestId, status: 'expired' });
    }
    const expiredSessions = this.sessions.sweepExpired(now);
    for (const session of expiredSessions) {
      this.audit.log('session_expired', {}, { appName: session.appName });
    }
    const prunedRateLimits = this.rateLimiter.sweep(now);
    const autoLocked = this.lock.autoLock(now);
    if (autoLocked) this.onLocked('auto_lock');

    const report = {
      expiredRequests: expiredRequests.length,
      expiredSessions: expiredSessions.length,
      prunedRateLimits,
      autoLocked,
    };
    this.logger.debug(report, 'Sweep complete');
    return report;
  }

  // ── Lifecycle ───────────────────────────────────────────────────────────────

  get running(): boolean {
    return this.httpServer !== null;
  }

  address(): AddressInfo | null {
    const address = this.httpServer?.address();
    return address && typeof address === 'object' ? address : null;
  }

  /** Binds host:port. Throws StartupError('PORT_IN_USE') when the port is taken. */
  async start(host: string = DEFAULT_HOST, port: number = DEFAULT_PORT): Promise<AddressInfo> {
    const current = this.address();
    if (current) return current;

    const server = http.createServer(this.app);
    try {
      await listen(server, host, port);
    } catch (err) {
      if (isAddressInUse(err)) {
        throw new StartupError('PORT_IN_USE', `Port ${port} is already in use`, port, err);
      }
      throw new StartupError('BIND_FAILED', `Could not bind ${host}:${port}`, port, err);
    }

    this.httpServer = server;
    this.push = attachPushChannel(server, {
      bus: this.bus,
      logger: createComponentLogger(this.logger, 'push'),
      adminToken: this.adminToken,
      snapshot: () => ({
        type: 'pending_requests',
        requests: this.requests.listPending().map((r) => requestToBody(r, this.requests.timeoutMs)),
      }),
    });
    this.sweeper.start();

    const bound = this.address() ?? { address: host, family: 'IPv4', port };
    this.logger.info({ host: bound.address, port: bound.port }, 'Wallet protocol server listening');
    return bound;
  }

  /**
   * start() with port-conflict recovery. A wallet server on the port is
   * ALREADY_RUNNING and another HTTP service is PORT_IN_USE; both are left
   * alone. A holder that does not answer is reclaimed and the bind retried
   * with exponential backoff, up to `maxRetries` reclaim-and-bind attempts.
   */
  async startRobust(options: RobustStartOptions = {}): Promise<AddressInfo> {
    const host = options.host ?? DEFAULT_HOST;
    const port = options.port ?? DEFAULT_PORT;
    const maxRetries = Math.max(1, options.maxRetries ?? 3);
    const retryDelayMs = options.retryDelayMs ?? 500;
    const probeTimeoutMs = options.probeTimeoutMs ?? 2_000;
    const reclaimer = options.reclaimer ?? createProcessPortReclaimer(this.logger);

    let lastError: unknown;
    const tryBind = async (): Promise<AddressInfo | null> => {
      try {
        return await this.start(host, port);
      } catch (err) {
        if (!(err instanceof StartupError) || err.code !== 'PORT_IN_USE') throw err;
        lastError = err;
        return null;
      }
    };

    const first = await tryBind();
    if (first) return first;

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      const occupant = await probeWalletServer(host, port, probeTimeoutMs);
      if (occupant === 'wallet') {
        throw new StartupError('ALREADY_RUNNING', `A wallet server is already running on port ${port}`, port);
      }
      if (occupant === 'foreign') {
        throw new StartupError('PORT_IN_USE', `Port ${port} is held by another service`, port, lastError);
      }
      this.logger.warn({ port, attempt, maxRetries }, 'Port held by an unresponsive process; reclaiming');
      await reclaimer.reclaim(port);
      await sleep(retryDelayMs * 2 ** (attempt - 1));
      const bound = await tryBind();
      if (bound) return bound;
    }
    throw new StartupError('PORT_IN_USE', `Port ${port} is still in use after ${maxRetries} attempts`, port, lastError);
  }

  /** Stops listening and drops all protocol state. Safe to call more than once. */
  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = null;

    await this.sweeper.stop();
    this.bus.broadcast({ type: 'server_shutdown' });
    this.bus.closeAll();
    if (this.push) {
      await this.push.close();
      this.push = null;
    }
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });

    this.requests.clear();
    this.sessions.clear();
    this.cache.clear();
    this.logger.info('Wallet protocol server stopped');
  }

  /** stop(), then release the audit log. The instance cannot be restarted. */
  async close(): Promise<void> {
    await this.stop();
    this.audit.close();
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private requireWallet(): WalletBackend {
    if (!this.wallet) {
      throw new ProtocolError('WALLET_NOT_FOUND', 'No wallet is attached to this server');
    }
    return this.wallet;
  }

  private requireUnlockedWallet(): WalletBackend {
    const wallet = this.requireWallet();
    if (this.lock.isLocked) {
      throw new ProtocolError('WALLET_LOCKED', 'Wallet is locked');
    }
    return wallet;
  }

  private async callBackend<T>(fn: () => Promise<T>, message: string): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof ProtocolError) throw err;
      this.logger.warn({ err }, message);
      throw new ProtocolError('NETWORK_ERROR', message, { cause: err });
    }
  }

  private onLocked(reason: 'manual' | 'auto_lock'): void {
    this.cache.clear();
    this.audit.log('wallet_locked', { reason });
    this.logger.info({ reason }, 'Wallet locked');
    this.bus.broadcast({ type: 'wallet_locked', reason });
  }
}

// ── Helpers ───────────────────────────────────────────────────────────────────

export function truncateAddress(address: string): string {
  return address.length <= 16 ? address : `${address.slice(0, 8)}...${address.slice(-8)}`;
}

function listen(server: http.Server, host: string, port: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const onError = (err: Error): void => {
      server.off('listening', onListening);
      reject(err);
    };
    const onListening = (): void => {
      server.off('error', onError);
      resolve();
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(port, host);
  });
}
