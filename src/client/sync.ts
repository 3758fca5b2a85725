/**
 * @file src/client/sync.ts
 *
 * SyncProtocolClient: blocking wrapper around ProtocolClient for callers that
 * cannot await (scripts, synchronous plugin hooks).
 *
 * Each instance owns one worker thread running a ProtocolClient. A call posts
 * the method and arguments over a MessageChannel, then parks the calling
 * thread on Atomics.wait until the worker flips a shared flag, and picks the
 * reply up with receiveMessageOnPort. Session state travels with every call
 * and reply, so a worker that dies or stops answering is replaced on the next
 * call without losing the session.
 *
 * Do not use it on a thread that also runs the wallet server: the server
 * cannot answer while that thread is blocked.
 */

import { extname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { MessageChannel, Worker, receiveMessageOnPort, type MessagePort } from 'node:worker_threads';
import { ProtocolError, isErrorCode } from '../protocol/types.js';
import type { Permission } from '../protocol/types.js';
import { createComponentLogger, getRootLogger, type Logger } from '../logger/logger.js';
import type {
  AuthorizationOutcome,
  ClientState,
  ConnectOptions,
  ProtocolClientConfig,
  TokenMetadata,
  WaitOptions,
} from './client.js';
import type {
  AuthorizationRequestView,
  SignedMessage,
  TransactionOutcome,
  WalletInfo,
  WalletStatus,
  WalletToken,
} from './schemas.js';

// ── Wire between the two threads ──────────────────────────────────────────────

/** Methods the worker will run. AbortSignals do not cross threads, so waits take only timeouts. */
export interface SyncMethods {
  checkWalletAvailable(): boolean;
  getStatus(): WalletStatus;
  requestAuthorization(permissions: string[], description?: string): AuthorizationRequestView;
  waitForAuthorization(requestId: string, options?: Omit<WaitOptions, 'signal'>): AuthorizationOutcome;
  connect(permissions: string[], options?: Omit<ConnectOptions, 'signal'>): boolean;
  disconnect(): void;
  getWalletInfo(): WalletInfo;
  getBalance(contract?: string): number;
  sendTransaction(contract: string, fn: string, kwargs?: Record<string, unknown>, stampsSupplied?: number): TransactionOutcome;
  signMessage(message: string): SignedMessage;
  addToken(contractAddress: string, metadata?: TokenMetadata): WalletToken;
  listTokens(): WalletToken[];
  unlockWallet(password: string): void;
  lockWallet(): void;
}

export type SyncMethod = keyof SyncMethods;

export interface SyncCall {
  id: number;
  method: SyncMethod;
  args: unknown[];
  state: ClientState;
}

export interface SerializedError {
  name: string;
  message: string;
  code?: string;
  status?: number;
  retryAfterSeconds?: number;
  details?: unknown;
}

export type SyncReply =
  | { id: number; ok: true; value: unknown; state: ClientState }
  | { id: number; ok: false; error: SerializedError; state: ClientState };

export interface SyncWorkerData {
  config: ProtocolClientConfig;
  /** Int32Array over a SharedArrayBuffer; the worker stores 1 and notifies when a reply is posted. */
  signal: Int32Array;
  port: MessagePort;
  logLevel: string;
}

function isSyncReply(value: unknown): value is SyncReply {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'number' &&
    'ok' in value &&
    typeof value.ok === 'boolean' &&
    'state' in value
  );
}

export function reviveError(error: SerializedError): Error {
  if (error.code !== undefined && isErrorCode(error.code)) {
    return new ProtocolError(error.code, error.message, {
      status: error.status,
      retryAfterSeconds: error.retryAfterSeconds,
      details: error.details,
    });
  }
  const revived = new Error(error.message);
  revived.name = error.name;
  return revived;
}

// ── Client ────────────────────────────────────────────────────────────────────

export interface SyncProtocolClientOptions extends ProtocolClientConfig {
  /** Extra time allowed on top of a call's own timeouts before the worker is replaced. */
  graceMs?: number;
  logLevel?: string;
  logger?: Logger;
}

interface WorkerHandle {
  worker: Worker;
  port: MessagePort;
  signal: Int32Array;
}

const workerUrl = (): URL => {
  const ext = extname(fileURLToPath(import.meta.url));
  return new URL(`./sync-worker${ext === '.ts' ? '.ts' : '.js'}`, import.meta.url);
};

export class SyncProtocolClient {
  private readonly config: ProtocolClientConfig;
  private readonly graceMs: number;
  private readonly logLevel: string;
  private readonly logger: Logger;
  private handle: WorkerHandle | null = null;
  private state: ClientState = { sessionToken: null, permissions: [] };
  private nextId = 1;
  private closed = false;

  constructor(options: SyncProtocolClientOptions) {
    const { graceMs, logLevel, logger, ...config } = options;
    this.config = config;
    this.graceMs = graceMs ?? 5_000;
    this.logLevel = logLevel ?? process.env['LOG_LEVEL'] ?? 'info';
    this.logger = createComponentLogger(logger ?? getRootLogger(), 'sync-client');
  }

  get isConnected(): boolean {
    return this.state.sessionToken !== null;
  }

  get grantedPermissions(): Permission[] {
    return [...this.state.permissions];
  }

  checkWalletAvailable(): boolean {
    return this.call('checkWalletAvailable', []);
  }

  getStatus(): WalletStatus {
    return this.call('getStatus', []);
  }

  requestAuthorization(permissions: string[], description?: string): AuthorizationRequestView {
    return this.call('requestAuthorization', [permissions, description]);
  }

  waitForAuthorization(requestId: string, options: Omit<WaitOptions, 'signal'> = {}): AuthorizationOutcome {
    return this.call('waitForAuthorization', [requestId, options], options.timeoutMs ?? 5 * 60_000);
  }

  connect(permissions: string[], options: Omit<ConnectOptions, 'signal'> = {}): boolean {
    return this.call('connect', [permissions, options], options.timeoutMs ?? 5 * 60_000);
  }

  disconnect(): void {
    this.call('disconnect', []);
  }

  getWalletInfo(): WalletInfo {
    return this.call('getWalletInfo', []);
  }

  getBalance(contract = 'currency'): number {
    return this.call('getBalance', [contract]);
  }

  sendTransaction(contract: string, fn: string, kwargs: Record<string, unknown> = {}, stampsSupplied?: number): TransactionOutcome {
    return this.call('sendTransaction', [contract, fn, kwargs, stampsSupplied]);
  }

  signMessage(message: string): SignedMessage {
    return this.call('signMessage', [message]);
  }

  addToken(contractAddress: string, metadata: TokenMetadata = {}): WalletToken {
    return this.call('addToken', [contractAddress, metadata]);
  }

  listTokens(): WalletToken[] {
    return this.call('listTokens', []);
  }

  unlockWallet(password: string): void {
    this.call('unlockWallet', [password]);
  }

  lockWallet(): void {
    this.call('lockWallet', []);
  }

  /** Stops the worker. Further calls throw. */
  close(): void {
    this.closed = true;
    this.discardWorker();
  }

  // ── Internals ───────────────────────────────────────────────────────────────

  private call<M extends SyncMethod>(
    method: M,
    args: Parameters<SyncMethods[M]>,
    extraMs = 0,
  ): ReturnType<SyncMethods[M]> {
    if (this.closed) {
      throw new ProtocolError('INVALID_STATE', 'Client is closed');
    }
    const handle = this.ensureWorker();
    const id = this.nextId++;
    const message: SyncCall = { id, method, args, state: this.state };

    Atomics.store(handle.signal, 0, 0);
    handle.port.postMessage(message);

    const budget = extraMs + 2 * (this.config.timeoutMs ?? 10_000) + this.graceMs;
    const deadline = Date.now() + budget;
    let reply: SyncReply | undefined;
    while (!reply) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;
      Atomics.wait(handle.signal, 0, 0, remaining);
      const received = receiveMessageOnPort(handle.port);
      if (received === undefined) continue;
      const candidate: unknown = received.message;
      if (isSyncReply(candidate) && candidate.id === id) reply = candidate;
    }

    if (!reply) {
      this.logger.warn({ method, budgetMs: budget }, 'Client worker did not answer; replacing it');
      this.discardWorker();
      throw new ProtocolError('NETWORK_ERROR', `Wallet client worker did not answer ${method} in time`);
    }

    this.state = reply.state;
    if (!reply.ok) throw reviveError(reply.error);
    // The worker ran ProtocolClient[method]; the structured clone keeps its shape.
    return reply.value as ReturnType<SyncMethods[M]>;
  }

  private ensureWorker(): WorkerHandle {
    if (this.handle) return this.handle;

    const { port1, port2 } = new MessageChannel();
    const signal = new Int32Array(new SharedArrayBuffer(Int32Array.BYTES_PER_ELEMENT));
    const url = workerUrl();
    const workerData: SyncWorkerData = { config: this.config, signal, port: port2, logLevel: this.logLevel };
    const worker = new Worker(url, {
      workerData,
      transferList: [port2],
      execArgv: url.pathname.endsWith('.ts') ? ['--import', 'tsx'] : undefined,
    });
    worker.unref();
    port1.unref();

    const handle: WorkerHandle = { worker, port: port1, signal };
    worker.on('error', (err) => {
      this.logger.warn({ err }, 'Client worker crashed');
      if (this.handle === handle) this.discardWorker();
    });
    worker.on('exit', () => {
      if (this.handle === handle) this.handle = null;
    });
    this.handle = handle;
    return handle;
  }

  private discardWorker(): void {
    const handle = this.handle;
    if (!handle) return;
    this.handle = null;
    handle.port.close();
    handle.worker.terminate().catch((err: unknown) => {
      this.logger.debug({ err }, 'Client worker terminate failed');
    });
  }
}
