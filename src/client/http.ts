/**
 * @file src/client/http.ts
 * Transport shared by the DApp and wallet-UI clients: JSON over fetch with a
 * per-call timeout, error bodies mapped back onto ProtocolError, and the
 * WebSocket push subscription.
 */

import WebSocket from 'ws';
import type { ZodType, ZodTypeDef } from 'zod';
import { API_PREFIX, PUSH_PATH, ProtocolError, isErrorCode } from '../protocol/types.js';
import type { ErrorCode } from '../protocol/types.js';
import type { Logger } from '../logger/logger.js';
import { errorBodySchema, pushEventSchema, type ClientPushEvent } from './schemas.js';

export type HttpMethod = 'GET' | 'POST';

export interface RequestOptions {
  body?: unknown;
  headers?: Record<string, string>;
  timeoutMs?: number;
}

export interface TransportOptions {
  serverUrl: string;
  timeoutMs: number;
  headers?: Record<string, string>;
}

function fallbackCode(status: number): ErrorCode {
  switch (status) {
    case 401: return 'UNAUTHORIZED';
    case 403: return 'FORBIDDEN';
    case 404: return 'NOT_FOUND';
    case 423: return 'WALLET_LOCKED';
    case 429: return 'TOO_MANY_ATTEMPTS';
    default: return 'INTERNAL_ERROR';
  }
}

export class HttpTransport {
  readonly serverUrl: string;
  private readonly timeoutMs: number;
  private readonly headers: Record<string, string>;

  constructor(options: TransportOptions) {
    this.serverUrl = options.serverUrl.replace(/\/+$/, '');
    this.timeoutMs = options.timeoutMs;
    this.headers = { ...options.headers };
  }

  /** Calls `${serverUrl}/api/v1${path}` and parses a 2xx body with `schema`. */
  async request<T>(
    method: HttpMethod,
    path: string,
    schema: ZodType<T, ZodTypeDef, unknown>,
    options: RequestOptions = {},
  ): Promise<T> {
    const url = `${this.serverUrl}${API_PREFIX}${path}`;
    const headers: Record<string, string> = { Accept: 'application/json', ...this.headers, ...options.headers };
    if (options.body !== undefined) headers['Content-Type'] = 'application/json';

    // The deadline covers the body as well as the headers.
    const ctrl = new AbortController();
    const timer = setTimeout(() => ctrl.abort(), options.timeoutMs ?? this.timeoutMs);
    let resp: Response;
    let payload: unknown;
    try {
      try {
        resp = await fetch(url, {
          method,
          headers,
          body: options.body !== undefined ? JSON.stringify(options.body) : undefined,
          signal: ctrl.signal,
        });
      } catch (err) {
        throw new ProtocolError('NETWORK_ERROR', `Could not reach wallet at ${this.serverUrl}`, { cause: err });
      }
      try {
        payload = await readJson(resp);
      } catch (err) {
        throw new ProtocolError('NETWORK_ERROR', `Wallet at ${this.serverUrl} stopped responding`, { cause: err });
      }
    } finally {
      clearTimeout(timer);
    }

    if (!resp.ok) throw toProtocolError(resp.status, payload);

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new ProtocolError('INTERNAL_ERROR', `Unexpected response from ${method} ${path}`, {
        status: resp.status,
        details: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
      });
    }
    return parsed.data;
  }

  /** Opens the push channel; resolves once the socket is open. */
  subscribe(listener: PushListener, options: SubscribeOptions = {}): Promise<PushSubscription> {
    const wsUrl = `${this.serverUrl.replace(/^http/, 'ws')}${PUSH_PATH}`;
    const ws = new WebSocket(wsUrl, { headers: { ...this.headers, ...options.headers } });
    const logger = options.logger;

    ws.on('message', (data) => {
      let event: unknown;
      try {
        event = JSON.parse(data.toString());
      } catch (err) {
        logger?.debug({ err }, 'Ignoring malformed push message');
        return;
      }
      const parsed = pushEventSchema.safeParse(event);
      if (parsed.success) listener(parsed.data);
      else logger?.debug({ issues: parsed.error.issues.length }, 'Ignoring unknown push event');
    });

    const subscription: PushSubscription = {
      close: () => ws.close(),
      get open() { return ws.readyState === WebSocket.OPEN; },
    };

    return new Promise((resolve, reject) => {
      ws.once('open', () => resolve(subscription));
      ws.once('unexpected-response', (_req, res) => {
        const status = res.statusCode ?? 500;
        res.resume();
        ws.terminate();
        reject(new ProtocolError(fallbackCode(status), `Push channel rejected with HTTP ${status}`, { status }));
      });
      ws.on('error', (err) => {
        if (ws.readyState !== WebSocket.OPEN) {
          reject(new ProtocolError('NETWORK_ERROR', `Could not open push channel at ${wsUrl}`, { cause: err }));
        } else {
          logger?.debug({ err }, 'Push channel error');
        }
      });
      ws.once('close', () => options.onClose?.());
    });
  }
}

// ── Push types ────────────────────────────────────────────────────────────────

export type PushListener = (event: ClientPushEvent) => void;

export interface SubscribeOptions {
  headers?: Record<string, string>;
  onClose?: () => void;
  logger?: Logger;
}

export interface PushSubscription {
  close(): void;
  readonly open: boolean;
}

// ── Error decoding ────────────────────────────────────────────────────────────

async function readJson(resp: Response): Promise<unknown> {
  const text = await resp.text();
  if (!text) return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

export function toProtocolError(status: number, payload: unknown): ProtocolError {
  const parsed = errorBodySchema.safeParse(payload);
  if (parsed.success) {
    const { error, code, details, retry_after } = parsed.data;
    return new ProtocolError(isErrorCode(code) ? code : fallbackCode(status), error, {
      status,
      details,
      retryAfterSeconds: retry_after,
    });
  }
  const message = typeof payload === 'string' && payload ? payload : `HTTP ${status}`;
  return new ProtocolError(fallbackCode(status), message, { status });
}
