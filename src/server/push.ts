/**
 * @file src/server/push.ts
 * WebSocket push channel at /ws/v1. Upgrades are wallet-local only; each new
 * listener gets a snapshot of pending requests, then live events from the bus.
 */

import type { IncomingMessage, Server } from 'node:http';
import type { Duplex } from 'node:stream';
import { getReasonPhrase, StatusCodes } from 'http-status-codes';
import { WebSocketServer, type WebSocket } from 'ws';
import { PUSH_PATH, ProtocolError, WALLET_TOKEN_HEADER } from '../protocol/types.js';
import type { NotificationBus, PushEvent } from '../notify/bus.js';
import type { Logger } from '../logger/logger.js';
import { checkWalletLocal } from './middleware.js';

export interface PushChannelOptions {
  bus: NotificationBus;
  logger: Logger;
  adminToken?: string;
  /** Event sent to each listener right after it connects. */
  snapshot: () => PushEvent;
  keepAliveMs?: number;
  /** How long close() waits for listeners to finish the closing handshake. */
  closeGraceMs?: number;
}

export interface PushChannel {
  close(): Promise<void>;
}

const KEEPALIVE_MS = 30_000;
const CLOSE_GRACE_MS = 1_000;

/** Resolves once every client has closed, or after `ms`. */
function drain(wss: WebSocketServer, ms: number): Promise<void> {
  const pending = [...wss.clients].filter((ws) => ws.readyState !== ws.CLOSED);
  if (pending.length === 0) return Promise.resolve();
  return new Promise((resolve) => {
    let remaining = pending.length;
    const timer = setTimeout(resolve, ms);
    timer.unref();
    for (const ws of pending) {
      ws.once('close', () => {
        if (--remaining === 0) {
          clearTimeout(timer);
          resolve();
        }
      });
    }
  });
}

function rejectUpgrade(socket: Duplex, status: number): void {
  socket.write(`HTTP/1.1 ${status} ${getReasonPhrase(status)}\r\nConnection: close\r\n\r\n`);
  socket.destroy();
}

export function attachPushChannel(server: Server, options: PushChannelOptions): PushChannel {
  const { bus, logger } = options;
  const wss = new WebSocketServer({ noServer: true, perMessageDeflate: false });
  const alive = new WeakSet<WebSocket>();

  const onUpgrade = (req: IncomingMessage, socket: Duplex, head: Buffer): void => {
    const pathname = new URL(req.url ?? '/', 'http://localhost').pathname;
    if (pathname !== PUSH_PATH) {
      rejectUpgrade(socket, StatusCodes.NOT_FOUND);
      return;
    }
    try {
      checkWalletLocal(req.socket.remoteAddress, req.headers[WALLET_TOKEN_HEADER], options.adminToken);
    } catch (err) {
      logger.warn({ err, remoteAddress: req.socket.remoteAddress }, 'Rejected push channel upgrade');
      rejectUpgrade(socket, err instanceof ProtocolError ? err.status : StatusCodes.FORBIDDEN);
      return;
    }
    wss.handleUpgrade(req, socket, head, (ws) => wss.emit('connection', ws, req));
  };

  wss.on('connection', (ws: WebSocket) => {
    alive.add(ws);
    bus.add(ws);
    bus.sendTo(ws, options.snapshot());
    logger.info({ listeners: bus.size }, 'Push listener connected');

    ws.on('pong', () => alive.add(ws));
    ws.on('close', () => {
      bus.remove(ws);
      logger.info({ listeners: bus.size }, 'Push listener disconnected');
    });
    ws.on('error', (err) => {
      logger.debug({ err }, 'Push listener error');
      bus.remove(ws);
    });
  });

  const keepAlive = setInterval(() => {
    for (const ws of wss.clients) {
      if (!alive.has(ws)) {
        ws.terminate();
        continue;
      }
      alive.delete(ws);
      ws.ping();
    }
  }, options.keepAliveMs ?? KEEPALIVE_MS);
  keepAlive.unref();

  server.on('upgrade', onUpgrade);

  return {
    async close(): Promise<void> {
      clearInterval(keepAlive);
      server.off('upgrade', onUpgrade);
      await drain(wss, options.closeGraceMs ?? CLOSE_GRACE_MS);
      for (const ws of wss.clients) ws.terminate();
      return new Promise((resolve, reject) => {
        wss.close((err) => (err ? reject(err) : resolve()));
      });
    },
  };
}
