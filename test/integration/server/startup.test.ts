/**
 * Integration tests for ProtocolServer.start() / startRobust().
 *
 * Test gates:
 *  ✅ a taken port is PORT_IN_USE
 *  ✅ a live wallet server on the port is ALREADY_RUNNING and is left alone
 *  ✅ an unresponsive holder is reclaimed and the bind retried
 *  ✅ startRobust() gives up after maxRetries attempts
 *  ✅ another HTTP service on the port is PORT_IN_USE and is never reclaimed
 *  ✅ a single retry is enough once the stale holder is gone
 *  ✅ the status check tells wallet, foreign and stalled occupants apart
 */

import * as http from 'node:http';
import * as net from 'node:net';
import { describe, it, expect, afterEach, vi } from 'vitest';
import { ProtocolServer } from '../../../src/server/server.js';
import { StartupError, probeWalletServer, type PortReclaimer } from '../../../src/server/startup.js';
import { logger, startServer, type RunningServer } from '../helpers.js';

const HOST = '127.0.0.1';

const cleanup: Array<() => Promise<void>> = [];

afterEach(async () => {
  while (cleanup.length > 0) {
    const fn = cleanup.pop();
    if (fn) await fn();
  }
});

function newServer(): ProtocolServer {
  const server = new ProtocolServer({ logger, sweepIntervalMs: 60_000 });
  cleanup.push(() => server.close());
  return server;
}

async function running(): Promise<RunningServer> {
  const ctx = await startServer();
  cleanup.push(() => ctx.server.close());
  return ctx;
}

/** A plain TCP listener that accepts connections and never answers. */
async function holdPort(): Promise<{ port: number; release(): Promise<void> }> {
  const sockets = new Set<net.Socket>();
  const holder = net.createServer((socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });
  await new Promise<void>((resolve) => holder.listen(0, HOST, resolve));
  const address = holder.address();
  if (!address || typeof address === 'string') throw new Error('holder has no port');

  let released = false;
  const release = async (): Promise<void> => {
    if (released) return;
    released = true;
    for (const socket of sockets) socket.destroy();
    await new Promise<void>((resolve) => holder.close(() => resolve()));
  };
  cleanup.push(release);
  return { port: address.port, release };
}

/** An HTTP listener run by someone else; `handler` decides how it answers. */
async function httpService(handler: http.RequestListener): Promise<number> {
  const service = http.createServer(handler);
  await new Promise<void>((resolve) => service.listen(0, HOST, resolve));
  const address = service.address();
  if (!address || typeof address === 'string') throw new Error('service has no port');
  cleanup.push(async () => {
    service.closeAllConnections();
    await new Promise<void>((resolve) => service.close(() => resolve()));
  });
  return address.port;
}

async function startupError(promise: Promise<unknown>): Promise<StartupError> {
  try {
    await promise;
  } catch (err) {
    if (err instanceof StartupError) return err;
    throw err;
  }
  throw new Error('expected a StartupError');
}

describe('ProtocolServer.start()', () => {
  it('GATE: a taken port is PORT_IN_USE', async () => {
    const { port } = await running();
    const err = await startupError(newServer().start(HOST, port));
    expect(err.code).toBe('PORT_IN_USE');
    expect(err.port).toBe(port);
  });

  it('returns the bound address again when already started', async () => {
    const server = newServer();
    const first = await server.start(HOST, 0);
    const second = await server.start(HOST, 0);
    expect(second.port).toBe(first.port);
  });

  it('an address the host does not own is BIND_FAILED', async () => {
    const err = await startupError(newServer().start('203.0.113.1', 0));
    expect(err.code).toBe('BIND_FAILED');
  });
});

describe('ProtocolServer.startRobust()', () => {
  it('GATE: leaves a live wallet server alone', async () => {
    const { port } = await running();
    const reclaimer: PortReclaimer = { reclaim: vi.fn(async () => true) };
    const err = await startupError(newServer().startRobust({ host: HOST, port, reclaimer, retryDelayMs: 10 }));
    expect(err.code).toBe('ALREADY_RUNNING');
    expect(reclaimer.reclaim).not.toHaveBeenCalled();
  });

  it('GATE: reclaims a port held by an unresponsive process and binds', async () => {
    const holder = await holdPort();
    const reclaim = vi.fn(async () => {
      await holder.release();
      return true;
    });
    const server = newServer();
    const bound = await server.startRobust({
      host: HOST,
      port: holder.port,
      reclaimer: { reclaim },
      retryDelayMs: 10,
      probeTimeoutMs: 200,
    });
    expect(bound.port).toBe(holder.port);
    expect(reclaim).toHaveBeenCalledWith(holder.port);
    expect(server.running).toBe(true);
  });

  it('GATE: gives up after maxRetries attempts', async () => {
    const holder = await holdPort();
    const reclaim = vi.fn(async () => false);
    const err = await startupError(newServer().startRobust({
      host: HOST,
      port: holder.port,
      maxRetries: 2,
      reclaimer: { reclaim },
      retryDelayMs: 10,
      probeTimeoutMs: 200,
    }));
    expect(err.code).toBe('PORT_IN_USE');
    expect(err.message).toBe(`Port ${holder.port} is still in use after 2 attempts`);
    expect(reclaim).toHaveBeenCalledTimes(2);
  });

  it('GATE: treats another HTTP service as PORT_IN_USE and never reclaims it', async () => {
    const port = await httpService((_req, res) => {
      res.writeHead(404, { 'Content-Type': 'text/plain' });
      res.end('not here');
    });
    const reclaim = vi.fn(async () => true);
    const err = await startupError(newServer().startRobust({
      host: HOST,
      port,
      maxRetries: 2,
      reclaimer: { reclaim },
      retryDelayMs: 10,
      probeTimeoutMs: 500,
    }));
    expect(err.code).toBe('PORT_IN_USE');
    expect(err.message).toBe(`Port ${port} is held by another service`);
    expect(reclaim).not.toHaveBeenCalled();
  });

  it('GATE: binds after one reclaim with maxRetries 1', async () => {
    const holder = await holdPort();
    const reclaim = vi.fn(async () => {
      await holder.release();
      return true;
    });
    const server = newServer();
    const bound = await server.startRobust({
      host: HOST,
      port: holder.port,
      maxRetries: 1,
      reclaimer: { reclaim },
      retryDelayMs: 10,
      probeTimeoutMs: 200,
    });
    expect(bound.port).toBe(holder.port);
    expect(reclaim).toHaveBeenCalledTimes(1);
  });
});

describe('probeWalletServer()', () => {
  it('recognises a wallet server', async () => {
    const { port } = await running();
    expect(await probeWalletServer(HOST, port, 1_000)).toBe('wallet');
  });

  it('GATE: reports an HTTP service that is not a wallet as foreign', async () => {
    const notFound = await httpService((_req, res) => {
      res.writeHead(404);
      res.end();
    });
    const otherJson = await httpService((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.end('{"jsonrpc":"2.0","result":"0x1"}');
    });
    const notJson = await httpService((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'text/html' });
      res.end('<html></html>');
    });
    expect(await probeWalletServer(HOST, notFound, 1_000)).toBe('foreign');
    expect(await probeWalletServer(HOST, otherJson, 1_000)).toBe('foreign');
    expect(await probeWalletServer(HOST, notJson, 1_000)).toBe('foreign');
  });

  it('reports a silent TCP holder as unresponsive', async () => {
    const holder = await holdPort();
    expect(await probeWalletServer(HOST, holder.port, 200)).toBe('unresponsive');
  });

  it('GATE: gives up on a body that stalls after the headers', async () => {
    const port = await httpService((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'application/json' });
      res.write('{"available":');
    });
    const started = Date.now();
    expect(await probeWalletServer(HOST, port, 200)).toBe('unresponsive');
    expect(Date.now() - started).toBeLessThan(5_000);
  });
});
