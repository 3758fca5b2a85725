/**
 * Shared fixtures for the integration suites: an in-process ProtocolServer on
 * an ephemeral loopback port, a small JSON-over-fetch caller, and helpers that
 * run the CLI in a child process through tsx.
 */

import { spawn, type ChildProcess } from 'node:child_process';
import { fileURLToPath } from 'node:url';
import { ProtocolServer, type ProtocolServerOptions } from '../../src/server/server.js';
import { InMemoryWallet } from '../../src/wallet/memory.js';
import { createLogger } from '../../src/logger/logger.js';
import type { Permission } from '../../src/protocol/types.js';

export const PASSWORD = 'test-password';
export const NETWORK = { url: 'http://127.0.0.1:26657', chainId: 'test-chain' };
export const logger = createLogger({ level: 'silent' });

export interface RunningServer {
  server: ProtocolServer;
  wallet: InMemoryWallet;
  port: number;
  origin: string;
  /** `${origin}/api/v1` */
  api: string;
}

export async function startServer(overrides: ProtocolServerOptions = {}): Promise<RunningServer> {
  const wallet = new InMemoryWallet({ balances: { currency: 100, con_token: 7 } });
  const server = new ProtocolServer({
    wallet,
    password: PASSWORD,
    locked: false,
    network: NETWORK,
    logger,
    sweepIntervalMs: 60_000,
    ...overrides,
  });
  const { port } = await server.start('127.0.0.1', 0);
  const origin = `http://127.0.0.1:${port}`;
  return { server, wallet, port, origin, api: `${origin}/api/v1` };
}

export interface CallOptions {
  body?: unknown;
  rawBody?: string;
  token?: string;
  headers?: Record<string, string>;
}

export interface CallResult {
  status: number;
  headers: Headers;
  body: Record<string, unknown>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export async function call(
  api: string,
  method: 'GET' | 'POST' | 'OPTIONS',
  path: string,
  options: CallOptions = {},
): Promise<CallResult> {
  const headers: Record<string, string> = { ...options.headers };
  if (options.token) headers['Authorization'] = `Bearer ${options.token}`;
  let body: string | undefined;
  if (options.rawBody !== undefined) {
    body = options.rawBody;
    headers['Content-Type'] = 'application/json';
  } else if (options.body !== undefined) {
    body = JSON.stringify(options.body);
    headers['Content-Type'] = 'application/json';
  }
  const resp = await fetch(`${api}${path}`, { method, headers, body });
  const text = await resp.text();
  const parsed: unknown = text ? JSON.parse(text) : {};
  return { status: resp.status, headers: resp.headers, body: isRecord(parsed) ? parsed : { value: parsed } };
}

/** Reads a string field, failing the test when it is missing. */
export function str(body: Record<string, unknown>, key: string): string {
  const value = body[key];
  if (typeof value !== 'string') throw new Error(`expected string field "${key}" in ${JSON.stringify(body)}`);
  return value;
}

export const APP = { app_name: 'Test DApp', app_url: 'http://localhost:3000' };

/** Runs request + approve and returns the session token. */
export async function authorize(api: string, permissions: Permission[], headers?: Record<string, string>): Promise<string> {
  const created = await call(api, 'POST', '/auth/request', { body: { ...APP, permissions } });
  const requestId = str(created.body, 'request_id');
  const approved = await call(api, 'POST', `/auth/approve/${requestId}`, { headers });
  return str(approved.body, 'session_token');
}

// ── CLI processes ─────────────────────────────────────────────────────────────

export const CLI_ENTRY = fileURLToPath(new URL('../../src/cli/index.ts', import.meta.url));

function cliEnv(extra: Record<string, string>): NodeJS.ProcessEnv {
  return { ...process.env, NO_COLOR: '1', CI: 'true', LOG_LEVEL: 'silent', ...extra };
}

export interface CliResult {
  code: number | null;
  stdout: string;
  stderr: string;
}

/**
 * Runs the CLI to completion without blocking the event loop, so an
 * in-process server can answer it.
 */
export function runCli(args: string[], env: Record<string, string> = {}): Promise<CliResult> {
  return new Promise((resolve, reject) => {
    const child = spawn(process.execPath, ['--import', 'tsx', CLI_ENTRY, ...args], { env: cliEnv(env) });
    let stdout = '';
    let stderr = '';
    child.stdout.setEncoding('utf8').on('data', (chunk: string) => { stdout += chunk; });
    child.stderr.setEncoding('utf8').on('data', (chunk: string) => { stderr += chunk; });
    child.once('error', reject);
    child.once('close', (code) => resolve({ code, stdout, stderr }));
  });
}

export interface ServeProcess {
  child: ChildProcess;
  port: number;
  origin: string;
  output(): string;
  /** SIGTERM, then resolves with the exit code. */
  stop(): Promise<number | null>;
}

const LISTENING = /Listening\s+http:\/\/127\.0\.0\.1:(\d+)\n/;

/** Starts `serve` in a child process and resolves once it prints its address. */
export function spawnServe(args: string[], env: Record<string, string> = {}, timeoutMs = 20_000): Promise<ServeProcess> {
  const child = spawn(
    process.execPath,
    ['--import', 'tsx', CLI_ENTRY, 'serve', '--host', '127.0.0.1', '--port', '0', ...args],
    { env: cliEnv(env) },
  );
  let stdout = '';
  let stderr = '';
  const exited = new Promise<number | null>((resolve) => child.once('exit', (code) => resolve(code)));

  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      child.kill('SIGKILL');
      reject(new Error(`serve did not start in time:\n${stdout}\n${stderr}`));
    }, timeoutMs);

    child.stderr?.setEncoding('utf8').on('data', (chunk: string) => { stderr += chunk; });
    child.stdout?.setEncoding('utf8').on('data', (chunk: string) => {
      stdout += chunk;
      const match = LISTENING.exec(stdout);
      if (!match?.[1]) return;
      clearTimeout(timer);
      const port = Number(match[1]);
      resolve({
        child,
        port,
        origin: `http://127.0.0.1:${port}`,
        output: () => stdout,
        stop: () => {
          if (child.exitCode === null && child.signalCode === null) child.kill('SIGTERM');
          return exited;
        },
      });
    });
    void exited.then((code) => {
      clearTimeout(timer);
      reject(new Error(`serve exited with ${String(code)} before listening:\n${stdout}\n${stderr}`));
    });
  });
}
