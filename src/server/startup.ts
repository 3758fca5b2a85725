/**
 * @file src/server/startup.ts
 *
 * Pieces of robust startup: telling a live wallet server apart from a stuck
 * process holding the port, and clearing the port when it is stuck.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { setTimeout as sleep } from 'node:timers/promises';
import { API_PREFIX } from '../protocol/types.js';
import type { Logger } from '../logger/logger.js';

const execFileAsync = promisify(execFile);

// ── Errors ────────────────────────────────────────────────────────────────────

export type StartupErrorCode = 'ALREADY_RUNNING' | 'PORT_IN_USE' | 'BIND_FAILED';

/** Lifecycle failure, kept apart from the request-level ProtocolError taxonomy. */
export class StartupError extends Error {
  override readonly name = 'StartupError';

  constructor(
    public readonly code: StartupErrorCode,
    message: string,
    public readonly port: number,
    public override readonly cause?: unknown,
  ) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, StartupError);
    }
  }
}

export function isAddressInUse(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'EADDRINUSE';
}

// ── Probe ─────────────────────────────────────────────────────────────────────

/**
 * What answers on a busy port: our own wallet server, some other HTTP
 * service, or nothing within the timeout. Only `unresponsive` may be reclaimed.
 */
export type PortOccupant = 'wallet' | 'foreign' | 'unresponsive';

/** Probes the status endpoint; the timeout covers headers and body. */
export async function probeWalletServer(host: string, port: number, timeoutMs: number): Promise<PortOccupant> {
  const hostPart = host.includes(':') ? `[${host}]` : host;
  const ctrl = new AbortController();
  const timer = setTimeout(() => ctrl.abort(), timeoutMs);
  let resp: Response;
  try {
    resp = await fetch(`http://${hostPart}:${port}${API_PREFIX}/wallet/status`, { signal: ctrl.signal });
  } catch {
    clearTimeout(timer);
    return 'unresponsive';
  }
  try {
    const text = await resp.text();
    if (!resp.ok) return 'foreign';
    const body: unknown = JSON.parse(text);
    return typeof body === 'object' && body !== null && 'available' in body && body.available === true
      ? 'wallet'
      : 'foreign';
  } catch (err) {
    // A non-JSON body is someone else's API; a stalled or dropped body is not.
    return err instanceof SyntaxError && !ctrl.signal.aborted ? 'foreign' : 'unresponsive';
  } finally {
    clearTimeout(timer);
  }
}

// ── Port reclaim ──────────────────────────────────────────────────────────────

/** Frees a port held by an unresponsive process. Returns whether anything was done. */
export interface PortReclaimer {
  reclaim(port: number): Promise<boolean>;
}

async function listeningPids(port: number): Promise<number[]> {
  try {
    const { stdout } = await execFileAsync('lsof', ['-t', `-iTCP:${port}`, '-sTCP:LISTEN']);
    return stdout
      .split('\n')
      .map((line) => parseInt(line.trim(), 10))
      .filter((pid) => Number.isInteger(pid) && pid > 0 && pid !== process.pid);
  } catch {
    // lsof exits 1 when nothing matches, or is not installed.
    return [];
  }
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch {
    return false;
  }
}

/**
 * Default reclaimer: finds the listening pids with lsof, sends SIGTERM, waits
 * `graceMs`, then SIGKILLs survivors. Never signals the current process.
 */
export function createProcessPortReclaimer(logger: Logger, graceMs = 1_000): PortReclaimer {
  return {
    async reclaim(port: number): Promise<boolean> {
      const pids = await listeningPids(port);
      if (pids.length === 0) {
        logger.warn({ port }, 'Port is busy but no listening process could be identified');
        return false;
      }
      for (const pid of pids) {
        logger.warn({ port, pid }, 'Terminating unresponsive process holding the port');
        try { process.kill(pid, 'SIGTERM'); } catch (err) { logger.debug({ err, pid }, 'SIGTERM failed'); }
      }
      await sleep(graceMs);
      for (const pid of pids.filter(isAlive)) {
        try { process.kill(pid, 'SIGKILL'); } catch (err) { logger.debug({ err, pid }, 'SIGKILL failed'); }
      }
      return true;
    },
  };
}
