/**
 * @file src/cli/output.ts
 *
 * Typed output helpers for all CLI commands.
 * Keeps presentation logic out of command files.
 *
 * Rules:
 *  - Only accepts plain values and client view types, never a live client
 *  - All stdout is human-readable; stderr is used for errors
 *  - Exit codes: 0 success, 1 user error, 2 internal/unexpected error
 */

import type { AuditEntry, AuthorizationRequestView, ClientPushEvent } from '../client/schemas.js';

// ── Colours (ANSI, disabled when not a TTY or CI=true) ───────────────────────

const NO_COLOR = !process.stdout.isTTY || process.env['CI'] === 'true' || process.env['NO_COLOR'];

const c = {
  bold:   (s: string): string => NO_COLOR ? s : `\x1b[1m${s}\x1b[0m`,
  green:  (s: string): string => NO_COLOR ? s : `\x1b[32m${s}\x1b[0m`,
  yellow: (s: string): string => NO_COLOR ? s : `\x1b[33m${s}\x1b[0m`,
  red:    (s: string): string => NO_COLOR ? s : `\x1b[31m${s}\x1b[0m`,
  cyan:   (s: string): string => NO_COLOR ? s : `\x1b[36m${s}\x1b[0m`,
  dim:    (s: string): string => NO_COLOR ? s : `\x1b[2m${s}\x1b[0m`,
};

// ── Section headers ───────────────────────────────────────────────────────────

export function header(title: string): void {
  const line = '─'.repeat(Math.min(title.length + 4, 60));
  process.stdout.write(`\n${c.bold(line)}\n  ${c.bold(title)}\n${c.bold(line)}\n\n`);
}

// ── Status lines ──────────────────────────────────────────────────────────────

export function success(msg: string): void {
  process.stdout.write(`${c.green('✓')} ${msg}\n`);
}

export function warn(msg: string): void {
  process.stdout.write(`${c.yellow('⚠')} ${msg}\n`);
}

export function info(msg: string): void {
  process.stdout.write(`  ${c.dim('·')} ${msg}\n`);
}

export function printLine(msg: string): void {
  process.stdout.write(`${msg}\n`);
}

// ── Error output ─────────────────────────────────────────────────────────────

export function errorAndExit(msg: string, code = 1): never {
  process.stderr.write(`\n${c.red('✗ Error:')} ${msg}\n\n`);
  process.exit(code);
}

/** One-line description of a failure, with its `code` when it carries one. */
export function describeError(err: unknown): string {
  const msg = err instanceof Error ? err.message : String(err);
  const code = typeof err === 'object' && err !== null && 'code' in err ? err.code : undefined;
  const codeStr = typeof code === 'string' && code ? ` [${code}]` : '';
  const retry =
    typeof err === 'object' && err !== null && 'retryAfterSeconds' in err && typeof err.retryAfterSeconds === 'number'
      ? ` (retry in ${err.retryAfterSeconds}s)`
      : '';
  return `${msg}${codeStr}${retry}`;
}

export function fatalError(err: unknown, context?: string): never {
  const ctx = context ? `${context}: ` : '';
  process.stderr.write(`\n${c.red('✗')} ${ctx}${describeError(err)}\n\n`);
  process.exit(1);
}

// ── Key-value pairs ───────────────────────────────────────────────────────────

export function kv(pairs: Array<[string, string]>): void {
  const maxKey = Math.max(...pairs.map(([k]) => k.length));
  for (const [key, val] of pairs) {
    process.stdout.write(`  ${c.dim(key.padEnd(maxKey, ' '))}  ${val}\n`);
  }
}

// ── Tables ────────────────────────────────────────────────────────────────────

export function table(
  headers: string[],
  rows: string[][],
  opts: { maxWidth?: number } = {},
): void {
  if (rows.length === 0) {
    process.stdout.write(`  ${c.dim('(no rows)')}\n`);
    return;
  }

  const maxWidth = opts.maxWidth ?? 120;
  const colWidths = headers.map((h, i) =>
    Math.min(
      Math.floor(maxWidth / headers.length),
      Math.max(h.length, ...rows.map((r) => (r[i] ?? '').length)),
    ),
  );

  const headerLine = headers
    .map((h, i) => c.bold(h.padEnd(colWidths[i] ?? 0)))
    .join('  ');

  const separator = colWidths.map((w) => '─'.repeat(w)).join('  ');

  process.stdout.write(`  ${headerLine}\n`);
  process.stdout.write(`  ${c.dim(separator)}\n`);

  for (const row of rows) {
    const line = row.map((cell, i) => {
      const w   = colWidths[i] ?? 0;
      const str = cell.slice(0, w);
      return str.padEnd(w);
    }).join('  ');
    process.stdout.write(`  ${line}\n`);
  }
}

// ── Protocol values ───────────────────────────────────────────────────────────

export function formatLockState(locked: boolean): string {
  return locked ? c.yellow('locked') : c.green('unlocked');
}

/** Seconds until `iso`, floored at zero. */
export function secondsUntil(iso: string, now: number = Date.now()): number {
  return Math.max(0, Math.ceil((Date.parse(iso) - now) / 1000));
}

export function formatPendingRequests(requests: AuthorizationRequestView[], now: number = Date.now()): void {
  if (requests.length === 0) {
    process.stdout.write(`  ${c.dim('No pending authorization requests.')}\n`);
    return;
  }
  table(
    ['REQUEST', 'APP', 'URL', 'PERMISSIONS', 'EXPIRES'],
    requests.map((r) => [
      r.requestId,
      r.appName,
      r.appUrl,
      r.permissions.join(','),
      `${secondsUntil(r.expiresAt, now)}s`,
    ]),
    { maxWidth: 160 },
  );
}

const INTERESTING_DETAILS = ['permissions', 'reason', 'code', 'attempts', 'contract', 'function', 'transactionHash', 'errors'];

export function formatAuditRows(rows: AuditEntry[]): void {
  if (rows.length === 0) {
    process.stdout.write(`  ${c.dim('No audit events found.')}\n`);
    return;
  }

  for (const row of rows) {
    const ts  = new Date(row.ts).toLocaleString();
    const app = row.app_name ? `  ${c.cyan(row.app_name)}` : '';
    const src = row.source ? `  ${c.dim('from')} ${row.source}` : '';

    process.stdout.write(`  ${c.dim(ts)}  ${c.bold(row.event.padEnd(16))}${app}${src}\n`);

    // Show key details from details_json inline
    let details: unknown;
    try {
      details = JSON.parse(row.details_json);
    } catch {
      continue; // malformed JSON
    }
    if (typeof details !== 'object' || details === null) continue;
    const interesting = Object.entries(details)
      .filter(([k]) => INTERESTING_DETAILS.includes(k))
      .map(([k, v]) => `${k}=${Array.isArray(v) ? v.join(',') : String(v)}`)
      .join('  ');
    if (interesting) {
      process.stdout.write(`    ${c.dim(interesting)}\n`);
    }
  }
}

/** Single line for a push event, as printed by `watch`. */
export function formatPushEvent(event: ClientPushEvent): string {
  switch (event.type) {
    case 'authorization_request':
      return `${c.cyan('request')}   ${event.request.appName} wants ${event.request.permissions.join(',')} (${event.request.requestId})`;
    case 'authorization_resolved':
      return `${c.cyan('resolved')}  ${event.request_id} ${event.status}`;
    case 'pending_requests':
      return `${c.cyan('pending')}   ${event.requests.length} request(s) awaiting a decision`;
    case 'wallet_locked':
      return `${c.yellow('locked')}    ${event.reason === 'auto_lock' ? 'auto-lock after inactivity' : 'locked by user'}`;
    case 'wallet_unlocked':
      return c.green('unlocked');
    case 'session_revoked':
      return `${c.cyan('revoked')}   session for ${event.app_name}`;
    case 'server_shutdown':
      return c.red('server shutting down');
  }
}

// Re-export colour helper for commands that need it
export { c };
