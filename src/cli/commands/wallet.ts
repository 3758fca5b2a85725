/**
 * @file src/cli/commands/wallet.ts
 *
 * Wallet-side subcommand group, talking to a running server:
 *
 *   wallet-bridge wallet status
 *   wallet-bridge wallet unlock  [--password <pass>]
 *   wallet-bridge wallet pending
 *   wallet-bridge wallet approve <requestId>
 *   wallet-bridge wallet deny    <requestId>
 *   wallet-bridge wallet audit   [--limit 20] [--event auth_approved]
 *   wallet-bridge wallet watch
 *
 * Every command takes --url and --admin-token; both default from the
 * environment (WALLET_HOST/WALLET_PORT, WALLET_ADMIN_TOKEN).
 *
 * Password resolution order for unlock (highest priority first):
 *   1. --password flag
 *   2. WALLET_PASSWORD env var
 */

import { Command, InvalidArgumentError, Option } from 'commander';
import { loadEnv } from '../../config/env.js';
import { AUDIT_EVENT_TYPES, type AuditEventType } from '../../logger/audit.js';
import { SERVICE_NAME, createLogger } from '../../logger/logger.js';
import { WalletUiClient } from '../../client/wallet-ui.js';
import type { PushSubscription } from '../../client/http.js';
import {
  header,
  kv,
  success,
  info,
  printLine,
  errorAndExit,
  fatalError,
  formatAuditRows,
  formatLockState,
  formatPendingRequests,
  formatPushEvent,
} from '../output.js';

interface ConnectionOptions {
  url?: string;
  adminToken?: string;
}

// ── Shared client builder ─────────────────────────────────────────────────────

function uiClient(opts: ConnectionOptions): WalletUiClient {
  const env = loadEnv();
  return new WalletUiClient({
    serverUrl: opts.url ?? `http://${env.WALLET_HOST}:${env.WALLET_PORT}`,
    adminToken: opts.adminToken ?? env.WALLET_ADMIN_TOKEN,
    logger: createLogger({ level: 'warn', bindings: { service: SERVICE_NAME } }),
  });
}

function withConnection(cmd: Command): Command {
  return cmd
    .option('--url <url>', 'Wallet server URL')
    .option('--admin-token <token>', 'Wallet UI token (X-Wallet-Token)');
}

// ── wallet status ─────────────────────────────────────────────────────────────

const statusCmd = withConnection(new Command('status'))
  .description('Show whether the wallet server is up and locked')
  .action(async (opts: ConnectionOptions) => {
    const client = uiClient(opts);
    try {
      const status = await client.status();
      header('Wallet status');
      kv([
        ['Server', client.serverUrl],
        ['State', formatLockState(status.locked)],
        ['Wallet', status.walletType],
        ['Network', status.network ?? '(not configured)'],
        ['Chain', status.chainId ?? '(not configured)'],
        ['Version', status.version],
      ]);
    } catch (err) {
      fatalError(err, 'status');
    }
  });

// ── wallet unlock ─────────────────────────────────────────────────────────────

const unlockCmd = withConnection(new Command('unlock'))
  .description('Unlock the wallet')
  .option('--password <pass>', 'Wallet password')
  .action(async (opts: ConnectionOptions & { password?: string }) => {
    const password = opts.password ?? process.env['WALLET_PASSWORD'];
    if (!password) {
      errorAndExit('No password provided. Set --password or the WALLET_PASSWORD env var.');
    }
    try {
      await uiClient(opts).unlock(password);
      success('Wallet unlocked');
    } catch (err) {
      fatalError(err, 'unlock');
    }
  });

// ── wallet pending ────────────────────────────────────────────────────────────

const pendingCmd = withConnection(new Command('pending'))
  .description('List authorization requests awaiting a decision')
  .action(async (opts: ConnectionOptions) => {
    try {
      const requests = await uiClient(opts).listPending();
      header(`Pending requests (${requests.length})`);
      formatPendingRequests(requests);
    } catch (err) {
      fatalError(err, 'pending');
    }
  });

// ── wallet approve / deny ─────────────────────────────────────────────────────

const approveCmd = withConnection(new Command('approve'))
  .description('Approve an authorization request and open a session')
  .argument('<requestId>', 'Request id shown by `wallet pending`')
  .action(async (requestId: string, opts: ConnectionOptions) => {
    try {
      const session = await uiClient(opts).approve(requestId);
      success(`Approved ${requestId}`);
      kv([
        ['Permissions', session.permissions.join(', ')],
        ['Expires', session.expiresAt],
      ]);
    } catch (err) {
      fatalError(err, 'approve');
    }
  });

const denyCmd = withConnection(new Command('deny'))
  .description('Deny an authorization request')
  .argument('<requestId>', 'Request id shown by `wallet pending`')
  .action(async (requestId: string, opts: ConnectionOptions) => {
    try {
      await uiClient(opts).deny(requestId);
      success(`Denied ${requestId}`);
    } catch (err) {
      fatalError(err, 'deny');
    }
  });

// ── wallet audit ──────────────────────────────────────────────────────────────

function parseLimit(value: string): number {
  const n = parseInt(value, 10);
  if (!Number.isInteger(n) || n < 1 || n > 500) {
    throw new InvalidArgumentError('Limit must be between 1 and 500.');
  }
  return n;
}

const auditCmd = withConnection(new Command('audit'))
  .description('Show recent audit events, newest first')
  .option('--limit <n>', 'Number of events to show', parseLimit, 20)
  .addOption(new Option('--event <type>', 'Only events of this type').choices(AUDIT_EVENT_TYPES))
  .action(async (opts: ConnectionOptions & { limit: number; event?: AuditEventType }) => {
    try {
      const rows = await uiClient(opts).auditLog({ limit: opts.limit, event: opts.event });
      header(`Audit log (last ${opts.limit})`);
      formatAuditRows(rows);
    } catch (err) {
      fatalError(err, 'audit');
    }
  });

// ── wallet watch ──────────────────────────────────────────────────────────────

const watchCmd = withConnection(new Command('watch'))
  .description('Follow authorization requests and wallet events as they happen')
  .action(async (opts: ConnectionOptions) => {
    const client = uiClient(opts);
    let subscription: PushSubscription;
    try {
      subscription = await client.subscribe(
        (event) => {
          printLine(`${new Date().toLocaleTimeString()}  ${formatPushEvent(event)}`);
          if (event.type === 'server_shutdown') process.exit(0);
        },
        () => {
          info('Push channel closed');
          process.exit(0);
        },
      );
    } catch (err) {
      fatalError(err, 'watch');
    }
    info(`Watching ${client.serverUrl} (Ctrl+C to stop)`);
    const stop = (): void => subscription.close();
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);
  });

export const walletCommand = new Command('wallet')
  .description('Approve requests and manage a running wallet server')
  .addCommand(statusCmd)
  .addCommand(unlockCmd)
  .addCommand(pendingCmd)
  .addCommand(approveCmd)
  .addCommand(denyCmd)
  .addCommand(auditCmd)
  .addCommand(watchCmd);
