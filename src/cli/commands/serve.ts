/**
 * @file src/cli/commands/serve.ts
 *
 *   wallet-bridge serve [--host 127.0.0.1] [--port 8545] [--password <pass>]
 *                       [--balance currency=1000] [--network-url <url> --chain-id <id>]
 *
 * Runs the wallet protocol server in the foreground over an in-memory wallet.
 * Settings come from the environment (.env), flags win over it. SIGINT and
 * SIGTERM stop the server cleanly.
 */

import type { AddressInfo } from 'node:net';
import { Command, InvalidArgumentError } from 'commander';
import { loadEnv, serverOptionsFromEnv } from '../../config/env.js';
import { SERVICE_NAME, createLogger } from '../../logger/logger.js';
import { ProtocolServer } from '../../server/server.js';
import { StartupError } from '../../server/startup.js';
import { InMemoryWallet } from '../../wallet/memory.js';
import { header, kv, success, info, errorAndExit, fatalError, formatLockState } from '../output.js';

interface ServeOptions {
  host?: string;
  port?: number;
  password?: string;
  unlocked?: boolean;
  adminToken?: string;
  networkUrl?: string;
  chainId?: string;
  balance: Record<string, number>;
  auditDb?: string;
  maxRetries: number;
}

export function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

/** Accumulates `contract=amount` pairs from a repeatable option. */
export function collectBalance(value: string, previous: Record<string, number>): Record<string, number> {
  const match = /^([^=\s]+)=(\d+(?:\.\d+)?)$/.exec(value);
  if (!match?.[1] || !match[2]) {
    throw new InvalidArgumentError('Expected <contract>=<amount>, e.g. currency=1000.');
  }
  return { ...previous, [match[1]]: Number(match[2]) };
}

export const serveCommand = new Command('serve')
  .description('Run the local wallet protocol server')
  .option('--host <host>', 'Interface to bind (default WALLET_HOST or 127.0.0.1)')
  .option('--port <port>', 'Port to bind (default WALLET_PORT or 8545)', parsePort)
  .option('--password <pass>', 'Unlock password; the wallet starts locked when set')
  .option('--unlocked', 'Start unlocked even when a password is set')
  .option('--admin-token <token>', 'Token required from the wallet UI (X-Wallet-Token)')
  .option('--network-url <url>', 'Network node URL')
  .option('--chain-id <id>', 'Network chain id')
  .option('--balance <contract=amount>', 'Opening balance (repeatable)', collectBalance, {})
  .option('--audit-db <path>', 'Audit log file (default AUDIT_DB_PATH or in-memory)')
  .option('--max-retries <n>', 'Bind attempts when the port is busy', (v) => parseInt(v, 10), 3)
  .action(async (opts: ServeOptions) => {
    const env = loadEnv();
    const logger = createLogger({
      level: env.LOG_LEVEL,
      pretty: env.LOG_PRETTY,
      bindings: { service: SERVICE_NAME, command: 'serve' },
    });
    const base = serverOptionsFromEnv(env);

    if ((opts.networkUrl === undefined) !== (opts.chainId === undefined)) {
      errorAndExit('--network-url and --chain-id must be given together.');
    }
    const password = opts.password ?? base.password;
    const balances = Object.keys(opts.balance).length > 0 ? opts.balance : { currency: 1_000 };

    const server = new ProtocolServer({
      ...base,
      wallet: new InMemoryWallet({ walletType: env.WALLET_TYPE, balances }),
      password,
      locked: opts.unlocked ? false : undefined,
      adminToken: opts.adminToken ?? base.adminToken,
      network:
        opts.networkUrl !== undefined && opts.chainId !== undefined
          ? { url: opts.networkUrl, chainId: opts.chainId }
          : base.network,
      auditDbPath: opts.auditDb ?? base.auditDbPath,
      logger,
    });

    let bound: AddressInfo;
    try {
      bound = await server.startRobust({
        host: opts.host ?? env.WALLET_HOST,
        port: opts.port ?? env.WALLET_PORT,
        maxRetries: opts.maxRetries,
      });
    } catch (err) {
      await server.close();
      if (err instanceof StartupError && err.code === 'ALREADY_RUNNING') {
        errorAndExit(`A wallet server is already running on port ${err.port}.`);
      }
      fatalError(err, 'serve');
    }

    header('Wallet protocol server');
    const status = server.status();
    kv([
      ['Listening', `http://${bound.address}:${bound.port}`],
      ['Wallet', `${status.wallet_type} (${formatLockState(status.locked)})`],
      ['Network', status.network ?? '(not configured)'],
      ['Version', status.version],
    ]);
    if (!password) info('No password set: the wallet runs unlocked.');
    success('Ready for authorization requests. Press Ctrl+C to stop.');

    let stopping = false;
    const shutdown = (signal: NodeJS.Signals): void => {
      if (stopping) return;
      stopping = true;
      logger.info({ signal }, 'Shutting down');
      server.close().then(
        () => process.exit(0),
        (err: unknown) => {
          logger.error({ err }, 'Shutdown failed');
          process.exit(2);
        },
      );
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);
  });
