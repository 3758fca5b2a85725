/**
 * @file src/cli/commands/dapp.ts
 *
 *   wallet-bridge dapp connect --name "My DApp" --permissions wallet_info,balance
 *                              [--app-url http://localhost:3000] [--timeout 300]
 *                              [--balance currency]
 *
 * Plays the DApp side of the handshake from a terminal: asks for
 * authorization, waits for the wallet user to approve it, shows what the
 * session can see, then disconnects.
 */

import { Command, InvalidArgumentError } from 'commander';
import { loadEnv } from '../../config/env.js';
import { SERVICE_NAME, createLogger } from '../../logger/logger.js';
import { ProtocolClient } from '../../client/client.js';
import { PERMISSIONS, normalisePermissions, type Permission } from '../../protocol/types.js';
import { header, kv, success, info, warn, errorAndExit, fatalError } from '../output.js';

interface ConnectOptions {
  name: string;
  appUrl: string;
  permissions: Permission[];
  description?: string;
  timeout: number;
  balance?: string;
  url?: string;
}

export function parsePermissions(value: string): Permission[] {
  try {
    return normalisePermissions(value.split(',').map((p) => p.trim()).filter((p) => p.length > 0));
  } catch {
    throw new InvalidArgumentError(`Permissions must be a comma-separated list of: ${PERMISSIONS.join(', ')}.`);
  }
}

function parseSeconds(value: string): number {
  const n = Number(value);
  if (!Number.isFinite(n) || n <= 0) throw new InvalidArgumentError('Timeout must be a positive number of seconds.');
  return n;
}

const connectCmd = new Command('connect')
  .description('Request a session from the wallet and wait for approval')
  .requiredOption('--name <appName>', 'Application name shown to the wallet user')
  .requiredOption('--permissions <list>', 'Comma-separated permissions', parsePermissions)
  .option('--app-url <url>', 'Application URL shown to the wallet user', 'http://localhost')
  .option('--description <text>', 'Why the application wants access')
  .option('--timeout <seconds>', 'How long to wait for approval', parseSeconds, 300)
  .option('--balance <contract>', 'Read this balance once connected')
  .option('--url <url>', 'Wallet server URL')
  .action(async (opts: ConnectOptions) => {
    if (opts.permissions.length === 0) {
      errorAndExit('At least one permission is required.');
    }
    const env = loadEnv();
    const client = new ProtocolClient({
      appName: opts.name,
      appUrl: opts.appUrl,
      serverUrl: opts.url ?? `http://${env.WALLET_HOST}:${env.WALLET_PORT}`,
      logger: createLogger({ level: 'warn', bindings: { service: SERVICE_NAME } }),
    });

    try {
      if (!(await client.checkWalletAvailable())) {
        errorAndExit('Wallet is not available. Start it with `wallet-bridge serve`.');
      }
      const request = await client.requestAuthorization(opts.permissions, opts.description);
      header(`Authorization request ${request.requestId}`);
      info(`Approve it with: wallet-bridge wallet approve ${request.requestId}`);

      const outcome = await client.waitForAuthorization(request.requestId, { timeoutMs: opts.timeout * 1000 });
      if (outcome.status !== 'approved') {
        warn(`Request ${outcome.status === 'pending' ? 'timed out' : outcome.status}`);
        process.exitCode = 1;
        return;
      }
      success('Connected');
      const pairs: Array<[string, string]> = [['Permissions', client.grantedPermissions.join(', ')]];
      if (client.grantedPermissions.includes('wallet_info')) {
        const walletInfo = await client.getWalletInfo();
        pairs.push(['Address', walletInfo.truncatedAddress], ['Wallet', walletInfo.walletType]);
      }
      if (opts.balance !== undefined) {
        pairs.push([`Balance (${opts.balance})`, String(await client.getBalance(opts.balance))]);
      }
      kv(pairs);
      await client.disconnect();
    } catch (err) {
      fatalError(err, 'connect');
    }
  });

export const dappCommand = new Command('dapp')
  .description('Act as a DApp against a running wallet server')
  .addCommand(connectCmd);
