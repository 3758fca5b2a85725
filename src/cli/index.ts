#!/usr/bin/env node
/**
 * @file src/cli/index.ts
 *
 * wallet-bridge CLI entry point.
 *
 * Usage:
 *   wallet-bridge serve [--port 8545] [--password <pass>]
 *
 *   wallet-bridge wallet status
 *   wallet-bridge wallet pending
 *   wallet-bridge wallet approve <requestId>
 *   wallet-bridge wallet deny <requestId>
 *   wallet-bridge wallet watch
 *
 *   wallet-bridge dapp connect --name "My DApp" --permissions wallet_info,balance
 *
 * Run with:
 *   npx tsx src/cli/index.ts <command>
 *   # or after build:
 *   node dist/cli/index.js <command>
 */

import { Command } from 'commander';
import { PROTOCOL_VERSION } from '../protocol/types.js';
import { serveCommand } from './commands/serve.js';
import { walletCommand } from './commands/wallet.js';
import { dappCommand } from './commands/dapp.js';

const program = new Command()
  .name('wallet-bridge')
  .description('Local wallet authorization and session server for DApps')
  .version(PROTOCOL_VERSION, '-v, --version', 'Print version number')
  .helpOption('-h, --help', 'Show help')
  // Surface errors instead of swallowing them
  .showHelpAfterError(true)
  .configureOutput({
    // Write commander errors to stderr
    outputError: (str, write) => write(`\n\x1b[31m✗\x1b[0m ${str.trim()}\n\n`),
  });

program.addCommand(serveCommand);
program.addCommand(walletCommand);
program.addCommand(dappCommand);

// Catch unhandled top-level errors (e.g. missing subcommand)
program.parseAsync(process.argv).catch((err: unknown) => {
  const msg = err instanceof Error ? err.message : String(err);
  process.stderr.write(`\n\x1b[31m✗ Fatal:\x1b[0m ${msg}\n\n`);
  process.exit(2);
});
