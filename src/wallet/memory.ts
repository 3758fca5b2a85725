/**
 * @file src/wallet/memory.ts
 *
 * InMemoryWallet: a self-contained WalletBackend for the `serve` command and
 * for tests. Holds an ed25519 key in process memory, keeps per-contract
 * balances in a Map and applies `currency.transfer` locally.
 *
 * It never talks to a chain. Anything that needs a real node belongs in a
 * different WalletBackend implementation.
 */

import * as crypto from 'node:crypto';
import type { WalletType } from '../protocol/types.js';
import { WalletError } from './types.js';
import type { NetworkConfig, TransactionCall, TransactionResult, WalletBackend } from './types.js';

export interface InMemoryWalletOptions {
  walletType?: WalletType;
  /** Opening balances keyed by contract name. */
  balances?: Record<string, number>;
  /** Fee charged per transaction, reported as gas used. */
  stampsPerTx?: number;
}

const CURRENCY = 'currency';
const RAW_KEY_LEN = 32;

export class InMemoryWallet implements WalletBackend {
  readonly walletType: WalletType;
  private readonly privateKey: crypto.KeyObject;
  private readonly publicKey: crypto.KeyObject;
  private readonly address: string;
  private readonly balances = new Map<string, number>();
  private readonly stampsPerTx: number;
  private nonce = 0;
  private offline = false;

  constructor(options: InMemoryWalletOptions = {}) {
    this.walletType = options.walletType ?? 'cli';
    this.stampsPerTx = options.stampsPerTx ?? 20;

    const { privateKey, publicKey } = crypto.generateKeyPairSync('ed25519');
    this.privateKey = privateKey;
    this.publicKey = publicKey;
    const der = publicKey.export({ format: 'der', type: 'spki' });
    this.address = der.subarray(der.length - RAW_KEY_LEN).toString('hex');

    for (const [contract, amount] of Object.entries(options.balances ?? {})) {
      this.balances.set(contract, amount);
    }
  }

  getAddress(): string {
    return this.address;
  }

  async getBalance(contract: string): Promise<number> {
    this.assertOnline();
    return this.balances.get(contract) ?? 0;
  }

  async sendTransaction(call: TransactionCall, network: NetworkConfig): Promise<TransactionResult> {
    this.assertOnline();
    this.nonce++;
    const transactionHash = crypto
      .createHash('sha256')
      .update(JSON.stringify({ ...call, chainId: network.chainId, nonce: this.nonce, sender: this.address }))
      .digest('hex');

    if (call.contract === CURRENCY && call.function === 'transfer') {
      return this.transfer(call, transactionHash);
    }
    return {
      success: false,
      transactionHash,
      errors: [`Function '${call.function}' is not available on contract '${call.contract}'`],
    };
  }

  async signMessage(message: string): Promise<string> {
    return crypto.sign(null, Buffer.from(message, 'utf8'), this.privateKey).toString('hex');
  }

  /** Checks a signature produced by signMessage(). */
  verify(message: string, signature: string): boolean {
    return crypto.verify(null, Buffer.from(message, 'utf8'), this.publicKey, Buffer.from(signature, 'hex'));
  }

  setBalance(contract: string, amount: number): void {
    this.balances.set(contract, amount);
  }

  /** Simulates losing the chain connection: reads and submissions throw. */
  setOffline(offline: boolean): void {
    this.offline = offline;
  }

  private assertOnline(): void {
    if (this.offline) {
      throw new WalletError('BACKEND_UNAVAILABLE', 'Chain node unreachable');
    }
  }

  private transfer(call: TransactionCall, transactionHash: string): TransactionResult {
    const { amount, to } = call.kwargs;
    if (typeof amount !== 'number' || !(amount > 0) || typeof to !== 'string' || to.length === 0) {
      return { success: false, transactionHash, errors: ['transfer requires a positive amount and a recipient'] };
    }
    const budget = call.stampsSupplied ?? this.stampsPerTx;
    if (budget < this.stampsPerTx) {
      return { success: false, transactionHash, errors: ['Not enough stamps supplied'] };
    }
    const balance = this.balances.get(CURRENCY) ?? 0;
    if (balance < amount) {
      return { success: false, transactionHash, errors: ['Insufficient balance'] };
    }
    this.balances.set(CURRENCY, balance - amount);
    return { success: true, transactionHash, result: null, gasUsed: this.stampsPerTx };
  }
}
