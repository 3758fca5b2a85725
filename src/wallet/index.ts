export { InMemoryWallet } from './memory.js';
export type { InMemoryWalletOptions } from './memory.js';
export { WalletLock } from './lock.js';
export type { WalletLockOptions } from './lock.js';
export { createPasswordVerifier, verifyPassword } from './password.js';
export { WalletError } from './types.js';
export type {
  NetworkConfig,
  PasswordVerifier,
  TransactionCall,
  TransactionResult,
  WalletBackend,
  WalletErrorCode,
} from './types.js';
