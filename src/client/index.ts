export { ProtocolClient, DEFAULT_SERVER_URL } from './client.js';
export type {
  AuthorizationOutcome,
  ClientState,
  ConnectOptions,
  ProtocolClientConfig,
  ProtocolClientOptions,
  TokenMetadata,
  WaitOptions,
} from './client.js';
export { WalletUiClient } from './wallet-ui.js';
export type { AuditLogQuery, WalletUiClientOptions } from './wallet-ui.js';
export { SyncProtocolClient } from './sync.js';
export type { SyncProtocolClientOptions } from './sync.js';
export { HttpTransport, toProtocolError } from './http.js';
export type { PushListener, PushSubscription } from './http.js';
export type {
  ApprovedSession,
  AuditEntry,
  AuthorizationRequestView,
  Balance,
  ClientPushEvent,
  SignedMessage,
  TransactionOutcome,
  WalletInfo,
  WalletStatus,
  WalletToken,
} from './schemas.js';
