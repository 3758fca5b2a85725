/**
 * @file src/index.ts
 * Public API: the wallet-side server, the DApp and wallet-UI clients, and the
 * shared protocol types.
 */

export * from './protocol/index.js';
export * from './auth/index.js';
export * from './server/index.js';
export * from './client/index.js';
export * from './wallet/index.js';
export * from './logger/index.js';
export { NotificationBus } from './notify/bus.js';
export type { PushConnection, PushEvent } from './notify/bus.js';
export { ResponseCache } from './cache/response-cache.js';
export { ConfigError, loadEnv, readEnv, serverOptionsFromEnv } from './config/env.js';
export type { Env } from './config/env.js';
