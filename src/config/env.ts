/**
 * @file src/config/env.ts
 * Single source of truth for environment-derived configuration.
 * readEnv() validates any record; loadEnv() reads .env + process.env and exits
 * the process on invalid input before anything else starts.
 */

import { z } from 'zod';
import { config as loadDotenv } from 'dotenv';
import { DEFAULT_HOST, DEFAULT_PORT, ProtocolDefaults, WALLET_TYPES } from '../protocol/types.js';
import { CorsConfig } from '../server/cors.js';
import type { ProtocolServerOptions } from '../server/server.js';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v === undefined || v.trim() === '' ? undefined : v));

const flag = z
  .enum(['true', 'false', '1', '0'])
  .default('false')
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  // ── Listener ────────────────────────────────────────────────────────────────
  WALLET_HOST: z.string().min(1).default(DEFAULT_HOST),
  WALLET_PORT: z.coerce.number().int().min(0).max(65_535).default(DEFAULT_PORT),
  WALLET_TYPE: z
    .enum(WALLET_TYPES, {
      errorMap: () => ({ message: `WALLET_TYPE must be one of: ${WALLET_TYPES.join(', ')}` }),
    })
    .default('cli'),

  // ── Network ─────────────────────────────────────────────────────────────────
  WALLET_NETWORK_URL: z.string().url('WALLET_NETWORK_URL must be a valid URL').optional(),
  WALLET_CHAIN_ID: optionalString,

  // ── Credentials ─────────────────────────────────────────────────────────────
  WALLET_PASSWORD: optionalString,
  WALLET_ADMIN_TOKEN: optionalString,

  // ── Limits ──────────────────────────────────────────────────────────────────
  MAX_SESSIONS: z.coerce.number().int().positive().default(ProtocolDefaults.maxSessions),
  MAX_PENDING_REQUESTS: z.coerce.number().int().positive().default(ProtocolDefaults.maxPendingRequests),
  SESSION_TIMEOUT_MINUTES: z.coerce.number().positive().default(ProtocolDefaults.sessionTimeoutMinutes),
  SESSION_IDLE_MINUTES: z.coerce.number().positive().optional(),
  REQUEST_TIMEOUT_MINUTES: z.coerce.number().positive().default(ProtocolDefaults.requestTimeoutMinutes),
  AUTO_LOCK_MINUTES: z.coerce.number().min(0).default(ProtocolDefaults.autoLockMinutes),
  CACHE_TTL_SECONDS: z.coerce.number().min(0).default(ProtocolDefaults.cacheTtlSeconds),
  UNLOCK_MAX_ATTEMPTS: z.coerce.number().int().positive().default(5),
  UNLOCK_LOCKOUT_SECONDS: z.coerce.number().positive().default(60),
  SWEEP_INTERVAL_SECONDS: z.coerce.number().positive().default(ProtocolDefaults.sweepIntervalSeconds),

  // ── CORS ────────────────────────────────────────────────────────────────────
  CORS_PRESET: z.enum(['development', 'localhost', 'production']).default('localhost'),
  CORS_ORIGINS: z
    .string()
    .default('')
    .transform((v) => v.split(',').map((o) => o.trim()).filter((o) => o.length > 0)),

  // ── Logging ─────────────────────────────────────────────────────────────────
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).default('info'),
  LOG_PRETTY: flag,
  AUDIT_DB_PATH: z.string().default(':memory:'),

  // ── Runtime ─────────────────────────────────────────────────────────────────
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
});

export type Env = z.infer<typeof envSchema>;

export class ConfigError extends Error {
  override readonly name = 'ConfigError';

  constructor(public readonly issues: string[]) {
    super(`Environment validation failed:\n${issues.map((i) => `  • ${i}`).join('\n')}`);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}

/** Validates `source` against the schema. Throws ConfigError listing every issue. */
export function readEnv(source: Record<string, string | undefined> = process.env): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  const env = result.data;
  if (env.CORS_PRESET === 'production' && env.CORS_ORIGINS.length === 0) {
    throw new ConfigError(['CORS_ORIGINS: required when CORS_PRESET is "production"']);
  }
  if ((env.WALLET_NETWORK_URL === undefined) !== (env.WALLET_CHAIN_ID === undefined)) {
    throw new ConfigError(['WALLET_NETWORK_URL and WALLET_CHAIN_ID must be set together']);
  }
  return env;
}

/** Loads .env, validates process.env and exits with status 1 when it is invalid. */
export function loadEnv(): Env {
  loadDotenv();
  try {
    return readEnv(process.env);
  } catch (err) {
    if (!(err instanceof ConfigError)) throw err;
    // The logger is not initialised yet
    process.stderr.write(
      `\n[wallet-bridge] ${err.message}\n\n` +
        '  Copy .env.example to .env and fill in the required values.\n\n',
    );
    process.exit(1);
  }
}

// ── Derived values ────────────────────────────────────────────────────────────

/** Maps validated settings onto ProtocolServer options (logger and wallet excluded). */
export function serverOptionsFromEnv(env: Env): ProtocolServerOptions {
  return {
    walletType: env.WALLET_TYPE,
    password: env.WALLET_PASSWORD,
    adminToken: env.WALLET_ADMIN_TOKEN,
    network:
      env.WALLET_NETWORK_URL !== undefined && env.WALLET_CHAIN_ID !== undefined
        ? { url: env.WALLET_NETWORK_URL, chainId: env.WALLET_CHAIN_ID }
        : undefined,
    cors: CorsConfig.fromPreset(env.CORS_PRESET, env.CORS_ORIGINS),
    maxSessions: env.MAX_SESSIONS,
    maxPendingRequests: env.MAX_PENDING_REQUESTS,
    sessionTimeoutMs: env.SESSION_TIMEOUT_MINUTES * 60_000,
    sessionIdleTimeoutMs: env.SESSION_IDLE_MINUTES !== undefined ? env.SESSION_IDLE_MINUTES * 60_000 : undefined,
    requestTimeoutMs: env.REQUEST_TIMEOUT_MINUTES * 60_000,
    autoLockMs: env.AUTO_LOCK_MINUTES * 60_000,
    cacheTtlMs: env.CACHE_TTL_SECONDS * 1000,
    sweepIntervalMs: env.SWEEP_INTERVAL_SECONDS * 1000,
    rateLimit: {
      maxAttempts: env.UNLOCK_MAX_ATTEMPTS,
      lockoutMs: env.UNLOCK_LOCKOUT_SECONDS * 1000,
    },
    auditDbPath: env.AUDIT_DB_PATH,
  };
}
