/**
 * @file src/logger/logger.ts
 * Structured JSON logger wrapping pino.
 * Credential-bearing field names are redacted at the transport level.
 */

import pino from 'pino';
import type { DestinationStream, Logger as PinoLogger } from 'pino';

// ── Redacted field names ──────────────────────────────────────────────────────
// Values under these paths are replaced with '[REDACTED]'. Handlers must still
// never hand passwords or session tokens to the logger.
const REDACTED_PATHS = [
  'password',
  'token',
  'sessionToken',
  'session_token',
  'adminToken',
  'authorization',
  'secretKey',
  'privateKey',
  '*.password',
  '*.token',
  '*.sessionToken',
  '*.session_token',
  '*.authorization',
  'req.headers.authorization',
  'req.headers["x-wallet-token"]',
];

// ── Public logger type ────────────────────────────────────────────────────────

export type Logger = PinoLogger;

/** Bound as `service` on loggers created by the CLI entry points. */
export const SERVICE_NAME = 'wallet-bridge';

// ── Factory ───────────────────────────────────────────────────────────────────

export interface LoggerOptions {
  level?: string;
  /** Persistent fields bound to every log line from this logger. */
  bindings?: Record<string, string>;
  /** Whether to pretty-print (dev only). Never use in production. */
  pretty?: boolean;
  /** Where JSON lines go when not pretty-printing. Defaults to stdout. */
  destination?: DestinationStream;
}

/**
 * Creates a structured logger. Call once at startup and pass the instance
 * through the dependency tree.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const { level = 'info', bindings = {}, pretty = false, destination } = options;

  const transport =
    pretty && process.env['NODE_ENV'] !== 'production'
      ? pino.transport({ target: 'pino-pretty', options: { colorize: true } })
      : undefined;

  return pino(
    {
      level,
      redact: {
        paths: REDACTED_PATHS,
        censor: '[REDACTED]',
      },
      serializers: {
        err: pino.stdSerializers.err,
        error: pino.stdSerializers.err,
      },
      base: {
        pid: process.pid,
        ...bindings,
      },
    },
    transport ?? destination,
  );
}

/** Child logger tagged with the emitting component (server, sweeper, client...). */
export function createComponentLogger(parent: Logger, component: string): Logger {
  return parent.child({ component });
}

let _rootLogger: Logger | undefined;

export function getRootLogger(): Logger {
  if (!_rootLogger) {
    _rootLogger = createLogger({
      level: process.env['LOG_LEVEL'] ?? 'info',
      bindings: { service: SERVICE_NAME },
    });
  }
  return _rootLogger;
}
