/**
 * @file src/server/cors.ts
 * Cross-origin policy for browser DApps, built on the `cors` middleware.
 *
 * Allowed origins are echoed back in Access-Control-Allow-Origin (never `*`),
 * so credentialed requests work. Other origins get no CORS headers and the
 * browser blocks the response; the request itself is still processed.
 */

import cors from 'cors';
import type { RequestHandler } from 'express';

export interface CorsConfig {
  /** Exact origins, or '*' to accept any origin. */
  allowOrigins: string[];
  allowCredentials: boolean;
  allowMethods: string[];
  allowHeaders: string[];
  /** Preflight cache lifetime in seconds. */
  maxAge?: number;
}

export type CorsPreset = 'development' | 'localhost' | 'production';

const DEFAULT_METHODS = ['GET', 'POST', 'OPTIONS'];
const DEFAULT_HEADERS = ['Content-Type', 'Authorization'];
// A browser-hosted wallet UI sends the admin token on wallet-local calls.
const WALLET_UI_HEADERS = [...DEFAULT_HEADERS, 'X-Wallet-Token'];
const DEV_PORTS = [3000, 3001, 4200, 5000, 5173, 8000, 8080, 8081];

export const CorsConfig = {
  /** Any origin. For local development only. */
  development(): CorsConfig {
    return {
      allowOrigins: ['*'],
      allowCredentials: true,
      allowMethods: [...DEFAULT_METHODS],
      allowHeaders: ['*'],
    };
  },

  /** http://localhost and http://127.0.0.1 on common dev-server ports. */
  localhostDev(ports: number[] = DEV_PORTS): CorsConfig {
    const allowOrigins = ports.flatMap((port) => [
      `http://localhost:${port}`,
      `http://127.0.0.1:${port}`,
    ]);
    return {
      allowOrigins,
      allowCredentials: true,
      allowMethods: [...DEFAULT_METHODS],
      allowHeaders: [...WALLET_UI_HEADERS],
    };
  },

  /** An explicit allow-list with a restricted header set. */
  production(origins: string[]): CorsConfig {
    return {
      allowOrigins: [...origins],
      allowCredentials: true,
      allowMethods: [...DEFAULT_METHODS],
      allowHeaders: [...DEFAULT_HEADERS],
      maxAge: 600,
    };
  },

  fromPreset(preset: CorsPreset, origins: string[] = []): CorsConfig {
    switch (preset) {
      case 'development':
        return CorsConfig.development();
      case 'production':
        return CorsConfig.production(origins);
      case 'localhost':
        return CorsConfig.localhostDev();
    }
  },
};

export function isOriginAllowed(config: CorsConfig, origin: string): boolean {
  return config.allowOrigins.includes('*') || config.allowOrigins.includes(origin);
}

export function createCorsMiddleware(config: CorsConfig): RequestHandler {
  return cors({
    origin: (origin, callback) => {
      // Same-origin and non-browser callers send no Origin header.
      if (origin === undefined) {
        callback(null, false);
        return;
      }
      callback(null, isOriginAllowed(config, origin) ? origin : false);
    },
    credentials: config.allowCredentials,
    methods: config.allowMethods,
    // '*' means reflect whatever the preflight asks for.
    allowedHeaders: config.allowHeaders.includes('*') ? undefined : config.allowHeaders,
    maxAge: config.maxAge,
    optionsSuccessStatus: 200,
  });
}
