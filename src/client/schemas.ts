/**
 * @file src/client/schemas.ts
 * Response schemas for the client: each parses a server body and reshapes it
 * into the camelCase value the client API returns.
 */

import { z } from 'zod';
import { PERMISSIONS, WALLET_TYPES } from '../protocol/types.js';

const permission = z.enum(PERMISSIONS);
const requestStatus = z.enum(['pending', 'approved', 'denied', 'expired']);

export const errorBodySchema = z.object({
  error: z.string(),
  code: z.string(),
  details: z.unknown().optional(),
  retry_after: z.number().optional(),
});

export const walletStatusSchema = z
  .object({
    available: z.boolean(),
    locked: z.boolean(),
    wallet_type: z.enum(WALLET_TYPES),
    network: z.string().nullable(),
    chain_id: z.string().nullable(),
    version: z.string(),
  })
  .transform((b) => ({
    available: b.available,
    locked: b.locked,
    walletType: b.wallet_type,
    network: b.network,
    chainId: b.chain_id,
    version: b.version,
  }));

export const walletInfoSchema = z
  .object({
    address: z.string(),
    truncated_address: z.string(),
    locked: z.boolean(),
    chain_id: z.string().nullable(),
    network: z.string().nullable(),
    wallet_type: z.enum(WALLET_TYPES),
    version: z.string(),
  })
  .transform((b) => ({
    address: b.address,
    truncatedAddress: b.truncated_address,
    locked: b.locked,
    chainId: b.chain_id,
    network: b.network,
    walletType: b.wallet_type,
    version: b.version,
  }));

const authorizationRequestBody = z.object({
  request_id: z.string(),
  status: requestStatus,
  app_name: z.string(),
  app_url: z.string(),
  permissions: z.array(permission),
  description: z.string().nullable(),
  created_at: z.string(),
  expires_at: z.string(),
  session_token: z.string().optional(),
  session_expires_at: z.string().optional(),
});

const toAuthorizationRequest = (b: z.infer<typeof authorizationRequestBody>) => ({
  requestId: b.request_id,
  status: b.status,
  appName: b.app_name,
  appUrl: b.app_url,
  permissions: b.permissions,
  description: b.description,
  createdAt: b.created_at,
  expiresAt: b.expires_at,
  sessionToken: b.session_token,
  sessionExpiresAt: b.session_expires_at,
});

export const authorizationRequestSchema = authorizationRequestBody.transform(toAuthorizationRequest);

export const pendingListSchema = z
  .object({ requests: z.array(authorizationRequestBody) })
  .transform((b) => b.requests.map(toAuthorizationRequest));

export const approvedSchema = z
  .object({
    session_token: z.string(),
    expires_at: z.string(),
    permissions: z.array(permission),
    status: z.literal('approved'),
  })
  .transform((b) => ({ sessionToken: b.session_token, expiresAt: b.expires_at, permissions: b.permissions }));

export const deniedSchema = z
  .object({ request_id: z.string(), status: requestStatus })
  .transform((b) => ({ requestId: b.request_id, status: b.status }));

export const balanceSchema = z.object({
  balance: z.number(),
  contract: z.string(),
  cached: z.boolean(),
});

export const transactionSchema = z
  .object({
    success: z.boolean(),
    transaction_hash: z.string().nullable(),
    result: z.unknown(),
    errors: z.array(z.string()).nullable(),
    gas_used: z.number().nullable(),
  })
  .transform((b) => ({
    success: b.success,
    transactionHash: b.transaction_hash,
    result: b.result,
    errors: b.errors,
    gasUsed: b.gas_used,
  }));

export const signatureSchema = z.object({
  signature: z.string(),
  message: z.string(),
  address: z.string(),
});

const tokenBody = z.object({
  contract_address: z.string(),
  token_name: z.string().nullable(),
  token_symbol: z.string().nullable(),
  decimals: z.number().nullable(),
  added_at: z.string(),
});

const toToken = (b: z.infer<typeof tokenBody>) => ({
  contractAddress: b.contract_address,
  tokenName: b.token_name,
  tokenSymbol: b.token_symbol,
  decimals: b.decimals,
  addedAt: b.added_at,
});

export const addTokenSchema = z
  .object({ success: z.boolean(), token: tokenBody })
  .transform((b) => toToken(b.token));

export const tokenListSchema = z
  .object({ tokens: z.array(tokenBody) })
  .transform((b) => b.tokens.map(toToken));

export const statusMessageSchema = z.object({ status: z.string() });

export const auditListSchema = z
  .object({
    events: z.array(
      z.object({
        id: z.number(),
        ts: z.string(),
        event: z.string(),
        app_name: z.string().nullable(),
        source: z.string().nullable(),
        request_id: z.string().nullable(),
        details_json: z.string(),
      }),
    ),
  })
  .transform((b) => b.events);

export const pushEventSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('authorization_request'), request: authorizationRequestBody.transform(toAuthorizationRequest) }),
  z.object({
    type: z.literal('authorization_resolved'),
    request_id: z.string(),
    status: z.enum(['approved', 'denied', 'expired']),
  }),
  z.object({ type: z.literal('pending_requests'), requests: z.array(authorizationRequestBody.transform(toAuthorizationRequest)) }),
  z.object({ type: z.literal('wallet_locked'), reason: z.enum(['manual', 'auto_lock']) }),
  z.object({ type: z.literal('wallet_unlocked') }),
  z.object({ type: z.literal('session_revoked'), app_name: z.string() }),
  z.object({ type: z.literal('server_shutdown') }),
]);

export type WalletStatus = z.output<typeof walletStatusSchema>;
export type WalletInfo = z.output<typeof walletInfoSchema>;
export type AuthorizationRequestView = z.output<typeof authorizationRequestSchema>;
export type ApprovedSession = z.output<typeof approvedSchema>;
export type Balance = z.output<typeof balanceSchema>;
export type TransactionOutcome = z.output<typeof transactionSchema>;
export type SignedMessage = z.output<typeof signatureSchema>;
export type WalletToken = z.output<typeof addTokenSchema>;
export type AuditEntry = z.output<typeof auditListSchema>[number];
export type ClientPushEvent = z.output<typeof pushEventSchema>;
