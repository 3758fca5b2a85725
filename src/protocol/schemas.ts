/**
 * @file src/protocol/schemas.ts
 * zod schemas for every request body the server accepts.
 * Bodies are validated here, at the boundary; handlers only see parsed data.
 */

import { z } from 'zod';
import { PERMISSIONS } from './types.js';

const permission = z.enum(PERMISSIONS, {
  errorMap: () => ({ message: `permission must be one of: ${PERMISSIONS.join(', ')}` }),
});

export const authorizationRequestSchema = z.object({
  app_name: z.string().trim().min(1, 'app_name is required').max(100),
  app_url: z.string().min(1).max(500).url('app_url must be a valid URL'),
  permissions: z.array(permission).max(PERMISSIONS.length * 4),
  description: z.string().max(500).optional(),
});

export const unlockSchema = z.object({
  password: z.string().min(1, 'password is required'),
});

export const transactionSchema = z.object({
  contract: z.string().min(1).max(100),
  function: z.string().min(1).max(100),
  kwargs: z.record(z.unknown()).default({}),
  stamps_supplied: z.number().int().nonnegative().optional(),
});

export const signMessageSchema = z.object({
  message: z.string().min(1, 'message is required').max(10_000),
});

export const addTokenSchema = z.object({
  contract_address: z.string().min(1).max(100),
  token_name: z.string().max(100).optional(),
  token_symbol: z.string().max(20).optional(),
  decimals: z.number().int().min(0).max(18).optional(),
});

export const contractParamSchema = z.string().min(1).max(100);

export type AuthorizationRequestInput = z.infer<typeof authorizationRequestSchema>;
export type UnlockInput = z.infer<typeof unlockSchema>;
export type TransactionInput = z.infer<typeof transactionSchema>;
export type SignMessageInput = z.infer<typeof signMessageSchema>;
export type AddTokenInput = z.infer<typeof addTokenSchema>;

/** Flattens zod issues into `path: message` strings for error bodies. */
export function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const where = issue.path.join('.');
    return where ? `${where}: ${issue.message}` : issue.message;
  });
}
