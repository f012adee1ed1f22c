import { z } from 'zod';

/**
 * The single OAuth credential persisted between runs.
 * Stored as plain JSON so any client can read it back.
 */
export const CredentialRecordSchema = z.object({
  version: z.literal(1),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1).optional(),
  tokenType: z.string().default('Bearer'),
  scopes: z.array(z.string()).default([]),
  /** Expiry as epoch milliseconds */
  expiresAt: z.number().int(),
});

export type CredentialRecord = z.infer<typeof CredentialRecordSchema>;

/**
 * Token endpoint response (RFC 6749 section 5.1)
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;
