import { z } from 'zod';

export const DEFAULT_DRIVE_SCOPES = ['https://www.googleapis.com/auth/drive.readonly'];
export const GOOGLE_AUTH_URI = 'https://accounts.google.com/o/oauth2/v2/auth';
export const GOOGLE_TOKEN_URI = 'https://oauth2.googleapis.com/token';

/**
 * Google OAuth 2.0 Authorization Code flow configuration
 */
export const GoogleAuthConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  /** Where Google sends the user back after consent */
  redirectUri: z.string().url(),
  scopes: z.array(z.string()).default(DEFAULT_DRIVE_SCOPES),
  /** Optional client-secret file downloaded from Google Cloud Console */
  credentialsFile: z.string().default('credentials.json'),
  /** Where the single cached credential record lives */
  tokenFile: z.string().default('token.json'),
});

/**
 * Fully resolved OAuth client used for a single authorization or exchange
 */
export const OAuthClientConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  redirectUri: z.string().url(),
  scopes: z.array(z.string()).min(1),
  authUri: z.string().url().default(GOOGLE_AUTH_URI),
  tokenUri: z.string().url().default(GOOGLE_TOKEN_URI),
});

export type GoogleAuthConfig = z.infer<typeof GoogleAuthConfigSchema>;
export type OAuthClientConfig = z.infer<typeof OAuthClientConfigSchema>;
