/**
 * Result of starting an authorization
 */
export type StartAuthorizationOutcome =
  | { status: 'already_authorized' }
  | { status: 'authorization_url_ready'; url: string; state: string };

/**
 * Result of a successful callback completion. Failures are thrown as AuthorizationError.
 */
export interface CompleteAuthorizationOutcome {
  status: 'authorized';
  expiresAt: number;
}

/**
 * Result of a reset. The pending states are always gone; `warning` is set
 * when the credential file could not be removed.
 */
export interface ResetOutcome {
  status: 'unauthorized';
  warning?: string;
}

/**
 * Query parameters Google appends to the redirect URI
 */
export interface OAuthCallbackParams {
  code?: string | null;
  state?: string | null;
  error?: string | null;
}

export type AuthStatus =
  | { status: 'authorized'; expiresAt: number }
  | { status: 'unauthorized'; reason?: string };
