import { z } from "zod";
import {
  TokenResponseSchema,
  type CredentialRecord,
  type OAuthClientConfig,
  type TokenResponse,
} from "@meeting-minutes/types";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/** Google omits expires_in on some refresh responses; its access tokens last an hour */
const DEFAULT_EXPIRES_IN_SECONDS = 3600;

const TokenErrorSchema = z.object({
  error: z.string().optional(),
  error_description: z.string().optional(),
});

/**
 * The provider's token endpoint: code exchange and refresh.
 */
export interface TokenEndpoint {
  exchangeCode(client: OAuthClientConfig, code: string): Promise<CredentialRecord>;
  refresh(client: OAuthClientConfig, record: CredentialRecord): Promise<CredentialRecord>;
}

/**
 * Build the consent URL. Requests offline access and forces the consent
 * screen so Google always returns a refresh token.
 */
export function buildAuthorizationUrl(client: OAuthClientConfig, state: string): URL {
  const url = new URL(client.authUri);
  url.searchParams.set("client_id", client.clientId);
  url.searchParams.set("redirect_uri", client.redirectUri);
  url.searchParams.set("response_type", "code");
  url.searchParams.set("scope", client.scopes.join(" "));
  url.searchParams.set("state", state);
  url.searchParams.set("access_type", "offline");
  url.searchParams.set("prompt", "consent");
  url.searchParams.set("include_granted_scopes", "true");
  return url;
}

/**
 * Convert a token endpoint response into the persisted record.
 * Refresh responses usually leave out the refresh token and scope, so the
 * previous values carry over.
 */
export function toCredentialRecord(
  response: TokenResponse,
  previous: { refreshToken?: string; scopes: string[] },
  now: number = Date.now()
): CredentialRecord {
  const expiresIn = response.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS;
  const refreshToken = response.refresh_token ?? previous.refreshToken;

  return {
    version: 1,
    accessToken: response.access_token,
    ...(refreshToken ? { refreshToken } : {}),
    tokenType: response.token_type ?? "Bearer",
    scopes: response.scope ? response.scope.split(" ").filter(Boolean) : previous.scopes,
    expiresAt: now + expiresIn * 1000,
  };
}

/**
 * Token endpoint client for Google's OAuth 2.0 server.
 */
export class GoogleTokenEndpoint implements TokenEndpoint {
  constructor(private readonly fetchImpl: FetchLike = fetch) {}

  async exchangeCode(client: OAuthClientConfig, code: string): Promise<CredentialRecord> {
    const data = await this.post(
      client.tokenUri,
      new URLSearchParams({
        code,
        client_id: client.clientId,
        client_secret: client.clientSecret,
        redirect_uri: client.redirectUri,
        grant_type: "authorization_code",
      })
    );

    return toCredentialRecord(data, { scopes: client.scopes });
  }

  async refresh(client: OAuthClientConfig, record: CredentialRecord): Promise<CredentialRecord> {
    if (!record.refreshToken) {
      throw new Error("No refresh token available");
    }

    const data = await this.post(
      client.tokenUri,
      new URLSearchParams({
        client_id: client.clientId,
        client_secret: client.clientSecret,
        refresh_token: record.refreshToken,
        grant_type: "refresh_token",
      })
    );

    return toCredentialRecord(data, { refreshToken: record.refreshToken, scopes: record.scopes });
  }

  private async post(tokenUri: string, body: URLSearchParams): Promise<TokenResponse> {
    const response = await this.fetchImpl(tokenUri, {
      method: "POST",
      headers: { "Content-Type": "application/x-www-form-urlencoded" },
      body: body.toString(),
    });

    const payload: unknown = await response.json().catch(() => ({}));

    if (!response.ok) {
      const parsed = TokenErrorSchema.safeParse(payload);
      const reason = parsed.success
        ? parsed.data.error_description ?? parsed.data.error
        : undefined;
      throw new Error(reason ?? `Token endpoint returned HTTP ${response.status}`);
    }

    return TokenResponseSchema.parse(payload);
  }
}
