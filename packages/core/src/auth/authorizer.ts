import type {
  AuthStatus,
  CompleteAuthorizationOutcome,
  CredentialRecord,
  OAuthCallbackParams,
  OAuthClientConfig,
  ResetOutcome,
  StartAuthorizationOutcome,
} from "@meeting-minutes/types";
import { AuthorizationError, ConfigurationError, describeError } from "../errors.js";
import {
  isCredentialRefreshable,
  isCredentialValid,
  type CredentialStore,
} from "./credential-store.js";
import { PendingStateSet } from "./session/index.js";
import {
  buildAuthorizationUrl,
  type ClientConfigLoader,
  type TokenEndpoint,
} from "./provider/index.js";

export interface OAuthAuthorizerOptions {
  store: CredentialStore;
  tokenEndpoint: TokenEndpoint;
  loadClientConfig: ClientConfigLoader;
  /** Injected so each authorizer owns its own pending states */
  pendingStates?: PendingStateSet;
  now?: () => number;
}

type RefreshResult = { ok: true; record: CredentialRecord } | { ok: false; message: string };

/**
 * Three-legged OAuth authorization-code flow for Google Drive.
 *
 * Unauthorized -> AuthorizationPending (startAuthorization)
 * AuthorizationPending -> Authorized (completeAuthorization)
 * Authorized -> Unauthorized (reset)
 */
export class OAuthAuthorizer {
  readonly pendingStates: PendingStateSet;
  private readonly now: () => number;

  constructor(private readonly options: OAuthAuthorizerOptions) {
    this.pendingStates = options.pendingStates ?? new PendingStateSet();
    this.now = options.now ?? Date.now;
  }

  /**
   * Begin authorization. Short-circuits when a usable credential exists.
   *
   * @throws ConfigurationError if no OAuth client id/secret is configured
   */
  async startAuthorization(): Promise<StartAuthorizationOutcome> {
    const client = await this.requireClient();

    const existing = await this.options.store.load();
    if (isCredentialValid(existing, this.now())) {
      return { status: "already_authorized" };
    }
    if (existing && isCredentialRefreshable(existing)) {
      const refreshed = await this.refresh(client, existing);
      if (refreshed.ok) {
        return { status: "already_authorized" };
      }
    }

    const state = this.pendingStates.issue();
    const url = buildAuthorizationUrl(client, state);
    return { status: "authorization_url_ready", url: url.toString(), state };
  }

  /**
   * Finish authorization from the provider's redirect.
   *
   * The state is consumed as soon as it passes the check, so a replayed
   * callback fails with state_mismatch even while the first exchange is in
   * flight. Nothing is written to the credential store unless the exchange
   * succeeds.
   */
  async completeAuthorization(params: OAuthCallbackParams): Promise<CompleteAuthorizationOutcome> {
    const { code, state, error } = params;

    if (error) {
      throw new AuthorizationError("provider_denied", error);
    }
    if (!code || !state) {
      throw new AuthorizationError("malformed_callback");
    }
    if (!this.pendingStates.consume(state)) {
      throw new AuthorizationError("state_mismatch");
    }

    const client = await this.requireClient();

    let record: CredentialRecord;
    try {
      record = await this.options.tokenEndpoint.exchangeCode(client, code);
    } catch (exchangeError) {
      throw new AuthorizationError("exchange_failed", describeError(exchangeError), {
        cause: exchangeError,
      });
    }

    await this.options.store.save(record);
    return { status: "authorized", expiresAt: record.expiresAt };
  }

  /**
   * Forget the stored credential and every pending state. Never throws: a
   * credential file that cannot be removed comes back as a warning.
   */
  async reset(): Promise<ResetOutcome> {
    this.pendingStates.clear();
    try {
      await this.options.store.clear();
      return { status: "unauthorized" };
    } catch (error) {
      return { status: "unauthorized", warning: describeError(error) };
    }
  }

  /**
   * Report whether Drive access is usable, refreshing an expired token first.
   */
  async currentStatus(): Promise<AuthStatus> {
    const resolved = await this.resolveCredential();
    return resolved.ok
      ? { status: "authorized", expiresAt: resolved.record.expiresAt }
      : { status: "unauthorized", ...(resolved.message ? { reason: resolved.message } : {}) };
  }

  /**
   * Access token for Drive requests.
   *
   * @throws AuthorizationError (not_authorized) when there is no usable credential
   */
  async getAccessToken(): Promise<string> {
    const resolved = await this.resolveCredential();
    if (!resolved.ok) {
      throw new AuthorizationError("not_authorized", resolved.message);
    }
    return resolved.record.accessToken;
  }

  /**
   * Whether an OAuth client id and secret are available.
   */
  async checkDriveSetup(): Promise<{ configured: boolean; message: string }> {
    try {
      const client = await this.options.loadClientConfig();
      return client
        ? { configured: true, message: "Google Drive OAuth configured successfully" }
        : {
            configured: false,
            message:
              "Google OAuth credentials not found. Please set GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET environment variables.",
          };
    } catch (error) {
      return { configured: false, message: describeError(error) };
    }
  }

  private async resolveCredential(): Promise<
    { ok: true; record: CredentialRecord } | { ok: false; message?: string }
  > {
    const record = await this.options.store.load();
    if (!record) {
      return { ok: false };
    }
    if (isCredentialValid(record, this.now())) {
      return { ok: true, record };
    }
    if (!isCredentialRefreshable(record)) {
      return { ok: false, message: "Stored credentials have expired" };
    }

    let client: OAuthClientConfig | null;
    try {
      client = await this.options.loadClientConfig();
    } catch (error) {
      return { ok: false, message: describeError(error) };
    }
    if (!client) {
      return { ok: false, message: "Google OAuth client is not configured" };
    }

    const refreshed = await this.refresh(client, record);
    return refreshed.ok
      ? refreshed
      : { ok: false, message: `Error refreshing credentials: ${refreshed.message}` };
  }

  /** One attempt, no retry */
  private async refresh(client: OAuthClientConfig, record: CredentialRecord): Promise<RefreshResult> {
    try {
      const refreshed = await this.options.tokenEndpoint.refresh(client, record);
      await this.options.store.save(refreshed);
      return { ok: true, record: refreshed };
    } catch (error) {
      return { ok: false, message: describeError(error) };
    }
  }

  private async requireClient(): Promise<OAuthClientConfig> {
    const client = await this.options.loadClientConfig();
    if (!client) {
      throw new ConfigurationError(["GOOGLE_CLIENT_ID", "GOOGLE_CLIENT_SECRET"]);
    }
    return client;
  }
}
