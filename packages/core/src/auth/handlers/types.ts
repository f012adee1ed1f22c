import type { OAuthCallbackResponse } from '../callback.js';

/**
 * Interface for handling interactive OAuth authorization flows.
 */
export interface InteractiveAuthHandler {
  /**
   * Called when user authorization is required.
   * The handler should present the authorization URL to the user.
   *
   * @param authorizationUrl - The URL to redirect the user to for authorization
   */
  onAuthorizationRequired(authorizationUrl: URL): Promise<void>;

  /**
   * Called by whoever serves the redirect URI once the callback was handled.
   */
  notifyCallback(response: OAuthCallbackResponse): void;

  /**
   * Wait for the callback to be handled.
   */
  waitForCallback(): Promise<OAuthCallbackResponse>;
}
