import type { OAuthCallbackResponse } from '../callback.js';
import type { InteractiveAuthHandler } from './types.js';

export interface CLIAuthHandlerOptions {
  /** Try to open the system browser (default true) */
  openBrowser?: boolean;
  /** Give up waiting after this long (default 5 minutes) */
  timeoutMs?: number;
  log?: (message: string) => void;
}

/**
 * CLI interactive auth handler that:
 * 1. Opens the authorization URL in the user's browser
 * 2. Waits until the callback route reports the outcome
 */
export function createCLIAuthHandler(options: CLIAuthHandlerOptions = {}): InteractiveAuthHandler {
  const { openBrowser = true, timeoutMs = 5 * 60 * 1000, log = console.log } = options;

  let received: OAuthCallbackResponse | null = null;
  let pendingResolve: ((response: OAuthCallbackResponse) => void) | null = null;

  return {
    async onAuthorizationRequired(authorizationUrl: URL): Promise<void> {
      log('\n[OAuth] Authorization Required');
      log(`URL: ${authorizationUrl.toString()}\n`);

      if (!openBrowser) {
        log('Open the URL above in your browser to continue.\n');
        return;
      }

      log('Opening browser for consent...');
      try {
        const { default: open } = await import('open');
        await open(authorizationUrl.toString());
      } catch {
        log('Could not open browser automatically.');
        log('Please open the URL above manually.\n');
      }
    },

    notifyCallback(response: OAuthCallbackResponse): void {
      if (pendingResolve) {
        pendingResolve(response);
        pendingResolve = null;
      } else {
        received = response;
      }
    },

    waitForCallback(): Promise<OAuthCallbackResponse> {
      if (received) {
        return Promise.resolve(received);
      }

      return new Promise((resolve, reject) => {
        const timer = setTimeout(() => {
          pendingResolve = null;
          reject(new Error(`OAuth callback timeout (${Math.round(timeoutMs / 1000)}s)`));
        }, timeoutMs);

        pendingResolve = (response) => {
          clearTimeout(timer);
          resolve(response);
        };
      });
    },
  };
}
