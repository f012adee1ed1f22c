import type { OAuthCallbackParams } from "@meeting-minutes/types";
import { AuthorizationError, ConfigurationError, describeError, type AuthorizationErrorKind } from "../errors.js";
import { escapeHtml } from "../utils/html.js";
import type { OAuthAuthorizer } from "./authorizer.js";

export type OAuthCallbackOutcome =
  | "authorized"
  | Exclude<AuthorizationErrorKind, "not_authorized">
  | "configuration_error"
  | "error";

export interface OAuthCallbackResponse {
  statusCode: number;
  outcome: OAuthCallbackOutcome;
  html: string;
  /** Failure text shown on the page */
  message?: string;
}

const FAILURE_STATUS: Record<Exclude<OAuthCallbackOutcome, "authorized">, number> = {
  provider_denied: 403,
  malformed_callback: 400,
  state_mismatch: 400,
  exchange_failed: 502,
  configuration_error: 500,
  error: 500,
};

/**
 * Complete authorization from the redirect query and render the landing page.
 * Never throws: every failure becomes an error page.
 */
export async function handleOAuthCallback(
  authorizer: OAuthAuthorizer,
  params: OAuthCallbackParams
): Promise<OAuthCallbackResponse> {
  try {
    await authorizer.completeAuthorization(params);
    return { statusCode: 200, outcome: "authorized", html: renderSuccessPage() };
  } catch (error) {
    const outcome = classifyCallbackError(error);
    const message = describeError(error);
    return {
      statusCode: FAILURE_STATUS[outcome],
      outcome,
      message,
      html: renderErrorPage(message),
    };
  }
}

function classifyCallbackError(error: unknown): Exclude<OAuthCallbackOutcome, "authorized"> {
  if (error instanceof AuthorizationError && error.kind !== "not_authorized") {
    return error.kind;
  }
  if (error instanceof ConfigurationError) {
    return "configuration_error";
  }
  return "error";
}

export function renderSuccessPage(): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <title>Authorization Successful</title>
  </head>
  <body style="font-family: system-ui; padding: 40px; text-align: center;">
    <h1 style="color: #16a34a;">Authorization Successful</h1>
    <p>Google Drive access has been granted.</p>
    <p>Redirecting you back to the app...</p>
    <p><a href="/">Return to App</a></p>
    <script>
      setTimeout(() => {
        try { window.close(); } catch (e) { window.location.href = '/'; }
      }, 2000);
      setTimeout(() => { window.location.href = '/'; }, 3000);
    </script>
  </body>
</html>
`;
}

export function renderErrorPage(message: string): string {
  return `<!DOCTYPE html>
<html>
  <head>
    <title>Authorization Failed</title>
  </head>
  <body style="font-family: system-ui; padding: 40px; text-align: center;">
    <h1 style="color: #dc2626;">Authorization Failed</h1>
    <p>${escapeHtml(message)}</p>
    <p>Please try again or contact support if the issue persists.</p>
    <p><a href="/">Return to App</a></p>
  </body>
</html>
`;
}
