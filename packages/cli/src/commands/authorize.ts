import { createCLIAuthHandler } from "@meeting-minutes/core";
import type { AppContext } from "@meeting-minutes/runner";
import { green, red } from "../output/index.js";
import { startServer } from "../server/index.js";
import { EXIT_FAILED, EXIT_OK, reportFailure, type CommonOptions } from "./shared.js";

export interface AuthorizeCommandOptions extends CommonOptions {
  /** Print the consent URL without opening a browser */
  openBrowser: boolean;
  timeoutMs?: number;
}

/**
 * Execute the authorize command: serve the callback route, send the user to
 * Google's consent screen and wait for the redirect.
 */
export async function authorizeCommand(
  context: AppContext,
  options: AuthorizeCommandOptions
): Promise<number> {
  const log = options.json ? () => undefined : console.log;

  try {
    const outcome = await context.authorizer.startAuthorization();
    if (outcome.status === "already_authorized") {
      if (options.json) {
        console.log(JSON.stringify(outcome));
      } else {
        console.log(`${green("✓")} Google Drive is already authorized`);
      }
      return EXIT_OK;
    }

    const handler = createCLIAuthHandler({
      openBrowser: options.openBrowser,
      timeoutMs: options.timeoutMs,
      log,
    });
    const running = await startServer(context, {
      onCallback: (response) => handler.notifyCallback(response),
      log: () => undefined,
    });

    try {
      if (options.json) {
        console.log(JSON.stringify(outcome));
      }
      await handler.onAuthorizationRequired(new URL(outcome.url));
      log("Waiting for Google to redirect back...");

      const response = await handler.waitForCallback();
      if (options.json) {
        console.log(JSON.stringify({ status: response.outcome, message: response.message }));
      } else if (response.outcome === "authorized") {
        console.log(`${green("✓")} Google Drive access granted`);
      } else {
        console.error(`${red("✗")} ${response.message ?? "Authorization failed"}`);
      }
      return response.outcome === "authorized" ? EXIT_OK : EXIT_FAILED;
    } finally {
      await running.close();
    }
  } catch (error) {
    return reportFailure(error, options);
  }
}
