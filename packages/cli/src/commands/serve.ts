import type { AppContext } from "@meeting-minutes/runner";
import { formatServerBanner } from "../output/index.js";
import { startServer, type RunningServer } from "../server/index.js";
import { EXIT_OK, reportFailure, type CommonOptions } from "./shared.js";

/**
 * Execute the serve command. Resolves once the server has shut down on
 * SIGINT or SIGTERM.
 */
export async function serveCommand(context: AppContext, options: CommonOptions): Promise<number> {
  let running: RunningServer;
  try {
    running = await startServer(context);
  } catch (error) {
    return reportFailure(error, options);
  }

  const { config } = context;
  console.log(
    formatServerBanner({
      host: config.server.host,
      port: running.port,
      redirectUri: config.google.redirectUri,
    })
  );

  const setup = await context.authorizer.checkDriveSetup();
  console.log(setup.configured ? `✅ ${setup.message}` : `⚠️  ${setup.message}`);

  await new Promise<void>((resolve) => {
    process.once("SIGINT", resolve);
    process.once("SIGTERM", resolve);
  });

  console.log("\nShutting down...");
  await running.close();
  return EXIT_OK;
}
