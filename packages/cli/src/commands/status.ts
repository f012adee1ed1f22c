import type { AppContext } from "@meeting-minutes/runner";
import { formatAuthStatus } from "../output/index.js";
import { EXIT_OK, reportFailure, type CommonOptions } from "./shared.js";

/**
 * Execute the status command
 */
export async function statusCommand(context: AppContext, options: CommonOptions): Promise<number> {
  try {
    const [setup, status] = await Promise.all([
      context.authorizer.checkDriveSetup(),
      context.authorizer.currentStatus(),
    ]);

    console.log(
      options.json ? JSON.stringify({ setup, ...status }) : formatAuthStatus(status, setup)
    );
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, options);
  }
}
