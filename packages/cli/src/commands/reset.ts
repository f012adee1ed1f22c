import type { AppContext } from "@meeting-minutes/runner";
import { green, yellow } from "../output/index.js";
import { EXIT_OK, reportFailure, type CommonOptions } from "./shared.js";

/**
 * Execute the reset command: forget the stored credential.
 */
export async function resetCommand(
  context: AppContext,
  options: CommonOptions,
  log: (message: string) => void = console.log
): Promise<number> {
  try {
    const outcome = await context.authorizer.reset();
    if (options.json) {
      log(JSON.stringify(outcome));
      return EXIT_OK;
    }
    log(`${green("✓")} Google Drive authorization has been reset`);
    if (outcome.warning) {
      log(`${yellow("!")} Credential file was not removed: ${outcome.warning}`);
    }
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, options);
  }
}
