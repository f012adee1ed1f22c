import { searchAudioCandidates } from "@meeting-minutes/core";
import type { AppContext } from "@meeting-minutes/runner";
import { formatSearchResult } from "../output/index.js";
import { EXIT_FAILED, EXIT_OK, reportFailure, type CommonOptions } from "./shared.js";

/**
 * Execute the browse command: list audio files in the user's Drive.
 */
export async function browseCommand(context: AppContext, options: CommonOptions): Promise<number> {
  try {
    const api = await context.openDriveSession();
    const result = await searchAudioCandidates(api);

    console.log(options.json ? JSON.stringify(result, null, 2) : formatSearchResult(result));
    return result.outcome === "error" ? EXIT_FAILED : EXIT_OK;
  } catch (error) {
    return reportFailure(error, options);
  }
}
