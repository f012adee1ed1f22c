import { ConfigurationError, MinutesError, describeError } from "@meeting-minutes/core";
import { red } from "../output/index.js";

export const EXIT_OK = 0;
export const EXIT_FAILED = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_RUNTIME_ERROR = 3;

export interface CommonOptions {
  json: boolean;
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof ConfigurationError) return EXIT_CONFIG_ERROR;
  if (error instanceof MinutesError) return EXIT_FAILED;
  return EXIT_RUNTIME_ERROR;
}

/**
 * Print a failure the way the command's output mode expects and pick the exit code.
 */
export function reportFailure(error: unknown, options: CommonOptions, log = console.error): number {
  const message = describeError(error);
  if (options.json) {
    console.log(JSON.stringify({ error: true, message }));
  } else {
    log(`${red("✗")} ${message}`);
  }
  return exitCodeFor(error);
}
