import type { PipelineInput } from "@meeting-minutes/types";
import { createAppContext, loadConfig, type AppContext } from "@meeting-minutes/runner";
import {
  authorizeCommand,
  browseCommand,
  reportFailure,
  resetCommand,
  runCommand,
  serveCommand,
  statusCommand,
} from "./commands/index.js";
import { setColorsEnabled } from "./output/index.js";

const HELP_TEXT = `
Meeting Minutes Generator

Usage:
  meeting-minutes authorize [options]          Grant access to Google Drive
  meeting-minutes status                       Show Google Drive authorization status
  meeting-minutes reset                        Forget the stored Google Drive credential
  meeting-minutes browse                       List audio files in Google Drive
  meeting-minutes run <audio-file> [options]   Generate minutes from a local recording
  meeting-minutes run --drive <id-or-url>      Generate minutes from a Google Drive file
  meeting-minutes serve                        Start the HTTP server

Options:
  --drive, -d <ref>      Google Drive file id or share URL (run)
  --output, -o <path>    Write the minutes to a file (run)
  --no-browser           Print the consent URL instead of opening a browser (authorize)
  --json                 Output JSON (NDJSON events for run)
  --no-color             Disable colored output
  --help, -h             Show this help message

Environment:
  OPENAI_API_KEY, ANTHROPIC_API_KEY, GOOGLE_CLIENT_ID and GOOGLE_CLIENT_SECRET are required.
  MEETING_MINUTES_TOKEN_FILE, GOOGLE_CREDENTIALS_FILE, MEETING_MINUTES_HOST and
  MEETING_MINUTES_PORT are optional.

Examples:
  meeting-minutes authorize
  meeting-minutes run ./standup.m4a --output minutes.md
  meeting-minutes run --drive https://drive.google.com/file/d/FILE_ID/view

Exit Codes:
  0  Success
  1  Run or authorization failed
  2  Configuration error
  3  Runtime error
`;

export type CommandName = "authorize" | "status" | "reset" | "browse" | "run" | "serve" | "help";

const COMMANDS: ReadonlySet<string> = new Set([
  "authorize",
  "status",
  "reset",
  "browse",
  "run",
  "serve",
]);

export interface ParsedArgs {
  command: CommandName;
  input: PipelineInput;
  output?: string;
  openBrowser: boolean;
  json: boolean;
  noColor: boolean;
}

function isCommandName(value: string): value is CommandName {
  return COMMANDS.has(value);
}

/**
 * Parse command line arguments
 */
export function parseArgs(args: string[]): ParsedArgs {
  const result: ParsedArgs = {
    command: "help",
    input: {},
    openBrowser: true,
    json: false,
    noColor: false,
  };
  let sawCommand = false;

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.command = "help";
      return result;
    }

    if (arg === "--json") {
      result.json = true;
      i++;
      continue;
    }

    if (arg === "--no-color") {
      result.noColor = true;
      i++;
      continue;
    }

    if (arg === "--no-browser") {
      result.openBrowser = false;
      i++;
      continue;
    }

    if (arg === "--drive" || arg === "-d") {
      const nextArg = args[i + 1];
      if (nextArg) {
        result.input.driveFileRef = nextArg;
        i += 2;
        continue;
      }
    }

    if (arg === "--output" || arg === "-o") {
      const nextArg = args[i + 1];
      if (nextArg) {
        result.output = nextArg;
        i += 2;
        continue;
      }
    }

    if (arg && !arg.startsWith("-")) {
      if (!sawCommand && isCommandName(arg)) {
        result.command = arg;
        sawCommand = true;
        i++;
        continue;
      }
      if (sawCommand && result.command === "run" && !result.input.localPath) {
        result.input.localPath = arg;
        i++;
        continue;
      }
    }

    console.error(`Unknown option: ${arg}`);
    result.command = "help";
    return result;
  }

  if (result.command === "run" && !result.input.localPath && !result.input.driveFileRef) {
    result.command = "help";
  }

  return result;
}

function defaultContext(): AppContext {
  return createAppContext(loadConfig());
}

/**
 * Main CLI entry point
 */
export async function main(
  args: string[],
  loadContext: () => AppContext = defaultContext
): Promise<number> {
  const parsed = parseArgs(args);

  if (parsed.command === "help") {
    console.log(HELP_TEXT);
    return 0;
  }

  if (parsed.noColor) {
    setColorsEnabled(false);
  }

  let context: AppContext;
  try {
    context = loadContext();
  } catch (error) {
    return reportFailure(error, parsed);
  }

  switch (parsed.command) {
    case "authorize":
      return authorizeCommand(context, { json: parsed.json, openBrowser: parsed.openBrowser });
    case "status":
      return statusCommand(context, parsed);
    case "reset":
      return resetCommand(context, parsed);
    case "browse":
      return browseCommand(context, parsed);
    case "run":
      return runCommand(context, { json: parsed.json, input: parsed.input, output: parsed.output });
    case "serve":
      return serveCommand(context, parsed);
  }
}

// Export for programmatic use
export * from "./commands/index.js";
export * from "./output/index.js";
export * from "./server/index.js";
