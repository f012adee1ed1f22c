import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { createAppContext, loadConfig, type AppContext } from "@meeting-minutes/runner";
import type { Summarizer, Transcriber } from "@meeting-minutes/runner";
import { setColorsEnabled } from "../output/index.js";
import { runCommand } from "./run.js";

describe("runCommand", () => {
  let dir: string;
  let out: string[];
  let err: string[];

  beforeAll(() => setColorsEnabled(false));
  afterAll(() => setColorsEnabled(true));

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "run-command-test-"));
    out = [];
    err = [];
    jest.spyOn(console, "log").mockImplementation((...args: unknown[]) => {
      out.push(args.map(String).join(" "));
    });
    jest.spyOn(console, "error").mockImplementation((...args: unknown[]) => {
      err.push(args.map(String).join(" "));
    });
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await fs.rm(dir, { recursive: true, force: true });
  });

  function context(transcriber: Transcriber, summarizer: Summarizer): AppContext {
    return createAppContext(
      loadConfig({
        OPENAI_API_KEY: "test-openai-key",
        ANTHROPIC_API_KEY: "test-anthropic-key",
        GOOGLE_CLIENT_ID: "test-client-id",
        GOOGLE_CLIENT_SECRET: "test-secret",
        MEETING_MINUTES_TOKEN_FILE: path.join(dir, "token.json"),
        GOOGLE_CREDENTIALS_FILE: path.join(dir, "credentials.json"),
      }),
      { transcriber, summarizer }
    );
  }

  const transcriber: Transcriber = { transcribe: async () => "We agreed to launch on Monday." };
  const summarizer: Summarizer = { summarize: async () => "## Meeting Summary\nLaunch on Monday." };

  it("writes the minutes to the output file", async () => {
    const output = path.join(dir, "minutes.md");

    const exitCode = await runCommand(context(transcriber, summarizer), {
      json: false,
      input: { localPath: path.join(dir, "standup.mp3") },
      output,
    });

    expect(exitCode).toBe(0);
    await expect(fs.readFile(output, "utf-8")).resolves.toBe("## Meeting Summary\nLaunch on Monday.");
    expect(out[0]).toBe("[initializing] ○ ⏳ Initializing...");
    expect(out[out.length - 1]).toContain(`Saved to: ${output}`);
  });

  it("prints the minutes when no output file is given", async () => {
    const exitCode = await runCommand(context(transcriber, summarizer), {
      json: false,
      input: { localPath: path.join(dir, "standup.mp3") },
    });

    expect(exitCode).toBe(0);
    expect(out[out.length - 1]).toContain("## Meeting Summary\nLaunch on Monday.");
  });

  it("prints every event as one JSON line", async () => {
    await runCommand(context(transcriber, summarizer), {
      json: true,
      input: { localPath: path.join(dir, "standup.mp3") },
    });

    const stages = out.map((line) => {
      const event: unknown = JSON.parse(line);
      return typeof event === "object" && event !== null && "stage" in event ? event.stage : null;
    });
    expect(stages).toEqual([
      "initializing",
      "acquiring_source",
      "source_ready",
      "transcribing",
      "transcription_ready",
      "summarizing",
      "complete",
    ]);
  });

  it("exits with 1 and writes nothing when a stage fails", async () => {
    const output = path.join(dir, "minutes.md");
    const failing: Transcriber = {
      transcribe: async () => {
        throw new Error("Rate limit reached");
      },
    };

    const exitCode = await runCommand(context(failing, summarizer), {
      json: false,
      input: { localPath: path.join(dir, "standup.mp3") },
      output,
    });

    expect(exitCode).toBe(1);
    await expect(fs.access(output)).rejects.toThrow();
    expect(out[out.length - 1]).toMatch(/^\[failed\] ✗ /);
  });

  it("exits with 1 without a source", async () => {
    const exitCode = await runCommand(context(transcriber, summarizer), { json: false, input: {} });

    expect(exitCode).toBe(1);
  });
});
