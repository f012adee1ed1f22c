import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { z } from "zod";
import { PipelineStatusSchema, type PipelineStatus } from "@meeting-minutes/types";
import type { OAuthCallbackResponse } from "@meeting-minutes/core";
import { createAppContext, loadConfig, type AppContext } from "@meeting-minutes/runner";
import { startServer, type RunningServer } from "./start.js";

describe("HTTP server", () => {
  let dir: string;
  let context: AppContext;
  let running: RunningServer;
  let callbacks: OAuthCallbackResponse[];
  let baseUrl: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "server-test-"));
    const config = loadConfig({
      OPENAI_API_KEY: "test-openai-key",
      ANTHROPIC_API_KEY: "test-anthropic-key",
      GOOGLE_CLIENT_ID: "test-client-id",
      GOOGLE_CLIENT_SECRET: "test-secret",
      MEETING_MINUTES_TOKEN_FILE: path.join(dir, "token.json"),
      GOOGLE_CREDENTIALS_FILE: path.join(dir, "credentials.json"),
    });
    context = createAppContext(config, {
      transcriber: { transcribe: async () => "We agreed to launch on Monday." },
      summarizer: { summarize: async () => "## Meeting Summary\nLaunch on Monday." },
      fetchImpl: async () =>
        new Response(
          JSON.stringify({ access_token: "access-1", refresh_token: "refresh-1", expires_in: 3600 }),
          { status: 200, headers: { "Content-Type": "application/json" } }
        ),
    });
    callbacks = [];
    running = await startServer(context, {
      host: "127.0.0.1",
      port: 0,
      onCallback: (response) => callbacks.push(response),
      log: () => undefined,
    });
    baseUrl = `http://127.0.0.1:${running.port}`;
  });

  afterEach(async () => {
    await running.close();
    await fs.rm(dir, { recursive: true, force: true });
  });

  async function ndjson(response: Response): Promise<PipelineStatus[]> {
    const body = await response.text();
    return body
      .split("\n")
      .filter((line) => line.length > 0)
      .map((line) => PipelineStatusSchema.parse(JSON.parse(line)));
  }

  const JsonBodySchema = z.record(z.unknown());

  async function json(response: Response): Promise<Record<string, unknown>> {
    return JsonBodySchema.parse(await response.json());
  }

  async function startFlow(): Promise<string> {
    const body = await json(await fetch(`${baseUrl}/api/auth/start`, { method: "POST" }));
    return z.object({ state: z.string() }).parse(body).state;
  }

  it("completes the authorization flow through the callback route", async () => {
    const start = await json(await fetch(`${baseUrl}/api/auth/start`, { method: "POST" }));
    expect(start.status).toBe("authorization_url_ready");
    const { state } = z.object({ state: z.string() }).parse(start);

    const callback = await fetch(
      `${baseUrl}/oauth/callback?code=auth-code&state=${encodeURIComponent(state)}`
    );

    expect(callback.status).toBe(200);
    expect(await callback.text()).toContain("Authorization Successful");
    expect(callbacks.map((c) => c.outcome)).toEqual(["authorized"]);

    const status = await json(await fetch(`${baseUrl}/api/auth/status`));
    expect(status).toMatchObject({
      status: "authorized",
      setup: { configured: true },
    });
  });

  it("renders a provider denial as 403", async () => {
    const response = await fetch(`${baseUrl}/oauth/callback?error=access_denied`);

    expect(response.status).toBe(403);
    expect(response.headers.get("content-type")).toMatch(/^text\/html/);
    expect(await response.text()).toContain("Authorization failed: access_denied");
    expect(callbacks.map((c) => c.outcome)).toEqual(["provider_denied"]);
  });

  it("rejects a replayed state", async () => {
    const state = await startFlow();
    await fetch(`${baseUrl}/oauth/callback?code=c&state=${encodeURIComponent(state)}`);

    const replay = await fetch(`${baseUrl}/oauth/callback?code=c&state=${encodeURIComponent(state)}`);

    expect(replay.status).toBe(400);
    await replay.text();
    expect(callbacks.map((c) => c.outcome)).toEqual(["authorized", "state_mismatch"]);
  });

  it("resets the authorization", async () => {
    const state = await startFlow();
    await fetch(`${baseUrl}/oauth/callback?code=c&state=${encodeURIComponent(state)}`);

    const reset = await fetch(`${baseUrl}/api/auth/reset`, { method: "POST" });

    expect(await json(reset)).toEqual({ status: "unauthorized" });
    await expect(context.authorizer.currentStatus()).resolves.toEqual({ status: "unauthorized" });
  });

  it("refuses to list Drive files before authorization", async () => {
    const response = await fetch(`${baseUrl}/api/drive/files`);

    expect(response.status).toBe(401);
    expect(await json(response)).toEqual({
      error: true,
      message: "Please authorize Google Drive access first",
    });
  });

  it("streams pipeline events as NDJSON", async () => {
    const response = await fetch(`${baseUrl}/api/minutes`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ localPath: "meeting.mp3" }),
    });

    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toMatch(/^application\/x-ndjson/);
    const events = await ndjson(response);
    expect(events.map((e) => e.stage)).toEqual([
      "initializing",
      "acquiring_source",
      "source_ready",
      "transcribing",
      "transcription_ready",
      "summarizing",
      "complete",
    ]);
    expect(events[6]?.minutesText).toBe("## Meeting Summary\nLaunch on Monday.");
  });

  it("streams a failure when no source is given", async () => {
    const response = await fetch(`${baseUrl}/api/minutes`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({}),
    });

    const events = await ndjson(response);
    expect(events.map((e) => e.stage)).toEqual(["initializing", "failed"]);
    expect(events[1]?.statusText).toBe(
      "❌ Please upload an audio file or select one from Google Drive"
    );
  });

  it("rejects a malformed request body", async () => {
    const response = await fetch(`${baseUrl}/api/minutes`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify({ localPath: 42 }),
    });

    expect(response.status).toBe(400);
    expect((await json(response)).error).toBe("invalid_request");
  });
});
