import type { AudioSearchResult, AuthStatus, PipelineResult } from "@meeting-minutes/types";
import { formatDuration } from "@meeting-minutes/core";
import { bold, cyan, dim, green, red, yellow } from "./colors.js";

const RULE = "═══════════════════════════════════════════════════════════";

/**
 * Authorization status and Drive setup, as printed by `status`
 */
export function formatAuthStatus(
  status: AuthStatus,
  setup: { configured: boolean; message: string }
): string {
  const lines: string[] = [];

  lines.push(
    setup.configured ? `${green("✓")} ${setup.message}` : `${red("✗")} ${setup.message}`
  );

  if (status.status === "authorized") {
    lines.push(`${green("✓")} Google Drive authorized`);
    lines.push(dim(`  Access token valid until ${new Date(status.expiresAt).toISOString()}`));
  } else {
    lines.push(`${yellow("⚠")} Google Drive not authorized`);
    if (status.reason) {
      lines.push(dim(`  ${status.reason}`));
    }
    lines.push(dim("  Run `meeting-minutes authorize` to grant access."));
  }

  return lines.join("\n");
}

/**
 * Audio candidates, as printed by `browse`
 */
export function formatSearchResult(result: AudioSearchResult): string {
  if (result.outcome !== "found") {
    const marker = result.outcome === "error" ? red("✗") : yellow("⚠");
    return `${marker} ${result.summary}`;
  }

  const lines = [`${green("✓")} ${result.summary}`, ""];
  for (const option of result.files) {
    lines.push(`  ${option.label}`);
    lines.push(dim(`    id: ${option.descriptor.id}`));
  }
  if (result.totalFound > result.files.length) {
    lines.push("");
    lines.push(dim(`  Showing the first ${result.files.length} of ${result.totalFound}.`));
  }
  if (result.skippedQueries > 0) {
    lines.push(dim(`  ${result.skippedQueries} search filter(s) failed and were skipped.`));
  }
  return lines.join("\n");
}

/**
 * Closing block of a successful `run`
 */
export function formatMinutesReport(result: PipelineResult, outputPath?: string): string {
  const lines: string[] = [];

  lines.push("");
  lines.push(bold(RULE));
  lines.push(bold("                     Meeting Minutes"));
  lines.push(bold(RULE));
  lines.push("");

  if (outputPath) {
    lines.push(`Saved to: ${cyan(outputPath)}`);
  } else {
    lines.push(result.minutes);
  }

  lines.push("");
  lines.push(dim(`Transcript: ${result.transcript.length} characters`));
  lines.push(dim(`Duration:   ${formatDuration(result.durationMs)}`));
  lines.push(dim(RULE));

  return lines.join("\n");
}

/**
 * Startup banner of the HTTP server
 */
export function formatServerBanner(options: {
  host: string;
  port: number;
  redirectUri: string;
}): string {
  const base = `http://localhost:${options.port}`;
  return `
${RULE}
  ${bold("Meeting Minutes Generator")}
${RULE}
  Listening on:    ${options.host}:${options.port}
  OAuth callback:  ${cyan(options.redirectUri)}
  Auth status:     ${base}/api/auth/status
  Drive files:     ${base}/api/drive/files
  Minutes:         POST ${base}/api/minutes
${RULE}
`;
}
