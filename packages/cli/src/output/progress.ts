import type { PipelineStage, PipelineStatus } from "@meeting-minutes/types";
import { bold, dim, red, stageIcon } from "./colors.js";

/** Stages whose status text is the transcript rather than a progress message */
const TRANSCRIPT_STAGES: ReadonlySet<PipelineStage> = new Set([
  "transcription_ready",
  "summarizing",
  "complete",
]);

const STAGE_LABELS: Record<PipelineStage, string> = {
  initializing: "Initializing",
  acquiring_source: "Acquiring audio",
  source_ready: "Audio ready",
  transcribing: "Transcribing",
  transcription_ready: "Transcript ready",
  summarizing: "Generating minutes",
  complete: "Complete",
  failed: "Failed",
};

/**
 * One console line for a pipeline event.
 * Transcript-bearing events print a length instead of the whole text.
 */
export function formatStatusEvent(event: PipelineStatus): string {
  const label = dim(`[${event.stage}]`);
  const icon = stageIcon(event.stage);

  if (event.failed) {
    return `${label} ${icon} ${red(event.statusText)}`;
  }
  if (TRANSCRIPT_STAGES.has(event.stage)) {
    const length = event.transcript?.length ?? event.statusText.length;
    return `${label} ${icon} ${bold(STAGE_LABELS[event.stage])} ${dim(`(${length} characters of transcript)`)}`;
  }
  return `${label} ${icon} ${event.statusText}`;
}

/**
 * One NDJSON line for a pipeline event
 */
export function formatStatusEventJson(event: PipelineStatus): string {
  return JSON.stringify(event);
}

/**
 * Create a progress callback that prints every pipeline event.
 */
export function createProgressPrinter(
  options: { json?: boolean; log?: (line: string) => void } = {}
): (event: PipelineStatus) => void {
  const log = options.log ?? console.log;
  return (event) => {
    log(options.json ? formatStatusEventJson(event) : formatStatusEvent(event));
  };
}
