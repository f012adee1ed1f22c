import type { PipelineStage } from "@meeting-minutes/types";

/**
 * Terminal color codes
 */
const colors = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",

  red: "\x1b[31m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  cyan: "\x1b[36m",
  gray: "\x1b[90m",
};

let colorsEnabled = true;

export function setColorsEnabled(enabled: boolean): void {
  colorsEnabled = enabled;
}

function colorize(text: string, color: keyof typeof colors): string {
  if (!colorsEnabled) return text;
  return `${colors[color]}${text}${colors.reset}`;
}

export function bold(text: string): string {
  return colorize(text, "bold");
}

export function dim(text: string): string {
  return colorize(text, "dim");
}

export function red(text: string): string {
  return colorize(text, "red");
}

export function green(text: string): string {
  return colorize(text, "green");
}

export function yellow(text: string): string {
  return colorize(text, "yellow");
}

export function cyan(text: string): string {
  return colorize(text, "cyan");
}

export function gray(text: string): string {
  return colorize(text, "gray");
}

/**
 * Colored marker for a pipeline stage
 */
export function stageIcon(stage: PipelineStage): string {
  switch (stage) {
    case "complete":
      return green("✓");
    case "failed":
      return red("✗");
    case "transcription_ready":
    case "source_ready":
      return cyan("•");
    default:
      return gray("○");
  }
}

/**
 * Colored label for an HTTP status code
 */
export function httpStatus(code: number): string {
  const text = String(code);
  if (code >= 500) return red(text);
  if (code >= 400) return yellow(text);
  return green(text);
}
