import type {
  PipelineInput,
  PipelineResult,
  PipelineStage,
  PipelineStatus,
} from "@meeting-minutes/types";
import { describeError, type DownloadedFile } from "@meeting-minutes/core";
import type { Summarizer, Transcriber } from "../stages/index.js";
import { createTimer } from "./timer.js";

export const FAILURE_MARKER = "❌";

export const STATUS_TEXT = {
  initializing: "⏳ Initializing...",
  downloading: "📁 Downloading from Google Drive...",
  usingLocalFile: "📁 Using local file",
  sourceReady: "📁 File loaded successfully",
  transcribing: "🔄 Transcribing audio (this may take a few minutes)...",
  summarizingSuffix: "\n\n🤖 Generating meeting minutes...",
  noSource: `${FAILURE_MARKER} Please upload an audio file or select one from Google Drive`,
  bothSources: `${FAILURE_MARKER} Select either a local file or a Google Drive file, not both`,
  cancelled: `${FAILURE_MARKER} Cancelled`,
} as const;

export interface PipelineDependencies {
  transcriber: Transcriber;
  summarizer: Summarizer;
  /** Downloads a Drive file. Absent when Drive is not available. */
  fetchRemote?: (fileRef: string) => Promise<DownloadedFile>;
  /** Stops the run at the next stage boundary */
  signal?: AbortSignal;
  now?: () => number;
}

export type MinutesPipeline = AsyncGenerator<PipelineStatus, PipelineResult | null, undefined>;

/**
 * Acquire, transcribe and summarize one recording, yielding a status event
 * before and after each stage.
 *
 * The stream is lazy and single-use. Every failure ends it with one `failed`
 * event; nothing is thrown to the consumer. A downloaded file is removed on
 * every exit path, including the consumer calling `return()`.
 */
export async function* runMinutesPipeline(
  input: PipelineInput,
  deps: PipelineDependencies
): MinutesPipeline {
  const now = deps.now ?? Date.now;
  const timer = createTimer(now);

  const status = (
    stage: PipelineStage,
    statusText: string,
    extra: Partial<Pick<PipelineStatus, "minutesText" | "transcript">> = {}
  ): PipelineStatus => ({
    stage,
    statusText,
    minutesText: "",
    failed: false,
    timestamp: new Date(now()).toISOString(),
    ...extra,
  });

  const failure = (statusText: string): PipelineStatus => ({
    ...status("failed", statusText),
    failed: true,
  });

  const cancelled = (): boolean => deps.signal?.aborted === true;

  let downloaded: DownloadedFile | null = null;

  try {
    yield status("initializing", STATUS_TEXT.initializing);

    const { localPath, driveFileRef } = input;
    if (localPath && driveFileRef) {
      yield failure(STATUS_TEXT.bothSources);
      return null;
    }

    let audioPath: string;
    if (driveFileRef) {
      yield status("acquiring_source", STATUS_TEXT.downloading);
      if (cancelled()) {
        yield failure(STATUS_TEXT.cancelled);
        return null;
      }
      if (!deps.fetchRemote) {
        yield failure(downloadFailure("Google Drive is not configured"));
        return null;
      }
      try {
        downloaded = await deps.fetchRemote(driveFileRef);
      } catch (error) {
        yield failure(downloadFailure(describeError(error)));
        return null;
      }
      audioPath = downloaded.path;
    } else if (localPath) {
      yield status("acquiring_source", STATUS_TEXT.usingLocalFile);
      audioPath = localPath;
    } else {
      yield failure(STATUS_TEXT.noSource);
      return null;
    }

    yield status("source_ready", STATUS_TEXT.sourceReady);
    if (cancelled()) {
      yield failure(STATUS_TEXT.cancelled);
      return null;
    }

    yield status("transcribing", STATUS_TEXT.transcribing);
    let transcript: string;
    try {
      transcript = await deps.transcriber.transcribe(audioPath);
    } catch (error) {
      yield failure(`${FAILURE_MARKER} Transcription failed: ${describeError(error)}`);
      return null;
    }

    yield status("transcription_ready", transcript, { transcript });
    if (cancelled()) {
      yield failure(STATUS_TEXT.cancelled);
      return null;
    }

    yield status("summarizing", transcript + STATUS_TEXT.summarizingSuffix, { transcript });
    let minutes: string;
    try {
      minutes = await deps.summarizer.summarize(transcript);
    } catch (error) {
      yield failure(`${FAILURE_MARKER} Summarization failed: ${describeError(error)}`);
      return null;
    }

    yield status("complete", transcript, { minutesText: minutes, transcript });
    return { transcript, minutes, durationMs: timer.getDurationMs() };
  } finally {
    if (downloaded) {
      await downloaded.cleanup().catch((error: unknown) => {
        console.error(`Cleanup error: ${describeError(error)}`);
      });
    }
  }
}

function downloadFailure(message: string): string {
  return `${FAILURE_MARKER} Error downloading from Google Drive: ${message}`;
}

/**
 * Drain a pipeline, reporting each event, and return the last one.
 */
export async function collectPipeline(
  pipeline: AsyncIterable<PipelineStatus>,
  onStatus?: (status: PipelineStatus) => void
): Promise<PipelineStatus | null> {
  let last: PipelineStatus | null = null;
  for await (const event of pipeline) {
    onStatus?.(event);
    last = event;
  }
  return last;
}
