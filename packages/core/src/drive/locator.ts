import type {
  AudioSearchResult,
  DriveFileOption,
  RemoteFileDescriptor,
} from "@meeting-minutes/types";
import { describeError } from "../errors.js";
import type { DriveApi } from "./drive-api.js";

/** Keeps the picker list usable */
export const MAX_AUDIO_CANDIDATES = 20;

const SAMPLE_QUERY = "trashed=false";
const SAMPLE_PAGE_SIZE = 5;
const CATEGORY_SAMPLE_SIZE = 10;
const ROOT_SENTINELS = new Set(["0", "root"]);

/**
 * Drive has no reliable single "is audio" predicate, so several filters run
 * one after another and their results are merged.
 */
export const AUDIO_QUERIES = [
  "mimeType contains 'audio/' and trashed=false",
  "name contains '.mp3' and trashed=false",
  "name contains '.wav' and trashed=false",
  "name contains '.m4a' and trashed=false",
  "name contains '.flac' and trashed=false",
  "name contains '.aac' and trashed=false",
  "name contains '.ogg' and trashed=false",
  "name contains '.wma' and trashed=false",
];

/**
 * Search Drive for audio files the user could pick.
 *
 * A Drive with no files at all reports `empty`; a Drive with files but no
 * audio reports `no_audio` with a breakdown of what was found instead.
 */
export async function searchAudioCandidates(api: DriveApi): Promise<AudioSearchResult> {
  let sampleFiles: RemoteFileDescriptor[];
  try {
    const sample = await api.listFiles({
      q: SAMPLE_QUERY,
      pageSize: SAMPLE_PAGE_SIZE,
      fields: "files(id, name, mimeType)",
    });
    sampleFiles = sample.files;
  } catch (error) {
    return emptyResult("error", `Cannot access Google Drive files: ${describeError(error)}`);
  }

  if (sampleFiles.length === 0) {
    return emptyResult("empty", "No files found in your Google Drive.");
  }

  const matches: RemoteFileDescriptor[] = [];
  const seenIds = new Set<string>();
  let skippedQueries = 0;

  for (const q of AUDIO_QUERIES) {
    let files: RemoteFileDescriptor[];
    try {
      const result = await api.listFiles({
        q,
        pageSize: MAX_AUDIO_CANDIDATES,
        fields: "files(id, name, mimeType, webViewLink, parents)",
      });
      files = result.files;
    } catch {
      skippedQueries++;
      continue;
    }

    for (const file of files) {
      if (!seenIds.has(file.id)) {
        seenIds.add(file.id);
        matches.push(file);
      }
    }
  }

  if (matches.length === 0) {
    return {
      ...emptyResult(
        "no_audio",
        `No audio files found in your Google Drive. Found: ${summarizeCategories(sampleFiles)} files.`
      ),
      skippedQueries,
    };
  }

  const files: DriveFileOption[] = [];
  for (const descriptor of matches.slice(0, MAX_AUDIO_CANDIDATES)) {
    const displayPath = await resolveDisplayPath(api, descriptor);
    files.push({ descriptor, displayPath, label: `🎵 ${descriptor.name} - ${displayPath}` });
  }

  return {
    outcome: "found",
    summary: `Found ${matches.length} audio files in your Google Drive.`,
    files,
    totalFound: matches.length,
    skippedQueries,
  };
}

/**
 * Full "Folder / Sub / file.mp3" path of a file.
 * Falls back to the bare file name if any lookup fails.
 */
export async function resolveDisplayPath(
  api: DriveApi,
  descriptor: RemoteFileDescriptor
): Promise<string> {
  try {
    const parts = [descriptor.name];
    const visited = new Set<string>([descriptor.id]);
    let currentId = descriptor.id;

    for (;;) {
      const metadata = await api.getFile(currentId, "parents");
      const parentId = metadata.parents?.[0];

      if (!parentId || ROOT_SENTINELS.has(parentId) || visited.has(parentId)) {
        break;
      }

      const parent = await api.getFile(parentId, "name");
      parts.unshift(parent.name ?? "Unknown");
      visited.add(parentId);
      currentId = parentId;
    }

    return parts.join(" / ");
  } catch {
    return descriptor.name;
  }
}

/**
 * "2 application, 1 image" from the first few sampled files
 */
export function summarizeCategories(files: RemoteFileDescriptor[]): string {
  const counts = new Map<string, number>();
  for (const file of files.slice(0, CATEGORY_SAMPLE_SIZE)) {
    const mimeType = file.mimeType ?? "unknown";
    const category = mimeType.includes("/") ? mimeType.split("/")[0] || "unknown" : "unknown";
    counts.set(category, (counts.get(category) ?? 0) + 1);
  }

  return [...counts.entries()].map(([category, count]) => `${count} ${category}`).join(", ");
}

function emptyResult(outcome: AudioSearchResult["outcome"], summary: string): AudioSearchResult {
  return { outcome, summary, files: [], totalFound: 0, skippedQueries: 0 };
}
