import { createWriteStream } from "node:fs";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { SourceAcquisitionError, describeError } from "../errors.js";
import type { DriveApi } from "./drive-api.js";

const DEFAULT_SUFFIX = ".mp3";
const TEMP_PREFIX = "meeting-minutes-";
const BARE_ID_PATTERN = /^[A-Za-z0-9_-]+$/;

/**
 * A downloaded file in its own temp directory. The caller owns it and must
 * call `cleanup()` once done, whatever the outcome.
 */
export interface DownloadedFile {
  path: string;
  /** Name of the file in Drive */
  name: string;
  mimeType?: string;
  sizeBytes: number;
  cleanup(): Promise<void>;
}

/**
 * Extract a file id from a bare id or a Drive share URL.
 *
 * Accepts `https://drive.google.com/file/d/{id}/view` and
 * `https://drive.google.com/open?id={id}` forms.
 */
export function parseDriveFileReference(input: string): string {
  const reference = input.trim();

  if (reference.includes("drive.google.com")) {
    const pathMatch = reference.match(/\/file\/d\/([^/?#]+)/);
    if (pathMatch?.[1]) {
      return pathMatch[1];
    }
    const queryMatch = reference.match(/[?&]id=([^&#]+)/);
    if (queryMatch?.[1]) {
      return queryMatch[1];
    }
    throw new SourceAcquisitionError("invalid_reference", "Invalid Google Drive URL format");
  }

  if (!BARE_ID_PATTERN.test(reference)) {
    throw new SourceAcquisitionError(
      "invalid_reference",
      `Not a Google Drive file id or URL: ${reference || "(empty)"}`
    );
  }
  return reference;
}

export interface DownloadOptions {
  /** Parent of the per-download directory (default: the OS temp dir) */
  tempRoot?: string;
}

/**
 * Download a Drive file to a fresh temp directory.
 */
export async function downloadDriveFile(
  api: DriveApi,
  input: string,
  options: DownloadOptions = {}
): Promise<DownloadedFile> {
  const fileId = parseDriveFileReference(input);

  let name: string;
  let mimeType: string | undefined;
  try {
    const metadata = await api.getFile(fileId, "id, name, mimeType");
    name = metadata.name ?? "downloaded_file";
    mimeType = metadata.mimeType;
  } catch (error) {
    throw new SourceAcquisitionError(
      "access_denied",
      `Error accessing file: ${describeError(error)}. Make sure you have access to this file.`,
      { cause: error }
    );
  }

  const directory = await fs.mkdtemp(path.join(options.tempRoot ?? os.tmpdir(), TEMP_PREFIX));
  const cleanup = createCleanup(directory);
  const filePath = path.join(directory, `audio${path.extname(name) || DEFAULT_SUFFIX}`);

  try {
    const content = await api.downloadFile(fileId);
    await pipeline(Readable.from(content), createWriteStream(filePath));
    const stats = await fs.stat(filePath);

    return { path: filePath, name, mimeType, sizeBytes: stats.size, cleanup };
  } catch (error) {
    await cleanup();
    throw new SourceAcquisitionError(
      "download_failed",
      `Error downloading file: ${describeError(error)}`,
      { cause: error }
    );
  }
}

function createCleanup(directory: string): () => Promise<void> {
  let done = false;
  return async () => {
    if (done) return;
    done = true;
    await fs.rm(directory, { recursive: true, force: true });
  };
}
