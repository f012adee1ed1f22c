export {
  FetchDriveApi,
  DRIVE_API_BASE,
  type DriveApi,
  type FetchDriveApiOptions,
  type ListFilesParams,
} from "./drive-api.js";

export {
  searchAudioCandidates,
  resolveDisplayPath,
  summarizeCategories,
  AUDIO_QUERIES,
  MAX_AUDIO_CANDIDATES,
} from "./locator.js";

export {
  parseDriveFileReference,
  downloadDriveFile,
  type DownloadedFile,
  type DownloadOptions,
} from "./fetcher.js";
