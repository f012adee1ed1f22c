import { z } from 'zod';

/**
 * A file as returned by Drive v3 `files.list` / `files.get`
 */
export const RemoteFileDescriptorSchema = z.object({
  id: z.string(),
  name: z.string(),
  mimeType: z.string().optional(),
  parents: z.array(z.string()).optional(),
  webViewLink: z.string().optional(),
});

export type RemoteFileDescriptor = z.infer<typeof RemoteFileDescriptorSchema>;

export const FileListResponseSchema = z.object({
  files: z.array(RemoteFileDescriptorSchema).default([]),
  nextPageToken: z.string().optional(),
});

export type FileListResponse = z.infer<typeof FileListResponseSchema>;

/**
 * Partial metadata from `files.get` with a narrowed `fields` mask
 */
export const FileMetadataSchema = RemoteFileDescriptorSchema.partial();

export type FileMetadata = z.infer<typeof FileMetadataSchema>;

/**
 * Selectable entry for a file picker
 */
export interface DriveFileOption {
  descriptor: RemoteFileDescriptor;
  displayPath: string;
  label: string;
}

export type AudioSearchOutcome = 'found' | 'empty' | 'no_audio' | 'error';

export interface AudioSearchResult {
  outcome: AudioSearchOutcome;
  summary: string;
  files: DriveFileOption[];
  /** Matches before truncation */
  totalFound: number;
  /** Filter queries that failed and were left out */
  skippedQueries: number;
}
