import { z } from "zod";
import {
  FileListResponseSchema,
  FileMetadataSchema,
  type FileListResponse,
  type FileMetadata,
} from "@meeting-minutes/types";
import { DriveApiError } from "../errors.js";
import type { FetchLike } from "../auth/provider/index.js";

export const DRIVE_API_BASE = "https://www.googleapis.com/drive/v3";

const GoogleErrorSchema = z.object({
  error: z.object({ message: z.string().optional() }).optional(),
});

export interface ListFilesParams {
  /** Drive search expression, e.g. "mimeType contains 'audio/' and trashed=false" */
  q: string;
  pageSize: number;
  fields: string;
}

/**
 * The slice of the Drive v3 API the locator and fetcher use.
 */
export interface DriveApi {
  listFiles(params: ListFilesParams): Promise<FileListResponse>;
  getFile(fileId: string, fields: string): Promise<FileMetadata>;
  downloadFile(fileId: string): Promise<AsyncIterable<Uint8Array>>;
}

export interface FetchDriveApiOptions {
  /** Called for every request, so refreshed tokens are picked up */
  getAccessToken: () => Promise<string>;
  fetchImpl?: FetchLike;
  baseUrl?: string;
}

/**
 * Drive v3 over plain REST calls with a bearer token.
 */
export class FetchDriveApi implements DriveApi {
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;

  constructor(private readonly options: FetchDriveApiOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.baseUrl = options.baseUrl ?? DRIVE_API_BASE;
  }

  async listFiles(params: ListFilesParams): Promise<FileListResponse> {
    const url = new URL(`${this.baseUrl}/files`);
    url.searchParams.set("q", params.q);
    url.searchParams.set("pageSize", String(params.pageSize));
    url.searchParams.set("fields", params.fields);

    const response = await this.request(url);
    return FileListResponseSchema.parse(await response.json());
  }

  async getFile(fileId: string, fields: string): Promise<FileMetadata> {
    const url = new URL(`${this.baseUrl}/files/${encodeURIComponent(fileId)}`);
    url.searchParams.set("fields", fields);

    const response = await this.request(url);
    return FileMetadataSchema.parse(await response.json());
  }

  async downloadFile(fileId: string): Promise<AsyncIterable<Uint8Array>> {
    const url = new URL(`${this.baseUrl}/files/${encodeURIComponent(fileId)}`);
    url.searchParams.set("alt", "media");

    const response = await this.request(url);
    if (!response.body) {
      throw new DriveApiError(response.status, `Empty response body for file ${fileId}`);
    }
    return response.body;
  }

  private async request(url: URL): Promise<Response> {
    const token = await this.options.getAccessToken();
    const response = await this.fetchImpl(url.toString(), {
      headers: { Authorization: `Bearer ${token}` },
    });

    if (!response.ok) {
      const payload: unknown = await response.json().catch(() => ({}));
      const parsed = GoogleErrorSchema.safeParse(payload);
      const message = parsed.success ? parsed.data.error?.message : undefined;
      throw new DriveApiError(
        response.status,
        message ?? `Drive API request failed with HTTP ${response.status}`
      );
    }

    return response;
  }
}
