export {
  RemoteFileDescriptorSchema,
  FileListResponseSchema,
  FileMetadataSchema,
  type RemoteFileDescriptor,
  type FileListResponse,
  type FileMetadata,
  type DriveFileOption,
  type AudioSearchOutcome,
  type AudioSearchResult,
} from "./file.js";
