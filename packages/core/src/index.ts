// Errors
export {
  MinutesError,
  ConfigurationError,
  AuthorizationError,
  SourceAcquisitionError,
  TranscriptionError,
  SummarizationError,
  StorageError,
  DriveApiError,
  describeError,
  errorCode,
  type AuthorizationErrorKind,
  type SourceAcquisitionErrorKind,
} from './errors.js';

// OAuth
export * from './auth/index.js';

// Google Drive
export * from './drive/index.js';
export * from './client/index.js';

// Utilities
export { escapeHtml } from './utils/html.js';
export { formatDuration, formatMegabytes } from './utils/format.js';
