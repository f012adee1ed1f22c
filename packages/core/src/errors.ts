/**
 * Base class for every failure the application reports on purpose.
 */
export class MinutesError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Required settings are missing. Fatal at startup.
 */
export class ConfigurationError extends MinutesError {
  constructor(readonly missing: string[], message?: string) {
    super(
      'configuration_error',
      message ?? `Missing required environment variables: ${missing.join(', ')}`
    );
  }
}

export type AuthorizationErrorKind =
  | 'provider_denied'
  | 'malformed_callback'
  | 'state_mismatch'
  | 'exchange_failed'
  | 'not_authorized';

const AUTHORIZATION_MESSAGES: Record<AuthorizationErrorKind, string> = {
  provider_denied: 'Authorization failed',
  malformed_callback:
    'Invalid authorization response: Missing authorization code or state parameter.',
  state_mismatch: 'Invalid state: Authorization state mismatch. Please try again.',
  exchange_failed: 'Authorization error',
  not_authorized: 'Please authorize Google Drive access first',
};

/**
 * Authorization flow failures. All are recovered by starting authorization again.
 */
export class AuthorizationError extends MinutesError {
  constructor(
    readonly kind: AuthorizationErrorKind,
    readonly detail?: string,
    options?: { cause?: unknown }
  ) {
    const base = AUTHORIZATION_MESSAGES[kind];
    super(kind, detail ? `${base}: ${detail}` : base, options);
  }
}

export type SourceAcquisitionErrorKind =
  | 'invalid_reference'
  | 'access_denied'
  | 'download_failed';

export class SourceAcquisitionError extends MinutesError {
  constructor(
    readonly kind: SourceAcquisitionErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(kind, message, options);
  }
}

export class TranscriptionError extends MinutesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('transcription_error', message, options);
  }
}

export class SummarizationError extends MinutesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('summarization_error', message, options);
  }
}

/**
 * Local credential file could not be written or removed
 */
export class StorageError extends MinutesError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('storage_error', message, options);
  }
}

/**
 * Non-2xx response from a Google REST endpoint
 */
export class DriveApiError extends MinutesError {
  constructor(readonly status: number, message: string) {
    super('drive_api_error', message);
  }
}

/**
 * Message of anything thrown. Errors raised by Node's fs layer fail
 * `instanceof Error` when the test runner loads modules in its own realm,
 * so the message is read structurally.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}

/**
 * System error code (ENOENT, EISDIR, ...) of a thrown value, if it has one.
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
