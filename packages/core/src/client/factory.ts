import type { OAuthAuthorizer } from '../auth/authorizer.js';
import type { FetchLike } from '../auth/provider/index.js';
import { FetchDriveApi, type DriveApi } from '../drive/drive-api.js';

export interface CreateDriveSessionOptions {
  /** Authorizer supplying (and refreshing) the access token */
  authorizer: OAuthAuthorizer;
  /** Override for tests */
  fetchImpl?: FetchLike;
  /** Drive REST base URL */
  baseUrl?: string;
}

/**
 * Create an authenticated Drive session.
 *
 * Fails early with AuthorizationError (not_authorized) when there is no
 * usable credential, rather than on the first request.
 *
 * @param options - Session creation options
 * @returns Drive API bound to the authorizer's token
 */
export async function createDriveSession(options: CreateDriveSessionOptions): Promise<DriveApi> {
  const { authorizer, fetchImpl, baseUrl } = options;

  await authorizer.getAccessToken();

  return new FetchDriveApi({
    getAccessToken: () => authorizer.getAccessToken(),
    fetchImpl,
    baseUrl,
  });
}
