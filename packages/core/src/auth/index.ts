// Credential storage
export {
  FileCredentialStore,
  TOKEN_SKEW_MS,
  isCredentialValid,
  isCredentialRefreshable,
  type CredentialStore,
} from './credential-store.js';

// Pending CSRF states
export { PendingStateSet } from './session/index.js';

// Provider
export {
  GoogleTokenEndpoint,
  buildAuthorizationUrl,
  toCredentialRecord,
  createClientConfigLoader,
  readClientSecretsFile,
  type FetchLike,
  type TokenEndpoint,
  type ClientConfigLoader,
  type ClientConfigSource,
} from './provider/index.js';

// Authorization state machine
export { OAuthAuthorizer, type OAuthAuthorizerOptions } from './authorizer.js';

// Callback landing pages
export {
  handleOAuthCallback,
  renderSuccessPage,
  renderErrorPage,
  type OAuthCallbackOutcome,
  type OAuthCallbackResponse,
} from './callback.js';

// Handlers
export {
  type InteractiveAuthHandler,
  createCLIAuthHandler,
  type CLIAuthHandlerOptions,
} from './handlers/index.js';
