export {
  GoogleTokenEndpoint,
  buildAuthorizationUrl,
  toCredentialRecord,
  type FetchLike,
  type TokenEndpoint,
} from "./google-oauth-client.js";

export {
  createClientConfigLoader,
  readClientSecretsFile,
  type ClientConfigLoader,
  type ClientConfigSource,
} from "./client-secrets.js";
