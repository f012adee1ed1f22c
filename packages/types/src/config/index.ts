// Auth configuration
export {
  DEFAULT_DRIVE_SCOPES,
  GOOGLE_AUTH_URI,
  GOOGLE_TOKEN_URI,
  GoogleAuthConfigSchema,
  OAuthClientConfigSchema,
  type GoogleAuthConfig,
  type OAuthClientConfig,
} from "./auth.js";

export {
  ClientSecretsFileSchema,
  type ClientSecretsEntry,
  type ClientSecretsFile,
} from "./client-secrets.js";

// Server configuration
export { ServerConfigSchema, type ServerConfig } from "./server.js";

// Stage configuration
export {
  SUPPORTED_AUDIO_EXTENSIONS,
  TranscriptionConfigSchema,
  SummarizationConfigSchema,
  type TranscriptionConfig,
  type SummarizationConfig,
} from "./stages.js";

// Main application configuration
export { AppConfigSchema, type AppConfig } from "./app-config.js";
