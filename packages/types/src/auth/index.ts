export {
  CredentialRecordSchema,
  TokenResponseSchema,
  type CredentialRecord,
  type TokenResponse,
} from "./credential.js";

export type {
  StartAuthorizationOutcome,
  CompleteAuthorizationOutcome,
  OAuthCallbackParams,
  ResetOutcome,
  AuthStatus,
} from "./outcome.js";
