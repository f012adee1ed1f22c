import type { AppConfig, PipelineInput } from "@meeting-minutes/types";
import {
  FileCredentialStore,
  GoogleTokenEndpoint,
  OAuthAuthorizer,
  createClientConfigLoader,
  createDriveSession,
  downloadDriveFile,
  type DriveApi,
  type FetchLike,
} from "@meeting-minutes/core";
import {
  createAnthropicSummarizer,
  createOpenAITranscriber,
  type Summarizer,
  type Transcriber,
} from "./stages/index.js";
import { runMinutesPipeline, type MinutesPipeline } from "./pipeline/index.js";

/**
 * Everything a CLI command or HTTP route needs, built once per process.
 */
export interface AppContext {
  config: AppConfig;
  authorizer: OAuthAuthorizer;
  transcriber: Transcriber;
  summarizer: Summarizer;
  /** Drive API bound to the current credential; fails when not authorized */
  openDriveSession(): Promise<DriveApi>;
  runPipeline(input: PipelineInput, signal?: AbortSignal): MinutesPipeline;
}

export interface AppContextOverrides {
  transcriber?: Transcriber;
  summarizer?: Summarizer;
  fetchImpl?: FetchLike;
}

export function createAppContext(
  config: AppConfig,
  overrides: AppContextOverrides = {}
): AppContext {
  const { google } = config;
  const authorizer = new OAuthAuthorizer({
    store: new FileCredentialStore(google.tokenFile),
    tokenEndpoint: new GoogleTokenEndpoint(overrides.fetchImpl),
    loadClientConfig: createClientConfigLoader({
      clientId: google.clientId,
      clientSecret: google.clientSecret,
      redirectUri: google.redirectUri,
      scopes: google.scopes,
      credentialsFile: google.credentialsFile,
    }),
  });

  const transcriber = overrides.transcriber ?? createOpenAITranscriber(config.transcription);
  const summarizer = overrides.summarizer ?? createAnthropicSummarizer(config.summarization);
  const openDriveSession = () => createDriveSession({ authorizer, fetchImpl: overrides.fetchImpl });

  return {
    config,
    authorizer,
    transcriber,
    summarizer,
    openDriveSession,
    runPipeline(input, signal) {
      return runMinutesPipeline(input, {
        transcriber,
        summarizer,
        fetchRemote: async (fileRef) => downloadDriveFile(await openDriveSession(), fileRef),
        signal,
      });
    },
  };
}
