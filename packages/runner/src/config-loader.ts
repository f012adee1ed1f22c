import { AppConfigSchema, type AppConfig } from "@meeting-minutes/types";
import { ConfigurationError } from "@meeting-minutes/core";

export type Environment = Record<string, string | undefined>;

/** Checked in this order and reported together */
export const REQUIRED_ENV_VARS = [
  "OPENAI_API_KEY",
  "GOOGLE_CLIENT_ID",
  "GOOGLE_CLIENT_SECRET",
  "ANTHROPIC_API_KEY",
] as const;

const DEFAULT_PORT = 7860;

/**
 * Build the application configuration from environment variables.
 *
 * Optional overrides: MEETING_MINUTES_HOST, MEETING_MINUTES_PORT,
 * GOOGLE_REDIRECT_URI, GOOGLE_CREDENTIALS_FILE, MEETING_MINUTES_TOKEN_FILE,
 * MEETING_MINUTES_SUMMARY_MODEL.
 *
 * @throws ConfigurationError listing every missing required variable
 */
export function loadConfig(env: Environment = process.env): AppConfig {
  const missing = REQUIRED_ENV_VARS.filter((name) => !env[name]?.trim());
  if (missing.length > 0) {
    throw new ConfigurationError([...missing]);
  }

  const port = env.MEETING_MINUTES_PORT ? Number(env.MEETING_MINUTES_PORT) : DEFAULT_PORT;

  return validateConfig({
    google: {
      clientId: env.GOOGLE_CLIENT_ID,
      clientSecret: env.GOOGLE_CLIENT_SECRET,
      redirectUri: env.GOOGLE_REDIRECT_URI || `http://localhost:${port}/oauth/callback`,
      credentialsFile: env.GOOGLE_CREDENTIALS_FILE || undefined,
      tokenFile: env.MEETING_MINUTES_TOKEN_FILE || undefined,
    },
    server: {
      host: env.MEETING_MINUTES_HOST || undefined,
      port,
    },
    transcription: {
      apiKey: env.OPENAI_API_KEY,
    },
    summarization: {
      apiKey: env.ANTHROPIC_API_KEY,
      model: env.MEETING_MINUTES_SUMMARY_MODEL || undefined,
    },
  });
}

/**
 * Validate a configuration object.
 *
 * @throws ConfigurationError naming each invalid field
 */
export function validateConfig(config: unknown): AppConfig {
  const parsed = AppConfigSchema.safeParse(config);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new ConfigurationError([], `Invalid configuration: ${problems.join("; ")}`);
  }
  return parsed.data;
}
