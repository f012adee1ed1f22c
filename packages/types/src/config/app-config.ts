import { z } from 'zod';
import { GoogleAuthConfigSchema } from './auth.js';
import { ServerConfigSchema } from './server.js';
import { SummarizationConfigSchema, TranscriptionConfigSchema } from './stages.js';

/**
 * Main application configuration schema
 */
export const AppConfigSchema = z.object({
  /** Google Drive OAuth configuration */
  google: GoogleAuthConfigSchema,
  /** HTTP server configuration */
  server: ServerConfigSchema,
  transcription: TranscriptionConfigSchema,
  summarization: SummarizationConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;
