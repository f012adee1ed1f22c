import { z } from 'zod';

export const SUPPORTED_AUDIO_EXTENSIONS = ['.mp3', '.wav', '.m4a', '.flac', '.aac', '.ogg', '.wma'] as const;

/**
 * Speech-to-text stage configuration
 */
export const TranscriptionConfigSchema = z.object({
  apiKey: z.string().min(1),
  model: z.string().default('whisper-1'),
  /** Upload limit of the transcription endpoint */
  maxFileSizeMb: z.number().positive().default(25),
  supportedExtensions: z.array(z.string()).default([...SUPPORTED_AUDIO_EXTENSIONS]),
  requestTimeoutMs: z.number().int().positive().default(10 * 60 * 1000),
});

/**
 * Minutes generation stage configuration
 */
export const SummarizationConfigSchema = z.object({
  apiKey: z.string().min(1),
  model: z.string().default('claude-sonnet-4-20250514'),
  maxTokens: z.number().int().positive().default(2000),
  temperature: z.number().min(0).max(1).default(0.7),
  requestTimeoutMs: z.number().int().positive().default(10 * 60 * 1000),
});

export type TranscriptionConfig = z.infer<typeof TranscriptionConfigSchema>;
export type SummarizationConfig = z.infer<typeof SummarizationConfigSchema>;
