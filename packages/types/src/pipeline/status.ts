import { z } from 'zod';

/**
 * Pipeline stages in the order they are entered.
 * `failed` may follow any of them and is terminal.
 */
export const PipelineStageSchema = z.enum([
  'initializing',
  'acquiring_source',
  'source_ready',
  'transcribing',
  'transcription_ready',
  'summarizing',
  'complete',
  'failed',
]);

export type PipelineStage = z.infer<typeof PipelineStageSchema>;

/**
 * One progress update. `minutesText` stays empty until `complete`.
 */
export const PipelineStatusSchema = z.object({
  stage: PipelineStageSchema,
  statusText: z.string(),
  minutesText: z.string(),
  failed: z.boolean(),
  timestamp: z.string(),
  transcript: z.string().optional(),
});

export type PipelineStatus = z.infer<typeof PipelineStatusSchema>;

/**
 * Exactly one source must be set
 */
export const PipelineInputSchema = z.object({
  localPath: z.string().min(1).optional(),
  driveFileRef: z.string().min(1).optional(),
});

export type PipelineInput = z.infer<typeof PipelineInputSchema>;

export interface PipelineResult {
  transcript: string;
  minutes: string;
  durationMs: number;
}
