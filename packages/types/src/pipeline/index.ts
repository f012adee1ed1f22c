export {
  PipelineStageSchema,
  PipelineStatusSchema,
  PipelineInputSchema,
  type PipelineStage,
  type PipelineStatus,
  type PipelineInput,
  type PipelineResult,
} from "./status.js";
