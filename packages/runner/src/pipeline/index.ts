export {
  runMinutesPipeline,
  collectPipeline,
  FAILURE_MARKER,
  STATUS_TEXT,
  type MinutesPipeline,
  type PipelineDependencies,
} from "./orchestrator.js";
export { createTimer } from "./timer.js";
