export {
  createOpenAITranscriber,
  validateAudioFile,
  type Transcriber,
} from "./transcription.js";

export {
  createAnthropicSummarizer,
  buildMinutesPrompt,
  MINUTES_SECTIONS,
  type MinutesPrompt,
  type Summarizer,
} from "./summarization.js";
