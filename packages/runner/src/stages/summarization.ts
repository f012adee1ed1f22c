import Anthropic from "@anthropic-ai/sdk";
import type { SummarizationConfig } from "@meeting-minutes/types";
import { SummarizationError, describeError } from "@meeting-minutes/core";

/**
 * Turns a transcript into markdown meeting minutes.
 */
export interface Summarizer {
  summarize(transcript: string): Promise<string>;
}

export const MINUTES_SECTIONS = [
  { title: "Meeting Summary", description: "Overview of the meeting purpose and key outcomes" },
  { title: "Attendees", description: "List of participants (extract names mentioned)" },
  { title: "Key Discussion Points", description: "Main topics and decisions discussed" },
  { title: "Action Items", description: "Specific tasks with owners and deadlines (if mentioned)" },
  { title: "Next Steps", description: "Follow-up actions or future meetings" },
  { title: "Additional Notes", description: "Any other important information" },
] as const;

const SYSTEM_PROMPT =
  "You are an assistant that produces professional meeting minutes from audio transcripts. " +
  "Create comprehensive minutes in markdown format with clear structure and actionable insights.";

export interface MinutesPrompt {
  system: string;
  user: string;
}

export function buildMinutesPrompt(transcript: string): MinutesPrompt {
  const sections = MINUTES_SECTIONS.map(
    (section, i) => `${i + 1}. **${section.title}** - ${section.description}`
  ).join("\n");

  const user = `Below is a transcript from a recorded meeting. Please analyze the transcript and create professional meeting minutes in markdown format. Include:

${sections}

Transcript:
${transcript}`;

  return { system: SYSTEM_PROMPT, user };
}

/**
 * Summarizer backed by the Anthropic Messages API.
 */
export function createAnthropicSummarizer(config: SummarizationConfig): Summarizer {
  const anthropic = new Anthropic({
    apiKey: config.apiKey,
    timeout: config.requestTimeoutMs,
    maxRetries: 0,
  });

  return {
    async summarize(transcript: string): Promise<string> {
      const prompt = buildMinutesPrompt(transcript);

      let response: Anthropic.Message;
      try {
        response = await anthropic.messages.create({
          model: config.model,
          max_tokens: config.maxTokens,
          temperature: config.temperature,
          system: prompt.system,
          messages: [{ role: "user", content: prompt.user }],
        });
      } catch (error) {
        throw new SummarizationError(describeError(error), { cause: error });
      }

      const text = response.content
        .filter((b): b is Anthropic.TextBlock => b.type === "text")
        .map((b) => b.text)
        .join("")
        .trim();

      if (!text) {
        throw new SummarizationError("The model returned no text");
      }
      return text;
    },
  };
}
