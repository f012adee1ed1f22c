import type { SummarizationConfig } from "@meeting-minutes/types";
import { SummarizationError } from "@meeting-minutes/core";
import {
  MINUTES_SECTIONS,
  buildMinutesPrompt,
  createAnthropicSummarizer,
} from "./summarization.js";

const mockAnthropicOptions = jest.fn();
const mockMessagesCreate = jest.fn();

jest.mock("@anthropic-ai/sdk", () => ({
  __esModule: true,
  default: jest.fn().mockImplementation((options: unknown) => {
    mockAnthropicOptions(options);
    return { messages: { create: mockMessagesCreate } };
  }),
}));

describe("buildMinutesPrompt", () => {
  const transcript = "Carol: budget approved.\nDan: hiring starts next month.";

  it("fixes the assistant's role in the system text", () => {
    expect(buildMinutesPrompt(transcript).system).toBe(
      "You are an assistant that produces professional meeting minutes from audio transcripts. " +
        "Create comprehensive minutes in markdown format with clear structure and actionable insights."
    );
  });

  it("lists the six numbered sections in order", () => {
    const { user } = buildMinutesPrompt(transcript);

    expect(user).toContain(
      [
        "1. **Meeting Summary** - Overview of the meeting purpose and key outcomes",
        "2. **Attendees** - List of participants (extract names mentioned)",
        "3. **Key Discussion Points** - Main topics and decisions discussed",
        "4. **Action Items** - Specific tasks with owners and deadlines (if mentioned)",
        "5. **Next Steps** - Follow-up actions or future meetings",
        "6. **Additional Notes** - Any other important information",
      ].join("\n")
    );
    expect(MINUTES_SECTIONS).toHaveLength(6);
  });

  it("ends with the verbatim transcript", () => {
    const { user } = buildMinutesPrompt(transcript);

    expect(user.endsWith(`\n\nTranscript:\n${transcript}`)).toBe(true);
    expect(user.startsWith("Below is a transcript from a recorded meeting.")).toBe(true);
  });
});

describe("createAnthropicSummarizer", () => {
  const config: SummarizationConfig = {
    apiKey: "test-secret",
    model: "test-model",
    maxTokens: 2000,
    temperature: 0.7,
    requestTimeoutMs: 600_000,
  };
  const transcript = "Erin: ship on Friday.";

  beforeEach(() => {
    mockAnthropicOptions.mockReset();
    mockMessagesCreate.mockReset();
  });

  it("configures the client with the key, timeout and no retries", () => {
    createAnthropicSummarizer(config);

    expect(mockAnthropicOptions).toHaveBeenCalledWith({
      apiKey: "test-secret",
      timeout: 600_000,
      maxRetries: 0,
    });
  });

  it("sends the minutes prompt with the configured sampling", async () => {
    mockMessagesCreate.mockResolvedValue({
      content: [{ type: "text", text: "## Meeting Summary" }],
    });

    await createAnthropicSummarizer(config).summarize(transcript);

    const prompt = buildMinutesPrompt(transcript);
    expect(mockMessagesCreate).toHaveBeenCalledWith({
      model: "test-model",
      max_tokens: 2000,
      temperature: 0.7,
      system: prompt.system,
      messages: [{ role: "user", content: prompt.user }],
    });
  });

  it("joins the text blocks and skips the others", async () => {
    mockMessagesCreate.mockResolvedValue({
      content: [
        { type: "text", text: "## Meeting Summary\n" },
        { type: "tool_use", id: "tool-1", name: "noop", input: {} },
        { type: "text", text: "Release planned.\n" },
      ],
    });

    await expect(createAnthropicSummarizer(config).summarize(transcript)).resolves.toBe(
      "## Meeting Summary\nRelease planned."
    );
  });

  it("fails when the response carries no text", async () => {
    mockMessagesCreate.mockResolvedValue({ content: [{ type: "text", text: "  " }] });

    const attempt = createAnthropicSummarizer(config).summarize(transcript);

    await expect(attempt).rejects.toBeInstanceOf(SummarizationError);
    await expect(attempt).rejects.toThrow("The model returned no text");
  });

  it("wraps API failures in SummarizationError", async () => {
    mockMessagesCreate.mockRejectedValue(new Error("overloaded"));

    const attempt = createAnthropicSummarizer(config).summarize(transcript);

    await expect(attempt).rejects.toBeInstanceOf(SummarizationError);
    await expect(attempt).rejects.toThrow("overloaded");
  });
});
