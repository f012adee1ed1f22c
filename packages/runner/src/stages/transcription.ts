import * as fs from "node:fs";
import * as path from "node:path";
import OpenAI from "openai";
import { z } from "zod";
import type { TranscriptionConfig } from "@meeting-minutes/types";
import { TranscriptionError, describeError, formatMegabytes } from "@meeting-minutes/core";

const BYTES_PER_MB = 1024 * 1024;

/**
 * Speech-to-text for one local audio file.
 */
export interface Transcriber {
  transcribe(filePath: string): Promise<string>;
}

const TranscriptionObjectSchema = z.object({ text: z.string() });

/**
 * Check a file before uploading it. Throws TranscriptionError with the reason.
 */
export async function validateAudioFile(
  filePath: string,
  limits: Pick<TranscriptionConfig, "maxFileSizeMb" | "supportedExtensions">
): Promise<void> {
  let sizeBytes: number;
  try {
    const stats = await fs.promises.stat(filePath);
    sizeBytes = stats.size;
  } catch {
    throw new TranscriptionError("File does not exist");
  }

  if (sizeBytes / BYTES_PER_MB > limits.maxFileSizeMb) {
    throw new TranscriptionError(
      `File size (${formatMegabytes(sizeBytes)}) exceeds the ${limits.maxFileSizeMb}MB limit`
    );
  }

  const extension = path.extname(filePath).toLowerCase();
  if (!limits.supportedExtensions.includes(extension)) {
    throw new TranscriptionError(
      `Unsupported file format: ${extension}. Supported formats: ${limits.supportedExtensions.join(", ")}`
    );
  }
}

/**
 * Transcriber backed by the OpenAI audio transcription endpoint.
 * The whole file is uploaded in one request.
 */
export function createOpenAITranscriber(config: TranscriptionConfig): Transcriber {
  const openai = new OpenAI({
    apiKey: config.apiKey,
    timeout: config.requestTimeoutMs,
    maxRetries: 0,
  });

  return {
    async transcribe(filePath: string): Promise<string> {
      await validateAudioFile(filePath, config);

      let result: unknown;
      try {
        result = await openai.audio.transcriptions.create({
          model: config.model,
          file: fs.createReadStream(filePath),
          response_format: "text",
        });
      } catch (error) {
        throw new TranscriptionError(describeError(error), { cause: error });
      }

      // Plain-text responses come back as a string, JSON ones as { text }
      const text =
        typeof result === "string" ? result : TranscriptionObjectSchema.parse(result).text;
      return text.trim();
    },
  };
}
