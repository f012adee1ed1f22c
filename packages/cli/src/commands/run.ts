import * as fs from "node:fs/promises";
import type { PipelineInput, PipelineResult } from "@meeting-minutes/types";
import type { AppContext } from "@meeting-minutes/runner";
import { createProgressPrinter, formatMinutesReport } from "../output/index.js";
import { EXIT_FAILED, EXIT_OK, reportFailure, type CommonOptions } from "./shared.js";

export interface RunCommandOptions extends CommonOptions {
  input: PipelineInput;
  /** Write the minutes to this file instead of the console */
  output?: string;
}

/**
 * Execute the run command: transcribe and summarize one recording.
 * Ctrl+C stops the pipeline at the next stage boundary.
 */
export async function runCommand(context: AppContext, options: RunCommandOptions): Promise<number> {
  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once("SIGINT", onInterrupt);

  const printStatus = createProgressPrinter({ json: options.json });

  try {
    const pipeline = context.runPipeline(options.input, controller.signal);

    let result: PipelineResult | null = null;
    for (;;) {
      const step = await pipeline.next();
      if (step.done) {
        result = step.value;
        break;
      }
      printStatus(step.value);
    }

    if (!result) {
      return EXIT_FAILED;
    }

    if (options.output) {
      await fs.writeFile(options.output, result.minutes);
    }
    if (!options.json) {
      console.log(formatMinutesReport(result, options.output));
    }
    return EXIT_OK;
  } catch (error) {
    return reportFailure(error, options);
  } finally {
    process.off("SIGINT", onInterrupt);
  }
}
