// Output sinks.
// Purpose: append step outputs and summaries to workflow files, or to a stream when none is set.

import type { Writable } from "node:stream";

import { appendTextFile } from "../core/utils.js";

import type { OutputFormat } from "./report.js";

// =============================================================================
// TYPES
// =============================================================================

export interface OutputSink {
  readonly description: string;
  write(text: string): Promise<void>;
}

export type StepSinks = {
  outputs: OutputSink;
  outputFormat: OutputFormat;
  summary: OutputSink;
};

export type StepSinkPaths = {
  outputFile?: string;
  summaryFile?: string;
};

// =============================================================================
// SINKS
// =============================================================================

export class FileSink implements OutputSink {
  constructor(public readonly filePath: string) {}

  get description(): string {
    return this.filePath;
  }

  async write(text: string): Promise<void> {
    await appendTextFile(this.filePath, text);
  }
}

export class StreamSink implements OutputSink {
  constructor(
    private readonly stream: Writable,
    public readonly description = "stderr",
  ) {}

  write(text: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.stream.write(text, (err) => (err ? reject(err) : resolve()));
    });
  }
}

// =============================================================================
// RESOLUTION
// =============================================================================

export function resolveStepSinkPaths(args: {
  flags: StepSinkPaths;
  config: { output_file?: string; summary_file?: string };
  env?: NodeJS.ProcessEnv;
}): StepSinkPaths {
  const env = args.env ?? process.env;
  return {
    outputFile: args.flags.outputFile ?? args.config.output_file ?? nonEmpty(env.GITHUB_OUTPUT),
    summaryFile:
      args.flags.summaryFile ?? args.config.summary_file ?? nonEmpty(env.GITHUB_STEP_SUMMARY),
  };
}

export function createStepSinks(paths: StepSinkPaths, fallback: Writable = process.stderr): StepSinks {
  return {
    outputs: paths.outputFile ? new FileSink(paths.outputFile) : new StreamSink(fallback),
    outputFormat: paths.outputFile ? "file" : "workflow-command",
    summary: paths.summaryFile ? new FileSink(paths.summaryFile) : new StreamSink(fallback),
  };
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.length > 0 ? value : undefined;
}
