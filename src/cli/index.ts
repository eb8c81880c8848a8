import { Command } from "commander";

import { gateCommand, resolveGatePositionals } from "./gate.js";

type GateCliOptions = {
  config?: string;
  allowCancelled?: boolean;
  outputFile?: string;
  summaryFile?: string;
  logFile?: string;
  json: boolean;
  pretty: boolean;
  debug?: boolean;
};

export function buildCli(): Command {
  const program = new Command();

  program
    .name("needs-gate")
    .description("Decide whether a workflow's dependency jobs succeeded well enough to proceed")
    .version("0.1.0")
    .argument(
      "<allowed-failures>",
      "Jobs allowed to fail (JSON array or comma-separated names)",
    )
    .argument(
      "[allowed-skips]",
      "Jobs allowed to be skipped (JSON array or comma-separated names)",
    )
    .argument("[jobs]", "JSON-encoded `needs` context")
    .option("--config <path>", "Config file (default: <repo>/.needs-gate.yaml when present)")
    .option("--allow-cancelled", "Accept cancelled jobs that are allowed to fail")
    .option("--output-file <path>", "Append step outputs here (default: $GITHUB_OUTPUT)")
    .option("--summary-file <path>", "Append the step summary here (default: $GITHUB_STEP_SUMMARY)")
    .option("--log-file <path>", "Append JSONL evaluation events to this file")
    .option("--json", "Emit the evaluation as a JSON envelope on stdout", false)
    .option("--pretty", "Pretty-print JSON output", false)
    .option("--debug", "Show error codes, causes and stack traces")
    .action(
      async (
        allowedFailures: string,
        allowedSkips: string | undefined,
        jobs: string | undefined,
        opts: GateCliOptions,
      ) => {
        const useJson = opts.json || opts.pretty;
        await gateCommand({
          ...resolveGatePositionals([allowedFailures, allowedSkips, jobs]),
          configPath: opts.config,
          allowCancelled: opts.allowCancelled,
          outputFile: opts.outputFile,
          summaryFile: opts.summaryFile,
          logFile: opts.logFile,
          useJson,
          prettyJson: opts.pretty,
          debug: opts.debug,
        });
      },
    );

  return program;
}
