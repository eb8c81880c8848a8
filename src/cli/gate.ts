import type { Writable } from "node:stream";

import { resolveGateConfig } from "../core/config.js";
import { formatErrorMessage, renderGateError } from "../core/error-format.js";
import { InvalidMatrixError, MissingJobFieldError } from "../core/errors.js";
import { openEventLogger, type EventLogger } from "../core/logger.js";
import { defaultEvaluationId } from "../core/utils.js";
import { mergeAllowLists, normalizeAllowList } from "../gate/allow-list.js";
import { evaluateJobs } from "../gate/decision.js";
import { EMPTY_MATRIX_MESSAGE, parseJobMatrix } from "../gate/job-matrix.js";
import {
  buildGateOutputs,
  buildSummaryLines,
  formatOutputs,
  renderSummary,
} from "../gate/report.js";
import { createStepSinks, resolveStepSinkPaths, type StepSinks } from "../gate/sinks.js";
import type { GateEvaluation, GateOutput, JobRecord } from "../gate/types.js";

import { emitGateError, emitGateResult, type GateOutputOptions } from "./output.js";

// =============================================================================
// TYPES
// =============================================================================

export type GatePositionals = {
  allowedFailures: string;
  allowedSkips?: string;
  jobs?: string;
};

export type GateRunOptions = GatePositionals & {
  configPath?: string;
  allowCancelled?: boolean;
  outputFile?: string;
  summaryFile?: string;
  logFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  fallbackStream?: Writable;
};

export type GateRunResult = {
  evaluation: GateEvaluation;
  outputs: GateOutput[];
  summaryLines: string[];
  exitCode: 0 | 1;
};

export type GateCommandOptions = GateRunOptions & GateOutputOptions;

// =============================================================================
// COMMAND
// =============================================================================

export async function gateCommand(options: GateCommandOptions): Promise<void> {
  if (!options.useJson) {
    const { exitCode } = await runGate(options);
    process.exitCode = exitCode;
    return;
  }

  try {
    const { evaluation, outputs, exitCode } = await runGate(options);
    emitGateResult({ ...evaluation, outputs }, options);
    process.exitCode = exitCode;
  } catch (error) {
    console.error(renderGateError(error, { debug: options.debug }));
    emitGateError(error, options);
  }
}

export async function runGate(options: GateRunOptions): Promise<GateRunResult> {
  const { config } = resolveGateConfig({
    explicitPath: options.configPath,
    cwd: options.cwd,
    env: options.env,
  });

  const sinks = createStepSinks(
    resolveStepSinkPaths({
      flags: { outputFile: options.outputFile, summaryFile: options.summaryFile },
      config,
      env: options.env,
    }),
    options.fallbackStream,
  );

  const logger = openEventLogger(options.logFile ?? config.log_file, {
    evaluationId: defaultEvaluationId(),
  });

  try {
    const allowedToFail = mergeAllowLists(
      config.allowed_failures,
      normalizeAllowList(options.allowedFailures),
    );
    const allowedToBeSkipped = mergeAllowLists(
      config.allowed_skips,
      normalizeAllowList(options.allowedSkips),
    );
    const allowCancelled = options.allowCancelled ?? config.allow_cancelled;

    logger.log({
      type: "gate.start",
      payload: {
        allowed_to_fail: [...allowedToFail],
        allowed_to_be_skipped: [...allowedToBeSkipped],
        allow_cancelled: allowCancelled,
      },
    });

    const jobs = await parseJobsOrReport(options.jobs, sinks, logger);
    const evaluation = evaluateJobs({ jobs, allowedToFail, allowedToBeSkipped, allowCancelled });

    for (const job of evaluation.jobs) {
      logger.log({
        type: "job.evaluated",
        payload: {
          name: job.name,
          outcome: job.outcome,
          classification: job.classification,
          acceptable: job.acceptable,
        },
      });
    }

    const outputs = buildGateOutputs(evaluation);
    const summaryLines = buildSummaryLines(evaluation);
    await sinks.outputs.write(formatOutputs(outputs, sinks.outputFormat));
    await sinks.summary.write(renderSummary(summaryLines));

    logger.log({
      type: "gate.complete",
      payload: {
        verdict: evaluation.verdict,
        jobs: evaluation.jobs.length,
        outputs: sinks.outputs.description,
        summary: sinks.summary.description,
      },
    });

    return { evaluation, outputs, summaryLines, exitCode: evaluation.verdict ? 0 : 1 };
  } finally {
    logger.close();
  }
}

export function resolveGatePositionals(args: (string | undefined)[]): GatePositionals {
  const [allowedFailures = "", second, third] = args;
  if (third === undefined) {
    // Two-argument form: <allowed-failures> <jobs>.
    return { allowedFailures, jobs: second };
  }
  return { allowedFailures, allowedSkips: second, jobs: third };
}

// =============================================================================
// INTERNALS
// =============================================================================

async function parseJobsOrReport(
  raw: string | undefined,
  sinks: StepSinks,
  logger: EventLogger,
): Promise<JobRecord[]> {
  try {
    if (raw === undefined) {
      throw new InvalidMatrixError(`${EMPTY_MATRIX_MESSAGE}; no jobs argument was given`);
    }
    return parseJobMatrix(raw);
  } catch (error) {
    if (error instanceof InvalidMatrixError || error instanceof MissingJobFieldError) {
      await reportInvalidInput(error, sinks, logger);
    }
    throw error;
  }
}

async function reportInvalidInput(
  error: InvalidMatrixError | MissingJobFieldError,
  sinks: StepSinks,
  logger: EventLogger,
): Promise<void> {
  const message = formatErrorMessage(error);
  logger.log({ type: "gate.error", payload: { name: error.name, message } });

  await sinks.outputs.write(formatOutputs(buildGateOutputs({ verdict: false }), sinks.outputFormat));
  await sinks.summary.write(renderSummary([message]));
}
