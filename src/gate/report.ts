/*
Gate report helpers.
Purpose: render an evaluation as step outputs and as the markdown step summary.
Assumptions: evaluations come from evaluateJobs; nothing here changes the verdict.
*/

import type { GateEvaluation, GateOutput, JobEvaluation, JobOutcome } from "./types.js";

export type OutputFormat = "file" | "workflow-command";

// =============================================================================
// STEP OUTPUTS
// =============================================================================

export function buildGateOutputs(evaluation: Pick<GateEvaluation, "verdict">): GateOutput[] {
  return [
    { key: "failure", value: String(!evaluation.verdict) },
    { key: "result", value: evaluation.verdict ? "success" : "failure" },
    { key: "success", value: String(evaluation.verdict) },
  ];
}

export function formatOutputs(outputs: readonly GateOutput[], format: OutputFormat): string {
  const lines = outputs.map(({ key, value }) =>
    format === "file" ? `${key}=${value}` : `::set-output name=${key}::${value}`,
  );
  return `${lines.join("\n")}\n`;
}

// =============================================================================
// STEP SUMMARY
// =============================================================================

export function buildSummaryLines(evaluation: GateEvaluation): string[] {
  const lines: string[] = [];

  lines.push(
    evaluation.verdict
      ? "# 🎉 All of the required dependency jobs succeeded."
      : "# 😢 Some of the required to succeed jobs failed.",
  );

  if (evaluation.allowedToFailSucceeded !== null) {
    lines.push(
      evaluation.allowedToFailSucceeded
        ? "🛈 All of the allowed to fail dependency jobs succeeded."
        : "🛈 Some of the allowed to fail jobs did not succeed.",
    );
  }

  if (evaluation.allowedToBeSkippedSucceeded !== null) {
    lines.push(
      evaluation.allowedToBeSkippedSucceeded
        ? "🛈 All of the allowed to be skipped dependency jobs succeeded."
        : "🛈 Some of the allowed to be skipped jobs did not succeed.",
    );
  }

  lines.push("📝 Job statuses:");
  for (const job of evaluation.jobs) {
    lines.push(formatJobLine(job));
  }

  return lines;
}

export function formatJobLine(job: Pick<JobEvaluation, "name" | "outcome" | "classification">): string {
  return `📝 ${job.name} → ${outcomeMarker(job.outcome)} ${job.outcome} [${job.classification}]`;
}

// Blank lines keep each entry its own markdown paragraph.
export function renderSummary(lines: readonly string[]): string {
  return `${lines.join("\n\n")}\n`;
}

// =============================================================================
// INTERNALS
// =============================================================================

function outcomeMarker(outcome: JobOutcome): string {
  switch (outcome) {
    case "success":
      return "✓";
    case "failure":
      return "❌";
    default:
      return "⬜";
  }
}
