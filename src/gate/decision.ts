/**
 * Gate decision engine.
 * Purpose: fold per-job outcomes into one verdict using each job's permission class.
 *
 * The two allow-list sub-verdicts use a strict "equals success" test and are
 * reporting aids only. They never feed the overall verdict.
 */

import { InvalidMatrixError } from "../core/errors.js";

import { EMPTY_MATRIX_MESSAGE } from "./job-matrix.js";
import type {
  GateEvaluation,
  GatePolicy,
  JobClassification,
  JobEvaluation,
  JobOutcome,
  JobRecord,
} from "./types.js";

// =============================================================================
// PUBLIC API
// =============================================================================

export function evaluateJobs(input: {
  jobs: readonly JobRecord[];
  allowedToFail: ReadonlySet<string>;
  allowedToBeSkipped: ReadonlySet<string>;
  allowCancelled?: boolean;
}): GateEvaluation {
  if (input.jobs.length === 0) {
    throw new InvalidMatrixError(EMPTY_MATRIX_MESSAGE);
  }

  const policy: GatePolicy = {
    allowedToFail: input.allowedToFail,
    allowedToBeSkipped: input.allowedToBeSkipped,
    allowCancelled: input.allowCancelled ?? false,
  };

  const jobs = input.jobs.map((job) => evaluateJob(job, policy));

  return {
    verdict: jobs.every((job) => job.acceptable),
    jobs,
    allowedToFailSucceeded: allSucceeded(input.jobs, policy.allowedToFail),
    allowedToBeSkippedSucceeded: allSucceeded(input.jobs, policy.allowedToBeSkipped),
  };
}

export function permissionClassFor(name: string, policy: GatePolicy): JobOutcome[] {
  const permitted: JobOutcome[] = ["success"];

  if (policy.allowedToBeSkipped.has(name)) {
    permitted.push("skipped");
  }

  if (policy.allowedToFail.has(name)) {
    permitted.push("failure");
    if (policy.allowCancelled) permitted.push("cancelled");
  }

  return permitted;
}

export function classifyJob(name: string, policy: GatePolicy): JobClassification {
  if (policy.allowedToFail.has(name)) return "allowed to fail";
  if (policy.allowedToBeSkipped.has(name)) return "required to succeed or be skipped";
  return "required to succeed";
}

// =============================================================================
// INTERNALS
// =============================================================================

function evaluateJob(job: JobRecord, policy: GatePolicy): JobEvaluation {
  const permitted = permissionClassFor(job.name, policy);
  return {
    name: job.name,
    outcome: job.outcome,
    classification: classifyJob(job.name, policy),
    permitted,
    acceptable: permitted.includes(job.outcome),
  };
}

function allSucceeded(jobs: readonly JobRecord[], names: ReadonlySet<string>): boolean | null {
  if (names.size === 0) return null;
  return jobs
    .filter((job) => names.has(job.name))
    .every((job) => job.outcome === "success");
}
