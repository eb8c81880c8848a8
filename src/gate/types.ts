// Shared gate types.
// Purpose: keep job, policy and evaluation shapes consistent across parsing, decision and reporting.

// =============================================================================
// JOBS
// =============================================================================

export const JOB_OUTCOMES = ["success", "failure", "cancelled", "skipped"] as const;

export type JobOutcome = (typeof JOB_OUTCOMES)[number];

export type JobRecord = {
  name: string;
  outcome: JobOutcome;
};

// =============================================================================
// POLICY
// =============================================================================

export type AllowSet = ReadonlySet<string>;

export type GatePolicy = {
  allowedToFail: AllowSet;
  allowedToBeSkipped: AllowSet;
  // Extends the allowed-to-fail class with `cancelled`.
  allowCancelled: boolean;
};

export type JobClassification =
  | "required to succeed"
  | "allowed to fail"
  | "required to succeed or be skipped";

// =============================================================================
// EVALUATION
// =============================================================================

export type JobEvaluation = {
  name: string;
  outcome: JobOutcome;
  classification: JobClassification;
  permitted: JobOutcome[];
  acceptable: boolean;
};

export type GateEvaluation = {
  verdict: boolean;
  jobs: JobEvaluation[];
  /** Null when the allowed-to-fail list is empty. */
  allowedToFailSucceeded: boolean | null;
  /** Null when the allowed-to-be-skipped list is empty. */
  allowedToBeSkippedSucceeded: boolean | null;
};

export type GateOutputKey = "failure" | "result" | "success";

export type GateOutput = {
  key: GateOutputKey;
  value: string;
};
