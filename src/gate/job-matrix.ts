/**
 * Job matrix parsing.
 * Purpose: validate the JSON `needs` context into ordered job records before any decision is made.
 */

import { z } from "zod";

import { InvalidMatrixError, MissingJobFieldError } from "../core/errors.js";

import { JOB_OUTCOMES, type JobOutcome, type JobRecord } from "./types.js";

export const EMPTY_MATRIX_MESSAGE =
  "❌ Invalid input jobs matrix, please provide a non-empty `needs` context";

const JobEntrySchema = z
  .object({
    result: z.string().optional(),
    outcome: z.string().optional(),
    outputs: z.record(z.unknown()).optional(),
  })
  .passthrough();

const JobOutcomeSchema = z.enum(JOB_OUTCOMES);

type JobEntry = z.infer<typeof JobEntrySchema>;

// =============================================================================
// PUBLIC API
// =============================================================================

export function parseJobMatrix(raw: string): JobRecord[] {
  const doc = parseMatrixJson(raw);

  if (!doc || typeof doc !== "object" || Array.isArray(doc)) {
    throw new InvalidMatrixError(
      `${EMPTY_MATRIX_MESSAGE}; expected a JSON object keyed by job name`,
    );
  }

  // Entries come from the parsed document itself: JSON.parse keeps "__proto__" as an own key.
  const records = Object.entries(doc).map(([name, entry]) => ({
    name,
    outcome: resolveOutcome(name, parseJobEntry(name, entry)),
  }));
  if (records.length === 0) {
    throw new InvalidMatrixError(EMPTY_MATRIX_MESSAGE);
  }

  return records;
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseMatrixJson(raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (err) {
    throw new InvalidMatrixError(`${EMPTY_MATRIX_MESSAGE}; the value is not valid JSON`, err);
  }
}

function parseJobEntry(name: string, entry: unknown): JobEntry {
  const parsed = JobEntrySchema.safeParse(entry);
  if (!parsed.success) {
    const detail = parsed.error.errors
      .map((issue) => `${[name, ...issue.path].join(".")}: ${issue.message}`)
      .join("; ");
    throw new InvalidMatrixError(`Invalid jobs matrix: ${detail}`);
  }
  return parsed.data;
}

function resolveOutcome(name: string, entry: JobEntry): JobOutcome {
  const { result, outcome } = entry;
  if (result !== undefined && outcome !== undefined && result !== outcome) {
    throw new InvalidMatrixError(
      `Job "${name}" has conflicting result "${result}" and outcome "${outcome}".`,
    );
  }

  const value = result ?? outcome;
  if (value === undefined) {
    throw new MissingJobFieldError(name, "result");
  }

  const checked = JobOutcomeSchema.safeParse(value);
  if (!checked.success) {
    throw new InvalidMatrixError(
      `Job "${name}" has unknown result "${value}"; expected one of ${JOB_OUTCOMES.join(", ")}.`,
    );
  }

  return checked.data;
}
