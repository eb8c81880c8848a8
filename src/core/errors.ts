export class GateError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "GateError";
  }
}

export class ConfigError extends GateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class InvalidMatrixError extends GateError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "InvalidMatrixError";
  }
}

export class MissingJobFieldError extends GateError {
  constructor(
    public readonly jobName: string,
    public readonly field: string,
  ) {
    super(`Job "${jobName}" is missing the \`${field}\` field.`);
    this.name = "MissingJobFieldError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  invalidMatrix: "INVALID_MATRIX",
  missingJobField: "MISSING_JOB_FIELD",
  config: "CONFIG_ERROR",
  unknown: "UNKNOWN_ERROR",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  readonly code: UserFacingErrorCode;
  readonly title: string;
  readonly hint?: string;

  constructor(input: UserFacingErrorInput) {
    super(input.message, input.cause === undefined ? undefined : { cause: input.cause });
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
  }
}

export function toUserFacingError(error: unknown): UserFacingError {
  if (error instanceof UserFacingError) {
    return error;
  }

  if (error instanceof InvalidMatrixError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.invalidMatrix,
      title: "Invalid jobs matrix.",
      message: error.message,
      hint: "Pass the JSON-encoded `needs` context, e.g. `${{ toJSON(needs) }}`.",
      cause: error.cause,
    });
  }

  if (error instanceof MissingJobFieldError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.missingJobField,
      title: "Incomplete job entry.",
      message: error.message,
      hint: "Every job needs a `result` (or `outcome`) of success, failure, cancelled or skipped.",
    });
  }

  if (error instanceof ConfigError) {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.config,
      title: "Config error.",
      message: error.message,
      cause: error.cause,
    });
  }

  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.unknown,
    title: "Unexpected error.",
    message: error instanceof Error ? error.message : String(error),
    cause: error,
  });
}
