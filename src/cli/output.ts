import { formatErrorMessage } from "../core/error-format.js";
import { toUserFacingError, type UserFacingErrorCode } from "../core/errors.js";

// =============================================================================
// JSON SHAPES
// =============================================================================

export type GateJsonError = {
  code: UserFacingErrorCode;
  message: string;
  hint?: string;
  details: Record<string, unknown> | null;
};

export type GateJsonEnvelope<T> =
  | {
      ok: true;
      result: T;
    }
  | {
      ok: false;
      error: GateJsonError;
    };

export type GateOutputOptions = {
  useJson: boolean;
  prettyJson: boolean;
  debug?: boolean;
};

// =============================================================================
// OUTPUT EMITTERS
// =============================================================================

export function emitGateResult<T>(result: T, output: GateOutputOptions): void {
  if (!output.useJson) return;
  writeJson({ ok: true, result }, output);
}

export function emitGateError(error: unknown, output: GateOutputOptions): void {
  writeJson({ ok: false, error: toGateJsonError(error, output) }, output);
  process.exitCode = 1;
}

export function toGateJsonError(error: unknown, output: Pick<GateOutputOptions, "debug">): GateJsonError {
  const userError = toUserFacingError(error);
  const details =
    output.debug && userError.cause !== undefined
      ? { cause: formatErrorMessage(userError.cause) }
      : null;

  return {
    code: userError.code,
    message: userError.message,
    ...(userError.hint ? { hint: userError.hint } : {}),
    details,
  };
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

function writeJson(envelope: GateJsonEnvelope<unknown>, output: GateOutputOptions): void {
  const payload = output.prettyJson ? JSON.stringify(envelope, null, 2) : JSON.stringify(envelope);
  console.log(payload);
}
