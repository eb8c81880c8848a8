/*
Purpose: turn thrown values into ordered, typed lines and render them for stderr.
Assumptions: non-TTY output is plain text; colour only when the stream is a TTY.
Usage: console.error(renderGateError(err, { debug: isDebugEnabled }));
*/

import { MissingJobFieldError, UserFacingError, toUserFacingError } from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "job"
  | "hint"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "cyan";

export type AnsiFormatter = (text: string, styles: AnsiStyle[]) => string;

export type GateErrorRenderOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LineStyle = {
  label?: string;
  labelStyles: AnsiStyle[];
  textStyles: AnsiStyle[];
  block?: boolean;
};

const ANSI_CODES: Record<AnsiStyle, [number, number]> = {
  bold: [1, 22],
  dim: [2, 22],
  red: [31, 39],
  yellow: [33, 39],
  cyan: [36, 39],
};

const LINE_STYLES: Record<ErrorFormatLineKind, LineStyle> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  message: { labelStyles: [], textStyles: [] },
  job: { label: "Job:", labelStyles: ["cyan"], textStyles: [] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
  stack: { label: "Stack:", labelStyles: ["dim"], textStyles: ["dim"], block: true },
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export function formatErrorLines(
  error: unknown,
  options: { mode: ErrorFormatMode },
): ErrorFormatLine[] {
  const userError = toUserFacingError(error);
  const lines: ErrorFormatLine[] = [
    { kind: "title", text: userError.title },
    { kind: "message", text: userError.message },
  ];

  // Name the job the gate stopped on.
  if (error instanceof MissingJobFieldError) {
    lines.push({ kind: "job", text: `${error.jobName} (no \`${error.field}\`)` });
  }

  if (userError.hint) lines.push({ kind: "hint", text: userError.hint });

  if (options.mode !== "debug") {
    return lines;
  }

  lines.push({ kind: "code", text: userError.code });
  lines.push({ kind: "name", text: resolveErrorName(error, userError) });

  if (userError.cause !== undefined && userError.cause !== error) {
    lines.push({ kind: "cause", text: formatErrorMessage(userError.cause) });
  }

  const stack = error instanceof Error ? error.stack : undefined;
  if (stack) {
    lines.push({ kind: "stack", text: stack });
  }

  return lines;
}

export function renderGateError(error: unknown, options: GateErrorRenderOptions = {}): string {
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  const useColor = resolveColorEnabled({
    stream: options.stream ?? process.stderr,
    useColor: options.useColor,
  });
  const format = createAnsiFormatter(useColor);

  return lines.map((line) => renderLine(line, format)).join("\n");
}

export function resolveColorEnabled(input: {
  stream: { isTTY?: boolean };
  useColor?: boolean;
}): boolean {
  if (!input.stream.isTTY) return false;
  if (input.useColor !== undefined) return input.useColor;
  return process.env.NO_COLOR === undefined;
}

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  if (!enabled) {
    return (text) => text;
  }

  return (text, styles) =>
    styles.reduce((acc, style) => {
      const [open, close] = ANSI_CODES[style];
      return `\x1b[${open}m${acc}\x1b[${close}m`;
    }, text);
}

// =============================================================================
// INTERNALS
// =============================================================================

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  const style = LINE_STYLES[line.kind];
  if (!style.label) {
    return format(line.text, style.textStyles);
  }

  const label = format(style.label, style.labelStyles);
  if (style.block) {
    const body = line.text
      .split("\n")
      .map((text) => `  ${text}`)
      .join("\n");
    return `${label}\n${format(body, style.textStyles)}`;
  }

  return `${label} ${format(line.text, style.textStyles)}`;
}

function resolveErrorName(error: unknown, userError: UserFacingError): string {
  if (error instanceof Error) return error.name;
  return userError.name;
}
