import fs from "node:fs";
import path from "node:path";

import fse from "fs-extra";

import { formatErrorMessage } from "./error-format.js";
import { isoNow } from "./utils.js";

// =============================================================================
// TYPES
// =============================================================================

export type JsonValue = string | number | boolean | null | JsonArray | JsonObject;
export type JsonArray = JsonValue[];
export interface JsonObject {
  [key: string]: JsonValue;
}

export type LogEvent = JsonObject & {
  ts: string;
  type: string;
  evaluation_id: string;
  payload?: JsonObject;
};

export type LogEventInput = {
  type: string;
  evaluationId?: string;
  payload?: JsonObject;
  ts?: string | Date;
};

type EventDefaults = {
  evaluationId?: string;
};

type LogFailureAction = "open" | "write" | "close";

export interface EventLogger {
  log(event: LogEventInput): void;
  close(): void;
}

// =============================================================================
// LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly fileDescriptor: number;
  private closed = false;

  constructor(
    public readonly filePath: string,
    private readonly defaults: EventDefaults = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
    this.fileDescriptor = fs.openSync(filePath, "a");
  }

  log(event: LogEventInput): void {
    this.append(eventWithTs(event, this.defaults));
  }

  close(): void {
    if (this.closed) return;
    try {
      fs.fsyncSync(this.fileDescriptor);
      fs.closeSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("close", this.filePath, err));
    } finally {
      this.closed = true;
    }
  }

  private append(event: LogEvent): void {
    if (this.closed) return;
    try {
      fs.writeSync(this.fileDescriptor, `${JSON.stringify(event)}\n`);
      fs.fsyncSync(this.fileDescriptor);
    } catch (err) {
      console.warn(formatLogFailureWarning("write", this.filePath, err));
    }
  }
}

/** Logger used when no log file is configured or it cannot be opened. */
export const noopLogger: EventLogger = {
  log: () => undefined,
  close: () => undefined,
};

export function openEventLogger(
  filePath: string | undefined,
  defaults: EventDefaults = {},
): EventLogger {
  if (!filePath) return noopLogger;
  try {
    return new JsonlLogger(filePath, defaults);
  } catch (err) {
    console.warn(formatLogFailureWarning("open", filePath, err));
    return noopLogger;
  }
}

// =============================================================================
// EVENT HELPERS
// =============================================================================

export function eventWithTs(event: LogEventInput, defaults: EventDefaults = {}): LogEvent {
  const evaluationId = event.evaluationId ?? defaults.evaluationId;
  if (!evaluationId) {
    throw new Error("evaluation_id is required for log events");
  }

  const ts =
    typeof event.ts === "string"
      ? event.ts
      : event.ts instanceof Date
        ? event.ts.toISOString()
        : isoNow();

  const result: LogEvent = {
    ts,
    type: event.type,
    evaluation_id: evaluationId,
  };

  if (event.payload && Object.keys(event.payload).length > 0) {
    result.payload = event.payload;
  }

  return result;
}

function formatLogFailureWarning(action: LogFailureAction, filePath: string, err: unknown): string {
  return `Warning: failed to ${action} log file at ${filePath}: ${formatErrorMessage(err)}`;
}
