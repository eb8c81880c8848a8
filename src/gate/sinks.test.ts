import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { Writable } from "node:stream";

import { describe, expect, it } from "vitest";

import { FileSink, StreamSink, createStepSinks, resolveStepSinkPaths } from "./sinks.js";

function recordingStream(chunks: string[]): Writable {
  return new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
    },
  });
}

describe("FileSink", () => {
  it("appends to existing content and creates parent directories", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gate-sink-"));
    const filePath = path.join(dir, "nested", "output");
    const sink = new FileSink(filePath);

    await sink.write("a=1\n");
    await sink.write("b=2\n");

    expect(fs.readFileSync(filePath, "utf8")).toBe("a=1\nb=2\n");
    expect(sink.description).toBe(filePath);
  });
});

describe("StreamSink", () => {
  it("writes to the stream", async () => {
    const chunks: string[] = [];
    const stream = recordingStream(chunks);

    await new StreamSink(stream).write("hello\n");

    expect(chunks.join("")).toBe("hello\n");
  });
});

describe("resolveStepSinkPaths", () => {
  it("prefers flags, then config, then the workflow environment", () => {
    const env = { GITHUB_OUTPUT: "/env/out", GITHUB_STEP_SUMMARY: "/env/summary" };

    expect(
      resolveStepSinkPaths({
        flags: { outputFile: "/flag/out" },
        config: { summary_file: "/config/summary" },
        env,
      }),
    ).toEqual({ outputFile: "/flag/out", summaryFile: "/config/summary" });

    expect(resolveStepSinkPaths({ flags: {}, config: {}, env })).toEqual({
      outputFile: "/env/out",
      summaryFile: "/env/summary",
    });
  });

  it("treats empty environment values as unset", () => {
    expect(
      resolveStepSinkPaths({
        flags: {},
        config: {},
        env: { GITHUB_OUTPUT: "", GITHUB_STEP_SUMMARY: "" },
      }),
    ).toEqual({ outputFile: undefined, summaryFile: undefined });
  });
});

describe("createStepSinks", () => {
  it("uses workflow commands on the fallback stream without an output file", () => {
    const sinks = createStepSinks({}, recordingStream([]));

    expect(sinks.outputFormat).toBe("workflow-command");
    expect(sinks.outputs).toBeInstanceOf(StreamSink);
    expect(sinks.summary).toBeInstanceOf(StreamSink);
  });

  it("uses key=value lines with an output file", () => {
    const sinks = createStepSinks({ outputFile: "/tmp/out", summaryFile: "/tmp/summary" });

    expect(sinks.outputFormat).toBe("file");
    expect(sinks.outputs).toBeInstanceOf(FileSink);
    expect(sinks.summary.description).toBe("/tmp/summary");
  });
});
