import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { ConfigError } from "./errors.js";
import { CONFIG_FILE_NAME, loadGateConfig, resolveGateConfig } from "./config.js";

function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "gate-config-"));
}

afterEach(() => {
  delete process.env.GATE_TEST_SUMMARY;
});

describe("loadGateConfig", () => {
  it("applies defaults to an empty file", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "gate.yaml");
    fs.writeFileSync(configPath, "", "utf8");

    expect(loadGateConfig(configPath)).toEqual({
      allowed_failures: [],
      allowed_skips: [],
      allow_cancelled: false,
    });
  });

  it("reads lists and expands environment references", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "gate.yaml");
    process.env.GATE_TEST_SUMMARY = "/tmp/summary.md";
    fs.writeFileSync(
      configPath,
      [
        "allowed_failures:",
        "  - nightly",
        "allowed_skips: [publish]",
        "allow_cancelled: true",
        "summary_file: ${GATE_TEST_SUMMARY}",
      ].join("\n"),
      "utf8",
    );

    expect(loadGateConfig(configPath)).toEqual({
      allowed_failures: ["nightly"],
      allowed_skips: ["publish"],
      allow_cancelled: true,
      summary_file: "/tmp/summary.md",
    });
  });

  it("rejects unset environment references", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "gate.yaml");
    fs.writeFileSync(configPath, "log_file: ${GATE_TEST_UNSET_VAR}\n", "utf8");

    expect(() => loadGateConfig(configPath)).toThrow(
      "Environment variable GATE_TEST_UNSET_VAR is not set but is referenced in config.",
    );
  });

  it("expands references from the given environment only", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "gate.yaml");
    process.env.GATE_TEST_SUMMARY = "/tmp/from-process.md";
    fs.writeFileSync(configPath, "summary_file: ${GATE_TEST_SUMMARY}\n", "utf8");

    expect(loadGateConfig(configPath, { GATE_TEST_SUMMARY: "/tmp/from-env.md" }).summary_file).toBe(
      "/tmp/from-env.md",
    );
    expect(() => loadGateConfig(configPath, {})).toThrow(
      "Environment variable GATE_TEST_SUMMARY is not set but is referenced in config.",
    );
  });

  it("rejects unknown keys", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "gate.yaml");
    fs.writeFileSync(configPath, "allowed_failure: [typo]\n", "utf8");

    expect(() => loadGateConfig(configPath)).toThrow(ConfigError);
  });

  it("rejects invalid YAML", () => {
    const dir = makeTempDir();
    const configPath = path.join(dir, "gate.yaml");
    fs.writeFileSync(configPath, "allowed_failures: [unterminated\n", "utf8");

    expect(() => loadGateConfig(configPath)).toThrow(`Failed to parse YAML config: ${configPath}`);
  });

  it("reports a missing file", () => {
    const configPath = path.join(makeTempDir(), "missing.yaml");

    expect(() => loadGateConfig(configPath)).toThrow(`Config not found at: ${configPath}`);
  });
});

describe("resolveGateConfig", () => {
  it("falls back to defaults outside a repo config", () => {
    const dir = makeTempDir();

    const resolved = resolveGateConfig({ cwd: dir });

    expect(resolved.configPath).toBeNull();
    expect(resolved.source).toBe("defaults");
    expect(resolved.config.allowed_failures).toEqual([]);
  });

  it("discovers the repo config from a nested directory", () => {
    const repo = makeTempDir();
    fs.mkdirSync(path.join(repo, ".git"));
    fs.writeFileSync(path.join(repo, CONFIG_FILE_NAME), "allowed_skips: [docs]\n", "utf8");
    const nested = path.join(repo, "packages", "web");
    fs.mkdirSync(nested, { recursive: true });

    const resolved = resolveGateConfig({ cwd: nested });

    expect(resolved.source).toBe("repo");
    expect(resolved.configPath).toBe(path.join(repo, CONFIG_FILE_NAME));
    expect(resolved.config.allowed_skips).toEqual(["docs"]);
  });

  it("resolves an explicit path relative to cwd", () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "custom.yaml"), "allow_cancelled: true\n", "utf8");

    const resolved = resolveGateConfig({ cwd: dir, explicitPath: "custom.yaml" });

    expect(resolved.source).toBe("explicit");
    expect(resolved.config.allow_cancelled).toBe(true);
  });

  it("passes its environment to the loader", () => {
    const dir = makeTempDir();
    fs.writeFileSync(path.join(dir, "custom.yaml"), "log_file: ${GATE_TEST_LOG}\n", "utf8");

    const resolved = resolveGateConfig({
      cwd: dir,
      explicitPath: "custom.yaml",
      env: { GATE_TEST_LOG: "/tmp/gate.jsonl" },
    });

    expect(resolved.config.log_file).toBe("/tmp/gate.jsonl");
  });
});
